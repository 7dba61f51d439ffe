import { JobState } from "./lifecycle";

export type JobSortField = "createdAt" | "updatedAt";

/**
 * Filter and paging for job listings. Unset fields match everything.
 */
export interface JobQuery {
  target?: string;

  // one state or any of several
  state?: JobState | JobState[];

  limit?: number;
  skip?: number;
  sort?: { field: JobSortField; order: "asc" | "desc" };
}
