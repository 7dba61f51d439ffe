import { Job } from "./job";
import { JobState } from "./lifecycle";

/**
 * Append-only record of one state change of a job.
 */
export interface JobEvent {
  jobId: string;
  target: string;
  state: JobState;
  timestamp: Date;
  detail: string;

  /**
   * Position in the job's event log, starting at 1
   */
  sequence: number;
}

export type NewJobEvent = Omit<JobEvent, "sequence">;

export type SchedulerEventMap = {
  // lifecycle
  "scheduler:start": void;
  "scheduler:stop": void;
  "scheduler:error": Error;

  // admission
  "job:submitted": Job;
  "job:rejected": { target: string; error: Error };

  // executor finished, lock released
  "job:settled": Job;

  // recovery
  "recovery:complete": { recovered: number };
};
