import { ContainerHandle, Job, TerminalReason } from "../types/job";
import { JobEvent, NewJobEvent } from "../types/events";
import { JobState } from "../types/lifecycle";
import { JobQuery } from "../types/query";

export type NewJob = Omit<Job, "createdAt" | "updatedAt">;

/**
 * Fields written together with a state change.
 */
export interface StateUpdate {
  imageRef?: string;
  container?: ContainerHandle;
  terminalReason?: TerminalReason;
}

export interface JobStore {
  /**
   * Insert a new job. Fails if the id already exists.
   */
  create(job: NewJob): Promise<Job>;

  findById(jobId: string): Promise<Job | null>;

  /**
   * Compare-and-swap state change.
   * Throws StateConflictError when the stored state is not `expected`
   * and InvalidTransitionError when the state machine forbids the move;
   * in both cases nothing is written.
   */
  updateState(
    jobId: string,
    expected: JobState,
    next: JobState,
    update?: StateUpdate
  ): Promise<Job>;

  /**
   * Jobs for a target, newest first
   */
  listByTarget(target: string): Promise<Job[]>;

  /**
   * Append to the job's event log and return the event with its sequence
   */
  appendEvent(event: NewJobEvent): Promise<JobEvent>;

  /**
   * Event log of a job in sequence order
   */
  listEvents(jobId: string): Promise<JobEvent[]>;

  findAll(query: JobQuery): Promise<Job[]>;

  /**
   * Number of stored jobs in each state, zero for absent states
   */
  countByState(): Promise<Record<JobState, number>>;

  /**
   * Jobs left in a non-terminal state, used for crash recovery
   */
  findNonTerminal(): Promise<Job[]>;
}
