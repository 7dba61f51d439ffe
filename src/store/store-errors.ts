import { OrchestratorError } from "../core/errors";
import { JobState } from "../types/lifecycle";

export class JobNotFoundError extends OrchestratorError {
  constructor(jobId: string) {
    super("NotFound", `Job ${jobId} not found`);
    this.name = "JobNotFoundError";
  }
}

/**
 * Compare-and-swap failure: the stored state is not the one the writer
 * expected. Nothing was written.
 */
export class StateConflictError extends OrchestratorError {
  constructor(
    readonly jobId: string,
    readonly expected: JobState,
    readonly actual: JobState
  ) {
    super(
      "Conflict",
      `Job ${jobId} state conflict: expected ${expected}, found ${actual}`
    );
    this.name = "StateConflictError";
  }
}

export class InvalidTransitionError extends OrchestratorError {
  constructor(
    readonly jobId: string,
    readonly from: JobState,
    readonly to: JobState
  ) {
    super("InvalidTransition", `Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}
