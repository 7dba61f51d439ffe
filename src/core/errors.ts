export type ErrorCode =
  | "InvalidSpec"
  | "TargetBusy"
  | "AtCapacity"
  | "NotRunning"
  | "NotFound"
  | "AlreadyTerminal"
  | "Conflict"
  | "InvalidTransition"
  | "Timeout"
  | "RuntimeError";

export class OrchestratorError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class InvalidSpecError extends OrchestratorError {
  constructor(readonly issues: string[]) {
    super("InvalidSpec", `Invalid deployment spec: ${issues.join("; ")}`);
    this.name = "InvalidSpecError";
  }
}

export class TargetBusyError extends OrchestratorError {
  constructor(
    readonly target: string,
    readonly heldBy: string
  ) {
    super("TargetBusy", `Target ${target} is busy with job ${heldBy}`);
    this.name = "TargetBusyError";
  }
}

export class AtCapacityError extends OrchestratorError {
  constructor(readonly limit: number) {
    super("AtCapacity", `Scheduler is at capacity (${limit} concurrent jobs)`);
    this.name = "AtCapacityError";
  }
}

export class SchedulerNotRunningError extends OrchestratorError {
  constructor(message = "Scheduler is not running") {
    super("NotRunning", message);
    this.name = "SchedulerNotRunningError";
  }
}

export class AlreadyTerminalError extends OrchestratorError {
  constructor(jobId: string, state: string) {
    super("AlreadyTerminal", `Job ${jobId} is already ${state}`);
    this.name = "AlreadyTerminalError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
