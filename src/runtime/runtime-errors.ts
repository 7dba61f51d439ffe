import { OrchestratorError } from "../core/errors";

export class RuntimeTimeoutError extends OrchestratorError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super("Timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "RuntimeTimeoutError";
  }
}

export class RuntimeCommandError extends OrchestratorError {
  constructor(
    readonly operation: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const reason = stderr.trim() || `exit code ${exitCode}`;
    super("RuntimeError", `${operation} failed: ${reason}`);
    this.name = "RuntimeCommandError";
  }
}
