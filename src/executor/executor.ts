import { ContainerHandle, Job, TerminalReason, TerminalReasonCode } from "../types/job";
import { JobState, TerminalState, isTerminal } from "../types/lifecycle";
import { StateUpdate } from "../store/job-store";
import { JobNotFoundError, StateConflictError } from "../store/store-errors";
import { sleep, withTimeout } from "../runtime/timeout";
import { toError } from "../core/errors";
import { Logger } from "../logging/logger";
import { CancellationToken } from "./cancellation";
import { ExecutorDeps, ResolvedExecutorOptions } from "./types";

type HealthOutcome =
  | { status: "healthy"; detail: string }
  | { status: "timeout"; detail: string }
  | { status: "cancelled" };

export class JobFinalizationError extends Error {
  constructor(
    readonly jobId: string,
    readonly lastError: Error
  ) {
    super(`Job ${jobId} could not be finalized: ${lastError.message}`);
    this.name = "JobFinalizationError";
  }
}

/**
 * Drives one job from `queued` to a terminal state.
 *
 * Every transition is written to the store (compare-and-swap on the state
 * this executor last wrote) before its event is appended and published.
 * Cancellation is cooperative: it is honored between steps and between
 * health probes, never in the middle of a runtime call.
 */
export class JobExecutor {
  private current: Job;
  private container?: ContainerHandle;
  private stopIssued = false;
  private readonly cancellation = new CancellationToken();
  private readonly logger: Logger;

  constructor(
    job: Job,
    private readonly deps: ExecutorDeps,
    private readonly options: ResolvedExecutorOptions
  ) {
    this.current = job;
    this.logger = deps.logger.child("executor");
  }

  get jobId(): string {
    return this.current.id;
  }

  get state(): JobState {
    return this.current.state;
  }

  get cancelRequested(): boolean {
    return this.cancellation.requested;
  }

  /**
   * Ask the job to stop at the next step boundary.
   * Returns false when already requested.
   */
  requestCancel(): boolean {
    const first = this.cancellation.request();
    if (first) {
      this.logger.info("Cancellation requested", {
        jobId: this.jobId,
        state: this.current.state,
      });
    }
    return first;
  }

  /**
   * Resolves with the job in a terminal state. Rejects only with
   * JobFinalizationError, when the terminal state could not be stored.
   */
  async run(): Promise<Job> {
    try {
      return await this.drive();
    } catch (err) {
      return this.recover(toError(err));
    }
  }

  private async drive(): Promise<Job> {
    const { spec } = this.current;
    const { timeouts } = this.options;

    if (this.cancellation.requested) return this.cancel();

    // building
    await this.transition("building", this.describeBuild());
    let imageRef: string;
    try {
      imageRef = await withTimeout(
        this.deps.runtime.build(spec, { timeoutMs: timeouts.buildMs }),
        timeouts.buildMs,
        `build ${spec.image}`
      );
    } catch (err) {
      return this.fail("BuildFailed", `Build failed: ${toError(err).message}`);
    }

    if (this.cancellation.requested) return this.cancel();

    // starting
    await this.transition("starting", `Starting container from ${imageRef}`, { imageRef });
    let container: ContainerHandle;
    try {
      container = await withTimeout(
        this.deps.runtime.run(spec, { timeoutMs: timeouts.runMs }),
        timeouts.runMs,
        `run ${spec.image}`
      );
    } catch (err) {
      return this.fail("StartFailed", `Start failed: ${toError(err).message}`);
    }
    this.container = container;

    if (this.cancellation.requested) return this.cancel();

    // health_checking
    await this.transition(
      "health_checking",
      `Container ${container.name} started (${container.id})`,
      { container }
    );

    const outcome = await this.awaitHealthy(container);
    if (outcome.status === "cancelled") return this.cancel();
    if (outcome.status === "timeout") {
      await this.stopContainer();
      return this.fail("HealthCheckTimeout", outcome.detail);
    }

    if (this.cancellation.requested) return this.cancel();

    return this.settle("succeeded", {
      code: "Deployed",
      message: `Deployed ${spec.image} to ${spec.target}: ${outcome.detail}`,
    });
  }

  private describeBuild(): string {
    const { spec } = this.current;
    return spec.build
      ? `Building ${spec.image} from ${spec.build.context}`
      : `Pulling ${spec.image}`;
  }

  private async awaitHealthy(container: ContainerHandle): Promise<HealthOutcome> {
    const { maxAttempts, intervalMs, deadlineMs, probeTimeoutMs } = this.options.healthCheck;
    const startedAt = Date.now();
    const deadline = startedAt + deadlineMs;

    let attempts = 0;
    let lastDetail = "no probe completed";

    while (attempts < maxAttempts) {
      if (this.cancellation.requested) return { status: "cancelled" };

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;

      attempts++;
      const timeoutMs = Math.min(probeTimeoutMs, remaining);
      try {
        const result = await withTimeout(
          this.deps.probe.check({ spec: this.current.spec, container }, { timeoutMs }),
          timeoutMs,
          "health probe"
        );
        if (result.healthy) {
          return { status: "healthy", detail: result.detail };
        }
        lastDetail = result.detail;
      } catch (err) {
        lastDetail = toError(err).message;
      }

      this.logger.debug("Health probe failed", {
        jobId: this.jobId,
        attempt: attempts,
        detail: lastDetail,
      });

      if (attempts < maxAttempts) {
        const wait = Math.min(intervalMs, deadline - Date.now());
        if (wait > 0) await sleep(wait);
      }
    }

    return {
      status: "timeout",
      detail: `Health check did not pass within ${deadlineMs}ms after ${attempts} attempt(s): ${lastDetail}`,
    };
  }

  private async cancel(): Promise<Job> {
    await this.stopContainer();
    return this.settle("cancelled", {
      code: "CancelRequested",
      message: `Cancelled while ${this.current.state}`,
    });
  }

  private async fail(code: TerminalReasonCode, message: string): Promise<Job> {
    this.logger.warn("Job failed", { jobId: this.jobId, code, message });
    return this.settle("failed", { code, message });
  }

  private async settle(state: TerminalState, reason: TerminalReason): Promise<Job> {
    await this.transition(state, reason.message, { terminalReason: reason });
    return this.current;
  }

  private async transition(next: JobState, detail: string, update: StateUpdate = {}): Promise<void> {
    const updated = await this.deps.store.updateState(
      this.current.id,
      this.current.state,
      next,
      update
    );
    this.current = updated;

    const event = await this.deps.store.appendEvent({
      jobId: updated.id,
      target: updated.target,
      state: updated.state,
      timestamp: updated.updatedAt,
      detail,
    });
    this.deps.bus.publish(event);
  }

  /**
   * Best effort: a failing stop is logged, never rethrown
   */
  private async stopContainer(): Promise<void> {
    const container = this.container;
    if (!container || this.stopIssued) return;
    this.stopIssued = true;

    const timeoutMs = this.options.timeouts.stopMs;
    try {
      await withTimeout(
        this.deps.runtime.stop(container, { timeoutMs }),
        timeoutMs,
        `stop ${container.name}`
      );
    } catch (err) {
      this.logger.warn("Failed to stop container", {
        jobId: this.jobId,
        container: container.name,
        error: toError(err).message,
      });
    }
  }

  /**
   * Unexpected error: move the job to failed(InternalError), retrying the
   * store write a bounded number of times.
   */
  private async recover(error: Error): Promise<Job> {
    if (error instanceof StateConflictError) {
      this.logger.error("State conflict, another writer touched this job", {
        jobId: this.jobId,
        expected: error.expected,
        actual: error.actual,
      });
      this.deps.emitter.emitSafe("scheduler:error", error);
    } else {
      this.logger.error("Unexpected executor error", {
        jobId: this.jobId,
        state: this.current.state,
        error: error.message,
      });
    }

    const reason: TerminalReason = {
      code: "InternalError",
      message: `Internal error: ${error.message}`,
    };

    let lastError = error;
    for (let attempt = 1; attempt <= this.options.finalizeAttempts; attempt++) {
      try {
        const stored = await this.deps.store.findById(this.jobId);
        if (!stored) throw new JobNotFoundError(this.jobId);

        this.current = stored;
        if (isTerminal(stored.state)) {
          return stored;
        }

        await this.stopContainer();
        return await this.settle("failed", reason);
      } catch (err) {
        lastError = toError(err);
        this.logger.warn("Finalize attempt failed", {
          jobId: this.jobId,
          attempt,
          error: lastError.message,
        });
        if (attempt < this.options.finalizeAttempts) {
          await sleep(this.options.finalizeBackoffMs * attempt);
        }
      }
    }

    throw new JobFinalizationError(this.jobId, lastError);
  }
}
