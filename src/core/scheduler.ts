import { v4 as uuidv4 } from "uuid";
import { SchedulerEmitter, EventBus, Subscription, SubscriptionFilter } from "../events";
import { JobEvent, SchedulerEventMap } from "../types/events";
import { DeploymentSpec, Job, TerminalReason } from "../types/job";
import { JobState, TerminalState, isTerminal } from "../types/lifecycle";
import { JobQuery } from "../types/query";
import { JobStore } from "../store/job-store";
import { JobNotFoundError } from "../store/store-errors";
import { ContainerRuntimeClient } from "../runtime/container-runtime";
import { withTimeout } from "../runtime/timeout";
import { ContainerHealthProbe, HealthProbe } from "../health/health-probe";
import { JobExecutor } from "../executor/executor";
import {
  ExecutorOptions,
  ResolvedExecutorOptions,
  resolveExecutorOptions,
} from "../executor/types";
import { Logger, silentLogger } from "../logging/logger";
import { TargetLockTable } from "./target-locks";
import { validateDeploymentRequest } from "./validation";
import {
  AlreadyTerminalError,
  AtCapacityError,
  OrchestratorError,
  SchedulerNotRunningError,
  TargetBusyError,
  toError,
} from "./errors";

export interface SchedulerOptions extends ExecutorOptions {
  /**
   * Optional unique id for this scheduler instance
   */
  id?: string;

  store: JobStore;
  runtime: ContainerRuntimeClient;

  /**
   * Defaults to ContainerHealthProbe over `runtime`
   */
  probe?: HealthProbe;
  bus?: EventBus;
  logger?: Logger;

  /**
   * Upper bound on non-terminal jobs across all targets
   */
  maxConcurrentJobs?: number;

  generateId?: () => string;
}

export interface SubmitOptions {
  /**
   * Retry counter carried by reruns
   */
  attempt?: number;
  previousJobId?: string;
}

export interface StopOptions {
  /**
   * Wait for in-flight jobs instead of cancelling them
   */
  graceful?: boolean;
  timeoutMs?: number;
}

export interface SchedulerStats {
  running: boolean;
  activeJobs: number;
  maxConcurrentJobs: number;
  lockedTargets: number;
}

/**
 * Totals over every stored job
 */
export interface DeploymentMetrics {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  inProgress: number;

  /**
   * Percentage of finished jobs that succeeded, two decimals
   */
  successRate: number;
  byState: Record<JobState, number>;
}

interface ActiveJob {
  target: string;
  executor?: JobExecutor;

  // cancel requested before the executor existed
  cancelRequested: boolean;
  done?: Promise<Job | null>;
}

/**
 * Admits deployment requests and runs each admitted job on its own
 * executor.
 *
 * Admission is synchronous up to the target claim: validation, the
 * capacity check and the claim happen without yielding, so concurrent
 * submissions for one target cannot both be admitted.
 */
export class JobScheduler {
  private readonly emitter: SchedulerEmitter;
  private readonly store: JobStore;
  private readonly runtime: ContainerRuntimeClient;
  private readonly probe: HealthProbe;
  private readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly locks = new TargetLockTable();
  private readonly active = new Map<string, ActiveJob>();
  private readonly executorOptions: ResolvedExecutorOptions;
  private readonly maxConcurrentJobs: number;
  private readonly generateId: () => string;
  private readonly id: string;
  private started = false;
  private starting?: Promise<void>;

  constructor(options: SchedulerOptions) {
    this.id = options.id ?? `scheduler-${Math.random().toString(36).slice(2)}`;
    this.logger = (options.logger ?? silentLogger).child("scheduler");
    this.emitter = new SchedulerEmitter(this.logger);
    this.store = options.store;
    this.runtime = options.runtime;
    this.probe = options.probe ?? new ContainerHealthProbe(options.runtime);
    this.bus = options.bus ?? new EventBus();
    this.maxConcurrentJobs = options.maxConcurrentJobs ?? 4;
    this.generateId = options.generateId ?? uuidv4;
    this.executorOptions = resolveExecutorOptions(options);

    if (!Number.isInteger(this.maxConcurrentJobs) || this.maxConcurrentJobs < 1) {
      throw new Error(`Invalid maxConcurrentJobs: ${this.maxConcurrentJobs}`);
    }
  }

  /**
   * Subscribe to scheduler events
   */
  on<K extends keyof SchedulerEventMap & string>(
    event: K,
    listener: (payload: SchedulerEventMap[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Recover jobs left non-terminal by a previous process, then start
   * accepting submissions
   */
  async start(): Promise<void> {
    if (this.started) return;

    if (!this.starting) {
      this.starting = this.startOnce().finally(() => {
        this.starting = undefined;
      });
    }
    return this.starting;
  }

  private async startOnce(): Promise<void> {
    const recovered = await this.recoverInterruptedJobs();
    this.started = true;

    this.logger.info("Scheduler started", { id: this.id, recovered });
    this.emitter.emitSafe("scheduler:start", undefined);
  }

  /**
   * Stop accepting submissions. Graceful stop waits for in-flight jobs
   * (up to `timeoutMs`); otherwise they are asked to cancel.
   */
  async stop(options: StopOptions = {}): Promise<void> {
    if (!this.started) return;

    this.started = false;
    this.emitter.emitSafe("scheduler:stop", undefined);

    if (!options.graceful) {
      for (const [jobId, entry] of this.active) {
        if (entry.executor && isTerminal(entry.executor.state)) continue;
        this.requestCancel(jobId);
      }
      return;
    }

    const pending = Array.from(this.active.values()).flatMap((entry) =>
      entry.done ? [entry.done] : []
    );
    const timeoutMs = options.timeoutMs ?? 30000; // default 30s

    try {
      await withTimeout(Promise.all(pending), timeoutMs, "graceful stop");
    } catch (err) {
      this.logger.warn("Graceful stop timed out", {
        pending: this.active.size,
        error: toError(err).message,
      });
    }
  }

  /**
   * Validate and admit a deployment request. Resolves with the job id as
   * soon as the queued job is stored; execution continues in the
   * background.
   *
   * @throws InvalidSpecError, TargetBusyError, AtCapacityError,
   * SchedulerNotRunningError
   */
  async submit(request: unknown, options: SubmitOptions = {}): Promise<string> {
    const spec = this.admit(request);
    const jobId = this.reserve(spec);

    let job: Job;
    try {
      job = await this.store.create({
        id: jobId,
        target: spec.target,
        spec,
        state: "queued",
        attempt: options.attempt ?? 0,
        ...(options.previousJobId ? { previousJobId: options.previousJobId } : {}),
      });
    } catch (err) {
      this.unreserve(spec.target, jobId);
      throw err;
    }

    try {
      await this.record(job, this.describeQueued(job));
    } catch (err) {
      await this.abandon(job, toError(err));
      throw err;
    }

    this.launch(job);
    this.emitter.emitSafe("job:submitted", job);
    return job.id;
  }

  /**
   * Re-submit a finished job's spec to the same target with the attempt
   * counter incremented
   */
  async rerun(jobId: string): Promise<string> {
    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    return this.submit(job.spec, {
      attempt: job.attempt + 1,
      previousJobId: job.id,
    });
  }

  /**
   * Signal cooperative cancellation. Repeating the call while the signal
   * is pending has no further effect.
   *
   * @throws JobNotFoundError, AlreadyTerminalError
   */
  async cancel(jobId: string): Promise<void> {
    if (this.requestCancel(jobId)) return;

    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (isTerminal(job.state)) throw new AlreadyTerminalError(jobId, job.state);

    // owned by no executor in this process
    await this.finalizeOrphan(job, "cancelled", {
      code: "CancelRequested",
      message: `Cancelled while ${job.state} with no live executor`,
    });

    // held since a failed recovery
    this.locks.release(job.target, job.id);
  }

  async getJob(jobId: string): Promise<Job | null> {
    return this.store.findById(jobId);
  }

  async listJobs(query: JobQuery = {}): Promise<Job[]> {
    return this.store.findAll(query);
  }

  async listByTarget(target: string): Promise<Job[]> {
    return this.store.listByTarget(target.toLowerCase());
  }

  async deploymentMetrics(): Promise<DeploymentMetrics> {
    const byState = await this.store.countByState();
    const total = Object.values(byState).reduce((sum, count) => sum + count, 0);
    const finished = byState.succeeded + byState.failed + byState.cancelled;

    return {
      total,
      succeeded: byState.succeeded,
      failed: byState.failed,
      cancelled: byState.cancelled,
      inProgress: total - finished,
      successRate: finished > 0 ? Math.round((byState.succeeded / finished) * 10000) / 100 : 0,
      byState,
    };
  }

  async getJobEvents(jobId: string): Promise<JobEvent[]> {
    return this.store.listEvents(jobId);
  }

  /**
   * Resolves with the job once its executor has settled
   */
  async waitForJob(jobId: string): Promise<Job> {
    const done = this.active.get(jobId)?.done;
    if (done) {
      const settled = await done;
      if (settled) return settled;
    }

    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /**
   * Live events; nothing emitted before the call is replayed
   */
  subscribe(filter: SubscriptionFilter = {}, options: { queueSize?: number } = {}): Subscription {
    return this.bus.subscribe(filter, options);
  }

  unsubscribe(subscription: Subscription): void {
    this.bus.unsubscribe(subscription);
  }

  /**
   * Container log lines of a job from now on
   */
  async streamLogs(
    jobId: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<AsyncIterable<string>> {
    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (!job.container) {
      throw new OrchestratorError("NotFound", `Job ${jobId} has no container`);
    }

    return this.runtime.streamLogs(job.container, options);
  }

  stats(): SchedulerStats {
    return {
      running: this.started,
      activeJobs: this.active.size,
      maxConcurrentJobs: this.maxConcurrentJobs,
      lockedTargets: this.locks.size,
    };
  }

  getBus(): EventBus {
    return this.bus;
  }

  /**
   * For testing / inspection
   */
  isRunning(): boolean {
    return this.started;
  }

  getId(): string {
    return this.id;
  }

  private admit(request: unknown): DeploymentSpec {
    try {
      if (!this.started) throw new SchedulerNotRunningError();
      return validateDeploymentRequest(request);
    } catch (err) {
      this.emitter.emitSafe("job:rejected", {
        target: rawTarget(request),
        error: toError(err),
      });
      throw err;
    }
  }

  /**
   * Claim the target and a capacity slot without yielding
   */
  private reserve(spec: DeploymentSpec): string {
    let error: Error | undefined;

    const holder = this.locks.holderOf(spec.target);
    if (holder !== undefined) {
      error = new TargetBusyError(spec.target, holder);
    } else if (this.active.size >= this.maxConcurrentJobs) {
      error = new AtCapacityError(this.maxConcurrentJobs);
    }

    let jobId = "";
    if (!error) {
      jobId = this.generateId();
      const claim = this.locks.tryClaim(spec.target, jobId);
      if (!claim.claimed) error = new TargetBusyError(spec.target, claim.heldBy);
    }

    if (error) {
      this.logger.debug("Submission rejected", { target: spec.target, error: error.message });
      this.emitter.emitSafe("job:rejected", { target: spec.target, error });
      throw error;
    }

    this.active.set(jobId, { target: spec.target, cancelRequested: false });
    return jobId;
  }

  private unreserve(target: string, jobId: string): void {
    this.active.delete(jobId);
    this.locks.release(target, jobId);
  }

  private launch(job: Job): void {
    const entry = this.active.get(job.id);
    if (!entry) {
      throw new Error(`Job ${job.id} has no reserved slot`);
    }

    const executor = new JobExecutor(
      job,
      {
        store: this.store,
        runtime: this.runtime,
        probe: this.probe,
        bus: this.bus,
        emitter: this.emitter,
        logger: this.logger,
      },
      this.executorOptions
    );

    entry.executor = executor;
    if (entry.cancelRequested) {
      executor.requestCancel();
    }

    entry.done = executor.run().then(
      (settled) => {
        this.unreserve(job.target, job.id);
        this.logger.info("Job settled", {
          jobId: job.id,
          target: job.target,
          state: settled.state,
          reason: settled.terminalReason?.code,
        });
        this.emitter.emitSafe("job:settled", settled);
        return settled;
      },
      (err: unknown) => {
        // the store still shows a live job: keep the target locked
        this.active.delete(job.id);
        const error = toError(err);
        this.logger.error("Job could not be finalized, target stays locked", {
          jobId: job.id,
          target: job.target,
          error: error.message,
        });
        this.emitter.emitSafe("scheduler:error", error);
        return null;
      }
    );
  }

  /**
   * Returns false when no executor in this process owns the job
   */
  private requestCancel(jobId: string): boolean {
    const entry = this.active.get(jobId);
    if (!entry) return false;

    if (!entry.executor) {
      entry.cancelRequested = true;
      return true;
    }
    if (isTerminal(entry.executor.state)) {
      throw new AlreadyTerminalError(jobId, entry.executor.state);
    }

    entry.executor.requestCancel();
    return true;
  }

  private describeQueued(job: Job): string {
    const attempt = job.attempt > 0 ? ` (attempt ${job.attempt})` : "";
    return `Queued deployment of ${job.spec.image} to ${job.target}${attempt}`;
  }

  private async record(job: Job, detail: string): Promise<void> {
    const event = await this.store.appendEvent({
      jobId: job.id,
      target: job.target,
      state: job.state,
      timestamp: job.updatedAt,
      detail,
    });
    this.bus.publish(event);
  }

  /**
   * The queued job was stored but could not be announced: fail it and
   * free the target
   */
  private async abandon(job: Job, error: Error): Promise<void> {
    try {
      await this.store.updateState(job.id, "queued", "failed", {
        terminalReason: {
          code: "InternalError",
          message: `Internal error: ${error.message}`,
        },
      });
      this.unreserve(job.target, job.id);
    } catch (err) {
      this.active.delete(job.id);
      this.logger.error("Queued job could not be failed, target stays locked", {
        jobId: job.id,
        error: toError(err).message,
      });
      this.emitter.emitSafe("scheduler:error", toError(err));
    }
  }

  private async finalizeOrphan(
    job: Job,
    state: TerminalState,
    reason: TerminalReason
  ): Promise<Job> {
    if (job.container) {
      try {
        await this.runtime.stop(job.container, {
          timeoutMs: this.executorOptions.timeouts.stopMs,
        });
      } catch (err) {
        this.logger.warn("Failed to stop container of interrupted job", {
          jobId: job.id,
          container: job.container.name,
          error: toError(err).message,
        });
      }
    }

    const updated = await this.store.updateState(job.id, job.state, state, {
      terminalReason: reason,
    });
    await this.record(updated, reason.message);
    return updated;
  }

  /**
   * Fail every job a previous process left behind. A job that cannot be
   * finalized keeps its target locked.
   */
  private async recoverInterruptedJobs(): Promise<number> {
    const orphans = (await this.store.findNonTerminal()).filter(
      (job) => !this.active.has(job.id)
    );

    let recovered = 0;
    for (const job of orphans) {
      try {
        await this.finalizeOrphan(job, "failed", {
          code: "InternalError",
          message: `Interrupted by scheduler restart while ${job.state}`,
        });
        recovered++;
      } catch (err) {
        const error = toError(err);
        if (await this.stillLive(job)) {
          this.locks.tryClaim(job.target, job.id);
        }
        this.logger.error("Could not recover interrupted job", {
          jobId: job.id,
          target: job.target,
          error: error.message,
        });
        this.emitter.emitSafe("scheduler:error", error);
      }
    }

    this.emitter.emitSafe("recovery:complete", { recovered });
    return recovered;
  }

  /**
   * Whether the store still shows the job as non-terminal. An unreadable
   * store counts as live.
   */
  private async stillLive(job: Job): Promise<boolean> {
    try {
      const current = await this.store.findById(job.id);
      return current !== null && !isTerminal(current.state);
    } catch (err) {
      this.logger.warn("Could not re-read interrupted job", {
        jobId: job.id,
        error: toError(err).message,
      });
      return true;
    }
  }
}

function rawTarget(request: unknown): string {
  if (typeof request === "object" && request !== null && "target" in request) {
    const { target } = request;
    if (typeof target === "string") return target;
  }
  return "";
}
