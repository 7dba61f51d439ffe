import { JobStore } from "../store/job-store";
import { ContainerRuntimeClient } from "../runtime/container-runtime";
import { HealthProbe } from "../health/health-probe";
import { EventBus } from "../events/event-bus";
import { SchedulerEmitter } from "../events/emitter";
import { Logger } from "../logging/logger";

export interface StepTimeouts {
  /**
   * Image build or pull (ms)
   */
  buildMs: number;

  /**
   * Container start (ms)
   */
  runMs: number;

  /**
   * Container stop, also used for inspect calls (ms)
   */
  stopMs: number;
}

export interface HealthCheckPolicy {
  /**
   * Probe attempts before giving up
   */
  maxAttempts: number;

  /**
   * Fixed pause between attempts (ms)
   */
  intervalMs: number;

  /**
   * Hard deadline for the whole health-checking step (ms)
   */
  deadlineMs: number;

  /**
   * Limit for a single probe (ms)
   */
  probeTimeoutMs: number;
}

export interface ExecutorOptions {
  timeouts?: Partial<StepTimeouts>;
  healthCheck?: Partial<HealthCheckPolicy>;

  /**
   * Attempts at writing the terminal state after an unexpected error
   */
  finalizeAttempts?: number;
  finalizeBackoffMs?: number;
}

export interface ResolvedExecutorOptions {
  timeouts: StepTimeouts;
  healthCheck: HealthCheckPolicy;
  finalizeAttempts: number;
  finalizeBackoffMs: number;
}

export const DEFAULT_STEP_TIMEOUTS: StepTimeouts = {
  buildMs: 10 * 60 * 1000,
  runMs: 60 * 1000,
  stopMs: 30 * 1000,
};

export const DEFAULT_HEALTH_CHECK: Omit<HealthCheckPolicy, "maxAttempts"> = {
  intervalMs: 2000,
  deadlineMs: 60 * 1000,
  probeTimeoutMs: 5000,
};

/**
 * One probe per interval up to and including the deadline
 */
export function attemptsWithinDeadline(deadlineMs: number, intervalMs: number): number {
  return Math.max(1, Math.ceil(deadlineMs / intervalMs) + 1);
}

export function resolveExecutorOptions(options: ExecutorOptions = {}): ResolvedExecutorOptions {
  const healthCheck: Partial<HealthCheckPolicy> = options.healthCheck ?? {};
  const { maxAttempts, ...overrides } = healthCheck;
  const policy = { ...DEFAULT_HEALTH_CHECK, ...overrides };

  return {
    timeouts: { ...DEFAULT_STEP_TIMEOUTS, ...options.timeouts },
    healthCheck: {
      ...policy,
      maxAttempts: maxAttempts ?? attemptsWithinDeadline(policy.deadlineMs, policy.intervalMs),
    },
    finalizeAttempts: options.finalizeAttempts ?? 3,
    finalizeBackoffMs: options.finalizeBackoffMs ?? 100,
  };
}

export interface ExecutorDeps {
  store: JobStore;
  runtime: ContainerRuntimeClient;
  probe: HealthProbe;
  bus: EventBus;
  emitter: SchedulerEmitter;
  logger: Logger;
}
