export { JobScheduler } from "./core/scheduler";
export type {
  SchedulerOptions,
  SubmitOptions,
  StopOptions,
  SchedulerStats,
} from "./core/scheduler";
export { validateDeploymentRequest, deploymentRequestSchema } from "./core/validation";
export type { DeploymentRequest } from "./core/validation";
export * from "./core/errors";

export { JobExecutor, JobFinalizationError } from "./executor/executor";
export * from "./executor/types";

export * from "./store";
export * from "./events";

export type {
  ContainerRuntimeClient,
  ContainerStatus,
  RuntimeCallOptions,
} from "./runtime/container-runtime";
export { DockerCliRuntime } from "./runtime/docker-cli-runtime";
export { RuntimeCommandError, RuntimeTimeoutError } from "./runtime/runtime-errors";
export { ContainerHealthProbe } from "./health/health-probe";
export type { HealthProbe, ProbeResult, ProbeTarget } from "./health/health-probe";

export { DeploymentServer } from "./api/server";
export { createApiHandler } from "./api/routes";
export { loadConfig } from "./config/config";
export type { AppConfig } from "./config/config";
export { createLogger, ConsoleLogger, silentLogger } from "./logging/logger";
export type { Logger, LogLevel } from "./logging/logger";

export * from "./types/job";
export * from "./types/lifecycle";
export * from "./types/events";
export * from "./types/query";
