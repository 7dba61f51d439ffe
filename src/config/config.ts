import { z } from "zod";
import { InvalidConfigError } from "./config-errors";

const intFromEnv = (fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

/**
 * Environment variables read at startup, all prefixed with DEPLOY_.
 */
export const envSchema = z.object({
  DEPLOY_HOST: z.string().min(1).default("127.0.0.1"),
  DEPLOY_PORT: intFromEnv(8080, 0, 65535),

  DEPLOY_STORE: z.enum(["memory", "mongo"]).default("memory"),
  DEPLOY_MONGO_URI: z.string().url().optional(),
  DEPLOY_MONGO_DB: z.string().min(1).default("deployments"),

  DEPLOY_MAX_CONCURRENT_JOBS: intFromEnv(4),
  DEPLOY_BUILD_TIMEOUT_MS: intFromEnv(10 * 60 * 1000),
  DEPLOY_RUN_TIMEOUT_MS: intFromEnv(60 * 1000),
  DEPLOY_STOP_TIMEOUT_MS: intFromEnv(30 * 1000),

  // derived from deadline and interval when unset
  DEPLOY_HEALTH_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  DEPLOY_HEALTH_INTERVAL_MS: intFromEnv(2000),
  DEPLOY_HEALTH_DEADLINE_MS: intFromEnv(60 * 1000),
  DEPLOY_HEALTH_PROBE_TIMEOUT_MS: intFromEnv(5000),
  DEPLOY_HEALTH_HOST: z.string().min(1).default("127.0.0.1"),

  DEPLOY_EVENT_QUEUE_SIZE: intFromEnv(256),
  DEPLOY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DEPLOY_DOCKER_BINARY: z.string().min(1).default("docker"),
});

export type StoreConfig =
  | { backend: "memory" }
  | { backend: "mongo"; uri: string; dbName: string };

export interface AppConfig {
  http: { host: string; port: number };
  store: StoreConfig;
  scheduler: {
    maxConcurrentJobs: number;
    timeouts: { buildMs: number; runMs: number; stopMs: number };
    healthCheck: {
      maxAttempts?: number;
      intervalMs: number;
      deadlineMs: number;
      probeTimeoutMs: number;
    };
  };
  healthHost: string;
  eventQueueSize: number;
  logLevel: "debug" | "info" | "warn" | "error";
  dockerBinary: string;
}

/**
 * Parse and validate configuration. Throws InvalidConfigError listing
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = result.data;

  let store: StoreConfig;
  if (vars.DEPLOY_STORE === "mongo") {
    if (!vars.DEPLOY_MONGO_URI) {
      throw new InvalidConfigError([
        "DEPLOY_MONGO_URI: required when DEPLOY_STORE is mongo",
      ]);
    }
    store = { backend: "mongo", uri: vars.DEPLOY_MONGO_URI, dbName: vars.DEPLOY_MONGO_DB };
  } else {
    store = { backend: "memory" };
  }

  return {
    http: { host: vars.DEPLOY_HOST, port: vars.DEPLOY_PORT },
    store,
    scheduler: {
      maxConcurrentJobs: vars.DEPLOY_MAX_CONCURRENT_JOBS,
      timeouts: {
        buildMs: vars.DEPLOY_BUILD_TIMEOUT_MS,
        runMs: vars.DEPLOY_RUN_TIMEOUT_MS,
        stopMs: vars.DEPLOY_STOP_TIMEOUT_MS,
      },
      healthCheck: {
        ...(vars.DEPLOY_HEALTH_MAX_ATTEMPTS !== undefined
          ? { maxAttempts: vars.DEPLOY_HEALTH_MAX_ATTEMPTS }
          : {}),
        intervalMs: vars.DEPLOY_HEALTH_INTERVAL_MS,
        deadlineMs: vars.DEPLOY_HEALTH_DEADLINE_MS,
        probeTimeoutMs: vars.DEPLOY_HEALTH_PROBE_TIMEOUT_MS,
      },
    },
    healthHost: vars.DEPLOY_HEALTH_HOST,
    eventQueueSize: vars.DEPLOY_EVENT_QUEUE_SIZE,
    logLevel: vars.DEPLOY_LOG_LEVEL,
    dockerBinary: vars.DEPLOY_DOCKER_BINARY,
  };
}
