import { z } from "zod";
import { JobScheduler } from "../core/scheduler";
import { ErrorCode, OrchestratorError, toError } from "../core/errors";
import { JobQuery } from "../types/query";
import { Logger, silentLogger } from "../logging/logger";

export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export type ApiHandler = (request: ApiRequest) => Promise<ApiResponse>;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  InvalidSpec: 400,
  TargetBusy: 409,
  AtCapacity: 429,
  NotRunning: 503,
  NotFound: 404,
  AlreadyTerminal: 409,
  Conflict: 409,
  InvalidTransition: 409,
  Timeout: 504,
  RuntimeError: 502,
};

const listQuerySchema = z.object({
  target: z
    .string()
    .min(1)
    .transform((target) => target.toLowerCase())
    .optional(),
  state: z
    .enum([
      "queued",
      "building",
      "starting",
      "health_checking",
      "succeeded",
      "failed",
      "cancelled",
    ])
    .optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  skip: z.coerce.number().int().min(0).default(0),
});

export function errorResponse(err: unknown): ApiResponse {
  if (err instanceof OrchestratorError) {
    return {
      status: STATUS_BY_CODE[err.code],
      body: { error: err.code, message: err.message },
    };
  }

  return {
    status: 500,
    body: { error: "InternalError", message: toError(err).message },
  };
}

type RouteMatch = (
  request: ApiRequest,
  params: string[]
) => Promise<ApiResponse>;

interface Route {
  method: string;
  pattern: RegExp;
  handle: RouteMatch;
}

/**
 * JSON routes of the deployment API. Streaming routes live in the server.
 */
export function createApiHandler(
  scheduler: JobScheduler,
  logger: Logger = silentLogger
): ApiHandler {
  const routes: Route[] = [
    {
      method: "GET",
      pattern: /^\/health$/,
      handle: async () => ({
        status: 200,
        body: { status: "ok", scheduler: scheduler.stats(), events: scheduler.getBus().stats() },
      }),
    },
    {
      method: "POST",
      pattern: /^\/deployments$/,
      handle: async (request) => {
        const jobId = await scheduler.submit(request.body);
        return { status: 202, body: { jobId } };
      },
    },
    {
      method: "GET",
      pattern: /^\/deployments$/,
      handle: async (request) => {
        const parsed = listQuerySchema.safeParse(Object.fromEntries(request.query));
        if (!parsed.success) {
          return {
            status: 400,
            body: {
              error: "InvalidQuery",
              message: parsed.error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; "),
            },
          };
        }

        const query: JobQuery = {
          limit: parsed.data.limit,
          skip: parsed.data.skip,
          sort: { field: "createdAt", order: "desc" },
        };
        if (parsed.data.target) query.target = parsed.data.target;
        if (parsed.data.state) query.state = parsed.data.state;

        return { status: 200, body: { jobs: await scheduler.listJobs(query) } };
      },
    },
    {
      method: "GET",
      pattern: /^\/deployments\/metrics$/,
      handle: async () => ({ status: 200, body: await scheduler.deploymentMetrics() }),
    },
    {
      method: "GET",
      pattern: /^\/deployments\/([^/]+)$/,
      handle: async (_request, [jobId]) => {
        const job = await scheduler.getJob(jobId);
        if (!job) {
          return {
            status: 404,
            body: { error: "NotFound", message: `Job ${jobId} not found` },
          };
        }
        return { status: 200, body: job };
      },
    },
    {
      method: "GET",
      pattern: /^\/deployments\/([^/]+)\/events$/,
      handle: async (_request, [jobId]) => ({
        status: 200,
        body: { events: await scheduler.getJobEvents(jobId) },
      }),
    },
    {
      method: "POST",
      pattern: /^\/deployments\/([^/]+)\/cancel$/,
      handle: async (_request, [jobId]) => {
        await scheduler.cancel(jobId);
        return { status: 200, body: { ok: true } };
      },
    },
    {
      method: "POST",
      pattern: /^\/deployments\/([^/]+)\/rerun$/,
      handle: async (_request, [jobId]) => {
        const newJobId = await scheduler.rerun(jobId);
        return { status: 202, body: { jobId: newJobId } };
      },
    },
  ];

  return async (request) => {
    for (const route of routes) {
      if (route.method !== request.method) continue;

      const match = route.pattern.exec(request.pathname);
      if (!match) continue;

      try {
        return await route.handle(request, match.slice(1).map(decodeURIComponent));
      } catch (err) {
        const response = errorResponse(err);
        if (response.status >= 500) {
          logger.error("Request failed", {
            method: request.method,
            path: request.pathname,
            error: toError(err).message,
          });
        }
        return response;
      }
    }

    return {
      status: 404,
      body: { error: "NotFound", message: `No route for ${request.method} ${request.pathname}` },
    };
  };
}
