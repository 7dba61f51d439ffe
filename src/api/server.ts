import * as http from "http";
import { JobScheduler } from "../core/scheduler";
import { toError } from "../core/errors";
import { JobEvent } from "../types/events";
import { SubscriptionFilter } from "../events/subscription";
import { Logger, silentLogger } from "../logging/logger";
import { ApiHandler, createApiHandler, errorResponse } from "./routes";

const MAX_BODY_BYTES = 1024 * 1024;
const KEEP_ALIVE_MS = 15000;

export function formatSseEvent(event: JobEvent): string {
  return `id: ${event.jobId}:${event.sequence}\nevent: job\ndata: ${JSON.stringify(event)}\n\n`;
}

export function formatSseDropped(dropped: number): string {
  return `event: dropped\ndata: ${JSON.stringify({ dropped })}\n\n`;
}

/**
 * Stream matching for a Server-Sent Events route, or undefined
 */
export function matchStreamRoute(
  method: string,
  pathname: string
): { kind: "events"; filter: SubscriptionFilter } | { kind: "logs"; jobId: string } | undefined {
  if (method !== "GET") return undefined;

  if (pathname === "/events") {
    return { kind: "events", filter: {} };
  }

  const stream = /^\/deployments\/([^/]+)\/stream$/.exec(pathname);
  if (stream) {
    return { kind: "events", filter: { jobId: decodeURIComponent(stream[1]) } };
  }

  const logs = /^\/deployments\/([^/]+)\/logs$/.exec(pathname);
  if (logs) {
    return { kind: "logs", jobId: decodeURIComponent(logs[1]) };
  }

  return undefined;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

class BodyError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "BodyError";
  }
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyError(413, "Request body too large");
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (!text) return undefined;

  try {
    return JSON.parse(text);
  } catch {
    throw new BodyError(400, "Request body is not valid JSON");
  }
}

/**
 * HTTP front end: JSON routes plus live event and log streams
 */
export class DeploymentServer {
  private readonly server: http.Server;
  private readonly handler: ApiHandler;
  private readonly logger: Logger;

  constructor(
    private readonly scheduler: JobScheduler,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child("http");
    this.handler = createApiHandler(scheduler, this.logger);
    this.server = http.createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.logger.error("Request handling error", toError(err));
        if (!res.headersSent) {
          const response = errorResponse(err);
          sendJson(res, response.status, response.body);
        } else {
          res.end();
        }
      });
    });
  }

  listen(port: number, host: string): Promise<{ host: string; port: number }> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, host, () => {
        this.server.off("error", reject);
        const address = this.server.address();
        const bound = typeof address === "object" && address ? address.port : port;
        this.logger.info("HTTP server started", { url: `http://${host}:${bound}` });
        resolve({ host, port: bound });
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.scheduler.getBus().closeAll();
      this.server.closeAllConnections();
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    this.logger.debug("Request received", { method, path: url.pathname });

    const stream = matchStreamRoute(method, url.pathname);
    if (stream?.kind === "events") {
      this.streamEvents(req, res, stream.filter);
      return;
    }
    if (stream?.kind === "logs") {
      await this.streamLogs(req, res, stream.jobId);
      return;
    }

    let body: unknown;
    if (method === "POST") {
      try {
        body = await readJsonBody(req);
      } catch (err) {
        if (err instanceof BodyError) {
          sendJson(res, err.status, { error: "InvalidRequest", message: err.message });
          return;
        }
        throw err;
      }
    }

    const response = await this.handler({
      method,
      pathname: url.pathname,
      query: url.searchParams,
      body,
    });
    sendJson(res, response.status, response.body);
  }

  private streamEvents(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    filter: SubscriptionFilter
  ): void {
    const subscription = this.scheduler.subscribe(filter);
    let reportedDrops = 0;

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(": connected\n\n");

    const keepAlive = setInterval(() => res.write(": keep-alive\n\n"), KEEP_ALIVE_MS);
    req.once("close", () => {
      clearInterval(keepAlive);
      subscription.close();
    });

    const pump = async () => {
      for await (const event of subscription) {
        if (subscription.dropped > reportedDrops) {
          reportedDrops = subscription.dropped;
          res.write(formatSseDropped(reportedDrops));
        }
        res.write(formatSseEvent(event));
      }
      clearInterval(keepAlive);
      res.end();
    };

    pump().catch((err: unknown) => {
      this.logger.warn("Event stream ended with error", toError(err));
      clearInterval(keepAlive);
      res.end();
    });
  }

  private async streamLogs(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    jobId: string
  ): Promise<void> {
    const abort = new AbortController();
    let lines: AsyncIterable<string>;
    try {
      lines = await this.scheduler.streamLogs(jobId, { signal: abort.signal });
    } catch (err) {
      const response = errorResponse(err);
      sendJson(res, response.status, response.body);
      return;
    }

    res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
    req.once("close", () => abort.abort());

    for await (const line of lines) {
      res.write(`${line}\n`);
    }
    res.end();
  }
}
