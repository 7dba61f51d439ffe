import { ContainerHandle, DeploymentSpec } from "../types/job";
import { ContainerRuntimeClient } from "../runtime/container-runtime";
import { toError } from "../core/errors";

export interface ProbeTarget {
  spec: DeploymentSpec;
  container: ContainerHandle;
}

export interface ProbeResult {
  healthy: boolean;
  detail: string;
}

/**
 * One health check of a started container. Implementations resolve
 * with `healthy: false` rather than throwing for an unhealthy service.
 */
export interface HealthProbe {
  check(target: ProbeTarget, options: { timeoutMs: number }): Promise<ProbeResult>;
}

/**
 * URL probed for a spec, or undefined when the spec asks for no HTTP check
 */
export function healthCheckUrl(spec: DeploymentSpec, host = "127.0.0.1"): string | undefined {
  const path = spec.healthCheck?.path;
  if (!path) return undefined;

  const port =
    spec.healthCheck?.port ??
    spec.ports.find((mapping) => mapping.protocol === "tcp")?.host;
  if (port === undefined) return undefined;

  return `http://${host}:${port}${path.startsWith("/") ? path : `/${path}`}`;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal }
) => Promise<{ ok: boolean; status: number }>;

export interface ContainerHealthProbeOptions {
  /**
   * Host the published ports are reachable on
   */
  host?: string;
  fetch?: FetchLike;
}

/**
 * Healthy when the container is running and, if the spec names an HTTP
 * path, that path answers 2xx.
 */
export class ContainerHealthProbe implements HealthProbe {
  private readonly host: string;
  private readonly fetch: FetchLike;

  constructor(
    private readonly runtime: ContainerRuntimeClient,
    options: ContainerHealthProbeOptions = {}
  ) {
    this.host = options.host ?? "127.0.0.1";
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async check(target: ProbeTarget, options: { timeoutMs: number }): Promise<ProbeResult> {
    const status = await this.runtime.inspect(target.container, options);
    if (status !== "running") {
      return { healthy: false, detail: `container is ${status}` };
    }

    const url = healthCheckUrl(target.spec, this.host);
    if (!url) {
      return { healthy: true, detail: "container is running" };
    }

    try {
      const response = await this.fetch(url, {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      return response.ok
        ? { healthy: true, detail: `GET ${url} answered ${response.status}` }
        : { healthy: false, detail: `GET ${url} answered ${response.status}` };
    } catch (err) {
      return { healthy: false, detail: `GET ${url} failed: ${toError(err).message}` };
    }
  }
}
