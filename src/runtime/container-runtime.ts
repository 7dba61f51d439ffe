import { ContainerHandle, DeploymentSpec } from "../types/job";

export type ContainerStatus =
  | "created"
  | "running"
  | "restarting"
  | "paused"
  | "exited"
  | "dead"
  | "not-found";

export interface RuntimeCallOptions {
  /**
   * Hard limit for the call. Exceeding it rejects with RuntimeTimeoutError.
   */
  timeoutMs: number;
}

/**
 * Narrow boundary to the container engine.
 */
export interface ContainerRuntimeClient {
  /**
   * Build (or pull) the spec's image and return the image reference
   */
  build(spec: DeploymentSpec, options: RuntimeCallOptions): Promise<string>;

  /**
   * Start a detached container for the spec, replacing any stale container
   * of the same name
   */
  run(spec: DeploymentSpec, options: RuntimeCallOptions): Promise<ContainerHandle>;

  stop(handle: ContainerHandle, options: RuntimeCallOptions): Promise<void>;

  inspect(handle: ContainerHandle, options: RuntimeCallOptions): Promise<ContainerStatus>;

  /**
   * Log lines produced from now on. Each call starts a new stream;
   * nothing is replayed. Aborting `signal` ends the stream.
   */
  streamLogs(handle: ContainerHandle, options?: { signal?: AbortSignal }): AsyncIterable<string>;
}

export function containerNameFor(target: string): string {
  return `deploy-${target}`;
}
