import { JobState } from "./lifecycle";

export type PortProtocol = "tcp" | "udp";

export interface PortMapping {
  host: number;
  container: number;
  protocol: PortProtocol;
}

export interface ResourceLimits {
  /**
   * Fractional CPU quota (docker --cpus)
   */
  cpus?: number;

  /**
   * Memory limit in megabytes
   */
  memoryMb?: number;
}

export interface BuildOptions {
  /**
   * Build context directory. When absent the image is pulled instead.
   */
  context: string;
  dockerfile?: string;
}

export interface HealthCheckOptions {
  /**
   * HTTP path probed on the published port, e.g. "/api/health-check"
   */
  path?: string;

  /**
   * Host port to probe. Defaults to the first published tcp port.
   */
  port?: number;
}

/**
 * Immutable, validated deployment request.
 */
export interface DeploymentSpec {
  target: string;
  image: string;
  ports: PortMapping[];
  env: Record<string, string>;
  resources?: ResourceLimits;
  build?: BuildOptions;
  healthCheck?: HealthCheckOptions;
}

export type TerminalReasonCode =
  | "Deployed"
  | "CancelRequested"
  | "BuildFailed"
  | "StartFailed"
  | "HealthCheckTimeout"
  | "InternalError";

export interface TerminalReason {
  code: TerminalReasonCode;
  message: string;
}

export interface ContainerHandle {
  id: string;
  name: string;
}

export interface Job {
  id: string;

  // serialization key
  target: string;
  spec: DeploymentSpec;

  state: JobState;
  attempt: number;
  previousJobId?: string;

  // step outputs
  imageRef?: string;
  container?: ContainerHandle;

  // only set once terminal
  terminalReason?: TerminalReason;

  createdAt: Date;
  updatedAt: Date;
}
