import { createInterface } from "readline";
import { ContainerHandle, DeploymentSpec } from "../types/job";
import {
  ContainerRuntimeClient,
  ContainerStatus,
  RuntimeCallOptions,
  containerNameFor,
} from "./container-runtime";
import { NodeProcessSpawner, ProcessSpawner, SpawnedProcess } from "./process-spawner";
import { RuntimeCommandError, RuntimeTimeoutError } from "./runtime-errors";
import { withTimeout } from "./timeout";
import { Logger, silentLogger } from "../logging/logger";

export interface DockerCliRuntimeOptions {
  /**
   * Docker executable, defaults to "docker" on PATH
   */
  binary?: string;
  spawner?: ProcessSpawner;
  logger?: Logger;
}

interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

const KNOWN_STATUSES: readonly ContainerStatus[] = [
  "created",
  "running",
  "restarting",
  "paused",
  "exited",
  "dead",
];

function isContainerStatus(value: string): value is ContainerStatus {
  return (KNOWN_STATUSES as readonly string[]).includes(value);
}

export function buildArgs(spec: DeploymentSpec): string[] {
  if (!spec.build) {
    return ["pull", spec.image];
  }

  const args = ["build", "-t", spec.image];
  if (spec.build.dockerfile) {
    args.push("-f", spec.build.dockerfile);
  }
  args.push(spec.build.context);
  return args;
}

export function runArgs(spec: DeploymentSpec): string[] {
  const args = [
    "run",
    "-d",
    "--name",
    containerNameFor(spec.target),
    "--label",
    `deploy.target=${spec.target}`,
  ];

  for (const port of spec.ports) {
    args.push("-p", `${port.host}:${port.container}/${port.protocol}`);
  }
  for (const [key, value] of Object.entries(spec.env)) {
    args.push("-e", `${key}=${value}`);
  }
  if (spec.resources?.cpus != null) {
    args.push("--cpus", String(spec.resources.cpus));
  }
  if (spec.resources?.memoryMb != null) {
    args.push("--memory", `${spec.resources.memoryMb}m`);
  }

  args.push(spec.image);
  return args;
}

/**
 * ContainerRuntimeClient driving the docker CLI
 */
export class DockerCliRuntime implements ContainerRuntimeClient {
  private readonly binary: string;
  private readonly spawner: ProcessSpawner;
  private readonly logger: Logger;

  constructor(options: DockerCliRuntimeOptions = {}) {
    this.binary = options.binary ?? "docker";
    this.spawner = options.spawner ?? new NodeProcessSpawner();
    this.logger = options.logger ?? silentLogger;
  }

  async build(spec: DeploymentSpec, options: RuntimeCallOptions): Promise<string> {
    const operation = spec.build ? `build ${spec.image}` : `pull ${spec.image}`;
    await this.execChecked(buildArgs(spec), options.timeoutMs, operation);
    return spec.image;
  }

  async run(spec: DeploymentSpec, options: RuntimeCallOptions): Promise<ContainerHandle> {
    const name = containerNameFor(spec.target);

    // a previous deployment of this target owns the name and ports
    const removed = await this.exec(["rm", "-f", name], options.timeoutMs, `remove ${name}`);
    if (removed.exitCode === 0) {
      this.logger.debug("Removed previous container", { name });
    }

    const result = await this.execChecked(runArgs(spec), options.timeoutMs, `run ${name}`);
    const lines = result.stdout.split("\n").map((line) => line.trim()).filter(Boolean);
    const id = lines[lines.length - 1];

    if (!id) {
      throw new RuntimeCommandError(`run ${name}`, result.exitCode, "no container id reported");
    }

    return { id, name };
  }

  async stop(handle: ContainerHandle, options: RuntimeCallOptions): Promise<void> {
    await this.execChecked(["stop", handle.id], options.timeoutMs, `stop ${handle.name}`);
  }

  async inspect(handle: ContainerHandle, options: RuntimeCallOptions): Promise<ContainerStatus> {
    const operation = `inspect ${handle.name}`;
    const result = await this.exec(
      ["inspect", "--format", "{{.State.Status}}", handle.id],
      options.timeoutMs,
      operation
    );

    if (result.exitCode !== 0) {
      if (/no such (object|container)/i.test(result.stderr)) {
        return "not-found";
      }
      throw new RuntimeCommandError(operation, result.exitCode, result.stderr);
    }

    const status = result.stdout.trim();
    if (!isContainerStatus(status)) {
      throw new RuntimeCommandError(operation, result.exitCode, `unknown status "${status}"`);
    }
    return status;
  }

  async *streamLogs(
    handle: ContainerHandle,
    options: { signal?: AbortSignal } = {}
  ): AsyncIterable<string> {
    // --tail 0: start at "now", nothing is replayed
    const proc = this.spawner.spawn(this.binary, [
      "logs",
      "--follow",
      "--tail",
      "0",
      handle.id,
    ]);

    const onAbort = () => proc.kill();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) proc.kill();

    try {
      yield* followLines(proc);
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      proc.kill();
    }
  }

  private async exec(
    args: string[],
    timeoutMs: number,
    operation: string
  ): Promise<CommandResult> {
    this.logger.debug("docker", { args });
    const proc = this.spawner.spawn(this.binary, args);

    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    try {
      const exitCode = await withTimeout(proc.exited, timeoutMs, operation);
      return { exitCode, stdout, stderr };
    } catch (err) {
      if (err instanceof RuntimeTimeoutError) {
        proc.kill();
      }
      throw err;
    }
  }

  private async execChecked(
    args: string[],
    timeoutMs: number,
    operation: string
  ): Promise<CommandResult> {
    const result = await this.exec(args, timeoutMs, operation);
    if (result.exitCode !== 0) {
      throw new RuntimeCommandError(operation, result.exitCode, result.stderr);
    }
    return result;
  }
}

/**
 * Interleave stdout and stderr lines until the process exits
 */
async function* followLines(proc: SpawnedProcess): AsyncGenerator<string> {
  const buffered: string[] = [];
  let wake: (() => void) | undefined;
  let open = 2;
  let failure: Error | undefined;

  const notify = () => {
    const resume = wake;
    wake = undefined;
    resume?.();
  };

  for (const stream of [proc.stdout, proc.stderr]) {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    lines.on("line", (line: string) => {
      buffered.push(line);
      notify();
    });
    lines.once("close", () => {
      open--;
      notify();
    });
  }

  proc.exited.catch((err: unknown) => {
    failure = err instanceof Error ? err : new Error(String(err));
    open = 0;
    notify();
  });

  while (true) {
    const line = buffered.shift();
    if (line !== undefined) {
      yield line;
      continue;
    }
    if (failure) throw failure;
    if (open === 0) return;

    await new Promise<void>((resolve) => {
      wake = resolve;
    });
  }
}
