import { spawn } from "child_process";

/**
 * Minimal view of a child process, enough to run CLI commands and
 * follow their output.
 */
export interface SpawnedProcess {
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream;

  /**
   * Exit code once the process and its streams have closed.
   * Rejects if the process could not be spawned.
   */
  readonly exited: Promise<number | null>;

  kill(): void;
}

export interface ProcessSpawner {
  spawn(command: string, args: string[]): SpawnedProcess;
}

/**
 * Default spawner delegating to child_process.spawn
 */
export class NodeProcessSpawner implements ProcessSpawner {
  spawn(command: string, args: string[]): SpawnedProcess {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    const exited = new Promise<number | null>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code) => resolve(code));
    });

    return {
      stdout: child.stdout,
      stderr: child.stderr,
      exited,
      kill: () => {
        child.kill("SIGKILL");
      },
    };
  }
}
