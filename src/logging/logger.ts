/**
 * Component-scoped logging.
 *
 * @example
 * ```typescript
 * const log = createLogger("executor", "info");
 * log.info("Job settled", { jobId, state });
 * log.error("Store write failed", err);
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Logger for a sub-component sharing this logger's level and sink
   */
  child(component: string): Logger;
}

export type LogSink = (line: string, level: LogLevel) => void;

const consoleSink: LogSink = (line, level) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

function formatData(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.name}: ${data.message}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = consoleSink
  ) {}

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  child(component: string): Logger {
    return new ConsoleLogger(`${this.component}:${component}`, this.level, this.sink);
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const timestamp = new Date().toISOString();
    this.sink(
      `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${formatData(data)}`,
      level
    );
  }
}

export function createLogger(component: string, level: LogLevel = "info"): Logger {
  return new ConsoleLogger(component, level);
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
