import { appendFile, mkdir } from "fs/promises";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Minimal logging interface shared by the server, the chat pipeline and ingestion.
 */
export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

abstract class LevelLogger implements Logger {
  constructor(protected readonly minLevel: LogLevel) {}

  protected abstract write(level: LogLevel, message: string, context?: object): void;

  private log(level: LogLevel, message: string, context?: object): void {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) return;
    this.write(level, message, context);
  }

  debug(message: string, context?: object): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: object): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: object): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: object): void {
    this.log("error", message, context);
  }
}

export class ConsoleLogger extends LevelLogger {
  constructor(options: { level?: LogLevel } = {}) {
    super(options.level ?? "info");
  }

  protected write(level: LogLevel, message: string, context?: object): void {
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) console[level](line, context);
    else console[level](line);
  }
}

/**
 * Appends one JSON object per line to a log file. Used for the ingestion log artifact.
 * Writes are chained so lines keep their order; `flush()` resolves once all are on disk.
 */
export class JsonlFileLogger extends LevelLogger {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    options: { level?: LogLevel } = {}
  ) {
    super(options.level ?? "info");
  }

  protected write(level: LogLevel, message: string, context?: object): void {
    const entry = { timestamp: new Date().toISOString(), level, message, ...context };
    const line = JSON.stringify(entry) + "\n";
    this.pending = this.pending
      .then(async () => {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, line, "utf-8");
      })
      .catch((err: unknown) => {
        console.error(`Failed to write log entry to ${this.filePath}:`, err);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

/** Sends every entry to each of the given loggers. */
export class TeeLogger implements Logger {
  private readonly targets: Logger[];

  constructor(...targets: Logger[]) {
    this.targets = targets;
  }

  debug(message: string, context?: object): void {
    for (const t of this.targets) t.debug(message, context);
  }

  info(message: string, context?: object): void {
    for (const t of this.targets) t.info(message, context);
  }

  warn(message: string, context?: object): void {
    for (const t of this.targets) t.warn(message, context);
  }

  error(message: string, context?: object): void {
    for (const t of this.targets) t.error(message, context);
  }
}

/** Discards everything. */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
