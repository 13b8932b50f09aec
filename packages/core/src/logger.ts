export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Writes `[scope] message` lines to the console, dropping anything below `level`. */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = "info"
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private line(message: string): string {
    return `[${this.scope}] ${message}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled("debug")) console.debug(this.line(message), meta ?? "");
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled("info")) console.info(this.line(message), meta ?? "");
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled("warn")) console.warn(this.line(message), meta ?? "");
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled("error")) console.error(this.line(message), meta ?? "");
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level);
  }
}

/** Discards everything. */
export class NullLogger implements Logger {
  debug(_message: string, _meta?: LogMeta): void {}
  info(_message: string, _meta?: LogMeta): void {}
  warn(_message: string, _meta?: LogMeta): void {}
  error(_message: string, _meta?: LogMeta): void {}
  child(_scope: string): Logger {
    return this;
  }
}
