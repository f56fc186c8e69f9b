export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  prefix?: string;
  /**
   * Messages below this level are dropped.
   */
  level?: LogLevel;
  /**
   * Send every level to stderr, leaving stdout to the caller.
   */
  stderrOnly?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;
  private readonly stderrOnly: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "[census]";
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.stderrOnly = options.stderrOnly ?? false;
  }

  debug(message: string): void {
    if (!this.enabled("debug")) return;
    if (this.stderrOnly) console.error(this.format(message));
    else console.debug(this.format(message));
  }

  info(message: string): void {
    if (!this.enabled("info")) return;
    if (this.stderrOnly) console.error(this.format(message));
    else console.log(this.format(message));
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.warn(this.format(message));
  }

  error(message: string): void {
    if (this.enabled("error")) console.error(this.format(message));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }
}

export const createConsoleLogger = (options?: ConsoleLoggerOptions): ConsoleLogger => new ConsoleLogger(options);

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown error";
