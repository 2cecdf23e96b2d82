/**
 * Minimal structured logger.
 *
 * MCP servers own stdout for the protocol, so everything here goes to stderr.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Prefix shown in brackets, e.g. "procwatch" -> "[procwatch]" */
  name: string;
  level?: LogLevel;
  /** Line sink, defaults to console.error */
  write?: (line: string) => void;
}

export class ConsoleLogger implements Logger {
  private readonly name: string;
  private readonly threshold: number;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions) {
    this.name = options.name;
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(msg: string, ctx?: LogContext): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.log("error", msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const tag = level === "info" ? "" : ` ${level.toUpperCase()}`;
    const suffix = ctx && Object.keys(ctx).length > 0 ? ` ${formatContext(ctx)}` : "";
    this.write(`[${this.name}]${tag} ${msg}${suffix}`);
  }
}

function formatContext(ctx: LogContext): string {
  return JSON.stringify(ctx, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
