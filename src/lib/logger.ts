/**
 * Leveled diagnostics for the runner
 *
 * Entries go to stderr only: stdout carries the output of the steps being run.
 * Output is a readable line for terminals, or one JSON object per line when
 * `NODE_ENV=production`.
 *
 */

/**
 * Log levels in order of severity
 *
 * @public
 */
export enum LogLevel {
  DEBUG = 0,
  WARN = 1,
  ERROR = 2,
  SILENT = 3,
}

/**
 * Rendering used by the default sink
 *
 * @public
 */
export type LogFormat = "pretty" | "json";

/**
 * A single diagnostic entry
 *
 * @public
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  levelName: string;
  message: string;
  component?: string;
  context?: Record<string, unknown>;
}

/**
 * Logger configuration options
 *
 * @public
 */
export interface LoggerOptions {
  /**
   * Minimum level written, WARN when omitted
   */
  level?: LogLevel;

  component?: string;

  /**
   * Context merged into every entry
   */
  context?: Record<string, unknown>;

  /**
   * Defaults to json under NODE_ENV=production, pretty otherwise
   */
  format?: LogFormat;

  /**
   * Receives every written entry instead of stderr
   */
  sink?: (entry: LogEntry) => void;
}

/**
 * Render an entry as one output record
 *
 * @param entry - Entry to render
 * @param format - Pretty line or JSON object
 * @returns Text written to stderr
 *
 * @public
 */
export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === "json") {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 19);
  const prefix = entry.component ? ` [${entry.component}]` : "";
  const details =
    entry.context && Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context)}`
      : "";

  return `${time} ${entry.levelName.padEnd(5)}${prefix} ${entry.message}${details}`;
}

/**
 * Structured logger with child contexts
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: LogLevel.DEBUG, component: "infra-run" });
 * logger.child({ target: "terraform-plan" }, "dispatcher").debug("idle -> guard-checking");
 * ```
 *
 * @public
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly format: LogFormat;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.WARN;
    this.component = options.component;
    this.context = options.context ?? {};
    this.format = options.format ?? (process.env.NODE_ENV === "production" ? "json" : "pretty");
    this.sink = options.sink ?? ((entry) => console.error(formatLogEntry(entry, this.format)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context);
  }

  /**
   * Whether entries at a level would be written
   */
  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  /**
   * Derive a logger that adds context to every entry
   *
   * @param context - Context merged under each entry's own context
   * @param component - Replaces the parent's component when given
   * @returns Logger sharing this logger's level, format and sink
   */
  child(context: Record<string, unknown>, component?: string): Logger {
    const resolvedComponent = component ?? this.component;

    return new Logger({
      level: this.level,
      format: this.format,
      sink: this.sink,
      context: { ...this.context, ...context },
      ...(resolvedComponent !== undefined && { component: resolvedComponent }),
    });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const merged = { ...this.context, ...context };

    this.sink({
      timestamp: new Date().toISOString(),
      level,
      levelName: LogLevel[level],
      message,
      ...(this.component !== undefined && { component: this.component }),
      ...(Object.keys(merged).length > 0 && { context: merged }),
    });
  }
}

/**
 * Parse a log level name
 *
 * @param value - Level name, case-insensitive
 * @returns Matching level, or undefined for an unknown or missing name
 *
 * @public
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toUpperCase()) {
    case "DEBUG": {
      return LogLevel.DEBUG;
    }
    case "WARN": {
      return LogLevel.WARN;
    }
    case "ERROR": {
      return LogLevel.ERROR;
    }
    case "SILENT": {
      return LogLevel.SILENT;
    }
    default: {
      return undefined;
    }
  }
}
