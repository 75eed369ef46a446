/**
 * Log levels ordered from least to most verbose.
 * Silent disables all logging output.
 */
export enum LogLevel {
  Silent,
  Fatal,
  Error,
  Warn,
  Info,
  Debug,
  Trace,
}

/**
 * Console method a logger writes through.
 */
export enum LogDestination {
  StdOut = 'log',
  StdErr = 'error',
}

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum level to output. Defaults to Info. */
  level?: LogLevel;
  /** Dot-notation paths whose values are replaced before writing. */
  redactPaths?: string[];
  destination?: LogDestination;
}

/**
 * Contract shared by every component that logs.
 */
export interface Logger {
  /**
   * Creates a logger that adds `context` to every message it writes.
   */
  child(context: LogMeta): Logger;

  level: LogLevel;

  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace(msg: string, meta?: LogMeta): void;
}

export type LogWriter = (message?: unknown, ...optionalParams: unknown[]) => void;

/**
 * Anything shaped like `console`.
 */
export interface LogTransport {
  log: LogWriter;
  error: LogWriter;
}
