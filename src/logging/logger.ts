import { redact } from './redaction.js';
import {
  LogDestination,
  LogLevel,
  type LogMeta,
  type LogTransport,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './types.js';

/**
 * Paths redacted by broker components unless a logger is injected.
 */
export const DELEGATION_REDACTION_PATHS = [
  'password',
  'clientSecret',
  'accessToken',
  'refreshToken',
  'codeVerifier',
  'code',
  'token.accessToken',
  'token.refreshToken',
  'app.password',
];

/**
 * Structured console logger. Each message is written as one object combining
 * the level, the bound context and the per-call meta, after redaction.
 */
export class DefaultLogger implements Logger {
  static readonly defaultLevel = LogLevel.Info;
  static readonly defaultDestination = LogDestination.StdOut;

  private readonly context: LogMeta;
  private readonly transport: LogTransport;
  private readonly write: LogWriter;

  public readonly destination: LogDestination;
  public redactPaths: string[];
  public level: LogLevel;

  constructor(
    context: LogMeta,
    options: LoggerOptions = {},
    transport: LogTransport = console
  ) {
    this.context = context;
    this.level = options.level ?? DefaultLogger.defaultLevel;
    this.destination = options.destination ?? DefaultLogger.defaultDestination;
    this.redactPaths = options.redactPaths ?? [];
    this.transport = transport;
    this.write =
      this.destination === LogDestination.StdErr
        ? transport.error.bind(transport)
        : transport.log.bind(transport);
  }

  child(context: LogMeta): Logger {
    return new DefaultLogger(
      { ...this.context, ...context },
      {
        level: this.level,
        redactPaths: this.redactPaths,
        destination: this.destination,
      },
      this.transport
    );
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Fatal, msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Error, msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Warn, msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Info, msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Debug, msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Trace, msg, meta);
  }

  private log(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (this.level === LogLevel.Silent || level > this.level) {
      return;
    }

    this.write({
      message: msg,
      level: LogLevel[level],
      ...redact(this.context, this.redactPaths),
      ...redact(meta ?? {}, this.redactPaths),
    });
  }
}

/**
 * Parse a LOG_LEVEL style name ("debug", "Warn", ...) into a LogLevel.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  const wanted = name.trim().toLowerCase();
  for (const level of Object.values(LogLevel)) {
    if (typeof level === 'number' && LogLevel[level].toLowerCase() === wanted) {
      return level;
    }
  }
  return undefined;
}
