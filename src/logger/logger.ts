import winston from 'winston';

/** Structured metadata attached to a log entry. */
export type LogMeta = Record<string, unknown>;

/**
 * Logging contract the client writes to. A winston logger satisfies it, as does any
 * object with these four methods.
 */
export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /**
   * Minimum level written.
   * @default process.env.LOG_LEVEL || 'info'
   */
  level?: string;
  /** Suppresses all output. */
  silent?: boolean;
  /**
   * Where entries go.
   * @default a single console transport
   */
  transports?: winston.LoggerOptions['transports'];
}

/** Service name stamped on every entry. */
export const LOGGER_SERVICE = 'jira-update-client';

/**
 * Creates the default winston logger: JSON lines with a timestamp, stack traces for errors,
 * and the service name as default metadata.
 */
export function createLogger({
  level = process.env.LOG_LEVEL || 'info',
  silent = false,
  transports = [new winston.transports.Console()],
}: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level,
    silent,
    defaultMeta: { service: LOGGER_SERVICE },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports,
  });
}
