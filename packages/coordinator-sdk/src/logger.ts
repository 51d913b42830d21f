/**
 * Pino logger factory.
 *
 * Components take a `CoordinatorLogger` by injection and derive children
 * with `component`, `taskId` or `agentId` bindings.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  /** Falls back to LOG_LEVEL, then "info" */
  level?: LogLevel;
  /** Route output through pino-pretty (development only) */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
  transport?: LoggerOptions['transport'];
}

export interface CoordinatorLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): CoordinatorLogger;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw);
}

export function createPinoLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? levelFromEnv() ?? 'info',
    base: { service: 'coordinator', ...config.base },
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

export function wrapPino(logger: Logger): CoordinatorLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err, data) => {
      if (err instanceof Error) {
        logger.error({ ...data, err }, msg);
      } else if (err !== undefined) {
        logger.error({ ...data, error: err }, msg);
      } else if (data) {
        logger.error(data, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapPino(logger.child(bindings)),
  };
}

export function createLogger(config?: LoggerConfig): CoordinatorLogger {
  return wrapPino(createPinoLogger(config));
}

export function createSilentLogger(): CoordinatorLogger {
  return createLogger({ level: 'silent' });
}

export type { Logger as PinoLogger } from 'pino';
