import { Writable } from 'node:stream';

import pino from 'pino';

import { type LogLevel, type LoggerEnvConfig, validateLoggerEnv } from './env.schema.js';

export type Logger = pino.Logger;

export interface LoggerConfig {
  level?: LogLevel | undefined;
  /**
   * Write every log line to this stream instead of the env-configured transports.
   */
  destination?: pino.DestinationStream | undefined;
}

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

let loggerConfig: LoggerConfig = {};

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  // vitest may set these after the env was first read
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function resolveLevel(env: LoggerEnvConfig): LogLevel {
  return loggerConfig.level ?? env.LOGGER_LOG_LEVEL;
}

/**
 * Creates and configures the root logger instance.
 *
 * stdout is reserved for command output, so the console transport writes to stderr.
 */
function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: resolveLevel(env),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (loggerConfig.destination) {
    return pino.pino(pinoConfig, loggerConfig.destination);
  }

  // In test mode, use a noop stream to completely suppress all output
  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const transportTargets: pino.TransportTargetOptions[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // Pure JSON on stderr for log processors
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino.pino({ ...pinoConfig, enabled: false });
  }

  return pino.pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

/**
 * Internal: get or create the underlying pino logger for a category.
 */
function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with reconfiguration.
 *
 * Modules create their loggers at top level, before the CLI has read its
 * flags, so the returned Proxy resolves the current pino logger on every
 * property access.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Replace the logger configuration. Cached loggers are dropped so the next call rebuilds them.
 */
export function initLogger(config: LoggerConfig): void {
  loggerConfig = { ...config };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Change the level of all loggers, keeping the rest of the configuration
 */
export function setLogLevel(level: LogLevel): void {
  initLogger({ ...loggerConfig, level });
}

/**
 * Flush buffered output of the root logger (no-op before the first log call)
 */
export function flushLoggers(): void {
  rootLogger?.flush();
}
