export { flushLoggers, getLogger, initLogger, setLogLevel, type Logger, type LoggerConfig } from './logger.js';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
