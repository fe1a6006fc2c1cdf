import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const BooleanStringSchema = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val: string) => val === 'true');

// Define environment schema
export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: BooleanStringSchema('true'),
  LOGGER_FILE_LOG_ENABLED: BooleanStringSchema('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('txledger.log'),
  LOGGER_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: 'Invalid log level' }) }))
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('txledger'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

// Infer TypeScript type from schema
export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

// Function to validate environment variables
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
