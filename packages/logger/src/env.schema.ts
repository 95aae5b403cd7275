import { z } from 'zod';

import { isLogLevel, LOG_LEVELS } from './logger.js';

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1, { message: 'Invalid service name' }).default('tessera'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }
  return result.data;
}
