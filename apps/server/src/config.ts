import { z } from 'zod';
import { getDefaultDbPath } from '@taskapi/core';
import { LOG_LEVELS, type LogLevel } from './log.js';

export const EnvSchema = z.object({
  TASKAPI_HOST: z.string().min(1).default('127.0.0.1'),
  TASKAPI_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  TASKAPI_DB_PATH: z.string().min(1).optional(),
  TASKAPI_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly dbPath: string;
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Read TASKAPI_* variables, applying defaults */
export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    host: parsed.TASKAPI_HOST,
    port: parsed.TASKAPI_PORT,
    dbPath: parsed.TASKAPI_DB_PATH ?? getDefaultDbPath(),
    logLevel: parsed.TASKAPI_LOG_LEVEL,
  };
}
