// Configuration loading
//
// All settings come from environment variables and are validated up front,
// so a misconfigured process fails at startup rather than on first use.

import { z } from 'zod';

const configSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  UOW_RELEASE_POLICY: z.enum(['retain', 'dispose']).default('dispose'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = {
  databaseUrl: string;
  maxConnections: number;
  releasePolicy: 'retain' | 'dispose';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

/**
 * Error when environment variables fail validation.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly keys: string[];

  constructor(keys: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}

/**
 * Read and validate configuration.
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      key: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      issues.map((i) => i.key),
      `Invalid configuration: ${issues.map((i) => `${i.key} (${i.message})`).join(', ')}`
    );
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    maxConnections: parsed.data.DATABASE_MAX_CONNECTIONS,
    releasePolicy: parsed.data.UOW_RELEASE_POLICY,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
