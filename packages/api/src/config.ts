// API configuration from the environment

import { z } from 'zod';
import { DEFAULT_THRESHOLDS, type ExtractionThresholds } from '@policyminer/protocol';
import { ValidationError, type LogLevel } from '@policyminer/runtime';

const threshold = (fallback: number) => z.coerce.number().finite().default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  POLICYMINER_MIN_SUPPORT: threshold(DEFAULT_THRESHOLDS.minSupport),
  POLICYMINER_MIN_CONFIDENCE: threshold(DEFAULT_THRESHOLDS.minConfidence),
  POLICYMINER_MIN_LIFT: threshold(DEFAULT_THRESHOLDS.minLift),
  POLICYMINER_DATA_DIR: z.string().min(1).default('data'),
});

export type ApiConfig = {
  /** Postgres connection string; in-memory repositories when absent */
  databaseUrl?: string;
  port: number;
  logLevel: LogLevel;
  /** Thresholds used when an extraction request leaves them out */
  thresholds: ExtractionThresholds;
  /** Directory file imports and exports are confined to */
  dataDir: string;
};

/**
 * Parse configuration from environment variables.
 *
 * @throws ValidationError naming the first invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const variable = issue.path.join('.');
    throw new ValidationError(`Invalid configuration: ${variable}: ${issue.message}`, {
      field: variable,
    });
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    thresholds: {
      minSupport: vars.POLICYMINER_MIN_SUPPORT,
      minConfidence: vars.POLICYMINER_MIN_CONFIDENCE,
      minLift: vars.POLICYMINER_MIN_LIFT,
    },
    dataDir: vars.POLICYMINER_DATA_DIR,
  };
}
