import { z } from 'zod';
import type { LogLevel } from '../logging/logger.js';
import type { RetryConfig } from '../types/workflow.js';

export interface AppConfig {
  logLevel: LogLevel;
  browser: {
    headless: boolean;
    /** Seconds. */
    navigationTimeout: number;
  };
  storageDir: string;
  runDir?: string;
  /** Default `wait_for` timeout, in seconds. */
  waitForTimeout: number;
  retry: RetryConfig;
}

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STEPWISE_HEADLESS: booleanFromEnv.default('true'),
  STEPWISE_STORAGE_DIR: z.string().min(1).default('./data'),
  STEPWISE_RUN_DIR: z.string().min(1).optional(),
  STEPWISE_WAIT_FOR_TIMEOUT: z.coerce.number().positive().default(30),
  STEPWISE_NAVIGATION_TIMEOUT: z.coerce.number().positive().default(30),
  STEPWISE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  STEPWISE_RETRY_DELAY: z.coerce.number().min(0).default(1),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Read configuration from environment variables. Empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    logLevel: vars.LOG_LEVEL,
    browser: {
      headless: vars.STEPWISE_HEADLESS,
      navigationTimeout: vars.STEPWISE_NAVIGATION_TIMEOUT,
    },
    storageDir: vars.STEPWISE_STORAGE_DIR,
    runDir: vars.STEPWISE_RUN_DIR,
    waitForTimeout: vars.STEPWISE_WAIT_FOR_TIMEOUT,
    retry: {
      max_attempts: vars.STEPWISE_RETRY_ATTEMPTS,
      delay_seconds: vars.STEPWISE_RETRY_DELAY,
    },
  };
}
