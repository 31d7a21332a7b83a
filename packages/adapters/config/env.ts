/**
 * Environment Configuration
 *
 * Reads and validates the settings of a wizard host from environment
 * variables. Invalid settings fail fast with every problem listed.
 */

import { z } from 'zod';
import { ConfigurationError } from '@stepwise/core/domain';
import { DEFAULT_STATE_TTL_SECONDS, MAX_STATE_TTL_SECONDS } from '@stepwise/core/ports';

// =============================================================================
// Schema
// =============================================================================

export const WizardEnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  WIZARD_SESSION_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_STATE_TTL_SECONDS)
    .default(DEFAULT_STATE_TTL_SECONDS),
  WIZARD_SIGNING_SECRET: z.string().min(16).optional(),
  REDIS_URL: z.string().url().optional(),
});

export type WizardEnv = z.infer<typeof WizardEnvSchema>;

/**
 * Host settings derived from the environment.
 */
export interface WizardHostConfig {
  logLevel: WizardEnv['LOG_LEVEL'];
  nodeEnv: WizardEnv['NODE_ENV'];
  sessionTtlSeconds: number;
  signingSecret: string | null;
  redisUrl: string | null;
}

// =============================================================================
// Loader
// =============================================================================

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === '' ? undefined : value;
  }
  return result;
}

/**
 * Load host settings.
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigurationError listing every invalid variable
 */
export function loadWizardEnv(env: NodeJS.ProcessEnv = process.env): WizardHostConfig {
  const result = WizardEnvSchema.safeParse(emptyToUndefined(env));
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
    sessionTtlSeconds: parsed.WIZARD_SESSION_TTL_SECONDS,
    signingSecret: parsed.WIZARD_SIGNING_SECRET ?? null,
    redisUrl: parsed.REDIS_URL ?? null,
  };
}
