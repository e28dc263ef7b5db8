/**
 * Configuration for a smart-home fulfillment.
 *
 * Values are loaded from environment variables with defaults suitable for
 * local development; explicit overrides win over both.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface FulfillmentConfig {
  /** Stable id of the linked user, reported in every SYNC response */
  agentUserId: string;
  /** Log level */
  logLevel: LogLevel;
}

const envSchema = z.object({
  AGENT_USER_ID: z.string().default(''),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export function loadConfig(
  overrides: Partial<FulfillmentConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): FulfillmentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;

  return {
    agentUserId: vars.AGENT_USER_ID,
    logLevel: vars.LOG_LEVEL,
    ...overrides,
  };
}
