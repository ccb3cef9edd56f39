/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read by
 * the Node host (scripts and the exploration runner).
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  /** json for machine-readable output, pretty for a colourised console */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  // ===================================================================
  // EXPLORATION
  // ===================================================================

  /** Default ply depth for position exploration */
  SHOGI_EXPLORATION_MAX_DEPTH: z.coerce.number().int().min(1).default(2),

  /** Stop expanding after this many discovered positions */
  SHOGI_EXPLORATION_MAX_POSITIONS: z.coerce.number().int().min(1).default(1_000_000),

  /** Wall-clock budget for one exploration run */
  SHOGI_EXPLORATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(60_000),

  /** Worklist items expanded between event-loop yields */
  SHOGI_EXPLORATION_SLICE_SIZE: z.coerce.number().int().min(1).default(256),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the effective environment is always "test", even when a .env
 * file sets NODE_ENV to something else.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
