/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for all host-side code.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';
import type { EnvValidationResult, RawEnv } from './env';

// Skip in test mode so a developer's .env cannot change test defaults.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
  }),
  exploration: z.object({
    maxDepth: z.number().int().min(1),
    maxPositions: z.number().int().min(1),
    timeoutMs: z.number().int().min(1),
    sliceSize: z.number().int().min(1),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

function describeEnvErrors(result: Extract<EnvValidationResult, { success: false }>): string {
  return result.errors.map((error) => `  - ${error.path || 'root'}: ${error.message}`).join('\n');
}

/**
 * Build a frozen config from an environment object. Throws when the
 * environment does not satisfy the schema.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const envResult = parseEnv(source);
  if (!envResult.success) {
    throw new Error(`Invalid environment configuration:\n${describeEnvErrors(envResult)}`);
  }
  const env: RawEnv = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);

  return Object.freeze(
    ConfigSchema.parse({
      nodeEnv,
      isProduction: nodeEnv === 'production',
      isDevelopment: nodeEnv === 'development',
      isTest: nodeEnv === 'test',
      app: {
        version: env.npm_package_version ?? '0.0.0',
      },
      logging: {
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
      },
      exploration: {
        maxDepth: env.SHOGI_EXPLORATION_MAX_DEPTH,
        maxPositions: env.SHOGI_EXPLORATION_MAX_POSITIONS,
        timeoutMs: env.SHOGI_EXPLORATION_TIMEOUT_MS,
        sliceSize: env.SHOGI_EXPLORATION_SLICE_SIZE,
      },
    })
  );
}

export const config: AppConfig = loadConfig();
