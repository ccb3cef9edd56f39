/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation and the
 * assembled application config.
 */

import { EnvSchema, getEffectiveNodeEnv, parseEnv, type RawEnv } from '../../src/server/config/env';
import { config, loadConfig } from '../../src/server/config';

describe('EnvSchema', () => {
  it('should apply defaults to an empty environment', () => {
    const result = parseEnv({});
    expect(result).toEqual({
      success: true,
      data: {
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'pretty',
        SHOGI_EXPLORATION_MAX_DEPTH: 2,
        SHOGI_EXPLORATION_MAX_POSITIONS: 1_000_000,
        SHOGI_EXPLORATION_TIMEOUT_MS: 60_000,
        SHOGI_EXPLORATION_SLICE_SIZE: 256,
      },
    });
  });

  it('should coerce numeric settings', () => {
    const result = parseEnv({ SHOGI_EXPLORATION_MAX_DEPTH: '4', SHOGI_EXPLORATION_SLICE_SIZE: '32' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.SHOGI_EXPLORATION_MAX_DEPTH).toBe(4);
      expect(result.data.SHOGI_EXPLORATION_SLICE_SIZE).toBe(32);
    }
  });

  it('should reject invalid values with their paths', () => {
    const result = parseEnv({ NODE_ENV: 'staging', SHOGI_EXPLORATION_MAX_DEPTH: '0', LOG_FORMAT: 'xml' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((error) => error.path)).toEqual([
        'NODE_ENV',
        'LOG_FORMAT',
        'SHOGI_EXPLORATION_MAX_DEPTH',
      ]);
    }
  });

  it('should reject non-numeric depth', () => {
    expect(EnvSchema.safeParse({ SHOGI_EXPLORATION_MAX_DEPTH: 'deep' }).success).toBe(false);
  });

  it('should report test as the effective environment under Jest', () => {
    const raw: RawEnv = EnvSchema.parse({ NODE_ENV: 'production' });
    expect(getEffectiveNodeEnv(raw)).toBe('test');
  });
});

describe('loadConfig', () => {
  it('should build a frozen config', () => {
    const loaded = loadConfig({ LOG_LEVEL: 'debug', npm_package_version: '1.2.3', SHOGI_EXPLORATION_TIMEOUT_MS: '500' });
    expect(Object.isFrozen(loaded)).toBe(true);
    expect(loaded.nodeEnv).toBe('test');
    expect(loaded.isTest).toBe(true);
    expect(loaded.isProduction).toBe(false);
    expect(loaded.app.version).toBe('1.2.3');
    expect(loaded.logging).toEqual({ level: 'debug', format: 'pretty' });
    expect(loaded.exploration).toEqual({
      maxDepth: 2,
      maxPositions: 1_000_000,
      timeoutMs: 500,
      sliceSize: 256,
    });
  });

  it('should default the version', () => {
    expect(loadConfig({}).app.version).toBe('0.0.0');
  });

  it('should list every invalid variable', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose', SHOGI_EXPLORATION_SLICE_SIZE: '-1' })).toThrow(
      /^Invalid environment configuration:\n {2}- LOG_LEVEL: .+\n {2}- SHOGI_EXPLORATION_SLICE_SIZE: .+$/
    );
  });

  it('should load the process config at import time', () => {
    expect(config.isTest).toBe(true);
    expect(config.logging.level).toBe('error');
  });
});
