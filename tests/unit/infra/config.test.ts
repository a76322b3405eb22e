/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.DATA_DIR).toBe('./data');
      expect(env.APP_VERSION).toBeUndefined();
    });

    it('parses PORT as number', () => {
      expect(parseEnv({ PORT: '8080' }).PORT).toBe(8080);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('reads the data directory', () => {
      expect(parseEnv({ DATA_DIR: '/srv/commerce' }).DATA_DIR).toBe('/srv/commerce');
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });

    it('throws on unknown LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on empty DATA_DIR', () => {
      expect(() => parseEnv({ DATA_DIR: '' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.server.isTest).toBe(true);
    });

    it('disables pretty logs in production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
    });

    it('carries dataset directory and version', () => {
      const config = createConfig(parseEnv({ DATA_DIR: 'fixtures', APP_VERSION: '1.2.3' }));

      expect(config.dataset.dataDir).toBe('fixtures');
      expect(config.version).toBe('1.2.3');
    });
  });
});
