/**
 * Unit Tests: Environment Configuration
 *
 * Tests for the environment validation utilities.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseEnv } from '../../../src/config/env';

describe('env configuration', () => {
  describe('parseEnv', () => {
    it('fills defaults for an empty environment', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.TIME_ZONE).toBe('UTC');
      expect(env.PROVIDER_PRIORITY).toEqual(['espn', 'tsdb']);
      expect(env.ESPN_ENABLED).toBe(true);
      expect(env.TSDB_ENABLED).toBe(true);
      expect(env.TSDB_API_KEY).toBe('3');
      expect(env.PROVIDER_HTTP_TIMEOUT_MS).toBe(10_000);
      expect(env.FEDERATION_TIMEOUT_MS).toBe(20_000);
      expect(env.FEDERATION_MERGE_OPERATIONS).toEqual(['getleagueteams']);
      expect(env.THROW_ON_TOTAL_FAILURE).toBe(false);
      expect(env.CACHE_MAX_SIZE).toBe(10_000);
      expect(env.CACHE_TTL_TEAM).toBeUndefined();
    });

    it('coerces numeric values', () => {
      const env = parseEnv({ FEDERATION_TIMEOUT_MS: '5000', CACHE_TTL_EVENTS_TODAY: '30' });

      expect(env.FEDERATION_TIMEOUT_MS).toBe(5_000);
      expect(env.CACHE_TTL_EVENTS_TODAY).toBe(30);
    });

    it('transforms boolean strings', () => {
      const env = parseEnv({ ESPN_ENABLED: 'off', TSDB_ENABLED: 'YES', THROW_ON_TOTAL_FAILURE: '1' });

      expect(env.ESPN_ENABLED).toBe(false);
      expect(env.TSDB_ENABLED).toBe(true);
      expect(env.THROW_ON_TOTAL_FAILURE).toBe(true);
    });

    it('splits, trims and lowercases comma lists', () => {
      const env = parseEnv({ PROVIDER_PRIORITY: ' TSDB , espn,', FEDERATION_MERGE_OPERATIONS: 'getLeagueTeams, SearchTeams' });

      expect(env.PROVIDER_PRIORITY).toEqual(['tsdb', 'espn']);
      expect(env.FEDERATION_MERGE_OPERATIONS).toEqual(['getleagueteams', 'searchteams']);
    });

    it('rejects an unknown time zone', () => {
      expect(() => parseEnv({ TIME_ZONE: 'Mars/Olympus' })).toThrow(
        'Environment validation failed:\n  - TIME_ZONE: TIME_ZONE must be an IANA time zone',
      );
    });

    it('rejects a breaker cooldown under one second and a non-numeric timeout', () => {
      expect(() => parseEnv({ BREAKER_COOLDOWN_MS: '10' })).toThrow(/BREAKER_COOLDOWN_MS/);
      expect(() => parseEnv({ FEDERATION_TIMEOUT_MS: 'soon' })).toThrow(/FEDERATION_TIMEOUT_MS/);
    });
  });

  describe('getEnv', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      // Reset modules to clear cached env
      vi.resetModules();
      process.env = { ...originalEnv };
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('parses process.env once and caches the result', async () => {
      process.env.FEDERATION_TIMEOUT_MS = '7000';

      const { getEnv } = await import('../../../src/config/env');
      const first = getEnv();
      process.env.FEDERATION_TIMEOUT_MS = '9000';

      expect(first.FEDERATION_TIMEOUT_MS).toBe(7_000);
      expect(getEnv()).toBe(first);
    });

    it('re-reads process.env after resetEnv', async () => {
      process.env.TIME_ZONE = 'Europe/London';

      const { getEnv, resetEnv } = await import('../../../src/config/env');
      expect(getEnv().TIME_ZONE).toBe('Europe/London');

      process.env.TIME_ZONE = 'Asia/Tokyo';
      resetEnv();
      expect(getEnv().TIME_ZONE).toBe('Asia/Tokyo');
    });
  });
});
