/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Parsed on first use and cached; throws if a variable is invalid.
 *
 * Usage:
 *   import { getEnv } from '../config/env';
 *   getEnv().FEDERATION_TIMEOUT_MS; // number, guaranteed to be valid
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .transform((val) => ['true', '1', 'yes', 'on'].includes(val.trim().toLowerCase()))
    .default(fallback);

const commaList = (fallback: string[]) =>
  z
    .string()
    .transform((val) =>
      val
        .split(',')
        .map((part) => part.trim().toLowerCase())
        .filter((part) => part.length > 0),
    )
    .default(fallback);

const optionalSeconds = z.coerce.number().int().nonnegative().optional();

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Caller's calendar: getEvents(date) is interpreted in this zone
  TIME_ZONE: z.string().refine(isValidTimeZone, 'TIME_ZONE must be an IANA time zone').default('UTC'),

  // Providers
  PROVIDER_PRIORITY: commaList(['espn', 'tsdb']),
  ESPN_ENABLED: booleanFlag(true),
  TSDB_ENABLED: booleanFlag(true),
  ESPN_BASE_URL: z.url().default('https://site.api.espn.com/apis/site/v2/sports'),
  TSDB_BASE_URL: z.url().default('https://www.thesportsdb.com/api/v1/json'),
  TSDB_API_KEY: z.string().min(1).default('3'),
  PROVIDER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Federation
  FEDERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  FEDERATION_MERGE_OPERATIONS: commaList(['getleagueteams']),
  THROW_ON_TOTAL_FAILURE: booleanFlag(false),
  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().min(1_000).default(30_000),

  // Cache
  CACHE_MAX_SIZE: z.coerce.number().int().nonnegative().default(10_000),
  CACHE_TTL_TEAM: optionalSeconds,
  CACHE_TTL_TEAM_SCHEDULE: optionalSeconds,
  CACHE_TTL_EVENTS: optionalSeconds,
  CACHE_TTL_EVENTS_TODAY: optionalSeconds,
  CACHE_TTL_EVENTS_TOMORROW: optionalSeconds,
  CACHE_TTL_EVENTS_PAST: optionalSeconds,
  CACHE_TTL_EVENT: optionalSeconds,
  CACHE_TTL_LIVE_EVENT: optionalSeconds,
  CACHE_TTL_TEAM_STATS: optionalSeconds,
  CACHE_TTL_LEAGUE_TEAMS: optionalSeconds,
  CACHE_TTL_TEAMS_BY_CONFERENCE: optionalSeconds,
  CACHE_TTL_SEARCH_TEAMS: optionalSeconds,
  CACHE_TTL_EMPTY: optionalSeconds,
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment record without touching the cache.
 * Throws with every failing variable listed.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }
  _env = parseEnv(process.env);
  return _env;
}

/** Drop the cached parse (tests change process.env between cases). */
export function resetEnv(): void {
  _env = null;
}
