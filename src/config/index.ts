/**
 * Federation configuration from the environment.
 *
 * Loads `.env` (if present) into process.env, then turns the validated env
 * into provider adapters and federation options.
 */

import dotenv from 'dotenv';
import { ConfigError } from '../errors/ConfigError';
import { EspnProvider } from '../providers/espn/espnProvider';
import { TsdbProvider } from '../providers/tsdb/tsdbProvider';
import type { SportsProvider } from '../providers/types';
import {
  MERGEABLE_OPERATIONS,
  type FederationServiceOptions,
  type FederationSettingsInput,
  type MergeableOperation,
  type ProviderRegistration,
  type TtlClass,
} from '../services/federation/options';
import { getEnv, type Env } from './env';

dotenv.config();

const TTL_ENV: Readonly<Record<TtlClass, keyof Env>> = {
  team: 'CACHE_TTL_TEAM',
  teamSchedule: 'CACHE_TTL_TEAM_SCHEDULE',
  eventsPast: 'CACHE_TTL_EVENTS_PAST',
  eventsToday: 'CACHE_TTL_EVENTS_TODAY',
  eventsTomorrow: 'CACHE_TTL_EVENTS_TOMORROW',
  events: 'CACHE_TTL_EVENTS',
  event: 'CACHE_TTL_EVENT',
  liveEvent: 'CACHE_TTL_LIVE_EVENT',
  teamStats: 'CACHE_TTL_TEAM_STATS',
  leagueTeams: 'CACHE_TTL_LEAGUE_TEAMS',
  teamsByConference: 'CACHE_TTL_TEAMS_BY_CONFERENCE',
  searchTeams: 'CACHE_TTL_SEARCH_TEAMS',
  empty: 'CACHE_TTL_EMPTY',
};

/** Scalar federation settings from env. */
export function buildFederationSettings(env: Env = getEnv()): FederationSettingsInput {
  const ttlSeconds: Partial<Record<TtlClass, number>> = {};
  for (const [cls, variable] of Object.entries(TTL_ENV)) {
    const value = env[variable];
    if (typeof value === 'number' && isTtlClass(cls)) ttlSeconds[cls] = value;
  }

  return {
    ttlSeconds,
    timeoutMs: env.FEDERATION_TIMEOUT_MS,
    cacheMaxSize: env.CACHE_MAX_SIZE,
    mergeOperations: env.FEDERATION_MERGE_OPERATIONS.map(toMergeableOperation),
    breaker: {
      failureThreshold: env.BREAKER_FAILURE_THRESHOLD,
      cooldownMs: env.BREAKER_COOLDOWN_MS,
    },
    throwOnTotalFailure: env.THROW_ON_TOTAL_FAILURE,
    timeZone: env.TIME_ZONE,
  };
}

/**
 * The bundled adapters, prioritized by PROVIDER_PRIORITY. Providers missing
 * from that list run after the listed ones.
 */
export function buildProviderRegistrations(env: Env = getEnv()): ProviderRegistration[] {
  const adapters: Array<{ provider: SportsProvider; enabled: boolean }> = [
    {
      provider: new EspnProvider({
        baseUrl: env.ESPN_BASE_URL,
        timeoutMs: env.PROVIDER_HTTP_TIMEOUT_MS,
        timeZone: env.TIME_ZONE,
      }),
      enabled: env.ESPN_ENABLED,
    },
    {
      provider: new TsdbProvider({
        baseUrl: env.TSDB_BASE_URL,
        apiKey: env.TSDB_API_KEY,
        timeoutMs: env.PROVIDER_HTTP_TIMEOUT_MS,
        timeZone: env.TIME_ZONE,
      }),
      enabled: env.TSDB_ENABLED,
    },
  ];

  const unknown = env.PROVIDER_PRIORITY.filter((name) => !adapters.some((a) => a.provider.name === name));
  if (unknown.length > 0) {
    throw new ConfigError(
      'PROVIDER_PRIORITY names unknown providers',
      unknown.map((name) => `${name}: expected one of ${adapters.map((a) => a.provider.name).join(', ')}`),
    );
  }

  return adapters.map(({ provider, enabled }, index) => {
    const rank = env.PROVIDER_PRIORITY.indexOf(provider.name);
    return {
      provider,
      priority: rank >= 0 ? rank : env.PROVIDER_PRIORITY.length + index,
      enabled,
    };
  });
}

export function buildFederationOptions(env: Env = getEnv()): FederationServiceOptions {
  return {
    ...buildFederationSettings(env),
    providers: buildProviderRegistrations(env),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function isTtlClass(value: string): value is TtlClass {
  return Object.prototype.hasOwnProperty.call(TTL_ENV, value);
}

// Env lists are lowercased; operation names are camelCase.
function toMergeableOperation(value: string): MergeableOperation {
  const match = MERGEABLE_OPERATIONS.find((op) => op.toLowerCase() === value);
  if (!match) {
    throw new ConfigError('FEDERATION_MERGE_OPERATIONS names an operation that cannot merge', [
      `${value}: expected one of ${MERGEABLE_OPERATIONS.join(', ')}`,
    ]);
  }
  return match;
}
