/**
 * Federation options
 *
 * Scalar settings are validated by a strict zod schema: an unknown key is a
 * configuration error, not something to ignore.
 */

import { z } from 'zod';
import { ConfigError } from '../../errors/ConfigError';
import type { SportsProvider } from '../../providers/types';

// ─────────────────────────────────────────────────────────────────────────────
// TTL classes
// ─────────────────────────────────────────────────────────────────────────────

export const TTL_CLASSES = [
  'team',
  'teamSchedule',
  'eventsPast',
  'eventsToday',
  'eventsTomorrow',
  'events',
  'event',
  'liveEvent',
  'teamStats',
  'leagueTeams',
  'teamsByConference',
  'searchTeams',
  'empty',
] as const;

export type TtlClass = (typeof TTL_CLASSES)[number];

/** Seconds. */
export const DEFAULT_TTL_SECONDS: Readonly<Record<TtlClass, number>> = {
  team: 86_400,
  teamSchedule: 28_800,
  eventsPast: 15_552_000,
  eventsToday: 60,
  eventsTomorrow: 14_400,
  events: 28_800,
  event: 1_800,
  liveEvent: 30,
  teamStats: 14_400,
  leagueTeams: 86_400,
  teamsByConference: 86_400,
  searchTeams: 3_600,
  empty: 60,
};

export const MERGEABLE_OPERATIONS = ['getLeagueTeams', 'searchTeams'] as const;
export type MergeableOperation = (typeof MERGEABLE_OPERATIONS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const seconds = z.number().int().nonnegative().optional();

const ttlSchema = z.strictObject({
  team: seconds,
  teamSchedule: seconds,
  eventsPast: seconds,
  eventsToday: seconds,
  eventsTomorrow: seconds,
  events: seconds,
  event: seconds,
  liveEvent: seconds,
  teamStats: seconds,
  leagueTeams: seconds,
  teamsByConference: seconds,
  searchTeams: seconds,
  empty: seconds,
});

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const settingsSchema = z.strictObject({
  ttlSeconds: ttlSchema.optional(),
  timeoutMs: z.number().int().positive().default(20_000),
  cacheMaxSize: z.number().int().nonnegative().default(10_000),
  mergeOperations: z.array(z.enum(MERGEABLE_OPERATIONS)).default(['getLeagueTeams']),
  breaker: z
    .strictObject({
      failureThreshold: z.number().int().positive().default(5),
      cooldownMs: z.number().int().nonnegative().default(30_000),
    })
    .default({ failureThreshold: 5, cooldownMs: 30_000 }),
  throwOnTotalFailure: z.boolean().default(false),
  timeZone: z.string().refine(isValidTimeZone, 'timeZone must be an IANA time zone').default('UTC'),
  defaultDaysAhead: z.number().int().nonnegative().default(14),
});

export type FederationSettingsInput = z.input<typeof settingsSchema>;

export interface FederationSettings {
  ttlSeconds: Readonly<Record<TtlClass, number>>;
  timeoutMs: number;
  cacheMaxSize: number;
  mergeOperations: readonly MergeableOperation[];
  breaker: { failureThreshold: number; cooldownMs: number };
  throwOnTotalFailure: boolean;
  timeZone: string;
  defaultDaysAhead: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Providers
// ─────────────────────────────────────────────────────────────────────────────

export interface ProviderRegistration {
  provider: SportsProvider;
  /** Lower runs first. */
  priority: number;
  /** Default true. */
  enabled?: boolean;
}

export interface FederationServiceOptions extends FederationSettingsInput {
  providers: readonly ProviderRegistration[];
  /** Injected clock for TTL expiry and date proximity. */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate scalar settings and fill defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseFederationSettings(input: unknown): FederationSettings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid federation options', issues);
  }

  const parsed = result.data;
  const ttlSeconds = { ...DEFAULT_TTL_SECONDS };
  for (const cls of TTL_CLASSES) {
    const override = parsed.ttlSeconds?.[cls];
    if (override !== undefined) ttlSeconds[cls] = override;
  }

  return {
    ...parsed,
    ttlSeconds: Object.freeze(ttlSeconds),
    mergeOperations: Object.freeze([...new Set(parsed.mergeOperations)]),
  };
}

/**
 * Registrations sorted by ascending priority (ties keep registration order).
 * @throws ConfigError on duplicate names or a non-finite priority
 */
export function validateProviders(registrations: readonly ProviderRegistration[]): ProviderRegistration[] {
  const issues: string[] = [];
  const seen = new Set<string>();
  registrations.forEach((registration, index) => {
    const name = registration.provider.name;
    if (!name || name !== name.trim().toLowerCase()) {
      issues.push(`providers.${index}: name must be a non-empty lowercase identifier`);
    } else if (seen.has(name)) {
      issues.push(`providers.${index}: duplicate provider name "${name}"`);
    }
    seen.add(name);
    if (!Number.isFinite(registration.priority)) {
      issues.push(`providers.${index}: priority must be a finite number`);
    }
  });
  if (issues.length > 0) {
    throw new ConfigError('Invalid provider registrations', issues);
  }
  return registrations
    .map((registration, index) => ({ registration, index }))
    .sort((a, b) => a.registration.priority - b.registration.priority || a.index - b.index)
    .map(({ registration }) => registration);
}
