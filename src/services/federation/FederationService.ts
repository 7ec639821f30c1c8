/**
 * Federation Service
 *
 * The one entry point consumers read sports data through. For each call it
 * checks the operation's cache, then walks the enabled providers in priority
 * order until one returns a non-empty answer:
 *
 *   cache hit ──────────────────────────────▶ return cached value
 *   provider skips the league ──────────────▶ next provider (not a failure)
 *   circuit open / error / timeout ─────────▶ record failure, next provider
 *   empty answer ───────────────────────────▶ next provider
 *   non-empty answer ───────────────────────▶ cache with the operation's TTL
 *   providers exhausted ────────────────────▶ empty value (+ error if all failed)
 *
 * Reads never throw for provider trouble. The outcome reports what happened;
 * `throwOnTotalFailure` turns "every attempted provider failed" into a throw.
 *
 * Operations listed in `mergeOperations` ask every eligible provider at once
 * and merge the team lists instead of stopping at the first answer.
 */

import { AllProvidersFailedError, ProviderError, type ProviderFailure } from '../../errors/ProviderError';
import { cacheLookupsTotal, providerCallDurationMs, providerCallsTotal } from '../../infrastructure/metrics';
import { normalizeLeagueKey } from '../../leagues/catalog';
import type { ConferenceTeams, Event, Team, TeamStats } from '../../types/sports';
import { runInCallContext } from '../../utils/callContext';
import { CircuitBreaker, type CircuitState } from '../../utils/circuitBreaker';
import { addDays, daysBetween, toCalendarDate } from '../../utils/dateTime';
import { createLogger } from '../../utils/logger';
import { SingleFlight } from '../../utils/singleFlight';
import { makeCacheKey, TtlCache, type CacheStats } from '../../utils/ttlCache';
import {
  parseFederationSettings,
  validateProviders,
  type FederationServiceOptions,
  type FederationSettings,
  type ProviderRegistration,
} from './options';
import {
  OPERATION_NAMES,
  OPERATIONS,
  type OperationArgs,
  type OperationContext,
  type OperationDescriptor,
  type OperationName,
  type OperationResult,
} from './operations';

const logger = createLogger('federation');

/** Longest span `getEventsForRange` accepts, in days. */
const MAX_RANGE_DAYS = 366;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CallOptions {
  /** Skip the cache read; the fresh answer overwrites the entry. */
  forceRefresh?: boolean;
  /** Budget for the whole routing, overriding the service default. */
  timeoutMs?: number;
}

export interface FederationOutcome<T> {
  value: T;
  /** Provider that supplied `value` (the highest-priority one when merged); null when none did. */
  provider: string | null;
  /** Every provider whose data is in `value`. */
  providers: readonly string[];
  cached: boolean;
  /** Providers that failed during this routing, in attempt order. */
  failures: readonly ProviderFailure[];
  /** No provider supplied a non-empty value. */
  exhausted: boolean;
  /** Set when every attempted provider failed outright. */
  error?: AllProvidersFailedError;
}

export interface ProviderHealth {
  name: string;
  priority: number;
  enabled: boolean;
  circuit: CircuitState;
  consecutiveFailures: number;
}

export interface FederationCacheStats extends Omit<CacheStats, 'maxSize'> {
  byOperation: Record<OperationName, CacheStats>;
}

interface RegisteredProvider extends Required<ProviderRegistration> {
  name: string;
  breaker: CircuitBreaker;
}

interface OperationState<K extends OperationName> {
  cache: TtlCache<OperationResult<K>>;
  flights: SingleFlight<FederationOutcome<OperationResult<K>>>;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: ProviderError };

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export class FederationService {
  private readonly settings: FederationSettings;
  private readonly registry: readonly RegisteredProvider[];
  private readonly now: () => Date;
  private readonly state: { readonly [K in OperationName]: OperationState<K> };

  constructor(options: FederationServiceOptions) {
    const { providers, now, ...settings } = options;
    this.settings = parseFederationSettings(settings);
    this.now = now ?? (() => new Date());

    const clock = () => this.now().getTime();
    this.registry = validateProviders(providers).map((registration) => ({
      provider: registration.provider,
      priority: registration.priority,
      enabled: registration.enabled ?? true,
      name: registration.provider.name,
      breaker: new CircuitBreaker({
        name: registration.provider.name,
        failureThreshold: this.settings.breaker.failureThreshold,
        cooldownMs: this.settings.breaker.cooldownMs,
        now: clock,
      }),
    }));

    const cacheOptions = { maxSize: this.settings.cacheMaxSize, now: clock };
    const createState = <K extends OperationName>(): OperationState<K> => ({
      cache: new TtlCache<OperationResult<K>>(cacheOptions),
      flights: new SingleFlight<FederationOutcome<OperationResult<K>>>(),
    });
    this.state = {
      getTeam: createState<'getTeam'>(),
      getTeamSchedule: createState<'getTeamSchedule'>(),
      getEvents: createState<'getEvents'>(),
      getEvent: createState<'getEvent'>(),
      getTeamStats: createState<'getTeamStats'>(),
      getLeagueTeams: createState<'getLeagueTeams'>(),
      getTeamsByConference: createState<'getTeamsByConference'>(),
      searchTeams: createState<'searchTeams'>(),
    };

    logger.info(
      {
        providers: this.registry.map((p) => ({ name: p.name, priority: p.priority, enabled: p.enabled })),
        mergeOperations: this.settings.mergeOperations,
        timeZone: this.settings.timeZone,
      },
      'Federation service ready',
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Read operations
  // ─────────────────────────────────────────────────────────────────────────

  async getTeam(teamId: string, league: string, options?: CallOptions): Promise<Team | null> {
    return this.unwrap(await this.run('getTeam', [teamId, league], options));
  }

  /** Upcoming events for a team, ascending. `daysAhead` defaults to the configured window. */
  async getTeamSchedule(
    teamId: string,
    league: string,
    daysAhead: number = this.settings.defaultDaysAhead,
    options?: CallOptions,
  ): Promise<readonly Event[]> {
    return this.unwrap(await this.run('getTeamSchedule', [teamId, league, daysAhead], options));
  }

  /**
   * Every event of `league` on one calendar date in the configured time zone.
   * A Date is read in that zone.
   */
  async getEvents(league: string, date: string | Date, options?: CallOptions): Promise<readonly Event[]> {
    const day = toCalendarDate(date, this.settings.timeZone);
    return this.unwrap(await this.run('getEvents', [league, day], options));
  }

  async getEvent(eventId: string, league: string, options?: CallOptions): Promise<Event | null> {
    return this.unwrap(await this.run('getEvent', [eventId, league], options));
  }

  async getTeamStats(teamId: string, league: string, options?: CallOptions): Promise<TeamStats | null> {
    return this.unwrap(await this.run('getTeamStats', [teamId, league], options));
  }

  async getLeagueTeams(league: string, options?: CallOptions): Promise<readonly Team[]> {
    return this.unwrap(await this.run('getLeagueTeams', [league], options));
  }

  async getTeamsByConference(league: string, options?: CallOptions): Promise<ConferenceTeams> {
    return this.unwrap(await this.run('getTeamsByConference', [league], options));
  }

  async searchTeams(query: string, league?: string, options?: CallOptions): Promise<readonly Team[]> {
    return this.unwrap(await this.run('searchTeams', [query, league], options));
  }

  /**
   * Events for every date in [startDate, endDate], ascending. Each date is
   * its own cached `getEvents` call.
   */
  async getEventsForRange(
    league: string,
    startDate: string | Date,
    endDate: string | Date,
    options?: CallOptions,
  ): Promise<readonly Event[]> {
    const first = toCalendarDate(startDate, this.settings.timeZone);
    const last = toCalendarDate(endDate, this.settings.timeZone);
    const span = daysBetween(first, last);
    if (span < 0) throw new RangeError(`endDate ${last} is before startDate ${first}`);
    if (span >= MAX_RANGE_DAYS) throw new RangeError(`Range of ${span + 1} days exceeds ${MAX_RANGE_DAYS}`);

    const dates = Array.from({ length: span + 1 }, (_, i) => addDays(first, i));
    const perDay = await Promise.all(dates.map((date) => this.getEvents(league, date, options)));
    return Object.freeze(perDay.flat());
  }

  /** True when any enabled provider covers `league`. */
  supportsLeague(league: string): boolean {
    const key = normalizeLeagueKey(league);
    return this.registry.some((p) => p.enabled && p.provider.supportsLeague(key));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cache & health
  // ─────────────────────────────────────────────────────────────────────────

  /** Drop every cached result `provider` contributed to. Returns entries removed. */
  invalidateProvider(provider: string): number {
    let removed = 0;
    for (const name of OPERATION_NAMES) removed += this.state[name].cache.deleteByProvider(provider);
    logger.info({ provider, removed }, 'Invalidated provider cache entries');
    return removed;
  }

  clearCache(): void {
    for (const name of OPERATION_NAMES) this.state[name].cache.clear();
  }

  /** Remove expired entries from every partition. Returns entries removed. */
  cleanupExpired(): number {
    let removed = 0;
    for (const name of OPERATION_NAMES) removed += this.state[name].cache.cleanupExpired();
    return removed;
  }

  getCacheStats(): FederationCacheStats {
    const byOperation: Record<OperationName, CacheStats> = {
      getTeam: this.state.getTeam.cache.stats(),
      getTeamSchedule: this.state.getTeamSchedule.cache.stats(),
      getEvents: this.state.getEvents.cache.stats(),
      getEvent: this.state.getEvent.cache.stats(),
      getTeamStats: this.state.getTeamStats.cache.stats(),
      getLeagueTeams: this.state.getLeagueTeams.cache.stats(),
      getTeamsByConference: this.state.getTeamsByConference.cache.stats(),
      searchTeams: this.state.searchTeams.cache.stats(),
    };
    const partitions = Object.values(byOperation);
    const sum = (field: 'totalEntries' | 'activeEntries' | 'expiredEntries' | 'hits' | 'misses'): number =>
      partitions.reduce((total, stats) => total + stats[field], 0);
    const hits = sum('hits');
    const misses = sum('misses');
    const requests = hits + misses;
    return {
      totalEntries: sum('totalEntries'),
      activeEntries: sum('activeEntries'),
      expiredEntries: sum('expiredEntries'),
      hits,
      misses,
      hitRate: requests > 0 ? Math.round((hits / requests) * 1000) / 1000 : 0,
      byOperation,
    };
  }

  getProviderHealth(): ProviderHealth[] {
    return this.registry.map((p) => ({
      name: p.name,
      priority: p.priority,
      enabled: p.enabled,
      circuit: p.breaker.getState(),
      consecutiveFailures: p.breaker.getFailureCount(),
    }));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Routing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Route one operation through cache and providers.
   * Throws only RangeError for invalid arguments.
   */
  async run<K extends OperationName>(
    name: K,
    rawArgs: OperationArgs<K>,
    options: CallOptions = {},
  ): Promise<FederationOutcome<OperationResult<K>>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const state: OperationState<K> = this.state[name];
    const ctx = this.context();
    const args = op.prepare(rawArgs, ctx);
    const key = makeCacheKey(name, ...op.keyParts(args));

    if (options.forceRefresh) {
      cacheLookupsTotal.inc({ operation: name, result: 'bypass' });
    } else {
      const entry = state.cache.getEntry(key);
      cacheLookupsTotal.inc({ operation: name, result: entry ? 'hit' : 'miss' });
      if (entry) {
        const exhausted = op.isEmpty(entry.value);
        return {
          value: entry.value,
          provider: exhausted ? null : (entry.providers[0] ?? null),
          providers: entry.providers,
          cached: true,
          failures: [],
          exhausted,
        };
      }
    }

    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const { promise } = state.flights.run(key, () =>
      runInCallContext(name, () => this.route(name, args, key, Date.now() + timeoutMs, timeoutMs)),
    );
    return promise;
  }

  private async route<K extends OperationName>(
    name: K,
    args: OperationArgs<K>,
    key: string,
    deadline: number,
    timeoutMs: number,
  ): Promise<FederationOutcome<OperationResult<K>>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const league = op.league(args);
    const eligible = this.registry.filter(
      (p) => p.enabled && (league === undefined || p.provider.supportsLeague(league)),
    );
    const merging = op.merge !== undefined && this.settings.mergeOperations.some((m) => m === name);

    if (eligible.length === 0) {
      logger.debug({ league }, 'No enabled provider covers this league');
      return this.exhausted(name, key, [], [], false);
    }

    return merging
      ? this.routeMerged(name, args, key, eligible, deadline)
      : this.routeFallback(name, args, key, eligible, deadline, timeoutMs);
  }

  private async routeFallback<K extends OperationName>(
    name: K,
    args: OperationArgs<K>,
    key: string,
    eligible: readonly RegisteredProvider[],
    deadline: number,
    timeoutMs: number,
  ): Promise<FederationOutcome<OperationResult<K>>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const failures: ProviderFailure[] = [];
    const answeredEmpty: string[] = [];

    for (const p of eligible) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        if (failures.length === 0 && answeredEmpty.length === 0) {
          failures.push({ provider: p.name, error: ProviderError.timeout(p.name, timeoutMs) });
        }
        logger.warn({ provider: p.name, timeoutMs }, 'Call budget spent; ending fallback');
        break;
      }

      const attempt = await this.attempt(name, p, args, remaining);
      if (!attempt.ok) {
        failures.push({ provider: p.name, error: attempt.error });
        continue;
      }

      const value = this.sanitize(op, attempt.value, args);
      if (op.isEmpty(value)) {
        answeredEmpty.push(p.name);
        continue;
      }

      const ctx = this.context();
      this.state[name].cache.set(key, value, op.ttl(value, args, ctx), [p.name]);
      return { value, provider: p.name, providers: [p.name], cached: false, failures, exhausted: false };
    }

    return this.exhausted(name, key, failures, answeredEmpty, true);
  }

  private async routeMerged<K extends OperationName>(
    name: K,
    args: OperationArgs<K>,
    key: string,
    eligible: readonly RegisteredProvider[],
    deadline: number,
  ): Promise<FederationOutcome<OperationResult<K>>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const budget = Math.max(0, deadline - Date.now());
    const attempts = await Promise.all(eligible.map((p) => this.attempt(name, p, args, budget)));

    const failures: ProviderFailure[] = [];
    const answeredEmpty: string[] = [];
    const contributions: Array<{ provider: string; value: OperationResult<K> }> = [];
    attempts.forEach((attempt, i) => {
      const provider = eligible[i].name;
      if (!attempt.ok) {
        failures.push({ provider, error: attempt.error });
        return;
      }
      const value = this.sanitize(op, attempt.value, args);
      if (op.isEmpty(value)) answeredEmpty.push(provider);
      else contributions.push({ provider, value });
    });

    if (contributions.length === 0 || !op.merge) {
      return this.exhausted(name, key, failures, answeredEmpty, true);
    }

    const value = op.merge(contributions.map((c) => c.value));
    const providers = contributions.map((c) => c.provider);
    this.state[name].cache.set(key, value, op.ttl(value, args, this.context()), providers);
    return { value, provider: providers[0], providers, cached: false, failures, exhausted: false };
  }

  /**
   * One provider call through its circuit breaker, bounded by `budgetMs`.
   * Never throws: failures come back as `{ ok: false }`.
   */
  private async attempt<K extends OperationName>(
    name: K,
    p: RegisteredProvider,
    args: OperationArgs<K>,
    budgetMs: number,
  ): Promise<Attempt<OperationResult<K>>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const started = Date.now();
    try {
      const value = await p.breaker.call(() => withTimeout(op.invoke(p.provider, args), budgetMs, p.name));
      providerCallDurationMs.observe({ operation: name, provider: p.name }, Date.now() - started);
      providerCallsTotal.inc({ operation: name, provider: p.name, outcome: op.isEmpty(value) ? 'empty' : 'ok' });
      return { ok: true, value };
    } catch (err) {
      const error = ProviderError.from(p.name, err);
      if (error.code === 'CIRCUIT_OPEN') {
        providerCallsTotal.inc({ operation: name, provider: p.name, outcome: 'skipped' });
      } else {
        providerCallDurationMs.observe({ operation: name, provider: p.name }, Date.now() - started);
        providerCallsTotal.inc({ operation: name, provider: p.name, outcome: 'error' });
      }
      logger.warn(
        { provider: p.name, code: error.code, statusCode: error.statusCode, error: error.message },
        'Provider call failed; falling back',
      );
      return { ok: false, error };
    }
  }

  /**
   * Documented empty value for an operation nobody could answer. Cached with
   * the short `empty` TTL when at least one provider answered empty; not
   * cached when every attempt failed, so the next call retries.
   */
  private exhausted<K extends OperationName>(
    name: K,
    key: string,
    failures: readonly ProviderFailure[],
    answeredEmpty: readonly string[],
    attempted: boolean,
  ): FederationOutcome<OperationResult<K>> {
    const op: OperationDescriptor<K> = OPERATIONS[name];
    const value = op.empty();

    if (answeredEmpty.length > 0) {
      this.state[name].cache.set(key, value, this.settings.ttlSeconds.empty, answeredEmpty);
    }

    const outcome: FederationOutcome<OperationResult<K>> = {
      value,
      provider: null,
      providers: answeredEmpty,
      cached: false,
      failures,
      exhausted: true,
    };

    if (attempted && answeredEmpty.length === 0 && failures.length > 0) {
      outcome.error = new AllProvidersFailedError(name, failures);
      logger.error(
        {
          failures: failures.map((f) => ({ provider: f.provider, code: f.error.code, error: f.error.message })),
          lastFailure: outcome.error.lastFailure?.message,
        },
        outcome.error.message,
      );
    }
    return outcome;
  }

  private sanitize<K extends OperationName>(
    op: OperationDescriptor<K>,
    value: OperationResult<K>,
    args: OperationArgs<K>,
  ): OperationResult<K> {
    return op.sanitize ? op.sanitize(value, args, this.context()) : value;
  }

  private context(): OperationContext {
    return {
      ttlSeconds: this.settings.ttlSeconds,
      timeZone: this.settings.timeZone,
      now: this.now(),
      logger,
    };
  }

  private unwrap<T>(outcome: FederationOutcome<T>): T {
    if (outcome.error && this.settings.throwOnTotalFailure) throw outcome.error;
    return outcome.value;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function withTimeout<T>(promise: Promise<T>, ms: number, provider: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(ProviderError.timeout(provider, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
