/**
 * Federated operations
 *
 * One descriptor per read operation tells the service how to call a
 * provider, which league gates the call, what "empty" looks like, how long
 * a result lives, and (for team lists) how results from several providers
 * merge. `FederationService.run` is generic over this table.
 */

import { normalizeLeagueKey } from '../../leagues/catalog';
import { freezeList } from '../../models/records';
import { byName } from '../../providers/shared/normalize';
import type { SportsProvider } from '../../providers/types';
import type { ConferenceTeams, Event, Team, TeamStats } from '../../types/sports';
import { calendarDateInZone, daysBetween, toCalendarDate } from '../../utils/dateTime';
import type { Logger } from '../../utils/logger';
import { mergeTeams } from './merge';
import type { TtlClass } from './options';

// ─────────────────────────────────────────────────────────────────────────────
// Operation signatures
// ─────────────────────────────────────────────────────────────────────────────

export interface FederatedOperations {
  getTeam: { args: [teamId: string, league: string]; result: Team | null };
  getTeamSchedule: { args: [teamId: string, league: string, daysAhead: number]; result: readonly Event[] };
  getEvents: { args: [league: string, date: string]; result: readonly Event[] };
  getEvent: { args: [eventId: string, league: string]; result: Event | null };
  getTeamStats: { args: [teamId: string, league: string]; result: TeamStats | null };
  getLeagueTeams: { args: [league: string]; result: readonly Team[] };
  getTeamsByConference: { args: [league: string]; result: ConferenceTeams };
  searchTeams: { args: [query: string, league?: string]; result: readonly Team[] };
}

export type OperationName = keyof FederatedOperations;
export type OperationArgs<K extends OperationName> = FederatedOperations[K]['args'];
export type OperationResult<K extends OperationName> = FederatedOperations[K]['result'];

export const OPERATION_NAMES: readonly OperationName[] = [
  'getTeam',
  'getTeamSchedule',
  'getEvents',
  'getEvent',
  'getTeamStats',
  'getLeagueTeams',
  'getTeamsByConference',
  'searchTeams',
];

export interface OperationContext {
  ttlSeconds: Readonly<Record<TtlClass, number>>;
  timeZone: string;
  now: Date;
  logger: Logger;
}

export interface OperationDescriptor<K extends OperationName> {
  /** Canonical arguments: league keys normalized, dates checked. Throws RangeError on bad input. */
  prepare(args: OperationArgs<K>, ctx: OperationContext): OperationArgs<K>;
  /** Cache key parts after the operation name. */
  keyParts(args: OperationArgs<K>): Array<string | number | undefined>;
  /** League gating provider eligibility; undefined means every provider is eligible. */
  league(args: OperationArgs<K>): string | undefined;
  invoke(provider: SportsProvider, args: OperationArgs<K>): Promise<OperationResult<K>>;
  empty(): OperationResult<K>;
  isEmpty(value: OperationResult<K>): boolean;
  ttl(value: OperationResult<K>, args: OperationArgs<K>, ctx: OperationContext): number;
  /** Drop records that violate the operation's contract. */
  sanitize?(value: OperationResult<K>, args: OperationArgs<K>, ctx: OperationContext): OperationResult<K>;
  /** Combine non-empty results, highest priority first. Present only for mergeable operations. */
  merge?(values: ReadonlyArray<OperationResult<K>>): OperationResult<K>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const EMPTY_EVENTS: readonly Event[] = freezeList([]);
const EMPTY_TEAMS: readonly Team[] = freezeList([]);
const EMPTY_CONFERENCES: ConferenceTeams = Object.freeze({});

const isNull = (value: unknown): boolean => value === null;
const isEmptyList = (value: readonly unknown[]): boolean => value.length === 0;

function requireText(value: string, field: string): string {
  const text = value.trim();
  if (!text) throw new RangeError(`${field} must be non-empty`);
  return text;
}

function leagueArg(value: string): string {
  return normalizeLeagueKey(requireText(value, 'league'));
}

const SETTLED_STATES = new Set(['final', 'postponed', 'cancelled']);

/**
 * TTL class for one date's events: past dates keep for months once every
 * game has settled, today's refresh every minute.
 */
export function eventsTtlClass(date: string, events: readonly Event[], ctx: OperationContext): TtlClass {
  const offset = daysBetween(calendarDateInZone(ctx.now, ctx.timeZone), date);
  if (offset < 0) {
    return events.every((event) => SETTLED_STATES.has(event.status.state)) ? 'eventsPast' : 'eventsToday';
  }
  if (offset === 0) return 'eventsToday';
  if (offset === 1) return 'eventsTomorrow';
  return 'events';
}

// ─────────────────────────────────────────────────────────────────────────────
// Descriptor table
// ─────────────────────────────────────────────────────────────────────────────

export const OPERATIONS: { readonly [K in OperationName]: OperationDescriptor<K> } = {
  getTeam: {
    prepare: ([teamId, leagueKey]) => [requireText(teamId, 'teamId'), leagueArg(leagueKey)],
    keyParts: ([teamId, leagueKey]) => [leagueKey, teamId],
    league: ([, leagueKey]) => leagueKey,
    invoke: (provider, [teamId, leagueKey]) => provider.getTeam(teamId, leagueKey),
    empty: () => null,
    isEmpty: isNull,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.team,
  },

  getTeamSchedule: {
    prepare: ([teamId, leagueKey, daysAhead]) => {
      if (!Number.isInteger(daysAhead) || daysAhead < 0) {
        throw new RangeError('daysAhead must be a non-negative integer');
      }
      return [requireText(teamId, 'teamId'), leagueArg(leagueKey), daysAhead];
    },
    keyParts: ([teamId, leagueKey, daysAhead]) => [leagueKey, teamId, daysAhead],
    league: ([, leagueKey]) => leagueKey,
    invoke: (provider, [teamId, leagueKey, daysAhead]) => provider.getTeamSchedule(teamId, leagueKey, daysAhead),
    empty: () => EMPTY_EVENTS,
    isEmpty: isEmptyList,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.teamSchedule,
  },

  getEvents: {
    prepare: ([leagueKey, date], ctx) => [leagueArg(leagueKey), toCalendarDate(date, ctx.timeZone)],
    keyParts: ([leagueKey, date]) => [leagueKey, date],
    league: ([leagueKey]) => leagueKey,
    invoke: (provider, [leagueKey, date]) => provider.getEvents(leagueKey, date),
    empty: () => EMPTY_EVENTS,
    isEmpty: isEmptyList,
    ttl: (value, [, date], ctx) => ctx.ttlSeconds[eventsTtlClass(date, value, ctx)],
    sanitize: (value, [leagueKey], ctx) => {
      const kept = value.filter((event) => event.league === leagueKey);
      if (kept.length === value.length) return value;
      ctx.logger.warn(
        {
          league: leagueKey,
          dropped: value
            .filter((event) => event.league !== leagueKey)
            .map((event) => ({ id: event.id, provider: event.provider, league: event.league })),
        },
        'Dropping events from another league',
      );
      return freezeList(kept);
    },
  },

  getEvent: {
    prepare: ([eventId, leagueKey]) => [requireText(eventId, 'eventId'), leagueArg(leagueKey)],
    keyParts: ([eventId, leagueKey]) => [leagueKey, eventId],
    league: ([, leagueKey]) => leagueKey,
    invoke: (provider, [eventId, leagueKey]) => provider.getEvent(eventId, leagueKey),
    empty: () => null,
    isEmpty: isNull,
    ttl: (value, _args, ctx) => (value?.status.state === 'live' ? ctx.ttlSeconds.liveEvent : ctx.ttlSeconds.event),
  },

  getTeamStats: {
    prepare: ([teamId, leagueKey]) => [requireText(teamId, 'teamId'), leagueArg(leagueKey)],
    keyParts: ([teamId, leagueKey]) => [leagueKey, teamId],
    league: ([, leagueKey]) => leagueKey,
    invoke: (provider, [teamId, leagueKey]) => provider.getTeamStats(teamId, leagueKey),
    empty: () => null,
    isEmpty: isNull,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.teamStats,
  },

  getLeagueTeams: {
    prepare: ([leagueKey]) => [leagueArg(leagueKey)],
    keyParts: ([leagueKey]) => [leagueKey],
    league: ([leagueKey]) => leagueKey,
    invoke: (provider, [leagueKey]) => provider.getLeagueTeams(leagueKey),
    empty: () => EMPTY_TEAMS,
    isEmpty: isEmptyList,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.leagueTeams,
    merge: (values) => freezeList(mergeTeams(values).sort(byName)),
  },

  getTeamsByConference: {
    prepare: ([leagueKey]) => [leagueArg(leagueKey)],
    keyParts: ([leagueKey]) => [leagueKey],
    league: ([leagueKey]) => leagueKey,
    invoke: (provider, [leagueKey]) => provider.getTeamsByConference(leagueKey),
    empty: () => EMPTY_CONFERENCES,
    isEmpty: (value) => Object.keys(value).length === 0,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.teamsByConference,
  },

  searchTeams: {
    prepare: ([query, leagueKey]) => [
      requireText(query, 'query'),
      leagueKey === undefined ? undefined : leagueArg(leagueKey),
    ],
    keyParts: ([query, leagueKey]) => [leagueKey, query.toLowerCase()],
    league: ([, leagueKey]) => leagueKey,
    invoke: (provider, [query, leagueKey]) => provider.searchTeams(query, leagueKey),
    empty: () => EMPTY_TEAMS,
    isEmpty: isEmptyList,
    ttl: (_value, _args, ctx) => ctx.ttlSeconds.searchTeams,
    // Keeps the best-first order of the highest-priority provider.
    merge: (values) => freezeList(mergeTeams(values)),
  },
};
