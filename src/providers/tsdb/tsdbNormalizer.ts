/**
 * TheSportsDB Normalizer
 *
 * Maps v1 JSON payloads to normalized records. TheSportsDB answers "nothing
 * found" with `null` in place of the list, and sends numbers as strings.
 * `strTimestamp` is UTC, usually without an offset.
 */

import { z } from 'zod';
import { NormalizationDefect } from '../../errors/NormalizationDefect';
import {
  createEvent,
  createEventStatus,
  createTeam,
  createTeamStats,
  createVenue,
  optionalText,
} from '../../models/records';
import type { Event, EventState, Team, TeamStats } from '../../types/sports';
import { leagueKeyForTsdbId } from '../../leagues/catalog';
import { parseInstant } from '../../utils/dateTime';
import type { Logger } from '../../utils/logger';
import {
  canonicalColor,
  collectRecords,
  idSchema,
  mapStatus,
  parseEnvelope,
  parseRecord,
  parseScore,
} from '../shared/normalize';

export interface TsdbContext {
  provider: string;
  league: string;
  logger: Logger;
  /** Whether the league's records carry a draw column. */
  draws?: boolean;
}

const TSDB_SOURCE_ZONE = 'UTC';

// ─────────────────────────────────────────────────────────────────────────────
// Raw shapes
// ─────────────────────────────────────────────────────────────────────────────

const numberish = z.union([z.string(), z.number()]).nullish();

const teamSchema = z.object({
  idTeam: idSchema,
  strTeam: z.string().min(1),
  strTeamShort: z.string().nullish(),
  strBadge: z.string().nullish(),
  strColour1: z.string().nullish(),
  idLeague: z.string().nullish(),
});

const eventSchema = z.object({
  idEvent: idSchema,
  strEvent: z.string().nullish(),
  strTimestamp: z.string(),
  idHomeTeam: idSchema,
  idAwayTeam: idSchema,
  strHomeTeam: z.string().min(1),
  strAwayTeam: z.string().min(1),
  strHomeTeamBadge: z.string().nullish(),
  strAwayTeamBadge: z.string().nullish(),
  intHomeScore: numberish,
  intAwayScore: numberish,
  strStatus: z.string().nullish(),
  strPostponed: z.string().nullish(),
  strVenue: z.string().nullish(),
  strCity: z.string().nullish(),
  strCountry: z.string().nullish(),
  strTVStation: z.string().nullish(),
  strSeason: z.string().nullish(),
  idLeague: z.string().nullish(),
});
type RawEvent = z.infer<typeof eventSchema>;

const tableRowSchema = z.object({
  idTeam: idSchema,
  intRank: numberish,
  intWin: numberish,
  intLoss: numberish,
  intDraw: numberish,
  strForm: z.string().nullish(),
  strGroup: z.string().nullish(),
});

// Envelopes. Lists are nullable: null is TheSportsDB's empty answer.
const teamsEnvelope = z.object({ teams: z.array(z.unknown()).nullable() });
const eventsEnvelope = z.object({ events: z.array(z.unknown()).nullable() });
const tableEnvelope = z.object({ table: z.array(z.unknown()).nullable() });

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

export const TSDB_STATUS: Readonly<Record<string, EventState>> = {
  '': 'scheduled',
  NS: 'scheduled',
  'Not Started': 'scheduled',
  TBD: 'scheduled',
  'Time To Be Defined': 'scheduled',
  '1H': 'live',
  HT: 'live',
  '2H': 'live',
  ET: 'live',
  BT: 'live',
  P: 'live',
  Q1: 'live',
  Q2: 'live',
  Q3: 'live',
  Q4: 'live',
  OT: 'live',
  LIVE: 'live',
  'In Progress': 'live',
  FT: 'final',
  AET: 'final',
  PEN: 'final',
  AOT: 'final',
  AP: 'final',
  'Match Finished': 'final',
  Finished: 'final',
  PST: 'postponed',
  Postponed: 'postponed',
  SUSP: 'postponed',
  CANC: 'cancelled',
  Cancelled: 'cancelled',
  ABD: 'cancelled',
  Abandoned: 'cancelled',
};

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeTeam(raw: unknown, ctx: TsdbContext): Team {
  const team = parseRecord(teamSchema, raw, ctx.provider, 'team');
  return createTeam({
    id: team.idTeam,
    provider: ctx.provider,
    name: team.strTeam,
    // strTeamShort is a code such as "PIT", not a short name
    abbreviation: team.strTeamShort ?? undefined,
    league: ctx.league,
    logoUrl: optionalText(team.strBadge),
    color: canonicalColor(team.strColour1),
  });
}

/**
 * Event payloads only name the teams. `roster` (league teams by id) supplies
 * the full records; a team missing from it is built from the event's own
 * name and badge.
 */
export function normalizeEvent(
  raw: unknown,
  ctx: TsdbContext,
  roster: ReadonlyMap<string, Team>,
): Event {
  const event = parseRecord(eventSchema, raw, ctx.provider, 'event');
  // Lookups by event id can land in another league; stamp the event's own.
  const league = leagueKeyForTsdbId(event.idLeague ?? '') ?? ctx.league;

  const startTime = parseInstant(event.strTimestamp, TSDB_SOURCE_ZONE);
  if (!startTime) {
    throw new NormalizationDefect(ctx.provider, 'event', `unreadable timestamp ${event.strTimestamp}`, event.idEvent);
  }

  const homeTeam =
    roster.get(event.idHomeTeam) ??
    createTeam({
      id: event.idHomeTeam,
      provider: ctx.provider,
      name: event.strHomeTeam,
      league,
      logoUrl: optionalText(event.strHomeTeamBadge),
    });
  const awayTeam =
    roster.get(event.idAwayTeam) ??
    createTeam({
      id: event.idAwayTeam,
      provider: ctx.provider,
      name: event.strAwayTeam,
      league,
      logoUrl: optionalText(event.strAwayTeamBadge),
    });

  const postponed = event.strPostponed?.trim().toLowerCase() === 'yes';
  const state = postponed ? 'postponed' : mapStatus(TSDB_STATUS, event.strStatus, ctx.logger, ctx.provider);
  const venue = optionalText(event.strVenue);

  return createEvent({
    id: event.idEvent,
    provider: ctx.provider,
    name: optionalText(event.strEvent) ?? `${awayTeam.name} at ${homeTeam.name}`,
    shortName: `${awayTeam.abbreviation} @ ${homeTeam.abbreviation}`,
    startTime,
    homeTeam,
    awayTeam,
    status: createEventStatus({ state, detail: optionalText(event.strStatus) }),
    league,
    homeScore: parseScore(event.intHomeScore),
    awayScore: parseScore(event.intAwayScore),
    venue: venue
      ? createVenue(
          { name: venue, city: event.strCity ?? undefined, country: event.strCountry ?? undefined },
          ctx.provider,
        )
      : undefined,
    broadcasts: splitStations(event.strTVStation),
    seasonYear: seasonYear(event),
  });
}

export function normalizeTeamStats(raw: unknown, ctx: TsdbContext): TeamStats {
  const row = parseRecord(tableRowSchema, raw, ctx.provider, 'teamStats');
  const wins = parseScore(row.intWin);
  const losses = parseScore(row.intLoss);
  if (wins === undefined || losses === undefined) {
    throw new NormalizationDefect(ctx.provider, 'teamStats', 'missing win/loss columns', row.idTeam);
  }
  const draws = parseScore(row.intDraw) ?? 0;
  const streak = parseForm(row.strForm);

  return createTeamStats({
    provider: ctx.provider,
    teamId: row.idTeam,
    league: ctx.league,
    record: ctx.draws ? `${wins}-${losses}-${draws}` : `${wins}-${losses}`,
    streak: streak?.streak,
    streakCount: streak?.count,
    rank: parseScore(row.intRank),
    division: optionalText(row.strGroup),
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Envelopes
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeTeams(payload: unknown, ctx: TsdbContext, endpoint: string): Team[] {
  const { teams } = parseEnvelope(teamsEnvelope, payload, ctx.provider, endpoint);
  return collectRecords(teams ?? [], (raw) => normalizeTeam(raw, ctx), ctx.logger);
}

export function normalizeEvents(
  payload: unknown,
  ctx: TsdbContext,
  roster: ReadonlyMap<string, Team>,
  endpoint: string,
): Event[] {
  const { events } = parseEnvelope(eventsEnvelope, payload, ctx.provider, endpoint);
  return collectRecords(events ?? [], (raw) => normalizeEvent(raw, ctx, roster), ctx.logger);
}

/**
 * Single-team lookup payload → the team, or null when TheSportsDB filed it
 * under another league than `ctx.league`. A team without `idLeague` is
 * trusted to belong to the requested league.
 */
export function normalizeLookupTeam(payload: unknown, ctx: TsdbContext): Team | null {
  const { teams } = parseEnvelope(teamsEnvelope, payload, ctx.provider, 'lookupteam');
  const inLeague = (teams ?? []).filter((raw) => {
    const idLeague = readField(raw, 'idLeague');
    if (idLeague === undefined) return true;
    const league = leagueKeyForTsdbId(idLeague);
    if (league === ctx.league) return true;
    ctx.logger.warn(
      { provider: ctx.provider, teamId: readField(raw, 'idTeam') ?? null, idLeague, league: ctx.league },
      'Team belongs to another league; ignoring',
    );
    return false;
  });
  const [team] = collectRecords(inLeague, (raw) => normalizeTeam(raw, ctx), ctx.logger);
  return team ?? null;
}

/** Standings payload → the row for `teamId`, or null when the team is not listed. */
export function normalizeStandingsRow(payload: unknown, teamId: string, ctx: TsdbContext): TeamStats | null {
  const { table } = parseEnvelope(tableEnvelope, payload, ctx.provider, 'lookuptable');
  const rows = (table ?? []).filter((row) => readField(row, 'idTeam') === teamId);
  const [stats] = collectRecords(rows, (row) => normalizeTeamStats(row, ctx), ctx.logger);
  return stats ?? null;
}

/**
 * Global team search payload → teams of catalog leagues. Each team is stamped
 * with the league its `idLeague` maps to; teams of unknown leagues are dropped.
 */
export function normalizeSearchTeams(payload: unknown, provider: string, logger: Logger): Team[] {
  const { teams } = parseEnvelope(teamsEnvelope, payload, provider, 'searchteams');
  const known = (teams ?? []).flatMap((raw) => {
    const league = leagueKeyForTsdbId(readField(raw, 'idLeague') ?? '');
    return league ? [{ raw, league }] : [];
  });
  return collectRecords(known, (entry) => normalizeTeam(entry.raw, { provider, league: entry.league, logger }), logger);
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Form string, most recent result last: 'WLWWW' → W3 (+3), 'WWLL' → L2 (-2).
 * Draw runs keep their length in `streak` with a count of 0.
 */
export function parseForm(form: string | null | undefined): { streak: string; count: number } | undefined {
  const results = (form ?? '').trim().toUpperCase();
  if (!/^[WLD]+$/.test(results)) return undefined;
  const last = results[results.length - 1];
  let length = 0;
  for (let i = results.length - 1; i >= 0 && results[i] === last; i--) length++;
  const sign = last === 'W' ? 1 : last === 'L' ? -1 : 0;
  return { streak: `${last}${length}`, count: sign * length };
}

function splitStations(value: string | null | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((station) => station.trim())
    .filter((station) => station.length > 0);
}

// '2025' or '2025-2026' → 2025
function seasonYear(event: RawEvent): number | undefined {
  const match = /^(\d{4})/.exec(event.strSeason ?? '');
  return match ? Number(match[1]) : undefined;
}

function readField(raw: unknown, key: string): string | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  const value: unknown = Reflect.get(raw, key);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}
