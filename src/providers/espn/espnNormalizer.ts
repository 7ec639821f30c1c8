/**
 * ESPN Normalizer
 *
 * Pure mapping from ESPN site API v2 payloads to normalized records.
 * ESPN names the same field differently per endpoint, so every endpoint
 * declares where its logo, broadcasts, score and season type live
 * (`FIELD_SOURCES`) instead of probing alternative keys.
 *
 * ESPN timestamps carry an offset ('2025-09-07T17:00Z'), so no source zone
 * is needed to read them.
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
import type { EventState } from '../../types/sports';
import type { Event, Team, TeamStats } from '../../types/sports';
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

export interface EspnContext {
  provider: string;
  league: string;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Raw shapes
// ─────────────────────────────────────────────────────────────────────────────

const teamSchema = z.object({
  id: idSchema,
  displayName: z.string().min(1),
  shortDisplayName: z.string().nullish(),
  abbreviation: z.string().nullish(),
  color: z.string().nullish(),
  logo: z.string().nullish(),
  logos: z.array(z.object({ href: z.string() })).nullish(),
});
type RawTeam = z.infer<typeof teamSchema>;

const scoreSchema = z
  .union([
    z.string(),
    z.number(),
    z.object({ value: z.number().nullish(), displayValue: z.string().nullish() }),
  ])
  .nullish();
type RawScore = z.infer<typeof scoreSchema>;

const competitorSchema = z.object({
  homeAway: z.enum(['home', 'away']),
  team: z.unknown(),
  score: scoreSchema,
});

const statusSchema = z.object({
  period: z.number().nullish(),
  displayClock: z.string().nullish(),
  type: z.object({
    name: z.string().nullish(),
    detail: z.string().nullish(),
    shortDetail: z.string().nullish(),
  }),
});

const broadcastSchema = z.object({
  names: z.array(z.string()).nullish(),
  media: z.object({ shortName: z.string().nullish() }).nullish(),
});
type RawBroadcast = z.infer<typeof broadcastSchema>;

const venueSchema = z.object({
  fullName: z.string().nullish(),
  address: z
    .object({
      city: z.string().nullish(),
      state: z.string().nullish(),
      country: z.string().nullish(),
    })
    .nullish(),
});

const competitionSchema = z.object({
  date: z.string().nullish(),
  competitors: z.array(competitorSchema),
  venue: venueSchema.nullish(),
  broadcasts: z.array(broadcastSchema).nullish(),
  status: statusSchema.nullish(),
});

const seasonSchema = z.object({ year: z.number().nullish(), type: z.number().nullish() });

const eventSchema = z.object({
  id: idSchema,
  date: z.string(),
  name: z.string().nullish(),
  shortName: z.string().nullish(),
  season: seasonSchema.nullish(),
  seasonType: z.object({ type: z.number().nullish() }).nullish(),
  competitions: z.array(competitionSchema).min(1),
});
type RawEvent = z.infer<typeof eventSchema>;

const recordItemSchema = z.object({
  type: z.string().nullish(),
  summary: z.string().nullish(),
  stats: z.array(z.object({ name: z.string(), value: z.number().nullish() })).nullish(),
});

const teamDetailSchema = teamSchema.extend({
  rank: z.number().nullish(),
  standingSummary: z.string().nullish(),
  record: z.object({ items: z.array(recordItemSchema).nullish() }).nullish(),
});

// Envelopes: a mismatch here fails the whole call as malformed.
const eventsEnvelope = z.object({ events: z.array(z.unknown()) });
const teamEnvelope = z.object({ team: z.unknown() });
const teamsEnvelope = z.object({
  sports: z.array(
    z.object({
      leagues: z.array(z.object({ teams: z.array(z.object({ team: z.unknown() })).nullish() })),
    }),
  ),
});
const groupsEnvelope = z.object({
  groups: z.array(
    z.object({
      name: z.string().nullish(),
      teams: z.array(z.unknown()).nullish(),
      children: z
        .array(z.object({ name: z.string().nullish(), teams: z.array(z.unknown()).nullish() }))
        .nullish(),
    }),
  ),
});
const summaryEnvelope = z.object({
  header: z.object({
    id: idSchema,
    season: seasonSchema.nullish(),
    competitions: z.array(z.unknown()).min(1),
  }),
  gameInfo: z.object({ venue: venueSchema.nullish() }).nullish(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Per-endpoint field sources
// ─────────────────────────────────────────────────────────────────────────────

export type EspnEndpoint = 'scoreboard' | 'schedule' | 'summary' | 'team' | 'teams' | 'groups';

interface FieldSources {
  logo(team: RawTeam): string | undefined;
  broadcasts(list: readonly RawBroadcast[]): string[];
  score(score: RawScore): number | undefined;
  seasonType(event: RawEvent): number | undefined;
}

const logoFromLogos = (team: RawTeam): string | undefined => optionalText(team.logos?.[0]?.href);
const broadcastsFromMedia = (list: readonly RawBroadcast[]): string[] =>
  list.flatMap((b) => (b.media?.shortName ? [b.media.shortName] : []));
const scoreFromText = (score: RawScore): number | undefined =>
  typeof score === 'object' ? undefined : parseScore(score);
const seasonTypeFromSeason = (event: RawEvent): number | undefined => event.season?.type ?? undefined;

const FIELD_SOURCES: Readonly<Record<EspnEndpoint, FieldSources>> = {
  scoreboard: {
    logo: (team) => optionalText(team.logo),
    broadcasts: (list) => list.flatMap((b) => b.names ?? []),
    score: scoreFromText,
    seasonType: seasonTypeFromSeason,
  },
  schedule: {
    logo: logoFromLogos,
    broadcasts: broadcastsFromMedia,
    score: (score) => (typeof score === 'object' && score !== null ? (score.value ?? undefined) : undefined),
    seasonType: (event) => event.seasonType?.type ?? undefined,
  },
  summary: {
    logo: logoFromLogos,
    broadcasts: broadcastsFromMedia,
    score: scoreFromText,
    seasonType: seasonTypeFromSeason,
  },
  team: { logo: logoFromLogos, broadcasts: () => [], score: () => undefined, seasonType: () => undefined },
  teams: { logo: logoFromLogos, broadcasts: () => [], score: () => undefined, seasonType: () => undefined },
  groups: { logo: logoFromLogos, broadcasts: () => [], score: () => undefined, seasonType: () => undefined },
};

const SEASON_TYPES: Readonly<Record<number, string>> = {
  1: 'preseason',
  2: 'regular',
  3: 'postseason',
  4: 'offseason',
};

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

export const ESPN_STATUS: Readonly<Record<string, EventState>> = {
  STATUS_SCHEDULED: 'scheduled',
  STATUS_TBD: 'scheduled',
  STATUS_DELAYED: 'scheduled',
  STATUS_RAIN_DELAY: 'live',
  STATUS_IN_PROGRESS: 'live',
  STATUS_HALFTIME: 'live',
  STATUS_END_PERIOD: 'live',
  STATUS_FIRST_HALF: 'live',
  STATUS_SECOND_HALF: 'live',
  STATUS_OVERTIME: 'live',
  STATUS_SHOOTOUT: 'live',
  STATUS_END_OF_EXTRATIME: 'live',
  STATUS_FINAL: 'final',
  STATUS_FINAL_OVERTIME: 'final',
  STATUS_FINAL_PEN: 'final',
  STATUS_FULL_TIME: 'final',
  STATUS_FORFEIT: 'final',
  STATUS_POSTPONED: 'postponed',
  STATUS_SUSPENDED: 'postponed',
  STATUS_CANCELED: 'cancelled',
  STATUS_ABANDONED: 'cancelled',
};

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeTeam(raw: unknown, endpoint: EspnEndpoint, ctx: EspnContext): Team {
  const team = parseRecord(teamSchema, raw, ctx.provider, 'team');
  return createTeam({
    id: team.id,
    provider: ctx.provider,
    name: team.displayName,
    shortName: team.shortDisplayName ?? undefined,
    abbreviation: team.abbreviation ?? undefined,
    league: ctx.league,
    logoUrl: FIELD_SOURCES[endpoint].logo(team),
    color: canonicalColor(team.color),
  });
}

export function normalizeEvent(raw: unknown, endpoint: EspnEndpoint, ctx: EspnContext): Event {
  const event = parseRecord(eventSchema, raw, ctx.provider, 'event');
  const sources = FIELD_SOURCES[endpoint];
  const competition = event.competitions[0];

  const startTime = parseInstant(event.date, 'UTC');
  if (!startTime) {
    throw new NormalizationDefect(ctx.provider, 'event', `unreadable date ${event.date}`, event.id);
  }

  const home = competition.competitors.find((c) => c.homeAway === 'home');
  const away = competition.competitors.find((c) => c.homeAway === 'away');
  if (!home || !away) {
    throw new NormalizationDefect(ctx.provider, 'event', 'missing home or away competitor', event.id);
  }
  const homeTeam = normalizeTeam(home.team, endpoint, ctx);
  const awayTeam = normalizeTeam(away.team, endpoint, ctx);

  const rawStatus = competition.status;
  const state = rawStatus
    ? mapStatus(ESPN_STATUS, rawStatus.type.name, ctx.logger, ctx.provider)
    : 'scheduled';

  const venue = optionalText(competition.venue?.fullName);
  const seasonType = sources.seasonType(event);

  return createEvent({
    id: event.id,
    provider: ctx.provider,
    name: optionalText(event.name) ?? `${awayTeam.name} at ${homeTeam.name}`,
    shortName: optionalText(event.shortName) ?? `${awayTeam.abbreviation} @ ${homeTeam.abbreviation}`,
    startTime,
    homeTeam,
    awayTeam,
    status: createEventStatus({
      state,
      detail: rawStatus?.type.detail ?? undefined,
      period: rawStatus?.period ?? undefined,
      clock: rawStatus?.displayClock ?? undefined,
    }),
    league: ctx.league,
    homeScore: sources.score(home.score),
    awayScore: sources.score(away.score),
    venue: venue
      ? createVenue(
          {
            name: venue,
            city: competition.venue?.address?.city ?? undefined,
            state: competition.venue?.address?.state ?? undefined,
            country: competition.venue?.address?.country ?? undefined,
          },
          ctx.provider,
        )
      : undefined,
    broadcasts: sources.broadcasts(competition.broadcasts ?? []),
    seasonYear: event.season?.year ?? undefined,
    seasonType: seasonType === undefined ? undefined : SEASON_TYPES[seasonType],
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Envelopes
// ─────────────────────────────────────────────────────────────────────────────

/** Scoreboard or team schedule payload → events, defective ones dropped. */
export function normalizeEvents(
  payload: unknown,
  endpoint: 'scoreboard' | 'schedule',
  ctx: EspnContext,
): Event[] {
  const { events } = parseEnvelope(eventsEnvelope, payload, ctx.provider, endpoint);
  return collectRecords(events, (raw) => normalizeEvent(raw, endpoint, ctx), ctx.logger);
}

/**
 * Game summary payload → one event. The summary has no event-level name;
 * `normalizeEvent` derives it from the teams.
 */
export function normalizeSummary(payload: unknown, ctx: EspnContext): Event | null {
  const { header, gameInfo } = parseEnvelope(summaryEnvelope, payload, ctx.provider, 'summary');
  const competition = header.competitions[0];
  const merged = {
    id: header.id,
    date: readField(competition, 'date'),
    season: header.season,
    competitions: [
      typeof competition === 'object' && competition !== null
        ? { ...competition, venue: gameInfo?.venue ?? undefined }
        : competition,
    ],
  };
  const [event] = collectRecords([merged], (raw) => normalizeEvent(raw, 'summary', ctx), ctx.logger);
  return event ?? null;
}

export function normalizeTeamDetail(payload: unknown, ctx: EspnContext): Team | null {
  const { team } = parseEnvelope(teamEnvelope, payload, ctx.provider, 'team');
  const [normalized] = collectRecords([team], (raw) => normalizeTeam(raw, 'team', ctx), ctx.logger);
  return normalized ?? null;
}

export function normalizeLeagueTeams(payload: unknown, ctx: EspnContext): Team[] {
  const { sports } = parseEnvelope(teamsEnvelope, payload, ctx.provider, 'teams');
  const entries = sports.flatMap((sport) => sport.leagues.flatMap((league) => league.teams ?? []));
  return collectRecords(entries, (entry) => normalizeTeam(entry.team, 'teams', ctx), ctx.logger);
}

/**
 * Groups payload → conference name to teams. Parent groups with children
 * (e.g. "FBS (I-A)") contribute their children; leaf groups stand alone.
 */
export function normalizeConferences(payload: unknown, ctx: EspnContext): Map<string, Team[]> {
  const { groups } = parseEnvelope(groupsEnvelope, payload, ctx.provider, 'groups');
  const conferences = new Map<string, Team[]>();
  const leaves = groups.flatMap((group) => (group.children?.length ? group.children : [group]));
  for (const leaf of leaves) {
    const name = optionalText(leaf.name);
    if (!name) continue;
    const teams = collectRecords(leaf.teams ?? [], (raw) => normalizeTeam(raw, 'groups', ctx), ctx.logger);
    if (teams.length === 0) continue;
    conferences.set(name, [...(conferences.get(name) ?? []), ...teams]);
  }
  return conferences;
}

/**
 * Team payload → standings record. Null when ESPN reports no overall record
 * for the team (off-season or a league without standings).
 */
export function normalizeTeamStats(payload: unknown, ctx: EspnContext): TeamStats | null {
  const { team } = parseEnvelope(teamEnvelope, payload, ctx.provider, 'team');
  const [stats] = collectRecords([team], (raw) => toTeamStats(raw, ctx), ctx.logger);
  return stats ?? null;
}

function toTeamStats(raw: unknown, ctx: EspnContext): TeamStats | null {
  const team = parseRecord(teamDetailSchema, raw, ctx.provider, 'teamStats');
  const items = team.record?.items ?? [];
  const total = items.find((item) => item.type === 'total');
  const record = optionalText(total?.summary);
  if (!record) return null;

  const streakValue = total?.stats?.find((stat) => stat.name === 'streak')?.value ?? undefined;
  // ESPN reports unranked teams as 99.
  const rank = team.rank ?? undefined;
  return createTeamStats({
    provider: ctx.provider,
    teamId: team.id,
    league: ctx.league,
    record,
    homeRecord: items.find((item) => item.type === 'home')?.summary ?? undefined,
    awayRecord: items.find((item) => item.type === 'road')?.summary ?? undefined,
    streak: formatStreak(streakValue),
    streakCount: streakValue === undefined ? undefined : Math.trunc(streakValue),
    rank: rank !== undefined && rank > 0 && rank < 99 ? rank : undefined,
    division: parseDivision(team.standingSummary),
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** 3 → 'W3', -2 → 'L2', 0 → undefined. */
export function formatStreak(value: number | undefined): string | undefined {
  if (value === undefined || value === 0) return undefined;
  const count = Math.abs(Math.trunc(value));
  return value > 0 ? `W${count}` : `L${count}`;
}

/** '1st in AFC East' → 'AFC East'. */
export function parseDivision(summary: string | null | undefined): string | undefined {
  const match = /^\s*\S+\s+in\s+(.+?)\s*$/i.exec(summary ?? '');
  return match ? match[1] : undefined;
}

function readField(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}
