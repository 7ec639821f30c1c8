/**
 * Record constructors
 *
 * The only way normalizers build records. Each constructor applies the
 * record's structural invariants and returns a frozen value whose embedded
 * records are frozen too, so a record handed to one consumer (or held in
 * the cache) cannot be changed by another.
 */

import { NormalizationDefect } from '../errors/NormalizationDefect';
import type { Event, EventState, EventStatus, Team, TeamStats, Venue } from '../types/sports';

// Mutable views of the record shapes, used only while building.
type Draft<T> = { -readonly [K in keyof T]: T[K] };

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Trimmed text, or undefined when absent/blank. */
export function optionalText(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Which record a required field belongs to, for the defect it raises. */
interface Owner {
  provider: string;
  kind: NormalizationDefect['recordKind'];
  id?: string;
}

function requireText(value: string, field: string, owner: Owner): string {
  const text = optionalText(value);
  if (!text) throw new NormalizationDefect(owner.provider, owner.kind, `${field} must be non-empty`, owner.id);
  return text;
}

function optionalNumber(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** Drop keys whose value is undefined so structural equality ignores them. */
function compact<T extends object>(draft: T): T {
  for (const key of Object.keys(draft)) {
    if (Reflect.get(draft, key) === undefined) Reflect.deleteProperty(draft, key);
  }
  return draft;
}

function refuseMutation(): never {
  throw new TypeError('Record instants are immutable');
}

/** A Date whose setters throw, so a frozen record's instant stays fixed. */
class FixedInstant extends Date {
  setTime(): never {
    return refuseMutation();
  }
  setMilliseconds(): never {
    return refuseMutation();
  }
  setUTCMilliseconds(): never {
    return refuseMutation();
  }
  setSeconds(): never {
    return refuseMutation();
  }
  setUTCSeconds(): never {
    return refuseMutation();
  }
  setMinutes(): never {
    return refuseMutation();
  }
  setUTCMinutes(): never {
    return refuseMutation();
  }
  setHours(): never {
    return refuseMutation();
  }
  setUTCHours(): never {
    return refuseMutation();
  }
  setDate(): never {
    return refuseMutation();
  }
  setUTCDate(): never {
    return refuseMutation();
  }
  setMonth(): never {
    return refuseMutation();
  }
  setUTCMonth(): never {
    return refuseMutation();
  }
  setFullYear(): never {
    return refuseMutation();
  }
  setUTCFullYear(): never {
    return refuseMutation();
  }
  setYear(): never {
    return refuseMutation();
  }
}

// Team fields the constructor filled in because the provider sent nothing.
type DerivableField = 'shortName' | 'abbreviation';
const derivedFields = new WeakMap<Team, ReadonlySet<DerivableField>>();

/** True when `field` of `team` was defaulted rather than sent by its provider. */
export function isDerived(team: Team, field: DerivableField): boolean {
  return derivedFields.get(team)?.has(field) ?? false;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export interface TeamInput {
  id: string;
  provider: string;
  name: string;
  shortName?: string;
  abbreviation?: string;
  league: string;
  logoUrl?: string;
  color?: string;
}

/**
 * `shortName` defaults to `name`; `abbreviation` defaults to the first
 * letters of up to three words of the name, uppercased.
 */
export function createTeam(input: TeamInput): Team {
  const owner: Owner = { provider: input.provider, kind: 'team', id: input.id };
  const name = requireText(input.name, 'team.name', owner);
  const shortName = optionalText(input.shortName);
  const abbreviation = optionalText(input.abbreviation);
  const team: Draft<Team> = {
    id: requireText(input.id, 'team.id', owner),
    provider: requireText(input.provider, 'team.provider', owner),
    name,
    shortName: shortName ?? name,
    abbreviation: abbreviation ?? deriveAbbreviation(name),
    league: requireText(input.league, 'team.league', owner),
    logoUrl: optionalText(input.logoUrl),
    color: optionalText(input.color),
  };
  const frozen = Object.freeze(compact(team));
  const derived = new Set<DerivableField>();
  if (shortName === undefined) derived.add('shortName');
  if (abbreviation === undefined) derived.add('abbreviation');
  if (derived.size > 0) derivedFields.set(frozen, derived);
  return frozen;
}

export function deriveAbbreviation(name: string): string {
  const words = name.split(/\s+/).filter((w) => /[a-z0-9]/i.test(w));
  if (words.length === 1) return words[0].slice(0, 3).toUpperCase();
  return words
    .slice(0, 3)
    .map((w) => w.replace(/[^a-z0-9]/gi, '').charAt(0))
    .join('')
    .toUpperCase();
}

export interface VenueInput {
  name: string;
  city?: string;
  state?: string;
  country?: string;
}

/** `provider` names the source in the defect raised for a blank venue name. */
export function createVenue(input: VenueInput, provider = 'unknown'): Venue {
  const venue: Draft<Venue> = {
    name: requireText(input.name, 'venue.name', { provider, kind: 'event' }),
    city: optionalText(input.city),
    state: optionalText(input.state),
    country: optionalText(input.country),
  };
  return Object.freeze(compact(venue));
}

export interface EventStatusInput {
  state: EventState;
  detail?: string;
  period?: number;
  clock?: string;
}

/** Period and clock are dropped unless the event is live or final. */
export function createEventStatus(input: EventStatusInput): EventStatus {
  const timed = input.state === 'live' || input.state === 'final';
  const status: Draft<EventStatus> = {
    state: input.state,
    detail: optionalText(input.detail),
    period: timed ? optionalNumber(input.period) : undefined,
    clock: timed ? optionalText(input.clock) : undefined,
  };
  return Object.freeze(compact(status));
}

export interface EventInput {
  id: string;
  provider: string;
  name: string;
  shortName?: string;
  startTime: Date;
  homeTeam: Team;
  awayTeam: Team;
  status: EventStatus;
  league: string;
  homeScore?: number;
  awayScore?: number;
  venue?: Venue;
  broadcasts?: readonly string[];
  seasonYear?: number;
  seasonType?: string;
}

export function createEvent(input: EventInput): Event {
  const owner: Owner = { provider: input.provider, kind: 'event', id: input.id };
  if (isNaN(input.startTime.getTime())) {
    throw new NormalizationDefect(owner.provider, owner.kind, 'event.startTime must be a valid instant', owner.id);
  }
  const name = requireText(input.name, 'event.name', owner);
  const broadcasts = Array.from(
    new Set((input.broadcasts ?? []).map((b) => b.trim()).filter((b) => b.length > 0)),
  );
  const event: Draft<Event> = {
    id: requireText(input.id, 'event.id', owner),
    provider: requireText(input.provider, 'event.provider', owner),
    name,
    shortName: optionalText(input.shortName) ?? name,
    // Own copy: a caller's Date must not alias the record's.
    startTime: Object.freeze(new FixedInstant(input.startTime.getTime())),
    homeTeam: Object.isFrozen(input.homeTeam) ? input.homeTeam : createTeam(input.homeTeam),
    awayTeam: Object.isFrozen(input.awayTeam) ? input.awayTeam : createTeam(input.awayTeam),
    status: Object.isFrozen(input.status) ? input.status : createEventStatus(input.status),
    league: requireText(input.league, 'event.league', owner),
    homeScore: optionalNumber(input.homeScore),
    awayScore: optionalNumber(input.awayScore),
    venue:
      input.venue === undefined || Object.isFrozen(input.venue) ? input.venue : createVenue(input.venue, input.provider),
    broadcasts: Object.freeze(broadcasts),
    seasonYear: optionalNumber(input.seasonYear),
    seasonType: optionalText(input.seasonType),
  };
  return Object.freeze(compact(event));
}

export interface TeamStatsInput {
  provider: string;
  teamId: string;
  league: string;
  record: string;
  homeRecord?: string;
  awayRecord?: string;
  streak?: string;
  streakCount?: number;
  rank?: number;
  conference?: string;
  division?: string;
}

export function createTeamStats(input: TeamStatsInput): TeamStats {
  const owner: Owner = { provider: input.provider, kind: 'teamStats', id: input.teamId };
  const stats: Draft<TeamStats> = {
    provider: requireText(input.provider, 'teamStats.provider', owner),
    teamId: requireText(input.teamId, 'teamStats.teamId', owner),
    league: requireText(input.league, 'teamStats.league', owner),
    record: requireText(input.record, 'teamStats.record', owner),
    homeRecord: optionalText(input.homeRecord),
    awayRecord: optionalText(input.awayRecord),
    streak: optionalText(input.streak),
    streakCount: optionalNumber(input.streakCount),
    rank: optionalNumber(input.rank),
    conference: optionalText(input.conference),
    division: optionalText(input.division),
  };
  return Object.freeze(compact(stats));
}

/** Freeze a list of records so a cached array cannot be reordered or grown. */
export function freezeList<T>(items: T[]): readonly T[] {
  return Object.freeze(items);
}
