/**
 * Normalized Sports Records
 *
 * The shared vocabulary every provider normalizes into. Consumers only ever
 * see these shapes; nothing provider-specific leaks past a normalizer.
 *
 * Records are immutable values. Build them through the constructors in
 * `models/records.ts`, which freeze them.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Event State
// ─────────────────────────────────────────────────────────────────────────────

export const EVENT_STATES = ['scheduled', 'live', 'final', 'postponed', 'cancelled'] as const;

export type EventState = (typeof EVENT_STATES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export interface Team {
  /** Provider-scoped id. Only meaningful together with `provider`. */
  readonly id: string;
  readonly provider: string;
  readonly name: string;
  readonly shortName: string;
  readonly abbreviation: string;
  /** Normalized league key, e.g. "nfl". */
  readonly league: string;
  readonly logoUrl?: string;
  /** Lowercase six-digit hex, no leading '#'. */
  readonly color?: string;
}

export interface Venue {
  readonly name: string;
  readonly city?: string;
  readonly state?: string;
  readonly country?: string;
}

export interface EventStatus {
  readonly state: EventState;
  readonly detail?: string;
  /** Only kept for live and final events. */
  readonly period?: number;
  /** Only kept for live and final events. */
  readonly clock?: string;
}

export interface Event {
  readonly id: string;
  readonly provider: string;
  readonly name: string;
  readonly shortName: string;
  readonly startTime: Date;
  readonly homeTeam: Team;
  readonly awayTeam: Team;
  readonly status: EventStatus;
  readonly league: string;
  readonly homeScore?: number;
  readonly awayScore?: number;
  readonly venue?: Venue;
  readonly broadcasts: readonly string[];
  readonly seasonYear?: number;
  readonly seasonType?: string;
}

export interface TeamStats {
  readonly provider: string;
  readonly teamId: string;
  readonly league: string;
  /** Provider-format win-loss(-draw) text. */
  readonly record: string;
  readonly homeRecord?: string;
  readonly awayRecord?: string;
  /** Formatted streak, e.g. "W3" or "L2". */
  readonly streak?: string;
  /** Signed streak length: wins positive, losses negative, anything else 0. */
  readonly streakCount?: number;
  readonly rank?: number;
  readonly conference?: string;
  readonly division?: string;
}

/** Conference name → teams in that conference, each list sorted by name. */
export type ConferenceTeams = Readonly<Record<string, readonly Team[]>>;
