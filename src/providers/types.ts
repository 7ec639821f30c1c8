/**
 * Provider Capability Interface
 *
 * The contract every sports data source implements. Methods return only
 * normalized records. "Nothing found" is an empty list, an empty mapping or
 * null. A method throws (a `ProviderError`) only when the provider is
 * temporarily unusable: transport, auth, rate limit, timeout or a response
 * it cannot read.
 */

import type { ConferenceTeams, Event, Team, TeamStats } from '../types/sports';

export interface SportsProvider {
  /** Stable lowercase identifier; stamped on every record this provider builds. */
  readonly name: string;

  /** Pure capability check. No I/O; called before every dispatch. */
  supportsLeague(league: string): boolean;

  getTeam(teamId: string, league: string): Promise<Team | null>;

  /** Upcoming events for a team, ascending by start time. */
  getTeamSchedule(teamId: string, league: string, daysAhead: number): Promise<readonly Event[]>;

  /** Every event of `league` on calendar date `date` ('YYYY-MM-DD', caller's zone). */
  getEvents(league: string, date: string): Promise<readonly Event[]>;

  getEvent(eventId: string, league: string): Promise<Event | null>;

  /** Null when the provider does not track standings for the league. */
  getTeamStats(teamId: string, league: string): Promise<TeamStats | null>;

  /** Full roster of a league, sorted by name. */
  getLeagueTeams(league: string): Promise<readonly Team[]>;

  /** Empty mapping for providers or leagues without conferences. */
  getTeamsByConference(league: string): Promise<ConferenceTeams>;

  /** Case-insensitive name match, best first. */
  searchTeams(query: string, league?: string): Promise<readonly Team[]>;
}

/**
 * Options shared by the bundled adapters.
 */
export interface ProviderOptions {
  /** Override the provider's name (and so the `provider` stamp on its records). */
  name?: string;
  /** Caller's time zone for calendar dates. Default 'UTC'. */
  timeZone?: string;
  /** Injected clock for schedule windows. */
  now?: () => Date;
}
