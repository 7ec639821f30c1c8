/**
 * ESPN Provider
 *
 * Primary source for every league the catalog maps to an ESPN path.
 * ESPN has no team search endpoint; `searchTeams` ranks the league roster
 * locally and needs a league.
 */

import { getLeague } from '../../leagues/catalog';
import { freezeList } from '../../models/records';
import type { ConferenceTeams, Event, Team, TeamStats } from '../../types/sports';
import { calendarDateInZone, compactDate, sourceDatesCovering } from '../../utils/dateTime';
import { createLogger, type Logger } from '../../utils/logger';
import { byName, byStartTime, upcomingWindow } from '../shared/normalize';
import { rankTeamMatches } from '../shared/teamSearch';
import type { ProviderOptions, SportsProvider } from '../types';
import { EspnClient, type EspnLeaguePath } from './espnClient';
import {
  normalizeConferences,
  normalizeEvents,
  normalizeLeagueTeams,
  normalizeSummary,
  normalizeTeamDetail,
  normalizeTeamStats,
  type EspnContext,
} from './espnNormalizer';

export interface EspnProviderOptions extends ProviderOptions {
  baseUrl: string;
  timeoutMs: number;
}

/** ESPN buckets scoreboard days in US Eastern time. */
const ESPN_SOURCE_ZONE = 'America/New_York';

export class EspnProvider implements SportsProvider {
  readonly name: string;

  private readonly client: EspnClient;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: EspnProviderOptions) {
    this.name = opts.name ?? 'espn';
    this.timeZone = opts.timeZone ?? 'UTC';
    this.now = opts.now ?? (() => new Date());
    this.logger = createLogger(`provider:${this.name}`);
    this.client = new EspnClient({
      provider: this.name,
      baseUrl: opts.baseUrl,
      timeoutMs: opts.timeoutMs,
      logger: this.logger,
    });
  }

  supportsLeague(league: string): boolean {
    return getLeague(league)?.espn !== undefined;
  }

  async getTeam(teamId: string, league: string): Promise<Team | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.team(target.path, teamId);
    if (payload === null) return null;
    return normalizeTeamDetail(payload, target.ctx);
  }

  async getTeamSchedule(teamId: string, league: string, daysAhead: number): Promise<readonly Event[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);
    const payload = await this.client.teamSchedule(target.path, teamId);
    if (payload === null) return freezeList([]);

    const events = normalizeEvents(payload, 'schedule', target.ctx).filter(
      upcomingWindow(this.now(), daysAhead),
    );
    return freezeList(events.sort(byStartTime));
  }

  async getEvents(league: string, date: string): Promise<readonly Event[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);

    const days = sourceDatesCovering(date, this.timeZone, ESPN_SOURCE_ZONE);
    const payload = await this.client.scoreboard(
      target.path,
      compactDate(days[0]),
      compactDate(days[days.length - 1]),
    );
    if (payload === null) return freezeList([]);

    const events = normalizeEvents(payload, 'scoreboard', target.ctx).filter(
      (event) => calendarDateInZone(event.startTime, this.timeZone) === date,
    );
    return freezeList(events.sort(byStartTime));
  }

  async getEvent(eventId: string, league: string): Promise<Event | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.summary(target.path, eventId);
    if (payload === null) return null;
    return normalizeSummary(payload, target.ctx);
  }

  async getTeamStats(teamId: string, league: string): Promise<TeamStats | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.team(target.path, teamId);
    if (payload === null) return null;
    return normalizeTeamStats(payload, target.ctx);
  }

  async getLeagueTeams(league: string): Promise<readonly Team[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);
    const payload = await this.client.teams(target.path);
    if (payload === null) return freezeList([]);
    return freezeList(normalizeLeagueTeams(payload, target.ctx).sort(byName));
  }

  async getTeamsByConference(league: string): Promise<ConferenceTeams> {
    const target = this.resolve(league);
    if (!target?.conferences) return Object.freeze({});
    const payload = await this.client.groups(target.path);
    if (payload === null) return Object.freeze({});

    const conferences: Record<string, readonly Team[]> = {};
    for (const [name, teams] of normalizeConferences(payload, target.ctx)) {
      conferences[name] = freezeList(teams.sort(byName));
    }
    return Object.freeze(conferences);
  }

  async searchTeams(query: string, league?: string): Promise<readonly Team[]> {
    if (league === undefined || !this.supportsLeague(league)) return freezeList([]);
    const roster = await this.getLeagueTeams(league);
    return freezeList(rankTeamMatches(roster, query));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private resolve(
    league: string,
  ): { path: EspnLeaguePath; ctx: EspnContext; conferences: boolean } | null {
    const entry = getLeague(league);
    if (!entry?.espn) return null;
    return {
      path: { sport: entry.espn.sport, league: entry.espn.league },
      ctx: { provider: this.name, league: entry.key, logger: this.logger },
      conferences: entry.espn.conferences === true,
    };
  }
}
