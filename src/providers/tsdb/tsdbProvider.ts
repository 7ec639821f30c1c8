/**
 * TheSportsDB Provider
 *
 * Secondary source. Covers the catalog leagues with a TheSportsDB id,
 * including some ESPN does not carry (CFL, AHL). Event payloads only name
 * their teams, so events are enriched from the league roster, which is
 * memoized per league.
 */

import { getLeague, type LeagueEntry } from '../../leagues/catalog';
import { freezeList } from '../../models/records';
import type { ConferenceTeams, Event, Team, TeamStats } from '../../types/sports';
import { calendarDateInZone, sourceDatesCovering } from '../../utils/dateTime';
import { createLogger, type Logger } from '../../utils/logger';
import { TtlCache } from '../../utils/ttlCache';
import { byName, byStartTime, upcomingWindow } from '../shared/normalize';
import { rankTeamMatches } from '../shared/teamSearch';
import type { ProviderOptions, SportsProvider } from '../types';
import { TsdbClient } from './tsdbClient';
import {
  normalizeEvents,
  normalizeLookupTeam,
  normalizeSearchTeams,
  normalizeStandingsRow,
  normalizeTeams,
  type TsdbContext,
} from './tsdbNormalizer';

export interface TsdbProviderOptions extends ProviderOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** How long a league roster stays memoized. Default 3600. */
  rosterTtlSeconds?: number;
}

const TSDB_SOURCE_ZONE = 'UTC';
const DEFAULT_ROSTER_TTL_SECONDS = 3600;

interface Target {
  leagueId: string;
  ctx: TsdbContext;
}

export class TsdbProvider implements SportsProvider {
  readonly name: string;

  private readonly client: TsdbClient;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly rosters: TtlCache<readonly Team[]>;
  private readonly rosterTtlSeconds: number;

  constructor(opts: TsdbProviderOptions) {
    this.name = opts.name ?? 'tsdb';
    this.timeZone = opts.timeZone ?? 'UTC';
    this.now = opts.now ?? (() => new Date());
    this.logger = createLogger(`provider:${this.name}`);
    this.rosterTtlSeconds = opts.rosterTtlSeconds ?? DEFAULT_ROSTER_TTL_SECONDS;
    this.rosters = new TtlCache({ maxSize: 64, now: () => this.now().getTime() });
    this.client = new TsdbClient({
      provider: this.name,
      baseUrl: opts.baseUrl,
      apiKey: opts.apiKey,
      timeoutMs: opts.timeoutMs,
      logger: this.logger,
    });
  }

  supportsLeague(league: string): boolean {
    return getLeague(league)?.tsdb !== undefined;
  }

  async getTeam(teamId: string, league: string): Promise<Team | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.lookupTeam(teamId);
    if (payload === null) return null;
    return normalizeLookupTeam(payload, target.ctx);
  }

  async getTeamSchedule(teamId: string, league: string, daysAhead: number): Promise<readonly Event[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);
    const payload = await this.client.eventsNext(teamId);
    if (payload === null) return freezeList([]);

    const roster = await this.rosterIndex(target);
    const events = normalizeEvents(payload, target.ctx, roster, 'eventsnext')
      .filter((event) => event.league === target.ctx.league)
      .filter(upcomingWindow(this.now(), daysAhead));
    return freezeList(events.sort(byStartTime));
  }

  async getEvents(league: string, date: string): Promise<readonly Event[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);

    const days = sourceDatesCovering(date, this.timeZone, TSDB_SOURCE_ZONE);
    const payloads = await Promise.all(days.map((day) => this.client.eventsDay(target.leagueId, day)));
    const roster = await this.rosterIndex(target);

    const byId = new Map<string, Event>();
    for (const payload of payloads) {
      if (payload === null) continue;
      for (const event of normalizeEvents(payload, target.ctx, roster, 'eventsday')) {
        if (calendarDateInZone(event.startTime, this.timeZone) === date) byId.set(event.id, event);
      }
    }
    return freezeList(Array.from(byId.values()).sort(byStartTime));
  }

  async getEvent(eventId: string, league: string): Promise<Event | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.lookupEvent(eventId);
    if (payload === null) return null;

    const roster = await this.rosterIndex(target);
    const events = normalizeEvents(payload, target.ctx, roster, 'lookupevent');
    return events.find((event) => event.id === eventId && event.league === target.ctx.league) ?? null;
  }

  async getTeamStats(teamId: string, league: string): Promise<TeamStats | null> {
    const target = this.resolve(league);
    if (!target) return null;
    const payload = await this.client.lookupTable(target.leagueId);
    if (payload === null) return null;
    return normalizeStandingsRow(payload, teamId, target.ctx);
  }

  async getLeagueTeams(league: string): Promise<readonly Team[]> {
    const target = this.resolve(league);
    if (!target) return freezeList([]);
    return this.roster(target);
  }

  /** TheSportsDB has no conference structure. */
  async getTeamsByConference(_league: string): Promise<ConferenceTeams> {
    return Object.freeze({});
  }

  async searchTeams(query: string, league?: string): Promise<readonly Team[]> {
    const target = league === undefined ? undefined : this.resolve(league);
    if (league !== undefined && !target) return freezeList([]);
    if (query.trim() === '') return freezeList([]);

    const payload = await this.client.searchTeams(query.trim());
    if (payload === null) return freezeList([]);
    const teams = normalizeSearchTeams(payload, this.name, this.logger).filter(
      (team) => !target || team.league === target.ctx.league,
    );
    return freezeList(rankTeamMatches(teams, query));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private resolve(league: string): Target | null {
    const entry: LeagueEntry | undefined = getLeague(league);
    if (!entry?.tsdb) return null;
    return {
      leagueId: entry.tsdb.id,
      ctx: { provider: this.name, league: entry.key, logger: this.logger, draws: entry.draws },
    };
  }

  private async roster(target: Target): Promise<readonly Team[]> {
    const cached = this.rosters.get(target.leagueId);
    if (cached) return cached;

    const payload = await this.client.allTeams(target.leagueId);
    const teams = freezeList(
      payload === null ? [] : normalizeTeams(payload, target.ctx, 'lookup_all_teams').sort(byName),
    );
    if (teams.length > 0) this.rosters.set(target.leagueId, teams, this.rosterTtlSeconds);
    return teams;
  }

  private async rosterIndex(target: Target): Promise<ReadonlyMap<string, Team>> {
    const teams = await this.roster(target);
    return new Map(teams.map((team) => [team.id, team]));
  }
}
