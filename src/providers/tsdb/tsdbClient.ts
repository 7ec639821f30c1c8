/**
 * TheSportsDB v1 client. The API key is a path segment.
 */

import type { Logger } from '../../utils/logger';
import { fetchJson } from '../shared/http';

export interface TsdbClientOptions {
  provider: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
}

export class TsdbClient {
  private readonly root: string;

  constructor(private readonly opts: TsdbClientOptions) {
    this.root = `${opts.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(opts.apiKey)}`;
  }

  lookupTeam(teamId: string): Promise<unknown> {
    return this.get('lookupteam.php', { id: teamId });
  }

  /** Next events for a team (TheSportsDB caps the list). */
  eventsNext(teamId: string): Promise<unknown> {
    return this.get('eventsnext.php', { id: teamId });
  }

  /** Events of one league on one UTC date ('YYYY-MM-DD'). */
  eventsDay(leagueId: string, date: string): Promise<unknown> {
    return this.get('eventsday.php', { d: date, l: leagueId });
  }

  lookupEvent(eventId: string): Promise<unknown> {
    return this.get('lookupevent.php', { id: eventId });
  }

  /** Current-season standings of a league. */
  lookupTable(leagueId: string): Promise<unknown> {
    return this.get('lookuptable.php', { l: leagueId });
  }

  allTeams(leagueId: string): Promise<unknown> {
    return this.get('lookup_all_teams.php', { id: leagueId });
  }

  searchTeams(name: string): Promise<unknown> {
    return this.get('searchteams.php', { t: name });
  }

  private get(resource: string, params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    return fetchJson(`${this.root}/${resource}?${query}`, {
      provider: this.opts.provider,
      timeoutMs: this.opts.timeoutMs,
      logger: this.opts.logger,
      endpoint: resource.replace(/\.php$/, ''),
    });
  }
}
