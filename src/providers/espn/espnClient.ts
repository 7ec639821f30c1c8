/**
 * ESPN site API v2 client.
 * Builds endpoint URLs for one `{sport}/{league}` path and returns raw JSON.
 */

import type { Logger } from '../../utils/logger';
import { fetchJson } from '../shared/http';

export interface EspnClientOptions {
  provider: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

/** Catalog coordinates of one ESPN league. */
export interface EspnLeaguePath {
  sport: string;
  league: string;
}

export class EspnClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: EspnClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  team(path: EspnLeaguePath, teamId: string): Promise<unknown> {
    return this.get(path, `teams/${encodeURIComponent(teamId)}`, 'team');
  }

  teamSchedule(path: EspnLeaguePath, teamId: string): Promise<unknown> {
    return this.get(path, `teams/${encodeURIComponent(teamId)}/schedule`, 'schedule');
  }

  /** `from`/`to` are 'YYYYMMDD' in US Eastern time, which is how ESPN buckets days. */
  scoreboard(path: EspnLeaguePath, from: string, to: string): Promise<unknown> {
    const dates = from === to ? from : `${from}-${to}`;
    return this.get(path, `scoreboard?dates=${dates}&limit=1000`, 'scoreboard');
  }

  summary(path: EspnLeaguePath, eventId: string): Promise<unknown> {
    return this.get(path, `summary?event=${encodeURIComponent(eventId)}`, 'summary');
  }

  teams(path: EspnLeaguePath): Promise<unknown> {
    return this.get(path, 'teams?limit=1000', 'teams');
  }

  groups(path: EspnLeaguePath): Promise<unknown> {
    return this.get(path, 'groups', 'groups');
  }

  private get(path: EspnLeaguePath, resource: string, endpoint: string): Promise<unknown> {
    const url = `${this.baseUrl}/${path.sport}/${path.league}/${resource}`;
    return fetchJson(url, {
      provider: this.opts.provider,
      timeoutMs: this.opts.timeoutMs,
      logger: this.opts.logger,
      endpoint,
    });
  }
}
