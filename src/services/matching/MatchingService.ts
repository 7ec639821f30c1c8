import type { Event } from '../../types/sports';
import { createLogger } from '../../utils/logger';
import type { CallOptions } from '../federation/FederationService';
import { findByTeamIds, findByTeamNames } from './eventMatcher';

const logger = createLogger('matching');

/** The slice of the federation service matching reads from. */
export interface EventSource {
  getEvents(league: string, date: string | Date, options?: CallOptions): Promise<readonly Event[]>;
}

export interface MatchResult {
  found: boolean;
  event?: Event;
}

/**
 * Finds the event two teams play on a date. Events come through the
 * federation service, so repeated lookups for one league and date share a
 * cached `getEvents` answer.
 */
export class MatchingService {
  constructor(private readonly source: EventSource) {}

  async matchByTeamIds(league: string, date: string | Date, team1Id: string, team2Id: string): Promise<MatchResult> {
    const events = await this.source.getEvents(league, date);
    const event = findByTeamIds(events, team1Id, team2Id);
    logger.debug({ league, team1Id, team2Id, candidates: events.length, found: !!event }, 'Matched by team ids');
    return event ? { found: true, event } : { found: false };
  }

  async matchByTeamNames(league: string, date: string | Date, name1: string, name2: string): Promise<MatchResult> {
    const events = await this.source.getEvents(league, date);
    const event = findByTeamNames(events, name1, name2);
    logger.debug({ league, name1, name2, candidates: events.length, found: !!event }, 'Matched by team names');
    return event ? { found: true, event } : { found: false };
  }
}
