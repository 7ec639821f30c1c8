import { describe, it, expect } from 'vitest';
import {
  normalizeEvents,
  normalizeSearchTeams,
  normalizeStandingsRow,
  normalizeTeams,
  parseForm,
  type TsdbContext,
} from '../../../../src/providers/tsdb/tsdbNormalizer';
import type { Team } from '../../../../src/types/sports';
import { fakeLogger } from '../../../helpers/fakeLogger';
import allTeams from '../../../fixtures/tsdb/all-teams-4391.json';
import eventsDay from '../../../fixtures/tsdb/eventsday-4391-2024-09-08.json';
import table from '../../../fixtures/tsdb/lookuptable-4391.json';
import search from '../../../fixtures/tsdb/searchteams-steelers.json';

function context(overrides: Partial<TsdbContext> = {}) {
  const logger = fakeLogger();
  const ctx: TsdbContext = { provider: 'tsdb', league: 'nfl', logger, draws: false, ...overrides };
  return { ctx, logger };
}

function rosterOf(teams: readonly Team[]): ReadonlyMap<string, Team> {
  return new Map(teams.map((team) => [team.id, team]));
}

describe('tsdbNormalizer', () => {
  describe('normalizeTeams', () => {
    it('maps the short code to the abbreviation and keeps the name as short name', () => {
      const { ctx } = context();

      const [steelers, falcons, bills] = normalizeTeams(allTeams, ctx, 'lookup_all_teams');

      expect(steelers).toEqual({
        id: '134925',
        provider: 'tsdb',
        name: 'Pittsburgh Steelers',
        shortName: 'Pittsburgh Steelers',
        abbreviation: 'PIT',
        league: 'nfl',
        logoUrl: 'https://img.example.test/tsdb/pit.png',
        color: 'ffb612',
      });
      expect(falcons.color).toBe('a71930');
      expect(bills).toEqual({
        id: '134918',
        provider: 'tsdb',
        name: 'Buffalo Bills',
        shortName: 'Buffalo Bills',
        abbreviation: 'BUF',
        league: 'nfl',
      });
    });

    it('drops nameless teams', () => {
      const { ctx, logger } = context();

      expect(normalizeTeams(allTeams, ctx, 'lookup_all_teams')).toHaveLength(3);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ provider: 'tsdb', kind: 'team', recordId: '1' }),
        'Dropping record that failed normalization',
      );
    });

    it('treats a null list as no teams', () => {
      const { ctx } = context();

      expect(normalizeTeams({ teams: null }, ctx, 'lookup_all_teams')).toEqual([]);
    });

    it('rejects a payload without a teams list', () => {
      const { ctx } = context();

      expect(() => normalizeTeams({ results: [] }, ctx, 'lookup_all_teams')).toThrow(
        'Unexpected lookup_all_teams response shape',
      );
    });
  });

  describe('normalizeEvents', () => {
    it('enriches teams from the roster and reads the UTC timestamp', () => {
      const { ctx } = context();
      const roster = rosterOf(normalizeTeams(allTeams, ctx, 'lookup_all_teams'));

      const events = normalizeEvents(eventsDay, ctx, roster, 'eventsday');
      const final = events[1];

      expect(events.map((e) => e.id)).toEqual(['2052302', '2052301', '2052303']);
      expect(final).toEqual({
        id: '2052301',
        provider: 'tsdb',
        name: 'Atlanta Falcons vs Pittsburgh Steelers',
        shortName: 'PIT @ ATL',
        startTime: new Date('2024-09-08T17:00:00Z'),
        homeTeam: roster.get('134942'),
        awayTeam: roster.get('134925'),
        status: { state: 'final', detail: 'FT' },
        league: 'nfl',
        homeScore: 10,
        awayScore: 18,
        venue: { name: 'Mercedes-Benz Stadium', city: 'Atlanta', country: 'United States' },
        broadcasts: ['FOX', 'NFL+'],
        seasonYear: 2024,
      });
    });

    it('builds teams missing from the roster out of the event itself', () => {
      const { ctx } = context();

      const [postponed] = normalizeEvents(eventsDay, ctx, new Map(), 'eventsday');

      expect(postponed.homeTeam).toEqual({
        id: '134944',
        provider: 'tsdb',
        name: 'Tampa Bay Buccaneers',
        shortName: 'Tampa Bay Buccaneers',
        abbreviation: 'TBB',
        league: 'nfl',
        logoUrl: 'https://img.example.test/tsdb/tb.png',
      });
      expect(postponed.shortName).toBe('WC @ TBB');
    });

    it('lets the postponed flag win over the status text', () => {
      const { ctx } = context();

      const [postponed] = normalizeEvents(eventsDay, ctx, new Map(), 'eventsday');

      expect(postponed.status).toEqual({ state: 'postponed', detail: 'NS' });
      expect(postponed.venue).toBeUndefined();
      expect(postponed.broadcasts).toEqual([]);
    });

    it('drops events with an unreadable timestamp', () => {
      const { ctx, logger } = context();

      normalizeEvents(eventsDay, ctx, new Map(), 'eventsday');

      expect(logger.warn).toHaveBeenCalledWith(
        {
          provider: 'tsdb',
          kind: 'event',
          recordId: '2052399',
          reason: 'unreadable timestamp whenever',
        },
        'Dropping record that failed normalization',
      );
    });

    it("stamps the event's own league when it differs", () => {
      const { ctx } = context();
      const payload = {
        events: [{ ...eventsDay.events[1], idEvent: '2060001', idLeague: '4405' }],
      };

      const [event] = normalizeEvents(payload, ctx, new Map(), 'lookupevent');

      expect(event.league).toBe('cfl');
      expect(event.homeTeam.league).toBe('cfl');
    });
  });

  describe('normalizeStandingsRow', () => {
    it('returns the row for the team', () => {
      const { ctx } = context();

      expect(normalizeStandingsRow(table, '134925', ctx)).toEqual({
        provider: 'tsdb',
        teamId: '134925',
        league: 'nfl',
        record: '10-7',
        streak: 'L2',
        streakCount: -2,
        rank: 3,
        division: 'AFC North',
      });
    });

    it('adds the draw column for leagues with draws', () => {
      const { ctx } = context({ draws: true });

      expect(normalizeStandingsRow(table, '134942', ctx)).toMatchObject({
        record: '8-9-0',
        streak: 'W4',
        streakCount: 4,
      });
    });

    it('returns null for a team not in the table', () => {
      const { ctx } = context();

      expect(normalizeStandingsRow(table, '999', ctx)).toBeNull();
      expect(normalizeStandingsRow({ table: null }, '134925', ctx)).toBeNull();
    });
  });

  describe('normalizeSearchTeams', () => {
    it('keeps teams of catalog leagues only, stamped with their league', () => {
      const logger = fakeLogger();

      const teams = normalizeSearchTeams(search, 'tsdb', logger);

      expect(teams.map((t) => [t.id, t.league])).toEqual([['134925', 'nfl']]);
    });
  });

  describe('parseForm', () => {
    it('counts the run ending with the latest result', () => {
      expect(parseForm('WLWWW')).toEqual({ streak: 'W3', count: 3 });
      expect(parseForm('wwll')).toEqual({ streak: 'L2', count: -2 });
      expect(parseForm('WDD')).toEqual({ streak: 'D2', count: 0 });
    });

    it('ignores empty or unreadable form', () => {
      expect(parseForm('')).toBeUndefined();
      expect(parseForm(null)).toBeUndefined();
      expect(parseForm('W-L')).toBeUndefined();
    });
  });
});
