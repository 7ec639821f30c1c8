import { describe, it, expect, vi, afterEach } from 'vitest';
import { TsdbProvider } from '../../../../src/providers/tsdb/tsdbProvider';
import { stubFetch, type StubRoute } from '../../../helpers/fetchStub';
import allTeams from '../../../fixtures/tsdb/all-teams-4391.json';
import eventsDay from '../../../fixtures/tsdb/eventsday-4391-2024-09-08.json';
import eventsNext from '../../../fixtures/tsdb/eventsnext-134925.json';
import table from '../../../fixtures/tsdb/lookuptable-4391.json';
import search from '../../../fixtures/tsdb/searchteams-steelers.json';

vi.mock('../../../../src/utils/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const ROOT = 'https://tsdb.test/api/v1/json/test-secret';

const ROUTES: StubRoute[] = [
  { match: 'lookup_all_teams.php?id=4391', body: allTeams },
  { match: 'eventsday.php?d=2024-09-08&l=4391', body: eventsDay },
  { match: 'eventsnext.php?id=134925', body: eventsNext },
  { match: 'lookupevent.php?id=2052301', body: { events: [eventsDay.events[1]] } },
  { match: 'lookupevent.php?id=2060001', body: { events: [eventsNext.events[2]] } },
  { match: 'lookupteam.php?id=134925', body: { teams: [allTeams.teams[0]] } },
  { match: 'lookuptable.php?l=4391', body: table },
  { match: 'searchteams.php?t=steelers', body: search },
];

function provider(opts: { name?: string; timeZone?: string } = {}) {
  return new TsdbProvider({
    baseUrl: 'https://tsdb.test/api/v1/json',
    apiKey: 'test-secret',
    timeoutMs: 1_000,
    now: () => new Date('2024-09-05T12:00:00Z'),
    ...opts,
  });
}

describe('TsdbProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('supports catalog leagues with a TheSportsDB id', () => {
    const tsdb = provider();

    expect(tsdb.supportsLeague('nfl')).toBe(true);
    expect(tsdb.supportsLeague('ahl')).toBe(true);
    expect(tsdb.supportsLeague('cfl')).toBe(true);
    expect(tsdb.supportsLeague('ncaaw')).toBe(false);
  });

  // ─── Events ─────────────────────────────────────────────────────────

  describe('getEvents', () => {
    it('requests the UTC day with the key in the path and keeps that day only', async () => {
      const fetch = stubFetch(ROUTES);

      const events = await provider().getEvents('nfl', '2024-09-08');

      expect(fetch.calls).toEqual([
        `${ROOT}/eventsday.php?d=2024-09-08&l=4391`,
        `${ROOT}/lookup_all_teams.php?id=4391`,
      ]);
      expect(events.map((e) => e.id)).toEqual(['2052301', '2052302']);
      expect(events[0].awayTeam.color).toBe('ffb612');
    });

    it('requests both UTC days overlapping an Eastern day', async () => {
      const fetch = stubFetch(ROUTES);

      const events = await provider({ timeZone: 'America/New_York' }).getEvents('nfl', '2024-09-08');

      expect(fetch.callsTo('eventsday.php')).toBe(2);
      expect(fetch.callsTo('d=2024-09-09')).toBe(1);
      expect(events.map((e) => e.id)).toEqual(['2052301', '2052302', '2052303']);
    });
  });

  describe('getTeamSchedule', () => {
    it('keeps upcoming games of the requested league', async () => {
      stubFetch(ROUTES);

      const games = await provider().getTeamSchedule('134925', 'nfl', 14);

      expect(games.map((e) => e.id)).toEqual(['2052301', '2052320']);
      expect(games[1].awayTeam).toMatchObject({ name: 'Denver Broncos', abbreviation: 'DB' });
    });

    it('returns nothing when the team has no upcoming games', async () => {
      stubFetch([{ match: 'eventsnext.php', body: { events: null } }, ...ROUTES]);

      await expect(provider().getTeamSchedule('134925', 'nfl', 14)).resolves.toEqual([]);
    });
  });

  describe('getEvent', () => {
    it('looks an event up by id', async () => {
      stubFetch(ROUTES);

      const event = await provider().getEvent('2052301', 'nfl');

      expect(event).toMatchObject({ id: '2052301', provider: 'tsdb', league: 'nfl', shortName: 'PIT @ ATL' });
    });

    it('returns null for an event of another league', async () => {
      stubFetch(ROUTES);

      await expect(provider().getEvent('2060001', 'nfl')).resolves.toBeNull();
    });

    it('returns null when the lookup finds nothing', async () => {
      stubFetch([{ match: 'lookupevent.php', body: { events: null } }, ...ROUTES]);

      await expect(provider().getEvent('1', 'nfl')).resolves.toBeNull();
    });
  });

  // ─── Teams ──────────────────────────────────────────────────────────

  describe('teams', () => {
    it('looks a team up by id', async () => {
      stubFetch(ROUTES);

      await expect(provider().getTeam('134925', 'nfl')).resolves.toMatchObject({
        id: '134925',
        abbreviation: 'PIT',
      });
    });

    it('ignores a looked-up team filed under another league', async () => {
      stubFetch([
        {
          match: 'lookupteam.php?id=999',
          body: { teams: [{ idTeam: '999', strTeam: 'Some Basketball Club', idLeague: '4387' }] },
        },
      ]);

      await expect(provider().getTeam('999', 'nfl')).resolves.toBeNull();
      await expect(provider().getTeam('999', 'nba')).resolves.toMatchObject({ id: '999', league: 'nba' });
    });

    it('drops a roster entry with a blank name and keeps the others', async () => {
      stubFetch([
        {
          match: 'lookup_all_teams.php?id=4391',
          body: { teams: [...allTeams.teams, { idTeam: '2', strTeam: '   ', idLeague: '4391' }] },
        },
      ]);

      const roster = await provider().getLeagueTeams('nfl');

      expect(roster.map((t) => t.name)).toEqual(['Atlanta Falcons', 'Buffalo Bills', 'Pittsburgh Steelers']);
    });

    it('reads team stats from the league table', async () => {
      stubFetch(ROUTES);

      await expect(provider().getTeamStats('134925', 'nfl')).resolves.toEqual({
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

    it('memoizes a league roster across calls', async () => {
      const fetch = stubFetch(ROUTES);
      const tsdb = provider();

      const roster = await tsdb.getLeagueTeams('nfl');
      await tsdb.getEvents('nfl', '2024-09-08');
      await tsdb.getLeagueTeams('nfl');

      expect(roster.map((t) => t.name)).toEqual(['Atlanta Falcons', 'Buffalo Bills', 'Pittsburgh Steelers']);
      expect(fetch.callsTo('lookup_all_teams.php')).toBe(1);
    });

    it('does not memoize an empty roster', async () => {
      const fetch = stubFetch([]);
      const tsdb = provider();

      await tsdb.getLeagueTeams('nfl');
      await tsdb.getLeagueTeams('nfl');

      expect(fetch.callsTo('lookup_all_teams.php')).toBe(2);
    });

    it('has no conference structure', async () => {
      const fetch = stubFetch(ROUTES);

      await expect(provider().getTeamsByConference('nfl')).resolves.toEqual({});
      expect(fetch.calls).toEqual([]);
    });
  });

  describe('searchTeams', () => {
    it('searches globally and filters to the league', async () => {
      const fetch = stubFetch(ROUTES);
      const tsdb = provider();

      await expect(tsdb.searchTeams('steelers', 'nfl')).resolves.toMatchObject([{ id: '134925' }]);
      await expect(tsdb.searchTeams('steelers', 'cfl')).resolves.toEqual([]);
      await expect(tsdb.searchTeams('steelers')).resolves.toMatchObject([{ id: '134925', league: 'nfl' }]);
      expect(fetch.calls[0]).toBe(`${ROOT}/searchteams.php?t=steelers`);
    });

    it('skips blank queries and unsupported leagues without a request', async () => {
      const fetch = stubFetch(ROUTES);
      const tsdb = provider();

      await expect(tsdb.searchTeams('   ', 'nfl')).resolves.toEqual([]);
      await expect(tsdb.searchTeams('steelers', 'ncaaw')).resolves.toEqual([]);
      expect(fetch.calls).toEqual([]);
    });
  });

  it('rejects with MALFORMED_RESPONSE for an unreadable table', async () => {
    stubFetch([{ match: 'lookuptable.php', body: { table: 'none' } }]);

    await expect(provider().getTeamStats('134925', 'nfl')).rejects.toMatchObject({
      code: 'MALFORMED_RESPONSE',
      provider: 'tsdb',
    });
  });
});
