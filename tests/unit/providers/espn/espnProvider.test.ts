import { describe, it, expect, vi, afterEach } from 'vitest';
import { EspnProvider } from '../../../../src/providers/espn/espnProvider';
import { stubFetch, type StubRoute } from '../../../helpers/fetchStub';
import scoreboard from '../../../fixtures/espn/scoreboard-nfl.json';
import schedule from '../../../fixtures/espn/schedule-nfl-133604.json';
import summary from '../../../fixtures/espn/summary-nfl-401671791.json';
import teamDetail from '../../../fixtures/espn/team-nfl-23.json';
import teams from '../../../fixtures/espn/teams-nfl.json';
import groups from '../../../fixtures/espn/groups-ncaaf.json';

vi.mock('../../../../src/utils/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const BASE_URL = 'https://espn.test/apis/site/v2/sports';

const ROUTES: StubRoute[] = [
  { match: '/football/nfl/scoreboard', body: scoreboard },
  { match: '/football/nfl/teams/133604/schedule', body: schedule },
  { match: '/football/nfl/summary?event=401671791', body: summary },
  { match: /\/football\/nfl\/teams\/23$/, body: teamDetail },
  { match: '/football/nfl/teams?limit=1000', body: teams },
  { match: '/football/college-football/groups', body: groups },
];

function provider(opts: { name?: string; timeZone?: string } = {}) {
  return new EspnProvider({
    baseUrl: `${BASE_URL}/`,
    timeoutMs: 1_000,
    now: () => new Date('2024-09-05T12:00:00Z'),
    ...opts,
  });
}

describe('EspnProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ─── Capability ─────────────────────────────────────────────────────

  it('supports catalog leagues with an ESPN path, by key or alias', () => {
    const espn = provider();

    expect(espn.supportsLeague('nfl')).toBe(true);
    expect(espn.supportsLeague('NFL')).toBe(true);
    expect(espn.supportsLeague('college-football')).toBe(true);
    expect(espn.supportsLeague('ahl')).toBe(false);
    expect(espn.supportsLeague('quidditch')).toBe(false);
  });

  it('answers unsupported leagues with empty results and no requests', async () => {
    const fetch = stubFetch(ROUTES);
    const espn = provider();

    await expect(espn.getEvents('ahl', '2024-09-08')).resolves.toEqual([]);
    await expect(espn.getTeam('1', 'cfl')).resolves.toBeNull();
    expect(fetch.calls).toEqual([]);
  });

  // ─── Events ─────────────────────────────────────────────────────────

  describe('getEvents', () => {
    it('requests both Eastern days covering a UTC day and keeps the UTC day only', async () => {
      const fetch = stubFetch(ROUTES);

      const events = await provider().getEvents('nfl', '2024-09-08');

      expect(fetch.calls).toEqual([`${BASE_URL}/football/nfl/scoreboard?dates=20240907-20240908&limit=1000`]);
      expect(events.map((e) => e.id)).toEqual(['401671789', '401671791']);
      expect(Object.isFrozen(events)).toBe(true);
    });

    it('requests a single day when the caller is on Eastern time', async () => {
      const fetch = stubFetch(ROUTES);

      const events = await provider({ timeZone: 'America/New_York' }).getEvents('nfl', '2024-09-08');

      expect(fetch.calls).toEqual([`${BASE_URL}/football/nfl/scoreboard?dates=20240908&limit=1000`]);
      expect(events.map((e) => e.id)).toEqual(['401671789', '401671791', '401671790']);
    });

    it('drops a game whose team has a blank name and keeps the rest', async () => {
      const [first, ...rest] = scoreboard.events;
      const [competition] = first.competitions;
      const [home, away] = competition.competitors;
      const blankHome = {
        ...first,
        competitions: [
          { ...competition, competitors: [{ ...home, team: { ...home.team, displayName: '   ' } }, away] },
        ],
      };
      stubFetch([{ match: '/football/nfl/scoreboard', body: { ...scoreboard, events: [blankHome, ...rest] } }]);

      const events = await provider().getEvents('nfl', '2024-09-08');

      expect(events.map((e) => e.id)).toEqual(['401671791']);
    });

    it('returns an empty list when the scoreboard is not found', async () => {
      stubFetch([]);

      await expect(provider().getEvents('nfl', '2024-09-08')).resolves.toEqual([]);
    });

    it('rejects with MALFORMED_RESPONSE for an unreadable scoreboard', async () => {
      stubFetch([{ match: 'scoreboard', body: { events: 'none' } }]);

      await expect(provider().getEvents('nfl', '2024-09-08')).rejects.toMatchObject({
        code: 'MALFORMED_RESPONSE',
        provider: 'espn',
      });
    });
  });

  describe('getTeamSchedule', () => {
    it('keeps games inside the window, ascending', async () => {
      stubFetch(ROUTES);

      const games = await provider().getTeamSchedule('133604', 'nfl', 14);

      expect(games.map((e) => e.id)).toEqual(['401671789', '401671805', '401671812']);
      expect(games.map((e) => e.startTime.toISOString())).toEqual([
        '2024-09-08T17:00:00.000Z',
        '2024-09-15T20:25:00.000Z',
        '2024-09-17T00:15:00.000Z',
      ]);
    });

    it('stamps records with a configured provider name', async () => {
      stubFetch(ROUTES);

      const games = await provider({ name: 'primary' }).getTeamSchedule('133604', 'nfl', 14);

      expect(games.every((e) => e.provider === 'primary')).toBe(true);
      expect(games[0].awayTeam.provider).toBe('primary');
    });
  });

  describe('getEvent', () => {
    it('normalizes the game summary', async () => {
      stubFetch(ROUTES);

      const event = await provider().getEvent('401671791', 'nfl');

      expect(event?.name).toBe('Washington Commanders at Tampa Bay Buccaneers');
      expect(event?.status.state).toBe('live');
      expect(event?.venue?.country).toBe('USA');
    });

    it('returns null for an unknown event', async () => {
      stubFetch(ROUTES);

      await expect(provider().getEvent('1', 'nfl')).resolves.toBeNull();
    });
  });

  // ─── Teams ──────────────────────────────────────────────────────────

  describe('teams', () => {
    it('fetches a team', async () => {
      const fetch = stubFetch(ROUTES);

      const team = await provider().getTeam('23', 'nfl');

      expect(fetch.calls).toEqual([`${BASE_URL}/football/nfl/teams/23`]);
      expect(team).toMatchObject({ id: '23', name: 'Pittsburgh Steelers', color: 'ffb612' });
    });

    it('fetches team stats from the team resource', async () => {
      stubFetch(ROUTES);

      await expect(provider().getTeamStats('23', 'nfl')).resolves.toEqual({
        provider: 'espn',
        teamId: '23',
        league: 'nfl',
        record: '10-7',
        homeRecord: '5-3',
        awayRecord: '5-4',
        streak: 'L2',
        streakCount: -2,
        division: 'AFC North',
      });
    });

    it('sorts the league roster by name', async () => {
      stubFetch(ROUTES);

      const roster = await provider().getLeagueTeams('nfl');

      expect(roster.map((t) => t.name)).toEqual(['Atlanta Falcons', 'Buffalo Bills', 'Pittsburgh Steelers']);
    });

    it('groups college teams by conference, each sorted by name', async () => {
      stubFetch(ROUTES);

      const conferences = await provider().getTeamsByConference('ncaaf');

      expect(Object.keys(conferences)).toEqual(['SEC', 'Big Ten', 'FBS Independents']);
      expect(conferences.SEC.map((t) => t.name)).toEqual(['Alabama Crimson Tide', 'Georgia Bulldogs']);
      expect(conferences['Big Ten'].map((t) => t.id)).toEqual(['194']);
    });

    it('returns an empty mapping for leagues without conferences, without a request', async () => {
      const fetch = stubFetch(ROUTES);

      await expect(provider().getTeamsByConference('nfl')).resolves.toEqual({});
      expect(fetch.calls).toEqual([]);
    });

    it('searches the league roster', async () => {
      const fetch = stubFetch(ROUTES);
      const espn = provider();

      await expect(espn.searchTeams('bills', 'nfl')).resolves.toMatchObject([{ id: '2' }]);
      await expect(espn.searchTeams('bills')).resolves.toEqual([]);
      expect(fetch.callsTo('/teams?limit=1000')).toBe(1);
    });
  });
});
