import { describe, it, expect } from 'vitest';
import {
  createEvent,
  createEventStatus,
  createTeam,
  createTeamStats,
  createVenue,
  deriveAbbreviation,
  isDerived,
} from '../../../src/models/records';
import { NormalizationDefect } from '../../../src/errors/NormalizationDefect';

const home = createTeam({ id: '1', provider: 'espn', name: 'Atlanta Falcons', league: 'nfl' });
const away = createTeam({ id: '23', provider: 'espn', name: 'Pittsburgh Steelers', league: 'nfl' });

describe('createTeam', () => {
  it('fills short name and abbreviation from the name', () => {
    expect(createTeam({ id: ' 23 ', provider: 'espn', name: ' Pittsburgh Steelers ', league: 'nfl' })).toEqual({
      id: '23',
      provider: 'espn',
      name: 'Pittsburgh Steelers',
      shortName: 'Pittsburgh Steelers',
      abbreviation: 'PS',
      league: 'nfl',
    });
  });

  it('omits blank optional fields and freezes the record', () => {
    const team = createTeam({ id: '1', provider: 'tsdb', name: 'Arsenal', league: 'epl', logoUrl: '  ', color: '' });

    expect(Object.keys(team)).toEqual(['id', 'provider', 'name', 'shortName', 'abbreviation', 'league']);
    expect(Object.isFrozen(team)).toBe(true);
  });

  it('requires an id and a name', () => {
    expect(() => createTeam({ id: '1', provider: 'espn', name: '  ', league: 'nfl' })).toThrow(
      'team.name must be non-empty',
    );
    expect(() => createTeam({ id: '', provider: 'espn', name: 'Team', league: 'nfl' })).toThrow(NormalizationDefect);
  });

  it('reports a blank field as a defect of that team', () => {
    let defect: unknown;
    try {
      createTeam({ id: '23', provider: 'espn', name: '   ', league: 'nfl' });
    } catch (err) {
      defect = err;
    }

    expect(defect).toBeInstanceOf(NormalizationDefect);
    expect(defect).toMatchObject({ provider: 'espn', recordKind: 'team', recordId: '23' });
  });

  it('remembers which fields it derived', () => {
    const derived = createTeam({ id: '23', provider: 'espn', name: 'Pittsburgh Steelers', league: 'nfl' });
    const sent = createTeam({
      id: '23',
      provider: 'espn',
      name: 'Pittsburgh Steelers',
      shortName: 'Steelers',
      abbreviation: 'PIT',
      league: 'nfl',
    });

    expect(isDerived(derived, 'abbreviation')).toBe(true);
    expect(isDerived(derived, 'shortName')).toBe(true);
    expect(isDerived(sent, 'abbreviation')).toBe(false);
    expect(isDerived(sent, 'shortName')).toBe(false);
  });
});

describe('deriveAbbreviation', () => {
  it('takes initials of up to three words, or three letters of one', () => {
    expect(deriveAbbreviation('Arsenal')).toBe('ARS');
    expect(deriveAbbreviation('St. Louis Blues')).toBe('SLB');
    expect(deriveAbbreviation('Brighton & Hove Albion')).toBe('BHA');
    expect(deriveAbbreviation('Tampa Bay Buccaneers Club')).toBe('TBB');
  });
});

describe('createEventStatus', () => {
  it('keeps period and clock for live and final games only', () => {
    expect(createEventStatus({ state: 'live', period: 2, clock: '5:12' })).toEqual({
      state: 'live',
      period: 2,
      clock: '5:12',
    });
    expect(createEventStatus({ state: 'scheduled', detail: 'Sun 1:00 PM', period: 0, clock: '0:00' })).toEqual({
      state: 'scheduled',
      detail: 'Sun 1:00 PM',
    });
  });
});

describe('createVenue', () => {
  it('requires a name', () => {
    expect(createVenue({ name: 'Acrisure Stadium', city: 'Pittsburgh' })).toEqual({
      name: 'Acrisure Stadium',
      city: 'Pittsburgh',
    });
    expect(() => createVenue({ name: '' }, 'tsdb')).toThrow('venue.name must be non-empty');
  });
});

describe('createEvent', () => {
  const base = {
    id: '401671789',
    provider: 'espn',
    name: 'Pittsburgh Steelers at Atlanta Falcons',
    startTime: new Date('2024-09-08T17:00:00Z'),
    homeTeam: home,
    awayTeam: away,
    status: createEventStatus({ state: 'scheduled' }),
    league: 'nfl',
  };

  it('defaults the short name and an empty broadcast list', () => {
    const event = createEvent(base);

    expect(event.shortName).toBe('Pittsburgh Steelers at Atlanta Falcons');
    expect(event.broadcasts).toEqual([]);
    expect(Object.isFrozen(event.broadcasts)).toBe(true);
  });

  it('trims and de-duplicates broadcasts', () => {
    expect(createEvent({ ...base, broadcasts: ['FOX', ' FOX ', '', 'NFL+'] }).broadcasts).toEqual(['FOX', 'NFL+']);
  });

  it('owns its start time', () => {
    const startTime = new Date('2024-09-08T17:00:00Z');
    const event = createEvent({ ...base, startTime });

    startTime.setUTCFullYear(2030);

    expect(event.startTime.toISOString()).toBe('2024-09-08T17:00:00.000Z');
  });

  it('refuses changes to its start time', () => {
    const event = createEvent(base);

    expect(() => event.startTime.setTime(0)).toThrow('Record instants are immutable');
    expect(() => event.startTime.setUTCHours(0)).toThrow(TypeError);
    expect(event.startTime.toISOString()).toBe('2024-09-08T17:00:00.000Z');
    expect(event.startTime).toEqual(new Date('2024-09-08T17:00:00Z'));
  });

  it('freezes embedded records that were passed unfrozen', () => {
    const event = createEvent({ ...base, awayTeam: { ...away } });

    expect(Object.isFrozen(event.awayTeam)).toBe(true);
    expect(event.awayTeam).toEqual(away);
  });

  it('rejects an invalid start time as a defect of the event', () => {
    expect(() => createEvent({ ...base, startTime: new Date('nope') })).toThrow(NormalizationDefect);
    expect(() => createEvent({ ...base, startTime: new Date('nope') })).toThrow(
      'event.startTime must be a valid instant',
    );
  });
});

describe('createTeamStats', () => {
  it('keeps only present fields', () => {
    expect(
      createTeamStats({ provider: 'tsdb', teamId: '134925', league: 'nfl', record: '10-7', rank: Number.NaN }),
    ).toEqual({ provider: 'tsdb', teamId: '134925', league: 'nfl', record: '10-7' });
  });
});
