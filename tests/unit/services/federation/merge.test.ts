import { describe, it, expect } from 'vitest';
import { isDerived } from '../../../../src/models/records';
import { mergeTeams } from '../../../../src/services/federation/merge';
import { buildTeam } from '../../../fixtures/factories';

describe('mergeTeams', () => {
  it('unions lists in first-appearance order', () => {
    const giants = buildTeam({ id: 'g', name: 'New York Giants' });
    const jets = buildTeam({ id: 'j', provider: 'secondary', name: 'New York Jets' });

    expect(mergeTeams([[giants], [jets]])).toEqual([giants, jets]);
  });

  it('identifies teams by normalized name within a league', () => {
    const primary = buildTeam({ id: '23', name: 'Pittsburgh Steelers', logoUrl: 'https://img.example.test/a.png' });
    const secondary = buildTeam({
      id: '134925',
      provider: 'secondary',
      name: 'PITTSBURGH  STEELERS',
      logoUrl: 'https://img.example.test/b.png',
      color: 'ffb612',
    });

    const [merged] = mergeTeams([[primary], [secondary]]);

    expect(merged).toMatchObject({
      id: '23',
      provider: 'primary',
      name: 'Pittsburgh Steelers',
      logoUrl: 'https://img.example.test/a.png',
      color: 'ffb612',
    });
  });

  it('keeps the earlier record untouched when it has no gaps', () => {
    const complete = buildTeam({
      name: 'Atlanta Falcons',
      shortName: 'Falcons',
      abbreviation: 'ATL',
      logoUrl: 'https://img.example.test/atl.png',
      color: 'a71930',
    });
    const other = buildTeam({ id: '9', provider: 'secondary', name: 'Atlanta Falcons', color: '000000' });

    expect(mergeTeams([[complete], [other]])[0]).toBe(complete);
  });

  it('takes a later abbreviation over one the earlier record only derived', () => {
    const primary = buildTeam({
      id: '23',
      name: 'Pittsburgh Steelers',
      logoUrl: 'https://img.example.test/a.png',
      color: '000000',
    });
    const secondary = buildTeam({ id: '134925', provider: 'secondary', name: 'Pittsburgh Steelers', abbreviation: 'PIT' });

    const [merged] = mergeTeams([[primary], [secondary]]);

    expect(primary.abbreviation).toBe('PS');
    expect(merged).toEqual({
      id: '23',
      provider: 'primary',
      name: 'Pittsburgh Steelers',
      shortName: 'Pittsburgh Steelers',
      abbreviation: 'PIT',
      league: 'nfl',
      logoUrl: 'https://img.example.test/a.png',
      color: '000000',
    });
    expect(isDerived(merged, 'abbreviation')).toBe(false);
    expect(isDerived(merged, 'shortName')).toBe(true);
  });

  it('keeps the earlier abbreviation when its provider sent one', () => {
    const primary = buildTeam({ name: 'Pittsburgh Steelers', abbreviation: 'PITT' });
    const secondary = buildTeam({ id: '9', provider: 'secondary', name: 'Pittsburgh Steelers', abbreviation: 'PIT' });

    expect(mergeTeams([[primary], [secondary]])[0].abbreviation).toBe('PITT');
  });

  it('keeps same-named teams of different leagues apart', () => {
    const football = buildTeam({ name: 'Arizona Cardinals', league: 'nfl' });
    const college = buildTeam({ name: 'Arizona Cardinals', league: 'ncaaf' });

    expect(mergeTeams([[football], [college]])).toHaveLength(2);
  });
});
