import { createTeam, isDerived } from '../../models/records';
import { teamIdentityKey } from '../../providers/shared/teamSearch';
import type { Team } from '../../types/sports';

/**
 * Union team lists from several providers, highest priority first.
 *
 * Teams are identified by normalized name within a league. When two
 * providers know the same team, the earlier list's record wins field by
 * field and only fills its gaps from the later one; `id` and `provider`
 * always come from the earlier list. A short name or abbreviation the
 * constructor derived counts as a gap. Order is first appearance.
 */
export function mergeTeams(listsByPriority: ReadonlyArray<readonly Team[]>): Team[] {
  const merged = new Map<string, Team>();
  for (const list of listsByPriority) {
    for (const team of list) {
      const key = teamIdentityKey(team);
      const existing = merged.get(key);
      merged.set(key, existing ? fillGaps(existing, team) : team);
    }
  }
  return Array.from(merged.values());
}

function fillGaps(primary: Team, secondary: Team): Team {
  const hasGaps =
    primary.logoUrl === undefined ||
    primary.color === undefined ||
    isDerived(primary, 'shortName') ||
    isDerived(primary, 'abbreviation');
  if (!hasGaps) return primary;
  return createTeam({
    id: primary.id,
    provider: primary.provider,
    name: primary.name,
    shortName: sent(primary, 'shortName') ?? sent(secondary, 'shortName'),
    abbreviation: sent(primary, 'abbreviation') ?? sent(secondary, 'abbreviation'),
    league: primary.league,
    logoUrl: primary.logoUrl ?? secondary.logoUrl,
    color: primary.color ?? secondary.color,
  });
}

/** The field's value when the provider sent it; undefined when it was derived. */
function sent(team: Team, field: 'shortName' | 'abbreviation'): string | undefined {
  return isDerived(team, field) ? undefined : team[field];
}
