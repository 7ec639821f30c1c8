import type { Team } from '../../types/sports';

/**
 * Case- and accent-insensitive form of a team name: NFKD, diacritics removed,
 * punctuation collapsed to single spaces.
 *
 *   normalizeName('  Atlético Madrid ') → 'atletico madrid'
 */
export function normalizeName(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/** Identity of a team across providers: normalized name within a league. */
export function teamIdentityKey(team: Team): string {
  return `${normalizeName(team.name)}|${team.league}`;
}

// Lower is better. Undefined means no match.
function matchRank(team: Team, query: string): number | undefined {
  const name = normalizeName(team.name);
  const short = normalizeName(team.shortName);
  const abbreviation = normalizeName(team.abbreviation);

  if (name === query || short === query || abbreviation === query) return 0;
  if (name.startsWith(query) || short.startsWith(query)) return 1;
  if (containsWords(name, query) || containsWords(short, query)) return 2;
  if (name.includes(query)) return 3;
  return undefined;
}

function containsWords(haystack: string, needle: string): boolean {
  return ` ${haystack} `.includes(` ${needle} `);
}

/**
 * Filter `teams` to those whose name matches `query` and order them best
 * first: exact, prefix, whole words, then any substring. Ties sort by name.
 */
export function rankTeamMatches(teams: readonly Team[], query: string): Team[] {
  const needle = normalizeName(query);
  if (!needle) return [];

  const ranked: Array<{ team: Team; rank: number }> = [];
  for (const team of teams) {
    const rank = matchRank(team, needle);
    if (rank !== undefined) ranked.push({ team, rank });
  }
  return ranked
    .sort((a, b) => a.rank - b.rank || a.team.name.localeCompare(b.team.name))
    .map((entry) => entry.team);
}
