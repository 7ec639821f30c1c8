/**
 * League Catalog
 *
 * Normalized league keys and how each provider addresses them. Adapters
 * answer `supportsLeague` from here, so capability checks never touch the
 * network.
 */

import { z } from 'zod';
import catalogJson from '../data/leagues.json';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const leagueSchema = z.object({
  key: z.string().regex(/^[a-z0-9]+$/),
  name: z.string().min(1),
  sport: z.string().min(1),
  draws: z.boolean(),
  aliases: z.array(z.string()),
  espn: z
    .object({
      sport: z.string().min(1),
      league: z.string().min(1),
      conferences: z.boolean().optional(),
    })
    .optional(),
  tsdb: z
    .object({
      id: z.string().min(1),
      name: z.string().min(1),
    })
    .optional(),
});

const catalogSchema = z.object({ leagues: z.array(leagueSchema) });

export type LeagueEntry = z.infer<typeof leagueSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Index
// ─────────────────────────────────────────────────────────────────────────────

const LEAGUES: readonly LeagueEntry[] = catalogSchema.parse(catalogJson).leagues;

const byKey = new Map<string, LeagueEntry>(LEAGUES.map((league) => [league.key, league]));

const aliasIndex = new Map<string, string>();
for (const league of LEAGUES) {
  for (const alias of league.aliases) {
    aliasIndex.set(alias.trim().toLowerCase(), league.key);
  }
}

/**
 * Normalize a league identifier to its catalog key. Unknown values come back
 * trimmed and lowercased, so callers can still use them as cache keys.
 */
export function normalizeLeagueKey(value: string): string {
  const normalized = value.trim().toLowerCase();
  return aliasIndex.get(normalized) ?? normalized;
}

export function getLeague(key: string): LeagueEntry | undefined {
  return byKey.get(normalizeLeagueKey(key));
}

export function listLeagues(): readonly LeagueEntry[] {
  return LEAGUES;
}

/** League key for a TheSportsDB league id, if the catalog knows it. */
export function leagueKeyForTsdbId(id: string): string | undefined {
  return LEAGUES.find((league) => league.tsdb?.id === id)?.key;
}
