/**
 * Event Matcher
 *
 * Finds the event two teams play in a list of events, by provider ids or by
 * free-text names such as "Celtics" or "Boston Celtics".
 *
 * Name matching compares the text against patterns derived from each team:
 * its full name, abbreviation, and the split of full name vs short name into
 * a location ("Boston") and a nickname ("Celtics"). Locations alone are
 * ambiguous across leagues, so they only match when they cover most of the
 * text.
 */

import { normalizeName } from '../../providers/shared/teamSearch';
import type { Event, Team } from '../../types/sports';

export interface TeamPattern {
  pattern: string;
  /** False for a bare location that several teams can share. */
  distinctive: boolean;
}

// Non-distinctive patterns shorter than this never substring-match.
const MIN_SUBSTRING_LENGTH = 5;
// Share of the text a non-distinctive pattern must cover.
const MIN_COVERAGE_RATIO = 0.7;

/** Searchable patterns for a team, most specific first. */
export function teamPatterns(team: Team): TeamPattern[] {
  const patterns: TeamPattern[] = [];
  const seen = new Set<string>();
  const add = (value: string, distinctive: boolean): void => {
    const pattern = normalizeName(value);
    if (pattern.length < 2 || seen.has(pattern)) return;
    seen.add(pattern);
    patterns.push({ pattern, distinctive });
  };

  const name = normalizeName(team.name);
  const short = normalizeName(team.shortName);
  add(name, true);

  if (short && short !== name) {
    if (name.endsWith(` ${short}`)) {
      // "boston celtics" / "celtics": short name is the nickname
      add(name.slice(0, name.length - short.length - 1), false);
      add(short, true);
    } else if (name.startsWith(`${short} `)) {
      // "florida atlantic owls" / "florida atlantic": short name is the location
      add(short, false);
      add(name.slice(short.length + 1), true);
    } else {
      add(short, true);
    }
  }

  add(team.abbreviation, true);
  return patterns;
}

/** Whether free text names this team. */
export function matchesTeam(team: Team, text: string): boolean {
  const haystack = normalizeName(text);
  if (!haystack) return false;
  const patterns = teamPatterns(team);

  if (patterns.some((p) => p.distinctive && hasWords(haystack, p.pattern))) return true;

  return patterns.some((p) => {
    if (p.distinctive) return false;
    if (p.pattern.length >= MIN_SUBSTRING_LENGTH && haystack.includes(p.pattern)) {
      if (p.pattern.length / haystack.length >= MIN_COVERAGE_RATIO) return true;
    }
    return p.pattern.includes(' ') && hasWords(haystack, p.pattern);
  });
}

function hasWords(haystack: string, words: string): boolean {
  return ` ${haystack} `.includes(` ${words} `);
}

/** The event between two teams, in either home/away order. */
export function findByTeamIds(events: readonly Event[], team1Id: string, team2Id: string): Event | undefined {
  return events.find(
    (event) =>
      (event.homeTeam.id === team1Id && event.awayTeam.id === team2Id) ||
      (event.homeTeam.id === team2Id && event.awayTeam.id === team1Id),
  );
}

export function findByTeamNames(events: readonly Event[], name1: string, name2: string): Event | undefined {
  return events.find(
    (event) =>
      (matchesTeam(event.homeTeam, name1) && matchesTeam(event.awayTeam, name2)) ||
      (matchesTeam(event.homeTeam, name2) && matchesTeam(event.awayTeam, name1)),
  );
}
