/**
 * Normalization helpers shared by every adapter.
 */

import { z } from 'zod';
import { NormalizationDefect } from '../../errors/NormalizationDefect';
import { ProviderError } from '../../errors/ProviderError';
import type { EventState } from '../../types/sports';
import type { Event, Team } from '../../types/sports';
import type { Logger } from '../../utils/logger';

/**
 * Canonical color: lowercase six-digit hex without '#'. Three-digit forms
 * are expanded; anything else is absent.
 */
export function canonicalColor(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const hex = value.trim().replace(/^#/, '').toLowerCase();
  if (/^[0-9a-f]{6}$/.test(hex)) return hex;
  if (/^[0-9a-f]{3}$/.test(hex)) {
    return hex
      .split('')
      .map((c) => c + c)
      .join('');
  }
  return undefined;
}

/**
 * Map provider status text through an exhaustive table. Unknown values land
 * in 'scheduled' and are logged; they never fail the record.
 */
export function mapStatus(
  table: Readonly<Record<string, EventState>>,
  raw: string | null | undefined,
  logger: Logger,
  provider: string,
): EventState {
  const key = (raw ?? '').trim();
  const state = table[key] ?? table[key.toUpperCase()] ?? table[key.toLowerCase()];
  if (state) return state;
  logger.warn({ provider, status: raw ?? null }, 'Unrecognized status; treating as scheduled');
  return 'scheduled';
}

/** Parse an integer-ish field ("24", 24, "") to a number or undefined. */
export function parseScore(value: string | number | null | undefined): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Validate an upstream envelope. A mismatch means the provider answered with
 * something we cannot read at all: a malformed response for the whole call.
 */
export function parseEnvelope<S extends z.ZodType>(
  schema: S,
  payload: unknown,
  provider: string,
  endpoint: string,
): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw ProviderError.malformed(provider, `Unexpected ${endpoint} response shape`, {
      issues: result.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/**
 * Map every raw item, dropping the ones that raise a NormalizationDefect.
 * Any other error propagates.
 */
export function collectRecords<R, T>(
  items: readonly R[],
  map: (item: R) => T,
  logger: Logger,
): T[] {
  const records: T[] = [];
  for (const item of items) {
    try {
      records.push(map(item));
    } catch (err) {
      if (!NormalizationDefect.isNormalizationDefect(err)) throw err;
      logger.warn(
        { provider: err.provider, kind: err.recordKind, recordId: err.recordId ?? null, reason: err.message },
        'Dropping record that failed normalization',
      );
    }
  }
  return records;
}

export function byStartTime(a: Event, b: Event): number {
  return a.startTime.getTime() - b.startTime.getTime() || a.id.localeCompare(b.id);
}

export function byName(a: Team, b: Team): number {
  return a.name.localeCompare(b.name) || a.id.localeCompare(b.id);
}

/** Upstream ids arrive as strings or numbers; records always carry strings. */
export const idSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

/**
 * Validate one raw record. A mismatch is a defect of that record only.
 */
export function parseRecord<S extends z.ZodType>(
  schema: S,
  raw: unknown,
  provider: string,
  kind: NormalizationDefect['recordKind'],
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid record';
    throw new NormalizationDefect(provider, kind, where, rawId(raw));
  }
  return result.data;
}

function rawId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  const id: unknown = Reflect.get(raw, 'id') ?? Reflect.get(raw, 'idEvent') ?? Reflect.get(raw, 'idTeam');
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

/** Games that started up to this long ago still count as upcoming. */
const IN_PROGRESS_GRACE_MS = 4 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Predicate for a team schedule window: start time within
 * [now - 4h, now + daysAhead days].
 */
export function upcomingWindow(now: Date, daysAhead: number): (event: Event) => boolean {
  const from = now.getTime() - IN_PROGRESS_GRACE_MS;
  const until = now.getTime() + daysAhead * DAY_MS;
  return (event) => {
    const start = event.startTime.getTime();
    return start >= from && start <= until;
  };
}
