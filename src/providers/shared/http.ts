/**
 * Upstream HTTP
 *
 * JSON GET with a hard timeout. Every failure is translated into a
 * ProviderError so the federation service can fall back; a 404 is the one
 * status that means "nothing there" and comes back as null.
 */

import { ProviderError } from '../../errors/ProviderError';
import { externalApiDurationMs } from '../../infrastructure/metrics';
import type { Logger } from '../../utils/logger';

const USER_AGENT = 'sports-data-federation/1.0';

export interface FetchJsonOptions {
  provider: string;
  timeoutMs: number;
  logger: Logger;
  /** Label for the latency histogram, e.g. 'scoreboard'. */
  endpoint: string;
}

/**
 * Fetch JSON from a URL with standard headers.
 * Resolves null for 404; throws ProviderError for everything else that is not 2xx.
 */
export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<unknown> {
  const { provider, logger, endpoint } = opts;
  const res = await send(url, opts);

  if (res.status === 404) {
    logger.debug({ url, status: res.status }, 'Not found');
    return null;
  }
  if (res.status === 401 || res.status === 403) {
    throw ProviderError.unauthorized(provider, res.status);
  }
  if (res.status === 429) {
    throw ProviderError.rateLimited(provider, retryAfterSeconds(res.headers.get('retry-after')));
  }
  if (!res.ok) {
    logger.debug({ url, status: res.status }, 'Fetch failed');
    throw ProviderError.transport(provider, `${endpoint} answered HTTP ${res.status}`, res.status);
  }

  const body = await res.text();
  if (body.trim() === '') return null;
  try {
    return JSON.parse(body);
  } catch {
    throw ProviderError.malformed(provider, `${endpoint} returned a body that is not JSON`);
  }
}

async function send(url: string, opts: FetchJsonOptions): Promise<Response> {
  const { provider, timeoutMs, logger, endpoint } = opts;
  const started = Date.now();
  try {
    return await fetch(url, {
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      throw ProviderError.timeout(provider, timeoutMs);
    }
    logger.debug({ url, err }, 'HTTP error');
    throw ProviderError.transport(provider, `Request to ${endpoint} failed: ${describe(err)}`);
  } finally {
    externalApiDurationMs.observe({ provider, endpoint }, Date.now() - started);
  }
}

function retryAfterSeconds(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
