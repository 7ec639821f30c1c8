/**
 * Circuit Breaker
 *
 * One breaker per provider. Keeps the federation service from hammering a
 * provider that keeps failing; while open, the provider is skipped and the
 * next one in priority order serves the call.
 *
 *   CLOSED  ──(N consecutive failures)──▶  OPEN
 *   OPEN    ──(cooldown elapsed)────────▶  HALF_OPEN
 *   HALF_OPEN ──(call succeeds)─────────▶  CLOSED
 *   HALF_OPEN ──(call fails)────────────▶  OPEN
 *
 * Usage:
 *   const breaker = new CircuitBreaker({ name: 'espn', failureThreshold: 5, cooldownMs: 30_000 });
 *   const teams = await breaker.call(() => provider.getLeagueTeams('nfl'));
 */

import { ProviderError } from '../errors/ProviderError';
import { circuitBreakerState } from '../infrastructure/metrics';
import { createLogger, type Logger } from './logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Provider name; used for logging, metrics and the CIRCUIT_OPEN error. */
  name: string;
  /** Number of consecutive failures before the circuit opens. Default 5. */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before allowing a probe. Default 30 000. */
  cooldownMs?: number;
  /** Injected clock for tests. */
  now?: () => number;
}

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_COOLDOWN_MS = 30_000;

const STATE_GAUGE: Record<CircuitState, number> = { CLOSED: 0, OPEN: 1, HALF_OPEN: 2 };

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt = 0;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.cooldownMs = opts.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.now = opts.now ?? Date.now;
    this.logger = createLogger(`circuitBreaker:${this.name}`);
    this.publish();
  }

  /** Current state of the breaker. */
  getState(): CircuitState {
    return this.state;
  }

  /** Number of consecutive failures recorded. */
  getFailureCount(): number {
    return this.consecutiveFailures;
  }

  /**
   * Execute `fn` through the circuit breaker.
   *
   * - **CLOSED**: calls pass through.
   * - **OPEN**: rejected immediately with a `CIRCUIT_OPEN` ProviderError,
   *   unless the cooldown has elapsed, in which case the call runs as a probe.
   * - **HALF_OPEN**: the probe decides: success closes, failure re-opens.
   *
   * Any resolved value (null and empty lists included) counts as success:
   * "nothing found" is a healthy answer.
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.now() - this.openedAt >= this.cooldownMs) {
        this.state = 'HALF_OPEN';
        this.publish();
        this.logger.info({}, 'transitioning to HALF_OPEN (probe allowed)');
      } else {
        throw ProviderError.circuitOpen(this.name);
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  /** Force-close the breaker (tests or admin overrides). */
  reset(): void {
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.openedAt = 0;
    this.publish();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.logger.info({}, 'probe succeeded; circuit CLOSED');
    }
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.publish();
  }

  private onFailure(): void {
    this.consecutiveFailures++;

    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.state = 'OPEN';
    this.openedAt = this.now();
    this.publish();
    this.logger.warn(
      { failures: this.consecutiveFailures, cooldownMs: this.cooldownMs },
      'circuit OPENED',
    );
  }

  private publish(): void {
    circuitBreakerState.set({ provider: this.name }, STATE_GAUGE[this.state]);
  }
}
