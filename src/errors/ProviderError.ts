/**
 * ProviderError - failures raised by a provider adapter
 *
 * A provider throws only when it is temporarily unusable for a call:
 * transport, auth, rate-limit, timeout or a response it cannot read.
 * "Nothing found" is never an error; adapters return null or an empty list.
 *
 * @example
 * throw ProviderError.rateLimited('espn', 30);
 * throw ProviderError.malformed('tsdb', 'events is not an array');
 */

export type ProviderErrorCode =
  | 'TRANSPORT'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'MALFORMED_RESPONSE'
  | 'TIMEOUT'
  | 'CIRCUIT_OPEN';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly code: ProviderErrorCode = 'TRANSPORT',
    public readonly statusCode?: number,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ProviderError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Network failure or an unexpected upstream HTTP status
   */
  static transport(provider: string, message: string, statusCode?: number): ProviderError {
    return new ProviderError(message, provider, 'TRANSPORT', statusCode);
  }

  /**
   * 401/403 from upstream - bad or missing API key
   */
  static unauthorized(provider: string, statusCode: number = 401): ProviderError {
    return new ProviderError(`${provider} rejected credentials`, provider, 'UNAUTHORIZED', statusCode);
  }

  /**
   * 429 from upstream
   */
  static rateLimited(provider: string, retryAfterSeconds?: number): ProviderError {
    return new ProviderError(`${provider} rate limit exhausted`, provider, 'RATE_LIMITED', 429, {
      retryAfterSeconds,
    });
  }

  /**
   * Body was not JSON, or its envelope did not have the documented shape
   */
  static malformed(provider: string, message: string, details?: unknown): ProviderError {
    return new ProviderError(message, provider, 'MALFORMED_RESPONSE', undefined, details);
  }

  static timeout(provider: string, timeoutMs: number): ProviderError {
    return new ProviderError(`${provider} did not answer within ${timeoutMs}ms`, provider, 'TIMEOUT');
  }

  static circuitOpen(provider: string): ProviderError {
    return new ProviderError(`${provider} circuit is open`, provider, 'CIRCUIT_OPEN');
  }

  /**
   * Wrap anything thrown by a provider call. ProviderErrors pass through.
   */
  static from(provider: string, err: unknown): ProviderError {
    if (ProviderError.isProviderError(err)) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ProviderError(message, provider, 'TRANSPORT', undefined, err);
  }

  static isProviderError(err: unknown): err is ProviderError {
    return err instanceof ProviderError;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Exhaustion
// ─────────────────────────────────────────────────────────────────────────────

export interface ProviderFailure {
  provider: string;
  error: ProviderError;
}

/**
 * Every provider that was attempted for a call failed outright.
 * `lastFailure` is the error of the final attempt.
 */
export class AllProvidersFailedError extends Error {
  public readonly failures: readonly ProviderFailure[];

  constructor(operation: string, failures: readonly ProviderFailure[]) {
    const providers = failures.map((f) => f.provider).join(', ');
    super(`All providers failed for ${operation}: ${providers}`);
    this.name = 'AllProvidersFailedError';
    this.failures = failures;
    Error.captureStackTrace(this, this.constructor);
  }

  get lastFailure(): ProviderError | undefined {
    return this.failures[this.failures.length - 1]?.error;
  }
}
