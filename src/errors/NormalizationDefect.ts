/**
 * Raised by a normalizer when one raw record cannot be mapped to a required
 * field. Fatal for that record only: the caller drops it and keeps going.
 */
export class NormalizationDefect extends Error {
  constructor(
    public readonly provider: string,
    public readonly recordKind: 'team' | 'event' | 'teamStats',
    message: string,
    public readonly recordId?: string,
  ) {
    super(message);
    this.name = 'NormalizationDefect';
    Error.captureStackTrace(this, this.constructor);
  }

  static isNormalizationDefect(err: unknown): err is NormalizationDefect {
    return err instanceof NormalizationDefect;
  }
}
