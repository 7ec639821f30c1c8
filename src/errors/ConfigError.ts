/**
 * Invalid federation options or environment. Thrown at construction time,
 * never during a read.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}
