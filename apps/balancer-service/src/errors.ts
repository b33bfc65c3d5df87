/**
 * Invalid or unreadable configuration. Raised only during startup; the process
 * cannot serve without a valid backend set.
 */
export class ConfigError extends Error {
  readonly field?: string;
  override readonly cause?: Error;

  constructor(message: string, options?: { field?: string; cause?: Error }) {
    super(message);
    this.name = 'ConfigError';
    this.field = options?.field;
    this.cause = options?.cause;
  }
}
