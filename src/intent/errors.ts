/**
 * Error thrown when an intent catalog cannot be built.
 *
 * Carries the offending intent name (when one is known) so callers can
 * point at the broken record.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly intentName?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
