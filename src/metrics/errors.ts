/**
 * Raised for configuration problems that must stop start-up: an unparseable
 * bind address or a metric name the registry already holds.
 */
export class MetricsStartupError extends Error {
  constructor(
    message: string,
    public readonly underlyingError?: unknown
  ) {
    super(message);
    this.name = 'MetricsStartupError';
  }
}
