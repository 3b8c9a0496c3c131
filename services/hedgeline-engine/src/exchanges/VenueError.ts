export type VenueErrorKind =
  /** Network failure, timeout, rate limit or 5xx; safe to retry reads */
  | 'TRANSIENT'
  /** The venue refused the request; retrying will not help */
  | 'REJECTED';

/**
 * Error raised by a venue gateway
 */
export class VenueError extends Error {
  public readonly timestamp: number;

  constructor(
    message: string,
    public readonly venue: string,
    public readonly kind: VenueErrorKind,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'VenueError';
    this.timestamp = Date.now();
  }

  static transient(venue: string, message: string, code?: string): VenueError {
    return new VenueError(message, venue, 'TRANSIENT', code);
  }

  static rejected(venue: string, message: string, code?: string): VenueError {
    return new VenueError(message, venue, 'REJECTED', code);
  }

  /**
   * Check if error is retryable
   */
  isRetryable(): boolean {
    return this.kind === 'TRANSIENT';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      venue: this.venue,
      kind: this.kind,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Retry predicate for idempotent venue reads. Errors that are not
 * VenueErrors come from transport code and are treated as transient.
 */
export function isRetryableVenueError(error: unknown): boolean {
  if (error instanceof VenueError) {
    return error.isRetryable();
  }
  return true;
}
