/**
 * Invariant violation inside the distance engine.
 *
 * Raised only for non-maximized input or a rule table that slipped past
 * load-time validation; never a condition callers are expected to handle.
 */
export class DistanceInvariantError extends Error {
  constructor(message: string) {
    super(`Distance invariant violated: ${message}`);
    this.name = "DistanceInvariantError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DistanceInvariantError);
    }
  }
}
