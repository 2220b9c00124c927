/**
 * Error types the control surface maps to HTTP responses.
 */

/** A required outside resource (ingest target, stream key, platform account) is not configured. */
export class ExternalResourceMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExternalResourceMissingError";
  }
}

/** The request conflicts with the current state (e.g. starting a stream that is already running). */
export class StateConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateConflictError";
  }
}
