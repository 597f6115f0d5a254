export type GrobidErrorCode =
  | "SERVICE_UNAVAILABLE"
  | "INVALID_ROOT"
  | "CONFIGURATION"
  | "TRANSPORT";

/** Base class for every error the runner raises on purpose. */
export class GrobidClientError extends Error {
  constructor(
    message: string,
    public readonly code: GrobidErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GrobidClientError";
  }
}

/** The liveness probe did not answer 200. Fatal before any file is sent. */
export class ServiceUnavailableError extends GrobidClientError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, "SERVICE_UNAVAILABLE", options);
    this.name = "ServiceUnavailableError";
  }
}

export class InvalidRootError extends GrobidClientError {
  constructor(public readonly root: string, reason: string) {
    super(`Invalid input directory ${root}: ${reason}`, "INVALID_ROOT");
    this.name = "InvalidRootError";
  }
}

export class ConfigurationError extends GrobidClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

/**
 * Request never produced an HTTP status (refused connection, DNS, timeout).
 * Kept apart from a 503 so it is never retried as an overload.
 */
export class TransportError extends GrobidClientError {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSPORT", options);
    this.name = "TransportError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
