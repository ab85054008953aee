/**
 * Custom Application Errors
 * Domain-specific error classes for the download lifecycle.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by a media fetcher when the requester cancelled the download.
 */
export class FetchCancelledError extends AppError {
  constructor(message: string = "Download cancelled") {
    super(message);
  }
}

/**
 * Media extraction failed (network, extractor or unsupported URL).
 */
export class FetchFailedError extends AppError {
  constructor(url: string, public readonly details: string) {
    super(`Media fetch failed for ${url}: ${details}`);
  }
}

/**
 * The fetcher reported success but the artifact is not on disk.
 */
export class ArtifactMissingError extends AppError {
  constructor(filePath: string) {
    super(`Artifact not found: ${filePath}`);
  }
}

/**
 * True when an error signals a cancelled download, either by type
 * or by a message mentioning cancellation.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof FetchCancelledError) return true;
  return error instanceof Error && /cancel/i.test(error.message);
}
