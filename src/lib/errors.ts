/**
 * Error types for ingestion, storage and configuration
 */

/**
 * Network or HTTP failure while loading one source
 */
export class FetchError extends Error {
  constructor(
    public readonly sourceFeed: string,
    public readonly statusCode: number | undefined,
    message: string
  ) {
    super(`Fetch failed for ${sourceFeed}${statusCode ? ` (HTTP ${statusCode})` : ""}: ${message}`);
    this.name = "FetchError";
  }
}

/**
 * Response body was not a feed, or the listing layout was not recognized
 */
export class ParseError extends Error {
  constructor(public readonly sourceFeed: string, message: string) {
    super(`Parse failed for ${sourceFeed}: ${message}`);
    this.name = "ParseError";
  }
}

/**
 * A delivery record already exists for this content id
 */
export class LedgerWriteConflictError extends Error {
  constructor(public readonly contentId: string) {
    super(`Delivery already recorded for ${contentId}`);
    this.name = "LedgerWriteConflictError";
  }
}

/**
 * Ledger storage could not be read or written
 */
export class LedgerUnavailableError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = "LedgerUnavailableError";
  }
}

export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
