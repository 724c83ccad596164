/**
 * Error taxonomy for the search pipeline.
 *
 * Blocked, network, parse and rate-budget errors are local to one source: the
 * runner records them in that source's outcome and keeps going. A
 * ConfigurationError is fatal and is raised before anything is dispatched.
 */

/**
 * Base class for failures that belong to a single source.
 */
export abstract class SourceError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.source = source;
  }
}

/**
 * The site detected automation and denied access (denial page, challenge, 403/429,
 * or an empty result page that should not be empty).
 */
export class BlockedError extends SourceError {
  constructor(source: string, reason: string) {
    super(source, `${source} blocked automated access: ${reason}`);
    this.name = 'BlockedError';
  }
}

/**
 * Transient connectivity failure or timeout. Retried by the runner.
 */
export class NetworkError extends SourceError {
  constructor(source: string, reason: string) {
    super(source, `${source} network failure: ${reason}`);
    this.name = 'NetworkError';
  }
}

/**
 * The page no longer matches the extraction rules for the site.
 */
export class ParseError extends SourceError {
  constructor(source: string, reason: string) {
    super(source, `${source} page could not be parsed: ${reason}`);
    this.name = 'ParseError';
  }
}

export class RateBudgetExhaustedError extends SourceError {
  readonly limit: number;

  constructor(source: string, limit: number) {
    super(source, `${source} request budget of ${limit} exhausted for this session`);
    this.name = 'RateBudgetExhaustedError';
    this.limit = limit;
  }
}

/**
 * Thrown into a source task when the run timeout cancels it.
 */
export class ScrapeCancelledError extends Error {
  constructor(message = 'Scrape cancelled') {
    super(message);
    this.name = 'ScrapeCancelledError';
  }
}

/**
 * A search was requested while the orchestrator was still running another one.
 */
export class SearchInProgressError extends Error {
  constructor() {
    super('Another search is already running');
    this.name = 'SearchInProgressError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
