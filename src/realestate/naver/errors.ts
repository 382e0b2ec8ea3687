/**
 * Whether a failure ends the crawl attempt or is absorbed where it happens
 */
export type FailurePolicy = 'fatal' | 'recoverable';

export type FatalErrorKind =
  | 'invalid-filter'
  | 'session-init'
  | 'address-not-found'
  | 'cancelled';

/**
 * Base class for failures that end a crawl attempt.
 * Only InvalidFilterError is allowed past the crawler's public boundary.
 */
export abstract class CrawlError extends Error {
  abstract readonly kind: FatalErrorKind;
  readonly policy: FailurePolicy = 'fatal';

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The filter failed shape validation; raised before any browser is launched
 */
export class InvalidFilterError extends CrawlError {
  readonly kind = 'invalid-filter';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid search filter: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class SessionInitError extends CrawlError {
  readonly kind = 'session-init';
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Browser session could not be started after ${attempts} attempt(s): ${reason}`, { cause });
    this.attempts = attempts;
  }
}

export class AddressNotFoundError extends CrawlError {
  readonly kind = 'address-not-found';
  readonly address: string;

  constructor(address: string, cause?: unknown) {
    super(`No search suggestion matches address "${address}"`, { cause });
    this.address = address;
  }
}

export class CrawlCancelledError extends CrawlError {
  readonly kind = 'cancelled';

  constructor(reason?: unknown) {
    super(
      reason === undefined ? 'Crawl was cancelled' : `Crawl was cancelled: ${String(reason)}`
    );
  }
}

/**
 * Recoverable failure points. Each one is skipped or degraded, then reported.
 */
export type CrawlIssueKind =
  | 'filter-panel-not-found'
  | 'filter-toggle-missing'
  | 'filter-toggle-failed'
  | 'range-input-failed'
  | 'area-option-failed'
  | 'apply-button-not-found'
  | 'markers-not-found'
  | 'marker-click-failed'
  | 'marker-read-failed'
  | 'panel-settle-timeout'
  | 'item-read-failed'
  | 'item-invalid';

export interface CrawlIssue {
  kind: CrawlIssueKind;
  policy: 'recoverable';
  message: string;
  context: Record<string, unknown>;
}
