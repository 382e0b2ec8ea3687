import type { Logger } from '../../utils/logger';
import { describeError } from '../../utils/logger';
import type { ListingRecord } from '../../types/ListingRecord';
import {
  SearchFilterSchema,
  describeIssues,
  type SearchFilter,
  type SearchFilterInput,
} from '../../types/SearchFilter';
import type { SessionHandle, SessionProvider } from './BrowserSessionManager';
import { CrawlDiagnostics } from './CrawlDiagnostics';
import { NaverSearchNavigator } from './NaverSearchNavigator';
import { NaverFilterTranslator, type PanelSelection } from './NaverFilterTranslator';
import { NaverListingExtractor } from './NaverListingExtractor';
import type { ListingCardSelectors, SelectorTable } from './NaverSelectors';
import { CrawlCancelledError, InvalidFilterError, SessionInitError, type CrawlIssue } from './errors';
import type { CrawlTimings } from './timing';

export type CrawlOutcome =
  | 'completed'
  | 'degraded'
  | 'address-not-found'
  | 'session-failed'
  | 'cancelled'
  | 'failed';

export interface CrawlReport {
  listings: ListingRecord[];
  outcome: CrawlOutcome;
  issues: readonly CrawlIssue[];
  /** Message of the failure that ended the crawl early, if any */
  error?: string;
}

export interface CrawlOptions {
  signal?: AbortSignal;
}

export interface NaverCrawlerOptions {
  timings?: Partial<CrawlTimings>;
  selectors?: SelectorTable;
  cardSelectors?: ListingCardSelectors;
  /** Panel selection a fresh session starts with */
  initialSelection?: PanelSelection;
}

/**
 * Public entry point: one filter in, listings out.
 *
 * Each crawl gets its own browser session, which is always closed.
 * Only InvalidFilterError escapes; every other failure becomes an empty or
 * partial result.
 */
export class NaverCrawler {
  private readonly sessions: SessionProvider;
  private readonly logger: Logger;
  private readonly options: NaverCrawlerOptions;

  constructor(sessions: SessionProvider, logger: Logger, options: NaverCrawlerOptions = {}) {
    this.sessions = sessions;
    this.logger = logger;
    this.options = options;
  }

  /**
   * @throws InvalidFilterError before any browser work when the filter is malformed
   */
  async crawl(filter: SearchFilterInput, options: CrawlOptions = {}): Promise<ListingRecord[]> {
    const report = await this.crawlWithReport(filter, options);
    return report.listings;
  }

  /**
   * Same contract as crawl(), but says why the list is empty or short.
   * @throws InvalidFilterError before any browser work when the filter is malformed
   */
  async crawlWithReport(input: SearchFilterInput, options: CrawlOptions = {}): Promise<CrawlReport> {
    const filter = this.validate(input);
    const { signal } = options;
    const diagnostics = new CrawlDiagnostics(this.logger, { address: filter.address });
    const startedAt = Date.now();

    this.logger.info('Crawl started', {
      address: filter.address,
      transactionTypes: filter.transactionTypes,
      buildingTypes: filter.buildingTypes,
    });

    let handle: SessionHandle | undefined;
    try {
      handle = await this.sessions.open(signal);

      const navigator = new NaverSearchNavigator(this.logger, {
        timings: this.options.timings,
        selectors: this.options.selectors,
      });
      const navigation = await navigator.navigateToAddress(handle.page, filter.address, diagnostics, signal);
      if (!navigation.ok) {
        this.logger.error('Address not found', { address: filter.address, error: navigation.error.message });
        return this.finish([], 'address-not-found', diagnostics, startedAt, navigation.error.message);
      }

      if (navigation.value.filterPanelOpened) {
        const translator = new NaverFilterTranslator(this.logger, {
          timings: this.options.timings,
          selectors: this.options.selectors,
          initialSelection: this.options.initialSelection,
        });
        await translator.apply(handle.page, filter, diagnostics, signal);
      } else {
        this.logger.warn('Skipping filter application; site defaults stay in effect', { address: filter.address });
      }

      const extractor = new NaverListingExtractor(this.logger, {
        timings: this.options.timings,
        selectors: this.options.selectors,
        cardSelectors: this.options.cardSelectors,
      });
      const extraction = await extractor.extract(handle.page, filter.address, diagnostics, signal);

      if (extraction.cancelled) {
        return this.finish(extraction.listings, 'cancelled', diagnostics, startedAt);
      }
      return this.finish(
        extraction.listings,
        diagnostics.count() > 0 ? 'degraded' : 'completed',
        diagnostics,
        startedAt
      );
    } catch (error) {
      const outcome: CrawlOutcome =
        error instanceof CrawlCancelledError
          ? 'cancelled'
          : error instanceof SessionInitError
            ? 'session-failed'
            : 'failed';

      if (outcome === 'cancelled') {
        this.logger.warn('Crawl cancelled', { address: filter.address });
      } else {
        this.logger.error('Crawl failed', {
          address: filter.address,
          outcome,
          error: describeError(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
      return this.finish([], outcome, diagnostics, startedAt, describeError(error));
    } finally {
      if (handle) {
        await this.sessions.close(handle);
      }
    }
  }

  private validate(input: SearchFilterInput): SearchFilter {
    const parsed = SearchFilterSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error.issues);
      this.logger.error('Rejected search filter', { issues });
      throw new InvalidFilterError(issues);
    }
    return parsed.data;
  }

  private finish(
    listings: ListingRecord[],
    outcome: CrawlOutcome,
    diagnostics: CrawlDiagnostics,
    startedAt: number,
    error?: string
  ): CrawlReport {
    this.logger.info('Crawl finished', {
      outcome,
      listings: listings.length,
      issues: diagnostics.count(),
      durationMs: Date.now() - startedAt,
    });
    return { listings, outcome, issues: [...diagnostics.issues], ...(error !== undefined && { error }) };
  }
}
