import type { Logger } from '../../utils/logger';
import { describeError } from '../../utils/logger';
import type { ListingRecord } from '../../types/ListingRecord';
import type { CrawlLocator, CrawlPage } from './PageDriver';
import type { CrawlDiagnostics } from './CrawlDiagnostics';
import {
  LISTING_CARD_SELECTORS,
  NAVER_SELECTORS,
  type ListingCardSelectors,
  type SelectorTable,
} from './NaverSelectors';
import { resolveFirst } from './SelectorChain';
import { parseListingCard, readListingId, toListingRecord } from './NaverListingCardParser';
import { CrawlCancelledError } from './errors';
import { delay, ensureNotAborted, resolveTimings, type CrawlTimings } from './timing';

export interface ExtractionResult {
  listings: ListingRecord[];
  markersFound: number;
  markersVisited: number;
  /** True when the signal aborted mid-way; `listings` holds what was read before */
  cancelled: boolean;
}

export interface ListingExtractorOptions {
  timings?: Partial<CrawlTimings>;
  selectors?: SelectorTable;
  cardSelectors?: ListingCardSelectors;
}

/**
 * Clicks every map marker and reads the listing cards each one reveals.
 * Listings are deduplicated by id across markers, first occurrence wins.
 */
export class NaverListingExtractor {
  private readonly logger: Logger;
  private readonly timings: CrawlTimings;
  private readonly selectors: SelectorTable;
  private readonly cardSelectors: ListingCardSelectors;

  constructor(logger: Logger, options: ListingExtractorOptions = {}) {
    this.logger = logger;
    this.timings = resolveTimings(options.timings);
    this.selectors = options.selectors ?? NAVER_SELECTORS;
    this.cardSelectors = options.cardSelectors ?? LISTING_CARD_SELECTORS;
  }

  async extract(
    page: CrawlPage,
    address: string,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<ExtractionResult> {
    const result: ExtractionResult = { listings: [], markersFound: 0, markersVisited: 0, cancelled: false };
    const seen = new Set<string>();

    try {
      const resolved = await resolveFirst(page, this.selectors.marker, 'attached', signal);
      if (!resolved.ok) {
        diagnostics.record('markers-not-found', 'No map markers found for address', {
          address,
          attempts: resolved.error.attempts,
        });
        return result;
      }

      let markers: CrawlLocator[];
      try {
        markers = await page.locator(resolved.value.selector).all();
      } catch (error) {
        if (error instanceof CrawlCancelledError) {
          throw error;
        }
        diagnostics.record('markers-not-found', 'Could not list map markers', {
          address,
          selector: resolved.value.selector,
          error: describeError(error),
        });
        return result;
      }
      result.markersFound = markers.length;
      this.logger.info('Found map markers', { selector: resolved.value.selector, count: markers.length });

      for (const [index, marker] of markers.entries()) {
        if (!(await this.openMarker(page, marker, index, diagnostics, signal))) {
          continue;
        }
        result.markersVisited++;

        const before = result.listings.length;
        try {
          await this.readItems(page, address, seen, result.listings, diagnostics, signal);
        } catch (error) {
          if (error instanceof CrawlCancelledError) {
            throw error;
          }
          // Listings read before the failure stay in the result
          diagnostics.record('marker-read-failed', `Could not read listings of marker ${index}`, {
            marker: index,
            error: describeError(error),
          });
          continue;
        }
        this.logger.info('Read marker listings', {
          marker: index,
          added: result.listings.length - before,
          total: result.listings.length,
        });
      }
    } catch (error) {
      if (!(error instanceof CrawlCancelledError)) {
        throw error;
      }
      result.cancelled = true;
      this.logger.warn('Listing extraction cancelled', { collected: result.listings.length });
    }

    return result;
  }

  /**
   * Brings a marker into view and clicks it, then waits for its panel to render.
   * Returns false when the marker could not be clicked.
   */
  private async openMarker(
    page: CrawlPage,
    marker: CrawlLocator,
    index: number,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<boolean> {
    ensureNotAborted(signal);
    try {
      await marker.waitFor({ state: 'visible', timeout: this.timings.markerVisibleTimeoutMs });
      await marker.scrollIntoViewIfNeeded({ timeout: this.timings.markerVisibleTimeoutMs });
      await delay(this.timings.markerScrollSettleMs, signal);
      // Overlapping map layers intercept pointer events on clustered markers
      await marker.click({ force: true, timeout: this.timings.markerClickTimeoutMs });
    } catch (error) {
      if (error instanceof CrawlCancelledError) {
        throw error;
      }
      diagnostics.record('marker-click-failed', `Could not open marker ${index}`, {
        marker: index,
        error: describeError(error),
      });
      return false;
    }

    try {
      await page.waitForLoadState('networkidle', { timeout: this.timings.panelIdleTimeoutMs });
    } catch (error) {
      diagnostics.record('panel-settle-timeout', `Listing panel for marker ${index} did not settle`, {
        marker: index,
        error: describeError(error),
      });
    }
    await delay(this.timings.panelAnimationMs, signal);
    return true;
  }

  private async readItems(
    page: CrawlPage,
    address: string,
    seen: Set<string>,
    into: ListingRecord[],
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<void> {
    const items = await this.findItems(page, signal);

    for (const [position, item] of items.entries()) {
      ensureNotAborted(signal);

      let html: string;
      try {
        html = await item.innerHTML({ timeout: this.timings.itemReadTimeoutMs });
      } catch (error) {
        diagnostics.record('item-read-failed', `Could not read listing item ${position}`, {
          item: position,
          error: describeError(error),
        });
        continue;
      }

      const listingId = readListingId(html, this.cardSelectors);
      if (listingId !== null && seen.has(listingId)) {
        continue;
      }

      const parsed = parseListingCard(html, this.cardSelectors);
      if (!parsed.ok) {
        diagnostics.record('item-invalid', `Listing item ${position} is incomplete`, {
          item: position,
          listingId,
          reason: parsed.error,
        });
        continue;
      }

      seen.add(parsed.value.listingId);
      into.push(toListingRecord(parsed.value, address));
    }
  }

  private async findItems(page: CrawlPage, signal?: AbortSignal): Promise<CrawlLocator[]> {
    const resolved = await resolveFirst(page, this.selectors.listingItem, 'attached', signal);
    if (!resolved.ok) {
      this.logger.debug('Marker panel shows no listing items');
      return [];
    }
    return page.locator(resolved.value.selector).all();
  }
}
