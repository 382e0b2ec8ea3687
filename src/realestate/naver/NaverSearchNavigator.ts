import type { Logger } from '../../utils/logger';
import { describeError } from '../../utils/logger';
import { err, ok, type Result } from '../../types/Result';
import type { CrawlPage } from './PageDriver';
import type { CrawlDiagnostics } from './CrawlDiagnostics';
import { NAVER_SELECTORS, type SelectorTable } from './NaverSelectors';
import { clickFirst, resolveFirst } from './SelectorChain';
import { AddressNotFoundError, CrawlCancelledError } from './errors';
import { delay, ensureNotAborted, resolveTimings, type CrawlTimings } from './timing';

export interface NavigationOutcome {
  /** Final page URL once the address's map view loaded */
  url: string;
  filterPanelOpened: boolean;
}

export interface SearchNavigatorOptions {
  timings?: Partial<CrawlTimings>;
  selectors?: SelectorTable;
}

/**
 * Moves a fresh session from the search page to an address's map view and
 * opens the filter panel there.
 */
export class NaverSearchNavigator {
  private readonly logger: Logger;
  private readonly timings: CrawlTimings;
  private readonly selectors: SelectorTable;

  constructor(logger: Logger, options: SearchNavigatorOptions = {}) {
    this.logger = logger;
    this.timings = resolveTimings(options.timings);
    this.selectors = options.selectors ?? NAVER_SELECTORS;
  }

  /**
   * Types the address, follows the autocomplete entry whose text equals it
   * exactly, then opens the filter panel.
   * A missing filter panel is recorded, not fatal.
   */
  async navigateToAddress(
    page: CrawlPage,
    address: string,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<Result<NavigationOutcome, AddressNotFoundError>> {
    ensureNotAborted(signal);
    this.logger.info('Searching address', { address });

    const input = await resolveFirst(page, this.selectors.searchInput, 'visible', signal);
    if (!input.ok) {
      return err(new AddressNotFoundError(address, new Error('search input not found')));
    }

    await input.value.locator.fill(address, { timeout: this.timings.actionTimeoutMs });
    await delay(this.timings.autocompleteDelayMs, signal);
    await input.value.locator.press('Enter', { timeout: this.timings.actionTimeoutMs });
    await this.waitForNetworkIdle(page);

    const suggestion = page.getByRole('link', { name: address, exact: true }).first();
    try {
      await suggestion.waitFor({ state: 'visible', timeout: this.timings.suggestionTimeoutMs });
    } catch (error) {
      if (error instanceof CrawlCancelledError) {
        throw error;
      }
      return err(new AddressNotFoundError(address, error));
    }

    const href = await suggestion.getAttribute('href', { timeout: this.timings.actionTimeoutMs });
    if (href) {
      const target = new URL(href, page.url()).toString();
      this.logger.debug('Following address suggestion', { target });
      await page.goto(target, { waitUntil: 'domcontentloaded', timeout: this.timings.networkIdleTimeoutMs });
    } else {
      this.logger.debug('Suggestion has no href; clicking it');
      await suggestion.click({ timeout: this.timings.actionTimeoutMs });
    }

    await this.waitForNetworkIdle(page);
    await delay(this.timings.postNavigationDelayMs, signal);
    this.logger.info('Address page loaded', { address, url: page.url() });

    const filterPanelOpened = await this.openFilterPanel(page, diagnostics, signal);
    return ok({ url: page.url(), filterPanelOpened });
  }

  private async openFilterPanel(
    page: CrawlPage,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<boolean> {
    const clicked = await clickFirst(page, this.selectors.filterPanelToggle, signal);
    if (!clicked.ok) {
      diagnostics.record('filter-panel-not-found', 'Filter panel toggle not found; filters will not be applied', {
        attempts: clicked.error.attempts,
      });
      return false;
    }

    this.logger.debug('Opened filter panel', { selector: clicked.value });
    await delay(this.timings.filterPanelSettleMs, signal);
    return true;
  }

  private async waitForNetworkIdle(page: CrawlPage): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: this.timings.networkIdleTimeoutMs });
    } catch (error) {
      this.logger.debug('Network did not go idle after navigation', { error: describeError(error) });
    }
  }
}
