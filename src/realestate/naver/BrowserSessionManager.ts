import { chromium, firefox, type BrowserContextOptions, type LaunchOptions } from 'playwright-core';
import type { Logger } from '../../utils/logger';
import { describeError } from '../../utils/logger';
import type { CrawlerConfig } from '../../types/CrawlerConfig';
import type { CrawlPage } from './PageDriver';
import { CrawlCancelledError, SessionInitError } from './errors';
import { delay, ensureNotAborted } from './timing';
import { STEALTH_INIT_SCRIPT, buildContextOptions, buildLaunchOptions } from './StealthProfile';

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
}

/**
 * Playwright's BrowserContext, narrowed to what a session uses
 */
export interface LaunchedContext {
  addInitScript(script: string): Promise<void>;
  addCookies(cookies: SessionCookie[]): Promise<void>;
  newPage(): Promise<CrawlPage>;
  close(): Promise<void>;
}

/**
 * Playwright's Browser, narrowed to what a session uses
 */
export interface LaunchedBrowser {
  newContext(options?: BrowserContextOptions): Promise<LaunchedContext>;
  close(): Promise<void>;
}

/**
 * Playwright's BrowserType (firefox / chromium)
 */
export interface BrowserLauncher {
  launch(options?: LaunchOptions): Promise<LaunchedBrowser>;
}

/**
 * A ready page plus the resources behind it, released in reverse order
 */
export interface SessionHandle {
  readonly page: CrawlPage;
  readonly context: LaunchedContext;
  readonly browser: LaunchedBrowser;
  readonly attempt: number;
}

/**
 * Opens and closes browser sessions for crawls
 */
export interface SessionProvider {
  open(signal?: AbortSignal): Promise<SessionHandle>;
  close(handle: SessionHandle): Promise<void>;
}

export type SessionSettings = Pick<
  CrawlerConfig,
  | 'entryUrl'
  | 'browserEngine'
  | 'headless'
  | 'cookies'
  | 'cookieDomain'
  | 'maxLaunchAttempts'
  | 'retryBaseDelayMs'
  | 'retryStepMs'
  | 'navigationTimeoutMs'
  | 'defaultTimeoutMs'
  | 'proxy'
> & {
  /** Pause after the entry page loads, before handing the page out */
  settleDelayMs?: number;
};

export function toSessionCookies(cookies: Record<string, string>, domain: string): SessionCookie[] {
  return Object.entries(cookies).map(([name, value]) => ({ name, value, domain, path: '/' }));
}

/**
 * Launches stealth-configured browser sessions with cookie auth and retry.
 * Holds no per-session state: every open() returns an independent handle.
 */
export class BrowserSessionManager implements SessionProvider {
  private readonly settings: SessionSettings;
  private readonly logger: Logger;
  private readonly launcher: BrowserLauncher;

  /**
   * @param launcher - Defaults to Playwright's browser type for the configured engine
   */
  constructor(settings: SessionSettings, logger: Logger, launcher?: BrowserLauncher) {
    this.settings = settings;
    this.logger = logger;
    this.launcher = launcher ?? (settings.browserEngine === 'firefox' ? firefox : chromium);
  }

  /**
   * Launches a browser and loads the entry page, retrying the whole sequence.
   * Attempt n (0-based) failing waits retryBaseDelayMs + n * retryStepMs before the next.
   * @throws SessionInitError once every attempt failed
   * @throws CrawlCancelledError if the signal aborts
   */
  async open(signal?: AbortSignal): Promise<SessionHandle> {
    const maxAttempts = this.settings.maxLaunchAttempts;
    let lastError: unknown = new Error('no launch attempt was made');

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      ensureNotAborted(signal);
      this.logger.info('Starting browser session', {
        engine: this.settings.browserEngine,
        attempt: attempt + 1,
        maxAttempts,
      });

      let browser: LaunchedBrowser | undefined;
      try {
        browser = await this.launcher.launch(buildLaunchOptions(this.settings));
        const handle = await this.prepare(browser, attempt + 1, signal);
        this.logger.info('Browser session ready', { url: handle.page.url(), attempt: attempt + 1 });
        return handle;
      } catch (error) {
        if (browser) {
          await this.safeClose('browser', () => browser?.close());
        }
        if (error instanceof CrawlCancelledError) {
          throw error;
        }

        lastError = error;
        this.logger.warn('Browser session attempt failed', {
          attempt: attempt + 1,
          maxAttempts,
          error: describeError(error),
        });

        if (attempt < maxAttempts - 1) {
          const waitMs = this.settings.retryBaseDelayMs + attempt * this.settings.retryStepMs;
          this.logger.info('Retrying browser session', { nextAttempt: attempt + 2, waitMs });
          await delay(waitMs, signal);
        }
      }
    }

    throw new SessionInitError(maxAttempts, lastError);
  }

  /**
   * Closes page, context and browser in that order. Never throws.
   */
  async close(handle: SessionHandle): Promise<void> {
    await this.safeClose('page', () => handle.page.close());
    await this.safeClose('context', () => handle.context.close());
    await this.safeClose('browser', () => handle.browser.close());
    this.logger.info('Browser session closed', { attempt: handle.attempt });
  }

  private async prepare(browser: LaunchedBrowser, attempt: number, signal?: AbortSignal): Promise<SessionHandle> {
    const context = await browser.newContext(buildContextOptions(this.settings.browserEngine));
    await context.addInitScript(STEALTH_INIT_SCRIPT);

    const cookies = toSessionCookies(this.settings.cookies, this.settings.cookieDomain);
    if (cookies.length > 0) {
      await context.addCookies(cookies);
    } else {
      this.logger.warn('No authentication cookies configured');
    }

    const page = await context.newPage();
    page.setDefaultNavigationTimeout(this.settings.navigationTimeoutMs);
    page.setDefaultTimeout(this.settings.defaultTimeoutMs);

    ensureNotAborted(signal);
    this.logger.info('Opening entry page', { url: this.settings.entryUrl });
    await page.goto(this.settings.entryUrl, {
      waitUntil: 'networkidle',
      timeout: this.settings.navigationTimeoutMs,
    });

    // The site answers some cold starts with a redirect to a 404 page
    const landedOn = page.url();
    if (landedOn.endsWith('404')) {
      throw new Error(`Entry page redirected to not-found URL: ${landedOn}`);
    }

    await delay(this.settings.settleDelayMs ?? 2000, signal);
    return { page, context, browser, attempt };
  }

  private async safeClose(resource: string, closeFn: () => Promise<void> | undefined): Promise<void> {
    try {
      await closeFn();
    } catch (error) {
      this.logger.warn(`Failed to close ${resource}`, { error: describeError(error) });
    }
  }
}
