/**
 * The slice of Playwright's Page/Locator API the crawler drives.
 * Playwright's own objects satisfy these interfaces structurally, and tests
 * provide in-process implementations.
 */

export type WaitState = 'attached' | 'detached' | 'visible' | 'hidden';
export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface CrawlLocator {
  first(): CrawlLocator;
  nth(index: number): CrawlLocator;
  count(): Promise<number>;
  all(): Promise<CrawlLocator[]>;
  locator(selector: string): CrawlLocator;
  filter(options: { hasText?: string }): CrawlLocator;
  getByRole(role: 'link' | 'listitem', options?: { name?: string; exact?: boolean }): CrawlLocator;
  waitFor(options?: { state?: WaitState; timeout?: number }): Promise<void>;
  click(options?: { force?: boolean; timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  press(key: string, options?: { timeout?: number }): Promise<void>;
  getAttribute(name: string, options?: { timeout?: number }): Promise<string | null>;
  scrollIntoViewIfNeeded(options?: { timeout?: number }): Promise<void>;
  innerHTML(options?: { timeout?: number }): Promise<string>;
}

export interface CrawlPage {
  goto(
    url: string,
    options?: { waitUntil?: LoadState | 'commit'; timeout?: number }
  ): Promise<unknown>;
  url(): string;
  title(): Promise<string>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  locator(selector: string): CrawlLocator;
  getByRole(role: 'link' | 'listitem', options?: { name?: string; exact?: boolean }): CrawlLocator;
  setDefaultTimeout(timeout: number): void;
  setDefaultNavigationTimeout(timeout: number): void;
  close(): Promise<void>;
}
