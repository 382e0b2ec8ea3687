import { CrawlCancelledError } from './errors';

/**
 * Every wait the crawler performs, in milliseconds. None is unbounded.
 */
export interface CrawlTimings {
  autocompleteDelayMs: number;
  suggestionTimeoutMs: number;
  networkIdleTimeoutMs: number;
  postNavigationDelayMs: number;
  filterPanelSettleMs: number;
  toggleSettleMs: number;
  actionTimeoutMs: number;
  applySettleMs: number;
  markerVisibleTimeoutMs: number;
  markerScrollSettleMs: number;
  markerClickTimeoutMs: number;
  panelIdleTimeoutMs: number;
  panelAnimationMs: number;
  itemReadTimeoutMs: number;
}

export const DEFAULT_TIMINGS: CrawlTimings = {
  autocompleteDelayMs: 2000,
  suggestionTimeoutMs: 10000,
  networkIdleTimeoutMs: 30000,
  postNavigationDelayMs: 2000,
  filterPanelSettleMs: 3000,
  toggleSettleMs: 500,
  actionTimeoutMs: 5000,
  applySettleMs: 2000,
  markerVisibleTimeoutMs: 5000,
  markerScrollSettleMs: 1000,
  markerClickTimeoutMs: 10000,
  panelIdleTimeoutMs: 20000,
  panelAnimationMs: 2000,
  itemReadTimeoutMs: 2000,
};

export function resolveTimings(overrides: Partial<CrawlTimings> = {}): CrawlTimings {
  return { ...DEFAULT_TIMINGS, ...overrides };
}

export function ensureNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CrawlCancelledError(signal.reason);
  }
}

/**
 * Waits `ms`, rejecting with CrawlCancelledError as soon as the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CrawlCancelledError(signal.reason));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CrawlCancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
