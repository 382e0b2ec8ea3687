import type { CrawlLocator, CrawlPage, WaitState } from './PageDriver';
import type { SelectorCandidate } from './NaverSelectors';
import { CrawlCancelledError } from './errors';
import { ensureNotAborted } from './timing';
import { err, ok, type Result } from '../../types/Result';
import { describeError } from '../../utils/logger';

export interface ResolvedSelector {
  selector: string;
  locator: CrawlLocator;
}

export interface SelectorAttempt {
  selector: string;
  error: string;
}

/**
 * No candidate reached the requested state
 */
export interface SelectorMiss {
  attempts: SelectorAttempt[];
}

/**
 * Tries each candidate in order and returns the first one whose first match
 * reaches `state` within the candidate's timeout.
 */
export async function resolveFirst(
  page: CrawlPage,
  candidates: readonly SelectorCandidate[],
  state: WaitState,
  signal?: AbortSignal
): Promise<Result<ResolvedSelector, SelectorMiss>> {
  const attempts: SelectorAttempt[] = [];

  for (const candidate of candidates) {
    ensureNotAborted(signal);
    const locator = page.locator(candidate.selector).first();
    try {
      await locator.waitFor({ state, timeout: candidate.timeoutMs });
      return ok({ selector: candidate.selector, locator });
    } catch (error) {
      if (error instanceof CrawlCancelledError) {
        throw error;
      }
      attempts.push({ selector: candidate.selector, error: describeError(error) });
    }
  }

  return err({ attempts });
}

/**
 * Clicks the first candidate that becomes visible and accepts the click.
 * A candidate whose click throws does not stop the chain.
 */
export async function clickFirst(
  page: CrawlPage,
  candidates: readonly SelectorCandidate[],
  signal?: AbortSignal
): Promise<Result<string, SelectorMiss>> {
  const attempts: SelectorAttempt[] = [];

  for (const candidate of candidates) {
    const resolved = await resolveFirst(page, [candidate], 'visible', signal);
    if (!resolved.ok) {
      attempts.push(...resolved.error.attempts);
      continue;
    }

    try {
      await resolved.value.locator.click({ timeout: candidate.timeoutMs });
      return ok(candidate.selector);
    } catch (error) {
      attempts.push({ selector: candidate.selector, error: describeError(error) });
    }
  }

  return err({ attempts });
}
