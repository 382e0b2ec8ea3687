import type { Logger } from '../../utils/logger';
import type { CrawlIssue, CrawlIssueKind } from './errors';

/**
 * Collects the recoverable failures of one crawl and logs each one once.
 * Owned by the crawler; components only record into it.
 */
export class CrawlDiagnostics {
  private readonly logger: Logger;
  private readonly baseContext: Record<string, unknown>;
  private readonly recorded: CrawlIssue[] = [];

  constructor(logger: Logger, baseContext: Record<string, unknown> = {}) {
    this.logger = logger;
    this.baseContext = baseContext;
  }

  record(kind: CrawlIssueKind, message: string, context: Record<string, unknown> = {}): void {
    const issue: CrawlIssue = { kind, policy: 'recoverable', message, context };
    this.recorded.push(issue);
    this.logger.warn(message, { issue: kind, ...this.baseContext, ...context });
  }

  get issues(): readonly CrawlIssue[] {
    return this.recorded;
  }

  count(kind?: CrawlIssueKind): number {
    return kind === undefined
      ? this.recorded.length
      : this.recorded.filter((issue) => issue.kind === kind).length;
  }
}
