#!/usr/bin/env node
import * as fs from 'fs';
import { loadConfig } from './utils/validators';
import { createLogger, describeError, type Logger } from './utils/logger';
import type { CrawlerConfig } from './types/CrawlerConfig';
import {
  KeywordFilterSchema,
  describeIssues,
  toSearchFilter,
  type KeywordFilter,
  type SearchFilterInput,
} from './types/SearchFilter';
import { err, ok, type Result } from './types/Result';
import { BrowserSessionManager } from './realestate/naver/BrowserSessionManager';
import { NaverCrawler, type CrawlOptions, type CrawlOutcome, type CrawlReport } from './realestate/naver/NaverCrawler';
import { InvalidFilterError } from './realestate/naver/errors';
import { SearchResultCache } from './database/SearchResultCache';
import { DataExporter } from './export/DataExporter';

const USAGE = 'Usage: naver-land-crawl <filter.json | inline JSON filter>';

export interface ReportingCrawler {
  crawlWithReport(filter: SearchFilterInput, options?: CrawlOptions): Promise<CrawlReport>;
}

/**
 * Collaborators of the command, replaceable in tests
 */
export interface CliDependencies {
  config?: CrawlerConfig;
  logger?: Logger;
  createCrawler?: (config: CrawlerConfig, logger: Logger) => ReportingCrawler;
  createCache?: (config: CrawlerConfig, logger: Logger) => SearchResultCache;
  createExporter?: (config: CrawlerConfig, logger: Logger) => DataExporter;
  print?: (line: string) => void;
}

const EXIT_CODES: Record<CrawlOutcome, number> = {
  completed: 0,
  degraded: 0,
  'address-not-found': 0,
  cancelled: 0,
  'session-failed': 2,
  failed: 2,
};

/**
 * Reads the keyword filter from inline JSON (argument starting with "{") or a JSON file
 */
export function readKeywordFilter(arg: string): Result<KeywordFilter, string[]> {
  let raw: string;
  if (arg.trim().startsWith('{')) {
    raw = arg;
  } else {
    try {
      raw = fs.readFileSync(arg, 'utf-8');
    } catch (error) {
      return err([`Cannot read filter file ${arg}: ${describeError(error)}`]);
    }
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    return err([`Filter is not valid JSON: ${describeError(error)}`]);
  }

  const parsed = KeywordFilterSchema.safeParse(payload);
  return parsed.success ? ok(parsed.data) : err(describeIssues(parsed.error.issues));
}

function defaultCrawler(config: CrawlerConfig, logger: Logger): ReportingCrawler {
  return new NaverCrawler(new BrowserSessionManager(config, logger), logger);
}

function defaultCache(config: CrawlerConfig, logger: Logger): SearchResultCache {
  return new SearchResultCache(config.cacheDbPath, logger, { ttlSeconds: config.cacheTtlSeconds });
}

function defaultExporter(config: CrawlerConfig, logger: Logger): DataExporter {
  return new DataExporter(config.outputDir, logger);
}

/**
 * Runs one crawl for the filter named on the command line.
 * Exit codes: 0 done (results may be empty), 1 bad filter or configuration, 2 crawl failed.
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  const [filterArg] = args;
  if (!filterArg) {
    print(USAGE);
    return 1;
  }

  let config: CrawlerConfig;
  try {
    config = deps.config ?? loadConfig();
  } catch (error) {
    print(describeError(error));
    return 1;
  }

  const logger = deps.logger ?? createLogger('naver-land-crawler', { level: config.logLevel });

  const keywords = readKeywordFilter(filterArg);
  if (!keywords.ok) {
    logger.error('Invalid search filter', { issues: keywords.error });
    print(`Invalid search filter:\n  ${keywords.error.join('\n  ')}`);
    return 1;
  }

  const crawler = (deps.createCrawler ?? defaultCrawler)(config, logger);
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupt received; stopping crawl');
    controller.abort('SIGINT');
  };
  process.once('SIGINT', onSigint);

  let report: CrawlReport;
  try {
    report = await crawler.crawlWithReport(toSearchFilter(keywords.value), { signal: controller.signal });
  } catch (error) {
    if (error instanceof InvalidFilterError) {
      print(`Invalid search filter:\n  ${error.issues.join('\n  ')}`);
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
  }

  const cache = (deps.createCache ?? defaultCache)(config, logger);
  let key: string;
  try {
    cache.clearExpired();
    key = cache.store(keywords.value, report.listings);
  } finally {
    cache.close();
  }

  const exporter = (deps.createExporter ?? defaultExporter)(config, logger);
  const files = await exporter.exportAll(report.listings, `listings-${key.split(':')[1]}`);

  print('=== Crawl Results ===');
  print(`Address: ${keywords.value.address}`);
  print(`Outcome: ${report.outcome}`);
  print(`Listings: ${report.listings.length}`);
  print(`Issues: ${report.issues.length}`);
  print(`Cache key: ${key}`);
  print(`JSON: ${files.json}`);
  print(`CSV: ${files.csv}`);

  return EXIT_CODES[report.outcome];
}

export { NaverCrawler } from './realestate/naver/NaverCrawler';
export type { CrawlOutcome, CrawlReport, CrawlOptions } from './realestate/naver/NaverCrawler';
export { BrowserSessionManager } from './realestate/naver/BrowserSessionManager';
export {
  InvalidFilterError,
  SessionInitError,
  AddressNotFoundError,
  CrawlCancelledError,
} from './realestate/naver/errors';
export * from './types/SearchFilter';
export * from './types/ListingRecord';
export { SearchResultCache } from './database/SearchResultCache';
export { DataExporter } from './export/DataExporter';

// Run if executed directly
if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error:', describeError(error));
      process.exitCode = 1;
    }
  );
}
