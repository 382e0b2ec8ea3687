import { describe, it, expect, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { readKeywordFilter, runCli, type ReportingCrawler } from '../../../src/index';
import type { CrawlOptions, CrawlReport } from '../../../src/realestate/naver/NaverCrawler';
import { InvalidFilterError } from '../../../src/realestate/naver/errors';
import { CrawlerConfigSchema, type CrawlerConfig } from '../../../src/types/CrawlerConfig';
import type { SearchFilterInput } from '../../../src/types/SearchFilter';
import type { ListingRecord } from '../../../src/types/ListingRecord';
import { DataExporter } from '../../../src/export/DataExporter';
import { createTestLogger, type RecordingLogger } from '../../fixtures/naverFixtures';

const FILTER_JSON = '{"address":"서울시 강남구","transaction_type":["매매"],"building_type":["아파트"]}';

const LISTING: ListingRecord = {
  listingId: '2412345678',
  address: '서울시 강남구',
  ownerType: '중개사',
  transactionType: '매매',
  price: 550_000_000,
  buildingType: '아파트',
  areaPyeong: 25.64,
  floorInfo: '5/15층',
  direction: '남향',
  tags: [],
  updatedDate: '2024-03-15',
  detailUrl: '',
  imageUrls: [],
  description: '',
};

class FakeCrawler implements ReportingCrawler {
  readonly calls: Array<{ filter: SearchFilterInput; options?: CrawlOptions }> = [];
  report: CrawlReport = { listings: [LISTING], outcome: 'completed', issues: [] };
  error?: Error;

  async crawlWithReport(filter: SearchFilterInput, options?: CrawlOptions): Promise<CrawlReport> {
    this.calls.push({ filter, options });
    if (this.error) {
      throw this.error;
    }
    return this.report;
  }
}

describe('readKeywordFilter', () => {
  it('should parse an inline JSON filter', () => {
    const result = readKeywordFilter(FILTER_JSON);

    expect(result).toEqual({
      ok: true,
      value: { address: '서울시 강남구', transaction_type: ['매매'], building_type: ['아파트'] },
    });
  });

  it('should read a filter file', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-filter-')), 'filter.json');
    fs.writeFileSync(file, FILTER_JSON, 'utf-8');

    expect(readKeywordFilter(file).ok).toBe(true);
  });

  it('should report a missing file', () => {
    const result = readKeywordFilter('/nonexistent/filter.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual([expect.stringMatching(/^Cannot read filter file \/nonexistent\/filter\.json: /)]);
    }
  });

  it('should report malformed JSON', () => {
    const result = readKeywordFilter('{not json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual([expect.stringMatching(/^Filter is not valid JSON: /)]);
    }
  });

  it('should report schema violations by path', () => {
    const result = readKeywordFilter('{"address":"강남구","transaction_type":["매매"],"building_type":["아파트"]}');

    expect(result).toEqual({
      ok: false,
      error: ['address: address needs at least a province and a district token'],
    });
  });
});

describe('runCli', () => {
  let outputDir: string;
  let config: CrawlerConfig;
  let logger: RecordingLogger;
  let crawler: FakeCrawler;
  let lines: string[];

  function run(args: string[]): Promise<number> {
    return runCli(args, {
      config,
      logger,
      createCrawler: () => crawler,
      createExporter: (_config, exporterLogger) =>
        new DataExporter(outputDir, exporterLogger, () => new Date('2024-03-15T09:30:00.000Z')),
      print: (line) => lines.push(line),
    });
  }

  beforeEach(() => {
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-cli-')), 'output');
    config = CrawlerConfigSchema.parse({ outputDir, cacheDbPath: ':memory:' });
    logger = createTestLogger();
    crawler = new FakeCrawler();
    lines = [];
  });

  it('should crawl, cache, export and summarize', async () => {
    const code = await run([FILTER_JSON]);

    expect(code).toBe(0);
    expect(crawler.calls).toHaveLength(1);
    expect(crawler.calls[0].filter).toMatchObject({
      address: '서울시 강남구',
      transactionTypes: ['매매'],
      buildingTypes: ['아파트'],
    });
    expect(crawler.calls[0].options?.signal).toBeInstanceOf(AbortSignal);
    expect(lines).toEqual([
      '=== Crawl Results ===',
      'Address: 서울시 강남구',
      'Outcome: completed',
      'Listings: 1',
      'Issues: 0',
      'Cache key: search:3950efd2fa6860ed:results',
      `JSON: ${path.join(outputDir, 'listings-3950efd2fa6860ed-2024-03-15T09-30-00-000Z.json')}`,
      `CSV: ${path.join(outputDir, 'listings-3950efd2fa6860ed-2024-03-15T09-30-00-000Z.csv')}`,
    ]);
    const exported: unknown = JSON.parse(
      fs.readFileSync(path.join(outputDir, 'listings-3950efd2fa6860ed-2024-03-15T09-30-00-000Z.json'), 'utf-8')
    );
    expect(exported).toEqual([LISTING]);
  });

  it('should print usage without an argument', async () => {
    const code = await run([]);

    expect(code).toBe(1);
    expect(lines).toEqual(['Usage: naver-land-crawl <filter.json | inline JSON filter>']);
    expect(crawler.calls).toHaveLength(0);
  });

  it('should reject an invalid filter before crawling', async () => {
    const code = await run(['{"address":"강남구","transaction_type":["매매"],"building_type":["아파트"]}']);

    expect(code).toBe(1);
    expect(lines).toEqual(['Invalid search filter:\n  address: address needs at least a province and a district token']);
    expect(crawler.calls).toHaveLength(0);
  });

  it('should exit with 1 when the crawler rejects the filter', async () => {
    crawler.error = new InvalidFilterError(['buildingTypes: At least one building type is required']);

    const code = await run([FILTER_JSON]);

    expect(code).toBe(1);
    expect(lines).toEqual(['Invalid search filter:\n  buildingTypes: At least one building type is required']);
  });

  it('should exit with 0 when the address is not found', async () => {
    crawler.report = { listings: [], outcome: 'address-not-found', issues: [], error: 'not found' };

    const code = await run([FILTER_JSON]);

    expect(code).toBe(0);
    expect(lines).toContain('Listings: 0');
  });

  it('should exit with 2 when no session could be started', async () => {
    crawler.report = { listings: [], outcome: 'session-failed', issues: [], error: 'browser crashed' };

    const code = await run([FILTER_JSON]);

    expect(code).toBe(2);
    expect(lines).toContain('Outcome: session-failed');
  });
});
