import Database from 'better-sqlite3';
import { createHash } from 'crypto';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import type { Logger } from '../utils/logger';
import { describeError } from '../utils/logger';
import { KeywordFilterSchema, type KeywordFilter } from '../types/SearchFilter';
import { ListingRecordSchema, type ListingRecord } from '../types/ListingRecord';

/**
 * What one cached search holds
 */
export const CachedSearchSchema = z.object({
  keywords: KeywordFilterSchema,
  properties: z.array(ListingRecordSchema),
  propertyCount: z.number().int().nonnegative(),
  timestamp: z.string(),
});

export type CachedSearch = z.infer<typeof CachedSearchSchema>;

export interface SearchResultCacheOptions {
  /** Seconds a stored search stays readable */
  ttlSeconds?: number;
  /** Milliseconds since epoch; injectable for tests */
  now?: () => number;
}

interface CacheRow {
  payload: string;
  expires_at: number;
}

/**
 * JSON with object keys sorted at every level, so equal filters hash equally
 */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Short-lived store of crawl results keyed by the search that produced them.
 * Rows carry an absolute expiry; expired rows are invisible and removed on read.
 */
export class SearchResultCache {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  /**
   * @param dbPath - SQLite file, or ':memory:'
   */
  constructor(dbPath: string, logger: Logger, options: SearchResultCacheOptions = {}) {
    this.logger = logger;
    this.ttlSeconds = options.ttlSeconds ?? 300;
    this.now = options.now ?? Date.now;

    if (dbPath !== ':memory:') {
      const dbDir = path.dirname(dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS search_results (
        cache_key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        property_count INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_search_results_expires_at ON search_results(expires_at);
    `);
  }

  /**
   * `search:<16 hex chars>:results`, from a SHA-256 of the key-sorted filter JSON
   */
  generateSearchKey(keywords: KeywordFilter): string {
    const hash = createHash('sha256').update(stableStringify(keywords), 'utf8').digest('hex').slice(0, 16);
    return `search:${hash}:results`;
  }

  /**
   * Stores the listings found for a search, replacing any earlier entry
   * @returns The cache key
   */
  store(keywords: KeywordFilter, listings: ListingRecord[]): string {
    const key = this.generateSearchKey(keywords);
    const createdAt = this.now();
    const entry: CachedSearch = {
      keywords,
      properties: listings,
      propertyCount: listings.length,
      timestamp: new Date(createdAt).toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO search_results (cache_key, payload, property_count, created_at, expires_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(cache_key) DO UPDATE SET
           payload = excluded.payload,
           property_count = excluded.property_count,
           created_at = excluded.created_at,
           expires_at = excluded.expires_at`
      )
      .run(key, JSON.stringify(entry), listings.length, createdAt, createdAt + this.ttlSeconds * 1000);

    this.logger.info('Stored search results', { key, propertyCount: listings.length, ttlSeconds: this.ttlSeconds });
    return key;
  }

  /**
   * @returns The stored search, or null when missing, expired or unreadable
   */
  get(key: string): CachedSearch | null {
    const row = this.readRow(key);
    if (!row) {
      this.logger.warn('Search results expired or missing', { key });
      return null;
    }

    try {
      const parsed = CachedSearchSchema.safeParse(JSON.parse(row.payload));
      if (!parsed.success) {
        this.logger.error('Cached search results are malformed', { key, issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.error('Failed to read cached search results', { key, error: describeError(error) });
      return null;
    }
  }

  exists(key: string): boolean {
    return this.readRow(key) !== null;
  }

  /**
   * Remaining lifetime in whole seconds, or -2 when the key is missing or expired
   */
  ttl(key: string): number {
    const row = this.readRow(key);
    if (!row) {
      return -2;
    }
    return Math.ceil((row.expires_at - this.now()) / 1000);
  }

  /**
   * @returns Number of rows removed
   */
  clearExpired(): number {
    const result = this.db.prepare('DELETE FROM search_results WHERE expires_at <= ?').run(this.now());
    if (result.changes > 0) {
      this.logger.info('Cleared expired search results', { count: result.changes });
    }
    return result.changes;
  }

  close(): void {
    this.db.close();
  }

  private readRow(key: string): CacheRow | null {
    const row = this.db
      .prepare<[string], CacheRow>('SELECT payload, expires_at FROM search_results WHERE cache_key = ?')
      .get(key);
    if (!row) {
      return null;
    }
    if (row.expires_at <= this.now()) {
      this.db.prepare('DELETE FROM search_results WHERE cache_key = ?').run(key);
      return null;
    }
    return row;
  }
}
