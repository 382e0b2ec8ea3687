import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import { describeError } from '../utils/logger';
import type { ListingRecord } from '../types/ListingRecord';

const CSV_COLUMNS = [
  'listingId',
  'address',
  'ownerType',
  'transactionType',
  'price',
  'buildingType',
  'areaPyeong',
  'floorInfo',
  'direction',
  'tags',
  'updatedDate',
  'detailUrl',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function csvValue(listing: ListingRecord, column: CsvColumn): string {
  switch (column) {
    case 'tags':
      return listing.tags.join('|');
    case 'price':
    case 'areaPyeong':
      return String(listing[column]);
    default:
      return listing[column];
  }
}

/**
 * Exports listing records to JSON and CSV files
 */
export class DataExporter {
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /**
   * @param outputDir - Directory to save exported files, created when missing
   * @param now - Clock used for the file name timestamp
   */
  constructor(outputDir: string, logger: Logger, now: () => Date = () => new Date()) {
    this.outputDir = outputDir;
    this.logger = logger;
    this.now = now;

    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
      this.logger.info('Created output directory', { outputDir });
    }
  }

  async exportToJson(listings: ListingRecord[], filename: string): Promise<string> {
    const filePath = this.filePathFor(filename, 'json');
    try {
      await fs.promises.writeFile(filePath, JSON.stringify(listings, null, 2), 'utf-8');
      this.logger.info('Exported listings to JSON', { filePath, listingCount: listings.length });
      return filePath;
    } catch (error) {
      this.logger.error('Failed to export to JSON', { error: describeError(error), filename });
      throw error;
    }
  }

  /**
   * Writes a header row plus one row per listing. Tags are joined with "|".
   */
  async exportToCsv(listings: ListingRecord[], filename: string): Promise<string> {
    const filePath = this.filePathFor(filename, 'csv');
    try {
      const lines = [CSV_COLUMNS.join(',')];
      for (const listing of listings) {
        lines.push(CSV_COLUMNS.map((column) => this.escapeCsvField(csvValue(listing, column))).join(','));
      }

      // BOM so spreadsheet tools detect UTF-8 Korean text
      await fs.promises.writeFile(filePath, '\uFEFF' + lines.join('\r\n'), 'utf-8');

      if (listings.length === 0) {
        this.logger.warn('No listings to export to CSV', { filePath });
      } else {
        this.logger.info('Exported listings to CSV', { filePath, listingCount: listings.length });
      }
      return filePath;
    } catch (error) {
      this.logger.error('Failed to export to CSV', { error: describeError(error), filename });
      throw error;
    }
  }

  async exportAll(listings: ListingRecord[], filename: string): Promise<{ json: string; csv: string }> {
    const jsonPath = await this.exportToJson(listings, filename);
    const csvPath = await this.exportToCsv(listings, filename);
    return { json: jsonPath, csv: csvPath };
  }

  private filePathFor(filename: string, extension: 'json' | 'csv'): string {
    const timestamp = this.now().toISOString().replace(/[:.]/g, '-');
    return path.join(this.outputDir, `${filename}-${timestamp}.${extension}`);
  }

  /**
   * Quotes a field containing a comma, quote or line break; doubles inner quotes
   */
  private escapeCsvField(field: string): string {
    // Zero-width characters and BOMs copied from the page
    const str = field.trim().replace(/[\u200B-\u200D\uFEFF]/g, '');

    if (/[",\r\n]/.test(str)) {
      return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
  }
}
