/**
 * Listing Sinks
 * In-memory and CSV destinations, and selection by configuration
 */

import { appendFile, mkdir, stat } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { JobListing } from '../../lib/crawling/crawling.types';
import { logger } from '../../lib/logger';
import { ConfigError, errorCode } from '../../lib/scraping/errors';
import { connectDB, disconnectDB } from '../../lib/mongo';
import { ListingRepository, MongoListingSink } from './listing.repository';
import { ListingSink, SinkType } from './listing.types';

export class MemoryListingSink implements ListingSink {
  readonly name = 'memory';
  readonly listings: JobListing[] = [];

  async write(listing: JobListing): Promise<void> {
    this.listings.push(listing);
  }

  async close(): Promise<void> {}
}

export const CSV_COLUMNS = ['title', 'link', 'company', 'location', 'posted_date', 'logo_url', 'skills'];

export function toCsvRow(listing: JobListing): string[] {
  return [
    listing.title,
    listing.canonicalLink,
    listing.company,
    listing.location,
    listing.postedDate,
    listing.logoUrl ?? '',
    listing.skills.join(', '),
  ];
}

async function isEmptyOrMissing(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).size === 0;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return true;
    }
    throw error;
  }
}

/**
 * Appends one row per listing; the header is written when the file is new
 */
export class CsvListingSink implements ListingSink {
  readonly name = 'csv';
  private headerChecked: boolean = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  write(listing: JobListing): Promise<void> {
    // Appends are chained so rows never interleave with the header
    const next = this.pending.then(() => this.append(listing));
    this.pending = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    await this.pending;
  }

  private async append(listing: JobListing): Promise<void> {
    let content = '';
    if (!this.headerChecked) {
      await mkdir(dirname(this.filePath), { recursive: true });
      if (await isEmptyOrMissing(this.filePath)) {
        content += stringify([CSV_COLUMNS]);
      }
      this.headerChecked = true;
    }
    content += stringify([toCsvRow(listing)]);
    await appendFile(this.filePath, content, 'utf-8');
  }
}

export interface SinkOptions {
  type: string;
  csvPath: string;
  mongoUri: string;
}

export async function createListingSink(options: SinkOptions): Promise<ListingSink> {
  switch (options.type) {
    case SinkType.MEMORY:
      return new MemoryListingSink();
    case SinkType.CSV:
      logger.info(`Writing listings to ${options.csvPath}`);
      return new CsvListingSink(options.csvPath);
    case SinkType.MONGO:
      await connectDB(options.mongoUri);
      return new MongoListingSink(new ListingRepository(), disconnectDB);
    default:
      throw new ConfigError(`Unknown sink type: ${options.type}`, [`expected one of ${Object.values(SinkType).join(', ')}`]);
  }
}
