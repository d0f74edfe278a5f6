/**
 * Listing Storage Types
 */

import { JobListing } from '../../lib/crawling/crawling.types';

/**
 * Destination for deduplicated listings. A rejected write is retried by the
 * result router; the sink itself does not retry.
 */
export interface ListingSink {
  readonly name: string;
  write(listing: JobListing): Promise<void>;
  close(): Promise<void>;
}

export enum SinkType {
  MEMORY = 'memory',
  CSV = 'csv',
  MONGO = 'mongo',
}

/**
 * Stored form of a listing, keyed by content fingerprint
 */
export interface IListing {
  fingerprint: string;
  title: string;
  link: string;
  company: string;
  location: string;
  postedDate: string;
  salary?: string;
  logoUrl?: string;
  skills: string[];
  sourceSite: string;
  fetchedAt: Date;
  createdAt?: Date;
  updatedAt?: Date;
}
