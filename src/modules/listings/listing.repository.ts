/**
 * Listing Repository
 * Data access for stored listings, and the MongoDB sink built on it
 */

import { JobListing } from '../../lib/crawling/crawling.types';
import { contentFingerprint } from '../../lib/dedup/fingerprint';
import { ListingModel } from './listing.model';
import { IListing, ListingSink } from './listing.types';

export interface ListingStore {
  upsert(listing: IListing): Promise<void>;
}

export class ListingRepository implements ListingStore {
  /**
   * Insert or refresh a listing by its fingerprint
   */
  async upsert(listing: IListing): Promise<void> {
    const { fingerprint, ...fields } = listing;
    await ListingModel.updateOne({ fingerprint }, { $set: fields }, { upsert: true });
  }
}

export function toListingDocument(listing: JobListing): IListing {
  return {
    fingerprint: contentFingerprint(listing),
    title: listing.title,
    link: listing.canonicalLink,
    company: listing.company,
    location: listing.location,
    postedDate: listing.postedDate,
    skills: [...listing.skills],
    sourceSite: listing.sourceSite,
    fetchedAt: new Date(listing.fetchTime),
    ...(listing.salary !== undefined ? { salary: listing.salary } : {}),
    ...(listing.logoUrl !== undefined ? { logoUrl: listing.logoUrl } : {}),
  };
}

export class MongoListingSink implements ListingSink {
  readonly name = 'mongo';

  constructor(
    private readonly store: ListingStore = new ListingRepository(),
    private readonly onClose?: () => Promise<void>
  ) {}

  async write(listing: JobListing): Promise<void> {
    await this.store.upsert(toListingDocument(listing));
  }

  async close(): Promise<void> {
    if (this.onClose) {
      await this.onClose();
    }
  }
}
