/**
 * Fingerprints
 * Deterministic hashes used for URL and listing membership tests
 */

import { createHash } from 'crypto';
import { JobListing } from '../crawling/crawling.types';
import { normalizeUrl } from '../crawling/url-normalizer';

function sha1(value: string): string {
  return createHash('sha1').update(value, 'utf8').digest('hex');
}

function canonicalText(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Hash of the normalized URL; unparseable input is hashed as-is
 */
export function urlFingerprint(url: string): string {
  return sha1(normalizeUrl(url) ?? url);
}

/**
 * Business key of a listing: title, company and canonical link.
 * Listings found on different pages or sites share a key when these agree.
 */
export function listingBusinessKey(listing: Pick<JobListing, 'title' | 'company' | 'canonicalLink'>): string {
  const link = normalizeUrl(listing.canonicalLink) ?? listing.canonicalLink.trim();
  return [canonicalText(listing.title), canonicalText(listing.company), link].join('|');
}

export function contentFingerprint(listing: Pick<JobListing, 'title' | 'company' | 'canonicalLink'>): string {
  return sha1(listingBusinessKey(listing));
}
