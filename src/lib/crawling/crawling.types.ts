/**
 * Crawling Types
 * Type definitions shared by the frontier, workers and router
 */

/**
 * A unit of fetch work.
 */
export interface FetchTask {
  id: string;
  url: string;
  siteId: string;

  /**
   * Link distance from a seed (0 = seed page)
   */
  depth: number;

  /**
   * Tie-breaker within a depth, lower first
   */
  priority: number;
  enqueueTime: number;

  /**
   * Transient failures so far
   */
  attemptCount: number;

  /**
   * Block signals so far, budgeted separately from attemptCount
   */
  blockedCount: number;

  /**
   * Earliest time (epoch ms) the task may be dispatched again
   */
  notBefore: number;
  parentUrl?: string;
  pageOf?: PageRef;
}

/**
 * Place of a query-parameter page in its seed's series
 */
export interface PageRef {
  seedUrl: string;
  page: number;
}

export interface TaskInput {
  url: string;
  siteId: string;
  depth: number;
  priority?: number;
  parentUrl?: string;
  pageOf?: PageRef;
}

export interface RateLimit {
  requests: number;
  intervalMs: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  maxBlockedAttempts: number;
}

export type PaginationStrategy =
  | { type: 'none' }
  | { type: 'links' }
  | { type: 'query_param'; param: string; start: number; maxPages: number };

export interface SearchQuery {
  param: string;
  value: string;
}

export interface SiteConfig {
  siteId: string;
  seedUrls: string[];

  /**
   * Search term set on every seed URL
   */
  query?: SearchQuery;
  rateLimit: RateLimit;
  maxConcurrency: number;
  parserId: string;
  maxDepth: number;
  retryPolicy: RetryPolicy;
  pagination: PaginationStrategy;
  allowedDomains: string[];
  blockedPatterns: string[];
  timeoutMs?: number;
}

export interface JobListing {
  readonly title: string;
  readonly canonicalLink: string;
  readonly company: string;
  readonly location: string;
  readonly postedDate: string;
  readonly salary?: string;
  readonly logoUrl?: string;
  readonly skills: readonly string[];
  readonly sourceSite: string;
  readonly fetchTime: number;
}

/**
 * Build an immutable listing
 */
export function createJobListing(fields: {
  title: string;
  canonicalLink: string;
  company: string;
  location: string;
  postedDate: string;
  salary?: string;
  logoUrl?: string;
  skills?: readonly string[];
  sourceSite: string;
  fetchTime: number;
}): JobListing {
  const listing: JobListing = {
    title: fields.title,
    canonicalLink: fields.canonicalLink,
    company: fields.company,
    location: fields.location,
    postedDate: fields.postedDate,
    sourceSite: fields.sourceSite,
    fetchTime: fields.fetchTime,
    skills: Object.freeze([...(fields.skills ?? [])]),
    ...(fields.salary !== undefined ? { salary: fields.salary } : {}),
    ...(fields.logoUrl !== undefined ? { logoUrl: fields.logoUrl } : {}),
  };
  return Object.freeze(listing);
}

/**
 * Fetched page handed to a parser
 */
export interface RawPage {
  url: string;
  finalUrl: string;
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  fetchTime: number;
  latencyMs: number;
}

export interface ParseResult {
  listings: JobListing[];
  discoveredLinks: string[];
}

/**
 * Why a task left the frontier without producing a page
 */
export type DropReason = 'retries_exhausted' | 'blocked_exhausted' | 'permanent' | 'parse_error' | 'no_parser';

export interface RouterStats {
  linksOffered: number;
  linksFiltered: number;
  linksAdmitted: number;
  listingsSeen: number;
  listingsDuplicate: number;
  listingsWritten: number;
  listingsLost: number;
  sinkRetries: number;
  pagesCancelled: number; // later query-parameter pages skipped after an empty page
}

export interface PipelineTotals {
  fetched: number;
  parsed: number;
  retried: number;
  exhausted: number;
  dropped: Record<DropReason, number>;
}
