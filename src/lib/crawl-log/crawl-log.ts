/**
 * Crawl Log
 * Append-only record of fetch attempts, aggregated per site
 */

import { EventEmitter } from 'events';
import { CrawlOutcome, isSiteFailure } from '../scraping/errors';

export interface CrawlLogEntry {
  siteId: string;
  timestamp: number;
  outcome: CrawlOutcome;
  latencyMs: number;
  url?: string;
  statusCode?: number;
  identityId?: string;
}

export type OutcomeCounts = Record<CrawlOutcome, number>;

export interface SiteLogStats {
  siteId: string;
  outcomes: OutcomeCounts;
  total: number;
  windowTotal: number;
  windowErrorRate: number; // 0-1, site failures in the window
  averageLatencyMs: number;
}

export const CRAWL_LOG_ENTRY = 'entry';

function emptyCounts(): OutcomeCounts {
  return {
    [CrawlOutcome.SUCCESS]: 0,
    [CrawlOutcome.CLIENT_ERROR]: 0,
    [CrawlOutcome.SERVER_ERROR]: 0,
    [CrawlOutcome.TIMEOUT]: 0,
    [CrawlOutcome.BLOCKED]: 0,
    [CrawlOutcome.NETWORK_ERROR]: 0,
  };
}

interface SiteTotals {
  outcomes: OutcomeCounts;
  latencyTotal: number;
}

export class CrawlLog extends EventEmitter {
  private entries: CrawlLogEntry[] = [];
  private readonly totals: Map<string, SiteTotals> = new Map();

  /**
   * @param maxEntries - entries retained for windowed queries; totals are kept forever
   */
  constructor(
    private readonly maxEntries: number = 10000,
    private readonly windowMs: number = 60000
  ) {
    super();
  }

  append(entry: CrawlLogEntry): void {
    const frozen = Object.freeze({ ...entry });
    this.entries.push(frozen);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    const totals = this.totals.get(entry.siteId) ?? { outcomes: emptyCounts(), latencyTotal: 0 };
    totals.outcomes[entry.outcome]++;
    totals.latencyTotal += entry.latencyMs;
    this.totals.set(entry.siteId, totals);

    this.emit(CRAWL_LOG_ENTRY, frozen);
  }

  onEntry(listener: (entry: CrawlLogEntry) => void): () => void {
    this.on(CRAWL_LOG_ENTRY, listener);
    return () => {
      this.off(CRAWL_LOG_ENTRY, listener);
    };
  }

  /**
   * Retained entries, oldest first
   */
  getEntries(siteId?: string): CrawlLogEntry[] {
    return siteId === undefined ? [...this.entries] : this.entries.filter((entry) => entry.siteId === siteId);
  }

  getSiteStats(siteId: string, now: number = Date.now()): SiteLogStats {
    const totals = this.totals.get(siteId) ?? { outcomes: emptyCounts(), latencyTotal: 0 };
    const total = Object.values(totals.outcomes).reduce((sum, count) => sum + count, 0);

    const windowStart = now - this.windowMs;
    const windowEntries = this.entries.filter((entry) => entry.siteId === siteId && entry.timestamp > windowStart);
    const windowFailures = windowEntries.filter((entry) => isSiteFailure(entry.outcome)).length;

    return {
      siteId,
      outcomes: { ...totals.outcomes },
      total,
      windowTotal: windowEntries.length,
      windowErrorRate: windowEntries.length > 0 ? windowFailures / windowEntries.length : 0,
      averageLatencyMs: total > 0 ? totals.latencyTotal / total : 0,
    };
  }

  clear(): void {
    this.entries = [];
    this.totals.clear();
  }
}
