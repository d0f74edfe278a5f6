/**
 * Result Router
 * Sends discovered links back to the frontier and new listings to the sink
 */

import { FetchTask, JobListing, PageRef, ParseResult, RawPage, RouterStats, SiteConfig } from '../../lib/crawling/crawling.types';
import { Frontier } from '../../lib/crawling/frontier';
import { followsLinks } from '../../lib/crawling/pagination';
import { resolveUrl, shouldFollowLink } from '../../lib/crawling/url-normalizer';
import { DeduplicationIndex } from '../../lib/dedup/dedup.index';
import { contentFingerprint } from '../../lib/dedup/fingerprint';
import { logger } from '../../lib/logger';
import { retryWithBackoff, Sleep } from '../../lib/utils/retry';
import { ListingSink } from '../listings/listing.types';

export interface ResultRouterOptions {
  sinkMaxAttempts: number;
  sinkBackoffBaseMs: number;
  sleep?: Sleep;
}

export interface RouteSummary {
  linksAdmitted: number;
  listingsWritten: number;
  listingsDuplicate: number;
  listingsLost: number;
}

function emptyStats(): RouterStats {
  return {
    linksOffered: 0,
    linksFiltered: 0,
    linksAdmitted: 0,
    listingsSeen: 0,
    listingsDuplicate: 0,
    listingsWritten: 0,
    listingsLost: 0,
    sinkRetries: 0,
    pagesCancelled: 0,
  };
}

export class ResultRouter {
  private stats: RouterStats = emptyStats();

  constructor(
    private readonly frontier: Frontier,
    private readonly dedup: DeduplicationIndex,
    private readonly sink: ListingSink,
    private readonly options: ResultRouterOptions
  ) {}

  async route(task: FetchTask, site: SiteConfig, page: RawPage, result: ParseResult): Promise<RouteSummary> {
    const linksAdmitted = await this.routeLinks(task, site, page, result.discoveredLinks);

    let listingsWritten = 0;
    let listingsDuplicate = 0;
    let listingsLost = 0;

    for (const listing of result.listings) {
      this.stats.listingsSeen++;
      const isNew = await this.markSeen(listing);
      if (isNew === null) {
        listingsLost++;
        this.stats.listingsLost++;
        continue;
      }
      if (!isNew) {
        listingsDuplicate++;
        this.stats.listingsDuplicate++;
        continue;
      }

      if (await this.write(listing)) {
        listingsWritten++;
        this.stats.listingsWritten++;
      } else {
        listingsLost++;
        this.stats.listingsLost++;
      }
    }

    if (result.listings.length === 0 && task.pageOf) {
      this.stopPagination(site, task.pageOf);
    }

    return { linksAdmitted, listingsWritten, listingsDuplicate, listingsLost };
  }

  getStats(): RouterStats {
    return { ...this.stats };
  }

  /**
   * An empty page ends its seed's series; the pages after it are not fetched
   */
  private stopPagination(site: SiteConfig, pageOf: PageRef): void {
    const cancelled = this.frontier.cancelPagesAfter(site.siteId, pageOf.seedUrl, pageOf.page);
    if (cancelled > 0) {
      this.stats.pagesCancelled += cancelled;
      logger.info(`No listings on page ${pageOf.page} of ${pageOf.seedUrl}, skipping ${cancelled} later page(s)`);
    }
  }

  private async routeLinks(task: FetchTask, site: SiteConfig, page: RawPage, links: string[]): Promise<number> {
    if (!followsLinks(site) || task.depth + 1 > site.maxDepth) {
      return 0;
    }

    const filter = { allowedDomains: site.allowedDomains, blockedPatterns: site.blockedPatterns };
    const candidates = new Set<string>();
    for (const link of links) {
      this.stats.linksOffered++;
      const absolute = resolveUrl(link, page.finalUrl);
      if (!absolute || !shouldFollowLink(absolute, filter)) {
        this.stats.linksFiltered++;
        continue;
      }
      candidates.add(absolute);
    }

    let admitted = 0;
    for (const url of candidates) {
      try {
        const outcome = await this.frontier.enqueue({
          url,
          siteId: site.siteId,
          depth: task.depth + 1,
          parentUrl: task.url,
        });
        if (outcome.admitted) {
          admitted++;
        }
      } catch (error: unknown) {
        logger.error(`Link ${url} from ${task.url} not enqueued:`, error);
      }
    }
    this.stats.linksAdmitted += admitted;
    return admitted;
  }

  /**
   * Mark the listing's fingerprint, retried like a sink write. Null when the
   * dedup store kept failing; the listing is then lost.
   */
  private async markSeen(listing: JobListing): Promise<boolean | null> {
    try {
      return await retryWithBackoff(() => this.dedup.markSeenContent(contentFingerprint(listing)), {
        maxAttempts: this.options.sinkMaxAttempts,
        baseDelay: this.options.sinkBackoffBaseMs,
        sleep: this.options.sleep,
        onRetry: (attempt, delay, error) => {
          logger.warn(`Dedup check failed (attempt ${attempt}), retrying in ${delay}ms:`, error);
        },
      });
    } catch (error: unknown) {
      logger.error(`Listing lost, dedup check failed for ${listing.canonicalLink}:`, error);
      return null;
    }
  }

  /**
   * Write with retries. A listing that still fails is a terminal loss; its
   * fingerprint stays marked, so it is not retried on a later page either.
   */
  private async write(listing: JobListing): Promise<boolean> {
    try {
      await retryWithBackoff(() => this.sink.write(listing), {
        maxAttempts: this.options.sinkMaxAttempts,
        baseDelay: this.options.sinkBackoffBaseMs,
        sleep: this.options.sleep,
        onRetry: (attempt, delay, error) => {
          this.stats.sinkRetries++;
          logger.warn(`Sink ${this.sink.name} write failed (attempt ${attempt}), retrying in ${delay}ms:`, error);
        },
      });
      return true;
    } catch (error: unknown) {
      logger.error(`Listing lost, sink ${this.sink.name} gave up on ${listing.canonicalLink}:`, error);
      return false;
    }
  }
}
