/**
 * Metrics
 * Periodic pipeline snapshots and where they are exported
 */

import { CircuitBreakerStats, CircuitState } from '../circuit-breaker/circuit-breaker.types';
import { PipelineTotals, RouterStats } from '../crawling/crawling.types';
import { DedupStats } from '../dedup/dedup.types';
import { logger } from '../logger';
import { IdentitySnapshot, IdentityStatus } from '../proxy/identity.types';
import { OutcomeCounts } from './crawl-log';

export interface SiteMetrics {
  siteId: string;
  outcomes: OutcomeCounts;
  errorRate: number;
  queueDepth: number;
  inFlight: number;
  breakerState: CircuitState;
  effectiveIntervalMs: number;
  backoffMultiplier: number;
  paused: boolean;
}

export interface MetricsSnapshot {
  timestamp: number;
  sites: SiteMetrics[];
  breakers: Record<string, CircuitBreakerStats>;
  identities: IdentitySnapshot[];
  router: RouterStats;
  dedup: DedupStats;
  totals: PipelineTotals;
}

export interface ObservabilitySink {
  export(snapshot: MetricsSnapshot): void | Promise<void>;
}

/**
 * Writes a one-line summary per site through the shared logger
 */
export class LoggerObservabilitySink implements ObservabilitySink {
  export(snapshot: MetricsSnapshot): void {
    for (const site of snapshot.sites) {
      logger.info(
        `[metrics] ${site.siteId} queue=${site.queueDepth} inFlight=${site.inFlight} ` +
          `errorRate=${(site.errorRate * 100).toFixed(1)}% breaker=${site.breakerState} ` +
          `interval=${site.effectiveIntervalMs}ms${site.paused ? ' paused' : ''}`
      );
    }
    const cooling = snapshot.identities.filter((identity) => identity.status === IdentityStatus.COOLDOWN).length;
    logger.info(
      `[metrics] fetched=${snapshot.totals.fetched} written=${snapshot.router.listingsWritten} ` +
        `duplicates=${snapshot.router.listingsDuplicate} identities=${snapshot.identities.length - cooling}/${snapshot.identities.length}`
    );
  }
}

/**
 * Keeps the latest snapshots in memory
 */
export class MemoryObservabilitySink implements ObservabilitySink {
  readonly snapshots: MetricsSnapshot[] = [];

  export(snapshot: MetricsSnapshot): void {
    this.snapshots.push(snapshot);
  }
}

/**
 * Calls `collect` every `intervalMs` and hands the result to the sink
 */
export class MetricsExporter {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly collect: () => MetricsSnapshot,
    private readonly sink: ObservabilitySink,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.flush().catch((error: unknown) => logger.error('Metrics export failed:', error));
    }, this.intervalMs);
    this.timer.unref();
  }

  async flush(): Promise<void> {
    await this.sink.export(this.collect());
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
