/**
 * Crawl Pipeline
 * Wires frontier, governor, identities, workers and router together and
 * exposes the operational controls
 */

import { EventEmitter } from 'events';
import { CircuitBreakerConfig, CircuitBreakerRegistry } from '../../lib/circuit-breaker';
import { CrawlLog, CrawlLogEntry } from '../../lib/crawl-log/crawl-log';
import { LoggerObservabilitySink, MetricsExporter, MetricsSnapshot, ObservabilitySink } from '../../lib/crawl-log/metrics';
import { PipelineTotals, SiteConfig } from '../../lib/crawling/crawling.types';
import { Frontier } from '../../lib/crawling/frontier';
import { FrontierStore } from '../../lib/crawling/frontier.store';
import { expandSeeds } from '../../lib/crawling/pagination';
import { DeduplicationIndex } from '../../lib/dedup/dedup.index';
import { logger } from '../../lib/logger';
import { Identity, IdentityPool, IdentityPoolConfig } from '../../lib/proxy';
import { GovernorConfig, PolitenessGovernor } from '../../lib/rate-limit';
import { sleep as defaultSleep, Sleep } from '../../lib/utils/retry';
import { ListingSink } from '../listings/listing.types';
import { emptyTotals, PipelineEvent, PipelineState, PipelineStatus } from './crawler.types';
import { FetchWorker } from './fetch.worker';
import { HttpFetcher, PageFetcher } from './fetcher';
import { createDefaultParserRegistry, ParserRegistry } from './parsers';
import { ResultRouter } from './result.router';

export interface CrawlPipelineOptions {
  workerCount: number;
  idlePollMs: number;
  defaultTimeoutMs: number;
  sinkMaxAttempts: number;
  sinkBackoffBaseMs: number;
  metricsIntervalMs: number;
  governor: Partial<GovernorConfig>;
  breaker: Partial<CircuitBreakerConfig>;
  identityPool: Partial<IdentityPoolConfig>;
}

export interface CrawlPipelineDeps {
  sites: SiteConfig[];
  dedup: DeduplicationIndex;
  sink: ListingSink;
  identities: Identity[];
  fetcher?: PageFetcher;
  parsers?: ParserRegistry;
  frontierStore?: FrontierStore;
  observability?: ObservabilitySink;
  now?: () => number;
  sleep?: Sleep;
  random?: () => number;
}

const DEFAULT_OPTIONS: CrawlPipelineOptions = {
  workerCount: 4,
  idlePollMs: 250,
  defaultTimeoutMs: 10000,
  sinkMaxAttempts: 3,
  sinkBackoffBaseMs: 200,
  metricsIntervalMs: 30000,
  governor: {},
  breaker: {},
  identityPool: {},
};

export class CrawlPipeline extends EventEmitter {
  readonly frontier: Frontier;
  readonly breakers: CircuitBreakerRegistry;
  readonly governor: PolitenessGovernor;
  readonly pool: IdentityPool;
  readonly crawlLog: CrawlLog;
  readonly parsers: ParserRegistry;
  readonly router: ResultRouter;

  private readonly options: CrawlPipelineOptions;
  private readonly fetcher: PageFetcher;
  private readonly exporter: MetricsExporter;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly detachCrawlLog: () => void;

  private state: PipelineState = PipelineState.IDLE;
  private totals: PipelineTotals = emptyTotals();
  private startedAt: number | null = null;
  private stopRequested: boolean = false;
  private running: Promise<void> | null = null;

  constructor(
    private readonly deps: CrawlPipelineDeps,
    options: Partial<CrawlPipelineOptions> = {}
  ) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;

    this.frontier = new Frontier(deps.sites, deps.dedup, this.now);
    this.breakers = new CircuitBreakerRegistry(this.options.breaker);
    this.governor = new PolitenessGovernor(deps.sites, this.breakers, this.options.governor, this.now);
    this.pool = new IdentityPool(deps.identities, this.options.identityPool, this.now, deps.random);
    this.crawlLog = new CrawlLog();
    this.detachCrawlLog = this.governor.attach(this.crawlLog);
    this.parsers = deps.parsers ?? createDefaultParserRegistry();
    this.fetcher = deps.fetcher ?? new HttpFetcher();
    this.router = new ResultRouter(this.frontier, deps.dedup, deps.sink, {
      sinkMaxAttempts: this.options.sinkMaxAttempts,
      sinkBackoffBaseMs: this.options.sinkBackoffBaseMs,
      sleep: this.sleep,
    });
    this.exporter = new MetricsExporter(
      () => this.metrics(),
      deps.observability ?? new LoggerObservabilitySink(),
      this.options.metricsIntervalMs
    );

    for (const site of deps.sites) {
      if (!this.parsers.has(site.parserId)) {
        logger.warn(`Site ${site.siteId} uses unknown parser "${site.parserId}"; its pages will be dropped`);
      }
    }
  }

  /**
   * Restore the saved frontier, enqueue seeds and start the workers
   */
  async start(): Promise<void> {
    if (this.state !== PipelineState.IDLE) {
      return;
    }
    this.state = PipelineState.RUNNING;
    this.startedAt = this.now();

    // A restored frontier resumes the previous run instead of starting over
    const restored = await this.restore();
    const seeded = restored > 0 ? 0 : await this.seed();
    logger.info(`Crawl started: ${restored} task(s) restored, ${seeded} seed(s) admitted, ${this.options.workerCount} worker(s)`);

    const workers = Array.from({ length: Math.max(1, this.options.workerCount) }, (_, id) => this.createWorker(id));
    this.exporter.start();
    this.running = Promise.all(workers.map((worker) => worker.run())).then(() => this.finish());
  }

  /**
   * Start if needed; resolves once the frontier is drained or the crawl is stopped
   */
  async run(): Promise<void> {
    await this.start();
    if (this.running) {
      await this.running;
    }
  }

  /**
   * Let workers finish their current task, then persist what is left
   */
  async stop(): Promise<void> {
    if (this.state === PipelineState.IDLE) {
      this.state = PipelineState.STOPPED;
      return;
    }
    if (this.state === PipelineState.RUNNING) {
      this.state = PipelineState.STOPPING;
      this.stopRequested = true;
      logger.info('Stopping crawl...');
    }
    if (this.running) {
      await this.running;
    }
  }

  /**
   * Enqueue the depth-0 tasks of every site
   */
  async seed(): Promise<number> {
    let admitted = 0;
    for (const site of this.deps.sites) {
      for (const input of expandSeeds(site)) {
        const result = await this.frontier.enqueue(input);
        if (result.admitted) {
          admitted++;
        }
      }
    }
    return admitted;
  }

  /**
   * The site's latest crawl log entries, oldest first; null for an unknown site
   */
  recentLog(siteId: string, limit: number): CrawlLogEntry[] | null {
    if (!this.governor.hasSite(siteId)) {
      return null;
    }
    return this.crawlLog.getEntries(siteId).slice(-limit);
  }

  pauseSite(siteId: string): boolean {
    if (!this.governor.hasSite(siteId)) {
      return false;
    }
    this.governor.pause(siteId);
    logger.info(`Site ${siteId} paused`);
    return true;
  }

  resumeSite(siteId: string): boolean {
    if (!this.governor.hasSite(siteId)) {
      return false;
    }
    this.governor.resume(siteId);
    logger.info(`Site ${siteId} resumed`);
    return true;
  }

  getState(): PipelineState {
    return this.state;
  }

  status(): PipelineStatus {
    const now = this.now();
    return {
      state: this.state,
      startedAt: this.startedAt,
      workers: this.options.workerCount,
      sites: this.frontier.getSiteIds().map((siteId) => ({
        siteId,
        pending: this.frontier.pendingCount(siteId),
        inFlight: this.frontier.inFlightCount(siteId),
        paused: this.governor.isPaused(siteId),
        breakerState: this.breakers.getState(siteId, now),
      })),
      totals: this.copyTotals(),
    };
  }

  metrics(): MetricsSnapshot {
    const now = this.now();
    return {
      timestamp: now,
      sites: this.frontier.getSiteIds().map((siteId) => {
        const log = this.crawlLog.getSiteStats(siteId, now);
        const politeness = this.governor.getStats(siteId);
        return {
          siteId,
          outcomes: log.outcomes,
          errorRate: log.windowErrorRate,
          queueDepth: this.frontier.pendingCount(siteId),
          inFlight: this.frontier.inFlightCount(siteId),
          breakerState: this.breakers.getState(siteId, now),
          effectiveIntervalMs: politeness.effectiveIntervalMs,
          backoffMultiplier: politeness.backoffMultiplier,
          paused: politeness.paused,
        };
      }),
      breakers: this.breakers.getAllStats(now),
      identities: this.pool.snapshot(),
      router: this.router.getStats(),
      dedup: this.deps.dedup.getStats(),
      totals: this.copyTotals(),
    };
  }

  private createWorker(id: number): FetchWorker {
    return new FetchWorker(id, {
      frontier: this.frontier,
      governor: this.governor,
      pool: this.pool,
      fetcher: this.fetcher,
      parsers: this.parsers,
      router: this.router,
      crawlLog: this.crawlLog,
      totals: this.totals,
      events: this,
      defaultTimeoutMs: this.options.defaultTimeoutMs,
      idlePollMs: this.options.idlePollMs,
      now: this.now,
      sleep: this.sleep,
      shouldStop: () => this.stopRequested,
    });
  }

  private async restore(): Promise<number> {
    if (!this.deps.frontierStore) {
      return 0;
    }
    const snapshot = await this.deps.frontierStore.load();
    return snapshot ? await this.frontier.restore(snapshot) : 0;
  }

  private async finish(): Promise<void> {
    this.exporter.stop();
    this.detachCrawlLog();

    const drained = this.frontier.isDrained();
    const store = this.deps.frontierStore;
    try {
      if (store && drained) {
        await store.clear();
      } else if (store) {
        const snapshot = this.frontier.snapshot();
        await store.save(snapshot);
        logger.info(`Saved ${snapshot.tasks.length} pending task(s)`);
      }
    } catch (error: unknown) {
      logger.error('Failed to persist frontier snapshot:', error);
    }

    try {
      await this.exporter.flush();
    } catch (error: unknown) {
      logger.error('Metrics export failed:', error);
    }

    this.state = PipelineState.STOPPED;
    const totals = this.copyTotals();
    logger.info(`Crawl ${drained ? 'drained' : 'stopped'}: ${totals.fetched} fetch(es), ${this.router.getStats().listingsWritten} listing(s) written`);
    this.emit(drained ? PipelineEvent.DRAINED : PipelineEvent.STOPPED, totals);
  }

  private copyTotals(): PipelineTotals {
    return { ...this.totals, dropped: { ...this.totals.dropped } };
  }
}
