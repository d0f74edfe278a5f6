/**
 * Fetch Worker
 * One cooperative loop: pick a site, get a permit, fetch, classify, then
 * route the page or apply the task's retry policy
 */

import { EventEmitter } from 'events';
import { CrawlLog } from '../../lib/crawl-log/crawl-log';
import { DropReason, FetchTask, PipelineTotals, RawPage, SiteConfig } from '../../lib/crawling/crawling.types';
import { Frontier } from '../../lib/crawling/frontier';
import { logger } from '../../lib/logger';
import { Identity, IdentityOutcome, IdentityPool } from '../../lib/proxy';
import { Permit, PolitenessGovernor } from '../../lib/rate-limit';
import {
  calculateRetryDelay,
  Classification,
  classifyError,
  classifyResponse,
  CrawlOutcome,
  ErrorCategory,
  PoolExhaustedError,
} from '../../lib/scraping/errors';
import { Sleep } from '../../lib/utils/retry';
import { PageFetcher } from './fetcher';
import { ParserRegistry } from './parsers/parser.registry';
import { ResultRouter } from './result.router';
import { DroppedTaskEvent, ExhaustedEvent, PipelineEvent } from './crawler.types';

export interface WorkerContext {
  frontier: Frontier;
  governor: PolitenessGovernor;
  pool: IdentityPool;
  fetcher: PageFetcher;
  parsers: ParserRegistry;
  router: ResultRouter;
  crawlLog: CrawlLog;
  totals: PipelineTotals;
  events: EventEmitter;
  defaultTimeoutMs: number;
  idlePollMs: number;
  now: () => number;
  sleep: Sleep;
  shouldStop: () => boolean;
}

type TickResult = { worked: true } | { worked: false; waitMs: number };

function identityOutcome(classification: Classification | null): IdentityOutcome {
  if (!classification || classification.outcome === CrawlOutcome.CLIENT_ERROR) {
    return 'success';
  }
  return classification.outcome === CrawlOutcome.BLOCKED ? 'blocked' : 'failure';
}

export class FetchWorker {
  private cursor: number;

  constructor(
    readonly id: number,
    private readonly ctx: WorkerContext
  ) {
    // Workers start at different sites
    this.cursor = id;
  }

  /**
   * Loop until the frontier is drained or a stop is requested
   */
  async run(): Promise<void> {
    logger.debug(`Worker ${this.id} started`);
    while (!this.ctx.shouldStop()) {
      const result = await this.tick();
      if (result.worked) {
        continue;
      }
      if (this.ctx.frontier.isDrained()) {
        break;
      }
      await this.ctx.sleep(Math.max(1, Math.min(this.ctx.idlePollMs, result.waitMs)));
    }
    logger.debug(`Worker ${this.id} stopped`);
  }

  /**
   * Process at most one task. When nothing is dispatchable, report how long
   * until something might be.
   */
  async tick(): Promise<TickResult> {
    const { frontier, governor } = this.ctx;
    const siteIds = frontier.getSiteIds();
    let waitMs = Number.POSITIVE_INFINITY;

    for (let i = 0; i < siteIds.length; i++) {
      const index = (this.cursor + i) % siteIds.length;
      const siteId = siteIds[index];

      if (!frontier.hasEligible(siteId)) {
        const nextAt = frontier.nextEligibleAt(siteId);
        if (nextAt !== null) {
          waitMs = Math.min(waitMs, nextAt - this.ctx.now());
        }
        continue;
      }

      const decision = governor.acquire(siteId);
      if (!decision.granted) {
        const untilFreed = decision.reason === 'concurrency' || decision.reason === 'probe_in_flight';
        waitMs = Math.min(waitMs, untilFreed ? this.ctx.idlePollMs : decision.waitMs);
        continue;
      }

      const task = frontier.dequeue(siteId);
      if (!task) {
        governor.release(decision.permit, false);
        continue;
      }

      this.cursor = index + 1;
      await this.process(task, decision.permit);
      return { worked: true };
    }

    return { worked: false, waitMs };
  }

  private async process(task: FetchTask, permit: Permit): Promise<void> {
    const { frontier, governor, pool } = this.ctx;
    let fetched = false;

    try {
      const site = frontier.getSite(task.siteId);
      if (!site) {
        frontier.complete(task.id);
        return;
      }

      let identity: Identity;
      try {
        identity = pool.select(task.siteId);
      } catch (error: unknown) {
        if (error instanceof PoolExhaustedError) {
          this.onPoolExhausted(task, error);
          return;
        }
        throw error;
      }

      fetched = true;
      const { page, classification } = await this.fetch(task, site, identity);
      pool.reportOutcome(identity.id, identityOutcome(classification));

      if (page && !classification) {
        await this.handlePage(task, site, page);
      } else if (classification) {
        this.handleFailure(task, site, classification);
      }
    } finally {
      governor.release(permit, fetched);
    }
  }

  private async fetch(
    task: FetchTask,
    site: SiteConfig,
    identity: Identity
  ): Promise<{ page: RawPage | null; classification: Classification | null }> {
    const startedAt = this.ctx.now();
    let page: RawPage | null = null;
    let classification: Classification | null;

    try {
      page = await this.ctx.fetcher.fetch({
        url: task.url,
        identity,
        timeoutMs: site.timeoutMs ?? this.ctx.defaultTimeoutMs,
        ...(task.parentUrl ? { referer: task.parentUrl } : {}),
      });
      classification = classifyResponse(page.statusCode, page.body);
    } catch (error: unknown) {
      classification = classifyError(error);
    }

    this.ctx.totals.fetched++;
    const statusCode = page?.statusCode ?? classification?.statusCode;
    this.ctx.crawlLog.append({
      siteId: task.siteId,
      timestamp: this.ctx.now(),
      outcome: classification ? classification.outcome : CrawlOutcome.SUCCESS,
      latencyMs: page ? page.latencyMs : this.ctx.now() - startedAt,
      url: task.url,
      identityId: identity.id,
      ...(statusCode !== undefined ? { statusCode } : {}),
    });

    return { page, classification };
  }

  private async handlePage(task: FetchTask, site: SiteConfig, page: RawPage): Promise<void> {
    const { parsers, router, frontier } = this.ctx;

    if (!parsers.has(site.parserId)) {
      this.drop(task, 'no_parser', `No parser registered as "${site.parserId}"`);
      return;
    }

    const outcome = parsers.parse(site.parserId, site.siteId, page);
    if (!outcome.ok) {
      this.drop(task, 'parse_error', outcome.error.message);
      return;
    }

    this.ctx.totals.parsed++;
    try {
      const summary = await router.route(task, site, page, outcome.result);
      logger.debug(
        `Worker ${this.id}: ${task.url} -> ${summary.listingsWritten} written, ` +
          `${summary.listingsDuplicate} duplicate, ${summary.linksAdmitted} links`
      );
    } catch (error: unknown) {
      logger.error(`Routing results of ${task.url} failed:`, error);
    } finally {
      frontier.complete(task.id);
    }
  }

  private handleFailure(task: FetchTask, site: SiteConfig, classification: Classification): void {
    const { frontier } = this.ctx;
    const policy = site.retryPolicy;

    switch (classification.category) {
      case ErrorCategory.TRANSIENT: {
        task.attemptCount++;
        if (task.attemptCount >= policy.maxAttempts) {
          this.drop(task, 'retries_exhausted', classification.message);
          return;
        }
        const delay = calculateRetryDelay(task.attemptCount, policy.baseBackoffMs, policy.maxBackoffMs);
        task.notBefore = this.ctx.now() + delay;
        frontier.requeue(task);
        this.ctx.totals.retried++;
        logger.debug(`Retrying ${task.url} in ${delay}ms (${classification.message})`);
        return;
      }

      case ErrorCategory.BLOCKING:
        task.blockedCount++;
        if (task.blockedCount >= policy.maxBlockedAttempts) {
          this.drop(task, 'blocked_exhausted', classification.message);
          return;
        }
        // Eligible at once; the next attempt goes out under another identity or a longer interval
        task.notBefore = this.ctx.now();
        frontier.requeue(task);
        this.ctx.totals.retried++;
        logger.warn(`Blocked on ${task.url}: ${classification.message}`);
        return;

      case ErrorCategory.PERMANENT:
        this.drop(task, 'permanent', classification.message);
        return;
    }
  }

  private onPoolExhausted(task: FetchTask, error: PoolExhaustedError): void {
    task.notBefore = error.retryAt;
    this.ctx.frontier.requeue(task);
    this.ctx.totals.exhausted++;
    logger.error(`${error.message}; ${task.url} waits until ${new Date(error.retryAt).toISOString()}`);

    const event: ExhaustedEvent = { siteId: task.siteId, taskId: task.id, retryAt: error.retryAt };
    this.ctx.events.emit(PipelineEvent.EXHAUSTED, event);
  }

  private drop(task: FetchTask, reason: DropReason, message: string): void {
    this.ctx.frontier.complete(task.id);
    this.ctx.totals.dropped[reason]++;
    logger.warn(`Dropped ${task.url} (${reason}): ${message}`);

    const event: DroppedTaskEvent = { task, reason, message };
    this.ctx.events.emit(PipelineEvent.DROPPED, event);
  }
}
