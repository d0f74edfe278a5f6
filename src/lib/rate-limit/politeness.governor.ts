/**
 * Politeness Governor
 * Per-site sliding-window rate limiting, concurrency caps and adaptive
 * backoff. Gates every dispatch from the frontier to a worker.
 */

import { CircuitBreakerRegistry } from '../circuit-breaker/circuit-breaker.manager';
import { CrawlLog, CrawlLogEntry } from '../crawl-log/crawl-log';
import { SiteConfig } from '../crawling/crawling.types';
import { logger } from '../logger';
import { CrawlOutcome, isSiteFailure } from '../scraping/errors';
import { AcquireResult, GovernorConfig, GovernorSiteStats, Permit, SiteLimits } from './rate-limit.types';

const DEFAULT_GOVERNOR_CONFIG: GovernorConfig = {
  maxBackoffMultiplier: 32,
  decayWindowMs: 60000,
};

interface SiteState {
  limits: SiteLimits;
  timestamps: number[]; // grant times, oldest first
  inFlight: number;
  paused: boolean;
  backoffMultiplier: number;
  lastAdjustedAt: number;
  totalGranted: number;
  totalDenied: number;
}

type Clock = () => number;

export class PolitenessGovernor {
  private readonly sites: Map<string, SiteState> = new Map();
  private readonly config: GovernorConfig;
  private nextPermitId: number = 1;

  constructor(
    sites: SiteConfig[],
    private readonly breakers: CircuitBreakerRegistry,
    config?: Partial<GovernorConfig>,
    private readonly now: Clock = Date.now
  ) {
    this.config = { ...DEFAULT_GOVERNOR_CONFIG, ...config };
    for (const site of sites) {
      this.sites.set(site.siteId, {
        limits: { rateLimit: site.rateLimit, maxConcurrency: site.maxConcurrency },
        timestamps: [],
        inFlight: 0,
        paused: false,
        backoffMultiplier: 1,
        lastAdjustedAt: 0,
        totalGranted: 0,
        totalDenied: 0,
      });
    }
  }

  /**
   * Ask for permission to fetch from a site. Never waits: a denial carries
   * how long the caller should wait before asking again.
   */
  acquire(siteId: string): AcquireResult {
    const state = this.getState(siteId);
    const now = this.now();

    if (state.paused) {
      state.totalDenied++;
      return { granted: false, waitMs: Number.POSITIVE_INFINITY, reason: 'paused' };
    }

    const breaker = this.breakers.get(siteId);
    const breakerDecision = breaker.peek(now);
    if (!breakerDecision.allowed) {
      state.totalDenied++;
      if (breakerDecision.retryAt === null) {
        return { granted: false, waitMs: 0, reason: 'probe_in_flight' };
      }
      return { granted: false, waitMs: Math.max(1, breakerDecision.retryAt - now), reason: 'circuit_open' };
    }

    if (state.inFlight >= state.limits.maxConcurrency) {
      state.totalDenied++;
      return { granted: false, waitMs: 0, reason: 'concurrency' };
    }

    const windowMs = this.effectiveWindowMs(state);
    this.prune(state, now, windowMs);
    const maxRequests = state.limits.rateLimit.requests;
    if (state.timestamps.length >= maxRequests) {
      // The grant that must leave the window before another fits
      const blocking = state.timestamps[state.timestamps.length - maxRequests];
      state.totalDenied++;
      return { granted: false, waitMs: Math.max(1, blocking + windowMs - now), reason: 'rate_limited' };
    }

    const decision = breaker.tryAcquire(now);
    const probe = decision.allowed && decision.probe;

    state.timestamps.push(now);
    state.inFlight++;
    state.totalGranted++;

    return {
      granted: true,
      permit: { id: this.nextPermitId++, siteId, grantedAt: now, probe },
    };
  }

  /**
   * Return a permit. A permit whose request was never sent frees its probe slot.
   */
  release(permit: Permit, fetched: boolean): void {
    const state = this.sites.get(permit.siteId);
    if (!state) {
      return;
    }
    state.inFlight = Math.max(0, state.inFlight - 1);
    if (!fetched && permit.probe) {
      this.breakers.get(permit.siteId).cancelProbe(this.now());
    }
  }

  /**
   * Feed crawl log outcomes into backoff and the site's circuit breaker
   */
  attach(crawlLog: CrawlLog): () => void {
    return crawlLog.onEntry((entry: CrawlLogEntry) => this.observe(entry));
  }

  observe(entry: CrawlLogEntry): void {
    if (!this.sites.has(entry.siteId)) {
      return;
    }
    this.breakers.get(entry.siteId).record(!isSiteFailure(entry.outcome), entry.timestamp);

    if (entry.outcome === CrawlOutcome.BLOCKED) {
      this.backoff(entry.siteId, entry.timestamp);
    } else if (entry.outcome === CrawlOutcome.SUCCESS) {
      this.decay(entry.siteId, entry.timestamp);
    }
  }

  /**
   * Double the site's interval, up to the configured ceiling
   */
  backoff(siteId: string, now: number = this.now()): void {
    const state = this.getState(siteId);
    const next = Math.min(this.config.maxBackoffMultiplier, state.backoffMultiplier * 2);
    if (next !== state.backoffMultiplier) {
      logger.warn(`Backing off ${siteId}: interval x${next}`);
    }
    state.backoffMultiplier = next;
    state.lastAdjustedAt = now;
  }

  /**
   * Halve the multiplier once a full decay window has passed without a block
   */
  private decay(siteId: string, now: number): void {
    const state = this.getState(siteId);
    if (state.backoffMultiplier <= 1 || now - state.lastAdjustedAt < this.config.decayWindowMs) {
      return;
    }
    state.backoffMultiplier = Math.max(1, state.backoffMultiplier / 2);
    state.lastAdjustedAt = now;
    logger.info(`Recovering ${siteId}: interval x${state.backoffMultiplier}`);
  }

  pause(siteId: string): void {
    this.getState(siteId).paused = true;
  }

  resume(siteId: string): void {
    this.getState(siteId).paused = false;
  }

  isPaused(siteId: string): boolean {
    return this.getState(siteId).paused;
  }

  hasSite(siteId: string): boolean {
    return this.sites.has(siteId);
  }

  getStats(siteId: string): GovernorSiteStats {
    const state = this.getState(siteId);
    const windowMs = this.effectiveWindowMs(state);
    this.prune(state, this.now(), windowMs);

    return {
      siteId,
      paused: state.paused,
      inFlight: state.inFlight,
      grantedInWindow: state.timestamps.length,
      backoffMultiplier: state.backoffMultiplier,
      effectiveIntervalMs: windowMs,
      totalGranted: state.totalGranted,
      totalDenied: state.totalDenied,
    };
  }

  private effectiveWindowMs(state: SiteState): number {
    return state.limits.rateLimit.intervalMs * state.backoffMultiplier;
  }

  private prune(state: SiteState, now: number, windowMs: number): void {
    const windowStart = now - windowMs;
    let expired = 0;
    while (expired < state.timestamps.length && state.timestamps[expired] <= windowStart) {
      expired++;
    }
    if (expired > 0) {
      state.timestamps.splice(0, expired);
    }
  }

  private getState(siteId: string): SiteState {
    const state = this.sites.get(siteId);
    if (!state) {
      throw new Error(`Unknown site: ${siteId}`);
    }
    return state;
  }
}
