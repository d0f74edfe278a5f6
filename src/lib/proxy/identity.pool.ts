/**
 * Identity Pool
 * Health-weighted selection of fetch identities with cooldown on repeated failure
 */

import { logger } from '../logger';
import { PoolExhaustedError } from '../scraping/errors';
import {
  Identity,
  IdentityOutcome,
  IdentityPoolConfig,
  IdentityPoolStats,
  IdentitySnapshot,
  IdentityStatus,
} from './identity.types';

export const DEFAULT_IDENTITY_POOL_CONFIG: IdentityPoolConfig = {
  maxConsecutiveFailures: 3,
  cooldownMs: 300000,
  successReward: 0.1,
  failurePenalty: 0.1,
  blockPenaltyFactor: 0.5,
  minWeight: 0.05,
};

type Clock = () => number;
type RandomSource = () => number;

export class IdentityPool {
  private readonly identities: Map<string, Identity> = new Map();
  private readonly config: IdentityPoolConfig;

  constructor(
    identities: Identity[],
    config?: Partial<IdentityPoolConfig>,
    private readonly now: Clock = Date.now,
    private readonly random: RandomSource = Math.random
  ) {
    this.config = { ...DEFAULT_IDENTITY_POOL_CONFIG, ...config };
    for (const identity of identities) {
      this.identities.set(identity.id, identity);
    }
  }

  /**
   * Pick an identity for the next request to a site
   */
  select(siteId: string): Identity {
    const now = this.now();
    const eligible = this.getAll().filter((identity) => identity.cooldownUntil <= now);

    if (eligible.length === 0) {
      const cooling = this.getAll().map((identity) => identity.cooldownUntil);
      const retryAt = cooling.length > 0 ? Math.min(...cooling) : now + this.config.cooldownMs;
      throw new PoolExhaustedError(siteId, retryAt);
    }

    const identity = this.pickWeighted(eligible);
    identity.lastUsed = now;
    return identity;
  }

  /**
   * Update an identity's health after a fetch
   */
  reportOutcome(identityId: string, outcome: IdentityOutcome): void {
    const identity = this.identities.get(identityId);
    if (!identity) {
      return;
    }

    if (outcome === 'success') {
      identity.successCount++;
      identity.consecutiveFailures = 0;
      identity.healthScore = Math.min(1, identity.healthScore + this.config.successReward);
      return;
    }

    identity.failureCount++;
    identity.consecutiveFailures++;
    if (outcome === 'blocked') {
      identity.blockedCount++;
      identity.healthScore *= this.config.blockPenaltyFactor;
    } else {
      identity.healthScore = Math.max(0, identity.healthScore - this.config.failurePenalty);
    }

    if (identity.consecutiveFailures >= this.config.maxConsecutiveFailures) {
      identity.cooldownUntil = this.now() + this.config.cooldownMs;
      identity.consecutiveFailures = 0;
      logger.warn(`Identity ${identity.id} cooling down until ${new Date(identity.cooldownUntil).toISOString()}`);
    }
  }

  get(identityId: string): Identity | undefined {
    return this.identities.get(identityId);
  }

  getAll(): Identity[] {
    return Array.from(this.identities.values());
  }

  size(): number {
    return this.identities.size;
  }

  getStatus(identity: Identity, now: number = this.now()): IdentityStatus {
    return identity.cooldownUntil > now ? IdentityStatus.COOLDOWN : IdentityStatus.ACTIVE;
  }

  snapshot(): IdentitySnapshot[] {
    const now = this.now();
    return this.getAll().map((identity) => ({
      id: identity.id,
      proxy: identity.proxy ? `${identity.proxy.host}:${identity.proxy.port}` : null,
      status: this.getStatus(identity, now),
      healthScore: identity.healthScore,
      consecutiveFailures: identity.consecutiveFailures,
      cooldownUntil: identity.cooldownUntil,
      successCount: identity.successCount,
      failureCount: identity.failureCount,
      blockedCount: identity.blockedCount,
      ...(identity.lastUsed !== undefined ? { lastUsed: identity.lastUsed } : {}),
    }));
  }

  getStats(): IdentityPoolStats {
    const all = this.getAll();
    const now = this.now();
    const coolingDown = all.filter((identity) => this.getStatus(identity, now) === IdentityStatus.COOLDOWN).length;
    const totalSuccess = all.reduce((sum, identity) => sum + identity.successCount, 0);
    const totalRequests = all.reduce((sum, identity) => sum + identity.successCount + identity.failureCount, 0);

    return {
      total: all.length,
      active: all.length - coolingDown,
      coolingDown,
      averageHealth: all.length > 0 ? all.reduce((sum, identity) => sum + identity.healthScore, 0) / all.length : 0,
      totalRequests,
      successRate: totalRequests > 0 ? totalSuccess / totalRequests : 0,
    };
  }

  /**
   * Weighted random selection by health score; weights never drop to zero
   * so a degraded identity still recovers through traffic
   */
  private pickWeighted(candidates: Identity[]): Identity {
    const weights = candidates.map((identity) => Math.max(this.config.minWeight, identity.healthScore));
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    let threshold = this.random() * total;

    for (let i = 0; i < candidates.length; i++) {
      threshold -= weights[i];
      if (threshold < 0) {
        return candidates[i];
      }
    }
    return candidates[candidates.length - 1];
  }
}
