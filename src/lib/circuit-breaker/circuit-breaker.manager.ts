/**
 * Circuit Breaker Registry
 * One breaker per site, created on first use
 */

import { EventEmitter } from 'events';
import { logger } from '../logger';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG, SiteCircuitBreaker } from './circuit-breaker';
import { CircuitBreakerConfig, CircuitBreakerEvent, CircuitBreakerStats, CircuitState } from './circuit-breaker.types';

export class CircuitBreakerRegistry extends EventEmitter {
  private readonly breakers: Map<string, SiteCircuitBreaker> = new Map();
  private readonly config: CircuitBreakerConfig;

  constructor(config?: Partial<CircuitBreakerConfig>) {
    super();
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
  }

  get(siteId: string): SiteCircuitBreaker {
    const existing = this.breakers.get(siteId);
    if (existing) {
      return existing;
    }

    const breaker = new SiteCircuitBreaker(siteId, this.config);
    breaker.on(CircuitBreakerEvent.STATE_CHANGE, (next: CircuitState, previous: CircuitState) => {
      const message = `Circuit for ${siteId}: ${previous} -> ${next}`;
      if (next === CircuitState.OPEN) {
        logger.warn(message);
      } else {
        logger.info(message);
      }
      this.emit(CircuitBreakerEvent.STATE_CHANGE, siteId, next, previous);
    });
    this.breakers.set(siteId, breaker);
    return breaker;
  }

  getState(siteId: string, now?: number): CircuitState {
    return this.get(siteId).getState(now);
  }

  getAllStats(now?: number): Record<string, CircuitBreakerStats> {
    const stats: Record<string, CircuitBreakerStats> = {};
    for (const [siteId, breaker] of this.breakers) {
      stats[siteId] = breaker.getStats(now);
    }
    return stats;
  }
}
