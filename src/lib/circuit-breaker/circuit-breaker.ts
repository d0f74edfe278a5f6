/**
 * Circuit Breaker
 * Per-site finite-state machine over a rolling error-rate window
 */

import { EventEmitter } from 'events';
import {
  BreakerEvent,
  BreakerSnapshot,
  CircuitBreakerConfig,
  CircuitBreakerEvent,
  CircuitBreakerStats,
  CircuitState,
} from './circuit-breaker.types';

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  windowMs: 60000,
  errorThresholdPercentage: 50,
  minimumRequests: 5,
  cooldownMs: 30000,
  halfOpenMaxProbes: 1,
};

/**
 * Transition function: (state, event) -> next state
 */
export function transition(
  current: BreakerSnapshot,
  event: BreakerEvent,
  config: CircuitBreakerConfig,
  now: number
): BreakerSnapshot {
  switch (event.type) {
    case 'reset':
      return { state: CircuitState.CLOSED, probesInFlight: 0 };

    case 'tick':
      if (
        current.state === CircuitState.OPEN &&
        current.openedAt !== undefined &&
        now - current.openedAt >= config.cooldownMs
      ) {
        return { state: CircuitState.HALF_OPEN, probesInFlight: 0 };
      }
      return current;

    case 'probe_dispatched':
      if (current.state !== CircuitState.HALF_OPEN) {
        return current;
      }
      return { ...current, probesInFlight: current.probesInFlight + 1 };

    case 'probe_cancelled':
      if (current.state !== CircuitState.HALF_OPEN) {
        return current;
      }
      return { ...current, probesInFlight: Math.max(0, current.probesInFlight - 1) };

    case 'outcome':
      if (current.state === CircuitState.HALF_OPEN) {
        return event.success
          ? { state: CircuitState.CLOSED, probesInFlight: 0 }
          : { state: CircuitState.OPEN, openedAt: now, probesInFlight: 0 };
      }
      if (
        current.state === CircuitState.CLOSED &&
        !event.success &&
        event.sampleSize >= config.minimumRequests &&
        event.errorRate > config.errorThresholdPercentage
      ) {
        return { state: CircuitState.OPEN, openedAt: now, probesInFlight: 0 };
      }
      // Late outcomes of requests dispatched before the breaker opened
      return current;
  }
}

/**
 * Whether a request may be dispatched in the given state
 */
export function canDispatch(snapshot: BreakerSnapshot, config: CircuitBreakerConfig): boolean {
  switch (snapshot.state) {
    case CircuitState.CLOSED:
      return true;
    case CircuitState.HALF_OPEN:
      return snapshot.probesInFlight < config.halfOpenMaxProbes;
    case CircuitState.OPEN:
      return false;
  }
}

/**
 * A denial's retryAt is null while a half-open probe is in flight: nothing
 * is known until its outcome is recorded.
 */
export type BreakerDecision =
  | { allowed: true; probe: boolean }
  | { allowed: false; retryAt: number | null };

interface WindowEntry {
  timestamp: number;
  success: boolean;
}

export class SiteCircuitBreaker extends EventEmitter {
  private snapshot: BreakerSnapshot = { state: CircuitState.CLOSED, probesInFlight: 0 };
  private window: WindowEntry[] = [];
  private failures: number = 0;
  private successes: number = 0;

  constructor(
    readonly siteId: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG
  ) {
    super();
  }

  /**
   * Current state, after applying any elapsed cooldown
   */
  getState(now: number = Date.now()): CircuitState {
    this.apply({ type: 'tick' }, now);
    return this.snapshot.state;
  }

  /**
   * Whether a request could be dispatched now, without taking a probe slot
   */
  peek(now: number = Date.now()): BreakerDecision {
    this.apply({ type: 'tick' }, now);

    if (!canDispatch(this.snapshot, this.config)) {
      const retryAt =
        this.snapshot.state === CircuitState.OPEN && this.snapshot.openedAt !== undefined
          ? this.snapshot.openedAt + this.config.cooldownMs
          : null;
      return { allowed: false, retryAt };
    }
    return { allowed: true, probe: this.snapshot.state === CircuitState.HALF_OPEN };
  }

  /**
   * Ask to dispatch one request. In HALF_OPEN a granted request is a probe
   * and holds a probe slot until its outcome is recorded or it is cancelled.
   */
  tryAcquire(now: number = Date.now()): BreakerDecision {
    const decision = this.peek(now);
    if (decision.allowed && decision.probe) {
      this.apply({ type: 'probe_dispatched' }, now);
    }
    return decision;
  }

  /**
   * Release a probe slot for a request that was never sent
   */
  cancelProbe(now: number = Date.now()): void {
    this.apply({ type: 'probe_cancelled' }, now);
  }

  /**
   * Record the outcome of a dispatched request
   */
  record(success: boolean, now: number = Date.now()): void {
    if (success) {
      this.successes++;
    } else {
      this.failures++;
    }

    this.window.push({ timestamp: now, success });
    this.pruneWindow(now);

    const sampleSize = this.window.length;
    const errors = this.window.filter((entry) => !entry.success).length;
    const errorRate = sampleSize > 0 ? (errors / sampleSize) * 100 : 0;

    this.apply({ type: 'outcome', success, errorRate, sampleSize }, now);
  }

  getStats(now: number = Date.now()): CircuitBreakerStats {
    const state = this.getState(now);
    this.pruneWindow(now);
    const errors = this.window.filter((entry) => !entry.success).length;

    return {
      state,
      failures: this.failures,
      successes: this.successes,
      totalRequests: this.failures + this.successes,
      errorRate: this.window.length > 0 ? (errors / this.window.length) * 100 : 0,
      openedAt: this.snapshot.openedAt,
      nextAttempt:
        state === CircuitState.OPEN && this.snapshot.openedAt !== undefined
          ? this.snapshot.openedAt + this.config.cooldownMs
          : undefined,
    };
  }

  /**
   * Manually close the circuit and clear the window
   */
  reset(now: number = Date.now()): void {
    this.window = [];
    this.apply({ type: 'reset' }, now);
  }

  private pruneWindow(now: number): void {
    const windowStart = now - this.config.windowMs;
    this.window = this.window.filter((entry) => entry.timestamp > windowStart);
  }

  private apply(event: BreakerEvent, now: number): void {
    const previous = this.snapshot.state;
    this.snapshot = transition(this.snapshot, event, this.config, now);
    const next = this.snapshot.state;

    if (previous === next) {
      return;
    }

    if (next === CircuitState.CLOSED) {
      // Recovery starts from a clean window
      this.window = [];
      this.emit(CircuitBreakerEvent.CLOSE);
    } else if (next === CircuitState.OPEN) {
      this.emit(CircuitBreakerEvent.OPEN);
    } else {
      this.emit(CircuitBreakerEvent.HALF_OPEN);
    }
    this.emit(CircuitBreakerEvent.STATE_CHANGE, next, previous);
  }
}
