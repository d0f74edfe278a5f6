/**
 * Rate Limit Types
 * Type definitions for the per-site politeness governor
 */

import { RateLimit } from '../crawling/crawling.types';

/**
 * `concurrency` and `probe_in_flight` clear when a request finishes, so
 * their waitMs is 0 and callers poll.
 */
export type DenialReason = 'paused' | 'circuit_open' | 'probe_in_flight' | 'concurrency' | 'rate_limited';

/**
 * Permission to issue one request to a site
 */
export interface Permit {
  readonly id: number;
  readonly siteId: string;
  readonly grantedAt: number;

  /**
   * Granted while the site's breaker was half-open
   */
  readonly probe: boolean;
}

export type AcquireResult =
  | { granted: true; permit: Permit }
  | { granted: false; waitMs: number; reason: DenialReason };

export interface SiteLimits {
  rateLimit: RateLimit;
  maxConcurrency: number;
}

export interface GovernorConfig {
  maxBackoffMultiplier: number; // Ceiling for the interval multiplier
  decayWindowMs: number;        // Block-free time after which a success halves the multiplier
}

export interface GovernorSiteStats {
  siteId: string;
  paused: boolean;
  inFlight: number;
  grantedInWindow: number;
  backoffMultiplier: number;
  effectiveIntervalMs: number;
  totalGranted: number;
  totalDenied: number;
}
