/**
 * Identity Types
 * A fetch identity is an optional outbound proxy plus a browser header set
 */

import { BrowserFingerprint } from './headers';

export enum ProxyProtocol {
  HTTP = 'http',
  HTTPS = 'https',
}

export enum IdentityStatus {
  ACTIVE = 'active',
  COOLDOWN = 'cooldown',
}

export interface ProxyEndpoint {
  url: string;
  protocol: ProxyProtocol;
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface Identity {
  id: string;
  proxy?: ProxyEndpoint;
  fingerprint: BrowserFingerprint;
  healthScore: number;          // 0..1
  consecutiveFailures: number;
  cooldownUntil: number;        // epoch ms, 0 when eligible
  lastUsed?: number;
  successCount: number;
  failureCount: number;
  blockedCount: number;
}

/**
 * Result of one fetch as seen by the identity that made it
 */
export type IdentityOutcome = 'success' | 'blocked' | 'failure';

export interface IdentityPoolConfig {
  maxConsecutiveFailures: number;
  cooldownMs: number;
  successReward: number;
  failurePenalty: number;
  blockPenaltyFactor: number;
  minWeight: number;
}

export interface IdentitySnapshot {
  id: string;
  proxy: string | null;          // host:port, credentials never exposed
  status: IdentityStatus;
  healthScore: number;
  consecutiveFailures: number;
  cooldownUntil: number;
  successCount: number;
  failureCount: number;
  blockedCount: number;
  lastUsed?: number;
}

export interface IdentityPoolStats {
  total: number;
  active: number;
  coolingDown: number;
  averageHealth: number;
  totalRequests: number;
  successRate: number;
}
