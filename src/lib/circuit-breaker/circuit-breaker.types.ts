/**
 * Circuit Breaker Types
 * Type definitions for the per-site circuit breaker
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',       // Normal dispatch
  OPEN = 'open',           // Dispatch suspended until cooldown elapses
  HALF_OPEN = 'half_open', // Limited probe requests allowed
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  windowMs: number;                 // Rolling window for the error rate (ms)
  errorThresholdPercentage: number; // Error percentage that trips the breaker (0-100)
  minimumRequests: number;          // Outcomes required in the window before tripping
  cooldownMs: number;               // Time in OPEN before probing (ms)
  halfOpenMaxProbes: number;        // Concurrent probes allowed in HALF_OPEN
}

/**
 * Serializable breaker state, the input and output of the transition function
 */
export interface BreakerSnapshot {
  state: CircuitState;
  openedAt?: number;
  probesInFlight: number;
}

export type BreakerEvent =
  | { type: 'outcome'; success: boolean; errorRate: number; sampleSize: number }
  | { type: 'tick' }
  | { type: 'probe_dispatched' }
  | { type: 'probe_cancelled' }
  | { type: 'reset' };

/**
 * Circuit breaker statistics
 */
export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  totalRequests: number;
  errorRate: number;
  openedAt?: number;
  nextAttempt?: number;
}

/**
 * Circuit breaker event types
 */
export enum CircuitBreakerEvent {
  OPEN = 'open',
  CLOSE = 'close',
  HALF_OPEN = 'half_open',
  STATE_CHANGE = 'stateChange',
}
