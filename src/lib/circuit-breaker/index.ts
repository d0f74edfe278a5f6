/**
 * Circuit Breaker System
 * Main export file for per-site circuit breaking
 */

export * from './circuit-breaker.types';
export * from './circuit-breaker';
export * from './circuit-breaker.manager';
