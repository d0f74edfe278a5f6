/**
 * Rate Limit System
 * Main export file for the politeness governor
 */

export * from './rate-limit.types';
export * from './politeness.governor';
