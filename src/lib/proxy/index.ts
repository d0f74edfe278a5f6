/**
 * Identity Pool
 * Proxies and browser header sets used for fetching
 */

export * from './identity.types';
export * from './headers';
export * from './identity.pool';
export * from './identity.factory';
