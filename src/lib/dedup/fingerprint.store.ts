/**
 * Fingerprint Stores
 * Exact membership sets: in-memory, or Redis for state shared across processes
 */

import { FingerprintStore } from './dedup.types';

export class MemoryFingerprintStore implements FingerprintStore {
  readonly name = 'memory';
  private readonly fingerprints: Set<string> = new Set();

  async add(fingerprint: string): Promise<boolean> {
    if (this.fingerprints.has(fingerprint)) {
      return false;
    }
    this.fingerprints.add(fingerprint);
    return true;
  }

  async has(fingerprint: string): Promise<boolean> {
    return this.fingerprints.has(fingerprint);
  }

  async size(): Promise<number> {
    return this.fingerprints.size;
  }

  async clear(): Promise<void> {
    this.fingerprints.clear();
  }
}

/**
 * Set commands used from the ioredis client
 */
export interface RedisSetClient {
  sadd(key: string, member: string): Promise<number>;
  sismember(key: string, member: string): Promise<number>;
  scard(key: string): Promise<number>;
  del(key: string): Promise<number>;
}

/**
 * SADD replies with the number of members actually added,
 * which makes it a server-side check-and-set.
 */
export class RedisFingerprintStore implements FingerprintStore {
  readonly name = 'redis';

  constructor(
    private readonly client: RedisSetClient,
    private readonly key: string
  ) {}

  async add(fingerprint: string): Promise<boolean> {
    const added = await this.client.sadd(this.key, fingerprint);
    return added === 1;
  }

  async has(fingerprint: string): Promise<boolean> {
    const member = await this.client.sismember(this.key, fingerprint);
    return member === 1;
  }

  async size(): Promise<number> {
    return this.client.scard(this.key);
  }

  async clear(): Promise<void> {
    await this.client.del(this.key);
  }
}
