/**
 * Deduplication Index
 * Seen-sets for URL and content fingerprints. URL admission can run on a
 * Bloom filter alone; listings are always checked against the exact store.
 */

import { BloomFilter } from './bloom-filter';
import { MemoryFingerprintStore, RedisFingerprintStore, RedisSetClient } from './fingerprint.store';
import { DedupIndexConfig, DedupStats, FingerprintStore, UrlDedupMode } from './dedup.types';

const DEFAULT_CONFIG: DedupIndexConfig = {
  urlMode: UrlDedupMode.EXACT,
  expectedItems: 1_000_000,
  falsePositiveRate: 0.001,
};

function emptyStats() {
  return {
    urlsMarked: 0,
    urlDuplicates: 0,
    contentMarked: 0,
    contentDuplicates: 0,
    bloomRejections: 0,
  };
}

export class DeduplicationIndex {
  private readonly config: DedupIndexConfig;
  // Only in probabilistic URL mode; the exact store is then skipped for URLs
  private readonly urlFilter: BloomFilter | null;
  private readonly urlStore: FingerprintStore;
  private readonly contentStore: FingerprintStore;
  private stats = emptyStats();

  constructor(
    stores: { url: FingerprintStore; content: FingerprintStore },
    config?: Partial<DedupIndexConfig>
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.urlStore = stores.url;
    this.contentStore = stores.content;
    this.urlFilter = this.config.urlMode === UrlDedupMode.PROBABILISTIC ? new BloomFilter(this.config) : null;
  }

  /**
   * Mark a URL fingerprint as seen. Resolves true if it was newly marked.
   */
  async markSeenURL(fingerprint: string): Promise<boolean> {
    let isNew: boolean;
    if (this.urlFilter) {
      isNew = this.urlFilter.testAndAdd(fingerprint);
      if (!isNew) {
        this.stats.bloomRejections++;
      }
    } else {
      isNew = await this.urlStore.add(fingerprint);
    }

    if (isNew) {
      this.stats.urlsMarked++;
    } else {
      this.stats.urlDuplicates++;
    }
    return isNew;
  }

  /**
   * Mark a listing fingerprint as seen. Always answered by the exact store,
   * so a false positive can never drop a listing.
   */
  async markSeenContent(fingerprint: string): Promise<boolean> {
    const isNew = await this.contentStore.add(fingerprint);

    if (isNew) {
      this.stats.contentMarked++;
    } else {
      this.stats.contentDuplicates++;
    }
    return isNew;
  }

  getStats(): DedupStats {
    return {
      ...this.stats,
      urlMode: this.config.urlMode,
      store: this.urlStore.name,
    };
  }

  async clear(): Promise<void> {
    this.urlFilter?.clear();
    await Promise.all([this.urlStore.clear(), this.contentStore.clear()]);
    this.stats = emptyStats();
  }
}

/**
 * In-memory index for a single process
 */
export function createMemoryDedupIndex(config?: Partial<DedupIndexConfig>): DeduplicationIndex {
  return new DeduplicationIndex(
    { url: new MemoryFingerprintStore(), content: new MemoryFingerprintStore() },
    config
  );
}

/**
 * Index whose exact tier lives in Redis sets, shared by every crawler process
 */
export function createRedisDedupIndex(
  client: RedisSetClient,
  keyPrefix: string,
  config?: Partial<DedupIndexConfig>
): DeduplicationIndex {
  return new DeduplicationIndex(
    {
      url: new RedisFingerprintStore(client, `${keyPrefix}:seen:url`),
      content: new RedisFingerprintStore(client, `${keyPrefix}:seen:content`),
    },
    config
  );
}
