/**
 * Deduplication Index Tests
 */

import { createMemoryDedupIndex, createRedisDedupIndex } from '../dedup.index';
import { UrlDedupMode } from '../dedup.types';
import { urlFingerprint } from '../fingerprint';
import { createMockRedisClient, createMockRedisFailure } from '../../../__tests__/helpers/mocks';

describe('DeduplicationIndex', () => {
  const url = urlFingerprint('https://jobs.example.com/it-jobs');

  describe('in memory', () => {
    it('should mark a URL once', async () => {
      const index = createMemoryDedupIndex({ expectedItems: 1000 });

      expect(await index.markSeenURL(url)).toBe(true);
      expect(await index.markSeenURL(url)).toBe(false);
      expect(index.getStats()).toMatchObject({ urlsMarked: 1, urlDuplicates: 1, urlMode: UrlDedupMode.EXACT, store: 'memory' });
    });

    it('should keep URL and content fingerprints apart', async () => {
      const index = createMemoryDedupIndex({ expectedItems: 1000 });

      await index.markSeenURL(url);

      expect(await index.markSeenContent(url)).toBe(true);
      expect(await index.markSeenContent(url)).toBe(false);
    });

    it('should use only the Bloom filter in probabilistic mode', async () => {
      const index = createMemoryDedupIndex({ expectedItems: 1000, urlMode: UrlDedupMode.PROBABILISTIC });

      expect(await index.markSeenURL(url)).toBe(true);
      expect(await index.markSeenURL(url)).toBe(false);
      expect(index.getStats().bloomRejections).toBe(1);
    });

    it('should reset on clear', async () => {
      const index = createMemoryDedupIndex({ expectedItems: 1000 });
      await index.markSeenURL(url);
      await index.clear();

      expect(await index.markSeenURL(url)).toBe(true);
      expect(index.getStats().urlsMarked).toBe(1);
    });
  });

  describe('with Redis', () => {
    it('should store fingerprints under prefixed set keys', async () => {
      const redis = createMockRedisClient();
      const index = createRedisDedupIndex(redis, 'crawl', { expectedItems: 1000 });

      await index.markSeenURL(url);
      await index.markSeenContent('abc');

      expect(redis.sadd).toHaveBeenCalledWith('crawl:seen:url', url);
      expect(redis.sadd).toHaveBeenCalledWith('crawl:seen:content', 'abc');
      expect(index.getStats().store).toBe('redis');
    });

    it('should share seen state between indexes on the same server', async () => {
      const redis = createMockRedisClient();
      const first = createRedisDedupIndex(redis, 'crawl', { expectedItems: 1000 });
      const second = createRedisDedupIndex(redis, 'crawl', { expectedItems: 1000 });

      expect(await first.markSeenURL(url)).toBe(true);
      expect(await second.markSeenURL(url)).toBe(false);
    });

    it('should confirm every URL with the exact store in exact mode', async () => {
      const redis = createMockRedisClient();
      const index = createRedisDedupIndex(redis, 'crawl', { expectedItems: 1000 });

      expect(await index.markSeenURL(url)).toBe(true);
      expect(await index.markSeenURL(url)).toBe(false);

      expect(redis.sadd).toHaveBeenCalledTimes(2);
      expect(index.getStats().bloomRejections).toBe(0);
    });

    it('should admit URLs from the Bloom filter alone in probabilistic mode', async () => {
      const redis = createMockRedisClient();
      const index = createRedisDedupIndex(redis, 'crawl', { expectedItems: 1000, urlMode: UrlDedupMode.PROBABILISTIC });

      expect(await index.markSeenURL(url)).toBe(true);
      expect(await index.markSeenURL(url)).toBe(false);
      expect(await index.markSeenContent('abc')).toBe(true);

      expect(redis.sadd).toHaveBeenCalledTimes(1);
      expect(redis.sadd).toHaveBeenCalledWith('crawl:seen:content', 'abc');
      expect(index.getStats()).toMatchObject({ bloomRejections: 1, urlsMarked: 1, urlDuplicates: 1 });
    });

    it('should propagate store failures', async () => {
      const index = createRedisDedupIndex(createMockRedisFailure(), 'crawl', { expectedItems: 1000 });

      await expect(index.markSeenURL(url)).rejects.toThrow('Redis connection failed');
    });
  });
});
