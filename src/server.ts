/**
 * Server Entry Point
 * Loads configuration, builds the crawl pipeline and serves the control API
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { loadSiteConfigs } from './config/sites';
import { redisConnection } from './lib/redis';
import { FileFrontierStore } from './lib/crawling/frontier.store';
import { createMemoryDedupIndex, createRedisDedupIndex, DeduplicationIndex } from './lib/dedup/dedup.index';
import { DedupIndexConfig, UrlDedupMode } from './lib/dedup/dedup.types';
import { logger } from './lib/logger';
import { createIdentities, splitProxyUrls } from './lib/proxy/identity.factory';
import { CrawlPipeline } from './modules/crawler/crawl.pipeline';
import { PipelineEvent } from './modules/crawler/crawler.types';
import { HttpFetcher } from './modules/crawler/fetcher';
import { createListingSink } from './modules/listings/listing.sinks';

async function createDedupIndex(): Promise<DeduplicationIndex> {
  const config: DedupIndexConfig = {
    urlMode: env.DEDUP_URL_MODE === UrlDedupMode.PROBABILISTIC ? UrlDedupMode.PROBABILISTIC : UrlDedupMode.EXACT,
    expectedItems: env.DEDUP_EXPECTED_ITEMS,
    falsePositiveRate: env.DEDUP_FALSE_POSITIVE_RATE,
  };

  if (!env.REDIS_ENABLED) {
    logger.info('Dedup state: in memory');
    return createMemoryDedupIndex(config);
  }

  const client = await redisConnection.waitUntilReady(5000);
  if (!client) {
    logger.warn('Redis not ready, dedup state kept in memory');
    return createMemoryDedupIndex(config);
  }
  logger.info(`Dedup state: Redis (${env.REDIS_KEY_PREFIX})`);
  return createRedisDedupIndex(client, env.REDIS_KEY_PREFIX, config);
}

const startServer = async (): Promise<void> => {
  try {
    const sites = await loadSiteConfigs(env.SITES_CONFIG_PATH);
    logger.info(`Loaded ${sites.length} site(s): ${sites.map((site) => site.siteId).join(', ')}`);

    const dedup = await createDedupIndex();
    const sink = await createListingSink({ type: env.SINK, csvPath: env.CSV_OUTPUT_PATH, mongoUri: env.MONGODB_URI });
    const identities = createIdentities({
      proxyUrls: splitProxyUrls(env.PROXY_URLS ?? ''),
      directIdentities: env.DIRECT_IDENTITIES,
    });
    logger.info(`Identity pool: ${identities.length} identit${identities.length === 1 ? 'y' : 'ies'}`);

    const fetcher = new HttpFetcher();
    const pipeline = new CrawlPipeline(
      {
        sites,
        dedup,
        sink,
        identities,
        fetcher,
        frontierStore: new FileFrontierStore(env.FRONTIER_SNAPSHOT_PATH),
      },
      {
        workerCount: env.WORKER_COUNT,
        idlePollMs: env.WORKER_IDLE_POLL_MS,
        defaultTimeoutMs: env.FETCH_TIMEOUT,
        sinkMaxAttempts: env.SINK_MAX_ATTEMPTS,
        sinkBackoffBaseMs: env.SINK_BACKOFF_BASE,
        metricsIntervalMs: env.METRICS_INTERVAL_MS,
        governor: {
          maxBackoffMultiplier: env.GOVERNOR_MAX_BACKOFF_MULTIPLIER,
          decayWindowMs: env.GOVERNOR_DECAY_WINDOW_MS,
        },
        breaker: {
          windowMs: env.CIRCUIT_BREAKER_WINDOW_MS,
          errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
          minimumRequests: env.CIRCUIT_BREAKER_MIN_REQUESTS,
          cooldownMs: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
          halfOpenMaxProbes: env.CIRCUIT_BREAKER_HALF_OPEN_PROBES,
        },
        identityPool: {
          maxConsecutiveFailures: env.IDENTITY_MAX_CONSECUTIVE_FAILURES,
          cooldownMs: env.IDENTITY_COOLDOWN_MS,
        },
      }
    );

    const httpServer = createServer(createApp(pipeline));
    httpServer.listen(env.PORT, () => {
      logger.info(`Listing crawler control API on port ${env.PORT} (${env.NODE_ENV})`);
    });

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`${signal} received, shutting down gracefully...`);

      await pipeline.stop();
      await sink.close();
      await fetcher.close();
      await redisConnection.disconnect();
      httpServer.close(() => {
        logger.info('Server closed');
        process.exit(0);
      });
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    };
    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));

    pipeline.on(PipelineEvent.DRAINED, () => {
      logger.info('Frontier drained; control API stays up until shutdown');
    });

    await pipeline.start();
  } catch (error: unknown) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
