/**
 * Redis Connection
 * Shared connection holding dedup state across crawler processes
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../config/env';
import { logger } from './logger';

export interface RedisConnectionConfig {
  enabled: boolean;
  url: string;
  password: string | undefined;
  db: number;
  maxConnectionAttempts: number;
}

export class RedisConnection {
  private client: Redis | null = null;
  private connectionAttempts: number = 0;

  constructor(private readonly config: RedisConnectionConfig) {}

  /**
   * Ready client, or null while disabled, connecting or out of attempts
   */
  getClient(): Redis | null {
    const client = this.client ?? this.connect();
    return client !== null && client.status === 'ready' ? client : null;
  }

  private connect(): Redis | null {
    if (!this.config.enabled) {
      return null;
    }

    if (this.connectionAttempts >= this.config.maxConnectionAttempts) {
      logger.error('Max Redis connection attempts reached, using in-memory dedup state');
      return null;
    }
    this.connectionAttempts++;

    const options: RedisOptions = {
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        logger.debug(`Redis retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      // Dedup commands fail fast instead of queueing while disconnected
      enableOfflineQueue: false,
      db: this.config.db,
    };
    if (this.config.password) {
      options.password = this.config.password;
    }

    const client = new Redis(this.config.url, options);
    this.client = client;

    client.on('ready', () => {
      logger.info('Redis: Connected and ready');
      this.connectionAttempts = 0;
    });
    client.on('error', (error: Error) => {
      logger.error('Redis error:', error.message);
    });
    client.on('reconnecting', () => {
      logger.debug('Redis: Reconnecting...');
    });
    client.on('end', () => {
      logger.warn('Redis: Connection ended');
      if (this.client === client) {
        this.client = null;
      }
    });

    return client;
  }

  /**
   * Wait for the client to become ready, up to timeoutMs
   */
  async waitUntilReady(timeoutMs: number = 2000): Promise<Redis | null> {
    const client = this.client ?? this.connect();
    if (client === null) {
      return null;
    }
    if (client.status === 'ready') {
      return client;
    }

    return new Promise((resolve) => {
      const onReady = () => {
        clearTimeout(timer);
        resolve(client);
      };
      const timer = setTimeout(() => {
        client.off('ready', onReady);
        resolve(null);
      }, timeoutMs);
      client.once('ready', onReady);
    });
  }

  async healthCheck(): Promise<boolean> {
    const client = this.getClient();
    if (!client) {
      return false;
    }

    try {
      return (await client.ping()) === 'PONG';
    } catch (error: unknown) {
      logger.error('Redis health check failed:', error);
      return false;
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    this.connectionAttempts = 0;
    await client.quit();
  }

  isAvailable(): boolean {
    return this.getClient() !== null;
  }
}

export const redisConnection = new RedisConnection({
  enabled: env.REDIS_ENABLED,
  url: env.REDIS_URL,
  password: env.REDIS_PASSWORD,
  db: env.REDIS_DB,
  maxConnectionAttempts: 5,
});
