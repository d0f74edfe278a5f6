/**
 * Redis Connection Tests
 * Unit tests for the shared Redis connection
 */

import { EventEmitter } from 'events';
import Redis from 'ioredis';
import { RedisConnection, RedisConnectionConfig } from '../redis';

class MockRedis extends EventEmitter {
  status: string = 'connecting';
  ping = jest.fn(async () => 'PONG');
  quit = jest.fn(async () => 'OK');

  becomeReady(): void {
    this.status = 'ready';
    this.emit('ready');
  }
}

let mockInstances: MockRedis[] = [];

jest.mock('ioredis', () => ({
  __esModule: true,
  default: jest.fn(() => {
    const instance = new MockRedis();
    mockInstances.push(instance);
    return instance;
  }),
}));

describe('RedisConnection', () => {
  const config: RedisConnectionConfig = {
    enabled: true,
    url: 'redis://localhost:6379',
    password: 'test-secret',
    db: 2,
    maxConnectionAttempts: 2,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockInstances = [];
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should not connect when disabled', async () => {
    const connection = new RedisConnection({ ...config, enabled: false });

    expect(connection.getClient()).toBeNull();
    await expect(connection.waitUntilReady()).resolves.toBeNull();
    expect(Redis).not.toHaveBeenCalled();
  });

  it('should connect with the configured options', () => {
    const connection = new RedisConnection(config);

    expect(connection.getClient()).toBeNull();
    expect(Redis).toHaveBeenCalledTimes(1);
    expect(Redis).toHaveBeenCalledWith(
      'redis://localhost:6379',
      expect.objectContaining({ db: 2, password: 'test-secret', enableOfflineQueue: false })
    );
  });

  it('should return the client once ready', () => {
    const connection = new RedisConnection(config);
    connection.getClient();
    mockInstances[0].becomeReady();

    expect(connection.getClient()).toBe(mockInstances[0]);
    expect(connection.isAvailable()).toBe(true);
    expect(Redis).toHaveBeenCalledTimes(1);
  });

  it('should wait for the ready event', async () => {
    const connection = new RedisConnection(config);
    const pending = connection.waitUntilReady(1000);
    mockInstances[0].becomeReady();

    await expect(pending).resolves.toBe(mockInstances[0]);
  });

  it('should give up waiting after the timeout', async () => {
    jest.useFakeTimers();
    const connection = new RedisConnection(config);
    const pending = connection.waitUntilReady(1000);
    jest.advanceTimersByTime(1000);

    await expect(pending).resolves.toBeNull();
    expect(mockInstances[0].listenerCount('ready')).toBe(1);
  });

  describe('healthCheck', () => {
    it('should return true when Redis responds to ping', async () => {
      const connection = new RedisConnection(config);
      connection.getClient();
      mockInstances[0].becomeReady();

      await expect(connection.healthCheck()).resolves.toBe(true);
    });

    it('should return false when ping fails', async () => {
      const connection = new RedisConnection(config);
      connection.getClient();
      mockInstances[0].becomeReady();
      mockInstances[0].ping.mockRejectedValueOnce(new Error('Connection failed'));

      await expect(connection.healthCheck()).resolves.toBe(false);
    });

    it('should return false before the client is ready', async () => {
      const connection = new RedisConnection(config);

      await expect(connection.healthCheck()).resolves.toBe(false);
    });
  });

  it('should stop creating clients after the attempt limit', () => {
    const connection = new RedisConnection(config);
    connection.getClient();
    mockInstances[0].emit('end');
    connection.getClient();
    mockInstances[1].emit('end');

    expect(connection.getClient()).toBeNull();
    expect(Redis).toHaveBeenCalledTimes(2);
  });

  it('should quit and reconnect on demand after disconnect', async () => {
    const connection = new RedisConnection(config);
    connection.getClient();
    await connection.disconnect();

    expect(mockInstances[0].quit).toHaveBeenCalledTimes(1);

    connection.getClient();
    expect(Redis).toHaveBeenCalledTimes(2);
  });

  it('should handle disconnect when no client exists', async () => {
    const connection = new RedisConnection(config);

    await expect(connection.disconnect()).resolves.toBeUndefined();
  });
});
