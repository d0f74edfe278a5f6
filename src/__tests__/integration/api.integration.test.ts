/**
 * Control API Integration Tests
 * Express app served on a loopback port with an idle pipeline behind it
 */

import { Server } from 'http';
import { AddressInfo } from 'net';
import { request } from 'undici';
import { createApp } from '../../app';
import { CrawlPipeline } from '../../modules/crawler/crawl.pipeline';
import { MemoryListingSink } from '../../modules/listings/listing.sinks';
import { createMemoryDedupIndex } from '../../lib/dedup/dedup.index';
import { CrawlOutcome } from '../../lib/scraping/errors';
import { makeIdentity, makeSite } from '../helpers/fixtures';
import { ScriptedFetcher } from '../helpers/mocks';

describe('Control API Integration Tests', () => {
  let pipeline: CrawlPipeline;
  let server: Server;
  let baseUrl: string;

  const call = async (method: 'GET' | 'POST', path: string) => {
    const response = await request(`${baseUrl}${path}`, { method });
    return { statusCode: response.statusCode, headers: response.headers, body: await response.body.json() };
  };

  beforeEach(async () => {
    pipeline = new CrawlPipeline(
      {
        sites: [makeSite()],
        dedup: createMemoryDedupIndex({ expectedItems: 1000 }),
        sink: new MemoryListingSink(),
        identities: [makeIdentity('direct_1')],
        fetcher: new ScriptedFetcher(() => ({ body: '' })),
      },
      { metricsIntervalMs: 0 }
    );
    server = createApp(pipeline).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${(address satisfies AddressInfo).port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should report health with security headers', async () => {
    const response = await call('GET', '/health');

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-content-type-options']).toBe('nosniff');
    expect(response.body).toMatchObject({ success: true, state: 'idle', environment: 'test' });
  });

  it('should return pipeline status', async () => {
    const response = await call('GET', '/api/crawl/status');

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({
      success: true,
      status: {
        state: 'idle',
        workers: 4,
        sites: [{ siteId: 'jobs', pending: 0, inFlight: 0, paused: false, breakerState: 'closed' }],
        totals: { fetched: 0 },
      },
    });
  });

  it('should return a metrics snapshot', async () => {
    const response = await call('GET', '/api/crawl/metrics');

    expect(response.body).toMatchObject({
      success: true,
      metrics: { sites: [{ siteId: 'jobs', effectiveIntervalMs: 1000 }], identities: [{ id: 'direct_1' }] },
    });
  });

  it('should pause and resume a site', async () => {
    const paused = await call('POST', '/api/crawl/sites/jobs/pause');
    expect(paused.body).toEqual({ success: true, siteId: 'jobs', paused: true });
    expect(pipeline.governor.isPaused('jobs')).toBe(true);

    const resumed = await call('POST', '/api/crawl/sites/jobs/resume');
    expect(resumed.body).toEqual({ success: true, siteId: 'jobs', paused: false });
    expect(pipeline.governor.isPaused('jobs')).toBe(false);
  });

  it('should answer 404 for an unknown site', async () => {
    const response = await call('POST', '/api/crawl/sites/nope/pause');

    expect(response.statusCode).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'Unknown site: nope' });
  });

  it('should return the latest crawl log entries of a site', async () => {
    for (const [timestamp, outcome] of [
      [1000, CrawlOutcome.SUCCESS],
      [2000, CrawlOutcome.SERVER_ERROR],
      [3000, CrawlOutcome.SUCCESS],
    ] as const) {
      pipeline.crawlLog.append({ siteId: 'jobs', timestamp, outcome, latencyMs: 5 });
    }

    const response = await call('GET', '/api/crawl/sites/jobs/log?limit=2');

    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({
      success: true,
      siteId: 'jobs',
      entries: [
        { siteId: 'jobs', timestamp: 2000, outcome: '5xx', latencyMs: 5 },
        { siteId: 'jobs', timestamp: 3000, outcome: 'success', latencyMs: 5 },
      ],
    });
  });

  it('should reject an invalid log limit', async () => {
    const response = await call('GET', '/api/crawl/sites/jobs/log?limit=0');

    expect(response.statusCode).toBe(400);
    expect(response.body).toEqual({ success: false, error: 'limit must be an integer between 1 and 1000' });
  });

  it('should stop the pipeline', async () => {
    const response = await call('POST', '/api/crawl/stop');

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({ success: true, status: { state: 'stopped' } });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await call('GET', '/api/nothing');

    expect(response.statusCode).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'Route not found', path: '/api/nothing' });
  });
});
