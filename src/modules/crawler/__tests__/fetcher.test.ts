/**
 * Page Fetcher Tests
 */

import { MockAgent } from 'undici';
import { HttpFetcher } from '../fetcher';
import { FetchErrorCode } from '../../../lib/scraping/errors';
import { JOBS_BASE, makeIdentity } from '../../../__tests__/helpers/fixtures';

describe('HttpFetcher', () => {
  let agent: MockAgent;
  let fetcher: HttpFetcher;
  const identity = makeIdentity('direct_1');

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    fetcher = new HttpFetcher({ dispatcher: agent });
  });

  afterEach(async () => {
    await fetcher.close();
    await agent.close();
  });

  it('should return the page with its status and headers', async () => {
    agent
      .get(JOBS_BASE)
      .intercept({ path: '/it-jobs', method: 'GET' })
      .reply(200, '<html>jobs</html>', { headers: { 'content-type': 'text/html' } });

    const page = await fetcher.fetch({ url: `${JOBS_BASE}/it-jobs`, identity, timeoutMs: 1000 });

    expect(page.statusCode).toBe(200);
    expect(page.body).toBe('<html>jobs</html>');
    expect(page.headers['content-type']).toBe('text/html');
    expect(page.finalUrl).toBe(`${JOBS_BASE}/it-jobs`);
    expect(page.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should return error statuses instead of throwing', async () => {
    agent.get(JOBS_BASE).intercept({ path: '/gone', method: 'GET' }).reply(404, 'not here');

    const page = await fetcher.fetch({ url: `${JOBS_BASE}/gone`, identity, timeoutMs: 1000 });

    expect(page.statusCode).toBe(404);
    expect(page.body).toBe('not here');
  });

  it('should follow redirects and report the final URL', async () => {
    const pool = agent.get(JOBS_BASE);
    pool.intercept({ path: '/old', method: 'GET' }).reply(301, '', { headers: { location: `${JOBS_BASE}/new` } });
    pool.intercept({ path: '/new', method: 'GET' }).reply(200, 'moved');

    const page = await fetcher.fetch({ url: `${JOBS_BASE}/old`, identity, timeoutMs: 1000 });

    expect(page.url).toBe(`${JOBS_BASE}/old`);
    expect(page.finalUrl).toBe(`${JOBS_BASE}/new`);
    expect(page.body).toBe('moved');
  });

  it('should throw a timeout error when the server is too slow', async () => {
    agent.get(JOBS_BASE).intercept({ path: '/slow', method: 'GET' }).reply(200, 'late').delay(200);

    await expect(fetcher.fetch({ url: `${JOBS_BASE}/slow`, identity, timeoutMs: 20 })).rejects.toMatchObject({
      name: 'FetchError',
      code: FetchErrorCode.TIMEOUT,
    });
  });

  it('should throw a network error when the connection fails', async () => {
    agent.get(JOBS_BASE).intercept({ path: '/down', method: 'GET' }).replyWithError(new Error('socket hang up'));

    await expect(fetcher.fetch({ url: `${JOBS_BASE}/down`, identity, timeoutMs: 1000 })).rejects.toMatchObject({
      code: FetchErrorCode.NETWORK,
    });
  });

  it('should reject URLs it cannot fetch without touching the network', async () => {
    await expect(fetcher.fetch({ url: 'ftp://jobs.example.com/file', identity, timeoutMs: 1000 })).rejects.toMatchObject({
      code: FetchErrorCode.INVALID_URL,
      message: 'Invalid URL: ftp://jobs.example.com/file',
    });
  });
});
