/**
 * Site Configuration Tests
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadSiteConfigs, parseSiteConfigs } from '../sites';
import { ConfigError } from '../../lib/scraping/errors';

const minimalSite = {
  siteId: 'jobs',
  seedUrls: ['https://www.jobs.example.com/it-jobs'],
  rateLimit: { requests: 2, intervalMs: 1000 },
  parserId: 'itviec',
};

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseSiteConfigs', () => {
  it('should fill in defaults', () => {
    const [site] = parseSiteConfigs({ sites: [minimalSite] });

    expect(site).toEqual({
      siteId: 'jobs',
      seedUrls: ['https://www.jobs.example.com/it-jobs'],
      rateLimit: { requests: 2, intervalMs: 1000 },
      maxConcurrency: 1,
      parserId: 'itviec',
      maxDepth: 1,
      retryPolicy: { maxAttempts: 3, baseBackoffMs: 1000, maxBackoffMs: 60000, maxBlockedAttempts: 5 },
      pagination: { type: 'links' },
      allowedDomains: ['jobs.example.com'],
      blockedPatterns: [],
    });
  });

  it('should default query parameter pagination fields', () => {
    const [site] = parseSiteConfigs({
      sites: [{ ...minimalSite, pagination: { type: 'query_param', maxPages: 4 } }],
    });
    expect(site.pagination).toEqual({ type: 'query_param', param: 'page', start: 1, maxPages: 4 });
  });

  it('should turn a search term into a query on the default parameter', () => {
    const [plain, custom] = parseSiteConfigs({
      sites: [
        { ...minimalSite, query: 'react' },
        { ...minimalSite, siteId: 'jobs-java', query: 'java', queryParam: 'keyword' },
      ],
    });

    expect(plain.query).toEqual({ param: 'query', value: 'react' });
    expect(custom.query).toEqual({ param: 'keyword', value: 'java' });
  });

  it('should report every invalid field with its path', () => {
    const error = configError(() =>
      parseSiteConfigs({
        sites: [{ ...minimalSite, seedUrls: ['ftp://jobs.example.com'], blockedPatterns: ['('], maxConcurrency: 0 }],
      })
    );

    expect(error.issues).toContain('sites.0.seedUrls.0: must be an http(s) URL');
    expect(error.issues).toContain('sites.0.blockedPatterns.0: must be a valid regular expression');
    expect(error.issues.some((issue) => issue.startsWith('sites.0.maxConcurrency:'))).toBe(true);
  });

  it('should reject a document without sites', () => {
    const error = configError(() => parseSiteConfigs({ sites: [] }));
    expect(error.issues).toEqual(['sites: at least one site is required']);
  });

  it('should reject duplicate site ids', () => {
    const error = configError(() => parseSiteConfigs({ sites: [minimalSite, minimalSite] }));
    expect(error.issues).toEqual(['duplicate siteId "jobs"']);
  });
});

describe('loadSiteConfigs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sites-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load the bundled configuration', async () => {
    const sites = await loadSiteConfigs(path.resolve(__dirname, '../../../config/sites.json'));

    expect(sites).toHaveLength(1);
    expect(sites[0]).toMatchObject({
      siteId: 'itviec',
      parserId: 'itviec',
      maxDepth: 0,
      allowedDomains: ['itviec.com'],
      pagination: { type: 'query_param', param: 'page', start: 1, maxPages: 3 },
      timeoutMs: 10000,
    });
  });

  it('should wrap a missing file in a ConfigError', async () => {
    await expect(loadSiteConfigs(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigError);
  });

  it('should reject malformed JSON', async () => {
    const file = path.join(dir, 'sites.json');
    await fs.writeFile(file, '{ "sites": [');

    await expect(loadSiteConfigs(file)).rejects.toThrow(`Site configuration ${file} is not valid JSON`);
  });
});
