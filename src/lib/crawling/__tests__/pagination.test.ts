/**
 * Pagination Tests
 */

import { expandSeeds, followsLinks, pageUrl, withQuery } from '../pagination';
import { makeSite, JOBS_BASE } from '../../../__tests__/helpers/fixtures';

describe('pageUrl', () => {
  it('should return the seed for the first page', () => {
    expect(pageUrl(`${JOBS_BASE}/it-jobs`, 'page', 1, 1)).toBe(`${JOBS_BASE}/it-jobs`);
  });

  it('should set the query parameter for later pages', () => {
    expect(pageUrl(`${JOBS_BASE}/it-jobs?q=java`, 'p', 4, 1)).toBe(`${JOBS_BASE}/it-jobs?q=java&p=4`);
  });
});

describe('expandSeeds', () => {
  it('should emit one depth-0 task per seed for link pagination', () => {
    const tasks = expandSeeds(makeSite({ seedUrls: [`${JOBS_BASE}/a`, `${JOBS_BASE}/b`] }));
    expect(tasks).toEqual([
      { url: `${JOBS_BASE}/a`, siteId: 'jobs', depth: 0 },
      { url: `${JOBS_BASE}/b`, siteId: 'jobs', depth: 0 },
    ]);
  });

  it('should expand query parameter pagination in page order', () => {
    const tasks = expandSeeds(
      makeSite({ pagination: { type: 'query_param', param: 'page', start: 1, maxPages: 3 } })
    );
    expect(tasks.map((task) => [task.url, task.priority])).toEqual([
      [`${JOBS_BASE}/it-jobs`, 0],
      [`${JOBS_BASE}/it-jobs?page=2`, 1],
      [`${JOBS_BASE}/it-jobs?page=3`, 2],
    ]);
  });

  it('should apply the site query to every page and tag each page with its series', () => {
    const tasks = expandSeeds(
      makeSite({
        query: { param: 'query', value: 'react' },
        pagination: { type: 'query_param', param: 'page', start: 1, maxPages: 2 },
      })
    );
    expect(tasks).toEqual([
      {
        url: `${JOBS_BASE}/it-jobs?query=react`,
        siteId: 'jobs',
        depth: 0,
        priority: 0,
        pageOf: { seedUrl: `${JOBS_BASE}/it-jobs?query=react`, page: 1 },
      },
      {
        url: `${JOBS_BASE}/it-jobs?query=react&page=2`,
        siteId: 'jobs',
        depth: 0,
        priority: 1,
        pageOf: { seedUrl: `${JOBS_BASE}/it-jobs?query=react`, page: 2 },
      },
    ]);
  });

  it('should apply the site query to link-paginated seeds', () => {
    const [task] = expandSeeds(makeSite({ query: { param: 'keyword', value: 'java' } }));
    expect(task.url).toBe(`${JOBS_BASE}/it-jobs?keyword=java`);
  });
});

describe('withQuery', () => {
  it('should set the search term on the seed', () => {
    expect(withQuery(`${JOBS_BASE}/it-jobs`, { param: 'q', value: 'node js' })).toBe(`${JOBS_BASE}/it-jobs?q=node+js`);
  });

  it('should leave the seed alone without a query', () => {
    expect(withQuery(`${JOBS_BASE}/it-jobs`, undefined)).toBe(`${JOBS_BASE}/it-jobs`);
  });
});

describe('followsLinks', () => {
  it('should be false only for sites without pagination', () => {
    expect(followsLinks(makeSite({ pagination: { type: 'none' } }))).toBe(false);
    expect(followsLinks(makeSite())).toBe(true);
  });
});
