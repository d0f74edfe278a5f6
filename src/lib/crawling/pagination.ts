/**
 * Pagination
 * Expands a site's seeds into the depth-0 tasks of a run
 */

import { SearchQuery, SiteConfig, TaskInput } from './crawling.types';

/**
 * Seed URL with the site's search term applied
 */
export function withQuery(seedUrl: string, query: SearchQuery | undefined): string {
  if (!query) {
    return seedUrl;
  }
  const url = new URL(seedUrl);
  url.searchParams.set(query.param, query.value);
  return url.href;
}

/**
 * URL of a given page for query-parameter pagination. The first page is the
 * seed itself; later pages set the parameter.
 */
export function pageUrl(seedUrl: string, param: string, page: number, start: number): string {
  if (page === start) {
    return seedUrl;
  }
  const url = new URL(seedUrl);
  url.searchParams.set(param, String(page));
  return url.href;
}

export function expandSeeds(site: SiteConfig): TaskInput[] {
  const tasks: TaskInput[] = [];
  const pagination = site.pagination;

  for (const seed of site.seedUrls) {
    const seedUrl = withQuery(seed, site.query);
    if (pagination.type !== 'query_param') {
      tasks.push({ url: seedUrl, siteId: site.siteId, depth: 0 });
      continue;
    }

    for (let offset = 0; offset < pagination.maxPages; offset++) {
      const page = pagination.start + offset;
      tasks.push({
        url: pageUrl(seedUrl, pagination.param, page, pagination.start),
        siteId: site.siteId,
        depth: 0,
        priority: offset,
        pageOf: { seedUrl, page },
      });
    }
  }

  return tasks;
}

/**
 * Whether links discovered on a site's pages are followed
 */
export function followsLinks(site: SiteConfig): boolean {
  return site.pagination.type !== 'none';
}
