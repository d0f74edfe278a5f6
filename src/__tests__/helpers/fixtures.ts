/**
 * Test Fixtures
 * Reusable test data
 */

import { createJobListing, FetchTask, JobListing, RawPage, SiteConfig } from '../../lib/crawling/crawling.types';
import { listFingerprints } from '../../lib/proxy/headers';
import { Identity } from '../../lib/proxy/identity.types';

export const JOBS_BASE = 'https://jobs.example.com';

export function makeSite(overrides: Partial<SiteConfig> = {}): SiteConfig {
  return {
    siteId: 'jobs',
    seedUrls: [`${JOBS_BASE}/it-jobs`],
    rateLimit: { requests: 100, intervalMs: 1000 },
    maxConcurrency: 2,
    parserId: 'itviec',
    maxDepth: 1,
    retryPolicy: { maxAttempts: 3, baseBackoffMs: 100, maxBackoffMs: 1000, maxBlockedAttempts: 5 },
    pagination: { type: 'links' },
    allowedDomains: ['jobs.example.com'],
    blockedPatterns: [],
    ...overrides,
  };
}

export function makeTask(overrides: Partial<FetchTask> = {}): FetchTask {
  return {
    id: 'task-1',
    url: `${JOBS_BASE}/it-jobs`,
    siteId: 'jobs',
    depth: 0,
    priority: 0,
    enqueueTime: 0,
    attemptCount: 0,
    blockedCount: 0,
    notBefore: 0,
    ...overrides,
  };
}

export function makeListing(overrides: Partial<Parameters<typeof createJobListing>[0]> = {}): JobListing {
  return createJobListing({
    title: 'Backend Engineer',
    canonicalLink: `${JOBS_BASE}/it-jobs/backend-engineer-1`,
    company: 'Acme Labs',
    location: 'Ha Noi',
    postedDate: 'Posted 2 days ago',
    skills: ['Java', 'AWS'],
    sourceSite: 'jobs',
    fetchTime: 0,
    ...overrides,
  });
}

export function makeRawPage(body: string, url: string = `${JOBS_BASE}/it-jobs`): RawPage {
  return {
    url,
    finalUrl: url,
    statusCode: 200,
    headers: { 'content-type': 'text/html' },
    body,
    fetchTime: 1000,
    latencyMs: 5,
  };
}

export function makeIdentity(id: string): Identity {
  return {
    id,
    fingerprint: listFingerprints()[0],
    healthScore: 1,
    consecutiveFailures: 0,
    cooldownUntil: 0,
    successCount: 0,
    failureCount: 0,
    blockedCount: 0,
  };
}

export interface JobCard {
  slug: string;
  title: string;
  company: string;
  city?: string;
  posted?: string;
  skills?: string[];
}

export function jobCardHtml(card: JobCard): string {
  const skills = (card.skills ?? []).map((skill) => `<span class="skill-chip">${skill}</span>`).join('');
  return `
    <div data-search-id="${card.slug}">
      <img src="/images/${card.slug}-logo.png" alt="${card.company}">
      <h3><a href="/it-jobs/${card.slug}">${card.title}</a></h3>
      <a href="/companies/${card.slug}-co">${card.company}</a>
      <span class="job-location">${card.city ?? 'Ho Chi Minh'}</span>
      <span class="posted-date">${card.posted ?? 'Posted 3 hours ago'}</span>
      <div class="meta">${skills}</div>
    </div>`;
}

/**
 * Search results page with job cards and optional extra links
 */
export function listingPageHtml(cards: JobCard[], links: string[] = []): string {
  const anchors = links.map((href) => `<a href="${href}">more</a>`).join('\n');
  return `<!DOCTYPE html>
<html>
<head><title>IT Jobs</title></head>
<body>
  <main>
    ${cards.map(jobCardHtml).join('\n')}
  </main>
  <nav>${anchors}</nav>
</body>
</html>`;
}

export function cards(prefix: string, count: number): JobCard[] {
  return Array.from({ length: count }, (_, i) => ({
    slug: `${prefix}-${i + 1}`,
    title: `Engineer ${prefix.toUpperCase()} ${i + 1}`,
    company: `Company ${prefix.toUpperCase()}${i + 1}`,
    skills: ['Java', 'AWS'],
  }));
}
