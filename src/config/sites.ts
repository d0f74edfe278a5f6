/**
 * Site Configuration
 * Loads and validates the per-site crawl settings
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SiteConfig } from '../lib/crawling/crawling.types';
import { extractDomain, isValidUrl } from '../lib/crawling/url-normalizer';
import { ConfigError } from '../lib/scraping/errors';

const positiveInt = z.number().int().positive();

const regexPattern = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'must be a valid regular expression' }
);

const PaginationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('links') }),
  z.object({
    type: z.literal('query_param'),
    param: z.string().min(1).default('page'),
    start: z.number().int().nonnegative().default(1),
    maxPages: positiveInt,
  }),
]);

const SiteSchema = z.object({
  siteId: z.string().regex(/^[a-z0-9_-]+$/i, 'siteId may contain letters, digits, "-" and "_" only'),
  seedUrls: z
    .array(z.string().refine(isValidUrl, { message: 'must be an http(s) URL' }))
    .min(1, 'at least one seed URL is required'),
  rateLimit: z.object({ requests: positiveInt, intervalMs: positiveInt }),
  maxConcurrency: positiveInt.default(1),
  parserId: z.string().min(1),
  maxDepth: z.number().int().nonnegative().default(1),
  retryPolicy: z
    .object({
      maxAttempts: positiveInt.default(3),
      baseBackoffMs: positiveInt.default(1000),
      maxBackoffMs: positiveInt.default(60000),
      maxBlockedAttempts: positiveInt.default(5),
    })
    .default({}),
  pagination: PaginationSchema.default({ type: 'links' }),
  query: z.string().min(1).optional(),
  queryParam: z.string().min(1).default('query'),
  allowedDomains: z.array(z.string().min(1)).optional(),
  blockedPatterns: z.array(regexPattern).default([]),
  timeoutMs: positiveInt.optional(),
});

const SitesFileSchema = z.object({
  sites: z.array(SiteSchema).min(1, 'at least one site is required'),
});

type ParsedSite = z.infer<typeof SiteSchema>;

function toSiteConfig(site: ParsedSite): SiteConfig {
  const seedDomains = Array.from(new Set(site.seedUrls.map(extractDomain)));
  return {
    siteId: site.siteId,
    seedUrls: site.seedUrls,
    ...(site.query !== undefined ? { query: { param: site.queryParam, value: site.query } } : {}),
    rateLimit: site.rateLimit,
    maxConcurrency: site.maxConcurrency,
    parserId: site.parserId,
    maxDepth: site.maxDepth,
    retryPolicy: site.retryPolicy,
    pagination: site.pagination,
    allowedDomains: site.allowedDomains ?? seedDomains,
    blockedPatterns: site.blockedPatterns,
    ...(site.timeoutMs !== undefined ? { timeoutMs: site.timeoutMs } : {}),
  };
}

/**
 * Validate a parsed sites document (`{ sites: [...] }`)
 */
export function parseSiteConfigs(input: unknown): SiteConfig[] {
  const parsed = SitesFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid site configuration', issues);
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const site of parsed.data.sites) {
    if (seen.has(site.siteId)) {
      duplicates.push(`duplicate siteId "${site.siteId}"`);
    }
    seen.add(site.siteId);
  }
  if (duplicates.length > 0) {
    throw new ConfigError('Invalid site configuration', duplicates);
  }

  return parsed.data.sites.map(toSiteConfig);
}

export async function loadSiteConfigs(filePath: string): Promise<SiteConfig[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read site configuration ${filePath}`, [message]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Site configuration ${filePath} is not valid JSON`, [message]);
  }

  return parseSiteConfigs(json);
}
