/**
 * URL Normalization Utilities
 * Functions for normalizing and validating URLs
 */

// Query parameters that never change the page content
const TRACKING_PARAMS = ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'gclid', 'fbclid'];

const BLOCKED_EXTENSIONS = ['.pdf', '.zip', '.jpg', '.jpeg', '.png', '.gif', '.svg', '.css', '.js', '.xml', '.ico', '.webp'];

export interface LinkFilter {
  allowedDomains: string[];
  blockedPatterns: string[];
}

/**
 * Normalize a URL by removing fragments, sorting query params, etc.
 * Returns null when the input cannot be parsed as an http(s) URL.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);
  } catch {
    return null;
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    return null;
  }

  urlObj.hash = '';

  // Sort query parameters, dropping tracking ones
  const sortedParams = Array.from(urlObj.searchParams.entries())
    .filter(([key]) => !TRACKING_PARAMS.includes(key.toLowerCase()))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  urlObj.search = '';
  sortedParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  // Remove trailing slash (except for root)
  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.slice(0, -1);
  }

  // URL already lowercases the hostname and drops default ports
  return urlObj.href;
}

/**
 * Extract domain from URL
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    // Remove www. prefix for comparison
    let hostname = urlObj.hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * Validate URL format (absolute http/https only)
 */
export function isValidUrl(url: string): boolean {
  return normalizeUrl(url) !== null;
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string | null {
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Determine if a discovered link should be followed for a site
 */
export function shouldFollowLink(url: string, filter: LinkFilter): boolean {
  const normalized = normalizeUrl(url);
  if (!normalized) {
    return false;
  }

  for (const pattern of filter.blockedPatterns) {
    if (new RegExp(pattern).test(normalized)) {
      return false;
    }
  }

  const domain = extractDomain(normalized);
  const isAllowed = filter.allowedDomains.some((allowedDomain) => {
    const allowed = allowedDomain.toLowerCase().replace(/^www\./, '');
    return domain === allowed || domain.endsWith(`.${allowed}`);
  });
  if (!isAllowed) {
    return false;
  }

  // Block common non-content URLs
  const pathname = new URL(normalized).pathname.toLowerCase();
  return !BLOCKED_EXTENSIONS.some((ext) => pathname.endsWith(ext));
}
