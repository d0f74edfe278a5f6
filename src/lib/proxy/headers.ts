/**
 * Browser Header Sets
 * Each identity keeps one browser's headers for its whole lifetime, so a
 * proxy never switches browsers between requests.
 */

import { z } from 'zod';
import fingerprintData from './browser-fingerprints.json';

const FingerprintSchema = z.object({
  name: z.string().min(1),
  userAgent: z.string().min(1),
  headers: z.record(z.string(), z.string()),
});

export type BrowserFingerprint = z.infer<typeof FingerprintSchema>;

const BROWSER_FINGERPRINTS: readonly BrowserFingerprint[] = z.array(FingerprintSchema).min(1).parse(fingerprintData);

export function listFingerprints(): readonly BrowserFingerprint[] {
  return BROWSER_FINGERPRINTS;
}

/**
 * Request headers for a fingerprint; `overrides` win over the browser's own values
 */
export function buildHeaders(fingerprint: BrowserFingerprint, overrides?: Record<string, string>): Record<string, string> {
  return {
    'User-Agent': fingerprint.userAgent,
    ...fingerprint.headers,
    ...overrides,
  };
}

/**
 * In-site navigation from the page that linked here. Browsers without
 * fetch metadata headers only gain the Referer.
 */
export function withReferer(headers: Record<string, string>, referer: string): Record<string, string> {
  const next: Record<string, string> = { ...headers, Referer: referer };
  if ('Sec-Fetch-Site' in headers) {
    next['Sec-Fetch-Site'] = 'same-origin';
  }
  return next;
}
