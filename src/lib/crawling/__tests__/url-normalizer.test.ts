/**
 * URL Normalizer Tests
 */

import { extractDomain, isValidUrl, normalizeUrl, resolveUrl, shouldFollowLink } from '../url-normalizer';

describe('normalizeUrl', () => {
  it('should lowercase the host, sort params and drop tracking params and fragments', () => {
    expect(normalizeUrl('https://Jobs.Example.com/it-jobs/?b=2&a=1&utm_source=x#top')).toBe(
      'https://jobs.example.com/it-jobs?a=1&b=2'
    );
  });

  it('should keep the root path slash', () => {
    expect(normalizeUrl('https://jobs.example.com')).toBe('https://jobs.example.com/');
  });

  it('should drop default ports', () => {
    expect(normalizeUrl('http://jobs.example.com:80/a')).toBe('http://jobs.example.com/a');
  });

  it('should resolve relative URLs against a base', () => {
    expect(normalizeUrl('/it-jobs/java', 'https://jobs.example.com/it-jobs')).toBe(
      'https://jobs.example.com/it-jobs/java'
    );
  });

  it('should reject non-http schemes and garbage', () => {
    expect(normalizeUrl('ftp://jobs.example.com/file')).toBeNull();
    expect(normalizeUrl('not a url')).toBeNull();
    expect(isValidUrl('mailto:hr@example.com')).toBe(false);
    expect(isValidUrl('https://jobs.example.com')).toBe(true);
  });
});

describe('extractDomain', () => {
  it('should strip the www prefix', () => {
    expect(extractDomain('https://www.Example.com/path')).toBe('example.com');
  });

  it('should return an empty string for invalid input', () => {
    expect(extractDomain('::')).toBe('');
  });
});

describe('resolveUrl', () => {
  it('should resolve against the base', () => {
    expect(resolveUrl('../b', 'https://example.com/a/c')).toBe('https://example.com/b');
  });
});

describe('shouldFollowLink', () => {
  const filter = { allowedDomains: ['example.com'], blockedPatterns: ['/sign_in'] };

  it('should follow links on allowed domains and their subdomains', () => {
    expect(shouldFollowLink('https://example.com/it-jobs', filter)).toBe(true);
    expect(shouldFollowLink('https://jobs.example.com/it-jobs', filter)).toBe(true);
  });

  it('should reject other domains', () => {
    expect(shouldFollowLink('https://other.com/it-jobs', filter)).toBe(false);
    expect(shouldFollowLink('https://notexample.com/it-jobs', filter)).toBe(false);
  });

  it('should reject blocked patterns', () => {
    expect(shouldFollowLink('https://example.com/sign_in', filter)).toBe(false);
  });

  it('should reject static assets', () => {
    expect(shouldFollowLink('https://example.com/logo.PNG', filter)).toBe(false);
  });
});
