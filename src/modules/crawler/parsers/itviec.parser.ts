/**
 * ITviec Parser
 * Job cards from itviec.com search pages, with selector fallbacks for
 * layout changes
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';
import { createJobListing, JobListing, ParseResult, RawPage } from '../../../lib/crawling/crawling.types';
import { normalizeUrl, resolveUrl } from '../../../lib/crawling/url-normalizer';
import { logger } from '../../../lib/logger';
import { ParseError } from '../../../lib/scraping/errors';
import { ParserAdapter } from './parser.types';
import vocabulary from './itviec.vocabulary.json';

const SELECTORS = {
  container: 'div[data-search-id]',
  containerAlt: ['.job-item', '.search-result-item', '[class*="job"]'],
  title: ['h3 a', '.job-title a', '[class*="title"] a'],
  titleAlt: ['h3', '.job-title', '[class*="title"]'],
  company: ['a[href*="/companies/"]', '[class*="company"] a', '.company-name a', '.employer a'],
  companyAlt: ['[class*="company"]', '.company-name', '.employer'],
  location: ['[class*="location"]', '.job-location', '.location'],
  date: ['[class*="date"]', '.posted-date', '.time', '[class*="time"]'],
  logo: ['img[src*="logo"]', 'img[alt*="logo"]', '.company-logo img', '.logo img'],
  skills: ['[class*="skill"]', '.skills a', '.tag', '[class*="tag"]'],
};

const MAX_HEURISTIC_CONTAINERS = 20;
const MAX_COMPANY_LENGTH = 100;
const MAX_SKILL_LENGTH = 50;

const DATE_PATTERNS = vocabulary.datePatterns.map((pattern) => new RegExp(pattern, 'i'));
const LOCATION_PATTERNS = vocabulary.locationPatterns.map((pattern) => new RegExp(pattern, 'i'));
const SKILL_PATTERNS = vocabulary.commonSkills.map((skill) => ({
  skill,
  pattern: new RegExp(`\\b${escapeRegExp(skill)}\\b`, 'i'),
}));

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Collapse whitespace, drop leading bullets and image placeholders
 */
export function cleanText(text: string | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/^\s*[•‣◦⁃∙]\s*/, '')
    .replace(/\s*\[Image:.*?\]\s*/g, '');
}

function isCompanyName(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    text.length > 0 &&
    text.length < MAX_COMPANY_LENGTH &&
    !vocabulary.companyStopWords.some((word) => lower.includes(word))
  );
}

class ItviecPage {
  constructor(
    private readonly $: CheerioAPI,
    private readonly baseUrl: string
  ) {}

  findContainers(): Element[] {
    const $ = this.$;

    const primary = $(SELECTORS.container).toArray().filter(isTag);
    if (primary.length > 0) {
      return primary;
    }

    for (const selector of SELECTORS.containerAlt) {
      const found = $(selector).toArray().filter(isTag);
      if (found.length > 0) {
        logger.debug(`itviec: containers found with fallback selector ${selector}`);
        return found;
      }
    }

    // Last resort: blocks that read like a job and link to one
    const candidates = $('div, article, section')
      .toArray()
      .filter(isTag)
      .filter((element) => {
        const text = $(element).text().toLowerCase();
        if (!vocabulary.jobKeywords.some((keyword) => text.includes(keyword))) {
          return false;
        }
        const href = $(element).find('a[href]').first().attr('href') ?? '';
        return vocabulary.jobLinkPatterns.some((pattern) => href.includes(pattern));
      });

    const outermost: Element[] = [];
    for (const candidate of candidates) {
      if (!outermost.some((parent) => cheerio.contains(parent, candidate))) {
        outermost.push(candidate);
      }
    }
    return outermost.slice(0, MAX_HEURISTIC_CONTAINERS);
  }

  parseContainer(element: Element, siteId: string, fetchTime: number): JobListing | null {
    const container = this.$(element);
    const { title, link } = this.extractTitleAndLink(container);
    const canonicalLink = link ? normalizeUrl(link) : null;
    if (!canonicalLink) {
      return null;
    }

    const logoUrl = this.extractLogoUrl(container);
    return createJobListing({
      title: title || 'N/A',
      canonicalLink,
      company: this.extractCompany(container) || 'N/A',
      location: this.extractLocation(container) || 'N/A',
      postedDate: this.extractPostedDate(container) || 'N/A',
      skills: this.extractSkills(container),
      sourceSite: siteId,
      fetchTime,
      ...(logoUrl ? { logoUrl } : {}),
    });
  }

  discoverLinks(): string[] {
    const links: string[] = [];
    this.$('a[href]').each((_, anchor) => {
      const href = (this.$(anchor).attr('href') ?? '').trim();
      if (href && !href.startsWith('#') && !href.toLowerCase().startsWith('javascript:')) {
        links.push(href);
      }
    });
    return links;
  }

  private resolve(href: string | undefined): string {
    if (!href) {
      return '';
    }
    return resolveUrl(href, this.baseUrl) ?? '';
  }

  private extractTitleAndLink(container: Cheerio<Element>): { title: string; link: string } {
    let title = '';
    let link = '';

    for (const selector of SELECTORS.title) {
      const element = container.find(selector).first();
      if (element.length > 0) {
        title = cleanText(element.text());
        link = this.resolve(element.attr('href'));
        break;
      }
    }

    if (link) {
      return { title, link };
    }

    for (const selector of SELECTORS.titleAlt) {
      const element = container.find(selector).first();
      if (element.length === 0) {
        continue;
      }
      if (!title) {
        title = cleanText(element.text());
      }
      // Nearest link: inside the title, around it, or anywhere in the card
      const inner = element.find('a').first();
      const outer = element.closest('a');
      if (inner.length > 0) {
        link = this.resolve(inner.attr('href'));
      } else if (outer.length > 0) {
        link = this.resolve(outer.attr('href'));
      } else {
        link = this.resolve(container.find('a[href]').first().attr('href'));
      }
      break;
    }

    return { title, link };
  }

  private extractCompany(container: Cheerio<Element>): string {
    for (const selector of SELECTORS.company) {
      const element = container.find(selector).first();
      if (element.length > 0) {
        const text = cleanText(element.text());
        if (isCompanyName(text)) {
          return text;
        }
      }
    }

    for (const selector of SELECTORS.companyAlt) {
      const element = container.find(selector).first();
      if (element.length > 0) {
        const text = cleanText(element.text());
        if (text && text.length < MAX_COMPANY_LENGTH) {
          return text;
        }
      }
    }

    // Any company profile link, not just the first
    for (const anchor of container.find('a[href*="/companies/"]').toArray()) {
      const text = cleanText(this.$(anchor).text());
      if (isCompanyName(text)) {
        return text;
      }
    }

    return '';
  }

  private extractLocation(container: Cheerio<Element>): string {
    let location = '';

    for (const selector of SELECTORS.location) {
      const element = container.find(selector).first();
      if (element.length > 0) {
        location = cleanText(element.text());
        const lower = location.toLowerCase();
        if (vocabulary.cities.some((city) => lower.includes(city))) {
          break;
        }
      }
    }

    if (location) {
      return location;
    }

    const text = container.text();
    for (const pattern of LOCATION_PATTERNS) {
      const match = text.match(pattern);
      if (match) {
        return match[0];
      }
    }
    return '';
  }

  private extractPostedDate(container: Cheerio<Element>): string {
    for (const selector of SELECTORS.date) {
      const element = container.find(selector).first();
      if (element.length > 0) {
        const text = cleanText(element.text());
        const lower = text.toLowerCase();
        if (vocabulary.dateHints.some((hint) => lower.includes(hint))) {
          return text;
        }
      }
    }

    const text = container.text();
    for (const pattern of DATE_PATTERNS) {
      const match = text.match(pattern);
      if (match) {
        return match[0];
      }
    }
    return '';
  }

  private extractLogoUrl(container: Cheerio<Element>): string {
    for (const selector of SELECTORS.logo) {
      const src = container.find(selector).first().attr('src');
      if (src) {
        return this.resolve(src);
      }
    }

    for (const image of container.find('img').toArray()) {
      const src = this.$(image).attr('src') ?? '';
      const alt = (this.$(image).attr('alt') ?? '').toLowerCase();
      if (src && (src.toLowerCase().includes('logo') || alt.includes('logo') || alt.includes('company'))) {
        return this.resolve(src);
      }
    }
    return '';
  }

  private extractSkills(container: Cheerio<Element>): string[] {
    const skills: string[] = [];

    for (const selector of SELECTORS.skills) {
      for (const element of container.find(selector).toArray()) {
        const text = cleanText(this.$(element).text());
        if (text && text.length < MAX_SKILL_LENGTH) {
          skills.push(text);
        }
      }
    }

    if (skills.length === 0) {
      const text = container.text();
      for (const { skill, pattern } of SKILL_PATTERNS) {
        if (pattern.test(text)) {
          skills.push(skill);
        }
      }
    }

    return Array.from(new Set(skills));
  }
}

export class ItviecParser implements ParserAdapter {
  readonly id = 'itviec';

  parse(siteId: string, page: RawPage): ParseResult {
    if (!page.body.trim()) {
      throw new ParseError('Empty page body', siteId, page.url);
    }

    const document = new ItviecPage(cheerio.load(page.body), page.finalUrl);
    const containers = document.findContainers();
    if (containers.length === 0) {
      logger.warn(`itviec: no job containers on ${page.url}`);
    }

    const listings: JobListing[] = [];
    for (const container of containers) {
      const listing = document.parseContainer(container, siteId, page.fetchTime);
      if (listing) {
        listings.push(listing);
      }
    }

    return { listings, discoveredLinks: document.discoverLinks() };
  }
}
