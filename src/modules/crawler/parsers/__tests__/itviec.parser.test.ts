/**
 * ITviec Parser Tests
 */

import { cleanText, ItviecParser } from '../itviec.parser';
import { ParseError } from '../../../../lib/scraping/errors';
import { cards, JOBS_BASE, listingPageHtml, makeRawPage } from '../../../../__tests__/helpers/fixtures';

describe('ItviecParser', () => {
  const parser = new ItviecParser();

  it('should extract every field of a search result card', () => {
    const page = makeRawPage(listingPageHtml(cards('a', 1)));

    const { listings } = parser.parse('jobs', page);

    expect(listings).toHaveLength(1);
    expect(listings[0]).toEqual({
      title: 'Engineer A 1',
      canonicalLink: `${JOBS_BASE}/it-jobs/a-1`,
      company: 'Company A1',
      location: 'Ho Chi Minh',
      postedDate: 'Posted 3 hours ago',
      logoUrl: `${JOBS_BASE}/images/a-1-logo.png`,
      skills: ['Java', 'AWS'],
      sourceSite: 'jobs',
      fetchTime: 1000,
    });
  });

  it('should return one listing per card', () => {
    const { listings } = parser.parse('jobs', makeRawPage(listingPageHtml(cards('b', 10))));

    expect(listings).toHaveLength(10);
    expect(listings.map((listing) => listing.title)).toContain('Engineer B 10');
  });

  it('should fall back to alternative selectors and text patterns', () => {
    const html = `
      <div class="job-item">
        <div class="job-title">Senior Go Developer</div>
        <a href="/it-jobs/senior-go?utm_source=feed">Apply</a>
        <div class="company-name">Gopher Co</div>
        <div class="details">Remote - 2 days ago - Docker, Go, PostgreSQL</div>
      </div>`;

    const { listings } = parser.parse('jobs', makeRawPage(html));

    expect(listings).toEqual([
      {
        title: 'Senior Go Developer',
        canonicalLink: `${JOBS_BASE}/it-jobs/senior-go`,
        company: 'Gopher Co',
        location: 'Remote',
        postedDate: '2 days ago',
        skills: ['Go', 'Docker', 'PostgreSQL'],
        sourceSite: 'jobs',
        fetchTime: 1000,
      },
    ]);
  });

  it('should find job blocks heuristically when no known container matches', () => {
    const html = `
      <section>
        <div>
          <h3>Data Engineer</h3>
          <a href="/it-jobs/data-eng">Details</a>
        </div>
      </section>`;

    const { listings } = parser.parse('jobs', makeRawPage(html));

    expect(listings).toEqual([
      {
        title: 'Data Engineer',
        canonicalLink: `${JOBS_BASE}/it-jobs/data-eng`,
        company: 'N/A',
        location: 'N/A',
        postedDate: 'N/A',
        skills: [],
        sourceSite: 'jobs',
        fetchTime: 1000,
      },
    ]);
  });

  it('should skip cards without a link', () => {
    const html = listingPageHtml(cards('c', 1)).replace('<main>', '<main><div data-search-id="broken"><h3>No link</h3></div>');

    const { listings } = parser.parse('jobs', makeRawPage(html));

    expect(listings.map((listing) => listing.title)).toEqual(['Engineer C 1']);
  });

  it('should resolve links against the final URL after redirects', () => {
    const page = { ...makeRawPage(listingPageHtml(cards('d', 1))), finalUrl: 'https://mirror.example.com/search' };

    const { listings } = parser.parse('jobs', page);

    expect(listings[0].canonicalLink).toBe('https://mirror.example.com/it-jobs/d-1');
  });

  it('should collect raw hrefs in document order, skipping anchors and scripts', () => {
    const html = listingPageHtml(cards('a', 1), ['/it-jobs?page=2', '#top', 'javascript:void(0)']);

    const { discoveredLinks } = parser.parse('jobs', makeRawPage(html));

    expect(discoveredLinks).toEqual(['/it-jobs/a-1', '/companies/a-1-co', '/it-jobs?page=2']);
  });

  it('should return no listings for a page without job content', () => {
    const result = parser.parse('jobs', makeRawPage('<html><body><p>Maintenance</p></body></html>'));
    expect(result).toEqual({ listings: [], discoveredLinks: [] });
  });

  it('should throw a ParseError for an empty body', () => {
    expect(() => parser.parse('jobs', makeRawPage('   '))).toThrow(ParseError);
  });
});

describe('cleanText', () => {
  it('should collapse whitespace and strip bullets and image placeholders', () => {
    expect(cleanText('  • Hello   world [Image: logo] ')).toBe('Hello world');
  });

  it('should return an empty string for missing text', () => {
    expect(cleanText(undefined)).toBe('');
  });
});
