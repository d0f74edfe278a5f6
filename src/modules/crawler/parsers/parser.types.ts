/**
 * Parser Types
 */

import { ParseResult, RawPage } from '../../../lib/crawling/crawling.types';
import { ParseError } from '../../../lib/scraping/errors';

/**
 * Turns a fetched page into listings and links. Throws ParseError when the
 * page cannot be interpreted at all; an empty result is not an error.
 */
export interface ParserAdapter {
  readonly id: string;
  parse(siteId: string, page: RawPage): ParseResult;
}

export type ParseOutcome =
  | { ok: true; result: ParseResult }
  | { ok: false; error: ParseError };
