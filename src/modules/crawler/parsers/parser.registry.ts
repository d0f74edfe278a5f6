/**
 * Parser Registry
 * Site adapters looked up by parser id
 */

import { RawPage } from '../../../lib/crawling/crawling.types';
import { ParseError } from '../../../lib/scraping/errors';
import { ParseOutcome, ParserAdapter } from './parser.types';

export class ParserRegistry {
  private readonly adapters: Map<string, ParserAdapter> = new Map();

  register(adapter: ParserAdapter): this {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Parser "${adapter.id}" is already registered`);
    }
    this.adapters.set(adapter.id, adapter);
    return this;
  }

  resolve(parserId: string): ParserAdapter | undefined {
    return this.adapters.get(parserId);
  }

  has(parserId: string): boolean {
    return this.adapters.has(parserId);
  }

  list(): string[] {
    return Array.from(this.adapters.keys());
  }

  /**
   * Run a parser; failures come back as values so one bad page never stops a worker
   */
  parse(parserId: string, siteId: string, page: RawPage): ParseOutcome {
    const adapter = this.adapters.get(parserId);
    if (!adapter) {
      return { ok: false, error: new ParseError(`No parser registered as "${parserId}"`, siteId, page.url) };
    }

    try {
      return { ok: true, result: adapter.parse(siteId, page) };
    } catch (error: unknown) {
      if (error instanceof ParseError) {
        return { ok: false, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new ParseError(`Parser "${parserId}" failed: ${message}`, siteId, page.url) };
    }
  }
}
