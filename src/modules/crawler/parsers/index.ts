/**
 * Parsers
 */

export * from './parser.types';
export * from './parser.registry';
export * from './itviec.parser';

import { ItviecParser } from './itviec.parser';
import { ParserRegistry } from './parser.registry';

/**
 * Registry with every bundled site adapter
 */
export function createDefaultParserRegistry(): ParserRegistry {
  return new ParserRegistry().register(new ItviecParser());
}
