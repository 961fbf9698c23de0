/**
 * TinyRel - Parser Module
 *
 * Exports the SQL tokenizer and parser.
 */

export { Tokenizer } from './Tokenizer';
export type { Token, TokenType } from './Tokenizer';
export { Parser, parseSQL } from './Parser';
