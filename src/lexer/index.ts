/**
 * Lexer
 * Converts source text into tokens
 */

export { nextToken, scan } from './tokenizer.js';
