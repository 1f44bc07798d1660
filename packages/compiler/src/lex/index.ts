/**
 * Lexical analysis module.
 * Produces tokens on demand for the parser.
 */

export { Lexer, type LexerOptions, tokenize, type UnknownCharacterPolicy } from './lexer.ts'
