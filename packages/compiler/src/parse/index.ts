export { formatAst } from './ast-printer.ts'
export { type ParseOptions, ParseError, Parser, type ParseResult, parse } from './parser.ts'
export { binaryOperatorOf, Precedence, precedenceOf } from './precedence.ts'
