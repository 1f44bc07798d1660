/**
 * Token definitions.
 * Tokens are produced one at a time by the lexer and never stored in bulk.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	AndAnd: 33,
	Assign: 25,
	Bang: 32,
	Bool: 52,
	Comma: 4,
	Double: 51,
	Else: 55,

	// Special (250-255)
	Eof: 255,
	EqualEqual: 26,
	Extern: 58,
	False: 60,
	FloatLiteral: 102,
	Greater: 29,
	GreaterEqual: 31,

	// Identifiers and literals (100-199)
	Identifier: 100,
	If: 54,

	// Keywords (50-99)
	Int: 50,
	IntLiteral: 101,
	LeftBrace: 2,

	// Punctuation (0-19)
	LeftParen: 0,
	Less: 28,
	LessEqual: 30,
	Minus: 21,
	NotEqual: 27,
	OrOr: 34,
	Percent: 24,

	// Operators (20-49)
	Plus: 20,
	Return: 57,
	RightBrace: 3,
	RightParen: 1,
	Semicolon: 5,
	Slash: 23,
	Star: 22,
	True: 59,
	Unknown: 254,
	Void: 53,
	While: 56,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/**
 * A single token.
 * `value` carries the numeric value of literals and is null for everything else.
 */
export interface Token {
	readonly kind: TokenKind
	readonly lexeme: string
	readonly value: number | null
	readonly line: number
	readonly column: number
}

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['bool', TokenKind.Bool],
	['double', TokenKind.Double],
	['else', TokenKind.Else],
	['extern', TokenKind.Extern],
	['false', TokenKind.False],
	['if', TokenKind.If],
	['int', TokenKind.Int],
	['return', TokenKind.Return],
	['true', TokenKind.True],
	['void', TokenKind.Void],
	['while', TokenKind.While],
])

/** Two-character operators, matched before their one-character prefixes. */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['!=', TokenKind.NotEqual],
	['&&', TokenKind.AndAnd],
	['<=', TokenKind.LessEqual],
	['==', TokenKind.EqualEqual],
	['>=', TokenKind.GreaterEqual],
	['||', TokenKind.OrOr],
])

export const ONE_CHAR_TOKENS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['!', TokenKind.Bang],
	['%', TokenKind.Percent],
	['(', TokenKind.LeftParen],
	[')', TokenKind.RightParen],
	['*', TokenKind.Star],
	['+', TokenKind.Plus],
	[',', TokenKind.Comma],
	['-', TokenKind.Minus],
	['/', TokenKind.Slash],
	[';', TokenKind.Semicolon],
	['<', TokenKind.Less],
	['=', TokenKind.Assign],
	['>', TokenKind.Greater],
	['{', TokenKind.LeftBrace],
	['}', TokenKind.RightBrace],
])

const TYPE_KEYWORDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
	TokenKind.Bool,
	TokenKind.Double,
	TokenKind.Int,
	TokenKind.Void,
])

export function isTypeKeyword(kind: TokenKind): boolean {
	return TYPE_KEYWORDS.has(kind)
}

/** Display text for a token kind in diagnostics, e.g. `';'` or `identifier`. */
export function describeTokenKind(kind: TokenKind): string {
	switch (kind) {
		case TokenKind.Eof:
			return 'end of input'
		case TokenKind.Identifier:
			return 'identifier'
		case TokenKind.IntLiteral:
		case TokenKind.FloatLiteral:
			return 'number'
		case TokenKind.Unknown:
			return 'unknown token'
		default:
			return `'${spellingOf(kind)}'`
	}
}

/** Display text for a concrete token: its lexeme where it has one. */
export function describeToken(token: Token): string {
	switch (token.kind) {
		case TokenKind.Eof:
			return 'end of input'
		case TokenKind.Identifier:
			return `identifier '${token.lexeme}'`
		case TokenKind.IntLiteral:
		case TokenKind.FloatLiteral:
			return `number ${token.lexeme}`
		default:
			return `'${token.lexeme}'`
	}
}

function spellingOf(kind: TokenKind): string {
	for (const table of [KEYWORDS, TWO_CHAR_OPERATORS, ONE_CHAR_TOKENS]) {
		for (const [text, candidate] of table) {
			if (candidate === kind) return text
		}
	}
	return String(kind)
}
