import { type CompilationContext, stripBom } from '../core/context.ts'
import {
	KEYWORDS,
	ONE_CHAR_TOKENS,
	type Token,
	TokenKind,
	TWO_CHAR_OPERATORS,
} from '../core/tokens.ts'

/**
 * What to do with a character that starts no token.
 * - `error`: report MCLEX001, skip the character and keep going
 * - `token`: hand it to the parser as a single Unknown token
 */
export type UnknownCharacterPolicy = 'error' | 'token'

export interface LexerOptions {
	unknownCharacters?: UnknownCharacterPolicy
}

const INT32_MAX = 2 ** 31 - 1

function isDigit(char: string): boolean {
	return char >= '0' && char <= '9'
}

function isIdentifierStart(char: string): boolean {
	return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_'
}

function isIdentifierPart(char: string): boolean {
	return isIdentifierStart(char) || isDigit(char)
}

function isWhitespace(char: string): boolean {
	return char === ' ' || char === '\t' || char === '\n' || char === '\r'
}

/**
 * Pull-based lexer.
 * Each call to nextToken() scans exactly one token; the position only moves
 * forward, and once the input is exhausted every call returns Eof.
 */
export class Lexer {
	private readonly source: string
	private readonly context: CompilationContext
	private readonly policy: UnknownCharacterPolicy
	private pos = 0
	private line = 1
	private column = 1

	constructor(context: CompilationContext, options: LexerOptions = {}) {
		this.context = context
		this.source = stripBom(context.source)
		this.policy = options.unknownCharacters ?? 'error'
	}

	nextToken(): Token {
		for (;;) {
			this.skipTrivia()

			if (this.atEnd()) {
				return this.makeToken(TokenKind.Eof, '', null, this.line, this.column)
			}

			const char = this.peek()
			if (isIdentifierStart(char)) return this.scanIdentifier()
			if (isDigit(char)) return this.scanNumber()

			const operator = this.scanOperator()
			if (operator !== null) return operator

			const line = this.line
			const column = this.column
			this.advance()
			if (this.policy === 'token') {
				return this.makeToken(TokenKind.Unknown, char, null, line, column)
			}
			this.context.emit('MCLEX001', line, column, { char })
		}
	}

	private atEnd(): boolean {
		return this.pos >= this.source.length
	}

	private peek(offset = 0): string {
		return this.source.charAt(this.pos + offset)
	}

	private advance(): string {
		const char = this.source.charAt(this.pos)
		this.pos++
		if (char === '\n') {
			this.line++
			this.column = 1
		} else {
			this.column++
		}
		return char
	}

	private makeToken(
		kind: TokenKind,
		lexeme: string,
		value: number | null,
		line: number,
		column: number
	): Token {
		return { column, kind, lexeme, line, value }
	}

	private skipTrivia(): void {
		while (!this.atEnd()) {
			const char = this.peek()
			if (isWhitespace(char)) {
				this.advance()
			} else if (char === '/' && this.peek(1) === '/') {
				this.skipLineComment()
			} else if (char === '/' && this.peek(1) === '*') {
				this.skipBlockComment()
			} else {
				return
			}
		}
	}

	private skipLineComment(): void {
		while (!this.atEnd() && this.peek() !== '\n') {
			this.advance()
		}
	}

	private skipBlockComment(): void {
		const line = this.line
		const column = this.column
		this.advance()
		this.advance()
		while (!this.atEnd()) {
			if (this.peek() === '*' && this.peek(1) === '/') {
				this.advance()
				this.advance()
				return
			}
			this.advance()
		}
		this.context.emit('MCLEX002', line, column)
	}

	private scanIdentifier(): Token {
		const line = this.line
		const column = this.column
		const start = this.pos
		while (!this.atEnd() && isIdentifierPart(this.peek())) {
			this.advance()
		}
		const text = this.source.slice(start, this.pos)
		const keyword = KEYWORDS.get(text)
		return this.makeToken(keyword ?? TokenKind.Identifier, text, null, line, column)
	}

	/** Digits with at most one decimal point; a second point ends the number. */
	private scanNumber(): Token {
		const line = this.line
		const column = this.column
		const start = this.pos
		while (isDigit(this.peek())) this.advance()

		let isFloat = false
		if (this.peek() === '.') {
			isFloat = true
			this.advance()
			while (isDigit(this.peek())) this.advance()
		}

		const text = this.source.slice(start, this.pos)
		const value = Number(text)
		if (isFloat) {
			return this.makeToken(TokenKind.FloatLiteral, text, value, line, column)
		}
		if (value > INT32_MAX) {
			this.context.emit('MCLEX003', line, column, { literal: text })
		}
		return this.makeToken(TokenKind.IntLiteral, text, value, line, column)
	}

	private scanOperator(): Token | null {
		const line = this.line
		const column = this.column
		const pair = this.peek() + this.peek(1)
		const twoChar = TWO_CHAR_OPERATORS.get(pair)
		if (twoChar !== undefined) {
			this.advance()
			this.advance()
			return this.makeToken(twoChar, pair, null, line, column)
		}

		const char = this.peek()
		const oneChar = ONE_CHAR_TOKENS.get(char)
		if (oneChar === undefined) return null
		this.advance()
		return this.makeToken(oneChar, char, null, line, column)
	}
}

/**
 * Drain a lexer into an array, Eof included.
 * The parser never does this; it is for diagnostics tooling and tests.
 */
export function tokenize(context: CompilationContext, options: LexerOptions = {}): Token[] {
	const lexer = new Lexer(context, options)
	const tokens: Token[] = []
	for (;;) {
		const token = lexer.nextToken()
		tokens.push(token)
		if (token.kind === TokenKind.Eof) return tokens
	}
}
