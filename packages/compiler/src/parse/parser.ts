/**
 * Recursive-descent parser.
 *
 * Statements are parsed by structured recursion; binary expressions by
 * precedence climbing over the table in precedence.ts. The parser pulls
 * tokens from its own Lexer one at a time and keeps at most one token of
 * lookahead beyond the current one.
 */

import type { CompilationContext } from '../core/context.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	getDiagnostic,
	interpolateMessage,
} from '../core/diagnostics.ts'
import {
	type BlockStmt,
	type Declaration,
	type Expression,
	type ExternDecl,
	type FunctionDecl,
	NodeKind,
	type Param,
	type Program,
	type SourcePosition,
	type Statement,
	type TypeName,
} from '../core/nodes.ts'
import { describeToken, describeTokenKind, isTypeKeyword, type Token, TokenKind } from '../core/tokens.ts'
import { Lexer, type LexerOptions } from '../lex/lexer.ts'
import { binaryOperatorOf, Precedence, precedenceOf } from './precedence.ts'

export interface ParseOptions extends LexerOptions {
	/**
	 * Resynchronize at the next top-level declaration after an error and keep
	 * collecting diagnostics. The parse still fails.
	 */
	recover?: boolean
}

export interface ParseResult {
	succeeded: boolean
	program?: Program
}

/**
 * A grammar violation. Thrown by the parsing methods and turned into a
 * diagnostic by parse().
 */
export class ParseError extends Error {
	readonly code: DiagnosticCode
	readonly line: number
	readonly column: number
	readonly args: DiagnosticArgs | undefined

	constructor(code: DiagnosticCode, position: SourcePosition, args?: DiagnosticArgs) {
		super(interpolateMessage(getDiagnostic(code).message, args))
		this.name = 'ParseError'
		this.code = code
		this.line = position.line
		this.column = position.column
		this.args = args
	}
}

function typeNameOf(kind: TokenKind): TypeName | null {
	switch (kind) {
		case TokenKind.Int:
			return 'int'
		case TokenKind.Double:
			return 'double'
		case TokenKind.Bool:
			return 'bool'
		case TokenKind.Void:
			return 'void'
		default:
			return null
	}
}

function positionOf(token: Token): SourcePosition {
	return { column: token.column, line: token.line }
}

export class Parser {
	private readonly lexer: Lexer
	private current: Token
	private lookahead: Token | null = null
	/** Braces opened and not yet closed, used to resynchronize at top level. */
	private depth = 0

	constructor(context: CompilationContext, options: LexerOptions = {}) {
		this.lexer = new Lexer(context, options)
		this.current = this.lexer.nextToken()
	}

	// ===========================================================================
	// TOKEN CURSOR
	// ===========================================================================

	private peek(): Token {
		if (this.lookahead === null) {
			this.lookahead = this.lexer.nextToken()
		}
		return this.lookahead
	}

	private advance(): Token {
		const token = this.current
		if (token.kind === TokenKind.LeftBrace) this.depth++
		if (token.kind === TokenKind.RightBrace) this.depth = Math.max(0, this.depth - 1)
		if (this.lookahead !== null) {
			this.current = this.lookahead
			this.lookahead = null
		} else if (token.kind !== TokenKind.Eof) {
			this.current = this.lexer.nextToken()
		}
		return token
	}

	private check(kind: TokenKind): boolean {
		return this.current.kind === kind
	}

	private match(kind: TokenKind): boolean {
		if (!this.check(kind)) return false
		this.advance()
		return true
	}

	private expect(kind: TokenKind): Token {
		if (!this.check(kind)) {
			throw this.unexpected(describeTokenKind(kind))
		}
		return this.advance()
	}

	private unexpected(expected: string): ParseError {
		return new ParseError('MCPARSE001', positionOf(this.current), {
			expected,
			found: describeToken(this.current),
		})
	}

	/** `IDENT IDENT` where a type should be: the first identifier is an unknown type. */
	private atUnknownType(): boolean {
		return this.check(TokenKind.Identifier) && this.peek().kind === TokenKind.Identifier
	}

	private unknownType(): ParseError {
		return new ParseError('MCPARSE003', positionOf(this.current), { name: this.current.lexeme })
	}

	// ===========================================================================
	// DECLARATIONS
	// ===========================================================================

	parseProgram(): Program {
		const declarations: Declaration[] = []
		while (!this.check(TokenKind.Eof)) {
			declarations.push(this.parseDeclaration())
		}
		return { declarations, kind: NodeKind.Program }
	}

	atEnd(): boolean {
		return this.check(TokenKind.Eof)
	}

	parseDeclaration(): Declaration {
		if (this.check(TokenKind.Extern)) {
			return this.parseExtern()
		}
		if (isTypeKeyword(this.current.kind)) {
			return this.parseFunction()
		}
		if (this.atUnknownType()) {
			throw this.unknownType()
		}
		throw this.unexpected('a type')
	}

	/**
	 * Skip to the next token that can start a top-level declaration.
	 * Always consumes at least one token so a failing declaration cannot loop.
	 */
	synchronize(): void {
		this.advance()
		while (!this.check(TokenKind.Eof)) {
			const startsDeclaration =
				this.check(TokenKind.Extern) || isTypeKeyword(this.current.kind)
			if (this.depth === 0 && startsDeclaration) return
			this.advance()
		}
	}

	private parseReturnType(): TypeName {
		const type = typeNameOf(this.current.kind)
		if (type === null) {
			if (this.atUnknownType()) throw this.unknownType()
			throw this.unexpected('a type')
		}
		this.advance()
		return type
	}

	private parseSignature(): Pick<FunctionDecl, 'returnType' | 'name' | 'params'> {
		const returnType = this.parseReturnType()
		const name = this.expect(TokenKind.Identifier).lexeme
		this.expect(TokenKind.LeftParen)
		const params = this.parseParams()
		this.expect(TokenKind.RightParen)
		return { name, params, returnType }
	}

	private parseFunction(): FunctionDecl {
		const start = positionOf(this.current)
		const { name, params, returnType } = this.parseSignature()
		const body = this.parseBlock()
		return { body, kind: NodeKind.Function, name, params, returnType, ...start }
	}

	private parseExtern(): ExternDecl {
		const start = positionOf(this.advance())
		const { name, params, returnType } = this.parseSignature()
		this.expect(TokenKind.Semicolon)
		return { kind: NodeKind.Extern, name, params, returnType, ...start }
	}

	private parseParams(): Param[] {
		if (this.check(TokenKind.RightParen)) return []
		if (this.check(TokenKind.Void) && this.peek().kind === TokenKind.RightParen) {
			this.advance()
			return []
		}

		const params = [this.parseParam()]
		while (this.match(TokenKind.Comma)) {
			params.push(this.parseParam())
		}
		return params
	}

	/** `type IDENT`, or a bare `IDENT` which is an int. */
	private parseParam(): Param {
		const start = positionOf(this.current)
		const type = typeNameOf(this.current.kind)

		if (type === null) {
			if (this.atUnknownType()) throw this.unknownType()
			const name = this.expect(TokenKind.Identifier).lexeme
			return { name, type: 'int', ...start }
		}

		this.advance()
		const nameToken = this.expect(TokenKind.Identifier)
		if (type === 'void') {
			throw new ParseError('MCPARSE004', positionOf(nameToken), { name: nameToken.lexeme })
		}
		return { name: nameToken.lexeme, type, ...start }
	}

	// ===========================================================================
	// STATEMENTS
	// ===========================================================================

	private parseBlock(): BlockStmt {
		const open = this.expect(TokenKind.LeftBrace)
		const statements: Statement[] = []
		while (!this.check(TokenKind.RightBrace)) {
			if (this.check(TokenKind.Eof)) {
				throw new ParseError('MCPARSE002', positionOf(open))
			}
			statements.push(this.parseStatement())
		}
		this.advance()
		return { kind: NodeKind.Block, statements, ...positionOf(open) }
	}

	private parseStatement(): Statement {
		if (isTypeKeyword(this.current.kind)) {
			return this.parseVarDecl()
		}
		switch (this.current.kind) {
			case TokenKind.If:
				return this.parseIf()
			case TokenKind.While:
				return this.parseWhile()
			case TokenKind.Return:
				return this.parseReturn()
			case TokenKind.LeftBrace:
				return this.parseBlock()
			default:
				break
		}
		if (this.atUnknownType()) {
			throw this.unknownType()
		}
		return this.parseExprStmt()
	}

	private parseVarDecl(): Statement {
		const start = positionOf(this.current)
		const type = this.parseReturnType()
		const nameToken = this.expect(TokenKind.Identifier)
		if (type === 'void') {
			throw new ParseError('MCPARSE004', positionOf(nameToken), { name: nameToken.lexeme })
		}
		const initializer = this.match(TokenKind.Assign) ? this.parseExpression() : null
		this.expect(TokenKind.Semicolon)
		return { initializer, kind: NodeKind.VarDecl, name: nameToken.lexeme, type, ...start }
	}

	private parseIf(): Statement {
		const start = positionOf(this.advance())
		this.expect(TokenKind.LeftParen)
		const condition = this.parseExpression()
		this.expect(TokenKind.RightParen)
		const thenBranch = this.parseStatement()
		const elseBranch = this.match(TokenKind.Else) ? this.parseStatement() : null
		return { condition, elseBranch, kind: NodeKind.If, thenBranch, ...start }
	}

	private parseWhile(): Statement {
		const start = positionOf(this.advance())
		this.expect(TokenKind.LeftParen)
		const condition = this.parseExpression()
		this.expect(TokenKind.RightParen)
		const body = this.parseStatement()
		return { body, condition, kind: NodeKind.While, ...start }
	}

	private parseReturn(): Statement {
		const start = positionOf(this.advance())
		const value = this.check(TokenKind.Semicolon) ? null : this.parseExpression()
		this.expect(TokenKind.Semicolon)
		return { kind: NodeKind.Return, value, ...start }
	}

	private parseExprStmt(): Statement {
		const start = positionOf(this.current)
		const expression = this.parseExpression()
		this.expect(TokenKind.Semicolon)
		return { expression, kind: NodeKind.ExprStmt, ...start }
	}

	// ===========================================================================
	// EXPRESSIONS
	// ===========================================================================

	parseExpression(): Expression {
		return this.parseAssignment()
	}

	/** Right-associative: `a = b = c` is `a = (b = c)`. */
	private parseAssignment(): Expression {
		const lhs = this.parseBinaryRhs(Precedence.LogicalOr, this.parseUnary())
		if (!this.check(TokenKind.Assign)) return lhs

		if (lhs.kind !== NodeKind.Identifier) {
			throw new ParseError('MCPARSE005', positionOf(this.current))
		}
		this.advance()
		const value = this.parseAssignment()
		return { kind: NodeKind.Assign, target: lhs.name, value, column: lhs.column, line: lhs.line }
	}

	/**
	 * Precedence climbing.
	 * Consumes operators that bind at least as tightly as minPrec. The right
	 * operand only absorbs the next operator when that one binds tighter, so
	 * equal-precedence chains associate to the left.
	 */
	parseBinaryRhs(minPrec: number, lhs: Expression): Expression {
		let left = lhs
		for (;;) {
			const info = binaryOperatorOf(this.current.kind)
			if (info === null || info.precedence < minPrec) return left

			this.advance()
			let right = this.parseUnary()
			if (info.precedence < precedenceOf(this.current.kind)) {
				right = this.parseBinaryRhs(info.precedence + 1, right)
			}
			left = {
				column: left.column,
				kind: NodeKind.Binary,
				left,
				line: left.line,
				operator: info.operator,
				right,
			}
		}
	}

	private parseUnary(): Expression {
		if (this.check(TokenKind.Minus) || this.check(TokenKind.Bang)) {
			const op = this.advance()
			const operand = this.parseUnary()
			const operator = op.kind === TokenKind.Minus ? '-' : '!'
			return { kind: NodeKind.Unary, operand, operator, ...positionOf(op) }
		}
		return this.parsePrimary()
	}

	private parsePrimary(): Expression {
		const token = this.current
		switch (token.kind) {
			case TokenKind.IntLiteral:
			case TokenKind.FloatLiteral:
				this.advance()
				return {
					isFloat: token.kind === TokenKind.FloatLiteral,
					kind: NodeKind.NumberLiteral,
					value: token.value ?? Number(token.lexeme),
					...positionOf(token),
				}
			case TokenKind.True:
			case TokenKind.False:
				this.advance()
				return {
					kind: NodeKind.BoolLiteral,
					value: token.kind === TokenKind.True,
					...positionOf(token),
				}
			case TokenKind.Identifier:
				this.advance()
				if (this.check(TokenKind.LeftParen)) {
					return this.parseCall(token)
				}
				return { kind: NodeKind.Identifier, name: token.lexeme, ...positionOf(token) }
			case TokenKind.LeftParen: {
				this.advance()
				const inner = this.parseExpression()
				this.expect(TokenKind.RightParen)
				return inner
			}
			case TokenKind.Unknown:
				throw this.unexpected('an expression')
			default:
				throw new ParseError('MCPARSE006', positionOf(token), { found: describeToken(token) })
		}
	}

	private parseCall(callee: Token): Expression {
		this.expect(TokenKind.LeftParen)
		const args: Expression[] = []
		if (!this.check(TokenKind.RightParen)) {
			args.push(this.parseExpression())
			while (this.match(TokenKind.Comma)) {
				args.push(this.parseExpression())
			}
		}
		this.expect(TokenKind.RightParen)
		return { args, callee: callee.lexeme, kind: NodeKind.Call, ...positionOf(callee) }
	}
}

function report(context: CompilationContext, error: unknown): void {
	if (!(error instanceof ParseError)) throw error
	context.emit(error.code, error.line, error.column, error.args)
}

function parseRecovering(context: CompilationContext, parser: Parser): Program {
	const declarations: Declaration[] = []
	while (!parser.atEnd()) {
		try {
			declarations.push(parser.parseDeclaration())
		} catch (error) {
			report(context, error)
			parser.synchronize()
		}
	}
	return { declarations, kind: NodeKind.Program }
}

/**
 * Parse the context's source into a Program.
 * Fails when a grammar violation is found or the lexer reported an error.
 */
export function parse(context: CompilationContext, options: ParseOptions = {}): ParseResult {
	const parser = new Parser(context, options)

	let program: Program
	if (options.recover) {
		program = parseRecovering(context, parser)
	} else {
		try {
			program = parser.parseProgram()
		} catch (error) {
			report(context, error)
			return { succeeded: false }
		}
	}

	if (context.hasErrors()) {
		return { succeeded: false }
	}
	return { program, succeeded: true }
}
