import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { NodeKind, type Program } from '../../src/core/nodes.ts'
import { formatAst } from '../../src/parse/ast-printer.ts'
import { type ParseOptions, ParseError, Parser, type ParseResult, parse } from '../../src/parse/parser.ts'

function parseSource(source: string, options: ParseOptions = {}): { ctx: CompilationContext; result: ParseResult } {
	const ctx = new CompilationContext(source)
	return { ctx, result: parse(ctx, options) }
}

function parseProgram(source: string): Program {
	const { ctx, result } = parseSource(source)
	assert.deepStrictEqual(ctx.getDiagnostics(), [])
	assert.ok(result.program)
	return result.program
}

/** AST dump of an expression, parsed on its own. */
function expr(source: string): string {
	const ctx = new CompilationContext(source)
	const tree = new Parser(ctx).parseExpression()
	assert.strictEqual(ctx.hasErrors(), false)
	return formatAst(tree)
}

function lines(...parts: string[]): string {
	return parts.join('\n')
}

function firstError(source: string, options: ParseOptions = {}): { code: string; message: string; line: number; column: number } {
	const { ctx, result } = parseSource(source, options)
	assert.strictEqual(result.succeeded, false)
	assert.strictEqual(result.program, undefined)
	const [diag] = ctx.getErrors()
	assert.ok(diag)
	return { code: diag.def.code, column: diag.column, line: diag.line, message: diag.message }
}

describe('parse/parser', () => {
	describe('programs', () => {
		it('should parse empty input', () => {
			const program = parseProgram('')
			assert.strictEqual(program.kind, NodeKind.Program)
			assert.deepStrictEqual(program.declarations, [])
		})

		it('should parse a minimal function', () => {
			assert.strictEqual(
				formatAst(parseProgram('int main() { return 0; }')),
				lines('Program', '  Function int main()', '    Block', '      Return', '        Number 0')
			)
		})

		it('should keep declarations in source order', () => {
			const program = parseProgram('extern double sqrt(double x);\nint a() { return 1; }\nvoid b() {}')
			assert.deepStrictEqual(
				program.declarations.map((d) => [d.kind, d.name]),
				[
					[NodeKind.Extern, 'sqrt'],
					[NodeKind.Function, 'a'],
					[NodeKind.Function, 'b'],
				]
			)
		})

		it('should record declaration positions', () => {
			const [ext, fn] = parseProgram('extern int f();\n  int g() {}').declarations
			assert.ok(ext && fn)
			assert.deepStrictEqual([ext.line, ext.column], [1, 1])
			assert.deepStrictEqual([fn.line, fn.column], [2, 3])
		})
	})

	describe('parameters', () => {
		it('should default a bare parameter name to int', () => {
			assert.strictEqual(
				formatAst(parseProgram('int f(int a, double b, c) {}')),
				lines('Program', '  Function int f(int a, double b, int c)', '    Block')
			)
		})

		it('should read (void) as no parameters', () => {
			const [fn] = parseProgram('int f(void) {}').declarations
			assert.ok(fn)
			assert.deepStrictEqual(fn.params, [])
		})

		it('should parse extern signatures', () => {
			assert.strictEqual(
				formatAst(parseProgram('extern void putd(double value);')),
				lines('Program', '  Extern void putd(double value)')
			)
		})
	})

	describe('precedence', () => {
		it('should bind * tighter than +', () => {
			assert.strictEqual(
				expr('2 + 3 * 4'),
				lines('Binary +', '  Number 2', '  Binary *', '    Number 3', '    Number 4')
			)
		})

		it('should associate equal precedence to the left', () => {
			assert.strictEqual(
				expr('10 - 3 - 2'),
				lines('Binary -', '  Binary -', '    Number 10', '    Number 3', '  Number 2')
			)
		})

		it('should climb through every level', () => {
			assert.strictEqual(
				expr('a || b && c == d < e + f * g'),
				lines(
					'Binary ||',
					'  Identifier a',
					'  Binary &&',
					'    Identifier b',
					'    Binary ==',
					'      Identifier c',
					'      Binary <',
					'        Identifier d',
					'        Binary +',
					'          Identifier e',
					'          Binary *',
					'            Identifier f',
					'            Identifier g'
				)
			)
		})

		it('should return to a lower level after a tighter operator', () => {
			assert.strictEqual(
				expr('1 * 2 + 3 * 4'),
				lines(
					'Binary +',
					'  Binary *',
					'    Number 1',
					'    Number 2',
					'  Binary *',
					'    Number 3',
					'    Number 4'
				)
			)
		})

		it('should honour parentheses', () => {
			assert.strictEqual(
				expr('(1 + 2) * 3'),
				lines('Binary *', '  Binary +', '    Number 1', '    Number 2', '  Number 3')
			)
		})

		it('should bind prefix operators tighter than binary ones', () => {
			assert.strictEqual(
				expr('-a * !b'),
				lines('Binary *', '  Unary -', '    Identifier a', '  Unary !', '    Identifier b')
			)
		})

		it('should nest prefix operators', () => {
			assert.strictEqual(expr('--x'), lines('Unary -', '  Unary -', '    Identifier x'))
		})

		it('should make assignment right-associative and lowest', () => {
			assert.strictEqual(
				expr('a = b = c + 1'),
				lines('Assign a', '  Assign b', '    Binary +', '      Identifier c', '      Number 1')
			)
		})
	})

	describe('expressions', () => {
		it('should parse literals', () => {
			assert.strictEqual(expr('1.5'), 'Number 1.5')
			assert.strictEqual(expr('2.0'), 'Number 2.0')
			assert.strictEqual(expr('true'), 'Bool true')
			assert.strictEqual(expr('false'), 'Bool false')
		})

		it('should parse calls with arguments in order', () => {
			assert.strictEqual(
				expr('f(1, g(), x)'),
				lines('Call f', '  Number 1', '  Call g', '  Identifier x')
			)
		})

		it('should position a binary expression at its left operand', () => {
			const ctx = new CompilationContext('  a + b')
			const tree = new Parser(ctx).parseExpression()
			assert.deepStrictEqual([tree.line, tree.column], [1, 3])
		})
	})

	describe('statements', () => {
		it('should parse variable declarations with and without initializers', () => {
			assert.strictEqual(
				formatAst(parseProgram('void f() { int x; bool b = true; }')),
				lines(
					'Program',
					'  Function void f()',
					'    Block',
					'      VarDecl int x',
					'      VarDecl bool b',
					'        Bool true'
				)
			)
		})

		it('should parse if/else and while with non-block bodies', () => {
			assert.strictEqual(
				formatAst(parseProgram('int f(int n) { while (n > 0) n = n - 1; if (n) return 1; else { return 2; } }')),
				lines(
					'Program',
					'  Function int f(int n)',
					'    Block',
					'      While',
					'        Binary >',
					'          Identifier n',
					'          Number 0',
					'        ExprStmt',
					'          Assign n',
					'            Binary -',
					'              Identifier n',
					'              Number 1',
					'      If',
					'        Identifier n',
					'        Return',
					'          Number 1',
					'        Block',
					'          Return',
					'            Number 2'
				)
			)
		})

		it('should attach else to the nearest if', () => {
			assert.strictEqual(
				formatAst(parseProgram('void f() { if (a) if (b) g(); else h(); }')),
				lines(
					'Program',
					'  Function void f()',
					'    Block',
					'      If',
					'        Identifier a',
					'        If',
					'          Identifier b',
					'          ExprStmt',
					'            Call g',
					'          ExprStmt',
					'            Call h'
				)
			)
		})

		it('should parse a bare return and nested blocks', () => {
			assert.strictEqual(
				formatAst(parseProgram('void f() { { return; } }')),
				lines('Program', '  Function void f()', '    Block', '      Block', '        Return')
			)
		})
	})

	describe('errors', () => {
		it('should report an unknown type inside a body', () => {
			assert.deepStrictEqual(firstError('int main() { float x; }'), {
				code: 'MCPARSE003',
				column: 14,
				line: 1,
				message: "unknown type 'float'",
			})
		})

		it('should report an unknown return type', () => {
			assert.deepStrictEqual(firstError('float f() {}'), {
				code: 'MCPARSE003',
				column: 1,
				line: 1,
				message: "unknown type 'float'",
			})
		})

		it('should report an unknown parameter type', () => {
			assert.strictEqual(firstError('int f(long n) {}').code, 'MCPARSE003')
		})

		it('should report a void variable at its name', () => {
			assert.deepStrictEqual(firstError('int main() { void x; }'), {
				code: 'MCPARSE004',
				column: 19,
				line: 1,
				message: "'x' cannot have type void",
			})
		})

		it('should report a void parameter', () => {
			const error = firstError('int f(void a) {}')
			assert.strictEqual(error.code, 'MCPARSE004')
			assert.strictEqual(error.column, 12)
		})

		it('should report an assignment to a non-identifier at the =', () => {
			assert.deepStrictEqual(firstError('int main() { 1 = 2; }'), {
				code: 'MCPARSE005',
				column: 16,
				line: 1,
				message: 'invalid assignment target',
			})
		})

		it('should report a missing expression', () => {
			assert.deepStrictEqual(firstError('int main() { return 1 + ; }'), {
				code: 'MCPARSE006',
				column: 25,
				line: 1,
				message: "expected expression, found ';'",
			})
		})

		it('should report an unterminated block at its brace', () => {
			assert.deepStrictEqual(firstError('int main() {\n  return 0;'), {
				code: 'MCPARSE002',
				column: 12,
				line: 1,
				message: 'unterminated block',
			})
		})

		it('should report a missing semicolon', () => {
			assert.deepStrictEqual(firstError('int main() { return 0 }'), {
				code: 'MCPARSE001',
				column: 23,
				line: 1,
				message: "expected ';', found '}'",
			})
		})

		it('should require a type at top level', () => {
			assert.strictEqual(firstError('return 0;').message, "expected a type, found 'return'")
		})

		it('should reject an unknown token where an expression belongs', () => {
			const error = firstError('int main() { return @; }', { unknownCharacters: 'token' })
			assert.strictEqual(error.code, 'MCPARSE001')
			assert.strictEqual(error.message, "expected an expression, found '@'")
		})

		it('should fail when only the lexer reported an error', () => {
			const { ctx, result } = parseSource('int main() { return 0; } @')
			assert.strictEqual(result.succeeded, false)
			assert.deepStrictEqual(
				ctx.getDiagnostics().map((d) => d.def.code),
				['MCLEX001']
			)
		})

		it('should stop at the first error without recovery', () => {
			const { ctx } = parseSource('float f() {}\nint g() { return 1 }')
			assert.strictEqual(ctx.getErrorCount(), 1)
		})
	})

	describe('ParseError', () => {
		it('should carry code, position and interpolated message', () => {
			const error = new ParseError('MCPARSE003', { column: 3, line: 2 }, { name: 'long' })
			assert.strictEqual(error.name, 'ParseError')
			assert.strictEqual(error.code, 'MCPARSE003')
			assert.strictEqual(error.line, 2)
			assert.strictEqual(error.column, 3)
			assert.strictEqual(error.message, "unknown type 'long'")
		})
	})

	describe('recovery', () => {
		it('should resynchronize at the next top-level declaration', () => {
			const source = 'float f() {}\nint g() { return 1 }\nint main() { return 0; }'
			const { ctx, result } = parseSource(source, { recover: true })
			assert.strictEqual(result.succeeded, false)
			assert.deepStrictEqual(
				ctx.getErrors().map((d) => [d.def.code, d.line, d.column]),
				[
					['MCPARSE003', 1, 1],
					['MCPARSE001', 2, 20],
				]
			)
		})

		it('should skip type keywords nested inside braces', () => {
			const { ctx } = parseSource('int f( { int x; }\nint main() { return 0; }', { recover: true })
			assert.strictEqual(ctx.getErrorCount(), 1)
		})

		it('should terminate on stray closing braces', () => {
			const { ctx, result } = parseSource('} } }', { recover: true })
			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(ctx.getErrorCount(), 1)
		})
	})
})
