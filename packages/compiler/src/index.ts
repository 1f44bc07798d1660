/**
 * Minic Compiler Public API
 *
 * Pipeline:
 * - Lexer produces tokens on demand for the recursive-descent Parser
 * - Parser builds a readonly AST
 * - Code generator lowers the AST to a basic-block IR module
 * - Backend lowers the IR module to WebAssembly through binaryen
 *
 * Every phase reports into one CompilationContext per compilation.
 */

import { type AssembleResult, assemble } from './backend/wasm.ts'
import { generate } from './codegen/index.ts'
import { CompilationContext, type Diagnostic } from './core/context.ts'
import { DiagnosticSeverity, ErrorKind } from './core/diagnostics.ts'
import type { Program } from './core/nodes.ts'
import { EmissionError } from './ir/errors.ts'
import type { IRModule } from './ir/module.ts'
import { printModule } from './ir/printer.ts'
import type { UnknownCharacterPolicy } from './lex/lexer.ts'
import { parse } from './parse/parser.ts'

export { type AssembleResult, assemble, type EmitOptions, IMPORT_MODULE } from './backend/index.ts'
export {
	type Binding,
	type CodeGenState,
	createState,
	declareSignature,
	emitExpression,
	emitFunction,
	emitStatement,
	type GenerateResult,
	generate,
	Scope,
} from './codegen/index.ts'
export {
	CompilationContext,
	type Diagnostic,
	type DiagnosticCode,
	DiagnosticSeverity,
	ErrorKind,
} from './core/index.ts'
export * from './core/nodes.ts'
export { describeToken, describeTokenKind, type Token, TokenKind } from './core/tokens.ts'
export {
	BasicBlock,
	EmissionError,
	IRBuilder,
	IRFunction,
	IRModule,
	IRType,
	type ParamSpec,
	printFunction,
	printModule,
	type Value,
	type ValueType,
	type VerifyResult,
	verifyFunction,
} from './ir/index.ts'
export { Lexer, type LexerOptions, tokenize, type UnknownCharacterPolicy } from './lex/index.ts'
export {
	formatAst,
	type ParseOptions,
	ParseError,
	Parser,
	type ParseResult,
	parse,
} from './parse/index.ts'
export { type ExternFunction, type InterpretOptions, interpret } from './testkit/index.ts'

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Run optimization passes on the output */
	optimize?: boolean
	/** What the lexer does with characters that start no token */
	unknownCharacters?: UnknownCharacterPolicy
	/** Keep parsing after a bad top-level declaration to report more errors */
	recover?: boolean
}

export interface CompileWarning {
	code: string
	message: string
	line: number
	column: number
	formattedMessage: string
}

export interface CompileResult {
	program: Program
	module: IRModule
	/** Textual IR */
	ir: string
	binary: Uint8Array
	/** WebAssembly text format */
	text: string
	valid: boolean
	warnings: CompileWarning[]
}

/**
 * A failed compilation.
 * The message is the first error, formatted with source context.
 */
export class CompileError extends Error {
	readonly kind: ErrorKind
	readonly diagnostics: readonly Diagnostic[]

	constructor(message: string, kind: ErrorKind, diagnostics: readonly Diagnostic[] = []) {
		super(message)
		this.name = 'CompileError'
		this.kind = kind
		this.diagnostics = diagnostics
	}
}

/**
 * Get the formatted error message from the first diagnostic.
 */
function getFormattedError(context: CompilationContext, fallback: string): string {
	const error = context.getErrors()[0]
	if (!error) return fallback
	return context.formatDiagnostic(error)
}

function failPhase(context: CompilationContext, fallbackKind: ErrorKind, fallback: string): CompileError {
	const kind = context.getErrors()[0]?.def.kind ?? fallbackKind
	return new CompileError(getFormattedError(context, fallback), kind, context.getDiagnostics())
}

function extractWarnings(context: CompilationContext): CompileWarning[] {
	return context
		.getDiagnostics()
		.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
		.map((d) => ({
			code: d.def.code,
			column: d.column,
			formattedMessage: context.formatDiagnostic(d),
			line: d.line,
			message: d.message,
		}))
}

/**
 * Run the backend, turning its internal failures into an EmissionError kind.
 */
function runBackend(module: IRModule, context: CompilationContext, optimize: boolean): AssembleResult {
	try {
		return assemble(module, { optimize })
	} catch (error) {
		if (!(error instanceof EmissionError)) throw error
		throw new CompileError(`backend failed: ${error.message}`, ErrorKind.Emission, context.getDiagnostics())
	}
}

/**
 * Compile Minic source to IR and WebAssembly.
 *
 * This is the main entry point for compilation. It chains all phases:
 * 1. Parsing, pulling tokens from the lexer (source → AST)
 * 2. Code generation (AST → IR module)
 * 3. Emission (IR module → WebAssembly)
 *
 * @param source - Minic source code
 * @param options - Compilation options
 * @returns Compilation result with the AST, IR, binary, text and validation status
 * @throws {CompileError} If compilation fails
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
	const context = new CompilationContext(source, options.filename)

	// Phase 1: Parsing (the lexer runs on demand)
	const parseResult = parse(context, {
		...(options.recover !== undefined ? { recover: options.recover } : {}),
		...(options.unknownCharacters !== undefined ? { unknownCharacters: options.unknownCharacters } : {}),
	})
	if (!parseResult.succeeded || parseResult.program === undefined) {
		throw failPhase(context, ErrorKind.Parse, 'Parse failed')
	}
	const program = parseResult.program

	// Phase 2: Code generation
	const genResult = generate(context, program)
	if (!genResult.succeeded || genResult.module === undefined) {
		throw failPhase(context, ErrorKind.Semantic, 'Code generation failed')
	}
	const module = genResult.module

	// Phase 3: Emission
	const ir = printModule(module)
	const { binary, text, valid } = runBackend(module, context, options.optimize ?? false)

	return { binary, ir, module, program, text, valid, warnings: extractWarnings(context) }
}
