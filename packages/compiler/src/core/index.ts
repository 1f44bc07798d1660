/**
 * Core data structures for the Minic compiler.
 */

export {
	CompilationContext,
	type Diagnostic,
} from './context.ts'
export {
	COMPILER_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	ErrorKind,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export * from './nodes.ts'
export { describeToken, describeTokenKind, isTypeKeyword, type Token, TokenKind } from './tokens.ts'
