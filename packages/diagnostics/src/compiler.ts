/**
 * Compiler diagnostic definitions.
 *
 * Error code format: MC<PHASE><NUMBER>
 * - MCLEX: Lexer errors (001-099)
 * - MCPARSE: Parser errors (001-099)
 * - MCSEM: Symbol resolution errors (001-099)
 * - MCGEN: Emission errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity, ErrorKind } from './types.ts'

// =============================================================================
// LEXER ERRORS (MCLEX001-099)
// =============================================================================

export const MCLEX001: DiagnosticDef = {
	code: 'MCLEX001',
	description: "Minic doesn't know what to do with this character. It was skipped.",
	kind: ErrorKind.Lex,
	message: "unknown character '{char}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or check for a typo in an operator.',
}

export const MCLEX002: DiagnosticDef = {
	code: 'MCLEX002',
	description: 'A block comment was opened with `/*` but the file ended before `*/`.',
	kind: ErrorKind.Lex,
	message: 'unterminated block comment',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the comment with `*/`.',
}

export const MCLEX003: DiagnosticDef = {
	code: 'MCLEX003',
	description: 'Integer literals are 32-bit signed values.',
	kind: ErrorKind.Lex,
	message: 'integer literal {literal} is out of range',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value no larger than 2147483647, or write it as a double (`{literal}.0`).',
}

// =============================================================================
// PARSER ERRORS (MCPARSE001-099)
// =============================================================================

export const MCPARSE001: DiagnosticDef = {
	code: 'MCPARSE001',
	description: "Minic expected a specific token here and found something else.",
	kind: ErrorKind.Parse,
	message: 'expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for a missing {expected}.',
}

export const MCPARSE002: DiagnosticDef = {
	code: 'MCPARSE002',
	description: 'A `{` was opened but the file ended before the matching `}`.',
	kind: ErrorKind.Parse,
	message: 'unterminated block',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the missing `}`.',
}

export const MCPARSE003: DiagnosticDef = {
	code: 'MCPARSE003',
	description: 'Only `int`, `double`, `bool` and `void` are types in Minic.',
	kind: ErrorKind.Parse,
	message: "unknown type '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of: int, double, bool, void.',
}

export const MCPARSE004: DiagnosticDef = {
	code: 'MCPARSE004',
	description: '`void` has no values, so nothing can be stored in it.',
	kind: ErrorKind.Parse,
	message: "'{name}' cannot have type void",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `void` only as a function return type.',
}

export const MCPARSE005: DiagnosticDef = {
	code: 'MCPARSE005',
	description: 'Only a variable name can appear on the left of `=`.',
	kind: ErrorKind.Parse,
	message: 'invalid assignment target',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Assign to a variable, for example `x = ...`.',
}

export const MCPARSE006: DiagnosticDef = {
	code: 'MCPARSE006',
	description: 'An expression was required here.',
	kind: ErrorKind.Parse,
	message: 'expected expression, found {found}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// SYMBOL ERRORS (MCSEM001-099)
// =============================================================================

export const MCSEM001: DiagnosticDef = {
	code: 'MCSEM001',
	description: 'This name is not declared in any enclosing block or parameter list.',
	kind: ErrorKind.Semantic,
	message: "unknown variable '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it first, for example `int {name} = 0;`.',
}

export const MCSEM002: DiagnosticDef = {
	code: 'MCSEM002',
	description: 'No function or extern with this name is declared in the program.',
	kind: ErrorKind.Semantic,
	message: "unknown function '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Define the function, or declare it with `extern`.',
}

export const MCSEM003: DiagnosticDef = {
	code: 'MCSEM003',
	description: 'The call passes a different number of arguments than the function declares.',
	kind: ErrorKind.Semantic,
	message: "function '{name}' expects {expected} argument(s), found {found}",
	severity: DiagnosticSeverity.Error,
}

export const MCSEM004: DiagnosticDef = {
	code: 'MCSEM004',
	description: 'Functions are not values in Minic; they can only be called.',
	kind: ErrorKind.Semantic,
	message: "'{name}' is a function, not a variable",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Call it instead: `{name}(...)`.',
}

export const MCSEM005: DiagnosticDef = {
	code: 'MCSEM005',
	description: 'A name can be declared once per block. Inner blocks may shadow it.',
	kind: ErrorKind.Semantic,
	message: "redeclaration of '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename the variable, or assign to the existing one.',
}

export const MCSEM006: DiagnosticDef = {
	code: 'MCSEM006',
	description: 'The remainder operator works on integers only.',
	kind: ErrorKind.Semantic,
	message: "operator '%' is not supported for double operands",
	severity: DiagnosticSeverity.Error,
}

export const MCSEM007: DiagnosticDef = {
	code: 'MCSEM007',
	description: 'Only variables can be assigned to.',
	kind: ErrorKind.Semantic,
	message: "cannot assign to '{name}': not a variable",
	severity: DiagnosticSeverity.Error,
}

export const MCSEM008: DiagnosticDef = {
	code: 'MCSEM008',
	description: 'A function declared `void` has no result to return.',
	kind: ErrorKind.Semantic,
	message: "void function '{name}' cannot return a value",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a bare `return;`, or change the return type.',
}

export const MCSEM009: DiagnosticDef = {
	code: 'MCSEM009',
	description: 'Each function or extern name may be declared once.',
	kind: ErrorKind.Semantic,
	message: "function '{name}' is already declared",
	severity: DiagnosticSeverity.Error,
}

export const MCSEM010: DiagnosticDef = {
	code: 'MCSEM010',
	description: 'The call returns nothing, so its result cannot be used.',
	kind: ErrorKind.Semantic,
	message: "call to void function '{name}' used as a value",
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// EMISSION ERRORS (MCGEN001-049)
// =============================================================================

export const MCGEN001: DiagnosticDef = {
	code: 'MCGEN001',
	description: 'The code generator broke one of its own rules. This is a compiler bug.',
	kind: ErrorKind.Emission,
	message: "internal error while emitting '{name}': {detail}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Please report this with the source file that triggered it.',
}

// =============================================================================
// EMISSION WARNINGS (MCGEN050-099)
// =============================================================================

export const MCGEN050: DiagnosticDef = {
	code: 'MCGEN050',
	description: 'This code never runs because the statement before it always returns.',
	kind: ErrorKind.Emission,
	message: 'unreachable code',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'You can safely remove this code, or move it before the return.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Emission errors
	MCGEN001,
	// Emission warnings
	MCGEN050,
	// Lexer errors
	MCLEX001,
	MCLEX002,
	MCLEX003,
	// Parser errors
	MCPARSE001,
	MCPARSE002,
	MCPARSE003,
	MCPARSE004,
	MCPARSE005,
	MCPARSE006,
	// Symbol errors
	MCSEM001,
	MCSEM002,
	MCSEM003,
	MCSEM004,
	MCSEM005,
	MCSEM006,
	MCSEM007,
	MCSEM008,
	MCSEM009,
	MCSEM010,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
