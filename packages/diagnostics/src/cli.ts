/**
 * CLI diagnostic definitions.
 *
 * Error code format: MCCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity, ErrorKind } from './types.ts'

// =============================================================================
// CLI ERRORS (MCCLI001-099)
// =============================================================================

export const MCCLI001: DiagnosticDef = {
	code: 'MCCLI001',
	description: "Minic couldn't find a file at this path.",
	kind: ErrorKind.Cli,
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const MCCLI002: DiagnosticDef = {
	code: 'MCCLI002',
	description: "The file exists but Minic can't open it.",
	kind: ErrorKind.Cli,
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const MCCLI003: DiagnosticDef = {
	code: 'MCCLI003',
	description: "Minic couldn't save the output file.",
	kind: ErrorKind.Cli,
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const MCCLI004: DiagnosticDef = {
	code: 'MCCLI004',
	description: "Minic doesn't recognize this output format.",
	kind: ErrorKind.Cli,
	message: 'unknown target "{target}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--target ir`, `--target wat` or `--target wasm`.',
}

export const MCCLI005: DiagnosticDef = {
	code: 'MCCLI005',
	description: "The generated WebAssembly didn't pass backend validation.",
	kind: ErrorKind.Cli,
	message: 'generated wasm is invalid',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a compiler bug. Please report it with the source file.',
}

export const MCCLI006: DiagnosticDef = {
	code: 'MCCLI006',
	description: 'Something unexpected went wrong during compilation.',
	kind: ErrorKind.Cli,
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	MCCLI001,
	MCCLI002,
	MCCLI003,
	MCCLI004,
	MCCLI005,
	MCCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
