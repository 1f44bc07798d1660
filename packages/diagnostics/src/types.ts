/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * The phase-level category a diagnostic belongs to.
 * Reported to callers as the kind of a failed compilation.
 */
export const ErrorKind = {
	Cli: 'CliError',
	Emission: 'EmissionError',
	Lex: 'LexError',
	Parse: 'ParseError',
	Semantic: 'SemanticError',
} as const

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly kind: ErrorKind
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
