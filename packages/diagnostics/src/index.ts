/**
 * @minic/diagnostics
 *
 * Shared diagnostic types and definitions for Minic packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	MCCLI001,
	MCCLI002,
	MCCLI003,
	MCCLI004,
	MCCLI005,
	MCCLI006,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	MCGEN001,
	MCGEN050,
	MCLEX001,
	MCLEX002,
	MCLEX003,
	MCPARSE001,
	MCPARSE002,
	MCPARSE003,
	MCPARSE004,
	MCPARSE005,
	MCPARSE006,
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
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	ErrorKind,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
