import { basename, extname } from 'node:path'
import { CompileError, type CompileResult } from '@minic/compiler'
import {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	MCCLI001,
	MCCLI002,
	MCCLI003,
	MCCLI004,
	MCCLI005,
	MCCLI006,
} from '@minic/diagnostics'

export type OutputTarget = 'ir' | 'wasm' | 'wat'

export const DEFAULT_TARGET: OutputTarget = 'ir'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCli(def: DiagnosticDef, args: DiagnosticArgs = {}): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCli(MCCLI001, { path: filePath })
	}
	return formatCli(MCCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCli(MCCLI003, { reason: getErrorMessage(error) })
}

export function formatInvalidTargetError(target: string): string {
	return formatCli(MCCLI004, { target })
}

export function formatValidationError(): string {
	return formatCli(MCCLI005)
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	return formatCli(MCCLI006, { reason: getErrorMessage(error) })
}

export function isValidTarget(value: string): value is OutputTarget {
	return value === 'ir' || value === 'wasm' || value === 'wat'
}

/** Text targets can go to stdout; wasm is always written to a file. */
export function isTextTarget(target: OutputTarget): boolean {
	return target !== 'wasm'
}

/**
 * Where the artifact goes: the explicit output path, `<basename>.wasm` in the
 * working directory for wasm, or null for stdout.
 */
export function resolveOutputPath(
	inputPath: string,
	output: string | undefined,
	target: OutputTarget
): string | null {
	if (output !== undefined) return output
	if (isTextTarget(target)) return null
	return `${basename(inputPath, extname(inputPath))}.wasm`
}

export function getOutputContent(result: CompileResult, target: OutputTarget): Uint8Array | string {
	switch (target) {
		case 'ir':
			return result.ir
		case 'wat':
			return result.text
		case 'wasm':
			return result.binary
	}
}
