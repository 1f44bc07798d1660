import type { DiagnosticArgs } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}
