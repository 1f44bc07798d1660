/**
 * An IR invariant was violated while emitting: an instruction appended after
 * a terminator, mismatched operand types, a verifier failure. Always a bug in
 * the code generator, never a problem with the input program.
 */
export class EmissionError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'EmissionError'
	}
}
