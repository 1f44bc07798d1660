import { EmissionError } from '../ir/errors.ts'
import type { AllocaInst, ValueType } from '../ir/types.ts'

/** Storage of a local variable or parameter. */
export interface Binding {
	readonly slot: AllocaInst
	readonly type: ValueType
}

/**
 * Stack of lexical frames.
 * Lookup walks from the innermost frame outward, so inner declarations shadow
 * outer ones until their frame is popped.
 */
export class Scope {
	private readonly frames: Map<string, Binding>[] = []

	get depth(): number {
		return this.frames.length
	}

	push(): void {
		this.frames.push(new Map())
	}

	pop(): void {
		if (this.frames.pop() === undefined) {
			throw new EmissionError('scope underflow: pop without a matching push')
		}
	}

	/** Bind a name in the innermost frame. Returns false if the frame already has it. */
	declare(name: string, binding: Binding): boolean {
		const frame = this.frames.at(-1)
		if (frame === undefined) {
			throw new EmissionError(`cannot declare '${name}' outside any frame`)
		}
		if (frame.has(name)) return false
		frame.set(name, binding)
		return true
	}

	isDeclaredInFrame(name: string): boolean {
		return this.frames.at(-1)?.has(name) ?? false
	}

	lookup(name: string): Binding | undefined {
		for (let i = this.frames.length - 1; i >= 0; i--) {
			const binding = this.frames[i]?.get(name)
			if (binding !== undefined) return binding
		}
		return undefined
	}

	/** Drop frames until only `depth` remain. */
	unwindTo(depth: number): void {
		while (this.frames.length > depth) {
			this.frames.pop()
		}
	}
}
