/**
 * Ownership structure of the IR: a module owns functions, a function owns
 * its basic blocks, a block owns its instructions.
 */

import { EmissionError } from './errors.ts'
import {
	type Argument,
	type Instruction,
	type IRType,
	isTerminator,
	type Terminator,
	type ValueType,
} from './types.ts'

function uniqueName(used: Set<string>, base: string): string {
	if (!used.has(base)) {
		used.add(base)
		return base
	}
	for (let suffix = 1; ; suffix++) {
		const candidate = `${base}.${suffix}`
		if (!used.has(candidate)) {
			used.add(candidate)
			return candidate
		}
	}
}

/**
 * A straight-line run of instructions ending in one terminator.
 *
 * Blocks are created detached from their function and only become part of
 * it when attached, which is when the builder first positions on them. A
 * block nothing branches to is therefore never attached.
 */
export class BasicBlock {
	readonly parent: IRFunction
	readonly label: string
	readonly instructions: Instruction[] = []
	readonly predecessors: BasicBlock[] = []
	private uniqueLabel: string | null = null

	constructor(parent: IRFunction, label: string) {
		this.parent = parent
		this.label = label
	}

	/** Unique label within the function. Equal to `label` until attached. */
	get name(): string {
		return this.uniqueLabel ?? this.label
	}

	get isAttached(): boolean {
		return this.uniqueLabel !== null
	}

	get terminator(): Terminator | null {
		const last = this.instructions.at(-1)
		return last !== undefined && isTerminator(last) ? last : null
	}

	get isTerminated(): boolean {
		return this.terminator !== null
	}

	successors(): BasicBlock[] {
		const term = this.terminator
		if (term === null) return []
		switch (term.op) {
			case 'br':
				return [term.target]
			case 'condbr':
				return [term.ifTrue, term.ifFalse]
			case 'ret':
				return []
		}
	}

	/** @internal called by IRFunction.attachBlock */
	assignName(name: string): void {
		this.uniqueLabel = name
	}
}

export interface ParamSpec {
	readonly name: string
	readonly type: ValueType
}

export class IRFunction {
	readonly name: string
	readonly returnType: IRType
	readonly params: readonly Argument[]
	readonly isExtern: boolean
	private blockList: BasicBlock[] = []
	private labels = new Set<string>()
	private valueNames = new Set<string>()

	constructor(name: string, returnType: IRType, params: readonly ParamSpec[], isExtern = false) {
		this.name = name
		this.returnType = returnType
		this.isExtern = isExtern
		this.params = params.map((param, index): Argument => ({
			index,
			name: uniqueName(this.valueNames, param.name),
			op: 'arg',
			type: param.type,
		}))
	}

	get blocks(): readonly BasicBlock[] {
		return this.blockList
	}

	/** A function without a body. Externs are always declarations. */
	get isDeclaration(): boolean {
		return this.blockList.length === 0
	}

	get entry(): BasicBlock | null {
		return this.blockList[0] ?? null
	}

	createBlock(label: string): BasicBlock {
		if (this.isExtern) {
			throw new EmissionError(`extern '${this.name}' cannot have a body`)
		}
		return new BasicBlock(this, label)
	}

	attachBlock(block: BasicBlock): void {
		if (block.parent !== this) {
			throw new EmissionError(`block '${block.label}' belongs to '${block.parent.name}', not '${this.name}'`)
		}
		if (block.isAttached) {
			throw new EmissionError(`block '${block.name}' is already attached`)
		}
		block.assignName(uniqueName(this.labels, block.label))
		this.blockList.push(block)
	}

	/** Reserve a unique `%name` for a named value such as a stack slot. */
	uniqueValueName(base: string): string {
		return uniqueName(this.valueNames, base)
	}

	/** Drop the body, turning the function back into a declaration. */
	clearBody(): void {
		this.blockList = []
		this.labels = new Set()
		this.valueNames = new Set(this.params.map((p) => p.name))
	}
}

export class IRModule {
	readonly name: string
	private readonly functionMap = new Map<string, IRFunction>()

	constructor(name: string) {
		this.name = name
	}

	/** Functions in declaration order. */
	get functions(): IRFunction[] {
		return [...this.functionMap.values()]
	}

	getFunction(name: string): IRFunction | undefined {
		return this.functionMap.get(name)
	}

	hasFunction(name: string): boolean {
		return this.functionMap.has(name)
	}

	declareFunction(
		name: string,
		returnType: IRType,
		params: readonly ParamSpec[],
		isExtern = false
	): IRFunction {
		if (this.functionMap.has(name)) {
			throw new EmissionError(`function '${name}' is already declared`)
		}
		const fn = new IRFunction(name, returnType, params, isExtern)
		this.functionMap.set(name, fn)
		return fn
	}

	removeFunction(name: string): boolean {
		return this.functionMap.delete(name)
	}
}
