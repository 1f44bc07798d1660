import type { BasicBlock, IRFunction, IRModule } from '../ir/module.ts'
import { type FCmpPredicate, type ICmpPredicate, type Instruction, IRType, type Value } from '../ir/types.ts'

// Minimal IR interpreter used by tests to check the semantics of emitted code.
// Values are plain numbers: i32 wrapped to 32 bits, i1 as 0 or 1, f64 as is.

export type ExternFunction = (...args: number[]) => number | undefined

export interface InterpretOptions {
	/** Implementations of extern functions, by name */
	externs?: Record<string, ExternFunction>
	/** Abort after this many executed instructions */
	maxSteps?: number
}

const DEFAULT_MAX_STEPS = 1_000_000

class Frame {
	readonly values = new Map<Instruction, number>()
	readonly slots = new Map<Instruction, number>()

	constructor(readonly args: readonly number[]) {}
}

class Interpreter {
	private steps = 0
	private readonly maxSteps: number
	private readonly externs: Record<string, ExternFunction>

	constructor(options: InterpretOptions) {
		this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS
		this.externs = options.externs ?? {}
	}

	call(fn: IRFunction, args: readonly number[]): number | undefined {
		if (args.length !== fn.params.length) {
			throw new Error(`@${fn.name} takes ${fn.params.length} argument(s), got ${args.length}`)
		}
		if (fn.isDeclaration) {
			const impl = this.externs[fn.name]
			if (impl === undefined) throw new Error(`no implementation for extern @${fn.name}`)
			return impl(...args)
		}
		const entry = fn.entry
		if (entry === null) throw new Error(`@${fn.name} has no body`)

		const frame = new Frame(args)
		let block: BasicBlock = entry
		for (;;) {
			const next = this.runBlock(block, frame)
			if (next.kind === 'return') return next.value
			block = next.block
		}
	}

	private read(value: Value, frame: Frame): number {
		switch (value.op) {
			case 'const':
				return value.value
			case 'arg': {
				const arg = frame.args[value.index]
				if (arg === undefined) throw new Error(`missing argument ${value.index}`)
				return arg
			}
			default: {
				const result = frame.values.get(value)
				if (result === undefined) throw new Error(`use of '${value.op}' before it was computed`)
				return result
			}
		}
	}

	private runBlock(
		block: BasicBlock,
		frame: Frame
	): { kind: 'jump'; block: BasicBlock } | { kind: 'return'; value: number | undefined } {
		for (const inst of block.instructions) {
			if (++this.steps > this.maxSteps) {
				throw new Error(`step limit of ${this.maxSteps} exceeded`)
			}
			switch (inst.op) {
				case 'br':
					return { block: inst.target, kind: 'jump' }
				case 'condbr':
					return {
						block: this.read(inst.condition, frame) !== 0 ? inst.ifTrue : inst.ifFalse,
						kind: 'jump',
					}
				case 'ret':
					return { kind: 'return', value: inst.value === null ? undefined : this.read(inst.value, frame) }
				default:
					this.execute(inst, frame)
			}
		}
		throw new Error(`block '${block.name}' fell off its end`)
	}

	private execute(inst: Instruction, frame: Frame): void {
		switch (inst.op) {
			case 'alloca':
				frame.slots.set(inst, 0)
				return
			case 'store':
				frame.slots.set(inst.slot, this.read(inst.value, frame))
				return
			case 'load':
				frame.values.set(inst, frame.slots.get(inst.slot) ?? 0)
				return
			case 'binary':
				frame.values.set(inst, binary(inst.opcode, this.read(inst.lhs, frame), this.read(inst.rhs, frame)))
				return
			case 'icmp':
			case 'fcmp':
				frame.values.set(inst, compare(inst.predicate, this.read(inst.lhs, frame), this.read(inst.rhs, frame)))
				return
			case 'fneg':
				frame.values.set(inst, -this.read(inst.operand, frame))
				return
			case 'cast': {
				const operand = this.read(inst.operand, frame)
				frame.values.set(inst, inst.opcode === 'fptosi' ? Math.trunc(operand) | 0 : operand)
				return
			}
			case 'call': {
				const args = inst.args.map((arg) => this.read(arg, frame))
				const result = this.call(inst.callee, args)
				if (inst.type !== IRType.Void) frame.values.set(inst, result ?? 0)
				return
			}
			default:
				throw new Error(`unexpected terminator '${inst.op}' in the middle of a block`)
		}
	}
}

function binary(opcode: Extract<Instruction, { op: 'binary' }>['opcode'], a: number, b: number): number {
	switch (opcode) {
		case 'add':
			return (a + b) | 0
		case 'sub':
			return (a - b) | 0
		case 'mul':
			return Math.imul(a, b)
		case 'sdiv':
			if (b === 0) throw new Error('integer division by zero')
			return Math.trunc(a / b) | 0
		case 'srem':
			if (b === 0) throw new Error('integer division by zero')
			return a % b | 0
		case 'fadd':
			return a + b
		case 'fsub':
			return a - b
		case 'fmul':
			return a * b
		case 'fdiv':
			return a / b
	}
}

function compare(predicate: ICmpPredicate | FCmpPredicate, a: number, b: number): number {
	switch (predicate) {
		case 'eq':
		case 'oeq':
			return a === b ? 1 : 0
		case 'ne':
			return a !== b ? 1 : 0
		case 'one':
			return a < b || a > b ? 1 : 0
		case 'slt':
		case 'olt':
			return a < b ? 1 : 0
		case 'sgt':
		case 'ogt':
			return a > b ? 1 : 0
		case 'sle':
		case 'ole':
			return a <= b ? 1 : 0
		case 'sge':
		case 'oge':
			return a >= b ? 1 : 0
	}
}

/**
 * Run a function of the module and return its result (undefined for void).
 *
 * @example
 * interpret(module, 'factorial', [5]) // 120
 */
export function interpret(
	module: IRModule,
	name: string,
	args: readonly number[] = [],
	options: InterpretOptions = {}
): number | undefined {
	const fn = module.getFunction(name)
	if (fn === undefined) {
		throw new Error(`no function @${name}`)
	}
	return new Interpreter(options).call(fn, args)
}
