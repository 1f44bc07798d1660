/**
 * Structural and type checks over an emitted function.
 *
 * - the function has an entry block
 * - every reachable block ends in exactly one terminator, with nothing after it
 * - every block other than the entry has at least one predecessor
 * - branch targets are attached blocks of the same function
 * - operand types agree with each instruction and with the function signature
 */

import type { BasicBlock, IRFunction } from './module.ts'
import { type CastOpcode, type Instruction, IRType, isTerminator, type Value } from './types.ts'

export interface VerifyResult {
	valid: boolean
	errors: string[]
}

const CAST_TYPES: Record<CastOpcode, readonly [from: IRType, to: IRType]> = {
	fptosi: [IRType.F64, IRType.I32],
	sitofp: [IRType.I32, IRType.F64],
	uitofp: [IRType.I1, IRType.F64],
	zext: [IRType.I1, IRType.I32],
}

const FLOAT_OPCODES = new Set(['fadd', 'fsub', 'fmul', 'fdiv'])

function reachableFrom(entry: BasicBlock): Set<BasicBlock> {
	const seen = new Set<BasicBlock>([entry])
	const work = [entry]
	for (let block = work.pop(); block !== undefined; block = work.pop()) {
		for (const next of block.successors()) {
			if (!seen.has(next)) {
				seen.add(next)
				work.push(next)
			}
		}
	}
	return seen
}

class FunctionVerifier {
	readonly errors: string[] = []

	constructor(private readonly fn: IRFunction) {}

	private fail(block: BasicBlock, message: string): void {
		this.errors.push(`${this.fn.name}/${block.name}: ${message}`)
	}

	private expectOperand(block: BasicBlock, value: Value, type: IRType, what: string): void {
		if (value.type !== type) {
			this.fail(block, `${what} has type ${value.type}, expected ${type}`)
		}
	}

	private checkTarget(block: BasicBlock, target: BasicBlock): void {
		if (target.parent !== this.fn || !target.isAttached) {
			this.fail(block, `branch to detached block '${target.name}'`)
		}
	}

	private checkInstruction(block: BasicBlock, inst: Instruction): void {
		switch (inst.op) {
			case 'alloca':
				if (block !== this.fn.entry) this.fail(block, `alloca '%${inst.name}' outside the entry block`)
				return
			case 'load':
				if (inst.type !== inst.slot.allocated) this.fail(block, `load of ${inst.type} from ${inst.slot.allocated} slot`)
				return
			case 'store':
				this.expectOperand(block, inst.value, inst.slot.allocated, `store to '%${inst.slot.name}'`)
				return
			case 'binary': {
				const expected = FLOAT_OPCODES.has(inst.opcode) ? IRType.F64 : IRType.I32
				this.expectOperand(block, inst.lhs, expected, `left operand of '${inst.opcode}'`)
				this.expectOperand(block, inst.rhs, expected, `right operand of '${inst.opcode}'`)
				return
			}
			case 'icmp':
				if (inst.lhs.type === IRType.F64 || inst.lhs.type === IRType.Void) {
					this.fail(block, `icmp on ${inst.lhs.type}`)
				}
				this.expectOperand(block, inst.rhs, inst.lhs.type, 'right operand of icmp')
				return
			case 'fcmp':
				this.expectOperand(block, inst.lhs, IRType.F64, 'left operand of fcmp')
				this.expectOperand(block, inst.rhs, IRType.F64, 'right operand of fcmp')
				return
			case 'fneg':
				this.expectOperand(block, inst.operand, IRType.F64, 'operand of fneg')
				return
			case 'cast': {
				const [from, to] = CAST_TYPES[inst.opcode]
				this.expectOperand(block, inst.operand, from, `operand of ${inst.opcode}`)
				if (inst.type !== to) this.fail(block, `${inst.opcode} produces ${inst.type}, expected ${to}`)
				return
			}
			case 'call':
				this.checkCall(block, inst.callee, inst.args)
				return
			case 'br':
				this.checkTarget(block, inst.target)
				return
			case 'condbr':
				this.expectOperand(block, inst.condition, IRType.I1, 'branch condition')
				this.checkTarget(block, inst.ifTrue)
				this.checkTarget(block, inst.ifFalse)
				return
			case 'ret':
				this.checkReturn(block, inst.value)
				return
		}
	}

	private checkCall(block: BasicBlock, callee: IRFunction, args: readonly Value[]): void {
		if (args.length !== callee.params.length) {
			this.fail(block, `call to '@${callee.name}' passes ${args.length} argument(s), expected ${callee.params.length}`)
			return
		}
		args.forEach((arg, index) => {
			const param = callee.params[index]
			if (param !== undefined) {
				this.expectOperand(block, arg, param.type, `argument ${index} of '@${callee.name}'`)
			}
		})
	}

	private checkReturn(block: BasicBlock, value: Value | null): void {
		if (value === null) {
			if (this.fn.returnType !== IRType.Void) this.fail(block, `ret void in function returning ${this.fn.returnType}`)
			return
		}
		this.expectOperand(block, value, this.fn.returnType, 'return value')
	}

	private checkBlock(block: BasicBlock): void {
		const last = block.instructions.length - 1
		block.instructions.forEach((inst, index) => {
			if (isTerminator(inst) && index !== last) {
				this.fail(block, `terminator '${inst.op}' is followed by more instructions`)
			}
			this.checkInstruction(block, inst)
		})
		if (!block.isTerminated) {
			this.fail(block, 'block does not end in a terminator')
		}
	}

	run(): void {
		const entry = this.fn.entry
		if (entry === null) {
			this.errors.push(`${this.fn.name}: function has no body`)
			return
		}
		const reachable = reachableFrom(entry)
		for (const block of this.fn.blocks) {
			if (block !== entry && block.predecessors.length === 0) {
				this.fail(block, 'block has no predecessor')
			}
			if (reachable.has(block)) this.checkBlock(block)
		}
	}
}

/** Check a defined function. Declarations have no body to verify and fail. */
export function verifyFunction(fn: IRFunction): VerifyResult {
	const verifier = new FunctionVerifier(fn)
	verifier.run()
	return { errors: verifier.errors, valid: verifier.errors.length === 0 }
}
