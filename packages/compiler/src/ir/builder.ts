import { EmissionError } from './errors.ts'
import type { BasicBlock, IRFunction } from './module.ts'
import {
	type AllocaInst,
	type BinaryInst,
	type BinaryOpcode,
	type BrInst,
	type CallInst,
	type CastInst,
	type CastOpcode,
	type CondBrInst,
	type FCmpInst,
	type FCmpPredicate,
	type FNegInst,
	type ICmpInst,
	type ICmpPredicate,
	type Instruction,
	IRType,
	type LoadInst,
	type RetInst,
	type StoreInst,
	type Value,
	type ValueType,
} from './types.ts'

/** The type of an operand, rejecting the result of a void call. */
export function typeOfValue(value: Value): ValueType {
	if (value.type === IRType.Void) {
		throw new EmissionError('the result of a void call cannot be used as a value')
	}
	return value.type
}

/**
 * Insertion cursor over basic blocks.
 *
 * Every append checks that the current block has no terminator yet and throws
 * EmissionError otherwise. Branches record themselves as predecessors of
 * their targets.
 */
export class IRBuilder {
	private block: BasicBlock | null = null

	get insertBlock(): BasicBlock | null {
		return this.block
	}

	get currentFunction(): IRFunction | null {
		return this.block?.parent ?? null
	}

	/** Move the cursor to the end of a block, attaching it to its function on first use. */
	positionAtEnd(block: BasicBlock): void {
		if (!block.isAttached) {
			block.parent.attachBlock(block)
		}
		this.block = block
	}

	clearInsertionPoint(): void {
		this.block = null
	}

	/** True when there is no block to append to, or the block already ends in a terminator. */
	isTerminated(): boolean {
		return this.block === null || this.block.isTerminated
	}

	private requireBlock(): BasicBlock {
		if (this.block === null) {
			throw new EmissionError('no insertion block')
		}
		return this.block
	}

	private append<T extends Instruction>(inst: T): T {
		const block = this.requireBlock()
		const term = block.terminator
		if (term !== null) {
			throw new EmissionError(
				`cannot append '${inst.op}' to block '${block.name}': it already ends in '${term.op}'`
			)
		}
		block.instructions.push(inst)
		return inst
	}

	// ===========================================================================
	// MEMORY
	// ===========================================================================

	/**
	 * Create a stack slot at the front of the current function's entry block,
	 * after any slots already there.
	 */
	createAlloca(allocated: ValueType, name: string): AllocaInst {
		const fn = this.requireBlock().parent
		const entry = fn.entry
		if (entry === null) {
			throw new EmissionError(`function '${fn.name}' has no entry block`)
		}
		const slot: AllocaInst = { allocated, name: fn.uniqueValueName(name), op: 'alloca' }
		const firstNonAlloca = entry.instructions.findIndex((inst) => inst.op !== 'alloca')
		const at = firstNonAlloca === -1 ? entry.instructions.length : firstNonAlloca
		entry.instructions.splice(at, 0, slot)
		return slot
	}

	createLoad(slot: AllocaInst): LoadInst {
		return this.append<LoadInst>({ op: 'load', slot, type: slot.allocated })
	}

	createStore(value: Value, slot: AllocaInst): StoreInst {
		const type = typeOfValue(value)
		if (type !== slot.allocated) {
			throw new EmissionError(`cannot store ${type} into ${slot.allocated} slot '%${slot.name}'`)
		}
		return this.append<StoreInst>({ op: 'store', slot, value })
	}

	// ===========================================================================
	// ARITHMETIC AND COMPARISON
	// ===========================================================================

	createBinary(opcode: BinaryOpcode, lhs: Value, rhs: Value): BinaryInst {
		const type = typeOfValue(lhs)
		if (type !== typeOfValue(rhs)) {
			throw new EmissionError(`operand types of '${opcode}' differ: ${type} and ${typeOfValue(rhs)}`)
		}
		return this.append<BinaryInst>({ lhs, op: 'binary', opcode, rhs, type })
	}

	createICmp(predicate: ICmpPredicate, lhs: Value, rhs: Value): ICmpInst {
		return this.append<ICmpInst>({ lhs, op: 'icmp', predicate, rhs, type: IRType.I1 })
	}

	createFCmp(predicate: FCmpPredicate, lhs: Value, rhs: Value): FCmpInst {
		return this.append<FCmpInst>({ lhs, op: 'fcmp', predicate, rhs, type: IRType.I1 })
	}

	createFNeg(operand: Value): FNegInst {
		return this.append<FNegInst>({ op: 'fneg', operand, type: IRType.F64 })
	}

	createCast(opcode: CastOpcode, operand: Value, type: ValueType): CastInst {
		return this.append<CastInst>({ op: 'cast', opcode, operand, type })
	}

	createCall(callee: IRFunction, args: readonly Value[]): CallInst {
		return this.append<CallInst>({ args, callee, op: 'call', type: callee.returnType })
	}

	// ===========================================================================
	// TERMINATORS
	// ===========================================================================

	private addEdge(from: BasicBlock, to: BasicBlock): void {
		if (to.parent !== from.parent) {
			throw new EmissionError(`branch from '${from.name}' leaves function '${from.parent.name}'`)
		}
		if (!to.predecessors.includes(from)) {
			to.predecessors.push(from)
		}
	}

	createBr(target: BasicBlock): BrInst {
		const inst = this.append<BrInst>({ op: 'br', target })
		this.addEdge(this.requireBlock(), target)
		return inst
	}

	createCondBr(condition: Value, ifTrue: BasicBlock, ifFalse: BasicBlock): CondBrInst {
		const inst = this.append<CondBrInst>({ condition, ifFalse, ifTrue, op: 'condbr' })
		const block = this.requireBlock()
		this.addEdge(block, ifTrue)
		this.addEdge(block, ifFalse)
		return inst
	}

	createRet(value: Value | null): RetInst {
		return this.append<RetInst>({ op: 'ret', value })
	}
}
