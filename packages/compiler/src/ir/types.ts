/**
 * IR value and instruction model.
 *
 * Instructions are plain objects discriminated by `op`. Blocks, functions and
 * the module that own them live in module.ts.
 */

import type { BasicBlock, IRFunction } from './module.ts'

export const IRType = {
	F64: 'f64',
	I1: 'i1',
	I32: 'i32',
	Void: 'void',
} as const

export type IRType = (typeof IRType)[keyof typeof IRType]

/** Types a value can have. */
export type ValueType = Exclude<IRType, 'void'>

export type BinaryOpcode = 'add' | 'sub' | 'mul' | 'sdiv' | 'srem' | 'fadd' | 'fsub' | 'fmul' | 'fdiv'

export type ICmpPredicate = 'eq' | 'ne' | 'slt' | 'sgt' | 'sle' | 'sge'

export type FCmpPredicate = 'oeq' | 'one' | 'olt' | 'ogt' | 'ole' | 'oge'

/**
 * Conversions between value types.
 * - zext: i1 → i32
 * - sitofp: i32 → f64
 * - uitofp: i1 → f64
 * - fptosi: f64 → i32
 */
export type CastOpcode = 'zext' | 'sitofp' | 'uitofp' | 'fptosi'

// =============================================================================
// Operands
// =============================================================================

export interface Constant {
	readonly op: 'const'
	readonly type: ValueType
	readonly value: number
}

export interface Argument {
	readonly op: 'arg'
	readonly type: ValueType
	readonly index: number
	readonly name: string
}

// =============================================================================
// Instructions
// =============================================================================

/** A stack slot. Always placed at the front of the entry block. */
export interface AllocaInst {
	readonly op: 'alloca'
	readonly allocated: ValueType
	readonly name: string
}

export interface LoadInst {
	readonly op: 'load'
	readonly type: ValueType
	readonly slot: AllocaInst
}

export interface StoreInst {
	readonly op: 'store'
	readonly value: Value
	readonly slot: AllocaInst
}

export interface BinaryInst {
	readonly op: 'binary'
	readonly opcode: BinaryOpcode
	readonly type: ValueType
	readonly lhs: Value
	readonly rhs: Value
}

export interface ICmpInst {
	readonly op: 'icmp'
	readonly predicate: ICmpPredicate
	readonly type: typeof IRType.I1
	readonly lhs: Value
	readonly rhs: Value
}

export interface FCmpInst {
	readonly op: 'fcmp'
	readonly predicate: FCmpPredicate
	readonly type: typeof IRType.I1
	readonly lhs: Value
	readonly rhs: Value
}

export interface FNegInst {
	readonly op: 'fneg'
	readonly type: typeof IRType.F64
	readonly operand: Value
}

export interface CastInst {
	readonly op: 'cast'
	readonly opcode: CastOpcode
	readonly type: ValueType
	readonly operand: Value
}

export interface CallInst {
	readonly op: 'call'
	readonly type: IRType
	readonly callee: IRFunction
	readonly args: readonly Value[]
}

export interface BrInst {
	readonly op: 'br'
	readonly target: BasicBlock
}

export interface CondBrInst {
	readonly op: 'condbr'
	readonly condition: Value
	readonly ifTrue: BasicBlock
	readonly ifFalse: BasicBlock
}

export interface RetInst {
	readonly op: 'ret'
	readonly value: Value | null
}

export type Terminator = BrInst | CondBrInst | RetInst

export type Instruction =
	| AllocaInst
	| LoadInst
	| StoreInst
	| BinaryInst
	| ICmpInst
	| FCmpInst
	| FNegInst
	| CastInst
	| CallInst
	| Terminator

/** Instructions whose result can be used as an operand. */
export type ValueInstruction = LoadInst | BinaryInst | ICmpInst | FCmpInst | FNegInst | CastInst | CallInst

export type Value = Constant | Argument | ValueInstruction

export function isTerminator(inst: Instruction): inst is Terminator {
	return inst.op === 'br' || inst.op === 'condbr' || inst.op === 'ret'
}

/** True when the instruction defines a value that gets a `%` name when printed. */
export function producesValue(inst: Instruction): inst is ValueInstruction {
	switch (inst.op) {
		case 'load':
		case 'binary':
		case 'icmp':
		case 'fcmp':
		case 'fneg':
		case 'cast':
			return true
		case 'call':
			return inst.type !== IRType.Void
		default:
			return false
	}
}

// =============================================================================
// Constants
// =============================================================================

export function constInt(value: number): Constant {
	return { op: 'const', type: IRType.I32, value: value | 0 }
}

export function constDouble(value: number): Constant {
	return { op: 'const', type: IRType.F64, value }
}

export function constBool(value: boolean): Constant {
	return { op: 'const', type: IRType.I1, value: value ? 1 : 0 }
}

export function zeroOf(type: ValueType): Constant {
	switch (type) {
		case IRType.I1:
			return constBool(false)
		case IRType.I32:
			return constInt(0)
		case IRType.F64:
			return constDouble(0)
	}
}
