/**
 * WebAssembly backend.
 *
 * Lowers an IR module to a binaryen module. Each basic block becomes a
 * Relooper block and each branch a Relooper edge, so the unstructured CFG is
 * turned back into structured wasm control flow by binaryen.
 *
 * Stack slots and instruction results all become wasm locals; bools are i32.
 */

import binaryen from 'binaryen'

import { EmissionError } from '../ir/errors.ts'
import type { BasicBlock, IRFunction, IRModule } from '../ir/module.ts'
import { type Instruction, IRType, producesValue, type Value } from '../ir/types.ts'

export interface EmitOptions {
	/** Run binaryen's default optimization passes */
	optimize?: boolean
}

export interface AssembleResult {
	binary: Uint8Array
	text: string
	valid: boolean
}

/** Module name that externs are imported from. */
export const IMPORT_MODULE = 'env'

function toBinaryenType(type: IRType): binaryen.Type {
	switch (type) {
		case IRType.I1:
		case IRType.I32:
			return binaryen.i32
		case IRType.F64:
			return binaryen.f64
		case IRType.Void:
			return binaryen.none
	}
}

function paramsType(fn: IRFunction): binaryen.Type {
	return binaryen.createType(fn.params.map((p) => toBinaryenType(p.type)))
}

/**
 * Per-function lowering state: the wasm local assigned to every slot and
 * every value-producing instruction.
 */
class FunctionLowering {
	private readonly locals = new Map<Instruction, number>()
	private readonly varTypes: binaryen.Type[] = []
	private readonly paramCount: number

	constructor(
		private readonly mod: binaryen.Module,
		private readonly fn: IRFunction
	) {
		this.paramCount = fn.params.length
		for (const block of fn.blocks) {
			for (const inst of block.instructions) {
				if (inst.op === 'alloca') {
					this.addLocal(inst, toBinaryenType(inst.allocated))
				} else if (producesValue(inst)) {
					this.addLocal(inst, toBinaryenType(inst.type))
				}
			}
		}
	}

	private addLocal(inst: Instruction, type: binaryen.Type): void {
		this.locals.set(inst, this.paramCount + this.varTypes.length)
		this.varTypes.push(type)
	}

	private localOf(inst: Instruction): number {
		const index = this.locals.get(inst)
		if (index === undefined) {
			throw new EmissionError(`no local for '${inst.op}' in '${this.fn.name}'`)
		}
		return index
	}

	private operand(value: Value): binaryen.ExpressionRef {
		const { mod } = this
		switch (value.op) {
			case 'const':
				return value.type === IRType.F64 ? mod.f64.const(value.value) : mod.i32.const(value.value)
			case 'arg':
				return mod.local.get(value.index, toBinaryenType(value.type))
			default:
				return mod.local.get(this.localOf(value), toBinaryenType(value.type))
		}
	}

	private binary(inst: Extract<Instruction, { op: 'binary' }>): binaryen.ExpressionRef {
		const { mod } = this
		const lhs = this.operand(inst.lhs)
		const rhs = this.operand(inst.rhs)
		switch (inst.opcode) {
			case 'add':
				return mod.i32.add(lhs, rhs)
			case 'sub':
				return mod.i32.sub(lhs, rhs)
			case 'mul':
				return mod.i32.mul(lhs, rhs)
			case 'sdiv':
				return mod.i32.div_s(lhs, rhs)
			case 'srem':
				return mod.i32.rem_s(lhs, rhs)
			case 'fadd':
				return mod.f64.add(lhs, rhs)
			case 'fsub':
				return mod.f64.sub(lhs, rhs)
			case 'fmul':
				return mod.f64.mul(lhs, rhs)
			case 'fdiv':
				return mod.f64.div(lhs, rhs)
		}
	}

	private icmp(inst: Extract<Instruction, { op: 'icmp' }>): binaryen.ExpressionRef {
		const { mod } = this
		const lhs = this.operand(inst.lhs)
		const rhs = this.operand(inst.rhs)
		switch (inst.predicate) {
			case 'eq':
				return mod.i32.eq(lhs, rhs)
			case 'ne':
				return mod.i32.ne(lhs, rhs)
			case 'slt':
				return mod.i32.lt_s(lhs, rhs)
			case 'sgt':
				return mod.i32.gt_s(lhs, rhs)
			case 'sle':
				return mod.i32.le_s(lhs, rhs)
			case 'sge':
				return mod.i32.ge_s(lhs, rhs)
		}
	}

	private fcmp(inst: Extract<Instruction, { op: 'fcmp' }>): binaryen.ExpressionRef {
		const { mod } = this
		const lhs = this.operand(inst.lhs)
		const rhs = this.operand(inst.rhs)
		switch (inst.predicate) {
			case 'oeq':
				return mod.f64.eq(lhs, rhs)
			case 'one':
				// ordered and unequal: false when either side is NaN, unlike f64.ne
				return mod.i32.or(
					mod.f64.lt(lhs, rhs),
					mod.f64.gt(this.operand(inst.lhs), this.operand(inst.rhs))
				)
			case 'olt':
				return mod.f64.lt(lhs, rhs)
			case 'ogt':
				return mod.f64.gt(lhs, rhs)
			case 'ole':
				return mod.f64.le(lhs, rhs)
			case 'oge':
				return mod.f64.ge(lhs, rhs)
		}
	}

	private cast(inst: Extract<Instruction, { op: 'cast' }>): binaryen.ExpressionRef {
		const { mod } = this
		const operand = this.operand(inst.operand)
		switch (inst.opcode) {
			case 'zext':
				return operand
			case 'sitofp':
				return mod.f64.convert_s.i32(operand)
			case 'uitofp':
				return mod.f64.convert_u.i32(operand)
			case 'fptosi':
				return mod.i32.trunc_s.f64(operand)
		}
	}

	private call(inst: Extract<Instruction, { op: 'call' }>): binaryen.ExpressionRef {
		const args = inst.args.map((arg) => this.operand(arg))
		return this.mod.call(inst.callee.name, args, toBinaryenType(inst.type))
	}

	/** The wasm statement for one non-branch instruction, or null when it has none. */
	private statement(inst: Instruction): binaryen.ExpressionRef | null {
		const { mod } = this
		switch (inst.op) {
			case 'alloca':
			case 'br':
			case 'condbr':
				return null
			case 'store':
				return mod.local.set(this.localOf(inst.slot), this.operand(inst.value))
			case 'load':
				return mod.local.set(
					this.localOf(inst),
					mod.local.get(this.localOf(inst.slot), toBinaryenType(inst.type))
				)
			case 'binary':
				return mod.local.set(this.localOf(inst), this.binary(inst))
			case 'icmp':
				return mod.local.set(this.localOf(inst), this.icmp(inst))
			case 'fcmp':
				return mod.local.set(this.localOf(inst), this.fcmp(inst))
			case 'fneg':
				return mod.local.set(this.localOf(inst), mod.f64.neg(this.operand(inst.operand)))
			case 'cast':
				return mod.local.set(this.localOf(inst), this.cast(inst))
			case 'call':
				return inst.type === IRType.Void
					? this.call(inst)
					: mod.local.set(this.localOf(inst), this.call(inst))
			case 'ret':
				return inst.value === null ? mod.return() : mod.return(this.operand(inst.value))
		}
	}

	private blockBody(block: BasicBlock): binaryen.ExpressionRef {
		const statements: binaryen.ExpressionRef[] = []
		for (const inst of block.instructions) {
			const stmt = this.statement(inst)
			if (stmt !== null) statements.push(stmt)
		}
		return statements.length === 0 ? this.mod.nop() : this.mod.block(null, statements)
	}

	private addBranches(
		relooper: binaryen.Relooper,
		refs: Map<BasicBlock, binaryen.RelooperBlockRef>,
		block: BasicBlock
	): void {
		const term = block.terminator
		const from = this.refOf(refs, block)
		if (term === null || term.op === 'ret') return

		if (term.op === 'br') {
			relooper.addBranch(from, this.refOf(refs, term.target), 0, 0)
			return
		}
		if (term.ifTrue === term.ifFalse) {
			relooper.addBranch(from, this.refOf(refs, term.ifTrue), 0, 0)
			return
		}
		relooper.addBranch(from, this.refOf(refs, term.ifTrue), this.operand(term.condition), 0)
		relooper.addBranch(from, this.refOf(refs, term.ifFalse), 0, 0)
	}

	private refOf(refs: Map<BasicBlock, binaryen.RelooperBlockRef>, block: BasicBlock): binaryen.RelooperBlockRef {
		const ref = refs.get(block)
		if (ref === undefined) {
			throw new EmissionError(`block '${block.name}' is not part of '${this.fn.name}'`)
		}
		return ref
	}

	/** Add the function to the binaryen module. */
	lower(): void {
		const { fn, mod } = this
		const entry = fn.entry
		if (entry === null) {
			throw new EmissionError(`function '${fn.name}' has no body`)
		}

		const relooper = new binaryen.Relooper(mod)
		const refs = new Map<BasicBlock, binaryen.RelooperBlockRef>()
		for (const block of fn.blocks) {
			refs.set(block, relooper.addBlock(this.blockBody(block)))
		}
		for (const block of fn.blocks) {
			this.addBranches(relooper, refs, block)
		}

		const labelHelper = this.paramCount + this.varTypes.length
		const rendered = relooper.renderAndDispose(this.refOf(refs, entry), labelHelper)
		const vars = [...this.varTypes, binaryen.i32]

		// Every path ends in a return, so falling off the end is unreachable.
		const body =
			fn.returnType === IRType.Void ? rendered : mod.block(null, [rendered, mod.unreachable()])

		mod.addFunction(fn.name, paramsType(fn), toBinaryenType(fn.returnType), vars, body)
		mod.addFunctionExport(fn.name, fn.name)
	}
}

function emitResult(mod: binaryen.Module): AssembleResult {
	const valid = mod.validate() === 1
	const binary = mod.emitBinary()
	const text = mod.emitText()
	mod.dispose()
	return { binary, text, valid }
}

/**
 * Lower an IR module to WebAssembly.
 * Externs become imports from `env`; every defined function is exported.
 */
export function assemble(module: IRModule, options: EmitOptions = {}): AssembleResult {
	const mod = new binaryen.Module()

	try {
		for (const fn of module.functions) {
			if (fn.isDeclaration) {
				mod.addFunctionImport(fn.name, IMPORT_MODULE, fn.name, paramsType(fn), toBinaryenType(fn.returnType))
			}
		}
		for (const fn of module.functions) {
			if (!fn.isDeclaration) {
				new FunctionLowering(mod, fn).lower()
			}
		}
	} catch (error) {
		mod.dispose()
		throw error
	}

	if (options.optimize) {
		mod.optimize()
	}
	return emitResult(mod)
}
