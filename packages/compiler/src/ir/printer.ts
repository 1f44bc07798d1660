/**
 * Textual IR.
 *
 * Output is deterministic for a given module: functions in declaration order,
 * blocks in attachment order, and unnamed values numbered %0, %1, ... in print
 * order, restarting in each function.
 */

import type { BasicBlock, IRFunction, IRModule } from './module.ts'
import { type Instruction, IRType, producesValue, type Value } from './types.ts'

function formatFloat(value: number): string {
	const text = String(value)
	if (!Number.isFinite(value) || /[.e]/.test(text)) return text
	return `${text}.0`
}

class FunctionPrinter {
	private readonly numbers = new Map<Instruction, number>()

	constructor(private readonly fn: IRFunction) {
		let next = 0
		for (const block of fn.blocks) {
			for (const inst of block.instructions) {
				if (producesValue(inst)) {
					this.numbers.set(inst, next++)
				}
			}
		}
	}

	private ref(value: Value): string {
		switch (value.op) {
			case 'const':
				if (value.type === IRType.I1) return value.value === 0 ? 'false' : 'true'
				if (value.type === IRType.F64) return formatFloat(value.value)
				return String(value.value)
			case 'arg':
				return `%${value.name}`
			default:
				return `%${this.numbers.get(value) ?? '?'}`
		}
	}

	private typed(value: Value): string {
		return `${value.type} ${this.ref(value)}`
	}

	private label(block: BasicBlock): string {
		return `label %${block.name}`
	}

	private body(inst: Instruction): string {
		switch (inst.op) {
			case 'alloca':
				return `%${inst.name} = alloca ${inst.allocated}`
			case 'load':
				return `load ${inst.type}, ptr %${inst.slot.name}`
			case 'store':
				return `store ${this.typed(inst.value)}, ptr %${inst.slot.name}`
			case 'binary':
				return `${inst.opcode} ${inst.type} ${this.ref(inst.lhs)}, ${this.ref(inst.rhs)}`
			case 'icmp':
			case 'fcmp':
				return `${inst.op} ${inst.predicate} ${inst.lhs.type} ${this.ref(inst.lhs)}, ${this.ref(inst.rhs)}`
			case 'fneg':
				return `fneg ${this.typed(inst.operand)}`
			case 'cast':
				return `${inst.opcode} ${this.typed(inst.operand)} to ${inst.type}`
			case 'call': {
				const args = inst.args.map((arg) => this.typed(arg)).join(', ')
				return `call ${inst.type} @${inst.callee.name}(${args})`
			}
			case 'br':
				return `br ${this.label(inst.target)}`
			case 'condbr':
				return `br ${this.typed(inst.condition)}, ${this.label(inst.ifTrue)}, ${this.label(inst.ifFalse)}`
			case 'ret':
				return inst.value === null ? 'ret void' : `ret ${this.typed(inst.value)}`
		}
	}

	private instruction(inst: Instruction): string {
		const number = this.numbers.get(inst)
		const text = this.body(inst)
		return number === undefined ? `  ${text}` : `  %${number} = ${text}`
	}

	print(): string {
		const { fn } = this
		if (fn.isDeclaration) {
			const types = fn.params.map((p) => p.type).join(', ')
			return `declare ${fn.returnType} @${fn.name}(${types})`
		}

		const params = fn.params.map((p) => `${p.type} %${p.name}`).join(', ')
		const lines = [`define ${fn.returnType} @${fn.name}(${params}) {`]
		fn.blocks.forEach((block, index) => {
			if (index > 0) lines.push('')
			lines.push(`${block.name}:`)
			for (const inst of block.instructions) {
				lines.push(this.instruction(inst))
			}
		})
		lines.push('}')
		return lines.join('\n')
	}
}

export function printFunction(fn: IRFunction): string {
	return new FunctionPrinter(fn).print()
}

/** Whole module, ending with a newline. */
export function printModule(module: IRModule): string {
	const parts = [`; module '${module.name}'`]
	for (const fn of module.functions) {
		parts.push(printFunction(fn))
	}
	return `${parts.join('\n\n')}\n`
}
