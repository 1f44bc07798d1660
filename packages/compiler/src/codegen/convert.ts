/**
 * Source-type mapping and implicit numeric conversions.
 *
 * Conversions never reject a program; they only keep operand types in line
 * with what each instruction expects. Constant operands are converted
 * directly instead of through a cast instruction.
 *
 * This is Layer 1 (Values) - no imports from other codegen modules.
 */

import type { TypeName } from '../core/nodes.ts'
import type { IRBuilder } from '../ir/builder.ts'
import { EmissionError } from '../ir/errors.ts'
import {
	constBool,
	constDouble,
	constInt,
	IRType,
	type Value,
	type ValueType,
} from '../ir/types.ts'

export function irTypeOf(type: TypeName): IRType {
	switch (type) {
		case 'int':
			return IRType.I32
		case 'double':
			return IRType.F64
		case 'bool':
			return IRType.I1
		case 'void':
			return IRType.Void
	}
}

/** IR type of a variable or parameter. The parser has already rejected `void` ones. */
export function valueTypeOf(type: TypeName): ValueType {
	const irType = irTypeOf(type)
	if (irType === IRType.Void) {
		throw new EmissionError('void is not a value type')
	}
	return irType
}

function convertConstant(value: number, to: ValueType): Value {
	switch (to) {
		case IRType.I1:
			return constBool(value !== 0)
		case IRType.I32:
			return constInt(Math.trunc(value))
		case IRType.F64:
			return constDouble(value)
	}
}

/** Convert a value to `to`, emitting a cast or comparison where the types differ. */
export function coerce(builder: IRBuilder, value: Value, to: ValueType): Value {
	const from = value.type
	if (from === to) return value
	if (from === IRType.Void) {
		throw new EmissionError('cannot convert the result of a void call')
	}
	if (value.op === 'const') return convertConstant(value.value, to)

	switch (to) {
		case IRType.I1:
			return from === IRType.F64
				? builder.createFCmp('one', value, constDouble(0))
				: builder.createICmp('ne', value, constInt(0))
		case IRType.I32:
			return from === IRType.F64
				? builder.createCast('fptosi', value, IRType.I32)
				: builder.createCast('zext', value, IRType.I32)
		case IRType.F64:
			return from === IRType.I1
				? builder.createCast('uitofp', value, IRType.F64)
				: builder.createCast('sitofp', value, IRType.F64)
	}
}

/** Truth value of a condition: `value != 0` as i1. */
export function toCondition(builder: IRBuilder, value: Value): Value {
	return coerce(builder, value, IRType.I1)
}

/**
 * Common operand type of an arithmetic or comparison operator: f64 if either
 * side is f64, otherwise i32 (bools are widened).
 */
export function promote(builder: IRBuilder, lhs: Value, rhs: Value): [Value, Value, ValueType] {
	const type = lhs.type === IRType.F64 || rhs.type === IRType.F64 ? IRType.F64 : IRType.I32
	return [coerce(builder, lhs, type), coerce(builder, rhs, type), type]
}
