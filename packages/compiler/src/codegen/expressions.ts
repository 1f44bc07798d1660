/**
 * Expression lowering.
 *
 * Every function here returns the resulting IR value, or null after reporting
 * a diagnostic. Operands are always lowered left to right.
 *
 * This is Layer 2 (Expressions) - imports from convert.ts (Layer 1).
 */

import type {
	AssignExpr,
	BinaryExpr,
	BinaryOperator,
	CallExpr,
	Expression,
	Identifier,
	UnaryExpr,
} from '../core/nodes.ts'
import { NodeKind } from '../core/nodes.ts'
import { EmissionError } from '../ir/errors.ts'
import type { IRFunction } from '../ir/module.ts'
import {
	type BinaryOpcode,
	constBool,
	constDouble,
	constInt,
	type FCmpPredicate,
	type ICmpPredicate,
	IRType,
	type Value,
} from '../ir/types.ts'
import { coerce, promote, toCondition } from './convert.ts'
import type { CodeGenState } from './state.ts'

type ArithmeticOperator = '+' | '-' | '*' | '/' | '%'
type ComparisonOperator = '==' | '!=' | '<' | '>' | '<=' | '>='

const INT_OPCODES: Record<ArithmeticOperator, BinaryOpcode> = {
	'%': 'srem',
	'*': 'mul',
	'+': 'add',
	'-': 'sub',
	'/': 'sdiv',
}

const FLOAT_OPCODES: Record<Exclude<ArithmeticOperator, '%'>, BinaryOpcode> = {
	'*': 'fmul',
	'+': 'fadd',
	'-': 'fsub',
	'/': 'fdiv',
}

const ICMP_PREDICATES: Record<ComparisonOperator, ICmpPredicate> = {
	'!=': 'ne',
	'<': 'slt',
	'<=': 'sle',
	'==': 'eq',
	'>': 'sgt',
	'>=': 'sge',
}

const FCMP_PREDICATES: Record<ComparisonOperator, FCmpPredicate> = {
	'!=': 'one',
	'<': 'olt',
	'<=': 'ole',
	'==': 'oeq',
	'>': 'ogt',
	'>=': 'oge',
}

function isComparison(operator: BinaryOperator): operator is ComparisonOperator {
	return operator in ICMP_PREDICATES
}

function requireFunction(state: CodeGenState): IRFunction {
	const fn = state.currentFunction
	if (fn === null) {
		throw new EmissionError('expression lowered outside a function')
	}
	return fn
}

// ============================================================================
// Leaves
// ============================================================================

function emitIdentifier(expr: Identifier, state: CodeGenState): Value | null {
	const binding = state.scope.lookup(expr.name)
	if (binding === undefined) {
		const code = state.module.hasFunction(expr.name) ? 'MCSEM004' : 'MCSEM001'
		state.context.emitAt(code, expr, { name: expr.name })
		return null
	}
	return state.builder.createLoad(binding.slot)
}

function emitAssign(expr: AssignExpr, state: CodeGenState): Value | null {
	const binding = state.scope.lookup(expr.target)
	if (binding === undefined) {
		const code = state.module.hasFunction(expr.target) ? 'MCSEM007' : 'MCSEM001'
		state.context.emitAt(code, expr, { name: expr.target })
		return null
	}
	const value = emitValue(expr.value, state)
	if (value === null) return null

	const stored = coerce(state.builder, value, binding.type)
	state.builder.createStore(stored, binding.slot)
	return stored
}

/**
 * A call, with the argument count checked before any argument is lowered.
 * The result of a void callee is returned as-is; emitValue rejects it where a
 * value is needed.
 */
function emitCall(expr: CallExpr, state: CodeGenState): Value | null {
	const callee = state.module.getFunction(expr.callee)
	if (callee === undefined) {
		state.context.emitAt('MCSEM002', expr, { name: expr.callee })
		return null
	}
	if (callee.params.length !== expr.args.length) {
		state.context.emitAt('MCSEM003', expr, {
			expected: callee.params.length,
			found: expr.args.length,
			name: expr.callee,
		})
		return null
	}

	const args: Value[] = []
	for (const [index, argExpr] of expr.args.entries()) {
		const value = emitValue(argExpr, state)
		if (value === null) return null
		const param = callee.params[index]
		args.push(param === undefined ? value : coerce(state.builder, value, param.type))
	}
	return state.builder.createCall(callee, args)
}

// ============================================================================
// Operators
// ============================================================================

function emitUnary(expr: UnaryExpr, state: CodeGenState): Value | null {
	const operand = emitValue(expr.operand, state)
	if (operand === null) return null
	const { builder } = state

	if (expr.operator === '!') {
		return operand.type === IRType.F64
			? builder.createFCmp('oeq', operand, constDouble(0))
			: builder.createICmp('eq', operand, operand.type === IRType.I1 ? constBool(false) : constInt(0))
	}

	if (operand.type === IRType.F64) {
		return builder.createFNeg(operand)
	}
	return builder.createBinary('sub', constInt(0), coerce(builder, operand, IRType.I32))
}

/**
 * Short-circuit `&&` / `||` through a stack slot.
 *
 *   store lhs, slot
 *   br lhs, rhs-block, end-block     (swapped for ||)
 * rhs-block:
 *   store rhs, slot
 *   br end-block
 * end-block:
 *   load slot
 */
function emitLogical(expr: BinaryExpr, state: CodeGenState): Value | null {
	const fn = requireFunction(state)
	const { builder } = state
	const prefix = expr.operator === '&&' ? 'and' : 'or'

	const lhs = emitValue(expr.left, state)
	if (lhs === null) return null
	const lhsCond = toCondition(builder, lhs)

	const slot = builder.createAlloca(IRType.I1, `${prefix}.result`)
	builder.createStore(lhsCond, slot)

	const rhsBlock = fn.createBlock(`${prefix}.rhs`)
	const endBlock = fn.createBlock(`${prefix}.end`)
	if (expr.operator === '&&') {
		builder.createCondBr(lhsCond, rhsBlock, endBlock)
	} else {
		builder.createCondBr(lhsCond, endBlock, rhsBlock)
	}

	builder.positionAtEnd(rhsBlock)
	const rhs = emitValue(expr.right, state)
	if (rhs === null) return null
	builder.createStore(toCondition(builder, rhs), slot)
	builder.createBr(endBlock)

	builder.positionAtEnd(endBlock)
	return builder.createLoad(slot)
}

function emitBinary(expr: BinaryExpr, state: CodeGenState): Value | null {
	const operator = expr.operator
	if (operator === '&&' || operator === '||') {
		return emitLogical(expr, state)
	}

	const left = emitValue(expr.left, state)
	if (left === null) return null
	const right = emitValue(expr.right, state)
	if (right === null) return null

	const { builder } = state
	const [lhs, rhs, type] = promote(builder, left, right)

	if (isComparison(operator)) {
		return type === IRType.F64
			? builder.createFCmp(FCMP_PREDICATES[operator], lhs, rhs)
			: builder.createICmp(ICMP_PREDICATES[operator], lhs, rhs)
	}

	if (type === IRType.I32) {
		return builder.createBinary(INT_OPCODES[operator], lhs, rhs)
	}
	if (operator === '%') {
		state.context.emitAt('MCSEM006', expr)
		return null
	}
	return builder.createBinary(FLOAT_OPCODES[operator], lhs, rhs)
}

// ============================================================================
// Entry points
// ============================================================================

function assertNever(expr: never): never {
	throw new EmissionError(`unhandled expression: ${JSON.stringify(expr)}`)
}

/**
 * Lower an expression whose value may be discarded. A void call is allowed
 * here and yields the call instruction itself.
 */
export function emitExpression(expr: Expression, state: CodeGenState): Value | null {
	switch (expr.kind) {
		case NodeKind.NumberLiteral:
			return expr.isFloat ? constDouble(expr.value) : constInt(expr.value)
		case NodeKind.BoolLiteral:
			return constBool(expr.value)
		case NodeKind.Identifier:
			return emitIdentifier(expr, state)
		case NodeKind.Binary:
			return emitBinary(expr, state)
		case NodeKind.Unary:
			return emitUnary(expr, state)
		case NodeKind.Call:
			return emitCall(expr, state)
		case NodeKind.Assign:
			return emitAssign(expr, state)
		default:
			return assertNever(expr)
	}
}

/** Lower an expression whose value is used. A void call is MCSEM010. */
export function emitValue(expr: Expression, state: CodeGenState): Value | null {
	const value = emitExpression(expr, state)
	if (value !== null && value.type === IRType.Void && expr.kind === NodeKind.Call) {
		state.context.emitAt('MCSEM010', expr, { name: expr.callee })
		return null
	}
	return value
}
