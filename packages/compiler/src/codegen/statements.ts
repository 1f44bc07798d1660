/**
 * Statement lowering and control flow.
 *
 * Each function returns false after reporting a diagnostic. The builder's
 * cursor is moved explicitly: branches are only emitted from blocks that do
 * not have a terminator yet, and a merge block is only entered when something
 * branches to it.
 *
 * This is Layer 3 (Statements) - imports from expressions.ts (Layer 2).
 */

import {
	type BlockStmt,
	type IfStmt,
	NodeKind,
	type ReturnStmt,
	type Statement,
	type VarDecl,
	type WhileStmt,
} from '../core/nodes.ts'
import { EmissionError } from '../ir/errors.ts'
import type { IRFunction } from '../ir/module.ts'
import { IRType, type Value, zeroOf } from '../ir/types.ts'
import { coerce, toCondition, valueTypeOf } from './convert.ts'
import { emitExpression, emitValue } from './expressions.ts'
import type { CodeGenState } from './state.ts'

function requireFunction(state: CodeGenState): IRFunction {
	const fn = state.currentFunction
	if (fn === null) {
		throw new EmissionError('statement lowered outside a function')
	}
	return fn
}

/** Lower a statement in a frame of its own. */
function emitScoped(stmt: Statement, state: CodeGenState): boolean {
	state.scope.push()
	try {
		return emitStatement(stmt, state)
	} finally {
		state.scope.pop()
	}
}

/**
 * Lower statements in order until the current block is terminated.
 * The first statement past that point is reported as unreachable and it and
 * everything after it is skipped.
 */
export function emitStatements(statements: readonly Statement[], state: CodeGenState): boolean {
	for (const stmt of statements) {
		if (state.builder.isTerminated()) {
			state.context.emitAt('MCGEN050', stmt)
			return true
		}
		if (!emitStatement(stmt, state)) return false
	}
	return true
}

function emitBlock(block: BlockStmt, state: CodeGenState): boolean {
	state.scope.push()
	try {
		return emitStatements(block.statements, state)
	} finally {
		state.scope.pop()
	}
}

/** The initializer is lowered before the name is bound, so `int x = x;` reads an outer `x`. */
function emitVarDecl(decl: VarDecl, state: CodeGenState): boolean {
	const { builder, scope } = state
	const type = valueTypeOf(decl.type)

	let initial: Value = zeroOf(type)
	if (decl.initializer !== null) {
		const value = emitValue(decl.initializer, state)
		if (value === null) return false
		initial = coerce(builder, value, type)
	}

	if (scope.isDeclaredInFrame(decl.name)) {
		state.context.emitAt('MCSEM005', decl, { name: decl.name })
		return false
	}
	const slot = builder.createAlloca(type, decl.name)
	scope.declare(decl.name, { slot, type })
	builder.createStore(initial, slot)
	return true
}

function emitReturn(stmt: ReturnStmt, state: CodeGenState): boolean {
	const fn = requireFunction(state)
	const { builder } = state

	if (fn.returnType === IRType.Void) {
		if (stmt.value !== null) {
			state.context.emitAt('MCSEM008', stmt, { name: fn.name })
			return false
		}
		builder.createRet(null)
		return true
	}

	if (stmt.value === null) {
		builder.createRet(zeroOf(fn.returnType))
		return true
	}
	const value = emitValue(stmt.value, state)
	if (value === null) return false
	builder.createRet(coerce(builder, value, fn.returnType))
	return true
}

function emitIf(stmt: IfStmt, state: CodeGenState): boolean {
	const fn = requireFunction(state)
	const { builder } = state

	const condition = emitValue(stmt.condition, state)
	if (condition === null) return false
	const cond = toCondition(builder, condition)

	const thenBlock = fn.createBlock('if.then')
	const elseBlock = stmt.elseBranch === null ? null : fn.createBlock('if.else')
	const endBlock = fn.createBlock('if.end')
	builder.createCondBr(cond, thenBlock, elseBlock ?? endBlock)

	builder.positionAtEnd(thenBlock)
	if (!emitScoped(stmt.thenBranch, state)) return false
	if (!builder.isTerminated()) builder.createBr(endBlock)

	if (elseBlock !== null && stmt.elseBranch !== null) {
		builder.positionAtEnd(elseBlock)
		if (!emitScoped(stmt.elseBranch, state)) return false
		if (!builder.isTerminated()) builder.createBr(endBlock)
	}

	// When every path has returned, nothing reaches if.end and it is never attached.
	if (endBlock.predecessors.length > 0) {
		builder.positionAtEnd(endBlock)
	}
	return true
}

function emitWhile(stmt: WhileStmt, state: CodeGenState): boolean {
	const fn = requireFunction(state)
	const { builder } = state

	const condBlock = fn.createBlock('while.cond')
	const bodyBlock = fn.createBlock('while.body')
	const endBlock = fn.createBlock('while.end')
	builder.createBr(condBlock)

	builder.positionAtEnd(condBlock)
	const condition = emitValue(stmt.condition, state)
	if (condition === null) return false
	builder.createCondBr(toCondition(builder, condition), bodyBlock, endBlock)

	builder.positionAtEnd(bodyBlock)
	if (!emitScoped(stmt.body, state)) return false
	if (!builder.isTerminated()) builder.createBr(condBlock)

	builder.positionAtEnd(endBlock)
	return true
}

function assertNever(stmt: never): never {
	throw new EmissionError(`unhandled statement: ${JSON.stringify(stmt)}`)
}

export function emitStatement(stmt: Statement, state: CodeGenState): boolean {
	switch (stmt.kind) {
		case NodeKind.VarDecl:
			return emitVarDecl(stmt, state)
		case NodeKind.ExprStmt:
			return emitExpression(stmt.expression, state) !== null
		case NodeKind.Return:
			return emitReturn(stmt, state)
		case NodeKind.If:
			return emitIf(stmt, state)
		case NodeKind.While:
			return emitWhile(stmt, state)
		case NodeKind.Block:
			return emitBlock(stmt, state)
		default:
			return assertNever(stmt)
	}
}
