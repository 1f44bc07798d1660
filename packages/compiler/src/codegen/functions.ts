/**
 * Function-level emission: signatures, bodies and the module rollback that
 * keeps the symbol table consistent when a body fails.
 *
 * This is Layer 4 (Functions) - imports from statements.ts (Layer 3).
 */

import { type Declaration, type FunctionDecl, NodeKind } from '../core/nodes.ts'
import { EmissionError } from '../ir/errors.ts'
import type { BasicBlock, IRFunction, ParamSpec } from '../ir/module.ts'
import { IRType, zeroOf } from '../ir/types.ts'
import { verifyFunction } from '../ir/verifier.ts'
import { irTypeOf, valueTypeOf } from './convert.ts'
import type { CodeGenState } from './state.ts'
import { emitStatement } from './statements.ts'

function paramSpecs(decl: Declaration): ParamSpec[] {
	return decl.params.map((param) => ({ name: param.name, type: valueTypeOf(param.type) }))
}

/**
 * Add a function or extern signature to the module.
 * Declaring a name twice is MCSEM009.
 */
export function declareSignature(decl: Declaration, state: CodeGenState): IRFunction | null {
	if (state.module.hasFunction(decl.name)) {
		state.context.emitAt('MCSEM009', decl, { name: decl.name })
		return null
	}
	const isExtern = decl.kind === NodeKind.Extern
	return state.module.declareFunction(decl.name, irTypeOf(decl.returnType), paramSpecs(decl), isExtern)
}

/** Emit the body into `fn`: parameter slots, statements, and a default return on fall-through. */
function emitBody(decl: FunctionDecl, fn: IRFunction, state: CodeGenState): boolean {
	const { builder, scope } = state
	builder.positionAtEnd(fn.createBlock('entry'))

	scope.push()
	try {
		for (const [index, param] of decl.params.entries()) {
			const arg = fn.params[index]
			if (arg === undefined) {
				throw new EmissionError(`'${fn.name}' has no argument ${index}`)
			}
			if (scope.isDeclaredInFrame(param.name)) {
				state.context.emitAt('MCSEM005', param, { name: param.name })
				return false
			}
			const slot = builder.createAlloca(arg.type, `${param.name}.addr`)
			builder.createStore(arg, slot)
			scope.declare(param.name, { slot, type: arg.type })
		}

		if (!emitStatement(decl.body, state)) return false

		if (!builder.isTerminated()) {
			builder.createRet(fn.returnType === IRType.Void ? null : zeroOf(fn.returnType))
		}
		return true
	} finally {
		scope.pop()
	}
}

function verifies(decl: FunctionDecl, fn: IRFunction, state: CodeGenState): boolean {
	const result = verifyFunction(fn)
	if (!result.valid) {
		state.context.emitAt('MCGEN001', decl, { detail: result.errors.join('; '), name: fn.name })
	}
	return result.valid
}

/**
 * Emit one function definition.
 *
 * Returns null after reporting a diagnostic. On failure the module is put
 * back as it was: a function this call declared is removed, and one that was
 * already declared goes back to a bodiless declaration. The builder position,
 * current function and scope depth are restored either way.
 */
export function emitFunction(decl: FunctionDecl, state: CodeGenState): IRFunction | null {
	const { builder, context, module, scope } = state

	const existing = module.getFunction(decl.name)
	if (existing !== undefined && (existing.isExtern || !existing.isDeclaration)) {
		context.emitAt('MCSEM009', decl, { name: decl.name })
		return null
	}
	if (existing !== undefined && existing.params.length !== decl.params.length) {
		context.emitAt('MCSEM009', decl, { name: decl.name })
		return null
	}
	const declaredHere = existing === undefined
	const fn = existing ?? module.declareFunction(decl.name, irTypeOf(decl.returnType), paramSpecs(decl))

	const savedFunction = state.currentFunction
	const savedBlock: BasicBlock | null = builder.insertBlock
	const savedDepth = scope.depth
	state.currentFunction = fn

	let succeeded = false
	try {
		succeeded = emitBody(decl, fn, state) && verifies(decl, fn, state)
	} catch (error) {
		if (!(error instanceof EmissionError)) throw error
		context.emitAt('MCGEN001', decl, { detail: error.message, name: decl.name })
	} finally {
		state.currentFunction = savedFunction
		scope.unwindTo(savedDepth)
		if (savedBlock === null) {
			builder.clearInsertionPoint()
		} else {
			builder.positionAtEnd(savedBlock)
		}
	}

	if (succeeded) return fn

	if (declaredHere) {
		module.removeFunction(fn.name)
	} else {
		fn.clearBody()
	}
	return null
}
