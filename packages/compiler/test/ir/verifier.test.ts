import assert from 'node:assert'
import { describe, it } from 'node:test'
import { IRBuilder } from '../../src/ir/builder.ts'
import { type IRFunction, IRModule } from '../../src/ir/module.ts'
import { constDouble, constInt, IRType, type RetInst } from '../../src/ir/types.ts'
import { verifyFunction } from '../../src/ir/verifier.ts'

function start(returnType: IRType = IRType.I32): { builder: IRBuilder; fn: IRFunction } {
	const fn = new IRModule('m').declareFunction('f', returnType, [])
	const builder = new IRBuilder()
	builder.positionAtEnd(fn.createBlock('entry'))
	return { builder, fn }
}

describe('ir/verifier', () => {
	it('should accept a well-formed function', () => {
		const { builder, fn } = start()
		const next = fn.createBlock('next')
		builder.createBr(next)
		builder.positionAtEnd(next)
		builder.createRet(constInt(0))
		assert.deepStrictEqual(verifyFunction(fn), { errors: [], valid: true })
	})

	it('should reject a declaration', () => {
		const fn = new IRModule('m').declareFunction('f', IRType.I32, [])
		assert.deepStrictEqual(verifyFunction(fn), { errors: ['f: function has no body'], valid: false })
	})

	it('should reject a block without a terminator', () => {
		const { fn } = start()
		assert.deepStrictEqual(verifyFunction(fn).errors, ['f/entry: block does not end in a terminator'])
	})

	it('should reject instructions after a terminator', () => {
		const { builder, fn } = start()
		builder.createRet(constInt(0))
		const extra: RetInst = { op: 'ret', value: constInt(1) }
		fn.entry?.instructions.push(extra)
		assert.deepStrictEqual(verifyFunction(fn).errors, [
			"f/entry: terminator 'ret' is followed by more instructions",
		])
	})

	it('should reject an attached block with no predecessor', () => {
		const { builder, fn } = start()
		builder.createRet(constInt(0))
		builder.positionAtEnd(fn.createBlock('orphan'))
		builder.createRet(constInt(1))
		assert.deepStrictEqual(verifyFunction(fn).errors, ['f/orphan: block has no predecessor'])
	})

	it('should reject a branch to a block that was never attached', () => {
		const { builder, fn } = start()
		builder.createBr(fn.createBlock('nowhere'))
		assert.deepStrictEqual(verifyFunction(fn).errors, ["f/entry: branch to detached block 'nowhere'"])
	})

	it('should check the return type', () => {
		const { builder, fn } = start()
		builder.createRet(constDouble(1))
		assert.deepStrictEqual(verifyFunction(fn).errors, ['f/entry: return value has type f64, expected i32'])
	})

	it('should reject ret void outside a void function', () => {
		const { builder, fn } = start()
		builder.createRet(null)
		assert.deepStrictEqual(verifyFunction(fn).errors, ['f/entry: ret void in function returning i32'])
	})

	it('should check branch conditions are i1', () => {
		const { builder, fn } = start(IRType.Void)
		const a = fn.createBlock('a')
		builder.createCondBr(constInt(1), a, a)
		builder.positionAtEnd(a)
		builder.createRet(null)
		assert.deepStrictEqual(verifyFunction(fn).errors, ['f/entry: branch condition has type i32, expected i1'])
	})

	it('should check call arguments against the callee', () => {
		const module = new IRModule('m')
		const callee = module.declareFunction('g', IRType.Void, [{ name: 'x', type: IRType.F64 }], true)
		const fn = module.declareFunction('f', IRType.Void, [])
		const builder = new IRBuilder()
		builder.positionAtEnd(fn.createBlock('entry'))
		builder.createCall(callee, [constInt(1)])
		builder.createRet(null)
		assert.deepStrictEqual(verifyFunction(fn).errors, ["f/entry: argument 0 of '@g' has type i32, expected f64"])
	})
})
