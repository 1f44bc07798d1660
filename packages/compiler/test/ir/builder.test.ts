import assert from 'node:assert'
import { describe, it } from 'node:test'
import { IRBuilder } from '../../src/ir/builder.ts'
import { EmissionError } from '../../src/ir/errors.ts'
import { IRModule } from '../../src/ir/module.ts'
import { constDouble, constInt, IRType } from '../../src/ir/types.ts'

function setup(): { builder: IRBuilder; module: IRModule } {
	return { builder: new IRBuilder(), module: new IRModule('test') }
}

describe('ir/builder', () => {
	describe('insertion point', () => {
		it('should start without a block', () => {
			const builder = new IRBuilder()
			assert.strictEqual(builder.insertBlock, null)
			assert.strictEqual(builder.currentFunction, null)
			assert.strictEqual(builder.isTerminated(), true)
		})

		it('should attach a block the first time it is positioned on', () => {
			const { builder, module } = setup()
			const fn = module.declareFunction('f', IRType.Void, [])
			const entry = fn.createBlock('entry')
			assert.strictEqual(entry.isAttached, false)
			assert.strictEqual(fn.isDeclaration, true)

			builder.positionAtEnd(entry)
			assert.strictEqual(entry.isAttached, true)
			assert.strictEqual(fn.entry, entry)
			assert.strictEqual(builder.currentFunction, fn)
			assert.strictEqual(builder.isTerminated(), false)
		})

		it('should make labels unique within a function', () => {
			const { builder, module } = setup()
			const fn = module.declareFunction('f', IRType.Void, [])
			const first = fn.createBlock('if.then')
			const second = fn.createBlock('if.then')
			const third = fn.createBlock('if.then')
			builder.positionAtEnd(first)
			builder.positionAtEnd(second)
			builder.positionAtEnd(third)
			assert.deepStrictEqual(
				fn.blocks.map((b) => b.name),
				['if.then', 'if.then.1', 'if.then.2']
			)
		})

		it('should clear the insertion point', () => {
			const { builder, module } = setup()
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			builder.clearInsertionPoint()
			assert.strictEqual(builder.insertBlock, null)
		})
	})

	describe('terminators', () => {
		it('should refuse to append after a terminator', () => {
			const { builder, module } = setup()
			const fn = module.declareFunction('f', IRType.I32, [])
			builder.positionAtEnd(fn.createBlock('entry'))
			builder.createRet(constInt(0))

			assert.strictEqual(builder.isTerminated(), true)
			assert.throws(
				() => builder.createRet(constInt(1)),
				(error: unknown) =>
					error instanceof EmissionError &&
					error.message === "cannot append 'ret' to block 'entry': it already ends in 'ret'"
			)
			assert.strictEqual(fn.entry?.instructions.length, 1)
		})

		it('should refuse to append without a block', () => {
			assert.throws(() => new IRBuilder().createRet(null), EmissionError)
		})

		it('should record each predecessor once', () => {
			const { builder, module } = setup()
			const fn = module.declareFunction('f', IRType.Void, [])
			const entry = fn.createBlock('entry')
			const target = fn.createBlock('next')
			builder.positionAtEnd(entry)
			builder.createCondBr(constInt(1), target, target)

			assert.deepStrictEqual(target.predecessors, [entry])
			assert.deepStrictEqual(entry.successors(), [target, target])
		})

		it('should reject a branch into another function', () => {
			const { builder, module } = setup()
			const f = module.declareFunction('f', IRType.Void, [])
			const g = module.declareFunction('g', IRType.Void, [])
			builder.positionAtEnd(f.createBlock('entry'))
			assert.throws(() => builder.createBr(g.createBlock('entry')), EmissionError)
		})
	})

	describe('memory', () => {
		it('should place stack slots at the front of the entry block', () => {
			const { builder, module } = setup()
			const fn = module.declareFunction('f', IRType.Void, [])
			const entry = fn.createBlock('entry')
			const body = fn.createBlock('body')
			builder.positionAtEnd(entry)
			const x = builder.createAlloca(IRType.I32, 'x')
			builder.createStore(constInt(1), x)
			builder.createBr(body)
			builder.positionAtEnd(body)
			const y = builder.createAlloca(IRType.F64, 'x')

			assert.deepStrictEqual(
				entry.instructions.map((inst) => inst.op),
				['alloca', 'alloca', 'store', 'br']
			)
			assert.strictEqual(y.name, 'x.1')
			assert.deepStrictEqual(body.instructions, [])
		})

		it('should reject a store of the wrong type', () => {
			const { builder, module } = setup()
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			const slot = builder.createAlloca(IRType.I32, 'x')
			assert.throws(() => builder.createStore(constDouble(1), slot), EmissionError)
		})

		it('should type a load by its slot', () => {
			const { builder, module } = setup()
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			const slot = builder.createAlloca(IRType.F64, 'd')
			assert.strictEqual(builder.createLoad(slot).type, IRType.F64)
		})
	})

	describe('values', () => {
		it('should reject binary operands of different types', () => {
			const { builder, module } = setup()
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			assert.throws(() => builder.createBinary('add', constInt(1), constDouble(1)), EmissionError)
		})

		it('should give a call the return type of its callee', () => {
			const { builder, module } = setup()
			const callee = module.declareFunction('g', IRType.F64, [{ name: 'x', type: IRType.I32 }], true)
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			assert.strictEqual(builder.createCall(callee, [constInt(2)]).type, IRType.F64)
		})

		it('should reject using a void call as an operand', () => {
			const { builder, module } = setup()
			const callee = module.declareFunction('g', IRType.Void, [], true)
			builder.positionAtEnd(module.declareFunction('f', IRType.Void, []).createBlock('entry'))
			const call = builder.createCall(callee, [])
			assert.throws(() => builder.createBinary('add', call, constInt(1)), EmissionError)
		})
	})
})

describe('ir/module', () => {
	it('should reject a duplicate function', () => {
		const module = new IRModule('m')
		module.declareFunction('f', IRType.Void, [])
		assert.throws(() => module.declareFunction('f', IRType.I32, []), EmissionError)
	})

	it('should keep functions in declaration order', () => {
		const module = new IRModule('m')
		module.declareFunction('b', IRType.Void, [])
		module.declareFunction('a', IRType.Void, [])
		assert.deepStrictEqual(
			module.functions.map((f) => f.name),
			['b', 'a']
		)
		assert.strictEqual(module.removeFunction('b'), true)
		assert.strictEqual(module.hasFunction('b'), false)
	})

	it('should give parameters unique names', () => {
		const fn = new IRModule('m').declareFunction('f', IRType.Void, [
			{ name: 'a', type: IRType.I32 },
			{ name: 'a', type: IRType.F64 },
		])
		assert.deepStrictEqual(
			fn.params.map((p) => [p.name, p.index, p.type]),
			[
				['a', 0, IRType.I32],
				['a.1', 1, IRType.F64],
			]
		)
	})

	it('should refuse a body for an extern', () => {
		const fn = new IRModule('m').declareFunction('ext', IRType.Void, [], true)
		assert.strictEqual(fn.isDeclaration, true)
		assert.throws(() => fn.createBlock('entry'), EmissionError)
	})

	it('should turn a function back into a declaration', () => {
		const module = new IRModule('m')
		const fn = module.declareFunction('f', IRType.Void, [{ name: 'n', type: IRType.I32 }])
		const builder = new IRBuilder()
		builder.positionAtEnd(fn.createBlock('entry'))
		builder.createAlloca(IRType.I32, 'n.addr')
		builder.createRet(null)

		fn.clearBody()
		assert.strictEqual(fn.isDeclaration, true)
		assert.strictEqual(fn.uniqueValueName('n.addr'), 'n.addr')
		assert.strictEqual(fn.uniqueValueName('n'), 'n.1')
	})
})
