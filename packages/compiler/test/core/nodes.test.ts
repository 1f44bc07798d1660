import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	type BlockStmt,
	type FunctionDecl,
	functionsOf,
	NodeKind,
	type Program,
} from '../../src/core/nodes.ts'

const at = { column: 1, line: 1 }

const body: BlockStmt = { kind: NodeKind.Block, statements: [], ...at }

function fn(name: string): FunctionDecl {
	return { body, kind: NodeKind.Function, name, params: [], returnType: 'int', ...at }
}

describe('core/nodes', () => {
	describe('NodeKind', () => {
		it('should have unique values', () => {
			const values = Object.values(NodeKind)
			assert.strictEqual(new Set(values).size, values.length)
		})
	})

	describe('functionsOf', () => {
		it('should keep function definitions in source order', () => {
			const program: Program = {
				declarations: [
					fn('a'),
					{ kind: NodeKind.Extern, name: 'putd', params: [], returnType: 'void', ...at },
					fn('b'),
				],
				kind: NodeKind.Program,
			}
			assert.deepStrictEqual(
				functionsOf(program).map((d) => d.name),
				['a', 'b']
			)
		})
	})
})
