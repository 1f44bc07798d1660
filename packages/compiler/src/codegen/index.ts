/**
 * Code generation: AST → IR module.
 */

import type { CompilationContext } from '../core/context.ts'
import { functionsOf, type Program } from '../core/nodes.ts'
import { IRModule } from '../ir/module.ts'
import { declareSignature, emitFunction } from './functions.ts'
import { type CodeGenState, createState } from './state.ts'

export { coerce, irTypeOf, promote, toCondition, valueTypeOf } from './convert.ts'
export { emitExpression, emitValue } from './expressions.ts'
export { declareSignature, emitFunction } from './functions.ts'
export { type Binding, Scope } from './scope.ts'
export { type CodeGenState, createState } from './state.ts'
export { emitStatement, emitStatements } from './statements.ts'

export interface GenerateResult {
	succeeded: boolean
	module?: IRModule
}

function declareAll(program: Program, state: CodeGenState): boolean {
	for (const decl of program.declarations) {
		if (declareSignature(decl, state) === null) return false
	}
	return true
}

/**
 * Generate the IR module for a program.
 *
 * Every signature is declared first, in source order, so calls may refer to
 * functions defined later and functions may recurse. Bodies are then emitted
 * in order, stopping at the first one that fails.
 */
export function generate(context: CompilationContext, program: Program): GenerateResult {
	const module = new IRModule(context.filename)
	const state = createState(context, module)

	if (!declareAll(program, state)) {
		return { succeeded: false }
	}

	for (const decl of functionsOf(program)) {
		if (emitFunction(decl, state) === null) {
			return { succeeded: false }
		}
	}

	if (context.hasErrors()) {
		return { succeeded: false }
	}
	return { module, succeeded: true }
}
