/**
 * Code generation state.
 * One per compilation; every emit function receives it explicitly.
 */

import type { CompilationContext } from '../core/context.ts'
import { IRBuilder } from '../ir/builder.ts'
import type { IRFunction, IRModule } from '../ir/module.ts'
import { Scope } from './scope.ts'

export interface CodeGenState {
	readonly context: CompilationContext
	readonly module: IRModule
	readonly builder: IRBuilder
	readonly scope: Scope
	/** Function whose body is being emitted, null at top level. */
	currentFunction: IRFunction | null
}

export function createState(context: CompilationContext, module: IRModule): CodeGenState {
	return {
		builder: new IRBuilder(),
		context,
		currentFunction: null,
		module,
		scope: new Scope(),
	}
}
