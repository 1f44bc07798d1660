/**
 * Basic-block intermediate representation.
 */

export { IRBuilder, typeOfValue } from './builder.ts'
export { EmissionError } from './errors.ts'
export { BasicBlock, IRFunction, IRModule, type ParamSpec } from './module.ts'
export { printFunction, printModule } from './printer.ts'
export * from './types.ts'
export { type VerifyResult, verifyFunction } from './verifier.ts'
