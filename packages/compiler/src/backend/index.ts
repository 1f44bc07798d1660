export { type AssembleResult, assemble, type EmitOptions, IMPORT_MODULE } from './wasm.ts'
