export { type ExternFunction, type InterpretOptions, interpret } from './interpreter.ts'
