import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileError, compile, ErrorKind } from '@minic/compiler'
import {
	formatCompileError,
	formatInvalidTargetError,
	formatReadError,
	formatValidationError,
	formatWriteError,
	getErrorMessage,
	getOutputContent,
	isNodeError,
	isTextTarget,
	isValidTarget,
	resolveOutputPath,
} from '../src/utils.ts'

function nodeError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should report ENOENT as a missing file', () => {
		const result = formatReadError('/path/to/main.c', nodeError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[MCCLI001] file not found: /path/to/main.c')
	})

	it('should report other errors with their reason', () => {
		const result = formatReadError('/path/to/main.c', nodeError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[MCCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		const result = formatReadError('/path/to/main.c', new Error('unknown error'))
		assert.strictEqual(result, '[MCCLI002] cannot read file: unknown error')
	})
})

describe('formatWriteError', () => {
	it('should include the reason', () => {
		assert.strictEqual(formatWriteError(new Error('disk full')), '[MCCLI003] cannot write file: disk full')
	})
})

describe('formatInvalidTargetError', () => {
	it('should name the target', () => {
		assert.strictEqual(formatInvalidTargetError('exe'), '[MCCLI004] unknown target "exe"')
	})
})

describe('formatValidationError', () => {
	it('should use the catalog message', () => {
		assert.strictEqual(formatValidationError(), '[MCCLI005] generated wasm is invalid')
	})
})

describe('formatCompileError', () => {
	it('should return CompileError message directly', () => {
		const error = new CompileError('unknown variable', ErrorKind.Semantic)
		assert.strictEqual(formatCompileError(error), 'unknown variable')
	})

	it('should pass through the formatted diagnostic of a real failure', () => {
		let caught: unknown
		try {
			compile('int main() { return y; }', { filename: 'main.c' })
		} catch (error) {
			caught = error
		}
		assert.ok(caught instanceof CompileError)
		const message = formatCompileError(caught)
		assert.strictEqual(message, caught.message)
		assert.ok(message.startsWith("error[MCSEM001]: unknown variable 'y'"))
	})

	it('should wrap other errors', () => {
		const result = formatCompileError(new Error('something went wrong'))
		assert.strictEqual(result, '[MCCLI006] compilation failed: something went wrong')
	})

	it('should handle non-Error values', () => {
		assert.strictEqual(formatCompileError('string error'), '[MCCLI006] compilation failed: string error')
	})
})

describe('isValidTarget', () => {
	it('should accept ir, wat and wasm', () => {
		assert.strictEqual(isValidTarget('ir'), true)
		assert.strictEqual(isValidTarget('wat'), true)
		assert.strictEqual(isValidTarget('wasm'), true)
	})

	it('should return false for other strings', () => {
		assert.strictEqual(isValidTarget('txt'), false)
		assert.strictEqual(isValidTarget('asm'), false)
		assert.strictEqual(isValidTarget(''), false)
		assert.strictEqual(isValidTarget('WASM'), false)
	})
})

describe('isTextTarget', () => {
	it('should treat only wasm as binary', () => {
		assert.strictEqual(isTextTarget('ir'), true)
		assert.strictEqual(isTextTarget('wat'), true)
		assert.strictEqual(isTextTarget('wasm'), false)
	})
})

describe('resolveOutputPath', () => {
	it('should print text targets to stdout without an output flag', () => {
		assert.strictEqual(resolveOutputPath('main.c', undefined, 'ir'), null)
		assert.strictEqual(resolveOutputPath('main.c', undefined, 'wat'), null)
	})

	it('should derive the wasm file name from the input basename', () => {
		assert.strictEqual(resolveOutputPath('main.c', undefined, 'wasm'), 'main.wasm')
		assert.strictEqual(resolveOutputPath('src/lib/prog.mc', undefined, 'wasm'), 'prog.wasm')
	})

	it('should use the explicit output path for every target', () => {
		assert.strictEqual(resolveOutputPath('main.c', 'out/main.ll', 'ir'), 'out/main.ll')
		assert.strictEqual(resolveOutputPath('main.c', 'build/app.wasm', 'wasm'), 'build/app.wasm')
	})
})

describe('getOutputContent', () => {
	const result = compile('int main() { return 0; }', { filename: 'main.c' })

	it('should return the IR text for ir target', () => {
		assert.strictEqual(getOutputContent(result, 'ir'), result.ir)
	})

	it('should return wasm text for wat target', () => {
		assert.strictEqual(getOutputContent(result, 'wat'), result.text)
	})

	it('should return binary for wasm target', () => {
		assert.strictEqual(getOutputContent(result, 'wasm'), result.binary)
	})
})
