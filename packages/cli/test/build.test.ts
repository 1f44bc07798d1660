import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { cliui } from '@poppinss/cliui'
import { createKernel } from '../src/kernel.ts'

interface RunResult {
	exitCode: number
	stdout: string[]
	stderr: string[]
}

async function runCli(argv: string[]): Promise<RunResult> {
	const kernel = createKernel()
	kernel.ui = cliui({ mode: 'raw' })
	await kernel.handle(argv)
	const logs = kernel.ui.logger.getLogs()
	return {
		exitCode: kernel.exitCode ?? 0,
		stderr: logs.filter((l) => l.stream === 'stderr').map((l) => l.message),
		stdout: logs.filter((l) => l.stream === 'stdout').map((l) => l.message),
	}
}

describe('build command', () => {
	let dir = ''

	function source(name: string, text: string): string {
		const path = join(dir, name)
		writeFileSync(path, text)
		return path
	}

	before(() => {
		dir = mkdtempSync(join(tmpdir(), 'minic-build-'))
	})

	after(() => {
		rmSync(dir, { force: true, recursive: true })
	})

	it('should print IR to stdout and exit 0', async () => {
		const input = source('ok.c', 'int main() { return 0; }')
		const result = await runCli(['build', input])

		assert.strictEqual(result.exitCode, 0)
		assert.deepStrictEqual(result.stdout, [
			[`; module '${input}'`, '', 'define i32 @main() {', 'entry:', '  ret i32 0', '}'].join('\n'),
		])
		assert.deepStrictEqual(result.stderr, [])
	})

	it('should exit 1 when the input file is missing', async () => {
		const input = join(dir, 'missing.c')
		const result = await runCli(['build', input])

		assert.strictEqual(result.exitCode, 1)
		assert.strictEqual(result.stdout.length, 0)
		assert.strictEqual(result.stderr.length, 1)
		assert.ok(result.stderr[0]?.includes(`[MCCLI001] file not found: ${input}`))
	})

	it('should exit 1 when compilation fails', async () => {
		const input = source('unknown.c', 'int main() { return f(); }')
		const result = await runCli(['build', input])

		assert.strictEqual(result.exitCode, 1)
		assert.strictEqual(result.stdout.length, 0)
		assert.ok(result.stderr[0]?.includes("error[MCSEM002]: unknown function 'f'"))
	})

	it('should exit 1 for an unknown target', async () => {
		const input = source('target.c', 'int main() { return 0; }')
		const result = await runCli(['build', input, '--target', 'asm'])

		assert.strictEqual(result.exitCode, 1)
		assert.ok(result.stderr[0]?.includes('[MCCLI004] unknown target "asm"'))
	})

	it('should keep warnings out of the artifact on stdout', async () => {
		const input = source('warn.c', 'int main() { return 1; return 2; }')
		const result = await runCli(['build', input])

		assert.strictEqual(result.exitCode, 0)
		assert.deepStrictEqual(result.stdout, [
			[`; module '${input}'`, '', 'define i32 @main() {', 'entry:', '  ret i32 1', '}'].join('\n'),
		])
		assert.strictEqual(result.stderr.length, 1)
		assert.ok(result.stderr[0]?.includes('warning[MCGEN050]: unreachable code'))
	})
})
