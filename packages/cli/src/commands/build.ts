import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompileResult, compile, formatAst } from '@minic/compiler'
import {
	DEFAULT_TARGET,
	formatCompileError,
	formatInvalidTargetError,
	formatReadError,
	formatValidationError,
	formatWriteError,
	getOutputContent,
	isValidTarget,
	type OutputTarget,
	resolveOutputPath,
} from '../utils.ts'

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Compile a Minic source file to IR or WebAssembly'

	@args.string({ description: 'Input source file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output file (text targets print to stdout without it)' })
	declare output?: string

	@flags.string<string>({
		alias: 't',
		default: DEFAULT_TARGET,
		description: 'Output format: ir (textual IR), wat (wasm text) or wasm (binary)',
	})
	declare target: string

	@flags.boolean({ description: 'Print the AST before the output' })
	declare printAst: boolean

	@flags.boolean({ description: 'Run optimization passes' })
	declare optimize: boolean

	private fail(message: string): void {
		this.logger.error(message)
		this.exitCode = 1
	}

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.fail(formatReadError(this.input, error))
			return null
		}
	}

	private compileSource(source: string): CompileResult | null {
		let result: CompileResult
		try {
			result = compile(source, { filename: this.input, optimize: this.optimize })
		} catch (error: unknown) {
			this.fail(formatCompileError(error))
			return null
		}
		if (!result.valid) {
			this.fail(formatValidationError())
			return null
		}
		return result
	}

	private async writeOutputFile(outputPath: string, content: Uint8Array | string): Promise<boolean> {
		try {
			await mkdir(dirname(outputPath), { recursive: true })
			await writeFile(outputPath, content)
			return true
		} catch (error: unknown) {
			this.fail(formatWriteError(error))
			return false
		}
	}

	private async emitOutput(result: CompileResult, target: OutputTarget): Promise<void> {
		const content = getOutputContent(result, target)
		const outputPath = resolveOutputPath(this.input, this.output, target)
		if (outputPath === null) {
			this.logger.log(String(content).trimEnd())
			return
		}
		await this.writeOutputFile(outputPath, content)
	}

	override async run(): Promise<void> {
		const target = this.target
		if (!isValidTarget(target)) {
			this.fail(formatInvalidTargetError(target))
			return
		}

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source)
		if (result === null) return

		// stdout carries the artifact
		for (const warning of result.warnings) {
			this.logger.logError(this.logger.prepareWarning(warning.formattedMessage))
		}
		if (this.printAst) {
			this.logger.log(formatAst(result.program))
		}
		await this.emitOutput(result, target)
	}
}
