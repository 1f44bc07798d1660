import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import BuildCommand from './commands/build.ts'

export const VERSION = '0.1.0'

export type MinicKernel = ReturnType<typeof Kernel.create>

/**
 * Create the command kernel with the build and help commands registered.
 */
export function createKernel(): MinicKernel {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'minic')
	kernel.info.set('version', VERSION)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.on('version', async () => {
		console.log(`Minic v${VERSION}`)
		return true
	})

	kernel.addLoader(new ListLoader([BuildCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`Minic v${VERSION}`)
		console.log('')
		console.log('Usage: minic [command] [options]')
		console.log('')
		console.log('Run "minic --help" for available commands and options.')
		return true
	})

	return kernel
}
