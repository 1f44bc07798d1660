#!/usr/bin/env -S node --import tsx

import { createKernel } from './kernel.ts'

async function main(): Promise<void> {
	const kernel = createKernel()
	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
