#!/usr/bin/env tsx
import { createProgram } from "./program.ts"

const controller = new AbortController()
process.once("SIGINT", () => controller.abort())
process.once("SIGTERM", () => controller.abort())

try {
	await createProgram({ signal: controller.signal }).parseAsync(process.argv)
} catch (err) {
	console.error(`classbell: ${err instanceof Error ? err.message : String(err)}`)
	process.exitCode = 1
}
