import type { CommandSpec } from "@classbell/config"

import { spawn, type SpawnOptions } from "node:child_process"

export interface Launcher {
	/** Starts the command and resolves once it is running. Does not wait for it to exit. */
	launch(command: CommandSpec): Promise<void>
}

/** Subset of ChildProcess used by ProcessLauncher. */
export interface SpawnedProcess {
	once(event: "spawn", listener: () => void): unknown
	once(event: "error", listener: (err: Error) => void): unknown
	unref(): void
}

export type SpawnFunction = (
	command: string,
	args: readonly string[],
	options: SpawnOptions,
) => SpawnedProcess

export interface ProcessLauncherOptions {
	/** Optional spawn implementation for testing. */
	spawn?: SpawnFunction
}

export class LaunchError extends Error {
	readonly command: CommandSpec

	constructor(command: CommandSpec, cause: Error) {
		super(`Failed to launch ${command.name}: ${cause.message}`, { cause })
		this.name = "LaunchError"
		this.command = command
	}
}

/**
 * Runs commands as detached child processes that outlive classbell.
 */
export class ProcessLauncher implements Launcher {
	private readonly spawnProcess: SpawnFunction

	constructor(options: ProcessLauncherOptions = {}) {
		this.spawnProcess = options.spawn ?? spawn
	}

	launch(command: CommandSpec): Promise<void> {
		return new Promise((resolve, reject) => {
			const child = this.spawnProcess(command.name, command.args, {
				detached: true,
				stdio: "ignore",
			})
			child.once("error", (err) => {
				reject(new LaunchError(command, err))
			})
			child.once("spawn", () => {
				child.unref()
				resolve()
			})
		})
	}
}
