import type { CommandSpec, Config } from "./types.ts"

import { UnknownCommandError, UnknownEventError } from "./errors.ts"

/**
 * @throws {UnknownCommandError} If the config has no command by that name
 */
export function commandNamed(config: Config, name: string): CommandSpec {
	const command = config.commands.get(name)
	if (!command) {
		throw new UnknownCommandError(name)
	}
	return command
}

/**
 * The command an event runs.
 * @throws {UnknownEventError} If the event is not listed under `[events]`
 * @throws {UnknownCommandError} If the event maps to a missing command
 */
export function commandForEvent(config: Config, eventName: string): CommandSpec {
	const commandName = config.events.get(eventName)
	if (commandName === undefined) {
		throw new UnknownEventError(eventName)
	}
	return commandNamed(config, commandName)
}

/**
 * Renders a command as a single shell-like line, e.g. `xdg-open https://example.com`.
 */
export function formatCommand(command: CommandSpec): string {
	return [command.name, ...command.args].join(" ")
}
