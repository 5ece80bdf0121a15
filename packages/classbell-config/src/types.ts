import type { Timetable } from "@classbell/core"

/**
 * A program to run and the arguments to pass it.
 */
export interface CommandSpec {
	readonly name: string
	readonly args: readonly string[]
}

export interface Config {
	readonly timetable: Timetable
	/** Event name → command name */
	readonly events: ReadonlyMap<string, string>
	/** Command name → command */
	readonly commands: ReadonlyMap<string, CommandSpec>
	/** Minutes before an event's time at which it counts as due */
	readonly notifyBefore: number
}
