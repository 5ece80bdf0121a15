import type { TimetableEvent } from "@classbell/core"

import { Weekday, parseTimeOfDay } from "@classbell/core"
import { type } from "arktype"
import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import { join } from "node:path"
import { parse } from "smol-toml"

import type { CommandSpec, Config } from "./types.ts"

import { ConfigError } from "./errors.ts"

const CONFIG_FILE_NAME = "classbell.toml"

type DayKey = "mon" | "tue" | "wed" | "thu" | "fri" | "sat" | "sun"

const DAY_KEYS: Record<DayKey, Weekday> = {
	mon: Weekday.Monday,
	tue: Weekday.Tuesday,
	wed: Weekday.Wednesday,
	thu: Weekday.Thursday,
	fri: Weekday.Friday,
	sat: Weekday.Saturday,
	sun: Weekday.Sunday,
}

const DAY_KEY_ORDER: readonly DayKey[] = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"]

const dayEntries = type({
	time: "string",
	event: "string",
}).array()

const commandEntry = type({
	name: "string",
	"args?": "string[]",
})

/** Shape of the TOML file before times are parsed and references checked. */
export const ConfigFile = type({
	// minutes, at most one week
	notify_before: "0 <= number.integer <= 10080",
	timetable: {
		"+": "reject",
		"mon?": dayEntries,
		"tue?": dayEntries,
		"wed?": dayEntries,
		"thu?": dayEntries,
		"fri?": dayEntries,
		"sat?": dayEntries,
		"sun?": dayEntries,
	},
	events: { "[string]": "string" },
	command: { "[string]": commandEntry },
})

export type ConfigFile = typeof ConfigFile.infer

/**
 * `$XDG_CONFIG_HOME/classbell.toml`, or `~/.config/classbell.toml` when the
 * variable is unset.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	const base = env.XDG_CONFIG_HOME || join(homedir(), ".config")
	return join(base, CONFIG_FILE_NAME)
}

/**
 * Reads and parses a config file.
 * @throws {ConfigError} If the file cannot be read or is not a valid config
 */
export async function loadConfig(path: string): Promise<Config> {
	let text: string
	try {
		text = await readFile(path, "utf-8")
	} catch (err) {
		throw new ConfigError(`unable to read config: ${errorMessage(err)}`, path, { cause: err })
	}
	return parseConfig(text, path)
}

/**
 * Parses TOML config text.
 *
 * @example
 * ```ts
 * const config = parseConfig(`
 * notify_before = 5
 *
 * [timetable]
 * mon = [{ time = "09:00", event = "math" }]
 *
 * [events]
 * math = "browser"
 *
 * [command.browser]
 * name = "xdg-open"
 * args = ["https://example.com/math"]
 * `)
 * ```
 *
 * @param path - Only used in error messages
 * @throws {ConfigError} If the text is not TOML, does not match the schema,
 *   has a malformed time, or references a missing event or command
 */
export function parseConfig(text: string, path: string | null = null): Config {
	let raw: unknown
	try {
		raw = parse(text)
	} catch (err) {
		throw new ConfigError(`invalid TOML: ${errorMessage(err)}`, path, { cause: err })
	}

	const file = ConfigFile(raw)
	if (file instanceof type.errors) {
		throw new ConfigError(file.summary, path)
	}

	const events = new Map(Object.entries(file.events))
	const commands = new Map<string, CommandSpec>(
		Object.entries(file.command).map(([name, command]) => [
			name,
			{ name: command.name, args: command.args ?? [] },
		]),
	)

	for (const [eventName, commandName] of events) {
		if (!commands.has(commandName)) {
			throw new ConfigError(`events.${eventName}: no command "${commandName}" in [command]`, path)
		}
	}

	const timetable: Partial<Record<Weekday, TimetableEvent[]>> = {}
	for (const key of DAY_KEY_ORDER) {
		const entries = file.timetable[key]
		if (!entries || entries.length === 0) continue

		timetable[DAY_KEYS[key]] = entries.map((entry, index) => {
			const location = `timetable.${key}[${index}]`
			if (!events.has(entry.event)) {
				throw new ConfigError(`${location}.event: no entry "${entry.event}" in [events]`, path)
			}
			return { time: parseTime(entry.time, `${location}.time`, path), name: entry.event }
		})
	}

	return {
		timetable,
		events,
		commands,
		notifyBefore: file.notify_before,
	}
}

function parseTime(text: string, location: string, path: string | null): number {
	try {
		return parseTimeOfDay(text)
	} catch (err) {
		if (err instanceof RangeError) {
			throw new ConfigError(`${location}: ${err.message}`, path, { cause: err })
		}
		throw err
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
