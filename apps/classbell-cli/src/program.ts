import type { CommandSpec, Config } from "@classbell/config"

import {
	commandForEvent,
	commandNamed,
	defaultConfigPath,
	formatCommand,
	loadConfig,
} from "@classbell/config"
import { momentOf, resolveActive } from "@classbell/core"
import { Command, Option } from "commander"

import type { Notifier } from "./notifier.ts"

import { systemClock, type Clock } from "./clock.ts"
import { Daemon, type Sleep } from "./daemon.ts"
import { ProcessLauncher, type Launcher } from "./launcher.ts"
import { DesktopNotifier } from "./notifier.ts"

export interface ProgramDependencies {
	loadConfig?: (path: string) => Promise<Config>
	launcher?: Launcher
	notifier?: Notifier
	clock?: Clock
	sleep?: Sleep
	/** Receives each line of user-facing output. Defaults to stdout. */
	write?: (line: string) => void
	/** Used to find the default config path. Defaults to `process.env`. */
	env?: NodeJS.ProcessEnv
	/** Stops the daemon loop. */
	signal?: AbortSignal
}

type CliOptions = {
	config?: string
	launch?: string
	event?: string
	daemonize?: boolean
	run: boolean
	showCommand?: string
}

/**
 * Builds the `classbell` command-line program.
 *
 * Without a mode option it launches the command of the event whose
 * notification window contains the current time, if any.
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
	const program = new Command()
		.name("classbell")
		.description("Launch the command for the current event of a weekly timetable")
		.version("0.1.0")
		.addOption(
			new Option("-c, --config <path>", "config file (default: $XDG_CONFIG_HOME/classbell.toml)"),
		)
		.addOption(
			new Option("-l, --launch <command>", "run a command from the config").conflicts([
				"event",
				"daemonize",
				"showCommand",
			]),
		)
		.addOption(
			new Option("-e, --event <event>", "run the command mapped to an event").conflicts([
				"daemonize",
				"showCommand",
			]),
		)
		.addOption(
			new Option("-d, --daemonize", "keep running and launch each event as it comes up").conflicts(
				"showCommand",
			),
		)
		.addOption(new Option("--no-run", "print commands instead of running them"))
		.addOption(new Option("--show-command <command>", "print a command from the config"))

	program.action(async () => {
		await runProgram(program.opts<CliOptions>(), deps)
	})

	return program
}

async function runProgram(options: CliOptions, deps: ProgramDependencies): Promise<void> {
	const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`))
	const load = deps.loadConfig ?? loadConfig
	const config = await load(options.config ?? defaultConfigPath(deps.env))
	const launcher = deps.launcher ?? new ProcessLauncher()
	const clock = deps.clock ?? systemClock

	const dispatch = async (command: CommandSpec): Promise<void> => {
		if (options.run) {
			await launcher.launch(command)
		} else {
			write(formatCommand(command))
		}
	}

	if (options.showCommand !== undefined) {
		write(formatCommand(commandNamed(config, options.showCommand)))
		return
	}

	if (options.launch !== undefined) {
		await dispatch(commandNamed(config, options.launch))
		return
	}

	if (options.event !== undefined) {
		await dispatch(commandForEvent(config, options.event))
		return
	}

	if (options.daemonize) {
		const daemon = new Daemon({
			config,
			launcher,
			notifier: deps.notifier ?? new DesktopNotifier(),
			clock,
			sleep: deps.sleep,
		})
		await daemon.run(deps.signal)
		return
	}

	const active = resolveActive(config.timetable, config.notifyBefore, momentOf(clock.now()))
	if (!active) {
		write("no event")
		return
	}

	write(`event = ${active.name}`)
	await dispatch(commandForEvent(config, active.name))
}
