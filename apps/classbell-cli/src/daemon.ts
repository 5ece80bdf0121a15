import type { Config } from "@classbell/config"
import type { TimetableEvent } from "@classbell/core"

import { commandForEvent } from "@classbell/config"
import { formatDuration, momentOf, resolveNextWakeup } from "@classbell/core"
import { setTimeout as delay } from "node:timers/promises"

import type { Launcher } from "./launcher.ts"
import type { Notifier } from "./notifier.ts"

import { systemClock, type Clock } from "./clock.ts"

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface DaemonOptions {
	config: Config
	launcher: Launcher
	notifier: Notifier
	/** Defaults to the system clock. */
	clock?: Clock
	/** Defaults to a timer that rejects when the signal aborts. */
	sleep?: Sleep
}

export class EmptyTimetableError extends Error {
	constructor() {
		super("No events scheduled on any day")
		this.name = "EmptyTimetableError"
	}
}

const MS_PER_MINUTE = 60 * 1000

/** Longest delay a Node timer takes; anything longer fires after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1

/**
 * Wraps `sleep` so that waits longer than `maxMs` are split into several
 * shorter ones.
 */
export function inChunks(sleep: Sleep, maxMs = MAX_TIMER_MS): Sleep {
	return async (ms, signal) => {
		let remaining = ms
		while (remaining > maxMs) {
			await sleep(maxMs, signal)
			remaining -= maxMs
		}
		await sleep(remaining, signal)
	}
}

const sleepFor: Sleep = inChunks(async (ms, signal) => {
	await delay(ms, undefined, { signal })
})

/**
 * Sleeps until each event's notification threshold, launches its command,
 * shows a notification, then waits out the notification window so the same
 * event is not launched twice.
 *
 * @example
 * ```ts
 * const daemon = new Daemon({
 *   config: await loadConfig(defaultConfigPath()),
 *   launcher: new ProcessLauncher(),
 *   notifier: new DesktopNotifier(),
 * })
 * await daemon.run(controller.signal)
 * ```
 */
export class Daemon {
	private readonly config: Config
	private readonly launcher: Launcher
	private readonly notifier: Notifier
	private readonly clock: Clock
	private readonly sleep: Sleep

	constructor(options: DaemonOptions) {
		this.config = options.config
		this.launcher = options.launcher
		this.notifier = options.notifier
		this.clock = options.clock ?? systemClock
		this.sleep = options.sleep ?? sleepFor
	}

	/**
	 * Loops until `signal` aborts. Resolves on abort.
	 * @throws {EmptyTimetableError} If the timetable has no events
	 */
	async run(signal?: AbortSignal): Promise<void> {
		try {
			while (!signal?.aborted) {
				await this.cycle(signal)
			}
		} catch (err) {
			if (signal?.aborted) return
			throw err
		}
	}

	private async cycle(signal: AbortSignal | undefined): Promise<void> {
		const wakeup = resolveNextWakeup(
			this.config.timetable,
			this.config.notifyBefore,
			momentOf(this.clock.now()),
		)
		if (!wakeup) {
			throw new EmptyTimetableError()
		}

		console.log(
			`[classbell.daemon] sleeping for ${formatDuration(wakeup.durationMs)} until ${wakeup.event.name}`,
		)
		await this.sleep(wakeup.durationMs, signal)
		if (signal?.aborted) return

		await this.dispatch(wakeup.event)

		await this.sleep((this.config.notifyBefore + 1) * MS_PER_MINUTE, signal)
	}

	private async dispatch(event: TimetableEvent): Promise<void> {
		const command = commandForEvent(this.config, event.name)

		try {
			await this.launcher.launch(command)
		} catch (err) {
			console.error(`[classbell.daemon] Failed to launch ${event.name}:`, err)
		}

		try {
			await this.notifier.notify({
				title: `${event.name} - classbell`,
				message: "event launched",
			})
		} catch (err) {
			console.warn("[classbell.daemon] Failed to show notification:", err)
		}
	}
}
