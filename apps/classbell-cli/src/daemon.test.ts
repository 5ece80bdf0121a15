import type { Config } from "@classbell/config"

import { parseConfig } from "@classbell/config"
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import type { Launcher } from "./launcher.ts"
import type { Notifier } from "./notifier.ts"

import { Daemon, EmptyTimetableError, MAX_TIMER_MS, inChunks, type Sleep } from "./daemon.ts"

const CONFIG_TEXT = `
notify_before = 10

[timetable]
mon = [{ time = "09:00", event = "math" }]

[events]
math = "browser"

[command.browser]
name = "xdg-open"
args = ["https://example.com/math"]
`

// 2026-10-19 is a Monday
const mondayAt = (hour: number, minute: number) => new Date(2026, 9, 19, hour, minute)

function createDaemon(options: { config?: Config; now?: Date; sleep?: Sleep } = {}) {
	const launcher = { launch: vi.fn<Launcher["launch"]>().mockResolvedValue(undefined) }
	const notifier = { notify: vi.fn<Notifier["notify"]>().mockResolvedValue(undefined) }
	const now = options.now ?? mondayAt(8, 40)
	const daemon = new Daemon({
		config: options.config ?? parseConfig(CONFIG_TEXT),
		launcher,
		notifier,
		clock: { now: () => now },
		sleep: options.sleep,
	})
	return { daemon, launcher, notifier }
}

/** Sleep that returns immediately and aborts the loop after `cycles` calls. */
function abortingSleep(controller: AbortController, calls: number) {
	const durations: number[] = []
	const sleep = vi.fn<Sleep>(async (ms) => {
		durations.push(ms)
		if (durations.length === calls) {
			controller.abort()
		}
	})
	return { sleep, durations }
}

describe("Daemon", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {})
	})

	afterEach(() => {
		vi.restoreAllMocks()
	})

	test("sleeps until the threshold, launches, notifies, then waits out the window", async () => {
		const controller = new AbortController()
		const { sleep, durations } = abortingSleep(controller, 2)
		const { daemon, launcher, notifier } = createDaemon({ sleep })

		await daemon.run(controller.signal)

		// 08:40 -> 08:50, then notify_before + 1 minutes
		expect(durations).toEqual([10 * 60 * 1000, 11 * 60 * 1000])
		expect(launcher.launch).toHaveBeenCalledWith({
			name: "xdg-open",
			args: ["https://example.com/math"],
		})
		expect(notifier.notify).toHaveBeenCalledWith({
			title: "math - classbell",
			message: "event launched",
		})
	})

	test("logs how long it sleeps", async () => {
		const controller = new AbortController()
		const { sleep } = abortingSleep(controller, 1)
		const { daemon } = createDaemon({ sleep })

		await daemon.run(controller.signal)

		expect(console.log).toHaveBeenCalledWith("[classbell.daemon] sleeping for 10m 0s until math")
	})

	test("does not launch when aborted during the first sleep", async () => {
		const controller = new AbortController()
		const { sleep } = abortingSleep(controller, 1)
		const { daemon, launcher, notifier } = createDaemon({ sleep })

		await daemon.run(controller.signal)

		expect(launcher.launch).not.toHaveBeenCalled()
		expect(notifier.notify).not.toHaveBeenCalled()
	})

	test("keeps looping across cycles", async () => {
		const controller = new AbortController()
		const { sleep } = abortingSleep(controller, 6)
		const { daemon, launcher } = createDaemon({ sleep })

		await daemon.run(controller.signal)

		expect(launcher.launch).toHaveBeenCalledTimes(3)
	})

	test("logs a failed launch and still notifies", async () => {
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
		const controller = new AbortController()
		const { sleep } = abortingSleep(controller, 2)
		const { daemon, launcher, notifier } = createDaemon({ sleep })
		const failure = new Error("spawn failed")
		launcher.launch.mockRejectedValue(failure)

		await daemon.run(controller.signal)

		expect(errorSpy).toHaveBeenCalledWith("[classbell.daemon] Failed to launch math:", failure)
		expect(notifier.notify).toHaveBeenCalledTimes(1)
	})

	test("logs a failed notification and keeps running", async () => {
		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {})
		const controller = new AbortController()
		const { sleep, durations } = abortingSleep(controller, 2)
		const { daemon, notifier } = createDaemon({ sleep })
		const failure = new Error("no display")
		notifier.notify.mockRejectedValue(failure)

		await daemon.run(controller.signal)

		expect(warnSpy).toHaveBeenCalledWith("[classbell.daemon] Failed to show notification:", failure)
		expect(durations).toHaveLength(2)
	})

	test("throws EmptyTimetableError when nothing is scheduled", async () => {
		const config: Config = {
			timetable: {},
			events: new Map(),
			commands: new Map(),
			notifyBefore: 5,
		}
		const { daemon } = createDaemon({ config, sleep: vi.fn<Sleep>() })

		await expect(daemon.run()).rejects.toBeInstanceOf(EmptyTimetableError)
	})

	test("returns immediately when the signal is already aborted", async () => {
		const sleep = vi.fn<Sleep>()
		const { daemon } = createDaemon({ sleep })

		await daemon.run(AbortSignal.abort())

		expect(sleep).not.toHaveBeenCalled()
	})

	test("splits a cooldown longer than a timer allows instead of relaunching", async () => {
		const controller = new AbortController()
		const { sleep, durations } = abortingSleep(controller, 3)
		const config: Config = { ...parseConfig(CONFIG_TEXT), notifyBefore: 40_000 }
		const { daemon, launcher } = createDaemon({ config, sleep: inChunks(sleep) })

		await daemon.run(controller.signal)

		// the lead reaches back past 08:40, so the event is due at once;
		// the 40001 minute cooldown then takes two timer-sized waits
		expect(durations).toEqual([0, MAX_TIMER_MS, 40_001 * 60 * 1000 - MAX_TIMER_MS])
		expect(launcher.launch).toHaveBeenCalledTimes(1)
	})

	test("default sleep stops on abort", async () => {
		const controller = new AbortController()
		const { daemon, launcher } = createDaemon()

		const running = daemon.run(controller.signal)
		controller.abort()

		await expect(running).resolves.toBeUndefined()
		expect(launcher.launch).not.toHaveBeenCalled()
	})
})

describe("inChunks", () => {
	test("passes short waits through unchanged", async () => {
		const sleep = vi.fn<Sleep>().mockResolvedValue(undefined)

		await inChunks(sleep, 100)(100)

		expect(sleep.mock.calls).toEqual([[100, undefined]])
	})

	test("splits long waits and forwards the signal", async () => {
		const sleep = vi.fn<Sleep>().mockResolvedValue(undefined)
		const { signal } = new AbortController()

		await inChunks(sleep, 100)(250, signal)

		expect(sleep.mock.calls).toEqual([
			[100, signal],
			[100, signal],
			[50, signal],
		])
	})

	test("stops at the first chunk that rejects", async () => {
		const failure = new Error("aborted")
		const sleep = vi.fn<Sleep>().mockRejectedValue(failure)

		await expect(inChunks(sleep, 100)(250)).rejects.toBe(failure)
		expect(sleep).toHaveBeenCalledTimes(1)
	})
})
