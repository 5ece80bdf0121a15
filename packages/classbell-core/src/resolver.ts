import type { Moment, NextWakeup, Timetable, TimetableEvent } from "./types.ts"

import { SECONDS_PER_DAY, SECONDS_PER_MINUTE } from "./time-of-day.ts"
import { daysAfter, type Weekday } from "./weekday.ts"

const MS_PER_SECOND = 1000

// Six following days, then today again one week later.
const DAYS_IN_WALK = 7

/**
 * The event on `now`'s day whose notification window contains `now`.
 *
 * Only today is inspected. An event is active from `notifyBefore` minutes before
 * its time up to and including its time.
 *
 * @example
 * ```ts
 * const timetable = { monday: [{ time: timeOfDay(9), name: "math" }] }
 * resolveActive(timetable, 5, { weekday: "monday", time: timeOfDay(8, 56) })
 * // { time: 32400, name: "math" }
 * ```
 */
export function resolveActive(
	timetable: Timetable,
	notifyBefore: number,
	now: Moment,
): TimetableEvent | null {
	const candidate = upcomingToday(timetable, now)
	if (!candidate) {
		return null
	}

	const gap = candidate.time - now.time
	if (gap > leadSeconds(notifyBefore)) {
		return null
	}
	return candidate
}

/**
 * How long to wait before acting on the next event, and which event that is.
 *
 * The remaining events of today take priority. Otherwise the first day after
 * today with any events wins, and its earliest event is used. Returns null only
 * when the timetable has no events on any day.
 */
export function resolveNextWakeup(
	timetable: Timetable,
	notifyBefore: number,
	now: Moment,
): NextWakeup | null {
	const lead = leadSeconds(notifyBefore)

	const candidate = upcomingToday(timetable, now)
	if (candidate) {
		const notifyAt = candidate.time - lead
		const waitSeconds = notifyAt <= now.time ? 0 : notifyAt - now.time
		return {
			durationMs: toMs(waitSeconds),
			event: candidate,
			daysAhead: 0,
		}
	}

	const days = daysAfter(now.weekday, DAYS_IN_WALK)
	for (const [index, day] of days.entries()) {
		const event = earliest(eventsOn(timetable, day))
		if (!event) continue

		const diff = index + 1
		const notifyAt = event.time - lead

		let waitSeconds: number
		if (notifyAt > now.time) {
			waitSeconds = diff * SECONDS_PER_DAY + (notifyAt - now.time)
		} else {
			// Threshold falls before the target day's clock reading: count from the day before
			waitSeconds = (diff - 1) * SECONDS_PER_DAY + (SECONDS_PER_DAY - (now.time - notifyAt))
		}

		return {
			durationMs: toMs(Math.max(0, waitSeconds)),
			event,
			daysAhead: diff,
		}
	}

	return null
}

/**
 * Copy of `events` ordered by time. Equal times keep their input order.
 */
export function sortByTime(events: readonly TimetableEvent[]): TimetableEvent[] {
	return [...events].sort((a, b) => a.time - b.time)
}

/**
 * Index of the first event in `sorted` whose time is at or after `time`,
 * or `sorted.length` if there is none.
 */
export function lowerBound(sorted: readonly TimetableEvent[], time: number): number {
	let low = 0
	let high = sorted.length
	while (low < high) {
		const mid = (low + high) >>> 1
		const event = sorted[mid]
		if (event !== undefined && event.time < time) {
			low = mid + 1
		} else {
			high = mid
		}
	}
	return low
}

function upcomingToday(timetable: Timetable, now: Moment): TimetableEvent | null {
	const events = eventsOn(timetable, now.weekday)
	if (events.length === 0) {
		return null
	}
	const sorted = sortByTime(events)
	return sorted[lowerBound(sorted, now.time)] ?? null
}

function earliest(events: readonly TimetableEvent[]): TimetableEvent | null {
	let first: TimetableEvent | null = null
	for (const event of events) {
		if (!first || event.time < first.time) {
			first = event
		}
	}
	return first
}

function eventsOn(timetable: Timetable, day: Weekday): readonly TimetableEvent[] {
	return timetable[day] ?? []
}

function leadSeconds(notifyBefore: number): number {
	return notifyBefore * SECONDS_PER_MINUTE
}

function toMs(seconds: number): number {
	return Math.round(seconds * MS_PER_SECOND)
}
