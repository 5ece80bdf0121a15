import type { TimeOfDay } from "./time-of-day.ts"
import type { Weekday } from "./weekday.ts"

/**
 * A named occurrence at a fixed time, recurring every week on its day.
 */
export interface TimetableEvent {
	readonly time: TimeOfDay
	/** Looked up in the config's event → command table */
	readonly name: string
}

/**
 * Weekly schedule. A missing day and an empty list both mean "no events".
 * Lists need not be sorted.
 */
export type Timetable = Readonly<Partial<Record<Weekday, readonly TimetableEvent[]>>>

/**
 * A clock reading: local weekday and time of day.
 */
export interface Moment {
	readonly weekday: Weekday
	readonly time: TimeOfDay
}

export interface NextWakeup {
	/** Milliseconds to wait before acting, whole seconds, never negative */
	durationMs: number
	event: TimetableEvent
	/** 0 for today, 1 for tomorrow, up to 7 for today next week */
	daysAhead: number
}
