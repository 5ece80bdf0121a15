import type { Moment } from "./types.ts"

import { timeOfDay } from "./time-of-day.ts"
import { weekdayOf } from "./weekday.ts"

/**
 * Reads the local weekday and time of day from a date. Milliseconds are dropped.
 */
export function momentOf(date: Date): Moment {
	return {
		weekday: weekdayOf(date),
		time: timeOfDay(date.getHours(), date.getMinutes(), date.getSeconds()),
	}
}
