// Model
export type { Moment, NextWakeup, Timetable, TimetableEvent } from "./types.ts"
export { WEEKDAYS, Weekday, daysAfter, nextWeekday, weekdayOf } from "./weekday.ts"
export {
	SECONDS_PER_DAY,
	SECONDS_PER_HOUR,
	SECONDS_PER_MINUTE,
	formatTimeOfDay,
	parseTimeOfDay,
	timeOfDay,
	type TimeOfDay,
} from "./time-of-day.ts"
export { momentOf } from "./moment.ts"

// Resolution
export { lowerBound, resolveActive, resolveNextWakeup, sortByTime } from "./resolver.ts"

// Formatting
export { formatDuration } from "./duration.ts"
