export const Weekday = {
	Monday: "monday",
	Tuesday: "tuesday",
	Wednesday: "wednesday",
	Thursday: "thursday",
	Friday: "friday",
	Saturday: "saturday",
	Sunday: "sunday",
} as const

export type Weekday = (typeof Weekday)[keyof typeof Weekday]

/** Days in cycle order, Monday first. */
export const WEEKDAYS: readonly Weekday[] = [
	Weekday.Monday,
	Weekday.Tuesday,
	Weekday.Wednesday,
	Weekday.Thursday,
	Weekday.Friday,
	Weekday.Saturday,
	Weekday.Sunday,
]

// Date#getDay() numbering: 0 = Sunday
const BY_DATE_INDEX: readonly Weekday[] = [
	Weekday.Sunday,
	Weekday.Monday,
	Weekday.Tuesday,
	Weekday.Wednesday,
	Weekday.Thursday,
	Weekday.Friday,
	Weekday.Saturday,
]

const NEXT: Record<Weekday, Weekday> = {
	monday: Weekday.Tuesday,
	tuesday: Weekday.Wednesday,
	wednesday: Weekday.Thursday,
	thursday: Weekday.Friday,
	friday: Weekday.Saturday,
	saturday: Weekday.Sunday,
	sunday: Weekday.Monday,
}

export function nextWeekday(day: Weekday): Weekday {
	return NEXT[day]
}

/**
 * The days following `start`, in order, wrapping around the week.
 *
 * @example
 * ```ts
 * daysAfter(Weekday.Saturday, 3) // ["sunday", "monday", "tuesday"]
 * ```
 */
export function daysAfter(start: Weekday, count: number): Weekday[] {
	const days: Weekday[] = []
	let day = start
	for (let i = 0; i < count; i++) {
		day = nextWeekday(day)
		days.push(day)
	}
	return days
}

/**
 * Local weekday of a date.
 */
export function weekdayOf(date: Date): Weekday {
	const day = BY_DATE_INDEX[date.getDay()]
	if (day === undefined) {
		throw new RangeError(`Invalid date: ${String(date)}`)
	}
	return day
}
