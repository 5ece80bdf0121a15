/**
 * A wall-clock time with no date, as seconds since local midnight (0..86399).
 */
export type TimeOfDay = number

export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/

/**
 * Builds a time of day from its parts.
 * @throws {RangeError} If any part is out of range or not an integer
 */
export function timeOfDay(hour: number, minute = 0, second = 0): TimeOfDay {
	if (!isPart(hour, 23) || !isPart(minute, 59) || !isPart(second, 59)) {
		throw new RangeError(`Invalid time of day: ${hour}:${minute}:${second}`)
	}
	return hour * SECONDS_PER_HOUR + minute * SECONDS_PER_MINUTE + second
}

/**
 * Parses `HH:MM`, `HH:MM:SS` or `HH:MM:SS.fff`. Fractional seconds are dropped.
 *
 * @example
 * ```ts
 * parseTimeOfDay("09:30") // 34200
 * ```
 */
export function parseTimeOfDay(text: string): TimeOfDay {
	const match = TIME_PATTERN.exec(text.trim())
	if (!match) {
		throw new RangeError(`Invalid time of day: "${text}"`)
	}
	const hour = Number(match[1])
	const minute = Number(match[2])
	const second = Number(match[3] ?? 0)
	try {
		return timeOfDay(hour, minute, second)
	} catch (err) {
		throw new RangeError(`Invalid time of day: "${text}"`, { cause: err })
	}
}

export function formatTimeOfDay(time: TimeOfDay): string {
	const hours = Math.floor(time / SECONDS_PER_HOUR)
	const minutes = Math.floor((time % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
	const seconds = time % SECONDS_PER_MINUTE
	return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":")
}

function isPart(value: number, max: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= max
}
