import { SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from "./time-of-day.ts"

/**
 * Renders a millisecond duration as `"1d 2h 3m 4s"`, dropping leading zero units.
 */
export function formatDuration(ms: number): string {
	const total = Math.floor(Math.max(0, ms) / 1000)
	const days = Math.floor(total / SECONDS_PER_DAY)
	const hours = Math.floor((total % SECONDS_PER_DAY) / SECONDS_PER_HOUR)
	const minutes = Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
	const seconds = total % SECONDS_PER_MINUTE

	const parts: string[] = []
	if (days > 0) parts.push(`${days}d`)
	if (parts.length > 0 || hours > 0) parts.push(`${hours}h`)
	if (parts.length > 0 || minutes > 0) parts.push(`${minutes}m`)
	parts.push(`${seconds}s`)
	return parts.join(" ")
}
