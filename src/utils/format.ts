const MONTHS = [
	'January',
	'February',
	'March',
	'April',
	'May',
	'June',
	'July',
	'August',
	'September',
	'October',
	'November',
	'December'
]

const SAVED_AT_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/

function pad(value: number): string {
	return String(value).padStart(2, '0')
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`, the format of `articles.saved_at`.
 */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	return `${day} ${time}`
}

/**
 * UTC time without milliseconds, e.g. `2024-03-01T08:00:00Z`, as the GNews `from` parameter expects.
 */
export function formatApiTimestamp(date: Date): string {
	return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * "January 05, 2024 at 03:04 PM" in UTC. Unparsable input is returned unchanged.
 */
export function formatPublishedDate(value?: string | null): string {
	if (!value || value === 'Unknown') return 'Unknown'

	const time = Date.parse(value)
	if (Number.isNaN(time)) return value

	const date = new Date(time)
	const hours = date.getUTCHours()
	const hour12 = hours % 12 === 0 ? 12 : hours % 12
	const meridiem = hours < 12 ? 'AM' : 'PM'

	return `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} at ${pad(hour12)}:${pad(date.getUTCMinutes())} ${meridiem}`
}

/** Short day of a `saved_at` value, e.g. "Jan 05". Anything unparsable reads as "Today". */
export function formatSaveDay(savedAt?: string | null): string {
	const match = savedAt ? SAVED_AT_PATTERN.exec(savedAt) : null
	if (!match) return 'Today'

	const month = Number(match[2])
	if (month < 1 || month > 12) return 'Today'

	return `${MONTHS[month - 1].slice(0, 3)} ${match[3]}`
}

export function savedDay(savedAt?: string | null): string {
	return savedAt ? savedAt.slice(0, 10) : 'Unknown'
}

export function truncateDescription(text: string, limit: number = 150): string {
	return text.length > limit ? `${text.slice(0, limit)}...` : text
}

export function titleCase(value: string): string {
	return value.charAt(0).toUpperCase() + value.slice(1)
}
