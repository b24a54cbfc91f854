import { describe, it, expect } from 'vitest'
import {
	formatApiTimestamp,
	formatPublishedDate,
	formatSaveDay,
	formatTimestamp,
	savedDay,
	titleCase,
	truncateDescription
} from '../../../src/utils/format.js'

describe('format', () => {
	describe('formatPublishedDate', () => {
		it('formats afternoon times on a 12-hour clock', () => {
			expect(formatPublishedDate('2024-01-05T15:04:00Z')).toBe('January 05, 2024 at 03:04 PM')
		})

		it('shows midnight as 12 AM', () => {
			expect(formatPublishedDate('2024-07-20T00:30:00Z')).toBe('July 20, 2024 at 12:30 AM')
		})

		it('reads missing values as Unknown', () => {
			expect(formatPublishedDate(undefined)).toBe('Unknown')
			expect(formatPublishedDate('Unknown')).toBe('Unknown')
		})

		it('returns unparsable values unchanged', () => {
			expect(formatPublishedDate('yesterday-ish')).toBe('yesterday-ish')
		})
	})

	describe('formatSaveDay', () => {
		it('returns the short month and day', () => {
			expect(formatSaveDay('2024-01-05 10:00:00')).toBe('Jan 05')
			expect(formatSaveDay('2023-12-31 23:59:59')).toBe('Dec 31')
		})

		it('falls back to Today', () => {
			expect(formatSaveDay('2024-01-05')).toBe('Today')
			expect(formatSaveDay(null)).toBe('Today')
			expect(formatSaveDay('2024-13-01 00:00:00')).toBe('Today')
		})
	})

	it('savedDay keeps the date part', () => {
		expect(savedDay('2024-01-05 10:00:00')).toBe('2024-01-05')
		expect(savedDay(null)).toBe('Unknown')
	})

	it('truncateDescription cuts after 150 characters', () => {
		expect(truncateDescription('a'.repeat(150))).toBe('a'.repeat(150))
		expect(truncateDescription('a'.repeat(151))).toBe(`${'a'.repeat(150)}...`)
	})

	it('formatTimestamp uses local wall-clock time', () => {
		expect(formatTimestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe('2024-01-05 09:07:03')
	})

	it('formatApiTimestamp drops milliseconds', () => {
		expect(formatApiTimestamp(new Date('2024-03-01T08:00:00.123Z'))).toBe('2024-03-01T08:00:00Z')
	})

	it('titleCase capitalises the first letter', () => {
		expect(titleCase('neutral')).toBe('Neutral')
	})
})
