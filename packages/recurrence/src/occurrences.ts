/**
 * Next-occurrence lookups for yearly recurring dates.
 */

import { invalidArgumentFromZod } from '@freeslot/core';
import { differenceInCalendarDays } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import { parseRecurrenceDescriptor } from './parse.js';
import { resolveDate } from './resolve.js';
import type {
	CalendarDate,
	NamedRecurrence,
	RecurrenceDescriptor,
	UpcomingDate,
	UpcomingDates,
} from './types.js';

/** Years searched after the reference year; reaches the next Feb 29 even across 1900-style gaps */
const MAX_YEARS_AHEAD = 8;

const LAST_YEAR = 9999;

const horizonSchema = z.number().int().min(0);

function calendarDateIn(instant: Date, timezone: string): CalendarDate {
	const [year, month, day] = formatInTimeZone(instant, timezone, 'yyyy-MM-dd').split('-').map(Number);
	return { year: year ?? 0, month: month ?? 0, day: day ?? 0 };
}

function toLocalDate(date: CalendarDate): Date {
	return new Date(date.year, date.month - 1, date.day);
}

/**
 * Calendar days from `from` to `to`; negative when `to` is earlier.
 */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
	return differenceInCalendarDays(toLocalDate(to), toLocalDate(from));
}

/**
 * Finds the first date on or after `from` that the descriptor names.
 *
 * `from` is read as a calendar date in `timezone`. If this year's occurrence has
 * already passed (or does not exist) the following years are tried.
 *
 * @returns The next occurrence, or null when the descriptor is unparseable or
 *   never resolves within the search horizon (e.g. Feb 30)
 *
 * @example
 * nextOccurrence('01-21', new Date('2025-03-01T00:00:00Z'));
 * // Result: { year: 2026, month: 1, day: 21 }
 */
export function nextOccurrence(
	descriptor: RecurrenceDescriptor | string,
	from: Date,
	timezone = 'UTC',
): CalendarDate | null {
	const parsed = typeof descriptor === 'string' ? parseRecurrenceDescriptor(descriptor) : descriptor;
	if (!parsed) {
		return null;
	}

	const today = calendarDateIn(from, timezone);
	const lastYear = Math.min(today.year + MAX_YEARS_AHEAD, LAST_YEAR);

	for (let year = today.year; year <= lastYear; year++) {
		const candidate = resolveDate(parsed, year);
		if (candidate && daysBetween(today, candidate) >= 0) {
			return candidate;
		}
	}

	return null;
}

/**
 * Collects the named dates that fall within `horizonDays` of `from`, for a daily
 * brief or reminder digest.
 *
 * @param horizonDays - Inclusive look-ahead in calendar days; 0 means today only
 * @throws InvalidArgumentError for a negative or fractional horizon
 *
 * @example
 * upcomingDates(
 *   [{ name: "Mom's Birthday", date: '01-21' }, { name: "Mother's Day", date: '05-2nd-sun' }],
 *   new Date('2025-01-14T12:00:00Z'),
 *   30,
 * );
 * // Result: {
 * //   upcoming: [{ name: "Mom's Birthday", date: { year: 2025, month: 1, day: 21 }, daysUntil: 7 }],
 * //   unresolved: []
 * // }
 */
export function upcomingDates(
	entries: NamedRecurrence[],
	from: Date,
	horizonDays: number,
	timezone = 'UTC',
): UpcomingDates {
	const horizon = horizonSchema.safeParse(horizonDays);
	if (!horizon.success) {
		throw invalidArgumentFromZod(horizon.error, 'horizonDays');
	}

	const today = calendarDateIn(from, timezone);
	const upcoming: UpcomingDate[] = [];
	const unresolved: NamedRecurrence[] = [];

	for (const entry of entries) {
		const date = nextOccurrence(entry.date, from, timezone);
		if (!date) {
			unresolved.push(entry);
			continue;
		}

		const daysUntil = daysBetween(today, date);
		if (daysUntil <= horizon.data) {
			upcoming.push({ name: entry.name, date, daysUntil });
		}
	}

	upcoming.sort((a, b) => a.daysUntil - b.daysUntil || a.name.localeCompare(b.name));

	return { upcoming, unresolved };
}
