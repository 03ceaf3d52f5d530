/**
 * Resolution of descriptors to concrete dates for a given year.
 */

import { invalidArgumentFromZod } from '@freeslot/core';
import { getDay, getDaysInMonth, isExists } from 'date-fns';
import { z } from 'zod';
import { formatCalendarDate } from './format.js';
import { isValidDescriptor, parseRecurrenceDescriptor } from './parse.js';
import type { CalendarDate, FloatingDate, RecurrenceDescriptor } from './types.js';

const yearSchema = z.number().int().min(1000).max(9999);

/**
 * @throws InvalidArgumentError unless `year` is a four-digit integer
 */
export function validateYear(year: number): void {
	const result = yearSchema.safeParse(year);
	if (!result.success) {
		throw invalidArgumentFromZod(result.error, 'year');
	}
}

/**
 * Finds the Nth weekday of a month. Never rolls into the next month: a 5th
 * Sunday in a month with four Sundays resolves to null.
 */
function resolveFloating(descriptor: FloatingDate, year: number): CalendarDate | null {
	const firstOfMonth = new Date(year, descriptor.month - 1, 1);
	const offset = (descriptor.weekday - getDay(firstOfMonth) + 7) % 7;
	const day = 1 + offset + 7 * (descriptor.ordinal - 1);

	if (day > getDaysInMonth(firstOfMonth)) {
		return null;
	}
	return { year, month: descriptor.month, day };
}

/**
 * Resolves a descriptor to the date it names in `year`.
 *
 * A fixed date that does not exist that year (Feb 30, Feb 29 outside leap
 * years) resolves to null rather than a nearby day.
 *
 * @param descriptor - A parsed descriptor or its string form
 * @returns The date, or null when the descriptor is unparseable or the date does not exist
 * @throws InvalidArgumentError for a year outside 1000-9999
 *
 * @example
 * resolveDate('06-3rd-sun', 2025);
 * // Result: { year: 2025, month: 6, day: 15 }
 */
export function resolveDate(descriptor: RecurrenceDescriptor | string, year: number): CalendarDate | null {
	validateYear(year);

	const parsed = typeof descriptor === 'string' ? parseRecurrenceDescriptor(descriptor) : descriptor;
	if (!parsed || !isValidDescriptor(parsed)) {
		return null;
	}

	switch (parsed.kind) {
		case 'fixed':
			return isExists(year, parsed.month - 1, parsed.day)
				? { year, month: parsed.month, day: parsed.day }
				: null;
		case 'floating':
			return resolveFloating(parsed, year);
	}
}

/**
 * String-in, string-out form of {@link resolveDate} for tool and UI handlers.
 *
 * @returns `YYYY-MM-DD`, or null when the caller should ask the user to clarify
 *
 * @example
 * resolveRecurrenceDate('05-2nd-sun', 2025); // '2025-05-11'
 * resolveRecurrenceDate('02-30', 2025); // null
 */
export function resolveRecurrenceDate(descriptor: string, year: number): string | null {
	const date = resolveDate(descriptor, year);
	return date ? formatCalendarDate(date) : null;
}
