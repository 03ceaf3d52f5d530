/**
 * String forms of descriptors and resolved dates.
 */

import { format } from 'date-fns';
import type { CalendarDate, RecurrenceDescriptor } from './types.js';

const WEEKDAY_ABBREVIATIONS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;

const WEEKDAY_NAMES = [
	'Sunday',
	'Monday',
	'Tuesday',
	'Wednesday',
	'Thursday',
	'Friday',
	'Saturday',
] as const;

const pad = (value: number, length = 2) => String(value).padStart(length, '0');

function monthName(month: number): string {
	return format(new Date(2000, month - 1, 1), 'MMMM');
}

/**
 * English ordinal suffix: 1st, 2nd, 3rd, 4th, 11th, 21st.
 */
export function ordinalSuffix(n: number): string {
	const lastTwo = n % 100;
	if (lastTwo >= 11 && lastTwo <= 13) return 'th';
	switch (n % 10) {
		case 1:
			return 'st';
		case 2:
			return 'nd';
		case 3:
			return 'rd';
		default:
			return 'th';
	}
}

/**
 * Formats a date as YYYY-MM-DD.
 */
export function formatCalendarDate(date: CalendarDate): string {
	return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/**
 * Canonical string form of a descriptor, the shape the parser reads back.
 *
 * @example
 * formatRecurrenceDescriptor({ kind: 'floating', month: 5, ordinal: 2, weekday: 0 }); // '05-2nd-sun'
 */
export function formatRecurrenceDescriptor(descriptor: RecurrenceDescriptor): string {
	switch (descriptor.kind) {
		case 'fixed':
			return `${pad(descriptor.month)}-${pad(descriptor.day)}`;
		case 'floating':
			return `${pad(descriptor.month)}-${descriptor.ordinal}${ordinalSuffix(descriptor.ordinal)}-${WEEKDAY_ABBREVIATIONS[descriptor.weekday]}`;
	}
}

/**
 * English phrase for a descriptor, e.g. "January 21" or "2nd Sunday of May".
 */
export function describeRecurrenceDescriptor(descriptor: RecurrenceDescriptor): string {
	switch (descriptor.kind) {
		case 'fixed':
			return `${monthName(descriptor.month)} ${descriptor.day}`;
		case 'floating':
			return `${descriptor.ordinal}${ordinalSuffix(descriptor.ordinal)} ${WEEKDAY_NAMES[descriptor.weekday]} of ${monthName(descriptor.month)}`;
	}
}
