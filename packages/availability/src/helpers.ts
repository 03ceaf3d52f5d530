/**
 * Helpers at the calendar-provider boundary: turning provider data into busy
 * intervals and slots into display text.
 */

import { isValid, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { intervalDuration } from './intervals.js';
import type { CalendarEvent, FreeBusyResponse, Interval } from './types.js';

function toDate(value: string | Date): Date {
	return value instanceof Date ? new Date(value.getTime()) : parseISO(value);
}

function toBusyInterval(start: string | Date, end: string | Date): Interval | null {
	const interval = { start: toDate(start), end: toDate(end) };
	if (!isValid(interval.start) || !isValid(interval.end) || interval.start >= interval.end) {
		return null;
	}
	return interval;
}

/**
 * Reduces calendar events to busy intervals.
 *
 * Only timed events count as busy. All-day entries (birthdays, anniversaries,
 * holidays) carry a `date` but no `dateTime` and never block meeting time.
 * Events with unparseable or empty times are skipped.
 *
 * @example
 * const busy = buildBusyFromEvents([
 *   { summary: 'Standup', start: { dateTime: '2025-01-06T09:00:00Z' }, end: { dateTime: '2025-01-06T09:15:00Z' } },
 *   { summary: "Mom's Birthday", start: { date: '2025-01-06' }, end: { date: '2025-01-07' } },
 * ]);
 * // Result: [{ start: 2025-01-06T09:00:00Z, end: 2025-01-06T09:15:00Z }]
 */
export function buildBusyFromEvents(events: CalendarEvent[]): Interval[] {
	const busy: Interval[] = [];

	for (const event of events) {
		const { dateTime: start } = event.start;
		const { dateTime: end } = event.end;
		if (!start || !end) {
			continue;
		}

		const interval = toBusyInterval(start, end);
		if (interval) {
			busy.push(interval);
		}
	}

	return busy;
}

/**
 * Flattens a FreeBusyResponse (Google Calendar format) into busy intervals,
 * across every calendar in the response.
 */
export function buildBusyFromFreebusy(freebusy: FreeBusyResponse): Interval[] {
	const busy: Interval[] = [];

	for (const calendar of Object.values(freebusy.calendars)) {
		if (!Array.isArray(calendar.busy)) {
			continue;
		}

		for (const period of calendar.busy) {
			const interval = toBusyInterval(period.start, period.end);
			if (interval) {
				busy.push(interval);
			}
		}
	}

	return busy;
}

/**
 * Whole minutes in a slot.
 */
export function slotDurationMinutes(slot: Interval): number {
	return Math.floor(intervalDuration(slot) / (60 * 1000));
}

/**
 * Renders a slot as a 12-hour time range in the given timezone, e.g. "10:00 AM - 12:00 PM".
 */
export function formatSlot(slot: Interval, timezone: string): string {
	const start = formatInTimeZone(slot.start, timezone, 'h:mm a');
	const end = formatInTimeZone(slot.end, timezone, 'h:mm a');
	return `${start} - ${end}`;
}
