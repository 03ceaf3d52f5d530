/**
 * Working-window validation and resolution to UTC bounds.
 */

import { InvalidArgumentError, invalidArgumentFromZod, isValidTimeZone } from '@freeslot/core';
import { isMatch } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { z } from 'zod';
import type { CalendarDay, Interval, WorkingWindow } from './types.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const hourSchema = z.number().int().min(0).max(23);

const workingWindowSchema = z
	.object({
		day: z.union([
			z
				.string()
				.regex(DAY_PATTERN, 'Expected YYYY-MM-DD')
				.refine((day) => isMatch(day, 'yyyy-MM-dd'), 'Not a calendar date'),
			z.date(),
		]),
		startHour: hourSchema,
		endHour: hourSchema,
		timezone: z.string().refine(isValidTimeZone, 'Unknown time zone'),
	})
	.refine((window) => window.startHour < window.endHour, {
		message: 'startHour must be before endHour',
		path: ['endHour'],
	});

const durationSchema = z.number().int().positive();

/**
 * @throws InvalidArgumentError when the window is malformed
 */
export function validateWorkingWindow(window: WorkingWindow): void {
	const result = workingWindowSchema.safeParse(window);
	if (!result.success) {
		throw invalidArgumentFromZod(result.error, 'window');
	}
}

/**
 * @throws InvalidArgumentError unless `minutes` is a positive integer
 */
export function validateDuration(minutes: number): void {
	const result = durationSchema.safeParse(minutes);
	if (!result.success) {
		throw invalidArgumentFromZod(result.error, 'durationMinutes');
	}
}

/**
 * @throws InvalidArgumentError unless `date` holds a real time
 */
export function validateInstant(date: Date, field: string): void {
	if (Number.isNaN(date.getTime())) {
		throw new InvalidArgumentError(field, `Invalid ${field}: expected a valid Date`);
	}
}

/**
 * Gets the YYYY-MM-DD calendar day of a date in a specific timezone.
 */
export function toCalendarDay(day: CalendarDay | Date, timezone: string): CalendarDay {
	return typeof day === 'string' ? day : formatInTimeZone(day, timezone, 'yyyy-MM-dd');
}

function localHour(day: CalendarDay, hour: number, timezone: string): Date {
	return fromZonedTime(`${day}T${String(hour).padStart(2, '0')}:00:00`, timezone);
}

/**
 * Converts a working window to its UTC interval. The local hours are read in the
 * window's timezone, so DST transitions shift the UTC bounds, not the local ones.
 *
 * @example
 * ```typescript
 * resolveWorkingWindow({ day: '2025-01-06', startHour: 9, endHour: 17, timezone: 'America/Toronto' });
 * // Result: { start: 2025-01-06T14:00:00Z, end: 2025-01-06T22:00:00Z }
 * ```
 *
 * @throws InvalidArgumentError when the window is malformed
 */
export function resolveWorkingWindow(window: WorkingWindow): Interval {
	validateWorkingWindow(window);
	const day = toCalendarDay(window.day, window.timezone);

	return {
		start: localHour(day, window.startHour, window.timezone),
		end: localHour(day, window.endHour, window.timezone),
	};
}
