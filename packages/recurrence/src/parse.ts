/**
 * Lexical parsing of the two descriptor shapes:
 *
 * - `MM-DD` for fixed dates, e.g. `01-21`
 * - `MM-{n}{st|nd|rd|th}-{weekday}` for floating dates, e.g. `05-2nd-sun`
 *
 * Input comes from free text, so parsing is tolerant: case and surrounding
 * whitespace are ignored, single-digit months and days are fine, and the
 * ordinal suffix is not checked against the number (`2th` reads as 2).
 */

import { z } from 'zod';
import type { RecurrenceDescriptor, Weekday } from './types.js';

const FIXED_PATTERN = /^(\d{1,2})-(\d{1,2})$/;
const FLOATING_PATTERN = /^(\d{1,2})-(\d)(?:st|nd|rd|th)-([a-z]+)$/;

const WEEKDAYS = new Map<string, Weekday>([
	['sun', 0],
	['sunday', 0],
	['mon', 1],
	['monday', 1],
	['tue', 2],
	['tuesday', 2],
	['wed', 3],
	['wednesday', 3],
	['thu', 4],
	['thursday', 4],
	['fri', 5],
	['friday', 5],
	['sat', 6],
	['saturday', 6],
]);

const monthSchema = z.number().int().min(1).max(12);

const descriptorSchema = z.discriminatedUnion('kind', [
	z.object({
		kind: z.literal('fixed'),
		month: monthSchema,
		day: z.number().int().min(1).max(31),
	}),
	z.object({
		kind: z.literal('floating'),
		month: monthSchema,
		ordinal: z.number().int().min(1).max(5),
		weekday: z.number().int().min(0).max(6),
	}),
]);

/**
 * Checks that every field of a descriptor is in range.
 */
export function isValidDescriptor(descriptor: RecurrenceDescriptor): boolean {
	return descriptorSchema.safeParse(descriptor).success;
}

/**
 * Parses a descriptor string.
 *
 * @returns The descriptor, or null when the input matches neither shape or a
 *   field is out of range (month 1-12, day 1-31, ordinal 1-5)
 *
 * @example
 * parseRecurrenceDescriptor('05-2nd-sun');
 * // Result: { kind: 'floating', month: 5, ordinal: 2, weekday: 0 }
 */
export function parseRecurrenceDescriptor(input: string): RecurrenceDescriptor | null {
	const text = input.trim().toLowerCase();

	const fixed = FIXED_PATTERN.exec(text);
	if (fixed) {
		const descriptor: RecurrenceDescriptor = {
			kind: 'fixed',
			month: Number(fixed[1]),
			day: Number(fixed[2]),
		};
		return isValidDescriptor(descriptor) ? descriptor : null;
	}

	const floating = FLOATING_PATTERN.exec(text);
	if (floating) {
		const weekday = WEEKDAYS.get(floating[3] ?? '');
		if (weekday === undefined) {
			return null;
		}
		const descriptor: RecurrenceDescriptor = {
			kind: 'floating',
			month: Number(floating[1]),
			ordinal: Number(floating[2]),
			weekday,
		};
		return isValidDescriptor(descriptor) ? descriptor : null;
	}

	return null;
}
