import { describe, expect, test } from 'vitest';
import {
	describeRecurrenceDescriptor,
	formatCalendarDate,
	formatRecurrenceDescriptor,
	ordinalSuffix,
} from '../src/format.js';
import { parseRecurrenceDescriptor } from '../src/parse.js';

describe('ordinalSuffix', () => {
	test('follows English rules', () => {
		expect([1, 2, 3, 4, 5].map(ordinalSuffix)).toEqual(['st', 'nd', 'rd', 'th', 'th']);
		expect([11, 12, 13, 21, 22, 101].map(ordinalSuffix)).toEqual(['th', 'th', 'th', 'st', 'nd', 'st']);
	});
});

describe('formatCalendarDate', () => {
	test('pads to YYYY-MM-DD', () => {
		expect(formatCalendarDate({ year: 2025, month: 5, day: 1 })).toBe('2025-05-01');
	});
});

describe('formatRecurrenceDescriptor', () => {
	test('formats fixed dates', () => {
		expect(formatRecurrenceDescriptor({ kind: 'fixed', month: 1, day: 21 })).toBe('01-21');
	});

	test('formats floating dates with the correct suffix', () => {
		expect(formatRecurrenceDescriptor({ kind: 'floating', month: 5, ordinal: 2, weekday: 0 })).toBe(
			'05-2nd-sun',
		);
	});

	test('normalizes tolerant input', () => {
		const parsed = parseRecurrenceDescriptor('5-2th-Sunday');
		if (!parsed) throw new Error('expected a descriptor');

		expect(formatRecurrenceDescriptor(parsed)).toBe('05-2nd-sun');
	});
});

describe('describeRecurrenceDescriptor', () => {
	test('describes fixed dates', () => {
		expect(describeRecurrenceDescriptor({ kind: 'fixed', month: 1, day: 21 })).toBe('January 21');
	});

	test('describes floating dates', () => {
		expect(describeRecurrenceDescriptor({ kind: 'floating', month: 5, ordinal: 2, weekday: 0 })).toBe(
			'2nd Sunday of May',
		);
		expect(describeRecurrenceDescriptor({ kind: 'floating', month: 9, ordinal: 1, weekday: 1 })).toBe(
			'1st Monday of September',
		);
		expect(describeRecurrenceDescriptor({ kind: 'floating', month: 11, ordinal: 4, weekday: 4 })).toBe(
			'4th Thursday of November',
		);
	});
});
