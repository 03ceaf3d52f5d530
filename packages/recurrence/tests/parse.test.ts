import { describe, expect, test } from 'vitest';
import { isValidDescriptor, parseRecurrenceDescriptor } from '../src/parse.js';

describe('parseRecurrenceDescriptor', () => {
	describe('fixed dates', () => {
		test('parses MM-DD', () => {
			expect(parseRecurrenceDescriptor('01-21')).toEqual({ kind: 'fixed', month: 1, day: 21 });
		});

		test('accepts single-digit fields', () => {
			expect(parseRecurrenceDescriptor('1-5')).toEqual({ kind: 'fixed', month: 1, day: 5 });
		});

		test('rejects out-of-range months and days', () => {
			expect(parseRecurrenceDescriptor('13-01')).toBeNull();
			expect(parseRecurrenceDescriptor('00-10')).toBeNull();
			expect(parseRecurrenceDescriptor('01-32')).toBeNull();
			expect(parseRecurrenceDescriptor('01-00')).toBeNull();
		});

		test('leaves month-length checks to resolution', () => {
			expect(parseRecurrenceDescriptor('02-30')).toEqual({ kind: 'fixed', month: 2, day: 30 });
		});
	});

	describe('floating dates', () => {
		test('parses MM-Nth-weekday', () => {
			expect(parseRecurrenceDescriptor('05-2nd-sun')).toEqual({
				kind: 'floating',
				month: 5,
				ordinal: 2,
				weekday: 0,
			});
		});

		test('ignores case and surrounding whitespace', () => {
			expect(parseRecurrenceDescriptor('  06-3RD-Sun ')).toEqual({
				kind: 'floating',
				month: 6,
				ordinal: 3,
				weekday: 0,
			});
		});

		test('does not check the suffix against the number', () => {
			expect(parseRecurrenceDescriptor('05-2th-sun')).toEqual({
				kind: 'floating',
				month: 5,
				ordinal: 2,
				weekday: 0,
			});
		});

		test('accepts full weekday names', () => {
			expect(parseRecurrenceDescriptor('09-1st-monday')).toEqual({
				kind: 'floating',
				month: 9,
				ordinal: 1,
				weekday: 1,
			});
			expect(parseRecurrenceDescriptor('11-4th-thu')).toEqual({
				kind: 'floating',
				month: 11,
				ordinal: 4,
				weekday: 4,
			});
		});

		test('rejects ordinals outside 1-5', () => {
			expect(parseRecurrenceDescriptor('05-0th-sun')).toBeNull();
			expect(parseRecurrenceDescriptor('05-6th-sun')).toBeNull();
		});

		test('rejects unknown weekdays and a missing suffix', () => {
			expect(parseRecurrenceDescriptor('05-2nd-xyz')).toBeNull();
			expect(parseRecurrenceDescriptor('05-2-sun')).toBeNull();
		});
	});

	test('returns null for any other shape', () => {
		expect(parseRecurrenceDescriptor('')).toBeNull();
		expect(parseRecurrenceDescriptor('2025-01-21')).toBeNull();
		expect(parseRecurrenceDescriptor('Jan 21')).toBeNull();
		expect(parseRecurrenceDescriptor('05-second-sunday')).toBeNull();
	});
});

describe('isValidDescriptor', () => {
	test('checks field ranges', () => {
		expect(isValidDescriptor({ kind: 'fixed', month: 12, day: 25 })).toBe(true);
		expect(isValidDescriptor({ kind: 'fixed', month: 12, day: 0 })).toBe(false);
		expect(isValidDescriptor({ kind: 'floating', month: 5, ordinal: 6, weekday: 0 })).toBe(false);
		expect(isValidDescriptor({ kind: 'floating', month: 2.5, ordinal: 1, weekday: 3 })).toBe(false);
	});
});
