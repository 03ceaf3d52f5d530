import { InvalidArgumentError } from '@freeslot/core';
import { describe, expect, test } from 'vitest';
import { resolveDate, resolveRecurrenceDate } from '../src/resolve.js';

describe('resolveRecurrenceDate', () => {
	test('resolves a fixed date', () => {
		expect(resolveRecurrenceDate('01-21', 2025)).toBe('2025-01-21');
	});

	test('returns null for a date that never exists', () => {
		expect(resolveRecurrenceDate('02-30', 2025)).toBeNull();
	});

	test('resolves the second Sunday of May', () => {
		expect(resolveRecurrenceDate('05-2nd-sun', 2025)).toBe('2025-05-11');
	});

	test('resolves the third Sunday of June', () => {
		expect(resolveRecurrenceDate('06-3rd-sun', 2025)).toBe('2025-06-15');
	});

	test('returns null for unparseable input', () => {
		expect(resolveRecurrenceDate('mid-June', 2025)).toBeNull();
	});
});

describe('resolveDate', () => {
	test('resolves Feb 29 only in leap years', () => {
		expect(resolveDate('02-29', 2024)).toEqual({ year: 2024, month: 2, day: 29 });
		expect(resolveDate('02-29', 2025)).toBeNull();
	});

	test('resolves weekdays other than Sunday', () => {
		expect(resolveDate('11-4th-thu', 2025)).toEqual({ year: 2025, month: 11, day: 27 });
		expect(resolveDate('09-1st-mon', 2025)).toEqual({ year: 2025, month: 9, day: 1 });
	});

	test('resolves a fifth weekday when the month has one', () => {
		expect(resolveDate('06-5th-sun', 2025)).toEqual({ year: 2025, month: 6, day: 29 });
	});

	test('never rolls a missing fifth weekday into the next month', () => {
		expect(resolveDate('05-5th-sun', 2025)).toBeNull();
	});

	test('accepts parsed descriptors', () => {
		expect(resolveDate({ kind: 'fixed', month: 12, day: 25 }, 2025)).toEqual({
			year: 2025,
			month: 12,
			day: 25,
		});
		expect(resolveDate({ kind: 'floating', month: 6, ordinal: 3, weekday: 0 }, 2026)).toEqual({
			year: 2026,
			month: 6,
			day: 21,
		});
	});

	test('returns null for out-of-range descriptor fields', () => {
		expect(resolveDate({ kind: 'fixed', month: 13, day: 1 }, 2025)).toBeNull();
		expect(resolveDate({ kind: 'floating', month: 5, ordinal: 0, weekday: 0 }, 2025)).toBeNull();
	});

	test('rejects years outside 1000-9999', () => {
		expect(() => resolveDate('01-21', 99)).toThrow(InvalidArgumentError);
		expect(() => resolveDate('01-21', 2025.5)).toThrow('Invalid year: Expected integer, received float');
	});
});
