/**
 * Interval arithmetic functions for working with time intervals.
 * All intervals are half-open [start, end), meaning start is inclusive and end is exclusive.
 * Inputs are never mutated; every returned interval holds fresh Date objects.
 */

import type { DateRange, Interval } from './types.js';

function cloneInterval(interval: Interval): Interval {
	return {
		start: new Date(interval.start.getTime()),
		end: new Date(interval.end.getTime()),
	};
}

/**
 * Orders intervals by start time; intervals sharing a start put the earlier end first.
 */
export function compareIntervals(a: Interval, b: Interval): number {
	const startDiff = a.start.getTime() - b.start.getTime();
	if (startDiff !== 0) return startDiff;
	return a.end.getTime() - b.end.getTime();
}

/**
 * Returns a sorted copy of the intervals (see {@link compareIntervals}).
 */
export function sortIntervals(intervals: Interval[]): Interval[] {
	return intervals.map(cloneInterval).sort(compareIntervals);
}

/**
 * Checks if two intervals strictly overlap (share some time, not just an endpoint).
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * Length of an interval in milliseconds.
 */
export function intervalDuration(interval: Interval): number {
	return interval.end.getTime() - interval.start.getTime();
}

/**
 * Clamps each interval to the range and drops whatever is left empty.
 * Zero-length and reversed intervals never survive clipping.
 *
 * @example
 * ```typescript
 * clipIntervals(
 *   [{ start: new Date('2025-01-06T08:00:00Z'), end: new Date('2025-01-06T10:00:00Z') }],
 *   { start: new Date('2025-01-06T09:00:00Z'), end: new Date('2025-01-06T17:00:00Z') },
 * );
 * // Result: [{ start: 2025-01-06T09:00:00Z, end: 2025-01-06T10:00:00Z }]
 * ```
 */
export function clipIntervals(intervals: Interval[], range: DateRange): Interval[] {
	const rangeStart = range.start.getTime();
	const rangeEnd = range.end.getTime();
	const clipped: Interval[] = [];

	for (const interval of intervals) {
		const start = Math.max(interval.start.getTime(), rangeStart);
		const end = Math.min(interval.end.getTime(), rangeEnd);
		if (start < end) {
			clipped.push({ start: new Date(start), end: new Date(end) });
		}
	}

	return clipped;
}

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 * Since intervals are half-open, [a, b) and [b, c) are adjacent and merge into [a, c).
 *
 * @param intervals - Array of intervals to merge (can be unsorted)
 * @returns A sorted array of non-overlapping intervals covering the same total time
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
	const sorted = sortIntervals(intervals.filter((interval) => interval.start < interval.end));
	const merged: Interval[] = [];

	for (const current of sorted) {
		const last = merged[merged.length - 1];
		if (last && current.start <= last.end) {
			if (current.end > last.end) {
				last.end = current.end;
			}
		} else {
			merged.push(current);
		}
	}

	return merged;
}

/**
 * Removes all time covered by `subtract` from `from`.
 * May split intervals if subtraction punches holes in the middle.
 *
 * @example
 * ```typescript
 * const from = [
 *   { start: new Date('2025-01-06T09:00:00Z'), end: new Date('2025-01-06T17:00:00Z') },
 * ];
 * const subtract = [
 *   { start: new Date('2025-01-06T12:00:00Z'), end: new Date('2025-01-06T13:00:00Z') },
 * ];
 * subtractIntervals(from, subtract);
 * // Result: [
 * //   { start: 2025-01-06T09:00:00Z, end: 2025-01-06T12:00:00Z },
 * //   { start: 2025-01-06T13:00:00Z, end: 2025-01-06T17:00:00Z }
 * // ]
 * ```
 */
export function subtractIntervals(from: Interval[], subtract: Interval[]): Interval[] {
	const holes = mergeIntervals(subtract);
	const result: Interval[] = [];

	for (const interval of mergeIntervals(from)) {
		let cursor = interval.start.getTime();
		const end = interval.end.getTime();

		for (const hole of holes) {
			const holeStart = hole.start.getTime();
			const holeEnd = hole.end.getTime();
			if (holeEnd <= cursor) continue;
			if (holeStart >= end) break;

			if (holeStart > cursor) {
				result.push({ start: new Date(cursor), end: new Date(holeStart) });
			}
			cursor = Math.max(cursor, holeEnd);
		}

		if (cursor < end) {
			result.push({ start: new Date(cursor), end: new Date(end) });
		}
	}

	return result;
}
