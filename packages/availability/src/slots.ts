/**
 * Free slot computation for a single working window.
 */

import { clipIntervals, sortIntervals } from './intervals.js';
import type { Interval, WorkingWindow } from './types.js';
import { resolveWorkingWindow, validateDuration, validateInstant } from './window.js';

const MS_PER_MINUTE = 60 * 1000;

/**
 * Finds the maximal free intervals within a working window that can fit the
 * requested duration.
 *
 * The search runs as a single sweep:
 * 1. **Clip** - busy intervals are clamped to [searchStart, window end); empty ones drop out
 * 2. **Sort** - by start, ties by earlier end
 * 3. **Sweep** - a cursor walks the sorted list; each gap of at least `durationMinutes`
 *    before the next busy interval is emitted, then the cursor jumps to that interval's end
 *    if it is later
 * 4. **Tail** - the gap between the cursor and the window end, if it fits
 *
 * Overlapping and nested busy intervals merge implicitly because the cursor only moves forward.
 * Returned slots can be longer than the duration: each is a whole gap, not a fixed-size slot.
 *
 * @param window - The working hours to search
 * @param busy - Busy intervals in any order; overlapping and zero-length entries are fine
 * @param durationMinutes - Minimum slot length, a positive integer
 * @param now - When given, searching starts no earlier than this
 * @returns Free intervals in chronological order; empty when the day is fully booked
 * @throws InvalidArgumentError for a malformed window, duration or `now`
 *
 * @example
 * ```typescript
 * const slots = findFreeSlots(
 *   { day: '2025-01-06', startHour: 9, endHour: 17, timezone: 'UTC' },
 *   [
 *     { start: new Date('2025-01-06T09:00:00Z'), end: new Date('2025-01-06T10:00:00Z') },
 *     { start: new Date('2025-01-06T12:00:00Z'), end: new Date('2025-01-06T13:00:00Z') },
 *   ],
 *   60,
 * );
 * // Result: [
 * //   { start: 2025-01-06T10:00:00Z, end: 2025-01-06T12:00:00Z },
 * //   { start: 2025-01-06T13:00:00Z, end: 2025-01-06T17:00:00Z }
 * // ]
 * ```
 */
export function findFreeSlots(
	window: WorkingWindow,
	busy: Interval[],
	durationMinutes: number,
	now?: Date,
): Interval[] {
	const bounds = resolveWorkingWindow(window);
	validateDuration(durationMinutes);
	if (now !== undefined) {
		validateInstant(now, 'now');
	}

	const duration = durationMinutes * MS_PER_MINUTE;
	const windowEnd = bounds.end.getTime();
	let cursor = Math.max(bounds.start.getTime(), now?.getTime() ?? -Infinity);

	if (cursor >= windowEnd) {
		return [];
	}

	const sorted = sortIntervals(clipIntervals(busy, { start: new Date(cursor), end: bounds.end }));
	const slots: Interval[] = [];

	for (const interval of sorted) {
		const busyStart = interval.start.getTime();
		if (cursor + duration <= busyStart) {
			slots.push({ start: new Date(cursor), end: new Date(busyStart) });
		}
		cursor = Math.max(cursor, interval.end.getTime());
	}

	if (cursor + duration <= windowEnd) {
		slots.push({ start: new Date(cursor), end: new Date(windowEnd) });
	}

	return slots;
}
