/**
 * freeslot availability
 *
 * Stateless free-slot finding for calendar assistants.
 * Given a working window, a day's busy intervals and a duration,
 * it answers the question: "When am I free?"
 *
 * @packageDocumentation
 */

// Interval arithmetic
export {
	clipIntervals,
	compareIntervals,
	intervalDuration,
	intervalsOverlap,
	mergeIntervals,
	sortIntervals,
	subtractIntervals,
} from './intervals.js';
// Working windows
export {
	resolveWorkingWindow,
	toCalendarDay,
	validateDuration,
	validateWorkingWindow,
} from './window.js';
// Main query function
export { findFreeSlots } from './slots.js';
// Calendar boundary helpers
export {
	buildBusyFromEvents,
	buildBusyFromFreebusy,
	formatSlot,
	slotDurationMinutes,
} from './helpers.js';
// Adapter-based engine
export { createAvailability } from './engine.js';

export type {
	AvailabilityAdapter,
	AvailabilityEngine,
	BusyPeriod,
	CalendarBusy,
	CalendarDay,
	CalendarEvent,
	CreateAvailabilityOptions,
	DateRange,
	DaySlots,
	EventTime,
	FreeBusyResponse,
	FreeSlotsAheadQuery,
	FreeSlotsQuery,
	Interval,
	WorkingHoursOptions,
	WorkingWindow,
} from './types.js';
