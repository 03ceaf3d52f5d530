/**
 * freeslot recurrence
 *
 * Yearly recurring dates ("MM-DD" or "MM-Nth-weekday") resolved to concrete
 * calendar dates. Unparseable descriptors and dates that do not exist in a
 * given year come back as null, for the caller to clarify with the user.
 *
 * @packageDocumentation
 */

// Parsing
export { isValidDescriptor, parseRecurrenceDescriptor } from './parse.js';
// Resolution
export { resolveDate, resolveRecurrenceDate, validateYear } from './resolve.js';
// Occurrences
export { daysBetween, nextOccurrence, upcomingDates } from './occurrences.js';
// Formatting
export {
	describeRecurrenceDescriptor,
	formatCalendarDate,
	formatRecurrenceDescriptor,
	ordinalSuffix,
} from './format.js';

export type {
	CalendarDate,
	FixedDate,
	FloatingDate,
	NamedRecurrence,
	RecurrenceDescriptor,
	UpcomingDate,
	UpcomingDates,
	Weekday,
} from './types.js';
