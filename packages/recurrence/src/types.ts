/**
 * Recurrence Type Definitions
 *
 * Descriptors name a date that repeats every year, either a fixed day of a
 * month or the Nth weekday of a month. Resolving one against a year yields a
 * concrete CalendarDate, or nothing when that date does not exist that year.
 */

/**
 * Day of the week as JavaScript's getDay() counts it (0 = Sunday, 6 = Saturday).
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * The same calendar day every year.
 *
 * @example
 * const birthday: FixedDate = { kind: 'fixed', month: 1, day: 21 };
 */
export interface FixedDate {
	kind: 'fixed';
	/** 1-12 */
	month: number;
	/** 1-31 */
	day: number;
}

/**
 * The Nth occurrence of a weekday in a month.
 *
 * @example
 * // Third Sunday of June
 * const fathersDay: FloatingDate = { kind: 'floating', month: 6, ordinal: 3, weekday: 0 };
 */
export interface FloatingDate {
	kind: 'floating';
	/** 1-12 */
	month: number;
	/** 1-5 */
	ordinal: number;
	weekday: Weekday;
}

export type RecurrenceDescriptor = FixedDate | FloatingDate;

/**
 * A calendar date without time or zone.
 */
export interface CalendarDate {
	year: number;
	/** 1-12 */
	month: number;
	/** 1-31 */
	day: number;
}

/**
 * A named recurring date as stored by the caller, e.g. `{ name: "Mom's Birthday", date: '01-21' }`.
 */
export interface NamedRecurrence {
	name: string;
	date: string | RecurrenceDescriptor;
}

export interface UpcomingDate {
	name: string;
	date: CalendarDate;
	/** Calendar days from the reference date; 0 means today */
	daysUntil: number;
}

export interface UpcomingDates {
	/** Sorted by date, then name */
	upcoming: UpcomingDate[];
	/** Entries whose descriptor could not be parsed or never resolves */
	unresolved: NamedRecurrence[];
}
