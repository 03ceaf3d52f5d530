/**
 * Availability Type Definitions
 *
 * All intervals are half-open: [start, end)
 * All times are UTC internally; a working window names the one time zone
 * its hours are read in.
 */

import type { DateRange, FreeslotConfig, Interval, Logger } from '@freeslot/core';

export type { DateRange, Interval };

/**
 * A calendar date in YYYY-MM-DD format.
 *
 * @example "2025-03-14"
 */
export type CalendarDay = string;

/**
 * The bounds within which free slots are searched: whole hours on one day,
 * read in the given time zone.
 *
 * @example
 * const window: WorkingWindow = {
 *   day: '2025-03-14',
 *   startHour: 9,
 *   endHour: 17,
 *   timezone: 'America/Toronto'
 * };
 */
export interface WorkingWindow {
	/** The day to search; a Date is read as its calendar date in `timezone` */
	day: CalendarDay | Date;
	/** First working hour, 0-23 (inclusive) */
	startHour: number;
	/** Hour the working day ends, 0-23; must be after startHour */
	endHour: number;
	/** IANA timezone identifier */
	timezone: string;
}

/**
 * Start or end of a calendar-provider event.
 * Timed events carry `dateTime`; all-day events carry only `date`.
 */
export interface EventTime {
	/** RFC 3339 timestamp for timed events */
	dateTime?: string;
	/** YYYY-MM-DD for all-day events */
	date?: string;
	timeZone?: string;
}

/**
 * An event as returned by the calendar provider's event listing.
 *
 * @example
 * const standup: CalendarEvent = {
 *   id: 'evt-1',
 *   summary: 'Standup',
 *   start: { dateTime: '2025-03-14T09:00:00-04:00' },
 *   end: { dateTime: '2025-03-14T09:15:00-04:00' }
 * };
 */
export interface CalendarEvent {
	id?: string;
	summary?: string;
	start: EventTime;
	end: EventTime;
}

/**
 * Busy time period from a calendar provider.
 */
export interface BusyPeriod {
	/** Start time as ISO string or Date */
	start: string | Date;
	/** End time as ISO string or Date */
	end: string | Date;
}

/**
 * Calendar data from a freebusy response.
 */
export interface CalendarBusy {
	busy: BusyPeriod[];
}

/**
 * Response format compatible with the Google Calendar FreeBusy API.
 */
export interface FreeBusyResponse {
	/** Map of calendar ID to busy periods */
	calendars: Record<string, CalendarBusy>;
}

/**
 * Loads calendar data for the engine. Implemented by the calendar integration layer.
 */
export interface AvailabilityAdapter {
	getEvents(input: { range: DateRange; timezone: string }): Promise<CalendarEvent[]>;
}

/**
 * Working-hour overrides shared by engine queries.
 * Anything omitted falls back to the engine's configuration.
 */
export interface WorkingHoursOptions {
	durationMinutes?: number;
	startHour?: number;
	endHour?: number;
	timezone?: string;
}

/**
 * A single-day free slot query.
 */
export interface FreeSlotsQuery extends WorkingHoursOptions {
	day: CalendarDay | Date;
	/** Current time; when given, no slot starts before it */
	at?: Date;
}

/**
 * A multi-day query covering `days` calendar days starting with the day of `from`.
 */
export interface FreeSlotsAheadQuery extends WorkingHoursOptions {
	days: number;
	/** Defaults to the current time; also used as "now" for the first day */
	from?: Date;
}

/**
 * Free slots found on one calendar day.
 */
export interface DaySlots {
	day: CalendarDay;
	slots: Interval[];
}

export interface CreateAvailabilityOptions {
	adapter: AvailabilityAdapter;
	/** Defaults to loadConfig() over process.env */
	config?: FreeslotConfig;
	logger?: Logger;
}

export interface AvailabilityEngine {
	findFreeSlots(query: FreeSlotsQuery): Promise<Interval[]>;
	findFreeSlotsAhead(query: FreeSlotsAheadQuery): Promise<DaySlots[]>;
}
