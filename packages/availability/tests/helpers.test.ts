import { describe, expect, test } from 'vitest';
import {
	buildBusyFromEvents,
	buildBusyFromFreebusy,
	formatSlot,
	slotDurationMinutes,
} from '../src/helpers.js';
import type { CalendarEvent, FreeBusyResponse } from '../src/types.js';

const d = (iso: string) => new Date(iso);

describe('buildBusyFromEvents', () => {
	test('converts timed events to intervals', () => {
		const events: CalendarEvent[] = [
			{
				summary: 'Standup',
				start: { dateTime: '2025-01-06T09:00:00Z' },
				end: { dateTime: '2025-01-06T09:15:00Z' },
			},
			{
				summary: 'Design review',
				start: { dateTime: '2025-01-06T10:00:00-05:00', timeZone: 'America/Toronto' },
				end: { dateTime: '2025-01-06T11:00:00-05:00', timeZone: 'America/Toronto' },
			},
		];

		expect(buildBusyFromEvents(events)).toEqual([
			{ start: d('2025-01-06T09:00:00Z'), end: d('2025-01-06T09:15:00Z') },
			{ start: d('2025-01-06T15:00:00Z'), end: d('2025-01-06T16:00:00Z') },
		]);
	});

	test('never treats all-day events as busy', () => {
		const events: CalendarEvent[] = [
			{ summary: "Mom's Birthday", start: { date: '2025-01-06' }, end: { date: '2025-01-07' } },
		];

		expect(buildBusyFromEvents(events)).toEqual([]);
	});

	test('skips events with unparseable or empty times', () => {
		const events: CalendarEvent[] = [
			{ start: { dateTime: 'soon' }, end: { dateTime: '2025-01-06T10:00:00Z' } },
			{ start: { dateTime: '2025-01-06T10:00:00Z' }, end: { dateTime: '2025-01-06T10:00:00Z' } },
			{ start: { dateTime: '2025-01-06T10:00:00Z' }, end: {} },
		];

		expect(buildBusyFromEvents(events)).toEqual([]);
	});
});

describe('buildBusyFromFreebusy', () => {
	test('flattens busy periods from every calendar', () => {
		const freebusy: FreeBusyResponse = {
			calendars: {
				primary: {
					busy: [{ start: '2025-01-06T10:00:00Z', end: '2025-01-06T11:00:00Z' }],
				},
				work: {
					busy: [{ start: d('2025-01-06T14:00:00Z'), end: d('2025-01-06T15:30:00Z') }],
				},
			},
		};

		expect(buildBusyFromFreebusy(freebusy)).toEqual([
			{ start: d('2025-01-06T10:00:00Z'), end: d('2025-01-06T11:00:00Z') },
			{ start: d('2025-01-06T14:00:00Z'), end: d('2025-01-06T15:30:00Z') },
		]);
	});

	test('returns empty for a response without busy time', () => {
		expect(buildBusyFromFreebusy({ calendars: { primary: { busy: [] } } })).toEqual([]);
	});

	test('copies Date inputs instead of sharing them', () => {
		const start = d('2025-01-06T14:00:00Z');
		const [interval] = buildBusyFromFreebusy({
			calendars: { primary: { busy: [{ start, end: d('2025-01-06T15:00:00Z') }] } },
		});

		expect(interval?.start).toEqual(start);
		expect(interval?.start).not.toBe(start);
	});
});

describe('slotDurationMinutes', () => {
	test('counts whole minutes', () => {
		expect(slotDurationMinutes({ start: d('2025-01-06T10:00:00Z'), end: d('2025-01-06T12:00:00Z') })).toBe(120);
		expect(slotDurationMinutes({ start: d('2025-01-06T10:00:00Z'), end: d('2025-01-06T10:00:59Z') })).toBe(0);
	});
});

describe('formatSlot', () => {
	test('renders a 12-hour range in the given timezone', () => {
		const slot = { start: d('2025-01-06T15:00:00Z'), end: d('2025-01-06T17:30:00Z') };

		expect(formatSlot(slot, 'UTC')).toBe('3:00 PM - 5:30 PM');
		expect(formatSlot(slot, 'America/Toronto')).toBe('10:00 AM - 12:30 PM');
	});
});
