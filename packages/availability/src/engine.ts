/**
 * Availability engine with adapter-based data loading.
 */

import { createLogger, invalidArgumentFromZod, loadConfig } from '@freeslot/core';
import type { DateRange, FreeslotConfig, Logger } from '@freeslot/core';
import { addDays, format, parseISO } from 'date-fns';
import { z } from 'zod';
import { buildBusyFromEvents } from './helpers.js';
import { findFreeSlots } from './slots.js';
import type {
	AvailabilityAdapter,
	AvailabilityEngine,
	CalendarDay,
	CreateAvailabilityOptions,
	DaySlots,
	FreeSlotsAheadQuery,
	FreeSlotsQuery,
	Interval,
	WorkingHoursOptions,
	WorkingWindow,
} from './types.js';
import {
	resolveWorkingWindow,
	toCalendarDay,
	validateDuration,
	validateInstant,
} from './window.js';

/** Upper bound on a multi-day search */
const MAX_DAYS_AHEAD = 60;

const daysSchema = z.number().int().min(1).max(MAX_DAYS_AHEAD);

function buildWindow(day: CalendarDay | Date, options: WorkingHoursOptions, config: FreeslotConfig): WorkingWindow {
	return {
		day,
		startHour: options.startHour ?? config.workStartHour,
		endHour: options.endHour ?? config.workEndHour,
		timezone: options.timezone ?? config.timezone,
	};
}

/**
 * Lists `count` consecutive calendar days starting at `first`.
 */
function consecutiveDays(first: CalendarDay, count: number): CalendarDay[] {
	const anchor = parseISO(first);
	return Array.from({ length: count }, (_, offset) => format(addDays(anchor, offset), 'yyyy-MM-dd'));
}

async function loadBusy(
	adapter: AvailabilityAdapter,
	range: DateRange,
	timezone: string,
	logger: Logger,
): Promise<Interval[]> {
	try {
		const events = await adapter.getEvents({ range, timezone });
		return buildBusyFromEvents(events);
	} catch (error) {
		logger.error('Failed to load calendar events', {
			error,
			rangeStart: range.start.toISOString(),
			rangeEnd: range.end.toISOString(),
		});
		throw error;
	}
}

/**
 * Create an availability engine with the given adapter.
 *
 * Request context (adapter, configuration, logger) is bound here and passed
 * down explicitly, so engines for different users never share state.
 *
 * @example
 * ```typescript
 * const availability = createAvailability({ adapter: googleCalendarAdapter(credentials) });
 * const slots = await availability.findFreeSlots({ day: '2025-01-06', durationMinutes: 30 });
 * ```
 */
export function createAvailability(options: CreateAvailabilityOptions): AvailabilityEngine {
	const { adapter } = options;
	const config = options.config ?? loadConfig();
	const logger =
		options.logger ??
		createLogger({
			level: config.logLevel,
			service: 'availability',
			json: config.nodeEnv === 'production',
			silent: config.nodeEnv === 'test',
		});

	async function findFreeSlotsForDay(query: FreeSlotsQuery): Promise<Interval[]> {
		const window = buildWindow(query.day, query, config);
		const durationMinutes = query.durationMinutes ?? config.defaultDurationMinutes;

		// Validate before touching the calendar
		const bounds = resolveWorkingWindow(window);
		validateDuration(durationMinutes);
		if (query.at) {
			validateInstant(query.at, 'at');
		}

		const busy = await loadBusy(adapter, bounds, window.timezone, logger);
		const slots = findFreeSlots(window, busy, durationMinutes, query.at);

		logger.debug('Computed free slots', {
			day: toCalendarDay(window.day, window.timezone),
			timezone: window.timezone,
			durationMinutes,
			busy: busy.length,
			slots: slots.length,
		});

		return slots;
	}

	async function findFreeSlotsAhead(query: FreeSlotsAheadQuery): Promise<DaySlots[]> {
		const parsedDays = daysSchema.safeParse(query.days);
		if (!parsedDays.success) {
			throw invalidArgumentFromZod(parsedDays.error, 'days');
		}

		const from = query.from ?? new Date();
		validateInstant(from, 'from');
		const durationMinutes = query.durationMinutes ?? config.defaultDurationMinutes;
		validateDuration(durationMinutes);

		const timezone = query.timezone ?? config.timezone;
		const firstWindow = buildWindow(from, query, config);
		resolveWorkingWindow(firstWindow);

		// Days whose working hours are already over have nothing to offer
		const candidates = consecutiveDays(toCalendarDay(from, timezone), parsedDays.data)
			.map((day) => {
				const window = buildWindow(day, query, config);
				return { day, window, bounds: resolveWorkingWindow(window) };
			})
			.filter(({ bounds }) => bounds.end > from);

		const first = candidates[0];
		const last = candidates[candidates.length - 1];
		if (!first || !last) {
			return [];
		}

		const busy = await loadBusy(
			adapter,
			{ start: first.bounds.start, end: last.bounds.end },
			timezone,
			logger,
		);

		const results: DaySlots[] = [];
		for (const { day, window } of candidates) {
			const slots = findFreeSlots(window, busy, durationMinutes, from);
			if (slots.length > 0) {
				results.push({ day, slots });
			}
		}

		logger.debug('Computed free slots ahead', {
			from: from.toISOString(),
			days: parsedDays.data,
			timezone,
			durationMinutes,
			busy: busy.length,
			daysWithSlots: results.length,
		});

		return results;
	}

	return {
		findFreeSlots: findFreeSlotsForDay,
		findFreeSlotsAhead,
	};
}
