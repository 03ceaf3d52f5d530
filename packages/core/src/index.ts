/**
 * freeslot core
 *
 * Shared time primitives, errors, logging and configuration for freeslot packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * A date range for querying time-bounded data.
 * Semantically identical to Interval.
 */
export interface DateRange {
	start: Date;
	end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

export { ConfigError, InvalidArgumentError, invalidArgumentFromZod } from './errors.js';
export { createLogger, type CreateLoggerOptions, type Logger } from './logger.js';
export { isValidTimeZone, loadConfig, type FreeslotConfig, type LogLevel } from './config.js';
