/**
 * Environment-driven defaults for working windows, time zone and logging.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface FreeslotConfig {
	nodeEnv: 'development' | 'test' | 'production';
	logLevel: LogLevel;
	/** IANA time zone used when a request does not name one */
	timezone: string;
	workStartHour: number;
	workEndHour: number;
	defaultDurationMinutes: number;
}

/**
 * Checks an IANA time zone identifier against the runtime's tz database.
 */
export function isValidTimeZone(timezone: string): boolean {
	if (timezone.length === 0) {
		return false;
	}
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: timezone });
		return true;
	} catch {
		return false;
	}
}

const blankToUndefined = (value: unknown) =>
	typeof value === 'string' && value.trim() === '' ? undefined : value;

const hour = (fallback: number) =>
	z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(23).default(fallback));

const envSchema = z
	.object({
		NODE_ENV: z.preprocess(
			blankToUndefined,
			z.enum(['development', 'test', 'production']).default('development'),
		),
		LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
		TIMEZONE: z.preprocess(
			blankToUndefined,
			z
				.string()
				.default('America/Toronto')
				.refine(isValidTimeZone, { message: 'Unknown time zone' }),
		),
		WORK_START_HOUR: hour(9),
		WORK_END_HOUR: hour(17),
		DEFAULT_DURATION_MINUTES: z.preprocess(
			blankToUndefined,
			z.coerce.number().int().positive().default(60),
		),
	})
	.refine((env) => env.WORK_START_HOUR < env.WORK_END_HOUR, {
		message: 'WORK_END_HOUR must be after WORK_START_HOUR',
		path: ['WORK_END_HOUR'],
	});

/**
 * Reads configuration from an environment map.
 *
 * @throws ConfigError listing every failing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FreeslotConfig {
	const parsed = envSchema.safeParse(env);

	if (!parsed.success) {
		const fields: Record<string, string[]> = {};
		for (const issue of parsed.error.issues) {
			const key = issue.path.length > 0 ? issue.path.join('.') : 'env';
			(fields[key] ??= []).push(issue.message);
		}
		throw new ConfigError(fields);
	}

	const data = parsed.data;
	return {
		nodeEnv: data.NODE_ENV,
		logLevel: data.LOG_LEVEL,
		timezone: data.TIMEZONE,
		workStartHour: data.WORK_START_HOUR,
		workEndHour: data.WORK_END_HOUR,
		defaultDurationMinutes: data.DEFAULT_DURATION_MINUTES,
	};
}
