import winston from 'winston';

export type Logger = winston.Logger;

export interface CreateLoggerOptions {
	/** winston level; defaults to "info" */
	level?: string;
	/** Added to every entry as `service` */
	service?: string;
	/** JSON lines instead of colorized text */
	json?: boolean;
	/** Drop all output (tests) */
	silent?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const { level = 'info', service = 'freeslot', json = false, silent = false } = options;

	return winston.createLogger({
		level,
		silent,
		format: winston.format.combine(
			winston.format.timestamp(),
			winston.format.errors({ stack: true }),
			json
				? winston.format.json()
				: winston.format.combine(winston.format.colorize(), winston.format.simple()),
		),
		defaultMeta: { service },
		transports: [new winston.transports.Console()],
	});
}
