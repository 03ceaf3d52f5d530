import type { ZodError } from 'zod';

/**
 * Raised when a caller hands the library a value that breaks a precondition:
 * a malformed working window, a non-positive duration, an out-of-range year.
 * This signals a bug in the calling layer, not bad user data.
 */
export class InvalidArgumentError extends Error {
	constructor(
		public readonly field: string,
		message: string,
	) {
		super(message);
		this.name = 'InvalidArgumentError';
		Object.setPrototypeOf(this, InvalidArgumentError.prototype);
	}
}

export class ConfigError extends Error {
	constructor(public readonly fields: Record<string, string[]>) {
		const summary = Object.entries(fields)
			.map(([field, messages]) => `${field}: ${messages.join(', ')}`)
			.join('; ');
		super(`Invalid configuration: ${summary}`);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

/**
 * Converts the first issue of a failed zod parse into an InvalidArgumentError.
 * The issue path becomes the field; an empty path falls back to `fallbackField`.
 */
export function invalidArgumentFromZod(error: ZodError, fallbackField: string): InvalidArgumentError {
	const [issue] = error.issues;
	if (!issue) {
		return new InvalidArgumentError(fallbackField, `Invalid ${fallbackField}`);
	}
	const field = issue.path.length > 0 ? issue.path.join('.') : fallbackField;
	return new InvalidArgumentError(field, `Invalid ${field}: ${issue.message}`);
}
