/** Severity levels understood by the console logger, lowest first. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean | null | undefined>;

/** Structured logger handed to services so they never write to the console directly. */
export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
}

/** Destination for formatted lines; defaults to the process console. */
export interface LogSink {
	log(line: string): void;
	error(line: string): void;
}

/**
 * Creates a logger that prints `[level] message key=value` lines and drops anything below
 * `minimum`. Warnings and errors go to stderr.
 *
 * @param minimum - Lowest level that is printed.
 * @param sink - Output target, replaced in tests.
 */
export function createLogger(minimum: LogLevel = 'info', sink: LogSink = console): Logger {
	const threshold = LOG_LEVELS.indexOf(minimum);
	const write = (level: LogLevel, message: string, fields?: LogFields): void => {
		if (LOG_LEVELS.indexOf(level) < threshold) {
			return;
		}
		const line = `[${level}] ${message}${formatFields(fields)}`;
		if (level === 'warn' || level === 'error') {
			sink.error(line);
		} else {
			sink.log(line);
		}
	};
	return {
		debug: (message, fields) => write('debug', message, fields),
		info: (message, fields) => write('info', message, fields),
		warn: (message, fields) => write('warn', message, fields),
		error: (message, fields) => write('error', message, fields),
	};
}

function formatFields(fields?: LogFields): string {
	if (!fields) {
		return '';
	}
	const parts = Object.entries(fields)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${typeof value === 'string' ? JSON.stringify(value) : String(value)}`);
	return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}
