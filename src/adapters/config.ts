import { z } from 'zod';

import { ConfigError } from '../errors';
import { LOG_LEVELS, LogLevel } from '../logger';

/** Runtime configuration read from `TODO_TRAY_*` environment variables. */
export interface TodoConfig {
	dataFile: string;
	iconFile: string;
	host: string;
	port: number;
	toastDurationMs: number;
	locale: string;
	logLevel: LogLevel;
	openOnStart: boolean;
}

const booleanFlag = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform((value) => value === 'true' || value === '1' || value === 'yes');

const ConfigSchema = z.object({
	TODO_TRAY_DATA_FILE: z.string().min(1).default('todo.json'),
	TODO_TRAY_ICON_FILE: z.string().min(1).default('tray.png'),
	TODO_TRAY_HOST: z.string().min(1).default('127.0.0.1'),
	TODO_TRAY_PORT: z.coerce.number().int().min(0).max(65_535).default(0),
	TODO_TRAY_TOAST_MS: z.coerce.number().int().min(0).default(2_000),
	TODO_TRAY_LOCALE: z.string().min(1).default('en'),
	TODO_TRAY_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	TODO_TRAY_OPEN_ON_START: booleanFlag.default('false'),
});

/**
 * Reads the configuration, applying defaults for unset variables.
 *
 * @param env - Environment to read; defaults to the process environment.
 * @returns Normalized configuration.
 * @throws ConfigError when a variable is set to an invalid value.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): TodoConfig {
	const result = ConfigSchema.safeParse(withoutBlankValues(env));
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new ConfigError(`Invalid configuration: ${details}`);
	}
	const values = result.data;
	return {
		dataFile: values.TODO_TRAY_DATA_FILE,
		iconFile: values.TODO_TRAY_ICON_FILE,
		host: values.TODO_TRAY_HOST,
		port: values.TODO_TRAY_PORT,
		toastDurationMs: values.TODO_TRAY_TOAST_MS,
		locale: values.TODO_TRAY_LOCALE.toLowerCase(),
		logLevel: values.TODO_TRAY_LOG_LEVEL,
		openOnStart: values.TODO_TRAY_OPEN_ON_START,
	};
}

/** Treats `VAR=` the same as an unset variable so defaults still apply. */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
	const entries = Object.entries(env).filter(
		(entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== ''
	);
	return Object.fromEntries(entries.map(([key, value]) => [key, value.trim()]));
}
