#!/usr/bin/env node
import { readConfig } from './adapters/config';
import { activate } from './app';
import { describeError } from './errors';
import { createLogger } from './logger';

async function main(): Promise<void> {
	const config = readConfig();
	const logger = createLogger(config.logLevel);
	const app = await activate({ config, logger });
	process.once('SIGINT', () => app.quit());
	process.once('SIGTERM', () => app.quit());
}

main().catch((error: unknown) => {
	console.error(`todo-tray: ${describeError(error)}`);
	process.exit(1);
});
