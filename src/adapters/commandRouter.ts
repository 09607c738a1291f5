import * as l10n from '@vscode/l10n';

import { describeError } from '../errors';
import { Logger } from '../logger';
import { TrayHost, TrayMenu } from '../trayHost';
import { Disposable } from '../types';

/** Commands reachable from the tray menu, in menu order. */
export const TRAY_COMMANDS = ['todo.open', 'todo.quit'] as const;

export type TrayCommandId = (typeof TRAY_COMMANDS)[number];

export type CommandHandler = () => void | Promise<void>;

/** Dependencies needed to register tray commands. */
export interface CommandRegistrationOptions {
	tray: Pick<TrayHost, 'onDidClickItem'>;
	handlers: Record<TrayCommandId, CommandHandler>;
	logger: Logger;
}

/**
 * Builds the tray menu with localized labels for each command.
 *
 * @param icon - Base64 PNG shown in the tray.
 */
export function buildTrayMenu(icon: string): TrayMenu {
	const title = l10n.t('app.title');
	return {
		icon,
		isTemplateIcon: false,
		title: '',
		tooltip: title,
		items: TRAY_COMMANDS.map((command) => ({
			title: commandLabel(command),
			tooltip: commandLabel(command),
			checked: false,
			enabled: true,
		})),
	};
}

/**
 * Routes tray clicks to command handlers. Failures are logged; a failing command never takes the
 * tray down.
 *
 * @param options - Tray, handlers and logger.
 * @returns Subscription that stops routing when disposed.
 */
export function registerCommands(options: CommandRegistrationOptions): Disposable {
	return options.tray.onDidClickItem((itemIndex) => {
		const command = TRAY_COMMANDS[itemIndex];
		if (!command) {
			options.logger.warn('Ignoring click on an unknown tray item', { itemIndex });
			return;
		}
		void runCommand(command, options);
	});
}

/**
 * Runs a command and logs its failure.
 *
 * @param command - Command identifier.
 * @param options - Registration options holding the handlers.
 */
export async function runCommand(
	command: TrayCommandId,
	options: Pick<CommandRegistrationOptions, 'handlers' | 'logger'>
): Promise<void> {
	options.logger.debug('Running command', { command });
	try {
		await options.handlers[command]();
	} catch (error) {
		options.logger.error('Command failed', { command, error: describeError(error) });
	}
}

function commandLabel(command: TrayCommandId): string {
	return command === 'todo.open' ? l10n.t('tray.open') : l10n.t('tray.quit');
}
