import * as l10n from '@vscode/l10n';
import clipboardy from 'clipboardy';
import open from 'open';

import { buildTrayMenu, registerCommands } from './adapters/commandRouter';
import { TodoConfig } from './adapters/config';
import { handleWebviewMessage, syncWebviewState } from './adapters/webviewRouter';
import { describeError } from './errors';
import { loadLocalization } from './localization';
import { createLogger, Logger } from './logger';
import { ToastCoordinator } from './services/toastService';
import { TodoListModel } from './todoListModel';
import { TodoRepository } from './todoRepository';
import { TodoWebviewHost } from './todoWebviewHost';
import { ensureIconFile } from './trayIcon';
import { readTrayIcon, SystemTrayHost, TrayHost, TrayMenu } from './trayHost';
import { Disposable, TodoItem } from './types';
import { HandlerContext } from './types/handlerContext';

/** Collaborators the bootstrap creates by default; tests replace the ones that touch the desktop. */
export interface ActivationOptions {
	config: TodoConfig;
	logger?: Logger;
	createTray?: (menu: TrayMenu) => TrayHost;
	openExternal?: (url: string) => Promise<unknown>;
	clipboardWriteText?: (value: string) => Promise<void>;
	/** Called after `quit` has torn everything down. */
	exit?: (code: number) => void;
}

/** Running application returned by {@link activate}. */
export interface TodoApp extends Disposable {
	readonly model: TodoListModel;
	readonly webviewHost: TodoWebviewHost;
	/** Shows or focuses the todo window. */
	open(): Promise<void>;
	/** Tears everything down and exits the process. */
	quit(): void;
}

/**
 * Startup entry point: loads localization and the persisted list, then wires the window host, the
 * tray and their handlers. A list that cannot be loaded aborts startup.
 *
 * @param options - Configuration and replaceable collaborators.
 * @throws IOError or DeserializationError when the persisted list cannot be loaded.
 */
export async function activate(options: ActivationOptions): Promise<TodoApp> {
	const { config } = options;
	const logger = options.logger ?? createLogger(config.logLevel);
	const bundlePath = await loadLocalization(config.locale);
	logger.debug('Localization loaded', { bundle: bundlePath });

	const repository = new TodoRepository({ dataFile: config.dataFile });
	let initialTodos: TodoItem[];
	try {
		initialTodos = repository.load();
	} catch (error) {
		logger.error('Cannot load the todo list', { file: repository.filePath, error: describeError(error) });
		throw error;
	}
	const iconPath = ensureIconFile(config.iconFile);

	const subscriptions: Disposable[] = [];
	const model = new TodoListModel(repository, initialTodos);
	const webviewHost = new TodoWebviewHost({
		host: config.host,
		port: config.port,
		title: l10n.t('app.title'),
		logger,
		openExternal: options.openExternal ?? ((url) => open(url)),
	});
	const toast = new ToastCoordinator((message) => webviewHost.postMessage(message), {
		logger,
		durationMs: config.toastDurationMs,
	});
	const handlerContext: HandlerContext = {
		model,
		webviewHost,
		toast,
		logger,
		clipboardWriteText: options.clipboardWriteText ?? ((value) => clipboardy.write(value)),
	};

	subscriptions.push(
		syncWebviewState(handlerContext),
		webviewHost.onDidReceiveMessage((event) => {
			handleWebviewMessage(event, handlerContext).catch((error: unknown) =>
				logger.error('Window message failed', { type: event.message.type, error: describeError(error) })
			);
		}),
		webviewHost.onDidDisconnect(() => toast.cancel())
	);

	const url = await webviewHost.start();
	const tray = (options.createTray ?? ((menu: TrayMenu) => new SystemTrayHost(menu, logger)))(
		buildTrayMenu(readTrayIcon(iconPath))
	);

	let disposed = false;
	const dispose = (): void => {
		if (disposed) {
			return;
		}
		disposed = true;
		subscriptions.reverse().forEach((subscription) => subscription.dispose());
		toast.dispose();
		webviewHost.dispose();
		model.dispose();
		tray.dispose();
	};

	const app: TodoApp = {
		model,
		webviewHost,
		open: () => webviewHost.show(),
		quit: () => {
			logger.info('Quitting');
			dispose();
			(options.exit ?? ((code: number) => process.exit(code)))(0);
		},
		dispose,
	};

	subscriptions.push(
		registerCommands({
			tray,
			handlers: { 'todo.open': app.open, 'todo.quit': app.quit },
			logger,
		})
	);
	await tray.start();

	logger.info(l10n.t('app.startedLog'), { todos: model.length, url, data: repository.filePath });
	if (config.openOnStart) {
		await app.open();
	}
	return app;
}
