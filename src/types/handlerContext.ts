import { Logger } from '../logger';
import { ToastCoordinator } from '../services/toastService';
import { TodoListModel } from '../todoListModel';
import { TodoWebviewHost } from '../todoWebviewHost';

/**
 * Shared dependencies injected into command and window handlers so lower layers never reach for
 * the tray, the browser or the clipboard directly.
 */
export interface HandlerContext {
	/** Owner of the in-memory list; writes through to the repository. */
	model: TodoListModel;
	/** Host that bridges process-side events to the window. */
	webviewHost: Pick<TodoWebviewHost, 'postMessage'>;
	/** Coordinator for transient notifications in the window. */
	toast: Pick<ToastCoordinator, 'show'>;
	logger: Logger;
	/** Clipboard writer; clipboardy in the app, a recorder in tests. */
	clipboardWriteText: (value: string) => Promise<void>;
}
