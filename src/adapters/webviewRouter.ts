import { addTodo, broadcastWebviewState, completeTodo, copyTodo } from '../services/todoOperations';
import { Disposable } from '../types';
import { HandlerContext } from '../types/handlerContext';
import { WebviewMessageEvent } from '../types/webviewMessages';

/**
 * Routes incoming window messages to list operations. State updates after mutations are pushed by
 * the model's change subscription, not here.
 *
 * @param event - Message event from the window host.
 * @param context - Handler context containing the model and coordination utilities.
 */
export async function handleWebviewMessage(
	event: WebviewMessageEvent,
	context: HandlerContext
): Promise<void> {
	const { message } = event;
	switch (message.type) {
		case 'webviewReady':
			broadcastWebviewState(context, { list: 'onInit' });
			return;
		case 'commitCreate':
			addTodo(context, message.text);
			return;
		case 'completeTodo':
			completeTodo(context, message.index, message.text);
			return;
		case 'copyTodo':
			await copyTodo(context, message.index, message.text);
			return;
		default:
			return;
	}
}

/**
 * Keeps the window in step with the list: every model change is re-projected and pushed. A list
 * emptied by a change can only have lost its last todo, so it gets the "all done" copy.
 *
 * @param context - Handler context supplying the model and host.
 * @returns Subscription to dispose when the window host goes away.
 */
export function syncWebviewState(context: Pick<HandlerContext, 'model' | 'webviewHost'>): Disposable {
	return context.model.onDidChange((todos) =>
		broadcastWebviewState(context, todos.length === 0 ? { list: 'afterCompletion' } : {})
	);
}
