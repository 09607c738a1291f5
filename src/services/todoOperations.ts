import * as l10n from '@vscode/l10n';

import { describeError, TooLongError } from '../errors';
import { HandlerContext } from '../types/handlerContext';
import { buildWebviewStateSnapshot, EmptyStateHints } from '../webviewState';

/**
 * Adds a todo from the window entry. Accepted text clears the entry; rejected text keeps it and
 * explains why in a toast.
 *
 * @param context - Handler context containing the model, host and toast coordinator.
 * @param text - Text submitted from the entry.
 * @returns True if the todo was added.
 */
export function addTodo(context: HandlerContext, text: string): boolean {
	const result = context.model.add(text);
	if (!result.ok) {
		const message =
			result.error instanceof TooLongError
				? l10n.t('toast.tooLong', result.error.maxLength)
				: l10n.t('toast.empty');
		context.toast.show(message);
		return false;
	}
	context.webviewHost.postMessage({ type: 'clearInput' });
	reportSaveError(context, result.saveError);
	return true;
}

/**
 * Completes, and therefore permanently removes, the todo the window shows at `index`. A row whose
 * text no longer matches the list is stale: nothing is removed and the window gets fresh state.
 *
 * @param context - Handler context containing the model and host.
 * @param index - Row index reported by the window.
 * @param text - Row text the window rendered at `index`.
 * @returns True if a todo was removed.
 */
export function completeTodo(context: HandlerContext, index: number, text: string): boolean {
	const result = matchesRow(context, index, text) ? context.model.removeAt(index) : undefined;
	if (!result || !result.ok) {
		context.logger.warn('Ignoring completion of a stale row', { index, length: context.model.length });
		broadcastWebviewState(context);
		return false;
	}
	reportSaveError(context, result.saveError);
	return true;
}

/**
 * Copies the text of the todo at `index` to the clipboard and confirms with a toast. A stale row
 * is answered with fresh state instead of copying whatever now sits at `index`.
 *
 * @param context - Handler context containing the model and clipboard writer.
 * @param index - Row index reported by the window.
 * @param text - Row text the window rendered at `index`.
 * @returns True if the clipboard was written.
 */
export async function copyTodo(context: HandlerContext, index: number, text: string): Promise<boolean> {
	if (!matchesRow(context, index, text)) {
		context.logger.warn('Ignoring copy of a stale row', { index, length: context.model.length });
		broadcastWebviewState(context);
		return false;
	}
	try {
		await context.clipboardWriteText(text);
	} catch (error) {
		const reason = describeError(error);
		context.logger.error('Clipboard write failed', { error: reason });
		context.toast.show(l10n.t('toast.copyFailed', reason));
		return false;
	}
	context.toast.show(l10n.t('toast.copied'));
	return true;
}

/**
 * Sends the current list to the window.
 *
 * @param context - Handler context supplying the model and host.
 * @param emptyStateHints - Optional hint choosing the empty-state copy.
 */
export function broadcastWebviewState(
	context: Pick<HandlerContext, 'model' | 'webviewHost'>,
	emptyStateHints: EmptyStateHints = {}
): void {
	const snapshot = buildWebviewStateSnapshot(context.model.todos, emptyStateHints);
	context.webviewHost.postMessage({ type: 'stateUpdate', payload: snapshot });
}

function matchesRow(context: HandlerContext, index: number, text: string): boolean {
	return context.model.at(index)?.text === text;
}

/** Surfaces a failed write-through so the change is not lost silently. */
function reportSaveError(context: HandlerContext, saveError: Error | undefined): void {
	if (!saveError) {
		return;
	}
	context.logger.error('Saving todos failed', { error: saveError.message });
	context.toast.show(l10n.t('toast.saveFailed', saveError.message));
}
