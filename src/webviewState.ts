import * as l10n from '@vscode/l10n';

import { MAX_TODO_LENGTH } from './domain/todo';
import { TodoItem } from './types';

/** Serialized snapshot the window consumes to render the list. */
export interface WebviewStateSnapshot {
	generatedAt: string;
	title: string;
	emptyLabel: string;
	maxLength: number;
	rows: WebviewTodoRow[];
	strings: WebviewStrings;
}

/** A single rendered row; `index` addresses the todo in completion and copy requests. */
export interface WebviewTodoRow {
	index: number;
	text: string;
}

/** Bundle of localized strings used in the UI. */
export interface WebviewStrings {
	addPlaceholder: string;
	completeLabel: string;
	copyLabel: string;
	/** Shown when a newer window took over this one. */
	replacedLabel: string;
}

/** Context that influences which empty-state copy should be used. */
export type EmptyStateKind = 'general' | 'onInit' | 'afterCompletion';

/** Optional hint to select the empty-state copy. */
export interface EmptyStateHints {
	list?: EmptyStateKind;
}

/**
 * Projects the todo list into the rows and localized strings the window renders. Pure apart from
 * the timestamp; nothing is cached between calls.
 *
 * @param todos - Current list in display order.
 * @param emptyStateHints - Optional hint choosing the empty-state copy.
 * @param maxLength - Length limit shown in the entry placeholder.
 * @returns A snapshot ready to send to the window.
 */
export function buildWebviewStateSnapshot(
	todos: readonly TodoItem[],
	emptyStateHints: EmptyStateHints = {},
	maxLength: number = MAX_TODO_LENGTH
): WebviewStateSnapshot {
	return {
		generatedAt: new Date().toISOString(),
		title: l10n.t('app.title'),
		emptyLabel: pickEmptyLabel(emptyStateHints.list ?? 'general'),
		maxLength,
		rows: todos.map((todo, index) => toTodoRow(todo, index)),
		strings: {
			addPlaceholder: l10n.t('webview.input.placeholder', maxLength),
			completeLabel: l10n.t('webview.todo.complete'),
			copyLabel: l10n.t('webview.todo.copy'),
			replacedLabel: l10n.t('webview.replaced'),
		},
	};
}

function toTodoRow(todo: TodoItem, index: number): WebviewTodoRow {
	return { index, text: todo.text };
}

function pickEmptyLabel(kind: EmptyStateKind): string {
	switch (kind) {
		case 'onInit':
			return l10n.t('webview.empty.onInit');
		case 'afterCompletion':
			return l10n.t('webview.empty.afterCompletion');
		default:
			return l10n.t('webview.empty.general');
	}
}
