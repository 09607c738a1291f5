import { EventEmitter } from 'events';

import { isValidIndex, MAX_TODO_LENGTH, validateTodoText, withoutIndex } from './domain/todo';
import { IndexError, ValidationError } from './errors';
import { TodoRepository } from './todoRepository';
import { Disposable, MutationResult, TodoItem } from './types';

const CHANGE_EVENT = 'change';

/** Persistence port used by the model; satisfied by {@link TodoRepository}. */
export type TodoStore = Pick<TodoRepository, 'save'>;

/** Listener notified with a copy of the list after each successful mutation. */
export type TodoListListener = (todos: TodoItem[]) => void;

/**
 * Owns the in-memory todo list for the lifetime of the process. Mutations validate first, write
 * through to the store, then notify listeners so the view can re-derive its rows.
 */
export class TodoListModel implements Disposable {
	private items: TodoItem[];
	private readonly emitter = new EventEmitter();

	constructor(
		private readonly store: TodoStore,
		initial: readonly TodoItem[] = [],
		private readonly maxLength: number = MAX_TODO_LENGTH
	) {
		this.items = initial.map((todo) => ({ text: todo.text }));
	}

	/** Copy of the current list in display order. */
	get todos(): TodoItem[] {
		return this.items.map((todo) => ({ ...todo }));
	}

	get length(): number {
		return this.items.length;
	}

	/**
	 * Appends a todo after validating it.
	 *
	 * @param text - Text entered by the user.
	 * @returns The validation failure, or success with an optional save failure.
	 */
	add(text: string): MutationResult<ValidationError> {
		const invalid = validateTodoText(text, this.maxLength);
		if (invalid) {
			return { ok: false, error: invalid };
		}
		return this.commit([...this.items, { text }]);
	}

	/**
	 * Removes the todo at `index`; later todos move up by one.
	 *
	 * @param index - Zero-based position of the todo.
	 */
	removeAt(index: number): MutationResult<IndexError> {
		if (!isValidIndex(this.items, index)) {
			return { ok: false, error: new IndexError(index, this.items.length) };
		}
		return this.commit(withoutIndex(this.items, index));
	}

	/**
	 * Reads the todo at `index` without mutating anything.
	 *
	 * @param index - Zero-based position of the todo.
	 */
	at(index: number): TodoItem | undefined {
		return isValidIndex(this.items, index) ? { ...this.items[index] } : undefined;
	}

	/**
	 * Subscribes to list changes.
	 *
	 * @param listener - Callback receiving a copy of the new list.
	 * @returns Subscription that detaches the listener when disposed.
	 */
	onDidChange(listener: TodoListListener): Disposable {
		this.emitter.on(CHANGE_EVENT, listener);
		return { dispose: () => this.emitter.off(CHANGE_EVENT, listener) };
	}

	dispose(): void {
		this.emitter.removeAllListeners();
	}

	/**
	 * Replaces the list, persists it and notifies listeners. A failed save keeps the new list in
	 * memory and is reported through `saveError`.
	 */
	private commit(next: TodoItem[]): MutationResult<never> {
		this.items = next;
		let saveError: Error | undefined;
		try {
			this.store.save(this.items);
		} catch (error) {
			saveError = error instanceof Error ? error : new Error(String(error));
		}
		this.emitter.emit(CHANGE_EVENT, this.todos);
		return saveError ? { ok: true, saveError } : { ok: true };
	}
}
