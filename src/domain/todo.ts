import { EmptyTodoError, TooLongError, ValidationError } from '../errors';
import { TodoItem } from '../types';

/** Longest todo text accepted, in Unicode code points. */
export const MAX_TODO_LENGTH = 50;

/**
 * Counts Unicode code points rather than UTF-16 units, so astral characters such as emoji count
 * once.
 *
 * @param text - Text to measure.
 */
export function codePointLength(text: string): number {
	return Array.from(text).length;
}

/**
 * Checks todo text against the emptiness and length rules. Emptiness is checked first.
 *
 * @param text - Text entered by the user.
 * @param maxLength - Upper bound in code points.
 * @returns The validation failure, or undefined when the text is acceptable.
 */
export function validateTodoText(
	text: string,
	maxLength: number = MAX_TODO_LENGTH
): ValidationError | undefined {
	if (text.length === 0) {
		return new EmptyTodoError();
	}
	const length = codePointLength(text);
	if (length > maxLength) {
		return new TooLongError(length, maxLength);
	}
	return undefined;
}

/**
 * Returns a copy of the list without the item at `index`; later items shift up by one.
 *
 * @param todos - Source list, left untouched.
 * @param index - Position of the item to drop, assumed to be in range.
 */
export function withoutIndex(todos: readonly TodoItem[], index: number): TodoItem[] {
	return [...todos.slice(0, index), ...todos.slice(index + 1)];
}

/**
 * Whether `index` addresses an existing item.
 *
 * @param todos - List being addressed.
 * @param index - Candidate position.
 */
export function isValidIndex(todos: readonly TodoItem[], index: number): boolean {
	return Number.isInteger(index) && index >= 0 && index < todos.length;
}
