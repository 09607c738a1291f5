/** Error taxonomy shared by the store, the list model and the configuration loader. */

export class TodoError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly recoverable: boolean = true
	) {
		super(message);
		this.name = 'TodoError';
	}
}

/** Reading or writing a file on disk failed. */
export class IOError extends TodoError {
	constructor(
		message: string,
		public readonly path: string
	) {
		super(message, 'IO_ERROR', true);
		this.name = 'IOError';
	}
}

/** The persisted todo file exists but does not hold a list of todos. */
export class DeserializationError extends TodoError {
	constructor(
		message: string,
		public readonly path: string
	) {
		super(message, 'DESERIALIZATION_ERROR', false);
		this.name = 'DeserializationError';
	}
}

export type ValidationReason = 'empty' | 'tooLong';

/** User input was rejected before it reached the list. */
export class ValidationError extends TodoError {
	constructor(
		message: string,
		public readonly reason: ValidationReason
	) {
		super(message, 'VALIDATION_ERROR', true);
		this.name = 'ValidationError';
	}
}

export class EmptyTodoError extends ValidationError {
	constructor() {
		super('Todo text must not be empty', 'empty');
		this.name = 'EmptyTodoError';
	}
}

export class TooLongError extends ValidationError {
	constructor(
		public readonly length: number,
		public readonly maxLength: number
	) {
		super(`Todo text is ${length} characters long; the limit is ${maxLength}`, 'tooLong');
		this.name = 'TooLongError';
	}
}

/** A removal addressed a position outside the list. */
export class IndexError extends TodoError {
	constructor(
		public readonly index: number,
		public readonly length: number
	) {
		super(`Index ${index} is out of range for a list of ${length}`, 'INDEX_ERROR', true);
		this.name = 'IndexError';
	}
}

export class ConfigError extends TodoError {
	constructor(message: string) {
		super(message, 'CONFIG_ERROR', false);
		this.name = 'ConfigError';
	}
}

/**
 * Renders an unknown thrown value as a single-line message for logs and toasts.
 *
 * @param error - Value caught from a failed operation.
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
