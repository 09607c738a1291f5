import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { DeserializationError, describeError, IOError } from './errors';
import { TodoItem } from './types';

const PersistedTodoSchema = z.object({ text: z.string() });

/** A `null` document is read as an empty list. */
const PersistedTodosSchema = z.preprocess(
	(value) => (value === null ? [] : value),
	z.array(PersistedTodoSchema)
);

/** Indentation used when writing the todo file. */
const JSON_INDENT = 2;

/** Location of the persisted list, resolved against the working directory when relative. */
export interface RepositoryContext {
	dataFile: string;
}

/**
 * Persists the todo list as a pretty-printed JSON array. Every save rewrites the whole file;
 * reads and writes are synchronous so a mutation is on disk once the call returns.
 */
export class TodoRepository {
	readonly filePath: string;

	constructor(context: RepositoryContext) {
		this.filePath = path.resolve(context.dataFile);
	}

	/**
	 * Reads the persisted list. A missing file is an empty list.
	 *
	 * @returns Todos in persisted order.
	 * @throws IOError when the file exists but cannot be read.
	 * @throws DeserializationError when the content is not a list of todos.
	 */
	load(): TodoItem[] {
		let raw: string;
		try {
			raw = fs.readFileSync(this.filePath, 'utf8');
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw new IOError(`Cannot read ${this.filePath}: ${describeError(error)}`, this.filePath);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			throw new DeserializationError(
				`${this.filePath} is not valid JSON: ${describeError(error)}`,
				this.filePath
			);
		}

		const result = PersistedTodosSchema.safeParse(parsed);
		if (!result.success) {
			const issue = result.error.issues[0];
			const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
			throw new DeserializationError(
				`${this.filePath} does not hold a todo list${where}: ${issue?.message ?? 'invalid content'}`,
				this.filePath
			);
		}
		return result.data.map((entity) => this.toTodo(entity));
	}

	/**
	 * Overwrites the file with the full list.
	 *
	 * @param todos - Todos to persist, in display order.
	 * @throws IOError when the file cannot be written.
	 */
	save(todos: readonly TodoItem[]): void {
		const payload = JSON.stringify(
			todos.map((todo) => this.toTodo(todo)),
			null,
			JSON_INDENT
		);
		try {
			fs.writeFileSync(this.filePath, payload, 'utf8');
		} catch (error) {
			throw new IOError(`Cannot write ${this.filePath}: ${describeError(error)}`, this.filePath);
		}
	}

	/** Keeps only the persisted fields so stray properties never reach the file. */
	private toTodo(entity: { text: string }): TodoItem {
		return { text: entity.text };
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
