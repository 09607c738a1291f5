/** Tests the in-memory list model and its write-through behaviour. */

import * as assert from 'assert';

import { EmptyTodoError, IndexError, IOError, TooLongError } from '../errors';
import { TodoListModel } from '../todoListModel';
import { TodoItem } from '../types';
import { MemoryStore } from './testUtils';

suite('TodoListModel', () => {
	test('appends valid text and saves the whole list', () => {
		const store = new MemoryStore();
		const model = new TodoListModel(store, [{ text: 'first' }]);

		const result = model.add('second');

		assert.deepStrictEqual(result, { ok: true });
		assert.deepStrictEqual(model.todos, [{ text: 'first' }, { text: 'second' }]);
		assert.deepStrictEqual(store.saves, [[{ text: 'first' }, { text: 'second' }]]);
	});

	test('allows duplicate text', () => {
		const model = new TodoListModel(new MemoryStore());
		model.add('same');
		model.add('same');
		assert.deepStrictEqual(model.todos, [{ text: 'same' }, { text: 'same' }]);
	});

	test('rejects empty and over-long text without touching the list or the store', () => {
		const store = new MemoryStore();
		const model = new TodoListModel(store, [{ text: 'keep' }]);

		const empty = model.add('');
		const tooLong = model.add('x'.repeat(51));

		assert.ok(!empty.ok && empty.error instanceof EmptyTodoError);
		assert.ok(!tooLong.ok && tooLong.error instanceof TooLongError);
		assert.deepStrictEqual(model.todos, [{ text: 'keep' }]);
		assert.strictEqual(store.saves.length, 0);
	});

	test('accepts text of exactly fifty code points', () => {
		const model = new TodoListModel(new MemoryStore());
		const text = '好'.repeat(50);
		assert.deepStrictEqual(model.add(text), { ok: true });
		assert.deepStrictEqual(model.todos, [{ text }]);
	});

	test('removes the addressed item and keeps the others in order', () => {
		const store = new MemoryStore();
		const model = new TodoListModel(store, [{ text: 'a' }, { text: 'b' }, { text: 'c' }]);

		const result = model.removeAt(1);

		assert.deepStrictEqual(result, { ok: true });
		assert.deepStrictEqual(model.todos, [{ text: 'a' }, { text: 'c' }]);
		assert.strictEqual(model.length, 2);
		assert.deepStrictEqual(store.saves, [[{ text: 'a' }, { text: 'c' }]]);
	});

	test('fails out-of-range removals without mutating', () => {
		const store = new MemoryStore();
		const model = new TodoListModel(store, [{ text: 'a' }]);

		for (const index of [-1, 1, 5, 0.5]) {
			const result = model.removeAt(index);
			assert.ok(!result.ok && result.error instanceof IndexError, `index ${index}`);
		}
		assert.deepStrictEqual(model.todos, [{ text: 'a' }]);
		assert.strictEqual(store.saves.length, 0);
	});

	test('reports the index and length on IndexError', () => {
		const model = new TodoListModel(new MemoryStore(), [{ text: 'a' }, { text: 'b' }]);
		const result = model.removeAt(2);
		assert.ok(!result.ok);
		assert.strictEqual(result.error.index, 2);
		assert.strictEqual(result.error.length, 2);
	});

	test('keeps the change in memory and returns the save failure', () => {
		const store = new MemoryStore();
		const failure = new IOError('disk full', '/tmp/todo.json');
		store.failWith = failure;
		const model = new TodoListModel(store);

		const result = model.add('unsaved');

		assert.deepStrictEqual(result, { ok: true, saveError: failure });
		assert.deepStrictEqual(model.todos, [{ text: 'unsaved' }]);
	});

	test('notifies listeners with a copy after each successful mutation only', () => {
		const model = new TodoListModel(new MemoryStore(), [{ text: 'a' }]);
		const seen: TodoItem[][] = [];
		const subscription = model.onDidChange((todos) => seen.push(todos));

		model.add('b');
		model.add('');
		model.removeAt(9);
		model.removeAt(0);
		subscription.dispose();
		model.add('c');

		assert.deepStrictEqual(seen, [[{ text: 'a' }, { text: 'b' }], [{ text: 'b' }]]);
	});

	test('does not expose its internal list', () => {
		const initial = [{ text: 'a' }];
		const model = new TodoListModel(new MemoryStore(), initial);
		model.todos.push({ text: 'sneaky' });
		initial.push({ text: 'also sneaky' });
		assert.deepStrictEqual(model.todos, [{ text: 'a' }]);
		assert.deepStrictEqual(model.at(0), { text: 'a' });
		assert.strictEqual(model.at(1), undefined);
	});
});
