/** Tests file persistence of the todo list. */

import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';

import { DeserializationError, IOError } from '../errors';
import { TodoRepository } from '../todoRepository';
import { createTempDir, removeTempDir } from './testUtils';

suite('TodoRepository', () => {
	let dir: string;
	let dataFile: string;

	setup(() => {
		dir = createTempDir();
		dataFile = path.join(dir, 'todo.json');
	});

	teardown(() => {
		removeTempDir(dir);
	});

	test('loads an empty list when the file does not exist', () => {
		const repository = new TodoRepository({ dataFile });
		assert.deepStrictEqual(repository.load(), []);
		assert.strictEqual(fs.existsSync(dataFile), false);
	});

	test('writes a pretty-printed JSON array with two-space indentation', () => {
		const repository = new TodoRepository({ dataFile });
		repository.save([{ text: 'buy milk' }, { text: '写周报' }]);

		assert.strictEqual(
			fs.readFileSync(dataFile, 'utf8'),
			'[\n  {\n    "text": "buy milk"\n  },\n  {\n    "text": "写周报"\n  }\n]'
		);
	});

	test('writes an empty list as []', () => {
		const repository = new TodoRepository({ dataFile });
		repository.save([]);
		assert.strictEqual(fs.readFileSync(dataFile, 'utf8'), '[]');
	});

	test('round-trips items and order through a second repository', () => {
		const todos = [{ text: 'one' }, { text: 'two' }, { text: 'one' }, { text: '🥛'.repeat(50) }];
		new TodoRepository({ dataFile }).save(todos);

		const reloaded = new TodoRepository({ dataFile }).load();
		assert.deepStrictEqual(reloaded, todos);
	});

	test('returns equal results when loading twice without writes', () => {
		const repository = new TodoRepository({ dataFile });
		repository.save([{ text: 'a' }, { text: 'b' }]);
		assert.deepStrictEqual(repository.load(), repository.load());
	});

	test('drops unknown fields and treats null as an empty list', () => {
		fs.writeFileSync(dataFile, '[{"text":"keep","done":true}]');
		assert.deepStrictEqual(new TodoRepository({ dataFile }).load(), [{ text: 'keep' }]);

		fs.writeFileSync(dataFile, 'null');
		assert.deepStrictEqual(new TodoRepository({ dataFile }).load(), []);
	});

	test('fails with DeserializationError on malformed JSON', () => {
		fs.writeFileSync(dataFile, '[{"text": "unterminated"');
		assert.throws(() => new TodoRepository({ dataFile }).load(), DeserializationError);
	});

	test('fails with DeserializationError when the content is not a list of todos', () => {
		fs.writeFileSync(dataFile, '{"text":"not a list"}');
		assert.throws(() => new TodoRepository({ dataFile }).load(), DeserializationError);

		fs.writeFileSync(dataFile, '[{"text":42}]');
		assert.throws(
			() => new TodoRepository({ dataFile }).load(),
			(error: unknown) =>
				error instanceof DeserializationError && error.message.includes('at 0.text')
		);
	});

	test('fails with IOError when the file cannot be read', () => {
		fs.mkdirSync(dataFile);
		assert.throws(() => new TodoRepository({ dataFile }).load(), IOError);
	});

	test('fails with IOError when the file cannot be written', () => {
		const repository = new TodoRepository({ dataFile: path.join(dir, 'missing', 'todo.json') });
		assert.throws(
			() => repository.save([{ text: 'lost' }]),
			(error: unknown) => error instanceof IOError && error.code === 'IO_ERROR'
		);
	});

	test('resolves relative paths against the working directory', () => {
		const repository = new TodoRepository({ dataFile: 'todo.json' });
		assert.strictEqual(repository.filePath, path.resolve('todo.json'));
	});
});
