/** Tests routing of window messages, including the add/complete round trip on disk. */

import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';

import { handleWebviewMessage, syncWebviewState } from '../adapters/webviewRouter';
import {
	createHandlerHarness,
	createTempDir,
	removeTempDir,
	useEnglishStrings,
} from './testUtils';

suite('handleWebviewMessage', () => {
	let dir: string;

	suiteSetup(async () => {
		await useEnglishStrings();
	});

	setup(() => {
		dir = createTempDir();
	});

	teardown(() => {
		removeTempDir(dir);
	});

	test('persists an add and a completion starting from no file', async () => {
		const harness = createHandlerHarness(dir);
		const dataFile = path.join(dir, 'todo.json');
		assert.strictEqual(fs.existsSync(dataFile), false);
		assert.deepStrictEqual(harness.context.model.todos, []);

		await handleWebviewMessage({ message: { type: 'commitCreate', text: 'buy milk' } }, harness.context);
		assert.deepStrictEqual(JSON.parse(fs.readFileSync(dataFile, 'utf8')), [{ text: 'buy milk' }]);

		await handleWebviewMessage({ message: { type: 'completeTodo', index: 0, text: 'buy milk' } }, harness.context);
		assert.deepStrictEqual(JSON.parse(fs.readFileSync(dataFile, 'utf8')), []);
	});

	test('sends the current state when the window reports ready', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'existing' }]);

		await handleWebviewMessage({ message: { type: 'webviewReady' } }, harness.context);

		assert.strictEqual(harness.host.postMessages.length, 1);
		const update = harness.host.postMessages[0];
		assert.ok(update.type === 'stateUpdate');
		assert.deepStrictEqual(update.payload.rows, [{ index: 0, text: 'existing' }]);
	});

	test('clears the entry after an accepted todo and re-renders through the model', async () => {
		const harness = createHandlerHarness(dir);
		const subscription = syncWebviewState(harness.context);

		await handleWebviewMessage({ message: { type: 'commitCreate', text: 'write report' } }, harness.context);

		assert.deepStrictEqual(harness.host.types(), ['stateUpdate', 'clearInput']);
		assert.deepStrictEqual(harness.toast.shown, []);
		subscription.dispose();
	});

	test('keeps the entry and shows a toast for over-long text', async () => {
		const harness = createHandlerHarness(dir);

		await handleWebviewMessage(
			{ message: { type: 'commitCreate', text: 'a'.repeat(51) } },
			harness.context
		);

		assert.deepStrictEqual(harness.toast.shown, ['Todo items are limited to 50 characters']);
		assert.deepStrictEqual(harness.host.postMessages, []);
		assert.deepStrictEqual(harness.context.model.todos, []);
		assert.strictEqual(fs.existsSync(path.join(dir, 'todo.json')), false);
	});

	test('asks for text when the entry is submitted empty', async () => {
		const harness = createHandlerHarness(dir);

		await handleWebviewMessage({ message: { type: 'commitCreate', text: '' } }, harness.context);

		assert.deepStrictEqual(harness.toast.shown, ['Type something first']);
		assert.deepStrictEqual(harness.host.postMessages, []);
	});

	test('shows the "all done" copy once the last todo is completed', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'only' }]);
		const subscription = syncWebviewState(harness.context);

		await handleWebviewMessage({ message: { type: 'completeTodo', index: 0, text: 'only' } }, harness.context);

		const update = harness.host.postMessages[0];
		assert.ok(update.type === 'stateUpdate');
		assert.deepStrictEqual(update.payload.rows, []);
		assert.strictEqual(update.payload.emptyLabel, 'All done!');
		subscription.dispose();
	});

	test('resends state instead of removing when the index is out of range', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'a' }]);

		await handleWebviewMessage({ message: { type: 'completeTodo', index: 3, text: 'a' } }, harness.context);

		assert.deepStrictEqual(harness.context.model.todos, [{ text: 'a' }]);
		assert.deepStrictEqual(harness.host.types(), ['stateUpdate']);
		assert.deepStrictEqual(harness.logger.messages('warn'), ['Ignoring completion of a stale row']);
	});

	test('does not remove a different todo when two rows are ticked from one snapshot', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'A' }, { text: 'B' }, { text: 'C' }, { text: 'D' }]);

		await handleWebviewMessage({ message: { type: 'completeTodo', index: 0, text: 'A' } }, harness.context);
		await handleWebviewMessage({ message: { type: 'completeTodo', index: 2, text: 'C' } }, harness.context);

		assert.deepStrictEqual(harness.context.model.todos, [{ text: 'B' }, { text: 'C' }, { text: 'D' }]);
		assert.deepStrictEqual(JSON.parse(fs.readFileSync(path.join(dir, 'todo.json'), 'utf8')), [
			{ text: 'B' },
			{ text: 'C' },
			{ text: 'D' },
		]);
		assert.deepStrictEqual(harness.host.types(), ['stateUpdate']);
		assert.deepStrictEqual(harness.logger.messages('warn'), ['Ignoring completion of a stale row']);
	});

	test('does not copy a different todo when the row has moved', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'B' }, { text: 'C' }]);

		await handleWebviewMessage({ message: { type: 'copyTodo', index: 1, text: 'B' } }, harness.context);

		assert.deepStrictEqual(harness.copied, []);
		assert.deepStrictEqual(harness.toast.shown, []);
		assert.deepStrictEqual(harness.host.types(), ['stateUpdate']);
		assert.deepStrictEqual(harness.logger.messages('warn'), ['Ignoring copy of a stale row']);
	});

	test('copies the todo text and confirms with a toast', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'first' }, { text: 'second' }]);

		await handleWebviewMessage({ message: { type: 'copyTodo', index: 1, text: 'second' } }, harness.context);

		assert.deepStrictEqual(harness.copied, ['second']);
		assert.deepStrictEqual(harness.toast.shown, ['Copied to clipboard']);
	});

	test('reports clipboard failures', async () => {
		const harness = createHandlerHarness(dir, [{ text: 'first' }]);
		harness.context.clipboardWriteText = async () => {
			throw new Error('no display');
		};

		await handleWebviewMessage({ message: { type: 'copyTodo', index: 0, text: 'first' } }, harness.context);

		assert.deepStrictEqual(harness.toast.shown, ['Could not copy to clipboard: no display']);
		assert.deepStrictEqual(harness.logger.messages('error'), ['Clipboard write failed']);
	});

	test('surfaces a failed save through a toast while keeping the todo', async () => {
		const harness = createHandlerHarness(dir);
		fs.mkdirSync(path.join(dir, 'todo.json'));

		await handleWebviewMessage({ message: { type: 'commitCreate', text: 'kept' } }, harness.context);

		assert.deepStrictEqual(harness.context.model.todos, [{ text: 'kept' }]);
		assert.strictEqual(harness.toast.shown.length, 1);
		assert.ok(harness.toast.shown[0].startsWith('Could not save todos: Cannot write '));
		assert.deepStrictEqual(harness.logger.messages('error'), ['Saving todos failed']);
	});
});
