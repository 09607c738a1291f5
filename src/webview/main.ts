/** Window runtime powering the todo list page. */

type HostMessage =
	| { type: 'stateUpdate'; payload: WebviewStateSnapshot }
	| { type: 'showToast'; text: string; durationMs: number }
	| { type: 'hideToast' }
	| { type: 'clearInput' }
	| { type: 'focusWindow' };

type ProcessMessage =
	| { type: 'webviewReady' }
	| { type: 'commitCreate'; text: string }
	| { type: 'completeTodo'; index: number; text: string }
	| { type: 'copyTodo'; index: number; text: string };

interface WebviewStateSnapshot {
	generatedAt: string;
	title: string;
	emptyLabel: string;
	maxLength: number;
	rows: WebviewTodoRow[];
	strings: WebviewStrings;
}

interface WebviewTodoRow {
	index: number;
	text: string;
}

interface WebviewStrings {
	addPlaceholder: string;
	completeLabel: string;
	copyLabel: string;
	replacedLabel: string;
}

const RECONNECT_DELAY_MS = 1_000;
/** Close code the process uses when a newer window took over. */
const REPLACED_CLOSE_CODE = 4000;

const appRoot = requireElement('root');
const toastElement = requireElement('toast');
const socketUrl = requireSocketUrl(appRoot);

const listContainer = document.createElement('div');
listContainer.className = 'todo-list';
const entryRow = document.createElement('footer');
entryRow.className = 'entry-row';
const entryInput = document.createElement('input');
entryInput.type = 'text';
entryInput.className = 'entry-input';
entryInput.autocomplete = 'off';
entryRow.appendChild(entryInput);
appRoot.appendChild(listContainer);
appRoot.appendChild(entryRow);

let snapshot: WebviewStateSnapshot | undefined;
let hostSocket: WebSocket | undefined;
// Set after a row is ticked; rows stay locked until the process answers with fresh state.
let awaitingState = false;
let replaced = false;

entryInput.addEventListener('keydown', (event) => {
	// Enter while an IME is composing confirms the candidate, not the todo.
	if (event.key !== 'Enter' || event.isComposing) {
		return;
	}
	event.preventDefault();
	sendToHost({ type: 'commitCreate', text: entryInput.value });
});

render();
connect();

/** Opens the socket to the process and re-opens it if the process goes away. */
function connect(): void {
	const socket = new WebSocket(socketUrl);
	hostSocket = socket;
	socket.addEventListener('open', () => sendToHost({ type: 'webviewReady' }));
	socket.addEventListener('message', (event) => {
		if (typeof event.data !== 'string') {
			return;
		}
		handleHostMessage(JSON.parse(event.data) as HostMessage);
	});
	socket.addEventListener('close', (event) => {
		if (hostSocket !== socket) {
			return;
		}
		hostSocket = undefined;
		entryInput.disabled = true;
		if (event.code === REPLACED_CLOSE_CODE) {
			replaced = true;
			render();
			return;
		}
		setTimeout(connect, RECONNECT_DELAY_MS);
	});
}

/**
 * Dispatches a message from the process.
 *
 * @param message - Parsed host message.
 */
function handleHostMessage(message: HostMessage): void {
	switch (message.type) {
		case 'stateUpdate':
			handleStateUpdate(message.payload);
			break;
		case 'showToast':
			showToast(message.text);
			break;
		case 'hideToast':
			toastElement.hidden = true;
			break;
		case 'clearInput':
			entryInput.value = '';
			break;
		case 'focusWindow':
			window.focus();
			entryInput.focus();
			break;
		default:
			break;
	}
}

/**
 * Replaces the current snapshot with the latest state from the process and re-renders the list.
 *
 * @param nextSnapshot - Serialized state update message.
 */
function handleStateUpdate(nextSnapshot: WebviewStateSnapshot): void {
	snapshot = nextSnapshot;
	awaitingState = false;
	document.title = nextSnapshot.title;
	entryInput.placeholder = nextSnapshot.strings.addPlaceholder;
	entryInput.disabled = false;
	render();
}

/** Renders the list rows; the entry is built once so typed text survives updates. */
function render(): void {
	listContainer.innerHTML = '';
	if (replaced) {
		entryInput.disabled = true;
		const notice = document.createElement('p');
		notice.className = 'empty-state';
		notice.textContent = snapshot?.strings.replacedLabel ?? '';
		listContainer.appendChild(notice);
		return;
	}
	if (!snapshot) {
		entryInput.disabled = true;
		return;
	}
	if (snapshot.rows.length === 0) {
		const empty = document.createElement('p');
		empty.className = 'empty-state';
		empty.textContent = snapshot.emptyLabel;
		listContainer.appendChild(empty);
		return;
	}
	const strings = snapshot.strings;
	snapshot.rows.forEach((row) => listContainer.appendChild(renderTodoRow(row, strings)));
}

/**
 * Renders a single todo: checkbox (completes and removes), wrapped text, copy button.
 *
 * @param row - Row to render.
 * @param strings - Localized labels.
 */
function renderTodoRow(row: WebviewTodoRow, strings: WebviewStrings): HTMLElement {
	const item = document.createElement('div');
	item.className = 'todo-item';
	item.dataset.index = String(row.index);

	const checkbox = document.createElement('input');
	checkbox.type = 'checkbox';
	checkbox.className = 'todo-check';
	checkbox.title = strings.completeLabel;
	checkbox.disabled = awaitingState;
	checkbox.setAttribute('aria-label', strings.completeLabel);
	checkbox.addEventListener('change', () => {
		if (!checkbox.checked) {
			return;
		}
		lockRows();
		sendToHost({ type: 'completeTodo', index: row.index, text: row.text });
	});

	const label = document.createElement('span');
	label.className = 'todo-text';
	label.textContent = row.text;

	const copyButton = document.createElement('button');
	copyButton.type = 'button';
	copyButton.className = 'button-link';
	copyButton.textContent = strings.copyLabel;
	copyButton.addEventListener('click', () =>
		sendToHost({ type: 'copyTodo', index: row.index, text: row.text })
	);

	item.appendChild(checkbox);
	item.appendChild(label);
	item.appendChild(copyButton);
	return item;
}

/** Indexes shift once a row is removed, so no row may be ticked until fresh state arrives. */
function lockRows(): void {
	awaitingState = true;
	listContainer.querySelectorAll<HTMLInputElement>('.todo-check').forEach((checkbox) => {
		checkbox.disabled = true;
	});
}

/**
 * Shows the toast; the process decides when it is hidden again.
 *
 * @param text - Message to show.
 */
function showToast(text: string): void {
	toastElement.textContent = text;
	toastElement.hidden = false;
}

function requireElement(id: string): HTMLElement {
	const element = document.getElementById(id);
	if (!element) {
		throw new Error(`Missing #${id} in the window shell.`);
	}
	return element;
}

function requireSocketUrl(root: HTMLElement): string {
	const url = root.dataset.socketUrl;
	if (!url) {
		throw new Error('Missing the socket address in the window shell.');
	}
	return url;
}

function sendToHost(message: ProcessMessage): void {
	if (!hostSocket || hostSocket.readyState !== WebSocket.OPEN) {
		return;
	}
	hostSocket.send(JSON.stringify(message));
}
