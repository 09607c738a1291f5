import type { WebviewStateSnapshot } from '../webviewState';

/** Message informing the window about the latest serialized state. */
export type StateUpdateMessage = { type: 'stateUpdate'; payload: WebviewStateSnapshot };
/** Message asking the window to show a transient notification. */
export type ShowToastMessage = { type: 'showToast'; text: string; durationMs: number };
/** Message dismissing the transient notification. */
export type HideToastMessage = { type: 'hideToast' };
/** Message sent after a todo was accepted so the entry can be emptied. */
export type ClearInputMessage = { type: 'clearInput' };
/** Message asking an already open window to come to the front. */
export type FocusWindowMessage = { type: 'focusWindow' };

/** Union of messages sent from the process to the window runtime. */
export type OutboundMessage =
	| StateUpdateMessage
	| ShowToastMessage
	| HideToastMessage
	| ClearInputMessage
	| FocusWindowMessage;

/** Message sent when the window initializes so the host can flush pending messages. */
export type WebviewReadyMessage = { type: 'webviewReady' };
/** Message requesting creation of a todo from the entry. */
export type CommitCreateMessage = { type: 'commitCreate'; text: string };
/**
 * Message sent when a todo's checkbox is ticked; the todo is removed. `text` is the row as the
 * window rendered it, so a row that has since moved is not mistaken for another.
 */
export type CompleteTodoMessage = { type: 'completeTodo'; index: number; text: string };
/** Message requesting a todo's text be copied to the clipboard. */
export type CopyTodoMessage = { type: 'copyTodo'; index: number; text: string };

/** Union of messages sent from the window runtime to the process. */
export type InboundMessage =
	| WebviewReadyMessage
	| CommitCreateMessage
	| CompleteTodoMessage
	| CopyTodoMessage;

/** Envelope fired by the window host for each inbound message. */
export type WebviewMessageEvent = { message: InboundMessage };
