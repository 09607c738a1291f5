/** Shape persisted for each todo item. Items are replaced wholesale, never edited. */
export interface TodoItem {
	readonly text: string;
}

/** Outcome of a list mutation; failures leave the list untouched. */
export type MutationResult<TError extends Error> =
	| { ok: true; saveError?: Error }
	| { ok: false; error: TError };

/** Minimal disposable contract shared by hosts, services and event subscriptions. */
export interface Disposable {
	dispose(): void;
}
