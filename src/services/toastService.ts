import { describeError } from '../errors';
import { Logger } from '../logger';
import { Disposable } from '../types';
import { HideToastMessage, ShowToastMessage } from '../types/webviewMessages';

const DEFAULT_TOAST_DURATION_MS = 2_000;

/** Sink receiving the show/hide messages, usually the window host. */
export type ToastPoster = (message: ShowToastMessage | HideToastMessage) => void;

/** Settings for the coordinator; delivery failures are reported to `logger`. */
export interface ToastOptions {
	logger: Pick<Logger, 'warn'>;
	durationMs?: number;
}

/**
 * Shows transient notifications in the window and dismisses them after a delay. Only one toast is
 * pending at a time; a newer toast replaces the older timer. Disposal cancels the timer so a hide
 * never reaches a window that has gone away.
 */
export class ToastCoordinator implements Disposable {
	private timer: ReturnType<typeof setTimeout> | undefined;
	private disposed = false;
	private readonly defaultDurationMs: number;

	constructor(
		private readonly post: ToastPoster,
		private readonly options: ToastOptions
	) {
		this.defaultDurationMs = this.sanitizeDelay(options.durationMs, DEFAULT_TOAST_DURATION_MS);
	}

	/** Whether a toast is currently waiting to be dismissed. */
	get pending(): boolean {
		return this.timer !== undefined;
	}

	/**
	 * Shows `text` and schedules its dismissal.
	 *
	 * @param text - Localized message to show.
	 * @param durationMs - Optional override of the configured duration.
	 */
	show(text: string, durationMs?: number): void {
		if (this.disposed) {
			return;
		}
		const delay = this.sanitizeDelay(durationMs, this.defaultDurationMs);
		this.cancel();
		this.send({ type: 'showToast', text, durationMs: delay });
		this.timer = setTimeout(() => {
			this.timer = undefined;
			if (!this.disposed) {
				this.send({ type: 'hideToast' });
			}
		}, delay);
	}

	/** Drops the pending dismissal without posting anything, e.g. when the window closes. */
	cancel(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
	}

	dispose(): void {
		this.cancel();
		this.disposed = true;
	}

	private send(message: ShowToastMessage | HideToastMessage): void {
		try {
			this.post(message);
		} catch (error) {
			this.options.logger.warn('Toast delivery failed', {
				type: message.type,
				error: describeError(error),
			});
		}
	}

	/**
	 * Sanitizes a delay to a non-negative finite number.
	 *
	 * @param value - Requested delay.
	 * @param defaultValue - Fallback delay to use if the value is invalid.
	 */
	private sanitizeDelay(value: number | undefined, defaultValue: number): number {
		if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
			return defaultValue;
		}
		return value;
	}
}
