import * as fs from 'fs';
import SysTray from 'systray2';

import { describeError } from './errors';
import { Logger } from './logger';
import { Disposable } from './types';

/** Entry of the tray menu. */
export interface TrayMenuItem {
	title: string;
	tooltip: string;
	checked: boolean;
	enabled: boolean;
}

/** Tray icon and menu; `icon` is base64 PNG data. */
export interface TrayMenu {
	icon: string;
	isTemplateIcon: boolean;
	title: string;
	tooltip: string;
	items: TrayMenuItem[];
}

/** Native tray surface; implemented with systray2, faked in tests. */
export interface TrayHost extends Disposable {
	/**
	 * Subscribes to menu clicks.
	 *
	 * @param listener - Receives the position of the clicked item in {@link TrayMenu.items}.
	 */
	onDidClickItem(listener: (itemIndex: number) => void): Disposable;
	/** Resolves once the tray is shown. */
	start(): Promise<void>;
}

/**
 * Reads a PNG file as the base64 payload the tray expects.
 *
 * @param iconPath - Absolute path of the PNG.
 */
export function readTrayIcon(iconPath: string): string {
	return fs.readFileSync(iconPath).toString('base64');
}

/** The part of the systray2 client the host drives. */
export interface SystemTrayClient {
	onClick(listener: (action: { seq_id: number }) => void): Promise<unknown>;
	ready(): Promise<unknown>;
	kill(exitNode?: boolean): Promise<unknown> | void;
}

/** Tray backed by the systray2 helper binary. */
export class SystemTrayHost implements TrayHost {
	private readonly tray: SystemTrayClient;
	private readonly listeners = new Set<(itemIndex: number) => void>();

	constructor(
		menu: TrayMenu,
		private readonly logger: Logger,
		createClient: (menu: TrayMenu) => SystemTrayClient = (trayMenu) => new SysTray({ menu: trayMenu })
	) {
		this.tray = createClient(menu);
	}

	async start(): Promise<void> {
		await this.tray.onClick((action) => {
			this.listeners.forEach((listener) => listener(action.seq_id));
		});
		await this.tray.ready();
	}

	onDidClickItem(listener: (itemIndex: number) => void): Disposable {
		this.listeners.add(listener);
		return { dispose: () => this.listeners.delete(listener) };
	}

	dispose(): void {
		this.listeners.clear();
		Promise.resolve(this.tray.kill(false)).catch((error: unknown) =>
			this.logger.error('Closing the tray failed', { error: describeError(error) })
		);
	}
}
