import { randomBytes, timingSafeEqual } from 'crypto';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import * as path from 'path';
import { WebSocketServer } from 'ws';
import { z } from 'zod';

import { describeError } from './errors';
import { Logger } from './logger';
import { Disposable } from './types';
import { InboundMessage, OutboundMessage, WebviewMessageEvent } from './types/webviewMessages';

/** Path the window runtime opens its WebSocket on. */
export const SOCKET_PATH = '/ws';

/** Close code telling a page that a newer page took over; the page must not reconnect. */
export const REPLACED_CLOSE_CODE = 4000;

const InboundMessageSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('webviewReady') }),
	z.object({ type: z.literal('commitCreate'), text: z.string() }),
	z.object({ type: z.literal('completeTodo'), index: z.number().int(), text: z.string() }),
	z.object({ type: z.literal('copyTodo'), index: z.number().int(), text: z.string() }),
]);

/** Outgoing half of a page connection; the ws socket in production, a fake in tests. */
export interface WebviewConnection {
	send(data: string): void;
	close(code?: number, reason?: string): void;
}

/** The parts of an upgrade request the host checks before accepting a page. */
export type UpgradeRequest = Pick<IncomingMessage, 'url' | 'headers'>;

/** Incoming half of a page connection, driven by the transport. */
export interface WebviewConnectionHandle {
	receive(data: string): void;
	disconnect(): void;
}

/** Options for {@link TodoWebviewHost}. */
export interface WebviewHostOptions {
	host: string;
	port: number;
	title: string;
	logger: Logger;
	/** Directory holding `webview.css`. */
	mediaDir?: string;
	/** Compiled window runtime served as `/webview.js`. */
	scriptPath?: string;
	/** Opens a URL in the user's browser. */
	openExternal?: (url: string) => Promise<unknown>;
}

const DEFAULT_MEDIA_DIR = path.resolve(__dirname, '..', 'media');
const DEFAULT_SCRIPT_PATH = path.join(__dirname, 'webview', 'main.js');

/**
 * Serves the todo window as a local page and bridges it to the process over a WebSocket. Only one
 * page is attached at a time; outbound messages wait until that page reports readiness. Closing
 * the page hides the window, the process keeps running.
 */
export class TodoWebviewHost implements Disposable {
	private readonly server: Server;
	private readonly sockets: WebSocketServer;
	private readonly emitter = new EventEmitter();
	private connection: WebviewConnection | undefined;
	private ready = false;
	private pendingMessages: OutboundMessage[] = [];
	private listeningUrl: string | undefined;
	private authority: string | undefined;
	private readonly sessionToken = randomBytes(24).toString('hex');
	private disposed = false;

	constructor(private readonly options: WebviewHostOptions) {
		this.server = createServer((req, res) => this.handleHttp(req, res));
		this.sockets = new WebSocketServer({ noServer: true });

		this.server.on('upgrade', (req, socket, head) => {
			if (!this.authorizeUpgrade(req)) {
				this.options.logger.warn('Refused window connection', {
					origin: req.headers.origin,
					path: requestPath(req),
				});
				socket.destroy();
				return;
			}
			this.sockets.handleUpgrade(req, socket, head, (webSocket) => {
				const handle = this.connect({
					send: (data) => webSocket.send(data),
					close: (code, reason) => webSocket.close(code, reason),
				});
				webSocket.on('message', (data) => handle.receive(String(data)));
				webSocket.on('close', () => handle.disconnect());
			});
		});
	}

	/** Address of the page once {@link start} has resolved. */
	get url(): string | undefined {
		return this.listeningUrl;
	}

	/** WebSocket address, including the session token, that the served page connects to. */
	get socketUrl(): string | undefined {
		if (!this.authority) {
			return undefined;
		}
		return `ws://${this.authority}${SOCKET_PATH}?token=${this.sessionToken}`;
	}

	/** Whether a page is attached and has reported readiness. */
	get isVisible(): boolean {
		return this.connection !== undefined && this.ready;
	}

	/**
	 * Starts listening on the configured interface.
	 *
	 * @returns The page URL.
	 */
	async start(): Promise<string> {
		await new Promise<void>((resolve, reject) => {
			this.server.once('error', reject);
			this.server.listen(this.options.port, this.options.host, () => {
				this.server.off('error', reject);
				resolve();
			});
		});
		const address = this.server.address();
		const port = address !== null && typeof address === 'object' ? address.port : this.options.port;
		const hostname = this.options.host.includes(':') ? `[${this.options.host}]` : this.options.host;
		this.authority = `${hostname}:${port}`;
		this.listeningUrl = `http://${this.authority}/`;
		this.options.logger.info('Window host listening', { url: this.listeningUrl });
		return this.listeningUrl;
	}

	/**
	 * Only a page served by this host may attach: the upgrade must come from the served origin and
	 * carry the session token the page was given.
	 *
	 * @param req - Upgrade request to check.
	 */
	authorizeUpgrade(req: UpgradeRequest): boolean {
		if (!this.authority || this.disposed) {
			return false;
		}
		const url = new URL(req.url ?? '/', 'http://localhost');
		if (url.pathname !== SOCKET_PATH || req.headers.origin !== `http://${this.authority}`) {
			return false;
		}
		const token = Buffer.from(url.searchParams.get('token') ?? '');
		const expected = Buffer.from(this.sessionToken);
		return token.length === expected.length && timingSafeEqual(token, expected);
	}

	/**
	 * Brings the window up: focuses the attached page or opens a new one in the browser. A page
	 * that is attached but not yet ready receives the focus request once it is.
	 */
	async show(): Promise<void> {
		if (this.connection) {
			this.postMessage({ type: 'focusWindow' });
			return;
		}
		if (!this.listeningUrl) {
			throw new Error('The window host has not been started.');
		}
		if (!this.options.openExternal) {
			this.options.logger.info('Open the todo window in a browser', { url: this.listeningUrl });
			return;
		}
		await this.options.openExternal(this.listeningUrl);
	}

	/**
	 * Attaches a page, replacing any page attached earlier.
	 *
	 * @param connection - Outgoing side of the page transport.
	 * @returns Callbacks the transport uses to deliver frames and report closure.
	 */
	connect(connection: WebviewConnection): WebviewConnectionHandle {
		const previous = this.connection;
		this.connection = connection;
		this.ready = false;
		this.pendingMessages = [];
		if (previous) {
			previous.close(REPLACED_CLOSE_CODE, 'replaced');
		}
		this.options.logger.debug('Window attached');
		return {
			receive: (data) => {
				if (this.connection === connection) {
					this.handleFrame(data);
				}
			},
			disconnect: () => {
				if (this.connection !== connection) {
					return;
				}
				this.connection = undefined;
				this.ready = false;
				this.pendingMessages = [];
				this.options.logger.debug('Window closed');
				this.emitter.emit('disconnect');
			},
		};
	}

	/**
	 * Sends a message to the attached page, buffering until it is ready. Messages sent while no
	 * page is attached are dropped; a page always receives full state once it is ready.
	 *
	 * @param message - Message payload to forward.
	 */
	postMessage(message: OutboundMessage): void {
		if (!this.connection || this.disposed) {
			return;
		}
		if (!this.ready) {
			this.pendingMessages.push(message);
			return;
		}
		this.send(message);
	}

	/**
	 * Subscribes to validated messages from the page.
	 *
	 * @param listener - Callback invoked for each inbound message.
	 */
	onDidReceiveMessage(listener: (event: WebviewMessageEvent) => void): Disposable {
		this.emitter.on('message', listener);
		return { dispose: () => this.emitter.off('message', listener) };
	}

	/**
	 * Subscribes to the page going away.
	 *
	 * @param listener - Callback invoked when the attached page closes.
	 */
	onDidDisconnect(listener: () => void): Disposable {
		this.emitter.on('disconnect', listener);
		return { dispose: () => this.emitter.off('disconnect', listener) };
	}

	/** Closes the page connection and the server. */
	dispose(): void {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		this.connection?.close();
		this.connection = undefined;
		this.ready = false;
		this.pendingMessages = [];
		this.sockets.close();
		if (this.server.listening) {
			this.server.close();
		}
		this.emitter.removeAllListeners();
	}

	/**
	 * Builds the static HTML shell, including a strict CSP keyed to a per-page nonce.
	 *
	 * @param nonce - Nonce allowed to run the window script.
	 * @throws Error when the host has not been started.
	 */
	buildHtml(nonce: string): string {
		const socketUrl = this.socketUrl;
		if (!this.authority || !socketUrl) {
			throw new Error('The window host has not been started.');
		}
		const csp = [
			"default-src 'none';",
			"img-src 'self' data:;",
			"style-src 'self';",
			`script-src 'nonce-${nonce}';`,
			`connect-src ws://${this.authority};`,
		].join(' ');
		return `<!DOCTYPE html>
<html lang="en">
	<head>
		<meta charset="UTF-8" />
		<meta http-equiv="Content-Security-Policy" content="${escapeHtml(csp)}" />
		<meta name="viewport" content="width=device-width, initial-scale=1.0" />
		<title>${escapeHtml(this.options.title)}</title>
		<link rel="stylesheet" href="/webview.css" />
	</head>
	<body>
		<main id="root" data-socket-url="${escapeHtml(socketUrl)}"></main>
		<div id="toast" class="toast" role="status" hidden></div>
		<script nonce="${nonce}" src="/webview.js"></script>
	</body>
</html>`;
	}

	private handleFrame(data: string): void {
		let parsed: unknown;
		try {
			parsed = JSON.parse(data);
		} catch (error) {
			this.options.logger.warn('Ignoring malformed window frame', { error: describeError(error) });
			return;
		}
		const result = InboundMessageSchema.safeParse(parsed);
		if (!result.success) {
			this.options.logger.warn('Ignoring unknown window message', {
				error: result.error.issues[0]?.message,
			});
			return;
		}
		const message: InboundMessage = result.data;
		if (message.type === 'webviewReady') {
			this.markReady();
		}
		this.emitter.emit('message', { message });
	}

	/** Marks the page as ready and flushes any buffered messages. */
	private markReady(): void {
		this.ready = true;
		const messages = [...this.pendingMessages];
		this.pendingMessages = [];
		messages.forEach((message) => this.send(message));
	}

	private send(message: OutboundMessage): void {
		try {
			this.connection?.send(JSON.stringify(message));
		} catch (error) {
			this.options.logger.warn('Could not deliver window message', {
				type: message.type,
				error: describeError(error),
			});
		}
	}

	private handleHttp(req: IncomingMessage, res: ServerResponse): void {
		if (req.method !== 'GET') {
			respond(res, 405, 'text/plain; charset=utf-8', 'Method Not Allowed');
			return;
		}
		switch (requestPath(req)) {
			case '/':
				respond(res, 200, 'text/html; charset=utf-8', this.buildHtml(getNonce()));
				return;
			case '/webview.js':
				this.serveFile(res, this.options.scriptPath ?? DEFAULT_SCRIPT_PATH, 'text/javascript; charset=utf-8');
				return;
			case '/webview.css':
				this.serveFile(
					res,
					path.join(this.options.mediaDir ?? DEFAULT_MEDIA_DIR, 'webview.css'),
					'text/css; charset=utf-8'
				);
				return;
			default:
				respond(res, 404, 'text/plain; charset=utf-8', 'Not Found');
		}
	}

	private serveFile(res: ServerResponse, filePath: string, contentType: string): void {
		fs.readFile(filePath, (error, contents) => {
			if (error) {
				this.options.logger.error('Cannot serve window asset', {
					path: filePath,
					error: describeError(error),
				});
				respond(res, 404, 'text/plain; charset=utf-8', 'Not Found');
				return;
			}
			respond(res, 200, contentType, contents);
		});
	}
}

function respond(res: ServerResponse, statusCode: number, contentType: string, body: string | Buffer): void {
	res.statusCode = statusCode;
	res.setHeader('content-type', contentType);
	res.setHeader('cache-control', 'no-store');
	res.end(body);
}

function requestPath(req: Pick<IncomingMessage, 'url'>): string {
	const url = new URL(req.url ?? '/', 'http://localhost');
	return url.pathname;
}

function escapeHtml(value: string): string {
	return value
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;');
}

/**
 * Generates a 32-character nonce for CSP script tags.
 *
 * @returns Randomly generated nonce string.
 */
export function getNonce(): string {
	const characters = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
	let nonce = '';
	for (let i = 0; i < 32; i += 1) {
		const randomIndex = Math.floor(Math.random() * characters.length);
		nonce += characters.charAt(randomIndex);
	}
	return nonce;
}
