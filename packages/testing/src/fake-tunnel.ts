/**
 * FakeTunnel: an in-process stand-in for the tunnel binary.
 *
 * Serves the readiness endpoint and a small origin (hello + event stream)
 * on 127.0.0.1, takes `reconnect <duration>` directives on its control
 * input, drains in-flight streams on SIGTERM/SIGINT within a grace period,
 * and writes JSON log lines to memory, a file, or a rotating directory.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { type IncomingMessage, type Server, type ServerResponse, createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { join } from 'node:path';
import type { ExitStatus, TerminationSignal, TunnelHandle } from '@tunnelprobe/sdk';
import { parseDuration } from '@tunnelprobe/sdk';
import { fileSize, rotateFile } from '@tunnelprobe/logger-file';

export type FakeLogLevel = 'debug' | 'info';

export interface FakeTunnelOptions {
	/** Connections registered at startup (default: 4) */
	haConnections?: number;
	/** Delay before the connections register (default: 0) */
	connectDelayMs?: number;
	/** How long in-flight streams are served after a signal (default: 5000) */
	gracePeriodMs?: number;
	/** Reported in the readiness body */
	connectorId?: string;
	/** Accept control lines (default: true) */
	stdinControl?: boolean;
	/** Also write log lines to this file */
	logFile?: string;
	/** Also write log lines to `<dir>/cloudflared.log`, rotated by size */
	logDirectory?: string;
	/** Rotate the directory log once it is larger than this (default: 1,000,000) */
	rotateAfterBytes?: number;
	/** `debug` also logs every origin request (default: info) */
	loglevel?: FakeLogLevel;
}

export const FAKE_CONNECTOR_ID = '00000000-0000-4000-8000-000000000000';
export const FAKE_LOG_FILE_NAME = 'cloudflared.log';
export const TERMINAL_LINE = '502 Bad Gateway';

interface Stream {
	res: ServerResponse;
	timer: ReturnType<typeof setInterval>;
}

function listen(server: Server): Promise<number> {
	return new Promise((resolve, reject) => {
		server.once('error', reject);
		server.listen(0, '127.0.0.1', () => {
			server.off('error', reject);
			const address: AddressInfo | string | null = server.address();
			if (address === null || typeof address === 'string') {
				reject(new Error('Server has no TCP address'));
				return;
			}
			resolve(address.port);
		});
	});
}

function close(server: Server): Promise<void> {
	return new Promise((resolve) => {
		server.close(() => resolve());
		server.closeAllConnections();
	});
}

export class FakeTunnel implements TunnelHandle {
	readonly pid = undefined;
	readonly haConnections: number;
	readonly gracePeriodMs: number;
	readonly connectorId: string;
	/** Every log line, as it would appear on stderr */
	readonly stderr: string[] = [];

	private readonly options: FakeTunnelOptions;
	private readonly metricsServer: Server;
	private readonly originServer: Server;
	private metricsPort = 0;
	private originPort = 0;
	private connections = 0;
	private shuttingDown = false;
	private exitStatus: ExitStatus | null = null;
	private resolveExit: (status: ExitStatus) => void = () => undefined;
	private readonly exitPromise: Promise<ExitStatus>;
	private readonly timers = new Set<ReturnType<typeof setTimeout>>();
	private readonly streams = new Set<Stream>();
	private readonly lineWaiters = new Set<() => void>();
	private logChain: Promise<void> = Promise.resolve();
	private logError: Error | null = null;
	private finishing: Promise<void> | null = null;

	private constructor(options: FakeTunnelOptions) {
		this.options = options;
		this.haConnections = options.haConnections ?? 4;
		this.gracePeriodMs = options.gracePeriodMs ?? 5_000;
		this.connectorId = options.connectorId ?? FAKE_CONNECTOR_ID;
		this.exitPromise = new Promise((resolve) => {
			this.resolveExit = resolve;
		});
		this.metricsServer = createServer((req, res) => this.handleMetrics(req, res));
		this.originServer = createServer((req, res) => this.handleOrigin(req, res));
	}

	/** Start listening and register connections */
	static async start(options: FakeTunnelOptions = {}): Promise<FakeTunnel> {
		const tunnel = new FakeTunnel(options);
		if (options.logDirectory !== undefined) {
			await mkdir(options.logDirectory, { recursive: true });
		}
		tunnel.metricsPort = await listen(tunnel.metricsServer);
		tunnel.originPort = await listen(tunnel.originServer);

		tunnel.log('info', `Starting tunnel tunnelID=${tunnel.connectorId}`);
		tunnel.log('info', `Starting Hello World server at 127.0.0.1:${tunnel.originPort}`);
		tunnel.log('info', `Starting metrics server on 127.0.0.1:${tunnel.metricsPort}/metrics`);

		const connectDelayMs = options.connectDelayMs ?? 0;
		if (connectDelayMs > 0) {
			tunnel.schedule(() => tunnel.registerAll(), connectDelayMs);
		} else {
			tunnel.registerAll();
		}
		return tunnel;
	}

	get metricsUrl(): string {
		return `http://127.0.0.1:${this.metricsPort}`;
	}

	get tunnelUrl(): string {
		return `http://127.0.0.1:${this.originPort}`;
	}

	get readyConnections(): number {
		return this.shuttingDown ? 0 : this.connections;
	}

	get exited(): boolean {
		return this.exitStatus !== null;
	}

	/** Streams currently being served */
	get inFlight(): number {
		return this.streams.size;
	}

	/** Last failure writing a log file, if any */
	get logWriteError(): Error | null {
		return this.logError;
	}

	signal(signal: TerminationSignal): void {
		if (this.exited || this.shuttingDown) return;
		this.shuttingDown = true;
		this.log(
			'info',
			`Initiating graceful shutdown due to signal ${signal.slice(3)} ... gracePeriod=${this.gracePeriodMs}ms`,
		);
		if (this.streams.size === 0) {
			void this.finish({ code: 0, signal: null });
			return;
		}
		// Each stream's close handler finishes the shutdown once the last one is gone
		this.schedule(() => {
			for (const stream of [...this.streams]) {
				clearInterval(stream.timer);
				stream.res.end(`${TERMINAL_LINE}\n`);
			}
		}, this.gracePeriodMs);
	}

	async writeLine(line: string): Promise<void> {
		if (this.options.stdinControl === false) {
			throw new Error('Tunnel was started without stdin control');
		}
		if (this.exited) {
			throw new Error('stdin is closed');
		}
		const command = line.trim();
		const match = command.match(/^reconnect\s+(\S+)$/);
		if (!match) {
			this.log('info', `Unknown command ${command}`);
			return;
		}
		const downMs = parseDuration(match[1]);
		if (this.connections === 0) {
			this.log('info', 'No connection to reconnect');
			return;
		}
		this.connections--;
		this.log('info', `Restarting connection for ${downMs}ms`, { connections: this.connections });
		this.schedule(() => {
			if (this.shuttingDown) return;
			this.connections = Math.min(this.connections + 1, this.haConnections);
			this.log('info', 'Registered tunnel connection', { connIndex: this.connections - 1 });
		}, downMs);
	}

	waitForExit(timeoutMs: number): Promise<ExitStatus | null> {
		if (this.exitStatus) return Promise.resolve(this.exitStatus);
		return new Promise((resolve) => {
			const timer = setTimeout(() => resolve(null), timeoutMs);
			void this.exitPromise.then((status) => {
				clearTimeout(timer);
				resolve(status);
			});
		});
	}

	/** Stop immediately, as if killed */
	async kill(): Promise<ExitStatus> {
		if (!this.exited) {
			for (const stream of [...this.streams]) stream.res.destroy();
			await this.finish({ code: null, signal: 'SIGKILL' });
		}
		return this.exitPromise;
	}

	/** Wait until every log line so far has reached its file */
	async flushLogs(): Promise<void> {
		await this.logChain;
	}

	/**
	 * Iterate stderr lines from the start. Ends after exit or when no line
	 * arrives within `idleTimeoutMs`.
	 */
	async *lines(idleTimeoutMs = 5_000): AsyncGenerator<string> {
		let index = 0;
		for (;;) {
			while (index < this.stderr.length) {
				yield this.stderr[index++];
			}
			if (this.exited) return;
			const woke = await new Promise<boolean>((resolve) => {
				const wake = (): void => {
					clearTimeout(timer);
					resolve(true);
				};
				const timer = setTimeout(() => {
					this.lineWaiters.delete(wake);
					resolve(false);
				}, idleTimeoutMs);
				this.lineWaiters.add(wake);
			});
			if (!woke) return;
		}
	}

	// ─── Servers ────────────────────────────────────────────────────────────────

	private handleMetrics(req: IncomingMessage, res: ServerResponse): void {
		const url = new URL(req.url ?? '/', 'http://127.0.0.1');
		if (url.pathname !== '/ready') {
			res.writeHead(404, { 'content-type': 'text/plain' });
			res.end('404 page not found\n');
			return;
		}
		const ready = this.readyConnections;
		const status = ready > 0 ? 200 : 503;
		res.writeHead(status, { 'content-type': 'application/json' });
		res.end(JSON.stringify({ status, readyConnections: ready, connectorId: this.connectorId }));
	}

	private handleOrigin(req: IncomingMessage, res: ServerResponse): void {
		const url = new URL(req.url ?? '/', 'http://127.0.0.1');
		if (this.shuttingDown || this.connections === 0) {
			res.writeHead(503, { 'content-type': 'text/plain' });
			res.end('no connection available\n');
			return;
		}

		if (url.pathname === '/sse') {
			this.openStream(res, url.searchParams.get('freq') ?? '1s');
			return;
		}

		this.log('debug', `${req.method ?? 'GET'} ${url.pathname} 200`, { originService: 'hello_world' });
		res.writeHead(200, { 'content-type': 'text/plain' });
		res.end('Hello World\n');
	}

	private openStream(res: ServerResponse, freq: string): void {
		let intervalMs: number;
		try {
			intervalMs = parseDuration(freq);
		} catch (err) {
			res.writeHead(400, { 'content-type': 'text/plain' });
			res.end(`${err instanceof Error ? err.message : String(err)}\n`);
			return;
		}

		res.writeHead(200, { 'content-type': 'text/event-stream', 'cache-control': 'no-cache' });
		res.flushHeaders();

		let count = 0;
		const send = (): void => {
			res.write(`${count++}\n\n`);
		};
		send();
		const stream: Stream = { res, timer: setInterval(send, intervalMs) };
		this.streams.add(stream);
		this.log('debug', `GET /sse 200 freq=${freq}`, { originService: 'hello_world' });

		res.on('close', () => {
			clearInterval(stream.timer);
			this.streams.delete(stream);
			if (this.shuttingDown && this.streams.size === 0 && !this.exited) {
				void this.finish({ code: 0, signal: null });
			}
		});
	}

	// ─── Lifecycle ──────────────────────────────────────────────────────────────

	private registerAll(): void {
		for (let i = 0; i < this.haConnections; i++) {
			this.connections++;
			this.log('info', 'Registered tunnel connection', { connIndex: i });
		}
	}

	private schedule(fn: () => void, ms: number): void {
		const timer = setTimeout(() => {
			this.timers.delete(timer);
			fn();
		}, ms);
		this.timers.add(timer);
	}

	private finish(status: ExitStatus): Promise<void> {
		if (!this.finishing) {
			this.finishing = this.shutdownNow(status);
		}
		return this.finishing;
	}

	private async shutdownNow(status: ExitStatus): Promise<void> {
		for (const timer of this.timers) clearTimeout(timer);
		this.timers.clear();
		for (const stream of this.streams) clearInterval(stream.timer);
		this.connections = 0;
		this.log('info', 'Tunnel server stopped');

		await Promise.all([close(this.metricsServer), close(this.originServer)]);
		await this.logChain;

		this.exitStatus = status;
		this.resolveExit(status);
		this.wakeLineWaiters();
	}

	// ─── Logging ────────────────────────────────────────────────────────────────

	private log(level: FakeLogLevel, message: string, fields: Record<string, unknown> = {}): void {
		if (level === 'debug' && this.options.loglevel !== 'debug') return;
		const line = JSON.stringify({ level, time: new Date().toISOString(), message, ...fields });
		this.stderr.push(line);
		this.wakeLineWaiters();

		const { logFile, logDirectory } = this.options;
		if (logFile !== undefined) {
			this.enqueue(() => appendFile(logFile, `${line}\n`, 'utf-8'));
		}
		if (logDirectory !== undefined) {
			const path = join(logDirectory, FAKE_LOG_FILE_NAME);
			const threshold = this.options.rotateAfterBytes ?? 1_000_000;
			this.enqueue(async () => {
				await appendFile(path, `${line}\n`, 'utf-8');
				if ((await fileSize(path)) > threshold) {
					await rotateFile(path, { keep: 1 });
				}
			});
		}
	}

	private enqueue(write: () => Promise<unknown>): void {
		this.logChain = this.logChain.then(write).then(
			() => undefined,
			(err: unknown) => {
				this.logError = err instanceof Error ? err : new Error(String(err));
			},
		);
	}

	private wakeLineWaiters(): void {
		const waiters = [...this.lineWaiters];
		this.lineWaiters.clear();
		for (const wake of waiters) wake();
	}
}
