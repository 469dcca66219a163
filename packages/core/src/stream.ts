/**
 * Long-lived streaming client used as the in-flight request during
 * termination scenarios.
 *
 * The stream runs as a background task: `connected` resolves once response
 * headers arrive, `done` once the server sends the terminal status line,
 * closes the stream, or the client closes it early.
 */

import { HarnessError, TransportError, UnexpectedStatusError } from './errors.js';
import { RunLogger } from './logger.js';
import { classifyFetchError } from './requests.js';
import { settleWithin } from './timing.js';

/** Line the tunnel writes into an in-flight response when it gives up on the origin */
export const TERMINAL_STATUS_LINE = '502 Bad Gateway';

export type StreamOutcome = 'terminal' | 'eof' | 'closed-early';

export interface StreamResult {
	url: string;
	outcome: StreamOutcome;
	/** Lines received before the terminal line (blank lines included) */
	lines: number;
}

export interface StreamOptions {
	/** Fail when no data arrives for this long (default: 5000) */
	idleTimeoutMs?: number;
	/** Close the stream from the client side after this many lines */
	closeAfterLines?: number;
	/** Line that ends the stream (default: "502 Bad Gateway") */
	terminalLine?: string;
	logger?: RunLogger;
}

export interface StreamTask {
	/** true once headers arrived; false if the request failed first (see `done`) */
	connected: Promise<boolean>;
	done: Promise<StreamResult>;
}

/**
 * Split a byte stream into lines. `\r\n` and `\n` both end a line; a
 * trailing partial line is emitted when the stream ends.
 */
export class LineSplitter {
	private readonly decoder = new TextDecoder();
	private partial = '';

	push(chunk: Uint8Array): string[] {
		const parts = (this.partial + this.decoder.decode(chunk, { stream: true })).split('\n');
		this.partial = parts.pop() ?? '';
		return parts.map(stripCr);
	}

	end(): string[] {
		const rest = this.partial + this.decoder.decode();
		this.partial = '';
		return rest ? [stripCr(rest)] : [];
	}
}

function stripCr(line: string): string {
	return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/** Start streaming `url` in the background */
export function openStream(url: string, options: StreamOptions = {}): StreamTask {
	const {
		idleTimeoutMs = 5_000,
		closeAfterLines,
		terminalLine = TERMINAL_STATUS_LINE,
		logger = new RunLogger(),
	} = options;

	let markConnected: (value: boolean) => void = () => undefined;
	const connected = new Promise<boolean>((resolve) => {
		markConnected = resolve;
	});

	const run = async (): Promise<StreamResult> => {
		const controller = new AbortController();
		const headerTimer = setTimeout(() => controller.abort(), idleTimeoutMs);
		let res: Response;
		try {
			res = await fetch(url, { signal: controller.signal, headers: { accept: 'text/event-stream' } });
		} catch (err) {
			throw new TransportError(url, classifyFetchError(err), err instanceof Error ? err.message : String(err), {
				cause: err,
			});
		} finally {
			clearTimeout(headerTimer);
		}

		if (res.status !== 200 || !res.body) {
			const body = await res.text();
			throw new UnexpectedStatusError(url, res.status, 200, body);
		}

		markConnected(true);
		logger.info('stream.open', `Streaming ${url}`, { url });

		const reader = res.body.getReader();
		const splitter = new LineSplitter();
		let lines = 0;

		const finish = async (outcome: StreamOutcome): Promise<StreamResult> => {
			if (outcome !== 'eof') {
				controller.abort();
				// The body may already be errored by the abort
				await reader.cancel().catch(() => undefined);
			}
			logger.info('stream.close', `Stream ended (${outcome}) after ${lines} line(s)`, { url });
			return { url, outcome, lines };
		};

		for (;;) {
			const read = await settleWithin(reader.read(), idleTimeoutMs).catch((err: unknown) => {
				throw new TransportError(url, classifyFetchError(err), err instanceof Error ? err.message : String(err), {
					cause: err,
				});
			});
			if (!read.settled) {
				controller.abort();
				throw new TransportError(url, 'timeout', `No data for ${idleTimeoutMs}ms`);
			}

			const chunk = read.value;
			const received = chunk.done ? splitter.end() : splitter.push(chunk.value);
			for (const line of received) {
				if (line === terminalLine) return finish('terminal');
				lines++;
				if (closeAfterLines !== undefined && lines >= closeAfterLines) return finish('closed-early');
			}
			if (chunk.done) return finish('eof');
		}
	};

	const done = run().catch((err: unknown) => {
		markConnected(false);
		logger.warn('stream.close', `Stream failed: ${err instanceof Error ? err.message : String(err)}`, { url });
		throw err instanceof HarnessError ? err : new HarnessError('STREAM_FAILED', String(err), { cause: err });
	});

	return { connected, done };
}
