/**
 * ManagedProcess: a child process owned by exactly one ProcessSupervisor scope.
 *
 * Captured stdout/stderr are read continuously into line buffers as soon as
 * the child starts, so a tunnel that writes a lot of stderr never blocks
 * on a full pipe.
 */

import type { ChildProcess } from 'node:child_process';
import type { ExitStatus, TerminationSignal, TunnelHandle } from '@tunnelprobe/sdk';
import { HarnessError } from './errors.js';
import type { RunLogger } from './logger.js';
import { settleWithin } from './timing.js';

export type OutputStream = 'stdout' | 'stderr';

export interface ManagedProcessInfo {
	/** Full argv, including any elevation prefix */
	command: string[];
	allowInput: boolean;
	captureOutput: boolean;
	root: boolean;
}

// ─── Line buffer ─────────────────────────────────────────────────────────────

class LineBuffer {
	readonly lines: string[] = [];
	private partial = '';
	private closed = false;
	private readonly waiters = new Set<() => void>();

	get isClosed(): boolean {
		return this.closed;
	}

	push(chunk: string): void {
		const parts = (this.partial + chunk).split('\n');
		this.partial = parts.pop() ?? '';
		for (const line of parts) {
			this.lines.push(line.endsWith('\r') ? line.slice(0, -1) : line);
		}
		if (parts.length > 0) this.notify();
	}

	close(): void {
		if (this.closed) return;
		if (this.partial) {
			this.lines.push(this.partial);
			this.partial = '';
		}
		this.closed = true;
		this.notify();
	}

	text(): string {
		const full = this.lines.join('\n');
		return this.partial ? (full ? `${full}\n${this.partial}` : this.partial) : full;
	}

	/** Resolves true when new lines arrive or the stream closes, false after `timeoutMs` */
	waitForChange(timeoutMs: number): Promise<boolean> {
		if (this.closed) return Promise.resolve(true);
		return new Promise((resolve) => {
			const wake = (): void => {
				clearTimeout(timer);
				resolve(true);
			};
			const timer = setTimeout(() => {
				this.waiters.delete(wake);
				resolve(false);
			}, timeoutMs);
			this.waiters.add(wake);
		});
	}

	private notify(): void {
		const waiters = [...this.waiters];
		this.waiters.clear();
		for (const wake of waiters) wake();
	}
}

// ─── ManagedProcess ──────────────────────────────────────────────────────────

export class ManagedProcess implements TunnelHandle {
	readonly command: string[];
	readonly allowInput: boolean;
	readonly captureOutput: boolean;
	readonly root: boolean;
	readonly startedAt = Date.now();

	private readonly child: ChildProcess;
	private readonly logger: RunLogger;
	private readonly outputs: Record<OutputStream, LineBuffer> = {
		stdout: new LineBuffer(),
		stderr: new LineBuffer(),
	};
	private readonly exitPromise: Promise<ExitStatus>;
	private exitStatus: ExitStatus | null = null;
	private writeChain: Promise<void> = Promise.resolve();
	private terminationClaimed = false;
	private lastError: Error | null = null;

	constructor(child: ChildProcess, info: ManagedProcessInfo, logger: RunLogger) {
		this.child = child;
		this.command = info.command;
		this.allowInput = info.allowInput;
		this.captureOutput = info.captureOutput;
		this.root = info.root;
		this.logger = logger;

		this.exitPromise = new Promise((resolve) => {
			child.once('exit', (code, signal) => {
				this.exitStatus = { code, signal };
				resolve(this.exitStatus);
			});
		});

		child.on('error', (err) => {
			this.lastError = err;
			this.logger.warn('process.exit', `Child process error: ${err.message}`, { pid: this.pid });
		});

		this.attachOutput('stdout');
		this.attachOutput('stderr');

		child.stdin?.on('error', (err) => {
			this.lastError = err;
			this.logger.warn('process.exit', `stdin error: ${err.message}`, { pid: this.pid });
		});
	}

	get pid(): number | undefined {
		return this.child.pid;
	}

	get exited(): boolean {
		return this.exitStatus !== null;
	}

	get status(): ExitStatus | null {
		return this.exitStatus;
	}

	/** Last error reported by the child or its stdin, if any */
	get error(): Error | null {
		return this.lastError;
	}

	signal(signal: TerminationSignal): void {
		this.kill(signal);
	}

	/** Send any signal. Returns false if the process is gone. */
	kill(signal: NodeJS.Signals): boolean {
		if (this.exited) return false;
		this.logger.info('process.signal', `Sending ${signal}`, { pid: this.pid });
		return this.child.kill(signal);
	}

	/**
	 * Write one line to the child's stdin. Writes are serialized: a second
	 * caller waits until the first write has been flushed.
	 */
	writeLine(line: string): Promise<void> {
		const write = this.writeChain.then(() => this.writeNow(line));
		// The caller sees the failure through `write`; the chain only orders writes.
		this.writeChain = write.catch(() => undefined);
		return write;
	}

	waitForExit(timeoutMs: number): Promise<ExitStatus | null> {
		if (this.exitStatus) return Promise.resolve(this.exitStatus);
		return settleWithin(this.exitPromise, timeoutMs).then((r) => (r.settled ? r.value : null));
	}

	/** Everything captured on a stream so far */
	output(stream: OutputStream): string {
		return this.outputs[stream].text();
	}

	/**
	 * Iterate captured lines from the beginning of the stream. Ends when the
	 * stream closes or no new line arrives within `idleTimeoutMs`.
	 */
	async *lines(stream: OutputStream, idleTimeoutMs = 5_000): AsyncGenerator<string> {
		const buffer = this.outputs[stream];
		let index = 0;
		for (;;) {
			while (index < buffer.lines.length) {
				yield buffer.lines[index++];
			}
			if (buffer.isClosed) return;
			if (!(await buffer.waitForChange(idleTimeoutMs))) return;
		}
	}

	/** Wait until both output streams have closed, up to `timeoutMs` */
	async drain(timeoutMs: number): Promise<boolean> {
		const deadline = Date.now() + timeoutMs;
		for (const buffer of Object.values(this.outputs)) {
			while (!buffer.isClosed) {
				const remaining = deadline - Date.now();
				if (remaining <= 0) return false;
				await buffer.waitForChange(remaining);
			}
		}
		return true;
	}

	/**
	 * Claim the right to terminate this process. Only the first caller gets
	 * true; everyone else must just wait for exit.
	 */
	claimTermination(): boolean {
		if (this.terminationClaimed) return false;
		this.terminationClaimed = true;
		return true;
	}

	private attachOutput(stream: OutputStream): void {
		const readable = this.child[stream];
		const buffer = this.outputs[stream];
		if (!readable) {
			buffer.close();
			return;
		}
		readable.setEncoding('utf-8');
		readable.on('data', (chunk: string) => buffer.push(chunk));
		readable.on('close', () => buffer.close());
		readable.on('error', (err) => {
			this.lastError = err;
			buffer.close();
		});
	}

	private writeNow(line: string): Promise<void> {
		const stdin = this.child.stdin;
		if (!this.allowInput || !stdin) {
			return Promise.reject(
				new HarnessError('INPUT_DISABLED', `Process ${this.pid ?? '?'} was started without stdin`),
			);
		}
		if (this.exited || stdin.destroyed || !stdin.writable) {
			return Promise.reject(
				new HarnessError('INPUT_CLOSED', `stdin of process ${this.pid ?? '?'} is closed`),
			);
		}
		const payload = line.endsWith('\n') ? line : `${line}\n`;
		return new Promise((resolve, reject) => {
			stdin.write(payload, 'utf-8', (err) => {
				if (err) reject(new HarnessError('INPUT_WRITE_FAILED', err.message, { cause: err }));
				else resolve();
			});
		});
	}
}
