/**
 * JSONL sink behind `--log-file`.
 *
 * Entries are buffered and appended in order. With `maxSize` set, the file
 * is rotated once an append takes it past that many bytes.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { LogEntry, Logger } from '@tunnelprobe/sdk';
import { fileSize, rotateFile } from './rotation.js';

const DEFAULT_KEEP = 5;
const DEFAULT_BUFFER_SIZE = 100;
const DEFAULT_FLUSH_INTERVAL_MS = 1_000;

function positive(config: Record<string, unknown>, key: string): number | undefined {
	const value = config[key];
	if (value === undefined) return undefined;
	if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
		throw new Error(`Invalid file logger option "${key}": ${JSON.stringify(value)}`);
	}
	return value;
}

export class FileLogger implements Logger {
	readonly id = 'file';
	private filePath = '';
	private maxSize: number | undefined;
	private keep = DEFAULT_KEEP;
	private bufferSize = DEFAULT_BUFFER_SIZE;
	private buffer: string[] = [];
	private writes: Promise<void> = Promise.resolve();
	private flushTimer: ReturnType<typeof setInterval> | null = null;
	private lastError: Error | null = null;

	get path(): string {
		return this.filePath;
	}

	/** Last failed write; entries of that write are lost */
	get writeError(): Error | null {
		return this.lastError;
	}

	/**
	 * Options: `path` (required), `maxSize` in bytes, `keep` rotated files,
	 * `bufferSize` entries and `flushIntervalMs`.
	 */
	async init(config: Record<string, unknown>): Promise<void> {
		if (typeof config.path !== 'string' || config.path.length === 0) {
			throw new Error('File logger needs a "path"');
		}
		this.filePath = resolve(config.path);
		this.maxSize = positive(config, 'maxSize');
		this.keep = positive(config, 'keep') ?? DEFAULT_KEEP;
		this.bufferSize = positive(config, 'bufferSize') ?? DEFAULT_BUFFER_SIZE;

		// Created up front so the file exists for tail -f
		await mkdir(dirname(this.filePath), { recursive: true });
		await appendFile(this.filePath, '', 'utf-8');

		this.flushTimer = setInterval(() => {
			void this.flush();
		}, positive(config, 'flushIntervalMs') ?? DEFAULT_FLUSH_INTERVAL_MS);
		this.flushTimer.unref();
	}

	async log(entry: LogEntry): Promise<void> {
		try {
			this.buffer.push(JSON.stringify(entry));
		} catch (err) {
			// Unserializable metadata; the entry is dropped
			this.lastError = err instanceof Error ? err : new Error(String(err));
			return;
		}
		if (this.buffer.length >= this.bufferSize) {
			await this.flush();
		}
	}

	async flush(): Promise<void> {
		if (this.buffer.length > 0) {
			const data = this.buffer.splice(0).map((line) => `${line}\n`).join('');
			this.writes = this.writes.then(() => this.write(data));
		}
		await this.writes;
	}

	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		await this.flush();
	}

	private async write(data: string): Promise<void> {
		try {
			await appendFile(this.filePath, data, 'utf-8');
			if (this.maxSize !== undefined && (await fileSize(this.filePath)) > this.maxSize) {
				await rotateFile(this.filePath, { keep: this.keep });
			}
		} catch (err) {
			// Loggers must not throw; the failure stays readable on writeError
			this.lastError = err instanceof Error ? err : new Error(String(err));
		}
	}
}
