/**
 * Console logger: one line per entry on stderr.
 */

import type { LogEntry, LogLevel, Logger } from '@tunnelprobe/sdk';
import { formatCompact, formatVerbose, isLogLevel, shouldLog } from './format.js';

export type ConsoleWrite = (line: string) => void;

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private level: LogLevel = 'info';
	private color = false;
	private verbose = false;
	private readonly write: ConsoleWrite;

	constructor(write: ConsoleWrite = (line) => process.stderr.write(`${line}\n`)) {
		this.write = write;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		if (config.level !== undefined) {
			if (!isLogLevel(config.level)) {
				throw new Error(`Invalid console logger level: ${JSON.stringify(config.level)}`);
			}
			this.level = config.level;
		}
		this.color = typeof config.color === 'boolean' ? config.color : process.stderr.isTTY === true;
		this.verbose = config.verbose === true;
	}

	async log(entry: LogEntry): Promise<void> {
		if (!shouldLog(entry, this.level)) return;
		try {
			this.write(this.verbose ? formatVerbose(entry, this.color) : formatCompact(entry, this.color));
		} catch {
			// Loggers must not throw
		}
	}

	async flush(): Promise<void> {}

	async shutdown(): Promise<void> {}
}
