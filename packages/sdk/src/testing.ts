/**
 * Test doubles for code that consumes tunnelprobe loggers.
 */

import type { Logger } from './logger.js';
import type { LogEntry, LogLevel, LogPhase } from './types.js';

/**
 * Logger that records every entry in memory.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushCount = 0;
	shutdownCalled = false;

	constructor(id = 'mock') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushCount++;
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}

	/** Entries recorded for a phase */
	byPhase(phase: LogPhase): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	/** Entries recorded at a level */
	byLevel(level: LogLevel): LogEntry[] {
		return this.entries.filter((e) => e.level === level);
	}

	clear(): void {
		this.entries.length = 0;
	}
}

/** Build a log entry with sensible defaults */
export function createTestEntry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: '2024-01-15T10:30:45.123Z',
		level: 'info',
		phase: 'readiness.ready',
		message: 'tunnel ready with 1 connection(s)',
		...overrides,
	};
}
