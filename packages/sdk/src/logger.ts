/**
 * Logger interface: sinks that receive harness log entries.
 */

import type { LogEntry } from './types.js';

export interface Logger {
	/** Unique logger ID */
	readonly id: string;

	/** Initialize with logger-specific config */
	init(config: Record<string, unknown>): Promise<void>;

	/** Record one entry. Must not throw. */
	log(entry: LogEntry): Promise<void>;

	/** Flush buffered entries */
	flush(): Promise<void>;

	/** Flush and release resources */
	shutdown(): Promise<void>;
}
