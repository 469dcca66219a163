/**
 * Run logging context.
 *
 * LoggerManager fans each entry out to every configured sink. RunLogger is
 * the context handed to every harness component: created once per run,
 * narrowed per scenario with child(), and closed (drained, flushed, shut
 * down) when the run completes.
 */

import type { LogEntry, LogLevel, LogPhase, Logger } from '@tunnelprobe/sdk';

export class LoggerManager {
	private readonly loggers: Logger[] = [];

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	/**
	 * Fan out a log entry to all loggers.
	 * One sink failing does not keep the entry from the others.
	 */
	async log(entry: LogEntry): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.log(entry)));
	}

	/** Flush all loggers */
	async flush(): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.flush()));
	}

	/** Shutdown all loggers */
	async shutdown(): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.shutdown()));
	}
}

/** Optional structured fields attached to an entry */
export type LogFields = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'phase' | 'message'>>;

interface RunLoggerState {
	manager: LoggerManager;
	pending: Set<Promise<void>>;
	closed: boolean;
}

export class RunLogger {
	private state: RunLoggerState;
	private readonly context: LogFields;

	constructor(manager: LoggerManager = new LoggerManager(), context: LogFields = {}) {
		this.state = { manager, pending: new Set(), closed: false };
		this.context = context;
	}

	/** A logger that shares this run's sinks but stamps extra context on each entry */
	child(context: LogFields): RunLogger {
		const child = new RunLogger(this.state.manager, { ...this.context, ...context });
		child.state = this.state;
		return child;
	}

	debug(phase: LogPhase, message: string, fields?: LogFields): void {
		this.emit('debug', phase, message, fields);
	}

	info(phase: LogPhase, message: string, fields?: LogFields): void {
		this.emit('info', phase, message, fields);
	}

	warn(phase: LogPhase, message: string, fields?: LogFields): void {
		this.emit('warn', phase, message, fields);
	}

	error(phase: LogPhase, message: string, fields?: LogFields): void {
		this.emit('error', phase, message, fields);
	}

	/** Wait for in-flight entries, then flush and shut down every sink. Idempotent. */
	async close(): Promise<void> {
		if (this.state.closed) return;
		this.state.closed = true;
		await Promise.allSettled([...this.state.pending]);
		await this.state.manager.flush();
		await this.state.manager.shutdown();
	}

	private emit(level: LogLevel, phase: LogPhase, message: string, fields?: LogFields): void {
		if (this.state.closed) return;
		const entry: LogEntry = {
			...this.context,
			...fields,
			timestamp: new Date().toISOString(),
			level,
			phase,
			message,
		};
		const { pending } = this.state;
		const write: Promise<void> = this.state.manager.log(entry).finally(() => {
			pending.delete(write);
		});
		pending.add(write);
	}
}
