import type { LogEntry, Logger } from '@tunnelprobe/sdk';
import { MockLogger } from '@tunnelprobe/sdk';
import { describe, expect, it } from 'vitest';
import { LoggerManager, RunLogger } from '../logger.js';

class FailingLogger implements Logger {
	readonly id = 'failing';
	async init(): Promise<void> {}
	async log(_entry: LogEntry): Promise<void> {
		throw new Error('disk full');
	}
	async flush(): Promise<void> {
		throw new Error('disk full');
	}
	async shutdown(): Promise<void> {}
}

describe('LoggerManager', () => {
	it('fans entries out to every logger', async () => {
		const a = new MockLogger('a');
		const b = new MockLogger('b');
		const manager = new LoggerManager();
		manager.addLogger(a);
		manager.addLogger(b);

		const logger = new RunLogger(manager);
		logger.info('run.start', 'hello');
		await logger.close();

		expect(a.entries.map((e) => e.message)).toEqual(['hello']);
		expect(b.entries.map((e) => e.message)).toEqual(['hello']);
	});

	it('keeps delivering when one logger fails', async () => {
		const good = new MockLogger();
		const manager = new LoggerManager();
		manager.addLogger(new FailingLogger());
		manager.addLogger(good);

		const logger = new RunLogger(manager);
		logger.error('process.exit', 'boom');
		await expect(logger.close()).resolves.toBeUndefined();

		expect(good.entries).toHaveLength(1);
		expect(good.flushCount).toBe(1);
		expect(good.shutdownCalled).toBe(true);
	});
});

describe('RunLogger', () => {
	it('stamps level, phase and context on each entry', async () => {
		const sink = new MockLogger();
		const manager = new LoggerManager();
		manager.addLogger(sink);
		const logger = new RunLogger(manager);

		logger.child({ scenario: 'termination' }).warn('termination.signal', 'Sending SIGTERM', { pid: 42 });
		logger.debug('readiness.attempt', 'not yet', { attempt: 2 });
		await logger.close();

		expect(sink.entries).toHaveLength(2);
		expect(sink.entries[0]).toMatchObject({
			level: 'warn',
			phase: 'termination.signal',
			message: 'Sending SIGTERM',
			scenario: 'termination',
			pid: 42,
		});
		expect(sink.entries[1].scenario).toBeUndefined();
		expect(sink.entries[1].attempt).toBe(2);
		expect(Number.isNaN(Date.parse(sink.entries[0].timestamp))).toBe(false);
	});

	it('closes once, from parent or child, and drops later entries', async () => {
		const sink = new MockLogger();
		const manager = new LoggerManager();
		manager.addLogger(sink);
		const logger = new RunLogger(manager);
		const child = logger.child({ scenario: 'reconnect' });

		await child.close();
		await logger.close();
		logger.info('run.stop', 'too late');

		expect(sink.flushCount).toBe(1);
		expect(sink.entries).toHaveLength(0);
	});

	it('works without sinks', async () => {
		const logger = new RunLogger();
		logger.info('run.start', 'nobody listens');
		await expect(logger.close()).resolves.toBeUndefined();
	});
});
