import { describe, expect, it } from 'vitest';
import { MockLogger, createTestEntry } from '../testing.js';

describe('MockLogger', () => {
	it('tracks lifecycle', async () => {
		const logger = new MockLogger();
		expect(logger.initialized).toBe(false);
		await logger.init({});
		expect(logger.initialized).toBe(true);

		await logger.flush();
		await logger.flush();
		expect(logger.flushCount).toBe(2);

		await logger.shutdown();
		expect(logger.shutdownCalled).toBe(true);
	});

	it('records entries and filters them', async () => {
		const logger = new MockLogger();
		await logger.log(createTestEntry({ phase: 'process.start', level: 'info' }));
		await logger.log(createTestEntry({ phase: 'process.kill', level: 'warn' }));
		await logger.log(createTestEntry({ phase: 'process.start', level: 'debug' }));

		expect(logger.entries).toHaveLength(3);
		expect(logger.byPhase('process.start')).toHaveLength(2);
		expect(logger.byLevel('warn')[0].phase).toBe('process.kill');

		logger.clear();
		expect(logger.entries).toHaveLength(0);
	});
});

describe('createTestEntry', () => {
	it('applies overrides over defaults', () => {
		const entry = createTestEntry({ message: 'custom', attempt: 3 });
		expect(entry.message).toBe('custom');
		expect(entry.attempt).toBe(3);
		expect(entry.level).toBe('info');
		expect(entry.timestamp).toBe('2024-01-15T10:30:45.123Z');
	});
});
