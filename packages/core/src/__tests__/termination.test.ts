import { FakeTunnel } from '@tunnelprobe/testing';
import { afterEach, describe, expect, it } from 'vitest';
import { InvariantError, NotReadyError } from '../errors.js';
import { ReadinessPoller } from '../readiness.js';
import { TerminationScenario, defaultMinStreamLines, supportedSignals } from '../termination.js';

const POLICY = { maxAttempts: 40, delayMs: 20, timeoutMs: 1_000 };

function scenarioFor(fake: FakeTunnel, gracePeriodMs: number, minStreamLines?: number): TerminationScenario {
	return new TerminationScenario(fake, {
		poller: new ReadinessPoller({ metricsUrl: fake.metricsUrl, policy: POLICY, disconnectPolicy: POLICY }),
		gracePeriodMs,
		timeoutMs: 2_000,
		tunnelUrl: fake.tunnelUrl,
		eventIntervalMs: 50,
		minStreamLines,
	});
}

describe('supportedSignals', () => {
	it('offers SIGINT everywhere but Windows', () => {
		expect(supportedSignals('linux')).toEqual(['SIGTERM', 'SIGINT']);
		expect(supportedSignals('darwin')).toEqual(['SIGTERM', 'SIGINT']);
		expect(supportedSignals('win32')).toEqual(['SIGTERM']);
	});
});

describe('defaultMinStreamLines', () => {
	it('expects an event and its blank separator per interval', () => {
		expect(defaultMinStreamLines(5_000, 1_000)).toBe(10);
		expect(defaultMinStreamLines(300, 50)).toBe(12);
	});
});

describe('TerminationScenario', () => {
	let fake: FakeTunnel | undefined;

	afterEach(async () => {
		await fake?.kill();
		fake = undefined;
	});

	it('builds the stream URL from the tunnel URL and event interval', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		expect(scenarioFor(fake, 1_000).streamUrl).toBe(`${fake.tunnelUrl}/sse?freq=0.05s`);
	});

	it('refuses to signal before readiness was observed', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		const scenario = scenarioFor(fake, 1_000);

		const err = await scenario.terminateBySignal('SIGTERM').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(InvariantError);
		if (!(err instanceof InvariantError)) return;
		expect(err.invariant).toBe('signal-after-ready');
		expect(fake.exited).toBe(false);
	});

	for (const signal of supportedSignals()) {
		it(`exits within the grace period with no connection (${signal})`, async () => {
			fake = await FakeTunnel.start({ haConnections: 1, gracePeriodMs: 1_000 });

			const result = await scenarioFor(fake, 1_000).noConnectionShutdown(signal);

			expect(result.signal).toBe(signal);
			expect(result.exit).toEqual({ code: 0, signal: null });
			expect(result.durationMs).toBeLessThan(1_000);
			expect(result.stream).toBeUndefined();
		});

		it(`serves the in-flight stream through the grace period (${signal})`, async () => {
			fake = await FakeTunnel.start({ haConnections: 1, gracePeriodMs: 300 });

			const result = await scenarioFor(fake, 300, 4).gracefulShutdown(signal);

			expect(result.exit).toEqual({ code: 0, signal: null });
			expect(result.stream?.outcome).toBe('terminal');
			expect(result.stream?.lines).toBeGreaterThanOrEqual(4);
			expect(result.durationMs).toBeGreaterThanOrEqual(250);
		});

		it(`exits early once the client closes its stream (${signal})`, async () => {
			fake = await FakeTunnel.start({ haConnections: 1, gracePeriodMs: 2_000 });

			const result = await scenarioFor(fake, 2_000).shutdownOnceNoConnection(signal);

			expect(result.exit).toEqual({ code: 0, signal: null });
			expect(result.stream?.outcome).toBe('closed-early');
			expect(result.stream?.lines).toBe(2);
			expect(result.durationMs).toBeLessThan(2_000);
		});
	}

	it('fails when the stream is cut short of the expected lines', async () => {
		fake = await FakeTunnel.start({ haConnections: 1, gracePeriodMs: 100 });

		const err = await scenarioFor(fake, 100, 1_000).gracefulShutdown('SIGTERM').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(InvariantError);
		if (!(err instanceof InvariantError)) return;
		expect(err.invariant).toBe('stream-served-through-grace');
	});

	it('fails when the stream outlives the grace period', async () => {
		// the tunnel holds the stream for 1500ms while the harness allows 300ms
		fake = await FakeTunnel.start({ haConnections: 1, gracePeriodMs: 1_500 });

		const err = await scenarioFor(fake, 300, 4).gracefulShutdown('SIGTERM').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(InvariantError);
		if (!(err instanceof InvariantError)) return;
		expect(err.invariant).toBe('stream-ended-within-grace');
		expect(err.details).toMatchObject({ gracePeriodMs: 300, toleranceMs: 250 });
		expect(err.details.streamMs).toBeGreaterThan(550);
	});

	it('never signals a tunnel that does not become ready', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		await fake.writeLine('reconnect 10s');

		const err = await scenarioFor(fake, 1_000).gracefulShutdown('SIGTERM').catch((e: unknown) => e);

		expect(err).toBeInstanceOf(NotReadyError);
		expect(fake.exited).toBe(false);
		expect(fake.inFlight).toBe(0);
	});
});
