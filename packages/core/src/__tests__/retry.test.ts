import { describe, expect, it, vi } from 'vitest';
import { FlakyRunError, HarnessError, RetryExhaustedError } from '../errors.js';
import { runFlaky } from '../flaky.js';
import {
	DEFAULT_DISCONNECT_POLICY,
	DEFAULT_POLL_POLICY,
	maxPolicyDurationMs,
	retryUntil,
	validatePolicy,
} from '../retry.js';
import { elapsedSince, settleWithin, sleep, withTimeout } from '../timing.js';

const FAST = { maxAttempts: 3, delayMs: 5, timeoutMs: 200 };

describe('settleWithin', () => {
	it('resolves the value when the promise settles in time', async () => {
		await expect(settleWithin(Promise.resolve('ok'), 50)).resolves.toEqual({ settled: true, value: 'ok' });
	});

	it('reports a promise still pending after the timeout', async () => {
		const pending = new Promise<string>(() => undefined);
		await expect(settleWithin(pending, 20)).resolves.toEqual({ settled: false });
	});

	it('propagates rejections', async () => {
		await expect(settleWithin(Promise.reject(new Error('boom')), 50)).rejects.toThrow('boom');
	});
});

describe('withTimeout', () => {
	it('throws the error built on timeout', async () => {
		const slow = sleep(200).then(() => 'late');
		await expect(withTimeout(slow, 10, () => new Error('too slow'))).rejects.toThrow('too slow');
	});

	it('passes the value through', async () => {
		await expect(withTimeout(Promise.resolve(7), 50, () => new Error('unused'))).resolves.toBe(7);
	});
});

describe('elapsedSince', () => {
	it('measures from a Date.now() timestamp', async () => {
		const startedAt = Date.now();
		await sleep(20);
		expect(elapsedSince(startedAt)).toBeGreaterThanOrEqual(15);
	});
});

describe('policies', () => {
	it('defaults match the harness budget', () => {
		expect(DEFAULT_POLL_POLICY).toEqual({ maxAttempts: 5, delayMs: 7000, timeoutMs: 7000 });
		expect(DEFAULT_DISCONNECT_POLICY).toEqual({ maxAttempts: 35, delayMs: 1000, timeoutMs: 1000 });
	});

	it('bounds the total duration', () => {
		expect(maxPolicyDurationMs(DEFAULT_POLL_POLICY)).toBe(70_000);
		expect(maxPolicyDurationMs(FAST)).toBe(615);
	});

	it('rejects an empty budget', () => {
		expect(() => validatePolicy({ maxAttempts: 0, delayMs: 0, timeoutMs: 10 })).toThrow(HarnessError);
		expect(() => validatePolicy({ maxAttempts: 1, delayMs: -1, timeoutMs: 10 })).toThrow(
			'delayMs must be >= 0 and timeoutMs > 0, got -1/10',
		);
	});
});

describe('retryUntil', () => {
	it('returns the first success', async () => {
		let calls = 0;
		const result = await retryUntil(async ({ attempt }) => {
			calls++;
			if (attempt < 3) throw new Error(`fail ${attempt}`);
			return 'done';
		}, FAST);
		expect(result).toBe('done');
		expect(calls).toBe(3);
	});

	it('throws RetryExhaustedError carrying the last failure', async () => {
		const err = await retryUntil(async ({ attempt }) => {
			throw new Error(`fail ${attempt}`);
		}, FAST).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(RetryExhaustedError);
		if (!(err instanceof RetryExhaustedError)) return;
		expect(err.attempts).toBe(3);
		expect(err.message).toBe('All 3 attempts failed: fail 3');
	});

	it('stops on a non-retryable error', async () => {
		let calls = 0;
		const fatal = new Error('fatal');
		await expect(
			retryUntil(
				async () => {
					calls++;
					throw fatal;
				},
				FAST,
				{ isRetryable: (e) => e !== fatal },
			),
		).rejects.toBe(fatal);
		expect(calls).toBe(1);
	});

	it('abandons an attempt after the per-attempt timeout and aborts its signal', async () => {
		const signals: AbortSignal[] = [];
		const result = await retryUntil(
			async ({ attempt, signal }) => {
				signals.push(signal);
				if (attempt === 1) await sleep(500);
				return attempt;
			},
			{ maxAttempts: 2, delayMs: 0, timeoutMs: 30 },
		);
		expect(result).toBe(2);
		expect(signals[0].aborted).toBe(true);
	});

	it('reports every retried failure but not the last one', async () => {
		const onRetry = vi.fn();
		await retryUntil(
			async () => {
				throw new Error('nope');
			},
			FAST,
			{ onRetry },
		).catch(() => undefined);
		expect(onRetry).toHaveBeenCalledTimes(2);
		expect(onRetry.mock.calls.map((c) => c[1])).toEqual([1, 2]);
	});
});

describe('runFlaky', () => {
	it('returns after the first pass', async () => {
		const fn = vi.fn(async (run: number) => {
			if (run === 1) throw new Error('edge hiccup');
			return run * 10;
		});
		await expect(runFlaky(fn)).resolves.toEqual({ value: 20, runs: 2, passes: 1 });
		expect(fn).toHaveBeenCalledTimes(2);
	});

	it('throws FlakyRunError after the run budget', async () => {
		const err = await runFlaky(async () => {
			throw new Error('still broken');
		}).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(FlakyRunError);
		if (!(err instanceof FlakyRunError)) return;
		expect(err.failures).toHaveLength(3);
		expect(err.message).toBe('Passed 0 of 3 runs, needed 1. Last failure: still broken');
	});

	it('stops once the remaining runs cannot reach the required passes', async () => {
		const fn = vi.fn(async () => {
			throw new Error('no');
		});
		await expect(runFlaky(fn, { maxRuns: 3, minPasses: 3 })).rejects.toBeInstanceOf(FlakyRunError);
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('rejects a policy that can never pass', async () => {
		await expect(runFlaky(async () => 1, { maxRuns: 2, minPasses: 3 })).rejects.toThrow(
			'minPasses must be between 1 and maxRuns (2), got 3',
		);
	});
});
