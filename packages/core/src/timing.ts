/**
 * Timer helpers shared by the polling and scenario code.
 *
 * Nothing in the harness blocks without a bound: every wait goes through
 * one of these with an explicit timeout.
 */

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Settled<T> = { settled: true; value: T } | { settled: false };

/**
 * Wait for `promise` for at most `timeoutMs`.
 * Resolves `{ settled: false }` if it is still pending; rejections propagate.
 */
export async function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<Settled<T>> {
	type Outcome = { kind: 'value'; value: T } | { kind: 'error'; error: unknown } | { kind: 'timeout' };

	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<Outcome>((resolve) => {
		timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
	});
	// Both branches resolve, so a late rejection of an abandoned promise is still handled.
	const outcome = promise.then(
		(value): Outcome => ({ kind: 'value', value }),
		(error: unknown): Outcome => ({ kind: 'error', error }),
	);

	try {
		const result = await Promise.race([outcome, timeout]);
		if (result.kind === 'error') throw result.error;
		if (result.kind === 'timeout') return { settled: false };
		return { settled: true, value: result.value };
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Like settleWithin, but rejects with the error built by `onTimeout`
 * when the deadline passes first.
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error,
): Promise<T> {
	const result = await settleWithin(promise, timeoutMs);
	if (!result.settled) throw onTimeout();
	return result.value;
}

/** Milliseconds elapsed since `startedAt` (from `Date.now()`) */
export function elapsedSince(startedAt: number): number {
	return Date.now() - startedAt;
}
