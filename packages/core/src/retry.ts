/**
 * Retry-until-budget-exhausted helper.
 *
 * Policies are explicit values (see PollPolicy) rather than decorators:
 * fixed delay between attempts, a per-attempt timeout, and a hard cap on
 * the number of attempts. Total wall time is bounded by
 * maxAttempts * (delayMs + timeoutMs).
 */

import type { PollPolicy } from '@tunnelprobe/sdk';
import { HarnessError, RetryExhaustedError } from './errors.js';
import { sleep, withTimeout } from './timing.js';

/** Metrics listener port and default polling budget */
export const METRICS_PORT = 51000;
export const MAX_RETRIES = 5;
export const BACKOFF_MS = 7_000;
export const MAX_LOG_LINES = 50;

/** Default readiness wait: 5 attempts, 7s apart, 7s per request */
export const DEFAULT_POLL_POLICY: Readonly<PollPolicy> = Object.freeze({
	maxAttempts: MAX_RETRIES,
	delayMs: BACKOFF_MS,
	timeoutMs: BACKOFF_MS,
});

/** Default disconnect wait: once a second for the same overall budget */
export const DEFAULT_DISCONNECT_POLICY: Readonly<PollPolicy> = Object.freeze({
	maxAttempts: (MAX_RETRIES * BACKOFF_MS) / 1000,
	delayMs: 1_000,
	timeoutMs: 1_000,
});

export interface AttemptContext {
	/** 1-based attempt number */
	attempt: number;
	/** Aborted when the attempt's timeout elapses */
	signal: AbortSignal;
}

export interface RetryOptions {
	/** Decide whether an error is worth another attempt. Defaults to always. */
	isRetryable?: (error: unknown) => boolean;
	/** Invoked after a failed attempt that will be retried */
	onRetry?: (error: unknown, attempt: number) => void;
}

/** Upper bound on the time `retryUntil` can take under `policy` */
export function maxPolicyDurationMs(policy: PollPolicy): number {
	return policy.maxAttempts * (policy.delayMs + policy.timeoutMs);
}

export function validatePolicy(policy: PollPolicy): void {
	if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
		throw new HarnessError('INVALID_POLICY', `maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
	}
	if (policy.delayMs < 0 || policy.timeoutMs <= 0) {
		throw new HarnessError(
			'INVALID_POLICY',
			`delayMs must be >= 0 and timeoutMs > 0, got ${policy.delayMs}/${policy.timeoutMs}`,
		);
	}
}

/**
 * Run `fn` until it resolves or the policy's attempt budget is used up.
 *
 * Each attempt gets its own AbortSignal and is abandoned when
 * `policy.timeoutMs` elapses. No delay follows the last attempt.
 *
 * @throws RetryExhaustedError carrying the last failure
 */
export async function retryUntil<T>(
	fn: (ctx: AttemptContext) => Promise<T>,
	policy: PollPolicy,
	options: RetryOptions = {},
): Promise<T> {
	validatePolicy(policy);
	const { isRetryable = () => true, onRetry } = options;

	let lastError: unknown;
	for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
		const controller = new AbortController();
		try {
			return await withTimeout(
				fn({ attempt, signal: controller.signal }),
				policy.timeoutMs,
				() => new HarnessError('ATTEMPT_TIMEOUT', `Attempt ${attempt} timed out after ${policy.timeoutMs}ms`),
			);
		} catch (error: unknown) {
			lastError = error;
			if (!isRetryable(error)) throw error;
			if (attempt >= policy.maxAttempts) break;
			onRetry?.(error, attempt);
			await sleep(policy.delayMs);
		} finally {
			controller.abort();
		}
	}

	throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
