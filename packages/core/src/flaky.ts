/**
 * Bounded end-to-end reruns for scenarios that depend on timing outside the
 * harness's control (edge reconnects).
 */

import { FlakyRunError, HarnessError } from './errors.js';
import { RunLogger } from './logger.js';

export interface FlakyPolicy {
	/** Upper bound on runs (default: 3) */
	maxRuns: number;
	/** Passes required (default: 1) */
	minPasses: number;
}

export const DEFAULT_FLAKY_POLICY: Readonly<FlakyPolicy> = Object.freeze({ maxRuns: 3, minPasses: 1 });

export interface FlakyResult<T> {
	value: T;
	runs: number;
	passes: number;
}

/**
 * Run `fn` until it has passed `minPasses` times. Stops as soon as the
 * remaining runs can no longer make up the missing passes.
 *
 * @throws FlakyRunError with every failure collected
 */
export async function runFlaky<T>(
	fn: (run: number) => Promise<T>,
	policy: FlakyPolicy = DEFAULT_FLAKY_POLICY,
	logger: RunLogger = new RunLogger(),
): Promise<FlakyResult<T>> {
	if (policy.minPasses < 1 || policy.minPasses > policy.maxRuns) {
		throw new HarnessError(
			'INVALID_POLICY',
			`minPasses must be between 1 and maxRuns (${policy.maxRuns}), got ${policy.minPasses}`,
		);
	}
	const failures: unknown[] = [];
	let passes = 0;
	let runs = 0;

	while (runs < policy.maxRuns) {
		const missing = policy.minPasses - passes;
		if (missing > policy.maxRuns - runs) break;
		runs++;
		try {
			const value = await fn(runs);
			passes++;
			if (passes >= policy.minPasses) {
				return { value, runs, passes };
			}
		} catch (err) {
			failures.push(err);
			const detail = err instanceof Error ? err.message : String(err);
			logger.warn('flaky.attempt', `Run ${runs}/${policy.maxRuns} failed: ${detail}`, { attempt: runs });
		}
	}

	throw new FlakyRunError(runs, passes, policy.minPasses, failures);
}
