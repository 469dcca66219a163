/**
 * Error taxonomy for tunnelprobe.
 *
 * Every error in the harness extends HarnessError, giving callers
 * a consistent shape to catch and inspect. Transient conditions
 * (TransportError, UnexpectedStatusError) are absorbed by retry loops;
 * LaunchError and InvariantError always reach the caller.
 */

import type { ReadinessSnapshot } from '@tunnelprobe/sdk';

export class HarnessError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'HarnessError';
		this.code = code;
	}
}

export class ConfigError extends HarnessError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigError';
	}
}

export class SchemaError extends HarnessError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('SCHEMA_ERROR', message, options);
		this.name = 'SchemaError';
		this.validationErrors = validationErrors;
	}
}

/** The binary could not be started, or a checked run exited non-zero. */
export class LaunchError extends HarnessError {
	readonly command: string[];
	readonly exitCode: number | null;
	readonly stderr: string;

	constructor(
		command: string[],
		message: string,
		details: { exitCode?: number | null; stderr?: string } = {},
		options?: ErrorOptions,
	) {
		super('LAUNCH_ERROR', `[${command[0] ?? '?'}] ${message}`, options);
		this.name = 'LaunchError';
		this.command = command;
		this.exitCode = details.exitCode ?? null;
		this.stderr = details.stderr ?? '';
	}
}

/** A checked run did not finish in time. */
export class ProcessTimeoutError extends HarnessError {
	readonly command: string[];
	readonly timeoutMs: number;
	readonly stdout: string;
	readonly stderr: string;

	constructor(command: string[], timeoutMs: number, output: { stdout: string; stderr: string }) {
		super(
			'PROCESS_TIMEOUT',
			`[${command[0] ?? '?'}] timed out after ${timeoutMs}ms, stdout: ${output.stdout}, stderr: ${output.stderr}`,
		);
		this.name = 'ProcessTimeoutError';
		this.command = command;
		this.timeoutMs = timeoutMs;
		this.stdout = output.stdout;
		this.stderr = output.stderr;
	}
}

/** How a request failed before an HTTP response arrived */
export type TransportFailureKind = 'refused' | 'reset' | 'timeout' | 'other';

/** Connection refused/reset or request timeout. Retryable. */
export class TransportError extends HarnessError {
	readonly url: string;
	readonly kind: TransportFailureKind;

	constructor(url: string, kind: TransportFailureKind, message: string, options?: ErrorOptions) {
		super('TRANSPORT_ERROR', `${url}: ${message}`, options);
		this.name = 'TransportError';
		this.url = url;
		this.kind = kind;
	}
}

/** The server answered, but not with the status the caller required. Retryable. */
export class UnexpectedStatusError extends HarnessError {
	readonly url: string;
	readonly status: number;
	readonly body: string;

	constructor(url: string, status: number, expected: number, body: string) {
		super('UNEXPECTED_STATUS', `${url} returned ${status}, expected ${expected}, body: ${body}`);
		this.name = 'UnexpectedStatusError';
		this.url = url;
		this.status = status;
		this.body = body;
	}
}

/** A retry budget ran out. */
export class RetryExhaustedError extends HarnessError {
	readonly attempts: number;
	readonly lastError: unknown;

	constructor(attempts: number, lastError: unknown) {
		const detail = lastError instanceof Error ? lastError.message : String(lastError);
		super('RETRY_EXHAUSTED', `All ${attempts} attempts failed: ${detail}`, { cause: lastError });
		this.name = 'RetryExhaustedError';
		this.attempts = attempts;
		this.lastError = lastError;
	}
}

function describeSnapshot(snapshot: ReadinessSnapshot | null): string {
	if (!snapshot) return 'no response';
	return `status ${snapshot.statusCode}, readyConnections ${snapshot.readyConnections}, connectorId ${snapshot.connectorId ?? '-'}`;
}

/** The readiness condition was not met within the attempt budget. */
export class NotReadyError extends HarnessError {
	readonly lastSnapshot: ReadinessSnapshot | null;
	readonly attempts: number;
	readonly minConnections: number;

	constructor(
		minConnections: number,
		attempts: number,
		lastSnapshot: ReadinessSnapshot | null,
		options?: ErrorOptions,
	) {
		super(
			'NOT_READY',
			`Tunnel not ready with at least ${minConnections} connection(s) after ${attempts} attempts (last: ${describeSnapshot(lastSnapshot)})`,
			options,
		);
		this.name = 'NotReadyError';
		this.minConnections = minConnections;
		this.attempts = attempts;
		this.lastSnapshot = lastSnapshot;
	}
}

/** The tunnel kept reporting connections after it should have disconnected. */
export class StillConnectedError extends HarnessError {
	readonly lastSnapshot: ReadinessSnapshot | null;
	readonly attempts: number;

	constructor(attempts: number, lastSnapshot: ReadinessSnapshot | null, options?: ErrorOptions) {
		super(
			'STILL_CONNECTED',
			`Tunnel still connected after ${attempts} attempts (last: ${describeSnapshot(lastSnapshot)})`,
			options,
		);
		this.name = 'StillConnectedError';
		this.attempts = attempts;
		this.lastSnapshot = lastSnapshot;
	}
}

/** A lifecycle or log invariant was violated. Always fatal. */
export class InvariantError extends HarnessError {
	readonly invariant: string;
	readonly details: Record<string, unknown>;

	constructor(invariant: string, message: string, details: Record<string, unknown> = {}) {
		super('INVARIANT_VIOLATION', `[${invariant}] ${message}`);
		this.name = 'InvariantError';
		this.invariant = invariant;
		this.details = details;
	}
}

/** A flaky-tolerant run did not collect enough passes. */
export class FlakyRunError extends HarnessError {
	readonly failures: unknown[];
	readonly passes: number;

	constructor(runs: number, passes: number, minPasses: number, failures: unknown[]) {
		const last = failures[failures.length - 1];
		const detail = last instanceof Error ? last.message : String(last);
		super(
			'FLAKY_RUN_FAILED',
			`Passed ${passes} of ${runs} runs, needed ${minPasses}. Last failure: ${detail}`,
			{ cause: last },
		);
		this.name = 'FlakyRunError';
		this.failures = failures;
		this.passes = passes;
	}
}
