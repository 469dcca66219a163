/**
 * HTTP helpers used against the readiness endpoint and through the tunnel.
 *
 * Every request carries a timeout. Failures before a response arrives are
 * classified into TransportError kinds so pollers can tell "nobody is
 * listening" from "the listener is slow".
 */

import type { PollPolicy } from '@tunnelprobe/sdk';
import { TransportError, type TransportFailureKind, UnexpectedStatusError } from './errors.js';
import { RunLogger } from './logger.js';
import { DEFAULT_POLL_POLICY, retryUntil } from './retry.js';
import { sleep } from './timing.js';

export interface HttpResponse {
	url: string;
	status: number;
	body: string;
}

export interface HttpGetOptions {
	/** Abort signal; takes precedence over timeoutMs */
	signal?: AbortSignal;
	/** Request timeout when no signal is given (default: 7000) */
	timeoutMs?: number;
	headers?: Record<string, string>;
}

function errorCode(value: unknown): string | undefined {
	if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
		return value.code;
	}
	return undefined;
}

function errorName(value: unknown): string | undefined {
	if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
		return value.name;
	}
	return undefined;
}

/** Map a fetch failure onto a transport failure kind */
export function classifyFetchError(err: unknown): TransportFailureKind {
	const name = errorName(err);
	if (name === 'AbortError' || name === 'TimeoutError') return 'timeout';

	const cause = err instanceof Error ? err.cause : undefined;
	const code = errorCode(cause) ?? errorCode(err);
	switch (code) {
		case 'ECONNREFUSED':
			return 'refused';
		case 'ECONNRESET':
		case 'EPIPE':
		case 'UND_ERR_SOCKET':
			return 'reset';
		case 'ETIMEDOUT':
		case 'UND_ERR_CONNECT_TIMEOUT':
		case 'UND_ERR_HEADERS_TIMEOUT':
		case 'UND_ERR_BODY_TIMEOUT':
			return 'timeout';
		default:
			return 'other';
	}
}

function describeFetchError(err: unknown): string {
	if (!(err instanceof Error)) return String(err);
	const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
	return `${err.message}${cause}`;
}

/**
 * GET a URL and read the whole body.
 *
 * @throws TransportError when no response arrives
 */
export async function httpGet(url: string, options: HttpGetOptions = {}): Promise<HttpResponse> {
	const signal = options.signal ?? AbortSignal.timeout(options.timeoutMs ?? 7_000);
	try {
		const res = await fetch(url, { signal, headers: options.headers });
		const body = await res.text();
		return { url, status: res.status, body };
	} catch (err) {
		throw new TransportError(url, classifyFetchError(err), describeFetchError(err), { cause: err });
	}
}

export interface SendRequestOptions {
	/** Require a 200 response, retrying otherwise (default: true) */
	requireOk?: boolean;
	policy?: PollPolicy;
	logger?: RunLogger;
	headers?: Record<string, string>;
}

/**
 * GET a URL under the retry policy.
 *
 * Resolves the response when it is a 200, or null for any other status
 * when `requireOk` is false.
 *
 * @throws RetryExhaustedError when the budget runs out
 */
export async function sendRequest(
	url: string,
	options: SendRequestOptions = {},
): Promise<HttpResponse | null> {
	const { requireOk = true, policy = DEFAULT_POLL_POLICY, logger = new RunLogger() } = options;

	const res = await retryUntil(
		async ({ signal }) => {
			const response = await httpGet(url, { signal, headers: options.headers });
			if (requireOk && response.status !== 200) {
				throw new UnexpectedStatusError(url, response.status, 200, response.body);
			}
			return response;
		},
		policy,
		{
			onRetry: (err, attempt) => {
				logger.debug('request.failure', err instanceof Error ? err.message : String(err), {
					url,
					attempt,
				});
			},
		},
	);
	return res.status === 200 ? res : null;
}

/**
 * GET a URL under the retry policy until it answers with `expected`.
 *
 * @throws RetryExhaustedError when the budget runs out
 */
export async function expectStatus(
	url: string,
	expected: number,
	options: Omit<SendRequestOptions, 'requireOk'> = {},
): Promise<HttpResponse> {
	const { policy = DEFAULT_POLL_POLICY } = options;
	return retryUntil(async ({ signal }) => {
		const response = await httpGet(url, { signal, headers: options.headers });
		if (response.status !== expected) {
			throw new UnexpectedStatusError(url, response.status, expected, response.body);
		}
		return response;
	}, policy);
}

export interface SendRequestsOptions extends SendRequestOptions {
	/** Pause between requests (default: 10) */
	intervalMs?: number;
}

export interface BatchResult {
	sent: number;
	/** Requests that did not end in a 200 */
	errors: number;
}

/**
 * Send `count` sequential GETs, e.g. to generate tunnel log volume.
 * Non-200 responses are counted and logged, not thrown, unless `requireOk`.
 */
export async function sendRequests(
	url: string,
	count: number,
	options: SendRequestsOptions = {},
): Promise<BatchResult> {
	const { intervalMs = 10, logger = new RunLogger() } = options;
	let errors = 0;
	for (let i = 0; i < count; i++) {
		const res = await sendRequest(url, { ...options, logger });
		if (res === null) errors++;
		if (intervalMs > 0) await sleep(intervalMs);
	}
	if (errors > 0) {
		logger.warn('request.failure', `${errors} out of ${count} requests to ${url} return non-200 status`, {
			url,
		});
	}
	return { sent: count, errors };
}
