/**
 * ReadinessPoller: polls the tunnel's local `/ready` endpoint.
 *
 * waitReady() tolerates the window between spawn and the listener being
 * bound: refused connections are failed attempts, not fatal errors.
 * confirmNotReady() is the inverse and accepts a refused connection as
 * proof the tunnel is down, so it can run after the process has exited.
 */

import type { PollPolicy, ReadinessBody, ReadinessSnapshot } from '@tunnelprobe/sdk';
import {
	HarnessError,
	NotReadyError,
	RetryExhaustedError,
	StillConnectedError,
	TransportError,
	UnexpectedStatusError,
} from './errors.js';
import { RunLogger } from './logger.js';
import { httpGet } from './requests.js';
import { DEFAULT_DISCONNECT_POLICY, DEFAULT_POLL_POLICY, METRICS_PORT, retryUntil } from './retry.js';
import { compileValidator } from './validation.js';

export const DEFAULT_METRICS_URL = `http://localhost:${METRICS_PORT}`;

export interface ReadinessPollerOptions {
	/** Base URL of the metrics listener (default: http://localhost:51000) */
	metricsUrl?: string;
	/** Budget for waitReady (default: 5 attempts, 7s apart) */
	policy?: PollPolicy;
	/** Budget for confirmNotReady (default: 35 attempts, 1s apart) */
	disconnectPolicy?: PollPolicy;
	logger?: RunLogger;
}

export interface WaitReadyOptions {
	/** Public tunnel URL that must also answer 200 */
	tunnelUrl?: string;
	/** Minimum ready connections (default: 1) */
	minConnections?: number;
}

const readinessBodySchema = {
	type: 'object',
	required: ['readyConnections'],
	properties: {
		readyConnections: { type: 'integer', minimum: 0 },
		connectorId: { type: 'string' },
	},
};

const readinessBody = compileValidator<ReadinessBody>(readinessBodySchema);

/**
 * Build a snapshot from a `/ready` response.
 *
 * A 200 must carry a valid body. Any other status with an unreadable body
 * is read as zero ready connections.
 */
export function parseReadiness(status: number, body: string, observedAt = Date.now()): ReadinessSnapshot {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch {
		parsed = undefined;
	}

	if (readinessBody.check(parsed)) {
		return Object.freeze({
			statusCode: status,
			readyConnections: parsed.readyConnections,
			connectorId: parsed.connectorId ?? null,
			observedAt,
		});
	}

	if (status === 200) {
		throw new HarnessError(
			'INVALID_READINESS_BODY',
			`Ready endpoint returned an unreadable body: ${body} (${readinessBody.errors().join('; ')})`,
		);
	}
	return Object.freeze({ statusCode: status, readyConnections: 0, connectorId: null, observedAt });
}

/** Ready means HTTP 200 with at least `minConnections` connections */
export function isReady(snapshot: ReadinessSnapshot, minConnections: number): boolean {
	return snapshot.statusCode === 200 && snapshot.readyConnections >= minConnections;
}

/** Not ready means a non-200 status with no connections left */
export function isDisconnected(snapshot: ReadinessSnapshot): boolean {
	return snapshot.statusCode !== 200 && snapshot.readyConnections === 0;
}

export class ReadinessPoller {
	readonly readyUrl: string;
	private readonly policy: PollPolicy;
	private readonly disconnectPolicy: PollPolicy;
	private readonly logger: RunLogger;

	constructor(options: ReadinessPollerOptions = {}) {
		this.readyUrl = new URL('/ready', options.metricsUrl ?? DEFAULT_METRICS_URL).toString();
		this.policy = options.policy ?? DEFAULT_POLL_POLICY;
		this.disconnectPolicy = options.disconnectPolicy ?? DEFAULT_DISCONNECT_POLICY;
		this.logger = options.logger ?? new RunLogger();
	}

	/** One read of the endpoint */
	async snapshot(signal?: AbortSignal): Promise<ReadinessSnapshot> {
		const res = await httpGet(this.readyUrl, { signal, timeoutMs: this.policy.timeoutMs });
		return parseReadiness(res.status, res.body);
	}

	/**
	 * Poll until the tunnel reports at least `minConnections` ready
	 * connections (and, with `tunnelUrl`, serves a 200 through the edge).
	 *
	 * @throws NotReadyError with the last snapshot when the budget runs out
	 */
	async waitReady(options: WaitReadyOptions = {}): Promise<ReadinessSnapshot> {
		const minConnections = options.minConnections ?? 1;
		let last: ReadinessSnapshot | null = null;

		try {
			const snapshot = await retryUntil(
				async ({ signal, attempt }) => {
					const current = await this.snapshot(signal);
					last = current;
					if (!isReady(current, minConnections)) {
						throw new HarnessError(
							'NOT_READY_YET',
							`Ready endpoint returned status ${current.statusCode} with ${current.readyConnections} connection(s) but we expect at least ${minConnections}`,
						);
					}
					if (options.tunnelUrl !== undefined) {
						const res = await httpGet(options.tunnelUrl, { signal });
						if (res.status !== 200) {
							throw new UnexpectedStatusError(options.tunnelUrl, res.status, 200, res.body);
						}
					}
					this.logger.info(
						'readiness.ready',
						`Tunnel ready with ${current.readyConnections} connection(s)`,
						{ url: this.readyUrl, attempt },
					);
					return current;
				},
				this.policy,
				{
					onRetry: (err, attempt) => {
						this.logger.debug('readiness.attempt', describe(err), { url: this.readyUrl, attempt });
					},
				},
			);
			return snapshot;
		} catch (err) {
			if (err instanceof RetryExhaustedError) {
				const notReady = new NotReadyError(minConnections, err.attempts, last, { cause: err.lastError });
				this.logger.error('readiness.not_ready', notReady.message, { url: this.readyUrl });
				throw notReady;
			}
			throw err;
		}
	}

	/**
	 * Poll until the endpoint reports not-ready with zero connections, or
	 * refuses the connection. Resolves the last snapshot, or null when the
	 * listener is gone.
	 *
	 * @throws StillConnectedError when the budget runs out
	 */
	async confirmNotReady(): Promise<ReadinessSnapshot | null> {
		let last: ReadinessSnapshot | null = null;

		try {
			return await retryUntil(
				async ({ signal }) => {
					let current: ReadinessSnapshot;
					try {
						current = await this.snapshot(signal);
					} catch (err) {
						if (err instanceof TransportError && (err.kind === 'refused' || err.kind === 'reset')) {
							// The tunnel may already have exited
							this.logger.warn(
								'readiness.disconnected',
								`Failed to connect to ${this.readyUrl}, error: ${err.message}`,
								{ url: this.readyUrl },
							);
							return null;
						}
						throw err;
					}
					last = current;
					if (!isDisconnected(current)) {
						throw new HarnessError(
							'STILL_CONNECTED_YET',
							`Expect ${this.readyUrl} returns 503, got ${current.statusCode} with ${current.readyConnections} connection(s)`,
						);
					}
					this.logger.info('readiness.disconnected', `Tunnel reports not ready (${current.statusCode})`, {
						url: this.readyUrl,
					});
					return current;
				},
				this.disconnectPolicy,
			);
		} catch (err) {
			if (err instanceof RetryExhaustedError) {
				throw new StillConnectedError(err.attempts, last, { cause: err.lastError });
			}
			throw err;
		}
	}

	/**
	 * Read the connector id of a ready tunnel.
	 *
	 * @throws NotReadyError if the tunnel never becomes ready
	 */
	async connectorId(): Promise<string> {
		const snapshot = await this.waitReady();
		if (snapshot.connectorId === null) {
			throw new HarnessError('NO_CONNECTOR_ID', `${this.readyUrl} did not report a connectorId`);
		}
		return snapshot.connectorId;
	}
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
