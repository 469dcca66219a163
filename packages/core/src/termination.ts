/**
 * Termination scenarios.
 *
 * A termination signal must make the tunnel report not-ready, then exit.
 * With no client connection it has to exit within the grace period; with
 * an in-flight stream it keeps serving until the stream drains or the grace
 * period runs out, then ends the stream with a terminal status line.
 */

import {
	formatSeconds,
	type ExitStatus,
	type ReadinessSnapshot,
	type TerminationSignal,
	type TunnelHandle,
} from '@tunnelprobe/sdk';
import { InvariantError } from './errors.js';
import { RunLogger } from './logger.js';
import type { ReadinessPoller } from './readiness.js';
import { openStream, type StreamResult, type StreamTask } from './stream.js';
import { settleWithin } from './timing.js';

/** Slack allowed past the grace period for the stream's last write to arrive */
export const GRACE_TOLERANCE_MS = 250;

/** Signals the tunnel handles gracefully on this platform */
export function supportedSignals(platform: NodeJS.Platform = process.platform): TerminationSignal[] {
	return platform === 'win32' ? ['SIGTERM'] : ['SIGTERM', 'SIGINT'];
}

/** Lines a stream of `2 lines per event` yields over the grace period */
export function defaultMinStreamLines(gracePeriodMs: number, eventIntervalMs: number): number {
	return 2 * Math.floor(gracePeriodMs / eventIntervalMs);
}

export interface TerminationScenarioOptions {
	poller: ReadinessPoller;
	/** Grace period configured on the tunnel (default: 5000) */
	gracePeriodMs?: number;
	/** Bound on connecting the stream and, added to the grace period, on joining it (default: 10000) */
	timeoutMs?: number;
	/** Public tunnel URL; required by the stream scenarios */
	tunnelUrl?: string;
	/** Event interval requested from the streaming endpoint (default: 1000) */
	eventIntervalMs?: number;
	/** Lines the in-flight stream must deliver (default: 2 per event over the grace period) */
	minStreamLines?: number;
	/** Idle timeout of the streaming client (default: 5000) */
	streamIdleTimeoutMs?: number;
	/** Slack past the grace period before the stream end counts as late (default: 250) */
	graceToleranceMs?: number;
	logger?: RunLogger;
}

export interface TerminationResult {
	signal: TerminationSignal;
	exit: ExitStatus;
	durationMs: number;
	stream?: StreamResult;
}

export class TerminationScenario {
	readonly gracePeriodMs: number;
	readonly timeoutMs: number;
	private readonly handle: TunnelHandle;
	private readonly poller: ReadinessPoller;
	private readonly tunnelUrl: string | undefined;
	private readonly eventIntervalMs: number;
	private readonly minStreamLines: number;
	private readonly streamIdleTimeoutMs: number;
	private readonly graceToleranceMs: number;
	private readonly logger: RunLogger;
	private observedReady = false;

	constructor(handle: TunnelHandle, options: TerminationScenarioOptions) {
		this.handle = handle;
		this.poller = options.poller;
		this.gracePeriodMs = options.gracePeriodMs ?? 5_000;
		this.timeoutMs = options.timeoutMs ?? 10_000;
		this.tunnelUrl = options.tunnelUrl;
		this.eventIntervalMs = options.eventIntervalMs ?? 1_000;
		this.minStreamLines =
			options.minStreamLines ?? defaultMinStreamLines(this.gracePeriodMs, this.eventIntervalMs);
		this.streamIdleTimeoutMs = options.streamIdleTimeoutMs ?? 5_000;
		this.graceToleranceMs = options.graceToleranceMs ?? GRACE_TOLERANCE_MS;
		this.logger = (options.logger ?? new RunLogger()).child({ scenario: 'termination' });
	}

	/** URL of the streaming endpoint behind the tunnel */
	get streamUrl(): string {
		if (this.tunnelUrl === undefined) {
			throw new InvariantError('stream-url', 'Stream scenarios need a tunnel URL');
		}
		return `${this.tunnelUrl.replace(/\/$/, '')}/sse?freq=${formatSeconds(this.eventIntervalMs)}`;
	}

	/** Wait for readiness; signals are refused until this has succeeded */
	async awaitReady(): Promise<ReadinessSnapshot> {
		const snapshot = await this.poller.waitReady({ tunnelUrl: this.tunnelUrl });
		this.observedReady = true;
		return snapshot;
	}

	/**
	 * Signal the tunnel, confirm it reports not-ready, and wait for it to
	 * exit (bounded by grace period + timeout).
	 */
	async terminateBySignal(signal: TerminationSignal): Promise<ExitStatus> {
		if (!this.observedReady) {
			throw new InvariantError('signal-after-ready', `Refusing to send ${signal} before the tunnel was observed ready`);
		}
		this.logger.info('termination.signal', `Sending ${signal}`, { pid: this.handle.pid });
		this.handle.signal(signal);
		await this.poller.confirmNotReady();

		const boundMs = this.gracePeriodMs + this.timeoutMs;
		const exit = await this.handle.waitForExit(boundMs);
		if (!exit) {
			throw new InvariantError('exit-after-signal', `Tunnel still running ${boundMs}ms after ${signal}`, {
				signal,
				boundMs,
			});
		}
		this.logger.info('termination.complete', `Tunnel exited (code=${exit.code}, signal=${exit.signal})`, {
			pid: this.handle.pid,
		});
		return exit;
	}

	/**
	 * Run `fn` and require it to finish strictly within the grace period.
	 * A failure inside `fn` is reported as is.
	 */
	async withinGracePeriod<T>(fn: () => Promise<T>): Promise<{ value: T; durationMs: number }> {
		const startedAt = Date.now();
		const value = await fn();
		const durationMs = Date.now() - startedAt;
		if (durationMs >= this.gracePeriodMs) {
			throw new InvariantError(
				'within-grace-period',
				`Took ${durationMs}ms, grace period is ${this.gracePeriodMs}ms`,
				{ durationMs, gracePeriodMs: this.gracePeriodMs },
			);
		}
		return { value, durationMs };
	}

	/**
	 * Join a background task. Still pending after `timeoutMs` is a violation.
	 */
	async joinWithin<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
		const result = await settleWithin(task, timeoutMs);
		if (!result.settled) {
			throw new InvariantError('stream-joined', `In-flight request still open after ${timeoutMs}ms`, {
				timeoutMs,
			});
		}
		return result.value;
	}

	/**
	 * Signal while a stream is in flight. The stream must deliver at least
	 * `minStreamLines` lines and end no later than the grace period after the
	 * signal (plus `graceToleranceMs`).
	 */
	async gracefulShutdown(signal: TerminationSignal): Promise<TerminationResult> {
		await this.awaitReady();
		const stream = await this.startStream();
		const startedAt = Date.now();
		let streamEndedAt = Number.POSITIVE_INFINITY;
		const streamDone = stream.done.then((result) => {
			streamEndedAt = Date.now();
			return result;
		});

		const [exit, result] = await Promise.all([
			this.terminateBySignal(signal),
			this.joinWithin(streamDone, this.gracePeriodMs + this.timeoutMs),
		]);

		const streamMs = streamEndedAt - startedAt;
		const boundMs = this.gracePeriodMs + this.graceToleranceMs;
		if (streamMs > boundMs) {
			throw new InvariantError(
				'stream-ended-within-grace',
				`In-flight request ended ${streamMs}ms after ${signal}, grace period is ${this.gracePeriodMs}ms`,
				{ streamMs, gracePeriodMs: this.gracePeriodMs, toleranceMs: this.graceToleranceMs },
			);
		}
		if (result.lines < this.minStreamLines) {
			throw new InvariantError(
				'stream-served-through-grace',
				`In-flight request got ${result.lines} line(s) before closing, expected at least ${this.minStreamLines}`,
				{ lines: result.lines, outcome: result.outcome },
			);
		}
		this.logger.info('termination.stream', `In-flight request ended ${streamMs}ms after ${signal}`, {
			duration_ms: streamMs,
		});
		return { signal, exit, durationMs: Date.now() - startedAt, stream: result };
	}

	/**
	 * Signal while a stream is in flight that the client closes after two
	 * lines. The tunnel must exit before the grace period runs out.
	 */
	async shutdownOnceNoConnection(signal: TerminationSignal): Promise<TerminationResult> {
		await this.awaitReady();
		const stream = await this.startStream(2);

		const { value, durationMs } = await this.withinGracePeriod(() =>
			Promise.all([this.terminateBySignal(signal), this.joinWithin(stream.done, this.gracePeriodMs)]),
		);
		const [exit, result] = value;
		return { signal, exit, durationMs, stream: result };
	}

	/** Signal with no client connection; the tunnel must exit within the grace period */
	async noConnectionShutdown(signal: TerminationSignal): Promise<TerminationResult> {
		await this.awaitReady();
		const { value, durationMs } = await this.withinGracePeriod(() => this.terminateBySignal(signal));
		return { signal, exit: value, durationMs };
	}

	private async startStream(closeAfterLines?: number): Promise<StreamTask> {
		const stream = openStream(this.streamUrl, {
			idleTimeoutMs: this.streamIdleTimeoutMs,
			closeAfterLines,
			logger: this.logger,
		});
		const connected = await settleWithin(stream.connected, this.timeoutMs);
		if (!connected.settled || !connected.value) {
			// Surface the stream's own failure when there is one
			const failed = await settleWithin(stream.done, 0);
			if (failed.settled) {
				throw new InvariantError('stream-connected', `In-flight request ended before the signal (${failed.value.outcome})`);
			}
			throw new InvariantError('stream-connected', `In-flight request not connected after ${this.timeoutMs}ms`);
		}
		return stream;
	}
}
