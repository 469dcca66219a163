/**
 * Core type definitions for tunnelprobe.
 *
 * Every component of the harness (supervisor, poller, scenarios, log
 * verification, loggers) depends on these shapes.
 */

// ─── Readiness ────────────────────────────────────────────────────────────────

/** Body returned by the tunnel's `GET /ready` endpoint */
export interface ReadinessBody {
	readyConnections: number;
	connectorId?: string;
}

/** A point-in-time read of the readiness endpoint. Recomputed on every poll. */
export interface ReadinessSnapshot {
	/** HTTP status code (200 when ready, 503 otherwise) */
	readonly statusCode: number;
	/** Number of edge connections the tunnel reports as ready */
	readonly readyConnections: number;
	/** Connector identifier, when the endpoint reports one */
	readonly connectorId: string | null;
	/** Epoch ms at which the response was read */
	readonly observedAt: number;
}

/**
 * Retry budget for a polling loop.
 *
 * Total wait is bounded by `maxAttempts * (delayMs + timeoutMs)`.
 */
export interface PollPolicy {
	/** Number of attempts before giving up (>= 1) */
	maxAttempts: number;
	/** Fixed delay between attempts */
	delayMs: number;
	/** Timeout applied to each individual attempt */
	timeoutMs: number;
}

// ─── Processes ────────────────────────────────────────────────────────────────

/** Signals the graceful-shutdown path honors */
export type TerminationSignal = 'SIGTERM' | 'SIGINT';

/** How a child process ended */
export interface ExitStatus {
	code: number | null;
	signal: string | null;
}

/**
 * The control surface a lifecycle scenario needs from a running tunnel.
 *
 * Implemented by the real child process handle and by in-process fakes.
 */
export interface TunnelHandle {
	/** OS process id, when there is one */
	readonly pid: number | undefined;
	/** Whether the process has fully exited */
	readonly exited: boolean;
	/** Deliver a termination signal */
	signal(signal: TerminationSignal): void;
	/** Write one control line to the process's standard input */
	writeLine(line: string): Promise<void>;
	/** Resolve with the exit status, or null if still running after `timeoutMs` */
	waitForExit(timeoutMs: number): Promise<ExitStatus | null>;
}

// ─── Tunnel configuration ─────────────────────────────────────────────────────

/** One ingress rule of the tunnel configuration */
export interface IngressRule {
	hostname?: string;
	path?: string;
	service: string;
}

/** Transport protocol the tunnel uses towards the edge */
export type TunnelProtocol = 'quic' | 'http2' | 'auto';

/** Harness configuration, as loaded from tunnelprobe.yaml */
export interface HarnessConfig {
	/** Path to the tunnel binary under test */
	cloudflared_binary: string;
	/** Tunnel id (named tunnel mode) */
	tunnel: string;
	/** Path to the tunnel's credentials file */
	credentials_file: string;
	/** Origin certificate path, passed to CLI sub-commands */
	origincert?: string;
	/** Public hostname; defaults to the first ingress rule's hostname */
	hostname?: string;
	/** Ingress rules written into the tunnel config */
	ingress: IngressRule[];
	/** Port of the tunnel's local metrics/readiness listener */
	metrics_port?: number;
}

// ─── Logging ──────────────────────────────────────────────────────────────────

/** Severity of a harness log entry */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Harness phase identifiers */
export type LogPhase =
	| 'run.start'
	| 'run.stop'
	| 'process.start'
	| 'process.signal'
	| 'process.exit'
	| 'process.kill'
	| 'process.output'
	| 'readiness.attempt'
	| 'readiness.ready'
	| 'readiness.not_ready'
	| 'readiness.disconnected'
	| 'request.failure'
	| 'retry.attempt'
	| 'reconnect.send'
	| 'reconnect.cycle'
	| 'termination.signal'
	| 'termination.complete'
	| 'termination.stream'
	| 'stream.open'
	| 'stream.close'
	| 'logs.check'
	| 'flaky.attempt';

/** Structured harness log entry */
export interface LogEntry {
	/** ISO 8601 timestamp */
	timestamp: string;
	level: LogLevel;
	phase: LogPhase;
	message: string;
	/** Scenario the entry belongs to (set by child loggers) */
	scenario?: string;
	pid?: number;
	attempt?: number;
	duration_ms?: number;
	url?: string;
	metadata?: Record<string, unknown>;
}

// ─── Utilities ────────────────────────────────────────────────────────────────

/** Duration string (e.g., "500ms", "5s", "1m") */
export type DurationString = string;

/** Parse a duration string to milliseconds */
export function parseDuration(duration: DurationString): number {
	const match = duration.match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(
			`Invalid duration format: "${duration}". Expected format: <number><unit> (e.g., 500ms, 5s, 1m)`,
		);
	}
	const value = Number.parseFloat(match[1]);
	const unit = match[2];
	switch (unit) {
		case 'ms':
			return value;
		case 's':
			return value * 1000;
		case 'm':
			return value * 60 * 1000;
		case 'h':
			return value * 60 * 60 * 1000;
		case 'd':
			return value * 24 * 60 * 60 * 1000;
		default:
			throw new Error(`Unknown duration unit: ${unit}`);
	}
}

/**
 * Render milliseconds as a seconds duration the tunnel binary accepts
 * (e.g. 15000 → "15s", 250 → "0.25s").
 */
export function formatSeconds(ms: number): DurationString {
	return `${Number((ms / 1000).toFixed(3))}s`;
}
