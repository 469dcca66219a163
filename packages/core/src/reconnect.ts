/**
 * Reconnect scenario: drives a ready tunnel through repeated
 * Ready(N) → 0 → Ready(N) round trips with stdin `reconnect` directives.
 */

import { formatSeconds, type ReadinessSnapshot, type TunnelHandle } from '@tunnelprobe/sdk';
import { InvariantError } from './errors.js';
import { RunLogger } from './logger.js';
import type { ReadinessPoller } from './readiness.js';

export type ReconnectState = 'disconnected' | 'connecting' | 'ready' | 'reconnecting' | 'terminated';

export interface ReconnectScenarioOptions {
	poller: ReadinessPoller;
	/** Connections the tunnel keeps (default: 4) */
	haConnections?: number;
	/** How long each connection stays down (default: 15000) */
	reconnectMs?: number;
	/** Public URL checked together with readiness */
	tunnelUrl?: string;
	logger?: RunLogger;
}

export interface CycleResult {
	cycle: number;
	durationMs: number;
	snapshot: ReadinessSnapshot;
}

export class ReconnectScenario {
	readonly haConnections: number;
	readonly reconnectMs: number;
	private readonly handle: TunnelHandle;
	private readonly poller: ReadinessPoller;
	private readonly tunnelUrl: string | undefined;
	private readonly logger: RunLogger;
	private current: ReconnectState = 'disconnected';

	constructor(handle: TunnelHandle, options: ReconnectScenarioOptions) {
		this.handle = handle;
		this.poller = options.poller;
		this.haConnections = options.haConnections ?? 4;
		this.reconnectMs = options.reconnectMs ?? 15_000;
		this.tunnelUrl = options.tunnelUrl;
		this.logger = (options.logger ?? new RunLogger()).child({ scenario: 'reconnect' });
	}

	get state(): ReconnectState {
		return this.handle.exited ? 'terminated' : this.current;
	}

	/** The stdin line that drops one connection for `reconnectMs` */
	get directive(): string {
		return `reconnect ${formatSeconds(this.reconnectMs)}`;
	}

	/** Wait for all connections to come up */
	async connect(): Promise<ReadinessSnapshot> {
		this.current = 'connecting';
		const snapshot = await this.poller.waitReady({
			tunnelUrl: this.tunnelUrl,
			minConnections: this.haConnections,
		});
		this.current = 'ready';
		return snapshot;
	}

	/** Write one reconnect directive per active connection */
	async sendReconnect(): Promise<void> {
		for (let i = 0; i < this.haConnections; i++) {
			await this.handle.writeLine(this.directive);
		}
		this.logger.info('reconnect.send', `Sent "${this.directive}" to ${this.haConnections} connection(s)`, {
			pid: this.handle.pid,
		});
	}

	/**
	 * One round trip: directives out, not-ready observed, all connections
	 * back within twice the reconnect duration.
	 */
	async cycle(cycle = 1): Promise<CycleResult> {
		if (this.state !== 'ready') {
			throw new InvariantError('reconnect-from-ready', `Cycle ${cycle} started in state ${this.state}`);
		}
		const startedAt = Date.now();
		this.current = 'reconnecting';
		await this.sendReconnect();
		await this.poller.confirmNotReady();

		this.current = 'connecting';
		const snapshot = await this.poller.waitReady({
			tunnelUrl: this.tunnelUrl,
			minConnections: this.haConnections,
		});
		this.current = 'ready';

		const durationMs = Date.now() - startedAt;
		const boundMs = 2 * this.reconnectMs;
		if (durationMs > boundMs) {
			throw new InvariantError(
				'reconnect-round-trip',
				`Cycle ${cycle} took ${durationMs}ms to get ${this.haConnections} connection(s) back, bound is ${boundMs}ms`,
				{ cycle, durationMs, boundMs },
			);
		}
		this.logger.info('reconnect.cycle', `Cycle ${cycle} reconnected ${snapshot.readyConnections} connection(s)`, {
			attempt: cycle,
			duration_ms: durationMs,
		});
		return { cycle, durationMs, snapshot };
	}

	/** Connect, then run `cycles` round trips (default: 10) */
	async run(cycles = 10): Promise<CycleResult[]> {
		await this.connect();
		const results: CycleResult[] = [];
		for (let i = 1; i <= cycles; i++) {
			results.push(await this.cycle(i));
		}
		return results;
	}
}
