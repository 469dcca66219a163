/**
 * tunnelprobe reconnect: drop and restore every edge connection through
 * stdin directives, cycle after cycle.
 *
 * Edge reconnects depend on timing outside the harness, so the whole run is
 * retried under the flaky policy.
 */

import {
	type CycleResult,
	DEFAULT_FLAKY_POLICY,
	type FlakyResult,
	ReconnectScenario,
	runFlaky,
} from '@tunnelprobe/core';
import type { Command } from 'commander';
import type { HarnessContext } from '../config.js';
import { parseDurationMs, parsePositiveInt, runHarnessCommand, withTunnel } from '../harness.js';
import * as output from '../output.js';

interface ReconnectOptions {
	haConnections: number;
	cycles: number;
	reconnect: number;
	maxRuns: number;
	minPasses: number;
}

async function runReconnect(ctx: HarnessContext, opts: ReconnectOptions): Promise<FlakyResult<CycleResult[]>> {
	return runFlaky(
		(run) =>
			withTunnel(
				ctx,
				{ haConnections: opts.haConnections, options: { stdinControl: true }, allowInput: true },
				(proc) => {
					const scenario = new ReconnectScenario(proc, {
						poller: ctx.poller,
						haConnections: opts.haConnections,
						reconnectMs: opts.reconnect,
						tunnelUrl: ctx.tunnelUrl,
						logger: ctx.logger.child({ attempt: run }),
					});
					return scenario.run(opts.cycles);
				},
			),
		{ maxRuns: opts.maxRuns, minPasses: opts.minPasses },
		ctx.logger,
	);
}

export function registerReconnectCommand(program: Command): void {
	program
		.command('reconnect')
		.description('Cycle every connection through reconnect directives')
		.option('--ha-connections <n>', 'Edge connections the tunnel opens', parsePositiveInt, 4)
		.option('--cycles <n>', 'Reconnect round trips per run', parsePositiveInt, 10)
		.option('--reconnect <duration>', 'How long each connection stays down', parseDurationMs, 15_000)
		.option('--max-runs <n>', 'Runs before giving up', parsePositiveInt, DEFAULT_FLAKY_POLICY.maxRuns)
		.option('--min-passes <n>', 'Passing runs required', parsePositiveInt, DEFAULT_FLAKY_POLICY.minPasses)
		.action(async (opts: ReconnectOptions, cmd: Command) => {
			await runHarnessCommand(
				cmd,
				'reconnect',
				(ctx) => runReconnect(ctx, opts),
				(result) => {
					output.success(`${result.value.length} reconnect cycle(s) passed (run ${result.runs})`);
					output.blank();
					output.table(
						[
							{ header: 'CYCLE', key: 'cycle', width: 6 },
							{ header: 'DURATION', key: 'duration', width: 10 },
							{ header: 'CONNECTIONS', key: 'connections', width: 12 },
						],
						result.value.map((c) => ({
							cycle: String(c.cycle),
							duration: `${c.durationMs}ms`,
							connections: String(c.snapshot.readyConnections),
						})),
					);
				},
			);
		});
}
