/**
 * tunnelprobe not-ready: confirm the tunnel's readiness endpoint reports
 * no connections (or no longer answers).
 */

import type { ReadinessSnapshot } from '@tunnelprobe/sdk';
import type { Command } from 'commander';
import { runHarnessCommand } from '../harness.js';
import * as output from '../output.js';
import { displaySnapshot } from './ready.js';

export function registerNotReadyCommand(program: Command): void {
	program
		.command('not-ready')
		.description('Confirm a running tunnel has disconnected from the edge')
		.action(async (_opts, cmd: Command) => {
			await runHarnessCommand(
				cmd,
				'not-ready',
				(ctx) => ctx.poller.confirmNotReady(),
				(snapshot: ReadinessSnapshot | null) => {
					if (snapshot === null) {
						output.success('Readiness endpoint is not listening');
						return;
					}
					output.success('Tunnel reports no ready connections');
					output.blank();
					displaySnapshot(snapshot);
				},
			);
		});
}
