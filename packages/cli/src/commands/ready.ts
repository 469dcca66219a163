/**
 * tunnelprobe ready: start the tunnel and wait until it reports ready.
 *
 * With --attach, polls a tunnel that is already running instead.
 */

import type { ReadinessSnapshot } from '@tunnelprobe/sdk';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { HarnessContext } from '../config.js';
import { parsePositiveInt, runHarnessCommand, withTunnel } from '../harness.js';
import * as output from '../output.js';

interface ReadyOptions {
	haConnections: number;
	minConnections?: number;
	attach: boolean;
	urlCheck: boolean;
}

export function displaySnapshot(snapshot: ReadinessSnapshot): void {
	output.table(
		[
			{ header: 'STATUS', key: 'status', width: 8 },
			{ header: 'CONNECTIONS', key: 'connections', width: 12 },
			{ header: 'CONNECTOR', key: 'connector', width: 36 },
		],
		[
			{
				status: snapshot.statusCode === 200 ? chalk.green('200') : chalk.red(String(snapshot.statusCode)),
				connections: String(snapshot.readyConnections),
				connector: snapshot.connectorId ?? '-',
			},
		],
	);
}

async function waitReady(ctx: HarnessContext, opts: ReadyOptions): Promise<ReadinessSnapshot> {
	const waitOptions = {
		tunnelUrl: opts.urlCheck ? ctx.tunnelUrl : undefined,
		minConnections: opts.minConnections ?? opts.haConnections,
	};
	if (opts.attach) {
		return ctx.poller.waitReady(waitOptions);
	}
	return withTunnel(ctx, { haConnections: opts.haConnections }, () => ctx.poller.waitReady(waitOptions));
}

export function registerReadyCommand(program: Command): void {
	program
		.command('ready')
		.description('Start the tunnel and wait for its readiness endpoint')
		.option('--ha-connections <n>', 'Edge connections the tunnel opens', parsePositiveInt, 1)
		.option('--min-connections <n>', 'Ready connections required (default: --ha-connections)', parsePositiveInt)
		.option('--attach', 'Poll an already running tunnel instead of starting one', false)
		.option('--no-url-check', 'Skip the request through the public hostname')
		.action(async (opts: ReadyOptions, cmd: Command) => {
			await runHarnessCommand(
				cmd,
				'ready',
				(ctx) => waitReady(ctx, opts),
				(snapshot) => {
					output.success(`Tunnel ready with ${snapshot.readyConnections} connection(s)`);
					output.blank();
					displaySnapshot(snapshot);
				},
			);
		});
}
