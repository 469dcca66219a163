/**
 * tunnelprobe tunnel: run the tunnel without config ingress.
 *
 *   hello-world  `run --hello-world`; wait for readiness through the hostname
 *   no-ingress   `run` with no rules; every request must answer 503
 *   list         `tunnel list --output json` must exit 0 with a JSON array
 */

import { expectStatus, HarnessError, runTunnelCommand, type TunnelConfigOptions } from '@tunnelprobe/core';
import { type Command, InvalidArgumentError } from 'commander';
import type { HarnessContext } from '../config.js';
import { parseDurationMs, runHarnessCommand, tunnelConfig, tunnelPreArgs, withTunnel } from '../harness.js';
import * as output from '../output.js';

const MODES = ['hello-world', 'no-ingress', 'list'] as const;
export type TunnelMode = (typeof MODES)[number];

/** Paths a tunnel without ingress is asked for */
export const NO_INGRESS_PATHS = ['/', '/test'];
export const LIST_TIMEOUT_MS = 15_000;

export type TunnelCheckResult =
	| { mode: 'hello-world'; connectorId: string; readyConnections: number }
	| { mode: 'no-ingress'; urls: string[] }
	| { mode: 'list'; tunnels: number };

interface TunnelOptions {
	listTimeout: number;
}

export function parseMode(value: string): TunnelMode {
	const mode = MODES.find((m) => m === value);
	if (!mode) {
		throw new InvalidArgumentError(`Modes: ${MODES.join(', ')}.`);
	}
	return mode;
}

/** Count the tunnels in `tunnel list --output json` */
export function parseTunnelList(stdout: string): number {
	let parsed: unknown;
	try {
		parsed = JSON.parse(stdout);
	} catch (err) {
		throw new HarnessError('LIST_OUTPUT', 'tunnel list did not print JSON', { cause: err });
	}
	if (!Array.isArray(parsed)) {
		throw new HarnessError('LIST_OUTPUT', `tunnel list printed ${typeof parsed}, expected an array`);
	}
	return parsed.length;
}

export function noIngressUrls(tunnelUrl: string): string[] {
	const base = tunnelUrl.replace(/\/$/, '');
	return NO_INGRESS_PATHS.map((path) => `${base}${path}`);
}

async function checkTunnel(ctx: HarnessContext, mode: TunnelMode, opts: TunnelOptions): Promise<TunnelCheckResult> {
	const noIngress: TunnelConfigOptions = { ingress: [] };

	switch (mode) {
		case 'hello-world':
			return withTunnel(
				ctx,
				{ haConnections: 1, options: noIngress, args: ['run', '--hello-world'] },
				async (): Promise<TunnelCheckResult> => {
					const snapshot = await ctx.poller.waitReady({ tunnelUrl: ctx.tunnelUrl, minConnections: 1 });
					return {
						mode: 'hello-world',
						connectorId: await ctx.poller.connectorId(),
						readyConnections: snapshot.readyConnections,
					};
				},
			);

		case 'no-ingress':
			return withTunnel(ctx, { haConnections: 1, options: noIngress }, async (): Promise<TunnelCheckResult> => {
				await ctx.poller.waitReady({ minConnections: 1 });
				const urls = noIngressUrls(ctx.tunnelUrl);
				for (const url of urls) {
					await expectStatus(url, 503, { logger: ctx.logger });
				}
				return { mode: 'no-ingress', urls };
			});

		case 'list': {
			const result = await runTunnelCommand(ctx.supervisor, {
				binary: ctx.config.cloudflared_binary,
				config: tunnelConfig(ctx),
				workDir: ctx.workDir,
				preArgs: tunnelPreArgs(),
				args: ['list', '--output', 'json'],
				timeoutMs: opts.listTimeout,
			});
			return { mode: 'list', tunnels: parseTunnelList(result.stdout) };
		}
	}
}

function report(result: TunnelCheckResult): void {
	switch (result.mode) {
		case 'hello-world':
			output.success(`Hello world tunnel ready with ${result.readyConnections} connection(s)`);
			output.info(`  connector ${result.connectorId}`);
			return;
		case 'no-ingress':
			output.success(`Tunnel without ingress answered 503 on ${result.urls.length} path(s)`);
			return;
		case 'list':
			output.success(`tunnel list returned ${result.tunnels} tunnel(s)`);
			return;
	}
}

export function registerTunnelCommand(program: Command): void {
	program
		.command('tunnel')
		.description('Run the tunnel with no config ingress, or list tunnels')
		.argument('<mode>', `What to check: ${MODES.join(', ')}`, parseMode)
		.option('--list-timeout <duration>', 'Bound on tunnel list', parseDurationMs, LIST_TIMEOUT_MS)
		.action(async (mode: TunnelMode, opts: TunnelOptions, cmd: Command) => {
			await runHarnessCommand(cmd, 'tunnel', (ctx) => checkTunnel(ctx, mode, opts), report);
		});
}
