/**
 * tunnelprobe terminate: check graceful shutdown on SIGTERM/SIGINT.
 *
 * Each scenario runs once per signal against a fresh tunnel.
 */

import {
	supportedSignals,
	type TerminationResult,
	TerminationScenario,
} from '@tunnelprobe/core';
import { formatSeconds, type TerminationSignal } from '@tunnelprobe/sdk';
import { type Command, InvalidArgumentError } from 'commander';
import type { HarnessContext } from '../config.js';
import { parseDurationMs, runHarnessCommand, withTunnel } from '../harness.js';
import * as output from '../output.js';

const MODES = ['graceful', 'drained', 'idle'] as const;
export type TerminationMode = (typeof MODES)[number];

interface TerminateOptions {
	signal?: TerminationSignal;
	mode?: TerminationMode;
	gracePeriod: number;
	timeout: number;
}

export interface TerminationRun extends Omit<TerminationResult, 'stream'> {
	mode: TerminationMode;
	streamLines?: number;
}

function parseSignal(value: string): TerminationSignal {
	const signal = supportedSignals().find((s) => s === value.toUpperCase());
	if (!signal) {
		throw new InvalidArgumentError(`Supported signals: ${supportedSignals().join(', ')}.`);
	}
	return signal;
}

function parseMode(value: string): TerminationMode {
	const mode = MODES.find((m) => m === value);
	if (!mode) {
		throw new InvalidArgumentError(`Modes: ${MODES.join(', ')}.`);
	}
	return mode;
}

function runMode(scenario: TerminationScenario, mode: TerminationMode, signal: TerminationSignal): Promise<TerminationResult> {
	switch (mode) {
		case 'graceful':
			return scenario.gracefulShutdown(signal);
		case 'drained':
			return scenario.shutdownOnceNoConnection(signal);
		case 'idle':
			return scenario.noConnectionShutdown(signal);
	}
}

async function runTermination(ctx: HarnessContext, opts: TerminateOptions): Promise<TerminationRun[]> {
	const signals = opts.signal ? [opts.signal] : supportedSignals();
	const modes = opts.mode ? [opts.mode] : [...MODES];
	const runs: TerminationRun[] = [];
	for (const mode of modes) {
		for (const signal of signals) {
			const result = await withTunnel(
				ctx,
				{ options: { gracePeriod: formatSeconds(opts.gracePeriod) }, captureOutput: false },
				(proc) => {
					const scenario = new TerminationScenario(proc, {
						poller: ctx.poller,
						gracePeriodMs: opts.gracePeriod,
						timeoutMs: opts.timeout,
						tunnelUrl: ctx.tunnelUrl,
						logger: ctx.logger,
					});
					return runMode(scenario, mode, signal);
				},
			);
			runs.push({
				mode,
				signal: result.signal,
				exit: result.exit,
				durationMs: result.durationMs,
				streamLines: result.stream?.lines,
			});
		}
	}
	return runs;
}

export function registerTerminateCommand(program: Command): void {
	program
		.command('terminate')
		.description('Check graceful shutdown on termination signals')
		.option('--signal <name>', 'Only this signal (default: every supported one)', parseSignal)
		.option('--mode <mode>', `Only this scenario: ${MODES.join(', ')}`, parseMode)
		.option('--grace-period <duration>', 'Grace period configured on the tunnel', parseDurationMs, 5_000)
		.option('--timeout <duration>', 'Bound on connecting and joining the in-flight request', parseDurationMs, 10_000)
		.action(async (opts: TerminateOptions, cmd: Command) => {
			await runHarnessCommand(
				cmd,
				'terminate',
				(ctx) => runTermination(ctx, opts),
				(runs) => {
					output.success(`${runs.length} termination scenario(s) passed`);
					output.blank();
					output.table(
						[
							{ header: 'MODE', key: 'mode', width: 10 },
							{ header: 'SIGNAL', key: 'signal', width: 8 },
							{ header: 'EXIT', key: 'exit', width: 10 },
							{ header: 'DURATION', key: 'duration', width: 10 },
							{ header: 'LINES', key: 'lines', width: 6 },
						],
						runs.map((r) => ({
							mode: r.mode,
							signal: r.signal,
							exit: r.exit.code !== null ? `code ${r.exit.code}` : (r.exit.signal ?? '-'),
							duration: `${r.durationMs}ms`,
							lines: r.streamLines === undefined ? '-' : String(r.streamLines),
						})),
					);
				},
			);
		});
}
