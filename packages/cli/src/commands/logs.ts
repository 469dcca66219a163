/**
 * tunnelprobe logs: check where and how the tunnel writes its logs.
 */

import { join } from 'node:path';
import {
	DEFAULT_EXPECTED_MESSAGE,
	DEFAULT_LOG_FILE_NAME,
	LogVerifier,
	ROTATE_AFTER_BYTES,
	sendRequests,
} from '@tunnelprobe/core';
import { type Command, InvalidArgumentError } from 'commander';
import type { HarnessContext } from '../config.js';
import { parsePositiveInt, runHarnessCommand, withTunnel } from '../harness.js';
import * as output from '../output.js';

const TARGETS = ['terminal', 'file', 'dir'] as const;
export type LogTarget = (typeof TARGETS)[number];

interface LogsOptions {
	expect: string;
	batchSize: number;
	maxBatches: number;
}

export interface LogCheckResult {
	target: LogTarget;
	location: string;
	detail: string;
}

function parseTarget(value: string): LogTarget {
	const target = TARGETS.find((t) => t === value);
	if (!target) {
		throw new InvalidArgumentError(`Targets: ${TARGETS.join(', ')}.`);
	}
	return target;
}

async function checkLogs(ctx: HarnessContext, target: LogTarget, opts: LogsOptions): Promise<LogCheckResult> {
	const verifier = new LogVerifier({ expectedMessage: opts.expect, logger: ctx.logger });
	const ready = () => ctx.poller.waitReady({ tunnelUrl: ctx.tunnelUrl });

	switch (target) {
		case 'terminal':
			return withTunnel(ctx, { haConnections: 1 }, async (proc) => {
				await ready();
				const line = await verifier.assertLogToTerminal(proc.lines('stderr'));
				return { target, location: 'stderr', detail: line };
			});

		case 'file': {
			const logfile = join(ctx.workDir, DEFAULT_LOG_FILE_NAME);
			return withTunnel(ctx, { haConnections: 1, options: { logfile }, captureOutput: false }, async () => {
				await ready();
				await verifier.assertLogInFile(logfile);
				const summary = await verifier.assertJsonLog(logfile);
				return { target, location: logfile, detail: `${summary.lines} structured line(s)` };
			});
		}

		case 'dir': {
			const logDirectory = join(ctx.workDir, 'logs');
			return withTunnel(
				ctx,
				{ haConnections: 1, options: { logDirectory, loglevel: 'debug' }, captureOutput: false },
				async () => {
					await ready();
					const rotation = await verifier.assertLogRotated({
						logDir: logDirectory,
						maxBatches: opts.maxBatches,
						rotateAfterBytes: ROTATE_AFTER_BYTES,
						generateBatch: () =>
							sendRequests(ctx.tunnelUrl, opts.batchSize, { requireOk: false, logger: ctx.logger }),
					});
					return {
						target,
						location: logDirectory,
						detail: `rotated after ${rotation.batches} batch(es) into ${rotation.rotatedFile} (${rotation.rotatedSize} bytes)`,
					};
				},
			);
		}
	}
}

export function registerLogsCommand(program: Command): void {
	program
		.command('logs')
		.description('Check tunnel logging to the terminal, a file or a rotating directory')
		.argument('<target>', `Where the tunnel logs: ${TARGETS.join(', ')}`, parseTarget)
		.option('--expect <text>', 'Text the logs must contain', DEFAULT_EXPECTED_MESSAGE)
		.option('--batch-size <n>', 'Requests per batch when filling the log directory', parsePositiveInt, 1_000)
		.option('--max-batches <n>', 'Batches before rotation counts as failed', parsePositiveInt, 3)
		.action(async (target: LogTarget, opts: LogsOptions, cmd: Command) => {
			await runHarnessCommand(
				cmd,
				'logs',
				(ctx) => checkLogs(ctx, target, opts),
				(result) => {
					output.success(`Logging to ${result.target} checked at ${result.location}`);
					output.info(`  ${result.detail}`);
				},
			);
		});
}
