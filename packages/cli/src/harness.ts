/**
 * Shared plumbing for commands that drive a tunnel: run bracketing, tunnel
 * launch from the harness config, and option parsers.
 */

import { rm } from 'node:fs/promises';
import {
	HarnessError,
	type ManagedProcess,
	type TunnelConfig,
	type TunnelConfigOptions,
	TunnelConfigBuilder,
	launchTunnel,
} from '@tunnelprobe/core';
import { parseSize } from '@tunnelprobe/logger-file';
import { parseDuration } from '@tunnelprobe/sdk';
import { type Command, InvalidArgumentError } from 'commander';
import { createHarnessContext, type HarnessContext, parseGlobalOptions } from './config.js';
import * as output from './output.js';

export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError('Expected a positive integer.');
	}
	return parsed;
}

export function parseDurationMs(value: string): number {
	try {
		return parseDuration(value);
	} catch (err) {
		throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
	}
}

export function parseSizeOption(value: string): number {
	try {
		return parseSize(value);
	} catch (err) {
		throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
	}
}

/** `tunnel [--ha-connections N]` */
export function tunnelPreArgs(haConnections?: number): string[] {
	return haConnections === undefined ? ['tunnel'] : ['tunnel', '--ha-connections', String(haConnections)];
}

export interface TunnelLaunch {
	haConnections?: number;
	options?: TunnelConfigOptions;
	/** Arguments after the config path (default: ["run"]) */
	args?: string[];
	allowInput?: boolean;
	captureOutput?: boolean;
	root?: boolean;
}

/** The harness config's tunnel, with `options` applied on top */
export function tunnelConfig(ctx: HarnessContext, options: TunnelConfigOptions = {}): TunnelConfig {
	return TunnelConfigBuilder.fromHarness(ctx.config).with(options).build();
}

/** Start the configured binary for the length of `fn`; it is stopped afterwards */
export async function withTunnel<T>(
	ctx: HarnessContext,
	launch: TunnelLaunch,
	fn: (proc: ManagedProcess) => Promise<T>,
): Promise<T> {
	return launchTunnel(
		ctx.supervisor,
		{
			binary: ctx.config.cloudflared_binary,
			config: tunnelConfig(ctx, launch.options),
			workDir: ctx.workDir,
			preArgs: tunnelPreArgs(launch.haConnections),
			args: launch.args,
			allowInput: launch.allowInput,
			captureOutput: launch.captureOutput,
			root: launch.root,
		},
		fn,
	);
}

function describeFailure(err: unknown): { code: string; message: string } {
	if (err instanceof HarnessError) return { code: err.code, message: err.message };
	return { code: 'UNEXPECTED', message: err instanceof Error ? err.message : String(err) };
}

/**
 * Bracket one harness run: build the context, log start and stop, report
 * the outcome, close the logger. Failures set a non-zero exit code.
 */
export async function runHarnessCommand<T>(
	cmd: Command,
	name: string,
	fn: (ctx: HarnessContext) => Promise<T>,
	report: (value: T) => void,
): Promise<void> {
	let ctx: HarnessContext | undefined;
	try {
		ctx = await createHarnessContext(parseGlobalOptions(cmd.parent?.opts() ?? {}));
		ctx.logger.info('run.start', `Starting ${name}`, { metadata: { config: ctx.configPath, workDir: ctx.workDir } });
		const startedAt = Date.now();
		const value = await fn(ctx);
		ctx.logger.info('run.stop', `${name} passed`, { duration_ms: Date.now() - startedAt });
		if (output.isJsonMode()) {
			output.json({ ok: true, command: name, result: value });
		} else {
			report(value);
		}
	} catch (err) {
		const failure = describeFailure(err);
		ctx?.logger.error('run.stop', `${name} failed: ${failure.message}`);
		if (output.isJsonMode()) {
			output.json({ ok: false, command: name, error: failure });
		} else {
			output.error(`${name} failed: ${failure.message}`);
		}
		process.exitCode = 1;
	} finally {
		await ctx?.logger.close();
		if (ctx?.ownsWorkDir) {
			await rm(ctx.workDir, { recursive: true, force: true });
		}
	}
}
