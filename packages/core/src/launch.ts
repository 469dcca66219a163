/**
 * Write a tunnel config, start the binary against it, and hand the running
 * process to a scenario. The process is terminated when the scenario settles.
 */

import type { ManagedProcess } from './managed-process.js';
import type { ProcessSupervisor, RunOptions, RunResult } from './supervisor.js';
import { buildTunnelCommand, type TunnelConfig, writeTunnelConfig } from './tunnel-config.js';

export interface LaunchOptions {
	binary: string;
	config: TunnelConfig;
	/** Directory receiving config.yml */
	workDir: string;
	/** Arguments before --config (default: ["tunnel"]) */
	preArgs?: string[];
	/** Arguments after the config path (default: ["run"]) */
	args?: string[];
	allowInput?: boolean;
	captureOutput?: boolean;
	root?: boolean;
}

export async function launchTunnel<T>(
	supervisor: ProcessSupervisor,
	options: LaunchOptions,
	fn: (proc: ManagedProcess) => Promise<T>,
): Promise<T> {
	const configPath = await writeTunnelConfig(options.workDir, options.config);
	const command = buildTunnelCommand({
		binary: options.binary,
		configPath,
		preArgs: options.preArgs,
		args: options.args,
	});
	return supervisor.withProcess(
		{
			command,
			allowInput: options.allowInput,
			captureOutput: options.captureOutput,
			root: options.root,
		},
		fn,
	);
}

/** Run a tunnel sub-command (e.g. `tunnel list`) to completion against a written config */
export async function runTunnelCommand(
	supervisor: ProcessSupervisor,
	options: Omit<LaunchOptions, 'allowInput'> & Pick<RunOptions, 'check' | 'timeoutMs'>,
): Promise<RunResult> {
	const configPath = await writeTunnelConfig(options.workDir, options.config);
	return supervisor.run({
		command: buildTunnelCommand({
			binary: options.binary,
			configPath,
			preArgs: options.preArgs,
			args: options.args,
		}),
		captureOutput: options.captureOutput,
		root: options.root,
		check: options.check,
		timeoutMs: options.timeoutMs,
	});
}
