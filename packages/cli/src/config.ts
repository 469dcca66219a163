/**
 * Run setup for the CLI.
 *
 * Resolves tunnelprobe.yaml from --config, TUNNELPROBE_CONFIG or the current
 * directory, and builds the run logging context every command passes down.
 */

import { access, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
	LoggerManager,
	loadHarnessConfig,
	metricsUrl,
	ProcessSupervisor,
	ReadinessPoller,
	RunLogger,
	tunnelUrl,
} from '@tunnelprobe/core';
import { ConsoleLogger } from '@tunnelprobe/logger-console';
import { FileLogger } from '@tunnelprobe/logger-file';
import type { HarnessConfig, LogLevel } from '@tunnelprobe/sdk';

export const CONFIG_ENV_VAR = 'TUNNELPROBE_CONFIG';
export const DEFAULT_CONFIG_FILE = 'tunnelprobe.yaml';

export interface GlobalOptions {
	config?: string;
	workDir?: string;
	logFile?: string;
	/** Rotate the --log-file past this many bytes */
	logMaxSize?: number;
	verbose: boolean;
	quiet: boolean;
	json: boolean;
}

function stringOption(value: unknown): string | undefined {
	return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Read the program-level flags out of Commander's option bag */
export function parseGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
	return {
		config: stringOption(opts.config),
		workDir: stringOption(opts.workDir),
		logFile: stringOption(opts.logFile),
		logMaxSize: typeof opts.logMaxSize === 'number' ? opts.logMaxSize : undefined,
		verbose: opts.verbose === true,
		quiet: opts.quiet === true,
		json: opts.json === true,
	};
}

export function resolveConfigPath(
	flag?: string,
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): string {
	const fromEnv = env[CONFIG_ENV_VAR];
	if (flag) return resolve(cwd, flag);
	if (fromEnv) return resolve(cwd, fromEnv);
	return resolve(cwd, DEFAULT_CONFIG_FILE);
}

export async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch {
		return false;
	}
}

export function consoleLevel(opts: Pick<GlobalOptions, 'verbose' | 'quiet'>): LogLevel {
	if (opts.quiet) return 'error';
	return opts.verbose ? 'debug' : 'info';
}

/** Console sink always; a JSONL file sink when --log-file is given */
export async function createRunLogger(opts: GlobalOptions): Promise<RunLogger> {
	const manager = new LoggerManager();
	const consoleSink = new ConsoleLogger();
	await consoleSink.init({ level: consoleLevel(opts), verbose: opts.verbose });
	manager.addLogger(consoleSink);
	if (opts.logFile) {
		const file = new FileLogger();
		await file.init({ path: opts.logFile, maxSize: opts.logMaxSize });
		manager.addLogger(file);
	}
	return new RunLogger(manager);
}

export interface HarnessContext {
	config: HarnessConfig;
	configPath: string;
	logger: RunLogger;
	supervisor: ProcessSupervisor;
	poller: ReadinessPoller;
	tunnelUrl: string;
	workDir: string;
	/** The work dir is a temp dir made for this run, removed when it ends */
	ownsWorkDir: boolean;
}

/** Load the harness config and wire the components one run shares */
export async function createHarnessContext(opts: GlobalOptions): Promise<HarnessContext> {
	const configPath = resolveConfigPath(opts.config);
	const config = await loadHarnessConfig(configPath);
	const logger = await createRunLogger(opts);
	const workDir = opts.workDir ? resolve(opts.workDir) : await mkdtemp(join(tmpdir(), 'tunnelprobe-'));
	return {
		config,
		configPath,
		logger,
		supervisor: new ProcessSupervisor({ logger }),
		poller: new ReadinessPoller({ metricsUrl: metricsUrl(config), logger }),
		tunnelUrl: tunnelUrl(config),
		workDir,
		ownsWorkDir: opts.workDir === undefined,
	};
}
