/**
 * ProcessSupervisor: starts the tunnel binary and guarantees it is stopped.
 *
 * Every process started through `withProcess` is terminated when the scope
 * exits, whether the body returned, threw, or timed out: SIGTERM first, then
 * SIGKILL if the process is still running after the termination wait.
 */

import { spawn } from 'node:child_process';
import type { ExitStatus } from '@tunnelprobe/sdk';
import { LaunchError, ProcessTimeoutError } from './errors.js';
import { RunLogger } from './logger.js';
import { ManagedProcess } from './managed-process.js';

export interface SupervisorOptions {
	/** Run logging context (default: a logger with no sinks) */
	logger?: RunLogger;
	/** Interval between exit checks after SIGTERM (default: 1000) */
	terminatePollIntervalMs?: number;
	/** Exit checks after SIGTERM before escalating to SIGKILL (default: 10) */
	terminateAttempts?: number;
	/** How long to wait for exit after SIGKILL (default: 5000) */
	killWaitMs?: number;
	/** How long to wait for stdout/stderr to close after exit (default: 5000) */
	drainTimeoutMs?: number;
}

export interface StartOptions {
	/** argv: binary path followed by its arguments */
	command: string[];
	/** Open a stdin pipe for control directives (default: false) */
	allowInput?: boolean;
	/** Capture stdout/stderr; discarded otherwise (default: true) */
	captureOutput?: boolean;
	/** Prefix the command with sudo (default: false) */
	root?: boolean;
	env?: Record<string, string>;
	cwd?: string;
}

export interface RunOptions extends Omit<StartOptions, 'allowInput'> {
	/** Fail with LaunchError on a non-zero exit (default: true) */
	check?: boolean;
	/** Kill the process and fail after this long (default: 600_000) */
	timeoutMs?: number;
}

export interface RunResult {
	command: string[];
	exitCode: number | null;
	signal: string | null;
	stdout: string;
	stderr: string;
}

export const DEFAULT_RUN_TIMEOUT_MS = 600_000;

/** Apply the elevation prefix */
export function elevate(command: string[], root: boolean): string[] {
	if (!root || command[0] === 'sudo') return [...command];
	return ['sudo', ...command];
}

export class ProcessSupervisor {
	private readonly logger: RunLogger;
	private readonly terminatePollIntervalMs: number;
	private readonly terminateAttempts: number;
	private readonly killWaitMs: number;
	private readonly drainTimeoutMs: number;

	constructor(options: SupervisorOptions = {}) {
		this.logger = options.logger ?? new RunLogger();
		this.terminatePollIntervalMs = options.terminatePollIntervalMs ?? 1_000;
		this.terminateAttempts = options.terminateAttempts ?? 10;
		this.killWaitMs = options.killWaitMs ?? 5_000;
		this.drainTimeoutMs = options.drainTimeoutMs ?? 5_000;
	}

	/**
	 * Spawn a process. Resolves once the OS has started it.
	 *
	 * @throws LaunchError if the binary cannot be executed
	 */
	async start(options: StartOptions): Promise<ManagedProcess> {
		const root = options.root ?? false;
		const allowInput = options.allowInput ?? false;
		const captureOutput = options.captureOutput ?? true;
		const command = elevate(options.command, root);
		const [binary, ...args] = command;
		if (!binary) {
			throw new LaunchError(command, 'Empty command line');
		}

		const output = captureOutput ? 'pipe' : 'ignore';
		const child = spawn(binary, args, {
			cwd: options.cwd,
			env: { ...process.env, ...options.env },
			stdio: [allowInput ? 'pipe' : 'ignore', output, output],
		});

		const managed = new ManagedProcess(child, { command, allowInput, captureOutput, root }, this.logger);

		await new Promise<void>((resolve, reject) => {
			const onSpawn = (): void => {
				child.off('error', onError);
				resolve();
			};
			const onError = (err: Error): void => {
				child.off('spawn', onSpawn);
				reject(new LaunchError(command, `Failed to start: ${err.message}`, {}, { cause: err }));
			};
			child.once('spawn', onSpawn);
			child.once('error', onError);
		});

		this.logger.info('process.start', `Run cmd ${command.join(' ')}`, { pid: managed.pid });
		return managed;
	}

	/**
	 * Stop a process: SIGTERM, poll for exit, SIGKILL if it outlives the
	 * termination wait, then drain its output. Only the first call per
	 * process signals it; later calls just wait for the exit.
	 */
	async terminate(proc: ManagedProcess): Promise<ExitStatus | null> {
		if (!proc.claimTermination()) {
			return proc.waitForExit(this.killWaitMs);
		}

		if (!proc.exited) {
			proc.kill('SIGTERM');
			if (!(await this.waitForTerminate(proc))) {
				proc.kill('SIGKILL');
				this.logger.warn(
					'process.kill',
					`${proc.command.join(' ')}: did not terminate within wait period. Killing process. stdout: ${proc.output('stdout')}, stderr: ${proc.output('stderr')}`,
					{ pid: proc.pid },
				);
			}
		}

		const status = await proc.waitForExit(this.killWaitMs);
		await proc.drain(this.drainTimeoutMs);

		if (proc.captureOutput) {
			this.logger.info('process.output', `tunnel log: ${proc.output('stderr')}`, { pid: proc.pid });
		}
		this.logger.info(
			'process.exit',
			status
				? `Process exited (code=${status.code}, signal=${status.signal})`
				: 'Process did not report an exit',
			{ pid: proc.pid, duration_ms: Date.now() - proc.startedAt },
		);
		return status;
	}

	/**
	 * Start a process, hand it to `fn`, and terminate it when `fn` settles.
	 */
	async withProcess<T>(options: StartOptions, fn: (proc: ManagedProcess) => Promise<T>): Promise<T> {
		const proc = await this.start(options);
		try {
			return await fn(proc);
		} finally {
			await this.terminate(proc);
		}
	}

	/**
	 * Run a process to completion.
	 *
	 * @throws LaunchError on a non-zero exit when `check` is set
	 * @throws ProcessTimeoutError when it outlives `timeoutMs`
	 */
	async run(options: RunOptions): Promise<RunResult> {
		const timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
		const check = options.check ?? true;
		const proc = await this.start({ ...options, allowInput: false });

		const status = await proc.waitForExit(timeoutMs);
		if (!status) {
			proc.claimTermination();
			proc.kill('SIGKILL');
			await proc.waitForExit(this.killWaitMs);
			await proc.drain(this.drainTimeoutMs);
			const err = new ProcessTimeoutError(proc.command, timeoutMs, {
				stdout: proc.output('stdout'),
				stderr: proc.output('stderr'),
			});
			this.logger.error('process.exit', err.message, { pid: proc.pid });
			throw err;
		}

		await proc.drain(this.drainTimeoutMs);
		const result: RunResult = {
			command: proc.command,
			exitCode: status.code,
			signal: status.signal,
			stdout: proc.output('stdout'),
			stderr: proc.output('stderr'),
		};

		if (check && status.code !== 0) {
			const message = `${proc.command.join(' ')} return exit code ${status.code}, stderr: ${result.stderr}`;
			this.logger.error('process.exit', message, { pid: proc.pid });
			throw new LaunchError(proc.command, `Exited with code ${status.code}`, {
				exitCode: status.code,
				stderr: result.stderr,
			});
		}

		this.logger.debug('process.output', `${proc.command.join(' ')} log: ${result.stdout}`, {
			pid: proc.pid,
		});
		return result;
	}

	private async waitForTerminate(proc: ManagedProcess): Promise<boolean> {
		for (let i = 0; i < this.terminateAttempts; i++) {
			if (await proc.waitForExit(this.terminatePollIntervalMs)) return true;
		}
		return proc.exited;
	}
}
