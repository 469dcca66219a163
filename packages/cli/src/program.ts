/**
 * tunnelprobe CLI: lifecycle checks for a tunnel binary.
 *
 * Sets up Commander.js with all commands and global flags.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerLogsCommand } from './commands/logs.js';
import { registerNotReadyCommand } from './commands/not-ready.js';
import { registerReadyCommand } from './commands/ready.js';
import { registerReconnectCommand } from './commands/reconnect.js';
import { registerTerminateCommand } from './commands/terminate.js';
import { registerTunnelCommand } from './commands/tunnel.js';
import { registerValidateCommand } from './commands/validate.js';
import { parseGlobalOptions } from './config.js';
import { parseSizeOption } from './harness.js';
import { setJsonMode, setQuietMode, setVerboseMode } from './output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function getVersion(): Promise<string> {
	try {
		const pkgPath = resolve(__dirname, '..', 'package.json');
		const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'));
		if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version;
		}
	} catch {
		// Not fatal: report an unknown version
	}
	return '0.0.0';
}

export function createProgram(version: string): Command {
	const program = new Command();

	program
		.name('tunnelprobe')
		.description('Lifecycle checks for a tunnel binary')
		.version(version, '-V, --version', 'Print version number')
		.option('-c, --config <path>', 'Path to tunnelprobe.yaml')
		.option('-w, --work-dir <path>', 'Directory for generated tunnel configs and logs (default: a temp dir)')
		.option('--log-file <path>', 'Also write harness logs as JSON lines to this file')
		.option('--log-max-size <size>', 'Rotate the log file past this size (e.g. 10MB)', parseSizeOption)
		.option('-v, --verbose', 'Verbose output')
		.option('--json', 'Output as JSON (for scripting)')
		.option('--quiet', 'Errors only')
		.hook('preAction', (thisCommand) => {
			const opts = parseGlobalOptions(thisCommand.opts());
			setJsonMode(opts.json);
			setVerboseMode(opts.verbose);
			setQuietMode(opts.quiet);
		});

	registerValidateCommand(program);
	registerReadyCommand(program);
	registerNotReadyCommand(program);
	registerReconnectCommand(program);
	registerTerminateCommand(program);
	registerLogsCommand(program);
	registerTunnelCommand(program);

	return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
	const program = createProgram(await getVersion());
	await program.parseAsync(argv);
}

export { resolveConfigPath, parseGlobalOptions, consoleLevel, CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from './config.js';
export type { GlobalOptions, HarnessContext } from './config.js';
export { runValidation } from './commands/validate.js';
export type { ValidationResult, ValidationReport } from './commands/validate.js';
