/**
 * Terminal output for the CLI.
 *
 * Human-readable lines go to stdout unless --json or --quiet is set; errors
 * always go to stderr. Harness log entries are written separately by the
 * console logger.
 */

import chalk from 'chalk';

let jsonMode = false;
let verboseMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

export function isVerboseMode(): boolean {
	return verboseMode;
}

export function isQuietMode(): boolean {
	return quietMode;
}

function print(line: string): void {
	if (jsonMode || quietMode) return;
	process.stdout.write(`${line}\n`);
}

export function info(message: string): void {
	print(message);
}

export function success(message: string): void {
	print(`${chalk.green('✓')} ${message}`);
}

export function warn(message: string): void {
	print(`${chalk.yellow('⚠')} ${message}`);
}

export function error(message: string): void {
	process.stderr.write(`${chalk.red('✗')} ${message}\n`);
}

export function debug(message: string): void {
	if (verboseMode) print(chalk.dim(message));
}

export function heading(title: string): void {
	print(chalk.bold(title));
}

export function blank(): void {
	print('');
}

export function json(value: unknown): void {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function validPass(label: string, description: string): void {
	print(`  ${chalk.green('✓')} ${label} ${chalk.dim(`— ${description}`)}`);
}

export function validFail(label: string, description: string): void {
	print(`  ${chalk.red('✗')} ${label} ${chalk.dim(`— ${description}`)}`);
}

export interface Column {
	header: string;
	key: string;
	width: number;
}

export function table(columns: Column[], rows: Record<string, string>[]): void {
	print(chalk.dim(columns.map((c) => c.header.padEnd(c.width)).join('  ')));
	for (const row of rows) {
		print(columns.map((c) => (row[c.key] ?? '').padEnd(c.width)).join('  '));
	}
}
