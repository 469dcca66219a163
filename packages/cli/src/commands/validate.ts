/**
 * tunnelprobe validate: check the harness config without starting a tunnel.
 *
 * Validates the YAML against the schema, builds the tunnel config from it,
 * and checks that the binary and credentials it points at exist.
 */

import { ConfigError, SchemaError, TunnelConfigBuilder, loadHarnessConfig, tunnelHostname } from '@tunnelprobe/core';
import type { HarnessConfig } from '@tunnelprobe/sdk';
import chalk from 'chalk';
import type { Command } from 'commander';
import { fileExists, parseGlobalOptions, resolveConfigPath } from '../config.js';
import * as output from '../output.js';

export interface ValidationResult {
	file: string;
	valid: boolean;
	description: string;
	errors: string[];
}

export interface ValidationReport {
	results: ValidationResult[];
	errorCount: number;
}

function describeError(err: unknown): string[] {
	if (err instanceof SchemaError && err.validationErrors.length > 0) return err.validationErrors;
	return [err instanceof Error ? err.message : String(err)];
}

function check(file: string, description: string, fn: () => void): ValidationResult {
	try {
		fn();
		return { file, valid: true, description, errors: [] };
	} catch (err) {
		return { file, valid: false, description, errors: describeError(err) };
	}
}

async function checkExists(file: string, description: string): Promise<ValidationResult> {
	const valid = await fileExists(file);
	return { file, valid, description, errors: valid ? [] : [`File not found: ${file}`] };
}

export async function runValidation(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<ValidationReport> {
	const results: ValidationResult[] = [];

	let config: HarnessConfig | undefined;
	try {
		config = await loadHarnessConfig(configPath, env);
		results.push({ file: configPath, valid: true, description: 'harness config', errors: [] });
	} catch (err) {
		results.push({ file: configPath, valid: false, description: 'harness config', errors: describeError(err) });
	}

	if (config) {
		const harness = config;
		results.push(check(configPath, 'tunnel config', () => TunnelConfigBuilder.fromHarness(harness).build()));
		results.push(check(configPath, 'public hostname', () => tunnelHostname(harness)));
		results.push(await checkExists(harness.cloudflared_binary, 'tunnel binary'));
		results.push(await checkExists(harness.credentials_file, 'credentials file'));
		if (harness.origincert !== undefined) {
			results.push(await checkExists(harness.origincert, 'origin certificate'));
		}
	}

	return { results, errorCount: results.filter((r) => !r.valid).length };
}

export function registerValidateCommand(program: Command): void {
	program
		.command('validate')
		.description('Validate the harness configuration')
		.action(async (_opts, cmd: Command) => {
			try {
				const globalOpts = parseGlobalOptions(cmd.parent?.opts() ?? {});
				const configPath = resolveConfigPath(globalOpts.config);

				if (!(await fileExists(configPath))) {
					throw new ConfigError(`Configuration file not found: ${configPath}`);
				}

				const { results, errorCount } = await runValidation(configPath);

				if (output.isJsonMode()) {
					output.json({ results, errors: errorCount });
					if (errorCount > 0) process.exitCode = 2;
					return;
				}

				output.blank();
				for (const r of results) {
					if (r.valid) {
						output.validPass(r.file, r.description);
					} else {
						output.validFail(r.file, r.description);
						for (const err of r.errors) {
							output.info(`    ${err}`);
						}
					}
				}

				output.blank();
				if (errorCount === 0) {
					output.info('0 errors ✓');
					output.info(chalk.dim('Next: run `tunnelprobe ready` against the configured tunnel.'));
				} else {
					output.info(`${errorCount} error${errorCount > 1 ? 's' : ''}`);
					output.info(chalk.dim('Fix the errors above, then re-run `tunnelprobe validate`.'));
					process.exitCode = 2;
				}
			} catch (err) {
				output.error(`Validation failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
