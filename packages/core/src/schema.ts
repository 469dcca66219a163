/**
 * Harness config loading + JSON Schema validation.
 *
 * Loads tunnelprobe.yaml, resolves ${} env vars, validates against the
 * schema, and returns a HarnessConfig.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { HarnessConfig } from '@tunnelprobe/sdk';
import yaml from 'js-yaml';
import { ConfigError, SchemaError } from './errors.js';
import { METRICS_PORT } from './retry.js';
import { compileValidator } from './validation.js';

// ─── JSON Schema for the harness config ───────────────────────────────────────

const ingressRuleSchema = {
	type: 'object',
	required: ['service'],
	properties: {
		hostname: { type: 'string' },
		path: { type: 'string' },
		service: { type: 'string', minLength: 1 },
	},
};

export const harnessConfigSchema = {
	type: 'object',
	required: ['cloudflared_binary', 'tunnel', 'credentials_file', 'ingress'],
	properties: {
		cloudflared_binary: { type: 'string', minLength: 1 },
		tunnel: { type: 'string', minLength: 1 },
		credentials_file: { type: 'string', minLength: 1 },
		origincert: { type: 'string' },
		hostname: { type: 'string' },
		ingress: { type: 'array', minItems: 1, items: ingressRuleSchema },
		metrics_port: { type: 'integer', minimum: 1, maximum: 65535 },
	},
};

const harnessConfig = compileValidator<HarnessConfig>(harnessConfigSchema);

// ─── Env var substitution ─────────────────────────────────────────────────────

export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = env[varName];
			if (envVal === undefined) {
				throw new ConfigError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map((item) => substituteEnvVars(item, env));
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v, env);
		}
		return result;
	}
	return value;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed config value.
 *
 * @throws SchemaError listing every violation
 */
export function parseHarnessConfig(raw: unknown): HarnessConfig {
	if (!harnessConfig.check(raw)) {
		throw new SchemaError('Invalid harness configuration', harnessConfig.errors());
	}
	return raw;
}

/**
 * Load and validate a harness configuration from YAML.
 */
export async function loadHarnessConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<HarnessConfig> {
	const filePath = resolve(configPath);
	let raw: unknown;
	try {
		const content = await readFile(filePath, 'utf-8');
		raw = substituteEnvVars(yaml.load(content), env);
	} catch (err) {
		if (err instanceof ConfigError) throw err;
		throw new ConfigError(`Failed to load YAML file: ${filePath}`, { cause: err });
	}
	return parseHarnessConfig(raw);
}

/** Public hostname: the explicit one, else the first ingress rule's */
export function tunnelHostname(config: HarnessConfig): string {
	const hostname = config.hostname ?? config.ingress.find((rule) => rule.hostname)?.hostname;
	if (!hostname) {
		throw new ConfigError('No hostname configured and no ingress rule has one');
	}
	return hostname;
}

/** URL of the tunnel's public hostname */
export function tunnelUrl(config: HarnessConfig): string {
	return `https://${tunnelHostname(config)}`;
}

/** Base URL of the tunnel's local metrics listener */
export function metricsUrl(config: HarnessConfig): string {
	return `http://localhost:${config.metrics_port ?? METRICS_PORT}`;
}
