/**
 * Tunnel configuration builder.
 *
 * Options are resolved field by field: a later `with()` overrides only the
 * fields it sets. `build()` yields a frozen value; `writeTunnelConfig()`
 * renders it as the YAML document the tunnel binary reads.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DurationString, HarnessConfig, IngressRule, TunnelProtocol } from '@tunnelprobe/sdk';
import { parseDuration } from '@tunnelprobe/sdk';
import yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { METRICS_PORT } from './retry.js';

export type TunnelLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type EdgeIpVersion = '4' | '6' | 'auto';

/** Options the tunnel binary recognizes in its config file */
export interface TunnelConfigOptions {
	tunnel?: string;
	credentialsFile?: string;
	originCert?: string;
	ingress?: IngressRule[];
	/** host:port of the metrics/readiness listener */
	metricsAddr?: string;
	protocol?: TunnelProtocol;
	logfile?: string;
	logDirectory?: string;
	loglevel?: TunnelLogLevel;
	gracePeriod?: DurationString;
	stdinControl?: boolean;
	edgeIpVersion?: EdgeIpVersion;
	/** Keys written verbatim; recognized options win on conflict */
	extra?: Record<string, unknown>;
}

export type TunnelConfig = Readonly<Omit<TunnelConfigOptions, 'ingress' | 'extra'>> & {
	readonly ingress: readonly Readonly<IngressRule>[];
	readonly extra: Readonly<Record<string, unknown>>;
};

const SCALAR_FIELDS = [
	'tunnel',
	'credentialsFile',
	'originCert',
	'metricsAddr',
	'protocol',
	'logfile',
	'logDirectory',
	'loglevel',
	'gracePeriod',
	'stdinControl',
	'edgeIpVersion',
] as const;

type ScalarField = (typeof SCALAR_FIELDS)[number];

const DOCUMENT_KEYS: Record<ScalarField, string> = {
	tunnel: 'tunnel',
	credentialsFile: 'credentials-file',
	originCert: 'origincert',
	metricsAddr: 'metrics',
	protocol: 'protocol',
	logfile: 'logfile',
	logDirectory: 'log-directory',
	loglevel: 'loglevel',
	gracePeriod: 'grace-period',
	stdinControl: 'stdin-control',
	edgeIpVersion: 'edge-ip-version',
};

export class TunnelConfigBuilder {
	private fields: TunnelConfigOptions = {};

	/** Start from the tunnel identity and ingress of a harness config */
	static fromHarness(config: HarnessConfig): TunnelConfigBuilder {
		return new TunnelConfigBuilder().with({
			tunnel: config.tunnel,
			credentialsFile: config.credentials_file,
			ingress: config.ingress,
			metricsAddr: `localhost:${config.metrics_port ?? METRICS_PORT}`,
		});
	}

	/** Override the fields set in `options`; `extra` keys merge */
	with(options: TunnelConfigOptions): this {
		const next: TunnelConfigOptions = { ...this.fields };
		for (const field of SCALAR_FIELDS) {
			if (options[field] !== undefined) {
				Object.assign(next, { [field]: options[field] });
			}
		}
		if (options.ingress !== undefined) next.ingress = options.ingress.map((rule) => ({ ...rule }));
		if (options.extra !== undefined) next.extra = { ...this.fields.extra, ...options.extra };
		this.fields = next;
		return this;
	}

	/**
	 * @throws ConfigError on contradictory or malformed options
	 */
	build(): TunnelConfig {
		const { ingress = [], extra = {}, ...rest } = this.fields;
		if (rest.logfile !== undefined && rest.logDirectory !== undefined) {
			throw new ConfigError('logfile and logDirectory are mutually exclusive');
		}
		if (rest.gracePeriod !== undefined) {
			try {
				parseDuration(rest.gracePeriod);
			} catch (err) {
				throw new ConfigError(`Invalid grace period "${rest.gracePeriod}"`, { cause: err });
			}
		}
		const last = ingress[ingress.length - 1];
		if (last?.hostname !== undefined) {
			throw new ConfigError('The last ingress rule must not have a hostname (catch-all)');
		}
		return Object.freeze({
			...rest,
			ingress: Object.freeze(ingress.map((rule) => Object.freeze({ ...rule }))),
			extra: Object.freeze({ ...extra }),
		});
	}
}

/** Render a config as the document the tunnel binary reads */
export function toDocument(config: TunnelConfig): Record<string, unknown> {
	const doc: Record<string, unknown> = { ...config.extra };
	for (const field of SCALAR_FIELDS) {
		const value = config[field];
		if (value !== undefined) doc[DOCUMENT_KEYS[field]] = value;
	}
	if (config.ingress.length > 0) {
		doc.ingress = config.ingress.map((rule) => ({ ...rule }));
	}
	return doc;
}

/** Write `config.yml` into `dir`; resolves its path */
export async function writeTunnelConfig(dir: string, config: TunnelConfig): Promise<string> {
	await mkdir(dir, { recursive: true });
	const configPath = join(dir, 'config.yml');
	await writeFile(configPath, yaml.dump(toDocument(config)), 'utf-8');
	return configPath;
}

export interface TunnelCommandOptions {
	binary: string;
	configPath: string;
	/** Arguments before --config (default: ["tunnel"]) */
	preArgs?: string[];
	/** Arguments after the config path (default: ["run"]) */
	args?: string[];
}

/** `<binary> <pre-args…> --config <path> <args…>` */
export function buildTunnelCommand(options: TunnelCommandOptions): string[] {
	const { binary, configPath, preArgs = ['tunnel'], args = ['run'] } = options;
	return [binary, ...preArgs, '--config', configPath, ...args];
}
