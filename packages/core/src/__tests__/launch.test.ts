import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { launchTunnel, runTunnelCommand } from '../launch.js';
import type { ManagedProcess } from '../managed-process.js';
import { ProcessSupervisor } from '../supervisor.js';
import { TunnelConfigBuilder } from '../tunnel-config.js';

// Stand-in binary: prints its arguments, or echoes stdin when asked to run
const BINARY_SCRIPT = `
const args = process.argv.slice(2);
if (args[args.length - 1] === 'run') {
	process.stdin.on('data', (d) => process.stdout.write('control ' + d));
	process.stderr.write('Starting Hello\\n');
} else {
	process.stdout.write(JSON.stringify(args));
}
`;

const CONFIG = new TunnelConfigBuilder()
	.with({
		tunnel: 'test-tunnel',
		credentialsFile: '/tmp/test-creds.json',
		ingress: [{ service: 'hello_world' }],
		stdinControl: true,
	})
	.build();

describe('launch', () => {
	let workDir: string;
	let script: string;
	const supervisor = new ProcessSupervisor({ terminatePollIntervalMs: 50, killWaitMs: 2_000 });

	beforeEach(async () => {
		workDir = await mkdtemp(join(tmpdir(), 'tunnelprobe-launch-'));
		script = join(workDir, 'fake-binary.mjs');
		await writeFile(script, BINARY_SCRIPT);
	});

	afterEach(async () => {
		await rm(workDir, { recursive: true, force: true });
	});

	it('runs a sub-command with --config after the pre-args', async () => {
		const result = await runTunnelCommand(supervisor, {
			binary: process.execPath,
			config: CONFIG,
			workDir,
			preArgs: [script, 'tunnel', '--ha-connections', '2'],
			args: ['list'],
		});

		const configPath = join(workDir, 'config.yml');
		expect(JSON.parse(result.stdout)).toEqual(['tunnel', '--ha-connections', '2', '--config', configPath, 'list']);
		expect(yaml.load(await readFile(configPath, 'utf-8'))).toEqual({
			tunnel: 'test-tunnel',
			'credentials-file': '/tmp/test-creds.json',
			ingress: [{ service: 'hello_world' }],
			'stdin-control': true,
		});
	});

	it('hands the running tunnel to the scenario and stops it afterwards', async () => {
		let held: ManagedProcess | undefined;

		const echoed = await launchTunnel(
			supervisor,
			{
				binary: process.execPath,
				config: CONFIG,
				workDir,
				preArgs: [script, 'tunnel'],
				allowInput: true,
			},
			async (proc) => {
				held = proc;
				await proc.writeLine('reconnect 1s');
				for await (const line of proc.lines('stdout', 2_000)) {
					return line;
				}
				return undefined;
			},
		);

		expect(echoed).toBe('control reconnect 1s');
		expect(held?.exited).toBe(true);
	});
});
