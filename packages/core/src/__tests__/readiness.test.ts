import { type Server, createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { MockLogger } from '@tunnelprobe/sdk';
import { FAKE_CONNECTOR_ID, FakeTunnel } from '@tunnelprobe/testing';
import { afterEach, describe, expect, it } from 'vitest';
import { HarnessError, NotReadyError, StillConnectedError } from '../errors.js';
import { LoggerManager, RunLogger } from '../logger.js';
import { ReadinessPoller, isDisconnected, isReady, parseReadiness } from '../readiness.js';

const FAST = { maxAttempts: 3, delayMs: 20, timeoutMs: 1_000 };

function listenOn(server: Server): Promise<number> {
	return new Promise((resolve) => {
		server.listen(0, '127.0.0.1', () => {
			const address: AddressInfo | string | null = server.address();
			resolve(address !== null && typeof address === 'object' ? address.port : 0);
		});
	});
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve) => server.close(() => resolve()));
}

describe('parseReadiness', () => {
	it('reads a ready body', () => {
		const snap = parseReadiness(200, '{"status":200,"readyConnections":4,"connectorId":"abc"}', 1000);
		expect(snap).toEqual({ statusCode: 200, readyConnections: 4, connectorId: 'abc', observedAt: 1000 });
		expect(Object.isFrozen(snap)).toBe(true);
	});

	it('treats a missing connectorId as null', () => {
		expect(parseReadiness(503, '{"readyConnections":0}', 1).connectorId).toBeNull();
	});

	it('reads an unparseable non-200 body as zero connections', () => {
		expect(parseReadiness(502, '<html>bad gateway</html>', 5)).toEqual({
			statusCode: 502,
			readyConnections: 0,
			connectorId: null,
			observedAt: 5,
		});
	});

	it('rejects a 200 without a valid body', () => {
		expect(() => parseReadiness(200, '{"readyConnections":-1}')).toThrow(HarnessError);
		let caught: unknown;
		try {
			parseReadiness(200, 'ok');
		} catch (err) {
			caught = err;
		}
		expect(caught).toMatchObject({ code: 'INVALID_READINESS_BODY' });
	});
});

describe('isReady / isDisconnected', () => {
	const snap = (statusCode: number, readyConnections: number) =>
		parseReadiness(statusCode, JSON.stringify({ readyConnections }), 0);

	it('compares connection counts with >=', () => {
		expect(isReady(snap(200, 4), 1)).toBe(true);
		expect(isReady(snap(200, 4), 4)).toBe(true);
		expect(isReady(snap(200, 4), 5)).toBe(false);
		expect(isReady(snap(503, 4), 1)).toBe(false);
	});

	it('needs a non-200 status and zero connections to count as disconnected', () => {
		expect(isDisconnected(snap(503, 0))).toBe(true);
		expect(isDisconnected(snap(503, 1))).toBe(false);
		expect(isDisconnected(snap(200, 0))).toBe(false);
	});
});

describe('ReadinessPoller', () => {
	let fake: FakeTunnel | undefined;

	afterEach(async () => {
		await fake?.kill();
		fake = undefined;
	});

	it('waits until at least the requested connections are ready', async () => {
		fake = await FakeTunnel.start({ haConnections: 4 });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, policy: FAST });

		for (const min of [1, 4]) {
			const snap = await poller.waitReady({ minConnections: min });
			expect(snap.statusCode).toBe(200);
			expect(snap.readyConnections).toBe(4);
		}
	});

	it('raises NotReadyError with the last snapshot when more connections are required', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, policy: FAST });

		const err = await poller.waitReady({ minConnections: 2 }).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(NotReadyError);
		if (!(err instanceof NotReadyError)) return;
		expect(err.attempts).toBe(3);
		expect(err.minConnections).toBe(2);
		expect(err.lastSnapshot?.readyConnections).toBe(1);
		expect(err.lastSnapshot?.statusCode).toBe(200);
	});

	it('retries while connections register', async () => {
		fake = await FakeTunnel.start({ haConnections: 2, connectDelayMs: 100 });
		const logger = new MockLogger();
		const manager = new LoggerManager();
		manager.addLogger(logger);
		const runLogger = new RunLogger(manager);
		const poller = new ReadinessPoller({
			metricsUrl: fake.metricsUrl,
			policy: { maxAttempts: 20, delayMs: 25, timeoutMs: 1_000 },
			logger: runLogger,
		});

		const snap = await poller.waitReady({ minConnections: 2 });
		await runLogger.close();

		expect(snap.readyConnections).toBe(2);
		expect(logger.byPhase('readiness.attempt').length).toBeGreaterThan(0);
		expect(logger.byPhase('readiness.ready')).toHaveLength(1);
	});

	it('also requires a 200 through the tunnel URL', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, policy: FAST });
		await expect(poller.waitReady({ tunnelUrl: fake.tunnelUrl })).resolves.toMatchObject({
			readyConnections: 1,
		});
	});

	it('raises NotReadyError with no snapshot when nothing listens', async () => {
		const server = createServer();
		const port = await listenOn(server);
		await closeServer(server);
		const poller = new ReadinessPoller({ metricsUrl: `http://127.0.0.1:${port}`, policy: FAST });

		const err = await poller.waitReady().catch((e: unknown) => e);

		expect(err).toBeInstanceOf(NotReadyError);
		if (!(err instanceof NotReadyError)) return;
		expect(err.lastSnapshot).toBeNull();
	});

	it('confirmNotReady resolves the 503 snapshot once connections drop', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, disconnectPolicy: FAST });

		await fake.writeLine('reconnect 5s');

		await expect(poller.confirmNotReady()).resolves.toMatchObject({
			statusCode: 503,
			readyConnections: 0,
			connectorId: FAKE_CONNECTOR_ID,
		});
	});

	it('confirmNotReady accepts a refused connection after exit', async () => {
		fake = await FakeTunnel.start({ haConnections: 1 });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, disconnectPolicy: FAST });

		fake.signal('SIGTERM');
		await fake.waitForExit(1_000);

		await expect(poller.confirmNotReady()).resolves.toBeNull();
		await expect(poller.confirmNotReady()).resolves.toBeNull();
	});

	it('confirmNotReady raises StillConnectedError while connections stay up', async () => {
		fake = await FakeTunnel.start({ haConnections: 2 });
		const poller = new ReadinessPoller({
			metricsUrl: fake.metricsUrl,
			disconnectPolicy: { maxAttempts: 2, delayMs: 10, timeoutMs: 1_000 },
		});

		const err = await poller.confirmNotReady().catch((e: unknown) => e);

		expect(err).toBeInstanceOf(StillConnectedError);
		if (!(err instanceof StillConnectedError)) return;
		expect(err.attempts).toBe(2);
		expect(err.lastSnapshot?.readyConnections).toBe(2);
	});

	it('reads the connector id', async () => {
		fake = await FakeTunnel.start({ haConnections: 1, connectorId: 'connector-test' });
		const poller = new ReadinessPoller({ metricsUrl: fake.metricsUrl, policy: FAST });
		await expect(poller.connectorId()).resolves.toBe('connector-test');
	});

	it('surfaces a 200 with an unreadable body as a failed attempt', async () => {
		const server = createServer((_req, res) => {
			res.writeHead(200, { 'content-type': 'text/plain' });
			res.end('ok');
		});
		const port = await listenOn(server);
		try {
			const poller = new ReadinessPoller({ metricsUrl: `http://127.0.0.1:${port}`, policy: FAST });
			await expect(poller.snapshot()).rejects.toMatchObject({ code: 'INVALID_READINESS_BODY' });
			const err = await poller.waitReady().catch((e: unknown) => e);
			expect(err).toBeInstanceOf(NotReadyError);
		} finally {
			server.closeAllConnections();
			await closeServer(server);
		}
	});
});
