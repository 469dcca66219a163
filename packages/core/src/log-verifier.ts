/**
 * LogVerifier: checks the log artifacts a tunnel leaves behind: terminal
 * output, a JSON log file, and a rotating log directory.
 */

import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import { InvariantError } from './errors.js';
import { RunLogger } from './logger.js';
import { MAX_LOG_LINES } from './retry.js';
import { compileValidator } from './validation.js';

export const DEFAULT_EXPECTED_MESSAGE = 'Starting Hello';
export const DEFAULT_LOG_FILE_NAME = 'cloudflared.log';
export const ROTATE_AFTER_BYTES = 1000 * 1000;

/** Fields every structured tunnel log line carries */
export interface TunnelLogRecord {
	level: string;
	time: string;
	message: string;
	[key: string]: unknown;
}

const tunnelLogRecord = compileValidator<TunnelLogRecord>({
	type: 'object',
	required: ['level', 'time', 'message'],
	properties: {
		level: { type: 'string' },
		time: { type: 'string' },
		message: { type: 'string' },
	},
});

export interface LogVerifierOptions {
	/** Substring the logs must contain (default: "Starting Hello") */
	expectedMessage?: string;
	/** Lines scanned for the expected message (default: 50) */
	maxLines?: number;
	logger?: RunLogger;
}

export interface RotationCheckOptions {
	logDir: string;
	/** Produce log volume, e.g. a batch of requests through the tunnel */
	generateBatch: (batch: number) => Promise<unknown>;
	/** Batches to try before giving up (default: 3) */
	maxBatches?: number;
	/** Name of the active log file (default: cloudflared.log) */
	currentFileName?: string;
	/** Size the rotated file must exceed (default: 1,000,000) */
	rotateAfterBytes?: number;
}

export interface JsonLogSummary {
	/** Lines checked, i.e. every line of the file */
	lines: number;
	first: TunnelLogRecord;
}

export interface RotationCheckResult {
	batches: number;
	currentFile: string;
	rotatedFile: string;
	rotatedSize: number;
}

/** Stream the lines of a file */
async function* fileLines(path: string): AsyncGenerator<string> {
	const input = createReadStream(path, { encoding: 'utf-8' });
	const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
	try {
		yield* rl;
	} finally {
		rl.close();
		input.destroy();
	}
}

/** Read up to `maxLines` lines of a file without loading the rest */
export async function readLines(path: string, maxLines: number): Promise<string[]> {
	const lines: string[] = [];
	if (maxLines <= 0) return lines;
	for await (const line of fileLines(path)) {
		lines.push(line);
		if (lines.length >= maxLines) break;
	}
	return lines;
}

export class LogVerifier {
	readonly expectedMessage: string;
	readonly maxLines: number;
	private readonly logger: RunLogger;

	constructor(options: LogVerifierOptions = {}) {
		this.expectedMessage = options.expectedMessage ?? DEFAULT_EXPECTED_MESSAGE;
		this.maxLines = options.maxLines ?? MAX_LOG_LINES;
		this.logger = options.logger ?? new RunLogger();
	}

	/**
	 * Scan a live output stream (e.g. the tunnel's stderr) for the expected
	 * message. Resolves the matching line.
	 */
	async assertLogToTerminal(lines: AsyncIterable<string>): Promise<string> {
		let scanned = 0;
		for await (const line of lines) {
			if (line.includes(this.expectedMessage)) {
				this.logger.info('logs.check', `Terminal log contains "${this.expectedMessage}"`);
				return line;
			}
			if (++scanned >= this.maxLines) break;
		}
		throw new InvariantError('log-to-terminal', `terminal log doesn't contain ${this.expectedMessage}`, {
			scanned,
		});
	}

	/** Require the expected message within the first `maxLines` lines of a file */
	async assertLogInFile(path: string): Promise<string> {
		const lines = await readLines(path, this.maxLines);
		const match = lines.find((line) => line.includes(this.expectedMessage));
		if (match === undefined) {
			throw new InvariantError('log-in-file', `log file ${path} doesn't contain ${this.expectedMessage}`, {
				path,
				scanned: lines.length,
			});
		}
		this.logger.info('logs.check', `${path} contains "${this.expectedMessage}"`);
		return match;
	}

	/**
	 * Require every line of a file to be a JSON object with `level`, `time`
	 * and `message`. The file is streamed, so rotated files of any size work.
	 */
	async assertJsonLog(path: string): Promise<JsonLogSummary> {
		let lines = 0;
		let first: TunnelLogRecord | undefined;
		for await (const line of fileLines(path)) {
			lines++;
			let parsed: unknown;
			try {
				parsed = JSON.parse(line);
			} catch (err) {
				throw new InvariantError('json-log', `line ${lines} of ${path} is not JSON: ${line}`, {
					path,
					line: lines,
					error: err instanceof Error ? err.message : String(err),
				});
			}
			if (!tunnelLogRecord.check(parsed)) {
				throw new InvariantError(
					'json-log',
					`line ${lines} of ${path} is missing fields: ${tunnelLogRecord.errors().join('; ')}`,
					{ path, line: lines },
				);
			}
			if (first === undefined) first = parsed;
		}
		if (first === undefined) {
			throw new InvariantError('json-log', `log file ${path} is empty`, { path });
		}
		this.logger.debug('logs.check', `${path}: ${lines} structured line(s)`);
		return { lines, first };
	}

	/**
	 * Generate log volume batch by batch until the directory holds exactly
	 * the active file and one rotated file, then check both.
	 */
	async assertLogRotated(options: RotationCheckOptions): Promise<RotationCheckResult> {
		const {
			logDir,
			generateBatch,
			maxBatches = 3,
			currentFileName = DEFAULT_LOG_FILE_NAME,
			rotateAfterBytes = ROTATE_AFTER_BYTES,
		} = options;

		for (let batch = 1; batch <= maxBatches; batch++) {
			await generateBatch(batch);
			const files = await readdir(logDir);
			this.logger.debug('logs.check', `After batch ${batch}: ${files.join(', ')}`, { attempt: batch });
			if (files.length !== 2) continue;

			if (!files.includes(currentFileName)) {
				throw new InvariantError('log-rotated', `${logDir} has no active ${currentFileName}: ${files.join(', ')}`, {
					files,
				});
			}
			const currentFile = join(logDir, currentFileName);
			const rotatedName = files.find((name) => name !== currentFileName) ?? '';
			const rotatedFile = join(logDir, rotatedName);

			const currentSize = (await stat(currentFile)).size;
			if (currentSize <= 0) {
				throw new InvariantError('log-rotated', `${currentFile} is empty`, { currentFile });
			}
			await this.assertJsonLog(currentFile);

			const rotatedSize = (await stat(rotatedFile)).size;
			if (rotatedSize <= rotateAfterBytes) {
				throw new InvariantError(
					'log-rotated',
					`${rotatedFile} is ${rotatedSize} bytes, expected more than ${rotateAfterBytes}`,
					{ rotatedFile, rotatedSize },
				);
			}
			await this.assertLogInFile(rotatedFile);

			this.logger.info('logs.check', `Log rotated after ${batch} batch(es) into ${rotatedName}`, {
				attempt: batch,
			});
			return { batches: batch, currentFile, rotatedFile, rotatedSize };
		}

		throw new InvariantError(
			'log-rotated',
			`Log file isn't rotated after ${maxBatches} batch(es) of log volume`,
			{ logDir, maxBatches },
		);
	}
}
