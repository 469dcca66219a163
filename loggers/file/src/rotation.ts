/**
 * Size-based rotation for JSON-lines logs.
 *
 * The active file is renamed to a timestamped sibling, and siblings beyond
 * `keep` are removed oldest first.
 */

import { readdir, rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

const SIZE_UNITS: Record<string, number> = {
	B: 1,
	KB: 1024,
	MB: 1024 * 1024,
	GB: 1024 * 1024 * 1024,
};

/** `"512KB"` → 524288 */
export function parseSize(size: string): number {
	const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)$/i);
	if (!match) {
		throw new Error(`Invalid size "${size}": expected <number><unit>, e.g. 512KB or 1MB`);
	}
	return Math.floor(Number.parseFloat(match[1]) * SIZE_UNITS[match[2].toUpperCase()]);
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Size of `path` in bytes, 0 when it does not exist */
export async function fileSize(path: string): Promise<number> {
	try {
		return (await stat(path)).size;
	} catch (err) {
		if (isMissing(err)) return 0;
		throw err;
	}
}

/** `tunnel.log` rotated at `at` → `tunnel.log.2024-01-15T10-30-45-123Z` */
export function rotatedName(baseName: string, at: Date = new Date()): string {
	return `${baseName}.${at.toISOString().replace(/[:.]/g, '-')}`;
}

export interface RotateOptions {
	/** Rotated files kept beside the active one */
	keep: number;
}

/**
 * Move `path` aside and prune older rotations. Resolves the rotated file's
 * path, or null when there was no file to rotate.
 */
export async function rotateFile(path: string, options: RotateOptions): Promise<string | null> {
	const dir = dirname(path);
	const baseName = basename(path);
	const rotatedPath = join(dir, rotatedName(baseName));

	try {
		await rename(path, rotatedPath);
	} catch (err) {
		if (isMissing(err)) return null;
		throw err;
	}

	// Timestamps are fixed width, so name order is rotation order
	const rotated = (await readdir(dir))
		.filter((name) => name.startsWith(`${baseName}.`))
		.sort()
		.reverse();
	for (const name of rotated.slice(options.keep)) {
		try {
			await unlink(join(dir, name));
		} catch (err) {
			if (!isMissing(err)) throw err;
		}
	}
	return rotatedPath;
}
