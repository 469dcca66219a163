/**
 * Formatting and color logic for the console logger.
 *
 * Uses ANSI escape codes directly.
 */

import type { LogEntry, LogLevel, LogPhase } from '@tunnelprobe/sdk';

// ANSI color codes
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const MAGENTA = '\x1b[35m';
const CYAN = '\x1b[36m';

interface PhaseStyle {
	icon: string;
	color: string;
}

const PHASE_STYLES: Record<LogPhase, PhaseStyle> = {
	'run.start': { icon: '\u25cf', color: MAGENTA }, // ●
	'run.stop': { icon: '\u25cf', color: MAGENTA }, // ●
	'process.start': { icon: '\u25b6', color: BLUE }, // ▶
	'process.signal': { icon: '\u26a1', color: YELLOW }, // ⚡
	'process.exit': { icon: '\u25a0', color: BLUE }, // ■
	'process.kill': { icon: '\u2717', color: RED }, // ✗
	'process.output': { icon: '\u2502', color: DIM }, // │
	'readiness.attempt': { icon: '\u25b7', color: CYAN }, // ▷
	'readiness.ready': { icon: '\u2713', color: GREEN }, // ✓
	'readiness.not_ready': { icon: '\u2717', color: RED }, // ✗
	'readiness.disconnected': { icon: '\u25cb', color: YELLOW }, // ○
	'request.failure': { icon: '\u26a0', color: YELLOW }, // ⚠
	'retry.attempt': { icon: '\u21bb', color: YELLOW }, // ↻
	'reconnect.send': { icon: '\u21bb', color: CYAN }, // ↻
	'reconnect.cycle': { icon: '\u2713', color: GREEN }, // ✓
	'termination.signal': { icon: '\u26a1', color: MAGENTA }, // ⚡
	'termination.complete': { icon: '\u25a0', color: GREEN }, // ■
	'stream.open': { icon: '\u25ba', color: CYAN }, // ►
	'stream.close': { icon: '\u25c4', color: CYAN }, // ◄
	'logs.check': { icon: '\u2713', color: GREEN }, // ✓
	'flaky.attempt': { icon: '\u21bb', color: YELLOW }, // ↻
};

const LEVEL_COLORS: Record<LogLevel, string> = {
	debug: DIM,
	info: '',
	warn: YELLOW,
	error: RED,
};

/**
 * Format a log entry as a compact one-line string.
 */
export function formatCompact(entry: LogEntry, useColor: boolean): string {
	const style = PHASE_STYLES[entry.phase];
	const time = formatTime(entry.timestamp);
	const parts: string[] = [];

	if (useColor) {
		parts.push(`${DIM}${time}${RESET}`);
		parts.push(`${style.color}${style.icon}${RESET}`);
		parts.push(`${style.color}${entry.phase}${RESET}`);
	} else {
		parts.push(time);
		parts.push(style.icon);
		parts.push(entry.phase);
	}

	if (entry.scenario) parts.push(`scn=${entry.scenario}`);
	if (entry.pid !== undefined) parts.push(`pid=${entry.pid}`);
	if (entry.attempt !== undefined) parts.push(`#${entry.attempt}`);
	if (entry.duration_ms !== undefined) parts.push(`${entry.duration_ms}ms`);

	const levelColor = LEVEL_COLORS[entry.level];
	parts.push(useColor && levelColor ? `${levelColor}${entry.message}${RESET}` : entry.message);

	return parts.join(' ');
}

/**
 * Format a log entry in verbose multi-line format.
 */
export function formatVerbose(entry: LogEntry, useColor: boolean): string {
	const lines: string[] = [formatCompact(entry, useColor)];

	if (entry.url) {
		lines.push(useColor ? `  ${DIM}url: ${entry.url}${RESET}` : `  url: ${entry.url}`);
	}
	if (entry.metadata) {
		const meta = JSON.stringify(entry.metadata, null, 2);
		lines.push(useColor ? `  ${DIM}metadata: ${meta}${RESET}` : `  metadata: ${meta}`);
	}

	return lines.join('\n');
}

/**
 * Extract HH:MM:SS.mmm from an ISO timestamp.
 */
export function formatTime(timestamp: string): string {
	const d = new Date(timestamp);
	if (Number.isNaN(d.getTime())) return timestamp;
	const h = String(d.getHours()).padStart(2, '0');
	const m = String(d.getMinutes()).padStart(2, '0');
	const s = String(d.getSeconds()).padStart(2, '0');
	const ms = String(d.getMilliseconds()).padStart(3, '0');
	return `${h}:${m}:${s}.${ms}`;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
	return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Check if a log entry should be shown at the given level.
 */
export function shouldLog(entry: LogEntry, level: LogLevel): boolean {
	return LEVEL_VALUES[entry.level] >= LEVEL_VALUES[level];
}
