/**
 * @tunnelprobe/sdk: shared types and test doubles for tunnelprobe packages.
 */

// Core types
export type {
	ReadinessBody,
	ReadinessSnapshot,
	PollPolicy,
	TerminationSignal,
	ExitStatus,
	TunnelHandle,
	IngressRule,
	TunnelProtocol,
	HarnessConfig,
	LogLevel,
	LogPhase,
	LogEntry,
	DurationString,
} from './types.js';

export { parseDuration, formatSeconds } from './types.js';

// Logger interface
export type { Logger } from './logger.js';

// Test doubles
export { MockLogger, createTestEntry } from './testing.js';
