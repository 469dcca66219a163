/**
 * @tunnelprobe/core: tunnel lifecycle harness.
 *
 * Public API exports for library mode.
 */

// Errors
export {
	HarnessError,
	ConfigError,
	SchemaError,
	LaunchError,
	ProcessTimeoutError,
	TransportError,
	UnexpectedStatusError,
	RetryExhaustedError,
	NotReadyError,
	StillConnectedError,
	InvariantError,
	FlakyRunError,
} from './errors.js';
export type { TransportFailureKind } from './errors.js';

// Config loading
export {
	loadHarnessConfig,
	parseHarnessConfig,
	substituteEnvVars,
	harnessConfigSchema,
	tunnelHostname,
	tunnelUrl,
	metricsUrl,
} from './schema.js';

// Tunnel config
export { TunnelConfigBuilder, toDocument, writeTunnelConfig, buildTunnelCommand } from './tunnel-config.js';
export type {
	TunnelConfig,
	TunnelConfigOptions,
	TunnelLogLevel,
	EdgeIpVersion,
	TunnelCommandOptions,
} from './tunnel-config.js';

// Logging context
export { LoggerManager, RunLogger } from './logger.js';
export type { LogFields } from './logger.js';

// Timing + retry
export { sleep, settleWithin, withTimeout, elapsedSince } from './timing.js';
export type { Settled } from './timing.js';
export {
	retryUntil,
	validatePolicy,
	maxPolicyDurationMs,
	DEFAULT_POLL_POLICY,
	DEFAULT_DISCONNECT_POLICY,
	METRICS_PORT,
	MAX_RETRIES,
	BACKOFF_MS,
	MAX_LOG_LINES,
} from './retry.js';
export type { AttemptContext, RetryOptions } from './retry.js';
export { runFlaky, DEFAULT_FLAKY_POLICY } from './flaky.js';
export type { FlakyPolicy, FlakyResult } from './flaky.js';

// Processes
export { ProcessSupervisor, elevate, DEFAULT_RUN_TIMEOUT_MS } from './supervisor.js';
export type { SupervisorOptions, StartOptions, RunOptions, RunResult } from './supervisor.js';
export { ManagedProcess } from './managed-process.js';
export type { OutputStream, ManagedProcessInfo } from './managed-process.js';
export { launchTunnel, runTunnelCommand } from './launch.js';
export type { LaunchOptions } from './launch.js';

// HTTP
export { httpGet, sendRequest, sendRequests, expectStatus, classifyFetchError } from './requests.js';
export type {
	HttpResponse,
	HttpGetOptions,
	SendRequestOptions,
	SendRequestsOptions,
	BatchResult,
} from './requests.js';
export { openStream, LineSplitter, TERMINAL_STATUS_LINE } from './stream.js';
export type { StreamOptions, StreamResult, StreamOutcome, StreamTask } from './stream.js';

// Readiness
export {
	ReadinessPoller,
	parseReadiness,
	isReady,
	isDisconnected,
	DEFAULT_METRICS_URL,
} from './readiness.js';
export type { ReadinessPollerOptions, WaitReadyOptions } from './readiness.js';

// Scenarios
export { ReconnectScenario } from './reconnect.js';
export type { ReconnectScenarioOptions, ReconnectState, CycleResult } from './reconnect.js';
export {
	TerminationScenario,
	supportedSignals,
	defaultMinStreamLines,
	GRACE_TOLERANCE_MS,
} from './termination.js';
export type { TerminationScenarioOptions, TerminationResult } from './termination.js';

// Log verification
export {
	LogVerifier,
	readLines,
	DEFAULT_EXPECTED_MESSAGE,
	DEFAULT_LOG_FILE_NAME,
	ROTATE_AFTER_BYTES,
} from './log-verifier.js';
export type {
	LogVerifierOptions,
	RotationCheckOptions,
	RotationCheckResult,
	TunnelLogRecord,
	JsonLogSummary,
} from './log-verifier.js';

// Validation
export { compileValidator, formatAjvErrors } from './validation.js';
export type { Validator } from './validation.js';
