/**
 * @tunnelprobe/logger-console: human-readable sink on stderr.
 */

export { ConsoleLogger } from './console-logger.js';
export type { ConsoleWrite } from './console-logger.js';
export { formatCompact, formatVerbose, formatTime, shouldLog, isLogLevel } from './format.js';
