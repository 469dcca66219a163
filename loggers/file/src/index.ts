/**
 * @tunnelprobe/logger-file: JSONL sink with size rotation.
 */

export { FileLogger } from './file-logger.js';
export { fileSize, parseSize, rotateFile, rotatedName } from './rotation.js';
export type { RotateOptions } from './rotation.js';
