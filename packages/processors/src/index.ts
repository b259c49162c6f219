/**
 * @fetchkit/processors - Post-download processing hooks.
 *
 * This library provides:
 * - Archive extraction (zip, tar with gzip/bzip2/xz wrappers)
 * - Single-stream decompression (xz/lzma, gzip, bzip2)
 * - A shared processor contract with an idempotent refresh policy
 */

// Contract exports
export {
	type Action,
	type FetchContext,
	type Processor,
	type ProcessorCallback,
	type WarningObserver,
	ACTIONS,
	isAction,
	assertAction,
	isFreshAction,
	toCallback,
} from "./types.js";

// Error exports
export {
	type ProcessorErrorOptions,
	ProcessorError,
	ConfigurationError,
	InvalidFormatError,
	InvalidMethodError,
	ArchiveMemberError,
	SecurityError,
	isProcessorError,
	getErrorMessage,
} from "./errors.js";

// Logging exports
export { type LogLevel, LOG_LEVELS, getLogLevel, logMessage, defaultWarningObserver } from "./logging.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Archive exports
export * from "./archive/index.js";

// Compression exports
export * from "./compression/index.js";
