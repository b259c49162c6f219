/**
 * @title Errors
 * @description Error types for @fetchkit/processors.
 *
 * Failures raised by processors themselves derive from ProcessorError.
 * Filesystem and archive-library errors are propagated unchanged.
 *
 * @module errors
 */

/**
 * Options for constructing a ProcessorError.
 */
export interface ProcessorErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all processor errors.
 */
export class ProcessorError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: ProcessorErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "ProcessorError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * A processor is missing a part of its definition, such as the output suffix.
 */
export class ConfigurationError extends ProcessorError {
	constructor(message: string, options?: ProcessorErrorOptions) {
		super(message, "NOT_IMPLEMENTED", options);
		this.name = "ConfigurationError";
	}
}

/**
 * The file extension does not map to a known compression method.
 */
export class InvalidFormatError extends ProcessorError {
	/** The extension that was not recognised. */
	readonly extension: string;
	/** Extensions that auto-detection understands. */
	readonly validExtensions: readonly string[];

	constructor(extension: string, validExtensions: readonly string[]) {
		super(
			`Unrecognized extension '${extension}'. Must be one of ${JSON.stringify(validExtensions)}.`,
			"INVALID_FORMAT",
			{ suggestion: "Pass an explicit compression method instead of 'auto'" },
		);
		this.name = "InvalidFormatError";
		this.extension = extension;
		this.validExtensions = validExtensions;
	}
}

/**
 * The requested compression method is not supported.
 */
export class InvalidMethodError extends ProcessorError {
	/** The method that was requested. */
	readonly method: string;
	/** Methods that are supported. */
	readonly validMethods: readonly string[];

	constructor(method: string, validMethods: readonly string[]) {
		super(`Invalid compression method '${method}'. Must be one of ${JSON.stringify(validMethods)}.`, "INVALID_METHOD");
		this.name = "InvalidMethodError";
		this.method = method;
		this.validMethods = validMethods;
	}
}

/**
 * A requested member does not exist in the archive.
 */
export class ArchiveMemberError extends ProcessorError {
	/** Name of the missing member. */
	readonly member: string;
	/** Path to the archive that was searched. */
	readonly archivePath: string;

	constructor(member: string, archivePath: string, options?: { cause?: unknown }) {
		super(`There is no item named '${member}' in the archive '${archivePath}'`, "MEMBER_NOT_FOUND", {
			suggestion: "Check the member names against the archive listing",
			cause: options?.cause,
		});
		this.name = "ArchiveMemberError";
		this.member = member;
		this.archivePath = archivePath;
	}
}

/**
 * Error related to security issues (path traversal, links escaping the output directory).
 */
export class SecurityError extends ProcessorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "SECURITY_ERROR", { cause: options?.cause });
		this.name = "SecurityError";
	}
}

/**
 * Check if an error is a ProcessorError.
 */
export function isProcessorError(error: unknown): error is ProcessorError {
	return error instanceof ProcessorError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
