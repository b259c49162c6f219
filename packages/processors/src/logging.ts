/**
 * @title Logging
 * @description Level-filtered console logging for processor messages.
 *
 * @module logging
 *
 * @envvar FETCHKIT_LOG_LEVEL - One of "error", "warn", "info", "debug". Defaults to "warn".
 * @envvar fetchkit_log_level - Lowercase variant, used when the uppercase one is unset.
 */

/** Log levels from least to most verbose. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read the configured log level from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Configured level, or "warn" when unset or unrecognised
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const raw = (env.FETCHKIT_LOG_LEVEL ?? env.fetchkit_log_level)?.trim().toLowerCase();
	if (raw && isLogLevel(raw)) {
		return raw;
	}
	return DEFAULT_LOG_LEVEL;
}

/**
 * Write a message to the console if its level is at or below the configured level.
 *
 * @param message - The message to log
 * @param type - Level of the message
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	if (LOG_LEVELS.indexOf(type) > LOG_LEVELS.indexOf(getLogLevel())) {
		return;
	}

	switch (type) {
		case "error":
			console.error(message);
			break;
		case "warn":
			console.warn(message);
			break;
		case "info":
			console.info(message);
			break;
		case "debug":
			console.debug(message);
			break;
	}
}

/**
 * Warning observer used when a processor is given none.
 */
export function defaultWarningObserver(message: string): void {
	logMessage(message, "warn");
}
