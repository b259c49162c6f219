/**
 * @title Processor Types
 * @description The contract between a fetch orchestrator and its processors.
 *
 * @module types
 */

import { ProcessorError } from "./errors.js";

/**
 * Why the file is present locally.
 *
 * - `download`: the file did not exist and was downloaded.
 * - `update`: the local file was outdated and was downloaded again.
 * - `fetch`: the file existed and was current, so nothing was downloaded.
 */
export type Action = "download" | "update" | "fetch";

/** Every valid action. */
export const ACTIONS: readonly Action[] = ["download", "update", "fetch"];

/**
 * Handle passed through by the orchestrator. Processors never inspect it.
 */
export type FetchContext = unknown;

/**
 * Receives advisory messages describing what a processor is about to write.
 */
export type WarningObserver = (message: string) => void;

/**
 * A configured post-download hook.
 */
export interface Processor<R> {
	/**
	 * Process a local file and report the resulting path(s).
	 *
	 * @param filePath - Full path of the file in local storage
	 * @param action - Why the file is present
	 * @param context - Orchestrator handle, passed through untouched
	 */
	process(filePath: string, action: Action, context?: FetchContext): Promise<R>;
}

/**
 * Callable form of a processor.
 */
export type ProcessorCallback<R> = (filePath: string, action: Action, context?: FetchContext) => Promise<R>;

/**
 * Check whether a value is a valid action.
 */
export function isAction(value: unknown): value is Action {
	return typeof value === "string" && ACTIONS.some((action) => action === value);
}

/**
 * Throw when an orchestrator hands over something other than a known action.
 */
export function assertAction(value: unknown): asserts value is Action {
	if (!isAction(value)) {
		throw new ProcessorError(`Unknown action '${String(value)}'. Must be one of ${JSON.stringify(ACTIONS)}.`, "INVALID_ACTION");
	}
}

/**
 * Whether the source file was just obtained, which always invalidates cached output.
 */
export function isFreshAction(action: Action): boolean {
	return action === "download" || action === "update";
}

/**
 * Bind a processor into the plain callable form.
 *
 * @example
 * ```typescript
 * const hook = toCallback(new Unzip({ members: ["x.csv"] }));
 * const files = await hook("/data/archive.zip", "download");
 * ```
 */
export function toCallback<R>(processor: Processor<R>): ProcessorCallback<R> {
	return (filePath, action, context) => processor.process(filePath, action, context);
}
