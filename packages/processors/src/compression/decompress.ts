/**
 * @title Stream Decompressor
 * @description Processor that decompresses a single-stream file next to the original.
 *
 * @module compression
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { pathExists } from "../filesystem/walk.js";
import { defaultWarningObserver } from "../logging.js";
import {
	type Action,
	type FetchContext,
	type Processor,
	type WarningObserver,
	assertAction,
	isFreshAction,
} from "../types.js";
import { type CompressionMethod, type MethodOption, openDecompressor, resolveMethod, validateMethodOption } from "./methods.js";

/** Suffix appended to the input path to form the output path. */
export const DECOMPRESS_SUFFIX = ".decomp";

/**
 * Options for the decompressor.
 */
export interface DecompressOptions {
	/** "auto" (default), "lzma", "xz", "gzip" or "bzip2". */
	method?: MethodOption;
	/** Receives the advisory message emitted before decompressing. */
	onWarning?: WarningObserver;
}

/**
 * Decompress a downloaded file so it can be opened directly, trading disk
 * space for speed on later reads.
 *
 * The output file is `<path>.decomp`. It is rewritten whenever the source was
 * just downloaded or updated, and reused otherwise.
 *
 * @example
 * ```typescript
 * const decompress = new Decompress({ method: "auto" });
 * const output = await decompress.process("/data/values.csv.gz", "download");
 * // "/data/values.csv.gz.decomp"
 * ```
 */
export class Decompress implements Processor<string> {
	/** Requested method. */
	readonly method: MethodOption;
	private readonly onWarning: WarningObserver;

	/**
	 * @throws InvalidMethodError if the method is not supported
	 */
	constructor(options: DecompressOptions = {}) {
		this.method = validateMethodOption(options.method ?? "auto");
		this.onWarning = options.onWarning ?? defaultWarningObserver;
	}

	async process(filePath: string, action: Action, _context?: FetchContext): Promise<string> {
		assertAction(action);

		const source = path.resolve(filePath);
		const decompressed = source + DECOMPRESS_SUFFIX;

		if (isFreshAction(action) || !(await pathExists(decompressed))) {
			const method = resolveMethod(this.method, source);
			this.onWarning(`Decompressing '${source}' to '${decompressed}' using method '${this.method}'.`);
			await decompressFile(source, decompressed, method);
		}

		return decompressed;
	}
}

/**
 * Stream a compressed file into its destination.
 *
 * Data is written to a temporary sibling first and renamed into place once
 * complete, so an interrupted run never leaves a truncated output behind.
 *
 * @param source - Compressed input
 * @param destination - Output path
 * @param method - Method to decompress with
 */
export async function decompressFile(source: string, destination: string, method: CompressionMethod): Promise<void> {
	const temporary = `${destination}.${randomUUID()}.tmp`;

	try {
		await pipeline(
			fs.createReadStream(source),
			openDecompressor(method),
			fs.createWriteStream(temporary, { flags: "wx" }),
		);
		await fs.promises.rename(temporary, destination);
	} catch (error) {
		await fs.promises.rm(temporary, { force: true });
		throw error;
	}
}
