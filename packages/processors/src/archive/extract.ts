/**
 * @title Archive Extractor
 * @description Processor that unpacks a downloaded archive next to the original.
 *
 * The output directory doubles as a cache entry: once it exists, a "fetch"
 * action only re-lists its contents. A "download" or "update" always unpacks
 * again.
 *
 * @module archive
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigurationError } from "../errors.js";
import { collectFiles, pathExists } from "../filesystem/walk.js";
import { defaultWarningObserver } from "../logging.js";
import {
	type Action,
	type FetchContext,
	type Processor,
	type WarningObserver,
	assertAction,
	isFreshAction,
} from "../types.js";
import type { ArchiveFormat, ArchiveKind } from "./format.js";
import { resolveMemberPath } from "./security.js";
import { tarFormat } from "./tar.js";
import { zipFormat } from "./zip.js";

/**
 * Options for archive extractors.
 */
export interface ExtractorOptions {
	/** Names to extract from the archive. Undefined or null extracts everything. */
	members?: readonly string[] | null;
	/** Receives advisory messages about what is being extracted. */
	onWarning?: WarningObserver;
}

/**
 * Archive variants by kind.
 */
export const ARCHIVE_FORMATS: ReadonlyMap<ArchiveKind, ArchiveFormat> = new Map<ArchiveKind, ArchiveFormat>([
	["zip", zipFormat],
	["tar", tarFormat],
]);

/**
 * Unpacks an archive into `<path><suffix>` and returns every file inside it.
 *
 * Files are returned depth first in the order the filesystem lists them,
 * which is not sorted and can differ between platforms.
 */
export class ArchiveExtractor implements Processor<string[]> {
	/** Variant this extractor unpacks. */
	readonly format: ArchiveFormat;
	/** Members to extract, or undefined for everything. */
	readonly members?: readonly string[];
	private readonly onWarning: WarningObserver;

	constructor(format: ArchiveFormat, options: ExtractorOptions = {}) {
		this.format = format;
		this.members = options.members ? Object.freeze([...options.members]) : undefined;
		this.onWarning = options.onWarning ?? defaultWarningObserver;
	}

	/** Suffix appended to the archive path to name the output directory. */
	get suffix(): string {
		return this.format.suffix;
	}

	/**
	 * Extract the archive if needed and list the extracted files.
	 *
	 * @param filePath - Full path of the archive in local storage
	 * @param action - Why the archive is present
	 * @returns Full paths of all files in the output directory
	 * @throws ConfigurationError if the variant defines no suffix
	 * @throws ArchiveMemberError if a requested member is not in the archive
	 */
	async process(filePath: string, action: Action, _context?: FetchContext): Promise<string[]> {
		assertAction(action);

		if (!this.format.suffix) {
			throw new ConfigurationError(`Archive format '${this.format.kind}' must define the 'suffix' attribute.`, {
				suggestion: "Give the format a non-empty suffix such as '.unzip'",
			});
		}

		const archivePath = path.resolve(filePath);
		const outputDir = archivePath + this.format.suffix;

		if (await this.needsUnpack(action, outputDir)) {
			const created = await fs.promises.mkdir(outputDir, { recursive: true });
			try {
				await this.format.unpack(archivePath, outputDir, this.members, this.onWarning);
			} catch (error) {
				// A directory made by this call must not be taken as a cached result.
				if (created !== undefined) {
					await fs.promises.rm(outputDir, { recursive: true, force: true });
				}
				throw error;
			}
		}

		return collectFiles(outputDir);
	}

	/**
	 * A fresh download always invalidates the output. Otherwise unpack only
	 * when the output directory, or one of the requested members, is missing.
	 */
	private async needsUnpack(action: Action, outputDir: string): Promise<boolean> {
		if (isFreshAction(action) || !(await pathExists(outputDir))) {
			return true;
		}

		for (const member of this.members ?? []) {
			if (!(await pathExists(resolveMemberPath(outputDir, member)))) {
				return true;
			}
		}

		return false;
	}
}

/**
 * Unpacks a ZIP archive into `<path>.unzip`.
 *
 * @example
 * ```typescript
 * const files = await new Unzip().process("/data/archive.zip", "download");
 * ```
 */
export class Unzip extends ArchiveExtractor {
	constructor(options: ExtractorOptions = {}) {
		super(zipFormat, options);
	}
}

/**
 * Unpacks a tarball (plain, gzip, bzip2 or xz) into `<path>.untar`.
 */
export class Untar extends ArchiveExtractor {
	constructor(options: ExtractorOptions = {}) {
		super(tarFormat, options);
	}
}

/**
 * Create an extractor for an archive kind.
 *
 * @param kind - "zip" or "tar"
 * @param options - Extractor options
 * @throws ConfigurationError if the kind is unknown
 */
export function createExtractor(kind: ArchiveKind, options: ExtractorOptions = {}): ArchiveExtractor {
	const format = ARCHIVE_FORMATS.get(kind);
	if (!format) {
		throw new ConfigurationError(`Unknown archive kind '${String(kind)}'.`, {
			suggestion: `Use one of: ${[...ARCHIVE_FORMATS.keys()].join(", ")}`,
		});
	}
	return new ArchiveExtractor(format, options);
}
