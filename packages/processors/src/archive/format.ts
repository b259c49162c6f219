/**
 * @title Archive Formats
 * @description The contract each archive variant implements.
 *
 * @module archive
 */

import type { WarningObserver } from "../types.js";

/** Supported archive variants. */
export type ArchiveKind = "zip" | "tar";

/**
 * One archive variant. The set of variants is closed; see `ARCHIVE_FORMATS`
 * in extract.ts.
 */
export interface ArchiveFormat {
	/** Variant tag. */
	readonly kind: ArchiveKind;
	/** Appended to the archive path to name the output directory. */
	readonly suffix: string;
	/**
	 * Unpack an archive into an existing directory.
	 *
	 * @param archivePath - Archive to read
	 * @param outputDir - Directory to write into
	 * @param members - Names to extract, or undefined for everything
	 * @param warn - Receives one message per extraction, or one per member
	 */
	unpack(
		archivePath: string,
		outputDir: string,
		members: readonly string[] | undefined,
		warn: WarningObserver,
	): Promise<void>;
}
