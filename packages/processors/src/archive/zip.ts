/**
 * @title ZIP Archive Extraction Module
 * @description ZIP variant of the archive extractor.
 *
 * Full extraction preserves the archive's directory layout. Member
 * extraction streams each named entry to `<outputDir>/<member>`.
 *
 * @module archive
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import * as unzipper from "unzipper";
import { ArchiveMemberError, SecurityError } from "../errors.js";
import type { WarningObserver } from "../types.js";
import type { ArchiveFormat } from "./format.js";
import { checkPathTraversal, normaliseEntryName, resolveMemberPath } from "./security.js";

type ZipDirectory = Awaited<ReturnType<typeof unzipper.Open.file>>;
type ZipEntry = ZipDirectory["files"][number];

/**
 * Reject symlinks: the Unix mode is stored in the upper 16 bits of externalFileAttributes.
 */
function checkNotSymlink(entry: ZipEntry): void {
	const unixMode = (entry.externalFileAttributes >>> 16) & 0xffff;
	if ((unixMode & 0o170000) === 0o120000) {
		throw new SecurityError(`Archive contains a symbolic link ("${entry.path}"), which is not permitted.`);
	}
}

/**
 * Write one entry to a destination path, creating parent directories.
 */
async function writeEntry(entry: ZipEntry, destPath: string): Promise<void> {
	if (entry.type === "Directory") {
		await fs.promises.mkdir(destPath, { recursive: true });
		return;
	}

	await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
	await pipeline(entry.stream(), fs.createWriteStream(destPath));
}

/**
 * Extract every entry of an opened archive. Every entry is checked before
 * anything is written.
 *
 * @param directory - Opened central directory
 * @param outputDir - Destination directory
 */
async function extractAll(directory: ZipDirectory, outputDir: string): Promise<void> {
	for (const entry of directory.files) {
		checkPathTraversal(entry.path);
		checkNotSymlink(entry);
	}

	for (const entry of directory.files) {
		await writeEntry(entry, path.join(outputDir, entry.path));
	}
}

/**
 * Extract a single named member.
 *
 * @throws ArchiveMemberError if no entry has that name
 */
async function extractMember(
	directory: ZipDirectory,
	member: string,
	archivePath: string,
	outputDir: string,
): Promise<void> {
	const destPath = resolveMemberPath(outputDir, member);
	const wanted = normaliseEntryName(member);
	const entry = directory.files.find((file) => normaliseEntryName(file.path) === wanted);

	if (!entry) {
		throw new ArchiveMemberError(member, archivePath);
	}

	checkNotSymlink(entry);
	await writeEntry(entry, destPath);
}

/**
 * Unpack a ZIP archive.
 *
 * @param archivePath - Path to the ZIP file
 * @param outputDir - Destination directory
 * @param members - Names to extract, or undefined for everything
 * @param warn - Advisory message sink
 */
export async function unzip(
	archivePath: string,
	outputDir: string,
	members: readonly string[] | undefined,
	warn: WarningObserver,
): Promise<void> {
	const directory = await unzipper.Open.file(archivePath);

	if (members === undefined) {
		warn(`Unzipping contents of '${archivePath}' to '${outputDir}'`);
		await extractAll(directory, outputDir);
		return;
	}

	for (const member of members) {
		warn(`Extracting '${member}' from '${archivePath}' to '${outputDir}'`);
		await extractMember(directory, member, archivePath, outputDir);
	}
}

/**
 * ZIP variant. Output directory is `<archive>.unzip`.
 */
export const zipFormat: ArchiveFormat = {
	kind: "zip",
	suffix: ".unzip",
	unpack: unzip,
};
