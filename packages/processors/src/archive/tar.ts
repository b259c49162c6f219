/**
 * @title TAR Archive Extraction Module
 * @description TAR variant of the archive extractor.
 *
 * Plain and gzip tarballs are read by `tar` directly. Bzip2 and xz
 * wrappers are recognised from their magic bytes and decompressed on the
 * way in. Member extraction reads the archive once after listing it.
 *
 * @module archive
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import * as tar from "tar";
import { type CompressionMethod, detectCompression, openDecompressor } from "../compression/methods.js";
import { ArchiveMemberError } from "../errors.js";
import type { WarningObserver } from "../types.js";
import type { ArchiveFormat } from "./format.js";
import { checkPathTraversal, normaliseEntryName, resolveMemberPath } from "./security.js";

/** Bytes needed to recognise any supported wrapper. */
const HEADER_SIZE = 6;

/**
 * Identify the compression wrapping a tarball.
 * Gzip is left to `tar`, which reads it natively.
 *
 * @param archivePath - Path to the tarball
 * @returns Method to decompress with first, or null
 */
export async function detectTarWrapper(archivePath: string): Promise<CompressionMethod | null> {
	const handle = await fs.promises.open(archivePath, "r");
	try {
		const header = Buffer.alloc(HEADER_SIZE);
		const { bytesRead } = await handle.read(header, 0, HEADER_SIZE, 0);
		const method = detectCompression(header.subarray(0, bytesRead));
		return method === "gzip" ? null : method;
	} finally {
		await handle.close();
	}
}

/**
 * Feed a tarball through a parser and wait until the parser has finished,
 * including any files it writes. The input stream is destroyed on failure.
 */
function feed(archivePath: string, wrapper: CompressionMethod | null, parser: tar.Parser): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const input = fs.createReadStream(archivePath);
		const fail = (error: unknown): void => {
			input.destroy();
			reject(error);
		};

		input.on("error", fail);
		parser.on("error", fail);
		parser.on("end", () => resolve());

		if (wrapper) {
			const decompressor = openDecompressor(wrapper);
			decompressor.on("error", fail);
			input.pipe(decompressor).pipe(parser);
		} else {
			input.pipe(parser);
		}
	});
}

/**
 * Header fields of one tar entry.
 */
interface TarEntryInfo {
	path: string;
	type: string;
	linkpath?: string;
}

/** Entry types whose body holds the file's bytes. */
const REGULAR_TYPES: ReadonlySet<string> = new Set(["File", "OldFile", "ContiguousFile"]);

/**
 * List entry headers without extracting anything.
 */
async function listEntries(archivePath: string, wrapper: CompressionMethod | null): Promise<TarEntryInfo[]> {
	const entries: TarEntryInfo[] = [];
	const parser = new tar.Parser({
		onReadEntry: (entry) => {
			entries.push({ path: entry.path, type: entry.type, linkpath: entry.linkpath });
			entry.resume();
		},
	});

	await feed(archivePath, wrapper, parser);
	return entries;
}

/**
 * Extract every entry into a directory, preserving the archive layout.
 */
async function extractEntries(archivePath: string, wrapper: CompressionMethod | null, outputDir: string): Promise<void> {
	const unpack = new tar.Unpack({
		cwd: outputDir,
		strict: true,
	});

	await feed(archivePath, wrapper, unpack);
}

/**
 * Follow hard and symbolic links inside the archive to the regular entry
 * holding their bytes.
 *
 * @param name - Normalised entry name
 * @param index - Entries by normalised name
 * @returns Name of the regular entry, or undefined if the chain leaves the archive
 */
function resolveLinkSource(name: string, index: ReadonlyMap<string, TarEntryInfo>): string | undefined {
	const seen = new Set<string>();
	let current = name;

	while (!seen.has(current)) {
		seen.add(current);
		const entry = index.get(current);
		if (!entry?.linkpath) {
			return entry && REGULAR_TYPES.has(entry.type) ? current : undefined;
		}

		if (entry.type === "Link") {
			current = normaliseEntryName(entry.linkpath);
		} else if (entry.type === "SymbolicLink" && !path.posix.isAbsolute(entry.linkpath)) {
			current = normaliseEntryName(path.posix.join(path.posix.dirname(current), entry.linkpath));
		} else {
			return undefined;
		}
	}

	return undefined;
}

/**
 * Stream one entry to its destinations. Further destinations are copies of
 * the first.
 */
async function writeEntry(entry: tar.ReadEntry, destinations: readonly string[]): Promise<void> {
	const [first, ...rest] = destinations;
	if (first === undefined) {
		entry.resume();
		return;
	}

	await fs.promises.mkdir(path.dirname(first), { recursive: true });
	await pipeline(entry, fs.createWriteStream(first));

	for (const destination of rest) {
		await fs.promises.mkdir(path.dirname(destination), { recursive: true });
		await fs.promises.copyFile(first, destination);
	}
}

/**
 * Write selected entries in a single pass over the archive.
 *
 * @param targets - Destination paths keyed by normalised entry name
 */
async function writeEntries(
	archivePath: string,
	wrapper: CompressionMethod | null,
	targets: ReadonlyMap<string, readonly string[]>,
): Promise<void> {
	const remaining = new Map(targets);
	const writes: Promise<void>[] = [];
	let failure: Error | undefined;

	const parser: tar.Parser = new tar.Parser({
		onReadEntry: (entry) => {
			const name = normaliseEntryName(entry.path);
			const destinations = REGULAR_TYPES.has(entry.type) ? remaining.get(name) : undefined;
			if (!destinations) {
				entry.resume();
				return;
			}

			remaining.delete(name);
			writes.push(
				writeEntry(entry, destinations).catch((error: unknown) => {
					const cause = error instanceof Error ? error : new Error(String(error));
					failure ??= cause;
					parser.abort(cause);
				}),
			);
		},
	});

	await feed(archivePath, wrapper, parser);
	await Promise.all(writes);
	if (failure) {
		throw failure;
	}
}

/**
 * Extract named members. Each member's bytes are written to
 * `<outputDir>/<member>`; link members receive the bytes of the entry they
 * point to. Members before a missing one are still written.
 */
async function extractMembers(
	archivePath: string,
	wrapper: CompressionMethod | null,
	entries: readonly TarEntryInfo[],
	outputDir: string,
	members: readonly string[],
	warn: WarningObserver,
): Promise<void> {
	const index = new Map<string, TarEntryInfo>();
	for (const entry of entries) {
		const name = normaliseEntryName(entry.path);
		if (!index.has(name)) {
			index.set(name, entry);
		}
	}

	const targets = new Map<string, string[]>();
	let missing: ArchiveMemberError | undefined;

	for (const member of members) {
		warn(`Extracting '${member}' from '${archivePath}' to '${outputDir}'`);
		const destPath = resolveMemberPath(outputDir, member);
		const wanted = normaliseEntryName(member);

		if (index.get(wanted)?.type === "Directory") {
			await fs.promises.mkdir(destPath, { recursive: true });
			continue;
		}

		const source = resolveLinkSource(wanted, index);
		if (source === undefined) {
			missing = new ArchiveMemberError(member, archivePath);
			break;
		}

		targets.set(source, [...(targets.get(source) ?? []), destPath]);
	}

	if (targets.size > 0) {
		await writeEntries(archivePath, wrapper, targets);
	}

	if (missing) {
		throw missing;
	}
}

/**
 * Unpack a tarball.
 *
 * @param archivePath - Path to the tar file, optionally gzip, bzip2 or xz compressed
 * @param outputDir - Destination directory
 * @param members - Names to extract, or undefined for everything
 * @param warn - Advisory message sink
 */
export async function untar(
	archivePath: string,
	outputDir: string,
	members: readonly string[] | undefined,
	warn: WarningObserver,
): Promise<void> {
	const wrapper = await detectTarWrapper(archivePath);
	const entries = await listEntries(archivePath, wrapper);

	if (members === undefined) {
		for (const entry of entries) {
			checkPathTraversal(entry.path);
		}
		warn(`Untarring contents of '${archivePath}' to '${outputDir}'`);
		await extractEntries(archivePath, wrapper, outputDir);
		return;
	}

	await extractMembers(archivePath, wrapper, entries, outputDir, members, warn);
}

/**
 * TAR variant. Output directory is `<archive>.untar`.
 */
export const tarFormat: ArchiveFormat = {
	kind: "tar",
	suffix: ".untar",
	unpack: untar,
};
