/**
 * @description Directory walking and file collection utilities.
 *
 * Used to enumerate the contents of extraction directories.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Entry information for directory walking.
 */
export interface WalkEntry {
	/** Full path to the entry. */
	path: string;
	/** Entry name (basename). */
	name: string;
	/** Whether entry is a directory. */
	isDirectory: boolean;
	/** Whether entry is a regular file. */
	isFile: boolean;
}

/**
 * Callback for directory walking.
 * Return false to skip processing children of a directory.
 */
export type WalkCallback = (entry: WalkEntry) => boolean | void | Promise<boolean | void>;

/**
 * Walk a directory recursively, depth first, calling the callback for each entry.
 * Entries are visited in the order the filesystem lists them.
 *
 * @param directory - Directory to walk
 * @param callback - Callback for each entry
 */
export async function walkDirectory(directory: string, callback: WalkCallback): Promise<void> {
	const entries = await fs.promises.readdir(directory, { withFileTypes: true });

	for (const entry of entries) {
		const fullPath = path.join(directory, entry.name);
		const walkEntry: WalkEntry = {
			path: fullPath,
			name: entry.name,
			isDirectory: entry.isDirectory(),
			isFile: entry.isFile(),
		};

		const result = await callback(walkEntry);

		if (entry.isDirectory() && result !== false) {
			await walkDirectory(fullPath, callback);
		}
	}
}

/**
 * Collect all regular file paths in a directory recursively.
 *
 * @param directory - Directory to walk
 * @returns Array of file paths
 */
export async function collectFiles(directory: string): Promise<string[]> {
	const files: string[] = [];

	await walkDirectory(directory, (entry) => {
		if (entry.isFile) {
			files.push(entry.path);
		}
	});

	return files;
}

/**
 * Check whether a path exists. Errors other than ENOENT propagate.
 *
 * @param target - Path to check
 * @returns True if something exists at the path
 */
export async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.promises.access(target);
		return true;
	} catch (error) {
		if (isNotFound(error)) {
			return false;
		}
		throw error;
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
