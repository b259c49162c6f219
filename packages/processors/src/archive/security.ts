/**
 * @title Archive Security Module
 * @description Shared path checks used by both ZIP and TAR extractors.
 *
 * @module archive
 */

import * as path from "node:path";
import { SecurityError } from "../errors.js";

/**
 * Check for path traversal attempts in archive entry paths.
 *
 * @param filePath - Entry path from the archive
 * @throws SecurityError if path traversal is detected
 */
export function checkPathTraversal(filePath: string): void {
	const normalised = path.normalize(filePath);

	if (path.isAbsolute(normalised)) {
		throw new SecurityError(`Path traversal detected in archive: "${filePath}"`);
	}

	const segments = normalised.split(/[\\/]/);
	if (segments.some((segment) => segment === "..")) {
		throw new SecurityError(`Path traversal detected in archive: "${filePath}"`);
	}
}

/**
 * Normalise an archive entry name for comparison with a requested member.
 * Drops leading "./" segments and backslash separators.
 *
 * @param name - Entry or member name
 */
export function normaliseEntryName(name: string): string {
	return path.posix.normalize(name.replace(/\\/g, "/")).replace(/^(\.\/)+/, "");
}

/**
 * Resolve where a member is written inside the output directory. The member
 * name is normalised first, so "./a.txt" and "nested\\c.txt" land at
 * "a.txt" and "nested/c.txt".
 *
 * @param outputDir - Extraction directory
 * @param member - Member name as requested
 * @returns Destination path
 * @throws SecurityError if the member would land outside the output directory
 */
export function resolveMemberPath(outputDir: string, member: string): string {
	const name = normaliseEntryName(member);
	checkPathTraversal(name);
	return path.join(outputDir, name);
}
