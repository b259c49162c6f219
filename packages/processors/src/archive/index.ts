/**
 * Archive module exports.
 */

export { type ArchiveKind, type ArchiveFormat } from "./format.js";

export { zipFormat, unzip } from "./zip.js";

export { tarFormat, untar, detectTarWrapper } from "./tar.js";

export { checkPathTraversal, normaliseEntryName, resolveMemberPath } from "./security.js";

export {
	type ExtractorOptions,
	ARCHIVE_FORMATS,
	ArchiveExtractor,
	Unzip,
	Untar,
	createExtractor,
} from "./extract.js";
