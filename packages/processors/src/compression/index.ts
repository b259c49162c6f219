/**
 * Compression module exports.
 */

export {
	type CompressionMethod,
	type MethodOption,
	type CompressionCapability,
	COMPRESSION_METHODS,
	AUTO_EXTENSIONS,
	isCompressionMethod,
	validateMethodOption,
	resolveMethod,
	openDecompressor,
	detectCompression,
} from "./methods.js";

export { type DecompressOptions, DECOMPRESS_SUFFIX, Decompress, decompressFile } from "./decompress.js";
