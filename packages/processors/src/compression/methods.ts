/**
 * @title Compression Methods
 * @description Single-stream compression methods and their detection.
 *
 * The method table is built once at module load and never mutated. Each
 * entry pairs a factory for a decompressing stream with the leading bytes
 * that identify data written with that method.
 *
 * @module compression
 */

import * as path from "node:path";
import * as zlib from "node:zlib";
import lzma from "lzma-native";
import unbzip2Stream from "unbzip2-stream";
import { InvalidFormatError, InvalidMethodError } from "../errors.js";

/** Methods the decompressor can apply. */
export type CompressionMethod = "lzma" | "xz" | "gzip" | "bzip2";

/** A method name, or "auto" to pick one from the file extension. */
export type MethodOption = CompressionMethod | "auto";

/**
 * What a compression method provides.
 */
export interface CompressionCapability {
	/** Create a stream that decompresses the data written through it. */
	open: () => NodeJS.ReadWriteStream;
	/** Magic bytes at the start of data compressed with this method. */
	signature: Uint8Array;
}

const XZ_SIGNATURE = Uint8Array.of(0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00);

const lzmaCapability: CompressionCapability = {
	// Accepts both .xz containers and legacy .lzma streams.
	open: () => lzma.createDecompressor(),
	signature: XZ_SIGNATURE,
};

/**
 * Supported methods. "lzma" and "xz" are aliases.
 */
export const COMPRESSION_METHODS: ReadonlyMap<CompressionMethod, CompressionCapability> = new Map<
	CompressionMethod,
	CompressionCapability
>([
	["lzma", lzmaCapability],
	["xz", lzmaCapability],
	["gzip", { open: () => zlib.createGunzip(), signature: Uint8Array.of(0x1f, 0x8b) }],
	["bzip2", { open: () => unbzip2Stream(), signature: Uint8Array.of(0x42, 0x5a, 0x68) }],
]);

/**
 * Extensions understood by "auto", mapped to their method.
 */
export const AUTO_EXTENSIONS: ReadonlyMap<string, CompressionMethod> = new Map<string, CompressionMethod>([
	[".xz", "lzma"],
	[".gz", "gzip"],
	[".bz2", "bzip2"],
]);

/**
 * Check whether a string names a supported method.
 */
export function isCompressionMethod(value: string): value is CompressionMethod {
	return [...COMPRESSION_METHODS.keys()].some((method) => method === value);
}

/**
 * Validate a method option, accepting "auto" as well as the method names.
 *
 * @param method - Requested method
 * @returns The same value, narrowed
 * @throws InvalidMethodError if the method is not supported
 */
export function validateMethodOption(method: string): MethodOption {
	if (method === "auto" || isCompressionMethod(method)) {
		return method;
	}
	throw new InvalidMethodError(method, [...COMPRESSION_METHODS.keys()]);
}

/**
 * Resolve the method to use for a file.
 *
 * With "auto", the method is chosen from the final extension of the file
 * name. Matching is case-sensitive.
 *
 * @param method - Requested method or "auto"
 * @param filePath - Path of the compressed file
 * @returns The concrete method
 * @throws InvalidFormatError if "auto" meets an unknown extension
 * @throws InvalidMethodError if the method is not supported
 */
export function resolveMethod(method: string, filePath: string): CompressionMethod {
	if (method === "auto") {
		const extension = path.extname(filePath);
		const detected = AUTO_EXTENSIONS.get(extension);
		if (!detected) {
			throw new InvalidFormatError(extension, [...AUTO_EXTENSIONS.keys()]);
		}
		return detected;
	}
	if (!isCompressionMethod(method)) {
		throw new InvalidMethodError(method, [...COMPRESSION_METHODS.keys()]);
	}
	return method;
}

/**
 * Create a decompressing stream for a method.
 */
export function openDecompressor(method: CompressionMethod): NodeJS.ReadWriteStream {
	const capability = COMPRESSION_METHODS.get(method);
	if (!capability) {
		throw new InvalidMethodError(method, [...COMPRESSION_METHODS.keys()]);
	}
	return capability.open();
}

/**
 * Identify the compression wrapping a stream from its first bytes.
 *
 * @param header - Leading bytes of the data
 * @returns The matching method, or null for uncompressed or unknown data
 */
export function detectCompression(header: Uint8Array): CompressionMethod | null {
	for (const [method, capability] of COMPRESSION_METHODS) {
		const { signature } = capability;
		if (header.length >= signature.length && signature.every((byte, index) => header[index] === byte)) {
			return method;
		}
	}
	return null;
}
