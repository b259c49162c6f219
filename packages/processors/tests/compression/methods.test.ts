import { describe, it, expect } from "vitest";
import * as zlib from "node:zlib";
import {
	AUTO_EXTENSIONS,
	COMPRESSION_METHODS,
	detectCompression,
	openDecompressor,
	resolveMethod,
	validateMethodOption,
} from "../../src/compression/methods.js";
import { InvalidFormatError, InvalidMethodError } from "../../src/errors.js";

describe("resolveMethod", () => {
	it("maps extensions under auto", () => {
		expect(resolveMethod("auto", "/data/values.csv.xz")).toBe("lzma");
		expect(resolveMethod("auto", "/data/values.csv.gz")).toBe("gzip");
		expect(resolveMethod("auto", "/data/values.csv.bz2")).toBe("bzip2");
	});

	it("rejects unknown extensions under auto", () => {
		let caught: unknown;
		try {
			resolveMethod("auto", "/data/values.csv");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(InvalidFormatError);
		expect(caught).toMatchObject({ extension: ".csv", validExtensions: [".xz", ".gz", ".bz2"] });
	});

	it("reports an empty extension for names without one", () => {
		expect(() => resolveMethod("auto", "/data/README")).toThrow(`Unrecognized extension ''.`);
	});

	it("matches extensions case-sensitively", () => {
		expect(() => resolveMethod("auto", "/data/VALUES.GZ")).toThrow(InvalidFormatError);
	});

	it("uses an explicit method regardless of extension", () => {
		expect(resolveMethod("xz", "/data/values.bin")).toBe("xz");
		expect(resolveMethod("gzip", "/data/values.xz")).toBe("gzip");
	});

	it("rejects unsupported explicit methods", () => {
		expect(() => resolveMethod("zstd", "/data/values.zst")).toThrow(InvalidMethodError);
	});
});

describe("validateMethodOption", () => {
	it("accepts auto and every method", () => {
		expect(validateMethodOption("auto")).toBe("auto");
		for (const method of COMPRESSION_METHODS.keys()) {
			expect(validateMethodOption(method)).toBe(method);
		}
	});

	it("lists the valid methods when rejecting", () => {
		expect(() => validateMethodOption("rar")).toThrow(
			`Invalid compression method 'rar'. Must be one of ["lzma","xz","gzip","bzip2"].`,
		);
	});
});

describe("method table", () => {
	it("exposes the supported methods and extensions", () => {
		expect([...COMPRESSION_METHODS.keys()]).toEqual(["lzma", "xz", "gzip", "bzip2"]);
		expect([...AUTO_EXTENSIONS.entries()]).toEqual([
			[".xz", "lzma"],
			[".gz", "gzip"],
			[".bz2", "bzip2"],
		]);
	});

	it("shares one decoder between lzma and xz", () => {
		expect(COMPRESSION_METHODS.get("lzma")).toBe(COMPRESSION_METHODS.get("xz"));
	});
});

describe("detectCompression", () => {
	it("recognises magic bytes", () => {
		expect(detectCompression(Uint8Array.of(0x1f, 0x8b, 0x08, 0x00))).toBe("gzip");
		expect(detectCompression(Buffer.from("BZh91AY"))).toBe("bzip2");
		expect(detectCompression(Uint8Array.of(0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00))).toBe("lzma");
	});

	it("returns null for plain or short data", () => {
		expect(detectCompression(Buffer.from("a.txt"))).toBeNull();
		expect(detectCompression(Uint8Array.of(0x1f))).toBeNull();
	});
});

describe("openDecompressor", () => {
	it("creates a working gzip stream", async () => {
		const stream = openDecompressor("gzip");
		const chunks: Buffer[] = [];
		stream.on("data", (chunk: Buffer) => chunks.push(chunk));
		const done = new Promise<void>((resolve, reject) => {
			stream.on("end", () => resolve());
			stream.on("error", reject);
		});

		stream.end(zlib.gzipSync("hello\n"));
		await done;

		expect(Buffer.concat(chunks).toString("utf-8")).toBe("hello\n");
	});
});
