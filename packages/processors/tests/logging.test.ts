import { describe, it, expect, vi, afterEach } from "vitest";
import { defaultWarningObserver, getLogLevel, logMessage } from "../src/logging.js";

describe("getLogLevel", () => {
	it("defaults to warn", () => {
		expect(getLogLevel({})).toBe("warn");
	});

	it("reads the uppercase variable first", () => {
		expect(getLogLevel({ FETCHKIT_LOG_LEVEL: "debug", fetchkit_log_level: "error" })).toBe("debug");
	});

	it("falls back to the lowercase variable", () => {
		expect(getLogLevel({ fetchkit_log_level: "error" })).toBe("error");
	});

	it("ignores case and surrounding whitespace", () => {
		expect(getLogLevel({ FETCHKIT_LOG_LEVEL: " INFO " })).toBe("info");
	});

	it("falls back to warn for unknown levels", () => {
		expect(getLogLevel({ FETCHKIT_LOG_LEVEL: "verbose" })).toBe("warn");
	});
});

describe("logMessage", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
	});

	it("writes messages at or below the configured level", () => {
		vi.stubEnv("FETCHKIT_LOG_LEVEL", "warn");
		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

		logMessage("careful", "warn");
		logMessage("broken", "error");

		expect(warnSpy).toHaveBeenCalledWith("careful");
		expect(errorSpy).toHaveBeenCalledWith("broken");
	});

	it("drops messages above the configured level", () => {
		vi.stubEnv("FETCHKIT_LOG_LEVEL", "error");
		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
		const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});

		logMessage("careful", "warn");
		logMessage("note");

		expect(warnSpy).not.toHaveBeenCalled();
		expect(infoSpy).not.toHaveBeenCalled();
	});

	it("routes the default warning observer to console.warn", () => {
		vi.stubEnv("FETCHKIT_LOG_LEVEL", "warn");
		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

		defaultWarningObserver("Extracting");

		expect(warnSpy).toHaveBeenCalledWith("Extracting");
	});
});
