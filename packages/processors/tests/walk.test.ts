import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { walkDirectory, collectFiles, pathExists } from "../src/filesystem/walk.js";

describe("walk.ts", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "walk-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	describe("walkDirectory", () => {
		it("walks all files and directories", async () => {
			fs.mkdirSync(path.join(tempDir, "subdir"));
			fs.writeFileSync(path.join(tempDir, "file1.txt"), "content1");
			fs.writeFileSync(path.join(tempDir, "subdir", "file2.txt"), "content2");

			const entries: string[] = [];
			await walkDirectory(tempDir, (entry) => {
				entries.push(entry.name);
			});

			expect(entries).toHaveLength(3);
			expect(entries).toContain("file1.txt");
			expect(entries).toContain("subdir");
			expect(entries).toContain("file2.txt");
		});

		it("provides correct isDirectory and isFile flags", async () => {
			fs.mkdirSync(path.join(tempDir, "dir"));
			fs.writeFileSync(path.join(tempDir, "file.txt"), "content");

			const dirs: string[] = [];
			const files: string[] = [];

			await walkDirectory(tempDir, (entry) => {
				if (entry.isDirectory) {
					dirs.push(entry.name);
				}
				if (entry.isFile) {
					files.push(entry.name);
				}
			});

			expect(dirs).toEqual(["dir"]);
			expect(files).toEqual(["file.txt"]);
		});

		it("skips subdirectory when callback returns false", async () => {
			fs.mkdirSync(path.join(tempDir, "skip"));
			fs.mkdirSync(path.join(tempDir, "include"));
			fs.writeFileSync(path.join(tempDir, "skip", "skipped.txt"), "skip");
			fs.writeFileSync(path.join(tempDir, "include", "included.txt"), "include");

			const entries: string[] = [];
			await walkDirectory(tempDir, (entry) => {
				entries.push(entry.name);
				if (entry.name === "skip") {
					return false;
				}
			});

			expect(entries).toContain("skip");
			expect(entries).toContain("included.txt");
			expect(entries).not.toContain("skipped.txt");
		});

		it("visits a directory's children before its later siblings", async () => {
			fs.mkdirSync(path.join(tempDir, "only"));
			fs.writeFileSync(path.join(tempDir, "only", "inner.txt"), "inner");

			const visited: string[] = [];
			await walkDirectory(tempDir, (entry) => {
				visited.push(path.relative(tempDir, entry.path));
			});

			expect(visited).toEqual(["only", path.join("only", "inner.txt")]);
		});
	});

	describe("collectFiles", () => {
		it("collects all files recursively", async () => {
			fs.mkdirSync(path.join(tempDir, "dir1"));
			fs.mkdirSync(path.join(tempDir, "dir1", "dir2"));
			fs.writeFileSync(path.join(tempDir, "root.txt"), "root");
			fs.writeFileSync(path.join(tempDir, "dir1", "level1.txt"), "level1");
			fs.writeFileSync(path.join(tempDir, "dir1", "dir2", "level2.txt"), "level2");

			const files = await collectFiles(tempDir);

			expect(files).toHaveLength(3);
			expect(files).toContain(path.join(tempDir, "root.txt"));
			expect(files).toContain(path.join(tempDir, "dir1", "level1.txt"));
			expect(files).toContain(path.join(tempDir, "dir1", "dir2", "level2.txt"));
		});

		it("excludes directories and symbolic links", async () => {
			fs.mkdirSync(path.join(tempDir, "dir"));
			fs.writeFileSync(path.join(tempDir, "file.txt"), "content");
			fs.symlinkSync(path.join(tempDir, "file.txt"), path.join(tempDir, "link.txt"));

			const files = await collectFiles(tempDir);

			expect(files).toEqual([path.join(tempDir, "file.txt")]);
		});

		it("returns empty array for empty directory", async () => {
			const files = await collectFiles(tempDir);

			expect(files).toEqual([]);
		});
	});

	describe("pathExists", () => {
		it("returns true for an existing path", async () => {
			await expect(pathExists(tempDir)).resolves.toBe(true);
		});

		it("returns false for a missing path", async () => {
			await expect(pathExists(path.join(tempDir, "missing"))).resolves.toBe(false);
		});
	});
});
