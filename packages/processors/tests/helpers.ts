import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

/**
 * Create a fresh temporary directory for one test.
 */
export async function makeTempDir(prefix: string): Promise<string> {
	return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Copy a fixture into a directory, optionally under a new name, and return its path.
 */
export async function copyFixture(name: string, destDir: string, fileName: string = name): Promise<string> {
	const destPath = path.join(destDir, fileName);
	await fs.promises.copyFile(path.join(FIXTURES_DIR, name), destPath);
	return destPath;
}

/**
 * Contents of the "pair" archives.
 */
export const PAIR_CONTENTS: Readonly<Record<string, string>> = {
	"a.txt": "alpha\n",
	"b.txt": "beta\n",
	"nested/c.txt": "gamma\n",
};

/** Contents of x.csv inside data.zip. */
export const DATA_CSV = "id,value\n1,alpha\n2,beta\n";

/** Plain text inside the values.csv.* fixtures. */
export const VALUES_CSV = "t,v\n0,1.5\n1,2.5\n";
