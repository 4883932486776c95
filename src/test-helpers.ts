import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { INTEGRATION_FILES } from "./staging";

export async function createTempDir(prefix = "vcpkg-export-test-"): Promise<string> {
	return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Write files given as `relative path -> content` under `root`
 */
export async function writeTree(
	root: string,
	files: Record<string, string>,
): Promise<void> {
	for (const [relativePath, content] of Object.entries(files)) {
		const path = join(root, relativePath);
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, content);
	}
}

/**
 * Lay out a minimal vcpkg root: integration files, triplets and a status
 * database with the given entries.
 */
export async function createVcpkgRoot(
	root: string,
	packages: Record<
		string,
		{ version: string; dependencies?: string[]; state?: string }
	> = {},
): Promise<void> {
	const integration: Record<string, string> = {};
	for (const file of INTEGRATION_FILES) {
		integration[file] = `# ${file}\n`;
	}

	const entries: Record<string, unknown> = {};
	for (const [key, entry] of Object.entries(packages)) {
		entries[key] = { state: "installed", ...entry };
	}

	await writeTree(root, {
		...integration,
		"triplets/x64-windows.cmake": "",
		"triplets/x64-linux.cmake": "",
		"triplets/community/arm64-osx.cmake": "",
		"installed/vcpkg/status.json": JSON.stringify({
			statusVersion: 1,
			packages: entries,
		}),
	});
}
