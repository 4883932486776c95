import { basename, dirname, join } from "node:path";
import { ArchiveFailedError } from "@/errors";
import { type ArchiveFormat, getArchiveFileName } from "@/lib/index";
import type { ToolRunner } from "@/process";
import { printNextStepInfo } from "./hints";

export interface ArchivePackagerDeps {
	runTool: ToolRunner;
	/** Path of the cmake executable, whose `-E tar` mode does the archiving */
	cmake: string;
}

/**
 * Compress the staged tree into `<outputDir>/<staged-dir-name>.<ext>`.
 *
 * The archiver runs from the staged tree's parent so entries are stored
 * under the tree's own name. `cmake -E tar` applies no default exclusions,
 * so `.vcpkg-root` is kept.
 */
export async function exportArchive(
	stagedDir: string,
	outputDir: string,
	format: ArchiveFormat,
	deps: ArchivePackagerDeps,
): Promise<string> {
	const exportedDirName = basename(stagedDir);
	const archivePath = join(
		outputDir,
		getArchiveFileName(exportedDirName, format),
	);

	console.log(`Creating ${format.label} archive... `);
	const exitCode = await deps.runTool(
		deps.cmake,
		[
			"-E",
			"tar",
			"cf",
			archivePath,
			`--format=${format.selector}`,
			"--",
			exportedDirName,
		],
		{ cwd: dirname(stagedDir) },
	);

	if (exitCode !== 0) {
		throw new ArchiveFailedError(format.label, archivePath, exitCode);
	}

	console.log(`Creating ${format.label} archive... done`);
	console.log(`${format.label} archive exported at: ${archivePath}`);
	printNextStepInfo("[...]");
	return archivePath;
}
