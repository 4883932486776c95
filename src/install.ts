/**
 * Install replay: copies a built package's files into an installed tree and
 * records them in the package's list file, the same layout `vcpkg install`
 * produces.
 */

import { copyFile, mkdir, readdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import ignore from "ignore";
import { type BinaryParagraph, getBinaryFullStem } from "./lib/index";

/**
 * Package-root files that describe the build and are never installed
 */
export const PACKAGE_CONTROL_FILES = ["/CONTROL", "/BUILD_INFO"];

export interface InstallDestination {
	/** The `installed/` directory receiving `<triplet>/...` */
	installedRoot: string;
	triplet: string;
	/** Path of the list file to write */
	listFile: string;
}

/**
 * Replays one package's installation into a destination tree
 */
export type InstallReplayer = (
	binary: BinaryParagraph,
	sourceDir: string,
	destination: InstallDestination,
) => Promise<void>;

/**
 * Destination of a package inside an export tree:
 * files under `installed/<triplet>/`, list file under
 * `installed/vcpkg/info/<fullstem>.list`.
 */
export function getInstallDestination(
	treeRoot: string,
	binary: BinaryParagraph,
): InstallDestination {
	const installedRoot = join(treeRoot, "installed");
	return {
		installedRoot,
		triplet: binary.triplet,
		listFile: join(
			installedRoot,
			"vcpkg",
			"info",
			`${getBinaryFullStem(binary)}.list`,
		),
	};
}

/**
 * Copy a package directory into `<installedRoot>/<triplet>/` and return the
 * list file entries (sorted, forward slashes, directories end with `/`).
 */
export async function installFiles(
	sourceDir: string,
	destination: InstallDestination,
): Promise<string[]> {
	const ig = ignore().add(PACKAGE_CONTROL_FILES);
	const targetRoot = join(destination.installedRoot, destination.triplet);
	const entries: string[] = [`${destination.triplet}/`];

	await mkdir(targetRoot, { recursive: true });

	async function copyDir(relativeDir: string): Promise<void> {
		const dirents = await readdir(join(sourceDir, relativeDir), {
			withFileTypes: true,
		});
		dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		for (const dirent of dirents) {
			const relativePath = relativeDir
				? `${relativeDir}/${dirent.name}`
				: dirent.name;
			if (ig.ignores(dirent.isDirectory() ? `${relativePath}/` : relativePath)) {
				continue;
			}

			const source = join(sourceDir, relativePath);
			const target = join(targetRoot, relativePath);

			if (dirent.isDirectory()) {
				await mkdir(target, { recursive: true });
				entries.push(`${destination.triplet}/${relativePath}/`);
				await copyDir(relativePath);
			} else if (dirent.isFile() || dirent.isSymbolicLink()) {
				await copyFile(source, target);
				entries.push(`${destination.triplet}/${relativePath}`);
			}
		}
	}

	await copyDir("");
	return entries.sort();
}

/**
 * Default replayer: copy files, then write the list file.
 */
export const replayInstall: InstallReplayer = async (
	_binary,
	sourceDir,
	destination,
) => {
	const entries = await installFiles(sourceDir, destination);
	await mkdir(dirname(destination.listFile), { recursive: true });
	await writeFile(destination.listFile, `${entries.join("\n")}\n`);
};
