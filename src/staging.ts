/**
 * Staging directory management.
 *
 * One export invocation assembles a single self-contained tree that every
 * packager reads from:
 *
 * ```
 * <outputDir>/<export-id>/
 *   .vcpkg-root
 *   installed/<triplet>/...
 *   installed/vcpkg/info/<name>_<version>_<triplet>.list
 *   scripts/...
 * ```
 */

import { copyFile, mkdir, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { VcpkgPaths } from "./config";
import {
	InstallReplayFailedError,
	IntegrationCopyFailedError,
	PlanContractError,
	StagingPrepareFailedError,
} from "./errors";
import { getInstallDestination, type InstallReplayer } from "./install";
import {
	type AlreadyBuiltAction,
	type ExportAction,
	formatPackageSpec,
	getPackageDirName,
	isAlreadyBuilt,
} from "./lib/index";

/**
 * Files copied from the vcpkg root so the exported tree can be used from
 * CMake and MSBuild, relative to the root.
 */
export const INTEGRATION_FILES: readonly string[] = [
	".vcpkg-root",
	"scripts/buildsystems/msbuild/applocal.ps1",
	"scripts/buildsystems/msbuild/vcpkg.targets",
	"scripts/buildsystems/vcpkg.cmake",
	"scripts/cmake/vcpkg_get_windows_sdk.cmake",
	"scripts/getWindowsSDK.ps1",
	"scripts/getProgramFilesPlatformBitness.ps1",
	"scripts/getProgramFiles32bit.ps1",
];

export interface StagingContext {
	paths: VcpkgPaths;
	replay: InstallReplayer;
}

/**
 * Remove a staging directory and everything in it. A missing directory is
 * not an error.
 */
export async function removeStagingDir(stagingDir: string): Promise<void> {
	await rm(stagingDir, { recursive: true, force: true });
}

/**
 * Delete any leftover tree at `stagingDir` and create it empty.
 */
export async function prepareStagingDir(stagingDir: string): Promise<void> {
	try {
		await removeStagingDir(stagingDir);
		await mkdir(stagingDir, { recursive: true });
	} catch (error) {
		throw new StagingPrepareFailedError(stagingDir, error);
	}
}

/**
 * Copy the integration files into a tree, preserving relative paths.
 * Any failed copy aborts the export.
 */
export async function exportIntegrationFiles(
	treeRoot: string,
	paths: VcpkgPaths,
): Promise<void> {
	for (const file of INTEGRATION_FILES) {
		const source = join(paths.root, file);
		const destination = join(treeRoot, file);
		try {
			await mkdir(dirname(destination), { recursive: true });
			await copyFile(source, destination);
		} catch (error) {
			throw new IntegrationCopyFailedError(file, error);
		}
	}
}

/**
 * Narrow a plan to already-built actions. Staging an unbuilt package is a
 * caller bug: the unbuilt check runs before staging.
 */
export function requireAllBuilt(
	plan: readonly ExportAction[],
): AlreadyBuiltAction[] {
	return plan.map((action) => {
		if (!isAlreadyBuilt(action)) {
			throw new PlanContractError(
				`Cannot export ${formatPackageSpec(action.spec)}: package has not been built`,
			);
		}
		return action;
	});
}

/**
 * Copy one package into the export tree through the install replayer.
 */
export async function exportPackage(
	action: AlreadyBuiltAction,
	treeRoot: string,
	context: StagingContext,
): Promise<void> {
	const sourceDir = join(context.paths.packages, getPackageDirName(action.spec));
	try {
		await context.replay(
			action.binary,
			sourceDir,
			getInstallDestination(treeRoot, action.binary),
		);
	} catch (error) {
		throw new InstallReplayFailedError(formatPackageSpec(action.spec), error);
	}
}

/**
 * Assemble the staging tree for an export plan.
 *
 * @returns The staging directory path
 */
export async function stageExport(
	plan: readonly ExportAction[],
	stagingDir: string,
	context: StagingContext,
): Promise<string> {
	const actions = requireAllBuilt(plan);

	await prepareStagingDir(stagingDir);

	for (const action of actions) {
		const displayName = formatPackageSpec(action.spec);
		console.log(`Exporting package ${displayName}... `);
		await exportPackage(action, stagingDir, context);
		console.log(`Exporting package ${displayName}... done`);
	}

	await exportIntegrationFiles(stagingDir, context.paths);

	return stagingDir;
}
