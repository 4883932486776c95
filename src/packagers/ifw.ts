/**
 * Qt Installer Framework export.
 *
 * Every package becomes an installer component under `packages.<port>`,
 * next to an `integration` component carrying the buildsystem scripts. The
 * component tree is written to a packages directory and compiled into an
 * offline installer, or into a repository plus an online-only installer
 * when a repository URL is given.
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ToolPaths, VcpkgPaths } from "@/config";
import { InstallerBuildFailedError, InstallReplayFailedError } from "@/errors";
import { getInstallDestination, type InstallReplayer } from "@/install";
import {
	type AlreadyBuiltAction,
	createConfigXml,
	createPackageXml,
	type ExportAction,
	formatPackageSpec,
	formatReleaseDate,
	getDependencyComponentNames,
	getPackageDirName,
	getPortComponentName,
	getSpecComponentName,
	type IfwComponent,
	type IfwOptions,
	IFW_TARGET_DIR,
	INTEGRATION_COMPONENT,
	PACKAGES_COMPONENT,
} from "@/lib/index";
import type { ToolRunner } from "@/process";
import { exportIntegrationFiles, requireAllBuilt } from "@/staging";
import { printNextStepInfo } from "./hints";

export interface IfwPackagerDeps {
	runTool: ToolRunner;
	replay: InstallReplayer;
	paths: VcpkgPaths;
	tools: Pick<ToolPaths, "binarycreator" | "repogen">;
	outputDir: string;
	now: Date;
	platform?: NodeJS.Platform;
}

/**
 * Builds an installer for a plan and resolves with the installer's path
 */
export type InstallerBuilder = (
	plan: readonly ExportAction[],
	exportId: string,
	options: IfwOptions,
	deps: IfwPackagerDeps,
) => Promise<string>;

export interface IfwPaths {
	packagesDir: string;
	repositoryDir: string;
	configFile: string;
	installerFile: string;
}

/**
 * Resolve the IFW working paths, defaulting each to `<outputDir>/<id>-ifw-*`.
 */
export function getIfwPaths(
	exportId: string,
	options: IfwOptions,
	outputDir: string,
	platform: NodeJS.Platform = process.platform,
): IfwPaths {
	const prefix = join(outputDir, `${exportId}-ifw`);
	const installerSuffix = platform === "win32" ? ".exe" : "";
	return {
		packagesDir: options.packagesDirPath ?? `${prefix}-packages`,
		repositoryDir: options.repositoryDirPath ?? `${prefix}-repository`,
		configFile: options.configFilePath ?? `${prefix}-configuration.xml`,
		installerFile:
			options.installerFilePath ?? `${prefix}-installer${installerSuffix}`,
	};
}

function getComponentDir(packagesDir: string, name: string): string {
	return join(packagesDir, name);
}

async function writeComponentMeta(
	packagesDir: string,
	component: IfwComponent,
): Promise<void> {
	const metaDir = join(getComponentDir(packagesDir, component.name), "meta");
	await mkdir(metaDir, { recursive: true });
	await writeFile(join(metaDir, "package.xml"), createPackageXml(component));
}

/**
 * Write the component tree for a plan into `packagesDir`.
 *
 * @returns Names of the components written, parents first
 */
export async function writeIfwComponents(
	actions: readonly AlreadyBuiltAction[],
	packagesDir: string,
	deps: Pick<IfwPackagerDeps, "replay" | "paths" | "now">,
): Promise<string[]> {
	const releaseDate = formatReleaseDate(deps.now);
	const written: string[] = [];

	await rm(packagesDir, { recursive: true, force: true });

	await writeComponentMeta(packagesDir, {
		name: PACKAGES_COMPONENT,
		displayName: "Packages",
		version: "1.0.0",
		releaseDate,
	});
	written.push(PACKAGES_COMPONENT);

	const ports = new Set<string>();
	for (const action of actions) {
		const portComponent = getPortComponentName(action.spec.name);
		if (!ports.has(portComponent)) {
			ports.add(portComponent);
			await writeComponentMeta(packagesDir, {
				name: portComponent,
				displayName: action.spec.name,
				version: action.binary.version,
				releaseDate,
			});
			written.push(portComponent);
		}

		const specComponent = getSpecComponentName(action.spec);
		await writeComponentMeta(packagesDir, {
			name: specComponent,
			displayName: formatPackageSpec(action.spec),
			version: action.binary.version,
			releaseDate,
			dependencies: getDependencyComponentNames(
				action.binary.dependencies,
				action.spec.triplet,
			),
		});

		const dataDir = join(getComponentDir(packagesDir, specComponent), "data");
		try {
			await deps.replay(
				action.binary,
				join(deps.paths.packages, getPackageDirName(action.spec)),
				getInstallDestination(dataDir, action.binary),
			);
		} catch (error) {
			throw new InstallReplayFailedError(formatPackageSpec(action.spec), error);
		}
		written.push(specComponent);
	}

	await writeComponentMeta(packagesDir, {
		name: INTEGRATION_COMPONENT,
		displayName: "Integration",
		version: "1.0.0",
		releaseDate,
		selectedByDefault: true,
	});
	await exportIntegrationFiles(
		join(getComponentDir(packagesDir, INTEGRATION_COMPONENT), "data"),
		deps.paths,
	);
	written.push(INTEGRATION_COMPONENT);

	return written;
}

async function runStep(
	step: string,
	run: () => Promise<number>,
): Promise<void> {
	console.log(`IFW installer ${step}... `);
	const exitCode = await run();
	if (exitCode !== 0) {
		throw new InstallerBuildFailedError(step, exitCode);
	}
	console.log(`IFW installer ${step}... done`);
}

export const exportIfw: InstallerBuilder = async (
	plan,
	exportId,
	options,
	deps,
) => {
	const actions = requireAllBuilt(plan);
	const ifwPaths = getIfwPaths(
		exportId,
		options,
		deps.outputDir,
		deps.platform,
	);

	console.log("Creating IFW packages... ");
	await writeIfwComponents(actions, ifwPaths.packagesDir, deps);
	console.log("Creating IFW packages... done");

	await mkdir(dirname(ifwPaths.configFile), { recursive: true });
	await writeFile(ifwPaths.configFile, createConfigXml(options.repositoryUrl));
	await mkdir(dirname(ifwPaths.installerFile), { recursive: true });

	if (options.repositoryUrl) {
		await rm(ifwPaths.repositoryDir, { recursive: true, force: true });
		await runStep("repository generation", () =>
			deps.runTool(deps.tools.repogen, [
				"--packages",
				ifwPaths.packagesDir,
				ifwPaths.repositoryDir,
			]),
		);
		await runStep("creation", () =>
			deps.runTool(deps.tools.binarycreator, [
				"--online-only",
				"--config",
				ifwPaths.configFile,
				"--packages",
				ifwPaths.packagesDir,
				ifwPaths.installerFile,
			]),
		);
		console.log(`IFW repository exported at: ${ifwPaths.repositoryDir}`);
	} else {
		await runStep("creation", () =>
			deps.runTool(deps.tools.binarycreator, [
				"--offline-only",
				"--config",
				ifwPaths.configFile,
				"--packages",
				ifwPaths.packagesDir,
				ifwPaths.installerFile,
			]),
		);
	}

	console.log(`IFW installer exported at: ${ifwPaths.installerFile}`);
	printNextStepInfo(IFW_TARGET_DIR);
	return ifwPaths.installerFile;
};
