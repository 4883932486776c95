import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { VcpkgPaths } from "@/config";
import { NugetPackFailedError } from "@/errors";
import {
	createNuspec,
	createTargetsRedirect,
	DEFAULT_NUGET_VERSION,
	type NugetOptions,
	TARGETS_REDIRECT_TARGET,
} from "@/lib/index";
import type { ToolRunner } from "@/process";

export interface NugetPackagerDeps {
	runTool: ToolRunner;
	nuget: string;
	paths: VcpkgPaths;
}

export interface NugetExportResult {
	id: string;
	version: string;
	packagePath: string;
}

/**
 * Scratch directory for the generated nuspec and targets redirect. The files
 * are left in place after packing.
 */
export function getNugetScratchDir(paths: VcpkgPaths): string {
	return join(paths.buildsystems, "tmp");
}

/**
 * Pack the staged tree as `<outputDir>/<id>.nupkg`.
 *
 * The id defaults to the staged directory's name and the version to 1.0.0.
 */
export async function exportNuget(
	stagedDir: string,
	outputDir: string,
	options: NugetOptions,
	deps: NugetPackagerDeps,
): Promise<NugetExportResult> {
	const id = options.id ?? basename(stagedDir);
	const version = options.version ?? DEFAULT_NUGET_VERSION;

	console.log("Creating nuget package... ");

	const scratchDir = getNugetScratchDir(deps.paths);
	await mkdir(scratchDir, { recursive: true });

	const targetsRedirectPath = join(scratchDir, "vcpkg.export.nuget.targets");
	await writeFile(
		targetsRedirectPath,
		createTargetsRedirect(TARGETS_REDIRECT_TARGET),
	);

	const nuspecPath = join(scratchDir, "vcpkg.export.nuspec");
	await writeFile(
		nuspecPath,
		createNuspec({ id, version, exportedDir: stagedDir, targetsRedirectPath }),
	);

	// -NoDefaultExcludes keeps .vcpkg-root in the package
	const exitCode = await deps.runTool(
		deps.nuget,
		["pack", "-OutputDirectory", outputDir, nuspecPath, "-NoDefaultExcludes"],
		{ quiet: true },
	);
	if (exitCode !== 0) {
		throw new NugetPackFailedError(exitCode);
	}

	const packagePath = join(outputDir, `${id}.nupkg`);
	console.log("Creating nuget package... done");
	console.log(`NuGet package exported at: ${packagePath}`);
	console.log("");
	console.log(
		"With a project open, go to Tools->NuGet Package Manager->Package Manager Console and paste:",
	);
	console.log(`    Install-Package ${id} -Source "${outputDir}"`);
	console.log("");

	return { id, version, packagePath };
}
