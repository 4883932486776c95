import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import {
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	type MockInstance,
	vi,
} from "vitest";
import { getVcpkgPaths } from "@/config";
import { NugetPackFailedError } from "@/errors";
import type { ToolRunner } from "@/process";
import { createTempDir } from "@/test-helpers";
import { exportNuget } from "./nuget";

describe("exportNuget", () => {
	let root: string;
	let log: MockInstance<typeof console.log>;

	beforeEach(async () => {
		root = await createTempDir();
		log = vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(root, { recursive: true, force: true });
	});

	it("should write the auxiliary files and pack quietly", async () => {
		const paths = getVcpkgPaths(root);
		const outputDir = join(root, "out");
		const stagedDir = join(outputDir, "export-20240101-000000");
		const runTool = vi.fn<ToolRunner>(async () => 0);

		const result = await exportNuget(
			stagedDir,
			outputDir,
			{ id: "mylib", version: "2.0.0" },
			{ runTool, nuget: "nuget", paths },
		);

		const scratch = join(root, "scripts", "buildsystems", "tmp");
		const nuspecPath = join(scratch, "vcpkg.export.nuspec");

		expect(result).toEqual({
			id: "mylib",
			version: "2.0.0",
			packagePath: join(outputDir, "mylib.nupkg"),
		});
		expect(runTool).toHaveBeenCalledWith(
			"nuget",
			["pack", "-OutputDirectory", outputDir, nuspecPath, "-NoDefaultExcludes"],
			{ quiet: true },
		);
		expect(await readFile(nuspecPath, "utf-8")).toContain("<id>mylib</id>");
		expect(
			await readFile(join(scratch, "vcpkg.export.nuget.targets"), "utf-8"),
		).toContain('Project="../../scripts/buildsystems/msbuild/vcpkg.targets"');
		expect(log).toHaveBeenCalledWith(
			`    Install-Package mylib -Source "${outputDir}"`,
		);
	});

	it("should default the id and version", async () => {
		const result = await exportNuget(
			"/out/export-20240101-000000",
			"/out",
			{},
			{ runTool: async () => 0, nuget: "nuget", paths: getVcpkgPaths(root) },
		);

		expect(result.id).toBe("export-20240101-000000");
		expect(result.version).toBe("1.0.0");
		expect(result.packagePath).toBe("/out/export-20240101-000000.nupkg");
	});

	it("should fail on a non-zero exit code", async () => {
		await expect(
			exportNuget(
				"/out/export-20240101-000000",
				"/out",
				{},
				{ runTool: async () => 1, nuget: "nuget", paths: getVcpkgPaths(root) },
			),
		).rejects.toThrow(NugetPackFailedError);
	});
});
