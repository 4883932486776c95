import { rm, stat } from "node:fs/promises";
import { join } from "node:path";
import {
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	type Mock,
	type MockInstance,
	vi,
} from "vitest";
import { getVcpkgPaths } from "./config";
import {
	ArchiveFailedError,
	EmptyExportPlanError,
	IntegrationCopyFailedError,
	UnbuiltDependencyError,
} from "./errors";
import { replayInstall } from "./install";
import { parseExportOptions, type RawOptionValues } from "./lib/index";
import type { InstallerBuilder } from "./packagers/index";
import { type ExportContext, runExport } from "./pipeline";
import { computeExportPlan } from "./plan";
import { createPortsDirectoryProvider } from "./ports";
import type { ToolRunner } from "./process";
import { readStatusDatabase } from "./status-db";
import { createTempDir, createVcpkgRoot, writeTree } from "./test-helpers";

const TRIPLET = "x64-windows";
const NOW = new Date(2024, 2, 7, 10, 30, 0);
const EXPORT_ID = "export-20240307-103000";

async function exists(path: string): Promise<boolean> {
	return stat(path).then(
		() => true,
		() => false,
	);
}

describe("runExport", () => {
	let root: string;
	let outputDir: string;
	let runTool: Mock<ToolRunner>;
	let buildInstaller: Mock<InstallerBuilder>;
	let log: MockInstance<typeof console.log>;

	async function createContext(): Promise<ExportContext> {
		const paths = getVcpkgPaths(root);
		return {
			paths,
			outputDir,
			tools: {
				cmake: "cmake",
				nuget: "nuget",
				binarycreator: "binarycreator",
				repogen: "repogen",
			},
			statusDb: await readStatusDatabase(paths),
			ports: createPortsDirectoryProvider(paths),
			runTool,
			replay: replayInstall,
			buildInstaller,
			computePlan: computeExportPlan,
			now: () => NOW,
		};
	}

	async function exportWith(specs: string[], raw: RawOptionValues) {
		return runExport(
			parseExportOptions(specs, raw, TRIPLET),
			await createContext(),
		);
	}

	beforeEach(async () => {
		root = await createTempDir();
		outputDir = join(root, "out");
		await createVcpkgRoot(root, {
			"zlib:x64-windows": { version: "1.3.1" },
			"libpng:x64-windows": { version: "1.6.43", dependencies: ["zlib"] },
		});
		await writeTree(root, {
			"packages/zlib_x64-windows/include/zlib.h": "zlib\n",
			"packages/libpng_x64-windows/include/png.h": "png\n",
			"ports/boost/vcpkg.json": JSON.stringify({
				name: "boost",
				version: "1.85.0",
				dependencies: ["zlib"],
			}),
		});

		runTool = vi.fn<ToolRunner>(async () => 0);
		buildInstaller = vi.fn<InstallerBuilder>(async () => "/installer");
		log = vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(root, { recursive: true, force: true });
	});

	it("should produce one artifact per enabled format", async () => {
		const result = await exportWith(["libpng"], {
			"--nuget": true,
			"--zip": true,
			"--7zip": true,
		});

		expect(result.status).toBe("exported");
		if (result.status !== "exported") return;

		expect(result.session.id).toBe(EXPORT_ID);
		expect(result.session.artifacts).toEqual([
			{ kind: "nuget", path: join(outputDir, `${EXPORT_ID}.nupkg`) },
			{ kind: "zip", path: join(outputDir, `${EXPORT_ID}.zip`) },
			{ kind: "7zip", path: join(outputDir, `${EXPORT_ID}.7z`) },
		]);
		expect(runTool).toHaveBeenCalledTimes(3);
		expect(log).toHaveBeenCalledWith("  * zlib:x64-windows");
		expect(log).toHaveBeenCalledWith("    libpng:x64-windows");
	});

	it("should stage every package of the plan", async () => {
		await exportWith(["libpng"], { "--raw": true });

		const tree = join(outputDir, EXPORT_ID);
		expect(
			await exists(
				join(tree, "installed", "x64-windows", "include", "zlib.h"),
			),
		).toBe(true);
		expect(
			await exists(
				join(tree, "installed", "vcpkg", "info", "libpng_1.6.43_x64-windows.list"),
			),
		).toBe(true);
		expect(await exists(join(tree, ".vcpkg-root"))).toBe(true);
	});

	it("should keep the staging directory when raw is requested", async () => {
		const result = await exportWith(["zlib"], { "--raw": true, "--zip": true });

		expect(await exists(join(outputDir, EXPORT_ID))).toBe(true);
		expect(result.status === "exported" && result.session.artifacts).toEqual([
			{ kind: "raw", path: join(outputDir, EXPORT_ID) },
			{ kind: "zip", path: join(outputDir, `${EXPORT_ID}.zip`) },
		]);
	});

	it("should remove the staging directory without raw", async () => {
		await exportWith(["zlib"], { "--zip": true });

		expect(await exists(join(outputDir, EXPORT_ID))).toBe(false);
		expect(await exists(outputDir)).toBe(true);
	});

	it("should export a NuGet package under the requested id", async () => {
		const result = await exportWith(["zlib:x64-windows"], {
			"--nuget": true,
			"--nuget-id": "mylib",
			"--nuget-version": "2.0.0",
		});

		expect(result.status === "exported" && result.session.artifacts).toEqual([
			{ kind: "nuget", path: join(outputDir, "mylib.nupkg") },
		]);
		expect(log).toHaveBeenCalledWith(
			`    Install-Package mylib -Source "${outputDir}"`,
		);
	});

	it("should abort before staging when a package is not built", async () => {
		let caught: unknown;
		try {
			await exportWith(["boost"], { "--zip": true });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(UnbuiltDependencyError);
		if (caught instanceof UnbuiltDependencyError) {
			expect(caught.remediation).toBe(
				"To build them, run:\n    vcpkg install boost:x64-windows",
			);
		}
		expect(runTool).not.toHaveBeenCalled();
		expect(await exists(outputDir)).toBe(false);
	});

	it("should report unbuilt packages on a dry run", async () => {
		await expect(exportWith(["boost"], { "--dry-run": true })).rejects.toThrow(
			UnbuiltDependencyError,
		);
	});

	it("should stop after the report on a dry run", async () => {
		const result = await exportWith(["libpng"], {
			"--dry-run": true,
			"--zip": true,
		});

		expect(result.status).toBe("dry-run");
		expect(result.plan).toHaveLength(2);
		expect(runTool).not.toHaveBeenCalled();
		expect(await exists(outputDir)).toBe(false);
	});

	it("should remove the staging directory when packaging fails", async () => {
		runTool.mockResolvedValue(1);

		await expect(exportWith(["zlib"], { "--zip": true })).rejects.toThrow(
			ArchiveFailedError,
		);
		expect(await exists(join(outputDir, EXPORT_ID))).toBe(false);
	});

	it("should keep a raw tree when a later format fails", async () => {
		runTool.mockResolvedValue(1);

		await expect(
			exportWith(["zlib"], { "--raw": true, "--zip": true }),
		).rejects.toThrow(ArchiveFailedError);
		expect(await exists(join(outputDir, EXPORT_ID))).toBe(true);
	});

	it("should leave a partially staged tree when staging fails", async () => {
		await rm(join(root, "scripts", "getWindowsSDK.ps1"));

		await expect(exportWith(["zlib"], { "--zip": true })).rejects.toThrow(
			IntegrationCopyFailedError,
		);
		expect(runTool).not.toHaveBeenCalled();
		expect(
			await exists(
				join(
					outputDir,
					EXPORT_ID,
					"installed",
					"x64-windows",
					"include",
					"zlib.h",
				),
			),
		).toBe(true);
	});

	it("should build installers without a staged tree", async () => {
		const result = await exportWith(["zlib"], { "--ifw": true });

		expect(buildInstaller).toHaveBeenCalledTimes(1);
		expect(buildInstaller.mock.calls[0]?.[1]).toBe(EXPORT_ID);
		expect(result.status === "exported" && result.session.artifacts).toEqual([
			{ kind: "ifw", path: "/installer" },
		]);
		expect(await exists(join(outputDir, EXPORT_ID))).toBe(false);
	});

	it("should reject an empty plan for a non-empty request", async () => {
		const context = await createContext();
		await expect(
			runExport(parseExportOptions(["zlib"], { "--zip": true }, TRIPLET), {
				...context,
				computePlan: async () => [],
			}),
		).rejects.toThrow(EmptyExportPlanError);
	});
});
