import { describe, expect, it } from "vitest";
import { PlanContractError, UnknownPortError } from "./errors";
import { createPackageSpec, formatPackageSpec } from "./lib/index";
import { computeExportPlan } from "./plan";
import type { PortManifest, PortProvider } from "./ports";
import type { StatusDatabase } from "./status-db";

function createPorts(manifests: PortManifest[]): PortProvider {
	const byName = new Map(manifests.map((manifest) => [manifest.name, manifest]));
	return {
		async getPort(name) {
			return byName.get(name) ?? null;
		},
	};
}

const statusDb: StatusDatabase = {
	statusVersion: 1,
	packages: {
		"zlib:x64-windows": { version: "1.3.1", state: "installed" },
		"bzip2:x64-windows": { version: "1.0.8", state: "installed" },
		"libpng:x64-windows": {
			version: "1.6.43",
			dependencies: ["zlib"],
			state: "installed",
		},
		"freetype:x64-windows": {
			version: "2.13.2",
			dependencies: ["zlib", "bzip2", "libpng"],
			state: "installed",
		},
	},
};

describe("computeExportPlan", () => {
	it("should order dependencies before their dependents", async () => {
		const plan = await computeExportPlan(
			[createPackageSpec("freetype", "x64-windows")],
			statusDb,
			createPorts([]),
		);

		expect(plan.map((action) => formatPackageSpec(action.spec))).toEqual([
			"bzip2:x64-windows",
			"zlib:x64-windows",
			"libpng:x64-windows",
			"freetype:x64-windows",
		]);
		expect(plan.map((action) => action.requestType)).toEqual([
			"auto-selected",
			"auto-selected",
			"auto-selected",
			"user-requested",
		]);
		expect(plan.every((action) => action.planType === "already-built")).toBe(
			true,
		);
	});

	it("should list each package once", async () => {
		const plan = await computeExportPlan(
			[
				createPackageSpec("libpng", "x64-windows"),
				createPackageSpec("zlib", "x64-windows"),
			],
			statusDb,
			createPorts([]),
		);

		expect(plan.map((action) => formatPackageSpec(action.spec))).toEqual([
			"zlib:x64-windows",
			"libpng:x64-windows",
		]);
		expect(plan[0]?.requestType).toBe("user-requested");
	});

	it("should take unbuilt dependencies from port manifests", async () => {
		const plan = await computeExportPlan(
			[createPackageSpec("boost", "x64-windows")],
			statusDb,
			createPorts([
				{ name: "boost", dependencies: ["boost-system", "zlib"] },
				{ name: "boost-system", dependencies: [] },
			]),
		);

		expect(
			plan.map((action) => [formatPackageSpec(action.spec), action.planType]),
		).toEqual([
			["boost-system:x64-windows", "not-built"],
			["zlib:x64-windows", "already-built"],
			["boost:x64-windows", "not-built"],
		]);
	});

	it("should fail for an unknown port", async () => {
		await expect(
			computeExportPlan(
				[createPackageSpec("nope", "x64-windows")],
				statusDb,
				createPorts([]),
			),
		).rejects.toThrow(UnknownPortError);
	});

	it("should detect dependency cycles", async () => {
		await expect(
			computeExportPlan(
				[createPackageSpec("a", "x64-linux")],
				{ statusVersion: 1, packages: {} },
				createPorts([
					{ name: "a", dependencies: ["b"] },
					{ name: "b", dependencies: ["a"] },
				]),
			),
		).rejects.toThrow(
			new PlanContractError(
				"Dependency cycle detected: a:x64-linux -> b:x64-linux -> a:x64-linux",
			),
		);
	});

	it("should return an empty plan for no specs", async () => {
		expect(await computeExportPlan([], statusDb, createPorts([]))).toEqual([]);
	});
});
