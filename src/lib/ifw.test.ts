import { describe, expect, it } from "vitest";
import {
	createConfigXml,
	createPackageXml,
	formatReleaseDate,
	getDependencyComponentNames,
	getSpecComponentName,
} from "./ifw";
import { createPackageSpec } from "./package-spec";

describe("IFW templates", () => {
	it("should name components after port and triplet", () => {
		expect(getSpecComponentName(createPackageSpec("zlib", "x64-windows"))).toBe(
			"packages.zlib.x64-windows",
		);
	});

	it("should resolve dependency components for the same triplet", () => {
		expect(
			getDependencyComponentNames(["zlib", "bzip2[tool]"], "x64-linux"),
		).toEqual(["packages.zlib.x64-linux", "packages.bzip2.x64-linux"]);
	});

	it("should format release dates", () => {
		expect(formatReleaseDate(new Date(2024, 2, 7, 15, 0, 0))).toBe(
			"2024-03-07",
		);
	});

	it("should write package.xml with optional fields", () => {
		expect(
			createPackageXml({
				name: "packages.zlib.x64-windows",
				displayName: "zlib:x64-windows",
				version: "1.3.1",
				releaseDate: "2024-03-07",
				dependencies: ["packages.a.x64-windows", "packages.b.x64-windows"],
				selectedByDefault: true,
			}),
		).toBe(
			[
				'<?xml version="1.0"?>',
				"<Package>",
				"    <DisplayName>zlib:x64-windows</DisplayName>",
				"    <Version>1.3.1</Version>",
				"    <ReleaseDate>2024-03-07</ReleaseDate>",
				"    <Dependencies>packages.a.x64-windows,packages.b.x64-windows</Dependencies>",
				"    <Default>true</Default>",
				"</Package>",
				"",
			].join("\n"),
		);
	});

	it("should omit the remote repository without a URL", () => {
		const xml = createConfigXml();
		expect(xml).toContain("<TargetDir>@RootDir@/src/vcpkg</TargetDir>");
		expect(xml).not.toContain("<RemoteRepositories>");
	});

	it("should add the remote repository URL", () => {
		expect(createConfigXml("https://example.com/repo?a=1&b=2")).toContain(
			"            <Url>https://example.com/repo?a=1&amp;b=2</Url>",
		);
	});
});
