import { describe, expect, it } from "vitest";
import {
	comparePackageSpecs,
	createPackageSpec,
	formatPackageSpec,
	getPackageDirName,
	parseDependencySpec,
	parsePackageSpec,
} from "./package-spec";

describe("package spec utilities", () => {
	describe("parsePackageSpec", () => {
		it("should apply the default triplet", () => {
			expect(parsePackageSpec("zlib", "x64-windows")).toEqual({
				name: "zlib",
				triplet: "x64-windows",
			});
		});

		it("should keep an explicit triplet", () => {
			expect(parsePackageSpec("zlib:x64-linux", "x64-windows")).toEqual({
				name: "zlib",
				triplet: "x64-linux",
			});
		});

		it("should normalize case and whitespace", () => {
			expect(parsePackageSpec("  Boost:X64-Linux ", "x64-windows")).toEqual({
				name: "boost",
				triplet: "x64-linux",
			});
		});

		it("should return null for invalid specifiers", () => {
			expect(parsePackageSpec("", "x64-windows")).toBeNull();
			expect(parsePackageSpec("zlib:", "x64-windows")).toBeNull();
			expect(parsePackageSpec("zlib:x64:extra", "x64-windows")).toBeNull();
			expect(parsePackageSpec("lib_name", "x64-windows")).toBeNull();
			expect(parsePackageSpec("zlib", "bad triplet")).toBeNull();
		});

		it("should return frozen specs", () => {
			const spec = parsePackageSpec("zlib", "x64-windows");
			expect(Object.isFrozen(spec)).toBe(true);
		});
	});

	describe("parseDependencySpec", () => {
		it("should inherit the dependent's triplet", () => {
			expect(parseDependencySpec("zlib", "arm64-osx")).toEqual({
				name: "zlib",
				triplet: "arm64-osx",
			});
		});

		it("should drop feature lists", () => {
			expect(parseDependencySpec("curl[ssl,http2]", "x64-linux")).toEqual({
				name: "curl",
				triplet: "x64-linux",
			});
		});

		it("should keep a qualified triplet", () => {
			expect(parseDependencySpec("zlib:x86-windows", "x64-windows")).toEqual(
				{ name: "zlib", triplet: "x86-windows" },
			);
		});
	});

	describe("formatting and ordering", () => {
		const zlib = createPackageSpec("zlib", "x64-windows");
		const boost = createPackageSpec("boost", "x64-windows");

		it("should format as name:triplet", () => {
			expect(formatPackageSpec(zlib)).toBe("zlib:x64-windows");
		});

		it("should compare by canonical form", () => {
			expect(comparePackageSpecs(boost, zlib)).toBe(-1);
			expect(comparePackageSpecs(zlib, boost)).toBe(1);
			expect(comparePackageSpecs(zlib, createPackageSpec("zlib", "x64-windows"))).toBe(0);
		});

		it("should name the package directory", () => {
			expect(getPackageDirName(zlib)).toBe("zlib_x64-windows");
		});
	});
});
