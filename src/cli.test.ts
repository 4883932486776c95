import { describe, expect, it, vi } from "vitest";
import { type ExportHandler, createProgram } from "./cli";

async function run(argv: string[]) {
	const handler = vi.fn<ExportHandler>(async () => {});
	const program = createProgram("1.2.3", handler).exitOverride();
	await program.parseAsync(argv, { from: "user" });
	return handler;
}

describe("createProgram", () => {
	it("should export from the root command", async () => {
		const handler = await run(["zlib", "--zip", "--triplet", "x64-linux"]);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith(["zlib"], {
			overrides: {
				vcpkgRoot: undefined,
				triplet: "x64-linux",
				outputDir: undefined,
			},
			raw: { "--zip": true },
		});
	});

	it("should export from the export subcommand", async () => {
		const handler = await run([
			"export",
			"zlib:x64-windows",
			"--nuget",
			"--nuget-id=mylib",
			"--output-dir",
			"/tmp/out",
		]);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith(["zlib:x64-windows"], {
			overrides: {
				vcpkgRoot: undefined,
				triplet: undefined,
				outputDir: "/tmp/out",
			},
			raw: { "--nuget": true, "--nuget-id": "mylib" },
		});
	});

	it("should keep options given before the subcommand", async () => {
		const handler = await run(["--vcpkg-root", "/opt/vcpkg", "export", "fmt", "--dry-run"]);

		expect(handler).toHaveBeenCalledWith(["fmt"], {
			overrides: {
				vcpkgRoot: "/opt/vcpkg",
				triplet: undefined,
				outputDir: undefined,
			},
			raw: { "--dry-run": true },
		});
	});
});
