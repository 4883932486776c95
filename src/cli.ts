import { Command, type Option } from "commander";
import {
	collectRawOptions,
	type ExportCommandOptions,
	exportCommand,
	registerExportOptions,
} from "./commands/index";

export type ExportHandler = (
	specs: string[],
	options: ExportCommandOptions,
) => Promise<void>;

const EXAMPLES = `
Example:
  vcpkg-export zlib zlib:x64-windows boost --nuget
  vcpkg-export export zlib --zip --7zip --output-dir ./exports
  vcpkg-export fmt --dry-run`;

function readStringOption(
	options: Record<string, unknown>,
	key: string,
): string | undefined {
	const value = options[key];
	return typeof value === "string" ? value : undefined;
}

/**
 * Add the specs argument, the global options and every export option
 */
function addExportSurface(command: Command): Map<string, Option> {
	command
		.argument("[specs...]", "Packages to export (<port> or <port>:<triplet>)")
		.option("--vcpkg-root <path>", "vcpkg root directory")
		.option("--triplet <triplet>", "Default triplet for specs without one")
		.option("--output-dir <path>", "Directory receiving the exported files");
	return registerExportOptions(command);
}

function toCommandOptions(
	options: Record<string, unknown>,
	registered: ReadonlyMap<string, Option>,
): ExportCommandOptions {
	return {
		overrides: {
			vcpkgRoot: readStringOption(options, "vcpkgRoot"),
			triplet: readStringOption(options, "triplet"),
			outputDir: readStringOption(options, "outputDir"),
		},
		raw: collectRawOptions(options, registered),
	};
}

/**
 * Build the program. Export runs as the root action and as the `export`
 * subcommand.
 */
export function createProgram(
	version: string,
	handler: ExportHandler = exportCommand,
): Command {
	const program = new Command();

	program
		.name("vcpkg-export")
		.description(
			"Export built vcpkg packages as a tree, archive, NuGet package or installer",
		)
		.version(version);

	const rootOptions = addExportSurface(program);
	program.addHelpText("after", EXAMPLES);
	program.action(async (specs: string[], options: Record<string, unknown>) => {
		await handler(specs, toCommandOptions(options, rootOptions));
	});

	const exportCmd = program
		.command("export")
		.description("Export built packages (same as the root command)");
	const exportOptions = addExportSurface(exportCmd);
	exportCmd.addHelpText("after", EXAMPLES);
	exportCmd.action(
		async (specs: string[], options: Record<string, unknown>) => {
			// Options given before the subcommand name are parsed by the program
			await handler(
				specs,
				toCommandOptions({ ...program.opts(), ...options }, exportOptions),
			);
		},
	);

	return program;
}
