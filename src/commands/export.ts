/**
 * Export command - Package built libraries for use outside the vcpkg root.
 *
 * Produces any combination of:
 * - A raw directory tree
 * - A NuGet package
 * - Zip / 7z archives
 * - A Qt Installer Framework installer
 */

import { type Command, Option } from "commander";
import {
	type CliConfigOverrides,
	type ResolvedConfig,
	resolveConfig,
} from "../config";
import { UnbuiltDependencyError, UserInputError } from "../errors";
import { replayInstall } from "../install";
import {
	EXPORT_EXAMPLE,
	EXPORT_SETTINGS,
	EXPORT_SWITCHES,
	parseExportOptions,
	type RawOptionValues,
} from "../lib/index";
import { exportIfw } from "../packagers/index";
import { type ExportContext, runExport } from "../pipeline";
import { computeExportPlan } from "../plan";
import { createPortsDirectoryProvider } from "../ports";
import { runTool } from "../process";
import { readStatusDatabase, type StatusDatabase } from "../status-db";

export interface ExportCommandOptions {
	overrides: CliConfigOverrides;
	/** Option values keyed by flag */
	raw: RawOptionValues;
}

/**
 * Register every export switch and setting on a command.
 *
 * @returns The registered options keyed by flag
 */
export function registerExportOptions(command: Command): Map<string, Option> {
	const registered = new Map<string, Option>();

	for (const descriptor of EXPORT_SWITCHES) {
		const option = new Option(descriptor.flag, descriptor.description);
		command.addOption(option);
		registered.set(descriptor.flag, option);
	}

	for (const descriptor of EXPORT_SETTINGS) {
		const option = new Option(
			`${descriptor.flag} <value>`,
			`${descriptor.description} (requires ${descriptor.requires})`,
		);
		command.addOption(option);
		registered.set(descriptor.flag, option);
	}

	return registered;
}

/**
 * Re-key commander's parsed option values by flag
 */
export function collectRawOptions(
	values: Record<string, unknown>,
	registered: ReadonlyMap<string, Option>,
): RawOptionValues {
	const raw: Record<string, string | boolean> = {};
	for (const [flag, option] of registered) {
		const value = values[option.attributeName()];
		if (typeof value === "string" || typeof value === "boolean") {
			raw[flag] = value;
		}
	}
	return raw;
}

/**
 * Lines printed to stderr for a failed export
 */
export function formatExportError(error: unknown): string[] {
	const message = error instanceof Error ? error.message : String(error);
	const lines = [`Error: ${message}`];

	if (error instanceof UnbuiltDependencyError) {
		lines.push(error.remediation);
	} else if (error instanceof UserInputError) {
		lines.push(EXPORT_EXAMPLE);
	}

	return lines;
}

/**
 * Wire the pipeline to the real filesystem and subprocesses
 */
export function createExportContext(
	config: ResolvedConfig,
	statusDb: StatusDatabase,
): ExportContext {
	return {
		paths: config.paths,
		outputDir: config.outputDir,
		tools: config.tools,
		statusDb,
		ports: createPortsDirectoryProvider(config.paths),
		runTool,
		replay: replayInstall,
		buildInstaller: exportIfw,
		computePlan: computeExportPlan,
		now: () => new Date(),
	};
}

export async function exportCommand(
	specs: string[],
	options: ExportCommandOptions,
): Promise<void> {
	try {
		const config = await resolveConfig(options.overrides);
		const exportOptions = parseExportOptions(
			specs,
			options.raw,
			config.defaultTriplet,
		);
		const statusDb = await readStatusDatabase(config.paths);

		await runExport(exportOptions, createExportContext(config, statusDb));
	} catch (error) {
		for (const line of formatExportError(error)) {
			console.error(line);
		}
		process.exit(1);
	}
}
