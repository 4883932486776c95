/**
 * Export orchestration: plan, report, stage, package, clean up.
 */

import { mkdir } from "node:fs/promises";
import type { ToolPaths, VcpkgPaths } from "./config";
import { EmptyExportPlanError } from "./errors";
import type { InstallReplayer } from "./install";
import {
	ARCHIVE_FORMATS,
	type ArchiveFormatKey,
	assertAllBuilt,
	createExportSession,
	type ExportAction,
	type ExportOptions,
	type ExportSession,
	groupByPlanType,
	needsStagedTree,
	type PackageSpec,
	recordArtifact,
	renderPlan,
} from "./lib/index";
import {
	exportArchive,
	exportNuget,
	exportRaw,
	type InstallerBuilder,
} from "./packagers/index";
import type { PortProvider } from "./ports";
import type { ToolRunner } from "./process";
import { removeStagingDir, stageExport } from "./staging";
import type { StatusDatabase } from "./status-db";
import { validateTriplets } from "./triplets";

export type PlanComputer = (
	specs: readonly PackageSpec[],
	statusDb: StatusDatabase,
	ports: PortProvider,
) => Promise<ExportAction[]>;

export interface ExportContext {
	paths: VcpkgPaths;
	outputDir: string;
	tools: ToolPaths;
	statusDb: StatusDatabase;
	ports: PortProvider;
	runTool: ToolRunner;
	replay: InstallReplayer;
	buildInstaller: InstallerBuilder;
	computePlan: PlanComputer;
	now: () => Date;
}

export type ExportResult =
	| { status: "dry-run"; plan: ExportAction[] }
	| { status: "exported"; plan: ExportAction[]; session: ExportSession };

const ARCHIVE_KEYS: readonly ArchiveFormatKey[] = ["zip", "7zip"];

async function runPackagers(
	plan: readonly ExportAction[],
	options: ExportOptions,
	session: ExportSession,
	context: ExportContext,
): Promise<void> {
	if (options.formats.has("raw")) {
		recordArtifact(session, "raw", exportRaw(session.stagingDir));
	}

	if (options.formats.has("nuget")) {
		const result = await exportNuget(
			session.stagingDir,
			session.outputDir,
			options.nuget,
			{ runTool: context.runTool, nuget: context.tools.nuget, paths: context.paths },
		);
		recordArtifact(session, "nuget", result.packagePath);
	}

	for (const key of ARCHIVE_KEYS) {
		if (!options.formats.has(key)) continue;
		const archivePath = await exportArchive(
			session.stagingDir,
			session.outputDir,
			ARCHIVE_FORMATS[key],
			{ runTool: context.runTool, cmake: context.tools.cmake },
		);
		recordArtifact(session, key, archivePath);
	}

	if (options.formats.has("ifw")) {
		const installerPath = await context.buildInstaller(
			plan,
			session.id,
			options.ifw,
			{
				runTool: context.runTool,
				replay: context.replay,
				paths: context.paths,
				tools: context.tools,
				outputDir: session.outputDir,
				now: context.now(),
			},
		);
		recordArtifact(session, "ifw", installerPath);
	}
}

/**
 * Run one export invocation.
 *
 * Nothing is written to disk before every package of the plan is known to
 * be built. The staging tree is removed afterwards unless a raw export was
 * requested, whether packaging succeeded or failed. A tree whose staging
 * failed is left as is; the next run deletes it before staging again.
 */
export async function runExport(
	options: ExportOptions,
	context: ExportContext,
): Promise<ExportResult> {
	await validateTriplets(options.specs, context.paths);

	const plan = await context.computePlan(
		options.specs,
		context.statusDb,
		context.ports,
	);
	if (options.specs.length > 0 && plan.length === 0) {
		throw new EmptyExportPlanError();
	}

	const groups = groupByPlanType(plan);
	for (const line of renderPlan(groups)) {
		console.log(line);
	}
	assertAllBuilt(groups);

	if (options.dryRun) {
		return { status: "dry-run", plan };
	}

	const session = createExportSession(context.outputDir, context.now());
	await mkdir(session.outputDir, { recursive: true });

	if (needsStagedTree(options)) {
		await stageExport(plan, session.stagingDir, context);
	}

	const keepStagingDir = options.formats.has("raw");
	try {
		await runPackagers(plan, options, session, context);
	} catch (error) {
		if (!keepStagingDir) {
			await removeStagingDir(session.stagingDir).catch((cleanupError: unknown) => {
				console.warn(
					`Warning: Could not remove ${session.stagingDir}: ${
						cleanupError instanceof Error
							? cleanupError.message
							: String(cleanupError)
					}`,
				);
			});
		}
		throw error;
	}

	if (!keepStagingDir) {
		await removeStagingDir(session.stagingDir);
	}

	return { status: "exported", plan, session };
}
