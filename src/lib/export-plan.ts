/**
 * Export plan model and reporting.
 *
 * The plan itself is computed from the installed-package database (see
 * `plan.ts`); this module classifies it, renders the human-readable report
 * and decides whether the export may proceed.
 */

import { UnbuiltDependencyError } from "../errors";
import {
	comparePackageSpecs,
	formatPackageSpec,
	type PackageSpec,
} from "./package-spec";

// =============================================================================
// Types
// =============================================================================

/**
 * Installed binary metadata of an already-built package
 */
export interface BinaryParagraph {
	name: string;
	version: string;
	triplet: string;
	dependencies: string[];
}

export type RequestType = "user-requested" | "auto-selected";

export type ExportPlanType = "already-built" | "not-built";

interface ExportActionBase {
	spec: PackageSpec;
	requestType: RequestType;
}

export interface AlreadyBuiltAction extends ExportActionBase {
	planType: "already-built";
	binary: BinaryParagraph;
}

export interface NotBuiltAction extends ExportActionBase {
	planType: "not-built";
}

export type ExportAction = AlreadyBuiltAction | NotBuiltAction;

export type ExportPlanGroups = Map<ExportPlanType, ExportAction[]>;

// =============================================================================
// Constants
// =============================================================================

/** Report order of the plan groups */
export const PLAN_TYPE_ORDER: readonly ExportPlanType[] = [
	"already-built",
	"not-built",
];

const PLAN_TYPE_HEADINGS: Record<ExportPlanType, string> = {
	"already-built":
		"The following packages are already built and will be exported:",
	"not-built": "The following packages need to be built:",
};

export const TRANSITIVE_WARNING =
	"Additional packages (*) need to be exported to complete this operation.";

export const TRANSITIVE_FOOTNOTE =
	"(*) indicates a package not directly requested.";

// =============================================================================
// Classification
// =============================================================================

/**
 * Stem of an installed package's file names, e.g. `zlib_1.2.11_x64-windows`.
 * The installed file list is stored as `<stem>.list`.
 */
export function getBinaryFullStem(binary: BinaryParagraph): string {
	return `${binary.name}_${binary.version}_${binary.triplet}`;
}

/**
 * Group plan actions by build status, keeping plan order within each group.
 */
export function groupByPlanType(
	plan: readonly ExportAction[],
): ExportPlanGroups {
	const groups: ExportPlanGroups = new Map();
	for (const action of plan) {
		const group = groups.get(action.planType);
		if (group) {
			group.push(action);
		} else {
			groups.set(action.planType, [action]);
		}
	}
	return groups;
}

export function hasTransitivePackages(plan: readonly ExportAction[]): boolean {
	return plan.some((action) => action.requestType !== "user-requested");
}

function formatActionLine(action: ExportAction): string {
	const spec = formatPackageSpec(action.spec);
	return action.requestType === "user-requested"
		? `    ${spec}`
		: `  * ${spec}`;
}

/**
 * Render the plan report.
 *
 * Already-built packages come first, then packages that need building; each
 * group is sorted by spec. Transitive packages are marked with `*`.
 */
export function renderPlan(groups: ExportPlanGroups): string[] {
	const lines: string[] = [];
	let transitive = false;

	for (const planType of PLAN_TYPE_ORDER) {
		const actions = groups.get(planType);
		if (!actions || actions.length === 0) continue;

		const sorted = [...actions].sort((a, b) =>
			comparePackageSpecs(a.spec, b.spec),
		);
		lines.push(PLAN_TYPE_HEADINGS[planType]);
		for (const action of sorted) {
			lines.push(formatActionLine(action));
		}
		transitive ||= hasTransitivePackages(sorted);
	}

	if (transitive) {
		lines.push(TRANSITIVE_WARNING, TRANSITIVE_FOOTNOTE);
	}

	return lines;
}

/**
 * Build command for the unbuilt packages. Only user-requested packages are
 * listed; their dependencies get built along with them.
 */
export function formatBuildCommand(unbuilt: readonly ExportAction[]): string {
	const specs = unbuilt
		.filter((action) => action.requestType === "user-requested")
		.map((action) => formatPackageSpec(action.spec));
	return `To build them, run:\n    vcpkg install ${specs.join(" ")}`;
}

/**
 * Throw if any package of the plan still needs to be built.
 */
export function assertAllBuilt(groups: ExportPlanGroups): void {
	const unbuilt = groups.get("not-built") ?? [];
	if (unbuilt.length === 0) {
		return;
	}

	throw new UnbuiltDependencyError(
		unbuilt.map((action) => formatPackageSpec(action.spec)),
		formatBuildCommand(unbuilt),
	);
}

/**
 * Narrow a plan action to an already-built one
 */
export function isAlreadyBuilt(
	action: ExportAction,
): action is AlreadyBuiltAction {
	return action.planType === "already-built";
}
