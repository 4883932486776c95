/**
 * Export plan computation.
 *
 * Walks the dependency closure of the requested packages and classifies each
 * package as already built (present in the status database) or not built.
 * Installed packages take their dependencies from the status database;
 * packages that still need building take them from their port manifest.
 *
 * The walk is depth-first with dependencies visited in name order, so the
 * plan lists every package after its dependencies and is deterministic for
 * a fixed status database and request.
 */

import { PlanContractError, UnknownPortError } from "./errors";
import {
	comparePackageSpecs,
	type ExportAction,
	formatPackageSpec,
	type PackageSpec,
	parseDependencySpec,
} from "./lib/index";
import type { PortProvider } from "./ports";
import { findInstalledBinary, type StatusDatabase } from "./status-db";

export async function computeExportPlan(
	specs: readonly PackageSpec[],
	statusDb: StatusDatabase,
	ports: PortProvider,
): Promise<ExportAction[]> {
	const requested = new Set(specs.map(formatPackageSpec));
	const visited = new Set<string>();
	const plan: ExportAction[] = [];

	async function visit(spec: PackageSpec, path: string[]): Promise<void> {
		const key = formatPackageSpec(spec);
		if (visited.has(key)) {
			return;
		}
		if (path.includes(key)) {
			throw new PlanContractError(
				`Dependency cycle detected: ${[...path, key].join(" -> ")}`,
			);
		}

		const binary = findInstalledBinary(statusDb, spec);
		let dependencies: string[];
		if (binary) {
			dependencies = binary.dependencies;
		} else {
			const port = await ports.getPort(spec.name);
			if (!port) {
				throw new UnknownPortError(spec.name);
			}
			dependencies = port.dependencies;
		}

		const dependencySpecs: PackageSpec[] = [];
		for (const dependency of dependencies) {
			const dependencySpec = parseDependencySpec(dependency, spec.triplet);
			if (!dependencySpec) {
				throw new PlanContractError(
					`Invalid dependency "${dependency}" of ${key}`,
				);
			}
			dependencySpecs.push(dependencySpec);
		}
		dependencySpecs.sort(comparePackageSpecs);

		for (const dependencySpec of dependencySpecs) {
			await visit(dependencySpec, [...path, key]);
		}

		visited.add(key);
		const requestType = requested.has(key) ? "user-requested" : "auto-selected";
		plan.push(
			binary
				? { spec, requestType, planType: "already-built", binary }
				: { spec, requestType, planType: "not-built" },
		);
	}

	for (const spec of specs) {
		await visit(spec, []);
	}

	return plan;
}
