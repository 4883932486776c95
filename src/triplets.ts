import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { VcpkgPaths } from "./config";
import { UnknownTripletError } from "./errors";
import type { PackageSpec } from "./lib/index";
import { isNotFound } from "./status-db";

const TRIPLET_FILE_EXTENSION = ".cmake";

async function listTripletFiles(dir: string): Promise<string[]> {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter(
				(entry) => entry.isFile() && entry.name.endsWith(TRIPLET_FILE_EXTENSION),
			)
			.map((entry) =>
				entry.name.slice(0, -TRIPLET_FILE_EXTENSION.length).toLowerCase(),
			);
	} catch (error) {
		if (isNotFound(error)) {
			return [];
		}
		throw error;
	}
}

/**
 * List the triplets known to a vcpkg root (`triplets/*.cmake` and
 * `triplets/community/*.cmake`), sorted.
 */
export async function listAvailableTriplets(
	paths: VcpkgPaths,
): Promise<string[]> {
	const builtIn = await listTripletFiles(paths.triplets);
	const community = await listTripletFiles(join(paths.triplets, "community"));
	return [...new Set([...builtIn, ...community])].sort();
}

/**
 * Check every requested triplet against the triplets directory
 */
export async function validateTriplets(
	specs: readonly PackageSpec[],
	paths: VcpkgPaths,
): Promise<void> {
	if (specs.length === 0) {
		return;
	}

	const available = await listAvailableTriplets(paths);
	const known = new Set(available);

	for (const spec of specs) {
		if (!known.has(spec.triplet)) {
			throw new UnknownTripletError(spec.triplet, available);
		}
	}
}
