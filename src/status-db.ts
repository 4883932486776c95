/**
 * Installed-package status database.
 *
 * Stored at `installed/vcpkg/status.json`:
 *
 * ```json
 * {
 *   "statusVersion": 1,
 *   "packages": {
 *     "zlib:x64-windows": { "version": "1.2.11", "state": "installed" },
 *     "libpng:x64-windows": {
 *       "version": "1.6.37",
 *       "dependencies": ["zlib"],
 *       "state": "installed"
 *     }
 *   }
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { VcpkgPaths } from "./config";
import {
	type BinaryParagraph,
	formatPackageSpec,
	isRecord,
	isStringArray,
	type PackageSpec,
} from "./lib/index";

export const STATUS_DB_VERSION = 1;

export type InstallState = "installed" | "not-installed";

export interface StatusEntry {
	version: string;
	dependencies?: string[];
	state: InstallState;
}

export interface StatusDatabase {
	statusVersion: number;
	packages: Record<string, StatusEntry>;
}

/**
 * Get the status database path for a vcpkg root
 */
export function getStatusDbPath(paths: VcpkgPaths): string {
	return join(paths.installed, "vcpkg", "status.json");
}

function isStatusEntry(value: unknown): value is StatusEntry {
	if (!isRecord(value)) {
		return false;
	}
	return (
		typeof value.version === "string" &&
		(value.state === "installed" || value.state === "not-installed") &&
		(value.dependencies === undefined || isStringArray(value.dependencies))
	);
}

/**
 * Parse status database content. Malformed entries are skipped with a warning.
 */
export function parseStatusDatabase(content: string): StatusDatabase {
	const parsed: unknown = JSON.parse(content);
	const packages: Record<string, StatusEntry> = {};

	if (!isRecord(parsed)) {
		throw new Error("Status database must be a JSON object");
	}

	const statusVersion =
		typeof parsed.statusVersion === "number"
			? parsed.statusVersion
			: STATUS_DB_VERSION;

	if (isRecord(parsed.packages)) {
		for (const [key, value] of Object.entries(parsed.packages)) {
			if (isStatusEntry(value)) {
				packages[key] = value;
			} else {
				console.warn(`Warning: Ignoring malformed status entry for ${key}`);
			}
		}
	}

	return { statusVersion, packages };
}

/**
 * Read the status database. A missing file means nothing is installed.
 */
export async function readStatusDatabase(
	paths: VcpkgPaths,
): Promise<StatusDatabase> {
	const dbPath = getStatusDbPath(paths);

	let content: string;
	try {
		content = await readFile(dbPath, "utf-8");
	} catch (error) {
		if (isNotFound(error)) {
			return { statusVersion: STATUS_DB_VERSION, packages: {} };
		}
		throw error;
	}

	try {
		return parseStatusDatabase(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to parse ${dbPath}: ${message}`);
	}
}

/**
 * Look up the installed binary metadata for a package, or null if the
 * package is not installed.
 */
export function findInstalledBinary(
	db: StatusDatabase,
	spec: PackageSpec,
): BinaryParagraph | null {
	const entry = db.packages[formatPackageSpec(spec)];
	if (!entry || entry.state !== "installed") {
		return null;
	}

	return {
		name: spec.name,
		version: entry.version,
		triplet: spec.triplet,
		dependencies: entry.dependencies ?? [],
	};
}

export function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	);
}
