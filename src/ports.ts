/**
 * Port manifest access (`ports/<name>/vcpkg.json`).
 *
 * Only the fields the export plan needs are read: the port name, its
 * version and its dependencies.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { VcpkgPaths } from "./config";
import { isRecord } from "./lib/index";
import { isNotFound } from "./status-db";

export interface PortManifest {
	name: string;
	version?: string;
	dependencies: string[];
}

/**
 * Anything that can look up a port by name
 */
export interface PortProvider {
	getPort(name: string): Promise<PortManifest | null>;
}

function readDependencyName(dependency: unknown): string | null {
	if (typeof dependency === "string") {
		return dependency;
	}
	if (isRecord(dependency) && typeof dependency.name === "string") {
		return dependency.name;
	}
	return null;
}

/**
 * Parse a port manifest. Dependencies may be plain names or objects with a
 * `name` field; both are reduced to names.
 */
export function parsePortManifest(
	content: string,
	fallbackName: string,
): PortManifest {
	const parsed: unknown = JSON.parse(content);
	if (!isRecord(parsed)) {
		throw new Error(`Manifest of port ${fallbackName} must be a JSON object`);
	}

	const dependencies: string[] = [];
	if (Array.isArray(parsed.dependencies)) {
		for (const dependency of parsed.dependencies) {
			const name = readDependencyName(dependency);
			if (name) {
				dependencies.push(name.toLowerCase());
			}
		}
	}

	return {
		name: typeof parsed.name === "string" ? parsed.name : fallbackName,
		version:
			typeof parsed.version === "string"
				? parsed.version
				: typeof parsed["version-string"] === "string"
					? parsed["version-string"]
					: undefined,
		dependencies,
	};
}

/**
 * Port provider reading manifests from the `ports/` directory, caching each
 * lookup.
 */
export function createPortsDirectoryProvider(paths: VcpkgPaths): PortProvider {
	const cache = new Map<string, PortManifest | null>();

	return {
		async getPort(name: string): Promise<PortManifest | null> {
			const cached = cache.get(name);
			if (cached !== undefined) {
				return cached;
			}

			const manifestPath = join(paths.ports, name, "vcpkg.json");
			let manifest: PortManifest | null;
			try {
				const content = await readFile(manifestPath, "utf-8");
				manifest = parsePortManifest(content, name);
			} catch (error) {
				if (!isNotFound(error)) {
					const message = error instanceof Error ? error.message : String(error);
					throw new Error(`Failed to read ${manifestPath}: ${message}`);
				}
				manifest = null;
			}

			cache.set(name, manifest);
			return manifest;
		},
	};
}
