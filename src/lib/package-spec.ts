/**
 * A package instance: one port built for one triplet.
 * e.g., "zlib:x64-windows"
 */
export interface PackageSpec {
	readonly name: string;
	readonly triplet: string;
}

/**
 * Package specifier regex pattern
 * Matches: {port}[:{triplet}]
 *
 * Group 1: port name
 * Group 2: optional triplet
 */
const PACKAGE_SPEC_PATTERN = /^([a-z0-9-]+)(?::([a-z0-9-]+))?$/;

/**
 * Triplet names follow the same character rules as port names.
 */
const TRIPLET_PATTERN = /^[a-z0-9-]+$/;

/**
 * Create an immutable package spec.
 */
export function createPackageSpec(name: string, triplet: string): PackageSpec {
	return Object.freeze({ name, triplet });
}

/**
 * Parse a package specifier from the command line.
 *
 * Input is case-insensitive and normalized to lowercase. A specifier without
 * a triplet gets the default triplet.
 *
 * @returns Parsed spec or null if invalid
 *
 * @example
 * ```typescript
 * parsePackageSpec("zlib", "x64-windows")
 * // => { name: "zlib", triplet: "x64-windows" }
 *
 * parsePackageSpec("Boost:x64-Linux", "x64-windows")
 * // => { name: "boost", triplet: "x64-linux" }
 * ```
 */
export function parsePackageSpec(
	input: string,
	defaultTriplet: string,
): PackageSpec | null {
	const match = input.trim().toLowerCase().match(PACKAGE_SPEC_PATTERN);
	if (!match) {
		return null;
	}

	const [, name, triplet] = match;
	if (!name) {
		return null;
	}

	const resolvedTriplet = triplet ?? defaultTriplet.toLowerCase();
	if (!TRIPLET_PATTERN.test(resolvedTriplet)) {
		return null;
	}

	return createPackageSpec(name, resolvedTriplet);
}

/**
 * Resolve a dependency entry (`zlib`, `zlib[core]`, `zlib:x64-linux`) against
 * the dependent's triplet. Feature lists are dropped.
 */
export function parseDependencySpec(
	dependency: string,
	triplet: string,
): PackageSpec | null {
	return parsePackageSpec(dependency.replace(/\[[^\]]*\]/g, ""), triplet);
}

/**
 * Canonical string form, used for display, ordering and equality.
 */
export function formatPackageSpec(spec: PackageSpec): string {
	return `${spec.name}:${spec.triplet}`;
}

/**
 * Compare by canonical string form (ascending, code-unit order).
 */
export function comparePackageSpecs(a: PackageSpec, b: PackageSpec): number {
	const left = formatPackageSpec(a);
	const right = formatPackageSpec(b);
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}

/**
 * Directory name of a built package under `packages/`
 */
export function getPackageDirName(spec: PackageSpec): string {
	return `${spec.name}_${spec.triplet}`;
}
