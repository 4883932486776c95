/**
 * Qt Installer Framework (IFW) file templates.
 *
 * Component names form the installer's tree through their dots:
 * `packages` > `packages.zlib` > `packages.zlib.x64-windows`.
 */

import { type PackageSpec, parseDependencySpec } from "./package-spec";
import { escapeXml } from "./xml";

export const IFW_INSTALLER_NAME = "vcpkg";
export const IFW_INSTALLER_VERSION = "1.0.0";
export const IFW_TARGET_DIR = "@RootDir@/src/vcpkg";

export const PACKAGES_COMPONENT = "packages";
export const INTEGRATION_COMPONENT = "integration";

export interface IfwComponent {
	name: string;
	displayName: string;
	version: string;
	releaseDate: string;
	/** Components installed along with this one */
	dependencies?: string[];
	/** Selected by default in the installer */
	selectedByDefault?: boolean;
}

export function getPortComponentName(portName: string): string {
	return `${PACKAGES_COMPONENT}.${portName}`;
}

export function getSpecComponentName(spec: PackageSpec): string {
	return `${getPortComponentName(spec.name)}.${spec.triplet}`;
}

/**
 * Component names of a package's dependencies for the same triplet
 */
export function getDependencyComponentNames(
	dependencies: readonly string[],
	triplet: string,
): string[] {
	const names: string[] = [];
	for (const dependency of dependencies) {
		const spec = parseDependencySpec(dependency, triplet);
		if (spec) {
			names.push(getSpecComponentName(spec));
		}
	}
	return names;
}

/**
 * IFW release dates are `YYYY-MM-DD`
 */
export function formatReleaseDate(date: Date): string {
	const month = String(date.getMonth() + 1).padStart(2, "0");
	const day = String(date.getDate()).padStart(2, "0");
	return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * `meta/package.xml` of one component
 */
export function createPackageXml(component: IfwComponent): string {
	const lines = [
		'<?xml version="1.0"?>',
		"<Package>",
		`    <DisplayName>${escapeXml(component.displayName)}</DisplayName>`,
		`    <Version>${escapeXml(component.version)}</Version>`,
		`    <ReleaseDate>${escapeXml(component.releaseDate)}</ReleaseDate>`,
	];

	if (component.dependencies && component.dependencies.length > 0) {
		lines.push(
			`    <Dependencies>${escapeXml(component.dependencies.join(","))}</Dependencies>`,
		);
	}
	if (component.selectedByDefault) {
		lines.push("    <Default>true</Default>");
	}

	lines.push("</Package>", "");
	return lines.join("\n");
}

/**
 * Installer `config.xml`. A repository URL makes the installer fetch its
 * components from that remote repository.
 */
export function createConfigXml(repositoryUrl?: string): string {
	const lines = [
		'<?xml version="1.0"?>',
		"<Installer>",
		`    <Name>${IFW_INSTALLER_NAME}</Name>`,
		`    <Version>${IFW_INSTALLER_VERSION}</Version>`,
		`    <TargetDir>${IFW_TARGET_DIR}</TargetDir>`,
	];

	if (repositoryUrl) {
		lines.push(
			"    <RemoteRepositories>",
			"        <Repository>",
			`            <Url>${escapeXml(repositoryUrl)}</Url>`,
			"        </Repository>",
			"    </RemoteRepositories>",
		);
	}

	lines.push("</Installer>", "");
	return lines.join("\n");
}
