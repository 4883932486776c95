import { valid as isValidVersion } from "semver";
import {
	InvalidOptionValueError,
	InvalidPackageSpecError,
	NoFormatSelectedError,
	NoPackagesRequestedError,
	OptionRequiresFormatError,
} from "../errors";
import { type PackageSpec, parsePackageSpec } from "./package-spec";

// =============================================================================
// Types
// =============================================================================

export type ExportFormat = "raw" | "nuget" | "ifw" | "zip" | "7zip";

export interface NugetOptions {
	readonly id?: string;
	readonly version?: string;
}

export interface IfwOptions {
	readonly repositoryUrl?: string;
	readonly packagesDirPath?: string;
	readonly repositoryDirPath?: string;
	readonly configFilePath?: string;
	readonly installerFilePath?: string;
}

/**
 * Parsed, validated input of one export invocation
 */
export interface ExportOptions {
	readonly specs: readonly PackageSpec[];
	readonly formats: ReadonlySet<ExportFormat>;
	readonly dryRun: boolean;
	readonly nuget: NugetOptions;
	readonly ifw: IfwOptions;
}

/**
 * Option values keyed by flag (e.g. `"--nuget-id"`). Switches are `true`
 * when present; settings carry their string value.
 */
export type RawOptionValues = Readonly<
	Record<string, string | boolean | undefined>
>;

export interface SwitchDescriptor {
	readonly flag: string;
	readonly description: string;
	/** Output format enabled by the switch; absent for `--dry-run` */
	readonly format?: ExportFormat;
}

export interface SettingDescriptor {
	readonly flag: string;
	readonly description: string;
	/** Switch that must be present for this setting to be accepted */
	readonly requires: string;
}

// =============================================================================
// Descriptors
// =============================================================================

export const OPTION_DRY_RUN = "--dry-run";
export const OPTION_RAW = "--raw";
export const OPTION_NUGET = "--nuget";
export const OPTION_IFW = "--ifw";
export const OPTION_ZIP = "--zip";
export const OPTION_SEVEN_ZIP = "--7zip";
export const OPTION_NUGET_ID = "--nuget-id";
export const OPTION_NUGET_VERSION = "--nuget-version";
export const OPTION_IFW_REPOSITORY_URL = "--ifw-repository-url";
export const OPTION_IFW_PACKAGES_DIR_PATH = "--ifw-packages-directory-path";
export const OPTION_IFW_REPOSITORY_DIR_PATH = "--ifw-repository-directory-path";
export const OPTION_IFW_CONFIG_FILE_PATH = "--ifw-configuration-file-path";
export const OPTION_IFW_INSTALLER_FILE_PATH = "--ifw-installer-file-path";

export const EXPORT_SWITCHES: readonly SwitchDescriptor[] = [
	{ flag: OPTION_DRY_RUN, description: "Do not actually export" },
	{
		flag: OPTION_RAW,
		description: "Export to an uncompressed directory",
		format: "raw",
	},
	{ flag: OPTION_NUGET, description: "Export a NuGet package", format: "nuget" },
	{
		flag: OPTION_IFW,
		description: "Export to an IFW-based installer",
		format: "ifw",
	},
	{ flag: OPTION_ZIP, description: "Export to a zip file", format: "zip" },
	{
		flag: OPTION_SEVEN_ZIP,
		description: "Export to a 7zip (.7z) file",
		format: "7zip",
	},
];

export const EXPORT_SETTINGS: readonly SettingDescriptor[] = [
	{
		flag: OPTION_NUGET_ID,
		description: "Specify the id for the exported NuGet package",
		requires: OPTION_NUGET,
	},
	{
		flag: OPTION_NUGET_VERSION,
		description: "Specify the version for the exported NuGet package",
		requires: OPTION_NUGET,
	},
	{
		flag: OPTION_IFW_REPOSITORY_URL,
		description: "Specify the remote repository URL for the online installer",
		requires: OPTION_IFW,
	},
	{
		flag: OPTION_IFW_PACKAGES_DIR_PATH,
		description: "Specify the temporary directory path for the repacked files",
		requires: OPTION_IFW,
	},
	{
		flag: OPTION_IFW_REPOSITORY_DIR_PATH,
		description: "Specify the directory path for the exported repository",
		requires: OPTION_IFW,
	},
	{
		flag: OPTION_IFW_CONFIG_FILE_PATH,
		description: "Specify the temporary file path for the installer configuration",
		requires: OPTION_IFW,
	},
	{
		flag: OPTION_IFW_INSTALLER_FILE_PATH,
		description: "Specify the file path for the exported installer",
		requires: OPTION_IFW,
	},
];

export const EXPORT_EXAMPLE =
	"Example:\n  vcpkg-export zlib zlib:x64-windows boost --nuget\n";

/**
 * NuGet package ids: dot- or dash-separated word characters
 */
const NUGET_ID_PATTERN = /^\w+(?:[.-]\w+)*$/;

// =============================================================================
// Parsing
// =============================================================================

function readSwitch(raw: RawOptionValues, flag: string): boolean {
	return raw[flag] === true;
}

function readSetting(raw: RawOptionValues, flag: string): string | undefined {
	const value = raw[flag];
	return typeof value === "string" ? value : undefined;
}

/**
 * Read the settings owned by a switch. When the switch is absent, any of its
 * settings being present is an error.
 */
function readOwnedSettings(
	raw: RawOptionValues,
	owner: string,
): Map<string, string> {
	const enabled = readSwitch(raw, owner);
	const values = new Map<string, string>();

	for (const setting of EXPORT_SETTINGS) {
		if (setting.requires !== owner) continue;

		const value = readSetting(raw, setting.flag);
		if (value === undefined) continue;

		if (!enabled) {
			throw new OptionRequiresFormatError(setting.flag, owner);
		}
		values.set(setting.flag, value);
	}

	return values;
}

function parseNugetOptions(raw: RawOptionValues): NugetOptions {
	const values = readOwnedSettings(raw, OPTION_NUGET);
	const id = values.get(OPTION_NUGET_ID);
	const version = values.get(OPTION_NUGET_VERSION);

	if (id !== undefined && !NUGET_ID_PATTERN.test(id)) {
		throw new InvalidOptionValueError(
			OPTION_NUGET_ID,
			id,
			"package ids may only contain letters, digits, '_', '.' and '-'",
		);
	}

	if (version !== undefined && !isValidVersion(version)) {
		throw new InvalidOptionValueError(
			OPTION_NUGET_VERSION,
			version,
			"expected a semantic version such as 1.0.0",
		);
	}

	return { id, version };
}

function parseIfwOptions(raw: RawOptionValues): IfwOptions {
	const values = readOwnedSettings(raw, OPTION_IFW);
	return {
		repositoryUrl: values.get(OPTION_IFW_REPOSITORY_URL),
		packagesDirPath: values.get(OPTION_IFW_PACKAGES_DIR_PATH),
		repositoryDirPath: values.get(OPTION_IFW_REPOSITORY_DIR_PATH),
		configFilePath: values.get(OPTION_IFW_CONFIG_FILE_PATH),
		installerFilePath: values.get(OPTION_IFW_INSTALLER_FILE_PATH),
	};
}

/**
 * Parse positional arguments and option values into export options.
 *
 * Pure: no filesystem access. Triplet existence is checked later against
 * the triplets directory.
 *
 * @param args - Package specifiers (`<port>` or `<port>:<triplet>`)
 * @param raw - Option values keyed by flag
 * @param defaultTriplet - Triplet used for specifiers without one
 */
export function parseExportOptions(
	args: readonly string[],
	raw: RawOptionValues,
	defaultTriplet: string,
): ExportOptions {
	const specs = args.map((arg) => {
		const spec = parsePackageSpec(arg, defaultTriplet);
		if (!spec) {
			throw new InvalidPackageSpecError(arg);
		}
		return spec;
	});

	const dryRun = readSwitch(raw, OPTION_DRY_RUN);
	const formats = new Set<ExportFormat>();
	for (const descriptor of EXPORT_SWITCHES) {
		if (descriptor.format && readSwitch(raw, descriptor.flag)) {
			formats.add(descriptor.format);
		}
	}

	if (formats.size === 0 && !dryRun) {
		throw new NoFormatSelectedError();
	}

	const nuget = parseNugetOptions(raw);
	const ifw = parseIfwOptions(raw);

	if (specs.length === 0 && !dryRun) {
		throw new NoPackagesRequestedError();
	}

	return { specs, formats, dryRun, nuget, ifw };
}

/**
 * Whether the staged tree is needed (every format except IFW packages it)
 */
export function needsStagedTree(options: ExportOptions): boolean {
	return (
		options.formats.has("raw") ||
		options.formats.has("nuget") ||
		options.formats.has("zip") ||
		options.formats.has("7zip")
	);
}
