/**
 * Export model - pure types and helpers shared by the export pipeline
 *
 * Nothing in this module touches the filesystem or spawns processes.
 */

// Archive formats
export {
	ARCHIVE_FORMATS,
	type ArchiveFormat,
	type ArchiveFormatKey,
	getArchiveFileName,
} from "./archive-format";
// Session identifiers
export { createExportId } from "./export-id";
// Command options
export {
	EXPORT_EXAMPLE,
	EXPORT_SETTINGS,
	EXPORT_SWITCHES,
	type ExportFormat,
	type ExportOptions,
	type IfwOptions,
	needsStagedTree,
	type NugetOptions,
	parseExportOptions,
	type RawOptionValues,
	type SettingDescriptor,
	type SwitchDescriptor,
} from "./export-options";
// Plan classification and reporting
export {
	type AlreadyBuiltAction,
	assertAllBuilt,
	type BinaryParagraph,
	type ExportAction,
	type ExportPlanGroups,
	type ExportPlanType,
	formatBuildCommand,
	getBinaryFullStem,
	groupByPlanType,
	hasTransitivePackages,
	isAlreadyBuilt,
	type NotBuiltAction,
	PLAN_TYPE_ORDER,
	type RequestType,
	renderPlan,
	TRANSITIVE_FOOTNOTE,
	TRANSITIVE_WARNING,
} from "./export-plan";
// Runtime type guards
export { isRecord, isStringArray } from "./guards";
// IFW templates
export {
	createConfigXml,
	createPackageXml,
	formatReleaseDate,
	getDependencyComponentNames,
	getPortComponentName,
	getSpecComponentName,
	type IfwComponent,
	IFW_TARGET_DIR,
	INTEGRATION_COMPONENT,
	PACKAGES_COMPONENT,
} from "./ifw";
// NuGet templates
export {
	createNuspec,
	createTargetsRedirect,
	DEFAULT_NUGET_VERSION,
	type NuspecInput,
	TARGETS_REDIRECT_TARGET,
} from "./nuget";
// Package specs
export {
	comparePackageSpecs,
	createPackageSpec,
	formatPackageSpec,
	getPackageDirName,
	type PackageSpec,
	parseDependencySpec,
	parsePackageSpec,
} from "./package-spec";
// Export sessions
export {
	type ArtifactKind,
	createExportSession,
	type ExportArtifact,
	type ExportSession,
	recordArtifact,
} from "./session";
// XML
export { escapeXml } from "./xml";
