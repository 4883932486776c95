export { type ArchivePackagerDeps, exportArchive } from "./archive";
export { printNextStepInfo } from "./hints";
export {
	exportIfw,
	getIfwPaths,
	type IfwPackagerDeps,
	type IfwPaths,
	type InstallerBuilder,
	writeIfwComponents,
} from "./ifw";
export {
	exportNuget,
	getNugetScratchDir,
	type NugetExportResult,
	type NugetPackagerDeps,
} from "./nuget";
export { exportRaw } from "./raw";
