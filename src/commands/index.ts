export {
	collectRawOptions,
	createExportContext,
	type ExportCommandOptions,
	exportCommand,
	formatExportError,
	registerExportOptions,
} from "./export";
