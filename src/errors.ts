/**
 * Base error class for every failure the export pipeline reports
 */
export class ExportError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ExportError";
	}
}

/**
 * Errors caused by bad command-line input. The command prints usage
 * text after the message.
 */
export class UserInputError extends ExportError {
	constructor(message: string) {
		super(message);
		this.name = "UserInputError";
	}
}

export class NoFormatSelectedError extends UserInputError {
	constructor() {
		super(
			"Must provide at least one export type: --raw --nuget --ifw --zip --7zip",
		);
		this.name = "NoFormatSelectedError";
	}
}

export class NoPackagesRequestedError extends UserInputError {
	constructor() {
		super("Must provide at least one package to export");
		this.name = "NoPackagesRequestedError";
	}
}

export class OptionRequiresFormatError extends UserInputError {
	constructor(
		public readonly option: string,
		public readonly format: string,
	) {
		super(`${option} is only valid with ${format}`);
		this.name = "OptionRequiresFormatError";
	}
}

export class InvalidPackageSpecError extends UserInputError {
	constructor(public readonly input: string) {
		super(
			`Invalid package specification "${input}". Expected <port> or <port>:<triplet>`,
		);
		this.name = "InvalidPackageSpecError";
	}
}

export class UnknownTripletError extends UserInputError {
	constructor(
		public readonly triplet: string,
		public readonly available: string[],
	) {
		super(`Invalid triplet: ${triplet}${formatTripletListing(available)}`);
		this.name = "UnknownTripletError";
	}
}

export class InvalidOptionValueError extends UserInputError {
	constructor(
		public readonly option: string,
		public readonly value: string,
		reason: string,
	) {
		super(`Invalid value "${value}" for ${option}: ${reason}`);
		this.name = "InvalidOptionValueError";
	}
}

export class UnknownPortError extends UserInputError {
	constructor(public readonly port: string) {
		super(`Could not locate port "${port}" in the ports directory`);
		this.name = "UnknownPortError";
	}
}

/**
 * Requested packages (or their dependencies) have not been built yet.
 * `remediation` is the ready-to-copy build command.
 */
export class UnbuiltDependencyError extends ExportError {
	constructor(
		public readonly unbuilt: string[],
		public readonly remediation: string,
	) {
		super("There are packages that have not been built.");
		this.name = "UnbuiltDependencyError";
	}
}

/**
 * A collaborator broke its contract (empty plan, unbuilt action handed to
 * staging). These are programming errors, not user errors.
 */
export class PlanContractError extends ExportError {
	constructor(message: string) {
		super(message);
		this.name = "PlanContractError";
	}
}

export class EmptyExportPlanError extends PlanContractError {
	constructor() {
		super("Export plan cannot be empty");
		this.name = "EmptyExportPlanError";
	}
}

/**
 * Filesystem failures while assembling the staging tree
 */
export class StagingError extends ExportError {
	constructor(message: string, cause?: unknown) {
		super(
			cause === undefined ? message : `${message}: ${describeCause(cause)}`,
			cause === undefined ? undefined : { cause },
		);
		this.name = "StagingError";
	}
}

export class StagingPrepareFailedError extends StagingError {
	constructor(
		public readonly path: string,
		cause?: unknown,
	) {
		super(`Failed to prepare staging directory ${path}`, cause);
		this.name = "StagingPrepareFailedError";
	}
}

export class InstallReplayFailedError extends StagingError {
	constructor(
		public readonly spec: string,
		cause?: unknown,
	) {
		super(`Failed to export package ${spec}`, cause);
		this.name = "InstallReplayFailedError";
	}
}

export class IntegrationCopyFailedError extends StagingError {
	constructor(
		public readonly file: string,
		cause?: unknown,
	) {
		super(`Failed to copy integration file ${file}`, cause);
		this.name = "IntegrationCopyFailedError";
	}
}

/**
 * A packaging tool (archiver, NuGet, IFW) exited with a non-zero status.
 * An exit code of -1 means the tool could not be started.
 */
export class ExternalToolError extends ExportError {
	constructor(
		message: string,
		public readonly exitCode: number,
	) {
		super(`${message} (exit code ${exitCode})`);
		this.name = "ExternalToolError";
	}
}

export class ArchiveFailedError extends ExternalToolError {
	constructor(
		public readonly format: string,
		public readonly archivePath: string,
		exitCode: number,
	) {
		super(`${format} archive creation failed: ${archivePath}`, exitCode);
		this.name = "ArchiveFailedError";
	}
}

export class NugetPackFailedError extends ExternalToolError {
	constructor(exitCode: number) {
		super("NuGet package creation failed", exitCode);
		this.name = "NugetPackFailedError";
	}
}

export class InstallerBuildFailedError extends ExternalToolError {
	constructor(
		public readonly step: string,
		exitCode: number,
	) {
		super(`IFW installer ${step} failed`, exitCode);
		this.name = "InstallerBuildFailedError";
	}
}

function formatTripletListing(available: string[]): string {
	if (available.length === 0) {
		return "";
	}
	return `\nAvailable architecture triplets:\n${available.map((t) => `  ${t}`).join("\n")}`;
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
