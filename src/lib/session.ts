import { join } from "node:path";
import { createExportId } from "./export-id";

export type ArtifactKind = "raw" | "nuget" | "zip" | "7zip" | "ifw";

export interface ExportArtifact {
	kind: ArtifactKind;
	path: string;
}

/**
 * State of one export invocation. The artifact list is for reporting only;
 * nothing is rolled back from it.
 */
export interface ExportSession {
	readonly id: string;
	readonly outputDir: string;
	/** `<outputDir>/<id>` */
	readonly stagingDir: string;
	readonly artifacts: ExportArtifact[];
}

export function createExportSession(
	outputDir: string,
	now: Date = new Date(),
): ExportSession {
	const id = createExportId(now);
	return {
		id,
		outputDir,
		stagingDir: join(outputDir, id),
		artifacts: [],
	};
}

export function recordArtifact(
	session: ExportSession,
	kind: ArtifactKind,
	path: string,
): void {
	session.artifacts.push({ kind, path });
}
