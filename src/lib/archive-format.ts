/**
 * Archive container formats produced through `cmake -E tar`.
 */
export interface ArchiveFormat {
	/** Display name used in progress messages */
	readonly label: string;
	/** File extension of the produced archive (without the dot) */
	readonly extension: string;
	/** Value passed to the archiver's `--format=` selector */
	readonly selector: string;
}

export const ARCHIVE_FORMATS = {
	zip: { label: "zip", extension: "zip", selector: "zip" },
	"7zip": { label: "7zip", extension: "7z", selector: "7zip" },
} as const satisfies Record<string, ArchiveFormat>;

export type ArchiveFormatKey = keyof typeof ARCHIVE_FORMATS;

/**
 * Archive file name for an exported directory, e.g. `export-20240101-120000.7z`
 */
export function getArchiveFileName(
	exportedDirName: string,
	format: ArchiveFormat,
): string {
	return `${exportedDirName}.${format.extension}`;
}
