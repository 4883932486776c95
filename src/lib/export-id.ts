const EXPORT_ID_PREFIX = "export-";

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

/**
 * Create the identifier of one export invocation from a timestamp.
 * Format: `export-YYYYMMDD-HHMMSS` (local time).
 *
 * Two invocations within the same second share an identifier.
 */
export function createExportId(date: Date): string {
	const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${EXPORT_ID_PREFIX}${day}-${time}`;
}

