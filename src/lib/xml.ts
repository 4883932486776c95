const XML_ENTITIES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
};

/**
 * Escape a value for use in XML text or a double-quoted attribute
 */
export function escapeXml(value: string): string {
	return value.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char);
}
