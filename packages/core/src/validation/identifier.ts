/**
 * Normalise a field name into BigQuery's column character set.
 *
 * Hyphens and dots become underscores and a name starting with a digit
 * gets a leading underscore. The rewrites do not interact, so their
 * order does not matter.
 */
export function sanitizeFieldName(name: string): string {
	const replaced = name.replace(/[-.]/g, "_");
	return /^\d/.test(replaced) ? `_${replaced}` : replaced;
}
