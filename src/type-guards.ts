// Blueprint Type Guard Utilities
// Narrowing helpers for reading untyped document maps without type assertions

/**
 * Check that a value is a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a string field; anything else reads as "".
 */
export function readString(spec: Record<string, unknown>, key: string): string {
	const value = spec[key];
	return typeof value === "string" ? value : "";
}

/**
 * Read an integer field; fractional numbers are truncated, anything else reads as 0.
 */
export function readInteger(spec: Record<string, unknown>, key: string): number {
	const value = spec[key];
	return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : 0;
}

/**
 * Read a list of strings.
 *
 * An absent or non-list field reads as undefined, so callers can tell
 * "not specified" from "explicitly empty". Non-string items are dropped.
 */
export function readStringList(spec: Record<string, unknown>, key: string): string[] | undefined {
	const value = spec[key];
	if (!Array.isArray(value)) return undefined;
	return value.filter((item): item is string => typeof item === "string");
}
