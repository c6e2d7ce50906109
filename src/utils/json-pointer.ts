// Blueprint JSON Pointer Utilities
// RFC 6901 pointers, used to follow local "$ref"s inside API contracts
// See: https://www.rfc-editor.org/rfc/rfc6901.html

import { isRecord } from "../type-guards.js";

//==============================================================================
// Types
//==============================================================================

/**
 * Result type for fallible operations
 */
export type Result<T> =
	| { success: true; value: T }
	| { success: false; error: string };

//==============================================================================
// Parsing
//==============================================================================

/**
 * Unescape a reference token from a JSON Pointer
 * Replaces: ~1 → /, ~0 → ~
 */
export function unescapeToken(token: string): string {
	return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Split a local reference ("#/a/b") into decoded tokens.
 *
 * @example
 * parseLocalRef("#/components/schemas/User") // ["components", "schemas", "User"]
 * parseLocalRef("#") // []
 */
export function parseLocalRef(ref: string): Result<string[]> {
	if (!ref.startsWith("#")) {
		return { success: false, error: `Only local references are supported, got "${ref}"` };
	}
	const pointer = ref.slice(1);
	if (pointer === "") {
		return { success: true, value: [] };
	}
	if (!pointer.startsWith("/")) {
		return { success: false, error: `Invalid JSON Pointer "${ref}": must start with "#/"` };
	}
	return { success: true, value: pointer.slice(1).split("/").map(unescapeToken) };
}

//==============================================================================
// Navigation
//==============================================================================

/**
 * Follow a local reference from the document root.
 *
 * @example
 * resolveLocalRef({ a: { b: 1 } }, "#/a/b") // { success: true, value: 1 }
 */
export function resolveLocalRef(root: unknown, ref: string): Result<unknown> {
	const parsed = parseLocalRef(ref);
	if (!parsed.success) {
		return parsed;
	}

	let current: unknown = root;
	for (const token of parsed.value) {
		if (Array.isArray(current)) {
			const index = Number.parseInt(token, 10);
			if (Number.isNaN(index) || index < 0 || index >= current.length) {
				return { success: false, error: `Array index "${token}" out of bounds in "${ref}"` };
			}
			current = current[index];
		} else if (isRecord(current)) {
			if (!(token in current)) {
				return { success: false, error: `Property "${token}" not found in "${ref}"` };
			}
			current = current[token];
		} else {
			return { success: false, error: `Cannot navigate into primitive value at "${token}" in "${ref}"` };
		}
	}

	return { success: true, value: current };
}
