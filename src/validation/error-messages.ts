// SPDX-License-Identifier: MIT
// Diagnostic Formatting and Suggestions
//
// Renders diagnostics for people and proposes near-miss names for
// unresolved references.

import type { BlueprintError, Diagnostic } from "../errors.js";
import { compareIds } from "../ir/ir.js";

//==============================================================================
// Formatting
//==============================================================================

/**
 * Render a diagnostic on one line:
 *   file:line:col: component: message [Code]
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	const parts: string[] = [];
	if (diagnostic.position !== undefined) {
		const { file, line, column } = diagnostic.position;
		parts.push(`${file}:${line}:${column}`);
	}
	if (diagnostic.componentId !== undefined) {
		parts.push(diagnostic.componentId);
	}
	parts.push(diagnostic.message);
	return `${parts.join(": ")} [${diagnostic.code}]`;
}

/**
 * Sort errors by component ID, then message. Errors without a component
 * (document-level rules) come first. Returns a new array.
 */
export function sortDiagnostics<E extends BlueprintError>(errors: readonly E[]): E[] {
	return [...errors].sort((a, b) => {
		const byId = compareIds(a.componentId ?? "", b.componentId ?? "");
		return byId !== 0 ? byId : compareIds(a.message, b.message);
	});
}

//==============================================================================
// Similarity Helpers
//==============================================================================

/**
 * Find names similar to the given name using Levenshtein distance.
 */
export function suggestSimilar(name: string, candidates: readonly string[]): string[] {
	const threshold = 3; // Maximum edit distance for "similar"
	const similar: { name: string; distance: number }[] = [];

	for (const candidate of candidates) {
		const distance = levenshteinDistance(name, candidate);
		if (distance <= threshold && distance < name.length) {
			similar.push({ name: candidate, distance });
		}
	}

	return similar
		.sort((a, b) => a.distance - b.distance || compareIds(a.name, b.name))
		.map((s) => s.name)
		.slice(0, 3);
}

/**
 * Calculate Levenshtein distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
	const aLen = a.length;
	const bLen = b.length;

	if (aLen === 0) return bLen;
	if (bLen === 0) return aLen;

	// Two rows of the distance matrix are enough
	let prevRow: number[] = Array.from({ length: aLen + 1 }, (_, i) => i);
	let currRow: number[] = new Array<number>(aLen + 1).fill(0);

	for (let i = 1; i <= bLen; i++) {
		currRow[0] = i;
		for (let j = 1; j <= aLen; j++) {
			const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
			const substitution = (prevRow[j - 1] ?? 0) + cost;
			const insertion = (currRow[j - 1] ?? 0) + 1;
			const deletion = (prevRow[j] ?? 0) + 1;
			currRow[j] = Math.min(substitution, insertion, deletion);
		}
		const temp = prevRow;
		prevRow = currRow;
		currRow = temp;
	}

	return prevRow[aLen] ?? aLen;
}
