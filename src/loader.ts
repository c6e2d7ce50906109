// SPDX-License-Identifier: MIT
// Blueprint Document Loader
//
// Reads one YAML or JSON specification document into an untyped tree and
// records where each component starts, for diagnostics. JSON goes through
// the same YAML parser.

import { readFileSync } from "node:fs";
import { load, YAMLException } from "js-yaml";
import { BlueprintError } from "./errors.js";
import { isRecord } from "./type-guards.js";
import type { Position } from "./types.js";

export interface LoadedDocument {
	file: string;
	data: Record<string, unknown>;
	/** Position of the document root */
	position: Position;
	/** Start of each entry of `components`, by index */
	componentPositions: (Position | undefined)[];
}

/**
 * Parse document text.
 * @throws BlueprintError (StructuralError) for unparseable text or a non-mapping root
 */
export function loadDocument(text: string, file = "<inline>"): LoadedDocument {
	const positions = new Map<object, Position>();
	const open: Position[] = [];

	let data: unknown;
	try {
		data = load(text, {
			filename: file,
			listener(event, state) {
				if (event === "open") {
					open.push({
						file,
						line: state.line + 1,
						column: state.position - state.lineStart + 1,
					});
					return;
				}
				const start = open.pop();
				const result: unknown = state.result;
				if (start !== undefined && typeof result === "object" && result !== null && !positions.has(result)) {
					positions.set(result, start);
				}
			},
		});
	} catch (err) {
		if (err instanceof YAMLException) {
			const position = { file, line: err.mark.line + 1, column: err.mark.column + 1 };
			throw BlueprintError.structural("malformed document: " + err.reason, position, err);
		}
		throw err;
	}

	const root = { file, line: 1, column: 1 };
	if (data === undefined || data === null) {
		throw BlueprintError.structural("document is empty", root);
	}
	if (!isRecord(data)) {
		throw BlueprintError.structural("document root must be a mapping", root);
	}

	const components = data.components;
	const componentPositions = Array.isArray(components)
		? components.map((entry: unknown) => (typeof entry === "object" && entry !== null ? positions.get(entry) : undefined))
		: [];

	return { file, data, position: root, componentPositions };
}

/**
 * Read and parse a document from disk.
 */
export function loadDocumentFile(path: string): LoadedDocument {
	let text: string;
	try {
		text = readFileSync(path, "utf8");
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw BlueprintError.structural("cannot read " + path + ": " + reason, undefined, err);
	}
	return loadDocument(text, path);
}
