// Blueprint Document Validator
// Two layers before the IR exists: Zod safeParse for structure, then flat
// semantic checks. Post-build rules live in validation/ir-rules.ts.

import { z } from "zod/v4";
import {
	BlueprintError,
	invalidResult,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type { LoadedDocument } from "./loader.js";
import { isRecord } from "./type-guards.js";
import type { Position, RawComponent, RawDocument } from "./types.js";
import { sortDiagnostics } from "./validation/error-messages.js";
import { DocumentSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-BlueprintError Conversion
//==============================================================================

function zodToSchemaViolations(error: z.ZodError): BlueprintError[] {
	return error.issues.map(issue =>
		BlueprintError.schemaViolation(issue.path.map(String).join(".") || "$", issue.message),
	);
}

//==============================================================================
// Schema Layer
//==============================================================================

/**
 * Check the shape of a parsed document and convert it to a RawDocument.
 * Component positions are re-attached by index.
 *
 * Failures are fatal for the compile: the builder must not run on a
 * document that did not pass this layer.
 */
export function validateSchema(
	data: unknown,
	componentPositions: readonly (Position | undefined)[] = [],
	position?: Position,
): ValidationResult<RawDocument> {
	if (!isRecord(data)) {
		return invalidResult([BlueprintError.structural("document root must be a mapping", position)]);
	}

	const parsed = DocumentSchema.safeParse(data);
	if (!parsed.success) {
		return invalidResult(zodToSchemaViolations(parsed.error));
	}

	const components: RawComponent[] = parsed.data.components.map((c, index) => ({
		id: c.id,
		kind: c.kind,
		spec: c.spec,
		position: componentPositions[index],
	}));

	const doc: RawDocument = {
		version: parsed.data.version ?? "",
		name: parsed.data.name ?? "",
		components,
		position,
	};
	if (parsed.data.description !== undefined) doc.description = parsed.data.description;

	return validResult(doc);
}

/**
 * Schema layer over a loaded document, carrying its source positions.
 */
export function validateLoaded(loaded: LoadedDocument): ValidationResult<RawDocument> {
	return validateSchema(loaded.data, loaded.componentPositions, loaded.position);
}

//==============================================================================
// Semantic Layer
//==============================================================================

/**
 * Flat checks over the raw document: component IDs are unique and the
 * document carries a version and a name. One DuplicateSymbol per repeat.
 */
export function validateSemantics(doc: RawDocument): ValidationResult<RawDocument> {
	const errors: BlueprintError[] = [];
	const seen = new Map<string, string>();

	for (const component of doc.components) {
		const existing = seen.get(component.id);
		if (existing !== undefined) {
			errors.push(BlueprintError.duplicateSymbol(component.id, existing, component.position));
			continue;
		}
		seen.set(component.id, component.kind);
	}

	if (doc.version === "") errors.push(BlueprintError.missingMetadata("version"));
	if (doc.name === "") errors.push(BlueprintError.missingMetadata("name"));

	return errors.length > 0 ? invalidResult(sortDiagnostics(errors)) : validResult(doc);
}
