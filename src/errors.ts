// SPDX-License-Identifier: MIT
// Blueprint Error Types
// Error domain for loading, building, validating and generating

import type { Kind, Position } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Document errors (fatal, before build)
	StructuralError: "StructuralError",
	SchemaViolation: "SchemaViolation",

	// Symbol and reference errors
	UnknownKind: "UnknownKind",
	UnresolvedReference: "UnresolvedReference",
	DuplicateSymbol: "DuplicateSymbol",
	ComponentNotFound: "ComponentNotFound",

	// Field errors
	FormatError: "FormatError",
	TypeMismatch: "TypeMismatch",
	MissingField: "MissingField",
	RangeError: "RangeError",

	// Graph and cross-component errors
	CrossComponentRequirement: "CrossComponentRequirement",
	CycleError: "CycleError",

	// Contract errors
	ContractParseError: "ContractParseError",
	OperationNotFound: "OperationNotFound",

	// Generation and runtime errors
	ArtifactConflict: "ArtifactConflict",
	PathTraversal: "PathTraversal",
	CacheError: "CacheError",
	ConfigError: "ConfigError",
	StageError: "StageError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Diagnostics
//==============================================================================

/** Plain, serialisable view of an error. */
export interface Diagnostic {
	code: ErrorCode;
	message: string;
	componentId?: string;
	path?: string;
	position?: Position;
}

export interface ErrorDetails {
	componentId?: string | undefined;
	/** Dotted path inside the document, for schema violations */
	path?: string | undefined;
	position?: Position | undefined;
	cause?: unknown;
}

//==============================================================================
// Blueprint Error Class
//==============================================================================

export class BlueprintError extends Error {
	readonly code: ErrorCode;
	readonly componentId?: string;
	readonly path?: string;
	readonly position?: Position;

	constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
		super(message, details.cause === undefined ? undefined : { cause: details.cause });
		this.name = "BlueprintError";
		this.code = code;
		// Only set optional properties that have values
		// Required for exactOptionalPropertyTypes compatibility
		if (details.componentId !== undefined) this.componentId = details.componentId;
		if (details.path !== undefined) this.path = details.path;
		if (details.position !== undefined) this.position = details.position;
	}

	/**
	 * Convert to a plain diagnostic record
	 */
	toDiagnostic(): Diagnostic {
		const result: Diagnostic = { code: this.code, message: this.message };
		if (this.componentId !== undefined) result.componentId = this.componentId;
		if (this.path !== undefined) result.path = this.path;
		if (this.position !== undefined) result.position = this.position;
		return result;
	}

	static structural(message: string, position?: Position, cause?: unknown): BlueprintError {
		return new BlueprintError(ErrorCodes.StructuralError, message, { position, cause });
	}

	static schemaViolation(path: string, message: string): BlueprintError {
		return new BlueprintError(ErrorCodes.SchemaViolation, message + " (at " + path + ")", { path });
	}

	static unknownKind(componentId: string, kind: string, position?: Position): BlueprintError {
		return new BlueprintError(
			ErrorCodes.UnknownKind,
			"unknown kind \"" + kind + "\"",
			{ componentId, position },
		);
	}

	/**
	 * Create an UnresolvedReference error, optionally with "did you mean" hints
	 */
	static unresolvedReference(
		reference: string,
		componentId: string,
		suggestions: string[] = [],
		position?: Position,
	): BlueprintError {
		const hint = suggestions.length > 0
			? " (did you mean " + suggestions.map((s) => "\"" + s + "\"").join(", ") + "?)"
			: "";
		return new BlueprintError(
			ErrorCodes.UnresolvedReference,
			"unresolved reference \"" + reference + "\"" + hint,
			{ componentId, position },
		);
	}

	static duplicateSymbol(name: string, existing: string, position?: Position): BlueprintError {
		return new BlueprintError(
			ErrorCodes.DuplicateSymbol,
			"symbol \"" + name + "\" already defined as " + existing,
			{ componentId: name, position },
		);
	}

	static componentNotFound(id: string): BlueprintError {
		return new BlueprintError(ErrorCodes.ComponentNotFound, "component not found: " + id, { componentId: id });
	}

	static format(componentId: string, message: string, position?: Position): BlueprintError {
		return new BlueprintError(ErrorCodes.FormatError, message, { componentId, position });
	}

	/**
	 * Create a TypeMismatch error for a reference resolving to the wrong kind
	 */
	static typeMismatch(
		componentId: string,
		field: string,
		reference: string,
		expected: Kind,
		got: Kind,
		position?: Position,
	): BlueprintError {
		return new BlueprintError(
			ErrorCodes.TypeMismatch,
			field + " reference \"" + reference + "\": expected " + expected + ", got " + got,
			{ componentId, position },
		);
	}

	static missingField(componentId: string, field: string, context?: string, position?: Position): BlueprintError {
		const suffix = context !== undefined ? " (" + context + ")" : "";
		return new BlueprintError(
			ErrorCodes.MissingField,
			"missing required field: " + field + suffix,
			{ componentId, position },
		);
	}

	/** A document-level field such as version or name is empty */
	static missingMetadata(field: string): BlueprintError {
		return new BlueprintError(ErrorCodes.MissingField, "missing required field: " + field, { path: field });
	}

	static range(componentId: string, message: string, position?: Position): BlueprintError {
		return new BlueprintError(ErrorCodes.RangeError, message, { componentId, position });
	}

	static crossComponent(message: string, componentId?: string): BlueprintError {
		return new BlueprintError(ErrorCodes.CrossComponentRequirement, message, { componentId });
	}

	static contractParse(componentId: string, file: string, cause: unknown, position?: Position): BlueprintError {
		const reason = cause instanceof Error ? cause.message : String(cause);
		return new BlueprintError(
			ErrorCodes.ContractParseError,
			"failed to parse API contract \"" + file + "\": " + reason,
			{ componentId, cause, position },
		);
	}

	static operationNotFound(componentId: string, key: string, serverId: string, position?: Position): BlueprintError {
		return new BlueprintError(
			ErrorCodes.OperationNotFound,
			"operation " + key + " not found in \"" + serverId + "\"'s API contract",
			{ componentId, position },
		);
	}

	static pathTraversal(path: string): BlueprintError {
		return new BlueprintError(ErrorCodes.PathTraversal, "unsafe artifact path: " + path, { path });
	}

	static cache(operation: string, cause: unknown): BlueprintError {
		const reason = cause instanceof Error ? cause.message : String(cause);
		return new BlueprintError(ErrorCodes.CacheError, "cache " + operation + " failed: " + reason, { cause });
	}

	static config(path: string, message: string): BlueprintError {
		return new BlueprintError(ErrorCodes.ConfigError, "invalid option " + path + ": " + message, { path });
	}
}

//==============================================================================
// Specialised Errors
//==============================================================================

/** Raised when ordering is requested over a cyclic dependency graph. */
export class CycleError extends BlueprintError {
	readonly cycles: string[][];

	constructor(cycles: string[][]) {
		const first = cycles[0];
		super(
			ErrorCodes.CycleError,
			first === undefined ? "dependency cycle detected" : "dependency cycle detected: " + formatCycle(first),
		);
		this.name = "CycleError";
		this.cycles = cycles;
	}
}

/** Raised when two generators plan the same output path. */
export class ArtifactConflictError extends BlueprintError {
	readonly existingOwner: string;
	readonly incomingOwner: string;

	constructor(path: string, existingOwner: string, incomingOwner: string) {
		super(
			ErrorCodes.ArtifactConflict,
			"artifact path conflict for \"" + path + "\": already planned by \"" + existingOwner +
				"\", attempted by \"" + incomingOwner + "\"",
			{ path },
		);
		this.name = "ArtifactConflictError";
		this.existingOwner = existingOwner;
		this.incomingOwner = incomingOwner;
	}
}

/** Wraps every diagnostic a failed pipeline stage produced. */
export class StageError extends BlueprintError {
	readonly stage: string;
	readonly errors: BlueprintError[];

	constructor(stage: string, message: string, errors: BlueprintError[]) {
		super(ErrorCodes.StageError, message + " (" + String(errors.length) + " error(s))");
		this.name = "StageError";
		this.stage = stage;
		this.errors = errors;
	}
}

/**
 * Render a cycle as a closed loop, e.g. "a -> b -> a".
 */
export function formatCycle(cycle: readonly string[]): string {
	const first = cycle[0];
	if (first === undefined) return "";
	return [...cycle, first].join(" -> ");
}

//==============================================================================
// Validation Results
//==============================================================================

export interface ValidationResult<T> {
	valid: boolean;
	errors: BlueprintError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(errors: BlueprintError[]): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
