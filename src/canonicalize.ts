// SPDX-License-Identifier: MIT
// Blueprint Content Hashing (JCS Profile)
// RFC 8785 (JSON Canonicalization Scheme) serialization of the semantic
// content of a specification and of each component, and SHA-256 digests
// over it. Source positions, resolved edges and parsed contracts never
// take part in a hash.

import { createHash, type Hash } from "node:crypto";
import { exhaustive } from "./errors.js";
import { compareIds, type IR } from "./ir/ir.js";
import { isRecord } from "./type-guards.js";
import type { Component } from "./types.js";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

/** Serialize a number per RFC 8785 / ECMAScript Number.toString(). */
function jcsNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw new Error(`JCS: non-finite number ${value} cannot be serialized`);
	}
	if (Object.is(value, -0)) return "0";
	return JSON.stringify(value);
}

/** Serialize an object with keys sorted by UTF-16 code unit comparison. */
function jcsObject(obj: Record<string, unknown>): string {
	const keys = Object.keys(obj).sort();
	const entries: string[] = [];
	for (const key of keys) {
		const val = obj[key];
		// Absent fields are omitted, which keeps "absent" apart from []
		if (val === undefined) continue;
		entries.push(JSON.stringify(key) + ":" + jcsSerialize(val));
	}
	return "{" + entries.join(",") + "}";
}

/**
 * Serialize a JSON value to its RFC 8785 canonical form.
 *
 * - Objects: keys sorted by UTF-16 code unit lexicographic order
 * - Arrays: element order preserved
 * - Strings: ECMAScript escaping
 * - Numbers: ECMAScript Number.toString()
 * - No whitespace between tokens
 */
function jcsSerialize(value: unknown): string {
	if (value === null || value === undefined) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jcsNumber(value);
	if (typeof value === "string") return JSON.stringify(value);
	if (Array.isArray(value)) return "[" + value.map(jcsSerialize).join(",") + "]";
	if (isRecord(value)) return jcsObject(value);
	throw new Error(`JCS: unsupported type ${typeof value}`);
}

//==============================================================================
// Semantic Views
//==============================================================================

/** Sorted copy of a list; undefined stays undefined. */
function sortedCopy(list: readonly string[] | undefined): string[] | undefined {
	return list === undefined ? undefined : [...list].sort(compareIds);
}

/**
 * The hashed view of the whole specification: document metadata plus
 * (id, kind) pairs sorted by ID. Component bodies are hashed separately.
 */
export function specView(ir: IR): Record<string, unknown> {
	return {
		version: ir.metadata.version,
		name: ir.metadata.name,
		description: ir.metadata.description,
		components: ir.sortedComponents().map((c) => ({ id: c.id, kind: c.kind })),
	};
}

/**
 * The hashed view of one component: its ID, kind and the fields the document
 * declared for it, under their document names. List fields are sorted.
 */
export function componentView(component: Component): Record<string, unknown> {
	const view = { id: component.id, kind: component.kind };

	switch (component.kind) {
	case "server": {
		const s = component.spec;
		return {
			...view,
			spec: {
				framework: s.framework,
				port: s.port,
				openapi: s.openapi,
				middleware: sortedCopy(s.middleware),
				depends_on: sortedCopy(s.dependsOn),
			},
		};
	}
	case "middleware": {
		const s = component.spec;
		return {
			...view,
			spec: {
				provider: s.provider,
				config: s.config,
				model: s.model,
				policy: s.policy,
				depends_on: sortedCopy(s.dependsOn),
			},
		};
	}
	case "database":
		return { ...view, spec: { provider: component.spec.provider, schema: component.spec.schema } };
	case "usecase": {
		const s = component.spec;
		return {
			...view,
			spec: {
				binds_to: s.bindsTo,
				middleware: sortedCopy(s.middleware),
				goal: s.goal,
				actor: s.actor,
				preconditions: sortedCopy(s.preconditions),
				acceptance_criteria: sortedCopy(s.acceptanceCriteria),
				postconditions: sortedCopy(s.postconditions),
			},
		};
	}
	default:
		return exhaustive(component);
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Produce the RFC 8785 canonical JSON string of a value.
 */
export function canonicalize(value: unknown): string {
	return jcsSerialize(value);
}

function digest(canonical: string, algorithm: string): string {
	const hash: Hash = createHash(algorithm);
	hash.update(canonical, "utf8");
	return `${algorithm}:${hash.digest("hex")}`;
}

/**
 * Digest of the specification as a whole.
 *
 * @returns Digest string in the format `{algorithm}:{hex}`
 */
export function specDigest(ir: IR, algorithm = "sha256"): string {
	return digest(canonicalize(specView(ir)), algorithm);
}

/**
 * Digest of a single component's semantic content.
 *
 * @returns Digest string in the format `{algorithm}:{hex}`
 */
export function componentDigest(component: Component, algorithm = "sha256"): string {
	return digest(canonicalize(componentView(component)), algorithm);
}
