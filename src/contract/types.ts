// SPDX-License-Identifier: MIT
// API Contract Model
// The subset of an OpenAPI 3 document the compiler and generators consume

import type { HttpMethod } from "../types.js";

export interface ContractDocument {
	title: string;
	version: string;
	/** Keyed by "METHOD:/path", see operationKey() */
	operations: Map<string, Operation>;
}

export interface Operation {
	operationId: string;
	method: HttpMethod;
	path: string;
	summary: string;
	description: string;
	tags: string[];
	parameters: Parameter[];
	requestBody?: RequestBody | undefined;
	/** Keyed by status code */
	responses: Map<string, Response>;
}

export type ParameterLocation = "path" | "query" | "header" | "cookie";

export interface Parameter {
	name: string;
	in: ParameterLocation;
	required: boolean;
	description: string;
	schema?: ContractSchema | undefined;
}

export interface RequestBody {
	required: boolean;
	description: string;
	/** Keyed by media type, e.g. "application/json" */
	content: Map<string, MediaType>;
}

export interface Response {
	description: string;
	content: Map<string, MediaType>;
}

export interface MediaType {
	schema?: ContractSchema | undefined;
}

/** Simplified JSON Schema used for type generation. */
export interface ContractSchema {
	type: string;
	format: string;
	/** Set when the schema is a $ref; no other field is populated then */
	ref: string;
	properties: Map<string, ContractSchema>;
	items?: ContractSchema | undefined;
	required: string[];
	enum: unknown[];
	description: string;
	nullable: boolean;
}

/**
 * Lookup key for an operation, e.g. "GET:/users/{id}".
 */
export function operationKey(method: string, path: string): string {
	return method + ":" + path;
}

/**
 * Type name of a $ref schema ("#/components/schemas/User" -> "User").
 * Empty for inline schemas.
 */
export function schemaRefName(schema: ContractSchema): string {
	if (schema.ref === "") return "";
	const slash = schema.ref.lastIndexOf("/");
	return slash === -1 ? schema.ref : schema.ref.slice(slash + 1);
}
