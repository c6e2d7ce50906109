// SPDX-License-Identifier: MIT
// API Contract Parser
// Reads an OpenAPI 3 document (YAML or JSON) into the contract model.
// Parameters, request bodies and responses written as local $refs are followed;
// schema $refs are kept as references for the generators to name.

import { readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { load } from "js-yaml";
import { z } from "zod/v4";

import { isRecord } from "../type-guards.js";
import { HttpMethods, type HttpMethod } from "../types.js";
import { resolveLocalRef } from "../utils/json-pointer.js";
import {
	operationKey,
	type ContractDocument,
	type ContractSchema,
	type MediaType,
	type Operation,
	type Parameter,
	type ParameterLocation,
	type RequestBody,
	type Response,
} from "./types.js";

//==============================================================================
// Document Skeleton
//==============================================================================

const OperationObject = z.looseObject({
	operationId: z.string().optional(),
	summary: z.string().optional(),
	description: z.string().optional(),
	tags: z.array(z.string()).optional(),
	parameters: z.array(z.unknown()).optional(),
	requestBody: z.unknown().optional(),
	responses: z.record(z.string(), z.unknown()).optional(),
});

type OperationObject = z.infer<typeof OperationObject>;

const PathItemObject = z.looseObject({
	parameters: z.array(z.unknown()).optional(),
	get: OperationObject.optional(),
	post: OperationObject.optional(),
	put: OperationObject.optional(),
	patch: OperationObject.optional(),
	delete: OperationObject.optional(),
	head: OperationObject.optional(),
	options: OperationObject.optional(),
});

type PathItemObject = z.infer<typeof PathItemObject>;

const OpenAPIDocumentSchema = z.looseObject({
	openapi: z.string().regex(/^3\./, "only OpenAPI 3.x documents are supported"),
	info: z.looseObject({
		title: z.string(),
		version: z.string(),
	}),
	paths: z.record(z.string(), PathItemObject).optional(),
});

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ["path", "query", "header", "cookie"];

/** Maximum chain length when following $ref -> $ref */
const MAX_REF_HOPS = 8;

function stringField(obj: Record<string, unknown>, key: string): string {
	const value = obj[key];
	return typeof value === "string" ? value : "";
}

function methodKey(method: HttpMethod): keyof PathItemObject & Lowercase<HttpMethod> {
	switch (method) {
	case "GET": return "get";
	case "POST": return "post";
	case "PUT": return "put";
	case "PATCH": return "patch";
	case "DELETE": return "delete";
	case "HEAD": return "head";
	case "OPTIONS": return "options";
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Loads contract files relative to a base directory.
 */
export class ContractParser {
	private readonly baseDir: string;

	constructor(baseDir = "") {
		this.baseDir = baseDir;
	}

	parseFile(file: string): ContractDocument {
		const path = isAbsolute(file) ? file : join(this.baseDir, file);
		const text = readFileSync(path, "utf8");
		return parseContract(text, path);
	}
}

/**
 * Parse OpenAPI text. Throws an Error describing the first problem found.
 */
export function parseContract(text: string, source = "<inline>"): ContractDocument {
	const raw: unknown = load(text, { filename: source });
	const result = OpenAPIDocumentSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue === undefined || issue.path.length === 0 ? "$" : issue.path.map(String).join(".");
		throw new Error(`invalid OpenAPI document ${source} at ${where}: ${issue?.message ?? "unknown error"}`);
	}

	const doc = result.data;
	const converter = new Converter(raw);
	const operations = new Map<string, Operation>();

	for (const [path, item] of Object.entries(doc.paths ?? {})) {
		for (const method of HttpMethods) {
			const op = item[methodKey(method)];
			if (op === undefined) continue;
			const operation = converter.operation(method, path, op, item.parameters ?? []);
			operations.set(operationKey(method, path), operation);
		}
	}

	return { title: doc.info.title, version: doc.info.version, operations };
}

//==============================================================================
// Conversion
//==============================================================================

class Converter {
	private readonly root: unknown;

	constructor(root: unknown) {
		this.root = root;
	}

	operation(method: HttpMethod, path: string, op: OperationObject, shared: unknown[]): Operation {
		const operation: Operation = {
			operationId: op.operationId ?? "",
			method,
			path,
			summary: op.summary ?? "",
			description: op.description ?? "",
			tags: op.tags ?? [],
			parameters: this.mergeParameters(shared, op.parameters ?? []),
			responses: new Map(),
		};

		if (op.requestBody !== undefined) {
			operation.requestBody = this.requestBody(this.deref(op.requestBody));
		}

		for (const [status, value] of Object.entries(op.responses ?? {})) {
			operation.responses.set(status, this.response(this.deref(value)));
		}

		return operation;
	}

	/** Path-level parameters apply unless the operation redefines (name, in). */
	private mergeParameters(shared: unknown[], own: unknown[]): Parameter[] {
		const merged = new Map<string, Parameter>();
		for (const value of [...shared, ...own]) {
			const param = this.parameter(this.deref(value));
			merged.set(param.in + ":" + param.name, param);
		}
		return [...merged.values()];
	}

	private parameter(value: Record<string, unknown>): Parameter {
		const name = stringField(value, "name");
		const location = PARAMETER_LOCATIONS.find((l) => l === value.in);
		if (name === "" || location === undefined) {
			throw new Error(`parameter must declare a name and a location (path, query, header, cookie)`);
		}
		const param: Parameter = {
			name,
			in: location,
			required: value.required === true,
			description: stringField(value, "description"),
		};
		if (value.schema !== undefined) param.schema = this.schema(value.schema);
		return param;
	}

	private requestBody(value: Record<string, unknown>): RequestBody {
		return {
			required: value.required === true,
			description: stringField(value, "description"),
			content: this.content(value.content),
		};
	}

	private response(value: Record<string, unknown>): Response {
		return {
			description: stringField(value, "description"),
			content: this.content(value.content),
		};
	}

	private content(value: unknown): Map<string, MediaType> {
		const content = new Map<string, MediaType>();
		if (!isRecord(value)) return content;
		for (const [mediaType, entry] of Object.entries(value)) {
			const media: MediaType = {};
			if (isRecord(entry) && entry.schema !== undefined) {
				media.schema = this.schema(entry.schema);
			}
			content.set(mediaType, media);
		}
		return content;
	}

	schema(value: unknown): ContractSchema {
		const schema: ContractSchema = {
			type: "",
			format: "",
			ref: "",
			properties: new Map(),
			required: [],
			enum: [],
			description: "",
			nullable: false,
		};
		if (!isRecord(value)) return schema;

		if (typeof value.$ref === "string") {
			schema.ref = value.$ref;
			return schema;
		}

		// OpenAPI 3.1 allows a list of types; the first one names the schema
		const type = value.type;
		if (typeof type === "string") {
			schema.type = type;
		} else if (Array.isArray(type)) {
			const first: unknown = type.find((t) => t !== "null");
			if (typeof first === "string") schema.type = first;
			schema.nullable = type.includes("null");
		}
		schema.format = stringField(value, "format");
		schema.description = stringField(value, "description");
		if (value.nullable === true) schema.nullable = true;
		if (Array.isArray(value.required)) {
			schema.required = value.required.filter((r): r is string => typeof r === "string");
		}
		if (Array.isArray(value.enum)) schema.enum = [...value.enum];
		if (isRecord(value.properties)) {
			for (const [name, prop] of Object.entries(value.properties)) {
				schema.properties.set(name, this.schema(prop));
			}
		}
		if (value.items !== undefined) schema.items = this.schema(value.items);

		return schema;
	}

	/** Follow local $refs until a concrete object is reached. */
	private deref(value: unknown): Record<string, unknown> {
		let current = value;
		for (let hops = 0; hops <= MAX_REF_HOPS; hops++) {
			if (!isRecord(current)) {
				throw new Error("expected an object, got " + (current === null ? "null" : typeof current));
			}
			const ref = current.$ref;
			if (typeof ref !== "string") return current;
			const resolved = resolveLocalRef(this.root, ref);
			if (!resolved.success) throw new Error(resolved.error);
			current = resolved.value;
		}
		throw new Error(`too many nested $refs (limit: ${MAX_REF_HOPS})`);
	}
}
