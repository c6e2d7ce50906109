// SPDX-License-Identifier: MIT
// Document Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { validateLoaded, validateSchema, validateSemantics } from "../src/validator.js";
import { loadDocument } from "../src/loader.js";
import { component, document } from "./helpers.js";

const server = { id: "server.api", kind: "server", spec: { framework: "express", port: 8080 } };
const database = { id: "db.main", kind: "database", spec: { provider: "postgres", schema: "schema.sql" } };

describe("validateSchema", () => {
	it("accepts a well-formed document", () => {
		const result = validateSchema({ version: "1.0", name: "shop", description: "demo", components: [server, database] });
		assert.equal(result.valid, true);
		assert.deepEqual(result.errors, []);
		assert.equal(result.value?.description, "demo");
		assert.deepEqual(result.value?.components.map((c) => c.id), ["server.api", "db.main"]);
	});

	it("keeps unknown keys in spec", () => {
		const result = validateSchema({
			version: "1.0",
			name: "shop",
			components: [{ ...server, spec: { ...server.spec, region: "eu" } }],
		});
		assert.equal(result.value?.components[0]?.spec.region, "eu");
	});

	it("defaults missing metadata to empty strings", () => {
		const result = validateSchema({ components: [] });
		assert.equal(result.valid, true);
		assert.equal(result.value?.version, "");
		assert.equal(result.value?.name, "");
		assert.equal(result.value !== undefined && "description" in result.value, false);
	});

	it("rejects a non-mapping root", () => {
		const result = validateSchema(["a"]);
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.code, "StructuralError");
	});

	it("requires components", () => {
		const result = validateSchema({ version: "1.0", name: "shop" });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.code, "SchemaViolation");
		assert.equal(result.errors[0]?.path, "components");
	});

	it("reports kind-specific fields with their path", () => {
		const result = validateSchema({
			components: [{ id: "server.api", kind: "server", spec: { port: 8080 } }],
		});
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors.map((e) => e.path), ["components.0.spec.framework"]);
	});

	it("rejects ports out of range", () => {
		const result = validateSchema({
			components: [{ id: "server.api", kind: "server", spec: { framework: "express", port: 70000 } }],
		});
		assert.deepEqual(result.errors.map((e) => e.path), ["components.0.spec.port"]);
	});

	it("rejects an unknown kind", () => {
		const result = validateSchema({ components: [{ id: "queue.jobs", kind: "queue", spec: {} }] });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.code, "SchemaViolation");
		assert.equal(result.errors[0]?.path, "components.0.kind");
	});

	it("rejects an empty id", () => {
		const result = validateSchema({ components: [{ ...database, id: "" }] });
		assert.deepEqual(result.errors.map((e) => e.path), ["components.0.id"]);
	});

	it("attaches positions by index", () => {
		const positions = [{ file: "a.yaml", line: 3, column: 5 }, undefined];
		const result = validateSchema({ components: [server, database] }, positions);
		assert.deepEqual(result.value?.components[0]?.position, positions[0]);
		assert.equal(result.value?.components[1]?.position, undefined);
	});
});

describe("validateLoaded", () => {
	it("carries positions from the loader", () => {
		const loaded = loadDocument(`version: "1.0"
name: shop
components:
  - id: db.main
    kind: database
    spec: { provider: postgres, schema: schema.sql }
`, "shop.yaml");
		const result = validateLoaded(loaded);
		assert.equal(result.valid, true);
		assert.equal(result.value?.components[0]?.position?.line, 4);
		assert.deepEqual(result.value?.position, { file: "shop.yaml", line: 1, column: 1 });
	});
});

describe("validateSemantics", () => {
	it("accepts unique IDs", () => {
		const doc = document([component("a", "database"), component("b", "database")]);
		const result = validateSemantics(doc);
		assert.equal(result.valid, true);
		assert.equal(result.value, doc);
	});

	it("reports one error per repeated ID", () => {
		const doc = document([
			component("a", "server"),
			component("b", "database"),
			component("a", "database"),
			component("a", "usecase"),
		]);
		const result = validateSemantics(doc);
		assert.equal(result.valid, false);
		assert.equal(result.errors.length, 2);
		for (const err of result.errors) {
			assert.equal(err.code, "DuplicateSymbol");
			assert.equal(err.message, "symbol \"a\" already defined as server");
		}
	});

	it("requires version and name", () => {
		const result = validateSemantics(document([], { version: "", name: "" }));
		assert.deepEqual(result.errors.map((e) => e.message), [
			"missing required field: name",
			"missing required field: version",
		]);
		assert.ok(result.errors.every((e) => e.code === "MissingField" && e.componentId === undefined));
	});
});
