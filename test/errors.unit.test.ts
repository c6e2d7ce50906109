// SPDX-License-Identifier: MIT
// Blueprint Errors - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ArtifactConflictError,
	BlueprintError,
	CycleError,
	ErrorCodes,
	StageError,
	formatCycle,
	invalidResult,
	validResult,
} from "../src/errors.js";

const position = { file: "blueprint.yaml", line: 4, column: 5 };

describe("BlueprintError class", () => {
	it("constructor sets code, message and name", () => {
		const err = new BlueprintError(ErrorCodes.FormatError, "bad value");
		assert.equal(err.code, "FormatError");
		assert.equal(err.message, "bad value");
		assert.equal(err.name, "BlueprintError");
		assert.equal(err.componentId, undefined);
		assert.equal("componentId" in err, false);
	});

	it("toDiagnostic() only carries the fields that are set", () => {
		const err = BlueprintError.missingField("server.api", "framework", undefined, position);
		assert.deepEqual(err.toDiagnostic(), {
			code: "MissingField",
			message: "missing required field: framework",
			componentId: "server.api",
			position,
		});
	});

	it("keeps the cause", () => {
		const cause = new Error("ENOENT");
		const err = BlueprintError.structural("cannot read", undefined, cause);
		assert.equal(err.cause, cause);
	});
});

describe("Static factories", () => {
	it("schemaViolation appends the path", () => {
		const err = BlueprintError.schemaViolation("components.0.spec.port", "Too big");
		assert.equal(err.code, "SchemaViolation");
		assert.equal(err.message, "Too big (at components.0.spec.port)");
		assert.equal(err.path, "components.0.spec.port");
	});

	it("unknownKind names the kind", () => {
		const err = BlueprintError.unknownKind("queue.jobs", "queue");
		assert.equal(err.message, "unknown kind \"queue\"");
		assert.equal(err.componentId, "queue.jobs");
	});

	it("unresolvedReference without suggestions", () => {
		const err = BlueprintError.unresolvedReference("missing", "usecase.y");
		assert.equal(err.message, "unresolved reference \"missing\"");
		assert.equal(err.componentId, "usecase.y");
	});

	it("unresolvedReference with suggestions", () => {
		const err = BlueprintError.unresolvedReference("server.apx", "usecase.y", ["server.api", "server.app"]);
		assert.equal(err.message, "unresolved reference \"server.apx\" (did you mean \"server.api\", \"server.app\"?)");
	});

	it("duplicateSymbol uses the name as component", () => {
		const err = BlueprintError.duplicateSymbol("db.main", "database", position);
		assert.equal(err.code, "DuplicateSymbol");
		assert.equal(err.message, "symbol \"db.main\" already defined as database");
		assert.equal(err.componentId, "db.main");
		assert.deepEqual(err.position, position);
	});

	it("typeMismatch", () => {
		const err = BlueprintError.typeMismatch("server.api", "middleware", "db.primary", "middleware", "database");
		assert.equal(err.code, "TypeMismatch");
		assert.equal(err.message, "middleware reference \"db.primary\": expected middleware, got database");
	});

	it("missingField with context", () => {
		const err = BlueprintError.missingField("mw.authz", "model", "required by authorization provider \"casbin\"");
		assert.equal(err.message, "missing required field: model (required by authorization provider \"casbin\")");
	});

	it("missingMetadata has no component", () => {
		const err = BlueprintError.missingMetadata("version");
		assert.equal(err.code, "MissingField");
		assert.equal(err.message, "missing required field: version");
		assert.equal(err.componentId, undefined);
	});

	it("contractParse keeps the reason", () => {
		const err = BlueprintError.contractParse("server.api", "api.yaml", new Error("boom"));
		assert.equal(err.code, "ContractParseError");
		assert.equal(err.message, "failed to parse API contract \"api.yaml\": boom");
	});

	it("operationNotFound", () => {
		const err = BlueprintError.operationNotFound("usecase.x", "GET:/nope", "server.api");
		assert.equal(err.message, "operation GET:/nope not found in \"server.api\"'s API contract");
	});

	it("cache and config messages", () => {
		assert.equal(BlueprintError.cache("load", "bad json").message, "cache load failed: bad json");
		assert.equal(BlueprintError.config("outDir", "Too small").message, "invalid option outDir: Too small");
		assert.equal(BlueprintError.pathTraversal("../x").message, "unsafe artifact path: ../x");
	});
});

describe("Specialised errors", () => {
	it("CycleError shows the first cycle as a loop", () => {
		const err = new CycleError([["a", "b"], ["c"]]);
		assert.equal(err.code, "CycleError");
		assert.equal(err.name, "CycleError");
		assert.equal(err.message, "dependency cycle detected: a -> b -> a");
		assert.deepEqual(err.cycles, [["a", "b"], ["c"]]);
		assert.ok(err instanceof BlueprintError);
	});

	it("ArtifactConflictError names both owners", () => {
		const err = new ArtifactConflictError("src/app.ts", "server", "routes");
		assert.equal(err.code, "ArtifactConflict");
		assert.equal(err.message, "artifact path conflict for \"src/app.ts\": already planned by \"server\", attempted by \"routes\"");
		assert.equal(err.existingOwner, "server");
		assert.equal(err.incomingOwner, "routes");
	});

	it("StageError counts its errors", () => {
		const inner = [BlueprintError.missingMetadata("name"), BlueprintError.missingMetadata("version")];
		const err = new StageError("semantic", "semantic validation failed", inner);
		assert.equal(err.message, "semantic validation failed (2 error(s))");
		assert.equal(err.stage, "semantic");
		assert.equal(err.errors.length, 2);
	});

	it("formatCycle", () => {
		assert.equal(formatCycle(["x"]), "x -> x");
		assert.equal(formatCycle([]), "");
	});
});

describe("Validation results", () => {
	it("validResult", () => {
		assert.deepEqual(validResult(3), { valid: true, errors: [], value: 3 });
	});

	it("invalidResult", () => {
		const errors = [BlueprintError.missingMetadata("name")];
		const result = invalidResult<number>(errors);
		assert.equal(result.valid, false);
		assert.equal(result.value, undefined);
		assert.equal(result.errors, errors);
	});
});
