// SPDX-License-Identifier: MIT
// IR Validation Rules - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { CycleError } from "../src/errors.js";
import { validateAuthenticationRequirements, validateIR } from "../src/validation/ir-rules.js";
import { build, component } from "./helpers.js";

const drizzle = component("db.main", "database", { provider: "drizzle", schema: "schema.ts" });
const auth = component("mw.auth", "middleware", { provider: "better-auth", config: "auth.ts" });

function server(spec: Record<string, unknown> = {}) {
	return component("server.api", "server", { framework: "express", port: 8080, ...spec });
}

function messages(errors: readonly { message: string }[]): string[] {
	return errors.map((e) => e.message);
}

describe("validateIR", () => {
	it("accepts a complete system", () => {
		const { ir, errors } = build([
			drizzle,
			auth,
			server({ middleware: ["mw.auth"], depends_on: ["db.main"] }),
			component("usecase.x", "usecase", { binds_to: "server.api:POST:/users", goal: "Create user" }),
		]);
		assert.deepEqual(errors, []);
		assert.deepEqual(validateIR(ir), []);
	});

	it("rejects a database used as middleware", () => {
		const { ir, errors } = build([
			component("db.primary", "database", { provider: "postgres", schema: "schema.sql" }),
			server({ middleware: ["db.primary"] }),
		]);
		assert.deepEqual(errors, []);
		const result = validateIR(ir);
		assert.equal(result.length, 1);
		assert.equal(result[0]?.code, "TypeMismatch");
		assert.equal(result[0]?.componentId, "server.api");
		assert.equal(result[0]?.message, "middleware reference \"db.primary\": expected middleware, got database");
	});

	it("reports a dependency cycle", () => {
		const { ir } = build([
			component("mw.a", "middleware", { provider: "custom", depends_on: ["mw.b"] }),
			component("mw.b", "middleware", { provider: "custom", depends_on: ["mw.a"] }),
		]);
		const result = validateIR(ir);
		assert.equal(result.length, 1);
		const [cycle] = result;
		assert.ok(cycle instanceof CycleError);
		assert.deepEqual(cycle.cycles, [["mw.a", "mw.b"]]);
		assert.equal(cycle.message, "dependency cycle detected: mw.a -> mw.b -> mw.a");
	});
});

describe("server rules", () => {
	it("requires a framework and a port", () => {
		const { ir } = build([component("server.api", "server", {})]);
		assert.deepEqual(messages(validateIR(ir)), [
			"missing required field: framework",
			"missing required field: port",
		]);
	});

	it("checks the port range", () => {
		for (const port of [70000, -1]) {
			const { ir } = build([server({ port })]);
			const result = validateIR(ir);
			assert.equal(result[0]?.code, "RangeError");
			assert.equal(result[0]?.message, `port must be between 1 and 65535, got ${port}`);
		}
	});
});

describe("middleware rules", () => {
	it("requires a provider", () => {
		const { ir } = build([component("mw.x", "middleware", {})]);
		assert.deepEqual(messages(validateIR(ir)), ["missing required field: provider"]);
	});

	it("requires config for the authentication provider", () => {
		const { ir } = build([component("mw.auth", "middleware", { provider: "better-auth" })]);
		assert.deepEqual(messages(validateIR(ir)), [
			"missing required field: config (required by authentication provider \"better-auth\")",
		]);
	});

	it("requires model for the authorization provider", () => {
		const { ir } = build([component("mw.authz", "middleware", { provider: "casbin", policy: "policy.csv" })]);
		const result = validateIR(ir);
		assert.equal(result.length, 1);
		assert.equal(result[0]?.code, "MissingField");
		assert.equal(result[0]?.message, "missing required field: model (required by authorization provider \"casbin\")");
	});

	it("reports model and policy separately", () => {
		const { ir } = build([component("mw.authz", "middleware", { provider: "casbin" })]);
		assert.deepEqual(messages(validateIR(ir)), [
			"missing required field: model (required by authorization provider \"casbin\")",
			"missing required field: policy (required by authorization provider \"casbin\")",
		]);
	});

	it("follows configured provider names", () => {
		const { ir } = build([component("mw.authz", "middleware", { provider: "casbin" })]);
		const providers = { authentication: "lucia", authorization: "oso", orm: "prisma" };
		assert.deepEqual(validateIR(ir, providers), []);
	});
});

describe("database and usecase rules", () => {
	it("requires provider and schema", () => {
		const { ir } = build([component("db.main", "database", {})]);
		assert.deepEqual(messages(validateIR(ir)), [
			"missing required field: provider",
			"missing required field: schema",
		]);
	});

	it("requires binds_to and goal", () => {
		const { ir } = build([component("usecase.x", "usecase", {})]);
		assert.deepEqual(messages(validateIR(ir)), [
			"missing required field: binds_to",
			"missing required field: goal",
		]);
	});

	it("rejects middleware references to other kinds", () => {
		const { ir } = build([
			server(),
			component("usecase.x", "usecase", { binds_to: "server.api:GET:/x", goal: "X", middleware: ["server.api"] }),
		]);
		assert.deepEqual(messages(validateIR(ir)), [
			"middleware reference \"server.api\": expected middleware, got server",
		]);
	});

	it("sorts diagnostics by component", () => {
		const { ir } = build([
			component("z.db", "database", { provider: "postgres" }),
			component("a.db", "database", { schema: "s.sql" }),
		]);
		const result = validateIR(ir);
		assert.deepEqual(result.map((e) => e.componentId), ["a.db", "z.db"]);
	});
});

describe("validateAuthenticationRequirements", () => {
	it("ignores authentication middleware nobody uses", () => {
		const { ir } = build([auth]);
		assert.deepEqual(validateAuthenticationRequirements(ir), []);
	});

	it("requires a database on the ORM provider", () => {
		const { ir } = build([
			auth,
			component("db.main", "database", { provider: "postgres", schema: "schema.sql" }),
			server({ middleware: ["mw.auth"] }),
		]);
		const result = validateAuthenticationRequirements(ir);
		assert.equal(result.length, 1);
		assert.equal(result[0]?.code, "CrossComponentRequirement");
		assert.equal(result[0]?.componentId, undefined);
		assert.equal(
			result[0]?.message,
			"authentication provider \"better-auth\" requires a database component with provider \"drizzle\"",
		);
	});

	it("reports both missing pieces", () => {
		const { ir } = build([
			auth,
			component("usecase.x", "usecase", { binds_to: "server.api:GET:/x", goal: "X", middleware: ["mw.auth"] }),
		]);
		assert.deepEqual(messages(validateIR(ir)), [
			"authentication provider \"better-auth\" requires a database component with provider \"drizzle\"",
			"authentication provider \"better-auth\" requires at least one server component",
		]);
	});

	it("is satisfied by a server and an ORM database", () => {
		const { ir } = build([drizzle, auth, server({ middleware: ["mw.auth"] })]);
		assert.deepEqual(validateAuthenticationRequirements(ir), []);
	});
});
