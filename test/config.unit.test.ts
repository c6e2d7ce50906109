// SPDX-License-Identifier: MIT
// Compiler Options - Unit Tests

import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_CACHE_FILE, DEFAULT_PROVIDERS, loadOptionsFile, resolveOptions } from "../src/config.js";
import { BlueprintError } from "../src/errors.js";

function configError(pattern: RegExp) {
	return (err: unknown): boolean => {
		assert.ok(err instanceof BlueprintError);
		assert.equal(err.code, "ConfigError");
		assert.match(err.message, pattern);
		return true;
	};
}

describe("resolveOptions", () => {
	it("fills in defaults", () => {
		assert.deepEqual(resolveOptions(), {
			outDir: "generated",
			cache: true,
			cacheFile: DEFAULT_CACHE_FILE,
			verbose: false,
			providers: { ...DEFAULT_PROVIDERS },
		});
	});

	it("merges partial provider names with the defaults", () => {
		const options = resolveOptions({ providers: { orm: "prisma" } });
		assert.deepEqual(options.providers, { authentication: "better-auth", authorization: "casbin", orm: "prisma" });
	});

	it("keeps given values", () => {
		const options = resolveOptions({ outDir: "out", cache: false, baseDir: "/specs" });
		assert.equal(options.outDir, "out");
		assert.equal(options.cache, false);
		assert.equal(options.baseDir, "/specs");
	});

	it("accepts already resolved options", () => {
		const once = resolveOptions({ outDir: "out" });
		assert.deepEqual(resolveOptions(once), once);
	});

	it("rejects an empty output directory", () => {
		assert.throws(() => resolveOptions({ outDir: "" }), configError(/^invalid option outDir: /));
	});

	it("rejects unknown options", () => {
		assert.throws(() => resolveOptions({ outdir: "x" }), configError(/^invalid option \$: /));
	});

	it("rejects values of the wrong type", () => {
		assert.throws(() => resolveOptions({ cache: "yes" }), configError(/^invalid option cache: /));
		assert.throws(() => resolveOptions({ providers: { orm: "" } }), configError(/^invalid option providers\.orm: /));
	});
});

describe("loadOptionsFile", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "blueprint-config-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("reads options from JSON", () => {
		const path = join(dir, "blueprint.json");
		writeFileSync(path, JSON.stringify({ outDir: "build", verbose: true }));
		const options = loadOptionsFile(path);
		assert.equal(options.outDir, "build");
		assert.equal(options.verbose, true);
		assert.equal(options.cache, true);
	});

	it("lets overrides win over the file", () => {
		const path = join(dir, "blueprint.json");
		writeFileSync(path, JSON.stringify({ outDir: "build", cache: true }));
		const options = loadOptionsFile(path, { outDir: "elsewhere", cache: false });
		assert.equal(options.outDir, "elsewhere");
		assert.equal(options.cache, false);
	});

	it("reports a missing file", () => {
		const path = join(dir, "missing.json");
		assert.throws(() => loadOptionsFile(path), configError(/ENOENT/));
	});

	it("reports invalid JSON", () => {
		const path = join(dir, "blueprint.json");
		writeFileSync(path, "{ outDir: build }");
		assert.throws(() => loadOptionsFile(path), configError(/not valid JSON: /));
	});

	it("requires an object", () => {
		const path = join(dir, "blueprint.json");
		writeFileSync(path, "[1, 2]");
		assert.throws(() => loadOptionsFile(path), {
			message: `invalid option ${path}: expected a JSON object`,
		});
	});
});
