// Blueprint Compiler Options
// Zod-validated options with defaults; loaded from an options object or a JSON file.

import { readFileSync } from "node:fs";
import { z } from "zod/v4";
import { BlueprintError } from "./errors.js";
import type { ProviderNames } from "./types.js";

//==============================================================================
// Defaults
//==============================================================================

export const DEFAULT_PROVIDERS: Readonly<ProviderNames> = {
	authentication: "better-auth",
	authorization: "casbin",
	orm: "drizzle",
};

export const DEFAULT_OUT_DIR = "generated";
export const DEFAULT_CACHE_FILE = ".blueprint/cache.json";

//==============================================================================
// Schema
//==============================================================================

const ProviderNamesSchema = z.object({
	authentication: z.string().min(1).default(DEFAULT_PROVIDERS.authentication),
	authorization: z.string().min(1).default(DEFAULT_PROVIDERS.authorization),
	orm: z.string().min(1).default(DEFAULT_PROVIDERS.orm),
});

export const CompilerOptionsSchema = z.strictObject({
	/** Directory relative contract paths resolve against; defaults to the document's directory */
	baseDir: z.string().optional(),
	outDir: z.string().min(1).default(DEFAULT_OUT_DIR),
	cache: z.boolean().default(true),
	/** Cache file location, relative to outDir */
	cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
	verbose: z.boolean().default(false),
	providers: ProviderNamesSchema.prefault({}),
});

export type CompilerOptionsInput = z.input<typeof CompilerOptionsSchema>;
export type CompilerOptions = z.output<typeof CompilerOptionsSchema>;

//==============================================================================
// Resolution
//==============================================================================

/**
 * Apply defaults and validate.
 * @throws BlueprintError (ConfigError) naming the first offending option
 */
export function resolveOptions(input: unknown = {}): CompilerOptions {
	const result = CompilerOptionsSchema.safeParse(input);
	if (!result.success) {
		const issue = result.error.issues[0];
		const path = issue === undefined || issue.path.length === 0 ? "$" : issue.path.map(String).join(".");
		throw BlueprintError.config(path, issue?.message ?? "invalid options");
	}
	return result.data;
}

/**
 * Read options from a JSON file and resolve them. Keys given in `overrides`
 * win over the file.
 */
export function loadOptionsFile(path: string, overrides: CompilerOptionsInput = {}): CompilerOptions {
	let text: string;
	try {
		text = readFileSync(path, "utf8");
	} catch (err) {
		throw BlueprintError.config(path, err instanceof Error ? err.message : String(err));
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (err) {
		throw BlueprintError.config(path, "not valid JSON: " + (err instanceof Error ? err.message : String(err)));
	}

	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw BlueprintError.config(path, "expected a JSON object");
	}

	return resolveOptions({ ...parsed, ...overrides });
}
