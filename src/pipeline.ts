// SPDX-License-Identifier: MIT
// Compile Pipeline
//
// load -> schema -> semantic -> build -> validate -> generate -> write
//
// Stages run in order and the first failing stage ends the run with a
// StageError listing every diagnostic that stage produced. Generation never
// runs on an IR that carries errors.

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { BuildCache } from "./cache.js";
import { specDigest } from "./canonicalize.js";
import { manifestPlugin } from "./codegen/manifest.js";
import { ArtifactPlanner, type Artifact } from "./codegen/planner.js";
import { PluginRegistry } from "./codegen/registry.js";
import { resolveOptions, type CompilerOptions, type CompilerOptionsInput } from "./config.js";
import { BlueprintError, StageError } from "./errors.js";
import { Builder } from "./ir/builder.js";
import type { IR } from "./ir/ir.js";
import { loadDocumentFile, type LoadedDocument } from "./loader.js";
import { silentLogger, tagged, type Logger } from "./logger.js";
import type { RawDocument } from "./types.js";
import { sortDiagnostics } from "./validation/error-messages.js";
import { validateIR } from "./validation/ir-rules.js";
import { validateLoaded, validateSemantics } from "./validator.js";

//==============================================================================
// Context and Stages
//==============================================================================

/** Data carried between stages. Each stage fills in what it produces. */
export interface PipelineContext {
	specPath: string;
	options: CompilerOptions;
	logger: Logger;
	registry: PluginRegistry;
	loaded?: LoadedDocument;
	raw?: RawDocument;
	ir?: IR;
	artifacts: Artifact[];
	/** Artifact paths written this run */
	written: string[];
	/** Artifact paths left untouched this run */
	skipped: string[];
}

export interface Stage {
	readonly name: string;
	run(ctx: PipelineContext): void;
}

export class Pipeline {
	private readonly stages: readonly Stage[];

	constructor(stages: readonly Stage[]) {
		this.stages = stages;
	}

	/**
	 * Run every stage in order.
	 * @throws StageError from the first stage that fails
	 */
	run(ctx: PipelineContext): void {
		for (const stage of this.stages) {
			ctx.logger.debug(`stage ${stage.name}`);
			stage.run(ctx);
		}
	}
}

/**
 * Run `fn`, turning a thrown BlueprintError into a StageError for `stage`.
 */
function guard<T>(stage: string, message: string, fn: () => T): T {
	try {
		return fn();
	} catch (err) {
		if (err instanceof StageError || !(err instanceof BlueprintError)) throw err;
		throw new StageError(stage, message, [err]);
	}
}

function required<T>(value: T | undefined, stage: string, what: string): T {
	if (value === undefined) {
		throw new Error(`stage "${stage}" needs ${what}; run the earlier stages first`);
	}
	return value;
}

//==============================================================================
// Front End
//==============================================================================

export const loadStage: Stage = {
	name: "load",
	run(ctx) {
		ctx.loaded = guard("load", "failed to load specification", () => loadDocumentFile(ctx.specPath));
	},
};

export const schemaStage: Stage = {
	name: "schema",
	run(ctx) {
		const result = validateLoaded(required(ctx.loaded, "schema", "a loaded document"));
		if (!result.valid || result.value === undefined) {
			throw new StageError("schema", "schema validation failed", result.errors);
		}
		ctx.raw = result.value;
	},
};

export const semanticStage: Stage = {
	name: "semantic",
	run(ctx) {
		const result = validateSemantics(required(ctx.raw, "semantic", "a raw document"));
		if (!result.valid) {
			throw new StageError("semantic", "semantic validation failed", result.errors);
		}
	},
};

export const buildStage: Stage = {
	name: "build",
	run(ctx) {
		const builder = new Builder({
			baseDir: ctx.options.baseDir ?? dirname(ctx.specPath),
			logger: tagged(ctx.logger, "build"),
		});
		const { ir, errors } = builder.build(required(ctx.raw, "build", "a raw document"));
		if (errors.length > 0) {
			throw new StageError("build", "IR build failed", sortDiagnostics(errors));
		}
		ctx.ir = ir;
	},
};

export const validateStage: Stage = {
	name: "validate",
	run(ctx) {
		const errors = validateIR(required(ctx.ir, "validate", "an IR"), ctx.options.providers);
		if (errors.length > 0) {
			throw new StageError("validate", "IR validation failed", errors);
		}
	},
};

//==============================================================================
// Back End
//==============================================================================

export const generateStage: Stage = {
	name: "generate",
	run(ctx) {
		const ir = required(ctx.ir, "generate", "an IR");
		const planner = new ArtifactPlanner();

		for (const generator of ctx.registry.generatorsFor(ir)) {
			const output = generator.generate(ir);
			guard("generate", `artifact planning failed for ${generator.name}`, () => {
				planner.addOutput(generator.name, output);
			});
			ctx.logger.debug(`${generator.name}: ${output.files.length} file(s)`);
		}

		ctx.artifacts = planner.artifacts();
	},
};

/**
 * Resolve an artifact path inside the output directory.
 * @throws BlueprintError (PathTraversal) for paths that escape it
 */
export function resolveInside(root: string, path: string): string {
	const target = resolve(root, path);
	const rel = relative(root, target);
	if (rel === "" || rel === ".." || rel.startsWith(".." + sep) || isAbsolute(rel)) {
		throw BlueprintError.pathTraversal(path);
	}
	return target;
}

export const writeStage: Stage = {
	name: "write",
	run(ctx) {
		const ir = required(ctx.ir, "write", "an IR");
		const { options, logger } = ctx;
		const outDir = resolve(options.outDir);

		// Check every path before touching the disk
		const targets = guard("write", "refusing to write outside the output directory", () =>
			ctx.artifacts.map((artifact) => ({ artifact, target: resolveInside(outDir, artifact.path) })),
		);

		const cachePath = resolve(outDir, options.cacheFile);
		const cache = options.cache
			? guard("write", "failed to load build cache", () => BuildCache.load(cachePath))
			: undefined;
		const unchanged = new Set<string>();
		if (cache !== undefined) {
			if (cache.specHash !== "" && cache.specHash !== specDigest(ir)) {
				logger.debug("document metadata or component set changed since the last compile");
			}
			const changed = new Set(cache.changedComponents(ir));
			for (const id of ir.components.keys()) {
				if (!changed.has(id)) unchanged.add(id);
			}
			for (const id of cache.removedComponents(ir)) {
				logger.warn(`component "${id}" was removed; its earlier artifacts are left in place`);
			}
		}

		const byComponent = new Map<string, string[]>();
		for (const { artifact, target } of targets) {
			if (artifact.componentId !== undefined) {
				const paths = byComponent.get(artifact.componentId) ?? [];
				paths.push(artifact.path);
				byComponent.set(artifact.componentId, paths);
			}

			const exists = existsSync(target);
			const keep = exists && (
				artifact.strategy === "create-once" ||
				(artifact.componentId !== undefined && unchanged.has(artifact.componentId))
			);
			if (keep) {
				ctx.skipped.push(artifact.path);
				logger.debug(`unchanged ${artifact.path}`);
				continue;
			}

			mkdirSync(dirname(target), { recursive: true });
			writeFileSync(target, artifact.content, "utf8");
			ctx.written.push(artifact.path);
			logger.debug(`wrote ${artifact.path}`);
		}

		if (cache !== undefined) {
			cache.update(ir);
			for (const [id, paths] of byComponent) {
				cache.setArtifacts(id, paths);
			}
			guard("write", "failed to save build cache", () => {
				cache.save(cachePath);
			});
		}

		logger.info(`${ctx.written.length} file(s) written, ${ctx.skipped.length} unchanged`);
	},
};

export const validationStages: readonly Stage[] = [loadStage, schemaStage, semanticStage, buildStage, validateStage];
export const compileStages: readonly Stage[] = [...validationStages, generateStage, writeStage];

//==============================================================================
// Entry Points
//==============================================================================

export interface CompileRequest {
	specPath: string;
	options?: CompilerOptionsInput | CompilerOptions;
	logger?: Logger;
	registry?: PluginRegistry;
}

export interface CompileResult {
	ir: IR;
	artifacts: Artifact[];
	written: string[];
	skipped: string[];
}

/** Registry with the built-in generators. */
export function defaultRegistry(): PluginRegistry {
	const registry = new PluginRegistry();
	registry.register(manifestPlugin);
	return registry;
}

function createContext(request: CompileRequest): PipelineContext {
	return {
		specPath: request.specPath,
		options: resolveOptions(request.options ?? {}),
		logger: request.logger ?? silentLogger,
		registry: request.registry ?? defaultRegistry(),
		artifacts: [],
		written: [],
		skipped: [],
	};
}

/**
 * Load, check and build a specification without generating anything.
 * @throws StageError from the first failing stage
 */
export function validate(request: CompileRequest): IR {
	const ctx = createContext(request);
	new Pipeline(validationStages).run(ctx);
	return required(ctx.ir, "validate", "an IR");
}

/**
 * Full compile: everything `validate` does, then generate and write.
 * @throws StageError from the first failing stage
 */
export function compile(request: CompileRequest): CompileResult {
	const ctx = createContext(request);
	new Pipeline(compileStages).run(ctx);
	return {
		ir: required(ctx.ir, "compile", "an IR"),
		artifacts: ctx.artifacts,
		written: ctx.written,
		skipped: ctx.skipped,
	};
}
