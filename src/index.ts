// Blueprint - Specification-to-IR Compiler
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Binding, Component, ComponentOfKind, DatabaseComponent, DatabaseSpec, Edge, EdgeType,
	HttpMethod, Kind, MiddlewareComponent, MiddlewareSpec, Position, ProviderNames,
	RawComponent, RawDocument, ServerComponent, ServerSpec, UsecaseComponent, UsecaseSpec,
} from "./types.js";

export type {
	ContractDocument, ContractSchema, MediaType, Operation, Parameter, RequestBody, Response,
} from "./contract/types.js";

export type { Diagnostic, ErrorCode, ValidationResult } from "./errors.js";

export type { Logger } from "./logger.js";

export { ComponentKinds, HttpMethods, isHttpMethod, isKind, parseKind } from "./types.js";

//==============================================================================
// Errors
//==============================================================================

export {
	ArtifactConflictError, BlueprintError, CycleError, ErrorCodes, StageError,
	exhaustive, formatCycle, invalidResult, validResult,
} from "./errors.js";

export { formatDiagnostic, levenshteinDistance, sortDiagnostics, suggestSimilar } from "./validation/error-messages.js";

//==============================================================================
// Configuration and Logging
//==============================================================================

export {
	CompilerOptionsSchema, DEFAULT_CACHE_FILE, DEFAULT_OUT_DIR, DEFAULT_PROVIDERS,
	loadOptionsFile, resolveOptions,
	type CompilerOptions, type CompilerOptionsInput,
} from "./config.js";

export { createConsoleLogger, silentLogger, tagged } from "./logger.js";

//==============================================================================
// Loading and Document Validation
//==============================================================================

export { loadDocument, loadDocumentFile, type LoadedDocument } from "./loader.js";
export { validateLoaded, validateSchema, validateSemantics } from "./validator.js";
export { ComponentSchema, DocumentSchema } from "./zod-schemas.js";
export { blueprintSchema, isBlueprintSchema } from "./schemas.js";

//==============================================================================
// IR
//==============================================================================

export { IR, type DocumentMetadata } from "./ir/ir.js";
export { SymbolTable, type SymbolEntry } from "./ir/symbols.js";
export { Builder, type BuilderOptions, type BuildResult, type ContractLoader } from "./ir/builder.js";
export { detectCycles, topologicalSort, type GraphNode } from "./validation/cycle-detection.js";
export { validateAuthenticationRequirements, validateComponent, validateIR } from "./validation/ir-rules.js";

//==============================================================================
// Contracts and Bindings
//==============================================================================

export { ContractParser, parseContract } from "./contract/parser.js";
export { operationKey, schemaRefName } from "./contract/types.js";
export { bindingServerId, parseBinding, type ParsedBinding } from "./contract/binding.js";

//==============================================================================
// Hashing and Cache
//==============================================================================

export { canonicalize, componentDigest, componentView, specDigest, specView } from "./canonicalize.js";
export { BuildCache, CACHE_VERSION, type CacheFile, type CachedComponent } from "./cache.js";

//==============================================================================
// Code Generation and Pipeline
//==============================================================================

export type { GeneratedFile, Generator, GeneratorOutput, WriteStrategy } from "./codegen/generator.js";
export { PluginRegistry, type GeneratorPlugin } from "./codegen/registry.js";
export { ArtifactPlanner, type Artifact } from "./codegen/planner.js";
export { buildManifest, ManifestGenerator, manifestPlugin, MANIFEST_FILE, type Manifest } from "./codegen/manifest.js";

export {
	compile, compileStages, defaultRegistry, Pipeline, validate, validationStages,
	type CompileRequest, type CompileResult, type PipelineContext, type Stage,
} from "./pipeline.js";
