// SPDX-License-Identifier: MIT
// IR Builder
//
// Four phases over the raw component list:
//   1. typing     - create typed components and fill the symbol table
//   2. contracts  - parse each server's API contract
//   3. references - turn middleware/depends_on/binding names into edges
//   4. bindings   - resolve binds_to against servers and their contracts
// Errors accumulate across phases. A failure in phase 1 stops the build after
// that phase, since reference resolution needs a complete symbol table.

import { bindingServerId, parseBinding } from "../contract/binding.js";
import { ContractParser } from "../contract/parser.js";
import { operationKey, type ContractDocument } from "../contract/types.js";
import { BlueprintError, exhaustive } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { readInteger, readString, readStringList } from "../type-guards.js";
import {
	parseKind,
	type Component,
	type EdgeType,
	type Kind,
	type Position,
	type RawComponent,
	type RawDocument,
	type UsecaseComponent,
} from "../types.js";
import { suggestSimilar } from "../validation/error-messages.js";
import { IR } from "./ir.js";

//==============================================================================
// Options
//==============================================================================

/** Anything that can turn a contract path into a parsed contract. */
export interface ContractLoader {
	parseFile(file: string): ContractDocument;
}

export interface BuilderOptions {
	/** Base directory for relative contract paths */
	baseDir?: string;
	contracts?: ContractLoader;
	logger?: Logger;
}

export interface BuildResult {
	ir: IR;
	errors: BlueprintError[];
}

//==============================================================================
// Builder
//==============================================================================

export class Builder {
	private readonly baseDir: string;
	private readonly contracts: ContractLoader;
	private readonly logger: Logger;

	constructor(options: BuilderOptions = {}) {
		this.baseDir = options.baseDir ?? "";
		this.contracts = options.contracts ?? new ContractParser(this.baseDir);
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Build an IR. The IR is returned even when errors were found, so callers
	 * can report every problem from one run.
	 */
	build(doc: RawDocument): BuildResult {
		const ir = new IR(
			{ version: doc.version, name: doc.name, description: doc.description ?? "" },
			this.baseDir,
		);

		const errors = this.createComponents(ir, doc.components);
		if (errors.length > 0) {
			this.logger.debug(`typing produced ${errors.length} error(s); skipping resolution`);
			return { ir, errors };
		}

		errors.push(...this.parseContracts(ir));
		errors.push(...this.resolveReferences(ir));
		errors.push(...this.resolveBindings(ir));

		this.logger.debug(`built ${ir.components.size} component(s), ${ir.edges.length} edge(s)`);
		return { ir, errors };
	}

	//==========================================================================
	// Phase 1: Typing
	//==========================================================================

	private createComponents(ir: IR, raws: readonly RawComponent[]): BlueprintError[] {
		const errors: BlueprintError[] = [];

		for (const raw of raws) {
			const kind = parseKind(raw.kind);
			if (kind === undefined) {
				errors.push(BlueprintError.unknownKind(raw.id, raw.kind, raw.position));
				continue;
			}

			const component = createComponent(kind, raw);
			try {
				ir.symbols.define(raw.id, kind, component, raw.position);
			} catch (err) {
				if (!(err instanceof BlueprintError)) throw err;
				errors.push(err);
				continue;
			}
			ir.components.set(raw.id, component);
		}

		return errors;
	}

	//==========================================================================
	// Phase 2: Contracts
	//==========================================================================

	private parseContracts(ir: IR): BlueprintError[] {
		const errors: BlueprintError[] = [];

		for (const server of ir.ofKind("server")) {
			const file = server.spec.openapi;
			if (file === "") continue;
			try {
				server.spec.contract = this.contracts.parseFile(file);
				this.logger.debug(`${server.id}: loaded ${server.spec.contract.operations.size} operation(s) from ${file}`);
			} catch (err) {
				errors.push(BlueprintError.contractParse(server.id, file, err, server.position));
			}
		}

		return errors;
	}

	//==========================================================================
	// Phase 3: References
	//==========================================================================

	private resolveReferences(ir: IR): BlueprintError[] {
		const errors: BlueprintError[] = [];

		for (const component of ir.components.values()) {
			for (const { refs, type } of declaredReferences(component)) {
				for (const ref of refs) {
					const target = ir.symbols.lookup(ref);
					if (target === undefined) {
						errors.push(unresolved(ir, ref, component.id, component.position));
						continue;
					}
					link(ir, component, target.component, type);
				}
			}
		}

		return errors;
	}

	//==========================================================================
	// Phase 4: Bindings
	//==========================================================================

	private resolveBindings(ir: IR): BlueprintError[] {
		const errors: BlueprintError[] = [];

		for (const usecase of ir.ofKind("usecase")) {
			if (usecase.spec.bindsTo === "") continue;
			const error = resolveBinding(ir, usecase);
			if (error !== undefined) errors.push(error);
		}

		return errors;
	}
}

//==============================================================================
// Component Construction
//==============================================================================

function createComponent(kind: Kind, raw: RawComponent): Component {
	const dependencies: Component[] = [];
	const dependents: Component[] = [];
	const base = { id: raw.id, position: raw.position, dependencies, dependents };
	const spec = raw.spec;

	switch (kind) {
	case "server":
		return {
			...base,
			kind,
			spec: {
				framework: readString(spec, "framework"),
				port: readInteger(spec, "port"),
				openapi: readString(spec, "openapi"),
				middleware: readStringList(spec, "middleware"),
				dependsOn: readStringList(spec, "depends_on"),
				contract: undefined,
			},
		};
	case "middleware":
		return {
			...base,
			kind,
			spec: {
				provider: readString(spec, "provider"),
				config: readString(spec, "config"),
				model: readString(spec, "model"),
				policy: readString(spec, "policy"),
				dependsOn: readStringList(spec, "depends_on"),
			},
		};
	case "database":
		return {
			...base,
			kind,
			spec: {
				provider: readString(spec, "provider"),
				schema: readString(spec, "schema"),
			},
		};
	case "usecase":
		return {
			...base,
			kind,
			spec: {
				bindsTo: readString(spec, "binds_to"),
				middleware: readStringList(spec, "middleware"),
				goal: readString(spec, "goal"),
				actor: readString(spec, "actor"),
				preconditions: readStringList(spec, "preconditions"),
				acceptanceCriteria: readStringList(spec, "acceptance_criteria"),
				postconditions: readStringList(spec, "postconditions"),
				binding: undefined,
			},
		};
	default:
		return exhaustive(kind);
	}
}

//==============================================================================
// Reference Helpers
//==============================================================================

interface DeclaredReferences {
	refs: readonly string[];
	type: EdgeType;
}

/**
 * String references a component declares. A usecase's binding contributes its
 * server segment; the rest of the binding is handled in phase 4.
 */
function declaredReferences(component: Component): DeclaredReferences[] {
	switch (component.kind) {
	case "server":
		return [
			{ refs: component.spec.middleware ?? [], type: "middleware" },
			{ refs: component.spec.dependsOn ?? [], type: "dependency" },
		];
	case "middleware":
		return [{ refs: component.spec.dependsOn ?? [], type: "dependency" }];
	case "database":
		return [];
	case "usecase": {
		const server = bindingServerId(component.spec.bindsTo);
		return [
			{ refs: server === "" ? [] : [server], type: "binding" },
			{ refs: component.spec.middleware ?? [], type: "middleware" },
		];
	}
	default:
		return exhaustive(component);
	}
}

/** Append an edge to the IR and to both endpoints. */
function link(ir: IR, from: Component, to: Component, type: EdgeType): void {
	from.dependencies.push(to);
	to.dependents.push(from);
	ir.edges.push({ from, to, type });
}

function unresolved(ir: IR, ref: string, componentId: string, position: Position | undefined): BlueprintError {
	return BlueprintError.unresolvedReference(ref, componentId, suggestSimilar(ref, ir.symbols.names()), position);
}

/**
 * Resolve one usecase's binds_to. Attaches the binding on success and returns
 * the error otherwise.
 */
function resolveBinding(ir: IR, usecase: UsecaseComponent): BlueprintError | undefined {
	const parsed = parseBinding(usecase.spec.bindsTo);
	if (!parsed.success) {
		return BlueprintError.format(usecase.id, "invalid binds_to: " + parsed.error, usecase.position);
	}

	const { serverId, method, path } = parsed.value;
	const symbol = ir.symbols.lookup(serverId);
	if (symbol === undefined) {
		// Already reported as an unresolved reference in phase 3
		return undefined;
	}

	const server = symbol.component;
	if (server.kind !== "server") {
		return BlueprintError.typeMismatch(usecase.id, "binds_to", serverId, "server", server.kind, usecase.position);
	}

	const contract = server.spec.contract;
	if (contract === undefined) {
		// Nothing to match against; the binding stands without an operation
		usecase.spec.binding = { serverId, method, path };
		return undefined;
	}

	const key = operationKey(method, path);
	const operation = contract.operations.get(key);
	if (operation === undefined) {
		return BlueprintError.operationNotFound(usecase.id, key, serverId, usecase.position);
	}

	usecase.spec.binding = { serverId, method, path, operation };
	return undefined;
}
