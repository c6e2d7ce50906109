// SPDX-License-Identifier: MIT
// IR Manifest Generator
// Writes a JSON view of the IR: one file for the whole graph and one per
// component, so downstream tools can read the resolved model without
// linking against the compiler.
//
// A component file holds exactly the content its component digest covers,
// so the write stage may skip it while that digest is unchanged. Edges and
// resolved operations depend on other components and on contract files;
// they live only in the graph file, which is always rewritten.

import { componentView } from "../canonicalize.js";
import { compareIds, type IR } from "../ir/ir.js";
import type { Component, Edge } from "../types.js";
import type { Generator, GeneratorOutput } from "./generator.js";
import type { GeneratorPlugin } from "./registry.js";

export const MANIFEST_FILE = "blueprint.ir.json";

export interface ManifestBinding {
	server: string;
	method: string;
	path: string;
	operationId?: string;
}

export interface ManifestComponent {
	id: string;
	kind: string;
	spec: unknown;
	dependencies: string[];
	dependents: string[];
	binding?: ManifestBinding;
}

export interface ManifestEdge {
	from: string;
	to: string;
	type: string;
}

export interface Manifest {
	version: string;
	name: string;
	description: string;
	components: ManifestComponent[];
	edges: ManifestEdge[];
}

//==============================================================================
// JSON View
//==============================================================================

function ids(components: readonly Component[]): string[] {
	return [...new Set(components.map((c) => c.id))].sort(compareIds);
}

export function manifestComponent(component: Component): ManifestComponent {
	const entry: ManifestComponent = {
		id: component.id,
		kind: component.kind,
		spec: componentView(component).spec,
		dependencies: ids(component.dependencies),
		dependents: ids(component.dependents),
	};

	if (component.kind === "usecase" && component.spec.binding !== undefined) {
		const { serverId, method, path, operation } = component.spec.binding;
		const binding: ManifestBinding = { server: serverId, method, path };
		if (operation !== undefined && operation.operationId !== "") binding.operationId = operation.operationId;
		entry.binding = binding;
	}

	return entry;
}

function compareEdges(a: ManifestEdge, b: ManifestEdge): number {
	return compareIds(a.from, b.from) || compareIds(a.to, b.to) || compareIds(a.type, b.type);
}

function manifestEdge(edge: Edge): ManifestEdge {
	return { from: edge.from.id, to: edge.to.id, type: edge.type };
}

/**
 * Deterministic JSON view of the IR: components by ID, edges by endpoints.
 */
export function buildManifest(ir: IR): Manifest {
	return {
		version: ir.metadata.version,
		name: ir.metadata.name,
		description: ir.metadata.description,
		components: ir.sortedComponents().map(manifestComponent),
		edges: ir.edges.map(manifestEdge).sort(compareEdges),
	};
}

function toJSON(value: unknown): string {
	return JSON.stringify(value, null, 2) + "\n";
}

//==============================================================================
// Generator
//==============================================================================

export class ManifestGenerator implements Generator {
	readonly name = "manifest";

	generate(ir: IR): GeneratorOutput {
		const manifest = buildManifest(ir);
		return {
			files: [
				{ path: MANIFEST_FILE, content: toJSON(manifest), strategy: "overwrite" },
				...ir.sortedComponents().map((component) => ({
					path: `components/${component.id}.json`,
					content: toJSON(componentView(component)),
					strategy: "overwrite" as const,
					componentId: component.id,
				})),
			],
		};
	}
}

export const manifestPlugin: GeneratorPlugin = {
	name: "manifest",
	create: () => new ManifestGenerator(),
	supports: [],
};
