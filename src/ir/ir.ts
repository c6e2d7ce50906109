// SPDX-License-Identifier: MIT
// Blueprint Intermediate Representation
// Aggregate root for one compile run: components, derived edges, symbol table

import { BlueprintError } from "../errors.js";
import type { Component, ComponentOfKind, Edge, Kind } from "../types.js";
import { SymbolTable } from "./symbols.js";

export interface DocumentMetadata {
	version: string;
	name: string;
	description: string;
}

export class IR {
	readonly metadata: DocumentMetadata;
	/** Directory that relative contract paths resolve against */
	readonly baseDir: string;
	readonly components = new Map<string, Component>();
	readonly edges: Edge[] = [];
	readonly symbols = new SymbolTable();

	constructor(metadata: DocumentMetadata, baseDir = "") {
		this.metadata = metadata;
		this.baseDir = baseDir;
	}

	get(id: string): Component | undefined {
		return this.components.get(id);
	}

	/**
	 * Components of one kind, in insertion order.
	 */
	ofKind<K extends Kind>(kind: K): ComponentOfKind<K>[] {
		const result: ComponentOfKind<K>[] = [];
		for (const component of this.components.values()) {
			if (isOfKind(component, kind)) result.push(component);
		}
		return result;
	}

	/**
	 * All components sorted by ID, for output that must not depend on map order.
	 */
	sortedComponents(): Component[] {
		return [...this.components.values()].sort((a, b) => compareIds(a.id, b.id));
	}

	dependenciesOf(id: string): readonly Component[] {
		const component = this.components.get(id);
		if (component === undefined) throw BlueprintError.componentNotFound(id);
		return component.dependencies;
	}

	dependentsOf(id: string): readonly Component[] {
		const component = this.components.get(id);
		if (component === undefined) throw BlueprintError.componentNotFound(id);
		return component.dependents;
	}
}

function isOfKind<K extends Kind>(component: Component, kind: K): component is ComponentOfKind<K> {
	return component.kind === kind;
}

export function compareIds(a: string, b: string): number {
	if (a < b) return -1;
	return a > b ? 1 : 0;
}
