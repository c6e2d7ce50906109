// SPDX-License-Identifier: MIT
// Symbol Table
// Per-compile registry of component names. Owned by one IR; never shared.

import { BlueprintError } from "../errors.js";
import type { Component, Kind, Position } from "../types.js";

export interface SymbolEntry {
	readonly name: string;
	readonly kind: Kind;
	readonly component: Component;
}

export class SymbolTable {
	private readonly symbols = new Map<string, SymbolEntry>();

	/**
	 * Register a name. Append-only: redefining a name throws DuplicateSymbol.
	 */
	define(name: string, kind: Kind, component: Component, position?: Position): void {
		const existing = this.symbols.get(name);
		if (existing !== undefined) {
			throw BlueprintError.duplicateSymbol(name, existing.kind, position);
		}
		this.symbols.set(name, { name, kind, component });
	}

	lookup(name: string): SymbolEntry | undefined {
		return this.symbols.get(name);
	}

	names(): string[] {
		return [...this.symbols.keys()];
	}

	all(): SymbolEntry[] {
		return [...this.symbols.values()];
	}

	get size(): number {
		return this.symbols.size;
	}
}
