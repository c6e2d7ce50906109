// SPDX-License-Identifier: MIT
// Generator Plugin Registry
// Ordered set of generator plugins, each enabled by the component kinds it supports.

import type { IR } from "../ir/ir.js";
import type { Kind } from "../types.js";
import type { Generator } from "./generator.js";

export interface GeneratorPlugin {
	name: string;
	create: () => Generator;
	/** Kinds that enable the plugin; empty means always enabled */
	supports: readonly Kind[];
}

export class PluginRegistry {
	private readonly plugins: GeneratorPlugin[] = [];

	/**
	 * Add a plugin, keeping registration order.
	 * @throws Error for an empty or already registered name
	 */
	register(plugin: GeneratorPlugin): void {
		if (plugin.name === "") {
			throw new Error("plugin name cannot be empty");
		}
		if (this.plugins.some((p) => p.name === plugin.name)) {
			throw new Error(`plugin "${plugin.name}" already registered`);
		}
		this.plugins.push(plugin);
	}

	names(): string[] {
		return this.plugins.map((p) => p.name);
	}

	/**
	 * Fresh generators for every plugin the IR enables, in registration order.
	 */
	generatorsFor(ir: IR): Generator[] {
		return this.plugins.filter((p) => isEnabled(p, ir)).map((p) => p.create());
	}
}

function isEnabled(plugin: GeneratorPlugin, ir: IR): boolean {
	if (plugin.supports.length === 0) return true;
	for (const component of ir.components.values()) {
		if (plugin.supports.includes(component.kind)) return true;
	}
	return false;
}
