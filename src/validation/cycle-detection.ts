// SPDX-License-Identifier: MIT
// Dependency Graph Cycle Detection and Ordering
//
// Depth-first search over component dependencies. Each DFS root reports at
// most one cycle (its first back-edge); this is not an enumeration of every
// simple cycle in the graph.

import { CycleError } from "../errors.js";

//==============================================================================
// Types
//==============================================================================

/** Anything with an ID and outgoing dependency edges */
export interface GraphNode<T> {
	readonly id: string;
	readonly dependencies: readonly T[];
}

//==============================================================================
// Cycle Detection
//==============================================================================

/**
 * Detect dependency cycles.
 *
 * When the search reaches a node already on the current path, the cycle is
 * the suffix of the path starting at that node. The search from that root
 * stops there; remaining roots are still visited.
 *
 * @returns One entry per discovered cycle, each an ordered list of IDs
 */
export function detectCycles<T extends GraphNode<T>>(nodes: Iterable<T>): string[][] {
	const cycles: string[][] = [];
	const visited = new Set<string>();
	const onPath = new Set<string>();
	const path: string[] = [];

	const visit = (node: T): boolean => {
		visited.add(node.id);
		onPath.add(node.id);
		path.push(node.id);

		for (const dep of node.dependencies) {
			if (onPath.has(dep.id)) {
				cycles.push(path.slice(path.indexOf(dep.id)));
				return true;
			}
			if (!visited.has(dep.id) && visit(dep)) {
				return true;
			}
		}

		path.pop();
		onPath.delete(node.id);
		return false;
	};

	for (const node of nodes) {
		if (visited.has(node.id)) continue;
		visit(node);
		// An aborted search leaves its path behind; the next root starts clean
		path.length = 0;
		onPath.clear();
	}

	return cycles;
}

//==============================================================================
// Topological Sort
//==============================================================================

/**
 * Order nodes so that for every edge A -> B, B comes before A.
 * Ties between unrelated nodes follow iteration order and carry no meaning.
 *
 * @throws CycleError when the graph contains a cycle
 */
export function topologicalSort<T extends GraphNode<T>>(nodes: Iterable<T>): T[] {
	const all = [...nodes];
	const cycles = detectCycles(all);
	if (cycles.length > 0) {
		throw new CycleError(cycles);
	}

	const visited = new Set<string>();
	const result: T[] = [];

	const visit = (node: T): void => {
		if (visited.has(node.id)) return;
		visited.add(node.id);
		for (const dep of node.dependencies) {
			visit(dep);
		}
		result.push(node);
	};

	for (const node of all) {
		visit(node);
	}

	return result;
}
