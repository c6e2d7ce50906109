// SPDX-License-Identifier: MIT
// Artifact Planner
// Collects generator output by path; two generators may not claim one path.

import { ArtifactConflictError, BlueprintError, ErrorCodes } from "../errors.js";
import { compareIds } from "../ir/ir.js";
import type { GeneratedFile, GeneratorOutput, WriteStrategy } from "./generator.js";

export interface Artifact {
	/** Name of the generator that planned the file */
	owner: string;
	path: string;
	content: string;
	strategy: WriteStrategy;
	componentId?: string;
}

export class ArtifactPlanner {
	private readonly byPath = new Map<string, Artifact>();

	/**
	 * @throws ArtifactConflictError when the path is already planned
	 * @throws BlueprintError (PathTraversal) for an empty path
	 */
	add(owner: string, file: GeneratedFile): void {
		if (file.path === "") {
			throw new BlueprintError(ErrorCodes.PathTraversal, `generator "${owner}" planned an artifact with an empty path`);
		}

		const existing = this.byPath.get(file.path);
		if (existing !== undefined) {
			throw new ArtifactConflictError(file.path, existing.owner, owner);
		}

		const artifact: Artifact = {
			owner,
			path: file.path,
			content: file.content,
			strategy: file.strategy,
		};
		if (file.componentId !== undefined) artifact.componentId = file.componentId;
		this.byPath.set(file.path, artifact);
	}

	addOutput(owner: string, output: GeneratorOutput): void {
		for (const file of output.files) {
			this.add(owner, file);
		}
	}

	/** Planned artifacts sorted by path. */
	artifacts(): Artifact[] {
		return [...this.byPath.values()].sort((a, b) => compareIds(a.path, b.path));
	}

	get size(): number {
		return this.byPath.size;
	}
}
