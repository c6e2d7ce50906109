// SPDX-License-Identifier: MIT
// Blueprint Build Cache
//
// Content-addressed record of the last successful compile: the spec digest,
// each component's digest and the artifacts written for it. A cache file in
// an older or unknown format is discarded whole; there is no migration.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod/v4";
import { componentDigest, specDigest } from "./canonicalize.js";
import { BlueprintError } from "./errors.js";
import { compareIds, type IR } from "./ir/ir.js";

export const CACHE_VERSION = "1.0";

//==============================================================================
// File Format
//==============================================================================

const CachedComponentSchema = z.object({
	hash: z.string(),
	artifacts: z.array(z.string()).default([]),
});

/** Just enough of a file to read its version, whatever its layout. */
const VersionedFileSchema = z.looseObject({
	cache_version: z.unknown(),
});

const CacheFileSchema = z.looseObject({
	cache_version: z.string().optional(),
	specHash: z.string().default(""),
	components: z.record(z.string(), CachedComponentSchema).default({}),
});

export interface CachedComponent {
	hash: string;
	artifacts: string[];
}

export interface CacheFile {
	cache_version: string;
	specHash: string;
	components: Record<string, CachedComponent>;
}

//==============================================================================
// Cache
//==============================================================================

export class BuildCache {
	/** Digest of the last compiled specification; the write stage compares it */
	specHash = "";
	readonly components = new Map<string, CachedComponent>();

	/**
	 * Load a cache file. A missing file, or one without the current
	 * `cache_version`, yields an empty cache whatever the rest of its layout.
	 * @throws BlueprintError (CacheError) for unreadable files, invalid JSON or a wrong shape under the current version
	 */
	static load(path: string): BuildCache {
		if (!existsSync(path)) return new BuildCache();

		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(path, "utf8"));
		} catch (err) {
			throw BlueprintError.cache("load", err);
		}

		const versioned = VersionedFileSchema.safeParse(raw);
		if (!versioned.success || versioned.data.cache_version !== CACHE_VERSION) {
			return new BuildCache();
		}

		const parsed = CacheFileSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue === undefined ? "" : " at " + (issue.path.map(String).join(".") || "$");
			throw BlueprintError.cache("load", new Error("unexpected cache file shape" + where));
		}

		const cache = new BuildCache();
		cache.specHash = parsed.data.specHash;
		for (const [id, entry] of Object.entries(parsed.data.components)) {
			cache.components.set(id, { hash: entry.hash, artifacts: [...entry.artifacts] });
		}
		return cache;
	}

	/**
	 * Write the cache as indented JSON, creating the directory if needed.
	 */
	save(path: string): void {
		try {
			mkdirSync(dirname(path), { recursive: true });
			writeFileSync(path, JSON.stringify(this.toJSON(), null, 2) + "\n", "utf8");
		} catch (err) {
			throw BlueprintError.cache("save", err);
		}
	}

	/** Serialisable form, components ordered by ID. */
	toJSON(): CacheFile {
		const components: Record<string, CachedComponent> = {};
		for (const id of [...this.components.keys()].sort(compareIds)) {
			const entry = this.components.get(id);
			if (entry !== undefined) components[id] = { hash: entry.hash, artifacts: [...entry.artifacts] };
		}
		return { cache_version: CACHE_VERSION, specHash: this.specHash, components };
	}

	/**
	 * Replace every hash with the IR's. Artifact lists start empty and are
	 * filled in with setArtifacts once files are written.
	 */
	update(ir: IR): void {
		this.specHash = specDigest(ir);
		this.components.clear();
		for (const component of ir.components.values()) {
			this.components.set(component.id, { hash: componentDigest(component), artifacts: [] });
		}
	}

	/** No-op for components the cache does not know. */
	setArtifacts(componentId: string, artifacts: readonly string[]): void {
		const entry = this.components.get(componentId);
		if (entry !== undefined) entry.artifacts = [...artifacts];
	}

	/** The cached hash, or "" when the component is not cached. */
	getComponentHash(componentId: string): string {
		return this.components.get(componentId)?.hash ?? "";
	}

	hasComponent(componentId: string): boolean {
		return this.components.has(componentId);
	}

	/** IDs of components that are new or whose hash differs, sorted. */
	changedComponents(ir: IR): string[] {
		const changed: string[] = [];
		for (const component of ir.components.values()) {
			if (this.getComponentHash(component.id) !== componentDigest(component)) {
				changed.push(component.id);
			}
		}
		return changed.sort(compareIds);
	}

	/** IDs present in the cache but no longer in the IR, sorted. */
	removedComponents(ir: IR): string[] {
		return [...this.components.keys()].filter((id) => !ir.components.has(id)).sort(compareIds);
	}
}
