// SPDX-License-Identifier: MIT
// Blueprint Type Definitions
// Component kinds, typed spec variants, edges and bindings of the IR

import type { ContractDocument, Operation } from "./contract/types.js";

//==============================================================================
// Component Kinds
//==============================================================================

export const ComponentKinds = ["server", "middleware", "database", "usecase"] as const;

export type Kind = (typeof ComponentKinds)[number];

export function isKind(value: unknown): value is Kind {
	return typeof value === "string" && ComponentKinds.some((k) => k === value);
}

/**
 * Match a raw kind string against the closed enumeration.
 * Returns undefined for anything unknown.
 */
export function parseKind(value: string): Kind | undefined {
	return isKind(value) ? value : undefined;
}

//==============================================================================
// HTTP Methods
//==============================================================================

export const HttpMethods = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"] as const;

export type HttpMethod = (typeof HttpMethods)[number];

export function isHttpMethod(value: string): value is HttpMethod {
	return HttpMethods.some((m) => m === value);
}

//==============================================================================
// Source Positions
//==============================================================================

/** Source location, 1-indexed. */
export interface Position {
	file: string;
	line: number;
	column: number;
}

//==============================================================================
// Raw (untyped) Document
//==============================================================================

export interface RawComponent {
	id: string;
	kind: string;
	spec: Record<string, unknown>;
	position?: Position | undefined;
}

export interface RawDocument {
	version: string;
	name: string;
	description?: string | undefined;
	components: RawComponent[];
	position?: Position | undefined;
}

//==============================================================================
// Kind-Specific Specs
//==============================================================================
// Scalars left unset in the document hold their zero value ("" / 0).
// Lists keep the distinction between absent (undefined) and empty ([]).

export interface ServerSpec {
	framework: string;
	port: number;
	openapi: string;
	middleware: string[] | undefined;
	dependsOn: string[] | undefined;
	/** Parsed API contract, attached by the builder */
	contract: ContractDocument | undefined;
}

export interface MiddlewareSpec {
	provider: string;
	config: string;
	model: string;
	policy: string;
	dependsOn: string[] | undefined;
}

export interface DatabaseSpec {
	provider: string;
	schema: string;
}

export interface UsecaseSpec {
	bindsTo: string;
	/** Absent inherits the server's middleware; [] means explicitly none */
	middleware: string[] | undefined;
	goal: string;
	actor: string;
	preconditions: string[] | undefined;
	acceptanceCriteria: string[] | undefined;
	postconditions: string[] | undefined;
	/** Resolved route binding, attached by the builder */
	binding: Binding | undefined;
}

//==============================================================================
// Components
//==============================================================================

interface ComponentBase {
	readonly id: string;
	readonly position: Position | undefined;
	/** Components this one points at (non-owning) */
	readonly dependencies: Component[];
	/** Components pointing at this one (non-owning) */
	readonly dependents: Component[];
}

export interface ServerComponent extends ComponentBase {
	readonly kind: "server";
	readonly spec: ServerSpec;
}

export interface MiddlewareComponent extends ComponentBase {
	readonly kind: "middleware";
	readonly spec: MiddlewareSpec;
}

export interface DatabaseComponent extends ComponentBase {
	readonly kind: "database";
	readonly spec: DatabaseSpec;
}

export interface UsecaseComponent extends ComponentBase {
	readonly kind: "usecase";
	readonly spec: UsecaseSpec;
}

export type Component =
	| ServerComponent
	| MiddlewareComponent
	| DatabaseComponent
	| UsecaseComponent;

export type ComponentOfKind<K extends Kind> = Extract<Component, { kind: K }>;

//==============================================================================
// Edges and Bindings
//==============================================================================

export type EdgeType = "dependency" | "middleware" | "binding";

export interface Edge {
	readonly from: Component;
	readonly to: Component;
	readonly type: EdgeType;
}

export interface Binding {
	readonly serverId: string;
	readonly method: HttpMethod;
	readonly path: string;
	/** Documented operation, present only when the server declares a contract */
	readonly operation?: Operation | undefined;
}

//==============================================================================
// Provider Identifiers
//==============================================================================

/** Provider names that trigger provider-specific validation rules. */
export interface ProviderNames {
	authentication: string;
	authorization: string;
	orm: string;
}
