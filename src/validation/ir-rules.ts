// SPDX-License-Identifier: MIT
// IR Validation Rules
//
// Post-build checks: dependency cycles, required fields per kind, the kind
// of every resolved reference, and the authentication requirements that
// span components. Every violation is collected; nothing stops early.

import { parseBinding } from "../contract/binding.js";
import { DEFAULT_PROVIDERS } from "../config.js";
import { BlueprintError, CycleError, exhaustive } from "../errors.js";
import type { IR } from "../ir/ir.js";
import type {
	Component,
	DatabaseComponent,
	MiddlewareComponent,
	ProviderNames,
	ServerComponent,
	UsecaseComponent,
} from "../types.js";
import { detectCycles } from "./cycle-detection.js";
import { sortDiagnostics } from "./error-messages.js";

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Run every IR rule. Diagnostics come back sorted by component ID, then message.
 */
export function validateIR(ir: IR, providers: ProviderNames = DEFAULT_PROVIDERS): BlueprintError[] {
	const errors: BlueprintError[] = [];

	for (const cycle of detectCycles(ir.components.values())) {
		errors.push(new CycleError([cycle]));
	}

	for (const component of ir.components.values()) {
		errors.push(...validateComponent(ir, component, providers));
	}

	errors.push(...validateAuthenticationRequirements(ir, providers));

	return sortDiagnostics(errors);
}

export function validateComponent(ir: IR, component: Component, providers: ProviderNames): BlueprintError[] {
	switch (component.kind) {
	case "server":
		return validateServer(ir, component);
	case "middleware":
		return validateMiddleware(component, providers);
	case "database":
		return validateDatabase(component);
	case "usecase":
		return validateUsecase(ir, component);
	default:
		return exhaustive(component);
	}
}

//==============================================================================
// Per-Kind Rules
//==============================================================================

function validateServer(ir: IR, server: ServerComponent): BlueprintError[] {
	const { id, position, spec } = server;
	const errors: BlueprintError[] = [];

	if (spec.framework === "") {
		errors.push(BlueprintError.missingField(id, "framework", undefined, position));
	}
	if (spec.port === 0) {
		errors.push(BlueprintError.missingField(id, "port", undefined, position));
	} else if (spec.port < MIN_PORT || spec.port > MAX_PORT) {
		errors.push(BlueprintError.range(id, `port must be between ${MIN_PORT} and ${MAX_PORT}, got ${spec.port}`, position));
	}

	errors.push(...checkMiddlewareRefs(ir, server, spec.middleware));
	return errors;
}

function validateMiddleware(middleware: MiddlewareComponent, providers: ProviderNames): BlueprintError[] {
	const { id, position, spec } = middleware;
	const errors: BlueprintError[] = [];

	if (spec.provider === "") {
		errors.push(BlueprintError.missingField(id, "provider", undefined, position));
	} else if (spec.provider === providers.authentication) {
		const context = `required by authentication provider "${spec.provider}"`;
		if (spec.config === "") errors.push(BlueprintError.missingField(id, "config", context, position));
	} else if (spec.provider === providers.authorization) {
		const context = `required by authorization provider "${spec.provider}"`;
		if (spec.model === "") errors.push(BlueprintError.missingField(id, "model", context, position));
		if (spec.policy === "") errors.push(BlueprintError.missingField(id, "policy", context, position));
	}

	return errors;
}

function validateDatabase(database: DatabaseComponent): BlueprintError[] {
	const { id, position, spec } = database;
	const errors: BlueprintError[] = [];

	if (spec.provider === "") errors.push(BlueprintError.missingField(id, "provider", undefined, position));
	if (spec.schema === "") errors.push(BlueprintError.missingField(id, "schema", undefined, position));

	return errors;
}

function validateUsecase(ir: IR, usecase: UsecaseComponent): BlueprintError[] {
	const { id, position, spec } = usecase;
	const errors: BlueprintError[] = [];

	if (spec.bindsTo === "") {
		errors.push(BlueprintError.missingField(id, "binds_to", undefined, position));
	} else {
		const parsed = parseBinding(spec.bindsTo);
		if (!parsed.success) {
			errors.push(BlueprintError.format(id, "invalid binds_to: " + parsed.error, position));
		} else {
			const { serverId } = parsed.value;
			const target = ir.symbols.lookup(serverId);
			if (target !== undefined && target.kind !== "server") {
				errors.push(BlueprintError.typeMismatch(id, "binds_to", serverId, "server", target.kind, position));
			}
		}
	}

	if (spec.goal === "") {
		errors.push(BlueprintError.missingField(id, "goal", undefined, position));
	}

	errors.push(...checkMiddlewareRefs(ir, usecase, spec.middleware));
	return errors;
}

/**
 * Each middleware reference that resolves must name a middleware component.
 * Unresolved references were already reported by the builder.
 */
function checkMiddlewareRefs(ir: IR, owner: Component, refs: readonly string[] | undefined): BlueprintError[] {
	const errors: BlueprintError[] = [];
	for (const ref of refs ?? []) {
		const target = ir.symbols.lookup(ref);
		if (target !== undefined && target.kind !== "middleware") {
			errors.push(BlueprintError.typeMismatch(owner.id, "middleware", ref, "middleware", target.kind, owner.position));
		}
	}
	return errors;
}

//==============================================================================
// Cross-Component Rule
//==============================================================================

/**
 * An authentication middleware that some server or usecase actually uses
 * needs a server to run in and a database on the ORM provider to store
 * its sessions. Each missing piece is reported on its own.
 */
export function validateAuthenticationRequirements(ir: IR, providers: ProviderNames = DEFAULT_PROVIDERS): BlueprintError[] {
	const authIds = new Set(
		ir.ofKind("middleware")
			.filter((m) => m.spec.provider === providers.authentication)
			.map((m) => m.id),
	);
	if (authIds.size === 0) return [];

	const users = [
		...ir.ofKind("server").map((s) => s.spec.middleware),
		...ir.ofKind("usecase").map((u) => u.spec.middleware),
	];
	const required = users.some((refs) => (refs ?? []).some((ref) => authIds.has(ref)));
	if (!required) return [];

	const errors: BlueprintError[] = [];
	const provider = providers.authentication;

	if (ir.ofKind("server").length === 0) {
		errors.push(BlueprintError.crossComponent(
			`authentication provider "${provider}" requires at least one server component`,
		));
	}
	if (!ir.ofKind("database").some((d) => d.spec.provider === providers.orm)) {
		errors.push(BlueprintError.crossComponent(
			`authentication provider "${provider}" requires a database component with provider "${providers.orm}"`,
		));
	}

	return errors;
}
