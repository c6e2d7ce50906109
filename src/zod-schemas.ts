// Blueprint Zod Schemas
// Structural schema of a specification document: top-level fields, the
// component envelope and the fields of each kind. Unknown keys are allowed
// everywhere; semantic checks (references, providers, bindings) live in the
// validator and builder.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

const StringList = z.array(z.string());

/** TCP port, 1..65535 */
const Port = z.int().min(1).max(65535);

//==============================================================================
// Kind-Specific Specs
//==============================================================================

export const ServerSpecSchema = z.looseObject({
	framework: z.string(),
	port: Port,
	openapi: z.string().optional(),
	middleware: StringList.optional(),
	depends_on: StringList.optional(),
});

export const MiddlewareSpecSchema = z.looseObject({
	provider: z.string(),
	config: z.string().optional(),
	model: z.string().optional(),
	policy: z.string().optional(),
	depends_on: StringList.optional(),
});

export const DatabaseSpecSchema = z.looseObject({
	provider: z.string(),
	schema: z.string(),
});

export const UsecaseSpecSchema = z.looseObject({
	binds_to: z.string(),
	goal: z.string(),
	middleware: StringList.optional(),
	actor: z.string().optional(),
	preconditions: StringList.optional(),
	acceptance_criteria: StringList.optional(),
	postconditions: StringList.optional(),
});

//==============================================================================
// Components
//==============================================================================

const ComponentId = z.string().min(1);

export const ComponentSchema = z.discriminatedUnion("kind", [
	z.looseObject({ id: ComponentId, kind: z.literal("server"), spec: ServerSpecSchema }),
	z.looseObject({ id: ComponentId, kind: z.literal("middleware"), spec: MiddlewareSpecSchema }),
	z.looseObject({ id: ComponentId, kind: z.literal("database"), spec: DatabaseSpecSchema }),
	z.looseObject({ id: ComponentId, kind: z.literal("usecase"), spec: UsecaseSpecSchema }),
]);

//==============================================================================
// Document
//==============================================================================

/**
 * version and name may be absent here; their presence is a semantic check,
 * reported as a missing field rather than a shape error.
 */
export const DocumentSchema = z.looseObject({
	version: z.string().optional(),
	name: z.string().optional(),
	description: z.string().optional(),
	components: z.array(ComponentSchema),
}).meta({ description: "BlueprintDocument" });
