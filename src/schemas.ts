// Blueprint JSON Schemas
// Generated from Zod schemas via z.toJSONSchema()

import { z } from "zod/v4";
import { DocumentSchema } from "./zod-schemas.js";

//==============================================================================
// Generated JSON Schemas
//==============================================================================

export const blueprintSchema = z.toJSONSchema(DocumentSchema, { target: "draft-07" });

//==============================================================================
// Schema Type Guards
//==============================================================================

function isSchemaWithDescription(obj: unknown, description: string): obj is Record<string, unknown> {
	return typeof obj === "object" && obj !== null && "$schema" in obj && "description" in obj && obj.description === description;
}

export function isBlueprintSchema(obj: unknown): obj is Record<string, unknown> {
	return isSchemaWithDescription(obj, "BlueprintDocument");
}
