// SPDX-License-Identifier: MIT
// Shared test fixtures

import { parseContract } from "../src/contract/parser.js";
import type { ContractDocument } from "../src/contract/types.js";
import type { BlueprintError } from "../src/errors.js";
import { Builder, type ContractLoader } from "../src/ir/builder.js";
import type { IR } from "../src/ir/ir.js";
import type { RawComponent, RawDocument } from "../src/types.js";

export function component(id: string, kind: string, spec: Record<string, unknown> = {}): RawComponent {
	return { id, kind, spec };
}

export function document(components: RawComponent[], meta: Partial<Pick<RawDocument, "version" | "name">> = {}): RawDocument {
	return { version: meta.version ?? "1.0", name: meta.name ?? "shop", components };
}

/** Contract loader that serves in-memory OpenAPI text by file name. */
export function contractsFrom(files: Record<string, string>): ContractLoader {
	return {
		parseFile(file: string): ContractDocument {
			const text = files[file];
			if (text === undefined) throw new Error(`ENOENT: no such file, open '${file}'`);
			return parseContract(text, file);
		},
	};
}

export function build(components: RawComponent[], contracts: Record<string, string> = {}): { ir: IR; errors: BlueprintError[] } {
	return new Builder({ contracts: contractsFrom(contracts) }).build(document(components));
}

export const USERS_API = `
openapi: 3.0.3
info:
  title: Users
  version: 1.0.0
paths:
  /users:
    post:
      operationId: createUser
      responses:
        "201":
          description: created
  /users/{id}:
    parameters:
      - name: id
        in: path
        required: true
        schema:
          type: string
    get:
      operationId: getUser
      responses:
        "200":
          description: ok
`;
