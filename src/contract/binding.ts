// SPDX-License-Identifier: MIT
// Route Binding Grammar
//
//   server-id:METHOD:/path
//
// The value is split on its first two ":" characters only, so everything after
// the second colon is the path (a literal ":" in the path stays in the path).

import { HttpMethods, isHttpMethod, type HttpMethod } from "../types.js";
import type { Result } from "../utils/json-pointer.js";

export interface ParsedBinding {
	serverId: string;
	method: HttpMethod;
	path: string;
}

const FORMAT_HINT = "expected server-id:METHOD:/path";

/**
 * Parse a binds_to value.
 *
 * @example
 * parseBinding("server.api:POST:/users")
 * // { success: true, value: { serverId: "server.api", method: "POST", path: "/users" } }
 */
export function parseBinding(value: string): Result<ParsedBinding> {
	if (value === "") {
		return { success: false, error: "empty binds_to value" };
	}

	const firstColon = value.indexOf(":");
	const secondColon = firstColon === -1 ? -1 : value.indexOf(":", firstColon + 1);
	if (secondColon === -1) {
		return { success: false, error: `invalid binds_to format "${value}" (${FORMAT_HINT})` };
	}

	const serverId = value.slice(0, firstColon);
	const method = value.slice(firstColon + 1, secondColon);
	const path = value.slice(secondColon + 1);

	if (serverId === "") {
		return { success: false, error: `missing server id in binds_to "${value}" (${FORMAT_HINT})` };
	}
	if (!isHttpMethod(method)) {
		return {
			success: false,
			error: `invalid HTTP method "${method}" in binds_to (one of ${HttpMethods.join(", ")})`,
		};
	}
	if (!path.startsWith("/")) {
		return { success: false, error: `path in binds_to must start with /, got "${path}"` };
	}

	return { success: true, value: { serverId, method, path } };
}

/**
 * The server segment of a binds_to value: the text before the first ":".
 * Empty when the value has no colon.
 */
export function bindingServerId(value: string): string {
	const colon = value.indexOf(":");
	return colon === -1 ? "" : value.slice(0, colon);
}
