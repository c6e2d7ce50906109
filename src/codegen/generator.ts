// SPDX-License-Identifier: MIT
// Generator Contract
// Generators read a validated IR and return files; they never mutate the IR.

import type { IR } from "../ir/ir.js";

/**
 * How a file is written on repeat runs:
 * - overwrite: always replaced
 * - create-once: written only when absent, so user edits survive
 */
export type WriteStrategy = "overwrite" | "create-once";

export interface GeneratedFile {
	/** Output path, relative to the output directory, "/"-separated */
	path: string;
	content: string;
	strategy: WriteStrategy;
	/** Component this file belongs to; absent for shared files */
	componentId?: string;
}

export interface GeneratorOutput {
	files: GeneratedFile[];
}

export interface Generator {
	readonly name: string;
	generate(ir: IR): GeneratorOutput;
}
