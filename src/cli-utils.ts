/**
 * Blueprint CLI Utilities
 *
 * Kept apart from the bin entry so they can be tested:
 * - Argument parsing (commands, flags and options with values)
 * - Option resolution from flags and an optional options file
 * - Running a command and reporting diagnostics
 */

import { loadOptionsFile, resolveOptions, type CompilerOptions, type CompilerOptionsInput } from "./config.js";
import { BlueprintError, StageError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { compile, validate } from "./pipeline.js";
import { blueprintSchema } from "./schemas.js";
import { formatDiagnostic } from "./validation/error-messages.js";

export const Commands = ["validate", "compile", "schema", "help"] as const;

export type Command = (typeof Commands)[number];

export function isCommand(value: string): value is Command {
	return Commands.some((c) => c === value);
}

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	help: boolean;
	cache: boolean;
	out?: string;
	config?: string;
}

export interface ParsedArgs {
	command: string | null;
	path: string | null;
	options: Options;
	/** Flags that were not recognised */
	unknown: string[];
}

export const USAGE = `Usage: blueprint <command> [file] [options]

Commands:
  validate <file>   Check a specification and report every problem
  compile <file>    Validate, then generate artifacts
  schema            Print the JSON Schema of specification documents
  help              Show this message

Options:
  -o, --out <dir>       Output directory (default: generated)
  -c, --config <file>   JSON file with compiler options
  --no-cache            Regenerate every artifact
  -v, --verbose         Print debug output
  -h, --help            Show this message`;

//==============================================================================
// Argument Parsing
//==============================================================================

function consumeNextArg(args: string[], i: number): string | undefined {
	if (i + 1 < args.length) {
		const nextArg = args[i + 1];
		if (nextArg && !nextArg.startsWith("-")) return nextArg;
	}
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--no-cache": options.cache = false; return true;
	default: return false;
	}
}

const VALUE_OPTIONS = new Set(["--out", "-o", "--config", "-c"]);

function processValueOption(options: Options, arg: string, nextVal: string): void {
	if (arg === "--out" || arg === "-o") options.out = nextVal;
	else if (arg === "--config" || arg === "-c") options.config = nextVal;
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 *
 * The first positional argument is the command, the second the document path.
 * An option missing its value is reported as unknown.
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: Options = { verbose: false, help: false, cache: true };
	const positional: string[] = [];
	const unknown: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (VALUE_OPTIONS.has(arg)) {
			const nextVal = consumeNextArg(args, i);
			if (nextVal === undefined) {
				unknown.push(arg);
				continue;
			}
			processValueOption(options, arg, nextVal);
			i++;
			continue;
		}
		if (arg.startsWith("-")) {
			unknown.push(arg);
			continue;
		}
		positional.push(arg);
	}

	return {
		command: positional[0] ?? null,
		path: positional[1] ?? null,
		options,
		unknown,
	};
}

/**
 * Compiler options from CLI flags, layered over the options file when one is given.
 */
export function optionsFromArgs(options: Options): CompilerOptions {
	const overrides: CompilerOptionsInput = {};
	if (options.verbose) overrides.verbose = true;
	if (!options.cache) overrides.cache = false;
	if (options.out !== undefined) overrides.outDir = options.out;

	return options.config !== undefined
		? loadOptionsFile(options.config, overrides)
		: resolveOptions(overrides);
}

//==============================================================================
// Running
//==============================================================================

/**
 * Log every diagnostic of an error, one per line.
 */
export function reportError(logger: Logger, err: BlueprintError): void {
	const errors = err instanceof StageError ? err.errors : [err];
	for (const error of errors) {
		logger.error(formatDiagnostic(error.toDiagnostic()));
	}
	if (err instanceof StageError) logger.error(err.message);
}

/**
 * Run the CLI and return the process exit code: 0 on success, 1 on any
 * diagnostic or usage error.
 */
export function runCli(args: string[], createLogger: (verbose: boolean) => Logger = createConsoleLogger): number {
	const parsed = parseArgs(args);
	let logger = createLogger(parsed.options.verbose);

	if (parsed.unknown.length > 0) {
		logger.error(`unknown option(s): ${parsed.unknown.join(", ")}`);
		logger.error(USAGE);
		return 1;
	}
	if (parsed.options.help || parsed.command === "help") {
		logger.info(USAGE);
		return 0;
	}
	if (parsed.command === null || !isCommand(parsed.command)) {
		if (parsed.command !== null) logger.error(`unknown command "${parsed.command}"`);
		logger.error(USAGE);
		return 1;
	}
	if (parsed.command === "schema") {
		logger.info(JSON.stringify(blueprintSchema, null, 2));
		return 0;
	}
	if (parsed.path === null) {
		logger.error(`${parsed.command}: missing specification file`);
		return 1;
	}

	try {
		const options = optionsFromArgs(parsed.options);
		// The options file may turn on verbose output
		if (options.verbose && !parsed.options.verbose) logger = createLogger(true);
		if (parsed.command === "validate") {
			const ir = validate({ specPath: parsed.path, options, logger });
			logger.info(`${parsed.path}: ok (${ir.components.size} component(s))`);
		} else {
			const result = compile({ specPath: parsed.path, options, logger });
			logger.info(`${parsed.path}: compiled ${result.artifacts.length} artifact(s) into ${options.outDir}`);
		}
		return 0;
	} catch (err) {
		if (!(err instanceof BlueprintError)) throw err;
		reportError(logger, err);
		return 1;
	}
}
