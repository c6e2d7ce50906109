// Blueprint Logging
// Stage-tagged console output; debug lines only when verbose.

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/**
 * Console logger. Informational output goes to stdout, problems to stderr.
 */
export function createConsoleLogger(verbose = false): Logger {
	return {
		debug(message) {
			if (verbose) console.log(`[debug] ${message}`);
		},
		info(message) {
			console.log(message);
		},
		warn(message) {
			console.warn(message);
		},
		error(message) {
			console.error(message);
		},
	};
}

/** Discards everything; for tests and embedding. */
export const silentLogger: Logger = {
	debug() { /* discard */ },
	info() { /* discard */ },
	warn() { /* discard */ },
	error() { /* discard */ },
};

/**
 * Prefix every line with a stage tag, e.g. "[build] ...".
 */
export function tagged(logger: Logger, tag: string): Logger {
	return {
		debug: (message) => { logger.debug(`[${tag}] ${message}`); },
		info: (message) => { logger.info(`[${tag}] ${message}`); },
		warn: (message) => { logger.warn(`[${tag}] ${message}`); },
		error: (message) => { logger.error(`[${tag}] ${message}`); },
	};
}
