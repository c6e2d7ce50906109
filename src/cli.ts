#!/usr/bin/env node
// Blueprint CLI
// blueprint <validate|compile|schema|help> [file] [options]

import { runCli } from "./cli-utils.js";

process.exitCode = runCli(process.argv.slice(2));
