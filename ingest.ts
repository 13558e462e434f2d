#!/usr/bin/env -S node --import tsx
/**
 * Drive Ingestion Job Entry Point
 *
 * Runs the CLI once and exits with its status. With no arguments this runs
 * the ingestion job, which is what the container does on start.
 */

import { runCli } from "./src/cli/index.ts";
import { printError } from "./src/cli/utils.ts";

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error) => {
		printError(`Fatal error: ${error}`);
		process.exitCode = 2;
	});
