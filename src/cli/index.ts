/**
 * Drive Ingestion CLI
 *
 * Usage: drive-ingest [command]
 *
 * Commands:
 *   run                      Run the ingestion job once (default)
 *   check                    Validate configuration and cloud access
 *   query                    Print the Drive query the job would issue
 *   help                     Show help message
 *   version                  Show version information
 */

import { loadConfig, printConfig, validateConfig } from "../job/config.ts";
import {
	buildDriveQuery,
	computeCutoff,
	createDriveClient,
	FOLDER_MIME_TYPE,
	GcsObjectStore,
	runIngestionJob,
} from "../job/services/index.ts";
import type { DriveClient, JobConfig, ObjectStore } from "../job/types/index.ts";
import { describeError } from "../job/utils/errors.ts";
import { logger } from "../job/utils/logger.ts";
import {
	printConfigErrors,
	printError,
	printHeader,
	printInfo,
	printSuccess,
	printWarning,
} from "./utils.ts";

// Version information
export const VERSION = "1.0.0";

/**
 * Exit codes of a run
 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_FATAL = 2;

/**
 * Builds the cloud clients; replaced in tests
 */
export interface ServiceFactory {
	createDrive(): DriveClient;
	createStore(bucketName: string): ObjectStore;
}

export const defaultServiceFactory: ServiceFactory = {
	createDrive: () => createDriveClient(),
	createStore: (bucketName) => new GcsObjectStore(bucketName),
};

// ====================================
// Help Command
// ====================================

function showVersion(): void {
	console.log(`Drive Ingestion Job v${VERSION}`);
	console.log(`Runtime: Node.js ${process.version}`);
}

export function showHelp(): void {
	console.log(`Drive Ingestion Job v${VERSION}

Usage: drive-ingest [command]

Commands:
  run          Run the ingestion job once (default)
  check        Validate configuration, Drive folder access and the bucket
  query        Print the Drive query the job would issue now
  help         Show this help message
  version      Show version information

Environment Variables:
  DRIVE_FOLDER_ID   Drive folder to ingest (required)
  GCS_BUCKET_NAME   Staging bucket (required)
  LOOKBACK_DAYS     Only files modified in the last N days, 1-36500 (default: 7)
  OUTPUT_PREFIX     Object name prefix (default: drive_data_)
  PAGE_SIZE         Drive list page size, 1-1000 (default: 100)
  DRY_RUN           Write JSONL to stdout instead of uploading (default: false)
  LOG_LEVEL         debug, info, warn, error or silent (default: info)

Credentials are resolved with Application Default Credentials.
`);
}

// ====================================
// Commands
// ====================================

function loadValidConfig(): JobConfig | null {
	const config = loadConfig();
	const errors = validateConfig(config);
	if (errors.length > 0) {
		printConfigErrors(errors);
		return null;
	}
	return config;
}

async function runCommand(factory: ServiceFactory): Promise<number> {
	const config = loadValidConfig();
	if (!config) return EXIT_FAILURE;

	try {
		const result = await runIngestionJob(config, {
			drive: factory.createDrive(),
			store: factory.createStore(config.GCS_BUCKET_NAME),
		});

		logger.info("Job finished", {
			filesFound: result.filesFound,
			recordsWritten: result.recordsWritten,
			skipped: result.skipped,
			failed: result.failed.length,
		});

		if (result.failed.length > 0) {
			printWarning(`${result.failed.length} file(s) could not be extracted`);
			return EXIT_FAILURE;
		}
		return EXIT_OK;
	} catch (error) {
		printError(`Job failed: ${describeError(error)}`);
		return EXIT_FATAL;
	}
}

async function checkCommand(factory: ServiceFactory): Promise<number> {
	printHeader("Drive Ingestion Check");

	const config = loadValidConfig();
	if (!config) return EXIT_FAILURE;
	printConfig(config);

	let healthy = true;

	try {
		const folder = await factory.createDrive().getFolder(config.DRIVE_FOLDER_ID);
		if (folder.mimeType === FOLDER_MIME_TYPE) {
			printSuccess(`Drive folder reachable: ${folder.name}`);
		} else {
			printError(`${config.DRIVE_FOLDER_ID} is not a folder (${folder.mimeType})`);
			healthy = false;
		}
	} catch (error) {
		printError(`Drive folder not reachable: ${describeError(error)}`);
		healthy = false;
	}

	try {
		if (await factory.createStore(config.GCS_BUCKET_NAME).exists()) {
			printSuccess(`Bucket exists: gs://${config.GCS_BUCKET_NAME}`);
		} else {
			printError(`Bucket not found: gs://${config.GCS_BUCKET_NAME}`);
			healthy = false;
		}
	} catch (error) {
		printError(`Bucket not reachable: ${describeError(error)}`);
		healthy = false;
	}

	if (healthy) {
		printSuccess("All checks passed!");
		return EXIT_OK;
	}
	return EXIT_FAILURE;
}

/**
 * Settings the query depends on; the rest only matter to `run`
 */
const QUERY_SETTINGS = ["DRIVE_FOLDER_ID", "LOOKBACK_DAYS"];

function queryCommand(now: Date): number {
	const config = loadConfig();
	const errors = validateConfig(config).filter((error) =>
		QUERY_SETTINGS.some((key) => error.startsWith(key)),
	);
	if (errors.length > 0) {
		printConfigErrors(errors);
		return EXIT_FAILURE;
	}

	const cutoff = computeCutoff(now, config.LOOKBACK_DAYS);
	printInfo(`Files modified after ${cutoff}`);
	console.log(buildDriveQuery(config.DRIVE_FOLDER_ID, cutoff));
	return EXIT_OK;
}

// ====================================
// Main Entry Point
// ====================================

/**
 * Dispatch a command and return the process exit code
 */
export async function runCli(
	args: string[],
	factory: ServiceFactory = defaultServiceFactory,
): Promise<number> {
	const command = args[0] ?? "run";

	switch (command) {
		case "run":
			return runCommand(factory);

		case "check":
			return checkCommand(factory);

		case "query":
			return queryCommand(new Date());

		case "help":
		case "-h":
		case "--help":
			showHelp();
			return EXIT_OK;

		case "version":
		case "-v":
		case "--version":
			showVersion();
			return EXIT_OK;

		default:
			printError(`Unknown command: ${command}`);
			console.log("");
			showHelp();
			return EXIT_FAILURE;
	}
}
