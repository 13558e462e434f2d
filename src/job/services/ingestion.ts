/**
 * Drive Ingestion Job
 * ===================
 *
 * Lists recently modified files in a Drive folder, extracts their text and
 * stages the records as a single JSONL object in Cloud Storage.
 */

import { NDJSON_CONTENT_TYPE, RECORD_SOURCE } from "../config.ts";
import type {
	DriveFile,
	FileFailure,
	IngestionRecord,
	JobConfig,
	JobDependencies,
	JobResult,
} from "../types/index.ts";
import { describeError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { listAllFiles } from "./drive.ts";
import { extractFileContent } from "./extractor.ts";
import { buildDriveQuery, computeCutoff } from "./query.ts";
import {
	describeLocation,
	formatOutputName,
	serializeRecords,
} from "./storage.ts";

export function buildRecord(file: DriveFile, text: string): IngestionRecord {
	return {
		document_id: file.id,
		file_name: file.name,
		text_content: text,
		last_modified_date: file.modifiedTime,
		source: RECORD_SOURCE,
	};
}

/**
 * Run the job once. Listing and upload failures propagate; a failure to
 * extract a single file is recorded and the file is left out.
 */
export async function runIngestionJob(
	config: JobConfig,
	deps: JobDependencies,
): Promise<JobResult> {
	const now = deps.now ?? new Date();
	const write = deps.write ?? ((chunk: string) => process.stdout.write(chunk));

	logger.info(`Starting Drive ingestion job for folder: ${config.DRIVE_FOLDER_ID}`);

	const cutoff = computeCutoff(now, config.LOOKBACK_DAYS);
	const query = buildDriveQuery(config.DRIVE_FOLDER_ID, cutoff);
	logger.info(`Drive API query: ${query}`);

	const files = await listAllFiles(deps.drive, query, config.PAGE_SIZE);
	logger.info(`Found ${files.length} files to process`);

	const records: IngestionRecord[] = [];
	const failed: FileFailure[] = [];
	let skipped = 0;

	for (const file of files) {
		try {
			const extraction = await extractFileContent(deps.drive, file);
			if (extraction.status === "skipped") {
				skipped++;
				logger.file(file.id, `Skipped extraction: ${file.name}`, { mimeType: file.mimeType });
			}
			records.push(buildRecord(file, extraction.text));
			logger.file(file.id, `Processed: ${file.name}`);
		} catch (error) {
			const message = describeError(error);
			failed.push({ fileId: file.id, fileName: file.name, error: message });
			logger.error(`Failed to extract ${file.name}`, { fileId: file.id, error: message });
		}
	}

	const result: JobResult = {
		query,
		cutoff,
		filesFound: files.length,
		recordsWritten: 0,
		skipped,
		failed,
		objectName: null,
		location: null,
		dryRun: config.DRY_RUN,
	};

	if (records.length === 0) {
		logger.info("No files were processed, skipping upload");
		return result;
	}

	const objectName = formatOutputName(config.OUTPUT_PREFIX, now);
	const body = serializeRecords(records);

	if (config.DRY_RUN) {
		write(`${body}\n`);
		logger.info(`DRY RUN: wrote ${records.length} records to stdout instead of ${objectName}`);
		return { ...result, recordsWritten: records.length, objectName };
	}

	await deps.store.upload(objectName, body, NDJSON_CONTENT_TYPE);
	const location = describeLocation(deps.store.bucketName, objectName);
	logger.info(`Uploaded ${records.length} records to ${location}`);

	return { ...result, recordsWritten: records.length, objectName, location };
}
