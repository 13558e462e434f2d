/**
 * Drive Ingestion Job - Type Definitions
 *
 * Shared types for the job, its configuration and the cloud client seams.
 */

// ============================================================================
// Configuration Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Effective job configuration, read from the environment
 */
export interface JobConfig {
	DRIVE_FOLDER_ID: string;
	GCS_BUCKET_NAME: string;
	LOOKBACK_DAYS: number;
	OUTPUT_PREFIX: string;
	PAGE_SIZE: number;
	DRY_RUN: boolean;
	/** Raw value, checked by validateConfig */
	LOG_LEVEL: string;
}

// ============================================================================
// Drive Types
// ============================================================================

/**
 * A Drive file with the fields the job requests
 */
export interface DriveFile {
	id: string;
	name: string;
	mimeType: string;
	/** RFC 3339 timestamp as returned by Drive */
	modifiedTime: string;
}

export interface DriveFolder {
	id: string;
	name: string;
	mimeType: string;
}

export interface ListFilesParams {
	query: string;
	pageSize: number;
	pageToken?: string;
}

export interface FilePage {
	files: DriveFile[];
	nextPageToken: string | null;
}

/**
 * The subset of the Drive v3 API the job relies on
 */
export interface DriveClient {
	listFiles(params: ListFilesParams): Promise<FilePage>;
	/** Export a Google Workspace file to the given MIME type */
	exportFile(fileId: string, mimeType: string): Promise<string>;
	/** Download the raw content of a stored file as UTF-8 text */
	downloadFile(fileId: string): Promise<string>;
	getFolder(folderId: string): Promise<DriveFolder>;
}

// ============================================================================
// Extraction Types
// ============================================================================

export type ExtractionPlan =
	| { kind: "export"; mimeType: string }
	| { kind: "download" }
	| { kind: "skip" };

export interface ExtractionResult {
	status: "extracted" | "skipped";
	text: string;
}

// ============================================================================
// Storage Types
// ============================================================================

/**
 * Destination for the staged JSONL object
 */
export interface ObjectStore {
	readonly bucketName: string;
	upload(objectName: string, body: string, contentType: string): Promise<void>;
	exists(): Promise<boolean>;
}

// ============================================================================
// Job Types
// ============================================================================

/**
 * One line of the staged JSONL object
 */
export interface IngestionRecord {
	document_id: string;
	file_name: string;
	text_content: string;
	last_modified_date: string;
	source: string;
}

export interface FileFailure {
	fileId: string;
	fileName: string;
	error: string;
}

export interface JobResult {
	query: string;
	cutoff: string;
	filesFound: number;
	recordsWritten: number;
	skipped: number;
	failed: FileFailure[];
	objectName: string | null;
	location: string | null;
	dryRun: boolean;
}

/**
 * Collaborators handed to the job, replaced by fakes in tests
 */
export interface JobDependencies {
	drive: DriveClient;
	store: ObjectStore;
	now?: Date;
	/** Sink for the JSONL body in dry-run mode */
	write?: (chunk: string) => void;
}
