/**
 * Services Module
 * ================
 *
 * Re-exports all service components.
 */

// Drive access
export {
  GoogleDriveClient,
  type DriveFilesApi,
  createDriveClient,
  listAllFiles,
  readResponseText,
  toDriveFile,
} from "./drive.ts";

// Text extraction
export {
  EXPORT_FORMATS,
  extractFileContent,
  resolveExtraction,
  skippedContent,
} from "./extractor.ts";

// Query construction
export {
  FOLDER_MIME_TYPE,
  buildDriveQuery,
  computeCutoff,
  escapeQueryValue,
} from "./query.ts";

// Cloud Storage staging
export {
  GcsObjectStore,
  type StorageApi,
  describeLocation,
  formatOutputName,
  serializeRecords,
} from "./storage.ts";

// The job itself
export { buildRecord, runIngestionJob } from "./ingestion.ts";
