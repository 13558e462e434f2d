/**
 * Google Drive Client
 * ===================
 *
 * Wraps the Drive v3 API from googleapis behind the DriveClient interface.
 * Credentials come from Application Default Credentials, i.e. the service
 * account the job runs as.
 */

import { type drive_v3, google } from "googleapis";
import { DRIVE_SCOPES } from "../config.ts";
import type {
	DriveClient,
	DriveFile,
	DriveFolder,
	FilePage,
	ListFilesParams,
} from "../types/index.ts";
import { logger } from "../utils/logger.ts";

const LIST_FIELDS = "nextPageToken, files(id, name, mimeType, modifiedTime)";
const FOLDER_FIELDS = "id, name, mimeType";

// ====================================
// Response Helpers
// ====================================

/**
 * Narrow a Drive API file row to the fields the job needs.
 * Returns null when any of them is missing.
 */
export function toDriveFile(row: drive_v3.Schema$File): DriveFile | null {
	const { id, name, mimeType, modifiedTime } = row;
	if (!id || !name || !mimeType || !modifiedTime) {
		return null;
	}
	return { id, name, mimeType, modifiedTime };
}

/**
 * Decode a media or export response body as UTF-8 text
 */
export function readResponseText(data: unknown): string {
	if (typeof data === "string") {
		return data;
	}
	if (Buffer.isBuffer(data)) {
		return data.toString("utf-8");
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data).toString("utf-8");
	}
	throw new Error(`Unexpected Drive response body of type ${typeof data}`);
}

// ====================================
// GoogleDriveClient Class
// ====================================

/**
 * The `files` resource calls the client makes; `drive_v3.Drive["files"]`
 * satisfies it
 */
export interface DriveFilesApi {
	list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
	export(
		params: drive_v3.Params$Resource$Files$Export,
		options: { responseType: "text" },
	): Promise<{ data: unknown }>;
	/** Media downloads answer with the body, metadata reads with a file */
	get(
		params: drive_v3.Params$Resource$Files$Get,
		options?: { responseType: "text" },
	): Promise<{ data: drive_v3.Schema$File | string }>;
}

export class GoogleDriveClient implements DriveClient {
	private files: DriveFilesApi;

	constructor(files: DriveFilesApi) {
		this.files = files;
	}

	async listFiles(params: ListFilesParams): Promise<FilePage> {
		const response = await this.files.list({
			q: params.query,
			pageSize: params.pageSize,
			pageToken: params.pageToken,
			fields: LIST_FIELDS,
			supportsAllDrives: true,
			includeItemsFromAllDrives: true,
		});

		const files: DriveFile[] = [];
		for (const row of response.data.files ?? []) {
			const file = toDriveFile(row);
			if (file) {
				files.push(file);
			} else {
				logger.warn("Dropping Drive file with incomplete metadata", { id: row.id ?? null });
			}
		}

		return { files, nextPageToken: response.data.nextPageToken ?? null };
	}

	async exportFile(fileId: string, mimeType: string): Promise<string> {
		const response = await this.files.export(
			{ fileId, mimeType },
			{ responseType: "text" },
		);
		return readResponseText(response.data);
	}

	async downloadFile(fileId: string): Promise<string> {
		const response = await this.files.get(
			{ fileId, alt: "media", supportsAllDrives: true },
			{ responseType: "text" },
		);
		return readResponseText(response.data);
	}

	async getFolder(folderId: string): Promise<DriveFolder> {
		const response = await this.files.get({
			fileId: folderId,
			fields: FOLDER_FIELDS,
			supportsAllDrives: true,
		});
		if (typeof response.data === "string") {
			throw new Error(`Drive returned a body instead of metadata for ${folderId}`);
		}
		const { id, name, mimeType } = response.data;
		if (!id || !mimeType) {
			throw new Error(`Drive returned incomplete metadata for ${folderId}`);
		}
		return { id, name: name ?? "", mimeType };
	}
}

/**
 * Create a Drive client authenticated with Application Default Credentials
 */
export function createDriveClient(): DriveClient {
	const auth = new google.auth.GoogleAuth({ scopes: DRIVE_SCOPES });
	const drive = google.drive({ version: "v3", auth });
	return new GoogleDriveClient(drive.files);
}

// ====================================
// Pagination
// ====================================

/**
 * List every file matching the query, following page tokens in order
 */
export async function listAllFiles(
	client: DriveClient,
	query: string,
	pageSize: number,
): Promise<DriveFile[]> {
	const files: DriveFile[] = [];
	let pageToken: string | undefined;
	let pages = 0;

	do {
		const page = await client.listFiles({ query, pageSize, pageToken });
		files.push(...page.files);
		pages++;
		pageToken = page.nextPageToken ?? undefined;
		logger.debug(`Fetched page ${pages}`, { files: page.files.length, more: pageToken !== undefined });
	} while (pageToken);

	return files;
}
