/**
 * Content Extraction
 * ==================
 *
 * Maps a Drive MIME type to an extraction strategy and runs it.
 */

import type {
	DriveClient,
	DriveFile,
	ExtractionPlan,
	ExtractionResult,
} from "../types/index.ts";

/**
 * Google Workspace types and the format each is exported to
 */
export const EXPORT_FORMATS: Readonly<Record<string, string>> = {
	"application/vnd.google-apps.document": "text/plain",
	"application/vnd.google-apps.presentation": "text/plain",
	// Drive exports only the first sheet as CSV
	"application/vnd.google-apps.spreadsheet": "text/csv",
};

const DOWNLOADABLE_TYPES = new Set(["application/json", "application/xml"]);

/**
 * Decide how to obtain text for a MIME type
 */
export function resolveExtraction(mimeType: string): ExtractionPlan {
	const exportType = EXPORT_FORMATS[mimeType];
	if (exportType) {
		return { kind: "export", mimeType: exportType };
	}

	if (mimeType.startsWith("text/") || DOWNLOADABLE_TYPES.has(mimeType)) {
		return { kind: "download" };
	}

	return { kind: "skip" };
}

export function skippedContent(mimeType: string): string {
	return `Content extraction skipped for file type: ${mimeType}`;
}

/**
 * Fetch the text content of a file. Errors from Drive propagate.
 */
export async function extractFileContent(
	client: DriveClient,
	file: DriveFile,
): Promise<ExtractionResult> {
	const plan = resolveExtraction(file.mimeType);

	switch (plan.kind) {
		case "export":
			return {
				status: "extracted",
				text: await client.exportFile(file.id, plan.mimeType),
			};
		case "download":
			return {
				status: "extracted",
				text: await client.downloadFile(file.id),
			};
		case "skip":
			return { status: "skipped", text: skippedContent(file.mimeType) };
	}
}
