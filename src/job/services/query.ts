/**
 * Drive Query Construction
 * ========================
 *
 * Builds the Drive `q` expression selecting recently modified files.
 */

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Earliest (exclusive) modification time, as RFC 3339 UTC
 */
export function computeCutoff(now: Date, lookbackDays: number): string {
	return new Date(now.getTime() - lookbackDays * DAY_MS).toISOString();
}

/**
 * Escape a value for use inside a single-quoted Drive query string
 */
export function escapeQueryValue(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/**
 * Direct children of the folder, modified after the cutoff, not trashed and
 * not themselves folders
 */
export function buildDriveQuery(folderId: string, cutoff: string): string {
	return [
		`'${escapeQueryValue(folderId)}' in parents`,
		`modifiedTime > '${cutoff}'`,
		"trashed = false",
		`mimeType != '${FOLDER_MIME_TYPE}'`,
	].join(" and ");
}
