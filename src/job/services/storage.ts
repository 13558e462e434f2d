/**
 * Cloud Storage Staging
 * =====================
 *
 * JSONL serialization and the GCS-backed ObjectStore.
 */

import { Storage } from "@google-cloud/storage";
import type { IngestionRecord, ObjectStore } from "../types/index.ts";

/**
 * One JSON document per line, no trailing newline
 */
export function serializeRecords(records: IngestionRecord[]): string {
	return records.map((record) => JSON.stringify(record)).join("\n");
}

/**
 * Object name for a run: `<prefix>YYYYMMDDHHMMSS.jsonl`, in UTC
 */
export function formatOutputName(prefix: string, now: Date): string {
	const stamp = now.toISOString().replace(/[-:T]/g, "").slice(0, 14);
	return `${prefix}${stamp}.jsonl`;
}

export function describeLocation(bucketName: string, objectName: string): string {
	return `gs://${bucketName}/${objectName}`;
}

// ====================================
// GcsObjectStore Class
// ====================================

/**
 * The Storage calls the store makes; `Storage` satisfies it
 */
export interface StorageApi {
	bucket(name: string): {
		file(name: string): {
			save(data: string, options: { contentType: string; resumable: boolean }): Promise<void>;
		};
		exists(): Promise<[boolean]>;
	};
}

export class GcsObjectStore implements ObjectStore {
	readonly bucketName: string;
	private storage: StorageApi;

	constructor(bucketName: string, storage: StorageApi = new Storage()) {
		this.bucketName = bucketName;
		this.storage = storage;
	}

	async upload(objectName: string, body: string, contentType: string): Promise<void> {
		// Staged objects are small enough for a single request
		await this.storage.bucket(this.bucketName).file(objectName).save(body, {
			contentType,
			resumable: false,
		});
	}

	async exists(): Promise<boolean> {
		const [exists] = await this.storage.bucket(this.bucketName).exists();
		return exists;
	}
}
