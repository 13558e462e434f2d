/**
 * Unit Tests for Drive Client Helpers
 */

import type { drive_v3 } from "googleapis";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
	type DriveFilesApi,
	GoogleDriveClient,
	listAllFiles,
	readResponseText,
	toDriveFile,
} from "../services/drive.ts";
import { FakeDriveClient, makeFile } from "./fakes.ts";

describe("toDriveFile", () => {
	test("keeps the requested fields", () => {
		const file = toDriveFile({
			id: "abc",
			name: "Plan",
			mimeType: "text/plain",
			modifiedTime: "2026-10-18T09:30:00.000Z",
			size: "42",
		});

		expect(file).toEqual({
			id: "abc",
			name: "Plan",
			mimeType: "text/plain",
			modifiedTime: "2026-10-18T09:30:00.000Z",
		});
	});

	test("returns null when a field is missing or null", () => {
		expect(toDriveFile({ id: "abc", name: "Plan", mimeType: "text/plain" })).toBeNull();
		expect(
			toDriveFile({
				id: null,
				name: "Plan",
				mimeType: "text/plain",
				modifiedTime: "2026-10-18T09:30:00.000Z",
			}),
		).toBeNull();
	});
});

describe("readResponseText", () => {
	test("returns strings as-is", () => {
		expect(readResponseText("hello")).toBe("hello");
	});

	test("decodes buffers as UTF-8", () => {
		expect(readResponseText(Buffer.from("héllo", "utf-8"))).toBe("héllo");
	});

	test("decodes array buffers", () => {
		const bytes = new TextEncoder().encode("plain");
		const copy = new ArrayBuffer(bytes.byteLength);
		new Uint8Array(copy).set(bytes);

		expect(readResponseText(copy)).toBe("plain");
	});

	test("throws on other bodies", () => {
		expect(() => readResponseText({ kind: "drive#file" })).toThrow(
			"Unexpected Drive response body of type object",
		);
	});
});

describe("listAllFiles", () => {
	const originalLevel = process.env.LOG_LEVEL;

	beforeEach(() => {
		process.env.LOG_LEVEL = "silent";
	});

	afterEach(() => {
		if (originalLevel === undefined) {
			delete process.env.LOG_LEVEL;
		} else {
			process.env.LOG_LEVEL = originalLevel;
		}
	});

	test("returns a single page", async () => {
		const client = new FakeDriveClient([[makeFile({ id: "a" })]]);

		const files = await listAllFiles(client, "q", 50);

		expect(files.map((f) => f.id)).toEqual(["a"]);
		expect(client.listCalls).toEqual([{ query: "q", pageSize: 50, pageToken: undefined }]);
	});

	test("follows page tokens in order", async () => {
		const client = new FakeDriveClient([
			[makeFile({ id: "a" }), makeFile({ id: "b" })],
			[makeFile({ id: "c" })],
			[makeFile({ id: "d" })],
		]);

		const files = await listAllFiles(client, "q", 2);

		expect(files.map((f) => f.id)).toEqual(["a", "b", "c", "d"]);
		expect(client.listCalls.map((c) => c.pageToken)).toEqual([undefined, "1", "2"]);
	});

	test("returns nothing for an empty folder", async () => {
		const client = new FakeDriveClient([[]]);

		expect(await listAllFiles(client, "q", 100)).toEqual([]);
		expect(client.listCalls).toHaveLength(1);
	});
});

describe("GoogleDriveClient", () => {
	const originalLevel = process.env.LOG_LEVEL;
	let warnings: string[];

	beforeEach(() => {
		delete process.env.LOG_LEVEL;
		warnings = [];
		vi.spyOn(console, "warn").mockImplementation((...args: unknown[]) => {
			warnings.push(args.map(String).join(" "));
		});
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		if (originalLevel === undefined) {
			delete process.env.LOG_LEVEL;
		} else {
			process.env.LOG_LEVEL = originalLevel;
		}
	});

	function stubFiles(
		page: drive_v3.Schema$FileList,
		body: drive_v3.Schema$File | string = "",
	) {
		const list = vi.fn(async (_params: drive_v3.Params$Resource$Files$List) => ({ data: page }));
		const exportFile = vi.fn(
			async (_params: drive_v3.Params$Resource$Files$Export, _options: { responseType: "text" }) => ({
				data: "exported text",
			}),
		);
		const get = vi.fn(
			async (
				_params: drive_v3.Params$Resource$Files$Get,
				_options?: { responseType: "text" },
			): Promise<{ data: drive_v3.Schema$File | string }> => ({ data: body }),
		);
		const files: DriveFilesApi = { list, export: exportFile, get };
		return { files, list, exportFile, get };
	}

	test("sends the field mask and shared-drive flags", async () => {
		const { files, list } = stubFiles({ files: [] });
		const client = new GoogleDriveClient(files);

		await client.listFiles({ query: "'folder-123' in parents", pageSize: 50, pageToken: "tok-2" });

		expect(list).toHaveBeenCalledWith({
			q: "'folder-123' in parents",
			pageSize: 50,
			pageToken: "tok-2",
			fields: "nextPageToken, files(id, name, mimeType, modifiedTime)",
			supportsAllDrives: true,
			includeItemsFromAllDrives: true,
		});
	});

	test("drops incomplete rows with a warning and keeps the rest", async () => {
		const { files } = stubFiles({
			files: [
				{ id: "a", name: "Plan", mimeType: "text/plain", modifiedTime: "2026-10-18T09:30:00.000Z" },
				{ id: "no-time", name: "Draft", mimeType: "text/plain" },
				{ id: "b", name: "Budget", mimeType: "text/csv", modifiedTime: "2026-10-17T08:00:00.000Z" },
			],
			nextPageToken: "tok-2",
		});
		const client = new GoogleDriveClient(files);

		const page = await client.listFiles({ query: "q", pageSize: 100 });

		expect(page.files.map((f) => f.id)).toEqual(["a", "b"]);
		expect(page.nextPageToken).toBe("tok-2");
		expect(warnings).toHaveLength(1);
		expect(warnings[0]).toContain('[WARN ] Dropping Drive file with incomplete metadata {"id":"no-time"}');
	});

	test("maps a missing page token and file list to null and empty", async () => {
		const { files } = stubFiles({ nextPageToken: null });
		const client = new GoogleDriveClient(files);

		expect(await client.listFiles({ query: "q", pageSize: 100 })).toEqual({ files: [], nextPageToken: null });
	});

	test("exports as text", async () => {
		const { files, exportFile } = stubFiles({});
		const client = new GoogleDriveClient(files);

		expect(await client.exportFile("doc-1", "text/csv")).toBe("exported text");
		expect(exportFile).toHaveBeenCalledWith({ fileId: "doc-1", mimeType: "text/csv" }, { responseType: "text" });
	});

	test("downloads media as text", async () => {
		const { files, get } = stubFiles({}, "line one");
		const client = new GoogleDriveClient(files);

		expect(await client.downloadFile("txt-1")).toBe("line one");
		expect(get).toHaveBeenCalledWith(
			{ fileId: "txt-1", alt: "media", supportsAllDrives: true },
			{ responseType: "text" },
		);
	});

	test("reads folder metadata", async () => {
		const { files, get } = stubFiles({}, {
			id: "folder-123",
			name: "Staging",
			mimeType: "application/vnd.google-apps.folder",
		});
		const client = new GoogleDriveClient(files);

		expect(await client.getFolder("folder-123")).toEqual({
			id: "folder-123",
			name: "Staging",
			mimeType: "application/vnd.google-apps.folder",
		});
		expect(get).toHaveBeenCalledWith({
			fileId: "folder-123",
			fields: "id, name, mimeType",
			supportsAllDrives: true,
		});
	});

	test("rejects folder metadata without an id", async () => {
		const { files } = stubFiles({}, { name: "Staging" });
		const client = new GoogleDriveClient(files);

		await expect(client.getFolder("folder-123")).rejects.toThrow(
			"Drive returned incomplete metadata for folder-123",
		);
	});
});
