/**
 * Drive Ingestion Job - Configuration
 *
 * Centralized configuration management using process.env with sensible defaults.
 */

import type { JobConfig, LogLevel } from "./types/index.ts";

/**
 * Read-only Drive access is all the job needs
 */
export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.readonly"];

/**
 * Value of the `source` field on every record
 */
export const RECORD_SOURCE = "Google Drive";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export const DEFAULT_LOOKBACK_DAYS = 7;
/** About a century */
export const MAX_LOOKBACK_DAYS = 36500;
export const DEFAULT_OUTPUT_PREFIX = "drive_data_";
export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

type Env = Record<string, string | undefined>;

/**
 * Parse environment variable as integer with default
 */
export function envInt(env: Env, key: string, defaultValue: number): number {
	const value = env[key];
	if (value === undefined) return defaultValue;
	const parsed = parseInt(value, 10);
	return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse environment variable as boolean
 */
export function envBool(env: Env, key: string, defaultValue: boolean): boolean {
	const value = env[key]?.trim().toLowerCase();
	if (value === undefined || value === "") return defaultValue;
	return value === "true" || value === "1" || value === "yes";
}

function envString(env: Env, key: string, defaultValue: string): string {
	const value = env[key]?.trim();
	return value === undefined || value === "" ? defaultValue : value;
}

/**
 * Build the job configuration from environment variables.
 * Nothing is validated here; see validateConfig.
 */
export function loadConfig(env: Env = process.env): JobConfig {
	return {
		// Source and destination
		DRIVE_FOLDER_ID: envString(env, "DRIVE_FOLDER_ID", ""),
		GCS_BUCKET_NAME: envString(env, "GCS_BUCKET_NAME", ""),

		// Selection
		LOOKBACK_DAYS: envInt(env, "LOOKBACK_DAYS", DEFAULT_LOOKBACK_DAYS),
		PAGE_SIZE: envInt(env, "PAGE_SIZE", DEFAULT_PAGE_SIZE),

		// Output
		OUTPUT_PREFIX: envString(env, "OUTPUT_PREFIX", DEFAULT_OUTPUT_PREFIX),
		DRY_RUN: envBool(env, "DRY_RUN", false),

		// Logging
		LOG_LEVEL: envString(env, "LOG_LEVEL", "info").toLowerCase(),
	};
}

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]{1,220}[a-z0-9]$/;

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate configuration before any client is created
 *
 * @returns Array of error messages, empty if valid
 */
export function validateConfig(cfg: JobConfig): string[] {
	const errors: string[] = [];

	if (!cfg.DRIVE_FOLDER_ID) {
		errors.push("DRIVE_FOLDER_ID is required");
	}

	if (!cfg.GCS_BUCKET_NAME) {
		errors.push("GCS_BUCKET_NAME is required");
	} else if (!BUCKET_NAME_PATTERN.test(cfg.GCS_BUCKET_NAME)) {
		errors.push(`Invalid GCS_BUCKET_NAME: ${cfg.GCS_BUCKET_NAME}`);
	}

	if (cfg.LOOKBACK_DAYS < 1 || cfg.LOOKBACK_DAYS > MAX_LOOKBACK_DAYS) {
		errors.push(`LOOKBACK_DAYS must be between 1 and ${MAX_LOOKBACK_DAYS}`);
	}

	if (cfg.PAGE_SIZE < 1 || cfg.PAGE_SIZE > MAX_PAGE_SIZE) {
		errors.push(`PAGE_SIZE must be between 1 and ${MAX_PAGE_SIZE}`);
	}

	if (cfg.OUTPUT_PREFIX.startsWith("/")) {
		errors.push("OUTPUT_PREFIX must not start with '/'");
	}

	if (!isLogLevel(cfg.LOG_LEVEL)) {
		errors.push(`Invalid LOG_LEVEL: ${cfg.LOG_LEVEL}`);
	}

	return errors;
}

/**
 * Print configuration banner
 */
export function printConfig(cfg: JobConfig): void {
	console.log("=".repeat(60));
	console.log("Drive Ingestion Job Configuration");
	console.log("=".repeat(60));
	console.log(`  Runtime:     Node.js ${process.version}`);
	console.log(`  Folder:      ${cfg.DRIVE_FOLDER_ID}`);
	console.log(`  Bucket:      gs://${cfg.GCS_BUCKET_NAME}`);
	console.log(`  Lookback:    ${cfg.LOOKBACK_DAYS} day(s)`);
	console.log(`  Prefix:      ${cfg.OUTPUT_PREFIX}`);
	console.log(`  Dry run:     ${cfg.DRY_RUN ? "yes" : "no"}`);
	console.log(`  Log Level:   ${cfg.LOG_LEVEL}`);
	console.log("=".repeat(60));
}
