/**
 * Drive Ingestion CLI - Utility Functions
 *
 * Console printing helpers for CLI output.
 */

// ====================================
// ANSI Color Codes
// ====================================

export const colors = {
  red: "\x1b[0;31m",
  green: "\x1b[0;32m",
  yellow: "\x1b[0;33m",
  blue: "\x1b[0;34m",
  reset: "\x1b[0m",
} as const;

// ====================================
// Printing Functions
// ====================================

export function printHeader(message: string): void {
  console.log(`${colors.blue}======================================${colors.reset}`);
  console.log(`${colors.blue}${message}${colors.reset}`);
  console.log(`${colors.blue}======================================${colors.reset}`);
}

export function printSuccess(message: string): void {
  console.log(`${colors.green}[OK]${colors.reset} ${message}`);
}

export function printError(message: string): void {
  console.log(`${colors.red}[ERROR]${colors.reset} ${message}`);
}

export function printWarning(message: string): void {
  console.log(`${colors.yellow}[WARN]${colors.reset} ${message}`);
}

export function printInfo(message: string): void {
  console.log(`${colors.blue}[INFO]${colors.reset} ${message}`);
}

/**
 * Print each configuration error and a pointer to `help`
 */
export function printConfigErrors(errors: string[]): void {
  for (const error of errors) {
    printError(error);
  }
  console.log("Run 'drive-ingest help' for the list of environment variables");
}
