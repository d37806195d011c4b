/**
 * Shared CLI output helpers.
 */

import { formatError } from "./errors.js";
import { redactSensitive } from "./redact.js";

/**
 * Print any value as formatted JSON to stdout.
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Write a diagnostic line to stderr. stdout is reserved for JSON results.
 */
export function logDiagnostic(message: string): void {
  console.error(redactSensitive(message));
}

/**
 * Print an error as JSON and exit with code 1.
 *
 * CofferErrors carry a code and a suggestion so the caller knows what to do next.
 */
export function handleError(error: unknown): never {
  const formatted = formatError(error);
  const output: Record<string, unknown> = { error: formatted.message };
  if (formatted.code !== undefined) {
    output.code = formatted.code;
    output.suggestion = formatted.suggestion;
  }
  if (formatted.details !== undefined) {
    output.details = formatted.details;
  }
  printJson(output);
  process.exit(1);
}
