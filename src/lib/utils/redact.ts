/**
 * Redact sensitive values from strings before logging
 */

const SENSITIVE_KEYS = "password|secret|token|accessToken|credentials|data";

/**
 * Redacts sensitive values from JSON-like strings.
 * Matches patterns like "password":"value", token: 'value', accessToken="value"
 * and replaces the value portion with [REDACTED].
 */
export function redactSensitive(input: string): string {
  return input
    .replace(
      new RegExp(`"(${SENSITIVE_KEYS})"\\s*:\\s*"([^"]*)"`, "gi"),
      '"$1":"[REDACTED]"'
    )
    .replace(
      new RegExp(`'(${SENSITIVE_KEYS})'\\s*:\\s*'([^']*)'`, "gi"),
      "'$1':'[REDACTED]'"
    )
    .replace(
      new RegExp(`\\b(${SENSITIVE_KEYS})\\s*[:=]\\s*"([^"]*)"`, "gi"),
      '$1:"[REDACTED]"'
    )
    .replace(
      new RegExp(`\\b(${SENSITIVE_KEYS})\\s*[:=]\\s*'([^']*)'`, "gi"),
      "$1:'[REDACTED]'"
    )
    .replace(/\bBearer\s+[A-Za-z0-9._~+/=-]+/g, "Bearer [REDACTED]");
}
