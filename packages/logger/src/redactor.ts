/**
 * Redaction for log output. Provider credentials, the credential encryption
 * key and stored ciphertext must never reach a log line.
 */

const REDACTED = "[REDACTED]";

/**
 * Property names whose values are always redacted, in the casing used in code.
 */
const SENSITIVE_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
  "encryptionKey",
  "credential",
  "ciphertext",
] as const;

const SENSITIVE_KEYS: ReadonlySet<string> = new Set(
  SENSITIVE_FIELDS.map((field) => field.toLowerCase()),
);

/**
 * Regex to detect email addresses inside string values.
 */
const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Loggable stand-in for user or document text: its size, never its content.
 */
export function describeText(text: string): { chars: number; lines: number } {
  return { chars: text.length, lines: text.length === 0 ? 0 : text.split("\n").length };
}

/**
 * JSON paths for Pino's `redact` option: every sensitive field at the top
 * level and one level of nesting (e.g. `provider.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_FIELDS,
  ...SENSITIVE_FIELDS.map((field) => `*.${field}`),
];
