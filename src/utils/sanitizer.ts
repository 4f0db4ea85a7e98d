/**
 * Log sanitization for the sign-in flow
 * Redacts authorization codes, state values, tokens, verifiers and secrets
 */

export type LogMetadata = Record<string, unknown>;

const REDACTED = '[REDACTED]';

// Keys whose values must never reach a log line
const SENSITIVE_KEY = /token|secret|code|verifier|state|password|credential|auth/i;

/**
 * Redact `key=value`, `key: value` and JSON `"key": "value"` pairs with sensitive keys inside free text.
 * Values stop at whitespace or `&` so query strings are redacted pair by pair.
 */
export function redactText(message: string): string {
  return message
    .replace(/\b([\w-]*(?:token|secret|verifier|password|credential)[\w-]*)([=:])\s*[^\s&]+/gi, `$1$2${REDACTED}`)
    .replace(/\b(code|state|auth[\w-]*)([=:])\s*[^\s&]+/gi, `$1$2${REDACTED}`)
    .replace(/"([\w-]*(?:token|secret|verifier|code|state)[\w-]*)"\s*:\s*"[^"]*"/gi, `"$1":"${REDACTED}"`);
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (typeof value === 'object' && value !== null) {
    const clean: LogMetadata = {};
    for (const [key, nested] of Object.entries(value)) {
      clean[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactValue(nested);
    }
    return clean;
  }
  if (typeof value === 'string') {
    return redactText(value);
  }
  return value;
}

/**
 * Sanitize log messages and metadata to prevent credential leakage
 *
 * @param message - Log message to sanitize
 * @param obj - Metadata object to sanitize
 * @returns Sanitized message and a redacted copy of the metadata
 */
export function sanitizeForLogging(message: string, obj: LogMetadata): { message: string; meta: LogMetadata } {
  const meta: LogMetadata = {};
  for (const [key, value] of Object.entries(obj)) {
    meta[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactValue(value);
  }

  return { message: redactText(message), meta };
}
