/**
 * Redaction helpers for request logging.
 *
 * Pino's `redact` paths cover structured log fields; these helpers cover
 * ad-hoc objects assembled in hooks (headers, donor fragments, free text).
 */

import { REDACT_CENSOR } from "./logger-config.js";

const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"]);

const SENSITIVE_HEADERS = new Set(["authorization", "x-api-key", "api-key", "x-auth-token", "cookie", "set-cookie"]);

/** Donor record keys that identify a person */
const PII_KEYS = new Set(["email", "phone", "name", "donor_name", "date_of_birth", "dob", "address"]);

const MAX_STRING_LENGTH = 200;

/**
 * Drop sensitive headers entirely
 */
export function redactHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase()) || UNSAFE_KEYS.has(key)) {
      continue;
    }
    redacted[key] = value;
  }
  return redacted;
}

function truncate(value: string): string {
  return value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...` : value;
}

function redactValue(value: unknown, depth: number): unknown {
  if (typeof value === "string") return truncate(value);
  if (value === null || typeof value !== "object") return value;
  if (depth > 8) return "[TRUNCATED]";

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (UNSAFE_KEYS.has(key)) continue;
    if (PII_KEYS.has(key.toLowerCase())) {
      result[key] = REDACT_CENSOR;
    } else if (key === "headers" && child !== null && typeof child === "object" && !Array.isArray(child)) {
      result[key] = redactHeaders(Object.fromEntries(Object.entries(child)));
    } else {
      result[key] = redactValue(child, depth + 1);
    }
  }
  return result;
}

/**
 * Copy an object for logging with PII keys censored, sensitive headers
 * dropped and long strings truncated. Objects gain `redacted: true`.
 */
export function safeLog(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return { redacted: true };
  }
  const redacted = redactValue(obj, 0);
  if (redacted !== null && typeof redacted === "object" && !Array.isArray(redacted)) {
    return { ...redacted, redacted: true };
  }
  return redacted;
}
