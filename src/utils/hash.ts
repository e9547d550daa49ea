/**
 * Hash helpers for telemetry and audit trails.
 *
 * Answers are never logged verbatim; events carry a short digest instead.
 */

import { createHash } from "node:crypto";

/**
 * SHA-256 digest truncated to `length` hex characters (default 12).
 */
export function shortDigest(input: string, length: number = 12): string {
  return createHash("sha256").update(input).digest("hex").substring(0, length);
}
