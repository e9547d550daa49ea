/**
 * JSON Recovery
 *
 * Best-effort extraction of a JSON object from model text that may carry
 * markdown fences, conversational preamble or trailing commentary.
 *
 * Attempts run in a fixed order and the first one that yields an object wins:
 * 1. content of a ```json fenced block
 * 2. the whole string parsed directly
 * 3. the substring between the first `{` and the last `}`
 *
 * Never throws. Total failure yields an empty object.
 */

import { emit, TelemetryEvents } from "./telemetry.js";

export type JsonRecord = Record<string, unknown>;

export type ExtractionMethod = "code_block" | "direct" | "boundary";

export interface JsonRecoveryResult {
  /** Parsed object, or `{}` when every attempt failed */
  value: JsonRecord;
  /** Which attempt succeeded; "none" on total failure */
  method: ExtractionMethod | "none";
}

export interface JsonRecoveryOptions {
  /** Pipeline stage name for telemetry (e.g., "synthesize") */
  stage?: string;
  requestId?: string;
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ParseOutcome = { ok: true; value: JsonRecord } | { ok: false };

function parseObject(candidate: string | null): ParseOutcome {
  if (candidate === null) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(candidate.trim());
    return isRecord(parsed) ? { ok: true, value: parsed } : { ok: false };
  } catch {
    return { ok: false };
  }
}

const FENCED_JSON = /```json\s*([\s\S]*?)```/i;

interface ParseAttempt {
  method: ExtractionMethod;
  locate: (text: string) => string | null;
}

const ATTEMPTS: readonly ParseAttempt[] = [
  {
    method: "code_block",
    locate: (text) => FENCED_JSON.exec(text)?.[1] ?? null,
  },
  {
    method: "direct",
    locate: (text) => text,
  },
  {
    method: "boundary",
    locate: (text) => {
      const start = text.indexOf("{");
      const end = text.lastIndexOf("}");
      return start !== -1 && end > start ? text.slice(start, end + 1) : null;
    },
  },
];

export function recoverJson(text: unknown, options: JsonRecoveryOptions = {}): JsonRecoveryResult {
  if (typeof text !== "string" || text.trim().length === 0) {
    return { value: {}, method: "none" };
  }

  for (const attempt of ATTEMPTS) {
    const outcome = parseObject(attempt.locate(text));
    if (outcome.ok) {
      if (attempt.method !== "direct") {
        emit(TelemetryEvents.JsonExtractionRequired, {
          stage: options.stage,
          request_id: options.requestId,
          extraction_method: attempt.method,
          content_length: text.length,
        });
      }
      return { value: outcome.value, method: attempt.method };
    }
  }

  return { value: {}, method: "none" };
}

/**
 * Convenience wrapper returning only the recovered object.
 */
export function recoverJsonObject(text: unknown, options: JsonRecoveryOptions = {}): JsonRecord {
  return recoverJson(text, options).value;
}
