/**
 * Forces any model output into a strict Decision.
 *
 * Pure and idempotent: normalize(normalize(x)) deep-equals normalize(x).
 */

import { isRecord } from "../../utils/json-extractor.js";
import { MAX_MISSING_FIELDS, type Decision, type DecisionLabelT } from "../../schemas/decision.js";

export const DEFAULT_CONFIDENCE = 0.5;

const LABEL_ALIASES: Readonly<Record<string, DecisionLabelT>> = {
  eligible: "Eligible",
  ok: "Eligible",
  yes: "Eligible",
  ineligible: "Ineligible",
  no: "Ineligible",
  defer: "Defer",
  deferred: "Defer",
  "temporary deferral": "Defer",
  needmoreinfo: "NeedMoreInfo",
  need_more_info: "NeedMoreInfo",
  "need more info": "NeedMoreInfo",
  clarify: "NeedMoreInfo",
};

// Checked before the Eligible fragments: "not eligible" contains "elig"
const INELIGIBLE_FRAGMENTS = ["inelig", "not elig", "not allow", "cannot", "can not", "can't"];
const ELIGIBLE_FRAGMENTS = ["elig", "allow", "can donate"];

function firstPresent(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function labelText(raw: unknown): string {
  const value = isRecord(raw) ? firstPresent(raw, ["label", "status"]) : raw;
  if (typeof value === "string") return value.trim().toLowerCase();
  if (typeof value === "number" || typeof value === "boolean") return String(value).toLowerCase();
  return "";
}

export function canonicalLabel(raw: unknown): DecisionLabelT {
  const text = labelText(raw);
  const alias = LABEL_ALIASES[text];
  if (alias) return alias;

  if ((text.includes("need") && text.includes("info")) || text.includes("clarify")) return "NeedMoreInfo";
  if (text.includes("defer")) return "Defer";
  if (INELIGIBLE_FRAGMENTS.some((fragment) => text.includes(fragment))) return "Ineligible";
  if (ELIGIBLE_FRAGMENTS.some((fragment) => text.includes(fragment))) return "Eligible";
  return "NeedMoreInfo";
}

export function coerceConfidence(raw: unknown): number {
  let value = Number.NaN;
  if (typeof raw === "number") value = raw;
  else if (typeof raw === "string" && raw.trim() !== "") value = Number(raw.trim());
  if (!Number.isFinite(value)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, value));
}

function coerceText(raw: unknown): string {
  if (raw === undefined || raw === null) return "";
  if (typeof raw === "string") return raw;
  if (typeof raw === "number" || typeof raw === "boolean") return String(raw);
  return JSON.stringify(raw);
}

function coerceStringList(raw: unknown): string[] {
  const items = Array.isArray(raw) ? raw : raw === undefined || raw === null ? [] : [raw];
  const out: string[] = [];
  for (const item of items) {
    if (typeof item === "string") {
      if (item.trim()) out.push(item);
    } else if (typeof item === "number" || typeof item === "boolean") {
      out.push(String(item));
    }
  }
  return out;
}

export function normalize(input: unknown): Decision {
  const record = isRecord(input) ? input : {};
  return {
    decision: canonicalLabel(firstPresent(record, ["decision", "label", "status"])),
    confidence: coerceConfidence(record.confidence),
    rationale: coerceText(record.rationale),
    missing_fields: coerceStringList(record.missing_fields).slice(0, MAX_MISSING_FIELDS),
    safety_flags: coerceStringList(record.safety_flags),
  };
}
