/**
 * Slot merge: fold a per-turn delta into the cumulative slot store.
 *
 * deepMerge(base, delta), field by field:
 * - mapping values recurse
 * - list values take the union (set semantics, base order first)
 * - scalars: delta wins only when it is concrete (not null, "", [] or {})
 *
 * merge(merge(b, d), d) equals merge(b, d), and a concrete base value is
 * never replaced by an empty one.
 */

import { isRecord, type JsonRecord } from "../../utils/json-extractor.js";
import { isValidIsoDate } from "../../utils/dates.js";
import { SlotsSchema, TOPICS, fieldKind, type FieldKind, type Slots, type TopicT } from "../../schemas/slots.js";

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

function stableKey(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableKey).join(",")}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableKey(value[k])}`).join(",")}}`;
  }
  return `${typeof value}:${JSON.stringify(value)}`;
}

function unionList(base: readonly unknown[], delta: readonly unknown[]): unknown[] {
  const seen = new Set<string>();
  const out: unknown[] = [];
  for (const item of [...base, ...delta]) {
    const key = stableKey(item);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(item);
    }
  }
  return out;
}

export function deepMerge(base: JsonRecord, delta: JsonRecord): JsonRecord {
  const out: JsonRecord = { ...base };

  for (const [key, incoming] of Object.entries(delta)) {
    const current = out[key];

    if (isRecord(incoming)) {
      const merged = deepMerge(isRecord(current) ? current : {}, incoming);
      if (isRecord(current) || Object.keys(merged).length > 0) {
        out[key] = merged;
      }
    } else if (Array.isArray(incoming)) {
      if (Array.isArray(current)) {
        out[key] = unionList(current, incoming);
      } else if (incoming.length > 0) {
        out[key] = unionList([], incoming);
      }
    } else if (!isEmptyValue(incoming)) {
      out[key] = incoming;
    }
  }

  return out;
}

const TRUE_WORDS = new Set(["true", "yes", "y"]);
const FALSE_WORDS = new Set(["false", "no", "n", "none"]);

function coerceFlag(value: unknown): boolean | null | undefined {
  if (typeof value === "boolean" || value === null) return value;
  if (typeof value === "string") {
    const lower = value.trim().toLowerCase();
    if (TRUE_WORDS.has(lower)) return true;
    if (FALSE_WORDS.has(lower)) return false;
  }
  return undefined;
}

function coerceDate(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value === "string" && isValidIsoDate(value.trim())) return value.trim();
  return undefined;
}

function coerceText(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function coerceDestinations(value: unknown): JsonRecord[] | undefined {
  const items = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const out: JsonRecord[] = [];
  for (const item of items) {
    if (typeof item === "string" && item.trim()) {
      out.push({ country: item.trim() });
    } else if (isRecord(item) && typeof item.country === "string" && item.country.trim()) {
      const destination: JsonRecord = { country: item.country.trim() };
      const region = coerceText(item.region);
      if (region !== undefined) destination.region = region;
      const returnDate = coerceDate(item.return_date);
      if (returnDate !== undefined) destination.return_date = returnDate;
      out.push(destination);
    }
  }
  return out.length > 0 ? out : undefined;
}

function coercePassThrough(value: unknown): unknown {
  if (typeof value === "string") return value.trim();
  if (typeof value === "boolean" || value === null) return value;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return undefined;
}

const COERCERS: Record<FieldKind, (value: unknown) => unknown> = {
  flag: coerceFlag,
  date: coerceDate,
  text: coerceText,
  destinations: coerceDestinations,
};

function coerceTopic(topic: TopicT, raw: JsonRecord): JsonRecord {
  const out: JsonRecord = {};
  for (const [field, value] of Object.entries(raw)) {
    const kind = fieldKind(topic, field);
    const coerced = kind ? COERCERS[kind](value) : coercePassThrough(value);
    if (coerced !== undefined) {
      out[field] = coerced;
    }
  }
  return out;
}

/**
 * Bring a model-produced slot delta into schema shape. Unknown topics and
 * values of the wrong kind are dropped.
 */
export function coerceSlotsDelta(raw: unknown): Slots {
  if (!isRecord(raw)) return {};

  const shaped: JsonRecord = {};
  for (const topic of TOPICS) {
    const value = raw[topic];
    if (isRecord(value)) {
      const fields = coerceTopic(topic, value);
      if (Object.keys(fields).length > 0) {
        shaped[topic] = fields;
      }
    }
  }

  const parsed = SlotsSchema.safeParse(shaped);
  return parsed.success ? parsed.data : {};
}

/** deepMerge over typed slots; a merge that would break the schema keeps base */
export function mergeSlots(base: Slots, delta: Slots): Slots {
  const parsed = SlotsSchema.safeParse(deepMerge(base, delta));
  return parsed.success ? parsed.data : base;
}
