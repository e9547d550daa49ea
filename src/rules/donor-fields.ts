import type { DonorRecord } from "../schemas/turn.js";

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export interface DonorVitals {
  sex?: string;
  age?: number;
  hemoglobin?: number;
  systolic?: number;
  diastolic?: number;
  bmi?: number;
  flags: string[];
}

function readBloodPressure(donor: DonorRecord): { systolic?: number; diastolic?: number } {
  const systolic = toNumber(donor.systolic_bp);
  const diastolic = toNumber(donor.diastolic_bp);
  if (systolic !== undefined || diastolic !== undefined) {
    return { systolic, diastolic };
  }
  if (typeof donor.blood_pressure === "string") {
    const match = /^\s*(\d{2,3})\s*\/\s*(\d{2,3})/.exec(donor.blood_pressure);
    if (match) {
      return { systolic: Number(match[1]), diastolic: Number(match[2]) };
    }
  }
  return {};
}

function readFlags(value: unknown): string[] {
  const items = Array.isArray(value) ? value : typeof value === "string" ? value.split(/[;,|]/) : [];
  return items
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0 && item !== "none");
}

/**
 * Read the vitals the precheck understands. Accepts the field aliases seen
 * in donor exports (hb_g_dl / hemoglobin, split or combined blood pressure).
 */
export function readVitals(donor: DonorRecord): DonorVitals {
  const sex = typeof donor.sex === "string" && donor.sex.trim() !== "" ? donor.sex.trim() : undefined;
  return {
    sex,
    age: toNumber(donor.age),
    hemoglobin: toNumber(donor.hb_g_dl) ?? toNumber(donor.hemoglobin),
    ...readBloodPressure(donor),
    bmi: toNumber(donor.bmi),
    flags: readFlags(donor.questionnaire_flags),
  };
}
