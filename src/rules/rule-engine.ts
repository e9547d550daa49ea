import type { DonorRecord } from "../schemas/turn.js";
import type { Precheck, PrecheckStatusT } from "../schemas/decision.js";
import { readVitals } from "./donor-fields.js";

export const HB_THRESHOLD_FEMALE = 12.5;
export const HB_THRESHOLD_MALE = 13.0;
export const SYSTOLIC_LIMIT = 180;
export const DIASTOLIC_LIMIT = 110;
export const BMI_CLEARANCE_LIMIT = 45;
export const CLEARANCE_FLAGS = ["tattoo_3m", "recent_surgery", "recent_antibiotics"] as const;

/**
 * Deterministic vitals precheck. Pure; no I/O.
 *
 * Missing vitals are not treated as failing values: a donor without a
 * hemoglobin reading is not flagged for low Hb.
 */
export function computeEligibility(donor: DonorRecord): Precheck {
  const vitals = readVitals(donor);
  const reasons: string[] = [];
  const sex = vitals.sex?.toLowerCase() ?? "";
  const hb = vitals.hemoglobin;

  if (hb !== undefined) {
    if ((sex.startsWith("f") && hb < HB_THRESHOLD_FEMALE) || (sex.startsWith("m") && hb < HB_THRESHOLD_MALE)) {
      reasons.push(`Low Hb: ${hb} g/dL`);
    }
  }

  const systolic = vitals.systolic ?? 0;
  const diastolic = vitals.diastolic ?? 0;
  if (systolic >= SYSTOLIC_LIMIT || diastolic >= DIASTOLIC_LIMIT) {
    reasons.push(`Very high blood pressure: ${Math.trunc(systolic)}/${Math.trunc(diastolic)} mmHg`);
  }

  let status: PrecheckStatusT = reasons.length > 0 ? "ineligible" : "eligible";

  const flagged = vitals.flags.some((flag) => CLEARANCE_FLAGS.some((known) => flag.includes(known)));
  if (flagged || (vitals.bmi ?? 0) >= BMI_CLEARANCE_LIMIT) {
    if (status !== "ineligible") {
      status = "require_medical_clearance";
    }
    reasons.push("Recent risk factor flags or high BMI");
  }

  if (reasons.length === 0) {
    reasons.push("Meets basic precheck thresholds");
  }

  return { status, reasons };
}
