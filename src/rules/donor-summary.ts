import type { DonorRecord } from "../schemas/turn.js";
import { readVitals } from "./donor-fields.js";

export function hasDonor(donor: DonorRecord): boolean {
  return Object.keys(donor).length > 0;
}

/** One-line fact summary used in prompts and internal retrieval queries. */
export function summariseDonor(donor: DonorRecord): string {
  if (!hasDonor(donor)) {
    return "No donor selected";
  }

  const vitals = readVitals(donor);
  const parts: string[] = [];
  if (typeof donor.donor_id === "string") parts.push(`donor_id: ${donor.donor_id}`);
  if (vitals.sex) parts.push(`sex: ${vitals.sex}`);
  if (vitals.age !== undefined) parts.push(`age: ${vitals.age}`);
  if (vitals.hemoglobin !== undefined) parts.push(`hb_g_dl: ${vitals.hemoglobin}`);
  if (vitals.systolic !== undefined && vitals.diastolic !== undefined) {
    parts.push(`blood_pressure: ${vitals.systolic}/${vitals.diastolic} mmHg`);
  }
  if (vitals.bmi !== undefined) parts.push(`bmi: ${vitals.bmi}`);
  parts.push(`questionnaire_flags: ${vitals.flags.length > 0 ? vitals.flags.join(", ") : "none"}`);

  return parts.join("; ");
}
