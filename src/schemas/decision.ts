/**
 * Decision schema: the strict shape every decision is forced into before
 * it leaves the pipeline.
 */

import { z } from "zod";

export const DECISION_LABELS = ["Eligible", "Ineligible", "Defer", "NeedMoreInfo"] as const;

export const DecisionLabel = z.enum(DECISION_LABELS);
export type DecisionLabelT = z.infer<typeof DecisionLabel>;

export function isDecisionLabel(value: unknown): value is DecisionLabelT {
  return DecisionLabel.safeParse(value).success;
}

export const MAX_MISSING_FIELDS = 3;

export const DecisionSchema = z.object({
  decision: DecisionLabel,
  confidence: z.number().finite().min(0).max(1),
  rationale: z.string(),
  missing_fields: z.array(z.string()).max(MAX_MISSING_FIELDS),
  safety_flags: z.array(z.string()),
});

export type Decision = z.infer<typeof DecisionSchema>;

export const RuleCitation = z.object({
  doc_id: z.string(),
  text: z.string(),
});
export type RuleCitationT = z.infer<typeof RuleCitation>;

export const PRECHECK_STATUSES = ["eligible", "ineligible", "require_medical_clearance"] as const;
export const PrecheckStatus = z.enum(PRECHECK_STATUSES);
export type PrecheckStatusT = z.infer<typeof PrecheckStatus>;

export const PrecheckSchema = z.object({
  status: PrecheckStatus,
  reasons: z.array(z.string()),
});
export type Precheck = z.infer<typeof PrecheckSchema>;
