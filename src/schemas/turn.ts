/**
 * Wire contracts for the turn endpoint.
 */

import { z } from "zod";
import { DecisionSchema, RuleCitation } from "./decision.js";

export const DonorRecordSchema = z.record(z.unknown());
export type DonorRecord = z.infer<typeof DonorRecordSchema>;

export const TurnRequestSchema = z.object({
  donor: DonorRecordSchema.default({}),
  question: z.string().max(4_000).default(""),
  session_id: z.string().trim().min(1).max(200),
});
export type TurnRequest = z.infer<typeof TurnRequestSchema>;

export const TurnResponseSchema = DecisionSchema.extend({
  rule_citations: z.array(RuleCitation),
  used_model: z.string(),
  final_status: z.string().min(1),
});
export type TurnResponse = z.infer<typeof TurnResponseSchema>;

export const PrecheckRequestSchema = z.object({
  donor: DonorRecordSchema,
});
