import { isRecord } from "../../utils/json-extractor.js";
import { isDecisionLabel, type Decision, type Precheck, type RuleCitationT } from "../../schemas/decision.js";
import type { TurnResponse } from "../../schemas/turn.js";
import type { CitationRef, RetrievedEvidence } from "../../retrieval/types.js";
import { redactPii } from "../../guardrails/index.js";
import type { PIIRedactionModeT } from "../config.js";
import { normalize } from "./normalizer.js";

export interface ComposeInput {
  decision: Decision | null;
  precheck: Precheck | null;
  retrieved: RetrievedEvidence | null;
  usedModel: string;
  redactionMode: PIIRedactionModeT;
}

function toCitation(ref: CitationRef): RuleCitationT | null {
  const docId = typeof ref === "string" ? ref : ref.doc_id;
  const trimmed = docId.trim();
  return trimmed ? { doc_id: trimmed, text: "" } : null;
}

export function buildRuleCitations(retrieved: RetrievedEvidence | null): RuleCitationT[] {
  const seen = new Set<string>();
  const citations: RuleCitationT[] = [];
  for (const ref of retrieved?.citations ?? []) {
    const citation = toCitation(ref);
    if (citation && !seen.has(citation.doc_id)) {
      seen.add(citation.doc_id);
      citations.push(citation);
    }
  }
  return citations;
}

/**
 * Canonical label when there is one, else whatever the precheck says:
 * first element of a list, or the `status` of a mapping.
 */
export function deriveFinalStatus(label: unknown, precheck: unknown): string {
  if (isDecisionLabel(label)) return label;
  if (Array.isArray(precheck) && precheck.length > 0) {
    const first: unknown = precheck[0];
    if (first !== undefined && first !== null && String(first).trim()) return String(first);
  }
  if (isRecord(precheck) && typeof precheck.status === "string" && precheck.status.trim()) {
    return precheck.status;
  }
  return "NeedMoreInfo";
}

export const PRECHECK_CONFLICT_FLAG = "precheck_conflict";
const PRECHECK_CONFLICT_CONFIDENCE = 0.5;

/**
 * An Eligible label never leaves the service against an ineligible rule
 * precheck: it becomes NeedMoreInfo with the precheck reasons attached.
 */
export function reconcileWithPrecheck(decision: Decision, precheck: Precheck | null): Decision {
  if (decision.decision !== "Eligible" || precheck?.status !== "ineligible") {
    return decision;
  }
  const note = `Rule precheck found: ${precheck.reasons.join("; ")}.`;
  return {
    ...decision,
    decision: "NeedMoreInfo",
    confidence: Math.min(decision.confidence, PRECHECK_CONFLICT_CONFIDENCE),
    rationale: decision.rationale ? `${decision.rationale} ${note}` : note,
    safety_flags: decision.safety_flags.includes(PRECHECK_CONFLICT_FLAG)
      ? decision.safety_flags
      : [...decision.safety_flags, PRECHECK_CONFLICT_FLAG],
  };
}

export function composeResponse(input: ComposeInput): TurnResponse {
  const decision = reconcileWithPrecheck(normalize(input.decision ?? {}), input.precheck);
  return {
    ...decision,
    rationale: redactPii(decision.rationale, input.redactionMode),
    rule_citations: buildRuleCitations(input.retrieved),
    used_model: input.usedModel || "none",
    final_status: deriveFinalStatus(decision.decision, input.precheck),
  };
}
