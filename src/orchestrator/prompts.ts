/**
 * System prompts and user payload builders for the model-backed stages.
 *
 * Payloads are JSON so every stage hands the model the same structured
 * view of the turn.
 */

import { TOPIC_FIELDS, type Slots, type TopicT } from "../schemas/slots.js";
import type { Decision, Precheck } from "../schemas/decision.js";
import type { DonorRecord } from "../schemas/turn.js";
import type { RetrievedEvidence } from "../retrieval/types.js";

export const EXTRACTOR_HISTORY_WINDOW = 5;

function describeTopicFields(): string {
  return Object.entries(TOPIC_FIELDS)
    .map(([topic, fields]) => {
      const list = Object.entries(fields).map(([field, kind]) => `${field} (${kind})`);
      return `- ${topic}: ${list.join(", ")}`;
    })
    .join("\n");
}

export const EXTRACTOR_SYSTEM = `You extract structured facts for a blood-donor eligibility assistant.
Return JSON ONLY with this schema:
{
  "topics_detected": string[],   // subset of: vaccine, tattoo, travel, donation, medication, symptoms
  "slots": { "<topic>": { "<field>": value } }
}

Fields per topic (dates are YYYY-MM-DD or null; flags are true/false):
${describeTopicFields()}
- travel.destinations is a list of {"country": string, "region"?: string, "return_date"?: "YYYY-MM-DD"}

Rules:
- Extract ONLY facts the user stated explicitly. Never infer or guess a value.
- Record explicit negations: "no", "none", "haven't" become false for flags or "none" for text.
  Example: "no other vaccines" -> {"vaccine": {"other_recent": false}}.
- Only convert a date when the user gave a concrete calendar date. Leave relative dates ("last week") out.
- Omit anything unknown. Do not repeat known slots unless the user corrected them.`;

export interface ExtractorPayload {
  question: string;
  history: readonly string[];
  slots: Slots;
}

export function buildExtractorUser(payload: ExtractorPayload): string {
  return JSON.stringify({
    question: payload.question,
    recent_history: payload.history.slice(-EXTRACTOR_HISTORY_WINDOW),
    known_slots: payload.slots,
  });
}

export function buildJudgeSystem(maxAsks: number): string {
  return `You are a conservative triage judge for a blood-donor eligibility assistant.
Return JSON ONLY (no markdown) with this schema:
{
  "decision": "answer" | "clarify",
  "missing_slots": [string],   // <= ${maxAsks} concise questions for the user; empty if decision="answer"
  "reason": string,
  "confidence": number         // 0..1
}

Clarification policy (no guessing):
- Consider ONLY topics explicitly present or affirmed in the user's text or known slots. Do not invent topics.
- If the user explicitly NEGATES a topic ("no travel", "no other vaccinations", "none"), treat it as satisfied. Never ask follow-ups about it.
- Never ask for general policy facts (waiting periods, deferral lengths, eligibility rules). The assistant answers those itself.
- Ask to clarify only when essential user-specific facts are missing for an active topic: exact dates, vaccine type or name, tattoo studio licensing, travel destination, symptom presence.
- At most ${maxAsks} questions.
- Do not answer the eligibility question here; only judge answer vs clarify.`;
}

export interface JudgePayload {
  question: string;
  history: readonly string[];
  slots: Slots;
  topics: readonly TopicT[];
  donorSelected: boolean;
  precheckAvailable: boolean;
}

export function buildJudgeUser(payload: JudgePayload): string {
  return JSON.stringify({
    question: payload.question,
    history: payload.history,
    known_slots: payload.slots,
    topics_detected: payload.topics,
    donor_selected: payload.donorSelected,
    precheck_available: payload.precheckAvailable,
  });
}

export const DECISION_SYSTEM = `You are a donor eligibility agent.
Combine the rule precheck, the retrieved handbook evidence and the known facts into one decision.
Return a SINGLE JSON object with keys:
  "decision": "Eligible" | "Ineligible" | "Defer" | "NeedMoreInfo",
  "confidence": number between 0 and 1,
  "rationale": string,
  "missing_fields": string[] (at most 3),
  "safety_flags": string[]

Hard rules:
- Never assume values that were not stated. Prefer NeedMoreInfo over guessing.
- If the retrieved evidence contradicts the rule precheck, explain the conflict in rationale and lower confidence.
- If the text mentions red-flag content (severe symptoms, self-harm), populate safety_flags.
- Give general information only. No diagnosis or treatment advice.`;

export interface DecisionPayload {
  donor: DonorRecord;
  donorSummary: string;
  precheck: Precheck | null;
  retrieved: RetrievedEvidence | null;
  slots: Slots;
  question: string;
}

export function buildDecisionUser(payload: DecisionPayload): string {
  return JSON.stringify({
    donor: payload.donor,
    donor_summary: payload.donorSummary,
    precheck: payload.precheck,
    retrieved: payload.retrieved,
    slots: payload.slots,
    user_question: payload.question,
  });
}

export const REFLECTOR_SYSTEM = `You are a strict validator of donor eligibility decisions.
Check the decision JSON against the precheck and the evidence. If it contradicts them or misses
necessary fields, fix it. Output the corrected decision as JSON ONLY, using the same keys:
decision, confidence, rationale, missing_fields, safety_flags.
If the decision is already correct, return it unchanged.`;

export interface ReflectorPayload {
  decision: Decision;
  donorSummary: string;
  precheck: Precheck | null;
  retrieved: RetrievedEvidence | null;
  question: string;
}

export function buildReflectorUser(payload: ReflectorPayload): string {
  return JSON.stringify({
    decision: payload.decision,
    donor_summary: payload.donorSummary,
    precheck: payload.precheck,
    retrieved: payload.retrieved,
    user_question: payload.question,
  });
}
