import type { ChatModel } from "../../adapters/llm/types.js";
import { callForJson } from "../../adapters/llm/json-call.js";
import type { Decision } from "../../schemas/decision.js";
import type { StageModelOptions } from "../config.js";
import type { StageCallContext } from "../types.js";
import { DECISION_SYSTEM, buildDecisionUser, type DecisionPayload } from "../prompts.js";
import { normalize } from "./normalizer.js";

const FALLBACK_CONFIDENCE = 0.4;
const MAX_RAW_RATIONALE = 2_000;

const PARTIAL_DEFAULTS = {
  decision: "NeedMoreInfo",
  confidence: 0.5,
  rationale: "",
  missing_fields: [],
  safety_flags: [],
} as const;

export interface SynthesisResult {
  decision: Decision;
  model: string;
  degraded?: string;
}

function fallbackRationale(raw: string, degraded: string | undefined): string {
  const text = raw.trim();
  if (text) return text.slice(0, MAX_RAW_RATIONALE);
  if (degraded && degraded !== "unparseable_output") {
    return `The decision model was unavailable (${degraded}). Please try again shortly.`;
  }
  return "unparsable output";
}

/**
 * One model call combining precheck, evidence and slots into a decision.
 */
export class DecisionSynthesizer {
  constructor(
    private readonly model: ChatModel,
    private readonly options: StageModelOptions,
  ) {}

  get modelId(): string {
    return this.model.model;
  }

  async synthesize(payload: DecisionPayload, ctx: StageCallContext): Promise<SynthesisResult> {
    const result = await callForJson(
      this.model,
      { stage: "decision", system: DECISION_SYSTEM, user: buildDecisionUser(payload), temperature: 0.1 },
      { ...this.options, ...ctx },
    );

    if (Object.keys(result.data).length === 0) {
      return {
        decision: {
          decision: "NeedMoreInfo",
          confidence: FALLBACK_CONFIDENCE,
          rationale: fallbackRationale(result.raw, result.degraded),
          missing_fields: [],
          safety_flags: [],
        },
        model: result.model,
        degraded: result.degraded ?? "empty_output",
      };
    }

    const filled: Record<string, unknown> = { ...PARTIAL_DEFAULTS };
    for (const [key, value] of Object.entries(result.data)) {
      if (value !== undefined && value !== null) filled[key] = value;
    }
    return { decision: normalize(filled), model: result.model };
  }
}
