import type { ChatModel } from "../../adapters/llm/types.js";
import { callForJson } from "../../adapters/llm/json-call.js";
import type { JsonRecord } from "../../utils/json-extractor.js";
import { MAX_MISSING_FIELDS } from "../../schemas/decision.js";
import type { StageModelOptions } from "../config.js";
import type { StageCallContext } from "../types.js";
import { buildJudgeSystem, buildJudgeUser, type JudgePayload } from "../prompts.js";

const MAX_REASON_LENGTH = 200;

export interface JudgeVerdict {
  decision: "answer" | "clarify";
  /** Candidate questions for the user, before the deterministic filter */
  asks: string[];
  reason: string;
  confidence: number;
  model: string;
  degraded?: string;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function parseJudgeOutput(data: JsonRecord, maxAsks: number): Omit<JudgeVerdict, "model"> {
  const rawAsks = Array.isArray(data.missing_slots) ? data.missing_slots : [];
  const asks = rawAsks
    .filter((ask): ask is string => typeof ask === "string")
    .map((ask) => ask.trim())
    .filter((ask) => ask.length > 0)
    .slice(0, maxAsks);

  const reason = typeof data.reason === "string" ? data.reason.trim().slice(0, MAX_REASON_LENGTH) : "";
  const confidence = typeof data.confidence === "number" && Number.isFinite(data.confidence) ? clamp01(data.confidence) : 0;

  // A clarify verdict with nothing to ask is an answer
  const wantsClarify = typeof data.decision === "string" && data.decision.trim().toLowerCase() === "clarify";
  const decision = wantsClarify && asks.length > 0 ? "clarify" : "answer";

  return { decision, asks: decision === "clarify" ? asks : [], reason, confidence };
}

/**
 * Model-backed answer-vs-clarify gate. Fails open: any upstream or parse
 * failure yields an "answer" verdict.
 */
export class ClarifierJudge {
  private readonly maxAsks: number;

  constructor(
    private readonly model: ChatModel,
    private readonly options: StageModelOptions,
    maxAsks: number = MAX_MISSING_FIELDS,
  ) {
    this.maxAsks = Math.max(0, Math.min(maxAsks, MAX_MISSING_FIELDS));
  }

  get modelId(): string {
    return this.model.model;
  }

  async judge(payload: JudgePayload, ctx: StageCallContext): Promise<JudgeVerdict> {
    const result = await callForJson(
      this.model,
      {
        stage: "clarifier",
        system: buildJudgeSystem(this.maxAsks),
        user: buildJudgeUser(payload),
        temperature: 0,
      },
      { ...this.options, ...ctx },
    );

    if (result.degraded) {
      return { decision: "answer", asks: [], reason: "", confidence: 0, model: result.model, degraded: result.degraded };
    }

    return { ...parseJudgeOutput(result.data, this.maxAsks), model: result.model };
  }
}
