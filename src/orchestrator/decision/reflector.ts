import type { ChatModel } from "../../adapters/llm/types.js";
import { callForJson } from "../../adapters/llm/json-call.js";
import type { JsonRecord } from "../../utils/json-extractor.js";
import type { Decision } from "../../schemas/decision.js";
import type { StageModelOptions } from "../config.js";
import type { StageCallContext } from "../types.js";
import { REFLECTOR_SYSTEM, buildReflectorUser, type ReflectorPayload } from "../prompts.js";
import { normalize } from "./normalizer.js";

export interface ReflectionResult {
  decision: Decision;
  /** False when the reflector produced nothing usable and the prior decision stands */
  applied: boolean;
  model: string;
  degraded?: string;
}

/**
 * Field-level overwrite: reflector fields win where present and non-null.
 * A label given under `label`/`status` counts as `decision`.
 */
export function applyReflection(prior: Decision, correction: JsonRecord): Decision {
  const merged: Record<string, unknown> = { ...prior };
  for (const [key, value] of Object.entries(correction)) {
    if (value !== undefined && value !== null) merged[key] = value;
  }
  if (correction.decision === undefined || correction.decision === null) {
    const label = correction.label ?? correction.status;
    if (label !== undefined && label !== null) merged.decision = label;
  }
  return normalize(merged);
}

export class SelfReflector {
  constructor(
    private readonly model: ChatModel,
    private readonly options: StageModelOptions,
  ) {}

  get modelId(): string {
    return this.model.model;
  }

  async reflect(payload: ReflectorPayload, ctx: StageCallContext): Promise<ReflectionResult> {
    const result = await callForJson(
      this.model,
      { stage: "reflector", system: REFLECTOR_SYSTEM, user: buildReflectorUser(payload), temperature: 0 },
      { ...this.options, ...ctx },
    );

    if (result.degraded || Object.keys(result.data).length === 0) {
      return {
        decision: payload.decision,
        applied: false,
        model: result.model,
        degraded: result.degraded ?? "empty_output",
      };
    }

    return { decision: applyReflection(payload.decision, result.data), applied: true, model: result.model };
  }
}
