import type { ChatModel } from "../../adapters/llm/types.js";
import { callForJson } from "../../adapters/llm/json-call.js";
import { isTopic, type Slots, type TopicT } from "../../schemas/slots.js";
import type { StageModelOptions } from "../config.js";
import type { StageCallContext } from "../types.js";
import { EXTRACTOR_SYSTEM, buildExtractorUser, type ExtractorPayload } from "../prompts.js";
import { coerceSlotsDelta } from "./merge.js";

export interface ExtractionResult {
  topics: TopicT[];
  delta: Slots;
  model: string;
  degraded?: string;
}

/**
 * Model-backed fact extraction. Produces a slot delta; merging is the
 * caller's job.
 */
export class SlotExtractor {
  constructor(
    private readonly model: ChatModel,
    private readonly options: StageModelOptions,
  ) {}

  get modelId(): string {
    return this.model.model;
  }

  async extract(input: ExtractorPayload, ctx: StageCallContext): Promise<ExtractionResult> {
    const result = await callForJson(
      this.model,
      { stage: "extractor", system: EXTRACTOR_SYSTEM, user: buildExtractorUser(input), temperature: 0 },
      { ...this.options, ...ctx },
    );

    if (result.degraded) {
      return { topics: [], delta: {}, model: result.model, degraded: result.degraded };
    }

    const delta = coerceSlotsDelta(result.data.slots);
    const detected = Array.isArray(result.data.topics_detected) ? result.data.topics_detected : [];
    const topics = new Set<TopicT>(detected.filter(isTopic));
    // A topic the model filled slots for is active even if it forgot to list it
    for (const key of Object.keys(delta)) {
      if (isTopic(key)) topics.add(key);
    }

    return { topics: [...topics], delta, model: result.model };
  }
}
