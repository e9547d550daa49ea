/**
 * Provider router for the decision pipeline.
 *
 * Selects a ChatModel (OpenAI, Anthropic, Fixtures) per pipeline stage from
 * an explicit PipelineConfig:
 * 1. Stage-specific model id (MODEL_EXTRACTOR, MODEL_DECISION, ...)
 * 2. LLM_MODEL
 * 3. Provider default
 */

import { log } from "../../utils/telemetry.js";
import { ConfigurationError } from "../../utils/errors.js";
import type { PipelineConfig } from "../../orchestrator/config.js";
import type { ChatModel, ChatPrompt, ChatResult, CallOpts, PipelineStage } from "./types.js";
import { OpenAIChatModel } from "./openai.js";
import { AnthropicChatModel } from "./anthropic.js";

const FIXTURE_RESPONSES: Record<PipelineStage, string> = {
  extractor: JSON.stringify({ topics_detected: [], slots: {} }),
  clarifier: JSON.stringify({ decision: "answer", missing_slots: [], reason: "Fixture judge", confidence: 0.5 }),
  decision: JSON.stringify({
    decision: "NeedMoreInfo",
    confidence: 0.5,
    rationale: "Fixture decision: no model reasoning was performed.",
    missing_fields: [],
    safety_flags: [],
  }),
  reflector: "{}",
};

/**
 * Fixtures model for running without API keys.
 * Returns one scripted JSON payload per stage.
 */
export class FixturesChatModel implements ChatModel {
  readonly provider = "fixtures" as const;
  readonly model: string;

  constructor(model = "fixture-v1") {
    this.model = model;
  }

  async complete(prompt: ChatPrompt, _opts: CallOpts): Promise<ChatResult> {
    return {
      content: FIXTURE_RESPONSES[prompt.stage],
      model: this.model,
      usage: { input_tokens: 0, output_tokens: 0 },
    };
  }
}

// Instances are cached per provider+model so stages share connection pools
const instances = new Map<string, ChatModel>();

function createInstance(pipelineConfig: PipelineConfig, modelId: string | undefined): ChatModel {
  const { llm } = pipelineConfig;
  switch (llm.provider) {
    case "openai":
      if (!llm.openaiApiKey) {
        throw new ConfigurationError("OPENAI_API_KEY is required for LLM_PROVIDER=openai", ["llm.openaiApiKey"]);
      }
      return new OpenAIChatModel({ apiKey: llm.openaiApiKey, baseUrl: llm.openaiBaseUrl, model: modelId });
    case "anthropic":
      if (!llm.anthropicApiKey) {
        throw new ConfigurationError("ANTHROPIC_API_KEY is required for LLM_PROVIDER=anthropic", ["llm.anthropicApiKey"]);
      }
      return new AnthropicChatModel({ apiKey: llm.anthropicApiKey, model: modelId });
    case "fixtures":
      return new FixturesChatModel(modelId);
  }
}

/**
 * Get the chat model for a pipeline stage.
 */
export function getChatModel(stage: PipelineStage, pipelineConfig: PipelineConfig): ChatModel {
  const modelId = pipelineConfig.llm.models[stage];
  const cacheKey = `${pipelineConfig.llm.provider}:${modelId ?? "default"}:${pipelineConfig.llm.openaiBaseUrl ?? ""}`;

  let instance = instances.get(cacheKey);
  if (!instance) {
    instance = createInstance(pipelineConfig, modelId);
    instances.set(cacheKey, instance);
    log.debug({ stage, provider: instance.provider, model: instance.model }, "Created chat model instance");
  }
  return instance;
}

/**
 * Clear the cached instances (for testing)
 */
export function resetChatModelCache(): void {
  instances.clear();
}
