import { getConfig, type Config, type LLMProviderT } from "../config/index.js";
import { clampTimeout } from "../config/timeouts.js";
import type { PipelineStage } from "../adapters/llm/types.js";

export type PIIRedactionModeT = Config["pipeline"]["piiRedactionMode"];

export interface PipelineLlmConfig {
  provider: LLMProviderT;
  openaiApiKey?: string;
  /** Endpoint override for OpenAI-compatible servers */
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  /** Whether to ask the provider for strict JSON-object output first */
  strictJson: boolean;
  timeoutMs: number;
  /** Resolved per stage; undefined means the provider default */
  models: Record<PipelineStage, string | undefined>;
}

/**
 * Everything the stages need, resolved once from the environment.
 * Stages receive this value (or a slice of it); none of them reads env.
 */
export interface PipelineConfig {
  llm: PipelineLlmConfig;
  historyCap: number;
  maxAsks: number;
  clarifierEnabled: boolean;
  reflectionEnabled: boolean;
  clarifyConfidenceCap: number;
  piiRedactionMode: PIIRedactionModeT;
}

export function buildPipelineConfig(cfg: Config = getConfig()): PipelineConfig {
  const fallbackModel = cfg.llm.model;
  return {
    llm: {
      provider: cfg.llm.provider,
      openaiApiKey: cfg.llm.openaiApiKey,
      openaiBaseUrl: cfg.llm.openaiBaseUrl,
      anthropicApiKey: cfg.llm.anthropicApiKey,
      strictJson: cfg.llm.strictJson,
      timeoutMs: clampTimeout(cfg.llm.timeoutMs),
      models: {
        extractor: cfg.models.extractor ?? fallbackModel,
        clarifier: cfg.models.clarifier ?? fallbackModel,
        decision: cfg.models.decision ?? fallbackModel,
        reflector: cfg.models.reflector ?? fallbackModel,
      },
    },
    historyCap: cfg.pipeline.historyCap,
    maxAsks: cfg.pipeline.maxAsks,
    clarifierEnabled: cfg.pipeline.clarifierEnabled,
    reflectionEnabled: cfg.pipeline.reflectionEnabled,
    clarifyConfidenceCap: cfg.pipeline.clarifyConfidenceCap,
    piiRedactionMode: cfg.pipeline.piiRedactionMode,
  };
}

/** What a model-backed stage needs besides its ChatModel */
export interface StageModelOptions {
  strictJson: boolean;
  timeoutMs: number;
}

export function stageModelOptions(pipelineConfig: PipelineConfig): StageModelOptions {
  return { strictJson: pipelineConfig.llm.strictJson, timeoutMs: pipelineConfig.llm.timeoutMs };
}
