/**
 * Wiring for the eligibility pipeline: builds every stage from a
 * PipelineConfig. Anything passed in overrides the default collaborator.
 */

import { getConfig, type Config } from "../config/index.js";
import { getChatModel } from "../adapters/llm/router.js";
import { Guardrails } from "../guardrails/index.js";
import { createEvidenceRetriever } from "../retrieval/index.js";
import type { EvidenceRetriever } from "../retrieval/types.js";
import { createCheckpointStore, type CheckpointStore } from "../services/checkpoint-store.js";
import { buildPipelineConfig, stageModelOptions, type PipelineConfig } from "./config.js";
import { SlotExtractor } from "./slots/extractor.js";
import { ClarifierJudge } from "./clarify/judge.js";
import { DecisionSynthesizer } from "./decision/synthesizer.js";
import { SelfReflector } from "./decision/reflector.js";
import { EligibilityPipeline } from "./pipeline/pipeline.js";
import type { PipelineDeps } from "./pipeline/types.js";

export { EligibilityPipeline } from "./pipeline/pipeline.js";
export type { PipelineDeps, PipelineDescription, RunTurnOptions } from "./pipeline/types.js";
export { buildPipelineConfig, type PipelineConfig } from "./config.js";

export interface CreatePipelineOptions {
  config?: Config;
  pipelineConfig?: PipelineConfig;
  guardrails?: Guardrails;
  retriever?: EvidenceRetriever;
  checkpoints?: CheckpointStore;
}

export function buildStageDeps(
  pipelineConfig: PipelineConfig,
): Pick<PipelineDeps, "extractor" | "judge" | "synthesizer" | "reflector"> {
  const options = stageModelOptions(pipelineConfig);
  return {
    extractor: new SlotExtractor(getChatModel("extractor", pipelineConfig), options),
    judge: new ClarifierJudge(getChatModel("clarifier", pipelineConfig), options, pipelineConfig.maxAsks),
    synthesizer: new DecisionSynthesizer(getChatModel("decision", pipelineConfig), options),
    reflector: new SelfReflector(getChatModel("reflector", pipelineConfig), options),
  };
}

export async function createPipeline(options: CreatePipelineOptions = {}): Promise<EligibilityPipeline> {
  const cfg = options.config ?? getConfig();
  const pipelineConfig = options.pipelineConfig ?? buildPipelineConfig(cfg);
  return new EligibilityPipeline({
    settings: {
      historyCap: pipelineConfig.historyCap,
      maxAsks: pipelineConfig.maxAsks,
      clarifierEnabled: pipelineConfig.clarifierEnabled,
      reflectionEnabled: pipelineConfig.reflectionEnabled,
      clarifyConfidenceCap: pipelineConfig.clarifyConfidenceCap,
      piiRedactionMode: pipelineConfig.piiRedactionMode,
    },
    guardrails: options.guardrails ?? Guardrails.fromPath(cfg.guardrails.path),
    retriever: options.retriever ?? createEvidenceRetriever(cfg),
    checkpoints: options.checkpoints ?? (await createCheckpointStore(cfg)),
    ...buildStageDeps(pipelineConfig),
  });
}
