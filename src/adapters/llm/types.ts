import type { LLMProviderT } from "../../config/index.js";

/**
 * Model-backed stages of the decision pipeline. Each may run on its own
 * model id.
 */
export type PipelineStage = "extractor" | "clarifier" | "decision" | "reflector";

export const PIPELINE_STAGES: readonly PipelineStage[] = ["extractor", "clarifier", "decision", "reflector"];

export interface ChatPrompt {
  stage: PipelineStage;
  system: string;
  user: string;
  /** Ask the provider for its strict JSON-object response mode */
  jsonMode: boolean;
  temperature?: number;
  maxTokens?: number;
}

export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface UsageStats {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResult {
  content: string;
  model: string;
  usage?: UsageStats;
}

/**
 * Provider-agnostic chat model.
 *
 * complete() must:
 * - reject with UpstreamTimeoutError / UpstreamHTTPError on transport failure
 * - reject with StrictJsonUnsupportedError when jsonMode is requested from a
 *   provider that has no such mode
 * - honour opts.abortSignal
 */
export interface ChatModel {
  readonly provider: LLMProviderT;
  readonly model: string;
  complete(prompt: ChatPrompt, opts: CallOpts): Promise<ChatResult>;
}
