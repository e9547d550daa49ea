/**
 * Dependencies and per-turn context for the eligibility state machine.
 *
 * Every collaborator is injected so tests can swap in fakes.
 */

import type { DonorRecord } from "../../schemas/turn.js";
import type { Precheck } from "../../schemas/decision.js";
import type { EvidenceRetriever } from "../../retrieval/types.js";
import type { CheckpointStore, CheckpointStoreKind } from "../../services/checkpoint-store.js";
import type { Guardrails } from "../../guardrails/index.js";
import type { SlotExtractor } from "../slots/extractor.js";
import type { ClarifierJudge } from "../clarify/judge.js";
import type { DecisionSynthesizer } from "../decision/synthesizer.js";
import type { SelfReflector } from "../decision/reflector.js";
import type { SessionLock } from "../session-lock.js";
import type { PipelineConfig } from "../config.js";
import type { PipelineStage } from "../../adapters/llm/types.js";
import type { ConversationState, TurnPath } from "../types.js";

export type PipelineSettings = Omit<PipelineConfig, "llm">;

export interface PipelineDeps {
  settings: PipelineSettings;
  guardrails: Guardrails;
  extractor: SlotExtractor;
  judge: ClarifierJudge;
  synthesizer: DecisionSynthesizer;
  reflector: SelfReflector;
  retriever: EvidenceRetriever;
  checkpoints: CheckpointStore;
  /** Defaults to a private lock per pipeline */
  lock?: SessionLock;
  /** Defaults to the built-in rule engine */
  computePrecheck?: (donor: DonorRecord) => Precheck;
  now?: () => Date;
}

export interface RunTurnOptions {
  requestId: string;
  abortSignal?: AbortSignal;
}

/** Mutable bookkeeping for one turn, separate from the state that gets checkpointed */
export interface TurnContext {
  requestId: string;
  sessionId: string;
  abortSignal?: AbortSignal;
  startedAt: number;
  /** History as loaded, before this turn's question was appended */
  priorHistory: string[];
  /** Everything the user typed this session, current question included */
  rawText: string;
  path: TurnPath;
  state: ConversationState;
}

export interface PipelineDescription {
  models: Record<PipelineStage, string>;
  retriever: string;
  checkpoint_store: CheckpointStoreKind;
}
