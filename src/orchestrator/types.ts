import { z } from "zod";
import { DecisionSchema, PrecheckSchema, type Decision, type Precheck } from "../schemas/decision.js";
import { SlotsSchema, Topic, type Slots, type TopicT } from "../schemas/slots.js";
import { DonorRecordSchema, type DonorRecord } from "../schemas/turn.js";
import { RetrievedEvidenceSchema, type RetrievedEvidence } from "../retrieval/types.js";

/**
 * Per-session conversation state. Owned by the orchestrator for the length
 * of a turn and checkpointed between turns.
 */
export interface ConversationState {
  donor: DonorRecord;
  question: string;
  /** Past questions, oldest first, capped */
  history: string[];
  slots: Slots;
  /** Topics detected in the current turn (unique) */
  topics: TopicT[];
  precheck: Precheck | null;
  retrieved: RetrievedEvidence | null;
  blocked: boolean;
  decision: Decision | null;
  used_model: string | null;
  turn_count: number;
  updated_at: string | null;
}

/** Schema used when reloading a checkpoint; a stored state that fails it is discarded */
export const ConversationStateSchema = z.object({
  donor: DonorRecordSchema,
  question: z.string(),
  history: z.array(z.string()),
  slots: SlotsSchema,
  topics: z.array(Topic),
  precheck: PrecheckSchema.nullable(),
  retrieved: RetrievedEvidenceSchema.nullable(),
  blocked: z.boolean(),
  decision: DecisionSchema.nullable(),
  used_model: z.string().nullable(),
  turn_count: z.number().int().nonnegative(),
  updated_at: z.string().nullable(),
});

/** Finite states of a turn */
export type TurnStage =
  | "Ingest"
  | "GuardrailCheck"
  | "SlotExtract"
  | "Precheck"
  | "Retrieve"
  | "Synthesize"
  | "Reflect"
  | "Compose"
  | "End";

/** Which route the turn took to Compose */
export type TurnPath = "full" | "clarify" | "blocked" | "failed";

/** Per-call identifiers threaded through every model-backed stage */
export interface StageCallContext {
  requestId: string;
  sessionId: string;
  abortSignal?: AbortSignal;
}
