/**
 * Eligibility turn orchestrator.
 *
 * Ingest → GuardrailCheck → SlotExtract → Precheck → Retrieve →
 * Synthesize (clarifier gate) → Reflect → Compose.
 *
 * A blocked guardrail check and a firing clarifier gate both jump straight
 * to Compose. The turn works on a copy of the loaded state and checkpoints
 * it only after Compose, so a failed or cancelled turn persists nothing.
 */

import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { TurnCancelledError } from "../../utils/errors.js";
import { shortDigest } from "../../utils/hash.js";
import { computeEligibility } from "../../rules/rule-engine.js";
import { hasDonor, summariseDonor } from "../../rules/donor-summary.js";
import type { Decision } from "../../schemas/decision.js";
import type { TurnRequest, TurnResponse } from "../../schemas/turn.js";
import { SessionLock } from "../session-lock.js";
import { cloneState, createEmptyState, pushHistory } from "../state.js";
import { mergeSlots } from "../slots/merge.js";
import { filterCandidates } from "../clarify/filter.js";
import { PATTERN_TABLE_VERSION } from "../clarify/patterns.js";
import { composeResponse } from "../decision/composer.js";
import type { ConversationState, StageCallContext, TurnStage } from "../types.js";
import type { PipelineDeps, PipelineDescription, RunTurnOptions, TurnContext } from "./types.js";

const FAILED_TURN_CONFIDENCE = 0.3;
const DEFAULT_CLARIFY_RATIONALE = "A few details are needed before this question can be answered.";

export class EligibilityPipeline {
  private readonly lock: SessionLock;
  private readonly computePrecheck: NonNullable<PipelineDeps["computePrecheck"]>;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.lock = deps.lock ?? new SessionLock();
    this.computePrecheck = deps.computePrecheck ?? computeEligibility;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one turn. Always resolves to a well-formed response, except when the
   * caller's signal fires, which rejects with TurnCancelledError.
   */
  async runTurn(request: TurnRequest, opts: RunTurnOptions): Promise<TurnResponse> {
    return this.lock.run(request.session_id, () => this.execute(request, opts));
  }

  /** Model and collaborator identities, for health reporting */
  describe(): PipelineDescription {
    return {
      models: {
        extractor: this.deps.extractor.modelId,
        clarifier: this.deps.judge.modelId,
        decision: this.deps.synthesizer.modelId,
        reflector: this.deps.reflector.modelId,
      },
      retriever: this.deps.retriever.name,
      checkpoint_store: this.deps.checkpoints.kind,
    };
  }

  async getSession(sessionId: string): Promise<ConversationState | null> {
    return this.deps.checkpoints.get(sessionId);
  }

  /** Replace the stored checkpoint with a fresh state. Queues behind running turns. */
  async resetSession(sessionId: string): Promise<void> {
    await this.lock.run(sessionId, async () => {
      await this.deps.checkpoints.put(sessionId, createEmptyState());
      log.info({ session_id: sessionId }, "Session reset");
    });
  }

  private async execute(request: TurnRequest, opts: RunTurnOptions): Promise<TurnResponse> {
    const sessionId = request.session_id;
    emit(TelemetryEvents.TurnStarted, { request_id: opts.requestId, session_id: sessionId });

    const turn: TurnContext = {
      requestId: opts.requestId,
      sessionId,
      abortSignal: opts.abortSignal,
      startedAt: Date.now(),
      priorHistory: [],
      rawText: "",
      path: "full",
      state: createEmptyState(),
    };

    try {
      this.throwIfCancelled(turn, "Ingest");
      const loaded = (await this.deps.checkpoints.get(sessionId)) ?? createEmptyState();
      turn.state = cloneState(loaded);

      await this.step(turn, "Ingest", () => this.ingest(turn, request));

      const blocked = await this.step(turn, "GuardrailCheck", () => this.guardrailCheck(turn));
      if (!blocked) {
        await this.step(turn, "SlotExtract", () => this.slotExtract(turn));
        await this.step(turn, "Precheck", () => this.precheck(turn));
        await this.step(turn, "Retrieve", () => this.retrieve(turn));
        const clarified = await this.step(turn, "Synthesize", () => this.synthesize(turn));
        if (!clarified && this.deps.settings.reflectionEnabled) {
          await this.step(turn, "Reflect", () => this.reflect(turn));
        }
      }

      return await this.step(turn, "Compose", () => this.compose(turn));
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        emit(TelemetryEvents.TurnCancelled, {
          request_id: turn.requestId,
          session_id: sessionId,
          stage: error.stage,
          duration_ms: Date.now() - turn.startedAt,
        });
        throw error;
      }
      return this.failedTurn(turn, error);
    }
  }

  private async step<T>(turn: TurnContext, stage: TurnStage, run: () => T | Promise<T>): Promise<T> {
    this.throwIfCancelled(turn, stage);
    const start = Date.now();
    const result = await run();
    emit(TelemetryEvents.StageCompleted, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      stage,
      duration_ms: Date.now() - start,
    });
    return result;
  }

  private throwIfCancelled(turn: TurnContext, stage: TurnStage): void {
    if (turn.abortSignal?.aborted) {
      throw new TurnCancelledError(turn.sessionId, stage);
    }
  }

  private callContext(turn: TurnContext): StageCallContext {
    return { requestId: turn.requestId, sessionId: turn.sessionId, abortSignal: turn.abortSignal };
  }

  private degraded(turn: TurnContext, stage: TurnStage, reason: string): void {
    emit(TelemetryEvents.StageDegraded, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      stage,
      reason,
    });
  }

  private ingest(turn: TurnContext, request: TurnRequest): void {
    const { state } = turn;
    if (hasDonor(request.donor)) {
      state.donor = request.donor;
    }
    turn.priorHistory = [...state.history];
    state.question = request.question.trim();
    state.history = pushHistory(state.history, state.question, this.deps.settings.historyCap);
    state.topics = [];
    state.precheck = null;
    state.retrieved = null;
    state.blocked = false;
    state.decision = null;
    state.used_model = null;
    turn.rawText = state.history.join("\n");
  }

  private guardrailCheck(turn: TurnContext): boolean {
    const { state } = turn;
    const verdict = this.deps.guardrails.check(`${state.question} ${JSON.stringify(state.donor)}`);
    if (!verdict) return false;

    state.blocked = true;
    state.decision = verdict.decision;
    state.used_model = "guardrails";
    turn.path = "blocked";
    emit(TelemetryEvents.GuardrailBlocked, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      kind: verdict.kind,
      match: verdict.match,
    });
    return true;
  }

  private async slotExtract(turn: TurnContext): Promise<void> {
    const { state } = turn;
    if (!state.question) return;

    const result = await this.deps.extractor.extract(
      { question: state.question, history: turn.priorHistory, slots: state.slots },
      this.callContext(turn),
    );
    if (result.degraded) {
      this.degraded(turn, "SlotExtract", result.degraded);
      return;
    }
    state.slots = mergeSlots(state.slots, result.delta);
    state.topics = result.topics;
  }

  private precheck(turn: TurnContext): void {
    const { state } = turn;
    state.precheck = hasDonor(state.donor) ? this.computePrecheck(state.donor) : null;
  }

  private async retrieve(turn: TurnContext): Promise<void> {
    const { state } = turn;
    const donorSummary = summariseDonor(state.donor);
    const query = state.question || `Eligibility determination context for donor: ${donorSummary}`;
    state.retrieved = await this.deps.retriever.query(query, {
      donorSummary,
      requestId: turn.requestId,
      abortSignal: turn.abortSignal,
    });
    if (!state.retrieved.text) {
      this.degraded(turn, "Retrieve", "no_evidence");
    }
  }

  /** Returns true when the clarifier gate fired and synthesis was skipped. */
  private async synthesize(turn: TurnContext): Promise<boolean> {
    const { state } = turn;
    const { settings } = this.deps;
    const ctx = this.callContext(turn);

    if (settings.clarifierEnabled && state.question) {
      const verdict = await this.deps.judge.judge(
        {
          question: state.question,
          history: turn.priorHistory,
          slots: state.slots,
          topics: state.topics,
          donorSelected: hasDonor(state.donor),
          precheckAvailable: state.precheck !== null,
        },
        ctx,
      );
      if (verdict.degraded) {
        this.degraded(turn, "Synthesize", `clarifier_${verdict.degraded}`);
      }

      if (verdict.decision === "clarify") {
        const filtered = filterCandidates(verdict.asks, {
          rawText: turn.rawText,
          slots: state.slots,
          donor: state.donor,
          maxAsks: settings.maxAsks,
        });
        emit(TelemetryEvents.ClarifyGated, {
          request_id: turn.requestId,
          session_id: turn.sessionId,
          outcome: filtered.kept.length > 0 ? "clarify" : "answer",
          asks_before: verdict.asks.length,
          asks_after: filtered.kept.length,
          dropped: filtered.dropped.map(({ reason }) => reason),
          pattern_version: PATTERN_TABLE_VERSION,
        });

        if (filtered.kept.length > 0) {
          state.decision = {
            decision: "NeedMoreInfo",
            confidence: Math.min(verdict.confidence, settings.clarifyConfidenceCap),
            rationale: verdict.reason || DEFAULT_CLARIFY_RATIONALE,
            missing_fields: filtered.kept,
            safety_flags: [],
          };
          state.used_model = verdict.model;
          turn.path = "clarify";
          return true;
        }
      }
    }

    const donorSummary = summariseDonor(state.donor);
    const result = await this.deps.synthesizer.synthesize(
      {
        donor: state.donor,
        donorSummary,
        precheck: state.precheck,
        retrieved: state.retrieved,
        slots: state.slots,
        question: state.question,
      },
      ctx,
    );
    if (result.degraded) {
      this.degraded(turn, "Synthesize", result.degraded);
    }
    state.decision = result.decision;
    state.used_model = result.model;
    return false;
  }

  private async reflect(turn: TurnContext): Promise<void> {
    const { state } = turn;
    if (!state.decision) return;

    const result = await this.deps.reflector.reflect(
      {
        decision: state.decision,
        donorSummary: summariseDonor(state.donor),
        precheck: state.precheck,
        retrieved: state.retrieved,
        question: state.question,
      },
      this.callContext(turn),
    );
    if (result.degraded) {
      this.degraded(turn, "Reflect", result.degraded);
    }
    state.decision = result.decision;
  }

  private async compose(turn: TurnContext): Promise<TurnResponse> {
    const { state } = turn;
    const response = composeResponse({
      decision: state.decision,
      precheck: state.precheck,
      retrieved: state.retrieved,
      usedModel: state.used_model ?? "none",
      redactionMode: this.deps.settings.piiRedactionMode,
    });

    state.decision = {
      decision: response.decision,
      confidence: response.confidence,
      rationale: response.rationale,
      missing_fields: response.missing_fields,
      safety_flags: response.safety_flags,
    };
    state.used_model = response.used_model;
    state.turn_count += 1;
    state.updated_at = this.now().toISOString();

    // Last chance to cancel: past this point the turn is committed
    this.throwIfCancelled(turn, "Compose");
    await this.deps.checkpoints.put(turn.sessionId, state);
    emit(TelemetryEvents.CheckpointSaved, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      store: this.deps.checkpoints.kind,
      turn_count: state.turn_count,
    });

    emit(TelemetryEvents.TurnCompleted, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      label: response.decision,
      confidence: response.confidence,
      path: turn.path,
      used_model: response.used_model,
      answer_hash: shortDigest(response.rationale),
      duration_ms: Date.now() - turn.startedAt,
    });
    return response;
  }

  private failedTurn(turn: TurnContext, error: unknown): TurnResponse {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ error: message, request_id: turn.requestId, session_id: turn.sessionId }, "Eligibility turn failed");
    emit(TelemetryEvents.TurnFailed, {
      request_id: turn.requestId,
      session_id: turn.sessionId,
      error_type: error instanceof Error ? error.name : "unknown_error",
      duration_ms: Date.now() - turn.startedAt,
    });

    const decision: Decision = {
      decision: "NeedMoreInfo",
      confidence: FAILED_TURN_CONFIDENCE,
      rationale: "Something went wrong while assessing this question, so no determination was made. Please try again.",
      missing_fields: [],
      safety_flags: [],
    };
    return composeResponse({
      decision,
      precheck: null,
      retrieved: null,
      usedModel: "none",
      redactionMode: this.deps.settings.piiRedactionMode,
    });
  }
}
