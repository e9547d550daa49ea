import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { recoverJson, type JsonRecord } from "../../utils/json-extractor.js";
import { TurnCancelledError } from "../../utils/errors.js";
import type { ChatModel, ChatPrompt, CallOpts } from "./types.js";
import { isUpstreamModelError } from "./errors.js";

export interface JsonCallOptions extends CallOpts {
  /** Try the provider's strict JSON mode first */
  strictJson: boolean;
  sessionId?: string;
}

export interface JsonCallResult {
  /** Recovered object; `{}` when the call failed or nothing parsed */
  data: JsonRecord;
  raw: string;
  model: string;
  attempts: number;
  /** Set when the stage should fall back: the reason it has to */
  degraded?: string;
}

function failureReason(error: unknown): string {
  if (isUpstreamModelError(error)) return error.name;
  if (error instanceof Error) return error.name || "Error";
  return "unknown_error";
}

/**
 * Issue one model call that should come back as a JSON object.
 *
 * strict call → (on failure) one unconstrained retry → JSON recovery on the
 * text. Upstream failures are reported through `degraded`, never thrown.
 * Cancellation of the caller's signal rejects with TurnCancelledError.
 */
export async function callForJson(
  model: ChatModel,
  prompt: Omit<ChatPrompt, "jsonMode">,
  opts: JsonCallOptions,
): Promise<JsonCallResult> {
  const modes = opts.strictJson ? [true, false] : [false];
  let attempts = 0;
  let lastFailure = "unknown_error";

  for (const [index, jsonMode] of modes.entries()) {
    attempts += 1;
    const start = Date.now();

    try {
      const result = await model.complete({ ...prompt, jsonMode }, opts);

      emit(TelemetryEvents.LlmCallCompleted, {
        request_id: opts.requestId,
        stage: prompt.stage,
        provider: model.provider,
        model: result.model,
        json_mode: jsonMode,
        attempt: attempts,
        duration_ms: Date.now() - start,
        input_tokens: result.usage?.input_tokens ?? 0,
        output_tokens: result.usage?.output_tokens ?? 0,
      });

      const recovered = recoverJson(result.content, { stage: prompt.stage, requestId: opts.requestId });
      return {
        data: recovered.value,
        raw: result.content,
        model: result.model,
        attempts,
        ...(recovered.method === "none" ? { degraded: "unparseable_output" } : {}),
      };
    } catch (error) {
      if (opts.abortSignal?.aborted) {
        throw new TurnCancelledError(opts.sessionId ?? "unknown", prompt.stage);
      }

      lastFailure = failureReason(error);
      emit(TelemetryEvents.LlmCallFailed, {
        request_id: opts.requestId,
        stage: prompt.stage,
        provider: model.provider,
        model: model.model,
        json_mode: jsonMode,
        attempt: attempts,
        error_type: lastFailure,
        duration_ms: Date.now() - start,
      });

      if (jsonMode && index < modes.length - 1) {
        emit(TelemetryEvents.StrictJsonRetry, {
          request_id: opts.requestId,
          stage: prompt.stage,
          provider: model.provider,
          reason: lastFailure,
        });
        continue;
      }

      log.warn({ request_id: opts.requestId, stage: prompt.stage, reason: lastFailure }, "Model call degraded to stage fallback");
    }
  }

  return { data: {}, raw: "", model: model.model, attempts, degraded: lastFailure };
}
