import { request } from "undici";
import { z } from "zod";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { linkAbort } from "../utils/abort.js";
import { CitationRefSchema, emptyEvidence, type EvidenceRetriever, type RetrievalContext, type RetrievedEvidence } from "./types.js";

const EvidenceResponseSchema = z
  .object({
    answer: z.string().optional(),
    text: z.string().optional(),
    citations: z.array(CitationRefSchema).default([]),
  })
  .transform((body) => ({ text: body.answer ?? body.text ?? "", citations: body.citations }));

/**
 * Evidence service over HTTP: POST {question, donor_facts} → {answer, citations}.
 */
export class HttpEvidenceRetriever implements EvidenceRetriever {
  readonly name = "http";

  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async query(question: string, context: RetrievalContext = {}): Promise<RetrievedEvidence> {
    const start = Date.now();
    const abort = linkAbort(this.timeoutMs, context.abortSignal);

    try {
      const response = await request(this.url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(context.requestId ? { "x-request-id": context.requestId } : {}),
        },
        body: JSON.stringify({ question, donor_facts: context.donorSummary ?? null }),
        signal: abort.signal,
      });

      if (response.statusCode >= 400) {
        await response.body.dump();
        return this.fail(`http_${response.statusCode}`, start, context.requestId);
      }

      const parsed = EvidenceResponseSchema.safeParse(await response.body.json());
      if (!parsed.success) {
        return this.fail("invalid_response", start, context.requestId);
      }
      return parsed.data;
    } catch (error) {
      const reason = error instanceof Error ? error.name : "unknown_error";
      log.warn({ request_id: context.requestId, error }, "Evidence retrieval request failed");
      return this.fail(reason, start, context.requestId);
    } finally {
      abort.dispose();
    }
  }

  private fail(reason: string, start: number, requestId?: string): RetrievedEvidence {
    emit(TelemetryEvents.RetrievalFailed, {
      request_id: requestId,
      retriever: this.name,
      reason,
      duration_ms: Date.now() - start,
    });
    return emptyEvidence();
  }
}
