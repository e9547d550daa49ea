import { existsSync } from "node:fs";
import { getConfig, type Config } from "../config/index.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { resolveConfigPath } from "../guardrails/config.js";
import { FaqEvidenceRetriever, loadFaqFile } from "./faq.js";
import { HttpEvidenceRetriever } from "./http.js";
import { emptyEvidence, type EvidenceRetriever, type RetrievalContext, type RetrievedEvidence } from "./types.js";

export * from "./types.js";
export { FaqEvidenceRetriever, loadFaqFile } from "./faq.js";
export { HttpEvidenceRetriever } from "./http.js";

export class NullEvidenceRetriever implements EvidenceRetriever {
  readonly name = "null";

  async query(): Promise<RetrievedEvidence> {
    return emptyEvidence();
  }
}

/**
 * Tries each retriever in order; the first non-empty answer wins.
 * A retriever that throws counts as empty.
 */
export class CompositeEvidenceRetriever implements EvidenceRetriever {
  readonly name: string;

  constructor(private readonly retrievers: readonly EvidenceRetriever[]) {
    this.name = retrievers.map((r) => r.name).join("+") || "null";
  }

  async query(question: string, context?: RetrievalContext): Promise<RetrievedEvidence> {
    for (const retriever of this.retrievers) {
      if (context?.abortSignal?.aborted) break;
      try {
        const result = await retriever.query(question, context);
        if (result.text.trim().length > 0) {
          return result;
        }
      } catch (error) {
        log.warn({ retriever: retriever.name, error }, "Evidence retriever threw, trying next");
        emit(TelemetryEvents.RetrievalFailed, {
          request_id: context?.requestId,
          retriever: retriever.name,
          reason: error instanceof Error ? error.name : "unknown_error",
        });
      }
    }
    return emptyEvidence();
  }
}

/**
 * FAQ first (cheap, local), then the HTTP evidence service when configured.
 */
export function createEvidenceRetriever(cfg: Config = getConfig()): EvidenceRetriever {
  const retrievers: EvidenceRetriever[] = [];

  if (existsSync(resolveConfigPath(cfg.retrieval.faqPath))) {
    retrievers.push(new FaqEvidenceRetriever(loadFaqFile(cfg.retrieval.faqPath), cfg.retrieval.faqMatchThreshold));
  } else {
    log.warn({ faq_path: cfg.retrieval.faqPath }, "FAQ file not found, FAQ retrieval disabled");
  }

  if (cfg.retrieval.url) {
    retrievers.push(new HttpEvidenceRetriever(cfg.retrieval.url, cfg.retrieval.timeoutMs));
  }

  if (retrievers.length === 0) {
    return new NullEvidenceRetriever();
  }
  return retrievers.length === 1 ? retrievers[0] : new CompositeEvidenceRetriever(retrievers);
}
