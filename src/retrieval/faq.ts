import { readFileSync } from "node:fs";
import { z } from "zod";
import { log } from "../utils/telemetry.js";
import { resolveConfigPath } from "../guardrails/config.js";
import { similarityRatio } from "./similarity.js";
import { emptyEvidence, type EvidenceRetriever, type RetrievedEvidence } from "./types.js";

export const FaqEntrySchema = z.object({
  q: z.string().min(1),
  a: z.string().min(1),
  source: z.string().default("FAQ"),
});
export type FaqEntry = z.infer<typeof FaqEntrySchema>;

export const FaqFileSchema = z.array(FaqEntrySchema);

export interface FaqMatch {
  entry: FaqEntry;
  score: number;
}

export function loadFaqFile(path: string): FaqEntry[] {
  const fullPath = resolveConfigPath(path);
  const entries = FaqFileSchema.parse(JSON.parse(readFileSync(fullPath, "utf-8")));
  log.info({ config_path: fullPath, entries: entries.length }, "Loaded FAQ entries");
  return entries;
}

/**
 * Answers from a curated FAQ list when the question is close enough to one
 * of its entries.
 */
export class FaqEvidenceRetriever implements EvidenceRetriever {
  readonly name = "faq";

  constructor(
    private readonly entries: readonly FaqEntry[],
    private readonly threshold: number,
  ) {}

  bestMatch(question: string): FaqMatch | null {
    const needle = question.trim().toLowerCase();
    if (!needle || this.entries.length === 0) return null;

    let best: FaqMatch | null = null;
    for (const entry of this.entries) {
      const score = similarityRatio(needle, entry.q.toLowerCase());
      if (best === null || score > best.score) {
        best = { entry, score };
      }
    }
    return best !== null && best.score >= this.threshold ? best : null;
  }

  async query(question: string): Promise<RetrievedEvidence> {
    const match = this.bestMatch(question);
    if (!match) return emptyEvidence();

    log.debug({ faq: match.entry.q, score: Number(match.score.toFixed(3)) }, "FAQ match");
    return { text: match.entry.a, citations: [match.entry.source] };
  }
}
