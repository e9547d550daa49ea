import { z } from "zod";

/** A citation as retrievers return it: a bare document id or a mapping carrying one */
export const CitationRefSchema = z.union([z.string(), z.object({ doc_id: z.string() }).passthrough()]);
export type CitationRef = z.infer<typeof CitationRefSchema>;

export const RetrievedEvidenceSchema = z.object({
  text: z.string(),
  citations: z.array(CitationRefSchema),
});
export type RetrievedEvidence = z.infer<typeof RetrievedEvidenceSchema>;

export interface RetrievalContext {
  donorSummary?: string;
  requestId?: string;
  abortSignal?: AbortSignal;
}

/**
 * Text query → answer text with citations.
 *
 * Implementations never reject for upstream trouble: a failed lookup
 * resolves to empty text and no citations.
 */
export interface EvidenceRetriever {
  readonly name: string;
  query(question: string, context?: RetrievalContext): Promise<RetrievedEvidence>;
}

export function emptyEvidence(): RetrievedEvidence {
  return { text: "", citations: [] };
}
