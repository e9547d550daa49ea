/**
 * Prompt-injection heuristics. Ordered; first hit wins.
 */
export const INJECTION_PATTERNS: ReadonlyArray<{ id: string; pattern: RegExp }> = [
  { id: "ignore_instructions", pattern: /ignore (previous|prior) (instructions|rules)/i },
  { id: "reveal_prompt", pattern: /reveal (system|hidden) prompt/i },
  { id: "dump_document", pattern: /show (the )?(full|entire) (document|policy)/i },
  { id: "print_context", pattern: /print (all )?context/i },
  { id: "exfiltration", pattern: /\bexfiltrate\b|\bleak\b|bypass (guardrails|safety)/i },
  { id: "encoded_payload", pattern: /\bbase64\b|curl\s+http/i },
];

/** Id of the first matching injection pattern, or null. */
export function matchPromptInjection(text: string): string | null {
  for (const { id, pattern } of INJECTION_PATTERNS) {
    if (pattern.test(text)) return id;
  }
  return null;
}
