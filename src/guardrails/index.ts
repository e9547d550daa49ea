import type { Decision } from "../schemas/decision.js";
import { loadGuardrailFile, type GuardrailFile } from "./config.js";
import { matchPromptInjection } from "./injection.js";

export { redactPii } from "./pii.js";
export { matchPromptInjection } from "./injection.js";
export { loadGuardrailFile, type GuardrailFile } from "./config.js";

export type GuardrailKind = "red_flag" | "prompt_injection";

export interface GuardrailVerdict {
  kind: GuardrailKind;
  /** Pattern id or red-flag phrase that fired */
  match: string;
  decision: Decision;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Deterministic safety checks run before any model call.
 */
export class Guardrails {
  private readonly redFlags: ReadonlyArray<{ phrase: string; pattern: RegExp }>;

  constructor(private readonly file: GuardrailFile) {
    this.redFlags = file.red_flag_patterns.map((phrase) => ({
      phrase,
      pattern: new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "i"),
    }));
  }

  static fromPath(path: string): Guardrails {
    return new Guardrails(loadGuardrailFile(path));
  }

  /** First red-flag phrase found as a whole word, or null */
  redFlagHit(text: string): string | null {
    return this.redFlags.find(({ pattern }) => pattern.test(text))?.phrase ?? null;
  }

  /**
   * Red flags win over injection: an emergency is escalated even when the
   * text also looks adversarial.
   */
  check(text: string): GuardrailVerdict | null {
    const redFlag = this.redFlagHit(text);
    if (redFlag !== null) {
      return {
        kind: "red_flag",
        match: redFlag,
        decision: {
          decision: "NeedMoreInfo",
          confidence: 0.95,
          rationale: this.file.escalation_message,
          missing_fields: [],
          safety_flags: ["red_flag_detected"],
        },
      };
    }

    const injection = matchPromptInjection(text);
    if (injection !== null) {
      return {
        kind: "prompt_injection",
        match: injection,
        decision: {
          decision: "NeedMoreInfo",
          confidence: 0.9,
          rationale: this.file.prompt_injection_refusal,
          missing_fields: [],
          safety_flags: ["prompt_injection_blocked"],
        },
      };
    }

    return null;
  }
}
