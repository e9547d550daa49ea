/**
 * Free-text PII redaction for outgoing rationale.
 *
 * - off: no redaction
 * - standard: emails, numeric dates, donor ids, phone numbers, and names in
 *   self-introductions ("my name is Jane Doe")
 * - strict: standard plus any capitalised two-word sequence
 *
 * Bracketed markers such as [S6] or [FAQ] are never touched.
 */

import type { PIIRedactionModeT } from "../orchestrator/config.js";

const BRACKET_BLOCK = /\[[^\]]+\]/g;

const EMAIL = /[\w.-]+@[\w.-]+/g;
const SLASH_DATE = /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g;
const ISO_DATE = /\b\d{4}-\d{1,2}-\d{1,2}\b/g;
const DONOR_ID = /\bD\d{3,8}\b/g;
// Starts and ends on a digit so trailing whitespace stays in place
const PHONE_CANDIDATE = /\+?\d[\d\s\-()]{6,}\d/g;
const SELF_INTRODUCED_NAME = /\b(?:[Mm]y name is|I am|I'm|[Nn]ame\s*:)\s+([A-Z][a-z]{2,}\s+[A-Z][a-z]{2,})\b/g;
const CAPITALISED_PAIR = /\b[A-Z][a-z]{2,}\s+[A-Z][a-z]{2,}\b/g;

function protectBrackets(text: string): { working: string; blocks: string[] } {
  const blocks: string[] = [];
  const working = text.replace(BRACKET_BLOCK, (match) => {
    blocks.push(match);
    return `\u0000${blocks.length - 1}\u0000`;
  });
  return { working, blocks };
}

function restoreBrackets(text: string, blocks: string[]): string {
  return text.replace(/\u0000(\d+)\u0000/g, (match, index: string) => blocks[Number(index)] ?? match);
}

export function redactPii(text: string, mode: PIIRedactionModeT = "standard"): string {
  if (!text || mode === "off") {
    return text;
  }

  const { working, blocks } = protectBrackets(text);

  let out = working
    .replace(EMAIL, "[REDACTED_EMAIL]")
    .replace(SLASH_DATE, "[REDACTED_DATE]")
    .replace(ISO_DATE, "[REDACTED_DATE]")
    .replace(DONOR_ID, "[REDACTED_DONOR_ID]")
    .replace(PHONE_CANDIDATE, (match) => (match.replace(/\D/g, "").length >= 8 ? "[REDACTED_PHONE]" : match))
    .replace(SELF_INTRODUCED_NAME, (match, name: string) => match.replace(name, "[REDACTED_NAME]"));

  if (mode === "strict") {
    out = out.replace(CAPITALISED_PAIR, "[REDACTED_NAME]");
  }

  return restoreBrackets(out, blocks);
}
