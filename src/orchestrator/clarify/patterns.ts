/**
 * Deterministic pattern tables behind the clarification filter.
 *
 * Bump PATTERN_TABLE_VERSION whenever a table changes; it is logged with
 * every gate decision.
 */

import { TOPICS, type TopicT } from "../../schemas/slots.js";

export const PATTERN_TABLE_VERSION = "2024.07.1";

export type PatternTable = readonly RegExp[];

export function matchesAny(text: string, table: PatternTable): boolean {
  return table.some((pattern) => pattern.test(text));
}

const MONTH = "(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*";

/** Questions about general policy. The system answers these itself. */
export const POLICY_QUESTION: PatternTable = [
  /\bwaiting period/i,
  /\bdeferral (length|period|time)/i,
  /\bhow long\b/i,
  /\bpolic(y|ies)\b/i,
  /\bguidelines?\b/i,
];

export const DATE_ASK: PatternTable = [/\bwhen\b/i, /\bdates?\b/i, /\bwhat day\b/i, /\bhow recently\b/i];

export const CONFIRM_TYPE: PatternTable = [
  /\bconfirm\b.*\b(type|name|brand|vaccine)\b/i,
  /\bwhich (vaccine|type|brand)\b/i,
  /\bwhat (type|kind|name|brand) of vaccin/i,
];

export const OTHER_VACCINATIONS_ASK: PatternTable = [
  /\bother (recent )?(vaccin\w*|shots?|jabs?|immuni[sz]ations?)\b/i,
  /\b(more|additional|further) (vaccin\w*|shots?|jabs?)\b/i,
];

export const OTHER_VACCINATIONS_DENIAL: PatternTable = [
  /\bno (other|more|additional|further) (recent )?(vaccin\w*|shots?|jabs?|immuni[sz]ations?)\b/i,
  /\b(haven't|have not|didn't|did not) (had|have|get|got|receive\w*) any (other|more) (vaccin\w*|shots?|jabs?)\b/i,
  /\bnot had any other (vaccin\w*|shots?|jabs?)\b/i,
];

export const TRAVEL_MENTION: PatternTable = [
  /\btravel\w*\b/i,
  /\btrips?\b/i,
  /\babroad\b/i,
  /\boverseas\b/i,
  /\bflew\b/i,
  /\bdestinations?\b/i,
  /\bcountr(y|ies)\b/i,
];

export const TRAVEL_DENIAL: PatternTable = [
  /\bno (recent |international )?(travel\w*|trips?)\b/i,
  /\b(haven't|have not|didn't|did not|never) (been )?travel+ed\b/i,
  /\b(haven't|have not|didn't|did not|never) (gone|go|been|went) (abroad|overseas)\b/i,
  /\bnot travel+ed\b/i,
];

export const LAST_DONATION_ASK: PatternTable = [
  /\blast (blood |plasma |platelet )?donat\w*\b/i,
  /\bprevious(ly)? donat\w*\b/i,
  /\bwhen did you (last )?donate\b/i,
  /\bdonated before\b/i,
];

/** The user raised a previous donation (not merely asking whether they can donate) */
export const DONATION_HISTORY_MENTION: PatternTable = [
  /\bdonated\b/i,
  /\bgave blood\b/i,
  /\blast (blood )?donation\b/i,
  /\bprevious donation\b/i,
  /\bregular donor\b/i,
];

export const GENERIC_MEDICAL_ASK: PatternTable = [
  /\b(any|other) (medical|health) (conditions?|issues?|problems?|concerns?)\b/i,
  /\bmedical history\b/i,
  /\bhealth conditions?\b/i,
];

export const SYMPTOM_KEYWORDS: PatternTable = [
  /\bsymptoms?\b/i,
  /\bfever\b/i,
  /\bcough\w*\b/i,
  /\bcold\b/i,
  /\bflu\b/i,
  /\bsore throat\b/i,
  /\bsick\b/i,
  /\bill(ness)?\b/i,
  /\binfection\b/i,
  /\bpain\b/i,
  /\brash\b/i,
  /\bdiarrh?o?ea\b/i,
  /\bvomit\w*\b/i,
  /\bheadache\b/i,
  /\bdizz(y|iness)\b/i,
];

export const ISO_DATE_IN_TEXT = /\b\d{4}-\d{2}-\d{2}\b/;

/** Concrete calendar dates only. Relative phrases ("last week") never pin a date down. */
export const CALENDAR_DATE_IN_TEXT: PatternTable = [
  ISO_DATE_IN_TEXT,
  /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/,
  new RegExp(`\\b${MONTH} \\d{1,2}(st|nd|rd|th)?\\b`, "i"),
  new RegExp(`\\b\\d{1,2}(st|nd|rd|th)? (of )?${MONTH}\\b`, "i"),
];

export const TOPIC_KEYWORDS: Readonly<Record<TopicT, PatternTable>> = {
  vaccine: [/\bvaccin\w*\b/i, /\bshots?\b/i, /\bjabs?\b/i, /\bimmuni[sz]\w*\b/i, /\bbooster\b/i],
  tattoo: [/\btattoo\w*\b/i, /\binked\b/i],
  travel: TRAVEL_MENTION,
  donation: LAST_DONATION_ASK,
  medication: [/\bmedicat\w*\b/i, /\bmedicines?\b/i, /\bmeds\b/i, /\bantibiotics?\b/i, /\bpills?\b/i, /\bprescri\w*\b/i],
  symptoms: SYMPTOM_KEYWORDS,
};

/** Whole-topic negations. "no other vaccines" is handled by OTHER_VACCINATIONS_DENIAL instead. */
export const TOPIC_NEGATIONS: Readonly<Record<TopicT, PatternTable>> = {
  vaccine: [
    /\bno (recent )?(vaccin\w*|shots?|jabs?)\b/i,
    /\b(haven't|have not|didn't|did not|never) (had|have|get|got|gotten|receive\w*) (a |any )?(recent )?(vaccin\w*|shots?|jabs?)\b/i,
  ],
  tattoo: [
    /\bno (new |recent )?tattoos?\b/i,
    /\b(haven't|have not|didn't|did not|never) (had|have|get|got|gotten) (a |any )?(new )?tattoos?\b/i,
  ],
  travel: TRAVEL_DENIAL,
  donation: [/\bnever donated\b/i, /\b(haven't|have not) donated\b/i, /\bfirst[- ]time donor\b/i],
  medication: [
    /\bno (medications?|medicines?|meds|antibiotics|pills)\b/i,
    /\bnot (taking|on) (any )?(medications?|medicines?|meds|antibiotics|pills)\b/i,
  ],
  symptoms: [/\bno symptoms?\b/i, /\b(feel|feeling) (fine|well|healthy)\b/i, /\bnot (sick|ill)\b/i],
};

export function topicsMentioned(text: string): Set<TopicT> {
  return new Set(TOPICS.filter((topic) => matchesAny(text, TOPIC_KEYWORDS[topic])));
}

export function topicsNegated(text: string): Set<TopicT> {
  return new Set(TOPICS.filter((topic) => matchesAny(text, TOPIC_NEGATIONS[topic])));
}

/**
 * Topics negated in a sequence of user entries, oldest first. A later entry
 * that mentions a topic without negating it clears an earlier negation.
 */
export function topicsNegatedAcross(entries: readonly string[]): Set<TopicT> {
  const negated = new Set<TopicT>();
  for (const entry of entries) {
    const mentioned = topicsMentioned(entry);
    const denied = topicsNegated(entry);
    for (const topic of TOPICS) {
      if (denied.has(topic)) {
        negated.add(topic);
      } else if (mentioned.has(topic)) {
        negated.delete(topic);
      }
    }
  }
  return negated;
}

export function hasCalendarDate(text: string): boolean {
  return matchesAny(text, CALENDAR_DATE_IN_TEXT);
}
