/**
 * Deterministic veto over the clarifier judge's candidate questions.
 *
 * Every candidate is re-checked against the user's raw text, the known
 * slots and the donor record. The first rule that fires drops it.
 */

import { isRecord } from "../../utils/json-extractor.js";
import { isValidIsoDate } from "../../utils/dates.js";
import { TOPICS, type Slots, type TopicT } from "../../schemas/slots.js";
import type { DonorRecord } from "../../schemas/turn.js";
import { MAX_MISSING_FIELDS } from "../../schemas/decision.js";
import { isEmptyValue } from "../slots/merge.js";
import {
  CONFIRM_TYPE,
  DATE_ASK,
  DONATION_HISTORY_MENTION,
  GENERIC_MEDICAL_ASK,
  LAST_DONATION_ASK,
  OTHER_VACCINATIONS_ASK,
  OTHER_VACCINATIONS_DENIAL,
  POLICY_QUESTION,
  SYMPTOM_KEYWORDS,
  TRAVEL_DENIAL,
  TRAVEL_MENTION,
  hasCalendarDate,
  matchesAny,
  topicsMentioned,
  topicsNegatedAcross,
} from "./patterns.js";

export type DropReason =
  | "policy_question"
  | "negated_topic"
  | "date_known"
  | "type_known"
  | "other_vaccinations_denied"
  | "travel_not_raised"
  | "last_donation_not_needed"
  | "generic_medical_without_symptoms"
  | "duplicate";

export interface FilterContext {
  /** Everything the user typed, one history entry per line, oldest first */
  rawText: string;
  slots: Slots;
  donor: DonorRecord;
  maxAsks?: number;
}

export interface FilterResult {
  kept: string[];
  dropped: Array<{ question: string; reason: DropReason }>;
}

interface Facts {
  rawText: string;
  entries: string[];
  slots: Slots;
  donor: DonorRecord;
  negated: Set<TopicT>;
}

function slotDates(slots: Slots, topics: Iterable<TopicT>): string[] {
  const dates: string[] = [];
  for (const topic of topics) {
    const fields = slots[topic];
    if (!fields) continue;
    for (const value of Object.values(fields)) {
      if (isValidIsoDate(value)) dates.push(value);
      if (Array.isArray(value)) {
        for (const item of value) {
          if (isRecord(item) && isValidIsoDate(item.return_date)) dates.push(item.return_date);
        }
      }
    }
  }
  return dates;
}

function entriesAbout(entries: readonly string[], topics: Set<TopicT>): string[] {
  if (topics.size === 0) return [...entries];
  return entries.filter((entry) => [...topicsMentioned(entry)].some((topic) => topics.has(topic)));
}

/** A true flag or a concrete value in a topic's slots outranks an earlier "no". */
function slotsAffirm(slots: Slots, topic: TopicT): boolean {
  const fields = slots[topic];
  if (!fields) return false;
  return Object.values(fields).some((value) => {
    if (value === true || typeof value === "number") return true;
    if (typeof value === "string") {
      const text = value.trim().toLowerCase();
      return text !== "" && text !== "none";
    }
    return Array.isArray(value) && value.length > 0;
  });
}

function negatedTopics(entries: readonly string[], slots: Slots): Set<TopicT> {
  const negated = topicsNegatedAcross(entries);
  for (const topic of [...negated]) {
    if (slotsAffirm(slots, topic)) negated.delete(topic);
  }
  return negated;
}

function knownLastDonation(facts: Facts): boolean {
  const { donor, slots } = facts;
  return (
    isValidIsoDate(slots.donation?.last_date) ||
    !isEmptyValue(donor.last_donation_date) ||
    !isEmptyValue(donor.last_donation)
  );
}

type Rule = (question: string, topics: Set<TopicT>, facts: Facts) => boolean;

const RULES: ReadonlyArray<{ reason: DropReason; applies: Rule }> = [
  {
    reason: "policy_question",
    applies: (q) => matchesAny(q, POLICY_QUESTION),
  },
  {
    reason: "negated_topic",
    applies: (_q, topics, facts) => [...topics].some((topic) => facts.negated.has(topic)),
  },
  {
    reason: "date_known",
    applies: (q, topics, facts) => {
      if (!matchesAny(q, DATE_ASK)) return false;
      const scope = topics.size > 0 ? topics : TOPICS;
      if (slotDates(facts.slots, scope).length > 0) return true;
      return entriesAbout(facts.entries, topics).some(hasCalendarDate);
    },
  },
  {
    reason: "type_known",
    applies: (q, _topics, facts) =>
      matchesAny(q, CONFIRM_TYPE) &&
      (!isEmptyValue(facts.slots.vaccine?.name) || !isEmptyValue(facts.slots.vaccine?.type)),
  },
  {
    reason: "other_vaccinations_denied",
    applies: (q, _topics, facts) =>
      matchesAny(q, OTHER_VACCINATIONS_ASK) &&
      (facts.slots.vaccine?.other_recent === false || matchesAny(facts.rawText, OTHER_VACCINATIONS_DENIAL)),
  },
  {
    reason: "travel_not_raised",
    applies: (q, _topics, facts) => {
      if (!matchesAny(q, TRAVEL_MENTION)) return false;
      const traveled = facts.slots.travel?.traveled;
      const denied = traveled === false || matchesAny(facts.rawText, TRAVEL_DENIAL);
      const raised = traveled === true || matchesAny(facts.rawText, TRAVEL_MENTION);
      return denied || !raised;
    },
  },
  {
    reason: "last_donation_not_needed",
    applies: (q, _topics, facts) => {
      if (!matchesAny(q, LAST_DONATION_ASK)) return false;
      const raised = facts.slots.donation !== undefined || matchesAny(facts.rawText, DONATION_HISTORY_MENTION);
      return !raised || knownLastDonation(facts);
    },
  },
  {
    reason: "generic_medical_without_symptoms",
    applies: (q, _topics, facts) =>
      matchesAny(q, GENERIC_MEDICAL_ASK) &&
      (!matchesAny(facts.rawText, SYMPTOM_KEYWORDS) || facts.negated.has("symptoms")),
  },
];

export function filterCandidates(candidates: readonly string[], ctx: FilterContext): FilterResult {
  const entries = ctx.rawText.split("\n").filter((entry) => entry.trim() !== "");
  const facts: Facts = {
    rawText: ctx.rawText,
    entries,
    slots: ctx.slots,
    donor: ctx.donor,
    negated: negatedTopics(entries, ctx.slots),
  };
  const limit = Math.min(ctx.maxAsks ?? MAX_MISSING_FIELDS, MAX_MISSING_FIELDS);

  const kept: string[] = [];
  const dropped: FilterResult["dropped"] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    const question = candidate.trim();
    if (!question) continue;

    const key = question.toLowerCase();
    if (seen.has(key)) {
      dropped.push({ question, reason: "duplicate" });
      continue;
    }
    seen.add(key);

    const topics = topicsMentioned(question);
    const rule = RULES.find(({ applies }) => applies(question, topics, facts));
    if (rule) {
      dropped.push({ question, reason: rule.reason });
    } else if (kept.length < limit) {
      kept.push(question);
    }
  }

  return { kept, dropped };
}
