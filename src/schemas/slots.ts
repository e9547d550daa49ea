/**
 * Slot schema: the structured facts accumulated across turns.
 *
 * Six topics, each a typed record of optional fields. Dates are ISO-8601
 * calendar dates (YYYY-MM-DD) or null. Unknown fields on a known topic are
 * kept as pass-through values; unknown topics are dropped.
 */

import { z } from "zod";

export const TOPICS = ["vaccine", "tattoo", "travel", "donation", "medication", "symptoms"] as const;

export const Topic = z.enum(TOPICS);
export type TopicT = z.infer<typeof Topic>;

export function isTopic(value: unknown): value is TopicT {
  return Topic.safeParse(value).success;
}

export type SlotScalar = string | number | boolean | null;
export type SlotValue = SlotScalar | SlotValue[] | { [key: string]: SlotValue };

export const SlotValueSchema: z.ZodType<SlotValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(SlotValueSchema),
    z.record(SlotValueSchema),
  ])
);

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const isoDate = z.string().regex(ISO_DATE_PATTERN).nullable();
const text = z.string().nullable();
const flag = z.boolean().nullable();

export const TravelDestination = z
  .object({
    country: z.string().min(1),
    region: text.optional(),
    return_date: isoDate.optional(),
  })
  .strict();
export type TravelDestinationT = z.infer<typeof TravelDestination>;

export const VaccineSlots = z
  .object({
    name: text.optional(),
    date: isoDate.optional(),
    other_recent: flag.optional(),
    type: text.optional(),
  })
  .catchall(SlotValueSchema);

export const TattooSlots = z
  .object({
    date: isoDate.optional(),
    licensed_studio: flag.optional(),
    location: text.optional(),
  })
  .catchall(SlotValueSchema);

export const TravelSlots = z
  .object({
    traveled: flag.optional(),
    destinations: z.array(TravelDestination).optional(),
    return_date: isoDate.optional(),
  })
  .catchall(SlotValueSchema);

export const DonationSlots = z
  .object({
    last_date: isoDate.optional(),
    type: text.optional(),
  })
  .catchall(SlotValueSchema);

export const MedicationSlots = z
  .object({
    name: text.optional(),
    taking: flag.optional(),
    last_dose_date: isoDate.optional(),
  })
  .catchall(SlotValueSchema);

export const SymptomSlots = z
  .object({
    present: flag.optional(),
    description: text.optional(),
    onset_date: isoDate.optional(),
  })
  .catchall(SlotValueSchema);

export const SlotsSchema = z
  .object({
    vaccine: VaccineSlots.optional(),
    tattoo: TattooSlots.optional(),
    travel: TravelSlots.optional(),
    donation: DonationSlots.optional(),
    medication: MedicationSlots.optional(),
    symptoms: SymptomSlots.optional(),
  })
  .strip();

export type Slots = z.infer<typeof SlotsSchema>;

export type FieldKind = "text" | "flag" | "date" | "destinations";

/**
 * Field kinds per topic. Drives coercion of model output and the field list
 * shown to the extractor prompt.
 */
export const TOPIC_FIELDS = {
  vaccine: { name: "text", date: "date", other_recent: "flag", type: "text" },
  tattoo: { date: "date", licensed_studio: "flag", location: "text" },
  travel: { traveled: "flag", destinations: "destinations", return_date: "date" },
  donation: { last_date: "date", type: "text" },
  medication: { name: "text", taking: "flag", last_dose_date: "date" },
  symptoms: { present: "flag", description: "text", onset_date: "date" },
} as const satisfies Record<TopicT, Record<string, FieldKind>>;

export function fieldKind(topic: TopicT, field: string): FieldKind | undefined {
  const fields: Record<string, FieldKind> = TOPIC_FIELDS[topic];
  return Object.prototype.hasOwnProperty.call(fields, field) ? fields[field] : undefined;
}
