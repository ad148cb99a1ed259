import { z } from 'zod';

function lowercase(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

const sentimentLabel = z.preprocess(lowercase, z.enum(['positive', 'negative', 'neutral']));
const level = z.preprocess(lowercase, z.enum(['high', 'medium', 'low']));

/** Numbers or numeric strings, clamped to 0.0-1.0 */
const confidence = z
  .preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z.number().finite(),
  )
  .transform((value) => Math.min(1, Math.max(0, value)));

/** Free text; scalar values are kept as their string form */
const text = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const textList = z.preprocess(
  (value) => (typeof value === 'string' ? [value] : value),
  z.array(text),
);

export const SentimentSchema = z.object({
  sentiment: sentimentLabel,
  confidence,
  emotions: textList,
  tone: text,
});

export const IntentSchema = z.object({
  primary_intent: text,
  confidence,
  entities: z.record(z.string(), z.unknown()),
  action_required: z.union([z.string(), z.boolean()]),
});

export const DealInsightsSchema = z.object({
  risk_factors: textList,
  opportunities: textList,
  next_action: text,
  close_likelihood: level,
});

export const NextActionSchema = z.object({
  action: text,
  description: text,
  priority: level,
  estimated_time: text,
});

export const NextActionListSchema = z.array(NextActionSchema);

export type SentimentAnalysis = z.output<typeof SentimentSchema>;
export type IntentExtraction = z.output<typeof IntentSchema>;
export type DealInsightsPayload = z.output<typeof DealInsightsSchema>;
export type NextAction = z.output<typeof NextActionSchema>;
