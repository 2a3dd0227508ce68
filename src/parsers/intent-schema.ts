import { z } from "zod";
import { COMPLIANCE_TONES, INTENT_TYPES, type CaseFilters, type IntentResult } from "../types";

export const DEFAULT_RESULT_COUNT = 5;
export const MAX_RESULT_COUNT = 50;
export const FALLBACK_CONFIDENCE = 0.5;

const RangeFilterSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional()
  })
  .strict()
  .refine((range) => range.min !== undefined || range.max !== undefined, {
    message: "Range filter needs a min or a max"
  });

export const FilterValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), RangeFilterSchema]);

export const IntentPayloadSchema = z.object({
  intent: z.enum(INTENT_TYPES),
  loan_id: z.union([z.string(), z.number()]).nullable().optional(),
  filters: z.record(z.unknown()).nullable().optional(),
  top_k_hint: z.number().int().positive().optional(),
  compliance_tone: z.enum(COMPLIANCE_TONES).optional(),
  confidence_score: z.number().min(0).max(1).optional()
});

export type IntentPayload = z.infer<typeof IntentPayloadSchema>;

export function parseIntentPayload(raw: unknown): IntentResult | null {
  const result = IntentPayloadSchema.safeParse(raw);
  if (!result.success) {
    console.warn("Intent payload failed validation", JSON.stringify(result.error.format()));
    return null;
  }
  return toIntentResult(result.data);
}

/** Keeps the filter values retrieval can apply and drops the rest one by one. */
export function toCaseFilters(raw: Record<string, unknown>): CaseFilters {
  const filters: CaseFilters = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined || (typeof value === "string" && value.trim().length === 0)) {
      continue;
    }
    const parsed = FilterValueSchema.safeParse(value);
    if (!parsed.success) {
      console.warn(`Ignoring unsupported filter value for "${key}"`, JSON.stringify(value));
      continue;
    }
    filters[key] = parsed.data;
  }
  return filters;
}

function toIntentResult(payload: IntentPayload): IntentResult {
  const filters = toCaseFilters(payload.filters ?? {});

  const loanId = payload.loan_id === null || payload.loan_id === undefined ? null : String(payload.loan_id).trim();

  return Object.freeze({
    intent: payload.intent,
    loanId: loanId && loanId.length > 0 ? loanId : null,
    filters: Object.freeze(filters),
    resultCountHint: Math.min(payload.top_k_hint ?? DEFAULT_RESULT_COUNT, MAX_RESULT_COUNT),
    tone: payload.compliance_tone ?? "neutral",
    confidence: payload.confidence_score ?? 0
  }) satisfies IntentResult;
}
