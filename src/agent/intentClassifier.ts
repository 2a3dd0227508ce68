import type { CompletionService } from "../llm/client";
import { buildIntentPrompt, JSON_SYSTEM_PROMPT } from "../llm/prompt";
import { DEFAULT_RESULT_COUNT, FALLBACK_CONFIDENCE, parseIntentPayload } from "../parsers/intent-schema";
import type { ComplianceTone, IntentResult, IntentType } from "../types";
import { describeError } from "../errors";
import { extractJsonObject } from "../utils";

// Checked in order; the first keyword present decides the intent.
const FALLBACK_INTENT_KEYWORDS: Array<{ keyword: string; intent: IntentType }> = [
  { keyword: "reject", intent: "why_rejected" },
  { keyword: "approve", intent: "why_approved" },
  { keyword: "similar", intent: "similar_cases" },
  { keyword: "risk", intent: "risk_analysis" }
];

export function fallbackIntent(query: string): IntentResult {
  const lower = query.toLowerCase();
  const intent = FALLBACK_INTENT_KEYWORDS.find((entry) => lower.includes(entry.keyword))?.intent ?? "general_inquiry";
  const tone: ComplianceTone = lower.includes("audit") ? "audit" : "neutral";

  return Object.freeze({
    intent,
    loanId: null,
    filters: Object.freeze({}),
    resultCountHint: DEFAULT_RESULT_COUNT,
    tone,
    confidence: FALLBACK_CONFIDENCE
  });
}

export class IntentClassifier {
  constructor(private readonly completion: CompletionService) {}

  /** Never throws: any failure to obtain a valid model answer yields the keyword heuristic. */
  async analyze(query: string): Promise<IntentResult> {
    if (!this.completion.available) {
      return fallbackIntent(query);
    }

    try {
      const prompt = await buildIntentPrompt(query);
      const content = await this.completion.complete({
        prompt,
        system: JSON_SYSTEM_PROMPT,
        temperature: 0,
        maxTokens: 300,
        json: true
      });
      if (content === null) {
        return fallbackIntent(query);
      }

      const parsed = parseIntentPayload(extractJsonObject(content));
      if (!parsed) {
        return fallbackIntent(query);
      }

      console.log(`Intent detected: ${parsed.intent} (confidence ${parsed.confidence})`);
      return parsed;
    } catch (error) {
      console.warn("Intent classification failed", describeError(error));
      return fallbackIntent(query);
    }
  }
}
