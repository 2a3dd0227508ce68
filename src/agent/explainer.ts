import { z } from "zod";
import { LOAN_COLUMNS } from "../config/columns";
import { describeError } from "../errors";
import type { CompletionService } from "../llm/client";
import { buildExplanationPrompt, JSON_SYSTEM_PROMPT } from "../llm/prompt";
import { buildCaseContext } from "../router/context";
import type { QueryRouter } from "../router/queryRouter";
import type { ComplianceTone, IntentResult, RetrievedCase } from "../types";
import { extractJsonObject, formatCurrency, toOptionalNumber } from "../utils";

export const NO_EVIDENCE_SUMMARY = "No relevant loan records were found for this query.";

const EVIDENCE_LIMIT = 5;
const HIGH_DTI = 0.4;
const LOW_CREDIT_SCORE = 650;

export const COMPLIANCE_DISCLAIMERS: Record<ComplianceTone, string> = {
  audit:
    "Audit notice: this analysis is derived from historical loan records by automated retrieval. Verify each cited record against the system of record before using it in a compliance review.",
  business:
    "For business planning only. Figures describe historical applications and are not a credit decision.",
  neutral:
    "Generated from historical loan data for informational purposes. It is not a lending decision."
};

const NarrativeSchema = z.object({
  summary: z.string().min(1),
  evidence_points: z.array(z.string()).default([]),
  risk_notes: z.array(z.string()).default([])
});

export interface ExplainInput {
  query: string;
  /** The query prefixed with recent conversation turns. */
  contextualQuery: string;
  intent: IntentResult;
  cases: readonly RetrievedCase[];
}

export interface Explanation {
  summary: string;
  evidencePoints: string[];
  riskNotes: string[];
  complianceDisclaimer: string;
}

export interface ExplainerOptions {
  completion: CompletionService;
  router: QueryRouter;
}

function joinSummary(computed: string | null, summary: string): string {
  return computed ? `${computed}\n\n${summary}` : summary;
}

function statusCounts(cases: readonly RetrievedCase[]): string {
  const counts = new Map<string, number>();
  for (const retrieved of cases) {
    const status = retrieved.approvalStatus ?? "Unknown";
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  return [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(", ");
}

export function fallbackSummary(cases: readonly RetrievedCase[]): string {
  const noun = cases.length === 1 ? "case" : "cases";
  const sentences = [`Reviewed ${cases.length} similar loan ${noun}: ${statusCounts(cases)}.`];
  const amounts = cases.flatMap((retrieved) => (retrieved.loanAmount === undefined ? [] : [retrieved.loanAmount]));
  if (amounts.length > 0) {
    const average = amounts.reduce((total, value) => total + value, 0) / amounts.length;
    sentences.push(`Average loan amount ${formatCurrency(average)}.`);
  }
  return sentences.join(" ");
}

export function fallbackEvidence(cases: readonly RetrievedCase[]): string[] {
  return cases.slice(0, EVIDENCE_LIMIT).map((retrieved) => {
    const record = retrieved.rawRecord;
    const parts = [
      retrieved.approvalStatus ?? "Unknown status",
      `amount ${retrieved.loanAmount === undefined ? "N/A" : formatCurrency(retrieved.loanAmount)}`,
      `credit score ${toOptionalNumber(record[LOAN_COLUMNS.creditScore]) ?? "N/A"}`,
      `DTI ${toOptionalNumber(record[LOAN_COLUMNS.debtRatio]) ?? "N/A"}`
    ];
    return `Case ${retrieved.caseId} (similarity ${retrieved.similarityScore.toFixed(3)}): ${parts.join(", ")}`;
  });
}

/** Ratios stored as percentages (45 rather than 0.45) are scaled down first. */
function asRatio(value: number): number {
  return value > 1 ? value / 100 : value;
}

export function riskNotes(cases: readonly RetrievedCase[]): string[] {
  const notes: string[] = [];
  for (const retrieved of cases) {
    const record = retrieved.rawRecord;
    const dti = toOptionalNumber(record[LOAN_COLUMNS.debtRatio]);
    if (dti !== undefined && asRatio(dti) > HIGH_DTI) {
      notes.push(`Case ${retrieved.caseId}: debt-to-income ratio ${dti} is above ${HIGH_DTI.toFixed(2)}`);
    }
    const creditScore = toOptionalNumber(record[LOAN_COLUMNS.creditScore]);
    if (creditScore !== undefined && creditScore < LOW_CREDIT_SCORE) {
      notes.push(`Case ${retrieved.caseId}: credit score ${creditScore} is below ${LOW_CREDIT_SCORE}`);
    }
    if (toOptionalNumber(record[LOAN_COLUMNS.income]) === undefined) {
      notes.push(`Case ${retrieved.caseId}: applicant income is missing`);
    }
  }
  return notes;
}

/**
 * Turns retrieved evidence (and, for computational questions, a figure over the
 * full dataset) into the narrative part of a response.
 */
export class Explainer {
  private readonly completion: CompletionService;

  private readonly router: QueryRouter;

  constructor(options: ExplainerOptions) {
    this.completion = options.completion;
    this.router = options.router;
  }

  async explain(input: ExplainInput): Promise<Explanation> {
    const complianceDisclaimer = COMPLIANCE_DISCLAIMERS[input.intent.tone];
    const computed = await this.computeFigure(input.query);

    if (input.cases.length === 0) {
      return {
        summary: computed ?? NO_EVIDENCE_SUMMARY,
        evidencePoints: [],
        riskNotes: [],
        complianceDisclaimer
      };
    }

    const narrative = await this.narrate(input, computed);
    if (narrative) {
      return { ...narrative, complianceDisclaimer };
    }

    return {
      summary: joinSummary(computed, fallbackSummary(input.cases)),
      evidencePoints: fallbackEvidence(input.cases),
      riskNotes: riskNotes(input.cases),
      complianceDisclaimer
    };
  }

  private async computeFigure(query: string): Promise<string | null> {
    const category = await this.router.classify(query);
    if (category !== "MATHEMATICAL") {
      return null;
    }
    const execution = await this.router.synthesizeAndRun(query);
    if (!execution.success || !execution.formatted) {
      console.warn(`No computed figure for "${query}": ${execution.error ?? "unknown error"}`);
      return null;
    }
    return execution.formatted;
  }

  private async narrate(
    input: ExplainInput,
    computed: string | null
  ): Promise<Omit<Explanation, "complianceDisclaimer"> | null> {
    if (!this.completion.available) {
      return null;
    }

    try {
      const prompt = await buildExplanationPrompt({
        question: input.contextualQuery,
        intent: input.intent.intent,
        tone: input.intent.tone,
        computed,
        context: buildCaseContext(input.cases)
      });
      const content = await this.completion.complete({
        prompt,
        system: JSON_SYSTEM_PROMPT,
        temperature: 0.2,
        maxTokens: 900,
        json: true
      });
      if (content === null) {
        return null;
      }

      const parsed = NarrativeSchema.safeParse(extractJsonObject(content));
      if (!parsed.success) {
        console.warn("Narrative response failed validation", parsed.error.issues);
        return null;
      }
      return {
        summary: joinSummary(computed, parsed.data.summary),
        evidencePoints: parsed.data.evidence_points,
        riskNotes: parsed.data.risk_notes
      };
    } catch (error) {
      console.warn("Narrative generation failed", describeError(error));
      return null;
    }
  }
}
