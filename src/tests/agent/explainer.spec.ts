import { describe, expect, it } from "vitest";
import {
  COMPLIANCE_DISCLAIMERS,
  Explainer,
  fallbackEvidence,
  fallbackSummary,
  NO_EVIDENCE_SUMMARY,
  riskNotes
} from "../../agent/explainer";
import { QueryRouter } from "../../router/queryRouter";
import type { IntentResult, RetrievedCase } from "../../types";
import { createRetriever, FakeCompletionService, replyByKind } from "../helpers/fakes";

const AUDIT_INTENT: IntentResult = {
  intent: "why_rejected",
  loanId: null,
  filters: {},
  resultCountHint: 5,
  tone: "audit",
  confidence: 0.5
};

const FALLBACK_SUMMARY = "Reviewed 2 similar loan cases: 2 Rejected. Average loan amount INR 450,000.00.";

async function rejectedBusinessCases(): Promise<RetrievedCase[]> {
  return createRetriever().retrieve("business loans", 2, { status: "rejected" });
}

function explainerWith(completion: FakeCompletionService): Explainer {
  return new Explainer({ completion, router: new QueryRouter({ completion, retriever: createRetriever() }) });
}

describe("deterministic explanations", () => {
  it("summarizes statuses and the average amount", async () => {
    expect(fallbackSummary(await rejectedBusinessCases())).toBe(FALLBACK_SUMMARY);
  });

  it("uses the singular for one case", async () => {
    const [first] = await rejectedBusinessCases();
    expect(fallbackSummary([first])).toBe("Reviewed 1 similar loan case: 1 Rejected. Average loan amount INR 500,000.00.");
  });

  it("cites each case with its key figures", async () => {
    expect(fallbackEvidence(await rejectedBusinessCases())).toEqual([
      "Case L002 (similarity 1.000): Rejected, amount INR 500,000.00, credit score 610, DTI 0.55",
      "Case L004 (similarity 0.800): Rejected, amount INR 400,000.00, credit score 640, DTI 0.48"
    ]);
  });

  it("flags high debt ratios, low credit scores and missing income", async () => {
    expect(riskNotes(await rejectedBusinessCases())).toEqual([
      "Case L002: debt-to-income ratio 0.55 is above 0.40",
      "Case L002: credit score 610 is below 650",
      "Case L004: debt-to-income ratio 0.48 is above 0.40",
      "Case L004: credit score 640 is below 650",
      "Case L004: applicant income is missing"
    ]);
  });

  it("reads ratios stored as percentages", () => {
    const stored: RetrievedCase = {
      caseId: "X1",
      similarityScore: 0.5,
      rawRecord: { Debt_to_Income_Ratio: 45, CIBIL_Score: 700, Applicant_Income: 50000 }
    };
    expect(riskNotes([stored])).toEqual(["Case X1: debt-to-income ratio 45 is above 0.40"]);
  });
});

describe("Explainer.explain", () => {
  it("falls back to the deterministic narrative without a model", async () => {
    const cases = await rejectedBusinessCases();
    const explanation = await explainerWith(FakeCompletionService.unavailable()).explain({
      query: "why was this rejected",
      contextualQuery: "why was this rejected",
      intent: AUDIT_INTENT,
      cases
    });

    expect(explanation.summary).toBe(FALLBACK_SUMMARY);
    expect(explanation.evidencePoints).toHaveLength(2);
    expect(explanation.riskNotes).toHaveLength(5);
    expect(explanation.complianceDisclaimer).toBe(COMPLIANCE_DISCLAIMERS.audit);
  });

  it("reports missing evidence", async () => {
    const explanation = await explainerWith(FakeCompletionService.unavailable()).explain({
      query: "why was this rejected",
      contextualQuery: "why was this rejected",
      intent: { ...AUDIT_INTENT, tone: "business" },
      cases: []
    });

    expect(explanation).toEqual({
      summary: NO_EVIDENCE_SUMMARY,
      evidencePoints: [],
      riskNotes: [],
      complianceDisclaimer: COMPLIANCE_DISCLAIMERS.business
    });
  });

  it("uses a validated model narrative", async () => {
    const completion = new FakeCompletionService(
      replyByKind({
        routing: "SEMANTIC",
        explanation: JSON.stringify({
          summary: "Both cases were declined for leverage.",
          evidence_points: ["L002 DTI 0.55"],
          risk_notes: ["High DTI"]
        })
      })
    );
    const explanation = await explainerWith(completion).explain({
      query: "why was this rejected",
      contextualQuery: "Previous conversation:\nUser: hi\n\nCurrent question: why was this rejected",
      intent: AUDIT_INTENT,
      cases: await rejectedBusinessCases()
    });

    expect(explanation).toEqual({
      summary: "Both cases were declined for leverage.",
      evidencePoints: ["L002 DTI 0.55"],
      riskNotes: ["High DTI"],
      complianceDisclaimer: COMPLIANCE_DISCLAIMERS.audit
    });
    const request = completion.requests.find((entry) => entry.json === true);
    expect(request?.prompt).toContain("Current question: why was this rejected");
    expect(request?.temperature).toBe(0.2);
  });

  it("ignores a narrative that fails validation", async () => {
    const completion = new FakeCompletionService(replyByKind({ routing: "SEMANTIC", explanation: '{"summary": ""}' }));
    const explanation = await explainerWith(completion).explain({
      query: "why was this rejected",
      contextualQuery: "why was this rejected",
      intent: AUDIT_INTENT,
      cases: await rejectedBusinessCases()
    });
    expect(explanation.summary).toBe(FALLBACK_SUMMARY);
  });

  it("leads with a figure computed over the full dataset", async () => {
    const completion = new FakeCompletionService(
      replyByKind({
        routing: "MATHEMATICAL",
        code: '```js\nresult = mean(column(df, "Loan_Amount"));\n```',
        explanation: null
      })
    );
    const explanation = await explainerWith(completion).explain({
      query: "average loan amount",
      contextualQuery: "average loan amount",
      intent: AUDIT_INTENT,
      cases: await rejectedBusinessCases()
    });
    expect(explanation.summary).toBe(`Result: INR 300,000.00\n\n${FALLBACK_SUMMARY}`);
  });
});
