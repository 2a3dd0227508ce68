import { describe, expect, it, vi } from "vitest";
import { fallbackIntent, IntentClassifier } from "../../agent/intentClassifier";
import { FakeCompletionService } from "../helpers/fakes";

describe("fallbackIntent", () => {
  it("prefers rejection when both reject and approve appear", () => {
    expect(fallbackIntent("Was it rejected or approved?").intent).toBe("why_rejected");
  });

  it("marks audit questions with the audit tone", () => {
    const result = fallbackIntent("audit reasons");
    expect(result.intent).toBe("general_inquiry");
    expect(result.tone).toBe("audit");
    expect(result.confidence).toBe(0.5);
    expect(result.resultCountHint).toBe(5);
    expect(result.filters).toEqual({});
  });

  it("detects similar and risk keywords in priority order", () => {
    expect(fallbackIntent("find similar cases with high risk").intent).toBe("similar_cases");
    expect(fallbackIntent("Risk profile of L002").intent).toBe("risk_analysis");
  });
});

describe("IntentClassifier.analyze", () => {
  it("uses the heuristic without calling an unavailable service", async () => {
    const completion = FakeCompletionService.unavailable();
    const result = await new IntentClassifier(completion).analyze("why was this loan rejected");
    expect(result.intent).toBe("why_rejected");
    expect(completion.requests).toHaveLength(0);
  });

  it("maps a valid model payload", async () => {
    const completion = new FakeCompletionService(() =>
      JSON.stringify({
        intent: "risk_analysis",
        loan_id: "L002",
        filters: { status: "Rejected", amount: { min: 100000 }, purpose: null },
        top_k_hint: 8,
        compliance_tone: "business",
        confidence_score: 0.9
      })
    );
    const result = await new IntentClassifier(completion).analyze("risk of large rejected loans");

    expect(result).toEqual({
      intent: "risk_analysis",
      loanId: "L002",
      filters: { status: "Rejected", amount: { min: 100000 } },
      resultCountHint: 8,
      tone: "business",
      confidence: 0.9
    });
    expect(completion.requests[0]?.json).toBe(true);
  });

  it("drops filter values it cannot apply and keeps the rest of the payload", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const completion = new FakeCompletionService(() =>
      JSON.stringify({
        intent: "why_approved",
        filters: { status: ["Approved", "Rejected"], Loan_Amount: { gt: 100000 }, purpose: "Home" },
        compliance_tone: "business",
        confidence_score: 0.9
      })
    );
    const result = await new IntentClassifier(completion).analyze("approved home loans");

    expect(result).toEqual({
      intent: "why_approved",
      loanId: null,
      filters: { purpose: "Home" },
      resultCountHint: 5,
      tone: "business",
      confidence: 0.9
    });
  });

  it("reads payloads wrapped in a fenced block", async () => {
    const completion = new FakeCompletionService(
      () => 'Here it is:\n```json\n{"intent": "similar_cases", "confidence_score": 0.7}\n```'
    );
    const result = await new IntentClassifier(completion).analyze("show cases like L001");
    expect(result.intent).toBe("similar_cases");
    expect(result.tone).toBe("neutral");
    expect(result.resultCountHint).toBe(5);
  });

  it("caps the result count hint", async () => {
    const completion = new FakeCompletionService(() => '{"intent": "general_inquiry", "top_k_hint": 500}');
    const result = await new IntentClassifier(completion).analyze("everything");
    expect(result.resultCountHint).toBe(50);
  });

  it("falls back when the payload fails validation", async () => {
    const completion = new FakeCompletionService(() => '{"intent": "approve_everything"}');
    const result = await new IntentClassifier(completion).analyze("audit the approved loans");
    expect(result.intent).toBe("why_approved");
    expect(result.tone).toBe("audit");
    expect(result.confidence).toBe(0.5);
  });

  it("falls back when the service returns nothing", async () => {
    const completion = new FakeCompletionService(() => null);
    const result = await new IntentClassifier(completion).analyze("similar loans");
    expect(result.intent).toBe("similar_cases");
    expect(result.confidence).toBe(0.5);
  });
});
