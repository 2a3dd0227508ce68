import { describe, expect, it, vi } from "vitest";
import { COMPLIANCE_DISCLAIMERS } from "../../agent/explainer";
import { createPipeline, TEST_KB_ENTRIES } from "../helpers/fakes";

describe("ResolutionOrchestrator.resolve", () => {
  it("answers curated questions without running the pipeline", async () => {
    const pipeline = createPipeline();
    const analyze = vi.spyOn(pipeline.classifier, "analyze");
    const retrieve = vi.spyOn(pipeline.retriever, "retrieve");

    const response = await pipeline.orchestrator.resolve("What is a CIBIL score?");

    expect(response).toEqual({
      query: "What is a CIBIL score?",
      intent: "general_inquiry",
      retrievedCaseCount: 0,
      summary: TEST_KB_ENTRIES[0].answer,
      evidencePoints: [],
      riskNotes: [],
      complianceDisclaimer: COMPLIANCE_DISCLAIMERS.neutral,
      structuredData: [],
      source: "golden_kb"
    });
    expect(analyze).not.toHaveBeenCalled();
    expect(retrieve).not.toHaveBeenCalled();
    expect(pipeline.orchestrator.history).toEqual([
      { role: "user", content: "What is a CIBIL score?" },
      { role: "assistant", content: TEST_KB_ENTRIES[0].answer }
    ]);
  });

  it("runs intent, retrieval and explanation for other questions", async () => {
    const { orchestrator } = createPipeline();

    const response = await orchestrator.resolve("audit reasons");

    expect(response.source).toBe("pipeline");
    expect(response.intent).toBe("general_inquiry");
    expect(response.complianceDisclaimer).toBe(COMPLIANCE_DISCLAIMERS.audit);
    expect(response.retrievedCaseCount).toBe(5);
    expect(response.structuredData.map((entry) => entry.caseId)).toEqual(["L001", "L005", "L003", "L002", "L004"]);
    expect(response.summary).toBe(
      "Reviewed 5 similar loan cases: 3 Approved, 2 Rejected. Average loan amount INR 320,000.00."
    );
    expect(Object.isFrozen(response)).toBe(true);
  });

  it("passes filters from the intent to retrieval", async () => {
    const { orchestrator } = createPipeline();

    const response = await orchestrator.resolve("why was this business loan rejected");

    expect(response.intent).toBe("why_rejected");
    expect(response.structuredData[0]?.caseId).toBe("L002");
  });

  it("hands the explainer the last three turns only", async () => {
    const pipeline = createPipeline();
    const explain = vi.spyOn(pipeline.explainer, "explain");

    await pipeline.orchestrator.resolve("loan one");
    await pipeline.orchestrator.resolve("loan two");
    await pipeline.orchestrator.resolve("loan three");

    expect(explain.mock.calls[0]?.[0].contextualQuery).toBe("loan one");
    const third = explain.mock.calls[2]?.[0].contextualQuery ?? "";
    expect(third).toContain("User: loan two");
    expect(third).not.toContain("User: loan one");
    expect(third.endsWith("Current question: loan three")).toBe(true);
  });

  it("starts fresh after the history is cleared", async () => {
    const { orchestrator } = createPipeline();
    await orchestrator.resolve("loan one");
    await orchestrator.resolve("loan two");

    orchestrator.clearHistory();
    const response = await orchestrator.resolve("audit reasons");

    expect(orchestrator.history).toEqual([
      { role: "user", content: "audit reasons" },
      { role: "assistant", content: response.summary }
    ]);
  });
});
