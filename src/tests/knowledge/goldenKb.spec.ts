import path from "node:path";
import { describe, expect, it } from "vitest";
import { GoldenKnowledgeBase, similarityRatio } from "../../knowledge/goldenKb";

describe("similarityRatio", () => {
  it("counts matching blocks over the combined length", () => {
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
  });

  it("treats two empty strings as identical", () => {
    expect(similarityRatio("", "")).toBe(1);
  });

  it("returns zero when nothing matches", () => {
    expect(similarityRatio("abc", "xyz")).toBe(0);
  });
});

describe("GoldenKnowledgeBase.findBestMatch", () => {
  const base = new GoldenKnowledgeBase([
    { id: "rate", questions: ["what is the approval rate"], answer: "About half of applications are approved." },
    { id: "dti", questions: ["what is dti", "explain dti"], answer: "Debt-to-income ratio." }
  ]);

  it("matches case-insensitively", () => {
    const match = base.findBestMatch("WHAT IS DTI");
    expect(match?.entry.id).toBe("dti");
    expect(match?.confidence).toBe(1);
  });

  it("boosts a contained question to 0.8", () => {
    const match = base.findBestMatch("tell me what is the approval rate please");
    expect(match?.entry.id).toBe("rate");
    expect(match?.confidence).toBe(0.8);
  });

  it("discards matches below the threshold", () => {
    expect(base.findBestMatch("average loan amount for salaried applicants")).toBeNull();
  });

  it("honours a custom threshold", () => {
    expect(base.findBestMatch("tell me what is the approval rate please", 0.85)).toBeNull();
  });

  it("keeps the first entry when scores tie", () => {
    const tied = new GoldenKnowledgeBase([
      { id: "first", questions: ["how many loans"], answer: "first" },
      { id: "second", questions: ["how many loans"], answer: "second" }
    ]);
    expect(tied.findBestMatch("how many loans")?.entry.id).toBe("first");
  });

  it("returns the same result for repeated calls", () => {
    const first = base.findBestMatch("what is dti?");
    const second = base.findBestMatch("what is dti?");
    expect(second).toEqual(first);
  });

  it("ignores blank queries", () => {
    expect(base.findBestMatch("   ")).toBeNull();
  });
});

describe("GoldenKnowledgeBase.fromFile", () => {
  it("loads the curated answers shipped with the service", () => {
    const base = GoldenKnowledgeBase.fromFile(path.resolve(__dirname, "../../../data/golden_kb.json"));
    expect(base.size).toBe(8);
    expect(base.findBestMatch("What is a CIBIL score?")?.entry.id).toBe("kb-what-is-cibil");
  });

  it("falls back to an empty base when the file is missing", () => {
    const base = GoldenKnowledgeBase.fromFile(path.resolve(__dirname, "missing.json"));
    expect(base.size).toBe(0);
    expect(base.findBestMatch("what is a cibil score")).toBeNull();
  });
});
