import { describe, expect, it } from "vitest";
import { extractCode, MAX_SNIPPET_LENGTH, validateCode } from "../../router/codeSynthesis";

describe("extractCode", () => {
  it("prefers a tagged fenced block", () => {
    const reply = "Here you go:\n```\nignored\n```\n```javascript\nresult = df.length;\n```";
    expect(extractCode(reply)).toBe("result = df.length;");
  });

  it("falls back to an untagged fence", () => {
    expect(extractCode("```\nresult = 1;\n```")).toBe("result = 1;");
  });

  it("keeps a bare reply that parses", () => {
    expect(extractCode("  result = sum(column(df, 'Loan_Amount'));  ")).toBe("result = sum(column(df, 'Loan_Amount'));");
  });

  it("keeps only code-looking lines from prose", () => {
    const reply = "The answer needs a filter.\nconst rejected = df.filter((r) => r.Loan_Status === 'Rejected');\nresult = rejected.length;\nHope this helps!";
    expect(extractCode(reply)).toBe(
      "const rejected = df.filter((r) => r.Loan_Status === 'Rejected');\nresult = rejected.length;"
    );
  });
});

describe("validateCode", () => {
  it("accepts a simple aggregation", () => {
    expect(validateCode("result = mean(column(df, 'Loan_Amount'));")).toEqual({ valid: true });
  });

  it("rejects empty output", () => {
    expect(validateCode("  \n")).toEqual({ valid: false, reason: "No code was generated" });
  });

  it("rejects oversized snippets", () => {
    expect(validateCode(`result = 1;\n${"// x\n".repeat(MAX_SNIPPET_LENGTH)}`)).toEqual({
      valid: false,
      reason: `Generated code exceeds ${MAX_SNIPPET_LENGTH} characters`
    });
  });

  it("names the first unsafe construct", () => {
    expect(validateCode("import os\nresult = 1")).toEqual({ valid: false, reason: "Unsafe code detected: import os" });
    expect(validateCode("result = process.env;")).toEqual({ valid: false, reason: "Unsafe code detected: process" });
    expect(validateCode("result = new Date();")).toEqual({ valid: false, reason: "Unsafe code detected: new" });
    expect(validateCode("while (true) {}\nresult = 1;")).toEqual({ valid: false, reason: "Unsafe code detected: while" });
  });

  it("rejects module names anywhere in the text, even inside words and strings", () => {
    expect(validateCode('const tag = "x_import os";\nresult = 1;')).toEqual({
      valid: false,
      reason: "Unsafe code detected: import os"
    });
    expect(validateCode("// reimport sys later\nresult = 1;")).toEqual({
      valid: false,
      reason: "Unsafe code detected: import sys"
    });
    expect(validateCode('result = "my__import__";')).toEqual({ valid: false, reason: "Unsafe code detected: __import__" });
  });

  it("requires an assignment to result", () => {
    expect(validateCode("const total = 1;")).toEqual({ valid: false, reason: "Code must assign its answer to 'result'" });
    expect(validateCode("if (result === 1) {}")).toEqual({
      valid: false,
      reason: "Code must assign its answer to 'result'"
    });
    expect(validateCode("let result = 0;\nresult += 2;")).toEqual({ valid: true });
  });

  it("reports syntax errors last", () => {
    const validation = validateCode("result = (");
    expect(validation.valid).toBe(false);
    if (!validation.valid) {
      expect(validation.reason).toMatch(/^Syntax error at line 1, column \d+: /);
    }
  });
});
