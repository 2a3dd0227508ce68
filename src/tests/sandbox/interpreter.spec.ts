import { describe, expect, it } from "vitest";
import { checkSyntax, runSandboxed, type SandboxOutcome } from "../../sandbox/interpreter";
import { sampleDataset } from "../helpers/fakes";

const df = Object.freeze([...sampleDataset().records]);

function run(code: string, stepBudget?: number): SandboxOutcome {
  return runSandboxed(code, { inputs: { df }, output: "result", stepBudget });
}

function valueOf(code: string): unknown {
  const outcome = run(code);
  if (!outcome.ok) {
    throw new Error(`snippet failed (${outcome.kind}): ${outcome.error}`);
  }
  return outcome.value;
}

describe("runSandboxed aggregations", () => {
  it("counts filtered rows", () => {
    expect(valueOf('result = df.filter((row) => row.Loan_Status === "Approved").length;')).toBe(3);
  });

  it("computes a percentage", () => {
    expect(valueOf('result = (df.filter((r) => r.Loan_Status === "Rejected").length / df.length) * 100;')).toBe(50);
  });

  it("averages a column and skips missing values in the median", () => {
    expect(valueOf('result = mean(column(df, "Loan_Amount"));')).toBe(300000);
    expect(valueOf('result = median(column(df, "Applicant_Income"));')).toBe(45000);
  });

  it("runs loops with continue", () => {
    const code = [
      "let total = 0;",
      "for (const row of df) {",
      "  if (row.Applicant_Income === null) continue;",
      "  total += row.Applicant_Income;",
      "}",
      "result = total;"
    ].join("\n");
    expect(valueOf(code)).toBe(240000);
  });

  it("groups with countBy", () => {
    expect(valueOf('result = countBy(df, "Loan_Status");')).toEqual({ Approved: 3, Rejected: 3 });
  });

  it("sorts a copy and maps fields", () => {
    const code = "result = [...df].sort((a, b) => b.Loan_Amount - a.Loan_Amount).slice(0, 2).map((row) => row.Loan_ID);";
    expect(valueOf(code)).toEqual(["L002", "L004"]);
  });

  it("finds the most common value through Object.entries", () => {
    const code = [
      'const counts = countBy(df, "Employment_Type");',
      "result = Object.entries(counts).sort((a, b) => b[1] - a[1])[0][0];"
    ].join("\n");
    expect(valueOf(code)).toBe("Salaried");
  });

  it("spreads arguments into Math functions", () => {
    expect(valueOf('result = Math.max(...column(df, "CIBIL_Score"));')).toBe(800);
  });

  it("supports template literals and destructuring", () => {
    expect(valueOf("result = `${df.length} loans`;")).toBe("6 loans");
    expect(valueOf("const { Customer_Name } = df[0];\nresult = Customer_Name;")).toBe("Asha Rao");
  });

  it("sorts with string order when no comparator is given", () => {
    expect(valueOf("result = [10, 9, 1].sort();")).toEqual([1, 10, 9]);
  });

  it("coerces loose equality and treats missing operands as unordered", () => {
    expect(valueOf('result = "5" == 5;')).toBe(true);
    expect(valueOf("result = null < 5;")).toBe(false);
  });
});

describe("runSandboxed output binding", () => {
  it("reports an unset output", () => {
    expect(run("const x = 1;")).toEqual({ ok: true, value: undefined, defined: false });
  });

  it("reports syntax errors with a position", () => {
    const outcome = run("result = (");
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.kind).toBe("syntax");
      expect(outcome.error).toMatch(/^Syntax error at line 1, column \d+: /);
    }
  });

  it("reports undefined names", () => {
    expect(run("result = foo;")).toEqual({ ok: false, kind: "runtime", error: "foo is not defined" });
  });
});

describe("runSandboxed isolation", () => {
  it("keeps input rows read-only", () => {
    expect(run('df[0].Loan_Status = "x";\nresult = 1;')).toEqual({
      ok: false,
      kind: "runtime",
      error: "Input data is read-only; copy it before modifying"
    });
    expect(run("df.push(1);\nresult = 1;")).toMatchObject({ ok: false, kind: "runtime" });
  });

  it("refuses to rebind inputs", () => {
    expect(run("df = [];")).toEqual({
      ok: false,
      kind: "runtime",
      error: "Assignment to constant variable 'df'"
    });
  });

  it("blocks prototype access", () => {
    expect(run("result = df.constructor;")).toEqual({
      ok: false,
      kind: "forbidden",
      error: "Access to 'constructor' is not allowed"
    });
    expect(run("result = { __proto__: 1 };")).toMatchObject({ ok: false, kind: "forbidden" });
  });

  it("rejects constructs outside the allowed subset", () => {
    expect(run("result = new Date();")).toEqual({
      ok: false,
      kind: "forbidden",
      error: "Unsupported expression: NewExpression"
    });
    expect(run("let i = 0;\nwhile (i < 3) { i++; }\nresult = i;")).toEqual({
      ok: false,
      kind: "forbidden",
      error: "Unsupported statement: WhileStatement"
    });
    expect(run("result = this;")).toMatchObject({ ok: false, kind: "forbidden" });
    expect(run("const f = async () => 1;\nresult = 1;")).toEqual({
      ok: false,
      kind: "forbidden",
      error: "Async and generator functions are not supported"
    });
  });

  it("rejects methods that are not allow-listed", () => {
    expect(run('result = "abc".at(0);')).toEqual({
      ok: false,
      kind: "forbidden",
      error: "Method 'at' is not available on string"
    });
  });

  it("stops runaway loops at the step budget", () => {
    const outcome = run("let total = 0;\nfor (const i of range(100000)) { total += i; }\nresult = total;", 1000);
    expect(outcome).toEqual({
      ok: false,
      kind: "budget",
      error: "Execution exceeded the step budget of 1000"
    });
  });

  it("stops arrays that grow past the size limit", () => {
    const tooLong = { ok: false, kind: "budget", error: "Array length exceeds the limit of 1000000 elements" };
    const doubling = (step: string) =>
      `let x = [1, 2, 3, 4, 5, 6, 7, 8];\nfor (const i of range(40)) { ${step} }\nresult = len(x);`;

    expect(run(doubling("x = x.concat(x);"))).toEqual(tooLong);
    expect(run(doubling("x = [...x, ...x];"))).toEqual(tooLong);
    expect(run(doubling("x.push(...x);"))).toEqual(tooLong);
    expect(run("result = range(100000).flatMap((v) => [v, v, v, v, v, v, v, v, v, v, v]);")).toEqual(tooLong);
  });

  it("stops strings that grow past the size limit", () => {
    const tooLong = { ok: false, kind: "budget", error: "String length exceeds the limit of 1000000 characters" };

    expect(run('let s = "ab";\nfor (const i of range(30)) { s = s + s; }\nresult = s;')).toEqual(tooLong);
    expect(run('let s = "ab";\nfor (const i of range(30)) { s = `${s}${s}`; }\nresult = s;')).toEqual(tooLong);
    expect(run('result = range(100000).map(() => "abcdefghij").join("-");')).toEqual(tooLong);
  });

  it("stops unbounded recursion", () => {
    expect(run("const f = (n) => f(n + 1);\nresult = f(0);")).toEqual({
      ok: false,
      kind: "budget",
      error: "Maximum call depth of 200 exceeded"
    });
  });
});

describe("checkSyntax", () => {
  it("returns null for valid code", () => {
    expect(checkSyntax("const a = [1, 2];\nresult = a.length;")).toBeNull();
  });

  it("names the line of the first error", () => {
    expect(checkSyntax("const a = 1;\nresult = ;")).toMatch(/^line 2, column \d+: Expression expected\.$/);
  });
});
