import { checkSyntax } from "../sandbox/interpreter";

export const INPUT_BINDING = "df";
export const OUTPUT_BINDING = "result";
export const MAX_SNIPPET_LENGTH = 4_000;

export type CodeValidation = { valid: true } | { valid: false; reason: string };

// Checked before anything is parsed. The interpreter rejects these constructs as
// well; the list catches them early with a readable reason. String patterns match
// anywhere in the snippet, including inside identifiers and string literals.
const FORBIDDEN_CONSTRUCTS: Array<{ label: string; pattern: RegExp | string }> = [
  { label: "import os", pattern: "import os" },
  { label: "import sys", pattern: "import sys" },
  { label: "import subprocess", pattern: "import subprocess" },
  { label: "__import__", pattern: "__import__" },
  { label: "import", pattern: /\bimport\b/ },
  { label: "require(", pattern: /\brequire\s*\(/ },
  { label: "process", pattern: /\bprocess\b/ },
  { label: "child_process", pattern: /child_process/ },
  { label: "eval(", pattern: /\beval\s*\(/ },
  { label: "exec(", pattern: /\bexec\s*\(/ },
  { label: "Function(", pattern: /\bFunction\s*\(/ },
  { label: "compile(", pattern: /\bcompile\s*\(/ },
  { label: "open(", pattern: /\bopen\s*\(/ },
  { label: "globalThis", pattern: /\bglobal(?:This)?\b/ },
  { label: "window", pattern: /\b(?:window|document)\b/ },
  { label: "constructor", pattern: /\bconstructor\b/ },
  { label: "__proto__", pattern: /__proto__/ },
  { label: "prototype", pattern: /\bprototype\b/ },
  { label: "fetch(", pattern: /\bfetch\s*\(/ },
  { label: "new", pattern: /\bnew\s+[A-Za-z_$]/ },
  { label: "class", pattern: /\bclass\s+[A-Za-z_$]/ },
  { label: "while", pattern: /\bwhile\s*\(/ },
  { label: "async/await", pattern: /\b(?:async|await)\b/ },
  { label: "timers", pattern: /\bset(?:Timeout|Interval|Immediate)\b/ },
  { label: "Reflect/Proxy", pattern: /\b(?:Reflect|Proxy)\b/ },
  { label: "this", pattern: /\bthis\b/ }
];

const OUTPUT_ASSIGNMENT = new RegExp(`(?<![\\w$.])${OUTPUT_BINDING}\\s*[-+*/]?=(?!=)`);

const CODE_LINE_MARKERS = [`${INPUT_BINDING}.`, `${INPUT_BINDING}[`, "=", OUTPUT_BINDING, "Math."];

/**
 * Pulls the snippet out of a completion: a js/ts fenced block first, then any
 * fenced block, then the whole reply when it parses, and finally the lines that
 * look like code.
 */
export function extractCode(response: string): string {
  const tagged = /```(?:javascript|js|typescript|ts)[^\S\n]*\n([\s\S]*?)```/i.exec(response);
  if (tagged) {
    return tagged[1].trim();
  }

  const generic = /```[^\n]*\n([\s\S]*?)```/.exec(response);
  if (generic) {
    return generic[1].trim();
  }

  const trimmed = response.trim();
  if (trimmed.length > 0 && checkSyntax(trimmed) === null) {
    return trimmed;
  }

  return trimmed
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => {
      const content = line.trim();
      return content.startsWith("//") || CODE_LINE_MARKERS.some((marker) => content.includes(marker));
    })
    .join("\n")
    .trim();
}

export function validateCode(code: string): CodeValidation {
  if (code.trim().length === 0) {
    return { valid: false, reason: "No code was generated" };
  }
  if (code.length > MAX_SNIPPET_LENGTH) {
    return { valid: false, reason: `Generated code exceeds ${MAX_SNIPPET_LENGTH} characters` };
  }

  const forbidden = FORBIDDEN_CONSTRUCTS.find(({ pattern }) =>
    typeof pattern === "string" ? code.includes(pattern) : pattern.test(code)
  );
  if (forbidden) {
    return { valid: false, reason: `Unsafe code detected: ${forbidden.label}` };
  }

  if (!OUTPUT_ASSIGNMENT.test(code)) {
    return { valid: false, reason: `Code must assign its answer to '${OUTPUT_BINDING}'` };
  }

  const syntaxError = checkSyntax(code);
  if (syntaxError) {
    return { valid: false, reason: `Syntax error at ${syntaxError}` };
  }

  return { valid: true };
}
