import type { CompletionService } from "../llm/client";
import { buildCodePrompt, buildRoutingPrompt, buildSemanticPrompt } from "../llm/prompt";
import type { CaseRetriever } from "../retrieval/retriever";
import { runSandboxed } from "../sandbox/interpreter";
import type { QueryCategory, RoutingDecision } from "../types";
import { truncateText } from "../utils";
import { extractCode, INPUT_BINDING, OUTPUT_BINDING, validateCode } from "./codeSynthesis";
import { buildCaseContext, NO_RECORDS_MESSAGE } from "./context";
import { formatResult } from "./format";
import { formatDatasetDescription } from "./schema";

export const SEMANTIC_TOP_K = 10;

const MATHEMATICAL_KEYWORDS = [
  "average",
  "mean",
  "sum",
  "total",
  "count",
  "how many",
  "percentage",
  "percent",
  "%",
  "ratio",
  "calculate",
  "what is",
  "top",
  "highest",
  "lowest",
  "maximum",
  "minimum"
];

const SEMANTIC_KEYWORDS = [
  "why",
  "reason",
  "pattern",
  "compare",
  "analysis",
  "risk",
  "factor",
  "trend",
  "similar",
  "related",
  "context",
  "explain",
  "show",
  "find",
  "identify"
];

// Break a tie in favour of computation only when one of these is present.
const AGGREGATE_TIEBREAKERS = ["how many", "count", "average", "total"];

export interface ExecutionResult {
  success: boolean;
  validationPassed: boolean;
  code?: string;
  value?: unknown;
  formatted?: string;
  error?: string;
}

export type AnswerMethod = "code_execution" | "semantic_analysis";

export interface RouterAnswer {
  answer: string;
  method: AnswerMethod;
  decision: RoutingDecision;
}

export interface QueryRouterOptions {
  completion: CompletionService;
  retriever: CaseRetriever;
  stepBudget?: number;
}

export function keywordRoute(query: string): QueryCategory {
  const lower = query.toLowerCase();
  const mathScore = MATHEMATICAL_KEYWORDS.filter((keyword) => lower.includes(keyword)).length;
  const semanticScore = SEMANTIC_KEYWORDS.filter((keyword) => lower.includes(keyword)).length;

  if (mathScore > semanticScore) return "MATHEMATICAL";
  if (semanticScore > mathScore) return "SEMANTIC";
  return AGGREGATE_TIEBREAKERS.some((keyword) => lower.includes(keyword)) ? "MATHEMATICAL" : "SEMANTIC";
}

/** Reads a one-word label out of the model reply; null when it names neither or both. */
export function parseCategory(reply: string): QueryCategory | null {
  const upper = reply.toUpperCase();
  const mathematical = upper.includes("MATHEMATICAL");
  const semantic = upper.includes("SEMANTIC");
  if (mathematical === semantic) return null;
  return mathematical ? "MATHEMATICAL" : "SEMANTIC";
}

/**
 * Chooses between computing an answer over the full dataset and narrating an
 * answer from the nearest cases.
 */
export class QueryRouter {
  private readonly completion: CompletionService;

  private readonly retriever: CaseRetriever;

  private readonly stepBudget?: number;

  constructor(options: QueryRouterOptions) {
    this.completion = options.completion;
    this.retriever = options.retriever;
    this.stepBudget = options.stepBudget;
  }

  async classify(query: string): Promise<QueryCategory> {
    if (!this.completion.available) {
      return keywordRoute(query);
    }

    const reply = await this.completion.complete({
      prompt: await buildRoutingPrompt(query),
      temperature: 0,
      maxTokens: 10
    });
    const category = reply === null ? null : parseCategory(reply);
    if (category === null) {
      console.warn(`Routing reply unusable, using keyword routing for "${truncateText(query, 80)}"`);
      return keywordRoute(query);
    }
    return category;
  }

  /**
   * Generates a snippet over the dataset, validates it and runs it in the
   * sandbox. Failures come back as `success: false` with a reason.
   */
  async synthesizeAndRun(query: string, schemaDescription?: string): Promise<ExecutionResult> {
    if (!this.completion.available) {
      return {
        success: false,
        validationPassed: false,
        error: "Code generation is unavailable: no completion service is configured"
      };
    }

    const dataset = await this.retriever.getDataset();
    const schema = schemaDescription ?? formatDatasetDescription(dataset);
    const reply = await this.completion.complete({
      prompt: await buildCodePrompt(query, schema),
      temperature: 0,
      maxTokens: 500
    });
    if (reply === null) {
      return {
        success: false,
        validationPassed: false,
        error: "Code generation failed: the completion service did not answer"
      };
    }

    const code = extractCode(reply);
    const validation = validateCode(code);
    if (!validation.valid) {
      console.warn(`Rejected generated code: ${validation.reason}`);
      return { success: false, validationPassed: false, code, error: validation.reason };
    }

    const outcome = runSandboxed(code, {
      inputs: { [INPUT_BINDING]: Object.freeze([...dataset.records]) },
      output: OUTPUT_BINDING,
      stepBudget: this.stepBudget
    });
    if (!outcome.ok) {
      console.warn(`Generated code failed (${outcome.kind}): ${outcome.error}`);
      return { success: false, validationPassed: true, code, error: `Execution error: ${outcome.error}` };
    }
    if (!outcome.defined) {
      return { success: false, validationPassed: true, code, error: `Execution error: '${OUTPUT_BINDING}' was not set` };
    }

    return {
      success: true,
      validationPassed: true,
      code,
      value: outcome.value,
      formatted: formatResult(outcome.value, query)
    };
  }

  async analyzeSemantic(query: string, topK = SEMANTIC_TOP_K): Promise<string> {
    const cases = await this.retriever.retrieve(query, topK);
    if (cases.length === 0) {
      return NO_RECORDS_MESSAGE;
    }

    const context = buildCaseContext(cases);
    const unavailable = `Narrative analysis unavailable. Retrieved context:\n\n${context}`;
    if (!this.completion.available) {
      return unavailable;
    }

    const analysis = await this.completion.complete({
      prompt: await buildSemanticPrompt(query, context),
      temperature: 0.3,
      maxTokens: 1000
    });
    return analysis ?? unavailable;
  }

  async answer(query: string): Promise<RouterAnswer> {
    const category = await this.classify(query);

    if (category === "MATHEMATICAL") {
      const execution = await this.synthesizeAndRun(query);
      const decision: RoutingDecision = {
        category,
        synthesizedCode: execution.code,
        validationPassed: execution.validationPassed
      };
      console.log(this.explainDecision(query, decision));
      const answer = execution.formatted ?? `Could not compute an answer. ${execution.error ?? ""}`.trim();
      return { answer, method: "code_execution", decision };
    }

    const decision: RoutingDecision = { category, validationPassed: false };
    console.log(this.explainDecision(query, decision));
    return { answer: await this.analyzeSemantic(query), method: "semantic_analysis", decision };
  }

  explainDecision(query: string, decision: RoutingDecision): string {
    const lines = [`Query: ${truncateText(query, 120)}`, `Route: ${decision.category}`];
    if (decision.category === "MATHEMATICAL") {
      lines.push("Strategy: generate code and run it over the full dataset");
      if (decision.synthesizedCode) {
        lines.push(`Validation: ${decision.validationPassed ? "passed" : "failed"}`);
        lines.push(`Code:\n${decision.synthesizedCode}`);
      }
    } else {
      lines.push(`Strategy: retrieve the ${SEMANTIC_TOP_K} most similar records and analyse them`);
    }
    return lines.join("\n");
  }
}
