import "dotenv/config";
import { loadConfig } from "../config/env";
import { createServices } from "../container";
import type { FinalResponse } from "../types";

const QUERIES: string[] = [
  "What is a CIBIL score?",
  "What is the average loan amount?",
  "Why are business loans often rejected?",
  "Show similar rejected cases with a high debt-to-income ratio",
  "How does that compare with approved home loans?"
];

const ROUTER_QUERIES: string[] = ["How many loans were rejected?", "What patterns explain rejections for self-employed applicants?"];

function preview(value: string, max = 400): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}

function logResponse(response: FinalResponse, startedAt: number): void {
  const elapsed = ((Date.now() - startedAt) * 0.001).toFixed(1);
  console.log("  Source:", response.source);
  console.log("  Intent:", response.intent);
  console.log("  Cases:", response.retrievedCaseCount);
  console.log("  Summary:", preview(response.summary));
  for (const point of response.evidencePoints.slice(0, 3)) {
    console.log("    -", preview(point, 160));
  }
  if (response.riskNotes.length > 0) {
    console.log("  Risk notes:", response.riskNotes.slice(0, 3).join(" | "));
  }
  console.log("  Responded in", elapsed, "seconds\n");
}

function logFailure(error: unknown, startedAt: number): void {
  const elapsed = ((Date.now() - startedAt) * 0.001).toFixed(1);
  console.error("  Failed after", elapsed, "seconds:");
  console.error("  ", error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG === "true" && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  console.log();
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.llm.apiKey) {
    console.warn("OPENAI_API_KEY is not set; answers will come from the keyword and template fallbacks.\n");
  }

  const services = createServices(config, process.cwd());
  const orchestrator = services.sessions.get("smoke-test");

  console.log("Running loan insight smoke test with", QUERIES.length, "conversational queries...\n");
  for (const query of QUERIES) {
    console.log("Query:", query);
    const startedAt = Date.now();
    try {
      logResponse(await orchestrator.resolve(query), startedAt);
    } catch (error) {
      logFailure(error, startedAt);
    }
  }

  for (const query of ROUTER_QUERIES) {
    console.log("Ask:", query);
    const startedAt = Date.now();
    try {
      const result = await services.router.answer(query);
      console.log(`  [${result.method}]`, preview(result.answer), "\n");
    } catch (error) {
      logFailure(error, startedAt);
    }
  }

  console.log("Conversation turns kept:", orchestrator.history.length);
  console.log("Smoke test complete.");
}

main().catch((error) => {
  console.error("Smoke test crashed:", error instanceof Error ? error.stack ?? error.message : error);
  process.exitCode = 1;
});
