import path from "node:path";
import { Explainer } from "./agent/explainer";
import { IntentClassifier } from "./agent/intentClassifier";
import { ResolutionOrchestrator } from "./agent/orchestrator";
import { createPool } from "./config/db";
import type { AppConfig } from "./config/env";
import { InMemoryHistoryStore, PgHistoryStore, type HistoryStore } from "./db";
import { GoldenKnowledgeBase } from "./knowledge/goldenKb";
import { OpenAICompletionService } from "./llm/client";
import { JsonDatasetProvider } from "./retrieval/dataset";
import { OpenAIEmbeddingService } from "./retrieval/embeddings";
import { CaseRetriever } from "./retrieval/retriever";
import { QueryRouter } from "./router/queryRouter";
import { SessionRegistry } from "./sessions";

export interface Services {
  retriever: CaseRetriever;
  router: QueryRouter;
  sessions: SessionRegistry;
  history: HistoryStore;
  knowledgeBase: GoldenKnowledgeBase;
}

/** Builds the process-wide services; only conversation memory is per session. */
export function createServices(config: AppConfig, rootDir: string): Services {
  const completion = new OpenAICompletionService({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    model: config.llm.completionModel,
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
    breakerThreshold: config.llm.breakerThreshold,
    breakerCooldownMs: config.llm.breakerCooldownMs
  });

  const embeddings = new OpenAIEmbeddingService({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    model: config.llm.embeddingModel,
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries
  });

  const retriever = new CaseRetriever({
    datasetProvider: new JsonDatasetProvider(path.resolve(rootDir, config.datasetPath)),
    embeddings
  });
  const knowledgeBase = GoldenKnowledgeBase.fromFile(path.resolve(rootDir, config.goldenKbPath));
  const router = new QueryRouter({ completion, retriever });
  const classifier = new IntentClassifier(completion);
  const explainer = new Explainer({ completion, router });

  const sessions = new SessionRegistry(
    () => new ResolutionOrchestrator({ knowledgeBase, classifier, retriever, explainer }),
    config.sessionLimit
  );

  const history: HistoryStore =
    config.persistence === "postgres" ? new PgHistoryStore(createPool()) : new InMemoryHistoryStore();

  return { retriever, router, sessions, history, knowledgeBase };
}
