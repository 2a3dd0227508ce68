import type { GoldenKnowledgeBase } from "../knowledge/goldenKb";
import { DEFAULT_MATCH_THRESHOLD } from "../knowledge/goldenKb";
import type { CaseRetriever } from "../retrieval/retriever";
import type { ConversationTurn, FinalResponse, MatchResult } from "../types";
import { COMPLIANCE_DISCLAIMERS, type Explainer } from "./explainer";
import type { IntentClassifier } from "./intentClassifier";
import { ConversationMemory } from "./memory";

export interface OrchestratorOptions {
  knowledgeBase: GoldenKnowledgeBase;
  classifier: IntentClassifier;
  retriever: CaseRetriever;
  explainer: Explainer;
  memory?: ConversationMemory;
  matchThreshold?: number;
}

/**
 * Resolves one conversation's queries: curated answers first, then intent,
 * retrieval and explanation. Holds that conversation's memory.
 */
export class ResolutionOrchestrator {
  private readonly knowledgeBase: GoldenKnowledgeBase;

  private readonly classifier: IntentClassifier;

  private readonly retriever: CaseRetriever;

  private readonly explainer: Explainer;

  private readonly memory: ConversationMemory;

  private readonly matchThreshold: number;

  constructor(options: OrchestratorOptions) {
    this.knowledgeBase = options.knowledgeBase;
    this.classifier = options.classifier;
    this.retriever = options.retriever;
    this.explainer = options.explainer;
    this.memory = options.memory ?? new ConversationMemory();
    this.matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
  }

  get history(): readonly ConversationTurn[] {
    return this.memory.all();
  }

  async resolve(query: string): Promise<FinalResponse> {
    const match = this.knowledgeBase.findBestMatch(query, this.matchThreshold);
    if (match) {
      return this.finish(query, curatedResponse(query, match));
    }

    const intent = await this.classifier.analyze(query);
    const cases = await this.retriever.retrieve(query, intent.resultCountHint, intent.filters);
    const explanation = await this.explainer.explain({
      query,
      contextualQuery: this.memory.contextualize(query),
      intent,
      cases
    });

    return this.finish(query, {
      query,
      intent: intent.intent,
      retrievedCaseCount: cases.length,
      summary: explanation.summary,
      evidencePoints: explanation.evidencePoints,
      riskNotes: explanation.riskNotes,
      complianceDisclaimer: explanation.complianceDisclaimer,
      structuredData: [...cases],
      source: "pipeline"
    });
  }

  clearHistory(): void {
    this.memory.clear();
  }

  private finish(query: string, response: FinalResponse): FinalResponse {
    this.memory.append("user", query);
    this.memory.append("assistant", response.summary);
    return Object.freeze(response);
  }
}

function curatedResponse(query: string, match: MatchResult): FinalResponse {
  console.log(`Answered from golden KB entry ${match.entry.id}`);
  return {
    query,
    intent: "general_inquiry",
    retrievedCaseCount: 0,
    summary: match.entry.answer,
    evidencePoints: [],
    riskNotes: [],
    complianceDisclaimer: COMPLIANCE_DISCLAIMERS.neutral,
    structuredData: [],
    source: "golden_kb"
  };
}
