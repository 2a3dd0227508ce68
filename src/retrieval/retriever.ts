import { LOAN_COLUMNS } from "../config/columns";
import { DatasetUnavailableError, describeError } from "../errors";
import type { CaseFilters, LoanDataset, LoanRecord, RetrievedCase } from "../types";
import { toOptionalNumber, toOptionalString } from "../utils";
import { recordToText, type DatasetProvider } from "./dataset";
import type { EmbeddingService } from "./embeddings";
import { compileFilters } from "./filters";
import { FlatInnerProductIndex, type IndexHit, type VectorIndex } from "./vectorIndex";

// Neighbours fetched per requested case when filters will discard some of them.
const FILTER_OVERFETCH_FACTOR = 4;
const MIN_TOKEN_LENGTH = 3;

export interface CaseRetrieverOptions {
  datasetProvider: DatasetProvider;
  embeddings: EmbeddingService;
  buildIndex?: (vectors: number[][]) => VectorIndex | Promise<VectorIndex>;
}

interface RetrieverState {
  dataset: LoanDataset;
  index: VectorIndex;
  searchText: string[];
}

/**
 * Nearest-neighbour retrieval over the loan dataset. The dataset and index are
 * built once on first use; concurrent first calls share the same build.
 */
export class CaseRetriever {
  private readonly datasetProvider: DatasetProvider;

  private readonly embeddings: EmbeddingService;

  private readonly buildIndex: (vectors: number[][]) => VectorIndex | Promise<VectorIndex>;

  private state: RetrieverState | null = null;

  private initPromise: Promise<RetrieverState> | null = null;

  constructor(options: CaseRetrieverOptions) {
    this.datasetProvider = options.datasetProvider;
    this.embeddings = options.embeddings;
    this.buildIndex = options.buildIndex ?? ((vectors) => FlatInnerProductIndex.build(vectors));
  }

  get isInitialized(): boolean {
    return this.state !== null;
  }

  async initialize(): Promise<void> {
    await this.ensureReady();
  }

  async getDataset(): Promise<LoanDataset> {
    const state = await this.ensureReady();
    return state.dataset;
  }

  async retrieve(query: string, topK = 5, filters: CaseFilters = {}): Promise<RetrievedCase[]> {
    const state = await this.ensureReady();
    const limit = Math.max(0, Math.floor(topK));
    if (limit === 0) {
      return [];
    }

    const predicates = compileFilters(filters, state.dataset.columns);
    const fetchCount = predicates.length > 0 ? limit * FILTER_OVERFETCH_FACTOR : limit;

    const hits = await this.search(state, query, fetchCount);
    const cases: RetrievedCase[] = [];
    for (const hit of hits) {
      const record = state.dataset.records[hit.rowIndex];
      if (!record || !predicates.every((predicate) => predicate(record))) {
        continue;
      }
      cases.push(toRetrievedCase(record, hit));
      if (cases.length === limit) {
        break;
      }
    }

    console.log(`Retrieved ${cases.length} cases for "${query}" (top_k=${limit})`);
    return cases;
  }

  private async search(state: RetrieverState, query: string, k: number): Promise<IndexHit[]> {
    try {
      const vector = await this.embeddings.embedOne(query);
      return await state.index.search(vector, k);
    } catch (error) {
      console.warn("Vector search unavailable, falling back to keyword overlap", describeError(error));
      return lexicalSearch(state.searchText, query, k);
    }
  }

  private ensureReady(): Promise<RetrieverState> {
    if (this.state) {
      return Promise.resolve(this.state);
    }
    if (!this.initPromise) {
      this.initPromise = this.load()
        .then((state) => {
          this.state = state;
          return state;
        })
        .catch((error: unknown) => {
          this.initPromise = null;
          throw new DatasetUnavailableError(`Loan dataset could not be initialized: ${describeError(error)}`, error);
        });
    }
    return this.initPromise;
  }

  private async load(): Promise<RetrieverState> {
    console.log("Initializing loan dataset and vector index...");
    const dataset = await this.datasetProvider.load();
    if (dataset.records.length !== dataset.embeddings.length) {
      throw new Error(`Dataset has ${dataset.records.length} records but ${dataset.embeddings.length} embeddings`);
    }
    const index = await this.buildIndex(dataset.embeddings);
    console.log(`Vector index ready with ${index.size} vectors (dimension ${index.dimension})`);
    return { dataset, index, searchText: dataset.records.map((record) => recordToText(record).toLowerCase()) };
  }
}

export function toRetrievedCase(record: LoanRecord, hit: IndexHit): RetrievedCase {
  return {
    caseId: toOptionalString(record[LOAN_COLUMNS.id]) ?? String(hit.rowIndex),
    customerName: toOptionalString(record[LOAN_COLUMNS.customerName]),
    loanAmount: toOptionalNumber(record[LOAN_COLUMNS.amount]),
    approvalStatus: toOptionalString(record[LOAN_COLUMNS.status]),
    similarityScore: hit.score,
    rawRecord: record
  };
}

function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter((token) => token.length >= MIN_TOKEN_LENGTH);
}

/** Share of distinct query tokens found in each record's text; zero-score records are dropped. */
export function lexicalSearch(searchText: readonly string[], query: string, k: number): IndexHit[] {
  const tokens = [...new Set(tokenize(query))];
  if (tokens.length === 0) {
    return [];
  }
  return searchText
    .map((text, rowIndex) => {
      const recordTokens = new Set(tokenize(text));
      const matched = tokens.filter((token) => recordTokens.has(token)).length;
      return { rowIndex, score: matched / tokens.length };
    })
    .filter((hit) => hit.score > 0)
    .sort((left, right) => right.score - left.score || left.rowIndex - right.rowIndex)
    .slice(0, Math.max(0, k));
}
