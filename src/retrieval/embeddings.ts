import { OpenAIEmbeddings } from "@langchain/openai";

export interface EmbeddingService {
  embedOne(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export function normalizeVector(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((total, value) => total + value * value, 0));
  if (norm === 0 || !Number.isFinite(norm)) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private readonly embeddings: OpenAIEmbeddings | null;

  constructor(options: OpenAIEmbeddingOptions) {
    this.embeddings = options.apiKey
      ? new OpenAIEmbeddings({
          apiKey: options.apiKey,
          model: options.model,
          timeout: options.timeoutMs,
          maxRetries: options.maxRetries ?? 2,
          configuration: options.baseURL ? { baseURL: options.baseURL } : undefined
        })
      : null;
  }

  async embedOne(text: string): Promise<number[]> {
    const vector = await this.client().embedQuery(text);
    return normalizeVector(vector);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors = await this.client().embedDocuments(texts);
    return vectors.map((vector) => normalizeVector(vector));
  }

  private client(): OpenAIEmbeddings {
    if (!this.embeddings) {
      throw new Error("Embedding service is not configured (OPENAI_API_KEY missing)");
    }
    return this.embeddings;
  }
}
