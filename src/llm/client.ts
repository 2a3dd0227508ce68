import OpenAI from "openai";
import { describeError } from "../errors";
import { CircuitBreaker, withRetry } from "../utils";

export interface CompletionRequest {
  prompt: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  json?: boolean;
}

/**
 * Remote text completion. `complete` resolves to `null` whenever the service
 * cannot answer (no credential, transport error, timeout, open circuit or an
 * empty reply); callers fall back on their own heuristics.
 */
export interface CompletionService {
  readonly available: boolean;
  complete(request: CompletionRequest): Promise<string | null>;
}

export interface OpenAICompletionOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs?: number;
  maxRetries?: number;
  breakerThreshold?: number;
  breakerCooldownMs?: number;
}

const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful AI assistant that generates precise code and analysis for loan data queries.";

export class OpenAICompletionService implements CompletionService {
  private readonly client: OpenAI | null;

  private readonly model: string;

  private readonly maxRetries: number;

  private readonly breaker: CircuitBreaker;

  constructor(options: OpenAICompletionOptions) {
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 2;
    this.client = options.apiKey
      ? new OpenAI({
          apiKey: options.apiKey,
          baseURL: options.baseURL,
          timeout: options.timeoutMs ?? 20_000,
          maxRetries: 0
        })
      : null;
    this.breaker = new CircuitBreaker({
      failureThreshold: options.breakerThreshold ?? 3,
      cooldownMs: options.breakerCooldownMs ?? 30_000
    });

    if (!this.client) {
      console.warn("OPENAI_API_KEY is not configured; completion-backed steps will use keyword fallbacks.");
    }
  }

  get available(): boolean {
    return this.client !== null && !this.breaker.open;
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const client = this.client;
    if (!client) {
      return null;
    }

    try {
      return await this.breaker.exec(() =>
        withRetry(() => this.requestOnce(client, request), { retries: this.maxRetries })
      );
    } catch (error) {
      console.warn("Completion request failed", describeError(error));
      return null;
    }
  }

  private async requestOnce(client: OpenAI, request: CompletionRequest): Promise<string> {
    const response = await client.chat.completions.create({
      model: this.model,
      temperature: request.temperature ?? 0.1,
      max_tokens: request.maxTokens ?? 500,
      response_format: request.json ? { type: "json_object" } : undefined,
      messages: [
        { role: "system", content: request.system ?? DEFAULT_SYSTEM_PROMPT },
        { role: "user", content: request.prompt }
      ]
    });

    const content = response.choices[0]?.message?.content;
    if (!content || content.trim().length === 0) {
      throw new Error("Model returned empty response");
    }
    return content;
  }
}
