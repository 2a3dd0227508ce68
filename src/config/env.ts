import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

function blankAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim().length === 0 ? undefined : value;
}

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());
const optionalUrl = z.preprocess(blankAsUndefined, z.string().url().optional());

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalUrl,
  COMPLETION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  LLM_BREAKER_THRESHOLD: z.coerce.number().int().positive().default(3),
  LLM_BREAKER_COOLDOWN_MS: z.coerce.number().int().positive().default(30_000),
  DATASET_PATH: z.string().min(1).default("data/loan_dataset.json"),
  GOLDEN_KB_PATH: z.string().min(1).default("data/golden_kb.json"),
  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  SESSION_LIMIT: z.coerce.number().int().positive().default(500)
});

export interface AppConfig {
  port: number;
  llm: {
    apiKey?: string;
    baseURL?: string;
    completionModel: string;
    embeddingModel: string;
    timeoutMs: number;
    maxRetries: number;
    breakerThreshold: number;
    breakerCooldownMs: number;
  };
  datasetPath: string;
  goldenKbPath: string;
  persistence: "postgres" | "memory";
  sessionLimit: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${JSON.stringify(parsed.error.format())}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    llm: {
      apiKey: values.OPENAI_API_KEY,
      baseURL: values.OPENAI_BASE_URL,
      completionModel: values.COMPLETION_MODEL,
      embeddingModel: values.EMBEDDING_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxRetries: values.LLM_MAX_RETRIES,
      breakerThreshold: values.LLM_BREAKER_THRESHOLD,
      breakerCooldownMs: values.LLM_BREAKER_COOLDOWN_MS
    },
    datasetPath: values.DATASET_PATH,
    goldenKbPath: values.GOLDEN_KB_PATH,
    persistence: values.DATABASE_URL || values.PGHOST ? "postgres" : "memory",
    sessionLimit: values.SESSION_LIMIT
  };
}
