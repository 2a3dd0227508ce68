import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loadConfig } from "../../src/config/env";
import { recordToText } from "../../src/retrieval/dataset";
import { OpenAIEmbeddingService } from "../../src/retrieval/embeddings";

const BATCH_SIZE = 100;

const RecordsFileSchema = z.union([
  z.array(z.record(z.unknown())),
  z.object({ records: z.array(z.record(z.unknown())) }).transform((file) => file.records)
]);

async function main() {
  const [inputArg, outputArg] = process.argv.slice(2);
  if (!inputArg) {
    console.error("Usage: node dist/scripts/manual/embedDataset.js <records.json> [output.json]");
    process.exit(1);
  }

  const config = loadConfig();
  const inputPath = path.resolve(inputArg);
  const outputPath = path.resolve(outputArg ?? config.datasetPath);

  const parsed = RecordsFileSchema.safeParse(JSON.parse(await fs.readFile(inputPath, "utf-8")));
  if (!parsed.success) {
    console.error(`${inputPath} must hold an array of records or { records: [...] }`);
    process.exit(1);
  }
  const records = parsed.data;

  const service = new OpenAIEmbeddingService({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    model: config.llm.embeddingModel,
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries
  });

  const embeddings: number[][] = [];
  for (let start = 0; start < records.length; start += BATCH_SIZE) {
    const batch = records.slice(start, start + BATCH_SIZE).map((record) => recordToText(record));
    embeddings.push(...(await service.embedBatch(batch)));
    console.log(`Embedded ${Math.min(start + BATCH_SIZE, records.length)}/${records.length} records`);
  }

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify({ records, embeddings }));
  console.log(`Wrote ${records.length} records with embeddings to ${outputPath}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
