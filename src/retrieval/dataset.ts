import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { EMBEDDING_COLUMN } from "../config/columns";
import type { CellValue, LoanDataset, LoanRecord } from "../types";

export interface DatasetProvider {
  load(): Promise<LoanDataset>;
}

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const VectorSchema = z.array(z.number().finite()).min(1);

const DatasetFileSchema = z.object({
  records: z.array(z.record(z.unknown())).min(1),
  embeddings: z.array(VectorSchema).optional()
});

/**
 * Loads `{ records, embeddings }` from a JSON export. Embeddings may also be
 * carried per record under the `embeddings` column.
 */
export class JsonDatasetProvider implements DatasetProvider {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<LoanDataset> {
    const raw: unknown = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
    const parsed = DatasetFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Dataset file ${this.filePath} is malformed: ${JSON.stringify(parsed.error.format())}`);
    }
    const dataset = buildDataset(parsed.data.records, parsed.data.embeddings);
    console.log(`Loaded ${dataset.records.length} loan records from ${this.filePath}`);
    return dataset;
  }
}

export class StaticDatasetProvider implements DatasetProvider {
  constructor(private readonly dataset: LoanDataset) {}

  async load(): Promise<LoanDataset> {
    return this.dataset;
  }
}

export function buildDataset(rows: Array<Record<string, unknown>>, embeddings?: number[][]): LoanDataset {
  const columns: string[] = [];
  const seen = new Set<string>();
  const records: LoanRecord[] = [];
  const vectors: number[][] = [];

  if (embeddings && embeddings.length !== rows.length) {
    throw new Error(`Dataset has ${rows.length} records but ${embeddings.length} embeddings`);
  }

  rows.forEach((row, index) => {
    const record: Record<string, CellValue> = {};
    for (const [key, value] of Object.entries(row)) {
      if (key === EMBEDDING_COLUMN) {
        continue;
      }
      const cell = CellSchema.safeParse(value ?? null);
      if (!cell.success) {
        throw new Error(`Record ${index} column ${key} is not a scalar value`);
      }
      record[key] = cell.data;
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
    records.push(Object.freeze(record));

    const perRecord = VectorSchema.safeParse(row[EMBEDDING_COLUMN]);
    const vector = embeddings ? embeddings[index] : perRecord.success ? perRecord.data : undefined;
    if (!vector) {
      throw new Error(`Record ${index} has no embedding`);
    }
    vectors.push(vector);
  });

  return { columns, records, embeddings: vectors };
}

/** Text a record is embedded from: every non-empty column as "name: value". */
export function recordToText(record: Readonly<Record<string, unknown>>): string {
  return Object.entries(record)
    .filter(([key, value]) => key !== EMBEDDING_COLUMN && value !== null && value !== undefined && value !== "")
    .map(([key, value]) => `${key.replace(/_/g, " ")}: ${String(value)}`)
    .join(" | ");
}
