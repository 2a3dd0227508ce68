import { EMBEDDING_COLUMN } from "../config/columns";
import type { CellValue, LoanDataset } from "../types";

const MAX_LISTED_VALUES = 20;
const SAMPLE_SIZE = 5;

interface NumericSummary {
  min: number;
  max: number;
  mean: number;
  median: number;
}

export interface ColumnDescription {
  name: string;
  type: "number" | "string" | "boolean" | "mixed" | "empty";
  non_null_count: number;
  null_count: number;
  stats?: NumericSummary;
  unique_values?: CellValue[];
  unique_count?: number;
  sample_values?: CellValue[];
}

export interface DatasetDescription {
  total_rows: number;
  total_columns: number;
  columns: ColumnDescription[];
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function summarize(values: number[]): NumericSummary {
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: round4(sorted.reduce((total, value) => total + value, 0) / sorted.length),
    median: round4(median)
  };
}

function describeColumn(name: string, dataset: LoanDataset): ColumnDescription {
  const present: Array<Exclude<CellValue, null>> = [];
  for (const record of dataset.records) {
    const value = record[name];
    if (value !== null && value !== undefined) {
      present.push(value);
    }
  }

  const kinds = new Set(present.map((value) => typeof value));
  let type: ColumnDescription["type"] = "empty";
  if (kinds.size > 1) {
    type = "mixed";
  } else if (kinds.has("number")) {
    type = "number";
  } else if (kinds.has("string")) {
    type = "string";
  } else if (kinds.has("boolean")) {
    type = "boolean";
  }

  const description: ColumnDescription = {
    name,
    type,
    non_null_count: present.length,
    null_count: dataset.records.length - present.length
  };

  const numbers = present.filter((value): value is number => typeof value === "number");
  if (type === "number" && numbers.length > 0) {
    description.stats = summarize(numbers);
  }

  if (type === "string" || type === "mixed") {
    const unique = [...new Set(present)];
    if (unique.length <= MAX_LISTED_VALUES) {
      description.unique_values = unique;
    } else {
      description.unique_count = unique.length;
      description.sample_values = unique.slice(0, SAMPLE_SIZE);
    }
  }
  return description;
}

/** Column-level profile the code generator works from. */
export function describeDataset(dataset: LoanDataset): DatasetDescription {
  const columns = dataset.columns.filter((column) => column !== EMBEDDING_COLUMN);
  return {
    total_rows: dataset.records.length,
    total_columns: columns.length,
    columns: columns.map((column) => describeColumn(column, dataset))
  };
}

export function formatDatasetDescription(dataset: LoanDataset): string {
  return JSON.stringify(describeDataset(dataset), null, 2);
}
