import { FILTER_ALIASES } from "../config/columns";
import type { CaseFilters, CellValue, FilterValue, LoanRecord } from "../types";
import { toOptionalNumber } from "../utils";

export type RecordPredicate = (record: LoanRecord) => boolean;

export function resolveFilterColumn(key: string, columns: readonly string[]): string | null {
  const lowered = key.trim().toLowerCase();
  const direct = columns.find((column) => column.toLowerCase() === lowered);
  if (direct) {
    return direct;
  }
  const alias = FILTER_ALIASES[lowered.replace(/[\s-]+/g, "_")];
  if (alias && columns.includes(alias)) {
    return alias;
  }
  return null;
}

/**
 * Turns intent filters into record predicates. Keys that name no known
 * column are dropped so a hallucinated filter cannot empty the result set.
 */
export function compileFilters(filters: CaseFilters, columns: readonly string[]): RecordPredicate[] {
  const predicates: RecordPredicate[] = [];
  for (const [key, value] of Object.entries(filters)) {
    const column = resolveFilterColumn(key, columns);
    if (!column) {
      console.warn(`Ignoring filter on unknown column "${key}"`);
      continue;
    }
    predicates.push((record) => matchesValue(record[column] ?? null, value));
  }
  return predicates;
}

function matchesValue(cell: CellValue, expected: FilterValue): boolean {
  if (typeof expected === "string") {
    return cell !== null && String(cell).trim().toLowerCase() === expected.trim().toLowerCase();
  }
  if (typeof expected === "number") {
    return toOptionalNumber(cell) === expected;
  }
  if (typeof expected === "boolean") {
    return cell === expected || (typeof cell === "string" && cell.trim().toLowerCase() === String(expected));
  }
  const numeric = toOptionalNumber(cell);
  if (numeric === undefined) {
    return false;
  }
  if (expected.min !== undefined && numeric < expected.min) {
    return false;
  }
  if (expected.max !== undefined && numeric > expected.max) {
    return false;
  }
  return true;
}
