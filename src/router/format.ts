import { formatCurrency, formatGrouped, isPlainRecord } from "../utils";

export const MAX_DISPLAY_ROWS = 10;
const MAX_ROW_FIELDS = 6;

type NumberStyle = "percent" | "count" | "currency" | "decimal";

const integerFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function numberStyle(query: string): NumberStyle {
  const lower = query.toLowerCase();
  if (["percentage", "percent", "%"].some((cue) => lower.includes(cue))) return "percent";
  if (["count", "how many", "number of"].some((cue) => lower.includes(cue))) return "count";
  if (["income", "amount", "loan"].some((cue) => lower.includes(cue))) return "currency";
  return "decimal";
}

function formatNumber(value: number, style: NumberStyle): string {
  if (!Number.isFinite(value)) {
    return "not available (no numeric values matched)";
  }
  switch (style) {
    case "percent":
      return `${value.toFixed(2)}%`;
    case "count":
      return Number.isInteger(value) ? integerFormat.format(value) : formatGrouped(value);
    case "currency":
      return formatCurrency(value);
    default:
      return formatGrouped(value);
  }
}

/** Plain rendering of one value inside a list or table row. */
export function displayValue(value: unknown): string {
  if (value === null || value === undefined) return "N/A";
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : formatGrouped(value);
  }
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return value ? "true" : "false";
  if (Array.isArray(value)) return `[${value.map((item: unknown) => displayValue(item)).join(", ")}]`;
  if (isPlainRecord(value)) {
    const entries = Object.entries(value);
    const shown = entries.slice(0, MAX_ROW_FIELDS).map(([key, item]) => `${key}: ${displayValue(item)}`);
    return entries.length > MAX_ROW_FIELDS ? `${shown.join(", ")}, ...` : shown.join(", ");
  }
  return "[unsupported value]";
}

function formatList(items: readonly unknown[]): string {
  if (items.length === 0) {
    return "Result: no matching records";
  }
  const shown = items.slice(0, MAX_DISPLAY_ROWS);
  const header = items.length > MAX_DISPLAY_ROWS ? `Top ${MAX_DISPLAY_ROWS} Results:` : "Results:";
  const lines = [header, ...shown.map((item, index) => `${index + 1}. ${displayValue(item)}`)];
  if (items.length > MAX_DISPLAY_ROWS) {
    lines.push(`... (${items.length} total)`);
  }
  return lines.join("\n");
}

function formatMapping(value: Record<string, unknown>, style: NumberStyle): string {
  const entries = Object.entries(value);
  if (entries.length === 0) {
    return "Result: no matching records";
  }
  const shown = entries.slice(0, MAX_DISPLAY_ROWS);
  const header = entries.length > MAX_DISPLAY_ROWS ? `Top ${MAX_DISPLAY_ROWS} Results:` : "Results:";
  const lines = [
    header,
    ...shown.map(([key, item]) => `- ${key}: ${typeof item === "number" ? formatNumber(item, style) : displayValue(item)}`)
  ];
  if (entries.length > MAX_DISPLAY_ROWS) {
    lines.push(`... (${entries.length} total)`);
  }
  return lines.join("\n");
}

/**
 * Renders a snippet's output for the user. Numeric styling follows cues in the
 * query: percentages, then counts, then currency, else a grouped decimal.
 */
export function formatResult(value: unknown, query: string): string {
  const style = numberStyle(query);
  if (typeof value === "number") {
    return `Result: ${formatNumber(value, style)}`;
  }
  if (typeof value === "string") {
    return `Result: ${value}`;
  }
  if (typeof value === "boolean") {
    return `Result: ${value ? "Yes" : "No"}`;
  }
  if (value === null || value === undefined) {
    return "Result: no value was produced";
  }
  if (Array.isArray(value)) {
    return formatList(value);
  }
  if (isPlainRecord(value)) {
    return formatMapping(value, style);
  }
  return `Result: ${displayValue(value)}`;
}
