import { LOAN_COLUMNS } from "../config/columns";
import type { LoanRecord, RetrievedCase } from "../types";
import { formatGrouped, toOptionalNumber, toOptionalString } from "../utils";

export const NO_RECORDS_MESSAGE = "No relevant loan records found for this query.";

// Printed after the core fields when the record carries them.
const OPTIONAL_COLUMNS = [LOAN_COLUMNS.age, LOAN_COLUMNS.employment, LOAN_COLUMNS.purpose];

function text(record: LoanRecord, column: string): string {
  return toOptionalString(record[column]) ?? "N/A";
}

function amount(record: LoanRecord, column: string): string {
  const value = toOptionalNumber(record[column]);
  return value === undefined ? "N/A" : formatGrouped(value);
}

/**
 * Renders retrieved cases as the plain-text evidence block handed to the
 * model, most similar first.
 */
export function buildCaseContext(cases: readonly RetrievedCase[]): string {
  if (cases.length === 0) {
    return NO_RECORDS_MESSAGE;
  }

  const lines = [`Retrieved ${cases.length} relevant loan records:`, ""];
  cases.forEach((retrieved, index) => {
    const record = retrieved.rawRecord;
    lines.push(`Record ${index + 1} (Similarity: ${retrieved.similarityScore.toFixed(3)}):`);
    lines.push(`- Customer: ${retrieved.customerName ?? "N/A"}`);
    lines.push(`- Loan Status: ${retrieved.approvalStatus ?? "N/A"}`);
    lines.push(`- Loan Amount: INR ${amount(record, LOAN_COLUMNS.amount)}`);
    lines.push(`- Income: INR ${amount(record, LOAN_COLUMNS.income)}`);
    lines.push(`- Credit Score: ${text(record, LOAN_COLUMNS.creditScore)}`);
    lines.push(`- DTI Ratio: ${text(record, LOAN_COLUMNS.debtRatio)}`);
    for (const column of OPTIONAL_COLUMNS) {
      if (record[column] !== undefined && record[column] !== null) {
        lines.push(`- ${column}: ${text(record, column)}`);
      }
    }
    lines.push("");
  });

  return lines.join("\n").trimEnd();
}
