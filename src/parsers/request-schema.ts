import { z } from "zod";
import { MAX_HISTORY_LIMIT } from "../db";

const nonBlank = z.string().trim().min(1);

export const QueryRequestSchema = z.object({
  query: nonBlank.max(2_000),
  sessionId: nonBlank.max(200).optional()
});

export const AskRequestSchema = z.object({
  query: nonBlank.max(2_000)
});

export const ClearHistoryRequestSchema = z.object({
  sessionId: nonBlank.max(200)
});

export const HistoryQuerySchema = z.object({
  userId: nonBlank.max(200),
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).optional()
});

/** First issue rendered as "field: message" for 400 responses. */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "Invalid request.";
  }
  const field = issue.path.join(".");
  return field ? `${field}: ${issue.message}` : issue.message;
}
