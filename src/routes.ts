import { randomUUID } from "node:crypto";
import { Router, Request, Response, NextFunction } from "express";
import type { HistoryStore } from "./db";
import { DatasetUnavailableError, describeError } from "./errors";
import {
  AskRequestSchema,
  ClearHistoryRequestSchema,
  describeIssues,
  HistoryQuerySchema,
  QueryRequestSchema
} from "./parsers/request-schema";
import type { QueryRouter } from "./router/queryRouter";
import type { SessionRegistry } from "./sessions";

export interface RouteDependencies {
  sessions: SessionRegistry;
  router: QueryRouter;
  history: HistoryStore;
}

function userIdFrom(req: Request): string | null {
  const header = req.header("x-user-id");
  return header && header.trim().length > 0 ? header.trim() : null;
}

function handleFailure(error: unknown, res: Response, next: NextFunction): void {
  if (error instanceof DatasetUnavailableError) {
    res.status(503).json({ message: "Loan dataset is temporarily unavailable." });
    return;
  }
  next(error);
}

export function createRoutes({ sessions, router, history }: RouteDependencies): Router {
  const routes = Router();

  routes.post("/query-loan-insights", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = QueryRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: describeIssues(parsed.error) });
    }

    const { query } = parsed.data;
    const sessionId = parsed.data.sessionId ?? randomUUID();
    const userId = userIdFrom(req);

    try {
      const response = await sessions.get(sessionId).resolve(query);

      // History is listed per user, so requests without a user id are not recorded.
      if (userId !== null) {
        try {
          await history.record({
            userId,
            sessionId,
            query,
            summary: response.summary,
            intent: response.intent,
            source: response.source,
            retrievedCaseCount: response.retrievedCaseCount,
            createdAt: new Date()
          });
        } catch (error) {
          console.error("Failed to record query history", describeError(error));
        }
      }

      return res.json({ sessionId, ...response });
    } catch (error) {
      return handleFailure(error, res, next);
    }
  });

  routes.post("/ask", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AskRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: describeIssues(parsed.error) });
    }

    try {
      const result = await router.answer(parsed.data.query);
      return res.json({ answer: result.answer, method: result.method });
    } catch (error) {
      return handleFailure(error, res, next);
    }
  });

  routes.post("/clear-history", (req: Request, res: Response) => {
    const parsed = ClearHistoryRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: describeIssues(parsed.error) });
    }
    return res.json({ cleared: sessions.clear(parsed.data.sessionId) });
  });

  routes.get("/history", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = HistoryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: describeIssues(parsed.error) });
    }

    try {
      const entries = await history.listByUser(parsed.data.userId, parsed.data.limit);
      return res.json({ entries });
    } catch (error) {
      return next(error);
    }
  });

  return routes;
}
