import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadConfig } from "./src/config/env";
import { createServices } from "./src/container";
import { describeError } from "./src/errors";
import { createRoutes } from "./src/routes";

const config = loadConfig();
const services = createServices(config, process.cwd());

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

const swaggerPath = [path.resolve(__dirname, "swagger.json"), path.resolve(__dirname, "..", "swagger.json")].find(
  (candidate) => fs.existsSync(candidate)
);
let swaggerDocument: Record<string, unknown> | null = null;

if (swaggerPath) {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      swaggerDocument = Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
  }
} else {
  console.warn("Swagger definition not found. /docs route disabled.");
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({
    status: "ok",
    uptime: process.uptime(),
    datasetReady: services.retriever.isInitialized,
    goldenKbEntries: services.knowledgeBase.size
  });
});

app.use(
  createRoutes({
    sessions: services.sessions,
    router: services.router,
    history: services.history
  })
);

// Basic error handler for uncaught errors within the request pipeline.
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error("Unhandled error", err);
  res.status(500).json({ message: "Unexpected server error" });
});

async function start(): Promise<void> {
  await services.history.init();

  // Warm the index in the background; requests retry initialization if this fails.
  services.retriever.initialize().catch((error: unknown) => {
    console.warn("Loan dataset warm-up failed", describeError(error));
  });

  app.listen(config.port, () => {
    console.log(`Loan insight resolver listening on port ${config.port}`);
  });
}

start().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  console.log("Received SIGTERM, shutting down.");
  process.exit(0);
});
