import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { HealthResponse } from "@postflow/shared";
import { config } from "./config.js";
import { createRunsRouter } from "./routes/runs.js";
import { createWorkflowRouter } from "./routes/workflow.js";
import { isGenerationConfigured } from "./services/llmClient.js";
import { resolveProviderChain } from "./services/searchProviders.js";
import type { WorkflowDependencies } from "./services/workflowService.js";
import { store } from "./storage/inMemoryStore.js";
import type { Store } from "./types/domain.js";

export interface AppOptions {
  store?: Store;
  workflow?: WorkflowDependencies;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const deps = options.workflow ?? {};

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    const response: HealthResponse = {
      ok: true,
      service: "postflow-api",
      features: {
        generation: isGenerationConfigured() ? config.ai.provider : "heuristic",
        searchProviders: deps.searchChain ?? resolveProviderChain(),
        complianceMode: deps.complianceMode ?? config.compliance.mode
      }
    };
    res.json(response);
  });

  app.use(createWorkflowRouter(deps));
  app.use(createRunsRouter(options.store ?? store, deps));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error(err);
    return res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
