import { Router } from "express";
import type { Store } from "../types/domain.js";
import { enqueueWorkflowRun } from "../queue/localQueue.js";
import { assertSourceLength } from "../services/keyPointService.js";
import { InputTooShortError } from "../services/errors.js";
import { renderWorkflowReport } from "../services/reportService.js";
import { runWorkflow, type WorkflowDependencies } from "../services/workflowService.js";
import { planRequestSchema } from "./workflow.js";

export function createRunsRouter(runStore: Store, deps: WorkflowDependencies = {}): Router {
  const runsRouter = Router();

  runsRouter.post("/v1/runs", (req, res) => {
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid payload", details: parsed.error.flatten() });
    }

    try {
      assertSourceLength(parsed.data.text);
    } catch (error) {
      if (error instanceof InputTooShortError) {
        return res.status(400).json({ error: error.message, minLength: error.minLength });
      }
      throw error;
    }

    const run = runStore.createRun({ sourceText: parsed.data.text, topicHint: parsed.data.topic_hint });
    enqueueWorkflowRun(runStore, run.id, () => runWorkflow(parsed.data.text, parsed.data.topic_hint, deps));
    return res.status(202).json({ runId: run.id, status: run.status });
  });

  runsRouter.get("/v1/runs", (_req, res) => {
    return res.json({ runs: runStore.listRuns().map(({ result: _result, ...summary }) => summary) });
  });

  runsRouter.get("/v1/runs/:id", (req, res) => {
    const run = runStore.getRun(req.params.id);
    if (!run) {
      return res.status(404).json({ error: "Run not found" });
    }
    return res.json(run);
  });

  runsRouter.get("/v1/runs/:id/report", (req, res) => {
    const run = runStore.getRun(req.params.id);
    if (!run) {
      return res.status(404).json({ error: "Run not found" });
    }
    if (run.status !== "succeeded" || !run.result) {
      return res.status(409).json({ error: `Run is ${run.status}`, status: run.status });
    }

    const report = renderWorkflowReport(run.result, { generatedAt: run.finishedAt ?? run.createdAt });
    return res.type("text/plain").send(report);
  });

  return runsRouter;
}
