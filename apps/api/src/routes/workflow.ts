import { Router, type Response } from "express";
import { z } from "zod";
import type { WorkflowResult } from "@postflow/shared";
import { InputTooShortError, errorMessage } from "../services/errors.js";
import { renderWorkflowReport } from "../services/reportService.js";
import { runWorkflow, type WorkflowDependencies } from "../services/workflowService.js";

export const planRequestSchema = z.object({
  text: z.string().min(1),
  topic_hint: z.string().max(200).optional()
});

export type PlanRequest = z.infer<typeof planRequestSchema>;

function sendPipelineFailure(res: Response, error: unknown): Response {
  if (error instanceof InputTooShortError) {
    return res.status(400).json({ error: error.message, minLength: error.minLength });
  }
  return res.status(500).json({ error: errorMessage(error, "Workflow failed") });
}

export function createWorkflowRouter(deps: WorkflowDependencies = {}): Router {
  const workflowRouter = Router();
  const now = deps.now ?? (() => new Date());

  const plan = (body: PlanRequest): Promise<WorkflowResult> => runWorkflow(body.text, body.topic_hint, deps);

  workflowRouter.post("/v1/plan", async (req, res) => {
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid payload", details: parsed.error.flatten() });
    }

    try {
      return res.json(await plan(parsed.data));
    } catch (error) {
      return sendPipelineFailure(res, error);
    }
  });

  workflowRouter.post("/v1/export", async (req, res) => {
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid payload", details: parsed.error.flatten() });
    }

    try {
      const result = await plan(parsed.data);
      const report = renderWorkflowReport(result, { generatedAt: now().toISOString() });
      return res.type("text/plain").send(report);
    } catch (error) {
      return sendPipelineFailure(res, error);
    }
  });

  return workflowRouter;
}
