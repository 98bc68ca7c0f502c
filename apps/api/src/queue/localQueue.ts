import type { WorkflowResult } from "@postflow/shared";
import type { Store } from "../types/domain.js";
import { errorMessage } from "../services/errors.js";

type RunHandler = () => Promise<WorkflowResult>;

/** Runs the handler on the next tick and tracks its lifecycle on the run entry. */
export function enqueueWorkflowRun(runStore: Store, runId: string, handler: RunHandler): void {
  setImmediate(async () => {
    runStore.updateRun(runId, {
      status: "running",
      startedAt: new Date().toISOString(),
      error: null
    });

    try {
      const result = await handler();
      runStore.updateRun(runId, {
        status: "succeeded",
        result,
        finishedAt: new Date().toISOString(),
        error: null
      });
    } catch (error) {
      console.error(`[queue] run ${runId} failed`, error);
      runStore.updateRun(runId, {
        status: "failed",
        finishedAt: new Date().toISOString(),
        error: errorMessage(error, "Unknown queue error")
      });
    }
  });
}
