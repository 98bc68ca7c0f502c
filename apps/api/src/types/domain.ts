import type {
  Claim,
  ComplianceMode,
  WorkflowResult,
  WorkflowRunEntry
} from "@postflow/shared";
import type {
  CapabilityPolicies,
  EmbeddingCapability,
  GenerationCapability,
  SearchCapability
} from "../services/capabilities.js";

export interface StageContext {
  generation: GenerationCapability;
  search: SearchCapability;
  embedding: EmbeddingCapability;
  policies: CapabilityPolicies;
  complianceMode: ComplianceMode;
  orgName: string;
  signal?: AbortSignal;
  recordError(message: string): void;
}

export type StageName =
  | "key_points"
  | "drafts"
  | "quality_analysis"
  | "claims"
  | "fact_check"
  | "compliance"
  | "schedule";

export interface StageOutcome {
  stage: StageName;
  status: "completed" | "failed" | "skipped";
  durationMs: number;
}

/** Run aggregate handed to every stage by reference. */
export interface WorkflowState extends WorkflowResult {
  runId: string;
  startedAt: Date;
  claimPool: Claim[];
  stages: StageOutcome[];
}

export interface Store {
  createRun(input: { sourceText: string; topicHint?: string }): WorkflowRunEntry;
  getRun(id: string): WorkflowRunEntry | undefined;
  listRuns(): WorkflowRunEntry[];
  updateRun(
    id: string,
    patch: Partial<Pick<WorkflowRunEntry, "status" | "result" | "error" | "startedAt" | "finishedAt">>
  ): WorkflowRunEntry | undefined;
}
