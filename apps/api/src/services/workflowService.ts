import { v4 as uuidv4 } from "uuid";
import {
  PLATFORMS,
  type ComplianceMode,
  type SearchProvider,
  type WorkflowResult
} from "@postflow/shared";
import { config } from "../config.js";
import type { StageContext, StageName, StageOutcome, WorkflowState } from "../types/domain.js";
import {
  createCapabilityPolicies,
  llmEmbedding,
  llmGeneration,
  webSearch,
  type CapabilityPolicies,
  type EmbeddingCapability,
  type GenerationCapability,
  type SearchCapability
} from "./capabilities.js";
import { attachClaimsToDrafts, extractClaims } from "./claimExtractionService.js";
import { reviewPost } from "./complianceService.js";
import { PipelineTimeoutError, errorMessage } from "./errors.js";
import { verifyClaims } from "./factCheckService.js";
import { assertSourceLength, extractKeyPoints } from "./keyPointService.js";
import { generatePlatformDraft } from "./platformGenerationService.js";
import { analyzeContentQuality } from "./qualityAnalysisService.js";
import type { SleepFn } from "./retryPolicy.js";
import { suggestPostingTimes } from "./scheduleService.js";

export interface WorkflowDependencies {
  generation?: GenerationCapability;
  search?: SearchCapability;
  embedding?: EmbeddingCapability;
  policies?: CapabilityPolicies;
  sleep?: SleepFn;
  now?: () => Date;
  complianceMode?: ComplianceMode;
  searchChain?: SearchProvider[];
  factCheckConcurrency?: number;
  runTimeoutMs?: number;
  staggerWindowMinutes?: number;
  defaultTimeZone?: string;
  orgName?: string;
}

type StageRunner = (state: WorkflowState, ctx: StageContext, deps: WorkflowDependencies) => Promise<void>;

const STAGES: Array<[StageName, StageRunner]> = [
  [
    "key_points",
    async (state, ctx) => {
      state.keyPoints = await extractKeyPoints(state.sourceText, state.topicHint, ctx);
    }
  ],
  [
    "drafts",
    async (state, ctx) => {
      await Promise.all(
        PLATFORMS.map(async (platform) => {
          state.drafts[platform] = await generatePlatformDraft(platform, state.keyPoints, state.topicHint, ctx);
        })
      );
    }
  ],
  [
    "quality_analysis",
    async (state, ctx) => {
      try {
        state.qualityAnalysis = await analyzeContentQuality(state.sourceText, state.keyPoints, state.drafts, ctx);
      } catch (error) {
        if (ctx.signal?.aborted) {
          throw error;
        }
        const message = errorMessage(error, "embedding failed");
        state.qualityAnalysis = { error: message };
        ctx.recordError(`Quality analysis unavailable: ${message}`);
      }
    }
  ],
  [
    "claims",
    async (state, ctx) => {
      state.claimPool = await extractClaims(state.sourceText, state.drafts, ctx);
      state.claims = attachClaimsToDrafts(state.claimPool, state.drafts);
    }
  ],
  [
    "fact_check",
    async (state, ctx, deps) => {
      await verifyClaims(state.claimPool, ctx, {
        runYear: state.startedAt.getUTCFullYear(),
        chain: deps.searchChain,
        concurrency: deps.factCheckConcurrency
      });
    }
  ],
  [
    "compliance",
    async (state, ctx) => {
      await Promise.all(
        PLATFORMS.map(async (platform) => {
          const draft = state.drafts[platform];
          if (!draft) {
            return;
          }
          state.reviews[platform] = await reviewPost(
            draft,
            { attachedClaims: state.claims[platform] ?? [], runClaims: state.claimPool, mode: ctx.complianceMode },
            ctx
          );
        })
      );
    }
  ],
  [
    "schedule",
    async (state, _ctx, deps) => {
      state.timings = suggestPostingTimes({
        drafts: state.drafts,
        claims: state.claims,
        reviews: state.reviews,
        sourceText: state.sourceText,
        topicHint: state.topicHint,
        now: (deps.now ?? (() => new Date()))(),
        staggerWindowMinutes: deps.staggerWindowMinutes,
        defaultTimeZone: deps.defaultTimeZone
      });
    }
  ]
];

export function createWorkflowState(sourceText: string, topicHint: string | undefined, startedAt: Date): WorkflowState {
  const state: WorkflowState = {
    runId: uuidv4(),
    startedAt,
    sourceText,
    keyPoints: [],
    drafts: {},
    claims: {},
    reviews: {},
    timings: [],
    errors: [],
    claimPool: [],
    stages: []
  };
  if (topicHint) {
    state.topicHint = topicHint;
  }
  return state;
}

export function toWorkflowResult(state: WorkflowState): WorkflowResult {
  const result: WorkflowResult = {
    sourceText: state.sourceText,
    keyPoints: state.keyPoints,
    drafts: state.drafts,
    claims: state.claims,
    reviews: state.reviews,
    timings: state.timings,
    errors: state.errors
  };
  if (state.topicHint) {
    result.topicHint = state.topicHint;
  }
  if (state.qualityAnalysis) {
    result.qualityAnalysis = state.qualityAnalysis;
  }
  return structuredClone(result);
}

/** One-line stage summary for the run log, e.g. "key_points:completed(12ms) drafts:skipped". */
export function formatStageSummary(stages: StageOutcome[]): string {
  return stages
    .map((outcome) =>
      outcome.status === "skipped"
        ? `${outcome.stage}:skipped`
        : `${outcome.stage}:${outcome.status}(${outcome.durationMs}ms)`
    )
    .join(" ");
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason;
}

/** Settles with the stage, or rejects as soon as the run is aborted. */
function raceWithSignal(work: Promise<void>, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Runs every stage in order against one shared state. Stage failures are
 * recorded and the run continues; only a too-short input rejects. When the
 * time budget runs out the remaining stages are skipped and the partial state
 * is returned.
 */
export async function runWorkflow(
  sourceText: string,
  topicHint?: string,
  deps: WorkflowDependencies = {}
): Promise<WorkflowResult> {
  assertSourceLength(sourceText);

  const now = deps.now ?? (() => new Date());
  const state = createWorkflowState(sourceText.trim(), topicHint?.trim() || undefined, now());
  const timeoutMs = deps.runTimeoutMs ?? config.pipeline.runTimeoutMs;
  const controller = new AbortController();
  const ceiling = setTimeout(() => controller.abort(new PipelineTimeoutError(timeoutMs)), timeoutMs);

  const ctx: StageContext = {
    generation: deps.generation ?? llmGeneration,
    search: deps.search ?? webSearch,
    embedding: deps.embedding ?? llmEmbedding,
    policies: deps.policies ?? createCapabilityPolicies(deps.sleep),
    complianceMode: deps.complianceMode ?? config.compliance.mode,
    orgName: deps.orgName ?? config.orgName,
    signal: controller.signal,
    recordError: (message) => {
      state.errors.push(message);
    }
  };

  const runStarted = Date.now();
  try {
    for (const [stage, runner] of STAGES) {
      if (controller.signal.aborted) {
        state.stages.push({ stage, status: "skipped", durationMs: 0 });
        continue;
      }

      const started = Date.now();
      try {
        await raceWithSignal(runner(state, ctx, deps), controller.signal);
        state.stages.push({ stage, status: "completed", durationMs: Date.now() - started });
      } catch (error) {
        state.stages.push({ stage, status: "failed", durationMs: Date.now() - started });
        if (controller.signal.aborted) {
          ctx.recordError(
            `${errorMessage(abortReason(controller.signal), "Pipeline aborted")} during ${stage}; remaining stages skipped`
          );
        } else {
          console.error(`[workflow] stage ${stage} failed`, error);
          ctx.recordError(`Stage ${stage} failed: ${errorMessage(error)}`);
        }
      }
    }
  } finally {
    clearTimeout(ceiling);
  }

  console.log(
    `[workflow] run ${state.runId} finished in ${Date.now() - runStarted}ms with ${state.errors.length} error(s): ` +
      formatStageSummary(state.stages)
  );
  return toWorkflowResult(state);
}
