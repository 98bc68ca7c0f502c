import { v4 as uuidv4 } from "uuid";
import type { WorkflowRunEntry } from "@postflow/shared";
import type { Store } from "../types/domain.js";
import { truncateAtWord } from "../services/normalizers.js";

const SOURCE_PREVIEW_CHARS = 160;

export class InMemoryStore implements Store {
  private readonly runs = new Map<string, WorkflowRunEntry>();

  createRun(input: { sourceText: string; topicHint?: string }): WorkflowRunEntry {
    const entry: WorkflowRunEntry = {
      id: uuidv4(),
      status: "queued",
      sourcePreview: truncateAtWord(input.sourceText.trim(), SOURCE_PREVIEW_CHARS),
      result: null,
      error: null,
      createdAt: new Date().toISOString(),
      startedAt: null,
      finishedAt: null
    };
    if (input.topicHint) {
      entry.topicHint = input.topicHint;
    }

    this.runs.set(entry.id, entry);
    return structuredClone(entry);
  }

  getRun(id: string): WorkflowRunEntry | undefined {
    const entry = this.runs.get(id);
    return entry ? structuredClone(entry) : undefined;
  }

  listRuns(): WorkflowRunEntry[] {
    return [...this.runs.values()]
      .map((entry) => structuredClone(entry))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  updateRun(
    id: string,
    patch: Partial<Pick<WorkflowRunEntry, "status" | "result" | "error" | "startedAt" | "finishedAt">>
  ): WorkflowRunEntry | undefined {
    const entry = this.runs.get(id);
    if (!entry) {
      return undefined;
    }

    const updated = { ...entry, ...structuredClone(patch) };
    this.runs.set(id, updated);
    return structuredClone(updated);
  }
}

export const store = new InMemoryStore();
