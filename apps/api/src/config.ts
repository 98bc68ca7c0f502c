import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "node:fs";
import dotenv from "dotenv";
import type { AIProvider, ComplianceMode, SearchProvider } from "@postflow/shared";

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const projectRootDir = path.resolve(currentDir, "../../..");

// Always load monorepo root .env first, regardless of current working directory.
dotenv.config({ path: path.resolve(projectRootDir, ".env") });
// Allow extra overrides from the process current directory when present.
dotenv.config();

function readEnvValue(name: string): string {
  const directValue = process.env[name]?.trim();
  if (directValue) {
    return directValue;
  }

  const filePath = process.env[`${name}_FILE`]?.trim();
  if (!filePath) {
    return "";
  }

  try {
    const fileValue = fs.readFileSync(filePath, "utf8").trim();
    return fileValue;
  } catch (error) {
    console.warn(
      `[config] could not read ${name}_FILE: ${error instanceof Error ? error.message : "unknown error"}`
    );
    return "";
  }
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function readAiProvider(): AIProvider {
  return process.env.AI_PROVIDER === "openrouter" ? "openrouter" : "openai";
}

function readSearchProvider(): SearchProvider {
  const value = process.env.FACTCHECK_PROVIDER?.trim().toLowerCase();
  if (value === "wikipedia" || value === "premium") {
    return value;
  }
  if (value === "serpapi") {
    return "premium";
  }
  return "duckduckgo";
}

function readComplianceMode(): ComplianceMode {
  return process.env.COMPLIANCE_MODE?.trim().toLowerCase() === "strict" ? "strict" : "standard";
}

export const config = {
  apiPort: Number(process.env.API_PORT ?? 4000),
  dataDir: path.resolve(currentDir, "../data"),
  orgName: process.env.ORG_NAME?.trim() ?? "",
  ai: {
    provider: readAiProvider(),
    requestTimeoutMs: readNumber("AI_REQUEST_TIMEOUT_MS", 120_000),
    openai: {
      apiKey: readEnvValue("OPENAI_API_KEY"),
      baseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
      model: process.env.OPENAI_MODEL ?? "gpt-4o-mini",
      embeddingModel: process.env.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-small"
    },
    openrouter: {
      apiKey: readEnvValue("OPENROUTER_API_KEY"),
      baseUrl: process.env.OPENROUTER_BASE_URL ?? "https://openrouter.ai/api/v1",
      model: process.env.OPENROUTER_MODEL ?? "openai/gpt-4o-mini",
      httpReferer: process.env.OPENROUTER_HTTP_REFERER ?? "",
      appName: process.env.OPENROUTER_APP_NAME ?? "postflow"
    }
  },
  retry: {
    maxAttempts: 3,
    delaysMs: [1_000, 2_000, 4_000],
    timeoutsMs: [30_000, 60_000, 120_000]
  },
  search: {
    provider: readSearchProvider(),
    serpApiKey: readEnvValue("SERPAPI_API_KEY"),
    wikipediaLang: process.env.WIKIPEDIA_LANG?.trim() || "en",
    maxResults: 5
  },
  factCheck: {
    concurrency: readNumber("FACTCHECK_CONCURRENCY", 4),
    maxClaims: readNumber("FACTCHECK_MAX_CLAIMS", 10)
  },
  compliance: {
    mode: readComplianceMode()
  },
  scheduling: {
    defaultTimeZone: process.env.DEFAULT_TZ?.trim() || "America/New_York",
    staggerWindowMinutes: readNumber("SCHEDULE_STAGGER_MINUTES", 30)
  },
  pipeline: {
    minSourceChars: readNumber("MIN_SOURCE_CHARS", 100),
    runTimeoutMs: readNumber("PIPELINE_TIMEOUT_MS", 300_000)
  }
};
