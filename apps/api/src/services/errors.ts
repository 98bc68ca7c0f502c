import type { Platform, SearchProvider } from "@postflow/shared";

export class InputTooShortError extends Error {
  readonly length: number;
  readonly minLength: number;

  constructor(length: number, minLength: number) {
    super(`Source text is too short: ${length} characters, at least ${minLength} required`);
    this.name = "InputTooShortError";
    this.length = length;
    this.minLength = minLength;
  }
}

export class GenerationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class GenerationProviderError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "GenerationProviderError";
    this.status = status;
  }
}

export class ProviderUnavailableError extends Error {
  readonly provider: SearchProvider | "all";
  /** True when the provider is down or unconfigured, not just failing on one query. */
  readonly outage: boolean;

  constructor(provider: SearchProvider | "all", reason: string, options: { outage?: boolean } = {}) {
    super(`Search provider ${provider} unavailable: ${reason}`);
    this.name = "ProviderUnavailableError";
    this.provider = provider;
    this.outage = options.outage ?? false;
  }
}

export class ValidationError extends Error {
  readonly platform: Platform;
  readonly violations: string[];

  constructor(platform: Platform, violations: string[]) {
    super(`Draft for ${platform} failed validation: ${violations.join("; ")}`);
    this.name = "ValidationError";
    this.platform = platform;
    this.violations = violations;
  }
}

export class RemediationExhaustedError extends Error {
  readonly platform: Platform;

  constructor(platform: Platform, remainingIssues: number) {
    super(
      `Automatic remediation for ${platform} left ${remainingIssues} blocking issue(s); downgraded to manual review`
    );
    this.name = "RemediationExhaustedError";
    this.platform = platform;
  }
}

export class CallTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class PipelineTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Pipeline exceeded its ${timeoutMs}ms time budget`);
    this.name = "PipelineTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
