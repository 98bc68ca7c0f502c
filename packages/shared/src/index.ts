export type JobStatus = "queued" | "running" | "succeeded" | "failed";

export type Platform = "x" | "linkedin" | "instagram";

export const PLATFORMS: readonly Platform[] = ["x", "linkedin", "instagram"];

export interface PlatformRules {
  minChars: number;
  maxChars: number;
  allowsThread: boolean;
  minThreadItems: number;
  maxThreadItems: number;
  maxHashtags: number;
  requiresSingleCta: boolean;
}

export const PLATFORM_RULES: Record<Platform, PlatformRules> = {
  x: {
    minChars: 1,
    maxChars: 280,
    allowsThread: true,
    minThreadItems: 3,
    maxThreadItems: 5,
    maxHashtags: 3,
    requiresSingleCta: false
  },
  linkedin: {
    minChars: 500,
    maxChars: 1200,
    allowsThread: false,
    minThreadItems: 0,
    maxThreadItems: 0,
    maxHashtags: 5,
    requiresSingleCta: false
  },
  instagram: {
    minChars: 125,
    maxChars: 2200,
    allowsThread: false,
    minThreadItems: 0,
    maxThreadItems: 0,
    maxHashtags: 10,
    requiresSingleCta: true
  }
};

export type ResponseFormat = "json" | "text";
export type SearchProvider = "duckduckgo" | "wikipedia" | "premium";
export type AIProvider = "openai" | "openrouter";
export type ComplianceMode = "standard" | "strict";

export interface KeyPoint {
  text: string;
  importance: number;
}

export interface PostMetadata {
  attempts?: number;
  validation?: "passed" | "failed";
  source?: "generated" | "heuristic";
  remediated?: boolean;
  complianceTrace?: string[];
  alignmentScore?: number;
  droppedMentions?: string[];
}

export interface PlatformPost {
  platform: Platform;
  primaryText: string;
  thread?: string[];
  hashtags: string[];
  mentions: string[];
  notes?: string;
  metadata: PostMetadata;
}

export type ClaimSeverity = "low" | "medium" | "high";

export interface ClaimSource {
  title: string;
  url: string;
  credibility: number;
}

export interface Claim {
  text: string;
  severity: ClaimSeverity;
  confidence: number;
  sources: ClaimSource[];
}

export type IssueSeverity = "minor" | "major" | "critical";

export type ComplianceRuleId =
  | "profanity"
  | "absolute_claims"
  | "unsupported_numeric"
  | "low_confidence_claim"
  | "unverified_claim"
  | "sensitive_domain";

export interface ComplianceIssue {
  ruleId: ComplianceRuleId;
  severity: IssueSeverity;
  message: string;
  suggestion: string;
}

export type ReviewStatus = "pass" | "flag" | "block";

export interface PostReview {
  status: ReviewStatus;
  issues: ComplianceIssue[];
  claims: Claim[];
}

export interface PostingTime {
  platform: Platform;
  localDatetime: string;
  rationale: string;
}

export interface ContentGap {
  platform: Platform;
  issue: string;
}

export interface QualityAnalysis {
  alignmentScores?: Partial<Record<Platform, number>>;
  crossPlatformSimilarity?: Record<string, number>;
  contentGaps?: ContentGap[];
  error?: string;
}

export interface WorkflowResult {
  sourceText: string;
  topicHint?: string;
  keyPoints: KeyPoint[];
  drafts: Partial<Record<Platform, PlatformPost>>;
  claims: Partial<Record<Platform, Claim[]>>;
  reviews: Partial<Record<Platform, PostReview>>;
  timings: PostingTime[];
  errors: string[];
  qualityAnalysis?: QualityAnalysis;
}

export interface WorkflowRunEntry {
  id: string;
  status: JobStatus;
  topicHint?: string;
  sourcePreview: string;
  result: WorkflowResult | null;
  error: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface HealthResponse {
  ok: boolean;
  service: string;
  features: {
    generation: AIProvider | "heuristic";
    searchProviders: SearchProvider[];
    complianceMode: ComplianceMode;
  };
}
