import {
  PLATFORM_RULES,
  type Claim,
  type ComplianceIssue,
  type ComplianceMode,
  type IssueSeverity,
  type PlatformPost,
  type PostReview,
  type ReviewStatus
} from "@postflow/shared";
import type { StageContext } from "../types/domain.js";
import { generateWithPolicy } from "./capabilities.js";
import { RemediationExhaustedError, ValidationError, errorMessage } from "./errors.js";
import { extractNumbers, fitToLength, normalizeWhitespace, truncateAtWord } from "./normalizers.js";
import { validatePost } from "./platformGenerationService.js";
import { renderPrompt } from "./promptTemplateService.js";

export const MAX_REMEDIATION_ATTEMPTS = 1;

const PROFANITY_TERMS = ["damn", "hell", "crap", "stupid", "idiot", "hate", "shit", "fuck", "bullshit", "wtf", "sucks"];

const ABSOLUTE_PATTERN = /\b(guarantee[sd]?|always|never|completely|entirely|impossible)\b|\b100\s?%/gi;

const CONDITIONAL_PATTERN =
  /\b(studies suggest|research suggests|reports? indicates?|data suggests|according to|estimated|estimates|reportedly|research indicates|surveys? suggests?)\b/i;

const ATTRIBUTION_PATTERN = /\b(according to|reported by|data from|source:|per the|via)\b/i;

const SENSITIVE_DOMAINS: Record<string, string[]> = {
  healthcare: ["health", "medical", "patient", "disease", "cure", "diagnos", "treatment", "clinical", "vaccine", "therapy", "drug"],
  finance: ["financial advice", "investment", "roi", "stock", "crypto", "trading", "returns", "loan", "interest rate"],
  legal: ["legal advice", "lawsuit", "attorney", "litigation", "liability", "court"]
};

const SOFTENING_REPLACEMENTS: Array<[RegExp, string]> = [
  [/\bguaranteed\b/gi, "expected"],
  [/\bguarantees\b/gi, "aims to deliver"],
  [/\bguarantee\b/gi, "aim to deliver"],
  [/\b100\s?%/g, "significant"],
  [/\balways\b/gi, "often"],
  [/\bnever\b/gi, "rarely"],
  [/\bcompletely\b/gi, "largely"],
  [/\bentirely\b/gi, "largely"],
  [/\bimpossible\b/gi, "unlikely"]
];

const ESCALATION: Record<IssueSeverity, IssueSeverity> = {
  minor: "major",
  major: "critical",
  critical: "critical"
};

export interface ReviewInput {
  attachedClaims: Claim[];
  runClaims: Claim[];
  mode: ComplianceMode;
}

function postText(post: PlatformPost): string {
  return [post.primaryText, ...(post.thread ?? [])].join("\n");
}

function profanityPattern(): RegExp {
  return new RegExp(`\\b(${PROFANITY_TERMS.join("|")})\\b`, "gi");
}

function distinctMatches(text: string, pattern: RegExp): string[] {
  return [...new Set((text.match(pattern) ?? []).map((item) => item.toLowerCase().replace(/\s+/g, "")))];
}

export function detectSensitiveDomains(text: string): string[] {
  const lower = text.toLowerCase();
  return Object.entries(SENSITIVE_DOMAINS)
    .filter(([, keywords]) => keywords.some((keyword) => new RegExp(`\\b${keyword}`).test(lower)))
    .map(([domain]) => domain);
}

export function evaluatePost(post: PlatformPost, input: ReviewInput): ComplianceIssue[] {
  const text = postText(post);
  const issues: ComplianceIssue[] = [];

  for (const term of distinctMatches(text, profanityPattern())) {
    issues.push({
      ruleId: "profanity",
      severity: "major",
      message: `Contains profanity: "${term}"`,
      suggestion: "Remove the word or replace it with neutral language."
    });
  }

  for (const term of distinctMatches(text, ABSOLUTE_PATTERN)) {
    issues.push({
      ruleId: "absolute_claims",
      severity: input.mode === "strict" ? "major" : "minor",
      message: `Absolute claim: "${term}"`,
      suggestion: "Qualify the statement, for example \"can help\" or \"in many cases\"."
    });
  }

  const supportedNumbers = new Set(
    input.runClaims.filter((claim) => claim.confidence >= 0.3).flatMap((claim) => extractNumbers(claim.text))
  );
  for (const value of extractNumbers(text)) {
    if (!supportedNumbers.has(value)) {
      issues.push({
        ruleId: "unsupported_numeric",
        severity: "major",
        message: `Figure "${value}" is not backed by a verified claim`,
        suggestion: "Cite a source for the figure or remove it."
      });
    }
  }

  const hedged = CONDITIONAL_PATTERN.test(text);
  const attributed = ATTRIBUTION_PATTERN.test(text);
  for (const claim of input.attachedClaims) {
    if (claim.confidence >= 0.3 && claim.confidence < 0.7 && !hedged) {
      issues.push({
        ruleId: "low_confidence_claim",
        severity: "minor",
        message: `Partially verified claim stated as fact: "${truncateAtWord(claim.text, 100)}"`,
        suggestion: "Use conditional phrasing such as \"studies suggest\" or \"reports indicate\"."
      });
    } else if (claim.confidence < 0.3 && !attributed) {
      issues.push({
        ruleId: "unverified_claim",
        severity: "minor",
        message: `Unverified claim: "${truncateAtWord(claim.text, 100)}"`,
        suggestion: "Attribute the claim to a named source or remove it."
      });
    }
  }

  if (input.mode === "strict") {
    const domains = detectSensitiveDomains(text);
    if (domains.length > 0) {
      for (const issue of issues) {
        issue.severity = ESCALATION[issue.severity];
      }
      issues.push({
        ruleId: "sensitive_domain",
        severity: "minor",
        message: `Touches a regulated topic (${domains.join(", ")})`,
        suggestion: "Have a qualified reviewer approve the post before publishing."
      });
    }
  }

  return issues;
}

export function deriveStatus(issues: ComplianceIssue[], mode: ComplianceMode): ReviewStatus {
  if (issues.some((issue) => issue.severity === "critical")) {
    return "block";
  }
  if (issues.some((issue) => issue.severity === "major")) {
    return mode === "strict" ? "block" : "flag";
  }
  return issues.length > 0 ? "flag" : "pass";
}

function matchCase(source: string, replacement: string): string {
  const first = source.charAt(0);
  if (first && first === first.toUpperCase() && first !== first.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

/** Deterministic rewrite: qualifies absolute language and drops profanity. */
export function softenText(text: string): string {
  let result = text;
  for (const [pattern, replacement] of SOFTENING_REPLACEMENTS) {
    result = result.replace(pattern, (match) => matchCase(match, replacement));
  }
  result = result.replace(profanityPattern(), "");
  return normalizeWhitespace(result.replace(/ +([,.!?])/g, "$1").replace(/ {2,}/g, " "));
}

function revisionViolations(post: PlatformPost, text: string): string[] {
  return validatePost({ ...post, primaryText: text });
}

/**
 * Proposes a replacement primary text, or null when no revision satisfies the
 * platform rules and the current text has to stay.
 */
async function remediateText(
  post: PlatformPost,
  issues: ComplianceIssue[],
  ctx: StageContext
): Promise<{ text: string; violations: string[] } | null> {
  const rules = PLATFORM_RULES[post.platform];

  try {
    const revised = await generateWithPolicy(
      ctx.generation,
      ctx.policies.generation,
      {
        prompt: renderPrompt("remediation", {
          platform_label: post.platform,
          min_chars: String(rules.minChars),
          max_chars: String(rules.maxChars),
          issues: issues.map((issue) => `- [${issue.severity}] ${issue.message}. ${issue.suggestion}`).join("\n"),
          post: post.primaryText
        }),
        responseFormat: "text",
        temperature: 0.3
      },
      ctx.signal
    );
    const cleaned = normalizeWhitespace(revised.replace(/^["'`]+|["'`]+$/g, ""));
    const violations = cleaned ? revisionViolations(post, cleaned) : ["revision is empty"];
    if (violations.length === 0) {
      return { text: cleaned, violations };
    }
    console.warn(
      `[compliance] revision for ${post.platform} rejected (${violations.join("; ")}), using deterministic softening`
    );
  } catch (error) {
    if (ctx.signal?.aborted) {
      throw error;
    }
    console.warn(`[compliance] revision for ${post.platform} failed: ${errorMessage(error)}`);
  }

  const softened = fitToLength(softenText(post.primaryText), rules.maxChars);
  const violations = revisionViolations(post, softened);
  const current = validatePost(post);
  if (violations.length === 0 || (current.length > 0 && violations.length <= current.length)) {
    return { text: softened, violations };
  }

  ctx.recordError(`${new ValidationError(post.platform, violations).message}; revision discarded, original text kept`);
  return null;
}

/**
 * Reviews one draft and runs the bounded remediation cycle. A draft that is
 * still blocked after remediation is downgraded to flag for manual review.
 */
export async function reviewPost(post: PlatformPost, input: ReviewInput, ctx: StageContext): Promise<PostReview> {
  const trace: string[] = [];
  let issues = evaluatePost(post, input);
  let status = deriveStatus(issues, input.mode);
  trace.push(`reviewed:${status}`);

  for (let attempt = 0; status === "block" && attempt < MAX_REMEDIATION_ATTEMPTS; attempt += 1) {
    const revision = await remediateText(post, issues, ctx);
    if (!revision) {
      trace.push("remediation:rejected");
      break;
    }
    post.primaryText = revision.text;
    post.metadata.remediated = true;
    post.metadata.validation = revision.violations.length === 0 ? "passed" : "failed";
    post.notes = `Revised automatically to resolve: ${issues.map((issue) => issue.ruleId).join(", ")}`;
    trace.push("remediated");

    issues = evaluatePost(post, input);
    status = deriveStatus(issues, input.mode);
    trace.push(`reviewed:${status}`);
  }

  if (status === "block") {
    const blocking = issues.filter((issue) => issue.severity !== "minor").length;
    ctx.recordError(new RemediationExhaustedError(post.platform, blocking).message);
    status = "flag";
    trace.push("downgraded:flag");
  }

  post.metadata.complianceTrace = trace;
  return { status, issues, claims: input.attachedClaims };
}
