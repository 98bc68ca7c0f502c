export type PromptTask =
  | "key_points"
  | "key_points_strict"
  | "platform_post"
  | "claims"
  | "remediation";

const PROMPT_TEMPLATES: Record<PromptTask, string> = {
  key_points: [
    "Read the document below and pull out its 5 to 8 most important points.",
    "Each point is one self-contained sentence. Keep numbers exactly as written.",
    "Score each point's importance between 0 and 1.",
    'Return JSON only: { "key_points": [ { "text": "string", "importance": 0.0 } ] }',
    "{{topic_line}}",
    "DOCUMENT:",
    "{{source_text}}"
  ].join("\n"),
  key_points_strict: [
    "Your previous answer could not be parsed.",
    "Return a single JSON object and nothing else. No markdown, no commentary.",
    'Exact shape: { "key_points": [ { "text": "string", "importance": 0.5 } ] } with 5 to 8 entries.',
    "importance must be a number between 0 and 1.",
    "DOCUMENT:",
    "{{source_text}}"
  ].join("\n"),
  platform_post: [
    "Write a {{platform_label}} post from the key points below.",
    "Rules:",
    "{{platform_rules}}",
    "- Stay faithful to the key points. Do not add statistics that are not in them.",
    "- Only mention @handles of organisations named in the key points.",
    "{{org_line}}",
    "{{adjustment}}",
    'Return JSON only: { "primary_text": "string", "thread": ["string"], "hashtags": ["#tag"], "mentions": ["@handle"] }',
    "{{topic_line}}",
    "KEY POINTS:",
    "{{key_points}}"
  ].join("\n"),
  claims: [
    "List the factual assertions in the text below that a reader could verify:",
    "statistics, dates, named studies, rankings and attributed statements.",
    "Skip opinions and calls to action. Copy each assertion close to its original wording.",
    'Return JSON only: { "claims": [ { "text": "string", "severity": "low|medium|high" } ] }',
    "TEXT:",
    "{{text}}"
  ].join("\n"),
  remediation: [
    "Revise this {{platform_label}} post so it resolves every issue listed.",
    "Keep the message, tone and any verified facts. Length must stay between {{min_chars}} and {{max_chars}} characters.",
    "ISSUES:",
    "{{issues}}",
    "POST:",
    "{{post}}",
    "Return only the revised post text."
  ].join("\n")
};

function renderTemplate(template: string, variables: Record<string, string>): string {
  return template
    .replace(/\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g, (_full, key: string) => variables[key] ?? "")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

export function renderPrompt(task: PromptTask, variables: Record<string, string>): string {
  return renderTemplate(PROMPT_TEMPLATES[task], variables);
}
