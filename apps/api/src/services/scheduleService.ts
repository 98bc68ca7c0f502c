import { TZDate } from "@date-fns/tz";
import { addDays, addMinutes, format, set } from "date-fns";
import {
  PLATFORMS,
  type Claim,
  type Platform,
  type PlatformPost,
  type PostReview,
  type PostingTime
} from "@postflow/shared";
import { config } from "../config.js";
import { detectSensitiveDomains } from "./complianceService.js";

export type ContentType = "breaking_news" | "professional" | "visual_lifestyle" | "analytical" | "generic";
export type AudienceRegion = "us" | "europe" | "asia" | "nordics" | "india";

const ISO_WITH_OFFSET = "yyyy-MM-dd'T'HH:mm:ssxxx";
const BREAKING_DELAY_MINUTES = 5;
const SEARCH_HORIZON_DAYS = 14;

export const REGION_TIMEZONES: Record<AudienceRegion, string> = {
  us: "America/New_York",
  europe: "Europe/London",
  asia: "Asia/Singapore",
  nordics: "Europe/Copenhagen",
  india: "Asia/Kolkata"
};

// Checked in order; the first region that matches wins.
const REGION_PATTERNS: Array<[AudienceRegion, RegExp]> = [
  ["nordics", /\b(nordics?|scandinavian?|denmark|danish|sweden|swedish|norway|norwegian|finland|copenhagen|stockholm|oslo)\b/i],
  ["india", /\b(india|indian|mumbai|bangalore|bengaluru|delhi)\b/i],
  ["asia", /\b(asia|asian|apac|singapore|hong kong|japan|china|korea|southeast asia)\b/i],
  ["europe", /\b(europe|european|eu|uk|united kingdom|britain|london|germany|france|paris|berlin)\b/i],
  ["us", /\b(united states|u\.s\.|usa|american?|new york|california|silicon valley|washington)\b/i]
];

const CONTENT_CUES: Record<Exclude<ContentType, "generic">, RegExp> = {
  breaking_news: /\b(breaking|just announced|just released|just in|happening now|developing story|urgent update)\b/gi,
  analytical: /\b(data|study|studies|research|survey|analysis|report|statistics|percent|findings|trend)\b|%/gi,
  professional: /\b(career|leadership|b2b|hiring|industry|strategy|enterprise|workplace|management|executives?|professionals?)\b/gi,
  visual_lifestyle: /\b(travel|food|fashion|photo|photography|design|lifestyle|wellness|fitness|recipe|style|beauty)\b/gi
};

const CONTENT_TYPE_LABELS: Record<ContentType, string> = {
  breaking_news: "Breaking news",
  professional: "Professional",
  visual_lifestyle: "Visual/lifestyle",
  analytical: "Analytical",
  generic: "General"
};

const WEEKDAYS = [1, 2, 3, 4, 5];

/** Slots per platform, keyed by day of week (0 = Sunday). */
function slotsFor(platform: Platform, dayOfWeek: number): string[] {
  const weekday = WEEKDAYS.includes(dayOfWeek);
  switch (platform) {
    case "x":
      return weekday ? ["09:00", "12:00", "13:00", "14:00", "15:00"] : ["10:00", "14:00"];
    case "linkedin":
      return dayOfWeek >= 2 && dayOfWeek <= 4 ? ["08:00", "09:00", "12:00", "17:00"] : [];
    case "instagram":
      return weekday ? ["18:00", "19:00", "20:00", "21:00"] : ["10:00", "11:00"];
  }
}

const PREFERRED_SLOTS: Record<Exclude<ContentType, "breaking_news">, Record<Platform, string[]>> = {
  professional: { x: ["09:00", "10:00"], linkedin: ["08:00", "09:00"], instagram: ["18:00", "10:00"] },
  analytical: { x: ["12:00", "14:00"], linkedin: ["12:00", "09:00"], instagram: ["19:00", "11:00"] },
  visual_lifestyle: { x: ["13:00", "14:00"], linkedin: ["12:00"], instagram: ["19:00", "11:00"] },
  generic: { x: ["12:00", "14:00"], linkedin: ["09:00"], instagram: ["18:00", "10:00"] }
};

const SLOT_REASONS: Record<string, string> = {
  "08:00": "Before the workday starts",
  "09:00": "Morning commute and first feed check",
  "10:00": "Relaxed morning browsing",
  "11:00": "Late-morning browsing",
  "12:00": "Lunch break browsing peak",
  "13:00": "Early-afternoon engagement window",
  "14:00": "Mid-afternoon engagement peak",
  "15:00": "Afternoon break scrolling",
  "17:00": "End-of-workday catch-up",
  "18:00": "Evening leisure browsing",
  "19:00": "Prime evening engagement",
  "20:00": "Late-evening browsing",
  "21:00": "Wind-down scrolling before bed"
};

export interface ScheduleInput {
  drafts: Partial<Record<Platform, PlatformPost>>;
  claims: Partial<Record<Platform, Claim[]>>;
  reviews: Partial<Record<Platform, PostReview>>;
  sourceText: string;
  topicHint?: string;
  now: Date;
  staggerWindowMinutes?: number;
  defaultTimeZone?: string;
}

interface PlannedSlot {
  platform: Platform;
  at: TZDate;
  reason: string;
  staggered: boolean;
}

export function classifyContentType(text: string): ContentType {
  if ((text.match(CONTENT_CUES.breaking_news) ?? []).length > 0) {
    return "breaking_news";
  }

  const ranked: Array<Exclude<ContentType, "generic" | "breaking_news">> = ["analytical", "professional", "visual_lifestyle"];
  let best: ContentType = "generic";
  let bestCount = 0;
  for (const type of ranked) {
    const count = (text.match(CONTENT_CUES[type]) ?? []).length;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

export function detectAudienceRegion(text: string): AudienceRegion | null {
  return REGION_PATTERNS.find(([, pattern]) => pattern.test(text))?.[0] ?? null;
}

function toClock(hhmm: string): { hours: number; minutes: number } {
  const [hours, minutes] = hhmm.split(":").map(Number);
  return { hours: hours ?? 0, minutes: minutes ?? 0 };
}

function nextSlot(
  platform: Platform,
  contentType: Exclude<ContentType, "breaking_news">,
  nowZoned: TZDate
): { at: TZDate; reason: string } | null {
  for (let offset = 0; offset <= SEARCH_HORIZON_DAYS; offset += 1) {
    const day = addDays(nowZoned, offset);
    const slots = slotsFor(platform, day.getDay());
    if (slots.length === 0) {
      continue;
    }

    const time = PREFERRED_SLOTS[contentType][platform].find((item) => slots.includes(item)) ?? slots[0] ?? "12:00";
    const at = set(day, { ...toClock(time), seconds: 0, milliseconds: 0 });
    if (at.getTime() > nowZoned.getTime()) {
      return { at, reason: `${SLOT_REASONS[time] ?? "Engagement window"} (${format(at, "EEEE")} ${time})` };
    }
  }
  return null;
}

function byTimeThenPlatform(a: { at: Date; platform: Platform }, b: { at: Date; platform: Platform }): number {
  return a.at.getTime() - b.at.getTime() || PLATFORMS.indexOf(a.platform) - PLATFORMS.indexOf(b.platform);
}

/** Pushes any slot closer than the window to its predecessor later by the window. */
export function staggerSlots<T extends { at: TZDate; staggered: boolean; platform: Platform }>(
  slots: T[],
  windowMinutes: number
): T[] {
  const ordered = [...slots];
  const windowMs = windowMinutes * 60_000;
  const maxPasses = ordered.length * ordered.length + 1;

  for (let pass = 0; pass < maxPasses; pass += 1) {
    ordered.sort(byTimeThenPlatform);
    let changed = false;
    for (let index = 1; index < ordered.length; index += 1) {
      const previous = ordered[index - 1];
      const current = ordered[index];
      if (!previous || !current) {
        continue;
      }
      if (current.at.getTime() - previous.at.getTime() < windowMs) {
        current.at = addMinutes(current.at, windowMinutes);
        current.staggered = true;
        changed = true;
      }
    }
    if (!changed) {
      break;
    }
  }
  return ordered;
}

function buildRationale(
  slot: PlannedSlot,
  contentType: ContentType,
  timeZone: string,
  input: ScheduleInput,
  regulatedDomains: string[],
  windowMinutes: number
): string {
  const parts = [`${CONTENT_TYPE_LABELS[contentType]} content: ${slot.reason}, ${timeZone}.`];
  if (slot.staggered) {
    parts.push(`Shifted to keep ${windowMinutes} minutes between platforms.`);
  }
  if (input.reviews[slot.platform]?.status === "flag") {
    parts.push("Flagged by compliance review; publish after manual approval.");
  }
  if ((input.claims[slot.platform] ?? []).some((claim) => claim.confidence < 0.3)) {
    parts.push("Contains claims below 0.3 confidence; verify before posting.");
  }
  if (regulatedDomains.length > 0) {
    parts.push(`Regulated topic (${regulatedDomains.join(", ")}): route through compliance sign-off.`);
  }
  return parts.join(" ");
}

/**
 * Recommends one posting time per draft. Pure: the same input, including
 * `now`, always yields the same output.
 */
export function suggestPostingTimes(input: ScheduleInput): PostingTime[] {
  const windowMinutes = input.staggerWindowMinutes ?? config.scheduling.staggerWindowMinutes;
  const classificationText = `${input.topicHint ?? ""}\n${input.sourceText}`;
  const contentType = classifyContentType(classificationText);
  const region = detectAudienceRegion(classificationText);
  const timeZone = region ? REGION_TIMEZONES[region] : input.defaultTimeZone ?? config.scheduling.defaultTimeZone;
  const nowZoned = new TZDate(input.now.getTime(), timeZone);
  const regulatedDomains = detectSensitiveDomains(classificationText);

  const planned: PlannedSlot[] = [];
  for (const platform of PLATFORMS) {
    if (!input.drafts[platform]) {
      continue;
    }

    if (contentType === "breaking_news") {
      planned.push({
        platform,
        at: addMinutes(nowZoned, BREAKING_DELAY_MINUTES),
        reason: "publish immediately while the story is fresh",
        staggered: false
      });
      continue;
    }

    const slot = nextSlot(platform, contentType, nowZoned);
    if (slot) {
      planned.push({ platform, at: slot.at, reason: slot.reason, staggered: false });
    }
  }

  return staggerSlots(planned, windowMinutes)
    .sort(byTimeThenPlatform)
    .map((slot) => ({
      platform: slot.platform,
      localDatetime: format(slot.at, ISO_WITH_OFFSET),
      rationale: buildRationale(slot, contentType, timeZone, input, regulatedDomains, windowMinutes)
    }));
}
