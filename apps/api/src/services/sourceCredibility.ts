import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { config } from "../config.js";

const sourceDomainsSchema = z.object({
  unknownScore: z.number().min(0).max(1),
  categories: z.array(
    z.object({
      name: z.string(),
      score: z.number().min(0).max(1),
      suffixes: z.array(z.string()),
      domains: z.array(z.string())
    })
  )
});

type SourceDomains = z.infer<typeof sourceDomainsSchema>;

export interface SourceCategory {
  category: string;
  credibility: number;
}

let cachedDomains: SourceDomains | null = null;

function loadSourceDomains(): SourceDomains {
  if (!cachedDomains) {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(config.dataDir, "sourceDomains.json"), "utf8"));
    cachedDomains = sourceDomainsSchema.parse(raw);
  }
  return cachedDomains;
}

function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

export function classifySource(url: string): SourceCategory {
  const data = loadSourceDomains();
  const host = hostnameOf(url);
  if (!host) {
    return { category: "unknown", credibility: data.unknownScore };
  }

  for (const category of data.categories) {
    const bySuffix = category.suffixes.some((suffix) => host.endsWith(suffix));
    const byDomain = category.domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
    if (bySuffix || byDomain) {
      return { category: category.name, credibility: category.score };
    }
  }

  return { category: "unknown", credibility: data.unknownScore };
}

export function credibilityScore(url: string): number {
  return classifySource(url).credibility;
}
