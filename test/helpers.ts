// Shared builders for the test suites.

import type { Entity, EntityType, ResolvedConfig, StrategyConfig } from "../src/types.js";
import type { EntityCandidate, SitemapAnalysis, SitemapSource } from "../src/sitemap-parser.js";

export const FIXED_NOW = () => new Date("2024-05-01T12:00:00.000Z");

export function strategy(overrides: Partial<StrategyConfig> = {}): StrategyConfig {
  return {
    brandName: "Acme",
    primaryNiche: "smart home",
    businessGoals: ["brand_awareness"],
    sourceMode: "seed",
    seedEntities: ["Acme Widget", "Acme Gadget"],
    competitors: [],
    targetRegions: [],
    ...overrides,
  };
}

export function resolved(overrides: Partial<StrategyConfig> = {}): ResolvedConfig {
  return {
    strategy: strategy(overrides),
    output: { formats: ["json"], dir: "." },
    sitemap: { timeoutMs: 1000, maxChildSitemaps: 10, exclude: [] },
    extensions: { fanoutPatterns: [], kpis: [] },
    verbose: false,
  };
}

export function entity(id: string, name: string, type: EntityType, extra: Partial<Entity> = {}): Entity {
  return {
    id,
    name,
    type,
    origin: "seed",
    aliases: [],
    centrality: 0,
    commercialValue: 0.5,
    sourceUrls: [],
    categories: [],
    ...extra,
  };
}

/** A sitemap source that hands back fixed candidates without any I/O. */
export function stubSitemap(candidates: EntityCandidate[]): SitemapSource & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async load(url: string): Promise<SitemapAnalysis> {
      calls.push(url);
      return { baseUrl: "https://example.com", urls: [], categories: {}, contentTypes: {}, urlPatterns: [], candidates };
    },
  };
}

/** A fetch stand-in serving fixed bodies by URL; numbers are HTTP error statuses. */
export function fakeFetch(pages: Record<string, string | number>): typeof fetch {
  return async (input: string | URL | Request): Promise<Response> => {
    const body = pages[String(input)];
    if (body === undefined) return new Response("", { status: 404 });
    if (typeof body === "number") return new Response("", { status: body });
    return new Response(body, { status: 200 });
  };
}
