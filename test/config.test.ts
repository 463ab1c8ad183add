import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseCliArgs, parseFormats, resolveConfig } from "../src/config.js";
import type { ParsedArgs } from "../src/config.js";
import { ConfigurationError } from "../src/types.js";
import type { Warning } from "../src/types.js";

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    goals: [],
    seeds: [],
    competitors: [],
    regions: [],
    formats: [],
    quiet: false,
    verbose: false,
    dryRun: false,
    help: false,
    ...overrides,
  };
}

describe("parseCliArgs", () => {
  it("reads flags, aliases and lists", async () => {
    const parsed = await parseCliArgs([
      "generate",
      "--brand", "Acme",
      "--niche", "smart home",
      "--goal", "brand_awareness,lead_generation",
      "--seed", "Plug, Mini",
      "--seed", "Hub",
      "-f", "json,md",
      "-q",
      "--timeout", "5000",
    ]);

    expect(parsed.command).toBe("generate");
    expect(parsed.brand).toBe("Acme");
    expect(parsed.niche).toBe("smart home");
    expect(parsed.goals).toEqual(["brand_awareness", "lead_generation"]);
    // Seeds are never split on commas
    expect(parsed.seeds).toEqual(["Plug, Mini", "Hub"]);
    expect(parsed.formats).toEqual(["json", "md"]);
    expect(parsed.quiet).toBe(true);
    expect(parsed.timeoutMs).toBe(5000);
    expect(parsed.dryRun).toBe(false);
  });

  it("rejects a non-numeric timeout", async () => {
    await expect(parseCliArgs(["--timeout", "abc"])).rejects.toThrow('--timeout must be a positive integer, got "abc"');
  });
});

describe("parseFormats", () => {
  it("splits, aliases and deduplicates", () => {
    expect(parseFormats(["json, MD", "csv", "json"])).toEqual(["json", "markdown", "csv"]);
  });

  it("defaults to json", () => {
    expect(parseFormats([])).toEqual(["json"]);
  });

  it("rejects unknown formats", () => {
    expect(() => parseFormats(["pdf"])).toThrow(ConfigurationError);
    expect(() => parseFormats(["pdf"])).toThrow('Unknown export format "pdf"');
  });
});

describe("resolveConfig", () => {
  let dir: string;
  let configPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "content-strategy-"));
    configPath = join(dir, "strategy.json");
    writeFileSync(
      configPath,
      JSON.stringify({
        strategy: {
          brandName: "Acme",
          primaryNiche: "smart home",
          businessGoals: ["brand_awareness"],
          seedEntities: ["Smart Plug"],
        },
        output: { formats: ["csv"], dir: "out" },
        sitemap: { timeoutMs: 2000 },
        extensions: {
          fanoutPatterns: [{ group: "versus", intent: "commercial", priority: 2, templates: ["{entity} vs {brand}"] }],
        },
      }),
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("layers CLI args over the config file over defaults", () => {
    const config = resolveConfig(args({ config: configPath, brand: "Acme Labs" }));

    expect(config.strategy).toEqual({
      brandName: "Acme Labs",
      primaryNiche: "smart home",
      businessGoals: ["brand_awareness"],
      sourceMode: "seed",
      seedEntities: ["Smart Plug"],
      competitors: [],
      targetRegions: [],
    });
    expect(config.output).toEqual({ formats: ["csv"], dir: "out" });
    expect(config.sitemap).toEqual({ timeoutMs: 2000, maxChildSitemaps: 10, exclude: [] });
    expect(config.extensions.fanoutPatterns.map((p) => p.id)).toEqual(["versus:1"]);
    expect(config.extensions.kpis).toEqual([]);
    expect(config.verbose).toBe(false);
  });

  it("infers hybrid mode from seeds plus a sitemap", () => {
    const config = resolveConfig(args({ config: configPath, sitemap: "https://example.com/sitemap.xml", formats: ["md"] }));
    expect(config.strategy.sourceMode).toBe("hybrid");
    expect(config.strategy.sitemapUrl).toBe("https://example.com/sitemap.xml");
    expect(config.output.formats).toEqual(["markdown"]);
  });

  it("warns about a missing config file and falls back to CLI values", () => {
    const warnings: Warning[] = [];
    const missing = join(dir, "missing.json");
    const config = resolveConfig(
      args({ config: missing, brand: "Acme", niche: "garden", goals: ["thought_leadership"], seeds: ["Compost"] }),
      warnings,
    );
    expect(warnings).toEqual([{ level: "warn", module: "config", message: `Config file not found: ${missing}` }]);
    expect(config.strategy.primaryNiche).toBe("garden");
    expect(config.output.formats).toEqual(["json"]);
  });

  it("rejects an invalid merged configuration", () => {
    const missing = join(dir, "missing.json");
    expect(() => resolveConfig(args({ config: missing, brand: "Acme" }))).toThrow(ConfigurationError);
  });
});
