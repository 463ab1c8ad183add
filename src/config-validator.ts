// src/config-validator.ts — Brand configuration validation
// Runs before any stage. Collects every issue, then rejects once with all of them.

import type { BusinessGoal, ConfigIssue, SourceMode, StrategyConfig, Warning } from "./types.js";
import { BUSINESS_GOALS, ConfigurationError, SOURCE_MODES } from "./types.js";
import { isOneOf, isRecord } from "./catalog.js";
import { normalizeKey } from "./text.js";

const MAX_RECOMMENDED_SEEDS = 50;

/**
 * Validate an untrusted brand configuration.
 * Goal and source-mode tags are accepted in any case; list entries are
 * trimmed and blank entries dropped.
 * @throws ConfigurationError listing every problem found
 */
export function validateStrategyConfig(
  input: unknown,
  warnings: Warning[] = [],
): StrategyConfig {
  const issues: ConfigIssue[] = [];
  if (!isRecord(input)) {
    throw new ConfigurationError("Invalid configuration: expected an object", [
      { field: "config", message: "expected an object" },
    ]);
  }

  const brandName = readText(input.brandName, "brandName", issues);
  const primaryNiche = readText(input.primaryNiche, "primaryNiche", issues);

  // Goals
  const businessGoals: BusinessGoal[] = [];
  if (!Array.isArray(input.businessGoals) || input.businessGoals.length === 0) {
    issues.push({ field: "businessGoals", message: "at least one business goal is required" });
  } else {
    for (const raw of input.businessGoals) {
      const goal = typeof raw === "string" ? raw.trim().toLowerCase() : raw;
      if (!isOneOf(goal, BUSINESS_GOALS)) {
        issues.push({
          field: "businessGoals",
          message: `unknown goal ${JSON.stringify(raw)} (expected one of ${BUSINESS_GOALS.join(", ")})`,
        });
      } else if (!businessGoals.includes(goal)) {
        businessGoals.push(goal);
      }
    }
  }

  // Source mode
  const rawMode = typeof input.sourceMode === "string" ? input.sourceMode.trim().toLowerCase() : input.sourceMode;
  let sourceMode: SourceMode = "seed";
  if (isOneOf(rawMode, SOURCE_MODES)) {
    sourceMode = rawMode;
  } else {
    issues.push({
      field: "sourceMode",
      message: `unknown source mode ${JSON.stringify(input.sourceMode)} (expected one of ${SOURCE_MODES.join(", ")})`,
    });
  }
  const needsSitemap = sourceMode === "sitemap" || sourceMode === "hybrid";
  const needsSeeds = sourceMode === "seed" || sourceMode === "hybrid";

  // Sitemap URL
  const sitemapUrl = typeof input.sitemapUrl === "string" ? input.sitemapUrl.trim() : undefined;
  if (input.sitemapUrl !== undefined && input.sitemapUrl !== null && typeof input.sitemapUrl !== "string") {
    issues.push({ field: "sitemapUrl", message: "must be a string" });
  }
  if (needsSitemap) {
    if (!sitemapUrl) {
      issues.push({ field: "sitemapUrl", message: `required when sourceMode is "${sourceMode}"` });
    } else if (!isHttpUrl(sitemapUrl)) {
      issues.push({ field: "sitemapUrl", message: `not a well-formed http(s) URL: ${sitemapUrl}` });
    } else if (!looksLikeSitemap(sitemapUrl)) {
      warnings.push({
        level: "warn",
        module: "config-validator",
        message: `Sitemap URL does not look like a sitemap (expected "sitemap" or ".xml"): ${sitemapUrl}`,
      });
    }
  } else if (sitemapUrl) {
    issues.push({ field: "sitemapUrl", message: `must be omitted when sourceMode is "${sourceMode}"` });
  }

  // Seeds
  const seedEntities = readList(input.seedEntities, "seedEntities", issues);
  if (needsSeeds && seedEntities.length === 0) {
    issues.push({ field: "seedEntities", message: `at least one non-blank seed entity is required when sourceMode is "${sourceMode}"` });
  }
  if (!needsSeeds && seedEntities.length > 0) {
    issues.push({ field: "seedEntities", message: `must be empty when sourceMode is "${sourceMode}"` });
  }
  if (needsSeeds && seedEntities.length > MAX_RECOMMENDED_SEEDS) {
    warnings.push({
      level: "warn",
      module: "config-validator",
      message: `${seedEntities.length} seed entities given; more than ${MAX_RECOMMENDED_SEEDS} makes the framework hard to act on`,
    });
  }
  const duplicates = findDuplicates(seedEntities);
  if (duplicates.length > 0) {
    warnings.push({
      level: "info",
      module: "config-validator",
      message: `Duplicate seed entities will be merged: ${duplicates.join(", ")}`,
    });
  }

  const competitors = readList(input.competitors, "competitors", issues);
  const targetRegions = readList(input.targetRegions, "targetRegions", issues);

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  const config: StrategyConfig = {
    brandName,
    primaryNiche,
    businessGoals,
    sourceMode,
    seedEntities,
    competitors,
    targetRegions,
  };
  if (needsSitemap && sitemapUrl) config.sitemapUrl = sitemapUrl;
  return config;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function readText(value: unknown, field: string, issues: ConfigIssue[]): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    issues.push({ field, message: "must be a non-blank string" });
    return "";
  }
  return value.replace(/\s+/g, " ").trim();
}

function readList(value: unknown, field: string, issues: ConfigIssue[]): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    issues.push({ field, message: "must be a list of strings" });
    return [];
  }
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      issues.push({ field, message: `entries must be strings, got ${JSON.stringify(entry)}` });
      continue;
    }
    const trimmed = entry.trim();
    if (trimmed.length > 0) out.push(trimmed);
  }
  return out;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
  } catch {
    return false;
  }
}

function looksLikeSitemap(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes("sitemap") || lower.endsWith(".xml") || lower.endsWith(".xml.gz");
}

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dupes: string[] = [];
  for (const name of names) {
    const key = normalizeKey(name);
    if (seen.has(key) && !dupes.includes(name)) dupes.push(name);
    seen.add(key);
  }
  return dupes;
}
