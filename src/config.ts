// src/config.ts — Config Resolver
// Resolution order: built-in defaults ← config file ← CLI args (mri).

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { ExportFormat, FanoutPattern, KpiTemplate, ResolvedConfig, Warning } from "./types.js";
import { ConfigurationError, EXPORT_FORMATS } from "./types.js";
import { isOneOf, isRecord, isStringArray, parseFanoutPatterns, parseKpiTemplates } from "./catalog.js";
import { validateStrategyConfig } from "./config-validator.js";
import { DEFAULT_SITEMAP_OPTIONS } from "./sitemap-parser.js";

export const CONFIG_FILENAME = "strategy.config.json";
export const PACKAGE_JSON_KEY = "contentStrategy";

export interface ParsedArgs {
  command?: string;
  brand?: string;
  niche?: string;
  goals: string[];
  mode?: string;
  seeds: string[];
  sitemap?: string;
  competitors: string[];
  regions: string[];
  formats: string[];
  output?: string;
  config?: string;
  timeoutMs?: number;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

const DEFAULTS: Omit<ResolvedConfig, "strategy"> = {
  output: {
    formats: ["json"],
    dir: ".",
  },
  sitemap: {
    timeoutMs: DEFAULT_SITEMAP_OPTIONS.timeoutMs,
    maxChildSitemaps: DEFAULT_SITEMAP_OPTIONS.maxChildSitemaps,
    exclude: [],
  },
  extensions: {
    fanoutPatterns: [],
    kpis: [],
  },
  verbose: false,
};

/**
 * Resolve config from CLI args, config file, and defaults.
 * @throws ConfigurationError when the merged brand configuration is invalid
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings) ?? {};
  const fileStrategy = section(fileConfig, "strategy");
  const fileOutput = section(fileConfig, "output");
  const fileSitemap = section(fileConfig, "sitemap");
  const fileExtensions = section(fileConfig, "extensions");

  // Merge: defaults ← fileConfig ← CLI args
  const seeds = args.seeds.length > 0 ? args.seeds : fileStrategy.seedEntities;
  const sitemapUrl = args.sitemap ?? fileStrategy.sitemapUrl;
  const rawStrategy = {
    ...fileStrategy,
    brandName: args.brand ?? fileStrategy.brandName,
    primaryNiche: args.niche ?? fileStrategy.primaryNiche,
    businessGoals: args.goals.length > 0 ? args.goals : fileStrategy.businessGoals,
    sourceMode: args.mode ?? fileStrategy.sourceMode ?? inferSourceMode(seeds, sitemapUrl),
    sitemapUrl,
    seedEntities: seeds,
    competitors: args.competitors.length > 0 ? args.competitors : fileStrategy.competitors,
    targetRegions: args.regions.length > 0 ? args.regions : fileStrategy.targetRegions,
  };
  // Validation warnings are reported again by runPipeline; only errors matter here.
  const strategy = validateStrategyConfig(rawStrategy, []);

  const formats = args.formats.length > 0 ? args.formats : readStrings(fileOutput.formats, "output.formats") ?? DEFAULTS.output.formats;
  const timeoutMs = args.timeoutMs ?? readPositiveInt(fileSitemap.timeoutMs, "sitemap.timeoutMs") ?? DEFAULTS.sitemap.timeoutMs;

  return {
    strategy,
    output: {
      formats: parseFormats(formats),
      dir: args.output ?? (typeof fileOutput.dir === "string" ? fileOutput.dir : DEFAULTS.output.dir),
    },
    sitemap: {
      timeoutMs,
      maxChildSitemaps:
        readPositiveInt(fileSitemap.maxChildSitemaps, "sitemap.maxChildSitemaps") ?? DEFAULTS.sitemap.maxChildSitemaps,
      exclude: readStrings(fileSitemap.exclude, "sitemap.exclude") ?? DEFAULTS.sitemap.exclude,
    },
    extensions: {
      fanoutPatterns: readFanoutExtensions(fileExtensions.fanoutPatterns),
      kpis: readKpiExtensions(fileExtensions.kpis),
    },
    verbose: args.verbose,
  };
}

/**
 * Split a comma-separated or repeated `--format` value into export formats.
 * @throws ConfigurationError on an unknown format
 */
export function parseFormats(values: string[]): ExportFormat[] {
  const formats: ExportFormat[] = [];
  for (const raw of values.flatMap((v) => v.split(","))) {
    const value = raw.trim().toLowerCase();
    if (value === "") continue;
    const format = value === "md" ? "markdown" : value;
    if (!isOneOf(format, EXPORT_FORMATS)) {
      throw new ConfigurationError(
        `Unknown export format "${raw.trim()}" (expected one of ${EXPORT_FORMATS.join(", ")})`,
        [{ field: "output.formats", message: `unknown format "${raw.trim()}"` }],
      );
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats.length > 0 ? formats : [...DEFAULTS.output.formats];
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  return isRecord(value) ? value : {};
}

function inferSourceMode(seeds: unknown, sitemapUrl: unknown): string {
  const hasSeeds = Array.isArray(seeds) && seeds.length > 0;
  const hasSitemap = typeof sitemapUrl === "string" && sitemapUrl.length > 0;
  if (hasSeeds && hasSitemap) return "hybrid";
  return hasSitemap ? "sitemap" : "seed";
}

function readStrings(value: unknown, field: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw new ConfigurationError(`Invalid config file: ${field} must be a list of strings`, [
      { field, message: "must be a list of strings" },
    ]);
  }
  return value;
}

function readPositiveInt(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Invalid config file: ${field} must be a positive integer`, [
      { field, message: "must be a positive integer" },
    ]);
  }
  return value;
}

function readFanoutExtensions(value: unknown): FanoutPattern[] {
  return value === undefined ? [] : parseFanoutPatterns(value, "extensions.fanoutPatterns");
}

function readKpiExtensions(value: unknown): KpiTemplate[] {
  return value === undefined ? [] : parseKpiTemplates(value, "extensions.kpis");
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
): Record<string, unknown> | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const cwd = process.cwd();

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // contentStrategy key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      const embedded = isRecord(pkg) ? pkg[PACKAGE_JSON_KEY] : undefined;
      if (isRecord(embedded)) return embedded;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: "config",
        message: `Ignoring unreadable package.json: ${msg}`,
      });
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): Record<string, unknown> | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file ${filePath} must contain a JSON object`,
      });
      return null;
    }
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Parse CLI args using mri. List flags may be repeated or comma-separated.
 */
export async function parseCliArgs(
  argv: string[],
): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { f: "format", o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help"],
    string: ["brand", "niche", "goal", "mode", "seed", "sitemap", "competitor", "region", "format", "output", "config", "timeout"],
  });

  const timeout = optString(args.timeout);
  return {
    command: args._.length > 0 ? String(args._[0]) : undefined,
    brand: optString(args.brand),
    niche: optString(args.niche),
    goals: toList(args.goal, true),
    mode: optString(args.mode),
    seeds: toList(args.seed, false),
    sitemap: optString(args.sitemap),
    competitors: toList(args.competitor, true),
    regions: toList(args.region, true),
    formats: toList(args.format, true),
    output: optString(args.output),
    config: optString(args.config),
    timeoutMs: timeout !== undefined ? parsePositiveInt(timeout, "--timeout") : undefined,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}

function optString(value: unknown): string | undefined {
  const last = Array.isArray(value) ? value[value.length - 1] : value;
  return typeof last === "string" && last.length > 0 ? last : undefined;
}

function toList(value: unknown, splitCommas: boolean): string[] {
  const values = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return values
    .filter((v): v is string => typeof v === "string")
    .flatMap((v) => (splitCommas ? v.split(",") : [v]))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${flag} must be a positive integer, got "${value}"`, [
      { field: flag, message: "must be a positive integer" },
    ]);
  }
  return n;
}
