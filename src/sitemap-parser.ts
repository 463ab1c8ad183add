// src/sitemap-parser.ts — Sitemap collaborator
// One bounded fetch per sitemap file, XML parsing with fast-xml-parser, and
// entity-candidate extraction from URL paths. Sitemap indexes are followed
// one level deep, up to `maxChildSitemaps` children.

import { XMLParser, XMLValidator } from "fast-xml-parser";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { ENGINE_VERSION, SitemapFetchError, SitemapParseError } from "./types.js";
import { isRecord } from "./catalog.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SitemapUrl {
  loc: string;
  lastmod?: string;
  changefreq?: string;
  priority?: number;
  pathSegments: string[];
  inferredCategory?: string;
  inferredEntity?: string;
}

export interface EntityCandidate {
  name: string;
  frequency: number;
  sourceUrls: string[];
  categories: string[];
}

export interface SitemapAnalysis {
  baseUrl: string;
  urls: SitemapUrl[];
  categories: Record<string, number>;
  contentTypes: Record<string, number>;
  urlPatterns: string[];
  candidates: EntityCandidate[];
}

export type ParsedSitemap =
  | { kind: "urlset"; urls: SitemapUrl[] }
  | { kind: "index"; sitemaps: string[] };

export interface SitemapFetchOptions {
  timeoutMs: number;
  maxChildSitemaps: number;
  exclude: string[];
  fetch?: typeof fetch;
}

export const DEFAULT_SITEMAP_OPTIONS: SitemapFetchOptions = {
  timeoutMs: 10_000,
  maxChildSitemaps: 10,
  exclude: [],
};

/** Anything that can turn a sitemap URL into an analysis. Injected into the ontology builder. */
export interface SitemapSource {
  load(url: string, warnings: Warning[]): Promise<SitemapAnalysis>;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const CONTENT_TYPE_PATTERNS: Array<[string, RegExp]> = [
  ["blog", /\/(blog|articles?|posts?|news)\//i],
  ["product", /\/(products?|shop|store|catalog)\//i],
  ["category", /\/(category|categories|topics?)\//i],
  ["tag", /\/(tags?)\//i],
  ["author", /\/(authors?|team|people)\//i],
  ["resource", /\/(resources?|guides?|tutorials?)\//i],
  ["landing", /\/(landing|lp)\//i],
  ["legal", /\/(privacy|terms|legal|policy)\//i],
  ["support", /\/(support|help|faq|docs?)\//i],
];

const SLUG_STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "and", "but", "for", "with", "from", "was", "are", "were", "been",
  "have", "has", "had", "does", "did", "will", "would", "could", "should",
  "may", "might", "must", "can", "need", "index", "page", "default", "home",
  "main", "about", "contact",
]);

const MAX_CANDIDATES = 100;
const MAX_SOURCE_URLS = 5;
const MAX_URL_PATTERNS = 20;

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name: string) => name === "url" || name === "sitemap",
});

// ─── Public API ──────────────────────────────────────────────────────────────

export function createSitemapSource(options: SitemapFetchOptions): SitemapSource {
  return {
    load: (url, warnings) => fetchSitemap(url, options, warnings),
  };
}

/**
 * Fetch and analyze a sitemap (or sitemap index).
 * @throws SitemapFetchError when the top-level fetch fails
 * @throws SitemapParseError when the XML is malformed or yields no URLs
 */
export async function fetchSitemap(
  url: string,
  options: SitemapFetchOptions,
  warnings: Warning[] = [],
): Promise<SitemapAnalysis> {
  const xml = await fetchText(url, options);
  const parsed = parseSitemapXml(xml, url);

  let urls: SitemapUrl[];
  if (parsed.kind === "urlset") {
    urls = parsed.urls;
  } else {
    urls = [];
    const children = parsed.sitemaps.slice(0, options.maxChildSitemaps);
    if (parsed.sitemaps.length > children.length) {
      warnings.push({
        level: "info",
        module: "sitemap-parser",
        message: `Sitemap index lists ${parsed.sitemaps.length} sitemaps; reading the first ${children.length}`,
      });
    }
    const fetchFailures: SitemapFetchError[] = [];
    for (const child of children) {
      try {
        const childParsed = parseSitemapXml(await fetchText(child, options), child);
        if (childParsed.kind === "urlset") urls.push(...childParsed.urls);
        else warnings.push({ level: "warn", module: "sitemap-parser", message: `Skipping nested sitemap index ${child}` });
      } catch (err: unknown) {
        if (!(err instanceof SitemapFetchError || err instanceof SitemapParseError)) throw err;
        if (err instanceof SitemapFetchError) fetchFailures.push(err);
        warnings.push({ level: "warn", module: "sitemap-parser", message: `Skipping child sitemap: ${err.message}` });
      }
    }
    // A network failure on every child is still a fetch failure, not an empty sitemap.
    const [firstFailure] = fetchFailures;
    if (firstFailure && fetchFailures.length === children.length) {
      throw new SitemapFetchError(
        `All ${children.length} child sitemap(s) of ${url} failed to load; first: ${firstFailure.message}`,
        url,
        firstFailure.statusCode,
        { cause: firstFailure },
      );
    }
  }

  const kept = filterExcluded(urls, options.exclude);
  if (kept.length < urls.length) {
    warnings.push({
      level: "info",
      module: "sitemap-parser",
      message: `Excluded ${urls.length - kept.length} of ${urls.length} sitemap URLs by pattern`,
    });
  }
  if (kept.length === 0) {
    throw new SitemapParseError(`Sitemap ${url} contains no usable <url> entries`, url);
  }
  return analyzeUrls(url, kept);
}

/**
 * Parse sitemap XML into either a URL set or a list of child sitemaps.
 * @throws SitemapParseError for malformed XML or an unknown root element
 */
export function parseSitemapXml(xml: string, url: string): ParsedSitemap {
  if (xml.trim().length === 0) {
    throw new SitemapParseError(`Sitemap ${url} is empty`, url);
  }
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new SitemapParseError(
      `Malformed sitemap XML at ${url} (line ${valid.err.line}): ${valid.err.msg}`,
      url,
    );
  }
  const doc: unknown = parser.parse(xml);
  if (!isRecord(doc)) {
    throw new SitemapParseError(`Sitemap ${url} has no root element`, url);
  }

  if ("urlset" in doc) {
    const entries = childList(doc.urlset, "url");
    const urls: SitemapUrl[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) continue;
      const loc = text(entry.loc);
      if (!loc) continue;
      urls.push(analyzeUrlPath({
        loc,
        lastmod: text(entry.lastmod),
        changefreq: text(entry.changefreq),
        priority: numberOrUndefined(text(entry.priority)),
        pathSegments: [],
      }));
    }
    return { kind: "urlset", urls };
  }

  if ("sitemapindex" in doc) {
    const sitemaps = childList(doc.sitemapindex, "sitemap")
      .map((s) => (isRecord(s) ? text(s.loc) : undefined))
      .filter((loc): loc is string => loc !== undefined);
    return { kind: "index", sitemaps };
  }

  throw new SitemapParseError(`Sitemap ${url} has neither <urlset> nor <sitemapindex> root`, url);
}

/**
 * Derive path segments, a category and an entity name from a sitemap URL.
 * The category comes from the first segment, the entity from the last.
 */
export function analyzeUrlPath(entry: SitemapUrl): SitemapUrl {
  const result: SitemapUrl = { ...entry, pathSegments: [] };
  for (const key of ["lastmod", "changefreq", "priority"] as const) {
    if (result[key] === undefined) delete result[key];
  }
  const path = urlPath(entry.loc).replace(/^\/+|\/+$/g, "");
  if (!path) return result;

  const segments = path.split("/").map(decodeSegment);
  result.pathSegments = segments;

  const first = segments[0].toLowerCase();
  const contentType = CONTENT_TYPE_PATTERNS.find(([, re]) => re.test(`/${first}/`));
  if (contentType) result.inferredCategory = contentType[0];
  else if (first.length > 2) result.inferredCategory = first;

  const slug = segments[segments.length - 1].replace(/\.(html?|php|aspx?)$/i, "");
  const words = slug
    .replace(/[-_]/g, " ")
    .split(/\s+/)
    .filter((w) => w.length > 2 && !SLUG_STOP_WORDS.has(w.toLowerCase()));
  if (words.length > 0) result.inferredEntity = words.map(titleCase).join(" ");

  return result;
}

/**
 * Group URLs by inferred entity name (case-insensitive), most frequent first.
 * Ties keep first-seen order.
 */
export function extractEntityCandidates(urls: SitemapUrl[]): EntityCandidate[] {
  const byKey = new Map<string, { name: string; frequency: number; sourceUrls: string[]; categories: Set<string> }>();
  for (const url of urls) {
    if (!url.inferredEntity) continue;
    const key = url.inferredEntity.toLowerCase();
    let entry = byKey.get(key);
    if (!entry) {
      entry = { name: url.inferredEntity, frequency: 0, sourceUrls: [], categories: new Set() };
      byKey.set(key, entry);
    }
    entry.frequency++;
    if (entry.sourceUrls.length < MAX_SOURCE_URLS) entry.sourceUrls.push(url.loc);
    if (url.inferredCategory) entry.categories.add(url.inferredCategory);
  }
  return [...byKey.values()]
    .map((e) => ({ name: e.name, frequency: e.frequency, sourceUrls: e.sourceUrls, categories: [...e.categories] }))
    .sort((a, b) => b.frequency - a.frequency)
    .slice(0, MAX_CANDIDATES);
}

// ─── Analysis ────────────────────────────────────────────────────────────────

function analyzeUrls(sitemapUrl: string, urls: SitemapUrl[]): SitemapAnalysis {
  const categories: Record<string, number> = {};
  const contentTypes: Record<string, number> = {};
  const patterns = new Map<string, number>();

  for (const url of urls) {
    if (url.inferredCategory) categories[url.inferredCategory] = (categories[url.inferredCategory] ?? 0) + 1;

    const path = `${urlPath(url.loc).replace(/\/?$/, "")}/`;
    const type = CONTENT_TYPE_PATTERNS.find(([, re]) => re.test(path))?.[0] ?? "other";
    contentTypes[type] = (contentTypes[type] ?? 0) + 1;

    if (url.pathSegments.length > 0) {
      const pattern = "/" + url.pathSegments.map(segmentPattern).join("/");
      patterns.set(pattern, (patterns.get(pattern) ?? 0) + 1);
    }
  }

  return {
    baseUrl: baseUrlOf(sitemapUrl),
    urls,
    categories: sortCounts(categories),
    contentTypes: sortCounts(contentTypes),
    urlPatterns: [...patterns.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_URL_PATTERNS)
      .map(([p]) => p),
    candidates: extractEntityCandidates(urls),
  };
}

function segmentPattern(segment: string): string {
  if (/^\d{4}$/.test(segment)) return "{year}";
  if (/^\d{1,2}$/.test(segment)) return "{month}";
  if (/^\d+$/.test(segment)) return "{id}";
  if (segment.length > 30) return "{slug}";
  return segment;
}

function filterExcluded(urls: SitemapUrl[], exclude: string[]): SitemapUrl[] {
  if (exclude.length === 0) return urls;
  const isExcluded = picomatch(exclude, { dot: true });
  return urls.filter((u) => !isExcluded(urlPath(u.loc)));
}

// ─── HTTP ────────────────────────────────────────────────────────────────────

async function fetchText(url: string, options: SitemapFetchOptions): Promise<string> {
  const doFetch = options.fetch ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await doFetch(url, {
      signal: controller.signal,
      headers: { "User-Agent": `content-strategy-engine/${ENGINE_VERSION}` },
    });
    if (!response.ok) {
      throw new SitemapFetchError(
        `Sitemap request to ${url} returned ${response.status}`,
        url,
        response.status,
      );
    }
    return await response.text();
  } catch (err: unknown) {
    if (err instanceof SitemapFetchError) throw err;
    const reason = controller.signal.aborted
      ? `timed out after ${options.timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    throw new SitemapFetchError(`Failed to fetch sitemap ${url}: ${reason}`, url, undefined, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function childList(parent: unknown, tag: string): unknown[] {
  if (!isRecord(parent)) return [];
  const value = parent[tag];
  return Array.isArray(value) ? value : [];
}

function text(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

function numberOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function urlPath(loc: string): string {
  try {
    return new URL(loc).pathname;
  } catch {
    return loc.startsWith("/") ? loc : `/${loc}`;
  }
}

function baseUrlOf(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function sortCounts(counts: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(counts).sort((a, b) => b[1] - a[1]));
}
