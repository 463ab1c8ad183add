// src/ontology-builder.ts — Step 1: Ontology Builder
// Turns the brand configuration into entities plus heuristically inferred
// relationships. The sitemap is the only I/O and sits behind SitemapSource.

import type {
  Entity,
  EntityType,
  Ontology,
  Relationship,
  StrategyConfig,
  Warning,
} from "./types.js";
import { ConfigurationError } from "./types.js";
import type { EntityCandidate, SitemapSource } from "./sitemap-parser.js";
import { createSitemapSource, DEFAULT_SITEMAP_OPTIONS } from "./sitemap-parser.js";
import { cleanName, containsPhrase, normalizeKey, sharedTokens, slugify, tokenize } from "./text.js";
import { computeCentrality, computeCommercialValue } from "./scoring.js";

export const MAX_SITEMAP_ENTITIES = 50;

// Head-noun keywords per type. The last matching token of a name decides.
const TYPE_KEYWORDS: Array<[EntityType, string[]]> = [
  ["product", ["app", "software", "platform", "tool", "tools", "kit", "device", "widget", "widgets", "gadget", "gadgets", "suite", "plugin", "product", "products"]],
  ["service", ["service", "services", "consulting", "agency", "management", "repair", "installation", "training", "hosting", "support", "delivery"]],
  ["feature", ["feature", "features", "integration", "integrations", "dashboard", "api", "analytics", "reporting", "automation", "editor", "module", "template", "templates"]],
  ["topic", ["guide", "guides", "tips", "trends", "news", "basics", "ideas", "strategy", "strategies"]],
];

const RELATION_WEIGHTS = {
  "is-a": 0.7,
  "part-of": 0.8,
  "used-for": 0.6,
  "relates-to": 0.5,
} as const;

export interface OntologyBuildOptions {
  /** Required for sitemap and hybrid modes; defaults to an HTTP source. */
  sitemapSource?: SitemapSource;
  warnings?: Warning[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Build the initial ontology. Seed mode never touches the sitemap source.
 * @throws ConfigurationError when no entities can be derived
 * @throws SourceFetchError propagated unchanged from the sitemap source
 */
export async function buildOntology(
  config: StrategyConfig,
  options: OntologyBuildOptions = {},
): Promise<Ontology> {
  const warnings = options.warnings ?? [];
  let candidates: EntityCandidate[] = [];

  if (config.sourceMode !== "seed") {
    if (!config.sitemapUrl) {
      throw new ConfigurationError(`sitemapUrl is required when sourceMode is "${config.sourceMode}"`, [
        { field: "sitemapUrl", message: "required" },
      ]);
    }
    const source = options.sitemapSource ?? createSitemapSource(DEFAULT_SITEMAP_OPTIONS);
    const analysis = await source.load(config.sitemapUrl, warnings);
    candidates = analysis.candidates;
  }

  return assembleOntology(config, candidates, warnings);
}

/**
 * Pure core of the builder: seeds first, then sitemap candidates, then
 * relationship inference and initial scores.
 */
export function assembleOntology(
  config: StrategyConfig,
  sitemapCandidates: EntityCandidate[] = [],
  warnings: Warning[] = [],
): Ontology {
  const entities: Entity[] = [];
  const byKey = new Map<string, Entity>();
  const usedIds = new Set<string>();

  const useSeeds = config.sourceMode === "seed" || config.sourceMode === "hybrid";
  const useSitemap = config.sourceMode === "sitemap" || config.sourceMode === "hybrid";

  if (useSeeds) {
    for (const seed of config.seedEntities) {
      const name = cleanName(seed);
      if (!name) continue;
      const key = normalizeKey(name);
      if (byKey.has(key)) continue;
      const entity = createEntity(name, "seed", inferEntityType(name, "seed"), usedIds);
      byKey.set(key, entity);
      entities.push(entity);
    }
    if (entities.length === 0) {
      throw new ConfigurationError("No seed entities remain after trimming blanks", [
        { field: "seedEntities", message: "empty after trimming" },
      ]);
    }
  }

  if (useSitemap) {
    const capped = sitemapCandidates.slice(0, MAX_SITEMAP_ENTITIES);
    if (sitemapCandidates.length > capped.length) {
      warnings.push({
        level: "info",
        module: "ontology-builder",
        message: `Sitemap produced ${sitemapCandidates.length} entity candidates; keeping the ${MAX_SITEMAP_ENTITIES} most frequent`,
      });
    }
    let added = 0;
    for (const candidate of capped) {
      const name = cleanName(candidate.name);
      if (!name) continue;
      const key = normalizeKey(name);
      const existing = byKey.get(key);
      if (existing) {
        // Seed wins type and value; sitemap evidence is merged in.
        mergeUnique(existing.sourceUrls, candidate.sourceUrls);
        mergeUnique(existing.categories, candidate.categories);
        continue;
      }
      const entity = createEntity(name, "sitemap", inferEntityType(name, "sitemap"), usedIds);
      entity.sourceUrls = [...candidate.sourceUrls];
      entity.categories = [...candidate.categories];
      byKey.set(key, entity);
      entities.push(entity);
      added++;
    }
    if (config.sourceMode === "sitemap" && entities.length === 0) {
      throw new ConfigurationError(`Sitemap ${config.sitemapUrl ?? ""} yielded no entity candidates`, [
        { field: "sitemapUrl", message: "no entity candidates found" },
      ]);
    }
    if (config.sourceMode === "hybrid" && added === 0) {
      warnings.push({
        level: "warn",
        module: "ontology-builder",
        message: "Sitemap added no entities beyond the seeds",
      });
    }
  }

  for (const entity of entities) {
    entity.commercialValue = computeCommercialValue(entity, config);
  }
  const relationships = inferRelationships(entities);
  const centrality = computeCentrality(entities, relationships);
  for (const entity of entities) {
    entity.centrality = centrality.get(entity.id) ?? 0;
  }

  return { brandName: config.brandName, entities, relationships };
}

/**
 * Keyword rules over a name's tokens, last token first. Seeds default to
 * `concept`, sitemap entities to `topic`.
 */
export function inferEntityType(name: string, origin: Entity["origin"]): EntityType {
  const tokens = tokenize(name);
  for (let i = tokens.length - 1; i >= 0; i--) {
    const match = TYPE_KEYWORDS.find(([, words]) => words.includes(tokens[i]));
    if (match) return match[0];
  }
  return origin === "seed" ? "concept" : "topic";
}

/**
 * Pairwise rules in entity order; the first rule that matches a pair wins,
 * so a pair never receives more than one relationship.
 */
export function inferRelationships(entities: readonly Entity[]): Relationship[] {
  const relationships: Relationship[] = [];
  for (let i = 0; i < entities.length; i++) {
    for (let j = i + 1; j < entities.length; j++) {
      const rel = detectRelationship(entities[i], entities[j]);
      if (rel) relationships.push(rel);
    }
  }
  return relationships;
}

/** `ent-` + slug of the normalized name. */
export function entityIdFor(name: string): string {
  return `ent-${slugify(normalizeKey(name)) || "entity"}`;
}

// ─── Internals ───────────────────────────────────────────────────────────────

function createEntity(
  name: string,
  origin: Entity["origin"],
  type: EntityType,
  usedIds: Set<string>,
): Entity {
  const base = entityIdFor(name);
  let id = base;
  for (let n = 2; usedIds.has(id); n++) id = `${base}-${n}`;
  usedIds.add(id);
  return {
    id,
    name,
    type,
    origin,
    aliases: [],
    centrality: 0,
    commercialValue: 0,
    sourceUrls: [],
    categories: [],
  };
}

function detectRelationship(a: Entity, b: Entity): Relationship | null {
  const keyA = normalizeKey(a.name);
  const keyB = normalizeKey(b.name);
  if (keyA === keyB) return null;

  // (1) containment: the longer, more specific name is-a the shorter one
  if (containsPhrase(b.name, a.name)) {
    return rel(b, "is-a", a, `"${b.name}" contains "${a.name}"`);
  }
  if (containsPhrase(a.name, b.name)) {
    return rel(a, "is-a", b, `"${a.name}" contains "${b.name}"`);
  }

  const shared = sharedTokens(a.name, b.name);
  if (shared.length === 0) return null;
  const terms = shared.join(", ");

  // (2) feature of a product or service
  const offering = (e: Entity) => e.type === "product" || e.type === "service";
  if (a.type === "feature" && offering(b)) return rel(a, "part-of", b, `Feature sharing terms: ${terms}`);
  if (b.type === "feature" && offering(a)) return rel(b, "part-of", a, `Feature sharing terms: ${terms}`);

  // (3) offering used for a concept or topic
  const subject = (e: Entity) => e.type === "concept" || e.type === "topic";
  if (offering(a) && subject(b)) return rel(a, "used-for", b, `Offering sharing terms: ${terms}`);
  if (offering(b) && subject(a)) return rel(b, "used-for", a, `Offering sharing terms: ${terms}`);

  // (4) any shared term
  return rel(a, "relates-to", b, `Shared terms: ${terms}`);
}

function rel(
  source: Entity,
  type: keyof typeof RELATION_WEIGHTS,
  target: Entity,
  evidence: string,
): Relationship {
  return { sourceId: source.id, type, targetId: target.id, weight: RELATION_WEIGHTS[type], evidence };
}

function mergeUnique(into: string[], values: readonly string[]): void {
  for (const v of values) if (!into.includes(v)) into.push(v);
}
