// src/entity-expander.ts — Step 2: Entity Expander
// Adds lexical aliases, recomputes centrality and commercial value, and reports
// goal/competitor topics the ontology does not cover. Never mutates its input.

import type { BusinessGoal, Entity, Ontology, StrategyConfig } from "./types.js";
import { fillTemplate, normalizeKey, round } from "./text.js";
import { computeCentrality, computeCommercialValue } from "./scoring.js";

// ─── Lexical tables ──────────────────────────────────────────────────────────

const ABBREVIATIONS: Record<string, string> = {
  seo: "search engine optimization",
  sem: "search engine marketing",
  ppc: "pay per click",
  cro: "conversion rate optimization",
  ux: "user experience",
  ui: "user interface",
  api: "application programming interface",
  ai: "artificial intelligence",
  ml: "machine learning",
  saas: "software as a service",
  b2b: "business to business",
  b2c: "business to consumer",
  roi: "return on investment",
  kpi: "key performance indicator",
  cms: "content management system",
  crm: "customer relationship management",
};

const SUFFIX_FAMILIES: Array<[string, string[]]> = [
  ["tool", ["tools", "software", "platform", "app"]],
  ["service", ["services", "solution", "solutions"]],
  ["guide", ["guides", "tutorial", "tutorials"]],
  ["tips", ["advice", "best practices", "strategies"]],
  ["review", ["reviews", "comparison", "alternatives"]],
];

const INDUSTRY_PREFIXES = ["digital", "online", "cloud", "modern", "advanced"];

const INTENT_MODIFIERS: Array<[string, string[]]> = [
  ["informational", ["what is", "how to", "guide to"]],
  ["commercial", ["best", "top", "alternatives to"]],
  ["transactional", ["buy", "get", "try"]],
];

const GOAL_TOPICS: Record<BusinessGoal, string[]> = {
  brand_awareness: ["{niche} guide"],
  lead_generation: ["{niche} pricing", "{niche} case studies"],
  ecommerce_sales: ["{niche} products", "{niche} deals"],
  thought_leadership: ["{niche} trends", "{niche} research"],
  local_visibility: ["{niche} near me", "{niche} in {region}"],
  product_adoption: ["{niche} tutorials", "{niche} integrations"],
};

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Return a new ontology with aliases, centrality and commercial value filled in.
 *
 * Alias collisions are settled in a fixed order: existing aliases before
 * generated ones, generation order within an entity, and ontology order across
 * entities (an alias produced for two entities stays with the first). An alias
 * equal to any entity's name is dropped.
 */
export function expandAllEntities(ontology: Ontology, config: StrategyConfig): Ontology {
  const nameKeys = new Set(ontology.entities.map((e) => normalizeKey(e.name)));
  const claimed = new Set<string>();

  const entities: Entity[] = ontology.entities.map((entity) => {
    const aliases: string[] = [];
    const own = new Set<string>();
    for (const alias of [...entity.aliases, ...generateAliases(entity.name)]) {
      const key = normalizeKey(alias);
      if (key.length < 2 || nameKeys.has(key) || own.has(key) || claimed.has(key)) continue;
      own.add(key);
      aliases.push(alias);
    }
    for (const key of own) claimed.add(key);
    return {
      ...entity,
      aliases,
      sourceUrls: [...entity.sourceUrls],
      categories: [...entity.categories],
      commercialValue: computeCommercialValue(entity, config),
    };
  });

  const relationships = ontology.relationships.map((r) => ({ ...r }));
  const centrality = computeCentrality(entities, relationships);
  for (const entity of entities) {
    entity.centrality = centrality.get(entity.id) ?? 0;
  }

  return { brandName: ontology.brandName, entities, relationships };
}

/**
 * Deterministic alias candidates for a name, in generation order, before any
 * filtering against the ontology.
 */
export function generateAliases(name: string): string[] {
  const lower = normalizeKey(name);
  const out: string[] = [
    ...expandAbbreviations(lower),
    ...numberVariants(lower),
    ...acronymVariants(name),
    ...formatVariants(name.trim()),
    ...suffixVariants(lower),
    ...prefixVariants(lower),
  ];
  const seen = new Set<string>();
  return out.filter((alias) => {
    const key = normalizeKey(alias);
    if (!key || key === lower || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Goal topics (templated with the niche) and competitors that no entity name
 * or alias covers. Goal topics come first, in configured goal order.
 */
export function findEntityGaps(ontology: Ontology, config: StrategyConfig): string[] {
  const covered = new Set<string>();
  for (const e of ontology.entities) {
    covered.add(normalizeKey(e.name));
    for (const a of e.aliases) covered.add(normalizeKey(a));
  }

  const niche = config.primaryNiche.toLowerCase();
  const wanted: string[] = [];
  for (const goal of config.businessGoals) {
    for (const template of GOAL_TOPICS[goal]) {
      if (template.includes("{region}")) {
        for (const region of config.targetRegions) wanted.push(fillTemplate(template, { niche, region }));
      } else {
        wanted.push(fillTemplate(template, { niche }));
      }
    }
  }
  wanted.push(...config.competitors);

  const gaps: string[] = [];
  const reported = new Set<string>();
  for (const name of wanted) {
    const key = normalizeKey(name);
    if (!key || covered.has(key) || reported.has(key)) continue;
    reported.add(key);
    gaps.push(name);
  }
  return gaps;
}

/**
 * Entities ordered by 0.4·centrality + 0.4·commercialValue + 0.2·min(1, aliases/10),
 * highest first. Ties keep ontology order.
 */
export function prioritizeEntities(ontology: Ontology): Entity[] {
  const score = (e: Entity) =>
    round(e.centrality * 0.4 + e.commercialValue * 0.4 + Math.min(1, e.aliases.length / 10) * 0.2);
  return ontology.entities
    .map((entity, index) => ({ entity, index, score: score(entity) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((x) => x.entity);
}

/** Name, aliases and intent-modified phrasings an entity's content should use. */
export function generateSemanticVariants(entity: Entity): string[] {
  const lower = entity.name.toLowerCase();
  const variants = [entity.name, ...entity.aliases];
  for (const [, modifiers] of INTENT_MODIFIERS) {
    for (const modifier of modifiers) variants.push(`${modifier} ${lower}`);
  }
  return [...new Set(variants)];
}

// ─── Alias rules ─────────────────────────────────────────────────────────────

function expandAbbreviations(lower: string): string[] {
  const out: string[] = [];
  const whole = ABBREVIATIONS[lower];
  if (whole) out.push(whole);

  const words = lower.split(" ");
  if (words.length > 1) {
    words.forEach((word, i) => {
      const expansion = ABBREVIATIONS[word];
      if (expansion) out.push([...words.slice(0, i), expansion, ...words.slice(i + 1)].join(" "));
    });
  }

  for (const [abbr, expansion] of Object.entries(ABBREVIATIONS)) {
    if (lower !== expansion && ` ${lower} `.includes(` ${expansion} `)) {
      out.push(lower.replace(expansion, abbr));
    }
  }
  return out;
}

function numberVariants(lower: string): string[] {
  if (lower.endsWith("s") && !lower.endsWith("ss")) {
    if (lower.endsWith("ies")) return [`${lower.slice(0, -3)}y`];
    if (/(ses|xes|zes|ches|shes)$/.test(lower)) return [lower.slice(0, -2)];
    return lower.length > 3 ? [lower.slice(0, -1)] : [];
  }
  if (lower.endsWith("y") && lower.length > 2 && !"aeiou".includes(lower.charAt(lower.length - 2))) {
    return [`${lower.slice(0, -1)}ies`];
  }
  if (/(s|x|z|ch|sh)$/.test(lower)) return [`${lower}es`];
  return [`${lower}s`];
}

function acronymVariants(name: string): string[] {
  const words = name.trim().split(/[\s-]+/).filter((w) => /^[A-Za-z]/.test(w));
  if (words.length < 2) return [];
  return [words.map((w) => w.charAt(0).toUpperCase()).join("")];
}

function formatVariants(name: string): string[] {
  if (name.includes("-")) {
    return [name.replace(/-/g, " "), name.replace(/-/g, "")];
  }
  if (name.includes(" ")) {
    return [name.replace(/ /g, "-"), name.replace(/ /g, "")];
  }
  // camelCase or PascalCase single token
  const split = name.replace(/([a-z0-9])([A-Z])/g, "$1 $2").toLowerCase();
  if (split !== name.toLowerCase()) {
    return [split, split.replace(/ /g, "-")];
  }
  return [];
}

function suffixVariants(lower: string): string[] {
  const out: string[] = [];
  for (const [suffix, related] of SUFFIX_FAMILIES) {
    if (lower === suffix || !lower.endsWith(` ${suffix}`)) continue;
    const base = lower.slice(0, -suffix.length);
    for (const r of related) out.push(`${base}${r}`);
  }
  return out;
}

function prefixVariants(lower: string): string[] {
  const prefix = INDUSTRY_PREFIXES.find((p) => lower.startsWith(`${p} `));
  return prefix ? [lower.slice(prefix.length + 1)] : [];
}
