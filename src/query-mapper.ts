// src/query-mapper.ts — Step 4: Query Mapper
// Fan-out pattern substitution per entity, per-entity dedup, static SERP
// feature lookup, and clustering by (taxonomy node, intent).

import type {
  FanoutPattern,
  Intent,
  IntentCoverage,
  Ontology,
  Query,
  QueryCluster,
  SerpFeature,
  StrategyConfig,
  Taxonomy,
  Warning,
} from "./types.js";
import { INTENTS } from "./types.js";
import { fillTemplate, normalizeKey, round } from "./text.js";

export const SERP_FEATURE_BY_INTENT: Record<Intent, SerpFeature> = {
  informational: "featured-snippet",
  navigational: "sitelinks",
  commercial: "people-also-ask",
  transactional: "shopping-results",
  local: "local-pack",
};

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Generate queries for every entity and group them into one cluster per
 * (taxonomy node, intent), ordered by node order then intent order.
 */
export function mapAllEntities(
  taxonomy: Taxonomy,
  ontology: Ontology,
  config: StrategyConfig,
  patterns: readonly FanoutPattern[],
  warnings: Warning[] = [],
): QueryCluster[] {
  const applicable = applicablePatterns(patterns, config);

  const nodeOfEntity = new Map<string, string>();
  for (const node of taxonomy.nodes) {
    for (const id of node.entityIds) if (!nodeOfEntity.has(id)) nodeOfEntity.set(id, node.id);
  }

  const buckets = new Map<string, Query[]>();
  for (const entity of ontology.entities) {
    const nodeId = nodeOfEntity.get(entity.id);
    if (!nodeId) {
      warnings.push({
        level: "warn",
        module: "query-mapper",
        message: `Entity ${entity.id} is not classified in the taxonomy; no queries generated`,
      });
      continue;
    }
    for (const query of generateQueries(entity, config.brandName, applicable)) {
      const key = `${nodeId}\u0000${query.intent}`;
      const bucket = buckets.get(key);
      if (bucket) bucket.push(query);
      else buckets.set(key, [query]);
    }
  }

  const clusters: QueryCluster[] = [];
  for (const node of taxonomy.nodes) {
    for (const intent of INTENTS) {
      const queries = buckets.get(`${node.id}\u0000${intent}`);
      if (!queries || queries.length === 0) continue;
      clusters.push(buildCluster(node.id, intent, queries));
    }
  }
  return clusters;
}

/** Patterns that declare goals apply only when one of them is configured. */
export function applicablePatterns(
  patterns: readonly FanoutPattern[],
  config: Pick<StrategyConfig, "businessGoals">,
): FanoutPattern[] {
  return patterns.filter((p) => !p.goals || p.goals.some((g) => config.businessGoals.includes(g)));
}

/**
 * One query per pattern for an entity, deduplicated case-insensitively.
 * A duplicate keeps its first position but takes the id, intent and tag of
 * the highest-priority pattern that produced it; equal priorities keep the
 * earlier pattern.
 */
export function generateQueries(
  entity: { id: string; name: string },
  brandName: string,
  patterns: readonly FanoutPattern[],
): Query[] {
  const queries: Query[] = [];
  const byText = new Map<string, Query>();
  const values = { entity: entity.name.toLowerCase(), brand: brandName.toLowerCase() };

  for (const pattern of patterns) {
    const text = fillTemplate(pattern.template, values);
    const key = normalizeKey(text);
    if (!key) continue;
    const existing = byText.get(key);
    if (existing) {
      if (pattern.priority < existing.priority) Object.assign(existing, queryFor(entity.id, text, pattern));
      continue;
    }
    const query = queryFor(entity.id, text, pattern);
    byText.set(key, query);
    queries.push(query);
  }
  return queries;
}

/** Fractions of the five-intent vocabulary covered, overall and per entity. */
export function getIntentCoverage(clusters: readonly QueryCluster[]): IntentCoverage {
  const overall = new Set<Intent>();
  const perEntity = new Map<string, Set<Intent>>();
  for (const cluster of clusters) {
    for (const q of cluster.queries) {
      overall.add(q.intent);
      const set = perEntity.get(q.entityId) ?? new Set<Intent>();
      set.add(q.intent);
      perEntity.set(q.entityId, set);
    }
  }
  const byEntity: Record<string, number> = {};
  for (const [entityId, intents] of perEntity) {
    byEntity[entityId] = round(intents.size / INTENTS.length);
  }
  return {
    overall: round(overall.size / INTENTS.length),
    byEntity,
    missingIntents: INTENTS.filter((i) => !overall.has(i)),
  };
}

/** SERP feature counts summed over all clusters. */
export function getSerpFeatureOpportunities(
  clusters: readonly QueryCluster[],
): Partial<Record<SerpFeature, number>> {
  const totals: Partial<Record<SerpFeature, number>> = {};
  for (const cluster of clusters) {
    for (const q of cluster.queries) {
      if (q.estimatedSerpFeature) {
        totals[q.estimatedSerpFeature] = (totals[q.estimatedSerpFeature] ?? 0) + 1;
      }
    }
  }
  return totals;
}

/** All queries, highest pattern priority first; ties keep cluster order. */
export function prioritizeQueries(clusters: readonly QueryCluster[]): Query[] {
  return clusters
    .flatMap((c) => c.queries)
    .map((query, index) => ({ query, index }))
    .sort((a, b) => a.query.priority - b.query.priority || a.index - b.index)
    .map((x) => x.query);
}

// ─── Internals ───────────────────────────────────────────────────────────────

function queryFor(entityId: string, text: string, pattern: FanoutPattern): Query {
  return {
    id: `${entityId}:${pattern.id}`,
    text,
    entityId,
    intent: pattern.intent,
    priority: pattern.priority,
    fanoutPatternUsed: pattern.id,
    estimatedSerpFeature: SERP_FEATURE_BY_INTENT[pattern.intent],
  };
}

function buildCluster(nodeId: string, intent: Intent, queries: Query[]): QueryCluster {
  const entityIds: string[] = [];
  const intentDistribution: Partial<Record<Intent, number>> = {};
  const serpFeatureOpportunities: Partial<Record<SerpFeature, number>> = {};
  for (const q of queries) {
    if (!entityIds.includes(q.entityId)) entityIds.push(q.entityId);
    intentDistribution[q.intent] = (intentDistribution[q.intent] ?? 0) + 1;
    if (q.estimatedSerpFeature) {
      serpFeatureOpportunities[q.estimatedSerpFeature] = (serpFeatureOpportunities[q.estimatedSerpFeature] ?? 0) + 1;
    }
  }
  return {
    id: `qc-${nodeId}-${intent}`,
    taxonomyNodeId: nodeId,
    intent,
    entityIds,
    queries,
    intentDistribution,
    serpFeatureOpportunities,
  };
}
