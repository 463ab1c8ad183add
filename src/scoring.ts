// src/scoring.ts — Entity scores
// Fixed weights for commercial value and the degree-based centrality measure.
// Shared by the ontology builder (initial scores) and the entity expander (recompute).

import type { BusinessGoal, Entity, EntityType, Relationship, StrategyConfig } from "./types.js";
import { round, sharedTokens } from "./text.js";

export const COMMERCIAL_WEIGHTS = {
  goalMatch: 0.4,
  competitorOverlap: 0.2,
  typeWeight: 0.4,
} as const;

export const TYPE_WEIGHTS: Record<EntityType, number> = {
  product: 1.0,
  service: 0.9,
  feature: 0.7,
  concept: 0.5,
  topic: 0.4,
};

/** Entity types each business goal cares about. */
export const GOAL_ENTITY_TYPES: Record<BusinessGoal, EntityType[]> = {
  brand_awareness: ["concept", "topic"],
  lead_generation: ["service", "product"],
  ecommerce_sales: ["product"],
  thought_leadership: ["concept", "topic"],
  local_visibility: ["service"],
  product_adoption: ["product", "feature"],
};

/**
 * 0.4·goalMatch + 0.2·competitorOverlap + 0.4·typeWeight, clamped to [0,1].
 * goalMatch and competitorOverlap are 0 or 1.
 */
export function computeCommercialValue(
  entity: Pick<Entity, "name" | "type">,
  config: Pick<StrategyConfig, "businessGoals" | "competitors">,
): number {
  const goalMatch = config.businessGoals.some((g) => GOAL_ENTITY_TYPES[g].includes(entity.type)) ? 1 : 0;
  const competitorOverlap = config.competitors.some((c) => sharedTokens(entity.name, c).length > 0) ? 1 : 0;
  const value =
    COMMERCIAL_WEIGHTS.goalMatch * goalMatch +
    COMMERCIAL_WEIGHTS.competitorOverlap * competitorOverlap +
    COMMERCIAL_WEIGHTS.typeWeight * TYPE_WEIGHTS[entity.type];
  return round(Math.min(1, Math.max(0, value)));
}

/** Relationships touching each entity id, in + out. */
export function degreeCounts(relationships: readonly Relationship[]): Map<string, number> {
  const degree = new Map<string, number>();
  for (const rel of relationships) {
    degree.set(rel.sourceId, (degree.get(rel.sourceId) ?? 0) + 1);
    degree.set(rel.targetId, (degree.get(rel.targetId) ?? 0) + 1);
  }
  return degree;
}

/**
 * degree / max degree per entity. Every entity scores 0 when the ontology has
 * a single entity or no relationships at all.
 */
export function computeCentrality(
  entities: readonly Pick<Entity, "id">[],
  relationships: readonly Relationship[],
): Map<string, number> {
  const degree = degreeCounts(relationships);
  const max = Math.max(0, ...entities.map((e) => degree.get(e.id) ?? 0));
  const centrality = new Map<string, number>();
  for (const e of entities) {
    centrality.set(e.id, entities.length <= 1 || max === 0 ? 0 : round((degree.get(e.id) ?? 0) / max));
  }
  return centrality;
}
