// src/taxonomy-builder.ts — Step 3: Taxonomy Builder
// Shallow grouping: one root per entity type, oversized roots split one level
// by their dominant relationship, plus facets and sibling internal links.

import type {
  Entity,
  EntityType,
  FacetDefinition,
  Ontology,
  RelationType,
  Relationship,
  Taxonomy,
  TaxonomyLink,
  TaxonomyNode,
} from "./types.js";
import { EmptyOntologyError, RELATION_TYPES } from "./types.js";
import { toUrlPath } from "./text.js";

/** A root holding more entities than this is split. */
export const SPLIT_THRESHOLD = 6;

export const COMMERCIAL_VALUE_FACET = "commercial-value";
export const SECTION_FACET = "section";
const COMMERCIAL_BANDS = ["high", "medium", "low"];

const TYPE_LABELS: Record<EntityType, string> = {
  product: "Products",
  service: "Services",
  feature: "Features",
  concept: "Concepts",
  topic: "Topics",
};

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * @throws EmptyOntologyError when the ontology has no entities
 */
export function buildTaxonomy(ontology: Ontology): Taxonomy {
  if (ontology.entities.length === 0) {
    throw new EmptyOntologyError("Cannot build a taxonomy from an ontology with no entities");
  }

  const groups = new Map<EntityType, Entity[]>();
  for (const entity of ontology.entities) {
    const group = groups.get(entity.type);
    if (group) group.push(entity);
    else groups.set(entity.type, [entity]);
  }

  const facets = declareFacets(ontology.entities);
  const nodes: TaxonomyNode[] = [];
  for (const [type, members] of groups) {
    const label = TYPE_LABELS[type];
    const root: TaxonomyNode = {
      id: `tax-${type}`,
      label,
      parentId: null,
      depth: 0,
      entityIds: members.map((e) => e.id),
      facetTags: [],
      targetUrl: toUrlPath(label),
    };
    nodes.push(root);
    if (members.length > SPLIT_THRESHOLD) {
      nodes.push(...splitRoot(root, members, ontology.relationships));
    }
  }

  const entityById = new Map(ontology.entities.map((e) => [e.id, e]));
  for (const node of nodes) {
    node.facetTags = facetTagsFor(
      node.entityIds.flatMap((id) => entityById.get(id) ?? []),
      facets,
    );
  }

  return {
    nodes,
    facets,
    internalLinks: buildInternalLinks(nodes, ontology.relationships),
  };
}

export function commercialBand(value: number): string {
  if (value >= 0.7) return "high";
  if (value >= 0.4) return "medium";
  return "low";
}

export function getRootNodes(taxonomy: Taxonomy): TaxonomyNode[] {
  return taxonomy.nodes.filter((n) => n.parentId === null);
}

export function getChildren(taxonomy: Taxonomy, nodeId: string): TaxonomyNode[] {
  return taxonomy.nodes.filter((n) => n.parentId === nodeId);
}

/** Root-to-node chain, or [] for an unknown id. */
export function getNodePath(taxonomy: Taxonomy, nodeId: string): TaxonomyNode[] {
  const byId = new Map(taxonomy.nodes.map((n) => [n.id, n]));
  const path: TaxonomyNode[] = [];
  const seen = new Set<string>();
  let current = byId.get(nodeId);
  while (current && !seen.has(current.id)) {
    seen.add(current.id);
    path.unshift(current);
    current = current.parentId === null ? undefined : byId.get(current.parentId);
  }
  return path;
}

/** Ids of the node itself plus all descendants, in node order. */
export function getSubtreeNodeIds(taxonomy: Taxonomy, nodeId: string): string[] {
  const ids = new Set<string>([nodeId]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const node of taxonomy.nodes) {
      if (node.parentId !== null && ids.has(node.parentId) && !ids.has(node.id)) {
        ids.add(node.id);
        grew = true;
      }
    }
  }
  return taxonomy.nodes.filter((n) => ids.has(n.id)).map((n) => n.id);
}

/** Entity ids classified anywhere under the node, deduplicated. */
export function getSubtreeEntityIds(taxonomy: Taxonomy, nodeId: string): string[] {
  const subtree = new Set(getSubtreeNodeIds(taxonomy, nodeId));
  const ids: string[] = [];
  for (const node of taxonomy.nodes) {
    if (!subtree.has(node.id)) continue;
    for (const id of node.entityIds) if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

// ─── Splitting ───────────────────────────────────────────────────────────────

function splitRoot(
  root: TaxonomyNode,
  members: Entity[],
  relationships: readonly Relationship[],
): TaxonomyNode[] {
  const memberIds = new Set(members.map((m) => m.id));
  const internal = relationships.filter((r) => memberIds.has(r.sourceId) && memberIds.has(r.targetId));
  const splitType = dominantRelationType(internal);
  if (!splitType) return [];

  const nameById = new Map(members.map((m) => [m.id, m.name]));
  const assigned = new Set<string>();
  const children: TaxonomyNode[] = [];
  const anchors: string[] = [];
  for (const r of internal) {
    if (r.type === splitType && !anchors.includes(r.targetId)) anchors.push(r.targetId);
  }

  for (const anchor of anchors) {
    if (assigned.has(anchor)) continue;
    const entityIds = [anchor];
    assigned.add(anchor);
    for (const r of internal) {
      if (r.type === splitType && r.targetId === anchor && !assigned.has(r.sourceId)) {
        entityIds.push(r.sourceId);
        assigned.add(r.sourceId);
      }
    }
    const anchorName = nameById.get(anchor) ?? anchor;
    children.push({
      id: `${root.id}-${anchor.replace(/^ent-/, "")}`,
      label: anchorName,
      parentId: root.id,
      depth: 1,
      entityIds,
      facetTags: [],
      targetUrl: toUrlPath(root.label, anchorName),
    });
  }

  root.entityIds = root.entityIds.filter((id) => !assigned.has(id));
  return children;
}

/** Most frequent relation type; ties go to the earlier declared type. */
function dominantRelationType(relationships: readonly Relationship[]): RelationType | undefined {
  let best: RelationType | undefined;
  let bestCount = 0;
  for (const type of RELATION_TYPES) {
    const count = relationships.filter((r) => r.type === type).length;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

// ─── Facets ──────────────────────────────────────────────────────────────────

function declareFacets(entities: readonly Entity[]): FacetDefinition[] {
  const facets: FacetDefinition[] = [{ name: COMMERCIAL_VALUE_FACET, values: [...COMMERCIAL_BANDS] }];
  const sections: string[] = [];
  for (const e of entities) {
    for (const c of e.categories) if (!sections.includes(c)) sections.push(c);
  }
  if (sections.length > 0) facets.push({ name: SECTION_FACET, values: sections });
  return facets;
}

function facetTagsFor(entities: readonly Entity[], facets: readonly FacetDefinition[]): string[] {
  const tags: string[] = [];
  for (const facet of facets) {
    const present = new Set<string>();
    for (const e of entities) {
      if (facet.name === COMMERCIAL_VALUE_FACET) present.add(commercialBand(e.commercialValue));
      else if (facet.name === SECTION_FACET) e.categories.forEach((c) => present.add(c));
    }
    for (const value of facet.values) {
      if (present.has(value)) tags.push(`${facet.name}:${value}`);
    }
  }
  return tags;
}

// ─── Internal links ──────────────────────────────────────────────────────────

function buildInternalLinks(
  nodes: readonly TaxonomyNode[],
  relationships: readonly Relationship[],
): TaxonomyLink[] {
  const nodeOfEntity = new Map<string, TaxonomyNode>();
  for (const node of nodes) {
    for (const id of node.entityIds) if (!nodeOfEntity.has(id)) nodeOfEntity.set(id, node);
  }

  const links: TaxonomyLink[] = [];
  const seen = new Set<string>();
  for (const r of relationships) {
    const from = nodeOfEntity.get(r.sourceId);
    const to = nodeOfEntity.get(r.targetId);
    if (!from || !to || from.id === to.id || from.parentId !== to.parentId) continue;
    const key = `${from.id}->${to.id}`;
    if (seen.has(key)) continue;
    seen.add(key);
    links.push({ fromNodeId: from.id, toNodeId: to.id, relationType: r.type });
  }
  return links;
}
