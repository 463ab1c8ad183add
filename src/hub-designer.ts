// src/hub-designer.ts — Step 5: Hub Designer
// One hub per taxonomy root: a pillar page plus one cluster page per query
// cluster in the root's subtree, wired into an internal link graph.

import type {
  ContentGap,
  ContentHub,
  HubPage,
  Intent,
  Query,
  QueryCluster,
  Taxonomy,
  TaxonomyNode,
} from "./types.js";
import { INTENTS } from "./types.js";
import type { ContentTemplateCatalog } from "./catalog.js";
import { loadCatalog } from "./catalog.js";
import { fillTemplate, round } from "./text.js";
import { getRootNodes, getSubtreeEntityIds, getSubtreeNodeIds } from "./taxonomy-builder.js";

export const PILLAR_WORD_COUNT = 3000;
export const CLUSTER_WORD_COUNT = 1500;
export const LOW_COVERAGE_THRESHOLD = 0.5;
export const MIN_CLUSTERS_PER_HUB = 3;

// ─── Public API ──────────────────────────────────────────────────────────────

export function designAllHubs(
  taxonomy: Taxonomy,
  queryClusters: readonly QueryCluster[],
  templates: ContentTemplateCatalog = loadCatalog().contentTemplates,
): ContentHub[] {
  const roots = getRootNodes(taxonomy);
  const hubIdOfRoot = new Map(roots.map((r) => [r.id, hubIdFor(r)]));
  const labelOf = new Map(taxonomy.nodes.map((n) => [n.id, n.label]));

  return roots.map((root) => {
    const hubId = hubIdFor(root);
    const pillarId = `${hubId}:pillar`;
    const subtreeNodes = new Set(getSubtreeNodeIds(taxonomy, root.id));
    const subtreeEntities = getSubtreeEntityIds(taxonomy, root.id);
    const owned = queryClusters.filter((c) => subtreeNodes.has(c.taxonomyNodeId));

    const clusters = owned.map((cluster): HubPage => ({
      id: `${hubId}:${cluster.id}`,
      title: fillTemplate(templates.clusterTitles[cluster.intent], {
        topic: labelOf.get(cluster.taxonomyNodeId) ?? root.label,
      }),
      role: "cluster",
      taxonomyNodeId: cluster.taxonomyNodeId,
      primaryIntent: cluster.intent,
      linkedQueryIds: cluster.queries.map((q) => q.id),
      linkedPageIds: [],
      recommendedFormat: templates.formats[cluster.intent] ?? templates.formats.pillar,
      wordCountTarget: CLUSTER_WORD_COUNT,
    }));

    // Clusters link back to the pillar and to siblings sharing an entity.
    owned.forEach((cluster, i) => {
      const page = clusters[i];
      page.linkedPageIds.push(pillarId);
      owned.forEach((other, j) => {
        if (i !== j && other.entityIds.some((id) => cluster.entityIds.includes(id))) {
          page.linkedPageIds.push(clusters[j].id);
        }
      });
    });

    const pillarQueries = topQueryPerEntity(subtreeEntities, owned);
    const linkedPillars = taxonomy.internalLinks
      .filter((l) => l.fromNodeId === root.id && l.toNodeId !== root.id)
      .flatMap((l) => {
        const target = hubIdOfRoot.get(l.toNodeId);
        return target ? [`${target}:pillar`] : [];
      });

    const pillar: HubPage = {
      id: pillarId,
      title: `The Complete Guide to ${root.label}`,
      role: "pillar",
      taxonomyNodeId: root.id,
      primaryIntent: dominantIntent(pillarQueries),
      linkedQueryIds: pillarQueries.map((q) => q.id),
      linkedPageIds: [...clusters.map((c) => c.id), ...new Set(linkedPillars)],
      recommendedFormat: templates.formats.pillar,
      wordCountTarget: PILLAR_WORD_COUNT,
    };

    const pages = [pillar, ...clusters];
    return {
      id: hubId,
      name: root.label,
      taxonomyNodeId: root.id,
      pillar,
      clusters,
      coverageScore: coverageScore(pages, owned, subtreeEntities),
      internalLinkCount: pages.reduce((sum, p) => sum + p.linkedPageIds.length, 0),
    };
  });
}

/**
 * Taxonomy nodes no page targets, hubs below the coverage threshold, and hubs
 * with too few cluster pages, in that order.
 */
export function suggestContentGaps(taxonomy: Taxonomy, hubs: readonly ContentHub[]): ContentGap[] {
  const gaps: ContentGap[] = [];
  const targeted = new Set(hubs.flatMap((h) => [h.pillar, ...h.clusters].map((p) => p.taxonomyNodeId)));

  for (const node of taxonomy.nodes) {
    if (targeted.has(node.id)) continue;
    gaps.push({
      kind: "uncovered-node",
      taxonomyNodeId: node.id,
      label: node.label,
      recommendation: `Plan a cluster page covering "${node.label}"`,
    });
  }

  for (const hub of hubs) {
    if (hub.coverageScore < LOW_COVERAGE_THRESHOLD) {
      gaps.push({
        kind: "low-coverage",
        hubId: hub.id,
        coverageScore: hub.coverageScore,
        recommendation: `Add queries for the uncovered entities under "${hub.name}"`,
      });
    }
    if (hub.clusters.length < MIN_CLUSTERS_PER_HUB) {
      gaps.push({
        kind: "thin-hub",
        hubId: hub.id,
        clusterCount: hub.clusters.length,
        recommendation: `Expand "${hub.name}" to at least ${MIN_CLUSTERS_PER_HUB} cluster pages`,
      });
    }
  }
  return gaps;
}

// ─── Internals ───────────────────────────────────────────────────────────────

function hubIdFor(root: TaxonomyNode): string {
  return `hub-${root.id.replace(/^tax-/, "")}`;
}

/** Highest-priority query per entity; ties keep the first seen. */
function topQueryPerEntity(entityIds: readonly string[], clusters: readonly QueryCluster[]): Query[] {
  const best = new Map<string, Query>();
  for (const cluster of clusters) {
    for (const q of cluster.queries) {
      const current = best.get(q.entityId);
      if (!current || q.priority < current.priority) best.set(q.entityId, q);
    }
  }
  return entityIds.flatMap((id) => best.get(id) ?? []);
}

function dominantIntent(queries: readonly Query[]): Intent {
  let best: Intent = "informational";
  let bestCount = 0;
  for (const intent of INTENTS) {
    const count = queries.filter((q) => q.intent === intent).length;
    if (count > bestCount) {
      best = intent;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Distinct entities referenced by the hub's linked queries over the entities in
 * its subtree. 0 when either side is empty.
 */
function coverageScore(
  pages: readonly HubPage[],
  clusters: readonly QueryCluster[],
  subtreeEntities: readonly string[],
): number {
  if (subtreeEntities.length === 0) return 0;
  const entityOfQuery = new Map<string, string>();
  for (const c of clusters) for (const q of c.queries) entityOfQuery.set(q.id, q.entityId);

  const referenced = new Set<string>();
  for (const page of pages) {
    for (const qid of page.linkedQueryIds) {
      const entityId = entityOfQuery.get(qid);
      if (entityId && subtreeEntities.includes(entityId)) referenced.add(entityId);
    }
  }
  return round(referenced.size / subtreeEntities.length);
}
