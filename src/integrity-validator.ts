// src/integrity-validator.ts — Final referential-integrity pass
// Every id string one stage hands to another must resolve in the assembled
// document. Collects every dangling reference, then fails once.

import type { FrameworkOutput, IntegrityIssue } from "./types.js";
import { ReferentialIntegrityError } from "./types.js";

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * @throws ReferentialIntegrityError listing every issue found
 */
export function validateFrameworkOutput(output: FrameworkOutput): void {
  const issues = collectIntegrityIssues(output);
  if (issues.length > 0) throw new ReferentialIntegrityError(issues);
}

/** All integrity issues in document order. An empty array means the output is sound. */
export function collectIntegrityIssues(output: FrameworkOutput): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const check = (ids: ReadonlySet<string>, reference: string, path: string, what: string): void => {
    if (!ids.has(reference)) {
      issues.push({ path, reference, message: `Unknown ${what} "${reference}"` });
    }
  };

  const entityIds = uniqueIds(
    output.ontology.entities.map((e) => e.id),
    "ontology.entities",
    issues,
  );

  output.ontology.relationships.forEach((r, i) => {
    const path = `ontology.relationships[${i}]`;
    check(entityIds, r.sourceId, `${path}.sourceId`, "entity");
    check(entityIds, r.targetId, `${path}.targetId`, "entity");
    if (r.sourceId === r.targetId) {
      issues.push({ path, reference: r.sourceId, message: "Relationship links an entity to itself" });
    }
  });

  // ─── Taxonomy ──────────────────────────────────────────────────────────────
  const nodeIds = uniqueIds(
    output.taxonomy.nodes.map((n) => n.id),
    "taxonomy.nodes",
    issues,
  );
  const parentOf = new Map(output.taxonomy.nodes.map((n) => [n.id, n.parentId]));
  output.taxonomy.nodes.forEach((node, i) => {
    const path = `taxonomy.nodes[${i}]`;
    if (node.parentId !== null) check(nodeIds, node.parentId, `${path}.parentId`, "taxonomy node");
    node.entityIds.forEach((id, j) => check(entityIds, id, `${path}.entityIds[${j}]`, "entity"));
    if (hasCycle(node.id, parentOf)) {
      issues.push({ path: `${path}.parentId`, reference: node.id, message: "Taxonomy parent chain forms a cycle" });
    }
  });
  output.taxonomy.internalLinks.forEach((l, i) => {
    check(nodeIds, l.fromNodeId, `taxonomy.internalLinks[${i}].fromNodeId`, "taxonomy node");
    check(nodeIds, l.toNodeId, `taxonomy.internalLinks[${i}].toNodeId`, "taxonomy node");
  });

  // ─── Queries ───────────────────────────────────────────────────────────────
  const queryIds = uniqueIds(
    output.queryClusters.flatMap((c) => c.queries.map((q) => q.id)),
    "queryClusters[].queries",
    issues,
  );
  output.queryClusters.forEach((cluster, i) => {
    const path = `queryClusters[${i}]`;
    check(nodeIds, cluster.taxonomyNodeId, `${path}.taxonomyNodeId`, "taxonomy node");
    cluster.entityIds.forEach((id, j) => check(entityIds, id, `${path}.entityIds[${j}]`, "entity"));
    cluster.queries.forEach((q, j) => check(entityIds, q.entityId, `${path}.queries[${j}].entityId`, "entity"));
  });
  for (const id of Object.keys(output.intentCoverage.byEntity)) {
    check(entityIds, id, `intentCoverage.byEntity.${id}`, "entity");
  }

  // ─── Hubs ──────────────────────────────────────────────────────────────────
  const hubIds = uniqueIds(
    output.contentHubs.map((h) => h.id),
    "contentHubs",
    issues,
  );
  const pageIds = uniqueIds(
    output.contentHubs.flatMap((h) => [h.pillar, ...h.clusters].map((p) => p.id)),
    "contentHubs[].pages",
    issues,
  );
  output.contentHubs.forEach((hub, i) => {
    check(nodeIds, hub.taxonomyNodeId, `contentHubs[${i}].taxonomyNodeId`, "taxonomy node");
    const pages = [hub.pillar, ...hub.clusters];
    pages.forEach((page, j) => {
      const path = j === 0 ? `contentHubs[${i}].pillar` : `contentHubs[${i}].clusters[${j - 1}]`;
      check(nodeIds, page.taxonomyNodeId, `${path}.taxonomyNodeId`, "taxonomy node");
      page.linkedQueryIds.forEach((id, k) => check(queryIds, id, `${path}.linkedQueryIds[${k}]`, "query"));
      page.linkedPageIds.forEach((id, k) => check(pageIds, id, `${path}.linkedPageIds[${k}]`, "hub page"));
    });
  });
  output.contentGaps.forEach((gap, i) => {
    if (gap.kind === "uncovered-node") {
      check(nodeIds, gap.taxonomyNodeId, `contentGaps[${i}].taxonomyNodeId`, "taxonomy node");
    } else {
      check(hubIds, gap.hubId, `contentGaps[${i}].hubId`, "content hub");
    }
  });

  // ─── Specs ─────────────────────────────────────────────────────────────────
  const personaIds = uniqueIds(
    output.personas.map((p) => p.id),
    "personas",
    issues,
  );
  const specIds = uniqueIds(output.contentSpecs.map((s) => s.id), "contentSpecs", issues);
  output.contentSpecs.forEach((spec, i) => {
    check(pageIds, spec.hubPageId, `contentSpecs[${i}].hubPageId`, "hub page");
    spec.targetPersonaIds.forEach((id, j) => check(personaIds, id, `contentSpecs[${i}].targetPersonaIds[${j}]`, "persona"));
    spec.linkAnchors.forEach((a, j) => check(pageIds, a.pageId, `contentSpecs[${i}].linkAnchors[${j}].pageId`, "hub page"));
  });

  // ─── Measurement ───────────────────────────────────────────────────────────
  const plan = output.measurementPlan;
  const monitoredIds = new Set(plan.monitoringQueries.map((m) => m.queryId));
  plan.monitoringQueries.forEach((m, i) => {
    check(queryIds, m.queryId, `measurementPlan.monitoringQueries[${i}].queryId`, "query");
    check(entityIds, m.entityId, `measurementPlan.monitoringQueries[${i}].entityId`, "entity");
  });
  plan.kpis.forEach((kpi, i) => {
    kpi.monitoringQueryIds.forEach((id, j) =>
      check(monitoredIds, id, `measurementPlan.kpis[${i}].monitoringQueryIds[${j}]`, "monitoring query"),
    );
  });
  plan.contentAudit.forEach((item, i) => {
    check(specIds, item.specId, `measurementPlan.contentAudit[${i}].specId`, "content spec");
    check(pageIds, item.hubPageId, `measurementPlan.contentAudit[${i}].hubPageId`, "hub page");
  });

  return issues;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function uniqueIds(ids: readonly string[], path: string, issues: IntegrityIssue[]): Set<string> {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) issues.push({ path, reference: id, message: `Duplicate id "${id}"` });
    seen.add(id);
  }
  return seen;
}

function hasCycle(start: string, parentOf: ReadonlyMap<string, string | null>): boolean {
  const visited = new Set<string>();
  let current = parentOf.get(start) ?? null;
  while (current !== null) {
    if (current === start) return true;
    if (visited.has(current)) return false; // loop above this node, reported at its own members
    visited.add(current);
    current = parentOf.get(current) ?? null;
  }
  return false;
}
