// src/exporters/csv.ts — Spreadsheet tables
// One CSV file per table, RFC 4180 quoting, CRLF line breaks. List cells are
// joined with "; ".

import type { ExportArtifact, FrameworkOutput } from "../types.js";
import { buildContentCalendar } from "../content-spec-generator.js";

type Cell = string | number | null | undefined;

export function exportCsv(output: FrameworkOutput): ExportArtifact[] {
  const entityName = new Map(output.ontology.entities.map((e) => [e.id, e.name]));
  const nameOf = (id: string): string => entityName.get(id) ?? id;

  return [
    {
      filename: "entities.csv",
      content: toCsv(
        ["Entity ID", "Name", "Type", "Origin", "Aliases", "Commercial Value", "Centrality", "Categories", "Source URLs"],
        output.ontology.entities.map((e) => [
          e.id,
          e.name,
          e.type,
          e.origin,
          list(e.aliases),
          e.commercialValue,
          e.centrality,
          list(e.categories),
          list(e.sourceUrls),
        ]),
      ),
    },
    {
      filename: "relationships.csv",
      content: toCsv(
        ["Source Entity", "Relationship Type", "Target Entity", "Weight", "Evidence"],
        output.ontology.relationships.map((r) => [nameOf(r.sourceId), r.type, nameOf(r.targetId), r.weight, r.evidence]),
      ),
    },
    {
      filename: "taxonomy.csv",
      content: toCsv(
        ["Node ID", "Label", "Parent ID", "Depth", "Target URL", "Facets", "Entities"],
        output.taxonomy.nodes.map((n) => [
          n.id,
          n.label,
          n.parentId,
          n.depth,
          n.targetUrl,
          list(n.facetTags),
          list(n.entityIds.map(nameOf)),
        ]),
      ),
    },
    {
      filename: "queries.csv",
      content: toCsv(
        ["Cluster ID", "Taxonomy Node", "Query ID", "Query", "Entity", "Intent", "Priority", "SERP Feature", "Fan-out Pattern"],
        output.queryClusters.flatMap((c) =>
          c.queries.map((q) => [
            c.id,
            c.taxonomyNodeId,
            q.id,
            q.text,
            nameOf(q.entityId),
            q.intent,
            q.priority,
            q.estimatedSerpFeature,
            q.fanoutPatternUsed,
          ]),
        ),
      ),
    },
    {
      filename: "content-hubs.csv",
      content: toCsv(
        ["Hub", "Page ID", "Title", "Role", "Intent", "Format", "Word Count", "Linked Queries", "Links To"],
        output.contentHubs.flatMap((h) =>
          [h.pillar, ...h.clusters].map((p) => [
            h.name,
            p.id,
            p.title,
            p.role,
            p.primaryIntent,
            p.recommendedFormat,
            p.wordCountTarget,
            p.linkedQueryIds.length,
            list(p.linkedPageIds),
          ]),
        ),
      ),
    },
    {
      filename: "content-specs.csv",
      content: toCsv(
        ["Spec ID", "Title", "Target URL", "Priority", "Primary Query", "Secondary Queries", "Personas", "Format", "Word Count", "Structure", "Schema Types", "SERP Targets", "Link Anchors"],
        output.contentSpecs.map((s) => [
          s.id,
          s.title,
          s.targetUrl,
          s.priority,
          s.primaryQuery,
          list(s.secondaryQueries),
          list(s.targetPersonaIds),
          s.recommendedFormat,
          s.wordCountTarget,
          s.recommendedStructure.join(" > "),
          list(s.schemaMarkupTypes),
          list(s.serpFeatureTargets),
          list(s.linkAnchors.map((a) => a.anchorText)),
        ]),
      ),
    },
    {
      filename: "content-calendar.csv",
      content: toCsv(
        ["Order", "Title", "Format", "Word Count", "Priority", "Primary Query", "Target URL", "Estimated Impact"],
        buildContentCalendar(output.contentSpecs).map((c) => [
          c.order,
          c.title,
          c.format,
          c.wordCount,
          c.priority,
          c.primaryQuery,
          c.targetUrl,
          c.estimatedImpact,
        ]),
      ),
    },
  ];
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly Cell[]>): string {
  return [header, ...rows].map((row) => row.map(escapeCsv).join(",")).join("\r\n") + "\r\n";
}

export function escapeCsv(value: Cell): string {
  const text = value === null || value === undefined ? "" : String(value);
  const needsQuotes = /[",\r\n]/.test(text);
  const escaped = text.replace(/"/g, '""');
  return needsQuotes ? `"${escaped}"` : escaped;
}

function list(values: readonly string[]): string {
  return values.join("; ");
}
