// src/exporters/markdown.ts — Human-readable strategy report
// One section per step, built from the document alone. No timestamps beyond
// meta.generatedAt, so equal documents render equal reports.

import type { ContentGap, ExportArtifact, FrameworkOutput, FrameworkSummary } from "../types.js";
import { getChildren, getRootNodes } from "../taxonomy-builder.js";
import { buildContentCalendar } from "../content-spec-generator.js";

export const MARKDOWN_FILENAME = "content-strategy.md";

const SUMMARY_ROWS: Array<[keyof FrameworkSummary, string]> = [
  ["totalEntities", "Entities"],
  ["totalRelationships", "Relationships"],
  ["taxonomyNodes", "Taxonomy nodes"],
  ["queryClusters", "Query clusters"],
  ["totalQueries", "Queries"],
  ["contentHubs", "Content hubs"],
  ["totalPagesPlanned", "Pages planned"],
  ["contentSpecs", "Content specs"],
  ["kpisDefined", "KPIs"],
  ["monitoringQueries", "Monitoring queries"],
];

export function exportMarkdown(output: FrameworkOutput): ExportArtifact[] {
  return [{ filename: MARKDOWN_FILENAME, content: renderMarkdown(output) }];
}

export function renderMarkdown(output: FrameworkOutput): string {
  const sections = [
    formatHeader(output),
    formatSummary(output.summary),
    formatOntology(output),
    formatExpansion(output),
    formatTaxonomy(output),
    formatQueries(output),
    formatHubs(output),
    formatSpecs(output),
    formatMeasurement(output),
    formatWarnings(output),
  ].filter((s) => s.length > 0);
  return `${sections.join("\n\n")}\n`;
}

// ─── Sections ────────────────────────────────────────────────────────────────

function formatHeader(output: FrameworkOutput): string {
  const s = output.strategy;
  const lines = [
    `# Content Strategy: ${s.brandName}`,
    "",
    `- **Niche:** ${s.primaryNiche}`,
    `- **Goals:** ${s.businessGoals.join(", ")}`,
    `- **Source:** ${s.sourceMode}${s.sitemapUrl ? ` (${s.sitemapUrl})` : ""}`,
  ];
  if (s.competitors.length > 0) lines.push(`- **Competitors:** ${s.competitors.join(", ")}`);
  if (s.targetRegions.length > 0) lines.push(`- **Regions:** ${s.targetRegions.join(", ")}`);
  lines.push(`- **Generated:** ${output.meta.generatedAt} (engine ${output.meta.engineVersion})`);
  return lines.join("\n");
}

function formatSummary(summary: FrameworkSummary): string {
  const rows = SUMMARY_ROWS.map(([key, label]) => `| ${label} | ${summary[key]} |`);
  return ["## Summary", "", "| Metric | Value |", "|--------|-------|", ...rows].join("\n");
}

function formatOntology(output: FrameworkOutput): string {
  const { entities, relationships } = output.ontology;
  const nameOf = new Map(entities.map((e) => [e.id, e.name]));
  const lines = [
    "## Step 1: Ontology",
    "",
    "| Entity | Type | Origin | Commercial value | Centrality |",
    "|--------|------|--------|------------------|------------|",
    ...entities.map(
      (e) => `| ${cell(e.name)} | ${e.type} | ${e.origin} | ${e.commercialValue} | ${e.centrality} |`,
    ),
    "",
    "### Relationships",
    "",
  ];
  if (relationships.length === 0) {
    lines.push("_No relationships inferred._");
  } else {
    for (const r of relationships) {
      lines.push(`- ${nameOf.get(r.sourceId) ?? r.sourceId} → *${r.type}* → ${nameOf.get(r.targetId) ?? r.targetId}`);
    }
  }
  return lines.join("\n");
}

function formatExpansion(output: FrameworkOutput): string {
  const lines = ["## Step 2: Entity Expansion", ""];
  const withAliases = output.ontology.entities.filter((e) => e.aliases.length > 0);
  if (withAliases.length === 0) {
    lines.push("_No aliases generated._");
  } else {
    for (const e of withAliases) lines.push(`- **${e.name}:** ${e.aliases.join(", ")}`);
  }
  if (output.entityGaps.length > 0) {
    lines.push("", "### Entity gaps", "");
    for (const gap of output.entityGaps) lines.push(`- ${gap}`);
  }
  return lines.join("\n");
}

function formatTaxonomy(output: FrameworkOutput): string {
  const taxonomy = output.taxonomy;
  const lines = ["## Step 3: Taxonomy", ""];
  for (const root of getRootNodes(taxonomy)) {
    lines.push(`- **${root.label}** \`${root.targetUrl}\` (${root.entityIds.length} entities)`);
    for (const child of getChildren(taxonomy, root.id)) {
      lines.push(`  - ${child.label} \`${child.targetUrl}\` (${child.entityIds.length} entities)`);
    }
  }
  lines.push("", "### Facets", "");
  for (const facet of taxonomy.facets) lines.push(`- **${facet.name}:** ${facet.values.join(", ")}`);
  return lines.join("\n");
}

function formatQueries(output: FrameworkOutput): string {
  const labelOf = new Map(output.taxonomy.nodes.map((n) => [n.id, n.label]));
  const coverage = output.intentCoverage;
  const lines = [
    "## Step 4: Query Mapping",
    "",
    `**Intent coverage:** ${percent(coverage.overall)}`,
  ];
  if (coverage.missingIntents.length > 0) {
    lines.push(`**Missing intents:** ${coverage.missingIntents.join(", ")}`);
  }
  for (const cluster of output.queryClusters) {
    lines.push("", `### ${labelOf.get(cluster.taxonomyNodeId) ?? cluster.taxonomyNodeId}: ${cluster.intent}`, "");
    for (const q of cluster.queries) lines.push(`- ${q.text} (priority ${q.priority})`);
  }
  return lines.join("\n");
}

function formatHubs(output: FrameworkOutput): string {
  const lines = ["## Step 5: Content Hubs"];
  for (const hub of output.contentHubs) {
    lines.push(
      "",
      `### ${hub.name}`,
      "",
      `- **Pillar:** ${hub.pillar.title}`,
      ...hub.clusters.map((c) => `- **Cluster:** ${c.title}`),
      `- **Coverage:** ${percent(hub.coverageScore)}`,
      `- **Internal links:** ${hub.internalLinkCount}`,
    );
  }
  if (output.contentGaps.length > 0) {
    lines.push("", "### Content gaps", "");
    for (const gap of output.contentGaps) lines.push(`- ${gapLine(gap)}`);
  }
  return lines.join("\n");
}

function formatSpecs(output: FrameworkOutput): string {
  const personaName = new Map(output.personas.map((p) => [p.id, p.name]));
  const lines = ["## Step 6: Content Specs", "", "### Personas", ""];
  for (const p of output.personas) {
    lines.push(`- **${p.name}** (${p.knowledgeLevel}): ${p.tone}`);
  }
  for (const spec of output.contentSpecs) {
    lines.push(
      "",
      `### ${spec.title}`,
      "",
      `- **URL:** \`${spec.targetUrl}\``,
      `- **Priority:** ${spec.priority} (${spec.estimatedImpact})`,
      `- **Primary query:** ${spec.primaryQuery}`,
    );
    if (spec.secondaryQueries.length > 0) {
      lines.push(`- **Secondary queries:** ${spec.secondaryQueries.join(", ")}`);
    }
    lines.push(
      `- **Personas:** ${spec.targetPersonaIds.map((id) => personaName.get(id) ?? id).join(", ")}`,
      `- **Format:** ${spec.recommendedFormat}, ${spec.wordCountTarget} words`,
      `- **Structure:** ${spec.recommendedStructure.join(" → ")}`,
      `- **Schema:** ${spec.schemaMarkupTypes.join(", ")}`,
    );
    for (const note of spec.aiOptimizationNotes) lines.push(`  - ${note}`);
    if (spec.linkAnchors.length > 0) {
      lines.push(`- **Link anchors:** ${spec.linkAnchors.map((a) => `"${a.anchorText}"`).join(", ")}`);
    }
  }
  const calendar = buildContentCalendar(output.contentSpecs);
  if (calendar.length > 0) {
    lines.push(
      "",
      "### Content calendar",
      "",
      "| # | Title | Priority | Format | Words |",
      "|---|-------|----------|--------|-------|",
      ...calendar.map((c) => `| ${c.order} | ${cell(c.title)} | ${c.priority} | ${c.format} | ${c.wordCount} |`),
    );
  }
  return lines.join("\n");
}

function formatMeasurement(output: FrameworkOutput): string {
  const plan = output.measurementPlan;
  const lines = [
    "## Step 7: Measurement",
    "",
    "| KPI | Priority | Cadence | Tracked queries |",
    "|-----|----------|---------|-----------------|",
    ...plan.kpis.map((k) => `| ${cell(k.name)} | ${k.priority} | ${k.refreshCadence} | ${k.monitoringQueryIds.length} |`),
    "",
    "### Monitoring queries",
    "",
  ];
  if (plan.monitoringQueries.length === 0) {
    lines.push("_No entity is valuable enough to monitor._");
  } else {
    for (const m of plan.monitoringQueries) lines.push(`- ${m.text}`);
  }
  lines.push("", "### AI audit prompts", "");
  for (const a of plan.auditPrompts) lines.push(`- **${a.category}:** ${a.prompt}`);
  lines.push("", "### Refresh schedule", "");
  for (const [item, cadence] of Object.entries(plan.refreshSchedule)) lines.push(`- **${item}:** ${cadence}`);
  if (plan.competitorTracking.length > 0) {
    lines.push("", "### Competitor tracking", "");
    for (const c of plan.competitorTracking) lines.push(`- **${c.competitor}:** ${c.monitorQueries.join(", ")}`);
  }
  if (plan.contentAudit.length > 0) {
    lines.push("", "### Content audit", "");
    for (const a of plan.contentAudit) {
      lines.push(`- **${a.title}** (${a.updatePriority}): ${a.recommendedUpdates.join("; ")}`);
    }
  }
  lines.push("", "### Quick wins", "");
  for (const w of plan.quickWins) {
    lines.push(`- **${w.action}** (impact ${w.impact}; effort ${w.effort}): ${w.items.join(", ")}`);
  }
  return lines.join("\n");
}

function formatWarnings(output: FrameworkOutput): string {
  if (output.warnings.length === 0) return "";
  return ["## Warnings", "", ...output.warnings.map((w) => `- [${w.level}] ${w.module}: ${w.message}`)].join("\n");
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function gapLine(gap: ContentGap): string {
  switch (gap.kind) {
    case "uncovered-node":
      return `Uncovered node ${gap.label}: ${gap.recommendation}`;
    case "low-coverage":
      return `Low coverage (${percent(gap.coverageScore)}): ${gap.recommendation}`;
    case "thin-hub":
      return `Thin hub (${gap.clusterCount} clusters): ${gap.recommendation}`;
  }
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/** Escape table-breaking pipes. */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
