// src/measurement-setup.ts — Step 7: Measurement Setup
// KPIs filtered by goal, a bounded monitoring-query list, AI audit prompts,
// and a freshness audit over the planned specs.

import type {
  AuditPrompt,
  CompetitorTracking,
  ContentAuditItem,
  ContentSpec,
  Entity,
  FrameworkOutput,
  KPI,
  KpiTemplate,
  MeasurementPlan,
  MonitoringQuery,
  Ontology,
  Query,
  QuickWin,
  StrategyConfig,
} from "./types.js";
import type { AuditPromptCatalog, ContentTemplateCatalog } from "./catalog.js";
import { loadCatalog } from "./catalog.js";
import { fillTemplate, slugify } from "./text.js";

export const MONITORING_VALUE_THRESHOLD = 0.5;
export const MAX_MONITORING_QUERIES = 25;
export const AUDIT_TOP_ENTITIES = 5;

const REFRESH_SCHEDULE: Record<string, string> = {
  "pillar-pages": "quarterly",
  "cluster-pages": "semi-annually",
  "comparison-content": "quarterly",
  "how-to-tutorials": "semi-annually",
  "schema-markup-audit": "quarterly",
  "internal-link-audit": "monthly",
  "ai-visibility-audit": "monthly",
  "monitoring-queries": "weekly",
};

// Formats whose facts go stale quickly; their audits start one rank higher.
const TIME_SENSITIVE_FORMATS = ["comparison_table", "product_review", "listicle"];

const MAX_QUICK_WIN_ITEMS = 5;

const STANDING_QUICK_WINS: readonly QuickWin[] = [
  {
    action: "Implement structured data on existing pages",
    items: ["FAQPage schema", "HowTo schema", "Article schema with author"],
    impact: "Medium: improves AI extractability",
    effort: "Low",
  },
  {
    action: "Update date-sensitive content",
    items: ["Comparison pages", "Pricing pages", "Product reviews"],
    impact: "Medium: signals recency to AI systems",
    effort: "Low-Medium",
  },
  {
    action: "Strengthen internal linking",
    items: ["Link new content to pillars", "Add contextual links between clusters"],
    impact: "Medium: improves topical authority signals",
    effort: "Low",
  },
];

/** The slice of the framework document measurement reads. */
export type MeasurementInput = Pick<FrameworkOutput, "strategy" | "ontology" | "queryClusters" | "contentSpecs">;

// ─── Public API ──────────────────────────────────────────────────────────────

export function createMeasurementPlan(
  document: MeasurementInput,
  kpiCatalog: readonly KpiTemplate[] = loadCatalog().kpis,
  auditCatalog: AuditPromptCatalog = loadCatalog().auditPrompts,
  refreshActions: ContentTemplateCatalog["refreshActions"] = loadCatalog().contentTemplates.refreshActions,
): MeasurementPlan {
  const { strategy, ontology, queryClusters, contentSpecs } = document;
  const monitoringQueries = selectMonitoringQueries(
    ontology,
    queryClusters.flatMap((c) => c.queries),
  );
  const monitoringIds = monitoringQueries.map((m) => m.queryId);

  const kpis: KPI[] = kpiCatalog
    .filter((k) => k.goals.length === 0 || k.goals.some((g) => strategy.businessGoals.includes(g)))
    .map((k) => ({
      id: `kpi-${slugify(k.key)}`,
      name: k.name,
      description: k.description,
      measurementMethod: k.measurementMethod,
      refreshCadence: k.refreshCadence,
      priority: k.priority,
      monitoringQueryIds: k.tracksQueries ? [...monitoringIds] : [],
    }));

  return {
    kpis,
    monitoringQueries,
    auditPrompts: getAiAuditPrompts(strategy, ontology, auditCatalog),
    refreshSchedule: { ...REFRESH_SCHEDULE },
    competitorTracking: getCompetitorTracking(strategy),
    contentAudit: createContentAudit(contentSpecs, refreshActions),
    quickWins: getQuickWins(contentSpecs),
  };
}

/**
 * One audit entry per spec. Nothing is published yet, so every page starts
 * with no update date and zero freshness.
 */
export function createContentAudit(
  specs: readonly ContentSpec[],
  refreshActions: ContentTemplateCatalog["refreshActions"] = loadCatalog().contentTemplates.refreshActions,
): ContentAuditItem[] {
  return specs.map((spec) => ({
    specId: spec.id,
    hubPageId: spec.hubPageId,
    url: spec.targetUrl,
    title: spec.title,
    lastUpdated: null,
    freshnessScore: 0,
    updatePriority:
      spec.priority === "medium" && TIME_SENSITIVE_FORMATS.includes(spec.recommendedFormat) ? "high" : spec.priority,
    recommendedUpdates: [...(refreshActions.default ?? []), ...(refreshActions[spec.recommendedFormat] ?? [])],
  }));
}

/** Critical pages to write first, when there are any, then standing actions. */
export function getQuickWins(specs: readonly ContentSpec[]): QuickWin[] {
  const critical = specs.filter((s) => s.priority === "critical");
  const wins: QuickWin[] = [];
  if (critical.length > 0) {
    wins.push({
      action: "Create critical priority content",
      items: critical.slice(0, MAX_QUICK_WIN_ITEMS).map((s) => s.title),
      impact: "High: addresses the most important visibility gaps",
      effort: "Medium-High",
    });
  }
  return [...wins, ...STANDING_QUICK_WINS.map((w) => ({ ...w, items: [...w.items] }))];
}

/**
 * The highest-priority query of each entity whose commercial value exceeds the
 * threshold. Entities are taken by commercial value, highest first (ties keep
 * ontology order), and the list is capped.
 */
export function selectMonitoringQueries(ontology: Ontology, queries: readonly Query[]): MonitoringQuery[] {
  const best = new Map<string, Query>();
  for (const q of queries) {
    const current = best.get(q.entityId);
    if (!current || q.priority < current.priority) best.set(q.entityId, q);
  }

  return byDescending(ontology.entities, (e) => e.commercialValue)
    .filter((e) => e.commercialValue > MONITORING_VALUE_THRESHOLD)
    .flatMap((e) => best.get(e.id) ?? [])
    .slice(0, MAX_MONITORING_QUERIES)
    .map((q) => ({ queryId: q.id, text: q.text, entityId: q.entityId }));
}

/**
 * Brand-level prompts followed by one topical prompt for each of the most
 * central entities.
 */
export function getAiAuditPrompts(
  config: Pick<StrategyConfig, "brandName" | "primaryNiche">,
  ontology: Ontology,
  catalog: AuditPromptCatalog = loadCatalog().auditPrompts,
): AuditPrompt[] {
  const values = { brand: config.brandName, niche: config.primaryNiche };
  const prompts = catalog.brand.map((p) => fillPrompt(p, values));
  for (const entity of byDescending(ontology.entities, (e) => e.centrality).slice(0, AUDIT_TOP_ENTITIES)) {
    prompts.push(fillPrompt(catalog.entity, { ...values, entity: entity.name }));
  }
  return prompts;
}

export function getCompetitorTracking(config: Pick<StrategyConfig, "brandName" | "competitors">): CompetitorTracking[] {
  const brand = config.brandName.toLowerCase();
  return config.competitors.map((competitor) => {
    const name = competitor.toLowerCase();
    return {
      competitor,
      monitorQueries: [`what is ${name}`, `${name} vs ${brand}`, `${name} review`, `${name} alternatives`],
    };
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function fillPrompt(prompt: AuditPrompt, values: Record<string, string>): AuditPrompt {
  return {
    category: prompt.category,
    prompt: fillTemplate(prompt.prompt, values),
    checkFor: fillTemplate(prompt.checkFor, values),
  };
}

/** Stable descending sort. */
function byDescending(entities: readonly Entity[], score: (e: Entity) => number): Entity[] {
  return entities
    .map((entity, index) => ({ entity, index }))
    .sort((a, b) => score(b.entity) - score(a.entity) || a.index - b.index)
    .map((x) => x.entity);
}
