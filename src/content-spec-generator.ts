// src/content-spec-generator.ts — Step 6: Content Spec Generator
// Personas once per run from goals and competitors; one spec per hub page
// assembled from fixed templates. No generated prose beyond string composition.

import type {
  CalendarItem,
  ContentHub,
  ContentPriority,
  ContentSpec,
  Entity,
  HubPage,
  Intent,
  LinkAnchor,
  Ontology,
  Persona,
  Query,
  QueryCluster,
  SerpFeature,
  StrategyConfig,
  Taxonomy,
} from "./types.js";
import type { Catalog, PersonaTemplate } from "./catalog.js";
import { loadCatalog } from "./catalog.js";
import { CONTENT_PRIORITIES } from "./types.js";
import { fillTemplate, slugify } from "./text.js";

const SCHEMA_BY_INTENT: Record<Intent, string[]> = {
  informational: ["Article", "HowTo", "FAQPage"],
  navigational: ["WebPage", "SiteNavigationElement"],
  commercial: ["Article", "ItemList", "FAQPage"],
  transactional: ["Product", "Offer", "Review"],
  local: ["LocalBusiness", "FAQPage"],
};

const SCHEMA_BY_ROLE: Record<HubPage["role"], string[]> = {
  pillar: ["Organization", "BreadcrumbList"],
  cluster: ["BreadcrumbList"],
};

const MAX_SECONDARY_QUERIES = 4;
const ANCHOR_WORDS = 4;
const MULTI_QUERY_THRESHOLD = 5;

export interface SpecContext {
  ontology: Ontology;
  queryClusters: readonly QueryCluster[];
  taxonomy: Taxonomy;
}

export interface SpecResult {
  personas: Persona[];
  specs: ContentSpec[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

export function generateAllSpecs(
  contentHubs: readonly ContentHub[],
  config: StrategyConfig,
  context: SpecContext,
  catalog: Pick<Catalog, "personas" | "contentTemplates"> = loadCatalog(),
): SpecResult {
  const templates = selectPersonaTemplates(config, catalog.personas);
  const personas = templates.map((t) => toPersona(t, config));

  const queryById = new Map<string, Query>();
  for (const c of context.queryClusters) for (const q of c.queries) queryById.set(q.id, q);
  const entityById = new Map(context.ontology.entities.map((e) => [e.id, e]));
  const nodeById = new Map(context.taxonomy.nodes.map((n) => [n.id, n]));
  const hubOfPage = new Map<string, ContentHub>();
  const pageById = new Map<string, HubPage>();
  for (const hub of contentHubs) {
    for (const page of [hub.pillar, ...hub.clusters]) {
      hubOfPage.set(page.id, hub);
      pageById.set(page.id, page);
    }
  }

  const specs: ContentSpec[] = [];
  for (const hub of contentHubs) {
    for (const page of [hub.pillar, ...hub.clusters]) {
      const queries = page.linkedQueryIds.flatMap((id) => queryById.get(id) ?? []);
      const entities = distinct(queries.map((q) => q.entityId)).flatMap((id) => entityById.get(id) ?? []);
      const matched = matchPersonas(page, templates);
      const targets = matched.length > 0 ? matched : templates.slice(0, 1);
      const node = nodeById.get(page.taxonomyNodeId);
      const topic = node?.label ?? hub.name;
      const baseUrl = node?.targetUrl ?? `/${slugify(hub.name)}/`;
      const priority = pagePriority(page, queries);

      specs.push({
        id: `spec-${page.id}`,
        hubPageId: page.id,
        title: page.title,
        targetUrl: page.role === "pillar" ? baseUrl : `${baseUrl}${slugify(page.title)}/`,
        primaryQuery: queries[0]?.text ?? page.title.toLowerCase(),
        secondaryQueries: queries.slice(1, 1 + MAX_SECONDARY_QUERIES).map((q) => q.text),
        targetPersonaIds: targets.map(personaId),
        recommendedFormat: page.recommendedFormat,
        recommendedStructure: recommendedStructure(page, topic, catalog.contentTemplates.structures),
        schemaMarkupTypes: distinct([...SCHEMA_BY_INTENT[page.primaryIntent], ...SCHEMA_BY_ROLE[page.role]]),
        toneGuidance: targets[0]?.tone ?? "clear, helpful, factual",
        aiOptimizationNotes: optimizationNotes(page, entities, targets, catalog.contentTemplates.formatNotes),
        serpFeatureTargets: distinct(
          queries.flatMap((q): SerpFeature[] => (q.estimatedSerpFeature ? [q.estimatedSerpFeature] : [])),
        ),
        linkAnchors: linkAnchors(page, hub, pageById, hubOfPage),
        wordCountTarget: page.wordCountTarget,
        priority,
        estimatedImpact: estimateImpact(page, priority, queries.length),
      });
    }
  }

  return { personas, specs };
}

/** Persona templates for the configured goals, first-seen order. */
export function selectPersonaTemplates(
  config: Pick<StrategyConfig, "businessGoals">,
  personaCatalog: Catalog["personas"],
): PersonaTemplate[] {
  const keys = distinct(config.businessGoals.flatMap((g) => personaCatalog.goalPersonas[g]));
  return keys.flatMap((key) => personaCatalog.templates.find((t) => t.key === key) ?? []);
}

export function groupSpecsByPriority(specs: readonly ContentSpec[]): Record<ContentPriority, ContentSpec[]> {
  return {
    critical: specs.filter((s) => s.priority === "critical"),
    high: specs.filter((s) => s.priority === "high"),
    medium: specs.filter((s) => s.priority === "medium"),
    low: specs.filter((s) => s.priority === "low"),
  };
}

/** Publishing order: by priority, then spec order. */
export function buildContentCalendar(specs: readonly ContentSpec[]): CalendarItem[] {
  return CONTENT_PRIORITIES.flatMap((p) => specs.filter((s) => s.priority === p)).map((spec, i) => ({
    order: i + 1,
    specId: spec.id,
    title: spec.title,
    format: spec.recommendedFormat,
    wordCount: spec.wordCountTarget,
    priority: spec.priority,
    primaryQuery: spec.primaryQuery,
    targetUrl: spec.targetUrl,
    estimatedImpact: spec.estimatedImpact,
  }));
}

// ─── Internals ───────────────────────────────────────────────────────────────

/** Pillars are critical; a cluster takes the rank of its best query. */
function pagePriority(page: HubPage, queries: readonly Query[]): ContentPriority {
  if (page.role === "pillar") return "critical";
  if (queries.some((q) => q.priority === 1)) return "critical";
  if (queries.some((q) => q.priority === 2)) return "high";
  return "medium";
}

function estimateImpact(page: HubPage, priority: ContentPriority, queryCount: number): string {
  const factors: string[] = [];
  if (priority === "critical") factors.push("high-priority topic");
  else if (priority === "high") factors.push("significant topic");
  if (page.role === "pillar") factors.push("pillar page (hub anchor)");
  if (page.primaryIntent === "commercial") factors.push("commercial intent (conversion potential)");
  if (page.primaryIntent === "transactional") factors.push("transactional intent (high conversion)");
  if (queryCount >= MULTI_QUERY_THRESHOLD) factors.push("multiple query targets");
  return factors.length === 0 ? "Standard visibility impact expected" : `High impact: ${factors.join(", ")}`;
}

/**
 * Anchor text for each outgoing link, in link order. The own pillar gets two
 * phrasings; duplicate anchor texts keep the first target.
 */
function linkAnchors(
  page: HubPage,
  hub: ContentHub,
  pageById: ReadonlyMap<string, HubPage>,
  hubOfPage: ReadonlyMap<string, ContentHub>,
): LinkAnchor[] {
  const anchors: LinkAnchor[] = [];
  const add = (anchorText: string, pageId: string): void => {
    if (!anchors.some((a) => a.anchorText === anchorText)) anchors.push({ anchorText, pageId });
  };
  for (const targetId of page.linkedPageIds) {
    const target = pageById.get(targetId);
    const targetHub = hubOfPage.get(targetId);
    if (!target || !targetHub || targetId === page.id) continue;
    const hubName = targetHub.name.toLowerCase();
    if (target.role === "cluster") {
      add(target.title.toLowerCase().split(/\s+/).slice(0, ANCHOR_WORDS).join(" "), targetId);
    } else if (targetHub.id === hub.id) {
      add(`comprehensive ${hubName} guide`, targetId);
      add(`learn more about ${hubName}`, targetId);
    } else {
      add(`${hubName} guide`, targetId);
    }
  }
  return anchors;
}

function personaId(template: PersonaTemplate): string {
  return `persona-${slugify(template.key)}`;
}

function toPersona(template: PersonaTemplate, config: StrategyConfig): Persona {
  const painPoints = [...template.painPoints];
  if (template.comparesVendors && config.competitors.length > 0) {
    painPoints.push(`Weighing ${config.brandName} against ${config.competitors.join(", ")}`);
  }
  return {
    id: personaId(template),
    name: template.name,
    knowledgeLevel: template.knowledgeLevel,
    goals: [...template.goals],
    painPoints,
    preferredFormats: [...template.preferredFormats],
    tone: template.tone,
    queryModifiers: [...template.queryModifiers],
  };
}

/** Personas whose intents include the page's intent or who prefer its format. */
function matchPersonas(page: HubPage, templates: readonly PersonaTemplate[]): PersonaTemplate[] {
  return templates.filter(
    (t) => t.intents.includes(page.primaryIntent) || t.preferredFormats.includes(page.recommendedFormat),
  );
}

function recommendedStructure(page: HubPage, topic: string, structures: Record<string, string[]>): string[] {
  const template = structures[`${page.role}:${page.primaryIntent}`] ?? structures[`${page.role}:default`] ?? [];
  return template.map((section) => fillTemplate(section, { topic }));
}

function optimizationNotes(
  page: HubPage,
  entities: readonly Entity[],
  personas: readonly PersonaTemplate[],
  formatNotes: Record<string, string[]>,
): string[] {
  const notes: string[] = [];
  if (entities.length > 0) {
    notes.push(`Name ${entities.slice(0, 3).map((e) => e.name).join(", ")} explicitly in the opening paragraph`);
  }
  if (personas.length > 0) {
    notes.push(`Write for ${personas.map((p) => p.name).join(" and ")} readers`);
  }
  notes.push(...(formatNotes[page.recommendedFormat] ?? []));
  const aliases = entities.flatMap((e) => e.aliases).slice(0, 3);
  if (aliases.length > 0) {
    notes.push(`Work in the variants ${aliases.map((a) => `"${a}"`).join(", ")}`);
  }
  if (page.role === "pillar") {
    notes.push("Link every cluster page from a section that summarizes it");
  }
  return notes;
}

function distinct<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}
