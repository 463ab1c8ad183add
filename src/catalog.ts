// src/catalog.ts — Template catalogs
// Fan-out patterns, personas, content templates, KPIs and audit prompts live as
// JSON under catalog/. Everything is validated on first load and frozen.

import { readFileSync } from "node:fs";
import type {
  AuditPrompt,
  BusinessGoal,
  ConfigIssue,
  FanoutPattern,
  Intent,
  KpiPriority,
  KpiTemplate,
  PatternPriority,
} from "./types.js";
import { BUSINESS_GOALS, ConfigurationError, INTENTS } from "./types.js";

// ─── Catalog shapes ──────────────────────────────────────────────────────────

export interface PersonaTemplate {
  key: string;
  name: string;
  knowledgeLevel: string;
  preferredFormats: string[];
  tone: string;
  goals: string[];
  painPoints: string[];
  queryModifiers: string[];
  intents: Intent[];
  comparesVendors: boolean;
}

export interface PersonaCatalog {
  templates: PersonaTemplate[];
  goalPersonas: Record<BusinessGoal, string[]>;
}

export interface ContentTemplateCatalog {
  structures: Record<string, string[]>; // keyed "role:intent" or "role:default"
  formats: Record<string, string>; // "pillar" or an intent
  clusterTitles: Record<Intent, string>;
  formatNotes: Record<string, string[]>;
  refreshActions: Record<string, string[]>; // by format, plus "default" for every page
}

export interface AuditPromptCatalog {
  brand: AuditPrompt[];
  entity: AuditPrompt;
}

export interface Catalog {
  fanoutPatterns: readonly FanoutPattern[];
  personas: PersonaCatalog;
  contentTemplates: ContentTemplateCatalog;
  kpis: readonly KpiTemplate[];
  auditPrompts: AuditPromptCatalog;
}

const KPI_PRIORITIES: readonly KpiPriority[] = ["critical", "high", "medium", "low"];
const PATTERN_PRIORITIES: readonly PatternPriority[] = [1, 2, 3];

// ─── Public API ──────────────────────────────────────────────────────────────

let cached: Catalog | undefined;

/**
 * Load the built-in catalogs. The result is cached and deeply frozen, so every
 * run in the process sees the same immutable tables.
 */
export function loadCatalog(): Catalog {
  if (cached) return cached;
  const catalog: Catalog = {
    fanoutPatterns: parseFanoutPatterns(readCatalogFile("fanout-patterns.json"), "catalog/fanout-patterns.json"),
    personas: parsePersonaCatalog(readCatalogFile("personas.json")),
    contentTemplates: parseContentTemplates(readCatalogFile("content-templates.json")),
    kpis: parseKpiTemplates(readCatalogFile("kpis.json"), "catalog/kpis.json"),
    auditPrompts: parseAuditPrompts(readCatalogFile("audit-prompts.json")),
  };
  cached = deepFreeze(catalog);
  return cached;
}

/**
 * Append configured fan-out patterns and KPIs to the built-in ones.
 * Extensions are checked with the same rules as the catalog files, and an
 * extension may not reuse an id or key already in the catalog.
 * @throws ConfigurationError listing every malformed or duplicate extension
 */
export function withExtensions(
  catalog: Catalog,
  extensions: { fanoutPatterns: FanoutPattern[]; kpis: KpiTemplate[] },
): Catalog {
  const issues: ConfigIssue[] = [];
  const patternIds = new Set(catalog.fanoutPatterns.map((p) => p.id));
  extensions.fanoutPatterns.forEach((p, i) => {
    issues.push(...fanoutPatternIssues(p, `extensions.fanoutPatterns[${i}]`));
    if (patternIds.has(p.id)) {
      issues.push({ field: "extensions.fanoutPatterns", message: `Duplicate fan-out pattern id "${p.id}"` });
    }
    patternIds.add(p.id);
  });
  const kpiKeys = new Set(catalog.kpis.map((k) => k.key));
  extensions.kpis.forEach((k, i) => {
    issues.push(...kpiTemplateIssues(k, `extensions.kpis[${i}]`));
    if (kpiKeys.has(k.key)) {
      issues.push({ field: "extensions.kpis", message: `Duplicate KPI key "${k.key}"` });
    }
    kpiKeys.add(k.key);
  });
  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid extensions: ${issues.map((i) => (i.field.includes("[") ? `${i.field} ${i.message}` : i.message)).join("; ")}`,
      issues,
    );
  }
  if (extensions.fanoutPatterns.length === 0 && extensions.kpis.length === 0) return catalog;
  return {
    ...catalog,
    fanoutPatterns: [...catalog.fanoutPatterns, ...extensions.fanoutPatterns],
    kpis: [...catalog.kpis, ...extensions.kpis],
  };
}

/**
 * Parse fan-out pattern groups. Each group expands to one pattern per
 * template, with ids `group:1`, `group:2`, ... in template order.
 */
export function parseFanoutPatterns(raw: unknown, source: string): FanoutPattern[] {
  const issues: ConfigIssue[] = [];
  const patterns: FanoutPattern[] = [];
  if (!Array.isArray(raw)) {
    throw catalogError(source, [{ field: source, message: "expected an array of pattern groups" }]);
  }
  raw.forEach((group: unknown, gi) => {
    const field = `${source}[${gi}]`;
    if (!isRecord(group)) {
      issues.push({ field, message: "expected an object" });
      return;
    }
    const { group: name, intent, priority, templates, goals } = group;
    if (!isNonEmptyString(name)) issues.push({ field: `${field}.group`, message: "must be a non-empty string" });
    if (!isOneOf(intent, INTENTS)) issues.push({ field: `${field}.intent`, message: `must be one of ${INTENTS.join(", ")}` });
    if (!isOneOf(priority, PATTERN_PRIORITIES)) issues.push({ field: `${field}.priority`, message: "must be 1, 2 or 3" });
    if (!isStringArray(templates) || templates.length === 0 || !templates.every((t) => t.includes("{entity}"))) {
      issues.push({ field: `${field}.templates`, message: "must be a non-empty list of templates containing {entity}" });
    }
    if (goals !== undefined && !isGoalArray(goals)) {
      issues.push({ field: `${field}.goals`, message: `must list goals from ${BUSINESS_GOALS.join(", ")}` });
    }
    if (!isNonEmptyString(name) || !isOneOf(intent, INTENTS) || !isOneOf(priority, PATTERN_PRIORITIES) || !isStringArray(templates)) {
      return;
    }
    templates.forEach((template, ti) => {
      const pattern: FanoutPattern = { id: `${name}:${ti + 1}`, group: name, template, intent, priority };
      if (isGoalArray(goals) && goals.length > 0) pattern.goals = [...goals];
      patterns.push(pattern);
    });
  });
  if (issues.length > 0) throw catalogError(source, issues);
  return patterns;
}

export function parseKpiTemplates(raw: unknown, source: string): KpiTemplate[] {
  const issues: ConfigIssue[] = [];
  const kpis: KpiTemplate[] = [];
  if (!Array.isArray(raw)) {
    throw catalogError(source, [{ field: source, message: "expected an array of KPI templates" }]);
  }
  raw.forEach((entry: unknown, i) => {
    const field = `${source}[${i}]`;
    if (!isRecord(entry)) {
      issues.push({ field, message: "expected an object" });
      return;
    }
    const { key, name, description, measurementMethod, refreshCadence, priority, goals, tracksQueries } = entry;
    const fieldIssues: ConfigIssue[] = [];
    for (const [prop, value] of Object.entries({ key, name, description, measurementMethod, refreshCadence })) {
      if (!isNonEmptyString(value)) fieldIssues.push({ field: `${field}.${prop}`, message: "must be a non-empty string" });
    }
    if (!isOneOf(priority, KPI_PRIORITIES)) {
      fieldIssues.push({ field: `${field}.priority`, message: `must be one of ${KPI_PRIORITIES.join(", ")}` });
    }
    if (goals !== undefined && !isGoalArray(goals)) {
      fieldIssues.push({ field: `${field}.goals`, message: `must list goals from ${BUSINESS_GOALS.join(", ")}` });
    }
    if (tracksQueries !== undefined && typeof tracksQueries !== "boolean") {
      fieldIssues.push({ field: `${field}.tracksQueries`, message: "must be a boolean" });
    }
    if (
      fieldIssues.length > 0 ||
      !isNonEmptyString(key) ||
      !isNonEmptyString(name) ||
      !isNonEmptyString(description) ||
      !isNonEmptyString(measurementMethod) ||
      !isNonEmptyString(refreshCadence) ||
      !isOneOf(priority, KPI_PRIORITIES)
    ) {
      issues.push(...fieldIssues);
      return;
    }
    kpis.push({
      key,
      name,
      description,
      measurementMethod,
      refreshCadence,
      priority,
      goals: isGoalArray(goals) ? [...goals] : [],
      tracksQueries: tracksQueries === true,
    });
  });
  if (issues.length > 0) throw catalogError(source, issues);
  return kpis;
}

// ─── Built-in catalog parsers ────────────────────────────────────────────────

function parsePersonaCatalog(raw: unknown): PersonaCatalog {
  const source = "catalog/personas.json";
  const issues: ConfigIssue[] = [];
  if (!isRecord(raw) || !Array.isArray(raw.templates) || !isRecord(raw.goalPersonas)) {
    throw catalogError(source, [{ field: source, message: "expected { templates, goalPersonas }" }]);
  }
  const templates: PersonaTemplate[] = [];
  raw.templates.forEach((t: unknown, i) => {
    const field = `${source}.templates[${i}]`;
    if (
      isRecord(t) &&
      isNonEmptyString(t.key) &&
      isNonEmptyString(t.name) &&
      isNonEmptyString(t.knowledgeLevel) &&
      isNonEmptyString(t.tone) &&
      isStringArray(t.preferredFormats) &&
      isStringArray(t.goals) &&
      isStringArray(t.painPoints) &&
      isStringArray(t.queryModifiers) &&
      Array.isArray(t.intents) &&
      t.intents.every((x: unknown) => isOneOf(x, INTENTS)) &&
      typeof t.comparesVendors === "boolean"
    ) {
      templates.push({
        key: t.key,
        name: t.name,
        knowledgeLevel: t.knowledgeLevel,
        tone: t.tone,
        preferredFormats: t.preferredFormats,
        goals: t.goals,
        painPoints: t.painPoints,
        queryModifiers: t.queryModifiers,
        intents: t.intents.filter((x: unknown): x is Intent => isOneOf(x, INTENTS)),
        comparesVendors: t.comparesVendors,
      });
    } else {
      issues.push({ field, message: "malformed persona template" });
    }
  });

  const known = new Set(templates.map((t) => t.key));
  const goalPersonas: Partial<Record<BusinessGoal, string[]>> = {};
  for (const goal of BUSINESS_GOALS) {
    const keys = raw.goalPersonas[goal];
    if (!isStringArray(keys) || keys.length === 0) {
      issues.push({ field: `${source}.goalPersonas.${goal}`, message: "must list at least one persona key" });
      continue;
    }
    const unknown = keys.filter((k) => !known.has(k));
    if (unknown.length > 0) {
      issues.push({ field: `${source}.goalPersonas.${goal}`, message: `unknown persona(s): ${unknown.join(", ")}` });
    }
    goalPersonas[goal] = keys;
  }
  if (issues.length > 0) throw catalogError(source, issues);
  return { templates, goalPersonas: completeGoalRecord(goalPersonas) };
}

function parseContentTemplates(raw: unknown): ContentTemplateCatalog {
  const source = "catalog/content-templates.json";
  const issues: ConfigIssue[] = [];
  if (!isRecord(raw)) {
    throw catalogError(source, [{ field: source, message: "expected an object" }]);
  }
  const structures = readRecord(raw.structures, isStringArray, `${source}.structures`, issues);
  const formats = readRecord(raw.formats, isNonEmptyString, `${source}.formats`, issues);
  const titles = readRecord(raw.clusterTitles, isNonEmptyString, `${source}.clusterTitles`, issues);
  const formatNotes = readRecord(raw.formatNotes, isStringArray, `${source}.formatNotes`, issues);
  const refreshActions = readRecord(raw.refreshActions, isStringArray, `${source}.refreshActions`, issues);
  if (!refreshActions.default) issues.push({ field: `${source}.refreshActions`, message: 'missing "default"' });

  for (const role of ["pillar", "cluster"]) {
    if (!structures[`${role}:default`]) {
      issues.push({ field: `${source}.structures`, message: `missing "${role}:default"` });
    }
  }
  for (const key of ["pillar", ...INTENTS]) {
    if (!formats[key]) issues.push({ field: `${source}.formats`, message: `missing "${key}"` });
  }
  const clusterTitles: Partial<Record<Intent, string>> = {};
  for (const intent of INTENTS) {
    const title = titles[intent];
    if (title === undefined) issues.push({ field: `${source}.clusterTitles`, message: `missing "${intent}"` });
    else clusterTitles[intent] = title;
  }
  if (issues.length > 0) throw catalogError(source, issues);
  return { structures, formats, clusterTitles: completeIntentRecord(clusterTitles), formatNotes, refreshActions };
}

function parseAuditPrompts(raw: unknown): AuditPromptCatalog {
  const source = "catalog/audit-prompts.json";
  if (!isRecord(raw) || !Array.isArray(raw.brand) || !raw.brand.every(isAuditPrompt) || !isAuditPrompt(raw.entity)) {
    throw catalogError(source, [{ field: source, message: "expected { brand: AuditPrompt[], entity: AuditPrompt }" }]);
  }
  return { brand: raw.brand.filter(isAuditPrompt), entity: raw.entity };
}

// ─── Extension checks ────────────────────────────────────────────────────────

// Typed callers can still hand over malformed values at run time.
function fanoutPatternIssues(p: FanoutPattern, field: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (!isNonEmptyString(p.id)) issues.push({ field: `${field}.id`, message: "must be a non-empty string" });
  if (!isNonEmptyString(p.group)) issues.push({ field: `${field}.group`, message: "must be a non-empty string" });
  if (!isNonEmptyString(p.template) || !p.template.includes("{entity}")) {
    issues.push({ field: `${field}.template`, message: "must contain {entity}" });
  }
  if (!isOneOf(p.intent, INTENTS)) issues.push({ field: `${field}.intent`, message: `must be one of ${INTENTS.join(", ")}` });
  if (!isOneOf(p.priority, PATTERN_PRIORITIES)) issues.push({ field: `${field}.priority`, message: "must be 1, 2 or 3" });
  if (p.goals !== undefined && !isGoalArray(p.goals)) {
    issues.push({ field: `${field}.goals`, message: `must list goals from ${BUSINESS_GOALS.join(", ")}` });
  }
  return issues;
}

function kpiTemplateIssues(k: KpiTemplate, field: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const { key, name, description, measurementMethod, refreshCadence } = k;
  for (const [prop, value] of Object.entries({ key, name, description, measurementMethod, refreshCadence })) {
    if (!isNonEmptyString(value)) issues.push({ field: `${field}.${prop}`, message: "must be a non-empty string" });
  }
  if (!isOneOf(k.priority, KPI_PRIORITIES)) {
    issues.push({ field: `${field}.priority`, message: `must be one of ${KPI_PRIORITIES.join(", ")}` });
  }
  if (!isGoalArray(k.goals)) {
    issues.push({ field: `${field}.goals`, message: `must list goals from ${BUSINESS_GOALS.join(", ")}` });
  }
  if (typeof k.tracksQueries !== "boolean") issues.push({ field: `${field}.tracksQueries`, message: "must be a boolean" });
  return issues;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function readCatalogFile(name: string): unknown {
  const url = new URL(`../catalog/${name}`, import.meta.url);
  try {
    return JSON.parse(readFileSync(url, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read catalog/${name}: ${msg}`, [
      { field: `catalog/${name}`, message: msg },
    ]);
  }
}

function catalogError(source: string, issues: ConfigIssue[]): ConfigurationError {
  return new ConfigurationError(
    `Invalid ${source}: ${issues.map((i) => `${i.field} ${i.message}`).join("; ")}`,
    issues,
  );
}

function readRecord<T>(
  value: unknown,
  guard: (v: unknown) => v is T,
  field: string,
  issues: ConfigIssue[],
): Record<string, T> {
  const out: Record<string, T> = {};
  if (!isRecord(value)) {
    issues.push({ field, message: "expected an object" });
    return out;
  }
  for (const [key, v] of Object.entries(value)) {
    if (guard(v)) out[key] = v;
    else issues.push({ field: `${field}.${key}`, message: "has the wrong shape" });
  }
  return out;
}

function completeGoalRecord(partial: Partial<Record<BusinessGoal, string[]>>): Record<BusinessGoal, string[]> {
  return {
    brand_awareness: partial.brand_awareness ?? [],
    lead_generation: partial.lead_generation ?? [],
    ecommerce_sales: partial.ecommerce_sales ?? [],
    thought_leadership: partial.thought_leadership ?? [],
    local_visibility: partial.local_visibility ?? [],
    product_adoption: partial.product_adoption ?? [],
  };
}

function completeIntentRecord(partial: Partial<Record<Intent, string>>): Record<Intent, string> {
  return {
    informational: partial.informational ?? "{topic}",
    navigational: partial.navigational ?? "{topic}",
    commercial: partial.commercial ?? "{topic}",
    transactional: partial.transactional ?? "{topic}",
    local: partial.local ?? "{topic}",
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function isOneOf<T extends string | number>(value: unknown, options: readonly T[]): value is T {
  return options.some((o) => o === value);
}

function isGoalArray(value: unknown): value is BusinessGoal[] {
  return Array.isArray(value) && value.every((g) => isOneOf(g, BUSINESS_GOALS));
}

function isAuditPrompt(value: unknown): value is AuditPrompt {
  return (
    isRecord(value) &&
    isNonEmptyString(value.category) &&
    isNonEmptyString(value.prompt) &&
    isNonEmptyString(value.checkFor)
  );
}
