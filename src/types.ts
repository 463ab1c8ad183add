// src/types.ts — ALL shared types for the Content Strategy Engine
// Cross-references between stages are by id string, never by embedded copies.

// ─── Configuration ───────────────────────────────────────────────────────────

export type BusinessGoal =
  | "brand_awareness"
  | "lead_generation"
  | "ecommerce_sales"
  | "thought_leadership"
  | "local_visibility"
  | "product_adoption";

export const BUSINESS_GOALS: readonly BusinessGoal[] = [
  "brand_awareness",
  "lead_generation",
  "ecommerce_sales",
  "thought_leadership",
  "local_visibility",
  "product_adoption",
];

export type SourceMode = "seed" | "sitemap" | "hybrid";

export const SOURCE_MODES: readonly SourceMode[] = ["seed", "sitemap", "hybrid"];

/** The brand description every stage reads. Never mutated after validation. */
export interface StrategyConfig {
  brandName: string;
  primaryNiche: string;
  businessGoals: BusinessGoal[];
  sourceMode: SourceMode;
  sitemapUrl?: string;
  seedEntities: string[];
  competitors: string[];
  targetRegions: string[];
}

export type ExportFormat = "json" | "markdown" | "csv";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "markdown", "csv"];

export interface ResolvedConfig {
  strategy: StrategyConfig;
  output: {
    formats: ExportFormat[];
    dir: string;
  };
  sitemap: {
    timeoutMs: number;
    maxChildSitemaps: number;
    exclude: string[]; // picomatch globs matched against URL paths
  };
  extensions: {
    fanoutPatterns: FanoutPattern[];
    kpis: KpiTemplate[];
  };
  verbose: boolean;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
}

// ─── Step 1-2: Ontology ──────────────────────────────────────────────────────

export type EntityType = "product" | "service" | "feature" | "concept" | "topic";

export const ENTITY_TYPES: readonly EntityType[] = [
  "product",
  "service",
  "feature",
  "concept",
  "topic",
];

export interface Entity {
  id: string;
  name: string;
  type: EntityType;
  origin: "seed" | "sitemap";
  aliases: string[];
  centrality: number;
  commercialValue: number;
  sourceUrls: string[];
  categories: string[]; // sitemap sections the entity was found under
}

// Declaration order doubles as the tie-break order everywhere.
export type RelationType =
  | "is-a"
  | "part-of"
  | "used-for"
  | "relates-to"
  | "requires"
  | "alternative-to"
  | "enables"
  | "contrasts-with";

export const RELATION_TYPES: readonly RelationType[] = [
  "is-a",
  "part-of",
  "used-for",
  "relates-to",
  "requires",
  "alternative-to",
  "enables",
  "contrasts-with",
];

export interface Relationship {
  sourceId: string;
  type: RelationType;
  targetId: string;
  weight: number;
  evidence: string;
}

export interface Ontology {
  brandName: string;
  entities: Entity[];
  relationships: Relationship[];
}

// ─── Step 3: Taxonomy ────────────────────────────────────────────────────────

export interface TaxonomyNode {
  id: string;
  label: string;
  parentId: string | null;
  depth: number;
  entityIds: string[];
  facetTags: string[];
  targetUrl: string;
}

export interface FacetDefinition {
  name: string;
  values: string[];
}

export interface TaxonomyLink {
  fromNodeId: string;
  toNodeId: string;
  relationType: RelationType;
}

export interface Taxonomy {
  nodes: TaxonomyNode[];
  facets: FacetDefinition[];
  internalLinks: TaxonomyLink[];
}

// ─── Step 4: Queries ─────────────────────────────────────────────────────────

export type Intent =
  | "informational"
  | "navigational"
  | "commercial"
  | "transactional"
  | "local";

export const INTENTS: readonly Intent[] = [
  "informational",
  "navigational",
  "commercial",
  "transactional",
  "local",
];

export type SerpFeature =
  | "featured-snippet"
  | "sitelinks"
  | "people-also-ask"
  | "shopping-results"
  | "local-pack";

/** 1 is the highest priority. */
export type PatternPriority = 1 | 2 | 3;

export interface FanoutPattern {
  id: string;
  group: string;
  template: string;
  intent: Intent;
  priority: PatternPriority;
  goals?: BusinessGoal[]; // applied only when one of these goals is configured
}

export interface Query {
  id: string;
  text: string;
  entityId: string;
  intent: Intent;
  priority: PatternPriority;
  fanoutPatternUsed: string;
  estimatedSerpFeature?: SerpFeature;
}

export interface QueryCluster {
  id: string;
  taxonomyNodeId: string;
  intent: Intent;
  entityIds: string[];
  queries: Query[];
  intentDistribution: Partial<Record<Intent, number>>;
  serpFeatureOpportunities: Partial<Record<SerpFeature, number>>;
}

export interface IntentCoverage {
  overall: number;
  byEntity: Record<string, number>;
  missingIntents: Intent[];
}

// ─── Step 5: Content Hubs ────────────────────────────────────────────────────

export type HubPageRole = "pillar" | "cluster";

export interface HubPage {
  id: string;
  title: string;
  role: HubPageRole;
  taxonomyNodeId: string;
  primaryIntent: Intent;
  linkedQueryIds: string[];
  linkedPageIds: string[]; // directed internal link edges; cycles allowed
  recommendedFormat: string;
  wordCountTarget: number;
}

export interface ContentHub {
  id: string;
  name: string;
  taxonomyNodeId: string;
  pillar: HubPage;
  clusters: HubPage[];
  coverageScore: number;
  internalLinkCount: number;
}

export type ContentGap =
  | { kind: "uncovered-node"; taxonomyNodeId: string; label: string; recommendation: string }
  | { kind: "low-coverage"; hubId: string; coverageScore: number; recommendation: string }
  | { kind: "thin-hub"; hubId: string; clusterCount: number; recommendation: string };

// ─── Step 6: Content Specs ───────────────────────────────────────────────────

export type ContentPriority = "critical" | "high" | "medium" | "low";

export const CONTENT_PRIORITIES: readonly ContentPriority[] = ["critical", "high", "medium", "low"];

/** Suggested anchor text for an internal link to another hub page. */
export interface LinkAnchor {
  anchorText: string;
  pageId: string;
}

export interface Persona {
  id: string;
  name: string;
  knowledgeLevel: string;
  goals: string[];
  painPoints: string[];
  preferredFormats: string[];
  tone: string;
  queryModifiers: string[];
}

export interface ContentSpec {
  id: string;
  hubPageId: string;
  title: string;
  targetUrl: string;
  primaryQuery: string;
  secondaryQueries: string[];
  targetPersonaIds: string[];
  recommendedFormat: string;
  recommendedStructure: string[];
  schemaMarkupTypes: string[];
  toneGuidance: string;
  aiOptimizationNotes: string[];
  serpFeatureTargets: SerpFeature[];
  linkAnchors: LinkAnchor[];
  wordCountTarget: number;
  priority: ContentPriority;
  estimatedImpact: string;
}

/** One row of the publishing plan, specs ordered by priority. */
export interface CalendarItem {
  order: number;
  specId: string;
  title: string;
  format: string;
  wordCount: number;
  priority: ContentPriority;
  primaryQuery: string;
  targetUrl: string;
  estimatedImpact: string;
}

// ─── Step 7: Measurement ─────────────────────────────────────────────────────

export type KpiPriority = "critical" | "high" | "medium" | "low";

export interface KpiTemplate {
  key: string;
  name: string;
  description: string;
  measurementMethod: string;
  refreshCadence: string;
  priority: KpiPriority;
  goals: BusinessGoal[]; // empty = relevant to every goal
  tracksQueries: boolean;
}

export interface KPI {
  id: string;
  name: string;
  description: string;
  measurementMethod: string;
  refreshCadence: string;
  priority: KpiPriority;
  monitoringQueryIds: string[];
}

export interface MonitoringQuery {
  queryId: string;
  text: string;
  entityId: string;
}

export interface AuditPrompt {
  category: string;
  prompt: string;
  checkFor: string;
}

export interface CompetitorTracking {
  competitor: string;
  monitorQueries: string[];
}

export interface ContentAuditItem {
  specId: string;
  hubPageId: string;
  url: string;
  title: string;
  lastUpdated: string | null; // null until the page is published
  freshnessScore: number;
  updatePriority: ContentPriority;
  recommendedUpdates: string[];
}

export interface QuickWin {
  action: string;
  items: string[];
  impact: string;
  effort: string;
}

export interface MeasurementPlan {
  kpis: KPI[];
  monitoringQueries: MonitoringQuery[];
  auditPrompts: AuditPrompt[];
  refreshSchedule: Record<string, string>;
  competitorTracking: CompetitorTracking[];
  contentAudit: ContentAuditItem[];
  quickWins: QuickWin[];
}

// ─── Top-level output ────────────────────────────────────────────────────────

export interface FrameworkSummary {
  totalEntities: number;
  totalRelationships: number;
  taxonomyNodes: number;
  queryClusters: number;
  totalQueries: number;
  contentHubs: number;
  totalPagesPlanned: number;
  contentSpecs: number;
  kpisDefined: number;
  monitoringQueries: number;
}

export interface FrameworkOutput {
  meta: {
    engineVersion: string;
    generatedAt: string;
  };
  strategy: StrategyConfig;
  ontology: Ontology;
  entityGaps: string[];
  taxonomy: Taxonomy;
  queryClusters: QueryCluster[];
  intentCoverage: IntentCoverage;
  contentHubs: ContentHub[];
  contentGaps: ContentGap[];
  personas: Persona[];
  contentSpecs: ContentSpec[];
  measurementPlan: MeasurementPlan;
  summary: FrameworkSummary;
  warnings: Warning[];
}

export type PipelineStage =
  | "validation"
  | "ontology"
  | "expansion"
  | "taxonomy"
  | "queries"
  | "hubs"
  | "specs"
  | "measurement"
  | "assembly";

export const STAGE_LABELS: Record<PipelineStage, string> = {
  validation: "Configuration validation",
  ontology: "Step 1 (ontology)",
  expansion: "Step 2 (entity expansion)",
  taxonomy: "Step 3 (taxonomy)",
  queries: "Step 4 (query mapping)",
  hubs: "Step 5 (content hubs)",
  specs: "Step 6 (content specs)",
  measurement: "Step 7 (measurement)",
  assembly: "Final assembly",
};

/** One file produced by an exporter. */
export interface ExportArtifact {
  filename: string;
  content: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class StrategyError extends Error {
  /** Set by the pipeline when the error escapes a stage. */
  stage?: PipelineStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StrategyError";
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigurationError extends StrategyError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SourceFetchError extends StrategyError {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SourceFetchError";
  }
}

export class SitemapFetchError extends SourceFetchError {
  constructor(
    message: string,
    url: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, url, options);
    this.name = "SitemapFetchError";
  }
}

export class SitemapParseError extends StrategyError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = "SitemapParseError";
  }
}

export class EmptyOntologyError extends StrategyError {
  constructor(message = "Ontology contains no entities") {
    super(message);
    this.name = "EmptyOntologyError";
  }
}

export interface IntegrityIssue {
  path: string;
  reference: string;
  message: string;
}

export class ReferentialIntegrityError extends StrategyError {
  constructor(public readonly issues: IntegrityIssue[]) {
    super(
      `${issues.length} dangling reference(s): ${issues
        .slice(0, 3)
        .map((i) => `${i.path} -> ${i.reference}`)
        .join("; ")}`,
    );
    this.name = "ReferentialIntegrityError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";
