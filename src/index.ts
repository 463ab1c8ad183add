// src/index.ts — Library API
// Two entry points: generate() and exportOutput().

import type { FrameworkOutput, ResolvedConfig, StrategyConfig } from "./types.js";
import type { PipelineOptions } from "./pipeline.js";
import { runPipeline } from "./pipeline.js";
import { DEFAULT_SITEMAP_OPTIONS } from "./sitemap-parser.js";

// Re-export all public types
export type {
  BusinessGoal,
  SourceMode,
  StrategyConfig,
  ResolvedConfig,
  ExportFormat,
  ExportArtifact,
  Warning,
  Entity,
  EntityType,
  RelationType,
  Relationship,
  Ontology,
  TaxonomyNode,
  TaxonomyLink,
  FacetDefinition,
  Taxonomy,
  Intent,
  SerpFeature,
  PatternPriority,
  FanoutPattern,
  Query,
  QueryCluster,
  IntentCoverage,
  HubPageRole,
  HubPage,
  ContentHub,
  ContentGap,
  Persona,
  ContentPriority,
  LinkAnchor,
  ContentSpec,
  CalendarItem,
  KpiPriority,
  KpiTemplate,
  KPI,
  MonitoringQuery,
  AuditPrompt,
  CompetitorTracking,
  ContentAuditItem,
  QuickWin,
  MeasurementPlan,
  FrameworkSummary,
  FrameworkOutput,
  PipelineStage,
  ConfigIssue,
  IntegrityIssue,
} from "./types.js";

export {
  BUSINESS_GOALS,
  SOURCE_MODES,
  EXPORT_FORMATS,
  ENTITY_TYPES,
  RELATION_TYPES,
  INTENTS,
  CONTENT_PRIORITIES,
  STAGE_LABELS,
  ENGINE_VERSION,
  StrategyError,
  ConfigurationError,
  SourceFetchError,
  SitemapFetchError,
  SitemapParseError,
  EmptyOntologyError,
  ReferentialIntegrityError,
} from "./types.js";

export type { PipelineOptions } from "./pipeline.js";
export { runPipeline, describeFailure } from "./pipeline.js";
export { validateStrategyConfig } from "./config-validator.js";
export type { Catalog } from "./catalog.js";
export { loadCatalog, withExtensions } from "./catalog.js";
export type { SitemapSource, SitemapAnalysis, SitemapFetchOptions, EntityCandidate } from "./sitemap-parser.js";
export { createSitemapSource, fetchSitemap, parseSitemapXml } from "./sitemap-parser.js";
export { buildOntology, assembleOntology } from "./ontology-builder.js";
export { expandAllEntities, findEntityGaps, prioritizeEntities, generateSemanticVariants } from "./entity-expander.js";
export { buildTaxonomy, getRootNodes, getChildren, getNodePath } from "./taxonomy-builder.js";
export { mapAllEntities, getIntentCoverage, getSerpFeatureOpportunities, prioritizeQueries } from "./query-mapper.js";
export { designAllHubs, suggestContentGaps } from "./hub-designer.js";
export { generateAllSpecs, groupSpecsByPriority, buildContentCalendar } from "./content-spec-generator.js";
export { createMeasurementPlan, createContentAudit, getAiAuditPrompts, getQuickWins } from "./measurement-setup.js";
export { validateFrameworkOutput, collectIntegrityIssues } from "./integrity-validator.js";
export { exportOutput, exportAll, parseFrameworkJson } from "./exporters/index.js";

export interface GenerateOptions extends PipelineOptions {
  sitemap?: Partial<ResolvedConfig["sitemap"]>;
  extensions?: Partial<ResolvedConfig["extensions"]>;
  verbose?: boolean;
}

/**
 * Produce a complete framework for one brand. Engine settings not given fall
 * back to the built-in defaults.
 */
export async function generate(
  strategy: StrategyConfig,
  options: GenerateOptions = {},
): Promise<FrameworkOutput> {
  const config: ResolvedConfig = {
    strategy,
    output: { formats: ["json"], dir: "." },
    sitemap: {
      timeoutMs: options.sitemap?.timeoutMs ?? DEFAULT_SITEMAP_OPTIONS.timeoutMs,
      maxChildSitemaps: options.sitemap?.maxChildSitemaps ?? DEFAULT_SITEMAP_OPTIONS.maxChildSitemaps,
      exclude: options.sitemap?.exclude ?? [...DEFAULT_SITEMAP_OPTIONS.exclude],
    },
    extensions: {
      fanoutPatterns: options.extensions?.fanoutPatterns ?? [],
      kpis: options.extensions?.kpis ?? [],
    },
    verbose: options.verbose ?? false,
  };
  return runPipeline(config, {
    sitemapSource: options.sitemapSource,
    now: options.now,
    catalog: options.catalog,
  });
}
