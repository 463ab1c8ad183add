// src/pipeline.ts — Pipeline Orchestrator
// Runs the seven steps in order, threads the shared warnings sink through them,
// stamps the failing stage on any StrategyError, and checks the assembled
// document before returning it.

import type {
  FrameworkOutput,
  FrameworkSummary,
  PipelineStage,
  ResolvedConfig,
  Warning,
} from "./types.js";
import { ConfigurationError, ENGINE_VERSION, STAGE_LABELS, StrategyError } from "./types.js";
import type { Catalog } from "./catalog.js";
import { loadCatalog, withExtensions } from "./catalog.js";
import { validateStrategyConfig } from "./config-validator.js";
import type { SitemapSource } from "./sitemap-parser.js";
import { createSitemapSource } from "./sitemap-parser.js";
import { buildOntology } from "./ontology-builder.js";
import { expandAllEntities, findEntityGaps } from "./entity-expander.js";
import { buildTaxonomy } from "./taxonomy-builder.js";
import { getIntentCoverage, mapAllEntities } from "./query-mapper.js";
import { designAllHubs, suggestContentGaps } from "./hub-designer.js";
import { generateAllSpecs } from "./content-spec-generator.js";
import { createMeasurementPlan } from "./measurement-setup.js";
import { validateFrameworkOutput } from "./integrity-validator.js";

export interface PipelineOptions {
  /** Replaces the HTTP sitemap source built from `config.sitemap`. */
  sitemapSource?: SitemapSource;
  /** Clock for `meta.generatedAt`. */
  now?: () => Date;
  /** Base catalog before `config.extensions` are applied. */
  catalog?: Catalog;
}

/** Verbose logger: writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Run the full strategy pipeline. Identical configuration and sitemap content
 * yield identical output apart from `meta.generatedAt`.
 * @throws StrategyError with `stage` set to the step that failed
 */
export async function runPipeline(
  config: ResolvedConfig,
  options: PipelineOptions = {},
): Promise<FrameworkOutput> {
  const warnings: Warning[] = [];
  const verbose = config.verbose;
  const startTime = performance.now();

  const stage = async <T>(name: PipelineStage, fn: () => T | Promise<T>): Promise<T> => {
    const t0 = performance.now();
    try {
      const result = await fn();
      vlog(verbose, `${STAGE_LABELS[name]} done in ${Math.round(performance.now() - t0)}ms`);
      return result;
    } catch (err: unknown) {
      if (err instanceof StrategyError && err.stage === undefined) err.stage = name;
      throw err;
    }
  };

  const { strategy, catalog } = await stage("validation", () => ({
    strategy: validateStrategyConfig(config.strategy, warnings),
    catalog: withExtensions(options.catalog ?? loadCatalog(), config.extensions),
  }));
  vlog(verbose, `Brand: ${strategy.brandName} (${strategy.sourceMode} mode, goals: ${strategy.businessGoals.join(", ")})`);

  const initial = await stage("ontology", () =>
    buildOntology(strategy, {
      sitemapSource: options.sitemapSource ?? createSitemapSource(config.sitemap),
      warnings,
    }),
  );
  vlog(verbose, `  Entities: ${initial.entities.length}, relationships: ${initial.relationships.length}`);

  const { ontology, entityGaps } = await stage("expansion", () => {
    const expanded = expandAllEntities(initial, strategy);
    return { ontology: expanded, entityGaps: findEntityGaps(expanded, strategy) };
  });
  if (entityGaps.length > 0) vlog(verbose, `  Entity gaps: ${entityGaps.join(", ")}`);

  const taxonomy = await stage("taxonomy", () => buildTaxonomy(ontology));
  vlog(verbose, `  Taxonomy nodes: ${taxonomy.nodes.length}`);

  const { queryClusters, intentCoverage } = await stage("queries", () => {
    const clusters = mapAllEntities(taxonomy, ontology, strategy, catalog.fanoutPatterns, warnings);
    return { queryClusters: clusters, intentCoverage: getIntentCoverage(clusters) };
  });
  if (intentCoverage.missingIntents.length > 0) {
    warnings.push({
      level: "info",
      module: "query-mapper",
      message: `No queries target these intents: ${intentCoverage.missingIntents.join(", ")}`,
    });
  }

  const { contentHubs, contentGaps } = await stage("hubs", () => {
    const hubs = designAllHubs(taxonomy, queryClusters, catalog.contentTemplates);
    return { contentHubs: hubs, contentGaps: suggestContentGaps(taxonomy, hubs) };
  });
  vlog(verbose, `  Hubs: ${contentHubs.length}, content gaps: ${contentGaps.length}`);

  const { personas, specs } = await stage("specs", () =>
    generateAllSpecs(contentHubs, strategy, { ontology, queryClusters, taxonomy }, catalog),
  );

  const measurementPlan = await stage("measurement", () =>
    createMeasurementPlan(
      { strategy, ontology, queryClusters, contentSpecs: specs },
      catalog.kpis,
      catalog.auditPrompts,
      catalog.contentTemplates.refreshActions,
    ),
  );

  const output = await stage("assembly", () => {
    const body: Omit<FrameworkOutput, "summary"> = {
      meta: {
        engineVersion: ENGINE_VERSION,
        generatedAt: (options.now ?? (() => new Date()))().toISOString(),
      },
      strategy,
      ontology,
      entityGaps,
      taxonomy,
      queryClusters,
      intentCoverage,
      contentHubs,
      contentGaps,
      personas,
      contentSpecs: specs,
      measurementPlan,
      warnings,
    };
    const assembled: FrameworkOutput = { ...body, summary: summarize(body) };
    validateFrameworkOutput(assembled);
    return assembled;
  });

  vlog(verbose, `Pipeline complete in ${Math.round(performance.now() - startTime)}ms`);
  return output;
}

/**
 * One-line description of a pipeline failure, naming the step when known.
 */
export function describeFailure(err: unknown): string {
  if (err instanceof StrategyError) {
    const stage = err.stage ?? (err instanceof ConfigurationError ? "validation" : undefined);
    const where = stage ? STAGE_LABELS[stage] : "Pipeline";
    return `${where} failed: ${err.message}`;
  }
  const msg = err instanceof Error ? err.message : String(err);
  return `Unexpected error: ${msg}`;
}

export function summarize(output: Omit<FrameworkOutput, "summary">): FrameworkSummary {
  const pages = output.contentHubs.reduce((sum, h) => sum + 1 + h.clusters.length, 0);
  return {
    totalEntities: output.ontology.entities.length,
    totalRelationships: output.ontology.relationships.length,
    taxonomyNodes: output.taxonomy.nodes.length,
    queryClusters: output.queryClusters.length,
    totalQueries: output.queryClusters.reduce((sum, c) => sum + c.queries.length, 0),
    contentHubs: output.contentHubs.length,
    totalPagesPlanned: pages,
    contentSpecs: output.contentSpecs.length,
    kpisDefined: output.measurementPlan.kpis.length,
    monitoringQueries: output.measurementPlan.monitoringQueries.length,
  };
}
