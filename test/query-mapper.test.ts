import { describe, it, expect } from "vitest";
import {
  applicablePatterns,
  generateQueries,
  getIntentCoverage,
  getSerpFeatureOpportunities,
  mapAllEntities,
  prioritizeQueries,
} from "../src/query-mapper.js";
import { loadCatalog } from "../src/catalog.js";
import { assembleOntology } from "../src/ontology-builder.js";
import { expandAllEntities } from "../src/entity-expander.js";
import { buildTaxonomy } from "../src/taxonomy-builder.js";
import type { FanoutPattern, Warning } from "../src/types.js";
import { strategy } from "./helpers.js";

const PLUG = { id: "ent-x", name: "Smart Plug" };

function clustersFor(config = strategy()) {
  const ontology = expandAllEntities(assembleOntology(config), config);
  const taxonomy = buildTaxonomy(ontology);
  return { ontology, taxonomy, clusters: mapAllEntities(taxonomy, ontology, config, loadCatalog().fanoutPatterns) };
}

describe("applicablePatterns", () => {
  it("keeps goal-specific patterns only for their goals", () => {
    const patterns = loadCatalog().fanoutPatterns;
    expect(applicablePatterns(patterns, { businessGoals: ["brand_awareness"] })).toHaveLength(29);
    expect(applicablePatterns(patterns, { businessGoals: ["local_visibility"] })).toHaveLength(30);
  });
});

describe("generateQueries", () => {
  it("substitutes the lowercased entity into each pattern", () => {
    const patterns = applicablePatterns(loadCatalog().fanoutPatterns, { businessGoals: ["brand_awareness"] });
    const queries = generateQueries(PLUG, "Acme", patterns);

    expect(queries).toHaveLength(29);
    expect(queries[0]).toEqual({
      id: "ent-x:definitional:1",
      text: "what is smart plug",
      entityId: "ent-x",
      intent: "informational",
      priority: 1,
      fanoutPatternUsed: "definitional:1",
      estimatedSerpFeature: "featured-snippet",
    });
  });

  it("lets the higher-priority pattern win a duplicate in place", () => {
    const patterns: FanoutPattern[] = [
      { id: "a:1", group: "a", template: "{entity} review", intent: "informational", priority: 3 },
      { id: "b:1", group: "b", template: "{entity} tips", intent: "informational", priority: 2 },
      { id: "c:1", group: "c", template: "{entity}  Review", intent: "commercial", priority: 1 },
    ];
    const queries = generateQueries(PLUG, "Acme", patterns);

    expect(queries.map((q) => q.id)).toEqual(["ent-x:c:1", "ent-x:b:1"]);
    expect(queries[0]).toEqual({
      id: "ent-x:c:1",
      text: "smart plug Review",
      entityId: "ent-x",
      intent: "commercial",
      priority: 1,
      fanoutPatternUsed: "c:1",
      estimatedSerpFeature: "people-also-ask",
    });
  });

  it("keeps the earlier pattern on equal priority", () => {
    const patterns: FanoutPattern[] = [
      { id: "a:1", group: "a", template: "{entity} review", intent: "informational", priority: 2 },
      { id: "b:1", group: "b", template: "{entity} REVIEW", intent: "commercial", priority: 2 },
    ];
    expect(generateQueries(PLUG, "Acme", patterns).map((q) => q.id)).toEqual(["ent-x:a:1"]);
  });

  it("substitutes the brand", () => {
    const patterns: FanoutPattern[] = [
      { id: "v:1", group: "v", template: "{entity} vs {brand}", intent: "commercial", priority: 2 },
    ];
    expect(generateQueries(PLUG, "Acme", patterns)[0].text).toBe("smart plug vs acme");
  });
});

describe("mapAllEntities", () => {
  it("clusters by taxonomy node then intent order", () => {
    const { clusters } = clustersFor();

    expect(clusters.map((c) => [c.id, c.queries.length])).toEqual([
      ["qc-tax-product-informational", 30],
      ["qc-tax-product-navigational", 4],
      ["qc-tax-product-commercial", 18],
      ["qc-tax-product-transactional", 6],
    ]);
    expect(clusters[0].entityIds).toEqual(["ent-acme-widget", "ent-acme-gadget"]);
    expect(clusters[0].intentDistribution).toEqual({ informational: 30 });
    expect(clusters[0].serpFeatureOpportunities).toEqual({ "featured-snippet": 30 });
    expect(clusters[2].queries.slice(0, 3).map((q) => q.text)).toEqual([
      "acme widget alternatives",
      "acme widget comparison",
      "best acme widget",
    ]);
  });

  it("warns about entities missing from the taxonomy", () => {
    const { ontology, taxonomy } = clustersFor();
    const partial = { ...taxonomy, nodes: [{ ...taxonomy.nodes[0], entityIds: ["ent-acme-widget"] }] };
    const warnings: Warning[] = [];
    const clusters = mapAllEntities(partial, ontology, strategy(), loadCatalog().fanoutPatterns, warnings);

    expect(clusters.flatMap((c) => c.queries)).toHaveLength(29);
    expect(warnings).toEqual([
      {
        level: "warn",
        module: "query-mapper",
        message: "Entity ent-acme-gadget is not classified in the taxonomy; no queries generated",
      },
    ]);
  });
});

describe("coverage and ordering", () => {
  const { clusters } = clustersFor();

  it("reports intent coverage and missing intents", () => {
    expect(getIntentCoverage(clusters)).toEqual({
      overall: 0.8,
      byEntity: { "ent-acme-widget": 0.8, "ent-acme-gadget": 0.8 },
      missingIntents: ["local"],
    });
  });

  it("reports zero coverage for no clusters", () => {
    expect(getIntentCoverage([])).toEqual({
      overall: 0,
      byEntity: {},
      missingIntents: ["informational", "navigational", "commercial", "transactional", "local"],
    });
  });

  it("sums SERP feature opportunities", () => {
    expect(getSerpFeatureOpportunities(clusters)).toEqual({
      "featured-snippet": 30,
      sitelinks: 4,
      "people-also-ask": 18,
      "shopping-results": 6,
    });
  });

  it("orders queries by priority with stable ties", () => {
    const ordered = prioritizeQueries(clusters);
    expect(ordered).toHaveLength(58);
    expect(ordered[0].id).toBe("ent-acme-widget:definitional:1");
    expect(ordered[57].priority).toBe(3);
    expect(ordered.filter((q) => q.priority === 1)).toHaveLength(12);
  });
});
