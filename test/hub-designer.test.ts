import { describe, it, expect } from "vitest";
import { designAllHubs, suggestContentGaps } from "../src/hub-designer.js";
import { loadCatalog } from "../src/catalog.js";
import { assembleOntology } from "../src/ontology-builder.js";
import { expandAllEntities } from "../src/entity-expander.js";
import { buildTaxonomy } from "../src/taxonomy-builder.js";
import { mapAllEntities } from "../src/query-mapper.js";
import type { QueryCluster, Taxonomy, TaxonomyNode } from "../src/types.js";
import { strategy } from "./helpers.js";

function node(id: string, label: string, parentId: string | null, entityIds: string[]): TaxonomyNode {
  return { id, label, parentId, depth: parentId ? 1 : 0, entityIds, facetTags: [], targetUrl: `/${id}/` };
}

function scenario() {
  const config = strategy();
  const ontology = expandAllEntities(assembleOntology(config), config);
  const taxonomy = buildTaxonomy(ontology);
  const clusters = mapAllEntities(taxonomy, ontology, config, loadCatalog().fanoutPatterns);
  return { taxonomy, clusters, hubs: designAllHubs(taxonomy, clusters) };
}

describe("designAllHubs", () => {
  it("builds one hub per root with a pillar and cluster pages", () => {
    const { hubs } = scenario();

    expect(hubs).toHaveLength(1);
    const hub = hubs[0];
    expect(hub.id).toBe("hub-product");
    expect(hub.name).toBe("Products");
    expect(hub.pillar).toEqual({
      id: "hub-product:pillar",
      title: "The Complete Guide to Products",
      role: "pillar",
      taxonomyNodeId: "tax-product",
      primaryIntent: "informational",
      linkedQueryIds: ["ent-acme-widget:definitional:1", "ent-acme-gadget:definitional:1"],
      linkedPageIds: [
        "hub-product:qc-tax-product-informational",
        "hub-product:qc-tax-product-navigational",
        "hub-product:qc-tax-product-commercial",
        "hub-product:qc-tax-product-transactional",
      ],
      recommendedFormat: "long_form_guide",
      wordCountTarget: 3000,
    });
    expect(hub.clusters.map((c) => [c.title, c.recommendedFormat])).toEqual([
      ["Products Guides and Explainers", "how_to_tutorial"],
      ["Products Resources", "faq_page"],
      ["Products Comparisons and Reviews", "comparison_table"],
      ["Products Pricing and Plans", "product_review"],
    ]);
    expect(hub.clusters[0].linkedPageIds).toEqual([
      "hub-product:pillar",
      "hub-product:qc-tax-product-navigational",
      "hub-product:qc-tax-product-commercial",
      "hub-product:qc-tax-product-transactional",
    ]);
    expect(hub.clusters[0].linkedQueryIds).toHaveLength(30);
    expect(hub.clusters[0].wordCountTarget).toBe(1500);
    expect(hub.coverageScore).toBe(1);
    expect(hub.internalLinkCount).toBe(20);
  });

  it("scores zero coverage when no queries exist", () => {
    const taxonomy: Taxonomy = {
      nodes: [node("tax-product", "Products", null, ["ent-a"])],
      facets: [],
      internalLinks: [],
    };
    const [hub] = designAllHubs(taxonomy, []);
    expect(hub.coverageScore).toBe(0);
    expect(hub.clusters).toEqual([]);
    expect(hub.pillar.linkedQueryIds).toEqual([]);
    expect(hub.pillar.linkedPageIds).toEqual([]);
    expect(hub.internalLinkCount).toBe(0);
  });

  it("links pillars of roots joined by a taxonomy link", () => {
    const taxonomy: Taxonomy = {
      nodes: [node("tax-product", "Products", null, ["ent-p"]), node("tax-concept", "Concepts", null, ["ent-c"])],
      facets: [],
      internalLinks: [{ fromNodeId: "tax-product", toNodeId: "tax-concept", relationType: "relates-to" }],
    };
    const hubs = designAllHubs(taxonomy, []);
    expect(hubs.map((h) => h.pillar.linkedPageIds)).toEqual([["hub-concept:pillar"], []]);
  });
});

describe("suggestContentGaps", () => {
  it("returns no gaps for a fully covered hub", () => {
    const { taxonomy, hubs } = scenario();
    expect(suggestContentGaps(taxonomy, hubs)).toEqual([]);
  });

  it("reports uncovered nodes, low coverage and thin hubs in order", () => {
    const taxonomy: Taxonomy = {
      nodes: [
        node("tax-concept", "Concepts", null, ["ent-a", "ent-b"]),
        node("tax-concept-lighting", "Lighting", "tax-concept", ["ent-c"]),
      ],
      facets: [],
      internalLinks: [],
    };
    const cluster: QueryCluster = {
      id: "qc-tax-concept-informational",
      taxonomyNodeId: "tax-concept",
      intent: "informational",
      entityIds: ["ent-a"],
      queries: [
        {
          id: "ent-a:definitional:1",
          text: "what is a",
          entityId: "ent-a",
          intent: "informational",
          priority: 1,
          fanoutPatternUsed: "definitional:1",
          estimatedSerpFeature: "featured-snippet",
        },
      ],
      intentDistribution: { informational: 1 },
      serpFeatureOpportunities: { "featured-snippet": 1 },
    };
    const hubs = designAllHubs(taxonomy, [cluster]);
    // one of three subtree entities is referenced
    expect(hubs[0].coverageScore).toBe(0.3333);

    expect(suggestContentGaps(taxonomy, hubs)).toEqual([
      {
        kind: "uncovered-node",
        taxonomyNodeId: "tax-concept-lighting",
        label: "Lighting",
        recommendation: 'Plan a cluster page covering "Lighting"',
      },
      {
        kind: "low-coverage",
        hubId: "hub-concept",
        coverageScore: 0.3333,
        recommendation: 'Add queries for the uncovered entities under "Concepts"',
      },
      {
        kind: "thin-hub",
        hubId: "hub-concept",
        clusterCount: 1,
        recommendation: 'Expand "Concepts" to at least 3 cluster pages',
      },
    ]);
  });
});
