import { describe, it, expect } from "vitest";
import {
  buildTaxonomy,
  commercialBand,
  getChildren,
  getNodePath,
  getRootNodes,
  getSubtreeEntityIds,
} from "../src/taxonomy-builder.js";
import { EmptyOntologyError } from "../src/types.js";
import type { Ontology } from "../src/types.js";
import { entity } from "./helpers.js";

// Seven concepts: two is-a anchors, one cross-anchor link, two loners.
const LARGE: Ontology = {
  brandName: "Acme",
  entities: [
    entity("ent-lighting", "Lighting", "concept", { categories: ["product"] }),
    entity("ent-smart-lighting", "Smart Lighting", "concept"),
    entity("ent-outdoor-lighting", "Outdoor Lighting", "concept"),
    entity("ent-security", "Security", "concept"),
    entity("ent-home-security", "Home Security", "concept"),
    entity("ent-energy-savings", "Energy Savings", "concept"),
    entity("ent-led", "LED", "concept"),
  ],
  relationships: [
    { sourceId: "ent-smart-lighting", type: "is-a", targetId: "ent-lighting", weight: 0.7, evidence: "" },
    { sourceId: "ent-outdoor-lighting", type: "is-a", targetId: "ent-lighting", weight: 0.7, evidence: "" },
    { sourceId: "ent-home-security", type: "is-a", targetId: "ent-security", weight: 0.7, evidence: "" },
    { sourceId: "ent-smart-lighting", type: "relates-to", targetId: "ent-home-security", weight: 0.5, evidence: "" },
  ],
};

describe("buildTaxonomy", () => {
  it("builds a single root for a single entity", () => {
    const taxonomy = buildTaxonomy({
      brandName: "Acme",
      entities: [entity("ent-smart-plug", "Smart Plug", "product", { commercialValue: 0.8 })],
      relationships: [],
    });

    expect(taxonomy.nodes).toEqual([
      {
        id: "tax-product",
        label: "Products",
        parentId: null,
        depth: 0,
        entityIds: ["ent-smart-plug"],
        facetTags: ["commercial-value:high"],
        targetUrl: "/products/",
      },
    ]);
    expect(taxonomy.facets).toEqual([{ name: "commercial-value", values: ["high", "medium", "low"] }]);
    expect(taxonomy.internalLinks).toEqual([]);
  });

  it("groups by type in first-seen order", () => {
    const taxonomy = buildTaxonomy({
      brandName: "Acme",
      entities: [
        entity("ent-a", "A Guide", "topic"),
        entity("ent-b", "B Kit", "product"),
        entity("ent-c", "C Guide", "topic"),
      ],
      relationships: [],
    });
    expect(taxonomy.nodes.map((n) => [n.id, n.entityIds])).toEqual([
      ["tax-topic", ["ent-a", "ent-c"]],
      ["tax-product", ["ent-b"]],
    ]);
  });

  it("splits an oversized root by its dominant relationship", () => {
    const taxonomy = buildTaxonomy(LARGE);

    expect(taxonomy.nodes.map((n) => [n.id, n.parentId, n.depth, n.entityIds])).toEqual([
      ["tax-concept", null, 0, ["ent-energy-savings", "ent-led"]],
      ["tax-concept-lighting", "tax-concept", 1, ["ent-lighting", "ent-smart-lighting", "ent-outdoor-lighting"]],
      ["tax-concept-security", "tax-concept", 1, ["ent-security", "ent-home-security"]],
    ]);
    expect(taxonomy.nodes[1].label).toBe("Lighting");
    expect(taxonomy.nodes[1].targetUrl).toBe("/concepts/lighting/");
    expect(taxonomy.nodes[1].facetTags).toEqual(["commercial-value:medium", "section:product"]);
    expect(taxonomy.nodes[0].facetTags).toEqual(["commercial-value:medium"]);
    expect(taxonomy.facets[1]).toEqual({ name: "section", values: ["product"] });
    expect(taxonomy.internalLinks).toEqual([
      { fromNodeId: "tax-concept-lighting", toNodeId: "tax-concept-security", relationType: "relates-to" },
    ]);
  });

  it("breaks a tie between relation types by declaration order", () => {
    const names = ["Alpha", "Beta", "Gamma", "Delta", "Epsilon", "Zeta", "Eta"];
    const taxonomy = buildTaxonomy({
      brandName: "Acme",
      entities: names.map((n) => entity(`ent-${n.toLowerCase()}`, n, "concept")),
      relationships: [
        { sourceId: "ent-beta", type: "relates-to", targetId: "ent-alpha", weight: 0.5, evidence: "" },
        { sourceId: "ent-delta", type: "is-a", targetId: "ent-gamma", weight: 0.7, evidence: "" },
      ],
    });

    expect(taxonomy.nodes.map((n) => [n.id, n.entityIds])).toEqual([
      ["tax-concept", ["ent-alpha", "ent-beta", "ent-epsilon", "ent-zeta", "ent-eta"]],
      ["tax-concept-gamma", ["ent-gamma", "ent-delta"]],
    ]);
  });

  it("rejects an empty ontology", () => {
    expect(() => buildTaxonomy({ brandName: "Acme", entities: [], relationships: [] })).toThrow(EmptyOntologyError);
  });
});

describe("taxonomy helpers", () => {
  const taxonomy = buildTaxonomy(LARGE);

  it("navigates roots, children and paths", () => {
    expect(getRootNodes(taxonomy).map((n) => n.id)).toEqual(["tax-concept"]);
    expect(getChildren(taxonomy, "tax-concept")).toHaveLength(2);
    expect(getNodePath(taxonomy, "tax-concept-security").map((n) => n.id)).toEqual(["tax-concept", "tax-concept-security"]);
    expect(getNodePath(taxonomy, "tax-missing")).toEqual([]);
  });

  it("collects subtree entities in node order", () => {
    expect(getSubtreeEntityIds(taxonomy, "tax-concept")).toEqual([
      "ent-energy-savings",
      "ent-led",
      "ent-lighting",
      "ent-smart-lighting",
      "ent-outdoor-lighting",
      "ent-security",
      "ent-home-security",
    ]);
  });

  it("bands commercial value", () => {
    expect(commercialBand(0.7)).toBe("high");
    expect(commercialBand(0.4)).toBe("medium");
    expect(commercialBand(0.39)).toBe("low");
  });
});
