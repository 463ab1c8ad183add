import { describe, it, expect, vi } from "vitest";
import {
  assembleOntology,
  buildOntology,
  entityIdFor,
  inferEntityType,
  MAX_SITEMAP_ENTITIES,
} from "../src/ontology-builder.js";
import type { SitemapAnalysis } from "../src/sitemap-parser.js";
import { ConfigurationError } from "../src/types.js";
import type { Warning } from "../src/types.js";
import { strategy, stubSitemap } from "./helpers.js";

describe("buildOntology", () => {
  it("builds seed entities without touching the sitemap", async () => {
    const load = vi.fn(async (): Promise<SitemapAnalysis> => {
      throw new Error("unexpected sitemap fetch");
    });
    const ontology = await buildOntology(strategy(), { sitemapSource: { load } });

    expect(load).not.toHaveBeenCalled();
    expect(ontology.brandName).toBe("Acme");
    expect(ontology.entities.map((e) => [e.id, e.name, e.type, e.origin])).toEqual([
      ["ent-acme-widget", "Acme Widget", "product", "seed"],
      ["ent-acme-gadget", "Acme Gadget", "product", "seed"],
    ]);
    expect(ontology.relationships).toEqual([
      { sourceId: "ent-acme-widget", type: "relates-to", targetId: "ent-acme-gadget", weight: 0.5, evidence: "Shared terms: acme" },
    ]);
    // brand_awareness does not target products: 0.4 * typeWeight(1.0)
    expect(ontology.entities.map((e) => e.commercialValue)).toEqual([0.4, 0.4]);
    expect(ontology.entities.map((e) => e.centrality)).toEqual([1, 1]);
  });

  it("loads sitemap candidates in sitemap mode", async () => {
    const source = stubSitemap([
      { name: "Motion Sensors", frequency: 3, sourceUrls: ["https://example.com/shop/motion-sensors"], categories: ["product"] },
    ]);
    const ontology = await buildOntology(
      strategy({ sourceMode: "sitemap", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: [] }),
      { sitemapSource: source },
    );
    expect(source.calls).toEqual(["https://example.com/sitemap.xml"]);
    expect(ontology.entities).toHaveLength(1);
    expect(ontology.entities[0]).toMatchObject({
      id: "ent-motion-sensors",
      type: "topic",
      origin: "sitemap",
      sourceUrls: ["https://example.com/shop/motion-sensors"],
      categories: ["product"],
      centrality: 0,
    });
  });

  it("propagates sitemap failures unchanged", async () => {
    const failure = new Error("boom");
    const load = vi.fn(async (): Promise<SitemapAnalysis> => {
      throw failure;
    });
    await expect(
      buildOntology(strategy({ sourceMode: "sitemap", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: [] }), {
        sitemapSource: { load },
      }),
    ).rejects.toBe(failure);
  });
});

describe("assembleOntology", () => {
  it("applies relationship rules in order", () => {
    const ontology = assembleOntology(
      strategy({
        businessGoals: ["product_adoption"],
        seedEntities: ["Smart Lighting", "Smart Lighting Kit", "Lighting Dashboard", "Energy Savings"],
      }),
    );

    expect(ontology.entities.map((e) => e.type)).toEqual(["concept", "product", "feature", "concept"]);
    expect(ontology.relationships).toEqual([
      {
        sourceId: "ent-smart-lighting-kit",
        type: "is-a",
        targetId: "ent-smart-lighting",
        weight: 0.7,
        evidence: '"Smart Lighting Kit" contains "Smart Lighting"',
      },
      {
        sourceId: "ent-smart-lighting",
        type: "relates-to",
        targetId: "ent-lighting-dashboard",
        weight: 0.5,
        evidence: "Shared terms: lighting",
      },
      {
        sourceId: "ent-lighting-dashboard",
        type: "part-of",
        targetId: "ent-smart-lighting-kit",
        weight: 0.8,
        evidence: "Feature sharing terms: lighting",
      },
    ]);
    expect(ontology.entities.map((e) => e.centrality)).toEqual([1, 1, 1, 0]);
    expect(ontology.entities.map((e) => e.commercialValue)).toEqual([0.2, 0.8, 0.68, 0.2]);
  });

  it("links an offering to a subject it shares terms with", () => {
    const ontology = assembleOntology(strategy({ seedEntities: ["Lighting Installation", "Ambient Lighting"] }));
    expect(ontology.relationships).toEqual([
      {
        sourceId: "ent-lighting-installation",
        type: "used-for",
        targetId: "ent-ambient-lighting",
        weight: 0.6,
        evidence: "Offering sharing terms: lighting",
      },
    ]);
  });

  it("adds competitor overlap to commercial value", () => {
    const ontology = assembleOntology(
      strategy({ seedEntities: ["Smart Lighting", "Energy Savings"], competitors: ["Lumen Lighting Co"] }),
    );
    // concept under brand_awareness: 0.4 goal + 0.2 overlap + 0.4 * 0.5
    expect(ontology.entities.map((e) => e.commercialValue)).toEqual([0.8, 0.6]);
  });

  it("merges sitemap candidates into matching seeds in hybrid mode", () => {
    const ontology = assembleOntology(
      strategy({ sourceMode: "hybrid", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: ["Smart Lighting"] }),
      [
        { name: "smart lighting", frequency: 3, sourceUrls: ["https://example.com/a"], categories: ["product"] },
        { name: "Motion Sensors", frequency: 1, sourceUrls: ["https://example.com/b"], categories: [] },
      ],
    );
    expect(ontology.entities.map((e) => [e.name, e.origin, e.type])).toEqual([
      ["Smart Lighting", "seed", "concept"],
      ["Motion Sensors", "sitemap", "topic"],
    ]);
    expect(ontology.entities[0].sourceUrls).toEqual(["https://example.com/a"]);
    expect(ontology.entities[0].categories).toEqual(["product"]);
  });

  it("warns when a hybrid sitemap adds nothing new", () => {
    const warnings: Warning[] = [];
    assembleOntology(
      strategy({ sourceMode: "hybrid", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: ["Smart Lighting"] }),
      [],
      warnings,
    );
    expect(warnings).toEqual([
      { level: "warn", module: "ontology-builder", message: "Sitemap added no entities beyond the seeds" },
    ]);
  });

  it("caps sitemap entities at the most frequent candidates", () => {
    const warnings: Warning[] = [];
    const candidates = Array.from({ length: 55 }, (_, i) => ({
      name: `Topic ${i + 1}`,
      frequency: 55 - i,
      sourceUrls: [],
      categories: [],
    }));
    const ontology = assembleOntology(
      strategy({ sourceMode: "sitemap", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: [] }),
      candidates,
      warnings,
    );
    expect(ontology.entities).toHaveLength(MAX_SITEMAP_ENTITIES);
    expect(ontology.entities[49].name).toBe("Topic 50");
    expect(warnings[0].message).toBe("Sitemap produced 55 entity candidates; keeping the 50 most frequent");
  });

  it("fails when no entity can be derived", () => {
    expect(() => assembleOntology(strategy({ seedEntities: ["  ", "<>"] }))).toThrow(ConfigurationError);
    expect(() =>
      assembleOntology(strategy({ sourceMode: "sitemap", sitemapUrl: "https://example.com/sitemap.xml", seedEntities: [] }), []),
    ).toThrow("Sitemap https://example.com/sitemap.xml yielded no entity candidates");
  });

  it("merges duplicate seeds and disambiguates colliding ids", () => {
    const ontology = assembleOntology(strategy({ seedEntities: ["C++", "c++", "C#"] }));
    expect(ontology.entities.map((e) => e.id)).toEqual(["ent-c", "ent-c-2"]);
  });
});

describe("inferEntityType / entityIdFor", () => {
  it("uses the last matching keyword", () => {
    expect(inferEntityType("Smart Plug Installation", "seed")).toBe("service");
    expect(inferEntityType("Analytics Dashboard", "seed")).toBe("feature");
    expect(inferEntityType("Content Strategy", "seed")).toBe("topic");
    expect(inferEntityType("Widget Pro", "seed")).toBe("product");
    expect(inferEntityType("Home Comfort", "seed")).toBe("concept");
    expect(inferEntityType("Home Comfort", "sitemap")).toBe("topic");
  });

  it("derives ids from normalized names", () => {
    expect(entityIdFor("Smart Plug")).toBe("ent-smart-plug");
    expect(entityIdFor("!!!")).toBe("ent-entity");
  });
});
