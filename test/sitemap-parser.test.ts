import { describe, it, expect } from "vitest";
import {
  analyzeUrlPath,
  extractEntityCandidates,
  fetchSitemap,
  parseSitemapXml,
} from "../src/sitemap-parser.js";
import type { SitemapFetchOptions } from "../src/sitemap-parser.js";
import { SitemapFetchError, SitemapParseError } from "../src/types.js";
import type { Warning } from "../src/types.js";
import { fakeFetch } from "./helpers.js";

const SITEMAP = "https://example.com/sitemap.xml";

function urlset(...locs: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ...locs.map((loc) => `  <url><loc>${loc}</loc></url>`),
    "</urlset>",
  ].join("\n");
}

function options(pages: Record<string, string | number>, overrides: Partial<SitemapFetchOptions> = {}): SitemapFetchOptions {
  return { timeoutMs: 1000, maxChildSitemaps: 10, exclude: [], fetch: fakeFetch(pages), ...overrides };
}

describe("parseSitemapXml", () => {
  it("reads a urlset with optional fields", () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://example.com/products/smart-plug</loc><lastmod>2024-01-02</lastmod><priority>0.8</priority></url>
  <url><loc>https://example.com/blog/smart-plug-guide.html</loc></url>
</urlset>`;
    const parsed = parseSitemapXml(xml, SITEMAP);

    expect(parsed).toEqual({
      kind: "urlset",
      urls: [
        {
          loc: "https://example.com/products/smart-plug",
          lastmod: "2024-01-02",
          priority: 0.8,
          pathSegments: ["products", "smart-plug"],
          inferredCategory: "product",
          inferredEntity: "Smart Plug",
        },
        {
          loc: "https://example.com/blog/smart-plug-guide.html",
          pathSegments: ["blog", "smart-plug-guide.html"],
          inferredCategory: "blog",
          inferredEntity: "Smart Plug Guide",
        },
      ],
    });
  });

  it("reads a sitemap index", () => {
    const xml = `<sitemapindex><sitemap><loc>https://example.com/a.xml</loc></sitemap><sitemap><loc>https://example.com/b.xml</loc></sitemap></sitemapindex>`;
    expect(parseSitemapXml(xml, SITEMAP)).toEqual({
      kind: "index",
      sitemaps: ["https://example.com/a.xml", "https://example.com/b.xml"],
    });
  });

  it("rejects empty, malformed and foreign documents", () => {
    expect(() => parseSitemapXml("  ", SITEMAP)).toThrow(`Sitemap ${SITEMAP} is empty`);
    expect(() => parseSitemapXml("<urlset><url></urlset>", SITEMAP)).toThrow(SitemapParseError);
    expect(() => parseSitemapXml("<urlset><url></urlset>", SITEMAP)).toThrow(`Malformed sitemap XML at ${SITEMAP} (line 1)`);
    expect(() => parseSitemapXml("<rss></rss>", SITEMAP)).toThrow("has neither <urlset> nor <sitemapindex> root");
  });
});

describe("analyzeUrlPath", () => {
  it("leaves the root URL without category or entity", () => {
    expect(analyzeUrlPath({ loc: "https://example.com/", pathSegments: [] })).toEqual({
      loc: "https://example.com/",
      pathSegments: [],
    });
  });

  it("uses the first segment as category and drops slug stop words", () => {
    const url = analyzeUrlPath({ loc: "https://example.com/about/the-team", pathSegments: [] });
    expect(url.inferredCategory).toBe("about");
    expect(url.inferredEntity).toBe("Team");
  });
});

describe("extractEntityCandidates", () => {
  it("groups case-insensitively, most frequent first", () => {
    const urls = [
      "https://example.com/shop/hub",
      "https://example.com/products/smart-plug",
      "https://example.com/blog/Smart-Plug",
    ].map((loc) => analyzeUrlPath({ loc, pathSegments: [] }));

    expect(extractEntityCandidates(urls)).toEqual([
      {
        name: "Smart Plug",
        frequency: 2,
        sourceUrls: ["https://example.com/products/smart-plug", "https://example.com/blog/Smart-Plug"],
        categories: ["product", "blog"],
      },
      { name: "Hub", frequency: 1, sourceUrls: ["https://example.com/shop/hub"], categories: ["product"] },
    ]);
  });
});

describe("fetchSitemap", () => {
  it("analyzes a urlset through the injected fetch", async () => {
    const analysis = await fetchSitemap(
      SITEMAP,
      options({
        [SITEMAP]: urlset("https://example.com/products/smart-plug", "https://example.com/products/smart-plug-mini"),
      }),
    );
    expect(analysis.baseUrl).toBe("https://example.com");
    expect(analysis.urls).toHaveLength(2);
    expect(analysis.categories).toEqual({ product: 2 });
    expect(analysis.contentTypes).toEqual({ product: 2 });
    expect(analysis.urlPatterns).toEqual(["/products/smart-plug", "/products/smart-plug-mini"]);
    expect(analysis.candidates.map((c) => c.name)).toEqual(["Smart Plug", "Smart Plug Mini"]);
  });

  it("follows an index and skips failing children with a warning", async () => {
    const warnings: Warning[] = [];
    const analysis = await fetchSitemap(
      SITEMAP,
      options({
        [SITEMAP]: `<sitemapindex><sitemap><loc>https://example.com/a.xml</loc></sitemap><sitemap><loc>https://example.com/b.xml</loc></sitemap></sitemapindex>`,
        "https://example.com/a.xml": urlset("https://example.com/products/smart-plug"),
        "https://example.com/b.xml": 500,
      }),
      warnings,
    );
    expect(analysis.urls.map((u) => u.loc)).toEqual(["https://example.com/products/smart-plug"]);
    expect(warnings).toEqual([
      {
        level: "warn",
        module: "sitemap-parser",
        message: "Skipping child sitemap: Sitemap request to https://example.com/b.xml returned 500",
      },
    ]);
  });

  it("fails with a fetch error when every child sitemap fails to load", async () => {
    const err = await fetchSitemap(
      SITEMAP,
      options({
        [SITEMAP]: `<sitemapindex><sitemap><loc>https://example.com/a.xml</loc></sitemap></sitemapindex>`,
        "https://example.com/a.xml": 500,
      }),
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SitemapFetchError);
    if (err instanceof SitemapFetchError) {
      expect(err.message).toBe(
        `All 1 child sitemap(s) of ${SITEMAP} failed to load; first: Sitemap request to https://example.com/a.xml returned 500`,
      );
      expect(err.statusCode).toBe(500);
      expect(err.url).toBe(SITEMAP);
    }
  });

  it("caps the number of child sitemaps", async () => {
    const warnings: Warning[] = [];
    await fetchSitemap(
      SITEMAP,
      options(
        {
          [SITEMAP]: `<sitemapindex><sitemap><loc>https://example.com/a.xml</loc></sitemap><sitemap><loc>https://example.com/b.xml</loc></sitemap></sitemapindex>`,
          "https://example.com/a.xml": urlset("https://example.com/products/smart-plug"),
        },
        { maxChildSitemaps: 1 },
      ),
      warnings,
    );
    expect(warnings).toEqual([
      { level: "info", module: "sitemap-parser", message: "Sitemap index lists 2 sitemaps; reading the first 1" },
    ]);
  });

  it("fails with the HTTP status when the top-level fetch fails", async () => {
    const err = await fetchSitemap(SITEMAP, options({ [SITEMAP]: 404 })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SitemapFetchError);
    if (err instanceof SitemapFetchError) {
      expect(err.message).toBe(`Sitemap request to ${SITEMAP} returned 404`);
      expect(err.statusCode).toBe(404);
      expect(err.url).toBe(SITEMAP);
    }
  });

  it("aborts a request that exceeds the timeout", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    await expect(fetchSitemap(SITEMAP, { timeoutMs: 20, maxChildSitemaps: 10, exclude: [], fetch: hanging })).rejects.toThrow(
      `Failed to fetch sitemap ${SITEMAP}: timed out after 20ms`,
    );
  });

  it("drops excluded paths and fails when nothing remains", async () => {
    const warnings: Warning[] = [];
    const pages = {
      [SITEMAP]: urlset("https://example.com/products/smart-plug", "https://example.com/blog/smart-plug-guide"),
    };
    const analysis = await fetchSitemap(SITEMAP, options(pages, { exclude: ["/blog/**"] }), warnings);
    expect(analysis.urls.map((u) => u.loc)).toEqual(["https://example.com/products/smart-plug"]);
    expect(warnings[0].message).toBe("Excluded 1 of 2 sitemap URLs by pattern");

    await expect(fetchSitemap(SITEMAP, options(pages, { exclude: ["/**"] }))).rejects.toThrow(
      `Sitemap ${SITEMAP} contains no usable <url> entries`,
    );
  });
});
