// src/exporters/json.ts — JSON export and read-back
// The JSON document mirrors FrameworkOutput field for field.

import type { ExportArtifact, FrameworkOutput } from "../types.js";
import { ConfigurationError } from "../types.js";
import { isRecord } from "../catalog.js";
import { validateFrameworkOutput } from "../integrity-validator.js";

export const JSON_FILENAME = "content-strategy.json";

export function exportJson(output: FrameworkOutput): ExportArtifact[] {
  return [{ filename: JSON_FILENAME, content: `${JSON.stringify(output, null, 2)}\n` }];
}

/**
 * Read a document written by exportJson. The shape is checked down to the
 * arrays the integrity pass walks, then every cross reference is resolved.
 * @throws ConfigurationError when the text is not a framework document
 * @throws ReferentialIntegrityError when a reference dangles
 */
export function parseFrameworkJson(text: string): FrameworkOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid framework JSON: ${msg}`, [{ field: "json", message: msg }]);
  }
  const problems = shapeProblems(parsed);
  if (problems.length > 0 || !isFrameworkOutput(parsed)) {
    throw new ConfigurationError(
      `Invalid framework JSON: ${problems.join("; ")}`,
      problems.map((p) => ({ field: "json", message: p })),
    );
  }
  validateFrameworkOutput(parsed);
  return parsed;
}

// ─── Shape checks ────────────────────────────────────────────────────────────

const REQUIRED_SECTIONS: Array<[string, "object" | "array"]> = [
  ["meta", "object"],
  ["strategy", "object"],
  ["ontology", "object"],
  ["entityGaps", "array"],
  ["taxonomy", "object"],
  ["queryClusters", "array"],
  ["intentCoverage", "object"],
  ["contentHubs", "array"],
  ["contentGaps", "array"],
  ["personas", "array"],
  ["contentSpecs", "array"],
  ["measurementPlan", "object"],
  ["summary", "object"],
  ["warnings", "array"],
];

function isFrameworkOutput(value: unknown): value is FrameworkOutput {
  return shapeProblems(value).length === 0;
}

function shapeProblems(value: unknown): string[] {
  if (!isRecord(value)) return ["document must be a JSON object"];
  const problems: string[] = [];
  for (const [key, kind] of REQUIRED_SECTIONS) {
    const section = value[key];
    const ok = kind === "array" ? Array.isArray(section) : isRecord(section);
    if (!ok) problems.push(`${key} must be ${kind === "array" ? "an array" : "an object"}`);
  }
  if (problems.length > 0) return problems;

  const arraysAt = (owner: unknown, path: string, keys: string[]): void => {
    if (!isRecord(owner)) {
      problems.push(`${path} must be an object`);
      return;
    }
    for (const key of keys) {
      if (!Array.isArray(owner[key])) problems.push(`${path}.${key} must be an array`);
    }
  };
  const eachOf = (list: unknown, path: string, check: (item: unknown, at: string) => void): void => {
    if (Array.isArray(list)) list.forEach((item, i) => check(item, `${path}[${i}]`));
  };

  arraysAt(value.ontology, "ontology", ["entities", "relationships"]);
  arraysAt(value.taxonomy, "taxonomy", ["nodes", "facets", "internalLinks"]);
  if (isRecord(value.taxonomy)) {
    eachOf(value.taxonomy.nodes, "taxonomy.nodes", (n, at) => arraysAt(n, at, ["entityIds"]));
  }
  eachOf(value.queryClusters, "queryClusters", (c, at) => arraysAt(c, at, ["entityIds", "queries"]));
  if (isRecord(value.intentCoverage) && !isRecord(value.intentCoverage.byEntity)) {
    problems.push("intentCoverage.byEntity must be an object");
  }
  eachOf(value.contentHubs, "contentHubs", (h, at) => {
    arraysAt(h, at, ["clusters"]);
    if (!isRecord(h)) return;
    arraysAt(h.pillar, `${at}.pillar`, ["linkedQueryIds", "linkedPageIds"]);
    eachOf(h.clusters, `${at}.clusters`, (p, pat) => arraysAt(p, pat, ["linkedQueryIds", "linkedPageIds"]));
  });
  eachOf(value.contentSpecs, "contentSpecs", (s, at) => arraysAt(s, at, ["targetPersonaIds", "linkAnchors"]));
  arraysAt(value.measurementPlan, "measurementPlan", [
    "kpis",
    "monitoringQueries",
    "auditPrompts",
    "competitorTracking",
    "contentAudit",
    "quickWins",
  ]);
  if (isRecord(value.measurementPlan)) {
    eachOf(value.measurementPlan.kpis, "measurementPlan.kpis", (k, at) => arraysAt(k, at, ["monitoringQueryIds"]));
  }
  return problems;
}
