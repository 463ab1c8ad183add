// src/exporters/index.ts — Export dispatch
// A closed set of formats, each a pure projection of a validated document.

import type { ExportArtifact, ExportFormat, FrameworkOutput } from "../types.js";
import { validateFrameworkOutput } from "../integrity-validator.js";
import { exportJson } from "./json.js";
import { exportMarkdown } from "./markdown.js";
import { exportCsv } from "./csv.js";

export { JSON_FILENAME, parseFrameworkJson } from "./json.js";
export { MARKDOWN_FILENAME, renderMarkdown } from "./markdown.js";
export { escapeCsv, toCsv } from "./csv.js";

const EXPORTERS: Record<ExportFormat, (output: FrameworkOutput) => ExportArtifact[]> = {
  json: exportJson,
  markdown: exportMarkdown,
  csv: exportCsv,
};

/**
 * Render one format. The document is checked first so a partially built or
 * hand-edited output is never written.
 * @throws ReferentialIntegrityError when a reference dangles
 */
export function exportOutput(output: FrameworkOutput, format: ExportFormat): ExportArtifact[] {
  validateFrameworkOutput(output);
  return EXPORTERS[format](output);
}

/** Artifacts for several formats, in the order given. */
export function exportAll(output: FrameworkOutput, formats: readonly ExportFormat[]): ExportArtifact[] {
  validateFrameworkOutput(output);
  return formats.flatMap((format) => EXPORTERS[format](output));
}
