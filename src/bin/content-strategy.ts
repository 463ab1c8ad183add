#!/usr/bin/env node
// CLI entry point for content-strategy

import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { ENGINE_VERSION, describeFailure, exportAll, runPipeline } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { Warning } from "../types.js";

const HELP_TEXT = `
content-strategy v${ENGINE_VERSION}

Usage:
  content-strategy [generate] [options]   Build a content strategy for one brand

Options:
  --brand              Brand name (required)
  --niche              Primary niche (required)
  --goal               Business goal, repeatable or comma-separated:
                       brand_awareness, lead_generation, ecommerce_sales,
                       thought_leadership, local_visibility, product_adoption
  --mode               Entity source: seed, sitemap, hybrid
                       (default: inferred from --seed and --sitemap)
  --seed               Seed entity, repeatable
  --sitemap            Sitemap URL (sitemap and hybrid modes)
  --competitor         Competitor name, repeatable or comma-separated
  --region             Target region, repeatable or comma-separated
  --format, -f         Export formats: json, markdown (md), csv (default: json)
  --output, -o         Output directory (default: current directory)
  --config, -c         Path to config file (default: strategy.config.json)
  --timeout            Sitemap fetch timeout in milliseconds
  --quiet, -q          Suppress warnings
  --verbose, -v        Print stage timings to stderr
  --dry-run            Print the framework JSON to stdout (no file write)
  --help, -h           Show this help text

Examples:
  content-strategy --brand Acme --niche "home automation" --goal brand_awareness --seed "Smart Plug"
  content-strategy --brand Acme --niche "home automation" --goal lead_generation --sitemap https://example.com/sitemap.xml -f json,md,csv -o out
`.trim();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  if (args.command !== undefined && args.command !== "generate") {
    process.stderr.write(`[error] Unknown command "${args.command}". Run content-strategy --help.\n`);
    return 1;
  }

  const configWarnings: Warning[] = [];
  const config = resolveConfig(args, configWarnings);
  const output = await runPipeline(config);

  // Config-time warnings first, then the pipeline's
  output.warnings.unshift(...configWarnings);

  if (!args.quiet) {
    for (const w of output.warnings) {
      process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
    }
  }

  if (args.dryRun) {
    process.stdout.write(JSON.stringify(output, null, 2) + "\n");
    return 0;
  }

  for (const artifact of exportAll(output, config.output.formats)) {
    const outputPath = resolve(config.output.dir, artifact.filename);
    writeFileSafe(outputPath, artifact.content);
    if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);
  }
  return 0;
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`${describeFailure(err)}\n`);
    process.exit(1);
  },
);
