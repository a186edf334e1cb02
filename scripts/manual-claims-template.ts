/**
 * Manual claims template CLI
 *
 * Writes a JSON template (and optionally a Markdown checklist) listing the
 * top-K claimable records for an operator to fill in by hand.
 *
 * Usage:
 *   npx tsx scripts/manual-claims-template.ts --in prior_art.json --out claims_manual.json [--topk N] [--out-md checklist.md]
 */

import * as fs from "node:fs";
import { CliUsageError, numberValue, parseCliArgs, requireValue } from "../src/lib/cli-args";
import { buildManualClaimsTemplate, renderManualClaimsChecklist } from "../src/lib/manual-claims";
import { loadPriorArtRecords, writeJsonFile } from "../src/lib/prior-art-io";

const USAGE = "Usage: manual-claims-template --in <prior_art.json> --out <template.json> [--topk N] [--out-md <file.md>]";

function main(): void {
  const args = parseCliArgs(process.argv.slice(2), ["in", "out", "out-md", "topk"], []);
  const inPath = requireValue(args, "in");
  const outPath = requireValue(args, "out");
  const topK = numberValue(args, "topk") ?? 10;

  const template = buildManualClaimsTemplate(loadPriorArtRecords(inPath), { topK, input: inPath });
  writeJsonFile(outPath, template);
  console.log(`[Manual-Template] ${template.items.length} item(s) → ${outPath}`);

  const mdPath = args.values.get("out-md");
  if (mdPath) {
    fs.writeFileSync(mdPath, renderManualClaimsChecklist(template) + "\n", "utf-8");
    console.log(`[Manual-Template] checklist → ${mdPath}`);
  }
}

try {
  main();
} catch (err) {
  console.error(err instanceof CliUsageError ? `${err.message}\n\n${USAGE}` : err);
  process.exitCode = 1;
}
