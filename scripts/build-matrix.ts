/**
 * Novelty matrix CLI
 *
 * Usage:
 *   npx tsx scripts/build-matrix.ts --profile invention_profile.json \
 *     --prior-art-full prior_art_full.json --out novelty_matrix.json [options]
 *
 * Exit codes: 0 ok, 2 claims quality gate halted the build, 1 any other error.
 */

import { buildNoveltyMatrix } from "../src/lib/analyzer/novelty-matrix";
import { QualityGateError } from "../src/lib/analyzer/quality-gate";
import {
  BUILD_MATRIX_FLAGS,
  BUILD_MATRIX_VALUES,
  buildMatrixOverrides,
  CliUsageError,
  parseCliArgs,
  requireValue,
} from "../src/lib/cli-args";
import { loadPipelineConfig } from "../src/lib/config-loader";
import { loadEnrichedRecords, loadInventionProfile, writeJsonFile } from "../src/lib/prior-art-io";

const USAGE = `Usage: build-matrix --profile <invention_profile.json> --prior-art-full <prior_art_full.json>
  --out <novelty_matrix.json> [--config <pipeline.json>] [--max-docs N]
  [--min-claims-ok-ratio X] [--fail-on-low-claims | --no-fail-on-low-claims]`;

function main(): number {
  const args = parseCliArgs(process.argv.slice(2), BUILD_MATRIX_VALUES, BUILD_MATRIX_FLAGS);
  const profilePath = requireValue(args, "profile");
  const priorArtPath = requireValue(args, "prior-art-full");
  const outPath = requireValue(args, "out");

  const { config } = loadPipelineConfig({
    filePath: args.values.get("config") ?? null,
    overrides: buildMatrixOverrides(args),
  });

  const profile = loadInventionProfile(profilePath);
  const records = loadEnrichedRecords(priorArtPath);

  const report = buildNoveltyMatrix({
    keyFeatures: profile.key_features,
    records,
    config: config.matrix,
  });
  writeJsonFile(outPath, report);

  console.log(
    `[Build-Matrix] ${report.feature_ids.length} features x ${report.documents.length} documents, ` +
      `${report.novelty_candidates.length} novelty / ${report.pair_candidates.length} pair candidates`,
  );
  console.log(`[Build-Matrix] out: ${outPath}`);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof QualityGateError) {
    console.error(`[Build-Matrix] ${err.message}`);
    process.exitCode = 2;
  } else if (err instanceof CliUsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
    process.exitCode = 1;
  } else {
    console.error("[Build-Matrix] Failed:", err);
    process.exitCode = 1;
  }
}
