/**
 * Claims enrichment CLI
 *
 * Fetches claims for the top-K recalled prior-art records and writes the
 * enriched list.
 *
 * Usage:
 *   npx tsx scripts/fetch-claims.ts --in prior_art.json --out prior_art_full.json [options]
 *
 * Exit codes: 0 ok, 2 claims ok ratio below --require-min-ok-ratio,
 * 3 empty recall, 1 any other error.
 */

import { EmptyRecallError, enrichPriorArtClaims } from "../src/lib/claims-enrichment";
import {
  buildFetchClaimsOverrides,
  CliUsageError,
  FETCH_CLAIMS_FLAGS,
  FETCH_CLAIMS_VALUES,
  parseCliArgs,
  requireValue,
} from "../src/lib/cli-args";
import { loadPipelineConfig } from "../src/lib/config-loader";
import { EvidenceCache } from "../src/lib/evidence-cache";
import {
  extractManualEntries,
  loadCheckpoint,
  loadPriorArtRecords,
  readJsonFile,
  writeJsonFile,
} from "../src/lib/prior-art-io";
import { RequestPacer } from "../src/lib/request-pacer";

const USAGE = `Usage: fetch-claims --in <prior_art.json> --out <prior_art_full.json>
  [--config <pipeline.json>] [--topk N] [--cache-path <db>] [--no-cache] [--clear-cache]
  [--force] [--no-resume] [--timeout-ms N] [--max-attempts N] [--backoff-ms N]
  [--backoff-multiplier X] [--jitter X] [--sleep-ms N]
  [--claim-sources auto|google,espacenet,cnipa,lens] [--manual-claims <file>]
  [--no-strict] [--require-min-ok-ratio X] [--fail-on-empty | --allow-empty]`;

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2), FETCH_CLAIMS_VALUES, FETCH_CLAIMS_FLAGS);
  const inPath = requireValue(args, "in");
  const outPath = requireValue(args, "out");

  const { config } = loadPipelineConfig({
    filePath: args.values.get("config") ?? null,
    overrides: buildFetchClaimsOverrides(args),
  });

  const records = loadPriorArtRecords(inPath);
  const checkpoint = config.fetch.resume && !config.fetch.force ? loadCheckpoint(outPath) : undefined;
  const manualPath = args.values.get("manual-claims");
  const manualEntries = manualPath ? extractManualEntries(readJsonFile(manualPath), manualPath) : undefined;

  const cache = config.cache.enabled ? new EvidenceCache(config.cache) : null;
  const pacer = new RequestPacer(config.pacing);

  try {
    await cache?.prepareForRun({ clear: args.flags.has("clear-cache") });

    const { records: enriched, summary } = await enrichPriorArtClaims(records, {
      config,
      checkpoint,
      manualEntries,
      deps: { cache, pacer },
    });
    writeJsonFile(outPath, enriched);

    const q = summary.quality;
    console.log(`[Fetch-Claims] claims ok: ${q.claims_ok}/${q.claims_total} (ratio=${q.claims_ok_ratio.toFixed(3)})`);
    console.log(`[Fetch-Claims] status counts: ${JSON.stringify(q.claims_status_counts)}`);
    console.log(
      `[Fetch-Claims] reused=${summary.reused} fetched=${summary.fetched} rejected_source=${summary.rejectedSource} ` +
        `manual=${summary.manualAccepted.length} manual_rejected=${summary.manualRejected.length}`,
    );
    if (cache) {
      const stats = await cache.getStats();
      console.log(
        `[Fetch-Claims] cache: ${stats.validEntries} valid entries for ${stats.documents} document(s) at ${cache.dbPath}`,
      );
    }
    console.log(`[Fetch-Claims] out: ${outPath}`);

    if (!q.pass) {
      console.error(
        `[Fetch-Claims] ok ratio ${q.claims_ok_ratio.toFixed(3)} < required ${q.min_claims_ok_ratio.toFixed(3)}`,
      );
      return 2;
    }
    return 0;
  } finally {
    await cache?.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof EmptyRecallError) {
      console.error(`[Fetch-Claims] ${err.message}`);
      process.exitCode = 3;
      return;
    }
    if (err instanceof CliUsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
    } else {
      console.error("[Fetch-Claims] Failed:", err);
    }
    process.exitCode = 1;
  });
