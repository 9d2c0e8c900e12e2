import fs from "fs";
import { parseFailureRate } from "../lib/config";
import { openCatalog } from "../lib/db";
import { processSubmission } from "../lib/ingest";
import { BatchResult, SubmissionResult } from "../lib/types";

function usage(): never {
  console.error("Usage: ingest-file <submissions.json> [--db <path>] [--json] [--max-failure-rate <0..1>]");
  process.exit(1);
}

function printResult(result: SubmissionResult): void {
  const status = result.success ? "ok" : result.manual_review_needed ? "review" : "FAILED";
  const detail = result.success ? result.actions_taken.join(", ") : result.conflicts.join("; ");
  console.log(`  #${result.index} [${status}] ${detail}`);
}

function isBatch(result: SubmissionResult | BatchResult): result is BatchResult {
  return "total_count" in result;
}

function main() {
  const args = process.argv.slice(2);
  let file: string | null = null;
  let dbPath: string | undefined;
  let json = false;
  let maxFailureRate: number | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--db" && args[i + 1]) {
      dbPath = args[++i];
    } else if (args[i] === "--max-failure-rate" && args[i + 1]) {
      const rate = parseFailureRate(args[++i]);
      if (rate === null) usage();
      maxFailureRate = rate;
    } else if (args[i] === "--json") {
      json = true;
    } else if (!args[i].startsWith("--")) {
      file = args[i];
    } else {
      usage();
    }
  }

  if (!file) usage();

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    console.error(`[ingest-file] Could not read ${file}:`, err instanceof Error ? err.message : err);
    process.exit(1);
  }

  const store = openCatalog(dbPath);
  const result = processSubmission(store, data, { maxFailureRate });
  store.close();

  if (json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (isBatch(result)) {
    console.log(`\n=== ${file} ===`);
    result.results.forEach(printResult);
    const a = result.summary.actions_taken;
    console.log(`\n=== Summary ===`);
    console.log(`Successful: ${result.summary.successful}/${result.total_count}`);
    console.log(`Manual review: ${result.summary.manual_review_needed}`);
    console.log(`Manufacturers: ${a.manufacturers_inserted} inserted, ${a.manufacturers_updated} updated`);
    console.log(`Models: ${a.models_inserted} inserted, ${a.models_updated} updated`);
    console.log(`Guitars: ${a.guitars_inserted} inserted, ${a.guitars_updated} updated`);
    if (result.rolled_back) console.log(`Rolled back: ${result.rollback_reason ?? result.error}`);
  } else {
    printResult(result);
  }

  const ok = isBatch(result) ? !result.rolled_back : result.success;
  process.exit(ok ? 0 : 1);
}

main();
