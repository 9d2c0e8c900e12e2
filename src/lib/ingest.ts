import type { CatalogStore } from "./db";
import { config, isFailureRate } from "./config";
import { IngestError, ManualReviewRequired, ProcessingError } from "./errors";
import { resolveAction } from "./resolution";
import {
  EntityStrategy,
  SubmissionContext,
  createSubmissionContext,
  individualGuitarStrategy,
  manufacturerStrategy,
  modelStrategy,
} from "./strategies";
import {
  ActionCounts,
  BatchResult,
  BatchSummary,
  ResolutionAction,
  SubmissionResult,
} from "./types";
import { Submission, validateSubmission } from "./validation";

export interface IngestOptions {
  /** Share of failed submissions above which a batch is rolled back */
  maxFailureRate?: number;
  /** Recorded in created_by on every inserted row */
  createdBy?: string;
  verbose?: boolean;
}

interface ResolvedOptions {
  maxFailureRate: number;
  createdBy: string;
  verbose: boolean;
}

const ACTION_COUNTERS: Record<string, keyof ActionCounts> = {
  "Manufacturer insert": "manufacturers_inserted",
  "Manufacturer update": "manufacturers_updated",
  "Model insert": "models_inserted",
  "Model update": "models_updated",
  "Guitar insert": "guitars_inserted",
  "Guitar update": "guitars_updated",
};

/** Thrown out of a transaction body to roll it back with a result in hand */
class SubmissionRollback extends Error {
  constructor(readonly result: SubmissionResult) {
    super("submission rolled back");
    this.name = "SubmissionRollback";
  }
}

class BatchRollback extends Error {
  constructor(readonly result: BatchResult) {
    super(result.rollback_reason);
    this.name = "BatchRollback";
  }
}

// ===== Entry points =====

/**
 * Ingest one submission or an ordered array of them. Arrays get the batch
 * result shape; anything else gets the bare per-item result.
 */
export function processSubmission(
  store: CatalogStore,
  data: unknown,
  options: IngestOptions = {}
): SubmissionResult | BatchResult {
  if (Array.isArray(data)) return ingestBatch(store, data, options);
  return ingestSubmission(store, data, options);
}

/** Ingest a single submission. Committed only if it succeeds. */
export function ingestSubmission(
  store: CatalogStore,
  data: unknown,
  options: IngestOptions = {}
): SubmissionResult {
  const opts = resolveOptions(options);

  try {
    return store.transaction(() => {
      const result = applySubmission(store, data, 0, opts);
      if (!result.success) throw new SubmissionRollback(result);
      return result;
    });
  } catch (error) {
    if (error instanceof SubmissionRollback) return error.result;
    console.error("[ingest] Submission failed outside item handling:", error);
    return failureResult(0, ProcessingError.wrap(error));
  }
}

/**
 * Ingest submissions in order inside one transaction. Each item runs in its
 * own savepoint, so a failed item leaves no rows while earlier items stay
 * visible to later ones. The whole batch is rolled back when the failure
 * rate exceeds `maxFailureRate`; otherwise the successful items commit.
 */
export function ingestBatch(
  store: CatalogStore,
  items: readonly unknown[],
  options: IngestOptions = {}
): BatchResult {
  const opts = resolveOptions(options);
  const total = items.length;

  if (total === 0) {
    return { success: true, processed_count: 0, total_count: 0, results: [], summary: summarize([]) };
  }

  try {
    const result = store.transaction((): BatchResult => {
      const results = items.map((item, index) => applySubmission(store, item, index, opts));
      const summary = summarize(results);
      const base = { processed_count: results.length, total_count: total, results, summary };

      if (summary.failed === 0) {
        return { ...base, success: true };
      }

      if (summary.failed / total > opts.maxFailureRate) {
        throw new BatchRollback({
          ...base,
          success: false,
          rolled_back: true,
          rollback_reason: `High failure rate: ${summary.failed}/${total} submissions failed`,
        });
      }

      return { ...base, success: false, partial_success: true };
    });

    console.log(
      `[ingest] Batch committed: ${result.summary.successful}/${total} succeeded, ` +
      `${result.summary.manual_review_needed} need review`
    );
    return result;
  } catch (error) {
    if (error instanceof BatchRollback) {
      console.warn(`[ingest] Batch rolled back: ${error.result.rollback_reason}`);
      return error.result;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error("[ingest] Batch processing error:", error);
    return {
      success: false,
      processed_count: 0,
      total_count: total,
      results: [],
      summary: summarize([]),
      rolled_back: true,
      error: `Batch processing error: ${message}`,
    };
  }
}

export function summarize(results: SubmissionResult[]): BatchSummary {
  const summary: BatchSummary = {
    successful: 0,
    failed: 0,
    manual_review_needed: 0,
    actions_taken: {
      manufacturers_inserted: 0,
      manufacturers_updated: 0,
      models_inserted: 0,
      models_updated: 0,
      guitars_inserted: 0,
      guitars_updated: 0,
    },
  };

  for (const result of results) {
    if (result.manual_review_needed) summary.manual_review_needed++;
    if (!result.success) {
      summary.failed++;
      continue;
    }
    summary.successful++;
    for (const action of result.actions_taken) {
      const counter = ACTION_COUNTERS[action];
      if (counter) summary.actions_taken[counter]++;
    }
  }

  return summary;
}

// ===== Per-submission processing =====

function resolveOptions(options: IngestOptions): ResolvedOptions {
  return {
    maxFailureRate: isFailureRate(options.maxFailureRate) ? options.maxFailureRate : config.maxBatchFailureRate,
    createdBy: options.createdBy ?? config.createdBy,
    verbose: options.verbose ?? config.verbose,
  };
}

/**
 * Validate and apply one submission inside a savepoint. Every failure becomes
 * a failed result for this index; nothing is rethrown.
 */
function applySubmission(
  store: CatalogStore,
  data: unknown,
  index: number,
  opts: ResolvedOptions
): SubmissionResult {
  const ctx = createSubmissionContext(store, opts.createdBy);

  try {
    const submission = validateSubmission(data);
    store.transaction(() => applySections(ctx, submission));

    if (opts.verbose) {
      console.log(`[ingest] #${index}: ${ctx.actions.join(", ")}`);
    }
    return {
      index,
      success: true,
      actions_taken: ctx.actions,
      conflicts: [],
      ids_created: ctx.idsCreated,
      ids_resolved: ctx.idsResolved,
      manual_review_needed: false,
    };
  } catch (error) {
    const failure = error instanceof IngestError ? error : ProcessingError.wrap(error);
    if (opts.verbose) {
      console.warn(`[ingest] #${index} failed (${failure.kind}): ${failure.conflicts().join("; ")}`);
    }
    return failureResult(index, failure);
  }
}

function failureResult(index: number, error: IngestError): SubmissionResult {
  return {
    index,
    success: false,
    actions_taken: [],
    conflicts: error.conflicts(),
    ids_created: {},
    ids_resolved: {},
    manual_review_needed: error instanceof ManualReviewRequired,
    failure_kind: error.kind,
  };
}

function applySections(ctx: SubmissionContext, submission: Submission): void {
  if (submission.manufacturer) applyEntity(ctx, manufacturerStrategy, submission.manufacturer);
  if (submission.model) applyEntity(ctx, modelStrategy, submission.model);
  if (submission.individual_guitar) applyEntity(ctx, individualGuitarStrategy, submission.individual_guitar);
}

/**
 * Resolve, match, decide and write one entity. Manual review throws; the
 * caller's savepoint discards anything the submission wrote before it.
 */
function applyEntity<Payload, Target, Row extends { id: string }>(
  ctx: SubmissionContext,
  strategy: EntityStrategy<Payload, Target, Row>,
  payload: Payload
): void {
  const target = strategy.resolve(ctx, payload);
  const candidates = strategy.findMatches(ctx.store, target);
  const best = candidates.length > 0 ? candidates[0] : null;
  const action = resolveAction(strategy.kind, best);

  if (action === ResolutionAction.MANUAL_REVIEW && best) {
    throw new ManualReviewRequired(strategy.kind, best.id, best.confidence, strategy.describeConflict(best));
  }

  const existing = action === ResolutionAction.UPDATE && best ? best.row : null;
  const written = existing ? strategy.merge(ctx, existing, target) : strategy.insert(ctx, target);

  ctx.actions.push(`${strategy.label} ${existing ? "update" : "insert"}`);
  if (!existing) ctx.idsCreated[strategy.key] = written.row.id;
  ctx.idsResolved[strategy.key] = written.row.id;
  strategy.remember(ctx, target, written);
}
