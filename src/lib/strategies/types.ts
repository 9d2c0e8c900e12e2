import type { CatalogStore } from "../db";
import type { EntityKind, IdsResolved, MatchCandidate } from "../types";
import type { WrittenEntity } from "../writer";
import type { SubmissionContext } from "./context";

/**
 * Strategy interface for one entity kind.
 * Each kind resolves its own references, retrieves and scores candidates, and
 * writes through the entity writer; the pipeline drives all kinds the same way.
 */
export interface EntityStrategy<Payload, Target, Row extends { id: string }> {
  readonly kind: EntityKind;
  /** Label used in action strings: "Manufacturer insert", "Guitar update" */
  readonly label: string;
  /** Slot in ids_created / ids_resolved */
  readonly key: keyof IdsResolved;
  /** Resolve named references. Throws MissingDependency when one is unknown. */
  resolve(ctx: SubmissionContext, payload: Payload): Target;
  /** Candidates sorted by descending confidence, already filtered by cutoff */
  findMatches(store: CatalogStore, target: Target): MatchCandidate<Row>[];
  /** Conflict note reported when the best candidate needs manual review */
  describeConflict(candidate: MatchCandidate<Row>): string;
  insert(ctx: SubmissionContext, target: Target): WrittenEntity<Row>;
  merge(ctx: SubmissionContext, existing: Row, target: Target): WrittenEntity<Row>;
  /** Carry the written entity forward for later sections of the submission */
  remember(ctx: SubmissionContext, target: Target, written: WrittenEntity<Row>): void;
}

export function byConfidence<Row>(a: MatchCandidate<Row>, b: MatchCandidate<Row>): number {
  return b.confidence - a.confidence;
}
