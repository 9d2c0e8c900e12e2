import { EntityKind, MatchCandidate, ResolutionAction } from "./types";
import { AUTO_MERGE_MIN, MANUAL_REVIEW_MIN } from "./thresholds";

/**
 * Decide what to do with an incoming entity given its best-scoring candidate.
 *
 * Manufacturers and models merge at AUTO_MERGE_MIN and are held for review
 * from MANUAL_REVIEW_MIN. Individual guitars merge only on a serial-key hit;
 * text similarity alone never identifies a physical instrument.
 */
export function resolveAction(kind: EntityKind, best: MatchCandidate | null): ResolutionAction {
  if (!best) return ResolutionAction.INSERT;

  if (kind === EntityKind.INDIVIDUAL_GUITAR) {
    return best.exactKey ? ResolutionAction.UPDATE : ResolutionAction.INSERT;
  }

  if (best.confidence >= AUTO_MERGE_MIN) return ResolutionAction.UPDATE;
  if (best.confidence >= MANUAL_REVIEW_MIN) return ResolutionAction.MANUAL_REVIEW;
  return ResolutionAction.INSERT;
}
