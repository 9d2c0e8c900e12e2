/**
 * Matching and resolution cutoffs. Scoring formulas in the strategies and the
 * resolution policy read these by name so they can be tuned independently.
 */

// ===== Candidate cutoffs (below these a candidate is discarded) =====

export const MANUFACTURER_CANDIDATE_MIN = 0.7;
export const MODEL_CANDIDATE_MIN = 0.8;
export const GUITAR_CANDIDATE_MIN = 0.5;

// ===== Score bonuses =====

export const MANUFACTURER_COUNTRY_BONUS = 0.1;
export const MANUFACTURER_FOUNDED_YEAR_BONUS = 0.1;
export const MODEL_YEAR_BONUS = 0.3;
export const GUITAR_PRODUCTION_DATE_BONUS = 0.5;
export const GUITAR_FALLBACK_MANUFACTURER_BASE = 0.3;
export const GUITAR_FALLBACK_MODEL_BONUS = 0.4;
export const GUITAR_FALLBACK_YEAR_BONUS = 0.3;

/** Confidence reported for a normalized serial-number hit */
export const SERIAL_MATCH_CONFIDENCE = 1.0;
/** Confidence reported for an exact name hit on a defunct manufacturer */
export const EXACT_NAME_CONFIDENCE = 1.0;

// ===== Resolution policy =====

/** At or above: merge into the existing entity */
export const AUTO_MERGE_MIN = 0.95;
/** At or above (and below AUTO_MERGE_MIN): hold for manual review */
export const MANUAL_REVIEW_MIN = 0.85;

/** Default share of failed submissions above which a whole batch rolls back */
export const DEFAULT_MAX_BATCH_FAILURE_RATE = 0.5;
