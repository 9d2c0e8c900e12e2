import { EntityKind, FailureKind } from "./types";

export interface Violation {
  path: string;
  message: string;
}

/**
 * Base class for per-submission failures. The batch coordinator turns each of
 * these into a failed SubmissionResult; `conflicts()` supplies its notes.
 */
export abstract class IngestError extends Error {
  abstract readonly kind: FailureKind;

  conflicts(): string[] {
    return [this.message];
  }
}

/** Payload failed structural validation; nothing was read or written */
export class SchemaViolation extends IngestError {
  readonly kind = "schema_violation" as const;
  readonly violations: Violation[];

  constructor(violations: Violation[]) {
    super(`Schema validation failed: ${violations.map(formatViolation).join("; ")}`);
    this.name = "SchemaViolation";
    this.violations = violations;
  }

  override conflicts(): string[] {
    return this.violations.map(formatViolation);
  }
}

/** A named foreign reference could not be resolved */
export class MissingDependency extends IngestError {
  readonly kind = "missing_dependency" as const;
  readonly entity: EntityKind;
  readonly reference: string;

  constructor(entity: EntityKind, reference: string, message: string) {
    super(message);
    this.name = "MissingDependency";
    this.entity = entity;
    this.reference = reference;
  }
}

/** Plausible but not confident match; the submission is held back */
export class ManualReviewRequired extends IngestError {
  readonly kind = "manual_review" as const;
  readonly entity: EntityKind;
  readonly candidateId: string;
  readonly confidence: number;

  constructor(entity: EntityKind, candidateId: string, confidence: number, message: string) {
    super(message);
    this.name = "ManualReviewRequired";
    this.entity = entity;
    this.candidateId = candidateId;
    this.confidence = confidence;
  }
}

/** Anything else that went wrong while applying one submission */
export class ProcessingError extends IngestError {
  readonly kind = "processing_error" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProcessingError";
  }

  static wrap(error: unknown): ProcessingError {
    if (error instanceof ProcessingError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ProcessingError(`Processing error: ${message}`, { cause: error });
  }
}

export function formatViolation(v: Violation): string {
  return v.path ? `${v.path}: ${v.message}` : v.message;
}
