export { openCatalog, CatalogStore, CATALOG_TABLES } from "./lib/db";
export type { CatalogTable } from "./lib/db";
export { config } from "./lib/config";
export { processSubmission, ingestSubmission, ingestBatch, summarize } from "./lib/ingest";
export type { IngestOptions } from "./lib/ingest";
export { validateSubmission, SubmissionSchema } from "./lib/validation";
export type {
  Submission,
  ManufacturerPayload,
  ModelPayload,
  ModelReference,
  IndividualGuitarPayload,
  SpecificationPayload,
} from "./lib/validation";
export {
  IngestError,
  SchemaViolation,
  MissingDependency,
  ManualReviewRequired,
  ProcessingError,
} from "./lib/errors";
export type { Violation } from "./lib/errors";
export { resolveAction } from "./lib/resolution";
export { nameSimilarity, normalizeName, serialKey } from "./lib/normalization";
export * from "./lib/thresholds";
export * from "./lib/types";
