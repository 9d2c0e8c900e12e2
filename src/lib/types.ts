// ===== Enums =====

export enum EntityKind {
  MANUFACTURER = "manufacturer",
  MODEL = "model",
  INDIVIDUAL_GUITAR = "individual_guitar",
}

export enum ManufacturerStatus {
  ACTIVE = "active",
  DEFUNCT = "defunct",
  ACQUIRED = "acquired",
}

export enum ProductionType {
  MASS = "mass",
  LIMITED = "limited",
  CUSTOM = "custom",
  PROTOTYPE = "prototype",
  ONE_OFF = "one-off",
}

export enum SignificanceLevel {
  HISTORIC = "historic",
  NOTABLE = "notable",
  RARE = "rare",
  CUSTOM = "custom",
}

export enum ConditionRating {
  MINT = "mint",
  EXCELLENT = "excellent",
  VERY_GOOD = "very_good",
  GOOD = "good",
  FAIR = "fair",
  POOR = "poor",
  RELIC = "relic",
}

export enum ResolutionAction {
  INSERT = "insert",
  UPDATE = "update",
  MANUAL_REVIEW = "manual_review",
}

// ===== Catalog rows (DB-shaped, camelCase) =====

export interface Manufacturer {
  id: string;
  name: string;
  displayName: string | null;
  country: string | null;
  foundedYear: number | null;
  website: string | null;
  status: ManufacturerStatus;
  notes: string | null;
  logoSource: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ProductLine {
  id: string;
  manufacturerId: string;
  name: string;
  description: string | null;
  introducedYear: number | null;
  discontinuedYear: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface Model {
  id: string;
  manufacturerId: string;
  productLineId: string | null;
  name: string;
  year: number;
  productionType: ProductionType;
  productionStartDate: string | null;
  productionEndDate: string | null;
  estimatedProductionQuantity: number | null;
  msrpOriginal: number | null;
  currency: string;
  description: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface IndividualGuitar {
  id: string;
  modelId: string | null;
  manufacturerNameFallback: string | null;
  modelNameFallback: string | null;
  yearEstimate: string | null;
  description: string | null;
  nickname: string | null;
  serialNumber: string | null;
  serialKey: string | null;
  productionDate: string | null;
  productionNumber: number | null;
  significanceLevel: SignificanceLevel;
  significanceNotes: string | null;
  currentEstimatedValue: number | null;
  lastValuationDate: string | null;
  conditionRating: ConditionRating | null;
  modifications: string | null;
  provenanceNotes: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Specification {
  id: string;
  modelId: string | null;
  individualGuitarId: string | null;
  bodyWood: string | null;
  neckWood: string | null;
  fingerboardWood: string | null;
  scaleLengthInches: number | null;
  numFrets: number | null;
  nutWidthInches: number | null;
  neckProfile: string | null;
  bridgeType: string | null;
  pickupConfiguration: string | null;
  electronicsDescription: string | null;
  hardwareFinish: string | null;
  bodyFinish: string | null;
  weightLbs: number | null;
  caseIncluded: boolean | null;
  caseType: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Owner of a specification row: exactly one of the two parents */
export type SpecificationParent =
  | { kind: EntityKind.MODEL; id: string }
  | { kind: EntityKind.INDIVIDUAL_GUITAR; id: string };

// ===== Matching =====

export interface MatchCandidate<Row = unknown> {
  id: string;
  confidence: number;
  /** True when the candidate shares a normalized unique key (serial number) */
  exactKey: boolean;
  row: Row;
}

// ===== Ingestion results (wire format) =====

export type FailureKind =
  | "schema_violation"
  | "missing_dependency"
  | "manual_review"
  | "processing_error";

export interface IdsCreated {
  manufacturer?: string;
  model?: string;
  individual_guitar?: string;
  model_specifications?: string[];
  guitar_specifications?: string[];
}

export interface IdsResolved {
  manufacturer?: string;
  model?: string;
  individual_guitar?: string;
}

export interface SubmissionResult {
  index: number;
  success: boolean;
  actions_taken: string[];
  conflicts: string[];
  ids_created: IdsCreated;
  ids_resolved: IdsResolved;
  manual_review_needed: boolean;
  failure_kind?: FailureKind;
}

export interface ActionCounts {
  manufacturers_inserted: number;
  manufacturers_updated: number;
  models_inserted: number;
  models_updated: number;
  guitars_inserted: number;
  guitars_updated: number;
}

export interface BatchSummary {
  successful: number;
  failed: number;
  manual_review_needed: number;
  actions_taken: ActionCounts;
}

export interface BatchResult {
  success: boolean;
  processed_count: number;
  total_count: number;
  results: SubmissionResult[];
  summary: BatchSummary;
  rolled_back?: boolean;
  rollback_reason?: string;
  partial_success?: boolean;
  error?: string;
}
