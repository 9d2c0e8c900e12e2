import { z } from "zod";
import {
  ConditionRating,
  ManufacturerStatus,
  ProductionType,
  SignificanceLevel,
} from "./types";
import { SchemaViolation, Violation } from "./errors";

// ===== Field helpers =====

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD format");

const text = (max?: number) => (max === undefined ? z.string() : z.string().max(max)).nullish();

function hasText(value: string | null | undefined): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/** A unit can be recorded by free text alone: manufacturer plus model name or description */
export function hasFallbackIdentity(guitar: {
  manufacturer_name_fallback?: string | null;
  model_name_fallback?: string | null;
  description?: string | null;
}): boolean {
  return (
    hasText(guitar.manufacturer_name_fallback) &&
    (hasText(guitar.model_name_fallback) || hasText(guitar.description))
  );
}

// ===== Section schemas =====

export const SpecificationSchema = z
  .object({
    body_wood: text(50),
    neck_wood: text(50),
    fingerboard_wood: text(50),
    scale_length_inches: z.number().min(20).max(30).nullish(),
    num_frets: z.number().int().min(12).max(36).nullish(),
    nut_width_inches: z.number().min(1.0).max(2.5).nullish(),
    neck_profile: text(50),
    bridge_type: text(50),
    pickup_configuration: text(150),
    electronics_description: text(),
    hardware_finish: text(50),
    body_finish: text(),
    weight_lbs: z.number().min(1).max(20).nullish(),
    case_included: z.boolean().nullish(),
    case_type: text(50),
  })
  .strict();

/** One specification object or a non-empty list; always parsed to a list */
const specificationList = z.preprocess(
  (value) => (value !== null && typeof value === "object" && !Array.isArray(value) ? [value] : value),
  z.array(SpecificationSchema).min(1).nullish()
);

export const ManufacturerSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    display_name: text(50),
    country: text(50),
    founded_year: z.number().int().min(1800).max(2030).nullish(),
    website: z.string().url().nullish(),
    status: z.nativeEnum(ManufacturerStatus).nullish(),
    notes: text(),
    logo_source: text(),
  })
  .strict();

export const ModelSchema = z
  .object({
    manufacturer_name: z.string().trim().min(1).max(100),
    product_line_name: z.string().trim().min(1).max(100).nullish(),
    name: z.string().trim().min(1).max(150),
    year: z.number().int().min(1900).max(2030),
    production_type: z.nativeEnum(ProductionType).nullish(),
    production_start_date: isoDate.nullish(),
    production_end_date: isoDate.nullish(),
    estimated_production_quantity: z.number().int().min(1).nullish(),
    msrp_original: z.number().min(0).nullish(),
    currency: text(3),
    description: text(),
    specifications: specificationList,
  })
  .strict();

export const ModelReferenceSchema = z
  .object({
    manufacturer_name: z.string().trim().min(1),
    model_name: z.string().trim().min(1),
    year: z.number().int(),
  })
  .strict();

export const IndividualGuitarSchema = z
  .object({
    model_reference: ModelReferenceSchema.nullish(),
    manufacturer_name_fallback: text(100),
    model_name_fallback: text(150),
    year_estimate: text(50),
    description: text(),
    nickname: text(50),
    serial_number: text(50),
    production_date: isoDate.nullish(),
    production_number: z.number().int().nullish(),
    significance_level: z.nativeEnum(SignificanceLevel).nullish(),
    significance_notes: text(),
    current_estimated_value: z.number().nullish(),
    last_valuation_date: isoDate.nullish(),
    condition_rating: z.nativeEnum(ConditionRating).nullish(),
    modifications: text(),
    provenance_notes: text(),
    specifications: specificationList,
    // Consumed by the media pipeline, not by ingestion
    photos: z.array(z.unknown()).nullish(),
  })
  .strict()
  .superRefine((guitar, ctx) => {
    if (guitar.model_reference || hasFallbackIdentity(guitar)) return;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "Requires model_reference, or manufacturer_name_fallback with model_name_fallback or description",
    });
  });

export const SubmissionSchema = z
  .object({
    manufacturer: ManufacturerSchema.nullish(),
    model: ModelSchema.nullish(),
    individual_guitar: IndividualGuitarSchema.nullish(),
  })
  .strict()
  .refine((s) => Boolean(s.manufacturer || s.model || s.individual_guitar), {
    message: "Submission must contain at least one of: manufacturer, model, individual_guitar",
  });

export type SpecificationPayload = z.infer<typeof SpecificationSchema>;
export type ManufacturerPayload = z.infer<typeof ManufacturerSchema>;
export type ModelPayload = z.infer<typeof ModelSchema>;
export type ModelReference = z.infer<typeof ModelReferenceSchema>;
export type IndividualGuitarPayload = z.infer<typeof IndividualGuitarSchema>;
export type Submission = z.infer<typeof SubmissionSchema>;

/**
 * Validate a whole submission before anything touches the catalog.
 * Throws SchemaViolation listing every failed constraint.
 */
export function validateSubmission(data: unknown): Submission {
  const parsed = SubmissionSchema.safeParse(data);
  if (parsed.success) return parsed.data;

  const violations: Violation[] = parsed.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  throw new SchemaViolation(violations);
}
