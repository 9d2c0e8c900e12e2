import type { CatalogStore } from "../db";
import { MissingDependency } from "../errors";
import { EntityKind, IndividualGuitar, MatchCandidate, Model } from "../types";
import { hasFallbackIdentity } from "../validation";
import type { IndividualGuitarPayload, ModelReference } from "../validation";
import type { WrittenEntity } from "../writer";
import { namesEqual, serialKey } from "../normalization";
import {
  GUITAR_CANDIDATE_MIN,
  GUITAR_FALLBACK_MANUFACTURER_BASE,
  GUITAR_FALLBACK_MODEL_BONUS,
  GUITAR_FALLBACK_YEAR_BONUS,
  GUITAR_PRODUCTION_DATE_BONUS,
  SERIAL_MATCH_CONFIDENCE,
} from "../thresholds";
import type { SubmissionContext } from "./context";
import { EntityStrategy, byConfidence } from "./types";

/**
 * What guitar candidates are retrieved and scored by. `modelId` is null in
 * fallback mode, where the unit is known only by free text.
 */
export interface GuitarQuery {
  modelId: string | null;
  serialKey: string | null;
  manufacturerNameFallback: string | null;
  modelNameFallback: string | null;
  yearEstimate: string | null;
  productionDate: string | null;
}

export interface GuitarTarget extends GuitarQuery {
  payload: IndividualGuitarPayload;
}

export class IndividualGuitarStrategy
  implements EntityStrategy<IndividualGuitarPayload, GuitarTarget, IndividualGuitar>
{
  readonly kind = EntityKind.INDIVIDUAL_GUITAR;
  readonly label = "Guitar";
  readonly key = "individual_guitar" as const;

  resolve(ctx: SubmissionContext, payload: IndividualGuitarPayload): GuitarTarget {
    return {
      payload,
      modelId: resolveModelId(ctx, payload),
      serialKey: serialKey(payload.serial_number),
      manufacturerNameFallback: payload.manufacturer_name_fallback ?? null,
      modelNameFallback: payload.model_name_fallback ?? null,
      yearEstimate: payload.year_estimate ?? null,
      productionDate: payload.production_date ?? null,
    };
  }

  findMatches(store: CatalogStore, query: GuitarQuery): MatchCandidate<IndividualGuitar>[] {
    if (query.serialKey) {
      const existing = store.findGuitarBySerialKey(query.serialKey);
      if (existing) {
        return [{ id: existing.id, confidence: SERIAL_MATCH_CONFIDENCE, exactKey: true, row: existing }];
      }
    }

    const candidates: MatchCandidate<IndividualGuitar>[] = [];
    for (const existing of this.retrieve(store, query)) {
      const confidence = scoreGuitar(query, existing);
      if (confidence < GUITAR_CANDIDATE_MIN) continue;
      candidates.push({ id: existing.id, confidence, exactKey: false, row: existing });
    }

    return candidates.sort(byConfidence);
  }

  describeConflict(candidate: MatchCandidate<IndividualGuitar>): string {
    const label = candidate.row.serialNumber ?? candidate.row.nickname ?? candidate.id;
    return `Guitar conflict: Similar guitar found: ${label}`;
  }

  insert(ctx: SubmissionContext, target: GuitarTarget): WrittenEntity<IndividualGuitar> {
    return ctx.writer.insertGuitar({ payload: target.payload, modelId: target.modelId });
  }

  merge(ctx: SubmissionContext, existing: IndividualGuitar, target: GuitarTarget): WrittenEntity<IndividualGuitar> {
    return ctx.writer.mergeGuitar(existing, { payload: target.payload, modelId: target.modelId });
  }

  remember(ctx: SubmissionContext, _target: GuitarTarget, { specificationIds }: WrittenEntity<IndividualGuitar>): void {
    if (specificationIds.length > 0) ctx.idsCreated.guitar_specifications = specificationIds;
  }

  private retrieve(store: CatalogStore, query: GuitarQuery): IndividualGuitar[] {
    if (query.modelId) return store.listGuitarsForModel(query.modelId);
    if (!query.manufacturerNameFallback) return [];
    return store.listGuitarsByFallback({
      manufacturerName: query.manufacturerNameFallback,
      modelName: query.modelNameFallback,
      yearEstimate: query.yearEstimate,
    });
  }
}

export function scoreGuitar(query: GuitarQuery, existing: IndividualGuitar): number {
  let score = 0;

  if (query.productionDate && query.productionDate === existing.productionDate) {
    score += GUITAR_PRODUCTION_DATE_BONUS;
  }

  if (!query.modelId) {
    score += GUITAR_FALLBACK_MANUFACTURER_BASE;
    if (query.modelNameFallback && namesEqual(query.modelNameFallback, existing.modelNameFallback)) {
      score += GUITAR_FALLBACK_MODEL_BONUS;
    }
    if (query.yearEstimate && query.yearEstimate === existing.yearEstimate) {
      score += GUITAR_FALLBACK_YEAR_BONUS;
    }
  }

  return score;
}

/**
 * Model id for a guitar's model_reference. An unresolved reference falls back
 * to the free-text fields when they identify the unit on their own.
 */
function resolveModelId(ctx: SubmissionContext, payload: IndividualGuitarPayload): string | null {
  const ref = payload.model_reference;
  if (!ref) return null;

  const model = findReferencedModel(ctx, ref);
  if (model) return model.id;
  if (hasFallbackIdentity(payload)) return null;

  throw new MissingDependency(
    EntityKind.MODEL,
    `${ref.manufacturer_name}/${ref.model_name}/${ref.year}`,
    `Model '${ref.model_name}' (${ref.year}) by '${ref.manufacturer_name}' not found`
  );
}

/** The submission's own model under its stored or submitted name, else a catalog lookup */
function findReferencedModel(ctx: SubmissionContext, ref: ModelReference): Model | null {
  const model = ctx.model;
  if (
    model &&
    model.year === ref.year &&
    ctx.modelNames.some((n) => namesEqual(n, ref.model_name)) &&
    ctx.modelManufacturerNames.some((n) => namesEqual(n, ref.manufacturer_name))
  ) {
    return model;
  }
  return ctx.store.findModel(ref.manufacturer_name, ref.model_name, ref.year);
}
