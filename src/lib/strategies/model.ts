import type { CatalogStore } from "../db";
import { MissingDependency } from "../errors";
import { EntityKind, Manufacturer, MatchCandidate, Model } from "../types";
import type { ModelPayload } from "../validation";
import type { WrittenEntity } from "../writer";
import { nameSimilarity, namesEqual } from "../normalization";
import { MODEL_CANDIDATE_MIN, MODEL_YEAR_BONUS } from "../thresholds";
import type { SubmissionContext } from "./context";
import { EntityStrategy, byConfidence } from "./types";

/** What model candidates are retrieved and scored by */
export interface ModelQuery {
  manufacturerId: string;
  name: string;
  year: number;
}

/** A model submission once its manufacturer has been resolved */
export interface ModelTarget extends ModelQuery {
  manufacturer: Manufacturer;
  payload: ModelPayload;
}

export class ModelStrategy implements EntityStrategy<ModelPayload, ModelTarget, Model> {
  readonly kind = EntityKind.MODEL;
  readonly label = "Model";
  readonly key = "model" as const;

  /** The submission's own manufacturer when the names agree, else a catalog lookup */
  resolve(ctx: SubmissionContext, payload: ModelPayload): ModelTarget {
    const name = payload.manufacturer_name;
    let manufacturer: Manufacturer | null = null;

    if (ctx.manufacturer && ctx.manufacturerNames.some((n) => namesEqual(n, name))) {
      manufacturer = ctx.manufacturer;
    } else {
      manufacturer = ctx.store.findManufacturerByName(name);
    }
    if (!manufacturer) {
      throw new MissingDependency(EntityKind.MANUFACTURER, name, `Manufacturer '${name}' not found`);
    }

    return {
      manufacturer,
      payload,
      manufacturerId: manufacturer.id,
      name: payload.name,
      year: payload.year,
    };
  }

  findMatches(store: CatalogStore, query: ModelQuery): MatchCandidate<Model>[] {
    const candidates: MatchCandidate<Model>[] = [];

    for (const existing of store.listModelsForManufacturer(query.manufacturerId)) {
      // Same name in a different model year is a different model
      if (existing.year !== query.year) continue;

      const confidence = nameSimilarity(query.name, existing.name) + MODEL_YEAR_BONUS;
      if (confidence < MODEL_CANDIDATE_MIN) continue;

      candidates.push({ id: existing.id, confidence, exactKey: false, row: existing });
    }

    return candidates.sort(byConfidence);
  }

  describeConflict(candidate: MatchCandidate<Model>): string {
    return `Model conflict: Similar model found: ${candidate.row.name} (${candidate.row.year})`;
  }

  insert(ctx: SubmissionContext, target: ModelTarget): WrittenEntity<Model> {
    return ctx.writer.insertModel(target.manufacturerId, target.payload);
  }

  merge(ctx: SubmissionContext, existing: Model, target: ModelTarget): WrittenEntity<Model> {
    return ctx.writer.mergeModel(existing, target.payload);
  }

  remember(ctx: SubmissionContext, target: ModelTarget, { row, specificationIds }: WrittenEntity<Model>): void {
    if (specificationIds.length > 0) ctx.idsCreated.model_specifications = specificationIds;
    ctx.model = row;
    ctx.modelNames = [row.name, target.payload.name];
    ctx.modelManufacturerNames = [target.manufacturer.name, target.payload.manufacturer_name];
  }
}
