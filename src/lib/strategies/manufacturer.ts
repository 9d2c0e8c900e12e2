import type { CatalogStore } from "../db";
import { EntityKind, Manufacturer, ManufacturerStatus, MatchCandidate } from "../types";
import type { ManufacturerPayload } from "../validation";
import type { WrittenEntity } from "../writer";
import { nameSimilarity, normalizeName } from "../normalization";
import {
  EXACT_NAME_CONFIDENCE,
  MANUFACTURER_CANDIDATE_MIN,
  MANUFACTURER_COUNTRY_BONUS,
  MANUFACTURER_FOUNDED_YEAR_BONUS,
} from "../thresholds";
import type { SubmissionContext } from "./context";
import { EntityStrategy, byConfidence } from "./types";

export class ManufacturerStrategy
  implements EntityStrategy<ManufacturerPayload, ManufacturerPayload, Manufacturer>
{
  readonly kind = EntityKind.MANUFACTURER;
  readonly label = "Manufacturer";
  readonly key = "manufacturer" as const;

  resolve(_ctx: SubmissionContext, payload: ManufacturerPayload): ManufacturerPayload {
    return payload;
  }

  findMatches(store: CatalogStore, target: ManufacturerPayload): MatchCandidate<Manufacturer>[] {
    // Defunct manufacturers are not fuzzy candidates, but their name stays taken
    const exact = store.findManufacturerByName(target.name);
    if (exact && exact.status === ManufacturerStatus.DEFUNCT) {
      return [{ id: exact.id, confidence: EXACT_NAME_CONFIDENCE, exactKey: true, row: exact }];
    }

    const candidates: MatchCandidate<Manufacturer>[] = [];
    for (const existing of store.listMatchableManufacturers()) {
      const confidence = scoreManufacturer(target, existing);
      if (confidence < MANUFACTURER_CANDIDATE_MIN) continue;
      candidates.push({ id: existing.id, confidence, exactKey: false, row: existing });
    }

    return candidates.sort(byConfidence);
  }

  describeConflict(candidate: MatchCandidate<Manufacturer>): string {
    return `Manufacturer conflict: Similar manufacturer found: ${candidate.row.name}`;
  }

  insert(ctx: SubmissionContext, target: ManufacturerPayload): WrittenEntity<Manufacturer> {
    return { row: ctx.writer.insertManufacturer(target), specificationIds: [] };
  }

  merge(ctx: SubmissionContext, existing: Manufacturer, target: ManufacturerPayload): WrittenEntity<Manufacturer> {
    return { row: ctx.writer.mergeManufacturer(existing, target), specificationIds: [] };
  }

  remember(ctx: SubmissionContext, target: ManufacturerPayload, { row }: WrittenEntity<Manufacturer>): void {
    ctx.manufacturer = row;
    ctx.manufacturerNames = [row.name, target.name];
  }
}

export function scoreManufacturer(target: ManufacturerPayload, existing: Manufacturer): number {
  let score = nameSimilarity(target.name, existing.name);

  // Bonuses only when the incoming side carries the attribute
  if (target.country && normalizeName(target.country) === normalizeName(existing.country)) {
    score += MANUFACTURER_COUNTRY_BONUS;
  }
  if (target.founded_year != null && target.founded_year === existing.foundedYear) {
    score += MANUFACTURER_FOUNDED_YEAR_BONUS;
  }

  return score;
}
