import type { CatalogStore, SpecificationInsert } from "./db";
import { config } from "./config";
import { serialKey } from "./normalization";
import {
  EntityKind,
  IndividualGuitar,
  Manufacturer,
  ManufacturerStatus,
  Model,
  ProductionType,
  SignificanceLevel,
  SpecificationParent,
} from "./types";
import type {
  IndividualGuitarPayload,
  ManufacturerPayload,
  ModelPayload,
  SpecificationPayload,
} from "./validation";

const DEFAULT_CURRENCY = "USD";

export interface WrittenEntity<Row> {
  row: Row;
  /** Ids of specification rows written alongside the entity */
  specificationIds: string[];
}

/** An individual guitar payload together with its resolved model, if any */
export interface GuitarWrite {
  payload: IndividualGuitarPayload;
  modelId: string | null;
}

/**
 * Applies insert/merge decisions to the catalog. Merges are monotonic: an
 * absent or null incoming field never clears a stored value, and business
 * keys (names, model year, serial number) are never rewritten.
 */
export class EntityWriter {
  constructor(
    private readonly store: CatalogStore,
    private readonly createdBy: string = config.createdBy
  ) {}

  // ===== Manufacturers =====

  insertManufacturer(p: ManufacturerPayload): Manufacturer {
    const id = this.store.insertManufacturer({
      name: p.name,
      displayName: p.display_name ?? null,
      country: p.country ?? null,
      foundedYear: p.founded_year ?? null,
      website: p.website ?? null,
      status: p.status ?? ManufacturerStatus.ACTIVE,
      notes: p.notes ?? null,
      logoSource: p.logo_source ?? null,
      createdBy: this.createdBy,
    });
    return reload(this.store.getManufacturer(id), "manufacturer", id);
  }

  mergeManufacturer(existing: Manufacturer, p: ManufacturerPayload): Manufacturer {
    this.store.mergeColumns("manufacturers", existing.id, {
      display_name: p.display_name,
      country: p.country,
      founded_year: p.founded_year,
      website: p.website,
      status: p.status,
      notes: p.notes,
      logo_source: p.logo_source,
    });
    return reload(this.store.getManufacturer(existing.id), "manufacturer", existing.id);
  }

  // ===== Product lines =====

  /** Id of the named product line under a manufacturer, created on first use */
  ensureProductLine(manufacturerId: string, name: string): string {
    const existing = this.store.findProductLine(manufacturerId, name);
    if (existing) return existing.id;

    const id = this.store.insertProductLine(manufacturerId, name);
    if (config.verbose) {
      console.log(`[writer] Created product line "${name.trim()}" (${id})`);
    }
    return id;
  }

  // ===== Models =====

  insertModel(manufacturerId: string, p: ModelPayload): WrittenEntity<Model> {
    const productLineId = p.product_line_name
      ? this.ensureProductLine(manufacturerId, p.product_line_name)
      : null;

    const id = this.store.insertModel({
      manufacturerId,
      productLineId,
      name: p.name,
      year: p.year,
      productionType: p.production_type ?? ProductionType.MASS,
      productionStartDate: p.production_start_date ?? null,
      productionEndDate: p.production_end_date ?? null,
      estimatedProductionQuantity: p.estimated_production_quantity ?? null,
      msrpOriginal: p.msrp_original ?? null,
      currency: p.currency || DEFAULT_CURRENCY,
      description: p.description ?? null,
      createdBy: this.createdBy,
    });

    const specificationIds = this.writeSpecifications(
      { kind: EntityKind.MODEL, id },
      p.specifications,
      false
    );
    return { row: reload(this.store.getModel(id), "model", id), specificationIds };
  }

  mergeModel(existing: Model, p: ModelPayload): WrittenEntity<Model> {
    const productLineId = p.product_line_name
      ? this.ensureProductLine(existing.manufacturerId, p.product_line_name)
      : null;

    this.store.mergeColumns("models", existing.id, {
      product_line_id: productLineId,
      production_type: p.production_type,
      production_start_date: p.production_start_date,
      production_end_date: p.production_end_date,
      estimated_production_quantity: p.estimated_production_quantity,
      msrp_original: p.msrp_original,
      currency: p.currency,
      description: p.description,
    });

    const specificationIds = this.writeSpecifications(
      { kind: EntityKind.MODEL, id: existing.id },
      p.specifications,
      true
    );
    return { row: reload(this.store.getModel(existing.id), "model", existing.id), specificationIds };
  }

  // ===== Individual guitars =====

  insertGuitar({ payload: p, modelId }: GuitarWrite): WrittenEntity<IndividualGuitar> {
    const id = this.store.insertIndividualGuitar({
      modelId,
      manufacturerNameFallback: p.manufacturer_name_fallback ?? null,
      modelNameFallback: p.model_name_fallback ?? null,
      yearEstimate: p.year_estimate ?? null,
      description: p.description ?? null,
      nickname: p.nickname ?? null,
      serialNumber: p.serial_number ?? null,
      serialKey: serialKey(p.serial_number),
      productionDate: p.production_date ?? null,
      productionNumber: p.production_number ?? null,
      significanceLevel: p.significance_level ?? SignificanceLevel.NOTABLE,
      significanceNotes: p.significance_notes ?? null,
      currentEstimatedValue: p.current_estimated_value ?? null,
      lastValuationDate: p.last_valuation_date ?? null,
      conditionRating: p.condition_rating ?? null,
      modifications: p.modifications ?? null,
      provenanceNotes: p.provenance_notes ?? null,
      createdBy: this.createdBy,
    });

    const specificationIds = this.writeSpecifications(
      { kind: EntityKind.INDIVIDUAL_GUITAR, id },
      p.specifications,
      false
    );
    return { row: reload(this.store.getIndividualGuitar(id), "individual guitar", id), specificationIds };
  }

  mergeGuitar(existing: IndividualGuitar, { payload: p, modelId }: GuitarWrite): WrittenEntity<IndividualGuitar> {
    this.store.mergeColumns("individual_guitars", existing.id, {
      model_id: modelId,
      manufacturer_name_fallback: p.manufacturer_name_fallback,
      model_name_fallback: p.model_name_fallback,
      year_estimate: p.year_estimate,
      description: p.description,
      nickname: p.nickname,
      production_date: p.production_date,
      production_number: p.production_number,
      significance_level: p.significance_level,
      significance_notes: p.significance_notes,
      current_estimated_value: p.current_estimated_value,
      last_valuation_date: p.last_valuation_date,
      condition_rating: p.condition_rating,
      modifications: p.modifications,
      provenance_notes: p.provenance_notes,
    });

    const specificationIds = this.writeSpecifications(
      { kind: EntityKind.INDIVIDUAL_GUITAR, id: existing.id },
      p.specifications,
      true
    );
    return {
      row: reload(this.store.getIndividualGuitar(existing.id), "individual guitar", existing.id),
      specificationIds,
    };
  }

  // ===== Specifications =====

  /**
   * Write specification rows under one parent. With `onlyIfEmpty` (merges),
   * nothing is written when the parent already has specifications.
   */
  writeSpecifications(
    parent: SpecificationParent,
    specs: SpecificationPayload[] | null | undefined,
    onlyIfEmpty: boolean
  ): string[] {
    if (!specs || specs.length === 0) return [];
    if (onlyIfEmpty && this.store.countSpecifications(parent) > 0) return [];
    return specs.map((spec) => this.store.insertSpecification(parent, toSpecificationInsert(spec)));
  }
}

function toSpecificationInsert(s: SpecificationPayload): SpecificationInsert {
  return {
    bodyWood: s.body_wood ?? null,
    neckWood: s.neck_wood ?? null,
    fingerboardWood: s.fingerboard_wood ?? null,
    scaleLengthInches: s.scale_length_inches ?? null,
    numFrets: s.num_frets ?? null,
    nutWidthInches: s.nut_width_inches ?? null,
    neckProfile: s.neck_profile ?? null,
    bridgeType: s.bridge_type ?? null,
    pickupConfiguration: s.pickup_configuration ?? null,
    electronicsDescription: s.electronics_description ?? null,
    hardwareFinish: s.hardware_finish ?? null,
    bodyFinish: s.body_finish ?? null,
    weightLbs: s.weight_lbs ?? null,
    caseIncluded: s.case_included ?? null,
    caseType: s.case_type ?? null,
  };
}

function reload<Row>(row: Row | null, entity: string, id: string): Row {
  if (!row) throw new Error(`${entity} ${id} not found after write`);
  return row;
}
