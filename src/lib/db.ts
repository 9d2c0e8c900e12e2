import Database from "better-sqlite3";
import { randomUUID } from "crypto";
import fs from "fs";
import path from "path";
import { config } from "./config";
import { normalizeName } from "./normalization";
import {
  ConditionRating,
  EntityKind,
  IndividualGuitar,
  Manufacturer,
  ManufacturerStatus,
  Model,
  ProductionType,
  ProductLine,
  SignificanceLevel,
  Specification,
  SpecificationParent,
} from "./types";

type SqlValue = string | number | null;

export type ManufacturerInsert = Omit<Manufacturer, "id" | "createdAt" | "updatedAt">;
export type ModelInsert = Omit<Model, "id" | "createdAt" | "updatedAt">;
export type IndividualGuitarInsert = Omit<IndividualGuitar, "id" | "createdAt" | "updatedAt">;
export type SpecificationInsert = Omit<
  Specification,
  "id" | "modelId" | "individualGuitarId" | "createdAt" | "updatedAt"
>;

export interface FallbackQuery {
  manufacturerName: string;
  modelName?: string | null;
  yearEstimate?: string | null;
}

export const CATALOG_TABLES = [
  "manufacturers",
  "product_lines",
  "models",
  "specifications",
  "individual_guitars",
] as const;

export type CatalogTable = (typeof CATALOG_TABLES)[number];

/** Columns a monotonic merge may write, per table. Business keys are absent. */
export const MERGEABLE_COLUMNS = {
  manufacturers: [
    "display_name", "country", "founded_year", "website", "status", "notes", "logo_source",
  ],
  models: [
    "product_line_id", "production_type", "production_start_date", "production_end_date",
    "estimated_production_quantity", "msrp_original", "currency", "description",
  ],
  individual_guitars: [
    "model_id", "manufacturer_name_fallback", "model_name_fallback", "year_estimate",
    "description", "nickname", "production_date", "production_number", "significance_level",
    "significance_notes", "current_estimated_value", "last_valuation_date", "condition_rating",
    "modifications", "provenance_notes",
  ],
} as const;

export type MergeTable = keyof typeof MERGEABLE_COLUMNS;
export type MergeChanges<T extends MergeTable> = Partial<
  Record<(typeof MERGEABLE_COLUMNS)[T][number], SqlValue | undefined>
>;

// ===== Connection =====

export function openCatalog(dbPath: string = config.dbPath): CatalogStore {
  const inMemory = dbPath === ":memory:";
  let db: Database.Database;

  if (inMemory) {
    db = new Database(dbPath);
  } else {
    const resolved = path.resolve(process.cwd(), dbPath);
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    db = new Database(resolved);
    db.pragma("journal_mode = WAL");
    console.log(`[catalog-db] Opened ${resolved}`);
  }

  db.pragma("foreign_keys = ON");
  // SQLite's NOCASE and LOWER() fold ASCII only
  db.function("name_key", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? normalizeName(value) : null
  );
  initSchema(db);
  migrateNameKeys(db);
  return new CatalogStore(db);
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS manufacturers (
      id           TEXT PRIMARY KEY,
      name         TEXT NOT NULL,
      name_key     TEXT NOT NULL,
      display_name TEXT,
      country      TEXT,
      founded_year INTEGER,
      website      TEXT,
      status       TEXT NOT NULL DEFAULT 'active'
                   CHECK (status IN ('active', 'defunct', 'acquired')),
      notes        TEXT,
      logo_source  TEXT,
      created_by   TEXT,
      created_at   TEXT NOT NULL,
      updated_at   TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS product_lines (
      id                TEXT PRIMARY KEY,
      manufacturer_id   TEXT NOT NULL REFERENCES manufacturers(id),
      name              TEXT NOT NULL,
      name_key          TEXT NOT NULL,
      description       TEXT,
      introduced_year   INTEGER,
      discontinued_year INTEGER,
      created_at        TEXT NOT NULL,
      updated_at        TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS models (
      id                            TEXT PRIMARY KEY,
      manufacturer_id               TEXT NOT NULL REFERENCES manufacturers(id),
      product_line_id               TEXT REFERENCES product_lines(id),
      name                          TEXT NOT NULL,
      name_key                      TEXT NOT NULL,
      year                          INTEGER NOT NULL,
      production_type               TEXT NOT NULL DEFAULT 'mass'
                                    CHECK (production_type IN ('mass', 'limited', 'custom', 'prototype', 'one-off')),
      production_start_date         TEXT,
      production_end_date           TEXT,
      estimated_production_quantity INTEGER,
      msrp_original                 REAL,
      currency                      TEXT NOT NULL DEFAULT 'USD',
      description                   TEXT,
      created_by                    TEXT,
      created_at                    TEXT NOT NULL,
      updated_at                    TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS individual_guitars (
      id                         TEXT PRIMARY KEY,
      model_id                   TEXT REFERENCES models(id),
      manufacturer_name_fallback TEXT,
      model_name_fallback        TEXT,
      year_estimate              TEXT,
      description                TEXT,
      nickname                   TEXT,
      serial_number              TEXT,
      serial_key                 TEXT UNIQUE,
      production_date            TEXT,
      production_number          INTEGER,
      significance_level         TEXT NOT NULL DEFAULT 'notable'
                                 CHECK (significance_level IN ('historic', 'notable', 'rare', 'custom')),
      significance_notes         TEXT,
      current_estimated_value    REAL,
      last_valuation_date        TEXT,
      condition_rating           TEXT
                                 CHECK (condition_rating IN ('mint', 'excellent', 'very_good', 'good', 'fair', 'poor', 'relic')),
      modifications              TEXT,
      provenance_notes           TEXT,
      created_by                 TEXT,
      created_at                 TEXT NOT NULL,
      updated_at                 TEXT NOT NULL,
      CHECK (
        model_id IS NOT NULL OR
        (manufacturer_name_fallback IS NOT NULL AND
         (model_name_fallback IS NOT NULL OR description IS NOT NULL))
      )
    );
    CREATE INDEX IF NOT EXISTS idx_individual_guitars_model ON individual_guitars(model_id);

    CREATE TABLE IF NOT EXISTS specifications (
      id                      TEXT PRIMARY KEY,
      model_id                TEXT REFERENCES models(id),
      individual_guitar_id    TEXT REFERENCES individual_guitars(id),
      body_wood               TEXT,
      neck_wood               TEXT,
      fingerboard_wood        TEXT,
      scale_length_inches     REAL,
      num_frets               INTEGER,
      nut_width_inches        REAL,
      neck_profile            TEXT,
      bridge_type             TEXT,
      pickup_configuration    TEXT,
      electronics_description TEXT,
      hardware_finish         TEXT,
      body_finish             TEXT,
      weight_lbs              REAL,
      case_included           INTEGER,
      case_type               TEXT,
      created_at              TEXT NOT NULL,
      updated_at              TEXT NOT NULL,
      CHECK ((model_id IS NOT NULL AND individual_guitar_id IS NULL) OR
             (model_id IS NULL AND individual_guitar_id IS NOT NULL))
    );
    CREATE INDEX IF NOT EXISTS idx_specifications_model ON specifications(model_id);
    CREATE INDEX IF NOT EXISTS idx_specifications_individual ON specifications(individual_guitar_id);
  `);
}

const NAME_KEYED_TABLES = ["manufacturers", "product_lines", "models"] as const;

/**
 * Business-key uniqueness lives on name_key, the normalized name. Catalogs
 * created before the column existed get it added and backfilled here.
 */
function migrateNameKeys(db: Database.Database): void {
  for (const table of NAME_KEYED_TABLES) {
    const columns = db.pragma(`table_info(${table})`) as { name: string }[];
    if (columns.some((c) => c.name === "name_key")) continue;

    db.exec(`ALTER TABLE ${table} ADD COLUMN name_key TEXT`);
    db.exec(`UPDATE ${table} SET name_key = name_key(name)`);
    console.log(`[catalog-db] Backfilled name_key on ${table}`);
  }

  db.exec(`
    DROP INDEX IF EXISTS idx_manufacturers_name;
    DROP INDEX IF EXISTS idx_product_lines_name;
    DROP INDEX IF EXISTS idx_models_identity;
    DROP INDEX IF EXISTS idx_individual_guitars_fallback;

    CREATE UNIQUE INDEX IF NOT EXISTS idx_manufacturers_name_key
      ON manufacturers(name_key);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_product_lines_name_key
      ON product_lines(manufacturer_id, name_key);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_models_name_key
      ON models(manufacturer_id, name_key, year);
  `);
}

function now(): string {
  return new Date().toISOString();
}

function fromBool(value: boolean | null): number | null {
  if (value === null) return null;
  return value ? 1 : 0;
}

// ===== Catalog store =====

/**
 * Explicit handle on one catalog database. Every engine operation takes the
 * store as an argument, so the transaction boundary is wherever the caller
 * opens it.
 */
export class CatalogStore {
  constructor(readonly db: Database.Database) {}

  /**
   * Run `fn` in a transaction. Nested calls become savepoints: a throw rolls
   * back only the innermost scope and rethrows.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  countRows(table: CatalogTable): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS c FROM ${table}`).get() as { c: number };
    return row.c;
  }

  /**
   * Monotonic update: only columns with a non-null value are written.
   * Returns the columns that were set.
   */
  mergeColumns<T extends MergeTable>(table: T, id: string, changes: MergeChanges<T>): string[] {
    const allowed: readonly string[] = MERGEABLE_COLUMNS[table];
    const columns: string[] = [];
    const values: SqlValue[] = [];

    for (const [column, value] of Object.entries<SqlValue | undefined>(changes)) {
      if (value === null || value === undefined) continue;
      if (!allowed.includes(column)) {
        throw new Error(`Column ${column} is not mergeable on ${table}`);
      }
      columns.push(column);
      values.push(value);
    }

    if (columns.length === 0) return [];

    const assignments = columns.map((c) => `${c} = ?`).join(", ");
    this.db
      .prepare(`UPDATE ${table} SET ${assignments}, updated_at = ? WHERE id = ?`)
      .run(...values, now(), id);
    return columns;
  }

  // ===== Manufacturers =====

  /** Every manufacturer eligible for matching (not defunct) */
  listMatchableManufacturers(): Manufacturer[] {
    const rows = this.db
      .prepare("SELECT * FROM manufacturers WHERE status IS NULL OR status != 'defunct' ORDER BY created_at")
      .all() as Record<string, unknown>[];
    return rows.map(mapRowToManufacturer);
  }

  findManufacturerByName(name: string): Manufacturer | null {
    const row = this.db
      .prepare("SELECT * FROM manufacturers WHERE name_key = ?")
      .get(normalizeName(name)) as Record<string, unknown> | undefined;
    return row ? mapRowToManufacturer(row) : null;
  }

  getManufacturer(id: string): Manufacturer | null {
    const row = this.db
      .prepare("SELECT * FROM manufacturers WHERE id = ?")
      .get(id) as Record<string, unknown> | undefined;
    return row ? mapRowToManufacturer(row) : null;
  }

  insertManufacturer(m: ManufacturerInsert): string {
    const id = randomUUID();
    const ts = now();
    this.db.prepare(`
      INSERT INTO manufacturers (
        id, name, name_key, display_name, country, founded_year, website, status,
        notes, logo_source, created_by, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, m.name, normalizeName(m.name), m.displayName, m.country, m.foundedYear, m.website, m.status,
      m.notes, m.logoSource, m.createdBy, ts, ts
    );
    return id;
  }

  // ===== Product lines =====

  findProductLine(manufacturerId: string, name: string): ProductLine | null {
    const row = this.db
      .prepare("SELECT * FROM product_lines WHERE manufacturer_id = ? AND name_key = ?")
      .get(manufacturerId, normalizeName(name)) as Record<string, unknown> | undefined;
    return row ? mapRowToProductLine(row) : null;
  }

  getProductLine(id: string): ProductLine | null {
    const row = this.db
      .prepare("SELECT * FROM product_lines WHERE id = ?")
      .get(id) as Record<string, unknown> | undefined;
    return row ? mapRowToProductLine(row) : null;
  }

  insertProductLine(manufacturerId: string, name: string): string {
    const id = randomUUID();
    const ts = now();
    this.db
      .prepare(`
        INSERT INTO product_lines (id, manufacturer_id, name, name_key, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(id, manufacturerId, name.trim(), normalizeName(name), ts, ts);
    return id;
  }

  // ===== Models =====

  listModelsForManufacturer(manufacturerId: string): Model[] {
    const rows = this.db
      .prepare("SELECT * FROM models WHERE manufacturer_id = ? ORDER BY created_at")
      .all(manufacturerId) as Record<string, unknown>[];
    return rows.map(mapRowToModel);
  }

  /** Exact lookup by normalized manufacturer name, model name and year */
  findModel(manufacturerName: string, modelName: string, year: number): Model | null {
    const row = this.db.prepare(`
      SELECT m.* FROM models m
      JOIN manufacturers mfr ON m.manufacturer_id = mfr.id
      WHERE mfr.name_key = ?
        AND m.name_key = ?
        AND m.year = ?
    `).get(normalizeName(manufacturerName), normalizeName(modelName), year) as Record<string, unknown> | undefined;
    return row ? mapRowToModel(row) : null;
  }

  getModel(id: string): Model | null {
    const row = this.db
      .prepare("SELECT * FROM models WHERE id = ?")
      .get(id) as Record<string, unknown> | undefined;
    return row ? mapRowToModel(row) : null;
  }

  insertModel(m: ModelInsert): string {
    const id = randomUUID();
    const ts = now();
    this.db.prepare(`
      INSERT INTO models (
        id, manufacturer_id, product_line_id, name, name_key, year, production_type,
        production_start_date, production_end_date, estimated_production_quantity,
        msrp_original, currency, description, created_by, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, m.manufacturerId, m.productLineId, m.name, normalizeName(m.name), m.year, m.productionType,
      m.productionStartDate, m.productionEndDate, m.estimatedProductionQuantity,
      m.msrpOriginal, m.currency, m.description, m.createdBy, ts, ts
    );
    return id;
  }

  // ===== Individual guitars =====

  findGuitarBySerialKey(key: string): IndividualGuitar | null {
    const row = this.db
      .prepare("SELECT * FROM individual_guitars WHERE serial_key = ?")
      .get(key) as Record<string, unknown> | undefined;
    return row ? mapRowToIndividualGuitar(row) : null;
  }

  listGuitarsForModel(modelId: string): IndividualGuitar[] {
    const rows = this.db
      .prepare("SELECT * FROM individual_guitars WHERE model_id = ? ORDER BY created_at")
      .all(modelId) as Record<string, unknown>[];
    return rows.map(mapRowToIndividualGuitar);
  }

  /**
   * Guitars recorded by fallback text: manufacturer name required, model name
   * and year estimate narrow the set when given.
   */
  listGuitarsByFallback(query: FallbackQuery): IndividualGuitar[] {
    let sql = `
      SELECT * FROM individual_guitars
      WHERE manufacturer_name_fallback IS NOT NULL
        AND name_key(manufacturer_name_fallback) = ?
    `;
    const params: SqlValue[] = [normalizeName(query.manufacturerName)];

    if (query.modelName) {
      sql += " AND name_key(model_name_fallback) = ?";
      params.push(normalizeName(query.modelName));
    }
    if (query.yearEstimate) {
      sql += " AND year_estimate = ?";
      params.push(query.yearEstimate);
    }

    const rows = this.db.prepare(`${sql} ORDER BY created_at`).all(...params) as Record<string, unknown>[];
    return rows.map(mapRowToIndividualGuitar);
  }

  getIndividualGuitar(id: string): IndividualGuitar | null {
    const row = this.db
      .prepare("SELECT * FROM individual_guitars WHERE id = ?")
      .get(id) as Record<string, unknown> | undefined;
    return row ? mapRowToIndividualGuitar(row) : null;
  }

  insertIndividualGuitar(g: IndividualGuitarInsert): string {
    const id = randomUUID();
    const ts = now();
    this.db.prepare(`
      INSERT INTO individual_guitars (
        id, model_id, manufacturer_name_fallback, model_name_fallback, year_estimate,
        description, nickname, serial_number, serial_key, production_date,
        production_number, significance_level, significance_notes,
        current_estimated_value, last_valuation_date, condition_rating,
        modifications, provenance_notes, created_by, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, g.modelId, g.manufacturerNameFallback, g.modelNameFallback, g.yearEstimate,
      g.description, g.nickname, g.serialNumber, g.serialKey, g.productionDate,
      g.productionNumber, g.significanceLevel, g.significanceNotes,
      g.currentEstimatedValue, g.lastValuationDate, g.conditionRating,
      g.modifications, g.provenanceNotes, g.createdBy, ts, ts
    );
    return id;
  }

  // ===== Specifications =====

  insertSpecification(parent: SpecificationParent, s: SpecificationInsert): string {
    const id = randomUUID();
    const ts = now();
    const modelId = parent.kind === EntityKind.MODEL ? parent.id : null;
    const guitarId = parent.kind === EntityKind.INDIVIDUAL_GUITAR ? parent.id : null;
    this.db.prepare(`
      INSERT INTO specifications (
        id, model_id, individual_guitar_id, body_wood, neck_wood, fingerboard_wood,
        scale_length_inches, num_frets, nut_width_inches, neck_profile, bridge_type,
        pickup_configuration, electronics_description, hardware_finish, body_finish,
        weight_lbs, case_included, case_type, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, modelId, guitarId, s.bodyWood, s.neckWood, s.fingerboardWood,
      s.scaleLengthInches, s.numFrets, s.nutWidthInches, s.neckProfile, s.bridgeType,
      s.pickupConfiguration, s.electronicsDescription, s.hardwareFinish, s.bodyFinish,
      s.weightLbs, fromBool(s.caseIncluded), s.caseType, ts, ts
    );
    return id;
  }

  getSpecifications(parent: SpecificationParent): Specification[] {
    const column = parent.kind === EntityKind.MODEL ? "model_id" : "individual_guitar_id";
    const rows = this.db
      .prepare(`SELECT * FROM specifications WHERE ${column} = ? ORDER BY created_at, rowid`)
      .all(parent.id) as Record<string, unknown>[];
    return rows.map(mapRowToSpecification);
  }

  countSpecifications(parent: SpecificationParent): number {
    const column = parent.kind === EntityKind.MODEL ? "model_id" : "individual_guitar_id";
    const row = this.db
      .prepare(`SELECT COUNT(*) AS c FROM specifications WHERE ${column} = ?`)
      .get(parent.id) as { c: number };
    return row.c;
  }
}

// ===== Row mapping =====

function mapRowToManufacturer(row: Record<string, unknown>): Manufacturer {
  return {
    id: row.id as string,
    name: row.name as string,
    displayName: (row.display_name as string) ?? null,
    country: (row.country as string) ?? null,
    foundedYear: (row.founded_year as number) ?? null,
    website: (row.website as string) ?? null,
    status: ((row.status as string) ?? ManufacturerStatus.ACTIVE) as ManufacturerStatus,
    notes: (row.notes as string) ?? null,
    logoSource: (row.logo_source as string) ?? null,
    createdBy: (row.created_by as string) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}

function mapRowToProductLine(row: Record<string, unknown>): ProductLine {
  return {
    id: row.id as string,
    manufacturerId: row.manufacturer_id as string,
    name: row.name as string,
    description: (row.description as string) ?? null,
    introducedYear: (row.introduced_year as number) ?? null,
    discontinuedYear: (row.discontinued_year as number) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}

function mapRowToModel(row: Record<string, unknown>): Model {
  return {
    id: row.id as string,
    manufacturerId: row.manufacturer_id as string,
    productLineId: (row.product_line_id as string) ?? null,
    name: row.name as string,
    year: row.year as number,
    productionType: row.production_type as ProductionType,
    productionStartDate: (row.production_start_date as string) ?? null,
    productionEndDate: (row.production_end_date as string) ?? null,
    estimatedProductionQuantity: (row.estimated_production_quantity as number) ?? null,
    msrpOriginal: (row.msrp_original as number) ?? null,
    currency: row.currency as string,
    description: (row.description as string) ?? null,
    createdBy: (row.created_by as string) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}

function mapRowToIndividualGuitar(row: Record<string, unknown>): IndividualGuitar {
  return {
    id: row.id as string,
    modelId: (row.model_id as string) ?? null,
    manufacturerNameFallback: (row.manufacturer_name_fallback as string) ?? null,
    modelNameFallback: (row.model_name_fallback as string) ?? null,
    yearEstimate: (row.year_estimate as string) ?? null,
    description: (row.description as string) ?? null,
    nickname: (row.nickname as string) ?? null,
    serialNumber: (row.serial_number as string) ?? null,
    serialKey: (row.serial_key as string) ?? null,
    productionDate: (row.production_date as string) ?? null,
    productionNumber: (row.production_number as number) ?? null,
    significanceLevel: row.significance_level as SignificanceLevel,
    significanceNotes: (row.significance_notes as string) ?? null,
    currentEstimatedValue: (row.current_estimated_value as number) ?? null,
    lastValuationDate: (row.last_valuation_date as string) ?? null,
    conditionRating: (row.condition_rating as ConditionRating) ?? null,
    modifications: (row.modifications as string) ?? null,
    provenanceNotes: (row.provenance_notes as string) ?? null,
    createdBy: (row.created_by as string) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}

function mapRowToSpecification(row: Record<string, unknown>): Specification {
  const caseIncluded = row.case_included as number | null;
  return {
    id: row.id as string,
    modelId: (row.model_id as string) ?? null,
    individualGuitarId: (row.individual_guitar_id as string) ?? null,
    bodyWood: (row.body_wood as string) ?? null,
    neckWood: (row.neck_wood as string) ?? null,
    fingerboardWood: (row.fingerboard_wood as string) ?? null,
    scaleLengthInches: (row.scale_length_inches as number) ?? null,
    numFrets: (row.num_frets as number) ?? null,
    nutWidthInches: (row.nut_width_inches as number) ?? null,
    neckProfile: (row.neck_profile as string) ?? null,
    bridgeType: (row.bridge_type as string) ?? null,
    pickupConfiguration: (row.pickup_configuration as string) ?? null,
    electronicsDescription: (row.electronics_description as string) ?? null,
    hardwareFinish: (row.hardware_finish as string) ?? null,
    bodyFinish: (row.body_finish as string) ?? null,
    weightLbs: (row.weight_lbs as number) ?? null,
    caseIncluded: caseIncluded === null ? null : caseIncluded === 1,
    caseType: (row.case_type as string) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}
