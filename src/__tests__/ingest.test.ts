import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CatalogStore, openCatalog } from "../lib/db";
import { ingestBatch, ingestSubmission, processSubmission } from "../lib/ingest";
import { EntityKind, ManufacturerStatus } from "../lib/types";
import { EntityWriter } from "../lib/writer";

const gibson = { name: "Gibson", country: "USA", founded_year: 1902 };

const lesPaul = {
  manufacturer_name: "Gibson",
  name: "Les Paul Standard",
  year: 1959,
  product_line_name: "Les Paul",
  specifications: { body_wood: "Mahogany", case_included: true },
};

const lesPaulRef = { manufacturer_name: "gibson", model_name: "les paul standard", year: 1959 };

describe("ingestion", () => {
  let store: CatalogStore;

  beforeEach(() => {
    store = openCatalog(":memory:");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    store.close();
  });

  describe("ingestSubmission", () => {
    it("inserts a new manufacturer", () => {
      const result = ingestSubmission(store, { manufacturer: gibson });

      expect(result).toMatchObject({
        index: 0,
        success: true,
        actions_taken: ["Manufacturer insert"],
        conflicts: [],
        manual_review_needed: false,
      });
      expect(result.failure_kind).toBeUndefined();
      expect(result.ids_created.manufacturer).toBeDefined();
      expect(result.ids_resolved.manufacturer).toBe(result.ids_created.manufacturer);
      expect(store.findManufacturerByName("GIBSON")?.createdBy).toBe("catalog-ingest");
    });

    it("records the created_by override", () => {
      ingestSubmission(store, { manufacturer: gibson }, { createdBy: "dealer-feed" });
      expect(store.findManufacturerByName("Gibson")?.createdBy).toBe("dealer-feed");
    });

    it("links manufacturer, model and guitar from one submission", () => {
      const result = ingestSubmission(store, {
        manufacturer: gibson,
        model: lesPaul,
        individual_guitar: {
          model_reference: lesPaulRef,
          serial_number: "9-0824",
          nickname: "Test Burst",
          specifications: [{ body_finish: "Sunburst" }],
        },
      });

      expect(result.success).toBe(true);
      expect(result.actions_taken).toEqual(["Manufacturer insert", "Model insert", "Guitar insert"]);
      expect(result.ids_created.model_specifications).toHaveLength(1);
      expect(result.ids_created.guitar_specifications).toHaveLength(1);

      const guitarId = result.ids_created.individual_guitar ?? "";
      const guitar = store.getIndividualGuitar(guitarId);
      expect(guitar?.modelId).toBe(result.ids_created.model);
      expect(guitar?.serialKey).toBe("90824");

      const model = store.getModel(result.ids_created.model ?? "");
      expect(model?.manufacturerId).toBe(result.ids_created.manufacturer);
    });

    it("merges a guitar submitted under a serial variant", () => {
      const first = ingestSubmission(store, {
        manufacturer: gibson,
        model: lesPaul,
        individual_guitar: { model_reference: lesPaulRef, serial_number: "9-0824" },
      });
      const second = ingestSubmission(store, {
        individual_guitar: {
          model_reference: lesPaulRef,
          serial_number: "090824",
          condition_rating: "excellent",
        },
      });

      expect(second.actions_taken).toEqual(["Guitar update"]);
      expect(second.ids_created).toEqual({});
      expect(second.ids_resolved.individual_guitar).toBe(first.ids_created.individual_guitar);

      const guitar = store.getIndividualGuitar(first.ids_created.individual_guitar ?? "");
      expect(guitar?.serialNumber).toBe("9-0824");
      expect(guitar?.conditionRating).toBe("excellent");
      expect(store.countRows("individual_guitars")).toBe(1);
    });

    it("keeps model years apart", () => {
      ingestSubmission(store, {
        manufacturer: gibson,
        model: { manufacturer_name: "Gibson", name: "Firebird III", year: 1963 },
      });
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "Gibson", name: "Firebird III", year: 1976 },
      });

      expect(result.actions_taken).toEqual(["Model insert"]);
      expect(store.countRows("models")).toBe(2);
    });

    it("does not duplicate specifications on resubmission", () => {
      ingestSubmission(store, { manufacturer: gibson, model: lesPaul });
      const again = ingestSubmission(store, { model: { ...lesPaul, description: "Flame top" } });

      expect(again.actions_taken).toEqual(["Model update"]);
      expect(again.ids_created.model_specifications).toBeUndefined();
      expect(store.countRows("specifications")).toBe(1);
      expect(store.countRows("product_lines")).toBe(1);
      expect(store.getModel(again.ids_resolved.model ?? "")?.description).toBe("Flame top");
    });

    it("holds a near match for manual review", () => {
      ingestSubmission(store, { manufacturer: { name: "Fender", country: "USA" } });
      // similarity 0.8 plus the country bonus
      const result = ingestSubmission(store, { manufacturer: { name: "Fender Co", country: "usa" } });

      expect(result).toMatchObject({
        success: false,
        manual_review_needed: true,
        failure_kind: "manual_review",
        conflicts: ["Manufacturer conflict: Similar manufacturer found: Fender"],
        actions_taken: [],
        ids_created: {},
      });
      expect(store.countRows("manufacturers")).toBe(1);
    });

    it("merges when the bonuses lift a near match past the cutoff", () => {
      ingestSubmission(store, { manufacturer: { name: "Fender", country: "USA", founded_year: 1946 } });
      const result = ingestSubmission(store, {
        manufacturer: { name: "Fender Co", country: "USA", founded_year: 1946, website: "https://example.com" },
      });

      expect(result.actions_taken).toEqual(["Manufacturer update"]);
      expect(store.findManufacturerByName("Fender")?.website).toBe("https://example.com");
      expect(store.findManufacturerByName("Fender Co")).toBeNull();
    });

    it("reports a missing manufacturer for a model", () => {
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "Rickenbacker", name: "360", year: 1964 },
      });

      expect(result.success).toBe(false);
      expect(result.failure_kind).toBe("missing_dependency");
      expect(result.conflicts).toEqual(["Manufacturer 'Rickenbacker' not found"]);
    });

    it("reports a missing model reference without fallback text", () => {
      ingestSubmission(store, { manufacturer: gibson });
      const result = ingestSubmission(store, {
        individual_guitar: {
          model_reference: { manufacturer_name: "Gibson", model_name: "Flying V", year: 1958 },
        },
      });

      expect(result.failure_kind).toBe("missing_dependency");
      expect(result.conflicts).toEqual(["Model 'Flying V' (1958) by 'Gibson' not found"]);
    });

    it("falls back to free text when the model reference does not resolve", () => {
      const result = ingestSubmission(store, {
        individual_guitar: {
          model_reference: { manufacturer_name: "Gibson", model_name: "Flying V", year: 1958 },
          manufacturer_name_fallback: "Gibson",
          model_name_fallback: "Flying V",
          year_estimate: "1958",
        },
      });

      expect(result.actions_taken).toEqual(["Guitar insert"]);
      const guitar = store.getIndividualGuitar(result.ids_created.individual_guitar ?? "");
      expect(guitar).toMatchObject({ modelId: null, manufacturerNameFallback: "Gibson", yearEstimate: "1958" });
    });

    it("never merges fallback-only guitars", () => {
      const unit = {
        individual_guitar: {
          manufacturer_name_fallback: "Gibson",
          model_name_fallback: "Les Paul",
          year_estimate: "1959",
          production_date: "1959-06-01",
        },
      };
      ingestSubmission(store, unit);
      const result = ingestSubmission(store, unit);

      expect(result.actions_taken).toEqual(["Guitar insert"]);
      expect(store.countRows("individual_guitars")).toBe(2);
    });

    it("leaves no rows behind when a later section fails", () => {
      const result = ingestSubmission(store, {
        manufacturer: { name: "Gretsch" },
        model: { manufacturer_name: "Gretch", name: "White Falcon", year: 1955 },
      });

      expect(result.conflicts).toEqual(["Manufacturer 'Gretch' not found"]);
      expect(result.actions_taken).toEqual([]);
      expect(store.countRows("manufacturers")).toBe(0);
    });

    it("returns schema violations without touching the catalog", () => {
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "Gibson", name: "SG", year: 1850 },
      });

      expect(result.failure_kind).toBe("schema_violation");
      expect(result.conflicts).toEqual(["model.year: Number must be greater than or equal to 1900"]);
    });

    it("merges an exact-name resubmission of a defunct manufacturer", () => {
      const kay = new EntityWriter(store).insertManufacturer({ name: "Kay", status: ManufacturerStatus.DEFUNCT });
      const result = ingestSubmission(store, { manufacturer: { name: "KAY", notes: "Chicago, 1931-1968" } });

      expect(result).toMatchObject({ success: true, actions_taken: ["Manufacturer update"], ids_created: {} });
      expect(result.ids_resolved.manufacturer).toBe(kay.id);
      expect(store.getManufacturer(kay.id)).toMatchObject({
        name: "Kay",
        notes: "Chicago, 1931-1968",
        status: ManufacturerStatus.DEFUNCT,
      });
      expect(store.countRows("manufacturers")).toBe(1);
    });

    it("resolves a guitar's reference by the submitted name of a merged model", () => {
      const seeded = ingestSubmission(store, { manufacturer: gibson, model: lesPaul });
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "Gibson", name: "Les Paul Std", year: 1959 },
        individual_guitar: {
          model_reference: { manufacturer_name: "Gibson", model_name: "Les Paul Std", year: 1959 },
          serial_number: "9-1234",
        },
      });

      expect(result.success).toBe(true);
      expect(result.actions_taken).toEqual(["Model update", "Guitar insert"]);
      expect(result.ids_resolved.model).toBe(seeded.ids_created.model);
      const guitar = store.getIndividualGuitar(result.ids_created.individual_guitar ?? "");
      expect(guitar?.modelId).toBe(seeded.ids_created.model);
      expect(store.countRows("models")).toBe(1);
    });

    it("holds a near model match for manual review", () => {
      ingestSubmission(store, { manufacturer: gibson, model: lesPaul });
      // similarity 0.64 plus the year bonus
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "Gibson", name: "Les Paul", year: 1959 },
      });

      expect(result).toMatchObject({
        success: false,
        manual_review_needed: true,
        failure_kind: "manual_review",
        conflicts: ["Model conflict: Similar model found: Les Paul Standard (1959)"],
        actions_taken: [],
        ids_created: {},
      });
      expect(store.countRows("models")).toBe(1);
    });

    it("resolves manufacturer names case-insensitively outside ASCII", () => {
      ingestSubmission(store, { manufacturer: { name: "H\u00f6fner", country: "Germany" } });
      const result = ingestSubmission(store, {
        model: { manufacturer_name: "H\u00d6FNER", name: "500/1", year: 1962 },
      });

      expect(result.success).toBe(true);
      expect(result.actions_taken).toEqual(["Model insert"]);
      expect(store.getModel(result.ids_created.model ?? "")?.manufacturerId).toBe(
        store.findManufacturerByName("h\u00f6fner")?.id
      );
    });
  });

  describe("ingestBatch", () => {
    const validNames = ["Gibson", "Fender", "Martin", "Rickenbacker", "Gretsch", "Taylor"];

    function batchOf(validCount: number, invalidCount: number): unknown[] {
      const valid = validNames.slice(0, validCount).map((name) => ({ manufacturer: { name } }));
      const invalid = Array.from({ length: invalidCount }, () => ({}));
      return [...valid, ...invalid];
    }

    it("deduplicates within a batch", () => {
      const result = ingestBatch(store, [
        { manufacturer: { name: "Gibson Guitar Corporation", country: "USA" } },
        { manufacturer: { name: "Gibson Guitar Corporation", website: "https://example.com" } },
      ]);

      expect(result.success).toBe(true);
      expect(result.partial_success).toBeUndefined();
      expect(result.results.map((r) => r.actions_taken)).toEqual([["Manufacturer insert"], ["Manufacturer update"]]);
      expect(result.summary.actions_taken).toEqual({
        manufacturers_inserted: 1,
        manufacturers_updated: 1,
        models_inserted: 0,
        models_updated: 0,
        guitars_inserted: 0,
        guitars_updated: 0,
      });
      expect(store.countRows("manufacturers")).toBe(1);
      expect(store.findManufacturerByName("Gibson Guitar Corporation")).toMatchObject({
        country: "USA",
        website: "https://example.com",
      });
    });

    it("lets later items reference entities created earlier in the batch", () => {
      const result = ingestBatch(store, [
        { manufacturer: gibson, model: lesPaul },
        { individual_guitar: { model_reference: lesPaulRef, serial_number: "9-0824" } },
      ]);

      expect(result.results[1].actions_taken).toEqual(["Guitar insert"]);
      const guitar = store.getIndividualGuitar(result.results[1].ids_created.individual_guitar ?? "");
      expect(guitar?.modelId).toBe(result.results[0].ids_created.model);
    });

    it("rolls everything back when most submissions fail", () => {
      const result = ingestBatch(store, batchOf(4, 6));

      expect(result).toMatchObject({
        success: false,
        processed_count: 10,
        total_count: 10,
        rolled_back: true,
        rollback_reason: "High failure rate: 6/10 submissions failed",
      });
      expect(result.summary.successful).toBe(4);
      expect(result.summary.failed).toBe(6);
      expect(store.countRows("manufacturers")).toBe(0);
    });

    it("commits the successful items when at most half fail", () => {
      const result = ingestBatch(store, batchOf(6, 4));

      expect(result.success).toBe(false);
      expect(result.partial_success).toBe(true);
      expect(result.rolled_back).toBeUndefined();
      expect(result.summary.failed).toBe(4);
      expect(result.results[9]).toMatchObject({ index: 9, success: false, failure_kind: "schema_violation" });
      expect(store.countRows("manufacturers")).toBe(6);
    });

    it("honours a stricter failure-rate override", () => {
      const result = ingestBatch(store, batchOf(6, 4), { maxFailureRate: 0.3 });

      expect(result.rolled_back).toBe(true);
      expect(result.rollback_reason).toBe("High failure rate: 4/10 submissions failed");
      expect(store.countRows("manufacturers")).toBe(0);
    });

    it("falls back to the default rate when the override is not a number", () => {
      const result = ingestBatch(store, batchOf(4, 6), { maxFailureRate: Number.NaN });

      expect(result.rolled_back).toBe(true);
      expect(result.rollback_reason).toBe("High failure rate: 6/10 submissions failed");
      expect(store.countRows("manufacturers")).toBe(0);
    });

    it("drops a failed item's writes but commits its neighbours", () => {
      const result = ingestBatch(store, [
        { manufacturer: { name: "Gibson" } },
        {
          manufacturer: { name: "Gretsch" },
          model: { manufacturer_name: "Gretch", name: "White Falcon", year: 1955 },
        },
        { manufacturer: { name: "Martin" } },
      ]);

      expect(result.partial_success).toBe(true);
      expect(result.results[1].ids_created).toEqual({});
      expect(store.findManufacturerByName("Gretsch")).toBeNull();
      expect(store.countRows("manufacturers")).toBe(2);
    });

    it("counts manual reviews in the summary", () => {
      const result = ingestBatch(store, [
        { manufacturer: { name: "Fender", country: "USA" } },
        { manufacturer: { name: "Fender Co", country: "USA" } },
      ]);

      expect(result.summary.manual_review_needed).toBe(1);
      expect(result.summary.failed).toBe(1);
      expect(result.partial_success).toBe(true);
    });

    it("reports success for an empty batch", () => {
      expect(ingestBatch(store, [])).toMatchObject({
        success: true,
        processed_count: 0,
        total_count: 0,
        results: [],
      });
    });

    it("rolls back on an error outside item handling", () => {
      vi.spyOn(store, "transaction").mockImplementationOnce(() => {
        throw new Error("database is locked");
      });

      const result = ingestBatch(store, [{ manufacturer: gibson }]);

      expect(result).toMatchObject({
        success: false,
        rolled_back: true,
        error: "Batch processing error: database is locked",
        total_count: 1,
        results: [],
      });
      expect(store.countRows("manufacturers")).toBe(0);
    });
  });

  describe("processSubmission", () => {
    it("returns the bare result for a single record", () => {
      const result = processSubmission(store, { manufacturer: gibson });
      expect("total_count" in result).toBe(false);
      expect(result).toMatchObject({ index: 0, success: true });
    });

    it("returns the batch result for an array", () => {
      const result = processSubmission(store, [{ manufacturer: gibson }]);
      expect(result).toMatchObject({ success: true, total_count: 1, processed_count: 1 });
    });

    it("attaches specifications to the right parent", () => {
      const result = processSubmission(store, {
        manufacturer: gibson,
        model: lesPaul,
      });
      expect("ids_created" in result && result.ids_created.model).toBeTruthy();
      const modelId = store.findModel("Gibson", "Les Paul Standard", 1959)?.id ?? "";
      expect(store.getSpecifications({ kind: EntityKind.MODEL, id: modelId })[0].caseIncluded).toBe(true);
    });
  });
});
