import { describe, it, expect } from "vitest";
import { validateSubmission } from "../lib/validation";
import { SchemaViolation } from "../lib/errors";

function violationsOf(data: unknown): string[] {
  try {
    validateSubmission(data);
  } catch (err) {
    if (err instanceof SchemaViolation) return err.conflicts();
    throw err;
  }
  throw new Error("expected a SchemaViolation");
}

describe("validateSubmission", () => {
  it("accepts a complete submission", () => {
    const submission = validateSubmission({
      manufacturer: { name: "  Gibson  ", country: "USA", founded_year: 1902 },
      model: { manufacturer_name: "Gibson", name: "Les Paul Standard", year: 1959 },
      individual_guitar: {
        model_reference: { manufacturer_name: "Gibson", model_name: "Les Paul Standard", year: 1959 },
        serial_number: "9-0824",
        production_date: "1959-06-01",
      },
    });

    expect(submission.manufacturer?.name).toBe("Gibson");
    expect(submission.individual_guitar?.serial_number).toBe("9-0824");
  });

  it("rejects an empty submission", () => {
    expect(violationsOf({})).toEqual([
      "Submission must contain at least one of: manufacturer, model, individual_guitar",
    ]);
  });

  it("rejects a non-object submission", () => {
    expect(violationsOf("not a submission")).toEqual(["Expected object, received string"]);
  });

  it("rejects unknown keys with the section path", () => {
    expect(violationsOf({ manufacturer: { name: "Gibson", colour: "red" } })).toEqual([
      "manufacturer: Unrecognized key(s) in object: 'colour'",
    ]);
  });

  it("enforces numeric bounds", () => {
    expect(violationsOf({ model: { manufacturer_name: "Gibson", name: "SG", year: 1850 } })).toEqual([
      "model.year: Number must be greater than or equal to 1900",
    ]);
  });

  it("enforces the date format", () => {
    const violations = violationsOf({
      individual_guitar: {
        manufacturer_name_fallback: "Gibson",
        description: "Sunburst single-cut",
        production_date: "1959/06/01",
      },
    });
    expect(violations).toEqual(["individual_guitar.production_date: Expected a date in YYYY-MM-DD format"]);
  });

  it("requires a model reference or enough fallback text on a guitar", () => {
    expect(violationsOf({ individual_guitar: { nickname: "Lucille" } })).toEqual([
      "individual_guitar: Requires model_reference, or manufacturer_name_fallback with model_name_fallback or description",
    ]);
    // A blank description does not count
    expect(violationsOf({
      individual_guitar: { manufacturer_name_fallback: "Gibson", description: "   " },
    })).toHaveLength(1);
  });

  it("accepts fallback identity without a model reference", () => {
    const submission = validateSubmission({
      individual_guitar: { manufacturer_name_fallback: "Gibson", model_name_fallback: "Les Paul" },
    });
    expect(submission.individual_guitar?.model_reference).toBeUndefined();
  });

  it("wraps a single specification object into a list", () => {
    const submission = validateSubmission({
      model: {
        manufacturer_name: "Gibson",
        name: "Les Paul Standard",
        year: 1959,
        specifications: { body_wood: "Mahogany", num_frets: 22 },
      },
    });
    expect(submission.model?.specifications).toEqual([{ body_wood: "Mahogany", num_frets: 22 }]);
  });

  it("rejects an empty specification list", () => {
    expect(violationsOf({
      model: { manufacturer_name: "Gibson", name: "Les Paul Standard", year: 1959, specifications: [] },
    })).toEqual(["model.specifications: Array must contain at least 1 element(s)"]);
  });

  it("reports the index of a bad specification", () => {
    expect(violationsOf({
      model: {
        manufacturer_name: "Gibson",
        name: "Les Paul Standard",
        year: 1959,
        specifications: [{ num_frets: 22 }, { num_frets: 40 }],
      },
    })).toEqual(["model.specifications.1.num_frets: Number must be less than or equal to 36"]);
  });

  it("collects every violation in one error", () => {
    try {
      validateSubmission({ manufacturer: { name: "", founded_year: 1700 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaViolation);
      if (err instanceof SchemaViolation) {
        expect(err.kind).toBe("schema_violation");
        expect(err.violations.map((v) => v.path)).toEqual(["manufacturer.name", "manufacturer.founded_year"]);
      }
    }
  });
});
