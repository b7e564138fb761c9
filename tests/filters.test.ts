import {
  FilterBuilder,
  normalizeSearchTerm,
  validateDateRange,
  validatePositiveId,
  validateRange,
} from "../src/query/filters";
import { InvalidInputError } from "../src/utils/errors";

interface Row {
  id: number;
  name: string;
  city: string | null;
  price: string;
}

describe("FilterBuilder", () => {
  it("should skip absent values", () => {
    const where = new FilterBuilder<Row>()
      .equals("id", undefined)
      .atLeast("price", undefined)
      .atMost("price", undefined)
      .contains("city", undefined)
      .containsAny(["name", "city"], undefined)
      .oneOf("id", undefined)
      .add(undefined)
      .build();

    expect(where).toEqual([]);
  });

  it("should trim text terms and drop blank ones", () => {
    const where = new FilterBuilder<Row>()
      .contains("city", "  ")
      .contains("name", "  tea ")
      .build();

    expect(where).toEqual([{ op: "contains", field: "name", value: "tea" }]);
  });

  it("should turn a multi-field search into one any-branch", () => {
    const where = new FilterBuilder<Row>()
      .equals("id", 0)
      .containsAny(["name", "city"], "por")
      .build();

    expect(where).toEqual([
      { op: "eq", field: "id", value: 0 },
      {
        op: "any",
        predicates: [
          { op: "contains", field: "name", value: "por" },
          { op: "contains", field: "city", value: "por" },
        ],
      },
    ]);
  });

  it("should keep range bounds including zero", () => {
    const where = new FilterBuilder<Row>()
      .atLeast("price", 0)
      .atMost("price", 12.5)
      .build();

    expect(where).toEqual([
      { op: "gte", field: "price", value: 0 },
      { op: "lte", field: "price", value: 12.5 },
    ]);
  });
});

describe("query validation", () => {
  it("should accept open and equal ranges", () => {
    expect(() => validateRange("amount", undefined, 5)).not.toThrow();
    expect(() => validateRange("amount", 5, 5)).not.toThrow();
  });

  it("should reject negative and inverted ranges", () => {
    expect(() => validateRange("amount", -1, undefined)).toThrow(
      "Minimum amount cannot be negative"
    );
    expect(() => validateRange("amount", undefined, -1)).toThrow(
      "Maximum amount cannot be negative"
    );
    expect(() => validateRange("amount", 9, 3)).toThrow(
      "Minimum amount cannot be greater than maximum amount"
    );
  });

  it("should reject a from date after the to date", () => {
    const earlier = new Date("2026-01-01T00:00:00.000Z");
    const later = new Date("2026-01-02T00:00:00.000Z");

    expect(() => validateDateRange(earlier, later)).not.toThrow();
    expect(() => validateDateRange(later, earlier)).toThrow(InvalidInputError);
  });

  it.each([0, -3, 1.5])("should reject id %p", (id) => {
    expect(() => validatePositiveId("Customer ID", id)).toThrow(
      "Customer ID must be a positive integer"
    );
  });

  it("should normalize search terms", () => {
    expect(normalizeSearchTerm("  ab ")).toBe("ab");
    expect(() => normalizeSearchTerm(undefined)).toThrow(
      "Search term is required"
    );
    expect(() => normalizeSearchTerm(" a ")).toThrow(
      "Search term must be at least 2 characters"
    );
  });
});
