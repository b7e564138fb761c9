import type { FieldOf, FieldValue, Predicate } from "@/types/store";
import { InvalidInputError } from "@/utils/errors";

export const SEARCH_MIN_LENGTH = 2;
export const SEARCH_LIMIT = 20;

/**
 * Collects predicates for a listing. Every method ignores an absent value, so
 * optional query parameters can be passed straight through.
 */
export class FilterBuilder<T> {
  private readonly predicates: Predicate<T>[] = [];

  equals(field: FieldOf<T>, value: FieldValue | undefined): this {
    if (value !== undefined) {
      this.predicates.push({ op: "eq", field, value });
    }
    return this;
  }

  atLeast(field: FieldOf<T>, value: number | Date | undefined): this {
    if (value !== undefined) {
      this.predicates.push({ op: "gte", field, value });
    }
    return this;
  }

  atMost(field: FieldOf<T>, value: number | Date | undefined): this {
    if (value !== undefined) {
      this.predicates.push({ op: "lte", field, value });
    }
    return this;
  }

  contains(field: FieldOf<T>, value: string | undefined): this {
    const term = value?.trim();
    if (term) {
      this.predicates.push({ op: "contains", field, value: term });
    }
    return this;
  }

  /** Matches when any of the fields contains the term. */
  containsAny(fields: FieldOf<T>[], value: string | undefined): this {
    const term = value?.trim();
    if (term) {
      this.predicates.push({
        op: "any",
        predicates: fields.map(
          (field): Predicate<T> => ({ op: "contains", field, value: term })
        ),
      });
    }
    return this;
  }

  oneOf(field: FieldOf<T>, values: FieldValue[] | undefined): this {
    if (values !== undefined) {
      this.predicates.push({ op: "in", field, values });
    }
    return this;
  }

  add(predicate: Predicate<T> | undefined): this {
    if (predicate) {
      this.predicates.push(predicate);
    }
    return this;
  }

  build(): Predicate<T>[] {
    return [...this.predicates];
  }
}

export const validateRange = (
  label: string,
  min: number | undefined,
  max: number | undefined
): void => {
  if (min !== undefined && min < 0) {
    throw new InvalidInputError(`Minimum ${label} cannot be negative`);
  }
  if (max !== undefined && max < 0) {
    throw new InvalidInputError(`Maximum ${label} cannot be negative`);
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw new InvalidInputError(
      `Minimum ${label} cannot be greater than maximum ${label}`
    );
  }
};

export const validateDateRange = (
  from: Date | undefined,
  to: Date | undefined
): void => {
  if (from && to && from.getTime() > to.getTime()) {
    throw new InvalidInputError("From date cannot be after to date");
  }
};

export const validatePositiveId = (
  label: string,
  id: number | undefined
): void => {
  if (id !== undefined && (!Number.isInteger(id) || id <= 0)) {
    throw new InvalidInputError(`${label} must be a positive integer`);
  }
};

export const normalizeSearchTerm = (term: string | undefined): string => {
  const trimmed = term?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new InvalidInputError("Search term is required");
  }
  if (trimmed.length < SEARCH_MIN_LENGTH) {
    throw new InvalidInputError(
      `Search term must be at least ${SEARCH_MIN_LENGTH} characters`
    );
  }
  return trimmed;
};
