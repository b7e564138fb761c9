import type { CountByCategory, TopNByMetric } from "@/types/statistics";

export const TOP_N = 5;

/** Arithmetic mean; 0 for an empty set. */
export const average = (values: number[]): number =>
  values.length === 0
    ? 0
    : values.reduce((sum, value) => sum + value, 0) / values.length;

export const roundTo = (value: number, decimals = 2): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const distinctCount = <T>(values: T[]): number => new Set(values).size;

/** Groups rows by key, skipping null or empty keys. */
export const groupBy = <T, K>(
  rows: T[],
  keyOf: (row: T) => K | null | undefined
): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null || key === undefined || key === "") {
      continue;
    }
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
};

/** Counts per category, largest first, then by category name. */
export const groupCount = <T>(
  rows: T[],
  categoryOf: (row: T) => string | null | undefined
): CountByCategory[] =>
  Array.from(groupBy(rows, categoryOf), ([category, members]) => ({
    category,
    count: members.length,
  })).sort(
    (left, right) =>
      right.count - left.count || left.category.localeCompare(right.category)
  );

/**
 * Highest `metric` first; equal values keep ascending `tieBreak` order so the
 * ranking does not depend on storage order.
 */
export const topN = <TEntry>(
  entries: TEntry[],
  metric: keyof TEntry & string,
  valueOf: (entry: TEntry) => number,
  tieBreak: (entry: TEntry) => number | string,
  limit = TOP_N
): TopNByMetric<TEntry> => {
  const compareTie = (left: TEntry, right: TEntry): number => {
    const a = tieBreak(left);
    const b = tieBreak(right);
    return typeof a === "number" && typeof b === "number"
      ? a - b
      : String(a).localeCompare(String(b));
  };

  return {
    metric,
    limit,
    entries: [...entries]
      .sort(
        (left, right) =>
          valueOf(right) - valueOf(left) || compareTie(left, right)
      )
      .slice(0, limit),
  };
};

/** Distinct non-empty values, ascending. */
export const distinctValues = (values: (string | null)[]): string[] =>
  Array.from(
    new Set(values.filter((value): value is string => Boolean(value)))
  ).sort((left, right) => left.localeCompare(right));
