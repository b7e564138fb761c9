import type {
  MonthlyOrderTrend,
  PeriodUnit,
  RevenueByPeriod,
} from "@/types/statistics";
import { centsToNumber, sumCents, toCents } from "@/utils/money";
import { InvalidInputError } from "@/utils/errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export const PERIOD_UNITS: readonly PeriodUnit[] = ["day", "week", "month"];

export interface RevenueSource {
  orderDate: Date;
  totalAmount: string;
}

interface Bucket {
  label: string;
  year: number;
  index: number;
}

const pad = (value: number): string => String(value).padStart(2, "0");

export const parsePeriodUnit = (value: string | undefined): PeriodUnit => {
  if (value === undefined || value.trim() === "") {
    return "day";
  }
  const unit = PERIOD_UNITS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!unit) {
    throw new InvalidInputError("Period must be one of: day, week, month");
  }
  return unit;
};

export const dayOfYear = (date: Date): number => {
  const start = Date.UTC(date.getUTCFullYear(), 0, 1);
  const day = Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate()
  );
  return (day - start) / DAY_MS + 1;
};

/** Week 1 is days 1-7 of the year, week 2 days 8-14, and so on (UTC). */
export const weekOfYear = (date: Date): number =>
  Math.floor((dayOfYear(date) - 1) / 7) + 1;

const bucketOf = (date: Date, unit: PeriodUnit): Bucket => {
  const year = date.getUTCFullYear();
  switch (unit) {
    case "day":
      return {
        label: `${year}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`,
        year,
        index: dayOfYear(date),
      };
    case "week": {
      const week = weekOfYear(date);
      return { label: `${year}-W${pad(week)}`, year, index: week };
    }
    case "month":
      return {
        label: `${year}-${pad(date.getUTCMonth() + 1)}`,
        year,
        index: date.getUTCMonth() + 1,
      };
  }
};

export const periodLabel = (date: Date, unit: PeriodUnit): string =>
  bucketOf(date, unit).label;

/** Groups orders into buckets, ascending by period. */
export const revenueByPeriod = (
  orders: RevenueSource[],
  unit: PeriodUnit
): RevenueByPeriod[] => {
  const buckets = new Map<string, { bucket: Bucket; amounts: number[] }>();

  for (const order of orders) {
    const bucket = bucketOf(order.orderDate, unit);
    const entry = buckets.get(bucket.label);
    if (entry) {
      entry.amounts.push(toCents(order.totalAmount));
    } else {
      buckets.set(bucket.label, {
        bucket,
        amounts: [toCents(order.totalAmount)],
      });
    }
  }

  return Array.from(buckets.values())
    .sort(
      (left, right) =>
        left.bucket.year - right.bucket.year ||
        left.bucket.index - right.bucket.index
    )
    .map(({ bucket, amounts }) => ({
      period: bucket.label,
      orderCount: amounts.length,
      revenue: centsToNumber(sumCents(amounts)),
    }));
};

export const monthlyOrderTrend = (
  orders: RevenueSource[]
): MonthlyOrderTrend[] =>
  revenueByPeriod(orders, "month").map(({ period, orderCount, revenue }) => {
    const [year, month] = period.split("-").map(Number);
    return { year, month, orderCount, revenue };
  });

/** The UTC midnight `days` days before the day containing `now`. */
export const startOfUtcDay = (now: Date, daysBack = 0): Date =>
  new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - daysBack)
  );

export const monthsAgo = (now: Date, months: number): Date => {
  const date = new Date(now.getTime());
  date.setUTCMonth(date.getUTCMonth() - months);
  return date;
};

export const daysAgo = (now: Date, days: number): Date =>
  new Date(now.getTime() - days * DAY_MS);
