/**
 * Time-series bucketing engine for trends.
 * Groups filtered records into calendar buckets with optional breakdown by dimension.
 */

import { compareText } from "./utils.js";
import type { VisitRecord, VisitTable } from "./types.js";

export type BucketSize = "daily" | "weekly" | "monthly" | "yearly";
export type BreakdownDimension = "client" | "procedure";

export const BUCKET_SIZES: readonly BucketSize[] = ["daily", "weekly", "monthly", "yearly"];
export const BREAKDOWN_DIMENSIONS: readonly BreakdownDimension[] = ["client", "procedure"];

/** Breakdown key that collects everything outside the top N. */
export const OTHER_KEY = "OTHER";

export interface TimeSeriesPoint {
  /** Bucket start (UTC midnight). */
  date: Date;
  /** Human-readable label (e.g., "Jan 05", "2024-W02", "Jan 2024"). */
  label: string;
  /** Summed quantity for this bucket. */
  value: number;
  /** Optional breakdown by dimension (e.g., client → quantity). */
  breakdown?: Map<string, number>;
}

export interface BreakdownOptions {
  by: BreakdownDimension;
  top: number;
}

const DAY_MS = 86_400_000;

/** Calendar date (YYYY-MM-DD) as a UTC midnight Date. */
export function toUtcDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00Z`);
}

/** Pick a granularity from the span of dates in the view. */
export function autoBucketSize(view: VisitTable): BucketSize {
  if (view.length === 0) return "daily";
  let min = Infinity;
  let max = -Infinity;
  for (const r of view) {
    const t = toUtcDate(r.date).getTime();
    if (t < min) min = t;
    if (t > max) max = t;
  }
  const spanDays = (max - min) / DAY_MS;
  if (spanDays <= 31) return "daily";
  if (spanDays <= 182) return "weekly";
  return "monthly";
}

function isoWeek(date: Date): { year: number; week: number } {
  const d = new Date(date);
  d.setUTCDate(d.getUTCDate() + 4 - (d.getUTCDay() || 7));
  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  const week = Math.ceil(((d.getTime() - yearStart.getTime()) / DAY_MS + 1) / 7);
  return { year: d.getUTCFullYear(), week };
}

/** Format a bucket start date as a human-readable label. */
export function bucketLabel(date: Date, size: BucketSize): string {
  switch (size) {
    case "daily":
      return date.toLocaleString("en-US", { month: "short", day: "2-digit", timeZone: "UTC" });
    case "weekly": {
      const { year, week } = isoWeek(date);
      return `${year}-W${String(week).padStart(2, "0")}`;
    }
    case "monthly":
      return date.toLocaleString("en-US", { month: "short", year: "numeric", timeZone: "UTC" });
    case "yearly":
      return String(date.getUTCFullYear());
  }
}

/** Get the bucket start date for a given date and size. */
export function bucketStart(date: Date, size: BucketSize): Date {
  const y = date.getUTCFullYear();
  const m = date.getUTCMonth();
  const d = date.getUTCDate();

  switch (size) {
    case "daily":
      return new Date(Date.UTC(y, m, d));
    case "weekly": {
      const dt = new Date(Date.UTC(y, m, d));
      const day = dt.getUTCDay();
      const diff = day === 0 ? 6 : day - 1; // Monday start
      dt.setUTCDate(dt.getUTCDate() - diff);
      return dt;
    }
    case "monthly":
      return new Date(Date.UTC(y, m, 1));
    case "yearly":
      return new Date(Date.UTC(y, 0, 1));
  }
}

function breakdownKey(record: VisitRecord, by: BreakdownDimension): string {
  return by === "client" ? record.client : record.procedure;
}

interface Bucket {
  date: Date;
  value: number;
  breakdown: Map<string, number>;
}

/** Build a quantity trend from records, optionally broken down by a dimension. */
export function buildTrend(
  view: VisitTable,
  size: BucketSize,
  breakdown?: BreakdownOptions,
): TimeSeriesPoint[] {
  if (view.length === 0) return [];

  const buckets = new Map<number, Bucket>();

  for (const record of view) {
    const start = bucketStart(toUtcDate(record.date), size);
    const key = start.getTime();

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { date: start, value: 0, breakdown: new Map() };
      buckets.set(key, bucket);
    }
    bucket.value += record.quantity;

    if (breakdown) {
      const name = breakdownKey(record, breakdown.by);
      bucket.breakdown.set(name, (bucket.breakdown.get(name) ?? 0) + record.quantity);
    }
  }

  const sorted = [...buckets.values()].sort((a, b) => a.date.getTime() - b.date.getTime());

  // Apply top-N + OTHER to breakdowns
  if (breakdown) {
    const globalTotals = new Map<string, number>();
    for (const bucket of sorted) {
      for (const [name, val] of bucket.breakdown) {
        globalTotals.set(name, (globalTotals.get(name) ?? 0) + val);
      }
    }
    const topSet = new Set(
      [...globalTotals.entries()]
        .sort(([a, x], [b, y]) => y - x || compareText(a, b))
        .slice(0, breakdown.top)
        .map(([name]) => name)
    );

    for (const bucket of sorted) {
      const collapsed = new Map<string, number>();
      let other = 0;
      for (const [name, val] of bucket.breakdown) {
        if (topSet.has(name)) {
          collapsed.set(name, val);
        } else {
          other += val;
        }
      }
      if (other > 0) collapsed.set(OTHER_KEY, other);
      bucket.breakdown = collapsed;
    }
  }

  return sorted.map((bucket) => ({
    date: bucket.date,
    label: bucketLabel(bucket.date, size),
    value: bucket.value,
    breakdown: breakdown ? bucket.breakdown : undefined,
  }));
}
